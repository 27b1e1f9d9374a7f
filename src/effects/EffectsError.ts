/**
 * An effect failure the caller cannot turn into an OrderingError, such as
 * a rollback that did not complete. Keeps every underlying failure.
 */
export class EffectsError extends Error {
    readonly failures: readonly Error[];

    constructor(context: string, failures: Error[]) {
        super(`${context}: ${failures.map(e => e.message).join('; ')}`);
        this.name = 'EffectsError';
        this.failures = failures;
    }
}
