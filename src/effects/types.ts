// ============================================================================
// Configuration
// ============================================================================

export type StorageKind = 'memory' | 'postgres';

export type DatabaseConfig = {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
}

export type AppConfig = {
    readonly storage: StorageKind;
    readonly seedFile: string;
    readonly database: DatabaseConfig;
    readonly apiPort: number;
}
