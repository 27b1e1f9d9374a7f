/**
 * Maps ordering results onto HTTP responses.
 */
import {Either} from 'purify-ts';
import {z} from 'zod';
import {ErrorCategory, errorCategory, OrderingError} from '../pure/errors';

export type HttpResponse = {
  readonly status: number;
  readonly body: unknown;
};

const statusByCategory: Record<ErrorCategory, number> = {
  ValidationError: 400,
  NotFoundError: 404,
  BusinessRuleViolation: 409,
  PersistenceError: 500,
};

export function statusFor(error: OrderingError): number {
  return statusByCategory[errorCategory(error.kind)];
}

export function ok(body: unknown, status = 200): HttpResponse {
  return { status, body };
}

export function failure(error: OrderingError): HttpResponse {
  if (errorCategory(error.kind) === 'PersistenceError') {
    console.error(`❌ ${error.kind}: ${error.message}`, error.cause ?? '');
  }
  return { status: statusFor(error), body: { error: error.message, kind: error.kind } };
}

export function toResponse<T>(
  result: Either<OrderingError, T>,
  render: (value: T) => unknown = value => value,
  status = 200
): HttpResponse {
  return result.caseOf({
    Left: failure,
    Right: value => ok(render(value), status),
  });
}

export function invalidRequest(error: z.ZodError): HttpResponse {
  return {
    status: 400,
    body: {
      error: 'Invalid request',
      details: error.issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)),
    },
  };
}

/**
 * Parse an input with the schema, answering 400 when it does not match.
 */
export function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  handle: (parsed: z.output<S>) => Promise<HttpResponse>
): Promise<HttpResponse> {
  const parsed = schema.safeParse(input);
  return parsed.success ? handle(parsed.data) : Promise.resolve(invalidRequest(parsed.error));
}

export const internalError: HttpResponse = {
  status: 500,
  body: { error: 'Internal server error' },
};
