/**
 * Application error model
 *
 * Every failure that can reach a caller is an AppError carrying:
 * - kind: the coarse class that decides the HTTP status and retry policy
 * - code: a stable snake_case tag clients can switch on
 * - details: optional structured payload (offending lines, fresh prices...)
 *
 * The mapping from kind to HTTP status lives in one place
 * (api/middleware/error-handling.ts); services only ever throw.
 */

export type ErrorKind =
  | 'validation'
  | 'unauthorized'
  | 'forbidden'
  | 'not_found'
  | 'conflict'
  | 'not_eligible'
  | 'dependency'
  | 'timeout'
  | 'fatal';

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly code: string;
  readonly details?: unknown;

  constructor(kind: ErrorKind, code: string, message: string, details?: unknown, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
    this.details = details;
  }

  /** Transient failures the worker should retry and the client may retry. */
  get retryable(): boolean {
    return this.kind === 'dependency' || this.kind === 'timeout' || this.code === 'serialization_failure';
  }
}

export class ValidationError extends AppError {
  constructor(code: string, message: string, details?: unknown) {
    super('validation', code, message, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super('unauthorized', 'unauthorized', message);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Not allowed') {
    super('forbidden', 'forbidden', message);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super('not_found', `${entity}_not_found`, `${entity} ${id} not found`, { id });
  }
}

export class ConflictError extends AppError {
  constructor(code: string, message: string, details?: unknown, options?: ErrorOptions) {
    super('conflict', code, message, details, options);
  }
}

export class NotEligibleError extends AppError {
  constructor(code: string, message: string, details?: unknown) {
    super('not_eligible', code, message, details);
  }
}

export class DependencyError extends AppError {
  constructor(code: string, message: string, options?: ErrorOptions) {
    super('dependency', code, message, undefined, options);
  }
}

export class TimeoutError extends AppError {
  constructor(code: string, message: string, options?: ErrorOptions) {
    super('timeout', code, message, undefined, options);
  }
}

/**
 * Broken stock or payment invariant. Logged with its code, counted, and
 * never retried.
 */
export class InvariantViolationError extends AppError {
  constructor(code: string, message: string, details?: unknown) {
    super('fatal', code, message, details);
  }
}

/**
 * Thrown by task handlers when retrying cannot help (bad payload, entity
 * gone). The worker moves the task straight to the dead-letter queue.
 */
export class SkipRetryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SkipRetryError';
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
