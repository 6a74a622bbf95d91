import type { Context, ErrorHandler, NotFoundHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { createLogger } from '../../utils/logger.js';
import { isAppError, type ErrorKind } from '../../utils/errors.js';
import type { ApiEnv } from '../env.js';

const logger = createLogger('HTTP');

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500 | 503 | 504;

/** The single place error kinds become HTTP statuses. */
export const STATUS_BY_KIND: Readonly<Record<ErrorKind, ErrorStatus>> = {
  validation: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  conflict: 409,
  not_eligible: 422,
  dependency: 503,
  timeout: 504,
  fatal: 500,
};

interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

function requestIdOf(c: Context<ApiEnv>): string {
  return c.get('requestId') ?? c.req.header('X-Request-ID') ?? 'unknown';
}

/**
 * Renders `{ error: { code, message, details?, requestId } }`. Unknown
 * errors are logged with their stack and answered with a generic 500.
 */
export const errorHandler: ErrorHandler<ApiEnv> = (err, c) => {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  const requestId = requestIdOf(c);

  if (isAppError(err)) {
    const status = STATUS_BY_KIND[err.kind];
    const body: ErrorResponse = { error: { code: err.code, message: err.message, requestId } };
    if (err.details !== undefined) {
      body.error.details = err.details;
    }
    if (status >= 500) {
      logger.error('Request failed', { requestId, kind: err.kind, code: err.code, error: err.message });
    } else {
      logger.debug('Request rejected', { requestId, kind: err.kind, code: err.code });
    }
    return c.json(body, status);
  }

  logger.error('Unhandled error', { requestId, error: err.message, stack: err.stack });
  const body: ErrorResponse = {
    error: { code: 'internal_error', message: 'An unexpected error occurred', requestId },
  };
  return c.json(body, 500);
};

export const notFoundHandler: NotFoundHandler<ApiEnv> = (c) => {
  const body: ErrorResponse = {
    error: { code: 'route_not_found', message: `Route not found: ${c.req.method} ${c.req.path}`, requestId: requestIdOf(c) },
  };
  return c.json(body, 404);
};
