import type { MiddlewareHandler } from 'hono';
import { v4 as uuidv4 } from 'uuid';
import type { ApiEnv } from '../env.js';

const MAX_LENGTH = 128;

/**
 * Echoes a caller-supplied X-Request-ID (when sane) or generates one, and
 * sets it on the response so logs and clients can be correlated.
 */
export const requestIdMiddleware: MiddlewareHandler<ApiEnv> = async (c, next) => {
  const supplied = c.req.header('X-Request-ID');
  const requestId = supplied && supplied.length <= MAX_LENGTH ? supplied : uuidv4();

  c.set('requestId', requestId);
  c.header('X-Request-ID', requestId);
  await next();
};
