import type { MiddlewareHandler } from 'hono';
import { createLogger } from '../../utils/logger.js';
import { createContext } from '../../utils/context.js';
import { getMetrics, METRIC_NAMES } from '../../observability/index.js';
import type { ApiEnv } from '../env.js';

const logger = createLogger('HTTP');
const metrics = getMetrics();

function clientIp(forwardedFor: string | undefined, realIp: string | undefined): string | undefined {
  const first = forwardedFor?.split(',')[0]?.trim();
  return first || realIp || undefined;
}

/**
 * Builds the RequestContext handed to services: caller identity, client ip
 * and a deadline of `timeoutMs` that also fires when the client goes away.
 * Logs and counts every request once it has a status.
 */
export function requestContext(options: { timeoutMs: number }): MiddlewareHandler<ApiEnv> {
  return async (c, next) => {
    const principal = c.get('principal');
    c.set(
      'ctx',
      createContext({
        requestId: c.get('requestId'),
        userId: principal?.userId,
        role: principal?.role ?? 'user',
        clientIp: clientIp(c.req.header('X-Forwarded-For'), c.req.header('X-Real-IP')),
        timeoutMs: options.timeoutMs,
        signal: c.req.raw.signal,
      })
    );

    const startTime = Date.now();
    await next();

    const durationMs = Date.now() - startTime;
    const status = c.res.status;
    metrics.increment(METRIC_NAMES.HTTP_REQUESTS, 1, { method: c.req.method, status: String(status) });
    const fields = { requestId: c.get('requestId'), method: c.req.method, path: c.req.path, status, durationMs };
    if (status >= 500) {
      logger.error('Request failed', fields);
    } else {
      logger.info('Request completed', fields);
    }
  };
}
