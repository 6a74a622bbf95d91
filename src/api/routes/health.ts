import { Hono } from 'hono';
import { errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { withTimeout, type RequestContext } from '../../utils/context.js';
import type { Store } from '../../store/types.js';
import type { KeyValueStore } from '../../keyspace/types.js';
import type { ApiEnv } from '../env.js';

const logger = createLogger('Health');

type CheckStatus = 'ok' | 'error';

export interface HealthReport {
  status: 'ok' | 'degraded';
  checks: { database: CheckStatus; keyspace: CheckStatus };
}

export interface HealthDependencies {
  store: Store;
  ks: KeyValueStore;
  databaseTimeoutMs: number;
  keyspaceTimeoutMs: number;
}

async function probe(name: string, fn: () => Promise<void>): Promise<CheckStatus> {
  try {
    await fn();
    return 'ok';
  } catch (error) {
    logger.warn('Health check failed', { check: name, error: errorMessage(error) });
    return 'error';
  }
}

export async function checkHealth(ctx: RequestContext, deps: HealthDependencies): Promise<HealthReport> {
  const [database, keyspace] = await Promise.all([
    probe('database', () => deps.store.ping(ctx, deps.databaseTimeoutMs)),
    probe('keyspace', () => withTimeout(ctx, deps.keyspaceTimeoutMs, 'keyspace_timeout', () => deps.ks.ping())),
  ]);
  return {
    status: database === 'ok' && keyspace === 'ok' ? 'ok' : 'degraded',
    checks: { database, keyspace },
  };
}

export function healthRoutes(deps: HealthDependencies): Hono<ApiEnv> {
  const router = new Hono<ApiEnv>();

  router.get('/health', async (c) => {
    const report = await checkHealth(c.get('ctx'), deps);
    return c.json(report, report.status === 'ok' ? 200 : 503);
  });

  return router;
}
