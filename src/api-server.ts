/**
 * API process entry point
 *
 * Usage:
 *   npm run build && npm run start:api
 */

import { serve } from '@hono/node-server';
import { loadConfig } from './config/index.js';
import { createContainer } from './container.js';
import { createLogger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { getMetrics } from './observability/index.js';

const logger = createLogger('ApiServer');

async function main(): Promise<void> {
  const config = loadConfig();
  const container = createContainer(config);

  const server = serve({ fetch: container.app.fetch, port: config.port }, (info) => {
    logger.info('API listening', { port: info.port, env: config.env });
  });

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down...`);
    server.close();
    await container.close();
    getMetrics().shutdown();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  logger.error('API failed to start', { error: errorMessage(error) });
  process.exit(1);
});
