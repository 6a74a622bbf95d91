/**
 * Worker process entry point
 *
 * Ensures the queue topology exists, then runs the task worker and the cron
 * scheduler until SIGINT/SIGTERM.
 */

import { loadConfig } from './config/index.js';
import { createContainer } from './container.js';
import { getSQSClient } from './queues/sqs-client.js';
import { initializeQueues } from './queues/queue-manager.js';
import { createLogger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { getMetrics } from './observability/index.js';

const logger = createLogger('WorkerMain');

async function main(): Promise<void> {
  const config = loadConfig();
  await initializeQueues(getSQSClient(config.aws), config.aws.queuePrefix);

  const container = createContainer(config);
  container.worker.start();
  container.scheduler.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, draining in-flight tasks...`);
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
  logger.error('Worker failed to start', { error: errorMessage(error) });
  process.exit(1);
});
