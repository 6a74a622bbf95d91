/**
 * Queue Manager - Job Queue Infrastructure
 *
 * One SQS queue per priority class, each with its own dead-letter queue:
 *
 *   <prefix>-high          ──▶ <prefix>-high-dlq
 *   <prefix>-default       ──▶ <prefix>-default-dlq
 *   <prefix>-low           ──▶ <prefix>-low-dlq
 *   <prefix>-notification  ──▶ <prefix>-notification-dlq
 *   <prefix>-auth          ──▶ <prefix>-auth-dlq
 *   <prefix>-promotion     ──▶ <prefix>-promotion-dlq
 *
 * DLQs are created first since the redrive policy references their ARN.
 */

import type { SQSClient } from '@aws-sdk/client-sqs';
import {
  createQueue,
  getQueueArn,
  configureDeadLetterQueue,
  deleteQueue,
  listQueues,
} from './sqs-client.js';
import { QUEUES, physicalQueueName, deadLetterQueueName, type QueueName } from './task.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const logger = createLogger('QueueManager');

const DLQ_RETENTION_SECONDS = 1_209_600; // 14 days

/** Receives before SQS itself moves a message aside. */
const REDRIVE_MAX_RECEIVE_COUNT = 10;

export interface QueueConfig {
  name: string;
  url: string;
  arn: string;
  dlqName: string;
  dlqUrl: string;
  dlqArn: string;
  visibilityTimeout: number;
  maxReceiveCount: number;
}

export type QueueTopology = Record<QueueName, QueueConfig>;

/** Longest handler timeout per queue, in seconds, plus headroom. */
const VISIBILITY_TIMEOUTS: Record<QueueName, number> = {
  high: 60,
  default: 60,
  low: 60,
  notification: 660,
  auth: 330,
  promotion: 660,
};

async function initializeQueue(client: SQSClient, prefix: string, queue: QueueName): Promise<QueueConfig> {
  const dlqName = deadLetterQueueName(prefix, queue);
  const dlqUrl = await createQueue(client, dlqName, { messageRetentionPeriod: DLQ_RETENTION_SECONDS });
  const dlqArn = await getQueueArn(client, dlqUrl);

  const name = physicalQueueName(prefix, queue);
  const visibilityTimeout = VISIBILITY_TIMEOUTS[queue];
  const url = await createQueue(client, name, { visibilityTimeout });
  const arn = await getQueueArn(client, url);

  await configureDeadLetterQueue(client, url, dlqArn, REDRIVE_MAX_RECEIVE_COUNT);

  return {
    name,
    url,
    arn,
    dlqName,
    dlqUrl,
    dlqArn,
    visibilityTimeout,
    maxReceiveCount: REDRIVE_MAX_RECEIVE_COUNT,
  };
}

/**
 * Create every queue and DLQ. CreateQueue is idempotent for identical
 * attributes, so this runs on each worker start.
 */
export async function initializeQueues(client: SQSClient, prefix: string): Promise<QueueTopology> {
  logger.info('Initializing job queue infrastructure...', { prefix });

  const topology: QueueTopology = {
    high: await initializeQueue(client, prefix, 'high'),
    default: await initializeQueue(client, prefix, 'default'),
    low: await initializeQueue(client, prefix, 'low'),
    notification: await initializeQueue(client, prefix, 'notification'),
    auth: await initializeQueue(client, prefix, 'auth'),
    promotion: await initializeQueue(client, prefix, 'promotion'),
  };

  logger.info('Queue infrastructure initialized successfully', {
    queues: QUEUES.map((queue) => topology[queue].name),
  });

  return topology;
}

/**
 * Clean up all queues (for testing/development)
 */
export async function destroyQueues(client: SQSClient, prefix: string): Promise<void> {
  logger.info('Destroying job queues...', { prefix });

  const queues = await listQueues(client, `${prefix}-`);

  for (const queueUrl of queues) {
    try {
      await deleteQueue(client, queueUrl);
    } catch (error) {
      logger.warn(`Failed to delete queue: ${queueUrl}`, { error: errorMessage(error) });
    }
  }

  logger.info('All queues destroyed');
}
