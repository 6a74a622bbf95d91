/**
 * Dead Letter Inspector - operator tooling for failed tasks
 *
 * Responsibilities:
 * - List the tasks parked in a queue's DLQ, with the error that parked them
 * - Replay a task onto its source queue with a fresh attempt budget
 * - Purge a DLQ
 *
 * Listing reads with a zero visibility timeout so inspected messages stay
 * available; SQS returns at most 10 per call.
 */

import { createLogger } from '../utils/logger.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import type { JobClient } from '../queues/job-client.js';
import type { MessageTransport, TransportMessage } from '../queues/transport.js';
import {
  QUEUES,
  deadLetterQueueName,
  taskEnvelopeSchema,
  type QueueName,
  type TaskEnvelope,
} from '../queues/task.js';

const logger = createLogger('DeadLetterInspector');

const MAX_BATCH = 10;

export interface DeadTask {
  messageId: string;
  queue: QueueName;
  /** Null when the body never was a valid envelope. */
  envelope: TaskEnvelope | null;
  body: string;
  reason: string;
  receiveCount: number;
}

export interface DeadLetterSummary {
  total: number;
  byQueue: Record<string, number>;
  byType: Record<string, number>;
}

function parseEnvelope(body: string): TaskEnvelope | null {
  try {
    const parsed = taskEnvelopeSchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    logger.debug('Dead letter body is not JSON', { error: String(error) });
    return null;
  }
}

export class DeadLetterInspector {
  constructor(
    private readonly transport: MessageTransport,
    private readonly jobs: JobClient,
    private readonly prefix: string
  ) {}

  async list(queue: QueueName, max = MAX_BATCH): Promise<DeadTask[]> {
    const messages = await this.peek(queue, max);
    return messages.map((message) => this.describe(queue, message));
  }

  async summary(): Promise<DeadLetterSummary> {
    const byQueue: Record<string, number> = {};
    const byType: Record<string, number> = {};
    let total = 0;

    for (const queue of QUEUES) {
      for (const task of await this.list(queue)) {
        total += 1;
        byQueue[queue] = (byQueue[queue] ?? 0) + 1;
        const type = task.envelope?.type ?? 'invalid';
        byType[type] = (byType[type] ?? 0) + 1;
      }
    }
    return { total, byQueue, byType };
  }

  /** Send the task back to its queue with `retried` reset, then drop it from the DLQ. */
  async replay(queue: QueueName, messageId: string): Promise<TaskEnvelope> {
    const message = (await this.peek(queue, MAX_BATCH)).find((m) => m.id === messageId);
    if (!message) throw new NotFoundError('dead_letter', messageId);

    const envelope = parseEnvelope(message.body);
    if (!envelope) {
      throw new ValidationError('invalid_envelope', 'Dead letter is not a replayable task', { messageId });
    }

    const replayed: TaskEnvelope = { ...envelope, retried: 0, lastError: null, notBefore: null };
    await this.jobs.resend(replayed);
    await this.transport.delete(deadLetterQueueName(this.prefix, queue), message.receiptHandle);

    logger.info('Dead letter replayed', { taskId: envelope.id, type: envelope.type, queue });
    return replayed;
  }

  async purge(queue: QueueName): Promise<void> {
    await this.transport.purge(deadLetterQueueName(this.prefix, queue));
    logger.warn('Dead letter queue purged', { queue });
  }

  private peek(queue: QueueName, max: number): Promise<TransportMessage[]> {
    return this.transport.receive(deadLetterQueueName(this.prefix, queue), {
      maxMessages: Math.min(max, MAX_BATCH),
      waitTimeSeconds: 0,
      visibilityTimeoutSeconds: 0,
    });
  }

  private describe(queue: QueueName, message: TransportMessage): DeadTask {
    const envelope = parseEnvelope(message.body);
    return {
      messageId: message.id,
      queue,
      envelope,
      body: message.body,
      reason: envelope?.lastError ?? message.attributes['DeadLetterReason']?.StringValue ?? 'unknown',
      receiveCount: message.receiveCount,
    };
  }
}
