/**
 * Job Client - enqueue side of the background job queue
 *
 * Responsibilities:
 * - Wrap payloads in a TaskEnvelope and send them to the queue of their class
 * - Delayed execution through SQS DelaySeconds (longer delays are finished
 *   off by the worker through visibility extensions)
 * - Deduplication: at most one pending task per (type, dedupKey), held as a
 *   SETNX key in the keyspace until the task completes or is dead-lettered
 * - Cancel-by-key: marks the pending task cancelled so the worker drops it
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger.js';
import { ConflictError } from '../utils/errors.js';
import { getMetrics, getTracer, METRIC_NAMES, type SpanContext } from '../observability/index.js';
import { KEYS, type KeyValueStore } from '../keyspace/types.js';
import type { MessageAttributes, MessageTransport } from './transport.js';
import {
  DEFAULT_MAX_RETRY,
  DEFAULT_TIMEOUT_MS,
  MAX_DELAY_SECONDS,
  deadLetterQueueName,
  physicalQueueName,
  type EnqueueOptions,
  type QueueName,
  type TaskEnvelope,
  type TaskInfo,
} from './task.js';

const logger = createLogger('JobClient');

const UNIQUE_KEY_SLACK_SECONDS = 24 * 60 * 60;

export interface JobClientOptions {
  prefix: string;
  clock?: () => number;
}

export class JobClient {
  private readonly metrics = getMetrics();
  private readonly prefix: string;
  private readonly clock: () => number;

  constructor(
    private readonly transport: MessageTransport,
    private readonly ks: KeyValueStore,
    options: JobClientOptions
  ) {
    this.prefix = options.prefix;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Enqueue a task. Throws ConflictError `duplicate_task` when a task with
   * the same type and dedup key is still pending.
   */
  async enqueue(type: string, payload: unknown, options: EnqueueOptions = {}): Promise<TaskInfo> {
    const now = this.clock();
    const envelope: TaskEnvelope = {
      id: uuidv4(),
      type,
      payload: JSON.parse(JSON.stringify(payload ?? null)),
      queue: options.queue ?? 'default',
      retried: 0,
      maxRetry: options.maxRetry ?? DEFAULT_MAX_RETRY,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      notBefore: options.notBefore && options.notBefore.getTime() > now ? options.notBefore.toISOString() : null,
      dedupKey: options.dedupKey ?? null,
      enqueuedAt: new Date(now).toISOString(),
      lastError: null,
      correlationId: options.correlationId ?? uuidv4(),
    };

    if (envelope.dedupKey !== null) {
      const uniqueKey = KEYS.jobUnique(type, envelope.dedupKey);
      const ttl = Math.ceil(this.delayMs(envelope) / 1000) + UNIQUE_KEY_SLACK_SECONDS;
      const claimed = await this.ks.setIfAbsent(uniqueKey, envelope.id, ttl);
      if (!claimed) {
        throw new ConflictError('duplicate_task', `A ${type} task with key ${envelope.dedupKey} is already pending`, {
          type,
          dedupKey: envelope.dedupKey,
        });
      }
      try {
        await this.send(envelope, options.traceContext);
      } catch (error) {
        await this.ks.delete(uniqueKey);
        throw error;
      }
    } else {
      await this.send(envelope, options.traceContext);
    }

    this.metrics.increment(METRIC_NAMES.JOBS_ENQUEUED, 1, { type, queue: envelope.queue });
    logger.debug('Task enqueued', {
      taskId: envelope.id,
      type,
      queue: envelope.queue,
      notBefore: envelope.notBefore,
      correlationId: envelope.correlationId,
    });

    return { id: envelope.id, type, queue: envelope.queue, notBefore: envelope.notBefore };
  }

  /**
   * Cancel the pending task holding (type, dedupKey). Returns false when no
   * such task is pending. A handler already running is not interrupted.
   */
  async cancelByKey(type: string, dedupKey: string): Promise<boolean> {
    const uniqueKey = KEYS.jobUnique(type, dedupKey);
    const taskId = await this.ks.get(uniqueKey);
    if (taskId === null) {
      return false;
    }
    await this.ks.set(KEYS.jobCancelled(taskId), type, UNIQUE_KEY_SLACK_SECONDS);
    await this.ks.delete(uniqueKey);
    logger.info('Task cancelled by key', { taskId, type, dedupKey });
    return true;
  }

  async isCancelled(taskId: string): Promise<boolean> {
    return (await this.ks.get(KEYS.jobCancelled(taskId))) !== null;
  }

  /** Re-send a failed task with its attempt counter bumped. */
  async retry(envelope: TaskEnvelope, error: string, delayMs: number, trace?: SpanContext): Promise<void> {
    await this.send(
      {
        ...envelope,
        retried: envelope.retried + 1,
        lastError: error,
        notBefore: new Date(this.clock() + delayMs).toISOString(),
      },
      trace
    );
  }

  /** Park a task in its queue's DLQ and free its dedup key. */
  async deadLetter(envelope: TaskEnvelope, error: string): Promise<void> {
    await this.transport.send(
      deadLetterQueueName(this.prefix, envelope.queue),
      JSON.stringify({ ...envelope, lastError: error }),
      { attributes: this.attributes(envelope) }
    );
    await this.releaseKey(envelope);
  }

  /** Park a body that is not a valid envelope. */
  async deadLetterRaw(queue: QueueName, body: string, reason: string): Promise<void> {
    await this.transport.send(deadLetterQueueName(this.prefix, queue), body, {
      attributes: { DeadLetterReason: { DataType: 'String', StringValue: reason } },
    });
  }

  /**
   * Free the dedup key once the task has finished, unless a newer task with
   * the same key has already claimed it.
   */
  async releaseKey(envelope: TaskEnvelope): Promise<void> {
    if (envelope.dedupKey === null) return;
    const uniqueKey = KEYS.jobUnique(envelope.type, envelope.dedupKey);
    const holder = await this.ks.get(uniqueKey);
    if (holder === envelope.id) {
      await this.ks.delete(uniqueKey);
    }
  }

  /** Send an envelope that already exists (dead-letter replay). */
  async resend(envelope: TaskEnvelope): Promise<void> {
    await this.send(envelope);
  }

  private async send(envelope: TaskEnvelope, trace?: SpanContext): Promise<void> {
    const delaySeconds = Math.min(MAX_DELAY_SECONDS, Math.ceil(this.delayMs(envelope) / 1000));
    const attributes = this.attributes(envelope);
    await this.transport.send(physicalQueueName(this.prefix, envelope.queue), JSON.stringify(envelope), {
      delaySeconds: delaySeconds > 0 ? delaySeconds : undefined,
      attributes: trace ? getTracer().injectToAttributes(trace, attributes) : attributes,
    });
  }

  private delayMs(envelope: TaskEnvelope): number {
    return envelope.notBefore === null ? 0 : Math.max(0, Date.parse(envelope.notBefore) - this.clock());
  }

  private attributes(envelope: TaskEnvelope): MessageAttributes {
    return {
      TaskType: { DataType: 'String', StringValue: envelope.type },
      CorrelationId: { DataType: 'String', StringValue: envelope.correlationId },
    };
  }
}
