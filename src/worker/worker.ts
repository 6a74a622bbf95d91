/**
 * Worker - pulls tasks from the priority queues and runs their handlers
 *
 * Implements the consumer side of the job queue:
 * - Smooth weighted round-robin across the queues (high:20, default:10, ...)
 * - Envelope validation (malformed bodies go straight to the DLQ)
 * - Cancel-by-key: cancelled tasks are dropped unrun
 * - Delays beyond the SQS cap are finished with visibility extensions
 * - Per-task timeout, enforced through the task's abort signal
 * - Exponential retry (1, 2, 4... minutes), then the dead-letter queue
 * - Graceful shutdown bounded by a grace period
 * - DataDog metrics and one APM span per task
 */

import { createLogger } from '../utils/logger.js';
import { InvariantViolationError, SkipRetryError, errorMessage } from '../utils/errors.js';
import { createContext, withTimeout } from '../utils/context.js';
import { getMetrics, getTracer, METRIC_NAMES } from '../observability/index.js';
import type { JobClient } from '../queues/job-client.js';
import type { MessageTransport, TransportMessage } from '../queues/transport.js';
import {
  MAX_VISIBILITY_SECONDS,
  QUEUES,
  QUEUE_WEIGHTS,
  physicalQueueName,
  retryDelayMs,
  taskEnvelopeSchema,
  type QueueName,
  type TaskEnvelope,
} from '../queues/task.js';
import type { TaskMux } from './mux.js';

const logger = createLogger('Worker');

const MAX_BATCH = 10;
const RECEIVE_VISIBILITY_SECONDS = 60;
const VISIBILITY_SLACK_SECONDS = 30;

/**
 * Smooth weighted round-robin: every pick adds each weight to its running
 * score, takes the highest score and subtracts the total from it.
 */
export class WeightedRoundRobin<K extends string> {
  private readonly current = new Map<K, number>();
  private readonly total: number;

  constructor(private readonly weights: ReadonlyArray<readonly [K, number]>) {
    this.total = weights.reduce((sum, [, weight]) => sum + weight, 0);
    for (const [key] of weights) this.current.set(key, 0);
  }

  next(): K {
    let best: K | null = null;
    let bestScore = -Infinity;
    for (const [key, weight] of this.weights) {
      const score = (this.current.get(key) ?? 0) + weight;
      this.current.set(key, score);
      if (score > bestScore) {
        best = key;
        bestScore = score;
      }
    }
    if (best === null) throw new Error('WeightedRoundRobin needs at least one entry');
    this.current.set(best, bestScore - this.total);
    return best;
  }
}

export interface WorkerOptions {
  prefix: string;
  concurrency: number;
  shutdownGraceMs: number;
  /** Pause between polls when every queue came back empty. */
  idleDelayMs?: number;
  weights?: Readonly<Record<QueueName, number>>;
  clock?: () => number;
}

type Outcome = 'processed' | 'retried' | 'dead' | 'cancelled' | 'deferred' | 'error';

export class Worker {
  private readonly metrics = getMetrics();
  private readonly tracer = getTracer();
  private readonly rotation: WeightedRoundRobin<QueueName>;
  private readonly byWeight: QueueName[];
  private readonly clock: () => number;
  private readonly shutdown = new AbortController();
  private running = false;
  private loop: Promise<void> | null = null;

  constructor(
    private readonly transport: MessageTransport,
    private readonly jobs: JobClient,
    private readonly mux: TaskMux,
    private readonly options: WorkerOptions
  ) {
    const weights = options.weights ?? QUEUE_WEIGHTS;
    this.rotation = new WeightedRoundRobin(QUEUES.map((queue) => [queue, weights[queue]] as const));
    this.byWeight = [...QUEUES].sort((a, b) => weights[b] - weights[a]);
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Poll one non-empty queue and process what it returned. The rotation picks
   * the first queue to try; when it is empty the remaining queues follow by
   * weight, so every queue is polled before the call reports 0. Returns the
   * number of messages handled.
   */
  async runOnce(): Promise<number> {
    for (const queue of this.pollOrder()) {
      const messages = await this.transport.receive(physicalQueueName(this.options.prefix, queue), {
        maxMessages: Math.min(MAX_BATCH, this.options.concurrency),
        waitTimeSeconds: 0,
        visibilityTimeoutSeconds: RECEIVE_VISIBILITY_SECONDS,
      });
      if (messages.length === 0) continue;

      const results = await Promise.allSettled(messages.map((message) => this.handleMessage(queue, message)));
      const failed = results.filter((r) => r.status === 'rejected' || r.value === 'error').length;
      if (failed > 0) {
        logger.warn(`${failed} message(s) could not be settled`, { queue });
      }
      return messages.length;
    }
    return 0;
  }

  private pollOrder(): QueueName[] {
    const first = this.rotation.next();
    return [first, ...this.byWeight.filter((queue) => queue !== first)];
  }

  start(): void {
    if (this.running) {
      logger.warn('Worker already running');
      return;
    }
    this.running = true;
    logger.info('Worker started', { concurrency: this.options.concurrency, handlers: this.mux.types() });
    this.loop = this.poll();
  }

  /** Stop polling and wait for in-flight tasks up to the grace period, then abort them. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    logger.info('Stopping worker...');

    const loop = this.loop ?? Promise.resolve();
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.options.shutdownGraceMs);
    });
    const result = await Promise.race([loop.then(() => 'drained' as const), grace]);
    clearTimeout(timer);

    if (result === 'timeout') {
      logger.warn('Shutdown grace period elapsed, aborting in-flight tasks');
      this.shutdown.abort(new Error('worker shutdown'));
      await loop;
    }
    logger.info('Worker stopped');
  }

  private async poll(): Promise<void> {
    const startTime = this.clock();
    while (this.running) {
      try {
        const handled = await this.runOnce();
        this.metrics.gauge(METRIC_NAMES.SERVICE_UPTIME, Math.floor((this.clock() - startTime) / 1000), {
          service: 'worker',
        });
        if (handled === 0) await this.sleep(this.options.idleDelayMs ?? 1000);
      } catch (error) {
        if (!this.running) break;
        logger.error('Error in poll loop', { error: errorMessage(error) });
        this.metrics.increment(METRIC_NAMES.SERVICE_ERRORS, 1, { service: 'worker', error_type: 'poll_error' });
        await this.sleep(5000);
      }
    }
  }

  private async handleMessage(queue: QueueName, message: TransportMessage): Promise<Outcome> {
    const physical = physicalQueueName(this.options.prefix, queue);
    try {
      return await this.process(queue, physical, message);
    } catch (error) {
      // Left on the queue: it reappears after the visibility timeout and SQS
      // redrives it once the receive count passes the queue's limit.
      logger.error('Failed to settle message', { queue, messageId: message.id, error: errorMessage(error) });
      this.metrics.increment(METRIC_NAMES.SERVICE_ERRORS, 1, { service: 'worker', error_type: 'settle_error' });
      return 'error';
    }
  }

  private async process(queue: QueueName, physical: string, message: TransportMessage): Promise<Outcome> {
    const envelope = this.parse(message.body);
    if (!envelope) {
      await this.jobs.deadLetterRaw(queue, message.body, 'invalid_envelope');
      await this.transport.delete(physical, message.receiptHandle);
      this.metrics.increment(METRIC_NAMES.JOBS_DEAD, 1, { queue, type: 'invalid' });
      logger.error('Malformed task moved to DLQ', { queue, messageId: message.id });
      return 'dead';
    }
    this.metrics.increment(METRIC_NAMES.JOBS_RECEIVED, 1, { queue, type: envelope.type });

    if (await this.jobs.isCancelled(envelope.id)) {
      await this.transport.delete(physical, message.receiptHandle);
      this.metrics.increment(METRIC_NAMES.JOBS_CANCELLED, 1, { type: envelope.type });
      logger.info('Cancelled task dropped', { taskId: envelope.id, type: envelope.type });
      return 'cancelled';
    }

    const remainingMs = envelope.notBefore === null ? 0 : Date.parse(envelope.notBefore) - this.clock();
    if (remainingMs > 0) {
      const seconds = Math.min(MAX_VISIBILITY_SECONDS, Math.ceil(remainingMs / 1000));
      await this.transport.changeVisibility(physical, message.receiptHandle, seconds);
      logger.debug('Task not due yet', { taskId: envelope.id, seconds });
      return 'deferred';
    }

    const neededSeconds = Math.ceil(envelope.timeoutMs / 1000) + VISIBILITY_SLACK_SECONDS;
    if (neededSeconds > RECEIVE_VISIBILITY_SECONDS) {
      await this.transport.changeVisibility(
        physical,
        message.receiptHandle,
        Math.min(MAX_VISIBILITY_SECONDS, neededSeconds)
      );
    }

    const startTime = this.clock();
    const error = await this.run(envelope, message);
    const durationMs = this.clock() - startTime;
    this.metrics.histogram(METRIC_NAMES.JOBS_DURATION, durationMs, { type: envelope.type });

    if (error === null) {
      await this.transport.delete(physical, message.receiptHandle);
      await this.jobs.releaseKey(envelope);
      this.metrics.increment(METRIC_NAMES.JOBS_PROCESSED, 1, { type: envelope.type, status: 'success' });
      logger.info('Task processed', { taskId: envelope.id, type: envelope.type, durationMs });
      return 'processed';
    }

    const reason = errorMessage(error);
    const fatal = error instanceof SkipRetryError || error instanceof InvariantViolationError;
    if (fatal || envelope.retried >= envelope.maxRetry) {
      await this.jobs.deadLetter(envelope, reason);
      await this.transport.delete(physical, message.receiptHandle);
      this.metrics.increment(METRIC_NAMES.JOBS_DEAD, 1, { queue, type: envelope.type });
      logger.error('Task moved to DLQ', {
        taskId: envelope.id,
        type: envelope.type,
        retried: envelope.retried,
        skipRetry: fatal,
        error: reason,
        correlationId: envelope.correlationId,
      });
      return 'dead';
    }

    const delayMs = retryDelayMs(envelope.retried + 1);
    await this.jobs.retry(envelope, reason, delayMs, this.tracer.extractFromAttributes(message.attributes));
    await this.transport.delete(physical, message.receiptHandle);
    this.metrics.increment(METRIC_NAMES.JOBS_RETRIED, 1, { type: envelope.type });
    logger.warn('Task failed, retry scheduled', {
      taskId: envelope.id,
      type: envelope.type,
      attempt: envelope.retried + 1,
      delayMs,
      error: reason,
    });
    return 'retried';
  }

  /** Run the handler inside a span; resolves to the error it failed with, or null. */
  private async run(envelope: TaskEnvelope, message: TransportMessage): Promise<unknown> {
    const ctx = createContext({
      requestId: envelope.correlationId,
      role: 'system',
      timeoutMs: envelope.timeoutMs,
      signal: this.shutdown.signal,
    });
    const taskLogger = logger.with({ taskId: envelope.id, type: envelope.type, correlationId: envelope.correlationId });

    try {
      await this.tracer.trace(
        `task.${envelope.type}`,
        (span) => {
          const traced = { ...ctx, trace: span.context };
          return withTimeout(traced, envelope.timeoutMs, 'task_timeout', () =>
            this.mux.dispatch({ ctx: traced, envelope, logger: taskLogger, span })
          );
        },
        {
          resourceName: envelope.type,
          parentContext: this.tracer.extractFromAttributes(message.attributes),
          tags: {
            'messaging.system': 'aws_sqs',
            'messaging.destination': envelope.queue,
            'task.id': envelope.id,
            'task.retried': envelope.retried,
          },
        }
      );
      return null;
    } catch (error) {
      return error;
    }
  }

  private parse(body: string): TaskEnvelope | null {
    try {
      const parsed = taskEnvelopeSchema.safeParse(JSON.parse(body));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      logger.debug('Task body is not JSON', { error: errorMessage(error) });
      return null;
    }
  }

  private sleep(ms: number): Promise<void> {
    const signal = this.shutdown.signal;
    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
