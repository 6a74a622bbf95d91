/**
 * Cron scheduler
 *
 * Wakes on every minute boundary, and for each registered entry whose cron
 * expression fires in that minute enqueues one task. Every (type, minute)
 * pair is claimed with SETNX in the keyspace first, so any number of worker
 * instances may run the scheduler and each scheduled run is enqueued once.
 */

import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { getMetrics, METRIC_NAMES } from '../observability/index.js';
import { KEYS, type KeyValueStore } from '../keyspace/types.js';
import { cronMatches, floorToMinute, getNextRunTime, parseCronExpression, type CronExpression } from './cron.js';
import type { JobClient } from './job-client.js';
import { TASK_TYPES, type QueueName, type TaskInfo } from './task.js';

const logger = createLogger('Scheduler');

const MINUTE_MS = 60_000;
const CLAIM_TTL_SECONDS = 24 * 60 * 60;

/** Missed minutes replayed after a stall. */
const MAX_CATCH_UP_MINUTES = 60;

export interface ScheduleEntry {
  type: string;
  cron: string;
  queue: QueueName;
  maxRetry: number;
  timeoutMs: number;
  payload: Record<string, unknown>;
}

export interface ScheduleLimits {
  releaseExpiredReservationsLimit: number;
  removeExpiredPromotionsLimit: number;
  sendPendingLimit: number;
  retryFailedLimit: number;
  notificationRetentionDays: number;
}

/** The recurring jobs of the bookstore. Cron strings are operational surface. */
export function defaultSchedule(limits: ScheduleLimits): ScheduleEntry[] {
  return [
    {
      type: TASK_TYPES.CLEANUP_EXPIRED_TOKENS,
      cron: '0 2 * * *',
      queue: 'auth',
      maxRetry: 1,
      timeoutMs: 5 * MINUTE_MS,
      payload: {},
    },
    {
      type: TASK_TYPES.NOTIFICATION_CLEANUP_OLD,
      cron: '0 3 * * *',
      queue: 'notification',
      maxRetry: 2,
      timeoutMs: 10 * MINUTE_MS,
      payload: { older_than_days: limits.notificationRetentionDays },
    },
    {
      type: TASK_TYPES.NOTIFICATION_SEND_PENDING,
      cron: '0 7 * * *',
      queue: 'notification',
      maxRetry: 3,
      timeoutMs: 2 * MINUTE_MS,
      payload: { limit: limits.sendPendingLimit },
    },
    {
      type: TASK_TYPES.REMOVE_EXPIRED_PROMOTIONS,
      cron: '0 */3 * * *',
      queue: 'promotion',
      maxRetry: 2,
      timeoutMs: 10 * MINUTE_MS,
      payload: { limit: limits.removeExpiredPromotionsLimit, offset: 0 },
    },
    {
      type: TASK_TYPES.NOTIFICATION_RETRY_FAILED,
      // Documented as every 6 h; a minute step past 59 fires at minute 0 of every hour.
      cron: '*/360 * * * *',
      queue: 'notification',
      maxRetry: 3,
      timeoutMs: 5 * MINUTE_MS,
      payload: { limit: limits.retryFailedLimit },
    },
    {
      type: TASK_TYPES.RELEASE_EXPIRED_RESERVATIONS,
      cron: '*/5 * * * *',
      queue: 'default',
      maxRetry: 1,
      timeoutMs: 2 * MINUTE_MS,
      payload: { limit: limits.releaseExpiredReservationsLimit },
    },
  ];
}

interface CompiledEntry extends ScheduleEntry {
  expression: CronExpression;
}

export class Scheduler {
  private readonly metrics = getMetrics();
  private readonly entries: CompiledEntry[];
  private readonly clock: () => number;
  private lastMinute: number | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly client: JobClient,
    private readonly ks: KeyValueStore,
    entries: ScheduleEntry[],
    options: { clock?: () => number } = {}
  ) {
    this.entries = entries.map((entry) => ({ ...entry, expression: parseCronExpression(entry.cron) }));
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Enqueue everything due in the minutes since the previous tick, up to and
   * including the minute of `now`.
   */
  async tick(now: Date = new Date(this.clock())): Promise<TaskInfo[]> {
    const current = floorToMinute(now).getTime();
    const first =
      this.lastMinute === null
        ? current
        : Math.max(this.lastMinute + MINUTE_MS, current - (MAX_CATCH_UP_MINUTES - 1) * MINUTE_MS);

    const enqueued: TaskInfo[] = [];
    for (let minute = first; minute <= current; minute += MINUTE_MS) {
      const at = new Date(minute);
      for (const entry of this.entries) {
        if (!cronMatches(entry.expression, at)) continue;
        const info = await this.fire(entry, at);
        if (info) enqueued.push(info);
      }
    }

    this.lastMinute = Math.max(this.lastMinute ?? current, current);
    return enqueued;
  }

  nextRuns(from: Date = new Date(this.clock())): Array<{ type: string; cron: string; nextRunAt: string }> {
    return this.entries.map((entry) => ({
      type: entry.type,
      cron: entry.cron,
      nextRunAt: getNextRunTime(entry.expression, from).toISOString(),
    }));
  }

  start(): void {
    if (this.timer) {
      logger.warn('Scheduler already running');
      return;
    }
    logger.info('Scheduler started', { entries: this.nextRuns() });
    this.schedule();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      logger.info('Scheduler stopped');
    }
  }

  private schedule(): void {
    const now = this.clock();
    const wait = MINUTE_MS - (now % MINUTE_MS);
    this.timer = setTimeout(() => {
      this.tick()
        .catch((error) => logger.error('Scheduler tick failed', { error: errorMessage(error) }))
        .finally(() => {
          if (this.timer) this.schedule();
        });
    }, wait);
  }

  private async fire(entry: CompiledEntry, at: Date): Promise<TaskInfo | null> {
    const runAt = at.toISOString();
    try {
      const claimed = await this.ks.setIfAbsent(KEYS.schedulerTick(entry.type, runAt), runAt, CLAIM_TTL_SECONDS);
      if (!claimed) {
        logger.debug('Scheduled run already claimed', { type: entry.type, runAt });
        return null;
      }

      const info = await this.client.enqueue(entry.type, entry.payload, {
        queue: entry.queue,
        maxRetry: entry.maxRetry,
        timeoutMs: entry.timeoutMs,
      });
      this.metrics.increment(METRIC_NAMES.SCHEDULER_TICKS, 1, { type: entry.type });
      logger.info('Scheduled task enqueued', { type: entry.type, runAt, taskId: info.id });
      return info;
    } catch (error) {
      logger.error('Failed to enqueue scheduled task', { type: entry.type, runAt, error: errorMessage(error) });
      return null;
    }
  }
}
