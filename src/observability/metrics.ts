/**
 * DataDog Metrics Client
 *
 * Unified interface for the counters, gauges and histograms the bookstore
 * emits. Points are buffered in memory and flushed on an interval when
 * `DD_ENABLED=true`; otherwise they are written to the debug log so local
 * runs and tests stay quiet.
 *
 * Naming: bookstore.<entity>.<action>. Tags stay low-cardinality (queue,
 * status, task type) - never order or user ids.
 */

import { createLogger } from '../utils/logger.js';

export interface MetricTags {
  [key: string]: string | number | boolean;
}

export interface MetricPoint {
  name: string;
  type: 'counter' | 'gauge' | 'histogram';
  value: number;
  tags: MetricTags;
  timestamp: number;
}

const logger = createLogger('Metrics');

const MAX_BUFFER_SIZE = 1000;

export const METRIC_NAMES = {
  // Checkout & orders
  CHECKOUT_ATTEMPTS: 'bookstore.checkout.attempts',
  CHECKOUT_FAILED: 'bookstore.checkout.failed',
  CHECKOUT_DURATION: 'bookstore.checkout.duration_ms',
  ORDERS_CREATED: 'bookstore.orders.created',
  ORDERS_VALUE: 'bookstore.orders.value',
  ORDERS_CANCELLED: 'bookstore.orders.cancelled',
  ORDERS_TRANSITIONS: 'bookstore.orders.transitions',
  CHECKOUTS_TRACKED: 'bookstore.analytics.checkouts',

  // Reservations
  RESERVATIONS_CREATED: 'bookstore.reservations.created',
  RESERVATIONS_REJECTED: 'bookstore.reservations.rejected',
  RESERVATIONS_RELEASED: 'bookstore.reservations.released',
  RESERVATIONS_SOLD: 'bookstore.reservations.sold',

  // Payments
  PAYMENTS_CREATED: 'bookstore.payments.created',
  PAYMENTS_SUCCEEDED: 'bookstore.payments.succeeded',
  PAYMENTS_FAILED: 'bookstore.payments.failed',
  CALLBACKS_RECEIVED: 'bookstore.callbacks.received',
  CALLBACKS_DUPLICATE: 'bookstore.callbacks.duplicate',
  REFUNDS: 'bookstore.refunds.transitions',

  // Notifications
  NOTIFICATIONS_SENT: 'bookstore.notifications.sent',
  NOTIFICATIONS_FAILED: 'bookstore.notifications.failed',
  EMAILS_SENT: 'bookstore.emails.sent',

  // Job queue
  JOBS_ENQUEUED: 'bookstore.jobs.enqueued',
  JOBS_ENQUEUE_FAILED: 'bookstore.jobs.enqueue_failed',
  JOBS_RECEIVED: 'bookstore.jobs.received',
  JOBS_PROCESSED: 'bookstore.jobs.processed',
  JOBS_RETRIED: 'bookstore.jobs.retried',
  JOBS_DEAD: 'bookstore.jobs.dead',
  JOBS_CANCELLED: 'bookstore.jobs.cancelled',
  JOBS_DURATION: 'bookstore.jobs.duration_ms',
  SCHEDULER_TICKS: 'bookstore.scheduler.enqueued',

  // Infrastructure
  DB_TRANSACTION_RETRIES: 'bookstore.db.transaction_retries',
  CACHE_ERRORS: 'bookstore.cache.errors',
  HTTP_REQUESTS: 'bookstore.http.requests',
  INVARIANT_VIOLATIONS: 'bookstore.invariant.violations',
  SERVICE_UPTIME: 'bookstore.service.uptime_seconds',
  SERVICE_ERRORS: 'bookstore.service.errors',
} as const;

class DataDogMetrics {
  private readonly defaultTags: MetricTags;
  private readonly isEnabled: boolean;
  private readonly buffer: MetricPoint[] = [];
  private flushInterval: NodeJS.Timeout | null = null;

  constructor(
    options: {
      defaultTags?: MetricTags;
      enabled?: boolean;
    } = {},
  ) {
    this.defaultTags = {
      env: process.env.DD_ENV || 'development',
      service: process.env.DD_SERVICE || 'bookstore',
      version: process.env.DD_VERSION || '1.0.0',
      ...options.defaultTags,
    };
    this.isEnabled = options.enabled ?? process.env.DD_ENABLED === 'true';

    if (this.isEnabled) {
      this.flushInterval = setInterval(() => {
        this.flush();
      }, 10000);
      this.flushInterval.unref();
    }
  }

  increment(name: string, value: number = 1, tags: MetricTags = {}): void {
    this.record(name, 'counter', value, tags);
  }

  gauge(name: string, value: number, tags: MetricTags = {}): void {
    this.record(name, 'gauge', value, tags);
  }

  histogram(name: string, value: number, tags: MetricTags = {}): void {
    this.record(name, 'histogram', value, tags);
  }

  /** Drain the buffer. The agent shipper hooks in here. */
  flush(): MetricPoint[] {
    const points = this.buffer.splice(0, this.buffer.length);
    if (points.length > 0) {
      logger.debug('Flushing metrics', { count: points.length });
    }
    return points;
  }

  getBuffer(): MetricPoint[] {
    return [...this.buffer];
  }

  shutdown(): void {
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
    this.flush();
  }

  private record(name: string, type: MetricPoint['type'], value: number, tags: MetricTags): void {
    const point: MetricPoint = {
      name,
      type,
      value,
      tags: { ...this.defaultTags, ...tags },
      timestamp: Date.now(),
    };

    if (!this.isEnabled) {
      logger.metric(name, value, tags);
      return;
    }

    this.buffer.push(point);
    if (this.buffer.length > MAX_BUFFER_SIZE) {
      this.buffer.shift();
    }
  }
}

let metricsInstance: DataDogMetrics | null = null;

export function getMetrics(options?: ConstructorParameters<typeof DataDogMetrics>[0]): DataDogMetrics {
  if (!metricsInstance) {
    metricsInstance = new DataDogMetrics(options);
  }
  return metricsInstance;
}

export { DataDogMetrics };
