/**
 * Post-commit side effects
 *
 * Domain services never call each other's side effects directly; they publish
 * task intents here once their transaction has committed. A failed enqueue
 * never fails the business operation that triggered it: it is logged and
 * counted, and the affected handlers tolerate the missing task: the scheduled
 * cart:release_expired_reservations sweep releases reservations whose timer
 * was lost, and cached stock expires through its TTL.
 */

import { createLogger } from '../utils/logger.js';
import { isAppError, errorMessage } from '../utils/errors.js';
import type { RequestContext } from '../utils/context.js';
import { getMetrics, METRIC_NAMES } from '../observability/index.js';
import type { JobClient } from '../queues/job-client.js';
import { TASK_TYPES, type EnqueueOptions } from '../queues/task.js';
import type { Order } from '../types/index.js';

const logger = createLogger('TaskPublisher');

export class TaskPublisher {
  private readonly metrics = getMetrics();

  constructor(
    private readonly jobs: JobClient,
    private readonly options: { reservationTtlMs: number }
  ) {}

  async orderPlaced(ctx: RequestContext, order: Order, bookIds: string[]): Promise<void> {
    await this.enqueue(ctx, TASK_TYPES.SEND_ORDER_CONFIRMATION, { order_id: order.id }, { queue: 'high' });
    await this.enqueue(
      ctx,
      TASK_TYPES.AUTO_RELEASE_RESERVATION,
      { order_id: order.id },
      {
        queue: 'default',
        notBefore: new Date(Date.parse(order.createdAt) + this.options.reservationTtlMs),
        dedupKey: order.id,
      }
    );
    await this.enqueue(
      ctx,
      TASK_TYPES.TRACK_CHECKOUT,
      { order_id: order.id, user_id: order.userId, total: order.total, payment_method: order.paymentMethod },
      { queue: 'low' }
    );
    await this.stockChanged(ctx, bookIds);
  }

  /** Drop the pending auto-release timer once payment (or COD) has settled the order. */
  async cancelAutoRelease(ctx: RequestContext, orderId: string): Promise<void> {
    try {
      const cancelled = await this.jobs.cancelByKey(TASK_TYPES.AUTO_RELEASE_RESERVATION, orderId);
      logger.debug('Auto-release cancellation', { orderId, cancelled, requestId: ctx.requestId });
    } catch (error) {
      // The handler re-checks order status, so a surviving timer is harmless.
      logger.warn('Failed to cancel auto-release task', { orderId, error: errorMessage(error) });
    }
  }

  async stockChanged(ctx: RequestContext, bookIds: Iterable<string>): Promise<void> {
    for (const bookId of new Set(bookIds)) {
      await this.enqueue(ctx, TASK_TYPES.SYNC_BOOK_STOCK, { book_id: bookId }, { queue: 'default' });
    }
  }

  async refundApproved(ctx: RequestContext, refundId: string): Promise<void> {
    await this.enqueue(ctx, TASK_TYPES.EXECUTE_REFUND, { refund_id: refundId }, { queue: 'default', dedupKey: refundId });
  }

  private async enqueue(ctx: RequestContext, type: string, payload: unknown, options: EnqueueOptions): Promise<void> {
    try {
      await this.jobs.enqueue(type, payload, { ...options, correlationId: ctx.requestId, traceContext: ctx.trace });
    } catch (error) {
      if (isAppError(error) && error.code === 'duplicate_task') {
        logger.debug('Task already pending', { type, dedupKey: options.dedupKey });
        return;
      }
      this.metrics.increment(METRIC_NAMES.JOBS_ENQUEUE_FAILED, 1, { type });
      logger.error('Failed to enqueue task', {
        type,
        requestId: ctx.requestId,
        error: errorMessage(error),
      });
    }
  }
}
