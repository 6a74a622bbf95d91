/**
 * Task handlers
 *
 * One handler per task type. Every handler is idempotent: it re-reads the
 * state it acts on, so redelivery and retries are harmless.
 */

import { z } from 'zod';
import { getMetrics, METRIC_NAMES } from '../observability/index.js';
import type { Store } from '../store/types.js';
import type { JobClient } from '../queues/job-client.js';
import { TASK_TYPES } from '../queues/task.js';
import type { CartService } from '../services/cart-service.js';
import type { NotificationService } from '../services/notification-service.js';
import type { OrderService } from '../services/order-service.js';
import type { PaymentService } from '../services/payment-service.js';
import type { StockCache } from '../services/stock-cache.js';
import { payloadOf, type TaskMux } from './mux.js';

const VERIFICATION_TOKEN_TTL_MS = 24 * 60 * 60_000;
const RESET_TOKEN_TTL_MS = 60 * 60_000;

export interface HandlerDependencies {
  store: Store;
  jobs: JobClient;
  orders: OrderService;
  payments: PaymentService;
  carts: CartService;
  notifications: NotificationService;
  stock: StockCache;
  limits: {
    releaseExpiredReservations: number;
    removeExpiredPromotions: number;
    sendPending: number;
    retryFailed: number;
    notificationRetentionDays: number;
  };
  clock?: () => number;
}

const orderPayload = z.object({ order_id: z.string().min(1) });
const bookPayload = z.object({ book_id: z.string().min(1) });
const refundPayload = z.object({ refund_id: z.string().min(1) });
const userPayload = z.object({ user_id: z.string().min(1) });
const limitPayload = (fallback: number) =>
  z.object({ limit: z.number().int().positive().default(fallback) });
const promotionSweepPayload = (fallback: number) =>
  z.object({
    limit: z.number().int().positive().default(fallback),
    offset: z.number().int().nonnegative().default(0),
  });
const cleanupPayload = (fallback: number) =>
  z.object({ older_than_days: z.number().int().positive().default(fallback) });
const trackPayload = z.object({
  order_id: z.string(),
  user_id: z.string(),
  total: z.number(),
  payment_method: z.string(),
});

export function registerHandlers(mux: TaskMux, deps: HandlerDependencies): TaskMux {
  const clock = deps.clock ?? Date.now;
  const metrics = getMetrics();

  return mux
    .handle(TASK_TYPES.AUTO_RELEASE_RESERVATION, async ({ ctx, envelope, logger, span }) => {
      const { order_id } = payloadOf(orderPayload, envelope);
      const released = await deps.orders.autoRelease(ctx, order_id);
      span.tags['order.id'] = order_id;
      span.tags['order.released'] = released;
      logger.info(released ? 'Reservation released' : 'Order no longer pending', { orderId: order_id });
    })

    .handle(TASK_TYPES.RELEASE_EXPIRED_RESERVATIONS, async ({ ctx, envelope, logger }) => {
      const { limit } = payloadOf(limitPayload(deps.limits.releaseExpiredReservations), envelope);
      const released = await deps.orders.releaseExpired(ctx, limit);
      logger.debug('Expired reservation sweep finished', { released });
    })

    .handle(TASK_TYPES.SEND_ORDER_CONFIRMATION, async ({ ctx, envelope, logger }) => {
      const { order_id } = payloadOf(orderPayload, envelope);
      const messageId = await deps.notifications.sendOrderConfirmation(ctx, order_id);
      logger.info('Order confirmation sent', { orderId: order_id, messageId });
    })

    .handle(TASK_TYPES.TRACK_CHECKOUT, async ({ envelope, logger }) => {
      const event = payloadOf(trackPayload, envelope);
      metrics.increment(METRIC_NAMES.CHECKOUTS_TRACKED, 1, { method: event.payment_method });
      logger.metric('checkout.total', event.total, { method: event.payment_method });
      logger.info('Checkout tracked', { orderId: event.order_id, userId: event.user_id });
    })

    .handle(TASK_TYPES.SYNC_BOOK_STOCK, async ({ ctx, envelope }) => {
      const { book_id } = payloadOf(bookPayload, envelope);
      await deps.stock.sync(ctx, book_id);
    })

    .handle(TASK_TYPES.EXECUTE_REFUND, async ({ ctx, envelope, logger }) => {
      const { refund_id } = payloadOf(refundPayload, envelope);
      const status = await deps.payments.executeRefund(ctx, refund_id);
      logger.info('Refund executed', { refundId: refund_id, status });
    })

    .handle(TASK_TYPES.EMAIL_VERIFICATION, async ({ ctx, envelope }) => {
      const { user_id } = payloadOf(userPayload, envelope);
      await deps.notifications.sendVerificationEmail(ctx, user_id);
    })

    .handle(TASK_TYPES.REMOVE_EXPIRED_PROMOTIONS, async ({ ctx, envelope, logger }) => {
      const { limit, offset } = payloadOf(promotionSweepPayload(deps.limits.removeExpiredPromotions), envelope);
      const result = await deps.carts.removeExpiredPromotions(ctx, offset, limit);
      if (result.nextOffset !== null) {
        await deps.jobs.enqueue(
          TASK_TYPES.REMOVE_EXPIRED_PROMOTIONS,
          { limit, offset: result.nextOffset },
          {
            queue: envelope.queue,
            maxRetry: envelope.maxRetry,
            timeoutMs: envelope.timeoutMs,
            correlationId: envelope.correlationId,
            traceContext: ctx.trace,
          }
        );
        logger.info('Promotion sweep continues', { nextOffset: result.nextOffset });
      }
    })

    .handle(TASK_TYPES.CLEANUP_EXPIRED_TOKENS, async ({ ctx, logger }) => {
      const now = clock();
      const verification = new Date(now - VERIFICATION_TOKEN_TTL_MS).toISOString();
      const reset = new Date(now - RESET_TOKEN_TTL_MS).toISOString();
      const cleared = await deps.store.transaction(ctx, async (tx) => ({
        verification: await tx.users.clearExpiredVerificationTokens(verification),
        reset: await tx.users.clearExpiredResetTokens(reset),
      }));
      logger.info('Expired tokens cleared', cleared);
    })

    .handle(TASK_TYPES.NOTIFICATION_SEND_PENDING, async ({ ctx, envelope }) => {
      const { limit } = payloadOf(limitPayload(deps.limits.sendPending), envelope);
      await deps.notifications.sendPending(ctx, limit);
    })

    .handle(TASK_TYPES.NOTIFICATION_RETRY_FAILED, async ({ ctx, envelope }) => {
      const { limit } = payloadOf(limitPayload(deps.limits.retryFailed), envelope);
      await deps.notifications.retryFailed(ctx, limit);
    })

    .handle(TASK_TYPES.NOTIFICATION_CLEANUP_OLD, async ({ ctx, envelope }) => {
      const { older_than_days } = payloadOf(cleanupPayload(deps.limits.notificationRetentionDays), envelope);
      await deps.notifications.cleanupOld(ctx, older_than_days);
    });
}
