/**
 * Notification Service - outbound customer communications
 *
 * Responsibilities:
 * - Publish notifications as `pending` rows (inside the caller's transaction
 *   when there is one)
 * - Dispatch pending rows by email, oldest first, with a per-user cap per run
 * - Redeliver failed rows on an exponential schedule, giving up after
 *   MAX_ATTEMPTS
 * - Send the order confirmation and verification emails directly
 * - Delete sent rows past the retention window
 *
 * Delivery goes through an EmailSender; the default one only logs.
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger.js';
import { DependencyError, NotFoundError, SkipRetryError, errorMessage, isAppError } from '../utils/errors.js';
import { formatMoney } from '../utils/money.js';
import { withTimeout, type RequestContext } from '../utils/context.js';
import { getMetrics, getTracer, METRIC_NAMES } from '../observability/index.js';
import type { Repositories, Store } from '../store/types.js';
import type { Notification, User } from '../types/index.js';

const logger = createLogger('NotificationService');
const tracer = getTracer();

export const MAX_ATTEMPTS = 5;
const RETRY_BASE_MS = 5 * 60_000;

export interface EmailMessage {
  to: string;
  subject: string;
  html: string;
}

export interface EmailSender {
  /** Returns the provider's message id. */
  send(message: EmailMessage, signal: AbortSignal): Promise<string>;
}

/** Writes the message to the log instead of an SMTP relay. */
export class LoggingEmailSender implements EmailSender {
  private readonly logger = createLogger('EmailSender');

  async send(message: EmailMessage, _signal: AbortSignal): Promise<string> {
    const messageId = uuidv4();
    this.logger.info('Email sent (log only)', { messageId, to: message.to, subject: message.subject });
    return messageId;
  }
}

const EMAIL_TEMPLATES: Record<string, { subject: string; body: string }> = {
  order_confirmation: {
    subject: 'Order Confirmed - #{orderNumber}',
    body: `<p>Hi #{fullName},</p>
<p>Thank you for your order <strong>#{orderNumber}</strong>.</p>
<p>Total: #{total}</p>
<p>Please complete payment within #{ttlMinutes} minutes to keep your books reserved.</p>`,
  },
  email_verification: {
    subject: 'Verify your email address',
    body: `<p>Hi #{fullName},</p>
<p>Use this code to verify your account: <strong>#{token}</strong></p>`,
  },
  promotion_removed: {
    subject: 'A promotion was removed from your cart',
    body: `<p>Hi #{fullName},</p>
<p>The promotion #{promotionCode} is no longer available (#{reason}) and was removed from your cart.</p>`,
  },
  order_cancelled: {
    subject: 'Order Cancelled - #{orderNumber}',
    body: `<p>Hi #{fullName},</p>
<p>Your order #{orderNumber} has been cancelled.</p>`,
  },
};

export function renderTemplate(template: string, data: Record<string, unknown>): string {
  return template.replace(/#\{(\w+)\}/g, (_, key: string) => {
    const value = data[key];
    return value === undefined || value === null ? '' : String(value);
  });
}

/** 5 min, 10 min, 20 min... after the n-th failed attempt. */
export function notificationRetryDelayMs(attempts: number): number {
  return RETRY_BASE_MS * 2 ** (attempts - 1);
}

export interface DispatchResult {
  sent: number;
  failed: number;
  deferred: number;
}

export interface NotificationServiceOptions {
  smtpTimeoutMs: number;
  userRateCap: number;
  reservationTtlMs: number;
  clock?: () => number;
}

export class NotificationService {
  private readonly metrics = getMetrics();
  private readonly clock: () => number;

  constructor(
    private readonly store: Store,
    private readonly email: EmailSender,
    private readonly options: NotificationServiceOptions
  ) {
    this.clock = options.clock ?? Date.now;
  }

  publish(ctx: RequestContext, userId: string, template: string, data: Record<string, unknown>): Promise<Notification> {
    return this.store.transaction(ctx, (tx) => this.publishIn(tx, userId, template, data));
  }

  async publishIn(
    tx: Repositories,
    userId: string,
    template: string,
    data: Record<string, unknown>
  ): Promise<Notification> {
    const notification: Notification = {
      id: uuidv4(),
      userId,
      template,
      data,
      status: 'pending',
      attempts: 0,
      nextRetryAt: null,
      lastError: null,
      createdAt: new Date(this.clock()).toISOString(),
      sentAt: null,
    };
    await tx.notifications.insert(notification);
    logger.debug('Notification published', { notificationId: notification.id, userId, template });
    return notification;
  }

  /**
   * Email the confirmation for a freshly placed order. Transport failures
   * surface as retryable errors; a vanished order or user does not.
   */
  async sendOrderConfirmation(ctx: RequestContext, orderId: string): Promise<string> {
    const { order, user } = await this.store.transaction(ctx, async (tx) => {
      const order = await tx.orders.findById(orderId);
      if (!order) throw new SkipRetryError(`Order ${orderId} not found`);
      const user = await tx.users.findById(order.userId);
      if (!user) throw new SkipRetryError(`User ${order.userId} not found`);
      return { order, user };
    });

    return this.deliver(ctx, user, 'order_confirmation', {
      orderNumber: order.orderNumber,
      total: formatMoney(order.total),
      ttlMinutes: Math.round(this.options.reservationTtlMs / 60_000),
    });
  }

  /** Returns null when the user is already verified or holds no token. */
  async sendVerificationEmail(ctx: RequestContext, userId: string): Promise<string | null> {
    const user = await this.store.transaction(ctx, (tx) => tx.users.findById(userId));
    if (!user) throw new SkipRetryError(`User ${userId} not found`);
    if (user.isVerified || user.verificationToken === null) {
      logger.info('Verification email not needed', { userId, verified: user.isVerified });
      return null;
    }
    return this.deliver(ctx, user, 'email_verification', { token: user.verificationToken });
  }

  /** Pending rows, oldest first; rows over the per-user cap wait for the next run. */
  async sendPending(ctx: RequestContext, limit: number): Promise<DispatchResult> {
    const pending = await this.store.transaction(ctx, (tx) => tx.notifications.listPending(limit));
    return this.dispatch(ctx, pending);
  }

  async retryFailed(ctx: RequestContext, limit: number): Promise<DispatchResult> {
    const now = new Date(this.clock()).toISOString();
    const due = await this.store.transaction(ctx, (tx) => tx.notifications.listRetryDue(now, limit));
    return this.dispatch(ctx, due);
  }

  async cleanupOld(ctx: RequestContext, olderThanDays: number): Promise<number> {
    const cutoff = new Date(this.clock() - olderThanDays * 24 * 60 * 60_000).toISOString();
    const deleted = await this.store.transaction(ctx, (tx) => tx.notifications.deleteSentBefore(cutoff));
    logger.info('Old notifications deleted', { deleted, cutoff });
    return deleted;
  }

  private async dispatch(ctx: RequestContext, notifications: Notification[]): Promise<DispatchResult> {
    const result: DispatchResult = { sent: 0, failed: 0, deferred: 0 };
    const perUser = new Map<string, number>();

    for (const notification of notifications) {
      const count = perUser.get(notification.userId) ?? 0;
      if (count >= this.options.userRateCap) {
        result.deferred += 1;
        continue;
      }
      perUser.set(notification.userId, count + 1);

      try {
        const user = await this.store.transaction(ctx, (tx) => tx.users.findById(notification.userId));
        if (!user) throw new NotFoundError('user', notification.userId);
        await this.deliver(ctx, user, notification.template, notification.data);
        await this.store.transaction(ctx, (tx) =>
          tx.notifications.markSent(notification.id, new Date(this.clock()).toISOString())
        );
        result.sent += 1;
      } catch (error) {
        await this.recordFailure(ctx, notification, error);
        result.failed += 1;
      }
    }

    logger.info('Notifications dispatched', { ...result, requestId: ctx.requestId });
    return result;
  }

  private async recordFailure(ctx: RequestContext, notification: Notification, error: unknown): Promise<void> {
    const attempts = notification.attempts + 1;
    const nextRetryAt =
      attempts >= MAX_ATTEMPTS ? null : new Date(this.clock() + notificationRetryDelayMs(attempts)).toISOString();
    await this.store.transaction(ctx, (tx) =>
      tx.notifications.markFailed(notification.id, attempts, nextRetryAt, errorMessage(error))
    );
    this.metrics.increment(METRIC_NAMES.NOTIFICATIONS_FAILED, 1, { template: notification.template });
    logger.warn('Notification delivery failed', {
      notificationId: notification.id,
      attempts,
      gaveUp: nextRetryAt === null,
      error: errorMessage(error),
    });
  }

  private async deliver(
    ctx: RequestContext,
    user: User,
    template: string,
    data: Record<string, unknown>
  ): Promise<string> {
    const entry = EMAIL_TEMPLATES[template];
    if (!entry) throw new SkipRetryError(`Unknown notification template ${template}`);
    const values = { fullName: user.fullName, ...data };

    return tracer.trace(
      'notification.send_email',
      async () => {
        try {
          const messageId = await withTimeout(ctx, this.options.smtpTimeoutMs, 'smtp_timeout', (signal) =>
            this.email.send(
              { to: user.email, subject: renderTemplate(entry.subject, values), html: renderTemplate(entry.body, values) },
              signal
            )
          );
          this.metrics.increment(METRIC_NAMES.EMAILS_SENT, 1, { template });
          this.metrics.increment(METRIC_NAMES.NOTIFICATIONS_SENT, 1, { template });
          return messageId;
        } catch (error) {
          if (isAppError(error)) throw error;
          throw new DependencyError('smtp_unavailable', `Email delivery failed: ${errorMessage(error)}`, {
            cause: error,
          });
        }
      },
      { resourceName: template, tags: { 'email.template': template } }
    );
  }
}
