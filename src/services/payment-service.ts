/**
 * Payment Service - payment intents, gateway callbacks and refunds
 *
 * Responsibilities:
 * - Create payment intents, idempotent per (order, method) while open
 * - Verify, de-duplicate and apply gateway callbacks in one transaction
 * - Drive the order to `paid` (completing the sale) or release its stock
 * - COD confirmation and collection
 * - Refund request / approve / reject, and execution against the gateway
 *
 * Flow:
 * OrderService.checkout → createPayment → gateway redirect
 * Gateway IPN → handleCallback → ReservationEngine.completeSaleIn | releaseIn
 * Admin approve → payment:execute_refund task → executeRefund
 *
 * Gateways are only called outside database transactions.
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger.js';
import {
  ConflictError,
  DependencyError,
  NotEligibleError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';
import type { RequestContext } from '../utils/context.js';
import { getMetrics, getTracer, METRIC_NAMES, reportInvariantViolation } from '../observability/index.js';
import type { Repositories, Store } from '../store/types.js';
import type { Gateway, Order, Payment, PaymentMethod, Refund, WebhookLog } from '../types/index.js';
import { RefundRejectedError, toWholeUnits, type AckStatus, type PaymentGateway } from '../gateways/types.js';
import type { ReservationEngine } from './reservation-engine.js';
import type { TaskPublisher } from './task-publisher.js';
import { actorOf, findOrderFor, transitionOrder } from './order-state.js';

const logger = createLogger('PaymentService');
const tracer = getTracer();

export interface PaymentIntent {
  paymentId: string;
  orderId: string;
  method: PaymentMethod;
  amount: number;
  status: Payment['status'];
  txnRef: string;
  redirectUrl: string | null;
}

export interface CallbackResponse {
  httpStatus: 200 | 400;
  status: AckStatus;
  body: Record<string, unknown>;
}

export interface PaymentServiceOptions {
  maxAttempts: number;
  clock?: () => number;
}

/** Work to run once the callback transaction has committed. */
interface CallbackEffects {
  cancelAutoRelease: string | null;
  stockChanged: string[];
}

const OPEN_STATUSES: ReadonlyArray<Payment['status']> = ['initiated', 'pending'];

function toIntent(payment: Payment): PaymentIntent {
  return {
    paymentId: payment.id,
    orderId: payment.orderId,
    method: payment.method,
    amount: payment.amount,
    status: payment.status,
    txnRef: payment.gatewayTxnRef,
    redirectUrl: payment.redirectUrl,
  };
}

export class PaymentService {
  private readonly metrics = getMetrics();
  private readonly clock: () => number;

  constructor(
    private readonly store: Store,
    private readonly reservations: ReservationEngine,
    private readonly gateways: ReadonlyMap<Gateway, PaymentGateway>,
    private readonly publisher: TaskPublisher,
    private readonly options: PaymentServiceOptions
  ) {
    this.clock = options.clock ?? Date.now;
  }

  // ---------------------------------------------------------------------------
  // Payment intents
  // ---------------------------------------------------------------------------

  /**
   * Returns the open payment for (order, method) when there is one, so
   * repeated calls yield the same payment id. A new intent needs a pending
   * order whose reservations are still held.
   */
  async createPayment(ctx: RequestContext, orderId: string, method: PaymentMethod): Promise<PaymentIntent> {
    const nowMs = this.clock();
    const now = new Date(nowMs).toISOString();

    const { payment, order, created } = await this.store.transaction(
      ctx,
      async (tx) => {
        const order = await findOrderFor(tx, ctx, orderId);
        if (order.paymentMethod !== method) {
          throw new ValidationError('payment_method_mismatch', `Order ${order.orderNumber} is paid by ${order.paymentMethod}`, {
            expected: order.paymentMethod,
            received: method,
          });
        }

        const open = await tx.payments.findOpen(order.id, method);
        if (open && (order.status === 'pending' || order.status === 'confirmed')) {
          return { payment: open, order, created: false };
        }
        if (order.status !== 'pending') {
          throw new NotEligibleError('order_not_payable', `Order ${order.orderNumber} is ${order.status}`, {
            status: order.status,
          });
        }

        const held = await tx.reservations.findByOrder(order.id);
        if (held.length === 0 || held.some((r) => Date.parse(r.expiresAt) <= nowMs)) {
          throw new NotEligibleError('reservation_expired', 'Reserved stock for this order has expired', {
            orderId: order.id,
          });
        }

        const attempts = await tx.payments.countByOrder(order.id);
        if (attempts >= this.options.maxAttempts) {
          throw new NotEligibleError('payment_attempts_exceeded', 'Too many payment attempts for this order', {
            attempts,
            max: this.options.maxAttempts,
          });
        }

        const payment: Payment = {
          id: uuidv4(),
          orderId: order.id,
          method,
          amount: order.total,
          status: method === 'cod' ? 'pending' : 'initiated',
          gatewayTxnRef: `${order.orderNumber}-${attempts + 1}`,
          idempotencyKey: uuidv4(),
          redirectUrl: null,
          gatewayResponseCode: null,
          gatewayTransactionId: null,
          createdAt: now,
          updatedAt: now,
        };
        await tx.payments.insert(payment);

        if (method === 'cod') {
          await transitionOrder(tx, order, 'confirmed', { actor: actorOf(ctx), reason: 'cod_selected', at: now });
        }
        return { payment, order, created: true };
      },
      { isolation: 'serializable' }
    );

    if (created) {
      this.metrics.increment(METRIC_NAMES.PAYMENTS_CREATED, 1, { method });
      logger.info('Payment created', { paymentId: payment.id, orderId, method, requestId: ctx.requestId });
    }

    if (method === 'cod') {
      if (created) await this.publisher.cancelAutoRelease(ctx, order.id);
      return toIntent(payment);
    }
    if (payment.redirectUrl !== null) {
      return toIntent(payment);
    }
    return this.attachRedirectUrl(ctx, payment, order, method);
  }

  private async attachRedirectUrl(
    ctx: RequestContext,
    payment: Payment,
    order: Order,
    method: Gateway
  ): Promise<PaymentIntent> {
    const gateway = this.gateway(method);
    let redirectUrl: string;
    try {
      redirectUrl = await tracer.trace(
        'payment.create_url',
        () =>
          gateway.createPaymentUrl(
            {
              txnRef: payment.gatewayTxnRef,
              amount: payment.amount,
              orderInfo: `Payment for order ${order.orderNumber}`,
              clientIp: ctx.clientIp ?? '127.0.0.1',
              createdAt: new Date(this.clock()),
            },
            ctx.signal
          ),
        { resourceName: method, tags: { 'payment.id': payment.id } }
      );
    } catch (error) {
      logger.warn('Payment URL creation failed', { paymentId: payment.id, error: errorMessage(error) });
      await this.store.transaction(ctx, (tx) =>
        tx.payments.update(payment.id, { status: 'failed' }, new Date(this.clock()).toISOString())
      );
      this.metrics.increment(METRIC_NAMES.PAYMENTS_FAILED, 1, { method, reason: 'gateway_unavailable' });
      throw error;
    }

    const at = new Date(this.clock()).toISOString();
    await this.store.transaction(ctx, (tx) =>
      tx.payments.update(payment.id, { status: 'pending', redirectUrl }, at)
    );
    return { ...toIntent(payment), status: 'pending', redirectUrl };
  }

  // ---------------------------------------------------------------------------
  // Gateway callbacks
  // ---------------------------------------------------------------------------

  /**
   * Verify, de-duplicate and apply a gateway callback. Every callback is
   * written to the webhook log. The response is the gateway's own
   * acknowledgement body; only an invalid signature answers 400.
   */
  async handleCallback(ctx: RequestContext, gatewayName: Gateway, params: Record<string, string>): Promise<CallbackResponse> {
    const gateway = this.gateway(gatewayName);
    const callback = gateway.parseCallback(params);
    const at = new Date(this.clock()).toISOString();
    this.metrics.increment(METRIC_NAMES.CALLBACKS_RECEIVED, 1, { gateway: gatewayName, result: callback.result });

    const log = (
      outcome: WebhookLog['outcome'],
      processed: boolean,
      response: Record<string, unknown>
    ): WebhookLog => ({
      id: uuidv4(),
      gateway: gatewayName,
      txnRef: callback.txnRef,
      signatureValid: callback.signatureValid,
      outcome,
      processed,
      payload: { ...params },
      response,
      createdAt: at,
    });

    if (!callback.signatureValid) {
      const body = gateway.acknowledge('invalid_signature');
      await this.store.transaction(ctx, (tx) => tx.webhooks.insert(log('invalid_signature', false, body)));
      logger.warn('Callback signature rejected', { gateway: gatewayName, txnRef: callback.txnRef });
      return { httpStatus: 400, status: 'invalid_signature', body };
    }

    const { response, effects } = await this.store.transaction(
      ctx,
      async (tx): Promise<{ response: CallbackResponse; effects: CallbackEffects }> => {
        const none: CallbackEffects = { cancelAutoRelease: null, stockChanged: [] };
        const reply = (status: AckStatus, body: Record<string, unknown> = gateway.acknowledge(status)) => ({
          httpStatus: 200 as const,
          status,
          body,
        });

        const previous = await tx.webhooks.findProcessed(gatewayName, callback.txnRef);
        if (previous) {
          this.metrics.increment(METRIC_NAMES.CALLBACKS_DUPLICATE, 1, { gateway: gatewayName });
          logger.info('Duplicate callback', { gateway: gatewayName, txnRef: callback.txnRef });
          return { response: reply('already_processed', previous.response), effects: none };
        }

        const payment = await tx.payments.findByTxnRef(callback.txnRef);
        const order = payment ? await tx.orders.findById(payment.orderId) : null;
        if (!payment || !order || payment.method !== gatewayName) {
          await tx.webhooks.insert(log('payment_not_found', false, gateway.acknowledge('payment_not_found')));
          return { response: reply('payment_not_found'), effects: none };
        }

        if (!OPEN_STATUSES.includes(payment.status)) {
          await tx.webhooks.insert(log(payment.status === 'failed' ? 'failed' : 'succeeded', false, gateway.acknowledge('already_processed')));
          return { response: reply('already_processed'), effects: none };
        }

        const expected = toWholeUnits(payment.amount) * 100;
        if (callback.amount !== expected) {
          reportInvariantViolation('AMOUNT_MISMATCH', 'Callback amount does not match the payment', {
            gateway: gatewayName,
            txnRef: callback.txnRef,
            expected,
            received: callback.amount,
          });
          await tx.webhooks.insert(log('amount_mismatch', false, gateway.acknowledge('amount_mismatch')));
          return { response: reply('amount_mismatch'), effects: none };
        }

        const effects =
          callback.result === 'success'
            ? await this.applySuccess(tx, payment, order, callback.responseCode, callback.transactionId, at)
            : await this.applyFailure(tx, payment, order, callback.responseCode, callback.transactionId, at);

        const body = gateway.acknowledge('confirmed');
        await tx.webhooks.insert(log(callback.result === 'success' ? 'succeeded' : 'failed', true, body));
        return { response: reply('confirmed', body), effects };
      },
      { isolation: 'serializable' }
    );

    if (effects.cancelAutoRelease !== null) {
      await this.publisher.cancelAutoRelease(ctx, effects.cancelAutoRelease);
    }
    await this.publisher.stockChanged(ctx, effects.stockChanged);
    return response;
  }

  private async applySuccess(
    tx: Repositories,
    payment: Payment,
    order: Order,
    responseCode: string,
    transactionId: string | null,
    at: string
  ): Promise<CallbackEffects> {
    if (order.status === 'pending' || order.status === 'confirmed') {
      await tx.payments.update(
        payment.id,
        { status: 'succeeded', gatewayResponseCode: responseCode, gatewayTransactionId: transactionId },
        at
      );
      const sold = await this.reservations.completeSaleIn(tx, order.id);
      await transitionOrder(tx, order, 'paid', { actor: `gateway:${payment.method}`, reason: 'payment_succeeded', at });
      this.metrics.increment(METRIC_NAMES.PAYMENTS_SUCCEEDED, 1, { method: payment.method });
      logger.info('Payment succeeded', { paymentId: payment.id, orderId: order.id });
      return { cancelAutoRelease: order.id, stockChanged: sold.map((r) => r.bookId) };
    }

    // Money was captured for an order that can no longer take it.
    const code = order.status === 'cancelled' ? 'PAID_AFTER_CANCEL' : 'DUPLICATE_PAYMENT';
    reportInvariantViolation(code, 'Payment captured for an order that is not awaiting payment', {
      paymentId: payment.id,
      orderId: order.id,
      orderStatus: order.status,
    });
    await tx.payments.update(
      payment.id,
      { status: 'refund_requested', gatewayResponseCode: responseCode, gatewayTransactionId: transactionId },
      at
    );
    const refund = this.newRefund(payment, code.toLowerCase(), 'system', at);
    await tx.refunds.insert(refund);
    await tx.audit.record({
      actor: 'system',
      action: 'refund.request',
      entity: 'refund',
      entityId: refund.id,
      data: { paymentId: payment.id, orderId: order.id, reason: refund.reason },
      createdAt: at,
    });
    return { cancelAutoRelease: null, stockChanged: [] };
  }

  private async applyFailure(
    tx: Repositories,
    payment: Payment,
    order: Order,
    responseCode: string,
    transactionId: string | null,
    at: string
  ): Promise<CallbackEffects> {
    await tx.payments.update(
      payment.id,
      { status: 'failed', gatewayResponseCode: responseCode, gatewayTransactionId: transactionId },
      at
    );
    this.metrics.increment(METRIC_NAMES.PAYMENTS_FAILED, 1, { method: payment.method, code: responseCode });
    logger.info('Payment failed', { paymentId: payment.id, orderId: order.id, responseCode });

    if (order.status !== 'pending') {
      return { cancelAutoRelease: null, stockChanged: [] };
    }
    const released = await this.reservations.releaseIn(tx, order.id);
    return { cancelAutoRelease: null, stockChanged: released.map((r) => r.bookId) };
  }

  // ---------------------------------------------------------------------------
  // COD
  // ---------------------------------------------------------------------------

  /** Admin: cash was collected on delivery of a confirmed COD order. */
  async confirmCodCollected(ctx: RequestContext, orderId: string): Promise<Order> {
    const at = new Date(this.clock()).toISOString();
    const { order, bookIds } = await this.store.transaction(
      ctx,
      async (tx) => {
        const order = await findOrderFor(tx, ctx, orderId);
        if (order.paymentMethod !== 'cod' || order.status !== 'confirmed') {
          throw new NotEligibleError('order_not_collectable', `Order ${order.orderNumber} is not an open COD order`, {
            status: order.status,
            method: order.paymentMethod,
          });
        }
        const payment = await tx.payments.findOpen(order.id, 'cod');
        if (!payment) throw new NotFoundError('payment', order.id);

        await tx.payments.update(payment.id, { status: 'succeeded' }, at);
        const sold = await this.reservations.completeSaleIn(tx, order.id);
        const paid = await transitionOrder(tx, order, 'paid', { actor: actorOf(ctx), reason: 'cod_collected', at });
        await tx.audit.record({
          actor: actorOf(ctx),
          action: 'payment.cod_collected',
          entity: 'order',
          entityId: order.id,
          data: { paymentId: payment.id, amount: payment.amount },
          createdAt: at,
        });
        return { order: paid, bookIds: sold.map((r) => r.bookId) };
      },
      { isolation: 'serializable' }
    );

    this.metrics.increment(METRIC_NAMES.PAYMENTS_SUCCEEDED, 1, { method: 'cod' });
    await this.publisher.stockChanged(ctx, bookIds);
    return order;
  }

  // ---------------------------------------------------------------------------
  // Refunds
  // ---------------------------------------------------------------------------

  async requestRefund(ctx: RequestContext, orderId: string, reason: string): Promise<Refund> {
    const at = new Date(this.clock()).toISOString();
    return this.store.transaction(ctx, async (tx) => {
      const order = await findOrderFor(tx, ctx, orderId);
      if (order.status !== 'paid') {
        throw new NotEligibleError('order_not_refundable', `Order ${order.orderNumber} is ${order.status}`, {
          status: order.status,
        });
      }
      const payment = await tx.payments.findSettled(order.id);
      if (!payment) throw new NotFoundError('payment', order.id);
      if (payment.status !== 'succeeded' || (await tx.refunds.findOpenByPayment(payment.id))) {
        throw new ConflictError('refund_already_requested', 'A refund is already open for this payment', {
          paymentId: payment.id,
        });
      }

      const refund = this.newRefund(payment, reason, actorOf(ctx), at);
      await tx.refunds.insert(refund);
      await tx.payments.update(payment.id, { status: 'refund_requested' }, at);
      await this.audit(tx, ctx, 'refund.request', refund, { reason }, at);
      this.metrics.increment(METRIC_NAMES.REFUNDS, 1, { to: 'requested' });
      return refund;
    });
  }

  async approveRefund(ctx: RequestContext, refundId: string): Promise<Refund> {
    const at = new Date(this.clock()).toISOString();
    const refund = await this.store.transaction(ctx, async (tx) => {
      const refund = await this.requireRefund(tx, refundId, 'requested');
      await tx.refunds.update(refund.id, { status: 'approved', reviewedBy: actorOf(ctx) }, at);
      await this.audit(tx, ctx, 'refund.approve', refund, {}, at);
      return { ...refund, status: 'approved' as const, reviewedBy: actorOf(ctx), updatedAt: at };
    });

    this.metrics.increment(METRIC_NAMES.REFUNDS, 1, { to: 'approved' });
    await this.publisher.refundApproved(ctx, refund.id);
    return refund;
  }

  async rejectRefund(ctx: RequestContext, refundId: string, reason: string): Promise<Refund> {
    const at = new Date(this.clock()).toISOString();
    const refund = await this.store.transaction(ctx, async (tx) => {
      const refund = await this.requireRefund(tx, refundId, 'requested');
      await tx.refunds.update(refund.id, { status: 'rejected', reviewedBy: actorOf(ctx), failureReason: reason }, at);
      const payment = await tx.payments.findById(refund.paymentId);
      if (payment?.status === 'refund_requested') {
        await tx.payments.update(payment.id, { status: 'succeeded' }, at);
      }
      await this.audit(tx, ctx, 'refund.reject', refund, { reason }, at);
      return { ...refund, status: 'rejected' as const, reviewedBy: actorOf(ctx), failureReason: reason, updatedAt: at };
    });

    this.metrics.increment(METRIC_NAMES.REFUNDS, 1, { to: 'rejected' });
    return refund;
  }

  /**
   * Worker side of an approved refund. Anything but `approved` is a no-op so
   * redelivered tasks cannot refund twice. Transport failures propagate for
   * the worker to retry; a gateway decline marks the refund failed.
   */
  async executeRefund(ctx: RequestContext, refundId: string): Promise<Refund['status']> {
    const loaded = await this.store.transaction(ctx, async (tx) => {
      const refund = await tx.refunds.findById(refundId);
      if (!refund) throw new NotFoundError('refund', refundId);
      if (refund.status !== 'approved') return null;
      const payment = await tx.payments.findById(refund.paymentId);
      if (!payment) throw new NotFoundError('payment', refund.paymentId);
      return { refund, payment };
    });
    if (!loaded) {
      logger.info('Refund not awaiting execution', { refundId });
      return (await this.store.transaction(ctx, (tx) => tx.refunds.findById(refundId)))?.status ?? 'failed';
    }
    const { refund, payment } = loaded;

    let gatewayRef: string;
    if (payment.method === 'cod') {
      gatewayRef = 'manual';
    } else {
      try {
        const result = await this.gateway(payment.method).refund(
          {
            txnRef: payment.gatewayTxnRef,
            amount: refund.amount,
            transactionId: payment.gatewayTransactionId,
            paidAt: new Date(payment.updatedAt),
            requestedBy: refund.reviewedBy ?? 'system',
          },
          ctx.signal
        );
        gatewayRef = result.refundTransactionId;
      } catch (error) {
        if (!(error instanceof RefundRejectedError)) throw error;
        await this.finishRefund(ctx, refund, { status: 'failed', failureReason: error.message });
        return 'failed';
      }
    }

    await this.finishRefund(ctx, refund, { status: 'succeeded', gatewayRef });
    return 'succeeded';
  }

  private async finishRefund(
    ctx: RequestContext,
    refund: Refund,
    outcome: { status: 'succeeded'; gatewayRef: string } | { status: 'failed'; failureReason: string }
  ): Promise<void> {
    const at = new Date(this.clock()).toISOString();
    await this.store.transaction(ctx, async (tx) => {
      const current = await this.requireRefund(tx, refund.id, 'approved');
      if (outcome.status === 'failed') {
        await tx.refunds.update(current.id, { status: 'failed', failureReason: outcome.failureReason }, at);
        await tx.payments.update(current.paymentId, { status: 'succeeded' }, at);
      } else {
        await tx.refunds.update(current.id, { status: 'succeeded' }, at);
        await tx.payments.update(current.paymentId, { status: 'refunded' }, at);
        const order = await tx.orders.findById(current.orderId);
        if (order?.status === 'paid') {
          await transitionOrder(tx, order, 'refunded', { actor: 'system', reason: 'refund_succeeded', at });
        }
      }
      await this.audit(tx, ctx, `refund.${outcome.status}`, current, { ...outcome }, at);
    });

    this.metrics.increment(METRIC_NAMES.REFUNDS, 1, { to: outcome.status });
    logger.info('Refund finished', { refundId: refund.id, status: outcome.status });
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private gateway(name: Gateway): PaymentGateway {
    const gateway = this.gateways.get(name);
    if (!gateway) {
      throw new DependencyError('gateway_not_configured', `No ${name} gateway is configured`);
    }
    return gateway;
  }

  private async requireRefund(tx: Repositories, refundId: string, status: Refund['status']): Promise<Refund> {
    const refund = await tx.refunds.findById(refundId);
    if (!refund) throw new NotFoundError('refund', refundId);
    if (refund.status !== status) {
      throw new NotEligibleError('invalid_refund_transition', `Refund ${refundId} is ${refund.status}`, {
        status: refund.status,
      });
    }
    return refund;
  }

  private newRefund(payment: Payment, reason: string, requestedBy: string, at: string): Refund {
    return {
      id: uuidv4(),
      paymentId: payment.id,
      orderId: payment.orderId,
      amount: payment.amount,
      reason,
      status: 'requested',
      requestedBy,
      reviewedBy: null,
      failureReason: null,
      createdAt: at,
      updatedAt: at,
    };
  }

  private audit(
    tx: Repositories,
    ctx: RequestContext,
    action: string,
    refund: Refund,
    data: Record<string, unknown>,
    at: string
  ): Promise<void> {
    return tx.audit.record({
      actor: actorOf(ctx),
      action,
      entity: 'refund',
      entityId: refund.id,
      data: { paymentId: refund.paymentId, orderId: refund.orderId, amount: refund.amount, ...data },
      createdAt: at,
    });
  }
}
