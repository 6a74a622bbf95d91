/**
 * Order Service - checkout pipeline and order lifecycle
 *
 * Responsibilities:
 * - Turn the user's cart into a `pending` order with stock reserved
 * - Cancel pending/confirmed orders, releasing their reservations
 * - Auto-release abandoned orders (worker timer and the expired-reservation sweep)
 * - Admin shipping transitions
 *
 * Checkout flow:
 * 1. Snapshot the cart, books and promotion (read-only)
 * 2. Reject stale prices, settle the promotion, pick a warehouse per line
 * 3. One SERIALIZABLE transaction: order + items + reservations + promotion
 *    usage + cart conversion
 * 4. After commit: enqueue side-effect tasks, then create the payment intent
 *
 * DataDog Integration:
 * - Metrics: checkout attempts/failures/duration, orders created and value
 * - Tracing: one span per checkout
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger.js';
import {
  ConflictError,
  NotEligibleError,
  UnauthorizedError,
  ValidationError,
  isAppError,
  errorMessage,
} from '../utils/errors.js';
import type { RequestContext } from '../utils/context.js';
import type { Money } from '../utils/money.js';
import { getMetrics, getTracer, METRIC_NAMES } from '../observability/index.js';
import type { Store } from '../store/types.js';
import type {
  Book,
  Cart,
  Order,
  OrderItem,
  OrderStatus,
  OrderStatusChange,
  PaymentMethod,
  Promotion,
  ShippingAddress,
} from '../types/index.js';
import { computeTotals, evaluatePromotion, type PromotionInvalidReason } from './pricing.js';
import type { ReservationEngine } from './reservation-engine.js';
import type { PaymentIntent, PaymentService } from './payment-service.js';
import type { TaskPublisher } from './task-publisher.js';
import { CANCELLABLE, actorOf, findOrderFor, transitionOrder } from './order-state.js';

const logger = createLogger('OrderService');
const metrics = getMetrics();
const tracer = getTracer();

export interface CheckoutRequest {
  paymentMethod: PaymentMethod;
  address: ShippingAddress;
}

export type CheckoutWarning =
  | { code: 'promotion_invalidated'; reason: PromotionInvalidReason | 'deleted' }
  | { code: 'promotion_not_applicable'; minOrderAmount: Money }
  | { code: 'payment_pending'; message: string };

export interface CheckoutResult {
  order: Order;
  items: OrderItem[];
  payment: PaymentIntent | null;
  warnings: CheckoutWarning[];
}

export interface OrderDetails {
  order: Order;
  items: OrderItem[];
  history: OrderStatusChange[];
}

export interface FreshLine {
  bookId: string;
  quantity: number;
  snapshotPrice: Money;
  currentPrice: Money | null;
  active: boolean;
}

export interface OrderServiceOptions {
  reservationTtlMs: number;
  shippingFee: Money;
  codFee: Money;
  priceTolerance: Money;
  clock?: () => number;
}

/** `ORD-YYYYMMDD-NNNNNN` from the UTC date and a database sequence value. */
export function formatOrderNumber(date: Date, sequence: number): string {
  const yyyy = String(date.getUTCFullYear());
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  return `ORD-${yyyy}${mm}${dd}-${String(sequence % 1_000_000).padStart(6, '0')}`;
}

interface CartSnapshot {
  cart: Cart;
  books: Map<string, Book>;
  promotion: Promotion | null;
  userUsage: number;
}

export class OrderService {
  private readonly clock: () => number;

  constructor(
    private readonly store: Store,
    private readonly reservations: ReservationEngine,
    private readonly payments: PaymentService,
    private readonly publisher: TaskPublisher,
    private readonly options: OrderServiceOptions
  ) {
    this.clock = options.clock ?? Date.now;
  }

  // ---------------------------------------------------------------------------
  // Checkout
  // ---------------------------------------------------------------------------

  async checkout(ctx: RequestContext, request: CheckoutRequest): Promise<CheckoutResult> {
    const userId = ctx.userId;
    if (!userId) throw new UnauthorizedError();
    const startTime = this.clock();
    metrics.increment(METRIC_NAMES.CHECKOUT_ATTEMPTS, 1, { method: request.paymentMethod });

    try {
      const result = await tracer.trace(
        'order.checkout',
        async (span) => {
          const result = await this.runCheckout({ ...ctx, trace: span.context }, userId, request);
          span.tags['order.id'] = result.order.id;
          span.tags['order.items'] = result.items.length;
          span.tags['order.total'] = result.order.total;
          return result;
        },
        { resourceName: request.paymentMethod, tags: { 'user.id': userId } }
      );

      metrics.increment(METRIC_NAMES.ORDERS_CREATED, 1, { method: request.paymentMethod });
      metrics.histogram(METRIC_NAMES.ORDERS_VALUE, result.order.total, { method: request.paymentMethod });
      return result;
    } catch (error) {
      metrics.increment(METRIC_NAMES.CHECKOUT_FAILED, 1, { code: isAppError(error) ? error.code : 'internal' });
      throw error;
    } finally {
      metrics.histogram(METRIC_NAMES.CHECKOUT_DURATION, this.clock() - startTime);
    }
  }

  private async runCheckout(ctx: RequestContext, userId: string, request: CheckoutRequest): Promise<CheckoutResult> {
    const { address, paymentMethod } = request;
    const warnings: CheckoutWarning[] = [];

    // 1. Snapshot
    const snapshot = await this.store.transaction(ctx, async (tx): Promise<CartSnapshot> => {
      const cart = await tx.carts.findActiveByUser(userId);
      if (!cart || cart.items.length === 0) {
        throw new ValidationError('empty_cart', 'Cart is empty');
      }
      for (const item of cart.items) {
        if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
          throw new ValidationError('invalid_quantity', 'Cart line quantity must be a positive integer', {
            bookId: item.bookId,
            quantity: item.quantity,
          });
        }
      }

      const books = new Map((await tx.books.findByIds(cart.items.map((i) => i.bookId))).map((b) => [b.id, b]));
      const promotion = cart.appliedPromotionId ? await tx.promotions.findById(cart.appliedPromotionId) : null;
      const userUsage = promotion ? await tx.promotions.countUserUsage(promotion.id, userId) : 0;
      return { cart, books, promotion, userUsage };
    });
    const { cart, books } = snapshot;

    // 2a. Prices
    const lines = cart.items.map(
      (item): FreshLine => {
        const book = books.get(item.bookId);
        return {
          bookId: item.bookId,
          quantity: item.quantity,
          snapshotPrice: item.unitPriceSnapshot,
          currentPrice: book ? book.price : null,
          active: book?.active ?? false,
        };
      }
    );
    const stale = lines.filter(
      (line) =>
        !line.active ||
        line.currentPrice === null ||
        Math.abs(line.currentPrice - line.snapshotPrice) > this.options.priceTolerance
    );
    if (stale.length > 0) {
      await this.refreshSnapshots(ctx, cart.id, lines);
      throw new ConflictError('price_changed', 'Prices changed since the items were added', { lines });
    }

    const priced = cart.items.map((item) => ({ ...item, unitPrice: books.get(item.bookId)?.price ?? item.unitPriceSnapshot }));
    const subtotal = priced.reduce((sum, line) => sum + line.unitPrice * line.quantity, 0);

    // 2b. Promotion
    let promotion: Promotion | null = null;
    let discount: Money = 0;
    let freeShipping = false;
    if (cart.appliedPromotionId !== null) {
      const check = snapshot.promotion
        ? evaluatePromotion(snapshot.promotion, {
            subtotal,
            userUsage: snapshot.userUsage,
            now: new Date(this.clock()),
          })
        : null;

      if (check === null || check.status === 'invalid') {
        const reason = check === null ? 'deleted' : check.reason;
        await this.store.transaction(ctx, (tx) => tx.carts.setPromotion(cart.id, null));
        warnings.push({ code: 'promotion_invalidated', reason });
        logger.info('Promotion removed at checkout', { cartId: cart.id, reason, requestId: ctx.requestId });
      } else if (check.status === 'not_applicable') {
        warnings.push({ code: 'promotion_not_applicable', minOrderAmount: check.minOrderAmount });
      } else {
        promotion = snapshot.promotion;
        discount = check.discount;
        freeShipping = check.freeShipping;
      }
    }

    // 2c. Warehouse per line
    const selections = await this.store.transaction(ctx, async (tx) => {
      const chosen = new Map<string, string>();
      const missing: Array<{ bookId: string; quantity: number }> = [];
      for (const item of priced) {
        const nearest = await this.reservations.findNearestWithStockIn(
          tx,
          item.bookId,
          address.latitude,
          address.longitude,
          item.quantity
        );
        if (nearest) chosen.set(item.bookId, nearest.warehouse.id);
        else missing.push({ bookId: item.bookId, quantity: item.quantity });
      }
      return { chosen, missing };
    });
    if (selections.missing.length > 0) {
      throw new NotEligibleError('out_of_stock', 'Some items are not available in any warehouse', {
        lines: selections.missing,
      });
    }

    const totals = computeTotals({
      subtotal,
      discount,
      shippingFee: this.options.shippingFee,
      codFee: paymentMethod === 'cod' ? this.options.codFee : 0,
      freeShipping,
    });

    // 3. Persist
    const { order, items } = await this.store.transaction(
      ctx,
      async (tx) => {
        const current = await tx.carts.findById(cart.id);
        if (!current || current.status !== 'active') {
          throw new ConflictError('cart_already_checked_out', 'Cart has already been checked out', { cartId: cart.id });
        }

        const nowMs = this.clock();
        const now = new Date(nowMs).toISOString();
        const order: Order = {
          id: uuidv4(),
          orderNumber: formatOrderNumber(new Date(nowMs), await tx.orders.nextSequence()),
          userId,
          status: 'pending',
          paymentMethod,
          ...totals,
          promotionId: promotion?.id ?? null,
          address: { ...address },
          version: 1,
          createdAt: now,
          updatedAt: now,
        };
        const items: OrderItem[] = priced.map((line) => ({
          orderId: order.id,
          bookId: line.bookId,
          quantity: line.quantity,
          unitPrice: line.unitPrice,
          warehouseId: selections.chosen.get(line.bookId) ?? '',
        }));
        await tx.orders.insert(order, items);

        for (const item of items) {
          await this.reservations.reserveIn(tx, {
            orderId: order.id,
            warehouseId: item.warehouseId,
            bookId: item.bookId,
            quantity: item.quantity,
            ttlMs: this.options.reservationTtlMs,
          });
        }

        if (promotion) {
          if (!(await tx.promotions.incrementUsage(promotion.id))) {
            throw new ConflictError('promotion_exhausted', `Promotion ${promotion.code} has no uses left`);
          }
          await tx.promotions.recordUsage({
            promotionId: promotion.id,
            userId,
            orderId: order.id,
            discount: totals.discount,
            createdAt: now,
          });
        }

        await tx.carts.markConverted(cart.id);
        await tx.orders.appendHistory({
          orderId: order.id,
          fromStatus: null,
          toStatus: 'pending',
          actor: userId,
          reason: 'checkout',
          createdAt: now,
        });
        return { order, items };
      },
      { isolation: 'serializable' }
    );

    logger.info('Order placed', {
      orderId: order.id,
      orderNumber: order.orderNumber,
      total: order.total,
      requestId: ctx.requestId,
    });

    // 4. Side effects, strictly after commit
    await this.publisher.orderPlaced(
      ctx,
      order,
      items.map((i) => i.bookId)
    );

    let payment: PaymentIntent | null = null;
    try {
      payment = await this.payments.createPayment(ctx, order.id, paymentMethod);
    } catch (error) {
      if (!isAppError(error) || (error.kind !== 'dependency' && error.kind !== 'timeout')) throw error;
      logger.warn('Payment intent deferred', { orderId: order.id, error: errorMessage(error) });
      warnings.push({ code: 'payment_pending', message: 'Payment could not be started; retry from the order page' });
    }

    const latest = payment?.method === 'cod' ? await this.reload(ctx, order.id) : order;
    return { order: latest, items, payment, warnings };
  }

  private async refreshSnapshots(ctx: RequestContext, cartId: string, lines: FreshLine[]): Promise<void> {
    await this.store.transaction(ctx, async (tx) => {
      for (const line of lines) {
        if (line.currentPrice !== null && line.currentPrice !== line.snapshotPrice) {
          await tx.carts.setItemPrice(cartId, line.bookId, line.currentPrice);
        }
      }
    });
  }

  private async reload(ctx: RequestContext, orderId: string): Promise<Order> {
    return this.store.transaction(ctx, (tx) => findOrderFor(tx, ctx, orderId));
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async getOrder(ctx: RequestContext, orderId: string): Promise<OrderDetails> {
    return this.store.transaction(ctx, async (tx) => {
      const order = await findOrderFor(tx, ctx, orderId);
      return {
        order,
        items: await tx.orders.findItems(order.id),
        history: await tx.orders.listHistory(order.id),
      };
    });
  }

  /** Allowed only before shipment and payment; paid orders go through refunds. */
  async cancel(ctx: RequestContext, orderId: string, reason = 'cancelled_by_user'): Promise<Order> {
    const at = new Date(this.clock()).toISOString();
    const { order, bookIds } = await this.store.transaction(
      ctx,
      async (tx) => {
        const order = await findOrderFor(tx, ctx, orderId);
        if (!CANCELLABLE.includes(order.status)) {
          throw new NotEligibleError('order_not_cancellable', `Order ${order.orderNumber} is ${order.status}`, {
            status: order.status,
          });
        }
        const released = await this.reservations.releaseIn(tx, order.id);
        const cancelled = await transitionOrder(tx, order, 'cancelled', { actor: actorOf(ctx), reason, at });
        return { order: cancelled, bookIds: released.map((r) => r.bookId) };
      },
      { isolation: 'serializable' }
    );

    metrics.increment(METRIC_NAMES.ORDERS_CANCELLED, 1, { reason });
    logger.info('Order cancelled', { orderId, reason, requestId: ctx.requestId });
    await this.publisher.cancelAutoRelease(ctx, order.id);
    await this.publisher.stockChanged(ctx, bookIds);
    return order;
  }

  /**
   * Release an abandoned order. Returns false when the order has moved on
   * (paid, confirmed for COD, cancelled) and there is nothing to do.
   */
  async autoRelease(ctx: RequestContext, orderId: string): Promise<boolean> {
    const at = new Date(this.clock()).toISOString();
    const outcome = await this.store.transaction(
      ctx,
      async (tx) => {
        const order = await tx.orders.findById(orderId);
        if (!order || order.status !== 'pending') return null;
        const released = await this.reservations.releaseIn(tx, order.id);
        await transitionOrder(tx, order, 'cancelled', { actor: 'system', reason: 'reservation_expired', at });
        return released.map((r) => r.bookId);
      },
      { isolation: 'serializable' }
    );

    if (outcome === null) {
      logger.debug('Auto-release skipped', { orderId });
      return false;
    }
    metrics.increment(METRIC_NAMES.ORDERS_CANCELLED, 1, { reason: 'reservation_expired' });
    logger.info('Abandoned order released', { orderId, lines: outcome.length });
    await this.publisher.stockChanged(ctx, outcome);
    return true;
  }

  /**
   * Scheduled backstop for auto-release timers that were never enqueued or
   * ended in the DLQ: releases pending orders whose reservations have expired.
   */
  async releaseExpired(ctx: RequestContext, limit: number): Promise<number> {
    const now = new Date(this.clock()).toISOString();
    const orderIds = await this.store.transaction(ctx, (tx) => tx.reservations.listExpiredPendingOrders(now, limit));

    let released = 0;
    for (const orderId of orderIds) {
      if (await this.autoRelease(ctx, orderId)) released += 1;
    }
    if (orderIds.length > 0) {
      logger.info('Expired reservations swept', { found: orderIds.length, released });
    }
    return released;
  }

  /** Admin: `paid → shipped → delivered`, optionally guarded by the caller's version. */
  async adminUpdateStatus(
    ctx: RequestContext,
    orderId: string,
    status: OrderStatus,
    expectedVersion?: number
  ): Promise<Order> {
    if (status !== 'shipped' && status !== 'delivered') {
      throw new ValidationError('invalid_status', 'Only shipped and delivered can be set here', { status });
    }
    const at = new Date(this.clock()).toISOString();

    return this.store.transaction(ctx, async (tx) => {
      const order = await findOrderFor(tx, ctx, orderId);
      if (expectedVersion !== undefined && order.version !== expectedVersion) {
        throw new ConflictError('version_conflict', `Order ${order.orderNumber} is at version ${order.version}`, {
          expectedVersion,
          actualVersion: order.version,
        });
      }
      return transitionOrder(tx, order, status, { actor: actorOf(ctx), reason: 'admin_update', at });
    });
  }
}
