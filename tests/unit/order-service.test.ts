/**
 * Order Service Tests
 *
 * Tests for:
 * - checkout(): totals, warehouse selection, reservations, side-effect tasks
 * - checkout() rejections: empty cart, stale prices, missing stock
 * - Promotions at checkout (applied, invalidated, below minimum)
 * - Concurrent checkouts for the last unit
 * - cancel(), autoRelease() through the worker, adminUpdateStatus()
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { physicalQueueName, taskEnvelopeSchema, TASK_TYPES, type QueueName } from '../../src/queues/task.js';
import { KEYS } from '../../src/keyspace/types.js';
import { formatOrderNumber } from '../../src/services/order-service.js';
import {
  ConflictError,
  NotEligibleError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  isAppError,
} from '../../src/utils/errors.js';
import {
  BOOK2_PRICE,
  BOOK_PRICE,
  HANOI,
  START,
  adminCtx,
  createHarness,
  drainWorker,
  fillCart,
  seedCatalog,
  seedPromotion,
  setStock,
  systemCtx,
  userCtx,
  type Harness,
} from '../support/fixtures.js';

const TTL = 15 * 60_000;
const SHIPPING = 1_500_000;

describe('OrderService', () => {
  let h: Harness;

  const queued = (queue: QueueName) =>
    h.transport
      .bodies(physicalQueueName(h.config.aws.queuePrefix, queue))
      .map((body) => taskEnvelopeSchema.parse(JSON.parse(body)));
  const stock = (warehouseId: string, bookId: string) => {
    const row = h.store.snapshot().inventory.get(`${warehouseId}|${bookId}`);
    return row ? { quantity: row.quantity, reserved: row.reserved } : null;
  };
  const checkout = (userId: string, paymentMethod: 'vnpay' | 'momo' | 'cod' = 'vnpay') =>
    h.container.orders.checkout(userCtx(userId), { paymentMethod, address: HANOI });

  beforeEach(() => {
    h = createHarness();
    seedCatalog(h.store);
  });

  describe('formatOrderNumber', () => {
    it('combines the UTC date with a zero-padded sequence', () => {
      expect(formatOrderNumber(new Date(START), 42)).toBe('ORD-20260302-000042');
      expect(formatOrderNumber(new Date('2026-12-31T23:59:59.000Z'), 1_000_001)).toBe('ORD-20261231-000001');
    });
  });

  // ==========================================================================
  // Happy path
  // ==========================================================================

  describe('checkout', () => {
    it('places a pending order with stock reserved at the nearest warehouse', async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 2 }]);

      const result = await checkout('user-1');

      expect(result.order).toMatchObject({
        orderNumber: 'ORD-20260302-000001',
        userId: 'user-1',
        status: 'pending',
        paymentMethod: 'vnpay',
        subtotal: 2 * BOOK_PRICE,
        discount: 0,
        shippingFee: SHIPPING,
        codFee: 0,
        total: 2 * BOOK_PRICE + SHIPPING,
        promotionId: null,
        version: 1,
        createdAt: '2026-03-02T08:00:00.000Z',
      });
      expect(result.items).toEqual([
        { orderId: result.order.id, bookId: 'book-1', quantity: 2, unitPrice: BOOK_PRICE, warehouseId: 'wh-hn' },
      ]);
      expect(result.warnings).toEqual([]);
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 5, reserved: 2 });
      expect(h.store.snapshot().reservations).toEqual([
        {
          orderId: result.order.id,
          warehouseId: 'wh-hn',
          bookId: 'book-1',
          quantity: 2,
          expiresAt: '2026-03-02T08:15:00.000Z',
          createdAt: '2026-03-02T08:00:00.000Z',
        },
      ]);
      expect(await h.container.carts.getCart(userCtx('user-1'))).toBeNull();
    });

    it('opens a gateway payment with a redirect', async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 2 }]);

      const { order, payment } = await checkout('user-1');

      expect(payment).toMatchObject({
        orderId: order.id,
        method: 'vnpay',
        amount: 21_500_000,
        status: 'pending',
        txnRef: 'ORD-20260302-000001-1',
      });
      const url = new URL(payment?.redirectUrl ?? '');
      expect(url.origin + url.pathname).toBe(h.config.vnpay.paymentUrl);
      expect(url.searchParams.get('vnp_TxnRef')).toBe('ORD-20260302-000001-1');
      expect(url.searchParams.get('vnp_Amount')).toBe('21500000');
      expect(url.searchParams.get('vnp_IpAddr')).toBe('10.0.0.1');
    });

    it('enqueues confirmation, auto-release, tracking and stock sync after commit', async () => {
      await fillCart(h, 'user-1', [
        { bookId: 'book-1', quantity: 1 },
        { bookId: 'book-2', quantity: 1 },
      ]);

      const { order } = await checkout('user-1');

      expect(queued('high').map((t) => [t.type, t.payload])).toEqual([
        [TASK_TYPES.SEND_ORDER_CONFIRMATION, { order_id: order.id }],
      ]);
      expect(queued('default').map((t) => [t.type, t.payload])).toEqual([
        [TASK_TYPES.AUTO_RELEASE_RESERVATION, { order_id: order.id }],
        [TASK_TYPES.SYNC_BOOK_STOCK, { book_id: 'book-1' }],
        [TASK_TYPES.SYNC_BOOK_STOCK, { book_id: 'book-2' }],
      ]);
      const [release] = queued('default');
      expect(release).toMatchObject({ dedupKey: order.id, notBefore: new Date(START + TTL).toISOString() });
      expect(queued('low')).toHaveLength(1);
      expect(queued('low')[0]?.payload).toEqual({
        order_id: order.id,
        user_id: 'user-1',
        total: BOOK_PRICE + BOOK2_PRICE + SHIPPING,
        payment_method: 'vnpay',
      });
    });

    it('splits lines across warehouses when the nearest cannot cover one', async () => {
      await fillCart(h, 'user-1', [
        { bookId: 'book-1', quantity: 2 },
        { bookId: 'book-2', quantity: 1 },
      ]);

      const { items } = await checkout('user-1');

      expect(items.map((i) => [i.bookId, i.warehouseId])).toEqual([
        ['book-1', 'wh-hn'],
        ['book-2', 'wh-hcm'],
      ]);
    });

    it('numbers orders from the sequence', async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);
      await fillCart(h, 'user-2', [{ bookId: 'book-1', quantity: 1 }]);

      expect((await checkout('user-1')).order.orderNumber).toBe('ORD-20260302-000001');
      expect((await checkout('user-2')).order.orderNumber).toBe('ORD-20260302-000002');
    });

    it('confirms a COD order straight away and drops its release timer', async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 2 }]);

      const { order, payment } = await checkout('user-1', 'cod');

      expect(order).toMatchObject({ status: 'confirmed', version: 2 });
      expect(payment).toMatchObject({ method: 'cod', status: 'pending', redirectUrl: null });
      expect(await h.ks.get(KEYS.jobUnique(TASK_TYPES.AUTO_RELEASE_RESERVATION, order.id))).toBeNull();

      await drainWorker(h);
      h.clock.advance(TTL);
      await drainWorker(h);

      const details = await h.container.orders.getOrder(userCtx('user-1'), order.id);
      expect(details.order.status).toBe('confirmed');
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 5, reserved: 2 });
    });

    it('reports a deferred payment when the gateway is down', async () => {
      h.gateway.networkDown = true;
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);

      const result = await checkout('user-1', 'momo');

      expect(result.order.status).toBe('pending');
      expect(result.payment).toBeNull();
      expect(result.warnings.map((w) => w.code)).toEqual(['payment_pending']);
      expect([...h.store.snapshot().payments.values()].map((p) => p.status)).toEqual(['failed']);
    });
  });

  // ==========================================================================
  // Rejections
  // ==========================================================================

  describe('checkout rejections', () => {
    it('requires a signed-in user', async () => {
      await expect(
        h.container.orders.checkout(systemCtx(), { paymentMethod: 'cod', address: HANOI })
      ).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it('rejects an empty cart', async () => {
      const error = await checkout('user-2').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ code: 'empty_cart' });
    });

    it('rejects stale prices and refreshes the cart snapshot', async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);
      h.store.seed((state) => {
        const book = state.books.get('book-1');
        if (book) book.price = 11_000_000;
      });

      const error = await checkout('user-1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({
        code: 'price_changed',
        details: {
          lines: [{ bookId: 'book-1', quantity: 1, snapshotPrice: BOOK_PRICE, currentPrice: 11_000_000, active: true }],
        },
      });
      const cart = await h.container.carts.getCart(userCtx('user-1'));
      expect(cart?.items[0]?.unitPriceSnapshot).toBe(11_000_000);

      const retry = await checkout('user-1');
      expect(retry.order.subtotal).toBe(11_000_000);
    });

    it('rejects a cart holding a book taken off sale', async () => {
      await fillCart(h, 'user-1', [
        { bookId: 'book-1', quantity: 1 },
        { bookId: 'book-2', quantity: 1 },
      ]);
      h.store.seed((state) => {
        const book = state.books.get('book-2');
        if (book) book.active = false;
      });

      const error = await checkout('user-1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({
        code: 'price_changed',
        details: {
          lines: [
            { bookId: 'book-1', quantity: 1, snapshotPrice: BOOK_PRICE, currentPrice: BOOK_PRICE, active: true },
            { bookId: 'book-2', quantity: 1, snapshotPrice: BOOK2_PRICE, currentPrice: BOOK2_PRICE, active: false },
          ],
        },
      });
      expect(h.store.snapshot().orders.size).toBe(0);
      expect(stock('wh-hcm', 'book-2')).toEqual({ quantity: 3, reserved: 0 });
      await expect(checkout('user-1')).rejects.toMatchObject({ code: 'price_changed' });
    });

    it('rejects lines no warehouse can cover without touching stock', async () => {
      await fillCart(h, 'user-1', [
        { bookId: 'book-1', quantity: 1 },
        { bookId: 'book-2', quantity: 4 },
      ]);

      const error = await checkout('user-1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotEligibleError);
      expect(error).toMatchObject({ code: 'out_of_stock', details: { lines: [{ bookId: 'book-2', quantity: 4 }] } });
      expect(h.store.snapshot().orders.size).toBe(0);
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 5, reserved: 0 });
      expect((await h.container.carts.getCart(userCtx('user-1')))?.status).toBe('active');
    });

    it('sells the last unit exactly once under concurrent checkouts', async () => {
      setStock(h.store, 'wh-hn', 'book-1', 1);
      setStock(h.store, 'wh-hcm', 'book-1', 0);
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);
      await fillCart(h, 'user-2', [{ bookId: 'book-1', quantity: 1 }]);

      const results = await Promise.allSettled([checkout('user-1'), checkout('user-2')]);

      const won = results.filter((r) => r.status === 'fulfilled');
      const lost = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
      expect(won).toHaveLength(1);
      expect(lost).toHaveLength(1);
      const [reason] = lost;
      expect(isAppError(reason) ? reason.code : null).toMatch(/^(insufficient|out_of_stock)$/);
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 1, reserved: 1 });
      expect(h.store.snapshot().orders.size).toBe(1);
    });
  });

  // ==========================================================================
  // Promotions
  // ==========================================================================

  describe('promotions at checkout', () => {
    it('applies the discount and records the usage', async () => {
      seedPromotion(h.store);
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 2 }]);
      await h.container.carts.applyPromotion(userCtx('user-1'), 'SAVE10');

      const { order, warnings } = await checkout('user-1', 'cod');

      expect(warnings).toEqual([]);
      expect(order).toMatchObject({
        subtotal: 20_000_000,
        discount: 2_000_000,
        shippingFee: SHIPPING,
        total: 19_500_000,
        promotionId: 'promo-1',
      });
      const state = h.store.snapshot();
      expect(state.promotions.get('promo-1')?.usedCount).toBe(1);
      expect(state.promotionUsages).toEqual([
        {
          promotionId: 'promo-1',
          userId: 'user-1',
          orderId: order.id,
          discount: 2_000_000,
          createdAt: '2026-03-02T08:00:00.000Z',
        },
      ]);
    });

    it('waives shipping for a free-shipping promotion', async () => {
      seedPromotion(h.store, { code: 'SHIPFREE', rule: { type: 'free_shipping' } });
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);
      await h.container.carts.applyPromotion(userCtx('user-1'), 'SHIPFREE');

      const { order } = await checkout('user-1', 'cod');

      expect(order).toMatchObject({ discount: 0, shippingFee: 0, total: BOOK_PRICE });
    });

    it('drops a promotion that stopped being valid and warns', async () => {
      seedPromotion(h.store);
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);
      await h.container.carts.applyPromotion(userCtx('user-1'), 'SAVE10');
      h.store.seed((state) => {
        const promotion = state.promotions.get('promo-1');
        if (promotion) promotion.active = false;
      });

      const { order, warnings } = await checkout('user-1');

      expect(warnings).toEqual([{ code: 'promotion_invalidated', reason: 'inactive' }]);
      expect(order).toMatchObject({ discount: 0, promotionId: null, total: BOOK_PRICE + SHIPPING });
      expect(h.store.snapshot().promotions.get('promo-1')?.usedCount).toBe(0);
    });

    it('keeps a promotion below its minimum order without discounting', async () => {
      seedPromotion(h.store, { minOrderAmount: 50_000_000 });
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);
      await h.container.carts.applyPromotion(userCtx('user-1'), 'SAVE10');

      const { order, warnings } = await checkout('user-1');

      expect(warnings).toEqual([{ code: 'promotion_not_applicable', minOrderAmount: 50_000_000 }]);
      expect(order).toMatchObject({ discount: 0, promotionId: null });
    });

    it('refuses to apply an expired promotion', async () => {
      seedPromotion(h.store, { endsAt: new Date(START).toISOString() });
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);

      await expect(h.container.carts.applyPromotion(userCtx('user-1'), 'SAVE10')).rejects.toMatchObject({
        code: 'promotion_invalid',
        details: { reason: 'expired' },
      });
    });
  });

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  describe('cancel', () => {
    it('releases the reservations and cancels the release timer', async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 2 }]);
      const { order } = await checkout('user-1');

      const cancelled = await h.container.orders.cancel(userCtx('user-1'), order.id);

      expect(cancelled).toMatchObject({ status: 'cancelled', version: 2 });
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 5, reserved: 0 });
      expect(h.store.snapshot().reservations).toEqual([]);
      expect(await h.ks.get(KEYS.jobUnique(TASK_TYPES.AUTO_RELEASE_RESERVATION, order.id))).toBeNull();

      const { history } = await h.container.orders.getOrder(userCtx('user-1'), order.id);
      expect(history.map((c) => [c.fromStatus, c.toStatus, c.actor, c.reason])).toEqual([
        [null, 'pending', 'user-1', 'checkout'],
        ['pending', 'cancelled', 'user-1', 'cancelled_by_user'],
      ]);
    });

    it('refuses a second cancellation', async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);
      const { order } = await checkout('user-1');
      await h.container.orders.cancel(userCtx('user-1'), order.id);

      await expect(h.container.orders.cancel(userCtx('user-1'), order.id)).rejects.toMatchObject({
        code: 'order_not_cancellable',
        details: { status: 'cancelled' },
      });
    });

    it("hides other users' orders", async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);
      const { order } = await checkout('user-1');

      const error = await h.container.orders.cancel(userCtx('user-2'), order.id).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ code: 'order_not_found' });
    });
  });

  describe('autoRelease', () => {
    it('cancels an unpaid order once the reservation TTL passes', async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 2 }]);
      const { order } = await checkout('user-1');
      await drainWorker(h);
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 5, reserved: 2 });

      h.clock.advance(TTL);
      await drainWorker(h);

      const { order: released, history } = await h.container.orders.getOrder(userCtx('user-1'), order.id);
      expect(released.status).toBe('cancelled');
      expect(history.at(-1)).toMatchObject({ toStatus: 'cancelled', actor: 'system', reason: 'reservation_expired' });
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 5, reserved: 0 });
    });

    it('leaves an order that moved on alone', async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);
      const { order } = await checkout('user-1');
      await h.container.orders.cancel(userCtx('user-1'), order.id);

      expect(await h.container.orders.autoRelease(systemCtx(), order.id)).toBe(false);
      expect(await h.container.orders.autoRelease(systemCtx(), 'missing-order')).toBe(false);
    });
  });

  describe('adminUpdateStatus', () => {
    it('ships and delivers a paid order under version checks', async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 2 }]);
      const { order } = await checkout('user-1', 'cod');
      const paid = await h.container.payments.confirmCodCollected(adminCtx(), order.id);
      expect(paid).toMatchObject({ status: 'paid', version: 3 });

      await expect(
        h.container.orders.adminUpdateStatus(adminCtx(), order.id, 'shipped', 2)
      ).rejects.toMatchObject({ code: 'version_conflict', details: { expectedVersion: 2, actualVersion: 3 } });

      const shipped = await h.container.orders.adminUpdateStatus(adminCtx(), order.id, 'shipped', 3);
      expect(shipped).toMatchObject({ status: 'shipped', version: 4 });
      const delivered = await h.container.orders.adminUpdateStatus(adminCtx(), order.id, 'delivered');
      expect(delivered.status).toBe('delivered');

      const { history } = await h.container.orders.getOrder(adminCtx(), order.id);
      expect(history.map((c) => [c.toStatus, c.actor])).toEqual([
        ['pending', 'user-1'],
        ['confirmed', 'user-1'],
        ['paid', 'admin-1'],
        ['shipped', 'admin-1'],
        ['delivered', 'admin-1'],
      ]);
    });

    it('only sets shipping states, in order', async () => {
      await fillCart(h, 'user-1', [{ bookId: 'book-1', quantity: 1 }]);
      const { order } = await checkout('user-1');

      await expect(h.container.orders.adminUpdateStatus(adminCtx(), order.id, 'paid')).rejects.toMatchObject({
        code: 'invalid_status',
      });
      await expect(h.container.orders.adminUpdateStatus(adminCtx(), order.id, 'shipped')).rejects.toMatchObject({
        code: 'invalid_transition',
      });
    });
  });
});
