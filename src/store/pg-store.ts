/**
 * PostgreSQL Store
 *
 * Production adapter over node-postgres:
 * - One pooled client per transaction, `BEGIN ISOLATION LEVEL ...`
 * - Per-statement timeout (`SET LOCAL statement_timeout`)
 * - Serialization failures and deadlocks (40001 / 40P01) retried with a
 *   fresh transaction, bounded by `maxAttempts`
 * - Explicit row mappers; NUMERIC money columns converted to minor units
 *
 * Stock mutations are single guarded UPDATEs whose rowCount decides the
 * outcome; no row lock is held across network I/O.
 */

import { readFile } from 'node:fs/promises';
import pg from 'pg';
import type {
  AuditEntry,
  Book,
  Cart,
  CartItem,
  DiscountRule,
  Gateway,
  Notification,
  Order,
  OrderItem,
  OrderStatus,
  OrderStatusChange,
  Payment,
  PaymentMethod,
  PaymentStatus,
  Promotion,
  Refund,
  RefundStatus,
  Reservation,
  ShippingAddress,
  StockRow,
  User,
  WarehouseInventory,
  WebhookLog,
  CallbackOutcome,
  CartStatus,
  NotificationStatus,
} from '../types/index.js';
import { throwIfExpired, withTimeout, type RequestContext } from '../utils/context.js';
import {
  AppError,
  ConflictError,
  DependencyError,
  InvariantViolationError,
  TimeoutError,
  errorMessage,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { formatMoney, parseMoney } from '../utils/money.js';
import { getMetrics, METRIC_NAMES, reportInvariantViolation } from '../observability/index.js';
import type { IsolationLevel, Repositories, Store, TransactionOptions } from './types.js';

const logger = createLogger('PgStore');

const ISOLATION_SQL: Record<IsolationLevel, string> = {
  'read committed': 'READ COMMITTED',
  'repeatable read': 'REPEATABLE READ',
  serializable: 'SERIALIZABLE',
};

const RETRYABLE_CODES = new Set(['40001', '40P01']);
const UNAVAILABLE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', '57P01', '57P03', '08000', '08001', '08003', '08006']);

export interface PgStoreConfig {
  connectionString: string;
  poolMax: number;
  queryTimeoutMs: number;
}

type Queryable = Pick<pg.PoolClient, 'query'>;

// ---------------------------------------------------------------------------
// Row shapes & mappers
// ---------------------------------------------------------------------------

type Timestamp = Date | string;

const iso = (value: Timestamp): string => new Date(value).toISOString();
const isoOrNull = (value: Timestamp | null): string | null => (value === null ? null : iso(value));
const moneyOrNull = (value: string | null): number | null => (value === null ? null : parseMoney(value));

interface BookRow {
  id: string;
  title: string;
  price: string;
  active: boolean;
}

const toBook = (r: BookRow): Book => ({ id: r.id, title: r.title, price: parseMoney(r.price), active: r.active });

interface StockRowRecord {
  warehouse_id: string;
  book_id: string;
  quantity: number;
  reserved: number;
  updated_at: Timestamp;
  w_code: string;
  w_name: string;
  w_active: boolean;
  w_latitude: number | null;
  w_longitude: number | null;
}

const toStockRow = (r: StockRowRecord): StockRow => ({
  warehouseId: r.warehouse_id,
  bookId: r.book_id,
  quantity: r.quantity,
  reserved: r.reserved,
  updatedAt: iso(r.updated_at),
  warehouse: {
    id: r.warehouse_id,
    code: r.w_code,
    name: r.w_name,
    active: r.w_active,
    latitude: r.w_latitude,
    longitude: r.w_longitude,
  },
});

const STOCK_SELECT = `
  SELECT i.warehouse_id, i.book_id, i.quantity, i.reserved, i.updated_at,
         w.code AS w_code, w.name AS w_name, w.active AS w_active,
         w.latitude AS w_latitude, w.longitude AS w_longitude
    FROM warehouse_inventory i
    JOIN warehouses w ON w.id = i.warehouse_id`;

interface InventoryRow {
  warehouse_id: string;
  book_id: string;
  quantity: number;
  reserved: number;
  updated_at: Timestamp;
}

const toInventory = (r: InventoryRow): WarehouseInventory => ({
  warehouseId: r.warehouse_id,
  bookId: r.book_id,
  quantity: r.quantity,
  reserved: r.reserved,
  updatedAt: iso(r.updated_at),
});

interface ReservationRow {
  order_id: string;
  warehouse_id: string;
  book_id: string;
  quantity: number;
  expires_at: Timestamp;
  created_at: Timestamp;
}

const toReservation = (r: ReservationRow): Reservation => ({
  orderId: r.order_id,
  warehouseId: r.warehouse_id,
  bookId: r.book_id,
  quantity: r.quantity,
  expiresAt: iso(r.expires_at),
  createdAt: iso(r.created_at),
});

interface CartRow {
  id: string;
  user_id: string | null;
  session_id: string | null;
  status: CartStatus;
  applied_promotion_id: string | null;
  updated_at: Timestamp;
}

interface CartItemRow {
  cart_id: string;
  book_id: string;
  quantity: number;
  unit_price_snapshot: string;
}

const toCart = (r: CartRow, items: CartItemRow[]): Cart => ({
  id: r.id,
  userId: r.user_id,
  sessionId: r.session_id,
  status: r.status,
  appliedPromotionId: r.applied_promotion_id,
  items: items
    .filter((i) => i.cart_id === r.id)
    .map((i): CartItem => ({
      bookId: i.book_id,
      quantity: i.quantity,
      unitPriceSnapshot: parseMoney(i.unit_price_snapshot),
    })),
  updatedAt: iso(r.updated_at),
});

interface PromotionRow {
  id: string;
  code: string;
  discount_type: DiscountRule['type'];
  discount_value: string;
  max_discount: string | null;
  min_order_amount: string;
  max_uses: number | null;
  max_uses_per_user: number | null;
  used_count: number;
  active: boolean;
  starts_at: Timestamp;
  ends_at: Timestamp;
}

function toDiscountRule(r: PromotionRow): DiscountRule {
  switch (r.discount_type) {
    case 'percentage':
      return { type: 'percentage', percent: Number(r.discount_value), maxDiscount: moneyOrNull(r.max_discount) };
    case 'fixed':
      return { type: 'fixed', amount: parseMoney(r.discount_value) };
    case 'free_shipping':
      return { type: 'free_shipping' };
  }
}

const toPromotion = (r: PromotionRow): Promotion => ({
  id: r.id,
  code: r.code,
  rule: toDiscountRule(r),
  active: r.active,
  startsAt: iso(r.starts_at),
  endsAt: iso(r.ends_at),
  minOrderAmount: parseMoney(r.min_order_amount),
  maxUses: r.max_uses,
  maxUsesPerUser: r.max_uses_per_user,
  usedCount: r.used_count,
});

interface OrderRow {
  id: string;
  order_number: string;
  user_id: string;
  status: OrderStatus;
  payment_method: PaymentMethod;
  subtotal: string;
  discount: string;
  shipping_fee: string;
  cod_fee: string;
  total: string;
  promotion_id: string | null;
  address: ShippingAddress;
  version: number;
  created_at: Timestamp;
  updated_at: Timestamp;
}

const toOrder = (r: OrderRow): Order => ({
  id: r.id,
  orderNumber: r.order_number,
  userId: r.user_id,
  status: r.status,
  paymentMethod: r.payment_method,
  subtotal: parseMoney(r.subtotal),
  discount: parseMoney(r.discount),
  shippingFee: parseMoney(r.shipping_fee),
  codFee: parseMoney(r.cod_fee),
  total: parseMoney(r.total),
  promotionId: r.promotion_id,
  address: r.address,
  version: r.version,
  createdAt: iso(r.created_at),
  updatedAt: iso(r.updated_at),
});

interface OrderItemRow {
  order_id: string;
  book_id: string;
  quantity: number;
  unit_price: string;
  warehouse_id: string;
}

const toOrderItem = (r: OrderItemRow): OrderItem => ({
  orderId: r.order_id,
  bookId: r.book_id,
  quantity: r.quantity,
  unitPrice: parseMoney(r.unit_price),
  warehouseId: r.warehouse_id,
});

interface HistoryRow {
  order_id: string;
  from_status: OrderStatus | null;
  to_status: OrderStatus;
  actor: string;
  reason: string | null;
  created_at: Timestamp;
}

const toHistory = (r: HistoryRow): OrderStatusChange => ({
  orderId: r.order_id,
  fromStatus: r.from_status,
  toStatus: r.to_status,
  actor: r.actor,
  reason: r.reason,
  createdAt: iso(r.created_at),
});

interface PaymentRow {
  id: string;
  order_id: string;
  method: PaymentMethod;
  amount: string;
  status: PaymentStatus;
  gateway_txn_ref: string;
  idempotency_key: string;
  redirect_url: string | null;
  gateway_response_code: string | null;
  gateway_transaction_id: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

const toPayment = (r: PaymentRow): Payment => ({
  id: r.id,
  orderId: r.order_id,
  method: r.method,
  amount: parseMoney(r.amount),
  status: r.status,
  gatewayTxnRef: r.gateway_txn_ref,
  idempotencyKey: r.idempotency_key,
  redirectUrl: r.redirect_url,
  gatewayResponseCode: r.gateway_response_code,
  gatewayTransactionId: r.gateway_transaction_id,
  createdAt: iso(r.created_at),
  updatedAt: iso(r.updated_at),
});

interface RefundRow {
  id: string;
  payment_id: string;
  order_id: string;
  amount: string;
  reason: string;
  status: RefundStatus;
  requested_by: string;
  reviewed_by: string | null;
  failure_reason: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

const toRefund = (r: RefundRow): Refund => ({
  id: r.id,
  paymentId: r.payment_id,
  orderId: r.order_id,
  amount: parseMoney(r.amount),
  reason: r.reason,
  status: r.status,
  requestedBy: r.requested_by,
  reviewedBy: r.reviewed_by,
  failureReason: r.failure_reason,
  createdAt: iso(r.created_at),
  updatedAt: iso(r.updated_at),
});

interface WebhookRow {
  id: string;
  gateway: Gateway;
  txn_ref: string;
  signature_valid: boolean;
  outcome: CallbackOutcome;
  processed: boolean;
  payload: Record<string, string>;
  response: Record<string, unknown>;
  created_at: Timestamp;
}

const toWebhook = (r: WebhookRow): WebhookLog => ({
  id: r.id,
  gateway: r.gateway,
  txnRef: r.txn_ref,
  signatureValid: r.signature_valid,
  outcome: r.outcome,
  processed: r.processed,
  payload: r.payload,
  response: r.response,
  createdAt: iso(r.created_at),
});

interface UserRow {
  id: string;
  email: string;
  full_name: string;
  is_verified: boolean;
  verification_token: string | null;
  verification_token_sent_at: Timestamp | null;
  reset_token: string | null;
  reset_token_sent_at: Timestamp | null;
}

const toUser = (r: UserRow): User => ({
  id: r.id,
  email: r.email,
  fullName: r.full_name,
  isVerified: r.is_verified,
  verificationToken: r.verification_token,
  verificationTokenSentAt: isoOrNull(r.verification_token_sent_at),
  resetToken: r.reset_token,
  resetTokenSentAt: isoOrNull(r.reset_token_sent_at),
});

interface NotificationRow {
  id: string;
  user_id: string;
  template: string;
  data: Record<string, unknown>;
  status: NotificationStatus;
  attempts: number;
  next_retry_at: Timestamp | null;
  last_error: string | null;
  created_at: Timestamp;
  sent_at: Timestamp | null;
}

const toNotification = (r: NotificationRow): Notification => ({
  id: r.id,
  userId: r.user_id,
  template: r.template,
  data: r.data,
  status: r.status,
  attempts: r.attempts,
  nextRetryAt: isoOrNull(r.next_retry_at),
  lastError: r.last_error,
  createdAt: iso(r.created_at),
  sentAt: isoOrNull(r.sent_at),
});

// ---------------------------------------------------------------------------
// Repositories bound to one client
// ---------------------------------------------------------------------------

function bindRepositories(client: Queryable, ctx: RequestContext): Repositories {
  async function q<R extends pg.QueryResultRow>(text: string, values: unknown[] = []): Promise<pg.QueryResult<R>> {
    throwIfExpired(ctx, 'database_timeout');
    return client.query<R>(text, values);
  }

  async function loadCarts(rows: CartRow[]): Promise<Cart[]> {
    if (rows.length === 0) return [];
    const items = await q<CartItemRow>(
      'SELECT cart_id, book_id, quantity, unit_price_snapshot FROM cart_items WHERE cart_id = ANY($1) ORDER BY book_id',
      [rows.map((r) => r.id)]
    );
    return rows.map((r) => toCart(r, items.rows));
  }

  const CART_COLUMNS = 'id, user_id, session_id, status, applied_promotion_id, updated_at';

  return {
    books: {
      async findByIds(ids) {
        const result = await q<BookRow>('SELECT id, title, price, active FROM books WHERE id = ANY($1)', [ids]);
        return result.rows.map(toBook);
      },
    },

    inventory: {
      async get(warehouseId, bookId) {
        const result = await q<StockRowRecord>(`${STOCK_SELECT} WHERE i.warehouse_id = $1 AND i.book_id = $2`, [
          warehouseId,
          bookId,
        ]);
        const row = result.rows[0];
        return row ? toStockRow(row) : null;
      },
      async listForBook(bookId) {
        const result = await q<StockRowRecord>(`${STOCK_SELECT} WHERE i.book_id = $1 ORDER BY i.warehouse_id`, [bookId]);
        return result.rows.map(toStockRow);
      },
      async incrementReserved(warehouseId, bookId, qty) {
        const result = await q(
          `UPDATE warehouse_inventory
              SET reserved = reserved + $3, updated_at = NOW()
            WHERE warehouse_id = $1 AND book_id = $2 AND quantity - reserved >= $3`,
          [warehouseId, bookId, qty]
        );
        return result.rowCount === 1;
      },
      async decrementReserved(warehouseId, bookId, qty) {
        const result = await q(
          `UPDATE warehouse_inventory
              SET reserved = reserved - $3, updated_at = NOW()
            WHERE warehouse_id = $1 AND book_id = $2 AND reserved >= $3`,
          [warehouseId, bookId, qty]
        );
        return result.rowCount === 1;
      },
      async commitSale(warehouseId, bookId, qty) {
        const result = await q(
          `UPDATE warehouse_inventory
              SET quantity = quantity - $3, reserved = reserved - $3, updated_at = NOW()
            WHERE warehouse_id = $1 AND book_id = $2 AND reserved >= $3 AND quantity >= $3`,
          [warehouseId, bookId, qty]
        );
        return result.rowCount === 1;
      },
      async lockForUpdate(warehouseId, bookId) {
        const result = await q<InventoryRow>(
          `SELECT warehouse_id, book_id, quantity, reserved, updated_at
             FROM warehouse_inventory WHERE warehouse_id = $1 AND book_id = $2 FOR UPDATE`,
          [warehouseId, bookId]
        );
        const row = result.rows[0];
        return row ? toInventory(row) : null;
      },
      async setQuantity(warehouseId, bookId, quantity) {
        await q(
          'UPDATE warehouse_inventory SET quantity = $3, updated_at = NOW() WHERE warehouse_id = $1 AND book_id = $2',
          [warehouseId, bookId, quantity]
        );
      },
      async insert(row) {
        await q(
          'INSERT INTO warehouse_inventory (warehouse_id, book_id, quantity, reserved) VALUES ($1, $2, $3, $4)',
          [row.warehouseId, row.bookId, row.quantity, row.reserved]
        );
      },
    },

    reservations: {
      async findByOrder(orderId) {
        const result = await q<ReservationRow>(
          `SELECT order_id, warehouse_id, book_id, quantity, expires_at, created_at
             FROM inventory_reservations WHERE order_id = $1 ORDER BY warehouse_id, book_id`,
          [orderId]
        );
        return result.rows.map(toReservation);
      },
      async exists(orderId, warehouseId, bookId) {
        const result = await q(
          'SELECT 1 FROM inventory_reservations WHERE order_id = $1 AND warehouse_id = $2 AND book_id = $3',
          [orderId, warehouseId, bookId]
        );
        return (result.rowCount ?? 0) > 0;
      },
      async insert(r) {
        await q(
          `INSERT INTO inventory_reservations (order_id, warehouse_id, book_id, quantity, expires_at, created_at)
           VALUES ($1, $2, $3, $4, $5, $6)`,
          [r.orderId, r.warehouseId, r.bookId, r.quantity, r.expiresAt, r.createdAt]
        );
      },
      async deleteByOrder(orderId) {
        const result = await q('DELETE FROM inventory_reservations WHERE order_id = $1', [orderId]);
        return result.rowCount ?? 0;
      },
      async listExpiredPendingOrders(at, limit) {
        const result = await q<{ order_id: string }>(
          `SELECT r.order_id
             FROM inventory_reservations r
             JOIN orders o ON o.id = r.order_id
            WHERE o.status = 'pending' AND r.expires_at <= $1
            GROUP BY r.order_id
            ORDER BY MIN(r.expires_at), r.order_id
            LIMIT $2`,
          [at, limit]
        );
        return result.rows.map((row) => row.order_id);
      },
    },

    carts: {
      async findById(cartId) {
        const result = await q<CartRow>(`SELECT ${CART_COLUMNS} FROM carts WHERE id = $1`, [cartId]);
        const [cart] = await loadCarts(result.rows);
        return cart ?? null;
      },
      async findActiveByUser(userId) {
        const result = await q<CartRow>(
          `SELECT ${CART_COLUMNS} FROM carts WHERE user_id = $1 AND status = 'active' ORDER BY updated_at DESC LIMIT 1`,
          [userId]
        );
        const [cart] = await loadCarts(result.rows);
        return cart ?? null;
      },
      async create(cart) {
        await q(
          `INSERT INTO carts (id, user_id, session_id, status, applied_promotion_id, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6)`,
          [cart.id, cart.userId, cart.sessionId, cart.status, cart.appliedPromotionId, cart.updatedAt]
        );
        for (const item of cart.items) {
          await q(
            'INSERT INTO cart_items (cart_id, book_id, quantity, unit_price_snapshot) VALUES ($1, $2, $3, $4)',
            [cart.id, item.bookId, item.quantity, formatMoney(item.unitPriceSnapshot)]
          );
        }
      },
      async upsertItem(cartId, item) {
        await q(
          `INSERT INTO cart_items (cart_id, book_id, quantity, unit_price_snapshot) VALUES ($1, $2, $3, $4)
           ON CONFLICT (cart_id, book_id)
           DO UPDATE SET quantity = EXCLUDED.quantity, unit_price_snapshot = EXCLUDED.unit_price_snapshot`,
          [cartId, item.bookId, item.quantity, formatMoney(item.unitPriceSnapshot)]
        );
        await q('UPDATE carts SET updated_at = NOW() WHERE id = $1', [cartId]);
      },
      async setItemPrice(cartId, bookId, unitPrice) {
        await q('UPDATE cart_items SET unit_price_snapshot = $3 WHERE cart_id = $1 AND book_id = $2', [
          cartId,
          bookId,
          formatMoney(unitPrice),
        ]);
      },
      async setPromotion(cartId, promotionId) {
        await q('UPDATE carts SET applied_promotion_id = $2, updated_at = NOW() WHERE id = $1', [cartId, promotionId]);
      },
      async markConverted(cartId) {
        await q(`UPDATE carts SET status = 'converted', updated_at = NOW() WHERE id = $1`, [cartId]);
        await q('DELETE FROM cart_items WHERE cart_id = $1', [cartId]);
      },
      async listWithPromotion(offset, limit) {
        const result = await q<CartRow>(
          `SELECT ${CART_COLUMNS} FROM carts
            WHERE status = 'active' AND applied_promotion_id IS NOT NULL
            ORDER BY id OFFSET $1 LIMIT $2`,
          [offset, limit]
        );
        return loadCarts(result.rows);
      },
    },

    promotions: {
      async findById(id) {
        const result = await q<PromotionRow>('SELECT * FROM promotions WHERE id = $1', [id]);
        const row = result.rows[0];
        return row ? toPromotion(row) : null;
      },
      async findByCode(code) {
        const result = await q<PromotionRow>('SELECT * FROM promotions WHERE code = $1', [code]);
        const row = result.rows[0];
        return row ? toPromotion(row) : null;
      },
      async countUserUsage(promotionId, userId) {
        const result = await q<{ count: string }>(
          'SELECT COUNT(*) AS count FROM promotion_usages WHERE promotion_id = $1 AND user_id = $2',
          [promotionId, userId]
        );
        return Number(result.rows[0]?.count ?? 0);
      },
      async incrementUsage(promotionId) {
        const result = await q(
          `UPDATE promotions SET used_count = used_count + 1
            WHERE id = $1 AND (max_uses IS NULL OR used_count < max_uses)`,
          [promotionId]
        );
        return result.rowCount === 1;
      },
      async recordUsage(usage) {
        await q(
          `INSERT INTO promotion_usages (promotion_id, user_id, order_id, discount, created_at)
           VALUES ($1, $2, $3, $4, $5)`,
          [usage.promotionId, usage.userId, usage.orderId, formatMoney(usage.discount), usage.createdAt]
        );
      },
    },

    orders: {
      async nextSequence() {
        const result = await q<{ value: string }>(`SELECT nextval('order_number_seq') AS value`);
        return Number(result.rows[0]?.value ?? 0);
      },
      async insert(order, items) {
        await q(
          `INSERT INTO orders (id, order_number, user_id, status, payment_method, subtotal, discount,
                               shipping_fee, cod_fee, total, promotion_id, address, version, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)`,
          [
            order.id,
            order.orderNumber,
            order.userId,
            order.status,
            order.paymentMethod,
            formatMoney(order.subtotal),
            formatMoney(order.discount),
            formatMoney(order.shippingFee),
            formatMoney(order.codFee),
            formatMoney(order.total),
            order.promotionId,
            JSON.stringify(order.address),
            order.version,
            order.createdAt,
            order.updatedAt,
          ]
        );
        for (const item of items) {
          await q(
            `INSERT INTO order_items (order_id, book_id, quantity, unit_price, warehouse_id)
             VALUES ($1, $2, $3, $4, $5)`,
            [item.orderId, item.bookId, item.quantity, formatMoney(item.unitPrice), item.warehouseId]
          );
        }
      },
      async findById(orderId) {
        const result = await q<OrderRow>('SELECT * FROM orders WHERE id = $1', [orderId]);
        const row = result.rows[0];
        return row ? toOrder(row) : null;
      },
      async findItems(orderId) {
        const result = await q<OrderItemRow>(
          'SELECT order_id, book_id, quantity, unit_price, warehouse_id FROM order_items WHERE order_id = $1 ORDER BY book_id',
          [orderId]
        );
        return result.rows.map(toOrderItem);
      },
      async updateStatus(orderId, expectedVersion, status, at) {
        const result = await q<OrderRow>(
          `UPDATE orders SET status = $3, version = version + 1, updated_at = $4
            WHERE id = $1 AND version = $2
        RETURNING *`,
          [orderId, expectedVersion, status, at]
        );
        const row = result.rows[0];
        return row ? toOrder(row) : null;
      },
      async appendHistory(change) {
        await q(
          `INSERT INTO order_status_history (order_id, from_status, to_status, actor, reason, created_at)
           VALUES ($1, $2, $3, $4, $5, $6)`,
          [change.orderId, change.fromStatus, change.toStatus, change.actor, change.reason, change.createdAt]
        );
      },
      async listHistory(orderId) {
        const result = await q<HistoryRow>(
          `SELECT order_id, from_status, to_status, actor, reason, created_at
             FROM order_status_history WHERE order_id = $1 ORDER BY id`,
          [orderId]
        );
        return result.rows.map(toHistory);
      },
    },

    payments: {
      async insert(p) {
        await q(
          `INSERT INTO payments (id, order_id, method, amount, status, gateway_txn_ref, idempotency_key,
                                 redirect_url, gateway_response_code, gateway_transaction_id, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
          [
            p.id,
            p.orderId,
            p.method,
            formatMoney(p.amount),
            p.status,
            p.gatewayTxnRef,
            p.idempotencyKey,
            p.redirectUrl,
            p.gatewayResponseCode,
            p.gatewayTransactionId,
            p.createdAt,
            p.updatedAt,
          ]
        );
      },
      async findById(paymentId) {
        const result = await q<PaymentRow>('SELECT * FROM payments WHERE id = $1', [paymentId]);
        const row = result.rows[0];
        return row ? toPayment(row) : null;
      },
      async findByTxnRef(txnRef) {
        const result = await q<PaymentRow>('SELECT * FROM payments WHERE gateway_txn_ref = $1', [txnRef]);
        const row = result.rows[0];
        return row ? toPayment(row) : null;
      },
      async findOpen(orderId, method) {
        const result = await q<PaymentRow>(
          `SELECT * FROM payments WHERE order_id = $1 AND method = $2 AND status IN ('initiated', 'pending')`,
          [orderId, method]
        );
        const row = result.rows[0];
        return row ? toPayment(row) : null;
      },
      async findSettled(orderId) {
        const result = await q<PaymentRow>(
          `SELECT * FROM payments
            WHERE order_id = $1 AND status IN ('succeeded', 'refund_requested')
            ORDER BY created_at DESC
            LIMIT 1`,
          [orderId]
        );
        const row = result.rows[0];
        return row ? toPayment(row) : null;
      },
      async countByOrder(orderId) {
        const result = await q<{ count: string }>('SELECT COUNT(*) AS count FROM payments WHERE order_id = $1', [
          orderId,
        ]);
        return Number(result.rows[0]?.count ?? 0);
      },
      async update(paymentId, changes, at) {
        await q(
          `UPDATE payments
              SET status = $2,
                  gateway_response_code = CASE WHEN $3::boolean THEN $4 ELSE gateway_response_code END,
                  gateway_transaction_id = CASE WHEN $5::boolean THEN $6 ELSE gateway_transaction_id END,
                  redirect_url = CASE WHEN $7::boolean THEN $8 ELSE redirect_url END,
                  updated_at = $9
            WHERE id = $1`,
          [
            paymentId,
            changes.status,
            changes.gatewayResponseCode !== undefined,
            changes.gatewayResponseCode ?? null,
            changes.gatewayTransactionId !== undefined,
            changes.gatewayTransactionId ?? null,
            changes.redirectUrl !== undefined,
            changes.redirectUrl ?? null,
            at,
          ]
        );
      },
    },

    refunds: {
      async insert(r) {
        await q(
          `INSERT INTO refunds (id, payment_id, order_id, amount, reason, status, requested_by, reviewed_by,
                                failure_reason, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
          [
            r.id,
            r.paymentId,
            r.orderId,
            formatMoney(r.amount),
            r.reason,
            r.status,
            r.requestedBy,
            r.reviewedBy,
            r.failureReason,
            r.createdAt,
            r.updatedAt,
          ]
        );
      },
      async findById(refundId) {
        const result = await q<RefundRow>('SELECT * FROM refunds WHERE id = $1', [refundId]);
        const row = result.rows[0];
        return row ? toRefund(row) : null;
      },
      async findOpenByPayment(paymentId) {
        const result = await q<RefundRow>(
          `SELECT * FROM refunds WHERE payment_id = $1 AND status IN ('requested', 'approved') LIMIT 1`,
          [paymentId]
        );
        const row = result.rows[0];
        return row ? toRefund(row) : null;
      },
      async update(refundId, changes, at) {
        await q(
          `UPDATE refunds
              SET status = $2,
                  reviewed_by = CASE WHEN $3::boolean THEN $4 ELSE reviewed_by END,
                  failure_reason = CASE WHEN $5::boolean THEN $6 ELSE failure_reason END,
                  updated_at = $7
            WHERE id = $1`,
          [
            refundId,
            changes.status,
            changes.reviewedBy !== undefined,
            changes.reviewedBy ?? null,
            changes.failureReason !== undefined,
            changes.failureReason ?? null,
            at,
          ]
        );
      },
    },

    webhooks: {
      async insert(log) {
        await q(
          `INSERT INTO webhook_logs (id, gateway, txn_ref, signature_valid, outcome, processed, payload, response, created_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)`,
          [
            log.id,
            log.gateway,
            log.txnRef,
            log.signatureValid,
            log.outcome,
            log.processed,
            JSON.stringify(log.payload),
            JSON.stringify(log.response),
            log.createdAt,
          ]
        );
      },
      async findProcessed(gateway, txnRef) {
        const result = await q<WebhookRow>(
          'SELECT * FROM webhook_logs WHERE gateway = $1 AND txn_ref = $2 AND processed LIMIT 1',
          [gateway, txnRef]
        );
        const row = result.rows[0];
        return row ? toWebhook(row) : null;
      },
    },

    audit: {
      async record(entry: AuditEntry) {
        await q(
          `INSERT INTO audit_logs (actor, action, entity, entity_id, data, created_at)
           VALUES ($1, $2, $3, $4, $5, $6)`,
          [entry.actor, entry.action, entry.entity, entry.entityId, JSON.stringify(entry.data), entry.createdAt]
        );
      },
    },

    users: {
      async findById(userId) {
        const result = await q<UserRow>('SELECT * FROM users WHERE id = $1', [userId]);
        const row = result.rows[0];
        return row ? toUser(row) : null;
      },
      async clearExpiredVerificationTokens(sentBefore) {
        const result = await q(
          `UPDATE users SET verification_token = NULL, verification_token_sent_at = NULL
            WHERE is_verified = FALSE
              AND verification_token IS NOT NULL
              AND verification_token_sent_at < $1`,
          [sentBefore]
        );
        return result.rowCount ?? 0;
      },
      async clearExpiredResetTokens(sentBefore) {
        const result = await q(
          `UPDATE users SET reset_token = NULL, reset_token_sent_at = NULL
            WHERE reset_token IS NOT NULL AND reset_token_sent_at < $1`,
          [sentBefore]
        );
        return result.rowCount ?? 0;
      },
    },

    notifications: {
      async insert(n) {
        await q(
          `INSERT INTO notifications (id, user_id, template, data, status, attempts, next_retry_at, last_error, created_at, sent_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
          [n.id, n.userId, n.template, JSON.stringify(n.data), n.status, n.attempts, n.nextRetryAt, n.lastError, n.createdAt, n.sentAt]
        );
      },
      async findById(id) {
        const result = await q<NotificationRow>('SELECT * FROM notifications WHERE id = $1', [id]);
        const row = result.rows[0];
        return row ? toNotification(row) : null;
      },
      async listPending(limit) {
        const result = await q<NotificationRow>(
          `SELECT * FROM notifications WHERE status = 'pending' ORDER BY created_at LIMIT $1 FOR UPDATE SKIP LOCKED`,
          [limit]
        );
        return result.rows.map(toNotification);
      },
      async listRetryDue(at, limit) {
        const result = await q<NotificationRow>(
          `SELECT * FROM notifications
            WHERE status = 'failed' AND next_retry_at IS NOT NULL AND next_retry_at <= $1
            ORDER BY next_retry_at LIMIT $2 FOR UPDATE SKIP LOCKED`,
          [at, limit]
        );
        return result.rows.map(toNotification);
      },
      async markSent(id, at) {
        await q(
          `UPDATE notifications SET status = 'sent', sent_at = $2, next_retry_at = NULL, last_error = NULL WHERE id = $1`,
          [id, at]
        );
      },
      async markFailed(id, attempts, nextRetryAt, error) {
        await q(
          `UPDATE notifications SET status = 'failed', attempts = $2, next_retry_at = $3, last_error = $4 WHERE id = $1`,
          [id, attempts, nextRetryAt, error]
        );
      },
      async deleteSentBefore(cutoff) {
        const result = await q(`DELETE FROM notifications WHERE status = 'sent' AND created_at < $1`, [cutoff]);
        return result.rowCount ?? 0;
      },
    },
  };
}

// ---------------------------------------------------------------------------
// Error translation
// ---------------------------------------------------------------------------

function driverCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function translate(error: unknown): Error {
  if (error instanceof AppError) return error;
  const code = driverCode(error);
  const message = errorMessage(error);

  if (code && RETRYABLE_CODES.has(code)) {
    return new ConflictError('serialization_failure', 'Concurrent update, please retry', undefined, { cause: error });
  }
  if (code === '57014') {
    return new TimeoutError('database_timeout', 'Database statement timed out', { cause: error });
  }
  if (code === '23505') {
    return new ConflictError('duplicate_key', 'Duplicate record', undefined, { cause: error });
  }
  if (code === '23514') {
    reportInvariantViolation('INVARIANT_CHECK_CONSTRAINT', 'Check constraint rejected a write', { error: message });
    return new InvariantViolationError('INVARIANT_CHECK_CONSTRAINT', 'Stock or order invariant rejected the write');
  }
  if ((code && UNAVAILABLE_CODES.has(code)) || message.includes('Connection terminated')) {
    return new DependencyError('database_unavailable', 'Database is unavailable', { cause: error });
  }
  return error instanceof Error ? error : new Error(message);
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class PgStore implements Store {
  private readonly pool: pg.Pool;
  private readonly queryTimeoutMs: number;

  constructor(config: PgStoreConfig) {
    this.pool = new pg.Pool({
      connectionString: config.connectionString,
      max: config.poolMax,
      connectionTimeoutMillis: config.queryTimeoutMs,
    });
    this.queryTimeoutMs = config.queryTimeoutMs;

    this.pool.on('error', (error) => {
      logger.error('Idle database client error', { error: error.message });
    });
  }

  async transaction<T>(
    ctx: RequestContext,
    fn: (tx: Repositories) => Promise<T>,
    options: TransactionOptions = {}
  ): Promise<T> {
    const isolation = options.isolation ?? 'read committed';
    const maxAttempts = options.maxAttempts ?? 3;

    for (let attempt = 1; ; attempt++) {
      throwIfExpired(ctx, 'database_timeout');
      const client = await this.connect();
      try {
        await client.query(`BEGIN ISOLATION LEVEL ${ISOLATION_SQL[isolation]}`);
        await client.query(`SET LOCAL statement_timeout = ${Math.floor(this.queryTimeoutMs)}`);
        const result = await fn(bindRepositories(client, ctx));
        throwIfExpired(ctx, 'database_timeout');
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await this.rollback(client);
        const code = driverCode(error);
        if (code && RETRYABLE_CODES.has(code) && attempt < maxAttempts) {
          logger.warn('Transaction conflict, retrying', { attempt, code, requestId: ctx.requestId });
          getMetrics().increment(METRIC_NAMES.DB_TRANSACTION_RETRIES, 1, { code });
          continue;
        }
        throw translate(error);
      } finally {
        client.release();
      }
    }
  }

  async ping(ctx: RequestContext, timeoutMs: number): Promise<void> {
    await withTimeout(ctx, timeoutMs, 'database_timeout', async () => {
      try {
        await this.pool.query('SELECT 1');
      } catch (error) {
        throw translate(error);
      }
    });
  }

  /** Apply db/schema.sql (idempotent DDL). */
  async migrate(): Promise<void> {
    const sql = await readFile(new URL('../../db/schema.sql', import.meta.url), 'utf8');
    await this.pool.query(sql);
    logger.info('Schema applied');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async connect(): Promise<pg.PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      throw new DependencyError('database_unavailable', 'Could not acquire a database connection', { cause: error });
    }
  }

  private async rollback(client: pg.PoolClient): Promise<void> {
    try {
      await client.query('ROLLBACK');
    } catch (error) {
      logger.error('Rollback failed', { error: errorMessage(error) });
    }
  }
}
