/**
 * In-memory Store
 *
 * Used by the test-suite and the demo. Transactions are serialised behind a
 * mutex and run against a structured clone of the state, which is swapped in
 * on commit and discarded on error - so every transaction is trivially
 * SERIALIZABLE and a thrown error leaves no partial writes.
 */

import type {
  AuditEntry,
  Book,
  Cart,
  Notification,
  Order,
  OrderItem,
  OrderStatusChange,
  Payment,
  Promotion,
  PromotionUsage,
  Refund,
  Reservation,
  StockRow,
  User,
  Warehouse,
  WarehouseInventory,
  WebhookLog,
} from '../types/index.js';
import type { RequestContext } from '../utils/context.js';
import { DependencyError, TimeoutError } from '../utils/errors.js';
import type { Repositories, Store, TransactionOptions } from './types.js';

export interface MemoryState {
  books: Map<string, Book>;
  warehouses: Map<string, Warehouse>;
  inventory: Map<string, WarehouseInventory>;
  reservations: Reservation[];
  carts: Map<string, Cart>;
  promotions: Map<string, Promotion>;
  promotionUsages: PromotionUsage[];
  orders: Map<string, Order>;
  orderItems: OrderItem[];
  orderHistory: OrderStatusChange[];
  payments: Map<string, Payment>;
  refunds: Map<string, Refund>;
  webhooks: WebhookLog[];
  audit: AuditEntry[];
  users: Map<string, User>;
  notifications: Map<string, Notification>;
  orderSequence: number;
}

function emptyState(): MemoryState {
  return {
    books: new Map(),
    warehouses: new Map(),
    inventory: new Map(),
    reservations: [],
    carts: new Map(),
    promotions: new Map(),
    promotionUsages: [],
    orders: new Map(),
    orderItems: [],
    orderHistory: [],
    payments: new Map(),
    refunds: new Map(),
    webhooks: [],
    audit: [],
    users: new Map(),
    notifications: new Map(),
    orderSequence: 0,
  };
}

const stockKey = (warehouseId: string, bookId: string): string => `${warehouseId}|${bookId}`;

const now = (): string => new Date().toISOString();

function joinWarehouse(state: MemoryState, row: WarehouseInventory): StockRow | null {
  const warehouse = state.warehouses.get(row.warehouseId);
  return warehouse ? { ...row, warehouse: { ...warehouse } } : null;
}

function bindRepositories(state: MemoryState): Repositories {
  return {
    books: {
      async findByIds(ids) {
        return ids.flatMap((id) => {
          const book = state.books.get(id);
          return book ? [{ ...book }] : [];
        });
      },
    },

    inventory: {
      async get(warehouseId, bookId) {
        const row = state.inventory.get(stockKey(warehouseId, bookId));
        return row ? joinWarehouse(state, row) : null;
      },
      async listForBook(bookId) {
        return [...state.inventory.values()]
          .filter((row) => row.bookId === bookId)
          .flatMap((row) => {
            const joined = joinWarehouse(state, row);
            return joined ? [joined] : [];
          });
      },
      async incrementReserved(warehouseId, bookId, qty) {
        const row = state.inventory.get(stockKey(warehouseId, bookId));
        if (!row || row.quantity - row.reserved < qty) return false;
        row.reserved += qty;
        row.updatedAt = now();
        return true;
      },
      async decrementReserved(warehouseId, bookId, qty) {
        const row = state.inventory.get(stockKey(warehouseId, bookId));
        if (!row || row.reserved < qty) return false;
        row.reserved -= qty;
        row.updatedAt = now();
        return true;
      },
      async commitSale(warehouseId, bookId, qty) {
        const row = state.inventory.get(stockKey(warehouseId, bookId));
        if (!row || row.reserved < qty || row.quantity < qty) return false;
        row.quantity -= qty;
        row.reserved -= qty;
        row.updatedAt = now();
        return true;
      },
      async lockForUpdate(warehouseId, bookId) {
        const row = state.inventory.get(stockKey(warehouseId, bookId));
        return row ? { ...row } : null;
      },
      async setQuantity(warehouseId, bookId, quantity) {
        const row = state.inventory.get(stockKey(warehouseId, bookId));
        if (row) {
          row.quantity = quantity;
          row.updatedAt = now();
        }
      },
      async insert(row) {
        state.inventory.set(stockKey(row.warehouseId, row.bookId), { ...row, updatedAt: now() });
      },
    },

    reservations: {
      async findByOrder(orderId) {
        return state.reservations.filter((r) => r.orderId === orderId).map((r) => ({ ...r }));
      },
      async exists(orderId, warehouseId, bookId) {
        return state.reservations.some(
          (r) => r.orderId === orderId && r.warehouseId === warehouseId && r.bookId === bookId
        );
      },
      async insert(reservation) {
        state.reservations.push({ ...reservation });
      },
      async deleteByOrder(orderId) {
        const before = state.reservations.length;
        state.reservations = state.reservations.filter((r) => r.orderId !== orderId);
        return before - state.reservations.length;
      },
      async listExpiredPendingOrders(at, limit) {
        const earliest = new Map<string, string>();
        for (const r of state.reservations) {
          if (r.expiresAt > at || state.orders.get(r.orderId)?.status !== 'pending') continue;
          const seen = earliest.get(r.orderId);
          if (seen === undefined || r.expiresAt < seen) earliest.set(r.orderId, r.expiresAt);
        }
        return [...earliest]
          .sort(([, a], [, b]) => a.localeCompare(b))
          .slice(0, limit)
          .map(([orderId]) => orderId);
      },
    },

    carts: {
      async findById(cartId) {
        const cart = state.carts.get(cartId);
        return cart ? structuredClone(cart) : null;
      },
      async findActiveByUser(userId) {
        const cart = [...state.carts.values()].find((c) => c.userId === userId && c.status === 'active');
        return cart ? structuredClone(cart) : null;
      },
      async create(cart) {
        state.carts.set(cart.id, structuredClone(cart));
      },
      async upsertItem(cartId, item) {
        const cart = state.carts.get(cartId);
        if (!cart) return;
        const existing = cart.items.find((i) => i.bookId === item.bookId);
        if (existing) {
          existing.quantity = item.quantity;
          existing.unitPriceSnapshot = item.unitPriceSnapshot;
        } else {
          cart.items.push({ ...item });
        }
        cart.updatedAt = now();
      },
      async setItemPrice(cartId, bookId, unitPrice) {
        const item = state.carts.get(cartId)?.items.find((i) => i.bookId === bookId);
        if (item) item.unitPriceSnapshot = unitPrice;
      },
      async setPromotion(cartId, promotionId) {
        const cart = state.carts.get(cartId);
        if (cart) {
          cart.appliedPromotionId = promotionId;
          cart.updatedAt = now();
        }
      },
      async markConverted(cartId) {
        const cart = state.carts.get(cartId);
        if (cart) {
          cart.status = 'converted';
          cart.items = [];
          cart.updatedAt = now();
        }
      },
      async listWithPromotion(offset, limit) {
        return [...state.carts.values()]
          .filter((c) => c.status === 'active' && c.appliedPromotionId !== null)
          .sort((a, b) => a.id.localeCompare(b.id))
          .slice(offset, offset + limit)
          .map((c) => structuredClone(c));
      },
    },

    promotions: {
      async findById(id) {
        const promotion = state.promotions.get(id);
        return promotion ? structuredClone(promotion) : null;
      },
      async findByCode(code) {
        const promotion = [...state.promotions.values()].find((p) => p.code === code);
        return promotion ? structuredClone(promotion) : null;
      },
      async countUserUsage(promotionId, userId) {
        return state.promotionUsages.filter((u) => u.promotionId === promotionId && u.userId === userId).length;
      },
      async incrementUsage(promotionId) {
        const promotion = state.promotions.get(promotionId);
        if (!promotion) return false;
        if (promotion.maxUses !== null && promotion.usedCount >= promotion.maxUses) return false;
        promotion.usedCount += 1;
        return true;
      },
      async recordUsage(usage) {
        state.promotionUsages.push({ ...usage });
      },
    },

    orders: {
      async nextSequence() {
        state.orderSequence += 1;
        return state.orderSequence;
      },
      async insert(order, items) {
        state.orders.set(order.id, structuredClone(order));
        state.orderItems.push(...items.map((i) => ({ ...i })));
      },
      async findById(orderId) {
        const order = state.orders.get(orderId);
        return order ? structuredClone(order) : null;
      },
      async findItems(orderId) {
        return state.orderItems.filter((i) => i.orderId === orderId).map((i) => ({ ...i }));
      },
      async updateStatus(orderId, expectedVersion, status, at) {
        const order = state.orders.get(orderId);
        if (!order || order.version !== expectedVersion) return null;
        order.status = status;
        order.version += 1;
        order.updatedAt = at;
        return structuredClone(order);
      },
      async appendHistory(change) {
        state.orderHistory.push({ ...change });
      },
      async listHistory(orderId) {
        return state.orderHistory.filter((h) => h.orderId === orderId).map((h) => ({ ...h }));
      },
    },

    payments: {
      async insert(payment) {
        state.payments.set(payment.id, { ...payment });
      },
      async findById(paymentId) {
        const payment = state.payments.get(paymentId);
        return payment ? { ...payment } : null;
      },
      async findByTxnRef(txnRef) {
        const payment = [...state.payments.values()].find((p) => p.gatewayTxnRef === txnRef);
        return payment ? { ...payment } : null;
      },
      async findOpen(orderId, method) {
        const payment = [...state.payments.values()].find(
          (p) => p.orderId === orderId && p.method === method && (p.status === 'initiated' || p.status === 'pending')
        );
        return payment ? { ...payment } : null;
      },
      async findSettled(orderId) {
        const payment = [...state.payments.values()]
          .filter((p) => p.orderId === orderId && (p.status === 'succeeded' || p.status === 'refund_requested'))
          .sort((a, b) => b.createdAt.localeCompare(a.createdAt))[0];
        return payment ? { ...payment } : null;
      },
      async countByOrder(orderId) {
        return [...state.payments.values()].filter((p) => p.orderId === orderId).length;
      },
      async update(paymentId, changes, at) {
        const payment = state.payments.get(paymentId);
        if (!payment) return;
        payment.status = changes.status;
        if (changes.gatewayResponseCode !== undefined) payment.gatewayResponseCode = changes.gatewayResponseCode;
        if (changes.gatewayTransactionId !== undefined) payment.gatewayTransactionId = changes.gatewayTransactionId;
        if (changes.redirectUrl !== undefined) payment.redirectUrl = changes.redirectUrl;
        payment.updatedAt = at;
      },
    },

    refunds: {
      async insert(refund) {
        state.refunds.set(refund.id, { ...refund });
      },
      async findById(refundId) {
        const refund = state.refunds.get(refundId);
        return refund ? { ...refund } : null;
      },
      async findOpenByPayment(paymentId) {
        const refund = [...state.refunds.values()].find(
          (r) => r.paymentId === paymentId && (r.status === 'requested' || r.status === 'approved')
        );
        return refund ? { ...refund } : null;
      },
      async update(refundId, changes, at) {
        const refund = state.refunds.get(refundId);
        if (!refund) return;
        refund.status = changes.status;
        if (changes.reviewedBy !== undefined) refund.reviewedBy = changes.reviewedBy;
        if (changes.failureReason !== undefined) refund.failureReason = changes.failureReason;
        refund.updatedAt = at;
      },
    },

    webhooks: {
      async insert(log) {
        state.webhooks.push(structuredClone(log));
      },
      async findProcessed(gateway, txnRef) {
        const log = state.webhooks.find((w) => w.gateway === gateway && w.txnRef === txnRef && w.processed);
        return log ? structuredClone(log) : null;
      },
    },

    audit: {
      async record(entry) {
        state.audit.push(structuredClone(entry));
      },
    },

    users: {
      async findById(userId) {
        const user = state.users.get(userId);
        return user ? { ...user } : null;
      },
      async clearExpiredVerificationTokens(sentBefore) {
        let count = 0;
        for (const user of state.users.values()) {
          if (
            !user.isVerified &&
            user.verificationToken !== null &&
            user.verificationTokenSentAt !== null &&
            user.verificationTokenSentAt < sentBefore
          ) {
            user.verificationToken = null;
            user.verificationTokenSentAt = null;
            count += 1;
          }
        }
        return count;
      },
      async clearExpiredResetTokens(sentBefore) {
        let count = 0;
        for (const user of state.users.values()) {
          if (user.resetToken !== null && user.resetTokenSentAt !== null && user.resetTokenSentAt < sentBefore) {
            user.resetToken = null;
            user.resetTokenSentAt = null;
            count += 1;
          }
        }
        return count;
      },
    },

    notifications: {
      async insert(notification) {
        state.notifications.set(notification.id, structuredClone(notification));
      },
      async findById(id) {
        const notification = state.notifications.get(id);
        return notification ? structuredClone(notification) : null;
      },
      async listPending(limit) {
        return [...state.notifications.values()]
          .filter((n) => n.status === 'pending')
          .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
          .slice(0, limit)
          .map((n) => structuredClone(n));
      },
      async listRetryDue(at, limit) {
        return [...state.notifications.values()]
          .filter((n) => n.status === 'failed' && n.nextRetryAt !== null && n.nextRetryAt <= at)
          .sort((a, b) => (a.nextRetryAt ?? '').localeCompare(b.nextRetryAt ?? ''))
          .slice(0, limit)
          .map((n) => structuredClone(n));
      },
      async markSent(id, at) {
        const notification = state.notifications.get(id);
        if (notification) {
          notification.status = 'sent';
          notification.sentAt = at;
          notification.nextRetryAt = null;
          notification.lastError = null;
        }
      },
      async markFailed(id, attempts, nextRetryAt, error) {
        const notification = state.notifications.get(id);
        if (notification) {
          notification.status = 'failed';
          notification.attempts = attempts;
          notification.nextRetryAt = nextRetryAt;
          notification.lastError = error;
        }
      },
      async deleteSentBefore(cutoff) {
        let count = 0;
        for (const [id, notification] of state.notifications) {
          if (notification.status === 'sent' && notification.createdAt < cutoff) {
            state.notifications.delete(id);
            count += 1;
          }
        }
        return count;
      },
    },
  };
}

export class MemoryStore implements Store {
  private state: MemoryState = emptyState();
  private tail: Promise<void> = Promise.resolve();
  private available = true;

  async transaction<T>(
    ctx: RequestContext,
    fn: (tx: Repositories) => Promise<T>,
    _options: TransactionOptions = {}
  ): Promise<T> {
    const release = await this.acquire();
    try {
      this.assertUsable(ctx);
      const draft = structuredClone(this.state);
      const result = await fn(bindRepositories(draft));
      this.assertUsable(ctx);
      this.state = draft;
      return result;
    } finally {
      release();
    }
  }

  async ping(ctx: RequestContext, _timeoutMs: number): Promise<void> {
    this.assertUsable(ctx);
  }

  async close(): Promise<void> {
    this.available = false;
  }

  /** Simulate a database outage (health checks, dependency errors). */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** Direct mutable access for seeding fixtures outside a transaction. */
  seed(mutate: (state: MemoryState) => void): void {
    mutate(this.state);
  }

  /** Deep copy of the committed state for assertions. */
  snapshot(): MemoryState {
    return structuredClone(this.state);
  }

  private assertUsable(ctx: RequestContext): void {
    if (!this.available) {
      throw new DependencyError('database_unavailable', 'Database is unavailable');
    }
    if (ctx.signal.aborted) {
      throw new TimeoutError('database_timeout', 'Transaction aborted: deadline exceeded');
    }
  }

  private async acquire(): Promise<() => void> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    await previous;
    return release;
  }
}
