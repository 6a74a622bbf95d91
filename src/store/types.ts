/**
 * Persistence contracts
 *
 * Services never talk to a driver. They open a unit of work through
 * `Store.transaction` and use the repositories bound to it; everything done
 * through one `Repositories` instance commits or rolls back together.
 *
 * Stock mutations are expressed as guarded single-statement updates that
 * report whether they applied (the affected-row count), never as
 * read-modify-write in application code.
 */

import type {
  AuditEntry,
  Book,
  Cart,
  CartItem,
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
  PromotionUsage,
  Refund,
  Reservation,
  StockRow,
  User,
  WarehouseInventory,
  WebhookLog,
} from '../types/index.js';
import type { RequestContext } from '../utils/context.js';

export type IsolationLevel = 'read committed' | 'repeatable read' | 'serializable';

export interface TransactionOptions {
  isolation?: IsolationLevel;
  /** Total attempts on serialization failure or deadlock. */
  maxAttempts?: number;
}

export interface Store {
  transaction<T>(
    ctx: RequestContext,
    fn: (tx: Repositories) => Promise<T>,
    options?: TransactionOptions
  ): Promise<T>;
  ping(ctx: RequestContext, timeoutMs: number): Promise<void>;
  close(): Promise<void>;
}

export interface Repositories {
  books: BookRepository;
  inventory: InventoryRepository;
  reservations: ReservationRepository;
  carts: CartRepository;
  promotions: PromotionRepository;
  orders: OrderRepository;
  payments: PaymentRepository;
  refunds: RefundRepository;
  webhooks: WebhookLogRepository;
  audit: AuditLogRepository;
  users: UserRepository;
  notifications: NotificationRepository;
}

export interface BookRepository {
  findByIds(ids: string[]): Promise<Book[]>;
}

export interface InventoryRepository {
  get(warehouseId: string, bookId: string): Promise<StockRow | null>;
  /** Rows for a book across all warehouses, with the warehouse joined. */
  listForBook(bookId: string): Promise<StockRow[]>;
  /** `reserved += qty` where `quantity - reserved >= qty`; false when the guard fails. */
  incrementReserved(warehouseId: string, bookId: string, qty: number): Promise<boolean>;
  /** `reserved -= qty` where `reserved >= qty`. */
  decrementReserved(warehouseId: string, bookId: string, qty: number): Promise<boolean>;
  /** `quantity -= qty, reserved -= qty` where `reserved >= qty`. */
  commitSale(warehouseId: string, bookId: string, qty: number): Promise<boolean>;
  /** Row lock (`SELECT ... FOR UPDATE`) for bulk adjustments. */
  lockForUpdate(warehouseId: string, bookId: string): Promise<WarehouseInventory | null>;
  setQuantity(warehouseId: string, bookId: string, quantity: number): Promise<void>;
  insert(row: Omit<WarehouseInventory, 'updatedAt'>): Promise<void>;
}

export interface ReservationRepository {
  findByOrder(orderId: string): Promise<Reservation[]>;
  exists(orderId: string, warehouseId: string, bookId: string): Promise<boolean>;
  insert(reservation: Reservation): Promise<void>;
  deleteByOrder(orderId: string): Promise<number>;
  /** Pending orders holding a reservation that expired at or before `at`, earliest expiry first. */
  listExpiredPendingOrders(at: string, limit: number): Promise<string[]>;
}

export interface CartRepository {
  findById(cartId: string): Promise<Cart | null>;
  findActiveByUser(userId: string): Promise<Cart | null>;
  create(cart: Cart): Promise<void>;
  upsertItem(cartId: string, item: CartItem): Promise<void>;
  setItemPrice(cartId: string, bookId: string, unitPrice: number): Promise<void>;
  setPromotion(cartId: string, promotionId: string | null): Promise<void>;
  /** Mark converted and clear items. */
  markConverted(cartId: string): Promise<void>;
  /** Active carts with a promotion applied, ordered by cart id. */
  listWithPromotion(offset: number, limit: number): Promise<Cart[]>;
}

export interface PromotionRepository {
  findById(id: string): Promise<Promotion | null>;
  findByCode(code: string): Promise<Promotion | null>;
  countUserUsage(promotionId: string, userId: string): Promise<number>;
  /** `used_count += 1` guarded by `max_uses`; false when exhausted. */
  incrementUsage(promotionId: string): Promise<boolean>;
  recordUsage(usage: PromotionUsage): Promise<void>;
}

export interface OrderRepository {
  nextSequence(): Promise<number>;
  insert(order: Order, items: OrderItem[]): Promise<void>;
  findById(orderId: string): Promise<Order | null>;
  findItems(orderId: string): Promise<OrderItem[]>;
  /**
   * Compare-and-swap on `version`. Returns the updated order, or null when
   * the stored version no longer matches.
   */
  updateStatus(orderId: string, expectedVersion: number, status: OrderStatus, at: string): Promise<Order | null>;
  appendHistory(change: OrderStatusChange): Promise<void>;
  listHistory(orderId: string): Promise<OrderStatusChange[]>;
}

export interface PaymentRepository {
  insert(payment: Payment): Promise<void>;
  findById(paymentId: string): Promise<Payment | null>;
  findByTxnRef(txnRef: string): Promise<Payment | null>;
  findOpen(orderId: string, method: PaymentMethod): Promise<Payment | null>;
  /** Most recent captured payment (succeeded or awaiting refund). */
  findSettled(orderId: string): Promise<Payment | null>;
  countByOrder(orderId: string): Promise<number>;
  update(
    paymentId: string,
    changes: {
      status: PaymentStatus;
      gatewayResponseCode?: string | null;
      gatewayTransactionId?: string | null;
      redirectUrl?: string | null;
    },
    at: string
  ): Promise<void>;
}

export interface RefundRepository {
  insert(refund: Refund): Promise<void>;
  findById(refundId: string): Promise<Refund | null>;
  findOpenByPayment(paymentId: string): Promise<Refund | null>;
  update(
    refundId: string,
    changes: { status: Refund['status']; reviewedBy?: string | null; failureReason?: string | null },
    at: string
  ): Promise<void>;
}

export interface WebhookLogRepository {
  insert(log: WebhookLog): Promise<void>;
  findProcessed(gateway: Gateway, txnRef: string): Promise<WebhookLog | null>;
}

export interface AuditLogRepository {
  record(entry: AuditEntry): Promise<void>;
}

export interface UserRepository {
  findById(userId: string): Promise<User | null>;
  /** Null verification tokens sent before the cutoff on unverified users. */
  clearExpiredVerificationTokens(sentBefore: string): Promise<number>;
  /** Null reset tokens sent before the cutoff. */
  clearExpiredResetTokens(sentBefore: string): Promise<number>;
}

export interface NotificationRepository {
  insert(notification: Notification): Promise<void>;
  findById(id: string): Promise<Notification | null>;
  listPending(limit: number): Promise<Notification[]>;
  listRetryDue(now: string, limit: number): Promise<Notification[]>;
  markSent(id: string, at: string): Promise<void>;
  markFailed(id: string, attempts: number, nextRetryAt: string | null, error: string): Promise<void>;
  deleteSentBefore(cutoff: string): Promise<number>;
}
