/**
 * Bookstore Domain Types
 *
 * Records as the core sees them, independent of storage:
 * - Catalog and stock (books, warehouses, per-warehouse inventory)
 * - Carts, orders and their status history
 * - Payments, refunds and gateway callbacks
 * - Promotions, users and outbound notifications
 *
 * Money fields are integer minor units (see utils/money.ts).
 */

import type { Money } from '../utils/money.js';

// Catalog & stock
export interface Book {
  id: string;
  title: string;
  price: Money;
  active: boolean;
}

export interface Warehouse {
  id: string;
  code: string;
  name: string;
  active: boolean;
  latitude: number | null;
  longitude: number | null;
}

export interface WarehouseInventory {
  warehouseId: string;
  bookId: string;
  quantity: number;
  reserved: number;
  updatedAt: string;
}

/** Inventory row joined with its warehouse, as stock queries return it. */
export interface StockRow extends WarehouseInventory {
  warehouse: Warehouse;
}

export interface Reservation {
  orderId: string;
  warehouseId: string;
  bookId: string;
  quantity: number;
  expiresAt: string;
  createdAt: string;
}

// Carts
export type CartStatus = 'active' | 'converted' | 'abandoned';

export interface CartItem {
  bookId: string;
  quantity: number;
  unitPriceSnapshot: Money;
}

export interface Cart {
  id: string;
  userId: string | null;
  sessionId: string | null;
  status: CartStatus;
  appliedPromotionId: string | null;
  items: CartItem[];
  updatedAt: string;
}

// Promotions
export type DiscountRule =
  | { type: 'percentage'; percent: number; maxDiscount: Money | null }
  | { type: 'fixed'; amount: Money }
  | { type: 'free_shipping' };

export interface Promotion {
  id: string;
  code: string;
  rule: DiscountRule;
  active: boolean;
  startsAt: string;
  endsAt: string;
  minOrderAmount: Money;
  maxUses: number | null;
  maxUsesPerUser: number | null;
  usedCount: number;
}

export interface PromotionUsage {
  promotionId: string;
  userId: string;
  orderId: string;
  discount: Money;
  createdAt: string;
}

// Orders
export type OrderStatus =
  | 'pending'
  | 'confirmed'
  | 'paid'
  | 'cancelled'
  | 'shipped'
  | 'delivered'
  | 'refunded';

export interface ShippingAddress {
  recipientName: string;
  phone: string;
  line1: string;
  city: string;
  latitude: number;
  longitude: number;
}

export type PaymentMethod = 'vnpay' | 'momo' | 'cod';

export interface Order {
  id: string;
  orderNumber: string;
  userId: string;
  status: OrderStatus;
  paymentMethod: PaymentMethod;
  subtotal: Money;
  discount: Money;
  shippingFee: Money;
  codFee: Money;
  total: Money;
  promotionId: string | null;
  address: ShippingAddress;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface OrderItem {
  orderId: string;
  bookId: string;
  quantity: number;
  unitPrice: Money;
  warehouseId: string;
}

export interface OrderStatusChange {
  orderId: string;
  fromStatus: OrderStatus | null;
  toStatus: OrderStatus;
  actor: string;
  reason: string | null;
  createdAt: string;
}

// Payments
export type PaymentStatus =
  | 'initiated'
  | 'pending'
  | 'succeeded'
  | 'failed'
  | 'refund_requested'
  | 'refunded';

export interface Payment {
  id: string;
  orderId: string;
  method: PaymentMethod;
  amount: Money;
  status: PaymentStatus;
  gatewayTxnRef: string;
  idempotencyKey: string;
  redirectUrl: string | null;
  gatewayResponseCode: string | null;
  gatewayTransactionId: string | null;
  createdAt: string;
  updatedAt: string;
}

export type RefundStatus = 'requested' | 'approved' | 'rejected' | 'succeeded' | 'failed';

export interface Refund {
  id: string;
  paymentId: string;
  orderId: string;
  amount: Money;
  reason: string;
  status: RefundStatus;
  requestedBy: string;
  reviewedBy: string | null;
  failureReason: string | null;
  createdAt: string;
  updatedAt: string;
}

export type Gateway = 'vnpay' | 'momo';

export type CallbackOutcome =
  | 'succeeded'
  | 'failed'
  | 'invalid_signature'
  | 'payment_not_found'
  | 'amount_mismatch';

export interface WebhookLog {
  id: string;
  gateway: Gateway;
  txnRef: string;
  signatureValid: boolean;
  outcome: CallbackOutcome;
  /** True once the callback drove a terminal payment transition. */
  processed: boolean;
  payload: Record<string, string>;
  response: Record<string, unknown>;
  createdAt: string;
}

export interface AuditEntry {
  actor: string;
  action: string;
  entity: string;
  entityId: string;
  data: Record<string, unknown>;
  createdAt: string;
}

// Users & notifications (external collaborators' tables the jobs touch)
export interface User {
  id: string;
  email: string;
  fullName: string;
  isVerified: boolean;
  verificationToken: string | null;
  verificationTokenSentAt: string | null;
  resetToken: string | null;
  resetTokenSentAt: string | null;
}

export type NotificationStatus = 'pending' | 'sent' | 'failed';

export interface Notification {
  id: string;
  userId: string;
  template: string;
  data: Record<string, unknown>;
  status: NotificationStatus;
  attempts: number;
  nextRetryAt: string | null;
  lastError: string | null;
  createdAt: string;
  sentAt: string | null;
}
