import { ConflictError, NotEligibleError, NotFoundError } from '../utils/errors.js';
import type { RequestContext } from '../utils/context.js';
import { getMetrics, METRIC_NAMES } from '../observability/index.js';
import type { Repositories } from '../store/types.js';
import type { Order, OrderStatus } from '../types/index.js';

const TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  pending: ['confirmed', 'paid', 'cancelled'],
  confirmed: ['paid', 'cancelled'],
  paid: ['shipped', 'refunded'],
  shipped: ['delivered'],
  delivered: [],
  cancelled: [],
  refunded: [],
};

export const CANCELLABLE: readonly OrderStatus[] = ['pending', 'confirmed'];

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: OrderStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/** Who a change is attributed to in history and audit rows. */
export function actorOf(ctx: RequestContext): string {
  return ctx.userId ?? ctx.role;
}

/** Customers only ever see their own orders; anyone else's is reported missing. */
export async function findOrderFor(tx: Repositories, ctx: RequestContext, orderId: string): Promise<Order> {
  const order = await tx.orders.findById(orderId);
  if (!order || (ctx.role === 'user' && order.userId !== ctx.userId)) {
    throw new NotFoundError('order', orderId);
  }
  return order;
}

/**
 * Move an order to `to` with a compare-and-swap on its version and append
 * the history row, all inside the caller's transaction.
 */
export async function transitionOrder(
  tx: Repositories,
  order: Order,
  to: OrderStatus,
  change: { actor: string; reason?: string; at: string }
): Promise<Order> {
  if (!canTransition(order.status, to)) {
    throw new NotEligibleError('invalid_transition', `Order cannot move from ${order.status} to ${to}`, {
      orderId: order.id,
      from: order.status,
      to,
    });
  }

  const updated = await tx.orders.updateStatus(order.id, order.version, to, change.at);
  if (!updated) {
    throw new ConflictError('version_conflict', `Order ${order.id} was modified concurrently`, {
      orderId: order.id,
      expectedVersion: order.version,
    });
  }

  await tx.orders.appendHistory({
    orderId: order.id,
    fromStatus: order.status,
    toStatus: to,
    actor: change.actor,
    reason: change.reason ?? null,
    createdAt: change.at,
  });

  getMetrics().increment(METRIC_NAMES.ORDERS_TRANSITIONS, 1, { from: order.status, to });
  return updated;
}
