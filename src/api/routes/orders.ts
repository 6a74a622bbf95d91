import { Hono } from 'hono';
import { z } from 'zod';
import type { OrderService } from '../../services/order-service.js';
import type { PaymentService } from '../../services/payment-service.js';
import { requireRole } from '../middleware/auth.js';
import { readJson } from '../validation.js';
import type { ApiEnv } from '../env.js';

const cancelSchema = z.object({
  reason: z.string().trim().min(1).max(255).optional(),
});

const refundSchema = z.object({
  reason: z.string().trim().min(1).max(255),
});

const createPaymentSchema = z.object({
  orderId: z.string().min(1),
  paymentMethod: z.enum(['vnpay', 'momo', 'cod']),
});

export function orderRoutes(deps: { orders: OrderService; payments: PaymentService }): Hono<ApiEnv> {
  const router = new Hono<ApiEnv>();
  const customer = requireRole('user', 'admin');

  router.get('/orders/:id', customer, async (c) => {
    const details = await deps.orders.getOrder(c.get('ctx'), c.req.param('id'));
    return c.json(details);
  });

  router.post('/orders/:id/cancel', customer, async (c) => {
    const { reason } = await readJson(c, cancelSchema);
    const order = await deps.orders.cancel(c.get('ctx'), c.req.param('id'), reason);
    return c.json({ order });
  });

  router.post('/orders/:id/refund', customer, async (c) => {
    const { reason } = await readJson(c, refundSchema);
    const refund = await deps.payments.requestRefund(c.get('ctx'), c.req.param('id'), reason);
    return c.json({ refund }, 201);
  });

  router.post('/payments/create', customer, async (c) => {
    const { orderId, paymentMethod } = await readJson(c, createPaymentSchema);
    const payment = await deps.payments.createPayment(c.get('ctx'), orderId, paymentMethod);
    return c.json({ payment }, 201);
  });

  return router;
}
