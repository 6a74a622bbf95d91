import { Hono } from 'hono';
import { z } from 'zod';
import { QUEUES } from '../../queues/task.js';
import type { DeadLetterInspector } from '../../services/dlq-inspector.js';
import type { OrderService } from '../../services/order-service.js';
import type { PaymentService } from '../../services/payment-service.js';
import { requireRole } from '../middleware/auth.js';
import { readJson, readParam, readQuery } from '../validation.js';
import type { ApiEnv } from '../env.js';

const statusSchema = z.object({
  status: z.enum(['shipped', 'delivered']),
  version: z.number().int().positive().optional(),
});

const rejectSchema = z.object({
  reason: z.string().trim().min(1).max(255),
});

const queueSchema = z.enum(QUEUES);
const listSchema = z.object({ max: z.coerce.number().int().min(1).max(10).default(10) });

export function adminRoutes(deps: {
  orders: OrderService;
  payments: PaymentService;
  deadLetters: DeadLetterInspector;
}): Hono<ApiEnv> {
  const router = new Hono<ApiEnv>();
  const admin = requireRole('admin');

  router.post('/admin/orders/:id/status', admin, async (c) => {
    const { status, version } = await readJson(c, statusSchema);
    const order = await deps.orders.adminUpdateStatus(c.get('ctx'), c.req.param('id'), status, version);
    return c.json({ order });
  });

  router.post('/admin/orders/:id/cod-collected', admin, async (c) => {
    const order = await deps.payments.confirmCodCollected(c.get('ctx'), c.req.param('id'));
    return c.json({ order });
  });

  router.post('/admin/refunds/:id/approve', admin, async (c) => {
    const refund = await deps.payments.approveRefund(c.get('ctx'), c.req.param('id'));
    return c.json({ refund });
  });

  router.post('/admin/refunds/:id/reject', admin, async (c) => {
    const { reason } = await readJson(c, rejectSchema);
    const refund = await deps.payments.rejectRefund(c.get('ctx'), c.req.param('id'), reason);
    return c.json({ refund });
  });

  // Dead-letter queues
  router.get('/admin/dead-letters', admin, async (c) => {
    return c.json(await deps.deadLetters.summary());
  });

  router.get('/admin/dead-letters/:queue', admin, async (c) => {
    const queue = readParam(c.req.param('queue'), queueSchema);
    const { max } = readQuery(c, listSchema);
    return c.json({ tasks: await deps.deadLetters.list(queue, max) });
  });

  router.post('/admin/dead-letters/:queue/:messageId/replay', admin, async (c) => {
    const queue = readParam(c.req.param('queue'), queueSchema);
    const task = await deps.deadLetters.replay(queue, c.req.param('messageId'));
    return c.json({ task });
  });

  router.delete('/admin/dead-letters/:queue', admin, async (c) => {
    const queue = readParam(c.req.param('queue'), queueSchema);
    await deps.deadLetters.purge(queue);
    return c.body(null, 204);
  });

  return router;
}
