import { Hono } from 'hono';
import { z } from 'zod';
import type { CartService } from '../../services/cart-service.js';
import type { OrderService } from '../../services/order-service.js';
import { requireRole } from '../middleware/auth.js';
import { readJson } from '../validation.js';
import type { ApiEnv } from '../env.js';

const addItemSchema = z.object({
  bookId: z.string().min(1),
  quantity: z.number().int().positive(),
});

const promotionSchema = z.object({
  code: z.string().trim().min(1).max(64),
});

const checkoutSchema = z.object({
  paymentMethod: z.enum(['vnpay', 'momo', 'cod']),
  address: z.object({
    recipientName: z.string().trim().min(1),
    phone: z.string().trim().min(6).max(20),
    line1: z.string().trim().min(1),
    city: z.string().trim().min(1),
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
  }),
});

export function cartRoutes(deps: { carts: CartService; orders: OrderService }): Hono<ApiEnv> {
  const router = new Hono<ApiEnv>();
  const customer = requireRole('user', 'admin');

  router.get('/cart', customer, async (c) => {
    const cart = await deps.carts.getCart(c.get('ctx'));
    return c.json({ cart });
  });

  router.post('/cart/items', customer, async (c) => {
    const body = await readJson(c, addItemSchema);
    const cart = await deps.carts.addItem(c.get('ctx'), body);
    return c.json({ cart });
  });

  router.post('/cart/promotion', customer, async (c) => {
    const { code } = await readJson(c, promotionSchema);
    const cart = await deps.carts.applyPromotion(c.get('ctx'), code);
    return c.json({ cart });
  });

  router.post('/cart/checkout', customer, async (c) => {
    const body = await readJson(c, checkoutSchema);
    const result = await deps.orders.checkout(c.get('ctx'), body);
    return c.json(result, 201);
  });

  return router;
}
