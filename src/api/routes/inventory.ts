import { Hono } from 'hono';
import { z } from 'zod';
import { NotEligibleError } from '../../utils/errors.js';
import type { ReservationEngine } from '../../services/reservation-engine.js';
import type { StockCache } from '../../services/stock-cache.js';
import type { TaskPublisher } from '../../services/task-publisher.js';
import { requireRole } from '../middleware/auth.js';
import { readJson, readQuery } from '../validation.js';
import type { ApiEnv } from '../env.js';

const reserveSchema = z.object({
  orderId: z.string().min(1),
  warehouseId: z.string().min(1),
  bookId: z.string().min(1),
  quantity: z.number().int().positive(),
});

const orderSchema = z.object({ orderId: z.string().min(1) });

const adjustSchema = z.object({
  warehouseId: z.string().min(1),
  bookId: z.string().min(1),
  delta: z.number().int(),
  reason: z.string().trim().min(1).max(255),
});

const nearestSchema = z.object({
  bookId: z.string().min(1),
  latitude: z.coerce.number(),
  longitude: z.coerce.number(),
  quantity: z.coerce.number().int().positive().default(1),
});

export interface InventoryRouteDependencies {
  reservations: ReservationEngine;
  stock: StockCache;
  publisher: TaskPublisher;
  reservationTtlMs: number;
}

/** Direct reservation-engine access for internal services, plus public stock lookups. */
export function inventoryRoutes(deps: InventoryRouteDependencies): Hono<ApiEnv> {
  const router = new Hono<ApiEnv>();
  const service = requireRole('service');

  router.post('/inventories/reserve', service, async (c) => {
    const body = await readJson(c, reserveSchema);
    const ctx = c.get('ctx');
    const reservation = await deps.reservations.reserve(ctx, { ...body, ttlMs: deps.reservationTtlMs });
    await deps.publisher.stockChanged(ctx, [body.bookId]);
    return c.json({ reservation }, 201);
  });

  router.post('/inventories/release', service, async (c) => {
    const { orderId } = await readJson(c, orderSchema);
    const ctx = c.get('ctx');
    const released = await deps.reservations.release(ctx, orderId);
    await deps.publisher.stockChanged(ctx, released.map((r) => r.bookId));
    return c.json({ released });
  });

  router.post('/inventories/complete-sale', service, async (c) => {
    const { orderId } = await readJson(c, orderSchema);
    const ctx = c.get('ctx');
    const sold = await deps.reservations.completeSale(ctx, orderId);
    await deps.publisher.stockChanged(ctx, sold.map((r) => r.bookId));
    return c.json({ sold });
  });

  router.post('/inventories/adjust', service, async (c) => {
    const body = await readJson(c, adjustSchema);
    const ctx = c.get('ctx');
    const inventory = await deps.reservations.adjustStock(ctx, body);
    await deps.publisher.stockChanged(ctx, [body.bookId]);
    return c.json({ inventory });
  });

  router.get('/warehouses/nearest-with-stock', async (c) => {
    const query = readQuery(c, nearestSchema);
    const nearest = await deps.reservations.findNearestWithStock(
      c.get('ctx'),
      query.bookId,
      query.latitude,
      query.longitude,
      query.quantity
    );
    if (!nearest) {
      throw new NotEligibleError('out_of_stock', 'No warehouse holds the requested quantity', {
        bookId: query.bookId,
        quantity: query.quantity,
      });
    }
    return c.json(nearest);
  });

  router.get('/books/:id/availability', async (c) => {
    const summary = await deps.stock.get(c.get('ctx'), c.req.param('id'));
    return c.json(summary);
  });

  return router;
}
