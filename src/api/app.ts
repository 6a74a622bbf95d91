/**
 * HTTP application
 *
 * Thin adapter over the services. Middleware order matters:
 * request id, then authentication, then the request context (which needs
 * both). Errors from any layer are rendered by `errorHandler`.
 */

import { Hono } from 'hono';
import type { AppConfig } from '../config/index.js';
import type { Store } from '../store/types.js';
import type { KeyValueStore } from '../keyspace/types.js';
import type { CartService } from '../services/cart-service.js';
import type { DeadLetterInspector } from '../services/dlq-inspector.js';
import type { OrderService } from '../services/order-service.js';
import type { PaymentService } from '../services/payment-service.js';
import type { ReservationEngine } from '../services/reservation-engine.js';
import type { StockCache } from '../services/stock-cache.js';
import type { TaskPublisher } from '../services/task-publisher.js';
import { authenticate } from './middleware/auth.js';
import { requestContext } from './middleware/context.js';
import { errorHandler, notFoundHandler } from './middleware/error-handling.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { adminRoutes } from './routes/admin.js';
import { cartRoutes } from './routes/cart.js';
import { healthRoutes } from './routes/health.js';
import { inventoryRoutes } from './routes/inventory.js';
import { orderRoutes } from './routes/orders.js';
import { webhookRoutes } from './routes/webhooks.js';
import type { ApiEnv } from './env.js';

export interface ApiDependencies {
  config: Pick<AppConfig, 'auth' | 'timeouts' | 'database' | 'checkout'>;
  store: Store;
  ks: KeyValueStore;
  carts: CartService;
  orders: OrderService;
  payments: PaymentService;
  reservations: ReservationEngine;
  stock: StockCache;
  publisher: TaskPublisher;
  deadLetters: DeadLetterInspector;
}

export function createApp(deps: ApiDependencies): Hono<ApiEnv> {
  const { config } = deps;
  const app = new Hono<ApiEnv>();

  app.use('*', requestIdMiddleware);
  app.use('*', authenticate(config.auth));
  app.use('*', requestContext({ timeoutMs: config.timeouts.requestMs }));

  app.route(
    '/api/v1',
    healthRoutes({
      store: deps.store,
      ks: deps.ks,
      databaseTimeoutMs: config.database.healthTimeoutMs,
      keyspaceTimeoutMs: config.timeouts.keyspaceMs,
    })
  );
  app.route('/api/v1', cartRoutes(deps));
  app.route('/api/v1', orderRoutes(deps));
  app.route('/api/v1', webhookRoutes(deps));
  app.route(
    '/api/v1',
    inventoryRoutes({
      reservations: deps.reservations,
      stock: deps.stock,
      publisher: deps.publisher,
      reservationTtlMs: config.checkout.reservationTtlMs,
    })
  );
  app.route('/api/v1', adminRoutes(deps));

  app.notFound(notFoundHandler);
  app.onError(errorHandler);
  return app;
}
