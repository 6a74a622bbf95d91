/**
 * Composition root
 *
 * Wires the services from configuration. Production infrastructure is
 * PostgreSQL, DynamoDB (keyspace) and SQS; tests and the demo hand in the
 * in-memory adapters through `overrides`.
 */

import type { Hono } from 'hono';
import type { AppConfig } from './config/index.js';
import { createApp } from './api/app.js';
import type { ApiEnv } from './api/env.js';
import { PgStore } from './store/pg-store.js';
import type { Store } from './store/types.js';
import { DynamoKeyValueStore } from './keyspace/dynamo-keyspace.js';
import type { KeyValueStore } from './keyspace/types.js';
import { SqsTransport, getSQSClient } from './queues/sqs-client.js';
import type { MessageTransport } from './queues/transport.js';
import { JobClient } from './queues/job-client.js';
import { Scheduler, defaultSchedule } from './queues/scheduler.js';
import { VnpayGateway } from './gateways/vnpay.js';
import { MomoGateway } from './gateways/momo.js';
import type { PaymentGateway } from './gateways/types.js';
import type { Gateway } from './types/index.js';
import { ReservationEngine } from './services/reservation-engine.js';
import { TaskPublisher } from './services/task-publisher.js';
import { LoggingEmailSender, NotificationService, type EmailSender } from './services/notification-service.js';
import { CartService } from './services/cart-service.js';
import { PaymentService } from './services/payment-service.js';
import { OrderService } from './services/order-service.js';
import { StockCache } from './services/stock-cache.js';
import { DeadLetterInspector } from './services/dlq-inspector.js';
import { TaskMux } from './worker/mux.js';
import { registerHandlers } from './worker/handlers.js';
import { Worker } from './worker/worker.js';

export interface Infrastructure {
  store: Store;
  ks: KeyValueStore;
  transport: MessageTransport;
  gateways: ReadonlyMap<Gateway, PaymentGateway>;
  email: EmailSender;
  clock: () => number;
}

export interface Container {
  config: AppConfig;
  store: Store;
  ks: KeyValueStore;
  transport: MessageTransport;
  jobs: JobClient;
  reservations: ReservationEngine;
  publisher: TaskPublisher;
  notifications: NotificationService;
  carts: CartService;
  payments: PaymentService;
  orders: OrderService;
  stock: StockCache;
  deadLetters: DeadLetterInspector;
  mux: TaskMux;
  worker: Worker;
  scheduler: Scheduler;
  app: Hono<ApiEnv>;
  close(): Promise<void>;
}

export function createGateways(config: AppConfig): ReadonlyMap<Gateway, PaymentGateway> {
  return new Map<Gateway, PaymentGateway>([
    ['vnpay', new VnpayGateway({ ...config.vnpay, timeoutMs: config.timeouts.gatewayMs })],
    ['momo', new MomoGateway({ ...config.momo, timeoutMs: config.timeouts.gatewayMs })],
  ]);
}

function productionInfrastructure(config: AppConfig, overrides: Partial<Infrastructure>): Infrastructure {
  const endpoint = config.aws.useLocalstack ? config.aws.localstackEndpoint : undefined;
  return {
    store:
      overrides.store ??
      new PgStore({
        connectionString: config.database.url,
        poolMax: config.database.poolMax,
        queryTimeoutMs: config.database.queryTimeoutMs,
      }),
    ks:
      overrides.ks ??
      new DynamoKeyValueStore({
        tableName: config.aws.keyspaceTable,
        region: config.aws.region,
        endpoint,
        timeoutMs: config.timeouts.keyspaceMs,
      }),
    transport: overrides.transport ?? new SqsTransport(getSQSClient(config.aws)),
    gateways: overrides.gateways ?? createGateways(config),
    email: overrides.email ?? new LoggingEmailSender(),
    clock: overrides.clock ?? Date.now,
  };
}

export function createContainer(config: AppConfig, overrides: Partial<Infrastructure> = {}): Container {
  const { store, ks, transport, gateways, email, clock } = productionInfrastructure(config, overrides);
  const prefix = config.aws.queuePrefix;
  const ttl = config.checkout.reservationTtlMs;

  const jobs = new JobClient(transport, ks, { prefix, clock });
  const reservations = new ReservationEngine(store, { clock });
  const publisher = new TaskPublisher(jobs, { reservationTtlMs: ttl });
  const notifications = new NotificationService(store, email, {
    smtpTimeoutMs: config.timeouts.smtpMs,
    userRateCap: config.jobs.notificationUserRateCap,
    reservationTtlMs: ttl,
    clock,
  });
  const carts = new CartService(store, notifications, { clock });
  const payments = new PaymentService(store, reservations, gateways, publisher, {
    maxAttempts: config.checkout.maxPaymentAttempts,
    clock,
  });
  const orders = new OrderService(store, reservations, payments, publisher, {
    reservationTtlMs: ttl,
    shippingFee: config.checkout.shippingFee,
    codFee: config.checkout.codFee,
    priceTolerance: config.checkout.priceTolerance,
    clock,
  });
  const stock = new StockCache(reservations, ks, { ttlSeconds: config.cache.bookTtlSeconds, clock });
  const deadLetters = new DeadLetterInspector(transport, jobs, prefix);

  const mux = registerHandlers(new TaskMux(), {
    store,
    jobs,
    orders,
    payments,
    carts,
    notifications,
    stock,
    limits: {
      releaseExpiredReservations: config.jobs.releaseExpiredReservationsLimit,
      removeExpiredPromotions: config.jobs.removeExpiredPromotionsLimit,
      sendPending: config.jobs.sendPendingLimit,
      retryFailed: config.jobs.retryFailedLimit,
      notificationRetentionDays: config.jobs.notificationRetentionDays,
    },
    clock,
  });
  const worker = new Worker(transport, jobs, mux, {
    prefix,
    concurrency: config.worker.concurrency,
    shutdownGraceMs: config.worker.shutdownGraceMs,
    clock,
  });
  const scheduler = new Scheduler(jobs, ks, defaultSchedule(config.jobs), { clock });

  const app = createApp({
    config,
    store,
    ks,
    carts,
    orders,
    payments,
    reservations,
    stock,
    publisher,
    deadLetters,
  });

  return {
    config,
    store,
    ks,
    transport,
    jobs,
    reservations,
    publisher,
    notifications,
    carts,
    payments,
    orders,
    stock,
    deadLetters,
    mux,
    worker,
    scheduler,
    app,
    async close() {
      scheduler.stop();
      await worker.stop();
      await store.close();
    },
  };
}
