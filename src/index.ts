/**
 * Bookstore Core - Main Exports
 *
 * Order fulfilment, inventory reservations and the background job queue,
 * plus the HTTP adapter and composition root that wire them together.
 */

// Types
export * from './types/index.js';

// Configuration & composition
export { loadConfig, ConfigError, type AppConfig } from './config/index.js';
export { createContainer, createGateways, type Container, type Infrastructure } from './container.js';
export { createApp, type ApiDependencies } from './api/app.js';

// Persistence
export type { Store, Repositories, TransactionOptions, IsolationLevel } from './store/types.js';
export { PgStore } from './store/pg-store.js';
export { MemoryStore } from './store/memory-store.js';
export { KEYS, type KeyValueStore } from './keyspace/types.js';
export { DynamoKeyValueStore } from './keyspace/dynamo-keyspace.js';
export { MemoryKeyValueStore } from './keyspace/memory-keyspace.js';

// Job queue
export * from './queues/task.js';
export { JobClient } from './queues/job-client.js';
export { Scheduler, defaultSchedule, type ScheduleEntry } from './queues/scheduler.js';
export { parseCronExpression, getNextRunTime, cronMatches } from './queues/cron.js';
export { SqsTransport, getSQSClient } from './queues/sqs-client.js';
export { initializeQueues, destroyQueues } from './queues/queue-manager.js';
export { MemoryTransport } from './queues/memory-transport.js';
export type { MessageTransport } from './queues/transport.js';

// Payment gateways
export type { PaymentGateway, AckStatus } from './gateways/types.js';
export { VnpayGateway, signVnpay, verifyVnpay } from './gateways/vnpay.js';
export { MomoGateway } from './gateways/momo.js';

// Services
export { ReservationEngine } from './services/reservation-engine.js';
export { OrderService, type CheckoutRequest, type CheckoutResult } from './services/order-service.js';
export { PaymentService, type PaymentIntent, type CallbackResponse } from './services/payment-service.js';
export { CartService } from './services/cart-service.js';
export { NotificationService, LoggingEmailSender, type EmailSender } from './services/notification-service.js';
export { StockCache } from './services/stock-cache.js';
export { TaskPublisher } from './services/task-publisher.js';
export { DeadLetterInspector } from './services/dlq-inspector.js';

// Worker
export { TaskMux } from './worker/mux.js';
export { Worker, WeightedRoundRobin } from './worker/worker.js';
export { registerHandlers } from './worker/handlers.js';

// Utilities
export { createLogger, type Logger } from './utils/logger.js';
export * from './utils/errors.js';
export { createContext, systemContext, type RequestContext } from './utils/context.js';
