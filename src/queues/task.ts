/**
 * Task envelope and queue catalogue
 *
 * Every background job travels as a JSON envelope on the SQS queue of its
 * priority class. Task type strings and queue names are part of the
 * deployment surface and must not be renamed.
 */

import { z } from 'zod';
import type { SpanContext } from '../observability/index.js';

export const QUEUES = ['high', 'default', 'low', 'notification', 'auth', 'promotion'] as const;

export type QueueName = (typeof QUEUES)[number];

/** Weighted round-robin shares used by the worker. */
export const QUEUE_WEIGHTS: Readonly<Record<QueueName, number>> = {
  high: 20,
  default: 10,
  low: 5,
  notification: 17,
  auth: 5,
  promotion: 5,
};

export const TASK_TYPES = {
  AUTO_RELEASE_RESERVATION: 'cart:auto_release_reservation',
  RELEASE_EXPIRED_RESERVATIONS: 'cart:release_expired_reservations',
  REMOVE_EXPIRED_PROMOTIONS: 'cart:remove_expired_promotions',
  TRACK_CHECKOUT: 'cart:track_checkout',
  SEND_ORDER_CONFIRMATION: 'order:send_order_confirmation',
  SYNC_BOOK_STOCK: 'inventory:sync_book_stock',
  EXECUTE_REFUND: 'payment:execute_refund',
  CLEANUP_EXPIRED_TOKENS: 'auth:cleanup_expired_tokens',
  EMAIL_VERIFICATION: 'email:verification',
  NOTIFICATION_SEND_PENDING: 'notification:send_pending',
  NOTIFICATION_RETRY_FAILED: 'notification:retry_failed',
  NOTIFICATION_CLEANUP_OLD: 'notification:cleanup_old',
} as const;

export type TaskType = (typeof TASK_TYPES)[keyof typeof TASK_TYPES];

export const DEFAULT_MAX_RETRY = 3;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const RETRY_BASE_MS = 60_000;

/** SQS caps per-message delay at 15 minutes. */
export const MAX_DELAY_SECONDS = 900;

/** SQS caps a visibility extension at 12 hours. */
export const MAX_VISIBILITY_SECONDS = 43_200;

export const taskEnvelopeSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  payload: z.unknown(),
  queue: z.enum(QUEUES),
  retried: z.number().int().nonnegative(),
  maxRetry: z.number().int().nonnegative(),
  timeoutMs: z.number().int().positive(),
  notBefore: z.string().datetime().nullable(),
  dedupKey: z.string().nullable(),
  enqueuedAt: z.string().datetime(),
  lastError: z.string().nullable(),
  correlationId: z.string(),
});

export type TaskEnvelope = z.infer<typeof taskEnvelopeSchema>;

export interface EnqueueOptions {
  queue?: QueueName;
  maxRetry?: number;
  timeoutMs?: number;
  notBefore?: Date;
  /** At most one pending task per (type, dedupKey). */
  dedupKey?: string;
  correlationId?: string;
  /** Parent span, carried to the worker in message attributes. */
  traceContext?: SpanContext;
}

export interface TaskInfo {
  id: string;
  type: string;
  queue: QueueName;
  notBefore: string | null;
}

/** Backoff before retry number `attempt` (1-based): 1, 2, 4, 8... minutes. */
export function retryDelayMs(attempt: number): number {
  return RETRY_BASE_MS * 2 ** (Math.max(attempt, 1) - 1);
}

export function physicalQueueName(prefix: string, queue: QueueName): string {
  return `${prefix}-${queue}`;
}

export function deadLetterQueueName(prefix: string, queue: QueueName): string {
  return `${prefix}-${queue}-dlq`;
}

export function isQueueName(value: string): value is QueueName {
  return QUEUES.some((queue) => queue === value);
}
