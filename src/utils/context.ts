/**
 * Request-scoped context
 *
 * Carried explicitly through every service call instead of module globals.
 * The signal fires when the request (or task) deadline passes or the caller
 * goes away; stores and clients bound their own timeouts to it.
 */

import { v4 as uuidv4 } from 'uuid';
import { TimeoutError } from './errors.js';
import type { SpanContext } from '../observability/tracing.js';

export type Role = 'user' | 'admin' | 'service' | 'system';

export interface RequestContext {
  requestId: string;
  userId?: string;
  role: Role;
  clientIp?: string;
  signal: AbortSignal;
  /** Span that tasks enqueued under this context hang off. */
  trace?: SpanContext;
}

export function createContext(options: {
  requestId?: string;
  userId?: string;
  role?: Role;
  clientIp?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  trace?: SpanContext;
}): RequestContext {
  const signals: AbortSignal[] = [];
  if (options.signal) signals.push(options.signal);
  if (options.timeoutMs !== undefined) signals.push(AbortSignal.timeout(options.timeoutMs));

  return {
    requestId: options.requestId ?? uuidv4(),
    userId: options.userId,
    role: options.role ?? 'system',
    clientIp: options.clientIp,
    signal: signals.length === 0 ? new AbortController().signal : AbortSignal.any(signals),
    trace: options.trace,
  };
}

/** Context for work that is not tied to an inbound request. */
export function systemContext(timeoutMs?: number, signal?: AbortSignal): RequestContext {
  return createContext({ role: 'system', timeoutMs, signal });
}

/**
 * Run `fn` bounded by both the context deadline and a per-operation timeout.
 * The combined signal is handed to `fn` so drivers can cancel in flight.
 */
export async function withTimeout<T>(
  ctx: RequestContext,
  timeoutMs: number,
  code: string,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const signal = AbortSignal.any([ctx.signal, AbortSignal.timeout(timeoutMs)]);
  if (signal.aborted) {
    throw new TimeoutError(code, `${code}: deadline exceeded before start`);
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new TimeoutError(code, `${code}: exceeded ${timeoutMs}ms`, { cause: signal.reason }));
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([fn(signal), aborted]);
  } finally {
    if (onAbort) signal.removeEventListener('abort', onAbort);
  }
}

export function throwIfExpired(ctx: RequestContext, code = 'deadline_exceeded'): void {
  if (ctx.signal.aborted) {
    throw new TimeoutError(code, 'Request deadline exceeded', { cause: ctx.signal.reason });
  }
}
