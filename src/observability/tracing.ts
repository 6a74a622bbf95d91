/**
 * DataDog APM Tracing
 *
 * Spans for worker tasks and checkout/payment operations. Trace context
 * crosses the queue boundary inside SQS message attributes, so a task's span
 * hangs off the request span that enqueued it.
 *
 * For queue-based flows:
 * - The enqueuing request id becomes the trace id when no span is active
 * - Each task handler runs in its own span
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger.js';

export interface SpanContext {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  samplingPriority: number;
}

export interface SpanTags {
  [key: string]: string | number | boolean | undefined;
}

export interface Span {
  context: SpanContext;
  operationName: string;
  serviceName: string;
  resourceName: string;
  startTime: number;
  endTime?: number;
  duration?: number;
  tags: SpanTags;
  error?: boolean;
  errorMessage?: string;
}

/** Attribute shape shared by SQS send and receive. */
export interface TraceAttribute {
  DataType?: string;
  StringValue?: string;
}

const logger = createLogger('Tracer');

const MAX_COMPLETED_SPANS = 1000;

const shortId = (): string => uuidv4().replace(/-/g, '').substring(0, 16);

class DataDogTracer {
  private readonly serviceName: string;
  private readonly env: string;
  private readonly version: string;
  private readonly completedSpans: Span[] = [];

  constructor(
    options: {
      serviceName?: string;
      env?: string;
      version?: string;
    } = {},
  ) {
    this.serviceName = options.serviceName || process.env.DD_SERVICE || 'bookstore';
    this.env = options.env || process.env.DD_ENV || 'development';
    this.version = options.version || process.env.DD_VERSION || '1.0.0';
  }

  startSpan(
    operationName: string,
    options: {
      resourceName?: string;
      parentContext?: SpanContext;
      tags?: SpanTags;
    } = {},
  ): Span {
    const span: Span = {
      context: {
        traceId: options.parentContext?.traceId || shortId(),
        spanId: shortId(),
        parentSpanId: options.parentContext?.spanId,
        samplingPriority: 1,
      },
      operationName,
      serviceName: this.serviceName,
      resourceName: options.resourceName || operationName,
      startTime: Date.now(),
      tags: {
        env: this.env,
        version: this.version,
        ...options.tags,
      },
    };

    logger.debug('Span started', { operation: operationName, traceId: span.context.traceId });
    return span;
  }

  finishSpan(span: Span, error?: unknown): void {
    span.endTime = Date.now();
    span.duration = span.endTime - span.startTime;

    if (error !== undefined) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.error = true;
      span.errorMessage = err.message;
      span.tags['error.type'] = err.name;
      span.tags['error.message'] = err.message;
    }

    this.completedSpans.push(span);
    if (this.completedSpans.length > MAX_COMPLETED_SPANS) {
      this.completedSpans.shift();
    }

    logger.debug('Span finished', {
      operation: span.operationName,
      durationMs: span.duration,
      error: span.error ?? false,
    });
  }

  /**
   * Wrap an async function with a span.
   */
  async trace<T>(
    operationName: string,
    fn: (span: Span) => Promise<T>,
    options: {
      resourceName?: string;
      parentContext?: SpanContext;
      tags?: SpanTags;
    } = {},
  ): Promise<T> {
    const span = this.startSpan(operationName, options);
    try {
      const result = await fn(span);
      this.finishSpan(span);
      return result;
    } catch (error) {
      this.finishSpan(span, error);
      throw error;
    }
  }

  /**
   * Extract trace context from SQS message attributes, falling back to the
   * correlation id so tasks still group under the originating request.
   */
  extractFromAttributes(attributes: Record<string, TraceAttribute | undefined>): SpanContext | undefined {
    const traceId = attributes['dd-trace-id']?.StringValue;
    const spanId = attributes['dd-span-id']?.StringValue;
    if (traceId && spanId) {
      return { traceId, spanId, samplingPriority: 1 };
    }

    const correlationId = attributes['CorrelationId']?.StringValue;
    if (correlationId) {
      return {
        traceId: correlationId.replace(/-/g, '').substring(0, 16),
        spanId: shortId(),
        samplingPriority: 1,
      };
    }
    return undefined;
  }

  injectToAttributes(
    context: SpanContext,
    attributes: Record<string, { DataType: string; StringValue: string }> = {},
  ): Record<string, { DataType: string; StringValue: string }> {
    return {
      ...attributes,
      'dd-trace-id': { DataType: 'String', StringValue: context.traceId },
      'dd-span-id': { DataType: 'String', StringValue: context.spanId },
    };
  }

  /** Most recent finished spans, oldest first. */
  getCompletedSpans(): Span[] {
    return [...this.completedSpans];
  }
}

let tracerInstance: DataDogTracer | null = null;

export function getTracer(options?: ConstructorParameters<typeof DataDogTracer>[0]): DataDogTracer {
  if (!tracerInstance) {
    tracerInstance = new DataDogTracer(options);
  }
  return tracerInstance;
}

export { DataDogTracer };
