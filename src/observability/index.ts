/**
 * Observability Module
 *
 * Usage:
 * ```typescript
 * import { getMetrics, getTracer, METRIC_NAMES } from './observability/index.js';
 *
 * getMetrics().increment(METRIC_NAMES.ORDERS_CREATED, 1, { method: 'vnpay' });
 *
 * await getTracer().trace('checkout', async (span) => {
 *   span.tags['order.items'] = 3;
 * });
 * ```
 */

export {
  getMetrics,
  DataDogMetrics,
  METRIC_NAMES,
  type MetricTags,
  type MetricPoint,
} from './metrics.js';

export {
  getTracer,
  DataDogTracer,
  type Span,
  type SpanContext,
  type SpanTags,
  type TraceAttribute,
} from './tracing.js';

export { reportInvariantViolation } from './invariants.js';
