import { createLogger } from '../utils/logger.js';
import { getMetrics, METRIC_NAMES } from './metrics.js';

const logger = createLogger('Invariants');

/**
 * Log and count a broken stock or payment invariant. Alerting keys off the
 * `code` field; nothing here attempts recovery.
 */
export function reportInvariantViolation(code: string, message: string, context: Record<string, unknown> = {}): void {
  getMetrics().increment(METRIC_NAMES.INVARIANT_VIOLATIONS, 1, { code });
  logger.error(message, { code, ...context });
}
