/**
 * Structured logger for observability
 *
 * Thin service-scoped facade over pino. Every service gets its own child
 * logger so the `service` field is always present in the JSON output, which
 * is what DataDog log pipelines facet on.
 */

import pino from 'pino';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  correlationId?: string;
  service?: string;
  orderId?: string;
  taskId?: string;
  requestId?: string;
  [key: string]: unknown;
}

const root = pino({
  name: 'bookstore',
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label.toUpperCase() }),
  },
});

class Logger {
  private readonly service: string;
  private readonly sink: pino.Logger;

  constructor(service: string, sink: pino.Logger = root.child({ service })) {
    this.service = service;
    this.sink = sink;
  }

  private log(level: LogLevel, message: string, context: LogContext = {}): void {
    this.sink[level](context, message);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Bind fields to every subsequent line (request id, task id...).
   */
  with(context: LogContext): Logger {
    return new Logger(this.service, this.sink.child(context));
  }

  metric(name: string, value: number, tags: Record<string, string | number | boolean> = {}): void {
    this.debug(`METRIC: ${name}=${value}`, { metricName: name, metricValue: value, ...tags });
  }
}

export function createLogger(service: string): Logger {
  return new Logger(service);
}

export type { Logger, LogContext };
