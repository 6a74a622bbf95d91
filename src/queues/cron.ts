/**
 * Five-field cron expressions, evaluated in UTC.
 *
 * Supports wildcards, ranges (1-5), lists (1,3,5) and steps (star/15,
 * 0-30/10). A step wider than its field keeps only the range start, so
 * `*` + `/360` in the minute field means minute 0 of every hour.
 */

export class InvalidCronExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCronExpressionError';
  }
}

type Field = number[] | '*';

export interface CronExpression {
  source: string;
  minute: Field;
  hour: Field;
  dayOfMonth: Field;
  month: Field;
  dayOfWeek: Field;
}

const MINUTE_MS = 60_000;

/** About four years of minutes. */
const MAX_ITERATIONS = 60 * 24 * 366 * 4;

function parseNumber(text: string, fieldName: string): number {
  if (!/^\d+$/.test(text)) {
    throw new InvalidCronExpressionError(`Invalid value in ${fieldName}: ${text}`);
  }
  return parseInt(text, 10);
}

function parseField(field: string, min: number, max: number, fieldName: string): Field {
  if (field === '*') {
    return '*';
  }

  const values = new Set<number>();

  for (const part of field.split(',')) {
    const stepMatch = /^(.+)\/(\d+)$/.exec(part);
    if (stepMatch) {
      const [, rangePart, stepText] = stepMatch;
      const step = parseNumber(stepText, fieldName);
      if (step === 0) {
        throw new InvalidCronExpressionError(`Zero step in ${fieldName}: ${part}`);
      }

      let start = min;
      let end = max;
      if (rangePart !== '*') {
        const rangeMatch = /^(\d+)-(\d+)$/.exec(rangePart);
        if (rangeMatch) {
          start = parseNumber(rangeMatch[1], fieldName);
          end = parseNumber(rangeMatch[2], fieldName);
        } else {
          start = parseNumber(rangePart, fieldName);
        }
      }

      for (let i = start; i <= end; i += step) {
        values.add(i);
      }
      continue;
    }

    const rangeMatch = /^(\d+)-(\d+)$/.exec(part);
    if (rangeMatch) {
      const start = parseNumber(rangeMatch[1], fieldName);
      const end = parseNumber(rangeMatch[2], fieldName);
      if (start > end) {
        throw new InvalidCronExpressionError(`Invalid range in ${fieldName}: ${part} (start > end)`);
      }
      for (let i = start; i <= end; i++) {
        values.add(i);
      }
      continue;
    }

    values.add(parseNumber(part, fieldName));
  }

  for (const value of values) {
    if (value < min || value > max) {
      throw new InvalidCronExpressionError(`Value ${value} in ${fieldName} is out of range (${min}-${max})`);
    }
  }

  return [...values].sort((a, b) => a - b);
}

export function parseCronExpression(expression: string): CronExpression {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new InvalidCronExpressionError(
      `Invalid cron expression: expected 5 fields, got ${fields.length}. Expression: "${expression}"`
    );
  }

  return {
    source: expression,
    minute: parseField(fields[0], 0, 59, 'minute'),
    hour: parseField(fields[1], 0, 23, 'hour'),
    dayOfMonth: parseField(fields[2], 1, 31, 'dayOfMonth'),
    month: parseField(fields[3], 1, 12, 'month'),
    dayOfWeek: parseField(fields[4], 0, 6, 'dayOfWeek'),
  };
}

function fieldMatches(value: number, field: Field): boolean {
  return field === '*' || field.includes(value);
}

/**
 * Whether the minute containing `date` is a firing minute. When both day
 * fields are restricted either may match, as in classic cron.
 */
export function cronMatches(cron: CronExpression, date: Date): boolean {
  const dayOfMonth = fieldMatches(date.getUTCDate(), cron.dayOfMonth);
  const dayOfWeek = fieldMatches(date.getUTCDay(), cron.dayOfWeek);
  const dayMatches =
    cron.dayOfMonth !== '*' && cron.dayOfWeek !== '*' ? dayOfMonth || dayOfWeek : dayOfMonth && dayOfWeek;

  return (
    dayMatches &&
    fieldMatches(date.getUTCMonth() + 1, cron.month) &&
    fieldMatches(date.getUTCHours(), cron.hour) &&
    fieldMatches(date.getUTCMinutes(), cron.minute)
  );
}

/** Truncate to the start of the minute. */
export function floorToMinute(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MINUTE_MS) * MINUTE_MS);
}

/** First firing minute strictly after `from`. */
export function getNextRunTime(cron: CronExpression, from: Date = new Date()): Date {
  let timestamp = floorToMinute(from).getTime() + MINUTE_MS;

  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const date = new Date(timestamp);
    if (cronMatches(cron, date)) {
      return date;
    }
    timestamp += MINUTE_MS;
  }

  throw new InvalidCronExpressionError(`Could not find next run time for "${cron.source}"`);
}
