/**
 * Money helpers. Amounts are integer minor units (cents) everywhere in the
 * domain; the database stores NUMERIC(12,2) and the mappers convert.
 */

export type Money = number;

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;

export function parseMoney(value: string | number): Money {
  const text = typeof value === 'number' ? value.toFixed(2) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new RangeError(`Invalid money amount: ${value}`);
  }
  const [, sign, whole, fraction = ''] = match;
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  return sign ? -cents : cents;
}

export function formatMoney(amount: Money): string {
  const sign = amount < 0 ? '-' : '';
  const abs = Math.abs(amount);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

/** Round half away from zero to an integer. */
export function roundHalfAwayFromZero(value: number): number {
  return value < 0 ? -Math.round(-value) : Math.round(value);
}

/**
 * Percentage of an amount, rounded to the cent half away from zero.
 * The rate is taken in basis points so 12.5% stays exact.
 */
export function percentOf(amount: Money, percent: number): Money {
  const basisPoints = Math.round(percent * 100);
  return roundHalfAwayFromZero((amount * basisPoints) / 10000);
}
