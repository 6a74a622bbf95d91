import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../src/config/index.js';

describe('loadConfig', () => {
  it('fills defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.env).toBe('development');
    expect(config.checkout).toEqual({
      reservationTtlMs: 15 * 60_000,
      shippingFee: 1_500_000,
      codFee: 0,
      priceTolerance: 0,
      maxPaymentAttempts: 3,
    });
    expect(config.aws.queuePrefix).toBe('bookstore-jobs');
    expect(config.aws.useLocalstack).toBe(false);
    expect(config.jobs.notificationUserRateCap).toBe(5);
  });

  it('coerces numeric and boolean variables', () => {
    const config = loadConfig({ RESERVATION_TTL_MINUTES: '30', USE_LOCALSTACK: '1', SHIPPING_FEE: '12.5' });

    expect(config.checkout.reservationTtlMs).toBe(1_800_000);
    expect(config.checkout.shippingFee).toBe(1250);
    expect(config.aws.useLocalstack).toBe(true);
  });

  it('reports every invalid key at once', () => {
    let caught: unknown;
    try {
      loadConfig({ NODE_ENV: 'staging', SHIPPING_FEE: 'free', VNPAY_PAYMENT_URL: 'not a url' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.issues.map((i) => i.split(':')[0]) : []).toEqual([
      'NODE_ENV',
      'SHIPPING_FEE',
      'VNPAY_PAYMENT_URL',
    ]);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
