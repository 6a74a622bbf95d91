/**
 * Promotion and totals arithmetic
 *
 * Tests for:
 * - computeDiscount() per rule type
 * - evaluatePromotion() check order and outcomes
 * - computeTotals()
 */

import { describe, it, expect } from 'vitest';
import { computeDiscount, computeTotals, evaluatePromotion } from '../../src/services/pricing.js';
import type { Promotion } from '../../src/types/index.js';

const NOW = new Date('2026-03-02T08:00:00.000Z');

function promotion(overrides: Partial<Promotion> = {}): Promotion {
  return {
    id: 'promo-1',
    code: 'SAVE10',
    rule: { type: 'percentage', percent: 10, maxDiscount: null },
    active: true,
    startsAt: '2026-03-01T00:00:00.000Z',
    endsAt: '2026-03-03T00:00:00.000Z',
    minOrderAmount: 0,
    maxUses: null,
    maxUsesPerUser: null,
    usedCount: 0,
    ...overrides,
  };
}

describe('computeDiscount', () => {
  it('takes a percentage of the subtotal', () => {
    expect(computeDiscount({ type: 'percentage', percent: 10, maxDiscount: null }, 20_000_000)).toBe(2_000_000);
  });

  it('caps a percentage at maxDiscount', () => {
    expect(computeDiscount({ type: 'percentage', percent: 10, maxDiscount: 500_000 }, 20_000_000)).toBe(500_000);
  });

  it('never discounts more than the subtotal', () => {
    expect(computeDiscount({ type: 'fixed', amount: 5000 }, 3000)).toBe(3000);
  });

  it('gives no money off for free shipping', () => {
    expect(computeDiscount({ type: 'free_shipping' }, 3000)).toBe(0);
  });
});

describe('evaluatePromotion', () => {
  const context = { subtotal: 10_000_000, userUsage: 0, now: NOW };

  it('reports inactive before anything else', () => {
    const check = evaluatePromotion(promotion({ active: false, endsAt: '2026-01-01T00:00:00.000Z' }), context);
    expect(check).toEqual({ status: 'invalid', reason: 'inactive' });
  });

  it('rejects a promotion that has not started', () => {
    expect(evaluatePromotion(promotion({ startsAt: '2026-03-02T08:00:01.000Z' }), context)).toEqual({
      status: 'invalid',
      reason: 'not_started',
    });
  });

  it('treats the end instant itself as expired', () => {
    expect(evaluatePromotion(promotion({ endsAt: NOW.toISOString() }), context)).toEqual({
      status: 'invalid',
      reason: 'expired',
    });
  });

  it('rejects when global uses are exhausted', () => {
    expect(evaluatePromotion(promotion({ maxUses: 5, usedCount: 5 }), context)).toEqual({
      status: 'invalid',
      reason: 'exhausted',
    });
  });

  it('rejects when the user has used it up', () => {
    expect(evaluatePromotion(promotion({ maxUsesPerUser: 1 }), { ...context, userUsage: 1 })).toEqual({
      status: 'invalid',
      reason: 'user_limit_reached',
    });
  });

  it('keeps a promotion whose minimum is unmet but gives no discount', () => {
    expect(evaluatePromotion(promotion({ minOrderAmount: 20_000_000 }), context)).toEqual({
      status: 'not_applicable',
      minOrderAmount: 20_000_000,
    });
  });

  it('computes the discount for a valid promotion', () => {
    expect(evaluatePromotion(promotion(), context)).toEqual({
      status: 'valid',
      discount: 1_000_000,
      freeShipping: false,
    });
  });

  it('flags free shipping', () => {
    expect(evaluatePromotion(promotion({ rule: { type: 'free_shipping' } }), context)).toEqual({
      status: 'valid',
      discount: 0,
      freeShipping: true,
    });
  });
});

describe('computeTotals', () => {
  it('adds shipping and the COD fee to the discounted subtotal', () => {
    expect(
      computeTotals({ subtotal: 20_000_000, discount: 2_000_000, shippingFee: 1_500_000, codFee: 300_000, freeShipping: false })
    ).toEqual({
      subtotal: 20_000_000,
      discount: 2_000_000,
      shippingFee: 1_500_000,
      codFee: 300_000,
      total: 19_800_000,
    });
  });

  it('clamps the discount to the subtotal', () => {
    const totals = computeTotals({ subtotal: 10_000, discount: 15_000, shippingFee: 1500, codFee: 0, freeShipping: false });
    expect(totals.discount).toBe(10_000);
    expect(totals.total).toBe(1500);
  });

  it('drops shipping for free-shipping promotions', () => {
    const totals = computeTotals({ subtotal: 10_000, discount: 0, shippingFee: 1500, codFee: 0, freeShipping: true });
    expect(totals.shippingFee).toBe(0);
    expect(totals.total).toBe(10_000);
  });
});
