import { percentOf, type Money } from '../utils/money.js';
import type { DiscountRule, Promotion } from '../types/index.js';

export type PromotionCheck =
  | { status: 'valid'; discount: Money; freeShipping: boolean }
  | { status: 'invalid'; reason: PromotionInvalidReason }
  | { status: 'not_applicable'; minOrderAmount: Money };

export type PromotionInvalidReason = 'inactive' | 'not_started' | 'expired' | 'exhausted' | 'user_limit_reached';

/** Discount of a rule against a subtotal, never more than the subtotal. */
export function computeDiscount(rule: DiscountRule, subtotal: Money): Money {
  return Math.max(0, Math.min(rawDiscount(rule, subtotal), subtotal));
}

function rawDiscount(rule: DiscountRule, subtotal: Money): Money {
  switch (rule.type) {
    case 'percentage': {
      const discount = percentOf(subtotal, rule.percent);
      return rule.maxDiscount === null ? discount : Math.min(discount, rule.maxDiscount);
    }
    case 'fixed':
      return rule.amount;
    case 'free_shipping':
      return 0;
  }
}

/**
 * Validity window, usage caps and minimum order. An unmet minimum is not an
 * invalid promotion: the cart keeps it and the discount is zero.
 */
export function evaluatePromotion(
  promotion: Promotion,
  context: { subtotal: Money; userUsage: number; now: Date }
): PromotionCheck {
  const now = context.now.getTime();
  if (!promotion.active) return { status: 'invalid', reason: 'inactive' };
  if (Date.parse(promotion.startsAt) > now) return { status: 'invalid', reason: 'not_started' };
  if (Date.parse(promotion.endsAt) <= now) return { status: 'invalid', reason: 'expired' };
  if (promotion.maxUses !== null && promotion.usedCount >= promotion.maxUses) {
    return { status: 'invalid', reason: 'exhausted' };
  }
  if (promotion.maxUsesPerUser !== null && context.userUsage >= promotion.maxUsesPerUser) {
    return { status: 'invalid', reason: 'user_limit_reached' };
  }
  if (context.subtotal < promotion.minOrderAmount) {
    return { status: 'not_applicable', minOrderAmount: promotion.minOrderAmount };
  }

  return {
    status: 'valid',
    discount: computeDiscount(promotion.rule, context.subtotal),
    freeShipping: promotion.rule.type === 'free_shipping',
  };
}

export interface OrderTotals {
  subtotal: Money;
  discount: Money;
  shippingFee: Money;
  codFee: Money;
  total: Money;
}

/** total = max(0, subtotal - discount) + shipping + COD fee. */
export function computeTotals(input: {
  subtotal: Money;
  discount: Money;
  shippingFee: Money;
  codFee: Money;
  freeShipping: boolean;
}): OrderTotals {
  const discount = Math.max(0, Math.min(input.discount, input.subtotal));
  const shippingFee = input.freeShipping ? 0 : input.shippingFee;
  return {
    subtotal: input.subtotal,
    discount,
    shippingFee,
    codFee: input.codFee,
    total: Math.max(0, input.subtotal - discount) + shippingFee + input.codFee,
  };
}
