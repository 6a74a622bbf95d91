/**
 * Cart Service
 *
 * Responsibilities:
 * - Create the user's active cart on first add and snapshot unit prices
 * - Apply a promotion by code
 * - Sweep active carts whose promotion stopped being valid (scheduled job)
 *
 * Checkout itself lives in OrderService; the cart is only mutated here and
 * converted there.
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../utils/logger.js';
import { NotEligibleError, NotFoundError, UnauthorizedError, ValidationError } from '../utils/errors.js';
import type { RequestContext } from '../utils/context.js';
import type { Store } from '../store/types.js';
import type { Cart } from '../types/index.js';
import { evaluatePromotion } from './pricing.js';
import type { NotificationService } from './notification-service.js';

const logger = createLogger('CartService');

export interface AddItemRequest {
  bookId: string;
  quantity: number;
}

export interface PromotionSweepResult {
  scanned: number;
  removed: number;
  /** Offset to resume from, or null when the scan reached the end. */
  nextOffset: number | null;
}

function requireUser(ctx: RequestContext): string {
  if (!ctx.userId) throw new UnauthorizedError();
  return ctx.userId;
}

const subtotalOf = (cart: Cart): number =>
  cart.items.reduce((sum, item) => sum + item.unitPriceSnapshot * item.quantity, 0);

export class CartService {
  private readonly clock: () => number;

  constructor(
    private readonly store: Store,
    private readonly notifications: NotificationService,
    options: { clock?: () => number } = {}
  ) {
    this.clock = options.clock ?? Date.now;
  }

  async getCart(ctx: RequestContext): Promise<Cart | null> {
    const userId = requireUser(ctx);
    return this.store.transaction(ctx, (tx) => tx.carts.findActiveByUser(userId));
  }

  /** Add `quantity` of a book, creating the cart if needed. Quantities accumulate. */
  async addItem(ctx: RequestContext, request: AddItemRequest): Promise<Cart> {
    const userId = requireUser(ctx);
    if (!Number.isInteger(request.quantity) || request.quantity <= 0) {
      throw new ValidationError('invalid_quantity', 'Quantity must be a positive integer', {
        quantity: request.quantity,
      });
    }

    return this.store.transaction(ctx, async (tx) => {
      const [book] = await tx.books.findByIds([request.bookId]);
      if (!book) throw new NotFoundError('book', request.bookId);
      if (!book.active) {
        throw new NotEligibleError('book_inactive', `Book ${book.id} is not for sale`, { bookId: book.id });
      }

      let cart = await tx.carts.findActiveByUser(userId);
      if (!cart) {
        cart = {
          id: uuidv4(),
          userId,
          sessionId: null,
          status: 'active',
          appliedPromotionId: null,
          items: [],
          updatedAt: new Date(this.clock()).toISOString(),
        };
        await tx.carts.create(cart);
      }

      const existing = cart.items.find((item) => item.bookId === book.id);
      await tx.carts.upsertItem(cart.id, {
        bookId: book.id,
        quantity: (existing?.quantity ?? 0) + request.quantity,
        unitPriceSnapshot: book.price,
      });

      const updated = await tx.carts.findById(cart.id);
      if (!updated) throw new NotFoundError('cart', cart.id);
      return updated;
    });
  }

  /**
   * Attach a promotion to the active cart. Window and usage caps are checked
   * now; the minimum order is only enforced at checkout.
   */
  async applyPromotion(ctx: RequestContext, code: string): Promise<Cart> {
    const userId = requireUser(ctx);

    return this.store.transaction(ctx, async (tx) => {
      const cart = await tx.carts.findActiveByUser(userId);
      if (!cart || cart.items.length === 0) {
        throw new ValidationError('empty_cart', 'Cart is empty');
      }

      const promotion = await tx.promotions.findByCode(code);
      if (!promotion) throw new NotFoundError('promotion', code);

      const check = evaluatePromotion(promotion, {
        subtotal: subtotalOf(cart),
        userUsage: await tx.promotions.countUserUsage(promotion.id, userId),
        now: new Date(this.clock()),
      });
      if (check.status === 'invalid') {
        throw new NotEligibleError('promotion_invalid', `Promotion ${code} cannot be applied`, {
          reason: check.reason,
        });
      }

      await tx.carts.setPromotion(cart.id, promotion.id);
      logger.info('Promotion applied', { cartId: cart.id, promotionId: promotion.id, requestId: ctx.requestId });
      return { ...cart, appliedPromotionId: promotion.id };
    });
  }

  /**
   * One batch of the expired-promotion sweep. Each removal publishes a
   * `promotion_removed` notification to the cart owner.
   */
  async removeExpiredPromotions(ctx: RequestContext, offset: number, limit: number): Promise<PromotionSweepResult> {
    const now = new Date(this.clock());

    return this.store.transaction(ctx, async (tx) => {
      const carts = await tx.carts.listWithPromotion(offset, limit);
      let removed = 0;

      for (const cart of carts) {
        if (cart.appliedPromotionId === null) continue;
        const promotion = await tx.promotions.findById(cart.appliedPromotionId);
        const check = promotion
          ? evaluatePromotion(promotion, {
              subtotal: subtotalOf(cart),
              userUsage: cart.userId ? await tx.promotions.countUserUsage(promotion.id, cart.userId) : 0,
              now,
            })
          : null;
        let reason = 'deleted';
        if (check !== null) {
          if (check.status !== 'invalid') continue;
          reason = check.reason;
        }

        await tx.carts.setPromotion(cart.id, null);
        removed += 1;
        if (cart.userId) {
          await this.notifications.publishIn(tx, cart.userId, 'promotion_removed', {
            cartId: cart.id,
            promotionCode: promotion?.code ?? '',
            reason,
          });
        }
      }

      // Removed carts drop out of the listing, so the next page starts earlier.
      const nextOffset = carts.length < limit ? null : offset + carts.length - removed;
      logger.info('Expired promotions swept', { offset, scanned: carts.length, removed });
      return { scanned: carts.length, removed, nextOffset };
    });
  }
}
