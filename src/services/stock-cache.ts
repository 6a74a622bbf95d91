import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { RequestContext } from '../utils/context.js';
import { getMetrics, METRIC_NAMES } from '../observability/index.js';
import { KEYS, type KeyValueStore } from '../keyspace/types.js';
import type { ReservationEngine } from './reservation-engine.js';

const logger = createLogger('StockCache');

const stockSummarySchema = z.object({
  bookId: z.string(),
  totalAvailable: z.number().int(),
  warehouses: z.array(z.object({ warehouseId: z.string(), code: z.string(), available: z.number().int() })),
  computedAt: z.string(),
});

export type StockSummary = z.infer<typeof stockSummarySchema>;

/**
 * Derived per-book availability held in the keyspace. Writers recompute it
 * after stock moves (last writer wins); readers fall back to the database
 * whenever the keyspace misses or is down.
 */
export class StockCache {
  private readonly metrics = getMetrics();
  private readonly clock: () => number;

  constructor(
    private readonly reservations: ReservationEngine,
    private readonly ks: KeyValueStore,
    private readonly options: { ttlSeconds: number; clock?: () => number }
  ) {
    this.clock = options.clock ?? Date.now;
  }

  /** Recompute from the database and overwrite the cached entry. */
  async sync(ctx: RequestContext, bookId: string): Promise<StockSummary> {
    const summary = await this.compute(ctx, bookId);
    await this.ks.set(KEYS.bookStock(bookId), JSON.stringify(summary), this.options.ttlSeconds);
    logger.debug('Stock summary cached', { bookId, totalAvailable: summary.totalAvailable });
    return summary;
  }

  async get(ctx: RequestContext, bookId: string): Promise<StockSummary> {
    const cached = await this.read(bookId);
    if (cached) return cached;

    const summary = await this.compute(ctx, bookId);
    try {
      await this.ks.set(KEYS.bookStock(bookId), JSON.stringify(summary), this.options.ttlSeconds);
    } catch (error) {
      this.cacheError('write', bookId, error);
    }
    return summary;
  }

  private async read(bookId: string): Promise<StockSummary | null> {
    let raw: string | null;
    try {
      raw = await this.ks.get(KEYS.bookStock(bookId));
    } catch (error) {
      this.cacheError('read', bookId, error);
      return null;
    }
    if (raw === null) return null;

    try {
      const parsed = stockSummarySchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      this.cacheError('decode', bookId, error);
      return null;
    }
  }

  private async compute(ctx: RequestContext, bookId: string): Promise<StockSummary> {
    const availability = await this.reservations.checkAvailability(ctx, bookId, 1);
    return {
      bookId,
      totalAvailable: availability.totalAvailable,
      warehouses: availability.warehouses,
      computedAt: new Date(this.clock()).toISOString(),
    };
  }

  private cacheError(operation: string, bookId: string, error: unknown): void {
    this.metrics.increment(METRIC_NAMES.CACHE_ERRORS, 1, { operation });
    logger.warn('Stock cache unavailable, using database', { operation, bookId, error: errorMessage(error) });
  }
}
