import { describe, it, expect, beforeEach } from 'vitest';
import { KEYS } from '../../src/keyspace/types.js';
import { DependencyError } from '../../src/utils/errors.js';
import { START, createHarness, seedCatalog, setStock, systemCtx, type Harness } from '../support/fixtures.js';

describe('StockCache', () => {
  let h: Harness;
  const ctx = systemCtx();

  const expected = {
    bookId: 'book-1',
    totalAvailable: 25,
    warehouses: [
      { warehouseId: 'wh-hcm', code: 'HCM01', available: 20 },
      { warehouseId: 'wh-hn', code: 'HN01', available: 5 },
    ],
    computedAt: new Date(START).toISOString(),
  };

  beforeEach(() => {
    h = createHarness();
    seedCatalog(h.store);
  });

  it('computes on a miss and serves the cached copy after', async () => {
    expect(await h.container.stock.get(ctx, 'book-1')).toEqual(expected);
    setStock(h.store, 'wh-hn', 'book-1', 1);

    expect((await h.container.stock.get(ctx, 'book-1')).totalAvailable).toBe(25);
  });

  it('overwrites the entry on sync', async () => {
    await h.container.stock.get(ctx, 'book-1');
    setStock(h.store, 'wh-hn', 'book-1', 1);

    expect((await h.container.stock.sync(ctx, 'book-1')).totalAvailable).toBe(21);
    expect((await h.container.stock.get(ctx, 'book-1')).totalAvailable).toBe(21);
  });

  it('falls back to the database while the keyspace is down', async () => {
    h.ks.setAvailable(false);

    expect(await h.container.stock.get(ctx, 'book-1')).toEqual(expected);
    await expect(h.container.stock.sync(ctx, 'book-1')).rejects.toBeInstanceOf(DependencyError);
  });

  it('recomputes an unreadable entry', async () => {
    await h.ks.set(KEYS.bookStock('book-1'), '{"bookId":', 60);

    expect(await h.container.stock.get(ctx, 'book-1')).toEqual(expected);
  });
});
