/**
 * Reservation Engine Tests
 *
 * Tests for:
 * - reserve(): guarded increment, rejection reasons, concurrency
 * - release() / completeSale(): idempotent give-back and sale
 * - findNearestWithStock(): distance ordering and eligibility
 * - checkAvailability() and adjustStock()
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryStore } from '../../src/store/memory-store.js';
import { ReservationEngine } from '../../src/services/reservation-engine.js';
import {
  ConflictError,
  InvariantViolationError,
  NotEligibleError,
  NotFoundError,
  ValidationError,
} from '../../src/utils/errors.js';
import { HANOI, ManualClock, SAIGON, START, seedCatalog, setStock, systemCtx } from '../support/fixtures.js';

const TTL = 15 * 60_000;

describe('ReservationEngine', () => {
  let clock: ManualClock;
  let store: MemoryStore;
  let engine: ReservationEngine;

  const stock = (warehouseId: string, bookId: string) => {
    const row = store.snapshot().inventory.get(`${warehouseId}|${bookId}`);
    return row ? { quantity: row.quantity, reserved: row.reserved } : null;
  };

  beforeEach(() => {
    clock = new ManualClock();
    store = new MemoryStore();
    seedCatalog(store);
    engine = new ReservationEngine(store, { clock: clock.read });
  });

  // ==========================================================================
  // reserve
  // ==========================================================================

  describe('reserve', () => {
    it('holds stock for the order until the TTL', async () => {
      const reservation = await engine.reserve(systemCtx(), {
        orderId: 'o-1',
        warehouseId: 'wh-hn',
        bookId: 'book-1',
        quantity: 2,
        ttlMs: TTL,
      });

      expect(reservation).toEqual({
        orderId: 'o-1',
        warehouseId: 'wh-hn',
        bookId: 'book-1',
        quantity: 2,
        expiresAt: '2026-03-02T08:15:00.000Z',
        createdAt: '2026-03-02T08:00:00.000Z',
      });
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 5, reserved: 2 });
    });

    it('rejects more than is available and leaves the row untouched', async () => {
      const error = await engine
        .reserve(systemCtx(), { orderId: 'o-1', warehouseId: 'wh-hn', bookId: 'book-1', quantity: 6, ttlMs: TTL })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({
        code: 'insufficient',
        details: { warehouseId: 'wh-hn', bookId: 'book-1', requested: 6, available: 5 },
      });
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 5, reserved: 0 });
      expect(store.snapshot().reservations).toEqual([]);
    });

    it('reserves exactly the available quantity', async () => {
      await engine.reserve(systemCtx(), { orderId: 'o-1', warehouseId: 'wh-hn', bookId: 'book-1', quantity: 5, ttlMs: TTL });

      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 5, reserved: 5 });
      await expect(
        engine.reserve(systemCtx(), { orderId: 'o-2', warehouseId: 'wh-hn', bookId: 'book-1', quantity: 1, ttlMs: TTL })
      ).rejects.toMatchObject({ code: 'insufficient', details: { requested: 1, available: 0 } });
    });

    it('reports out_of_stock for a book the warehouse does not carry', async () => {
      await expect(
        engine.reserve(systemCtx(), { orderId: 'o-1', warehouseId: 'wh-hn', bookId: 'book-2', quantity: 1, ttlMs: TTL })
      ).rejects.toMatchObject({ kind: 'not_eligible', code: 'out_of_stock' });
    });

    it('reports out_of_stock at an inactive warehouse', async () => {
      store.seed((state) => {
        const warehouse = state.warehouses.get('wh-hn');
        if (warehouse) warehouse.active = false;
      });
      const error = await engine
        .reserve(systemCtx(), { orderId: 'o-1', warehouseId: 'wh-hn', bookId: 'book-1', quantity: 1, ttlMs: TTL })
        .catch((e: unknown) => e);
      expect(error).toBeInstanceOf(NotEligibleError);
    });

    it('refuses a second reservation for the same order line', async () => {
      const input = { orderId: 'o-1', warehouseId: 'wh-hcm', bookId: 'book-1', quantity: 1, ttlMs: TTL };
      await engine.reserve(systemCtx(), input);
      await expect(engine.reserve(systemCtx(), input)).rejects.toMatchObject({ code: 'duplicate_reservation' });
      expect(stock('wh-hcm', 'book-1')).toEqual({ quantity: 20, reserved: 1 });
    });

    it('validates the quantity', async () => {
      for (const quantity of [0, -1, 1.5]) {
        const error = await engine
          .reserve(systemCtx(), { orderId: 'o-1', warehouseId: 'wh-hn', bookId: 'book-1', quantity, ttlMs: TTL })
          .catch((e: unknown) => e);
        expect(error).toBeInstanceOf(ValidationError);
        expect(error).toMatchObject({ code: 'invalid_quantity' });
      }
    });

    it('never oversells under concurrent reservations', async () => {
      const attempts = Array.from({ length: 10 }, (_, i) =>
        engine.reserve(systemCtx(), { orderId: `o-${i}`, warehouseId: 'wh-hn', bookId: 'book-1', quantity: 1, ttlMs: TTL })
      );
      const results = await Promise.allSettled(attempts);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(5);
      const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
      expect(rejected).toHaveLength(5);
      for (const reason of rejected) expect(reason).toMatchObject({ code: 'insufficient' });
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 5, reserved: 5 });
    });
  });

  // ==========================================================================
  // release / completeSale
  // ==========================================================================

  describe('release and completeSale', () => {
    beforeEach(async () => {
      await engine.reserve(systemCtx(), { orderId: 'o-1', warehouseId: 'wh-hcm', bookId: 'book-1', quantity: 3, ttlMs: TTL });
      await engine.reserve(systemCtx(), { orderId: 'o-1', warehouseId: 'wh-hcm', bookId: 'book-2', quantity: 1, ttlMs: TTL });
    });

    it('gives back every line of the order', async () => {
      const released = await engine.release(systemCtx(), 'o-1');

      expect(released.map((r) => [r.bookId, r.quantity])).toEqual([
        ['book-1', 3],
        ['book-2', 1],
      ]);
      expect(stock('wh-hcm', 'book-1')).toEqual({ quantity: 20, reserved: 0 });
      expect(stock('wh-hcm', 'book-2')).toEqual({ quantity: 3, reserved: 0 });
      expect(store.snapshot().reservations).toEqual([]);
    });

    it('is a no-op the second time', async () => {
      await engine.release(systemCtx(), 'o-1');
      expect(await engine.release(systemCtx(), 'o-1')).toEqual([]);
      expect(stock('wh-hcm', 'book-1')).toEqual({ quantity: 20, reserved: 0 });
    });

    it('turns reservations into a stock decrement', async () => {
      const sold = await engine.completeSale(systemCtx(), 'o-1');

      expect(sold).toHaveLength(2);
      expect(stock('wh-hcm', 'book-1')).toEqual({ quantity: 17, reserved: 0 });
      expect(stock('wh-hcm', 'book-2')).toEqual({ quantity: 2, reserved: 0 });
      expect(await engine.completeSale(systemCtx(), 'o-1')).toEqual([]);
    });

    it('raises an invariant violation for a reservation no longer backed by stock', async () => {
      setStock(store, 'wh-hcm', 'book-1', 20, 0);

      const error = await engine.release(systemCtx(), 'o-1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvariantViolationError);
      expect(error).toMatchObject({ code: 'INVARIANT_ORPHAN_RESERVATION' });
      expect(store.snapshot().reservations).toHaveLength(2);
      expect(stock('wh-hcm', 'book-2')).toEqual({ quantity: 3, reserved: 1 });
    });
  });

  // ==========================================================================
  // findNearestWithStock / checkAvailability
  // ==========================================================================

  describe('findNearestWithStock', () => {
    it('picks the closest warehouse that can cover the quantity', async () => {
      const nearest = await engine.findNearestWithStock(systemCtx(), 'book-1', HANOI.latitude, HANOI.longitude, 2);
      expect(nearest?.warehouse.id).toBe('wh-hn');
      expect(nearest?.available).toBe(5);
      expect(nearest?.distanceKm).toBeLessThan(5);
    });

    it('skips warehouses short of stock', async () => {
      const nearest = await engine.findNearestWithStock(systemCtx(), 'book-1', HANOI.latitude, HANOI.longitude, 6);
      expect(nearest?.warehouse.id).toBe('wh-hcm');
    });

    it('counts reserved stock as unavailable', async () => {
      await engine.reserve(systemCtx(), { orderId: 'o-1', warehouseId: 'wh-hn', bookId: 'book-1', quantity: 4, ttlMs: TTL });
      const nearest = await engine.findNearestWithStock(systemCtx(), 'book-1', HANOI.latitude, HANOI.longitude, 2);
      expect(nearest?.warehouse.id).toBe('wh-hcm');
    });

    it('serves the south from the southern warehouse', async () => {
      const nearest = await engine.findNearestWithStock(systemCtx(), 'book-1', SAIGON.latitude, SAIGON.longitude, 1);
      expect(nearest?.warehouse.id).toBe('wh-hcm');
    });

    it('ignores warehouses without coordinates', async () => {
      store.seed((state) => {
        const warehouse = state.warehouses.get('wh-hn');
        if (warehouse) warehouse.latitude = null;
      });
      const nearest = await engine.findNearestWithStock(systemCtx(), 'book-1', HANOI.latitude, HANOI.longitude, 1);
      expect(nearest?.warehouse.id).toBe('wh-hcm');
    });

    it('breaks distance ties by warehouse id', async () => {
      store.seed((state) => {
        state.warehouses.set('wh-a', { id: 'wh-a', code: 'A', name: 'A', active: true, latitude: 16, longitude: 108 });
        state.warehouses.set('wh-b', { id: 'wh-b', code: 'B', name: 'B', active: true, latitude: 16, longitude: 108 });
      });
      setStock(store, 'wh-b', 'book-2', 4);
      setStock(store, 'wh-a', 'book-2', 4);

      const nearest = await engine.findNearestWithStock(systemCtx(), 'book-2', 16, 108, 1);
      expect(nearest?.warehouse.id).toBe('wh-a');
    });

    it('returns null when no warehouse has enough', async () => {
      expect(await engine.findNearestWithStock(systemCtx(), 'book-1', HANOI.latitude, HANOI.longitude, 100)).toBeNull();
    });

    it('validates coordinates', async () => {
      await expect(engine.findNearestWithStock(systemCtx(), 'book-1', 91, 0, 1)).rejects.toMatchObject({
        code: 'invalid_latitude',
      });
      await expect(engine.findNearestWithStock(systemCtx(), 'book-1', 0, -181, 1)).rejects.toMatchObject({
        code: 'invalid_longitude',
      });
    });
  });

  describe('checkAvailability', () => {
    it('sums availability across active warehouses', async () => {
      await engine.reserve(systemCtx(), { orderId: 'o-1', warehouseId: 'wh-hn', bookId: 'book-1', quantity: 2, ttlMs: TTL });

      expect(await engine.checkAvailability(systemCtx(), 'book-1', 30)).toEqual({
        bookId: 'book-1',
        requested: 30,
        totalAvailable: 23,
        sufficient: false,
        warehouses: [
          { warehouseId: 'wh-hcm', code: 'HCM01', available: 20 },
          { warehouseId: 'wh-hn', code: 'HN01', available: 3 },
        ],
      });
    });
  });

  // ==========================================================================
  // adjustStock
  // ==========================================================================

  describe('adjustStock', () => {
    it('applies the delta and audits it', async () => {
      clock.advance(1000);
      const row = await engine.adjustStock(systemCtx(), {
        warehouseId: 'wh-hn',
        bookId: 'book-1',
        delta: 5,
        reason: 'restock',
      });

      expect(row).toMatchObject({ quantity: 10, reserved: 0, updatedAt: '2026-03-02T08:00:01.000Z' });
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 10, reserved: 0 });
      expect(store.snapshot().audit).toEqual([
        {
          actor: 'system',
          action: 'inventory.adjust',
          entity: 'warehouse_inventory',
          entityId: 'wh-hn/book-1',
          data: { delta: 5, reason: 'restock', from: 5, to: 10 },
          createdAt: new Date(START + 1000).toISOString(),
        },
      ]);
    });

    it('refuses to go below the reserved count', async () => {
      await engine.reserve(systemCtx(), { orderId: 'o-1', warehouseId: 'wh-hn', bookId: 'book-1', quantity: 3, ttlMs: TTL });
      await expect(
        engine.adjustStock(systemCtx(), { warehouseId: 'wh-hn', bookId: 'book-1', delta: -3, reason: 'damaged' })
      ).rejects.toMatchObject({ code: 'below_reserved' });
      expect(stock('wh-hn', 'book-1')).toEqual({ quantity: 5, reserved: 3 });
    });

    it('rejects a zero delta and unknown rows', async () => {
      await expect(
        engine.adjustStock(systemCtx(), { warehouseId: 'wh-hn', bookId: 'book-1', delta: 0, reason: 'noop' })
      ).rejects.toMatchObject({ code: 'invalid_delta' });

      const error = await engine
        .adjustStock(systemCtx(), { warehouseId: 'wh-hn', bookId: 'book-2', delta: 1, reason: 'x' })
        .catch((e: unknown) => e);
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ code: 'inventory_not_found' });
    });
  });
});
