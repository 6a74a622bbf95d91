/**
 * Reservation Engine - per-(warehouse, book) stock counters
 *
 * Responsibilities:
 * - Reserve stock for an order with a guarded single-statement update
 * - Release an order's reservations (payment failure, cancel, expiry)
 * - Promote an order's reservations to a sale (payment success)
 * - Nearest-warehouse selection and availability lookups
 * - Bulk stock adjustments under a row lock
 *
 * Invariant: 0 <= reserved <= quantity for every row at every commit.
 *
 * The `...In` variants run inside a caller's transaction so the order
 * pipeline can compose them with its own writes; the plain variants open
 * their own.
 */

import { createLogger } from '../utils/logger.js';
import { haversineKm } from '../utils/geo.js';
import {
  ConflictError,
  InvariantViolationError,
  NotEligibleError,
  NotFoundError,
  ValidationError,
} from '../utils/errors.js';
import type { RequestContext } from '../utils/context.js';
import { getMetrics, METRIC_NAMES, reportInvariantViolation } from '../observability/index.js';
import type { Repositories, Store } from '../store/types.js';
import type { Reservation, StockRow, Warehouse, WarehouseInventory } from '../types/index.js';

const logger = createLogger('ReservationEngine');

export interface ReserveInput {
  orderId: string;
  warehouseId: string;
  bookId: string;
  quantity: number;
  ttlMs: number;
}

export interface NearestWarehouse {
  warehouse: Warehouse;
  distanceKm: number;
  available: number;
}

export interface Availability {
  bookId: string;
  requested: number;
  totalAvailable: number;
  sufficient: boolean;
  warehouses: Array<{ warehouseId: string; code: string; available: number }>;
}

export interface StockAdjustment {
  warehouseId: string;
  bookId: string;
  delta: number;
  reason: string;
}

const available = (row: WarehouseInventory): number => row.quantity - row.reserved;

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new ValidationError('invalid_quantity', 'Quantity must be a positive integer', { quantity });
  }
}

function assertCoordinates(latitude: number, longitude: number): void {
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new ValidationError('invalid_latitude', 'Latitude must be between -90 and 90', { latitude });
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new ValidationError('invalid_longitude', 'Longitude must be between -180 and 180', { longitude });
  }
}

export class ReservationEngine {
  private readonly metrics = getMetrics();
  private readonly clock: () => number;

  constructor(
    private readonly store: Store,
    options: { clock?: () => number } = {}
  ) {
    this.clock = options.clock ?? Date.now;
  }

  // ---------------------------------------------------------------------------
  // Transaction-bound primitives
  // ---------------------------------------------------------------------------

  async reserveIn(tx: Repositories, input: ReserveInput): Promise<Reservation> {
    assertQuantity(input.quantity);
    const { orderId, warehouseId, bookId, quantity } = input;

    if (await tx.reservations.exists(orderId, warehouseId, bookId)) {
      throw new ConflictError('duplicate_reservation', `Order ${orderId} already holds a reservation for this line`, {
        orderId,
        warehouseId,
        bookId,
      });
    }

    const row = await tx.inventory.get(warehouseId, bookId);
    if (!row || !row.warehouse.active) {
      this.metrics.increment(METRIC_NAMES.RESERVATIONS_REJECTED, 1, { reason: 'out_of_stock' });
      throw new NotEligibleError('out_of_stock', `Book ${bookId} is not stocked at warehouse ${warehouseId}`, {
        warehouseId,
        bookId,
      });
    }

    const applied = await tx.inventory.incrementReserved(warehouseId, bookId, quantity);
    if (!applied) {
      this.metrics.increment(METRIC_NAMES.RESERVATIONS_REJECTED, 1, { reason: 'insufficient' });
      throw new ConflictError('insufficient', `Not enough stock for book ${bookId}`, {
        warehouseId,
        bookId,
        requested: quantity,
        available: available(row),
      });
    }

    const now = this.clock();
    const reservation: Reservation = {
      orderId,
      warehouseId,
      bookId,
      quantity,
      expiresAt: new Date(now + input.ttlMs).toISOString(),
      createdAt: new Date(now).toISOString(),
    };
    await tx.reservations.insert(reservation);

    this.metrics.increment(METRIC_NAMES.RESERVATIONS_CREATED, quantity, { warehouse_id: warehouseId });
    return reservation;
  }

  /** Give back every reservation of the order. No-op when none are held. */
  async releaseIn(tx: Repositories, orderId: string): Promise<Reservation[]> {
    const reservations = await tx.reservations.findByOrder(orderId);
    for (const reservation of reservations) {
      const applied = await tx.inventory.decrementReserved(
        reservation.warehouseId,
        reservation.bookId,
        reservation.quantity
      );
      if (!applied) {
        this.orphan(reservation, 'release');
      }
    }

    if (reservations.length > 0) {
      await tx.reservations.deleteByOrder(orderId);
      this.metrics.increment(METRIC_NAMES.RESERVATIONS_RELEASED, reservations.length);
      logger.info('Reservations released', { orderId, lines: reservations.length });
    }
    return reservations;
  }

  /** Turn every reservation of the order into a stock decrement. No-op when none are held. */
  async completeSaleIn(tx: Repositories, orderId: string): Promise<Reservation[]> {
    const reservations = await tx.reservations.findByOrder(orderId);
    for (const reservation of reservations) {
      const applied = await tx.inventory.commitSale(reservation.warehouseId, reservation.bookId, reservation.quantity);
      if (!applied) {
        this.orphan(reservation, 'complete_sale');
      }
    }

    if (reservations.length > 0) {
      await tx.reservations.deleteByOrder(orderId);
      this.metrics.increment(METRIC_NAMES.RESERVATIONS_SOLD, reservations.length);
      logger.info('Reservations converted to sale', { orderId, lines: reservations.length });
    }
    return reservations;
  }

  async findNearestWithStockIn(
    tx: Repositories,
    bookId: string,
    latitude: number,
    longitude: number,
    requiredQty: number
  ): Promise<NearestWarehouse | null> {
    assertQuantity(requiredQty);
    assertCoordinates(latitude, longitude);

    const candidates = (await tx.inventory.listForBook(bookId)).flatMap((row) => {
      const { warehouse } = row;
      if (!warehouse.active || warehouse.latitude === null || warehouse.longitude === null) return [];
      if (available(row) < requiredQty) return [];
      return [
        {
          warehouse,
          available: available(row),
          distanceKm: haversineKm(latitude, longitude, warehouse.latitude, warehouse.longitude),
        },
      ];
    });

    candidates.sort((a, b) =>
      a.distanceKm !== b.distanceKm
        ? a.distanceKm - b.distanceKm
        : a.warehouse.id < b.warehouse.id
          ? -1
          : a.warehouse.id > b.warehouse.id
            ? 1
            : 0
    );
    return candidates[0] ?? null;
  }

  // ---------------------------------------------------------------------------
  // Standalone operations
  // ---------------------------------------------------------------------------

  reserve(ctx: RequestContext, input: ReserveInput): Promise<Reservation> {
    return this.store.transaction(ctx, (tx) => this.reserveIn(tx, input));
  }

  release(ctx: RequestContext, orderId: string): Promise<Reservation[]> {
    return this.store.transaction(ctx, (tx) => this.releaseIn(tx, orderId));
  }

  completeSale(ctx: RequestContext, orderId: string): Promise<Reservation[]> {
    return this.store.transaction(ctx, (tx) => this.completeSaleIn(tx, orderId));
  }

  findNearestWithStock(
    ctx: RequestContext,
    bookId: string,
    latitude: number,
    longitude: number,
    requiredQty: number
  ): Promise<NearestWarehouse | null> {
    return this.store.transaction(ctx, (tx) =>
      this.findNearestWithStockIn(tx, bookId, latitude, longitude, requiredQty)
    );
  }

  async checkAvailability(ctx: RequestContext, bookId: string, requested: number): Promise<Availability> {
    assertQuantity(requested);
    const rows: StockRow[] = await this.store.transaction(ctx, (tx) => tx.inventory.listForBook(bookId));

    const warehouses = rows
      .filter((row) => row.warehouse.active)
      .map((row) => ({ warehouseId: row.warehouseId, code: row.warehouse.code, available: available(row) }))
      .sort((a, b) => (a.warehouseId < b.warehouseId ? -1 : a.warehouseId > b.warehouseId ? 1 : 0));
    const totalAvailable = warehouses.reduce((sum, w) => sum + w.available, 0);

    return { bookId, requested, totalAvailable, sufficient: totalAvailable >= requested, warehouses };
  }

  /**
   * Apply a signed delta to `quantity` under SELECT ... FOR UPDATE. Refuses
   * to take quantity below what is currently reserved.
   */
  async adjustStock(ctx: RequestContext, adjustment: StockAdjustment): Promise<WarehouseInventory> {
    const { warehouseId, bookId, delta } = adjustment;
    if (!Number.isInteger(delta) || delta === 0) {
      throw new ValidationError('invalid_delta', 'Delta must be a non-zero integer', { delta });
    }

    return this.store.transaction(ctx, async (tx) => {
      const row = await tx.inventory.lockForUpdate(warehouseId, bookId);
      if (!row) {
        throw new NotFoundError('inventory', `${warehouseId}/${bookId}`);
      }

      const quantity = row.quantity + delta;
      if (quantity < row.reserved) {
        throw new NotEligibleError('below_reserved', 'Adjustment would leave less stock than is reserved', {
          quantity: row.quantity,
          reserved: row.reserved,
          delta,
        });
      }

      await tx.inventory.setQuantity(warehouseId, bookId, quantity);
      const at = new Date(this.clock()).toISOString();
      await tx.audit.record({
        actor: ctx.userId ?? ctx.role,
        action: 'inventory.adjust',
        entity: 'warehouse_inventory',
        entityId: `${warehouseId}/${bookId}`,
        data: { delta, reason: adjustment.reason, from: row.quantity, to: quantity },
        createdAt: at,
      });

      logger.info('Stock adjusted', { warehouseId, bookId, delta, quantity });
      return { ...row, quantity, updatedAt: at };
    });
  }

  private orphan(reservation: Reservation, operation: string): never {
    reportInvariantViolation('INVARIANT_ORPHAN_RESERVATION', 'Reservation no longer covered by reserved stock', {
      operation,
      orderId: reservation.orderId,
      warehouseId: reservation.warehouseId,
      bookId: reservation.bookId,
      quantity: reservation.quantity,
    });
    throw new InvariantViolationError(
      'INVARIANT_ORPHAN_RESERVATION',
      `Reservation of order ${reservation.orderId} is not backed by reserved stock`
    );
  }
}
