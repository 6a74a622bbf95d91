/**
 * HTTP API Tests
 *
 * Tests for:
 * - Authentication: bearer tokens, service key, role checks
 * - Error rendering and request ids
 * - Cart, checkout and gateway callback routes
 * - Inventory, health and dead-letter admin routes
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SignJWT } from 'jose';
import {
  HANOI,
  createHarness,
  seedCatalog,
  vnpayCallback,
  type Harness,
} from '../support/fixtures.js';

const JWT_SECRET = new TextEncoder().encode('test-secret-jwt');

async function bearer(sub: string, role: 'user' | 'admin' = 'user', secret = JWT_SECRET): Promise<string> {
  const token = await new SignJWT({ role })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(sub)
    .setIssuedAt()
    .setExpirationTime('1h')
    .sign(secret);
  return `Bearer ${token}`;
}

describe('HTTP API', () => {
  let h: Harness;

  const request = (path: string, init: RequestInit = {}) => h.container.app.request(`/api/v1${path}`, init);
  const json = (method: string, body: unknown, headers: Record<string, string> = {}): RequestInit => ({
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });

  beforeEach(() => {
    h = createHarness();
    seedCatalog(h.store);
  });

  // ==========================================================================
  // Authentication
  // ==========================================================================

  describe('authentication', () => {
    it('rejects anonymous callers with the error envelope and request id', async () => {
      const res = await request('/cart', { headers: { 'X-Request-ID': 'req-abc' } });

      expect(res.status).toBe(401);
      expect(res.headers.get('X-Request-ID')).toBe('req-abc');
      expect(await res.json()).toEqual({
        error: { code: 'unauthorized', message: 'Authentication required', requestId: 'req-abc' },
      });
    });

    it('rejects a token signed with another secret', async () => {
      const authorization = await bearer('user-1', 'user', new TextEncoder().encode('other-secret'));

      const res = await request('/cart', { headers: { Authorization: authorization } });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ error: { code: 'unauthorized', message: 'Invalid token' } });
    });

    it('rejects an expired token', async () => {
      const token = await new SignJWT({ role: 'user' })
        .setProtectedHeader({ alg: 'HS256' })
        .setSubject('user-1')
        .setExpirationTime(Math.floor(Date.now() / 1000) - 60)
        .sign(JWT_SECRET);

      const res = await request('/cart', { headers: { Authorization: `Bearer ${token}` } });

      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ error: { message: 'Token expired' } });
    });

    it('refuses a customer on an admin route', async () => {
      const res = await request('/admin/dead-letters', { headers: { Authorization: await bearer('user-1') } });

      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({ error: { code: 'forbidden', message: 'Requires role admin' } });
    });

    it('admits internal callers holding the service key', async () => {
      const adjust = { warehouseId: 'wh-hn', bookId: 'book-1', delta: 5, reason: 'restock' };

      const ok = await request('/inventories/adjust', json('POST', adjust, { 'X-Service-Key': 'test-service-key' }));
      expect(ok.status).toBe(200);
      expect(await ok.json()).toMatchObject({ inventory: { warehouseId: 'wh-hn', bookId: 'book-1', quantity: 10 } });

      const wrong = await request('/inventories/adjust', json('POST', adjust, { 'X-Service-Key': 'wrong-key' }));
      expect(wrong.status).toBe(401);
      expect(await wrong.json()).toMatchObject({ error: { message: 'Invalid service key' } });

      const user = await request('/inventories/adjust', json('POST', adjust, { Authorization: await bearer('user-1') }));
      expect(user.status).toBe(403);
    });
  });

  // ==========================================================================
  // Validation and routing errors
  // ==========================================================================

  describe('errors', () => {
    it('lists schema violations', async () => {
      const res = await request(
        '/cart/items',
        json('POST', { bookId: 'book-1', quantity: 0 }, { Authorization: await bearer('user-1') })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: {
          code: 'invalid_request',
          details: [{ path: 'quantity', message: 'Number must be greater than 0' }],
        },
      });
    });

    it('rejects a body that is not JSON', async () => {
      const res = await request('/cart/items', {
        method: 'POST',
        headers: { Authorization: await bearer('user-1'), 'Content-Type': 'application/json' },
        body: 'not json',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'invalid_json' } });
    });

    it('answers unknown routes with route_not_found', async () => {
      const res = await request('/nope');

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({
        error: { code: 'route_not_found', message: 'Route not found: GET /api/v1/nope' },
      });
    });

    it('maps not-eligible errors to 422', async () => {
      const res = await request('/warehouses/nearest-with-stock?bookId=book-1&latitude=21.03&longitude=105.85&quantity=100');

      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({
        error: { code: 'out_of_stock', details: { bookId: 'book-1', quantity: 100 } },
      });
    });
  });

  // ==========================================================================
  // Checkout flow
  // ==========================================================================

  describe('checkout', () => {
    it('places an order and accepts the gateway callback', async () => {
      const authorization = await bearer('user-1');
      await request('/cart/items', json('POST', { bookId: 'book-1', quantity: 2 }, { Authorization: authorization }));

      const placed = await request(
        '/cart/checkout',
        json('POST', { paymentMethod: 'vnpay', address: HANOI }, { Authorization: authorization, 'X-Forwarded-For': '10.1.2.3, 10.0.0.9' })
      );
      expect(placed.status).toBe(201);
      const [payment] = [...h.store.snapshot().payments.values()];
      expect(payment).toMatchObject({ status: 'pending', amount: 21_500_000 });
      expect(new URL(payment?.redirectUrl ?? '').searchParams.get('vnp_IpAddr')).toBe('10.1.2.3');

      const params = vnpayCallback(h.config, { txnRef: payment?.gatewayTxnRef ?? '', amount: payment?.amount ?? 0 });
      const ipn = await request(`/webhooks/vnpay?${new URLSearchParams(params).toString()}`);

      expect(ipn.status).toBe(200);
      expect(await ipn.json()).toEqual({ RspCode: '00', Message: 'Confirm Success' });
      const [order] = [...h.store.snapshot().orders.values()];
      expect(order?.status).toBe('paid');
    });

    it('rejects callbacks for unknown gateways', async () => {
      const res = await request('/webhooks/paypal', { method: 'POST' });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: 'unknown_gateway' } });
    });
  });

  // ==========================================================================
  // Public reads and operations
  // ==========================================================================

  describe('health', () => {
    it('reports ok when both backends answer', async () => {
      const res = await request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok', checks: { database: 'ok', keyspace: 'ok' } });
    });

    it('reports degraded when the keyspace is down', async () => {
      h.ks.setAvailable(false);

      const res = await request('/health');

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ status: 'degraded', checks: { database: 'ok', keyspace: 'error' } });
    });
  });

  it('serves book availability without authentication', async () => {
    const res = await request('/books/book-1/availability');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ bookId: 'book-1', totalAvailable: 25 });
  });

  it('summarises dead letters for admins', async () => {
    const authorization = await bearer('admin-1', 'admin');

    const summary = await request('/admin/dead-letters', { headers: { Authorization: authorization } });
    expect(await summary.json()).toEqual({ total: 0, byQueue: {}, byType: {} });

    const badQueue = await request('/admin/dead-letters/urgent', { headers: { Authorization: authorization } });
    expect(badQueue.status).toBe(400);
  });
});
