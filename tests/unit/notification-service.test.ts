/**
 * Notification Service Tests
 *
 * Tests for:
 * - renderTemplate() / notificationRetryDelayMs()
 * - sendPending(): dispatch and the per-user cap
 * - retryFailed(): schedule and giving up
 * - cleanupOld()
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  MAX_ATTEMPTS,
  notificationRetryDelayMs,
  renderTemplate,
} from '../../src/services/notification-service.js';
import { START, createHarness, seedCatalog, systemCtx, type Harness } from '../support/fixtures.js';
import type { Notification } from '../../src/types/index.js';

const DAY = 24 * 60 * 60_000;

describe('renderTemplate', () => {
  it('substitutes known keys and blanks missing ones', () => {
    expect(renderTemplate('Order #{orderNumber} for #{name}', { orderNumber: 'ORD-1' })).toBe('Order ORD-1 for ');
  });
});

describe('notificationRetryDelayMs', () => {
  it('doubles from five minutes', () => {
    expect(notificationRetryDelayMs(1)).toBe(300_000);
    expect(notificationRetryDelayMs(3)).toBe(1_200_000);
  });
});

describe('NotificationService', () => {
  let h: Harness;
  const ctx = systemCtx();

  const rows = () => [...h.store.snapshot().notifications.values()];
  const publishRemoval = (userId: string) =>
    h.container.notifications.publish(ctx, userId, 'promotion_removed', {
      cartId: 'cart-1',
      promotionCode: 'SAVE10',
      reason: 'expired',
    });

  beforeEach(() => {
    h = createHarness({ env: { NOTIFICATION_USER_RATE_CAP: '2' } });
    seedCatalog(h.store);
  });

  it('emails pending notifications and marks them sent', async () => {
    await publishRemoval('user-1');

    expect(await h.container.notifications.sendPending(ctx, 10)).toEqual({ sent: 1, failed: 0, deferred: 0 });

    expect(h.email.sent).toEqual([
      {
        to: 'user-1@example.test',
        subject: 'A promotion was removed from your cart',
        html: '<p>Hi Reader user-1,</p>\n<p>The promotion SAVE10 is no longer available (expired) and was removed from your cart.</p>',
      },
    ]);
    expect(rows()[0]).toMatchObject({ status: 'sent', sentAt: new Date(START).toISOString() });
  });

  it('defers rows over the per-user cap to the next run', async () => {
    for (let i = 0; i < 3; i++) await publishRemoval('user-1');
    await publishRemoval('user-2');

    expect(await h.container.notifications.sendPending(ctx, 10)).toEqual({ sent: 3, failed: 0, deferred: 1 });
    expect(rows().filter((n) => n.status === 'pending')).toHaveLength(1);

    expect(await h.container.notifications.sendPending(ctx, 10)).toEqual({ sent: 1, failed: 0, deferred: 0 });
  });

  it('schedules a retry after a failed delivery', async () => {
    await publishRemoval('user-1');
    h.email.failure = new Error('smtp down');

    expect(await h.container.notifications.sendPending(ctx, 10)).toEqual({ sent: 0, failed: 1, deferred: 0 });
    expect(rows()[0]).toMatchObject({
      status: 'failed',
      attempts: 1,
      nextRetryAt: new Date(START + 5 * 60_000).toISOString(),
      lastError: 'Email delivery failed: smtp down',
    });

    h.email.failure = null;
    expect(await h.container.notifications.retryFailed(ctx, 10)).toEqual({ sent: 0, failed: 0, deferred: 0 });

    h.clock.advance(5 * 60_000);
    expect(await h.container.notifications.retryFailed(ctx, 10)).toEqual({ sent: 1, failed: 0, deferred: 0 });
    expect(rows()[0]).toMatchObject({ status: 'sent', nextRetryAt: null, lastError: null });
  });

  it(`gives up after ${MAX_ATTEMPTS} attempts`, async () => {
    const notification = await publishRemoval('user-1');
    h.store.seed((state) => {
      const row = state.notifications.get(notification.id);
      if (row) {
        row.status = 'failed';
        row.attempts = MAX_ATTEMPTS - 1;
        row.nextRetryAt = new Date(START).toISOString();
      }
    });
    h.email.failure = new Error('smtp down');

    await h.container.notifications.retryFailed(ctx, 10);

    expect(rows()[0]).toMatchObject({ status: 'failed', attempts: MAX_ATTEMPTS, nextRetryAt: null });
  });

  it('fails rows whose user is gone', async () => {
    await publishRemoval('missing-user');

    expect(await h.container.notifications.sendPending(ctx, 10)).toEqual({ sent: 0, failed: 1, deferred: 0 });
    expect(rows()[0]?.lastError).toBe('user missing-user not found');
  });

  it('deletes sent rows past the retention window', async () => {
    const row = (id: string, status: Notification['status'], ageDays: number): Notification => ({
      id,
      userId: 'user-1',
      template: 'promotion_removed',
      data: {},
      status,
      attempts: 0,
      nextRetryAt: null,
      lastError: null,
      createdAt: new Date(START - ageDays * DAY).toISOString(),
      sentAt: null,
    });
    h.store.seed((state) => {
      for (const n of [row('old-sent', 'sent', 31), row('recent-sent', 'sent', 29), row('old-pending', 'pending', 40)]) {
        state.notifications.set(n.id, n);
      }
    });

    expect(await h.container.notifications.cleanupOld(ctx, 30)).toBe(1);
    expect(rows().map((n) => n.id)).toEqual(['recent-sent', 'old-pending']);
  });
});
