import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryKeyValueStore } from '../../src/keyspace/memory-keyspace.js';
import { MemoryTransport } from '../../src/queues/memory-transport.js';
import { JobClient } from '../../src/queues/job-client.js';
import { Scheduler, defaultSchedule } from '../../src/queues/scheduler.js';
import { TASK_TYPES, physicalQueueName, taskEnvelopeSchema } from '../../src/queues/task.js';
import { ManualClock, START } from '../support/fixtures.js';

const limits = {
  releaseExpiredReservationsLimit: 100,
  removeExpiredPromotionsLimit: 100,
  sendPendingLimit: 50,
  retryFailedLimit: 25,
  notificationRetentionDays: 30,
};

const at = (iso: string) => new Date(iso);

describe('defaultSchedule', () => {
  it('registers the six recurring jobs', () => {
    expect(defaultSchedule(limits).map((e) => [e.type, e.cron, e.queue])).toEqual([
      [TASK_TYPES.CLEANUP_EXPIRED_TOKENS, '0 2 * * *', 'auth'],
      [TASK_TYPES.NOTIFICATION_CLEANUP_OLD, '0 3 * * *', 'notification'],
      [TASK_TYPES.NOTIFICATION_SEND_PENDING, '0 7 * * *', 'notification'],
      [TASK_TYPES.REMOVE_EXPIRED_PROMOTIONS, '0 */3 * * *', 'promotion'],
      [TASK_TYPES.NOTIFICATION_RETRY_FAILED, '*/360 * * * *', 'notification'],
      [TASK_TYPES.RELEASE_EXPIRED_RESERVATIONS, '*/5 * * * *', 'default'],
    ]);
  });
});

describe('Scheduler', () => {
  let clock: ManualClock;
  let ks: MemoryKeyValueStore;
  let transport: MemoryTransport;
  let jobs: JobClient;
  let scheduler: Scheduler;

  beforeEach(() => {
    clock = new ManualClock();
    ks = new MemoryKeyValueStore(clock.read);
    transport = new MemoryTransport(clock.read);
    jobs = new JobClient(transport, ks, { prefix: 'test', clock: clock.read });
    scheduler = new Scheduler(jobs, ks, defaultSchedule(limits), { clock: clock.read });
  });

  it('enqueues every entry due in the current minute', async () => {
    const enqueued = await scheduler.tick(at('2026-03-02T09:00:20.000Z'));

    expect(enqueued.map((t) => t.type)).toEqual([
      TASK_TYPES.REMOVE_EXPIRED_PROMOTIONS,
      TASK_TYPES.NOTIFICATION_RETRY_FAILED,
      TASK_TYPES.RELEASE_EXPIRED_RESERVATIONS,
    ]);

    const [sweep] = transport.bodies(physicalQueueName('test', 'promotion')).map((b) => taskEnvelopeSchema.parse(JSON.parse(b)));
    expect(sweep).toMatchObject({
      type: TASK_TYPES.REMOVE_EXPIRED_PROMOTIONS,
      payload: { limit: 100, offset: 0 },
      maxRetry: 2,
      timeoutMs: 600_000,
    });
  });

  it('fires nothing between schedules', async () => {
    expect(await scheduler.tick(at('2026-03-02T09:17:00.000Z'))).toEqual([]);
  });

  it('claims each run once across scheduler instances', async () => {
    const other = new Scheduler(jobs, ks, defaultSchedule(limits), { clock: clock.read });

    expect(await scheduler.tick(at('2026-03-02T07:00:00.000Z'))).toHaveLength(3);
    expect(await other.tick(at('2026-03-02T07:00:00.000Z'))).toEqual([]);
    expect(transport.bodies(physicalQueueName('test', 'notification'))).toHaveLength(2);
  });

  it('does not fire the same minute twice on one instance', async () => {
    await scheduler.tick(at('2026-03-02T09:00:00.000Z'));
    expect(await scheduler.tick(at('2026-03-02T09:00:40.000Z'))).toEqual([]);
  });

  it('catches up on minutes missed since the previous tick', async () => {
    expect(await scheduler.tick(new Date(START))).toHaveLength(2);

    const enqueued = await scheduler.tick(at('2026-03-02T09:30:00.000Z'));
    expect(enqueued.filter((t) => t.type !== TASK_TYPES.RELEASE_EXPIRED_RESERVATIONS).map((t) => t.type)).toEqual([
      TASK_TYPES.REMOVE_EXPIRED_PROMOTIONS,
      TASK_TYPES.NOTIFICATION_RETRY_FAILED,
    ]);
    // 08:05 through 09:30
    expect(enqueued.filter((t) => t.type === TASK_TYPES.RELEASE_EXPIRED_RESERVATIONS)).toHaveLength(18);
    expect(enqueued.every((t) => t.notBefore === null)).toBe(true);
  });

  it('replays at most an hour after a stall', async () => {
    await scheduler.tick(new Date(START));
    const enqueued = await scheduler.tick(at('2026-03-02T12:30:00.000Z'));
    expect(enqueued.filter((t) => t.type !== TASK_TYPES.RELEASE_EXPIRED_RESERVATIONS).map((t) => t.type)).toEqual([
      TASK_TYPES.REMOVE_EXPIRED_PROMOTIONS,
      TASK_TYPES.NOTIFICATION_RETRY_FAILED,
    ]);
    // 11:35 through 12:30
    expect(enqueued.filter((t) => t.type === TASK_TYPES.RELEASE_EXPIRED_RESERVATIONS)).toHaveLength(12);
  });

  it('swallows keyspace outages without enqueueing', async () => {
    ks.setAvailable(false);
    expect(await scheduler.tick(at('2026-03-02T09:00:00.000Z'))).toEqual([]);
    expect(transport.bodies(physicalQueueName('test', 'promotion'))).toEqual([]);
  });

  it('reports the next run of every entry', () => {
    expect(scheduler.nextRuns(new Date(START))).toEqual([
      { type: TASK_TYPES.CLEANUP_EXPIRED_TOKENS, cron: '0 2 * * *', nextRunAt: '2026-03-03T02:00:00.000Z' },
      { type: TASK_TYPES.NOTIFICATION_CLEANUP_OLD, cron: '0 3 * * *', nextRunAt: '2026-03-03T03:00:00.000Z' },
      { type: TASK_TYPES.NOTIFICATION_SEND_PENDING, cron: '0 7 * * *', nextRunAt: '2026-03-03T07:00:00.000Z' },
      { type: TASK_TYPES.REMOVE_EXPIRED_PROMOTIONS, cron: '0 */3 * * *', nextRunAt: '2026-03-02T09:00:00.000Z' },
      { type: TASK_TYPES.NOTIFICATION_RETRY_FAILED, cron: '*/360 * * * *', nextRunAt: '2026-03-02T09:00:00.000Z' },
      { type: TASK_TYPES.RELEASE_EXPIRED_RESERVATIONS, cron: '*/5 * * * *', nextRunAt: '2026-03-02T08:05:00.000Z' },
    ]);
  });
});
