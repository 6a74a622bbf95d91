/**
 * Bookstore Demo - checkout to fulfilment, end to end, in one process
 *
 * This demo walks through:
 * 1. Cart, promotion and checkout with an online gateway (VNPay)
 * 2. A signed gateway callback settling the payment, then a replay of it
 * 3. A cash-on-delivery order confirmed and collected by an admin
 * 4. The worker draining the follow-up tasks (emails, stock sync, tracking)
 *
 * Everything runs on the in-memory store, keyspace and queue transport, so
 * no database or AWS account is needed.
 *
 * Usage:
 *   npm run build && npm run demo
 */

import { loadConfig } from './config/index.js';
import { createContainer } from './container.js';
import { MemoryStore } from './store/memory-store.js';
import { MemoryKeyValueStore } from './keyspace/memory-keyspace.js';
import { MemoryTransport } from './queues/memory-transport.js';
import { signVnpay } from './gateways/vnpay.js';
import { toWholeUnits } from './gateways/types.js';
import { createContext } from './utils/context.js';
import { formatMoney } from './utils/money.js';
import { createLogger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { getMetrics } from './observability/index.js';

const logger = createLogger('Demo');

const ADDRESS = {
  recipientName: 'Demo Customer',
  phone: '0900000000',
  line1: '1 Demo Street',
  city: 'Hanoi',
  latitude: 21.03,
  longitude: 105.85,
};

function seed(store: MemoryStore): void {
  const at = new Date().toISOString();
  store.seed((state) => {
    state.warehouses.set('wh-hn', {
      id: 'wh-hn',
      code: 'HN01',
      name: 'Hanoi',
      active: true,
      latitude: 21.0278,
      longitude: 105.8342,
    });
    state.warehouses.set('wh-hcm', {
      id: 'wh-hcm',
      code: 'HCM01',
      name: 'Ho Chi Minh City',
      active: true,
      latitude: 10.8231,
      longitude: 106.6297,
    });
    state.books.set('book-1', { id: 'book-1', title: 'Distributed Systems', price: 25_000_000, active: true });
    state.books.set('book-2', { id: 'book-2', title: 'Database Internals', price: 18_000_000, active: true });
    state.inventory.set('wh-hn|book-1', { warehouseId: 'wh-hn', bookId: 'book-1', quantity: 5, reserved: 0, updatedAt: at });
    state.inventory.set('wh-hcm|book-1', { warehouseId: 'wh-hcm', bookId: 'book-1', quantity: 20, reserved: 0, updatedAt: at });
    state.inventory.set('wh-hcm|book-2', { warehouseId: 'wh-hcm', bookId: 'book-2', quantity: 8, reserved: 0, updatedAt: at });
    state.promotions.set('promo-1', {
      id: 'promo-1',
      code: 'WELCOME10',
      rule: { type: 'percentage', percent: 10, maxDiscount: 5_000_000 },
      active: true,
      startsAt: new Date(Date.now() - 86_400_000).toISOString(),
      endsAt: new Date(Date.now() + 86_400_000).toISOString(),
      minOrderAmount: 0,
      maxUses: 100,
      maxUsesPerUser: 1,
      usedCount: 0,
    });
    for (const id of ['user-1', 'user-2']) {
      state.users.set(id, {
        id,
        email: `${id}@example.com`,
        fullName: id,
        isVerified: true,
        verificationToken: null,
        verificationTokenSentAt: null,
        resetToken: null,
        resetTokenSentAt: null,
      });
    }
  });
}

async function runDemo(): Promise<void> {
  console.log('\n=== BOOKSTORE DEMO: ORDER FULFILMENT PIPELINE ===\n');

  const config = loadConfig();
  const store = new MemoryStore();
  seed(store);
  const container = createContainer(config, {
    store,
    ks: new MemoryKeyValueStore(),
    transport: new MemoryTransport(),
  });
  const { carts, orders, payments, worker, stock, deadLetters } = container;

  // Step 1: online checkout
  logger.info('Step 1: VNPay checkout with a promotion...');
  const alice = createContext({ userId: 'user-1', role: 'user', clientIp: '127.0.0.1' });
  await carts.addItem(alice, { bookId: 'book-1', quantity: 2 });
  await carts.applyPromotion(alice, 'WELCOME10');
  const online = await orders.checkout(alice, { paymentMethod: 'vnpay', address: ADDRESS });
  console.log(`  order ${online.order.orderNumber}: total ${formatMoney(online.order.total)} (${online.order.status})`);
  console.log(`  redirect: ${online.payment?.redirectUrl ?? 'none'}`);

  // Step 2: gateway callback, then the same callback again
  if (online.payment) {
    logger.info('Step 2: Delivering the VNPay callback twice...');
    const params: Record<string, string> = {
      vnp_TmnCode: config.vnpay.tmnCode,
      vnp_TxnRef: online.payment.txnRef,
      vnp_Amount: String(toWholeUnits(online.payment.amount) * 100),
      vnp_ResponseCode: '00',
      vnp_TransactionStatus: '00',
      vnp_TransactionNo: '14000001',
    };
    params.vnp_SecureHash = signVnpay(params, config.vnpay.hashSecret);

    const gatewayCtx = createContext({ role: 'system' });
    const first = await payments.handleCallback(gatewayCtx, 'vnpay', params);
    const replay = await payments.handleCallback(gatewayCtx, 'vnpay', params);
    console.log(`  first ack:  ${JSON.stringify(first.body)}`);
    console.log(`  replay ack: ${JSON.stringify(replay.body)}`);
  }

  // Step 3: cash on delivery
  logger.info('Step 3: COD checkout and collection...');
  const bob = createContext({ userId: 'user-2', role: 'user', clientIp: '127.0.0.1' });
  await carts.addItem(bob, { bookId: 'book-2', quantity: 1 });
  const cod = await orders.checkout(bob, { paymentMethod: 'cod', address: ADDRESS });
  console.log(`  order ${cod.order.orderNumber}: ${cod.order.status}`);
  const admin = createContext({ userId: 'admin-1', role: 'admin' });
  const collected = await payments.confirmCodCollected(admin, cod.order.id);
  console.log(`  after collection: ${collected.status}`);

  // Step 4: drain the worker
  logger.info('Step 4: Running the worker until the queues are drained...');
  let handled = 0;
  for (let batch = await worker.runOnce(); batch > 0; batch = await worker.runOnce()) {
    handled += batch;
  }
  console.log(`  messages handled: ${handled}`);

  const summary = await stock.get(createContext({ role: 'system' }), 'book-1');
  console.log(`  book-1 available: ${summary.totalAvailable}`);
  const dead = await deadLetters.summary();
  console.log(`  dead letters: ${dead.total}`);

  const state = store.snapshot();
  console.log('\n=== FINAL ORDER STATES ===');
  for (const order of state.orders.values()) {
    console.log(`  ${order.orderNumber}  ${order.status.padEnd(10)} ${formatMoney(order.total)}`);
  }
  console.log(`\nMetrics buffered: ${getMetrics().getBuffer().length}\n`);
}

runDemo().catch((error) => {
  logger.error('Demo failed', { error: errorMessage(error) });
  process.exit(1);
});
