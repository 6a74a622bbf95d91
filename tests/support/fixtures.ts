import { loadConfig, type AppConfig } from '../../src/config/index.js';
import { createContainer, type Container } from '../../src/container.js';
import { MemoryStore } from '../../src/store/memory-store.js';
import { MemoryKeyValueStore } from '../../src/keyspace/memory-keyspace.js';
import { MemoryTransport } from '../../src/queues/memory-transport.js';
import { VnpayGateway, signVnpay } from '../../src/gateways/vnpay.js';
import { MomoGateway, signMomo } from '../../src/gateways/momo.js';
import { toWholeUnits, type FetchLike, type PaymentGateway } from '../../src/gateways/types.js';
import type { EmailMessage, EmailSender } from '../../src/services/notification-service.js';
import { createContext, type RequestContext } from '../../src/utils/context.js';
import type { Gateway, Promotion, ShippingAddress, User } from '../../src/types/index.js';

export const START = Date.parse('2026-03-02T08:00:00.000Z');

export class ManualClock {
  constructor(public now: number = START) {}

  readonly read = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export const TEST_ENV: Record<string, string> = {
  NODE_ENV: 'test',
  LOG_LEVEL: 'silent',
  JWT_SECRET: 'test-secret-jwt',
  SERVICE_API_KEY: 'test-service-key',
  VNPAY_TMN_CODE: 'TESTTMN1',
  VNPAY_HASH_SECRET: 'test-secret',
  MOMO_PARTNER_CODE: 'TESTMOMO',
  MOMO_ACCESS_KEY: 'test-access',
  MOMO_SECRET_KEY: 'test-secret',
  SHIPPING_FEE: '15000',
};

export function testConfig(extra: Record<string, string> = {}): AppConfig {
  return loadConfig({ ...TEST_ENV, ...extra });
}

export class RecordingEmailSender implements EmailSender {
  readonly sent: EmailMessage[] = [];
  failure: Error | null = null;

  async send(message: EmailMessage): Promise<string> {
    if (this.failure) throw this.failure;
    this.sent.push(message);
    return `msg-${this.sent.length}`;
  }
}

export interface StubReply {
  status: number;
  body: unknown;
}

/** Stands in for the gateways' HTTP endpoints. */
export class GatewayStub {
  readonly calls: Array<{ url: string; body: unknown }> = [];
  networkDown = false;
  reply: (url: string, body: unknown) => StubReply = defaultReply;

  readonly fetch: FetchLike = async (url, init) => {
    const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : null;
    this.calls.push({ url, body });
    if (this.networkDown) throw new TypeError('fetch failed');
    const { status, body: payload } = this.reply(url, body);
    return new Response(JSON.stringify(payload), { status, headers: { 'Content-Type': 'application/json' } });
  };
}

function defaultReply(url: string): StubReply {
  if (url.includes('merchant_webapi')) {
    return { status: 200, body: { vnp_ResponseCode: '00', vnp_TransactionNo: 'VNREF-1' } };
  }
  if (url.endsWith('/refund')) {
    return { status: 200, body: { resultCode: 0, message: 'Success', transId: 5550001 } };
  }
  return { status: 200, body: { resultCode: 0, message: 'Success', payUrl: 'https://momo.test/pay/1' } };
}

export interface Harness {
  clock: ManualClock;
  config: AppConfig;
  store: MemoryStore;
  ks: MemoryKeyValueStore;
  transport: MemoryTransport;
  email: RecordingEmailSender;
  gateway: GatewayStub;
  container: Container;
}

export function createHarness(options: { env?: Record<string, string> } = {}): Harness {
  const clock = new ManualClock();
  const config = testConfig(options.env);
  const store = new MemoryStore();
  const ks = new MemoryKeyValueStore(clock.read);
  const transport = new MemoryTransport(clock.read);
  const email = new RecordingEmailSender();
  const gateway = new GatewayStub();
  const gateways = new Map<Gateway, PaymentGateway>([
    ['vnpay', new VnpayGateway({ ...config.vnpay, timeoutMs: 1000 }, gateway.fetch)],
    ['momo', new MomoGateway({ ...config.momo, timeoutMs: 1000 }, gateway.fetch)],
  ]);

  const container = createContainer(config, { store, ks, transport, email, gateways, clock: clock.read });
  return { clock, config, store, ks, transport, email, gateway, container };
}

// ---------------------------------------------------------------------------
// Seed data
// ---------------------------------------------------------------------------

/** Near the Hanoi warehouse. */
export const HANOI: ShippingAddress = {
  recipientName: 'Test Reader',
  phone: '0900000001',
  line1: '12 Test Street',
  city: 'Hanoi',
  latitude: 21.03,
  longitude: 105.85,
};

/** Near the Ho Chi Minh City warehouse. */
export const SAIGON: ShippingAddress = {
  ...HANOI,
  city: 'Ho Chi Minh City',
  latitude: 10.78,
  longitude: 106.7,
};

export const BOOK_PRICE = 10_000_000;
export const BOOK2_PRICE = 5_000_000;

function user(id: string): User {
  return {
    id,
    email: `${id}@example.test`,
    fullName: `Reader ${id}`,
    isVerified: true,
    verificationToken: null,
    verificationTokenSentAt: null,
    resetToken: null,
    resetTokenSentAt: null,
  };
}

/**
 * Two warehouses, two books, three users:
 * - wh-hn (Hanoi): book-1 × 5
 * - wh-hcm (Ho Chi Minh City): book-1 × 20, book-2 × 3
 */
export function seedCatalog(store: MemoryStore, at = new Date(START).toISOString()): void {
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
    state.books.set('book-1', { id: 'book-1', title: 'Test Book One', price: BOOK_PRICE, active: true });
    state.books.set('book-2', { id: 'book-2', title: 'Test Book Two', price: BOOK2_PRICE, active: true });
    state.inventory.set('wh-hn|book-1', { warehouseId: 'wh-hn', bookId: 'book-1', quantity: 5, reserved: 0, updatedAt: at });
    state.inventory.set('wh-hcm|book-1', { warehouseId: 'wh-hcm', bookId: 'book-1', quantity: 20, reserved: 0, updatedAt: at });
    state.inventory.set('wh-hcm|book-2', { warehouseId: 'wh-hcm', bookId: 'book-2', quantity: 3, reserved: 0, updatedAt: at });
    for (const id of ['user-1', 'user-2', 'user-3']) state.users.set(id, user(id));
  });
}

export function seedPromotion(store: MemoryStore, overrides: Partial<Promotion> = {}): Promotion {
  const promotion: Promotion = {
    id: 'promo-1',
    code: 'SAVE10',
    rule: { type: 'percentage', percent: 10, maxDiscount: null },
    active: true,
    startsAt: new Date(START - 86_400_000).toISOString(),
    endsAt: new Date(START + 86_400_000).toISOString(),
    minOrderAmount: 0,
    maxUses: null,
    maxUsesPerUser: null,
    usedCount: 0,
    ...overrides,
  };
  store.seed((state) => {
    state.promotions.set(promotion.id, promotion);
  });
  return promotion;
}

/** Set book stock at a warehouse directly. */
export function setStock(store: MemoryStore, warehouseId: string, bookId: string, quantity: number, reserved = 0): void {
  store.seed((state) => {
    state.inventory.set(`${warehouseId}|${bookId}`, {
      warehouseId,
      bookId,
      quantity,
      reserved,
      updatedAt: new Date(START).toISOString(),
    });
  });
}

// ---------------------------------------------------------------------------
// Contexts & callbacks
// ---------------------------------------------------------------------------

export const userCtx = (userId: string): RequestContext =>
  createContext({ userId, role: 'user', clientIp: '10.0.0.1' });
export const adminCtx = (): RequestContext => createContext({ userId: 'admin-1', role: 'admin' });
export const systemCtx = (): RequestContext => createContext({ role: 'system' });

export async function fillCart(
  h: Harness,
  userId: string,
  lines: Array<{ bookId: string; quantity: number }>
): Promise<void> {
  for (const line of lines) {
    await h.container.carts.addItem(userCtx(userId), line);
  }
}

export function vnpayCallback(
  config: AppConfig,
  payment: { txnRef: string; amount: number },
  overrides: Record<string, string> = {}
): Record<string, string> {
  const params: Record<string, string> = {
    vnp_TmnCode: config.vnpay.tmnCode,
    vnp_TxnRef: payment.txnRef,
    vnp_Amount: String(toWholeUnits(payment.amount) * 100),
    vnp_ResponseCode: '00',
    vnp_TransactionStatus: '00',
    vnp_TransactionNo: '14000001',
    vnp_PayDate: '20260302150500',
    ...overrides,
  };
  return { ...params, vnp_SecureHash: signVnpay(params, config.vnpay.hashSecret) };
}

const MOMO_IPN_FIELDS = [
  'accessKey',
  'amount',
  'extraData',
  'message',
  'orderId',
  'orderInfo',
  'orderType',
  'partnerCode',
  'payType',
  'requestId',
  'responseTime',
  'resultCode',
  'transId',
] as const;

export function momoCallback(
  config: AppConfig,
  payment: { txnRef: string; amount: number },
  overrides: Record<string, string> = {}
): Record<string, string> {
  const params: Record<string, string> = {
    partnerCode: config.momo.partnerCode,
    orderId: payment.txnRef,
    requestId: 'req-1',
    amount: String(toWholeUnits(payment.amount)),
    orderInfo: 'Payment',
    orderType: 'momo_wallet',
    transId: '2900001',
    resultCode: '0',
    message: 'Successful.',
    payType: 'qr',
    responseTime: '1772438700000',
    extraData: '',
    ...overrides,
  };
  const signature = signMomo(MOMO_IPN_FIELDS, { ...params, accessKey: config.momo.accessKey }, config.momo.secretKey);
  return { ...params, signature };
}

/** Run the worker until every queue comes back empty. */
export async function drainWorker(h: Harness, maxRounds = 50): Promise<number> {
  let handled = 0;
  for (let round = 0; round < maxRounds; round++) {
    const batch = await h.container.worker.runOnce();
    if (batch === 0) break;
    handled += batch;
  }
  return handled;
}
