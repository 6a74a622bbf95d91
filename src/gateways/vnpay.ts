/**
 * VNPay gateway
 *
 * Signing: HMAC-SHA512, upper-case hex, over the canonical string built by
 * `canonicalize`. The outbound payment URL, the refund request and callback
 * verification all use that one canonicaliser, so a value with spaces or
 * reserved characters signs identically in both directions.
 *
 * Amounts travel as whole VND × 100.
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { DependencyError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { hmacHex, phpUrlEncode, signaturesMatch } from './signer.js';
import {
  gatewayTimestamp,
  toWholeUnits,
  type AckStatus,
  type FetchLike,
  type ParsedCallback,
  type PaymentGateway,
  type PaymentUrlRequest,
  type RefundRequest,
  type RefundResult,
  RefundRejectedError,
} from './types.js';

const logger = createLogger('VNPay');

const HASH_FIELDS = new Set(['vnp_SecureHash', 'vnp_SecureHashType']);

export const VNPAY_SUCCESS = '00';
export const VNPAY_CUSTOMER_CANCEL = '24';

export interface VnpayConfig {
  tmnCode: string;
  hashSecret: string;
  paymentUrl: string;
  returnUrl: string;
  refundUrl: string;
  timeoutMs: number;
}

/** Sorted `key=value` pairs, PHP-urlencoded, without hash fields or empty values. */
export function canonicalize(params: Record<string, string>): string {
  return Object.keys(params)
    .filter((key) => !HASH_FIELDS.has(key) && params[key] !== '')
    .sort()
    .map((key) => `${phpUrlEncode(key)}=${phpUrlEncode(params[key])}`)
    .join('&');
}

export function signVnpay(params: Record<string, string>, secret: string): string {
  return hmacHex('sha512', secret, canonicalize(params)).toUpperCase();
}

export function verifyVnpay(params: Record<string, string>, secret: string): boolean {
  const received = params.vnp_SecureHash;
  if (!received) {
    return false;
  }
  return signaturesMatch(signVnpay(params, secret), received);
}

const refundResponseSchema = z.object({
  vnp_ResponseCode: z.string(),
  vnp_Message: z.string().optional(),
  vnp_TransactionNo: z.string().optional(),
});

const ACKS: Record<AckStatus, { RspCode: string; Message: string }> = {
  confirmed: { RspCode: '00', Message: 'Confirm Success' },
  already_processed: { RspCode: '02', Message: 'Order already confirmed' },
  payment_not_found: { RspCode: '01', Message: 'Order not found' },
  amount_mismatch: { RspCode: '04', Message: 'Invalid amount' },
  invalid_signature: { RspCode: '97', Message: 'Invalid signature' },
};

export class VnpayGateway implements PaymentGateway {
  readonly name = 'vnpay' as const;

  constructor(
    private readonly config: VnpayConfig,
    private readonly fetchFn: FetchLike = fetch
  ) {}

  async createPaymentUrl(request: PaymentUrlRequest, _signal?: AbortSignal): Promise<string> {
    const params: Record<string, string> = {
      vnp_Version: '2.1.0',
      vnp_Command: 'pay',
      vnp_TmnCode: this.config.tmnCode,
      vnp_Amount: String(toWholeUnits(request.amount) * 100),
      vnp_CurrCode: 'VND',
      vnp_TxnRef: request.txnRef,
      vnp_OrderInfo: request.orderInfo,
      vnp_OrderType: 'other',
      vnp_Locale: 'vn',
      vnp_ReturnUrl: this.config.returnUrl,
      vnp_IpAddr: request.clientIp === '::1' ? '127.0.0.1' : request.clientIp,
      vnp_CreateDate: gatewayTimestamp(request.createdAt),
      vnp_ExpireDate: gatewayTimestamp(new Date(request.createdAt.getTime() + 30 * 60_000)),
    };

    const query = canonicalize(params);
    const secureHash = hmacHex('sha512', this.config.hashSecret, query).toUpperCase();
    return `${this.config.paymentUrl}?${query}&vnp_SecureHash=${secureHash}`;
  }

  parseCallback(params: Record<string, string>): ParsedCallback {
    const responseCode = params.vnp_ResponseCode ?? '';
    const transactionStatus = params.vnp_TransactionStatus;
    const amount = /^\d+$/.test(params.vnp_Amount ?? '') ? parseInt(params.vnp_Amount, 10) : null;

    let result: ParsedCallback['result'] = 'failure';
    if (responseCode === VNPAY_SUCCESS && (transactionStatus === undefined || transactionStatus === VNPAY_SUCCESS)) {
      result = 'success';
    } else if (responseCode === VNPAY_CUSTOMER_CANCEL) {
      result = 'cancelled';
    }

    return {
      gateway: 'vnpay',
      signatureValid: verifyVnpay(params, this.config.hashSecret),
      txnRef: params.vnp_TxnRef ?? '',
      // vnp_Amount is VND × 100, which equals the amount in minor units.
      amount,
      result,
      responseCode,
      transactionId: params.vnp_TransactionNo || null,
    };
  }

  acknowledge(status: AckStatus): Record<string, string> {
    return { ...ACKS[status] };
  }

  async refund(request: RefundRequest, signal: AbortSignal): Promise<RefundResult> {
    const now = new Date();
    const params: Record<string, string> = {
      vnp_RequestId: uuidv4().replace(/-/g, '').substring(0, 32),
      vnp_Version: '2.1.0',
      vnp_Command: 'refund',
      vnp_TmnCode: this.config.tmnCode,
      vnp_TransactionType: '02',
      vnp_TxnRef: request.txnRef,
      vnp_Amount: String(toWholeUnits(request.amount) * 100),
      vnp_OrderInfo: `Refund ${request.txnRef}`,
      vnp_TransactionNo: request.transactionId ?? '',
      vnp_TransactionDate: gatewayTimestamp(request.paidAt),
      vnp_CreateDate: gatewayTimestamp(now),
      vnp_CreateBy: request.requestedBy,
      vnp_IpAddr: '127.0.0.1',
    };
    const body = { ...params, vnp_SecureHash: signVnpay(params, this.config.hashSecret) };

    let response: Response;
    try {
      response = await this.fetchFn(this.config.refundUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.any([signal, AbortSignal.timeout(this.config.timeoutMs)]),
      });
    } catch (error) {
      logger.warn('VNPay refund call failed', { txnRef: request.txnRef, error: errorMessage(error) });
      throw new DependencyError('gateway_unavailable', 'VNPay refund call failed', { cause: error });
    }

    if (response.status >= 500) {
      throw new DependencyError('gateway_unavailable', `VNPay refund returned HTTP ${response.status}`);
    }

    const parsed = refundResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DependencyError('gateway_bad_response', 'VNPay refund response was malformed');
    }
    if (parsed.data.vnp_ResponseCode !== VNPAY_SUCCESS) {
      throw new RefundRejectedError(parsed.data.vnp_ResponseCode, parsed.data.vnp_Message ?? 'refund rejected');
    }

    return {
      refundTransactionId: parsed.data.vnp_TransactionNo ?? params.vnp_RequestId,
      responseCode: parsed.data.vnp_ResponseCode,
    };
  }
}
