/**
 * MoMo gateway
 *
 * Signing: HMAC-SHA256, lower-case hex, over `key=value` pairs joined by `&`
 * in the fixed field order MoMo publishes for each message type (not sorted
 * and not URL-encoded). Amounts are whole VND.
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { DependencyError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { hmacHex, signaturesMatch } from './signer.js';
import {
  toWholeUnits,
  RefundRejectedError,
  type AckStatus,
  type FetchLike,
  type ParsedCallback,
  type PaymentGateway,
  type PaymentUrlRequest,
  type RefundRequest,
  type RefundResult,
} from './types.js';

const logger = createLogger('MoMo');

export const MOMO_SUCCESS = 0;
export const MOMO_CUSTOMER_CANCEL = 9000;

const CREATE_FIELDS = [
  'accessKey',
  'amount',
  'extraData',
  'ipnUrl',
  'orderId',
  'orderInfo',
  'partnerCode',
  'redirectUrl',
  'requestId',
  'requestType',
] as const;

const IPN_FIELDS = [
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

const REFUND_FIELDS = ['accessKey', 'amount', 'description', 'orderId', 'partnerCode', 'requestId', 'transId'] as const;

export interface MomoConfig {
  partnerCode: string;
  accessKey: string;
  secretKey: string;
  endpoint: string;
  refundEndpoint: string;
  redirectUrl: string;
  ipnUrl: string;
  timeoutMs: number;
}

/** `field=value&...` in the given order; missing fields sign as empty. */
export function momoRawSignature(fields: readonly string[], values: Record<string, string>): string {
  return fields.map((field) => `${field}=${values[field] ?? ''}`).join('&');
}

export function signMomo(fields: readonly string[], values: Record<string, string>, secret: string): string {
  return hmacHex('sha256', secret, momoRawSignature(fields, values));
}

const createResponseSchema = z.object({
  resultCode: z.number(),
  message: z.string().optional(),
  payUrl: z.string().optional(),
});

const refundResponseSchema = z.object({
  resultCode: z.number(),
  message: z.string().optional(),
  transId: z.union([z.number(), z.string()]).optional(),
});

export class MomoGateway implements PaymentGateway {
  readonly name = 'momo' as const;

  constructor(
    private readonly config: MomoConfig,
    private readonly fetchFn: FetchLike = fetch
  ) {}

  async createPaymentUrl(request: PaymentUrlRequest, signal: AbortSignal): Promise<string> {
    const values: Record<string, string> = {
      accessKey: this.config.accessKey,
      amount: String(toWholeUnits(request.amount)),
      extraData: '',
      ipnUrl: this.config.ipnUrl,
      orderId: request.txnRef,
      orderInfo: request.orderInfo,
      partnerCode: this.config.partnerCode,
      redirectUrl: this.config.redirectUrl,
      requestId: uuidv4(),
      requestType: 'captureWallet',
    };
    const body = {
      ...values,
      amount: Number(values.amount),
      signature: signMomo(CREATE_FIELDS, values, this.config.secretKey),
      lang: 'vi',
    };

    const data = await this.post(this.config.endpoint, body, signal, createResponseSchema);
    if (data.resultCode !== MOMO_SUCCESS || !data.payUrl) {
      logger.warn('MoMo rejected payment creation', { txnRef: request.txnRef, resultCode: data.resultCode });
      throw new DependencyError('gateway_rejected', `MoMo create failed: ${data.message ?? data.resultCode}`);
    }
    return data.payUrl;
  }

  parseCallback(params: Record<string, string>): ParsedCallback {
    const resultCode = Number(params.resultCode);
    const amount = /^\d+$/.test(params.amount ?? '') ? parseInt(params.amount, 10) * 100 : null;
    const expected = signMomo(IPN_FIELDS, { ...params, accessKey: this.config.accessKey }, this.config.secretKey);

    let result: ParsedCallback['result'] = 'failure';
    if (params.resultCode !== undefined && params.resultCode !== '' && resultCode === MOMO_SUCCESS) {
      result = 'success';
    } else if (resultCode === MOMO_CUSTOMER_CANCEL) {
      result = 'cancelled';
    }

    return {
      gateway: 'momo',
      signatureValid: Boolean(params.signature) && signaturesMatch(expected, params.signature),
      txnRef: params.orderId ?? '',
      amount,
      result,
      responseCode: params.resultCode ?? '',
      transactionId: params.transId || null,
    };
  }

  acknowledge(status: AckStatus): Record<string, string | number> {
    const ok = status === 'confirmed' || status === 'already_processed';
    return { resultCode: ok ? 0 : 1, message: ok ? 'Success' : status };
  }

  async refund(request: RefundRequest, signal: AbortSignal): Promise<RefundResult> {
    const values: Record<string, string> = {
      accessKey: this.config.accessKey,
      amount: String(toWholeUnits(request.amount)),
      description: `Refund ${request.txnRef}`,
      orderId: `${request.txnRef}-R${Date.now()}`,
      partnerCode: this.config.partnerCode,
      requestId: uuidv4(),
      transId: request.transactionId ?? '',
    };
    const body = {
      ...values,
      amount: Number(values.amount),
      transId: Number(values.transId),
      signature: signMomo(REFUND_FIELDS, values, this.config.secretKey),
      lang: 'vi',
    };

    const data = await this.post(this.config.refundEndpoint, body, signal, refundResponseSchema);
    if (data.resultCode !== MOMO_SUCCESS) {
      throw new RefundRejectedError(String(data.resultCode), data.message ?? 'refund rejected');
    }
    return {
      refundTransactionId: data.transId !== undefined ? String(data.transId) : values.requestId,
      responseCode: String(data.resultCode),
    };
  }

  private async post<T>(url: string, body: unknown, signal: AbortSignal, schema: z.ZodType<T>): Promise<T> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.any([signal, AbortSignal.timeout(this.config.timeoutMs)]),
      });
    } catch (error) {
      logger.warn('MoMo call failed', { url, error: errorMessage(error) });
      throw new DependencyError('gateway_unavailable', 'MoMo call failed', { cause: error });
    }

    if (response.status >= 500) {
      throw new DependencyError('gateway_unavailable', `MoMo returned HTTP ${response.status}`);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DependencyError('gateway_bad_response', 'MoMo response was malformed');
    }
    return parsed.data;
  }
}
