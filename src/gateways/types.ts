import type { Gateway } from '../types/index.js';
import type { Money } from '../utils/money.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface PaymentUrlRequest {
  txnRef: string;
  amount: Money;
  orderInfo: string;
  clientIp: string;
  createdAt: Date;
}

export type CallbackResult = 'success' | 'cancelled' | 'failure';

/** A gateway callback reduced to what the payment coordinator needs. */
export interface ParsedCallback {
  gateway: Gateway;
  signatureValid: boolean;
  txnRef: string;
  /** Amount reported by the gateway in minor units; null when unparseable. */
  amount: Money | null;
  result: CallbackResult;
  responseCode: string;
  transactionId: string | null;
}

export type AckStatus =
  | 'confirmed'
  | 'already_processed'
  | 'invalid_signature'
  | 'payment_not_found'
  | 'amount_mismatch';

export interface RefundRequest {
  txnRef: string;
  amount: Money;
  transactionId: string | null;
  paidAt: Date;
  requestedBy: string;
}

export interface RefundResult {
  refundTransactionId: string;
  responseCode: string;
}

export interface PaymentGateway {
  readonly name: Gateway;
  createPaymentUrl(request: PaymentUrlRequest, signal: AbortSignal): Promise<string>;
  parseCallback(params: Record<string, string>): ParsedCallback;
  /** Response body in the gateway's own acknowledgement convention. */
  acknowledge(status: AckStatus): Record<string, string | number>;
  refund(request: RefundRequest, signal: AbortSignal): Promise<RefundResult>;
}

/** Gateway amounts are whole VND; minor units are rounded to the unit. */
export function toWholeUnits(amount: Money): number {
  return Math.round(amount / 100);
}

/** `yyyyMMddHHmmss` in Indochina Time (UTC+7), as both gateways expect. */
export function gatewayTimestamp(date: Date): string {
  const shifted = new Date(date.getTime() + 7 * 60 * 60 * 1000);
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    String(shifted.getUTCFullYear()) +
    pad(shifted.getUTCMonth() + 1) +
    pad(shifted.getUTCDate()) +
    pad(shifted.getUTCHours()) +
    pad(shifted.getUTCMinutes()) +
    pad(shifted.getUTCSeconds())
  );
}

/** The gateway answered and declined; retrying the same request will not help. */
export class RefundRejectedError extends Error {
  constructor(
    readonly responseCode: string,
    message: string
  ) {
    super(`Refund rejected [${responseCode}]: ${message}`);
    this.name = 'RefundRejectedError';
  }
}
