import type { TraceAttribute } from '../observability/index.js';

export type MessageAttributes = Record<string, { DataType: string; StringValue: string }>;

export interface TransportMessage {
  id: string;
  receiptHandle: string;
  body: string;
  attributes: Record<string, TraceAttribute | undefined>;
  receiveCount: number;
}

export interface ReceiveOptions {
  maxMessages: number;
  waitTimeSeconds: number;
  visibilityTimeoutSeconds: number;
}

/**
 * The slice of SQS the job queue relies on. Queue arguments are physical
 * queue names; adapters resolve them to URLs as needed.
 */
export interface MessageTransport {
  send(queue: string, body: string, options?: { delaySeconds?: number; attributes?: MessageAttributes }): Promise<string>;
  receive(queue: string, options: ReceiveOptions): Promise<TransportMessage[]>;
  delete(queue: string, receiptHandle: string): Promise<void>;
  changeVisibility(queue: string, receiptHandle: string, seconds: number): Promise<void>;
  purge(queue: string): Promise<void>;
}
