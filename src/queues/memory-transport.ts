import { v4 as uuidv4 } from 'uuid';
import type { MessageAttributes, MessageTransport, ReceiveOptions, TransportMessage } from './transport.js';

interface StoredMessage {
  id: string;
  body: string;
  attributes: MessageAttributes;
  visibleAt: number;
  receiveCount: number;
  receiptHandle: string | null;
}

/**
 * In-process stand-in for SQS with delay and visibility semantics, driven by
 * an injectable clock so tests can step time forward.
 */
export class MemoryTransport implements MessageTransport {
  private readonly queues = new Map<string, StoredMessage[]>();
  private failSends = false;

  constructor(private readonly clock: () => number = Date.now) {}

  async send(
    queue: string,
    body: string,
    options: { delaySeconds?: number; attributes?: MessageAttributes } = {}
  ): Promise<string> {
    if (this.failSends) {
      throw new Error(`send to ${queue} failed`);
    }
    const message: StoredMessage = {
      id: uuidv4(),
      body,
      attributes: options.attributes ?? {},
      visibleAt: this.clock() + (options.delaySeconds ?? 0) * 1000,
      receiveCount: 0,
      receiptHandle: null,
    };
    this.list(queue).push(message);
    return message.id;
  }

  async receive(queue: string, options: ReceiveOptions): Promise<TransportMessage[]> {
    const now = this.clock();
    const batch = this.list(queue)
      .filter((message) => message.visibleAt <= now)
      .slice(0, options.maxMessages);

    return batch.map((message) => {
      message.receiveCount += 1;
      message.visibleAt = now + options.visibilityTimeoutSeconds * 1000;
      message.receiptHandle = uuidv4();
      return {
        id: message.id,
        receiptHandle: message.receiptHandle,
        body: message.body,
        attributes: { ...message.attributes },
        receiveCount: message.receiveCount,
      };
    });
  }

  async delete(queue: string, receiptHandle: string): Promise<void> {
    this.queues.set(
      queue,
      this.list(queue).filter((message) => message.receiptHandle !== receiptHandle)
    );
  }

  async changeVisibility(queue: string, receiptHandle: string, seconds: number): Promise<void> {
    const message = this.list(queue).find((m) => m.receiptHandle === receiptHandle);
    if (message) {
      message.visibleAt = this.clock() + seconds * 1000;
    }
  }

  async purge(queue: string): Promise<void> {
    this.queues.set(queue, []);
  }

  /** Make every following send reject, to exercise enqueue failure paths. */
  setFailSends(fail: boolean): void {
    this.failSends = fail;
  }

  /** Message bodies currently held by a queue, visible or not. */
  bodies(queue: string): string[] {
    return this.list(queue).map((message) => message.body);
  }

  /** Milliseconds until each held message becomes visible (0 when visible now). */
  delays(queue: string): number[] {
    const now = this.clock();
    return this.list(queue).map((message) => Math.max(0, message.visibleAt - now));
  }

  private list(queue: string): StoredMessage[] {
    let messages = this.queues.get(queue);
    if (!messages) {
      messages = [];
      this.queues.set(queue, messages);
    }
    return messages;
  }
}
