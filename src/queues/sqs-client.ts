/**
 * AWS SQS Client Configuration
 *
 * Uses AWS SDK v3 with support for:
 * - LocalStack for local development
 * - Real AWS for production
 *
 * `SqsTransport` is the job queue's view of SQS; the free functions below
 * are the queue administration calls used by the queue manager.
 */

import {
  SQSClient,
  CreateQueueCommand,
  DeleteQueueCommand,
  GetQueueUrlCommand,
  GetQueueAttributesCommand,
  SetQueueAttributesCommand,
  SendMessageCommand,
  ReceiveMessageCommand,
  DeleteMessageCommand,
  ChangeMessageVisibilityCommand,
  ListQueuesCommand,
  PurgeQueueCommand,
  type SendMessageCommandInput,
  type Message,
} from '@aws-sdk/client-sqs';
import { createLogger } from '../utils/logger.js';
import { DependencyError } from '../utils/errors.js';
import type { MessageAttributes, MessageTransport, ReceiveOptions, TransportMessage } from './transport.js';

const logger = createLogger('SQS-Client');

export interface SqsSettings {
  region: string;
  useLocalstack: boolean;
  localstackEndpoint: string;
}

function clientConfig(settings: SqsSettings) {
  if (settings.useLocalstack) {
    return {
      region: settings.region,
      endpoint: settings.localstackEndpoint,
      credentials: {
        accessKeyId: 'test',
        secretAccessKey: 'test',
      },
    };
  }

  return { region: settings.region };
}

// Singleton SQS client
let sqsClient: SQSClient | null = null;

export function getSQSClient(settings: SqsSettings): SQSClient {
  if (!sqsClient) {
    const config = clientConfig(settings);
    sqsClient = new SQSClient(config);
    logger.info('SQS client initialized', { region: config.region, endpoint: settings.useLocalstack ? settings.localstackEndpoint : undefined });
  }
  return sqsClient;
}

function required(value: string | undefined, what: string): string {
  if (!value) {
    throw new DependencyError('queue_unavailable', `SQS response missing ${what}`);
  }
  return value;
}

// Queue management functions
export async function createQueue(
  client: SQSClient,
  queueName: string,
  options: {
    visibilityTimeout?: number;
    messageRetentionPeriod?: number;
  } = {}
): Promise<string> {
  const command = new CreateQueueCommand({
    QueueName: queueName,
    Attributes: {
      VisibilityTimeout: String(options.visibilityTimeout ?? 30),
      MessageRetentionPeriod: String(options.messageRetentionPeriod ?? 345600), // 4 days
    },
  });

  const response = await client.send(command);
  logger.info(`Queue created: ${queueName}`, { queueUrl: response.QueueUrl });

  return required(response.QueueUrl, 'QueueUrl');
}

export async function getQueueUrl(client: SQSClient, queueName: string): Promise<string> {
  const response = await client.send(new GetQueueUrlCommand({ QueueName: queueName }));
  return required(response.QueueUrl, 'QueueUrl');
}

export async function getQueueArn(client: SQSClient, queueUrl: string): Promise<string> {
  const response = await client.send(
    new GetQueueAttributesCommand({
      QueueUrl: queueUrl,
      AttributeNames: ['QueueArn'],
    })
  );
  return required(response.Attributes?.QueueArn, 'QueueArn');
}

/**
 * Safety net for messages whose handler crashes the process before the worker
 * can record the failure; ordinary failures are dead-lettered by the worker.
 */
export async function configureDeadLetterQueue(
  client: SQSClient,
  sourceQueueUrl: string,
  dlqArn: string,
  maxReceiveCount: number
): Promise<void> {
  await client.send(
    new SetQueueAttributesCommand({
      QueueUrl: sourceQueueUrl,
      Attributes: {
        RedrivePolicy: JSON.stringify({ deadLetterTargetArn: dlqArn, maxReceiveCount }),
      },
    })
  );
  logger.info('Dead letter queue configured', { sourceQueueUrl, dlqArn, maxReceiveCount });
}

export async function deleteQueue(client: SQSClient, queueUrl: string): Promise<void> {
  await client.send(new DeleteQueueCommand({ QueueUrl: queueUrl }));
  logger.info(`Queue deleted: ${queueUrl}`);
}

export async function listQueues(client: SQSClient, prefix?: string): Promise<string[]> {
  const response = await client.send(new ListQueuesCommand({ QueueNamePrefix: prefix }));
  return response.QueueUrls ?? [];
}

function toTransportMessage(message: Message): TransportMessage | null {
  if (!message.MessageId || !message.ReceiptHandle || message.Body === undefined) {
    return null;
  }
  return {
    id: message.MessageId,
    receiptHandle: message.ReceiptHandle,
    body: message.Body,
    attributes: message.MessageAttributes ?? {},
    receiveCount: parseInt(message.Attributes?.ApproximateReceiveCount ?? '1', 10),
  };
}

export class SqsTransport implements MessageTransport {
  private readonly urls = new Map<string, string>();

  constructor(private readonly client: SQSClient) {}

  async send(
    queue: string,
    body: string,
    options: { delaySeconds?: number; attributes?: MessageAttributes } = {}
  ): Promise<string> {
    const input: SendMessageCommandInput = {
      QueueUrl: await this.url(queue),
      MessageBody: body,
      DelaySeconds: options.delaySeconds,
      MessageAttributes: options.attributes,
    };
    const response = await this.client.send(new SendMessageCommand(input));

    logger.debug('Message sent', { queue, messageId: response.MessageId });
    return required(response.MessageId, 'MessageId');
  }

  async receive(queue: string, options: ReceiveOptions): Promise<TransportMessage[]> {
    const response = await this.client.send(
      new ReceiveMessageCommand({
        QueueUrl: await this.url(queue),
        MaxNumberOfMessages: options.maxMessages,
        VisibilityTimeout: options.visibilityTimeoutSeconds,
        WaitTimeSeconds: options.waitTimeSeconds,
        MessageAttributeNames: ['All'],
        AttributeNames: ['All'],
      })
    );

    return (response.Messages ?? []).flatMap((message) => {
      const converted = toTransportMessage(message);
      return converted ? [converted] : [];
    });
  }

  async delete(queue: string, receiptHandle: string): Promise<void> {
    await this.client.send(
      new DeleteMessageCommand({
        QueueUrl: await this.url(queue),
        ReceiptHandle: receiptHandle,
      })
    );
    logger.debug('Message deleted', { queue, receiptHandle: receiptHandle.substring(0, 20) });
  }

  async changeVisibility(queue: string, receiptHandle: string, seconds: number): Promise<void> {
    await this.client.send(
      new ChangeMessageVisibilityCommand({
        QueueUrl: await this.url(queue),
        ReceiptHandle: receiptHandle,
        VisibilityTimeout: seconds,
      })
    );
  }

  async purge(queue: string): Promise<void> {
    await this.client.send(new PurgeQueueCommand({ QueueUrl: await this.url(queue) }));
    logger.info(`Queue purged: ${queue}`);
  }

  private async url(queue: string): Promise<string> {
    const cached = this.urls.get(queue);
    if (cached) return cached;
    const url = await getQueueUrl(this.client, queue);
    this.urls.set(queue, url);
    return url;
  }
}
