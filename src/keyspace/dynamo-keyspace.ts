/**
 * DynamoDB keyspace
 *
 * Single-table layout: partition key `key`, string `value`, numeric
 * `counter`, and `expiresAt` (epoch seconds) registered as the table's TTL
 * attribute. DynamoDB deletes expired items lazily, so reads and the SETNX
 * condition re-check `expiresAt` themselves.
 *
 * Uses the same LocalStack/AWS switch as the SQS client.
 */

import { DynamoDBClient, DescribeTableCommand } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  DeleteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import { DependencyError, TimeoutError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { KeyValueStore } from './types.js';

const logger = createLogger('DynamoKeyspace');

export interface DynamoKeyspaceConfig {
  tableName: string;
  region: string;
  endpoint?: string;
  timeoutMs: number;
}

const nowSeconds = (): number => Math.floor(Date.now() / 1000);

function isConditionFailure(error: unknown): boolean {
  return error instanceof Error && error.name === 'ConditionalCheckFailedException';
}

export class DynamoKeyValueStore implements KeyValueStore {
  private readonly client: DynamoDBClient;
  private readonly doc: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly timeoutMs: number;

  constructor(config: DynamoKeyspaceConfig) {
    this.client = new DynamoDBClient({
      region: config.region,
      endpoint: config.endpoint,
      ...(config.endpoint ? { credentials: { accessKeyId: 'test', secretAccessKey: 'test' } } : {}),
    });
    this.doc = DynamoDBDocumentClient.from(this.client, {
      marshallOptions: { removeUndefinedValues: true },
    });
    this.tableName = config.tableName;
    this.timeoutMs = config.timeoutMs;
    logger.info('Keyspace client initialized', { table: config.tableName, endpoint: config.endpoint });
  }

  async get(key: string): Promise<string | null> {
    const result = await this.call('get', (abortSignal) =>
      this.doc.send(new GetCommand({ TableName: this.tableName, Key: { key }, ConsistentRead: true }), { abortSignal })
    );
    const item = result.Item;
    if (!item) return null;
    if (typeof item.expiresAt === 'number' && item.expiresAt <= nowSeconds()) return null;
    if (typeof item.value === 'string') return item.value;
    if (typeof item.counter === 'number') return String(item.counter);
    return null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.call('set', (abortSignal) =>
      this.doc.send(
        new PutCommand({
          TableName: this.tableName,
          Item: { key, value, expiresAt: ttlSeconds === undefined ? undefined : nowSeconds() + ttlSeconds },
        }),
        { abortSignal }
      )
    );
  }

  async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    try {
      await this.call('setIfAbsent', (abortSignal) =>
        this.doc.send(
          new PutCommand({
            TableName: this.tableName,
            Item: { key, value, expiresAt: ttlSeconds === undefined ? undefined : nowSeconds() + ttlSeconds },
            ConditionExpression: 'attribute_not_exists(#k) OR (attribute_exists(#e) AND #e <= :now)',
            ExpressionAttributeNames: { '#k': 'key', '#e': 'expiresAt' },
            ExpressionAttributeValues: { ':now': nowSeconds() },
          }),
          { abortSignal }
        )
      );
      return true;
    } catch (error) {
      if (isConditionFailure(error)) return false;
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    await this.call('delete', (abortSignal) =>
      this.doc.send(new DeleteCommand({ TableName: this.tableName, Key: { key } }), { abortSignal })
    );
  }

  async increment(key: string, by = 1): Promise<number> {
    const result = await this.call('increment', (abortSignal) =>
      this.doc.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { key },
          UpdateExpression: 'ADD #c :by',
          ExpressionAttributeNames: { '#c': 'counter' },
          ExpressionAttributeValues: { ':by': by },
          ReturnValues: 'UPDATED_NEW',
        }),
        { abortSignal }
      )
    );
    const counter = result.Attributes?.counter;
    return typeof counter === 'number' ? counter : by;
  }

  async ping(): Promise<void> {
    await this.call('ping', (abortSignal) =>
      this.client.send(new DescribeTableCommand({ TableName: this.tableName }), { abortSignal })
    );
  }

  private async call<T>(operation: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const signal = AbortSignal.timeout(this.timeoutMs);
    try {
      return await fn(signal);
    } catch (error) {
      if (isConditionFailure(error)) throw error;
      if (signal.aborted) {
        throw new TimeoutError('keyspace_timeout', `Keyspace ${operation} exceeded ${this.timeoutMs}ms`, { cause: error });
      }
      logger.warn('Keyspace call failed', { operation, error: errorMessage(error) });
      throw new DependencyError('keyspace_unavailable', `Keyspace ${operation} failed`, { cause: error });
    }
  }
}
