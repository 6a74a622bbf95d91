/**
 * Key/value keyspace used for read caches, job dedup keys, cancellation
 * markers and scheduler tick claims. TTLs are in seconds.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  /** SETNX: true when the key was written, false when it already existed. */
  setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean>;
  delete(key: string): Promise<void>;
  increment(key: string, by?: number): Promise<number>;
  ping(): Promise<void>;
}

export const KEYS = {
  jobUnique: (type: string, dedupKey: string) => `jobs:unique:${type}:${dedupKey}`,
  jobCancelled: (taskId: string) => `jobs:cancelled:${taskId}`,
  schedulerTick: (type: string, runAt: string) => `scheduler:tick:${type}:${runAt}`,
  bookStock: (bookId: string) => `inventory:stock:${bookId}`,
} as const;
