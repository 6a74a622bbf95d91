import { DependencyError } from '../utils/errors.js';
import type { KeyValueStore } from './types.js';

interface Entry {
  value: string;
  expiresAt: number | null;
}

/**
 * Process-local keyspace for tests and the demo. Expiry is evaluated lazily
 * against an injectable clock.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, Entry>();
  private available = true;

  constructor(private readonly clock: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    this.assertAvailable();
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.assertAvailable();
    this.entries.set(key, { value, expiresAt: this.expiry(ttlSeconds) });
  }

  async setIfAbsent(key: string, value: string, ttlSeconds?: number): Promise<boolean> {
    this.assertAvailable();
    if (this.live(key)) return false;
    this.entries.set(key, { value, expiresAt: this.expiry(ttlSeconds) });
    return true;
  }

  async delete(key: string): Promise<void> {
    this.assertAvailable();
    this.entries.delete(key);
  }

  async increment(key: string, by = 1): Promise<number> {
    this.assertAvailable();
    const current = this.live(key);
    const next = (current ? Number(current.value) : 0) + by;
    this.entries.set(key, { value: String(next), expiresAt: current?.expiresAt ?? null });
    return next;
  }

  async ping(): Promise<void> {
    this.assertAvailable();
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  keys(): string[] {
    return [...this.entries.keys()].filter((key) => this.live(key) !== null);
  }

  private live(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private expiry(ttlSeconds?: number): number | null {
    return ttlSeconds === undefined ? null : this.clock() + ttlSeconds * 1000;
  }

  private assertAvailable(): void {
    if (!this.available) {
      throw new DependencyError('keyspace_unavailable', 'Keyspace is unavailable');
    }
  }
}
