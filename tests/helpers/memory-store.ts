import type { KeyValueStore } from '../../src/lib/store.js';
import { TransientStoreError } from '../../src/lib/errors.js';

export type StoreOperation = keyof KeyValueStore;

interface StoredValue {
  value: string;
  expiresAt: number | null;
}

/**
 * In-process KeyValueStore with a controllable clock and injectable outages
 */
export class MemoryStore implements KeyValueStore {
  readonly data = new Map<string, StoredValue>();
  readonly calls: Record<StoreOperation, number> = { get: 0, set: 0, delete: 0, exists: 0, increment: 0, keys: 0 };
  private readonly pendingFailures = new Map<StoreOperation, number>();
  /** Fails every call for which it returns true */
  failWhen: ((operation: StoreOperation, key: string) => boolean) | null = null;

  constructor(public clock: () => number = () => 0) {}

  /**
   * Make the next `times` calls of `operation` reject with TransientStoreError
   */
  failNext(operation: StoreOperation, times = 1): void {
    this.pendingFailures.set(operation, (this.pendingFailures.get(operation) ?? 0) + times);
  }

  /** Raw write that bypasses counters and failures */
  seed(key: string, value: string): void {
    this.data.set(key, { value, expiresAt: null });
  }

  /** Raw read that bypasses counters and failures */
  peek(key: string): string | null {
    return this.live(key)?.value ?? null;
  }

  async get(key: string): Promise<string | null> {
    this.enter('get', key);
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.enter('set', key);
    this.data.set(key, { value, expiresAt: this.expiry(ttlSeconds) });
  }

  async delete(key: string): Promise<void> {
    this.enter('delete', key);
    this.data.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    this.enter('exists', key);
    return this.live(key) !== undefined;
  }

  async increment(key: string, ttlSeconds?: number): Promise<number> {
    this.enter('increment', key);
    const current = this.live(key);
    const next = (current ? Number.parseInt(current.value, 10) : 0) + 1;
    this.data.set(key, { value: String(next), expiresAt: current ? current.expiresAt : this.expiry(ttlSeconds) });
    return next;
  }

  async keys(prefix: string): Promise<string[]> {
    this.enter('keys', prefix);
    return [...this.data.keys()].filter((key) => key.startsWith(prefix) && this.live(key) !== undefined);
  }

  private enter(operation: StoreOperation, key: string): void {
    this.calls[operation]++;
    const pending = this.pendingFailures.get(operation) ?? 0;
    if (pending > 0) {
      this.pendingFailures.set(operation, pending - 1);
      throw new TransientStoreError(operation);
    }
    if (this.failWhen?.(operation, key)) {
      throw new TransientStoreError(operation);
    }
  }

  private expiry(ttlSeconds?: number): number | null {
    return ttlSeconds === undefined ? null : this.clock() + ttlSeconds * 1000;
  }

  private live(key: string): StoredValue | undefined {
    const stored = this.data.get(key);
    if (stored && stored.expiresAt !== null && stored.expiresAt <= this.clock()) {
      this.data.delete(key);
      return undefined;
    }
    return stored;
  }
}

/**
 * Uniform source that replays the given values in order (then repeats the last)
 */
export function sequence(...values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)];
    index++;
    return value ?? 0;
  };
}
