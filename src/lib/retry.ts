import { setTimeout as sleep } from 'node:timers/promises';
import type { KeyValueStore } from './store.js';
import { TransientStoreError } from './errors.js';
import { STORE_CONFIG } from '../constants.js';
import { safeLogger as logger } from './safe-logger.js';

export interface RetryOptions {
  /** Attempts per operation, first try included */
  maxAttempts?: number;
  /** Fixed delay between attempts */
  backoffMs?: number;
}

/**
 * Run `fn` until it succeeds or `maxAttempts` transient failures happened.
 * Non-transient errors are rethrown on the first occurrence.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  { maxAttempts = STORE_CONFIG.MAX_ATTEMPTS, backoffMs = STORE_CONFIG.RETRY_BACKOFF_MS }: RetryOptions = {}
): Promise<T> {
  let lastError: TransientStoreError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof TransientStoreError)) {
        throw error;
      }
      lastError = error;
      logger.warn(`Store ${operation} failed (attempt ${attempt}/${maxAttempts})`);
      if (attempt < maxAttempts && backoffMs > 0) {
        await sleep(backoffMs);
      }
    }
  }

  throw lastError ?? new TransientStoreError(operation);
}

/**
 * Decorator that gives every KeyValueStore operation bounded retries
 */
export class RetryingStore implements KeyValueStore {
  constructor(
    private readonly inner: KeyValueStore,
    private readonly options: RetryOptions = {}
  ) {}

  get(key: string): Promise<string | null> {
    return withRetry(`get ${key}`, () => this.inner.get(key), this.options);
  }

  set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    return withRetry(`set ${key}`, () => this.inner.set(key, value, ttlSeconds), this.options);
  }

  delete(key: string): Promise<void> {
    return withRetry(`delete ${key}`, () => this.inner.delete(key), this.options);
  }

  exists(key: string): Promise<boolean> {
    return withRetry(`exists ${key}`, () => this.inner.exists(key), this.options);
  }

  increment(key: string, ttlSeconds?: number): Promise<number> {
    return withRetry(`increment ${key}`, () => this.inner.increment(key, ttlSeconds), this.options);
  }

  keys(prefix: string): Promise<string[]> {
    return withRetry(`keys ${prefix}*`, () => this.inner.keys(prefix), this.options);
  }
}
