import { AsyncQueue } from '@sapphire/async-queue';

/**
 * Single mutual-exclusion lock (FIFO)
 */
export class Mutex {
  private readonly queue = new AsyncQueue();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.queue.wait();
    try {
      return await fn();
    } finally {
      this.queue.shift();
    }
  }
}

/**
 * One FIFO lock per key; idle keys are dropped
 *
 * Used for per-account read-modify-write cycles, inventories and the case bank.
 * Not reentrant: a holder must never wait on its own key.
 */
export class KeyedMutex {
  private readonly queues = new Map<string, AsyncQueue>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new AsyncQueue();
      this.queues.set(key, queue);
    }

    await queue.wait();
    try {
      return await fn();
    } finally {
      queue.shift();
      if (queue.remaining === 0 && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
    }
  }

  /** Keys with a holder or waiters */
  get size(): number {
    return this.queues.size;
  }
}
