import type { KeyValueStore } from './store.js';
import { DAILY_COUNTER_TTL_SECONDS, STORE_KEYS } from '../constants.js';
import { DailyLimitError } from './errors.js';
import { parseBigInt } from './utils.js';

/**
 * Per-user-per-day action counter stored as `daily:<action>:<userId>:<YYYY-MM-DD>`
 * with a 24h expiry. Days roll over at 00:00 UTC.
 */
export class DailyLimiter {
  constructor(
    private readonly store: KeyValueStore,
    private readonly action: string,
    private readonly limit: number,
    private readonly description: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  key(userId: string): string {
    const day = this.now().toISOString().slice(0, 10);
    return `${STORE_KEYS.DAILY}${this.action}:${userId}:${day}`;
  }

  async used(userId: string): Promise<number> {
    return parseBigInt(await this.store.get(this.key(userId)));
  }

  async remaining(userId: string): Promise<number> {
    return Math.max(0, this.limit - (await this.used(userId)));
  }

  /**
   * Reject when `amount` more actions would exceed today's limit
   */
  async assertAvailable(userId: string, amount = 1): Promise<void> {
    const used = await this.used(userId);
    if (used + amount > this.limit) {
      throw new DailyLimitError(this.description, this.limit);
    }
  }

  /**
   * Record `amount` actions
   * @returns Count after recording
   */
  async record(userId: string, amount = 1): Promise<number> {
    const key = this.key(userId);
    let count = 0;
    for (let i = 0; i < amount; i++) {
      count = await this.store.increment(key, DAILY_COUNTER_TTL_SECONDS);
    }
    return count;
  }
}
