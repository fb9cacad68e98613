import type { KeyValueStore } from '../lib/store.js';
import type { Account, LeaderboardEntry } from '../lib/types.js';
import { LEADERBOARD_CONFIG, STORE_KEYS } from '../constants.js';
import { parseAccount } from './WalletService.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

/**
 * LeaderboardService ranks users by balance
 *
 * The store has no secondary index, so every call scans the `user:` keys.
 * Zero balances are not ranked; ties are ordered by user ID.
 */
export class LeaderboardService {
  constructor(private readonly store: KeyValueStore) {}

  /**
   * Get top N users by balance
   * @param limit - Number of users to return (default 5)
   */
  async getTop(limit: number = LEADERBOARD_CONFIG.DEFAULT_LIMIT): Promise<LeaderboardEntry[]> {
    const ranked = await this.rankAll();
    return ranked.slice(0, Math.max(0, limit));
  }

  /**
   * Get user's rank on the leaderboard
   * @param userId - Discord user ID
   * @returns 1-based rank, or null when the user has no credits
   */
  async getRank(userId: string): Promise<number | null> {
    const ranked = await this.rankAll();
    return ranked.find((entry) => entry.user_id === userId)?.rank ?? null;
  }

  private async rankAll(): Promise<LeaderboardEntry[]> {
    const keys = await this.store.keys(STORE_KEYS.ACCOUNT);
    const accounts: Account[] = [];

    for (const key of keys) {
      const raw = await this.store.get(key);
      if (raw === null) {
        continue;
      }
      try {
        accounts.push(parseAccount(raw));
      } catch (error) {
        logger.warn(`Skipping unreadable account record ${key}:`, error);
      }
    }

    return accounts
      .filter((account) => account.balance > 0)
      .sort((a, b) => b.balance - a.balance || a.id.localeCompare(b.id))
      .map((account, index) => ({ user_id: account.id, balance: account.balance, rank: index + 1 }));
  }
}
