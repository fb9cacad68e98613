import type { WalletService } from './WalletService.js';
import { LedgerReason, VOICE_CONFIG } from '../constants.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

interface VoicePresence {
  joinedAt: number;
  paidMinutes: number;
}

const MINUTE_MS = 60_000;

/**
 * Pays users for time spent in voice channels
 *
 * Only full minutes count. Presence lives in memory: after a restart, users
 * already in a channel are picked up again by the ready listener.
 */
export class VoiceRewardService {
  private readonly present = new Map<string, VoicePresence>();

  constructor(
    private readonly wallet: WalletService,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Start tracking a user (no-op when already tracked, e.g. channel switch)
   */
  join(userId: string, at: number = this.now()): void {
    if (!this.present.has(userId)) {
      this.present.set(userId, { joinedAt: at, paidMinutes: 0 });
    }
  }

  /**
   * Stop tracking a user, paying any full minutes not yet paid
   * @returns Credits paid by this call
   */
  async leave(userId: string, at: number = this.now()): Promise<number> {
    const presence = this.present.get(userId);
    if (!presence) {
      return 0;
    }
    const paid = await this.payOwed(userId, presence, at);
    this.present.delete(userId);
    return paid;
  }

  /**
   * Pay every tracked user for the minutes completed since the last tick
   * @returns Total credits paid
   */
  async tick(at: number = this.now()): Promise<number> {
    let total = 0;
    for (const [userId, presence] of this.present) {
      total += await this.payOwed(userId, presence, at);
    }
    return total;
  }

  isTracking(userId: string): boolean {
    return this.present.has(userId);
  }

  get size(): number {
    return this.present.size;
  }

  private async payOwed(userId: string, presence: VoicePresence, at: number): Promise<number> {
    const minutes = Math.floor((at - presence.joinedAt) / MINUTE_MS);
    const owedMinutes = minutes - presence.paidMinutes;
    if (owedMinutes <= 0) {
      return 0;
    }

    const credits = owedMinutes * VOICE_CONFIG.CREDITS_PER_MINUTE;
    try {
      await this.wallet.credit(userId, credits, LedgerReason.VOICE_REWARD);
      presence.paidMinutes = minutes;
      return credits;
    } catch (error) {
      logger.error(`Voice reward for ${userId} failed:`, error);
      return 0;
    }
  }
}
