import type { WalletService } from './WalletService.js';
import type { ExpireHandler, GameStateService, SessionOf } from './GameStateService.js';
import { GameKind, LedgerReason, SESSION_TTL_MINUTES, SessionKind } from '../constants.js';
import { ValidationError } from '../lib/errors.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

export type DuelSession = SessionOf<SessionKind.DUEL>;

export interface DuelResult {
  winnerId: string;
  loserId: string;
  bet: number;
  payout: number;
  winnerBalance: number;
}

/**
 * Two-player coin-flip duel
 *
 * Flow:
 * 1. challenge() - challenger's bet is escrowed and an open duel is posted
 * 2. accept() - opponent matches the bet, a fair coin picks the winner
 * 3. winner receives both bets; an unanswered duel expires and refunds the challenger
 *
 * A payout the ledger rejects voids the duel and returns each bet.
 */
export class DuelService {
  constructor(
    private readonly wallet: WalletService,
    private readonly registry: GameStateService,
    private readonly random: () => number = Math.random
  ) {}

  /**
   * Open a duel and escrow the challenger's bet
   *
   * @param challengerId - Discord user ID
   * @param bet - Credits each side puts in
   * @throws InsufficientFundsError if the challenger cannot cover the bet (no duel is created)
   */
  async challenge(challengerId: string, bet: number, onExpire?: ExpireHandler<SessionKind.DUEL>): Promise<DuelSession> {
    if (!Number.isSafeInteger(bet) || bet <= 0) {
      throw new ValidationError('The bet must be a positive whole number.');
    }

    return this.registry.runExclusive(async () => {
      await this.wallet.debit(challengerId, bet, LedgerReason.DUEL_ESCROW);
      const duel = this.registry.create(
        challengerId,
        SessionKind.DUEL,
        SESSION_TTL_MINUTES[SessionKind.DUEL] * 60 * 1000,
        { bet, opponentId: null },
        { escrow: { [challengerId]: bet }, onExpire }
      );
      logger.info(`Duel opened: ${duel.sessionId} by ${challengerId} for ${bet}`);
      return duel;
    });
  }

  /**
   * Accept an open duel and settle it
   *
   * @param duelId - Session ID of the duel
   * @param opponentId - Discord user ID of the accepting player
   * @throws ForbiddenActionError when the challenger accepts their own duel
   * @throws InsufficientFundsError when the opponent cannot match (the duel stays open)
   */
  async accept(duelId: string, opponentId: string): Promise<DuelResult> {
    return this.registry.runExclusive(async () => {
      const duel = this.registry.claim(duelId, SessionKind.DUEL, opponentId, ['open'], { forbidOwner: true });
      const { bet } = duel.data;

      await this.wallet.debit(opponentId, bet, LedgerReason.DUEL_ESCROW);
      this.registry.addEscrow(duel, opponentId, bet);
      duel.data.opponentId = opponentId;
      this.registry.transition(duel, 'accepted');
      this.registry.resolve(duel.sessionId);

      const challengerWins = this.random() < 0.5;
      const winnerId = challengerWins ? duel.ownerId : opponentId;
      const loserId = challengerWins ? opponentId : duel.ownerId;
      const payout = bet * 2;

      let winnerBalance: number;
      try {
        winnerBalance = await this.wallet.credit(winnerId, payout, LedgerReason.DUEL_WON);
      } catch (error) {
        // Void the duel: both bets go back to their owners
        logger.error(`Duel ${duel.sessionId} payout failed, returning both bets:`, error);
        await this.registry.releaseEscrow(duel);
        throw error;
      }
      duel.escrow.clear();

      await this.recordResult(winnerId, true);
      await this.recordResult(loserId, false);

      logger.info(`Duel ${duel.sessionId}: ${winnerId} beat ${loserId} for ${payout}`);
      return { winnerId, loserId, bet, payout, winnerBalance };
    });
  }

  private async recordResult(userId: string, won: boolean): Promise<void> {
    try {
      await this.wallet.recordGame(userId, GameKind.DUEL, won);
    } catch (error) {
      logger.warn(`Failed to record duel stats for ${userId}:`, error);
    }
  }
}
