import type { WalletService } from './WalletService.js';
import type { ExpireHandler, GameStateService, SessionOf } from './GameStateService.js';
import type { RedBlackSide } from '../lib/types.js';
import { GameKind, LedgerReason, REDBLACK_CONFIG, SESSION_TTL_MINUTES, SessionKind } from '../constants.js';
import { ConcurrencyConflictError, ForbiddenActionError, ValidationError } from '../lib/errors.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

export type RedBlackSession = SessionOf<SessionKind.REDBLACK>;

export interface RedBlackResult {
  side: RedBlackSide;
  amount: number;
  outcome: RedBlackSide;
  won: boolean;
  payout: number;
  balance: number;
}

export function isRedBlackSide(value: string): value is RedBlackSide {
  return REDBLACK_CONFIG.SIDES.some((side) => side === value);
}

/**
 * Single-player red/black round
 *
 * States: awaiting_bet -> in_progress -> resolved. An unplaced round expires
 * with nothing to refund; a placed bet that is never settled is refunded on expiry.
 */
export class RedBlackService {
  constructor(
    private readonly wallet: WalletService,
    private readonly registry: GameStateService,
    private readonly random: () => number = Math.random
  ) {}

  private ttlMs(): number {
    return SESSION_TTL_MINUTES[SessionKind.REDBLACK] * 60 * 1000;
  }

  /**
   * Start a round waiting for the player's bet
   * A previous round of the same player still waiting for a bet is replaced.
   *
   * @param playerId - Discord user ID
   */
  async start(
    playerId: string,
    onExpire?: ExpireHandler<SessionKind.REDBLACK>
  ): Promise<{ session: RedBlackSession; balance: number }> {
    const session = await this.registry.runExclusive(async () => {
      const stale = this.registry.findByOwner(playerId, SessionKind.REDBLACK, 'awaiting_bet');
      if (stale) {
        this.registry.resolve(stale.sessionId);
      }
      return this.registry.create(playerId, SessionKind.REDBLACK, this.ttlMs(), { side: null, amount: 0 }, { onExpire });
    });
    const balance = await this.wallet.getBalance(playerId);
    return { session, balance };
  }

  /**
   * Place the bet on a round waiting for it
   *
   * @param sessionId - Round the bet is for
   * @param playerId - Discord user ID
   * @param side - red or black
   * @param amount - Credits to bet (escrowed until the round settles)
   * @throws NotFoundError if that round is gone or was replaced
   * @throws ForbiddenActionError if the round belongs to someone else
   */
  async placeBet(sessionId: string, playerId: string, side: string, amount: number): Promise<RedBlackSession> {
    if (!isRedBlackSide(side)) {
      throw new ValidationError('Pick either red or black.');
    }
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new ValidationError('The bet must be a positive whole number.');
    }

    return this.registry.runExclusive(async () => {
      const session = this.registry.claim(sessionId, SessionKind.REDBLACK, playerId, ['awaiting_bet'], {
        ownerOnly: true,
      });

      await this.wallet.debit(playerId, amount, LedgerReason.REDBLACK_BET);
      this.registry.addEscrow(session, playerId, amount);
      session.data.side = side;
      session.data.amount = amount;
      this.registry.transition(session, 'in_progress');
      return session;
    });
  }

  /**
   * Cosmetic reveal sequence (alternating sides); no effect on the outcome
   */
  revealFrames(count: number = REDBLACK_CONFIG.REVEAL_FRAMES): RedBlackSide[] {
    return Array.from({ length: Math.max(0, count) }, (_, i) => REDBLACK_CONFIG.SIDES[i % 2]);
  }

  /**
   * Draw the outcome and pay out
   *
   * @param sessionId - Session ID of an in-progress round
   * @throws ConcurrencyConflictError if the round already settled or expired
   */
  async settle(sessionId: string): Promise<RedBlackResult> {
    return this.registry.runExclusive(async () => {
      const session = this.registry.get(sessionId, SessionKind.REDBLACK);
      if (!session || session.state !== 'in_progress') {
        throw new ConcurrencyConflictError('This round has already finished.');
      }
      const { side, amount } = session.data;
      if (!side) {
        throw new ConcurrencyConflictError('No bet was placed on this round.');
      }
      this.registry.resolve(sessionId);

      const outcome: RedBlackSide = this.random() < 0.5 ? 'red' : 'black';
      const won = outcome === side;
      const payout = won ? amount * 2 : 0;
      const playerId = session.ownerId;

      let balance: number;
      try {
        balance = won
          ? await this.wallet.credit(playerId, payout, LedgerReason.REDBLACK_WON)
          : await this.wallet.getBalance(playerId);
      } catch (error) {
        logger.error(`Red/black ${sessionId} payout failed, returning the bet:`, error);
        await this.registry.releaseEscrow(session);
        throw error;
      }
      session.escrow.clear();

      try {
        await this.wallet.recordGame(playerId, GameKind.REDBLACK, won);
      } catch (error) {
        logger.warn(`Failed to record red/black stats for ${playerId}:`, error);
      }

      logger.info(`Red/black ${sessionId}: ${playerId} bet ${amount} on ${side}, landed ${outcome}`);
      return { side, amount, outcome, won, payout, balance };
    });
  }

  /**
   * Start a fresh round for the owner of a finished one
   *
   * @param ownerId - Player of the finished round
   * @param actorId - User who pressed "play again"
   */
  async replay(
    ownerId: string,
    actorId: string,
    onExpire?: ExpireHandler<SessionKind.REDBLACK>
  ): Promise<{ session: RedBlackSession; balance: number }> {
    if (ownerId !== actorId) {
      throw new ForbiddenActionError('Only the player of this round can play again.');
    }
    return this.start(ownerId, onExpire);
  }
}
