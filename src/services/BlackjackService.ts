import type { WalletService } from './WalletService.js';
import type { ExpireHandler, GameStateService, SessionOf } from './GameStateService.js';
import type { BlackjackData, Card } from '../lib/types.js';
import { BLACKJACK_CONFIG, GameKind, LedgerReason, SESSION_TTL_MINUTES, SessionKind } from '../constants.js';
import { createDeck, handValue } from '../lib/cards.js';
import { ForbiddenActionError, ValidationError } from '../lib/errors.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

export type BlackjackSession = SessionOf<SessionKind.BLACKJACK>;

export type BlackjackOutcome = 'win' | 'dealer_bust' | 'push' | 'loss' | 'bust';

export interface BlackjackResult {
  outcome: BlackjackOutcome;
  bet: number;
  payout: number;
  balance: number;
  playerCards: Card[];
  dealerCards: Card[];
  playerTotal: number;
  dealerTotal: number;
}

export interface HitResult {
  session: BlackjackSession;
  card: Card;
  /** Set when the hit busted the hand */
  result: BlackjackResult | null;
}

/**
 * Compare final totals; the player's bust is checked first
 */
export function decideOutcome(playerTotal: number, dealerTotal: number): BlackjackOutcome {
  if (playerTotal > BLACKJACK_CONFIG.BUST_THRESHOLD) return 'bust';
  if (dealerTotal > BLACKJACK_CONFIG.BUST_THRESHOLD) return 'dealer_bust';
  if (playerTotal > dealerTotal) return 'win';
  if (playerTotal === dealerTotal) return 'push';
  return 'loss';
}

/**
 * Credits returned for a finished hand: double on a win, the bet on a push
 */
export function payoutFor(outcome: BlackjackOutcome, bet: number): number {
  switch (outcome) {
    case 'win':
    case 'dealer_bust':
      return bet * 2;
    case 'push':
      return bet;
    case 'loss':
    case 'bust':
      return 0;
  }
}

/**
 * Single-player blackjack against the dealer
 *
 * States: awaiting_bet -> in_progress -> resolved. The bet is escrowed when the
 * cards are dealt; a hand left unfinished is refunded on expiry. Hit and stand
 * only. The dealer draws to 17.
 */
export class BlackjackService {
  constructor(
    private readonly wallet: WalletService,
    private readonly registry: GameStateService,
    private readonly newDeck: () => Card[] = () => createDeck()
  ) {}

  private ttlMs(): number {
    return SESSION_TTL_MINUTES[SessionKind.BLACKJACK] * 60 * 1000;
  }

  /**
   * Open a table waiting for the player's bet
   * A previous table of the same player still waiting for a bet is replaced.
   */
  async start(
    playerId: string,
    onExpire?: ExpireHandler<SessionKind.BLACKJACK>
  ): Promise<{ session: BlackjackSession; balance: number }> {
    const session = await this.registry.runExclusive(async () => {
      const stale = this.registry.findByOwner(playerId, SessionKind.BLACKJACK, 'awaiting_bet');
      if (stale) {
        this.registry.resolve(stale.sessionId);
      }
      const data: BlackjackData = { bet: 0, deck: [], playerCards: [], dealerCards: [] };
      return this.registry.create(playerId, SessionKind.BLACKJACK, this.ttlMs(), data, { onExpire });
    });
    const balance = await this.wallet.getBalance(playerId);
    return { session, balance };
  }

  /**
   * Escrow the bet and deal two cards each (player first)
   *
   * @param sessionId - Table waiting for a bet
   * @param playerId - Discord user ID of the table owner
   * @param amount - Credits to bet
   */
  async placeBet(sessionId: string, playerId: string, amount: number): Promise<BlackjackSession> {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new ValidationError('The bet must be a positive whole number.');
    }

    return this.registry.runExclusive(async () => {
      const session = this.registry.claim(sessionId, SessionKind.BLACKJACK, playerId, ['awaiting_bet'], {
        ownerOnly: true,
      });

      await this.wallet.debit(playerId, amount, LedgerReason.BLACKJACK_BET);
      this.registry.addEscrow(session, playerId, amount);

      const { data } = session;
      data.bet = amount;
      data.deck = this.newDeck();
      data.playerCards = [this.draw(data), this.draw(data)];
      data.dealerCards = [this.draw(data), this.draw(data)];
      this.registry.transition(session, 'in_progress');
      return session;
    });
  }

  /**
   * Draw one card for the player; a bust ends the hand
   */
  async hit(sessionId: string, playerId: string): Promise<HitResult> {
    return this.registry.runExclusive(async () => {
      const session = this.claimHand(sessionId, playerId);
      const card = this.draw(session.data);
      session.data.playerCards.push(card);

      if (handValue(session.data.playerCards) > BLACKJACK_CONFIG.BUST_THRESHOLD) {
        return { session, card, result: await this.finish(session) };
      }
      return { session, card, result: null };
    });
  }

  /**
   * Player stands: the dealer draws to 17 and the hand is settled
   */
  async stand(sessionId: string, playerId: string): Promise<BlackjackResult> {
    return this.registry.runExclusive(async () => {
      const session = this.claimHand(sessionId, playerId);
      const { data } = session;
      while (handValue(data.dealerCards) < BLACKJACK_CONFIG.DEALER_STAND_VALUE) {
        data.dealerCards.push(this.draw(data));
      }
      return this.finish(session);
    });
  }

  /**
   * End a player's table from outside the game (admin), refunding any bet in play
   * @returns false when the player has no table
   */
  async endGame(playerId: string): Promise<boolean> {
    const session = this.registry.findByOwner(playerId, SessionKind.BLACKJACK);
    if (!session) {
      return false;
    }
    logger.info(`Blackjack table ${session.sessionId} of ${playerId} ended by an admin`);
    return this.registry.expire(session.sessionId);
  }

  /**
   * Open a fresh table for the owner of a finished one
   */
  async replay(
    ownerId: string,
    actorId: string,
    onExpire?: ExpireHandler<SessionKind.BLACKJACK>
  ): Promise<{ session: BlackjackSession; balance: number }> {
    if (ownerId !== actorId) {
      throw new ForbiddenActionError('Only the player of this table can play again.');
    }
    return this.start(ownerId, onExpire);
  }

  private claimHand(sessionId: string, playerId: string): BlackjackSession {
    return this.registry.claim(sessionId, SessionKind.BLACKJACK, playerId, ['in_progress'], { ownerOnly: true });
  }

  /**
   * Resolve the session and pay out; call inside the registry lock
   * A payout the ledger rejects returns the bet instead.
   */
  private async finish(session: BlackjackSession): Promise<BlackjackResult> {
    const { bet, playerCards, dealerCards } = session.data;
    const playerTotal = handValue(playerCards);
    const dealerTotal = handValue(dealerCards);
    const outcome = decideOutcome(playerTotal, dealerTotal);
    const payout = payoutFor(outcome, bet);
    const playerId = session.ownerId;

    this.registry.resolve(session.sessionId);

    let balance: number;
    try {
      balance =
        payout > 0
          ? await this.wallet.credit(
              playerId,
              payout,
              outcome === 'push' ? LedgerReason.BLACKJACK_PUSH : LedgerReason.BLACKJACK_WON
            )
          : await this.wallet.getBalance(playerId);
    } catch (error) {
      logger.error(`Blackjack ${session.sessionId} payout failed, returning the bet:`, error);
      await this.registry.releaseEscrow(session);
      throw error;
    }
    session.escrow.clear();

    try {
      await this.wallet.recordGame(playerId, GameKind.BLACKJACK, outcome === 'win' || outcome === 'dealer_bust');
    } catch (error) {
      logger.warn(`Failed to record blackjack stats for ${playerId}:`, error);
    }

    logger.info(`Blackjack ${session.sessionId}: ${playerId} ${outcome} (${playerTotal} vs ${dealerTotal}), bet ${bet}`);
    return { outcome, bet, payout, balance, playerCards, dealerCards, playerTotal, dealerTotal };
  }

  private draw(data: BlackjackData): Card {
    if (data.deck.length === 0) {
      data.deck = this.newDeck();
    }
    const card = data.deck.pop();
    if (!card) {
      throw new Error('Deck factory returned an empty deck');
    }
    return card;
  }
}
