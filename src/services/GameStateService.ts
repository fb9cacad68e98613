import { randomUUID } from 'node:crypto';
import type { WalletService } from './WalletService.js';
import type {
  BlackjackData,
  DuelData,
  OperatorNotifier,
  RedBlackData,
  SaleData,
  Session,
  SessionState,
  TradeData,
} from '../lib/types.js';
import { LedgerReason, SessionKind } from '../constants.js';
import { Mutex } from '../lib/lock.js';
import { ConcurrencyConflictError, ForbiddenActionError, NotFoundError } from '../lib/errors.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

/**
 * Session payload per kind
 */
export interface SessionDataByKind {
  [SessionKind.DUEL]: DuelData;
  [SessionKind.REDBLACK]: RedBlackData;
  [SessionKind.SALE]: SaleData;
  [SessionKind.TRADE]: TradeData;
  [SessionKind.BLACKJACK]: BlackjackData;
}

export type SessionOf<K extends SessionKind> = Session<SessionDataByKind[K]> & { kind: K };

export type ExpireHandler<K extends SessionKind> = (session: SessionOf<K>) => void | Promise<void>;

export interface CreateSessionOptions<K extends SessionKind> {
  /** Credits already debited for this session, per participant */
  escrow?: Record<string, number>;
  /** Called after an expired session was removed and refunded */
  onExpire?: ExpireHandler<K>;
}

export interface ClaimOptions {
  /** Reject the owner (two-party games) */
  forbidOwner?: boolean;
  /** Reject anyone but the owner (confirmation prompts) */
  ownerOnly?: boolean;
}

/**
 * Escrow whose refund failed, waiting for the next sweep
 */
export interface ParkedRefund {
  sessionId: string;
  userId: string;
  amount: number;
}

interface RegistryEntry {
  session: Session<unknown>;
  timer: NodeJS.Timeout;
  onExpire?: () => void | Promise<void>;
}

function isSessionOf<K extends SessionKind>(session: Session<unknown>, kind: K): session is SessionOf<K> {
  return session.kind === kind;
}

export interface GameStateServiceOptions {
  notifier?: OperatorNotifier;
  now?: () => number;
}

/**
 * In-memory registry of ephemeral sessions (duels, red/black and blackjack rounds, sale and trade prompts)
 *
 * - Each session has one cancellable expiry timer; `sweep` is the backstop
 * - `runExclusive` is the single registry lock: every resolution path and every
 *   escrow coupled to a session runs inside it, timers included
 * - A session reaches exactly one terminal state: removed by `resolve`, or
 *   removed and refunded by `expire`
 * - A refund the ledger rejects is parked and retried by every sweep until it lands
 *
 * Lock order: registry -> inventory/bank -> ledger user.
 */
export class GameStateService {
  private readonly sessions = new Map<string, RegistryEntry>();
  private readonly parkedRefunds: ParkedRefund[] = [];
  private readonly lock = new Mutex();
  private readonly notifier: OperatorNotifier;
  private readonly now: () => number;

  constructor(
    private readonly wallet: WalletService,
    options: GameStateServiceOptions = {}
  ) {
    this.notifier = options.notifier ?? { notify: (message) => logger.error(message) };
    this.now = options.now ?? Date.now;
  }

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(fn);
  }

  /**
   * Register a new session and schedule its expiry
   *
   * @param ownerId - Discord user ID of the initiator
   * @param kind - Session kind
   * @param ttlMs - Lifetime in milliseconds
   * @param data - Kind-specific payload
   */
  create<K extends SessionKind>(
    ownerId: string,
    kind: K,
    ttlMs: number,
    data: SessionDataByKind[K],
    options: CreateSessionOptions<K> = {}
  ): SessionOf<K> {
    const createdAt = this.now();
    const session: SessionOf<K> = {
      sessionId: `${ownerId}_${createdAt}_${randomUUID().slice(0, 8)}`,
      kind,
      ownerId,
      state: initialState(kind),
      createdAt: new Date(createdAt),
      expiresAt: new Date(createdAt + ttlMs),
      escrow: new Map(Object.entries(options.escrow ?? {})),
      data,
    };

    const timer = setTimeout(() => {
      this.expire(session.sessionId).catch((error: unknown) => {
        logger.error(`Failed to expire session ${session.sessionId}:`, error);
      });
    }, ttlMs);
    timer.unref();

    const { onExpire } = options;
    this.sessions.set(session.sessionId, {
      session,
      timer,
      onExpire: onExpire ? () => onExpire(session) : undefined,
    });

    logger.debug(`Session created: ${session.sessionId} (${kind}, ttl ${ttlMs}ms)`);
    return session;
  }

  get<K extends SessionKind>(sessionId: string, kind: K): SessionOf<K> | null {
    const entry = this.sessions.get(sessionId);
    return entry && isSessionOf(entry.session, kind) ? entry.session : null;
  }

  /**
   * First live session of a kind owned by a user, optionally in a given state
   */
  findByOwner<K extends SessionKind>(ownerId: string, kind: K, state?: SessionState): SessionOf<K> | null {
    for (const { session } of this.sessions.values()) {
      if (session.ownerId === ownerId && isSessionOf(session, kind) && (!state || session.state === state)) {
        return session;
      }
    }
    return null;
  }

  /**
   * Validate that `claimantId` may act on a session right now
   * Call inside `runExclusive`.
   *
   * @throws NotFoundError if the session is gone (or of another kind)
   * @throws ConcurrencyConflictError if it is no longer in an acceptable state
   * @throws ForbiddenActionError if the claimant may not act on it
   */
  claim<K extends SessionKind>(
    sessionId: string,
    kind: K,
    claimantId: string,
    acceptableStates: readonly SessionState[],
    options: ClaimOptions = {}
  ): SessionOf<K> {
    const session = this.get(sessionId, kind);
    if (!session) {
      throw new NotFoundError('This game is no longer available. It may have expired or already finished.');
    }
    if (!acceptableStates.includes(session.state)) {
      throw new ConcurrencyConflictError();
    }
    if (options.forbidOwner && session.ownerId === claimantId) {
      throw new ForbiddenActionError('You cannot join your own game.');
    }
    if (options.ownerOnly && session.ownerId !== claimantId) {
      throw new ForbiddenActionError('Only the player who started this can use it.');
    }
    return session;
  }

  transition(session: Session<unknown>, state: SessionState): void {
    logger.debug(`Session ${session.sessionId}: ${session.state} -> ${state}`);
    session.state = state;
  }

  addEscrow(session: Session<unknown>, userId: string, amount: number): void {
    session.escrow.set(userId, (session.escrow.get(userId) ?? 0) + amount);
  }

  /**
   * Remove a session and cancel its timer
   * Idempotent: a second call returns null and changes nothing.
   */
  resolve(sessionId: string): Session<unknown> | null {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      return null;
    }
    clearTimeout(entry.timer);
    this.sessions.delete(sessionId);
    entry.session.state = 'resolved';
    return entry.session;
  }

  /**
   * Expire a session: remove it, refund its escrow, then run its expiry hook
   * No-op when the session was already resolved or expired.
   *
   * @returns true if this call expired the session
   */
  async expire(sessionId: string): Promise<boolean> {
    const entry = await this.runExclusive(async () => {
      const found = this.sessions.get(sessionId);
      if (!found) {
        return null;
      }
      clearTimeout(found.timer);
      this.sessions.delete(sessionId);
      found.session.state = 'expired';
      await this.releaseEscrow(found.session);
      return found;
    });

    if (!entry) {
      return false;
    }

    logger.info(`Session expired: ${sessionId} (${entry.session.kind})`);
    if (entry.onExpire) {
      try {
        await entry.onExpire();
      } catch (error) {
        logger.error(`Expiry handler failed for session ${sessionId}:`, error);
      }
    }
    return true;
  }

  /**
   * Expire every session past its deadline (backstop for lost timers)
   * @returns Number of sessions expired
   */
  async sweep(now: number = this.now()): Promise<number> {
    await this.runExclusive(() => this.retryParkedRefunds());

    const due = [...this.sessions.values()]
      .filter(({ session }) => session.expiresAt.getTime() <= now)
      .map(({ session }) => session.sessionId);

    let expired = 0;
    for (const sessionId of due) {
      if (await this.expire(sessionId)) {
        expired++;
      }
    }
    if (expired > 0) {
      logger.info(`Session sweep expired ${expired} session(s)`);
    }
    return expired;
  }

  /**
   * Cancel every timer and return escrowed credits (process shutdown)
   * Expiry hooks are not run.
   */
  async shutdown(): Promise<void> {
    await this.runExclusive(async () => {
      for (const entry of this.sessions.values()) {
        clearTimeout(entry.timer);
      }
      const remaining = [...this.sessions.values()];
      this.sessions.clear();
      for (const { session } of remaining) {
        session.state = 'expired';
        await this.releaseEscrow(session);
      }
      await this.retryParkedRefunds();
      for (const refund of this.parkedRefunds.splice(0)) {
        this.notifier.notify(
          `🚨 Shutting down with ${refund.amount} credits still owed to <@${refund.userId}> (session ${refund.sessionId}).`
        );
      }
    });
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Refunds that failed and have not landed yet
   */
  get pendingRefunds(): readonly ParkedRefund[] {
    return this.parkedRefunds;
  }

  /**
   * Return every escrow entry of a session to its owner
   * Call inside `runExclusive`. The session's escrow is empty afterwards; a
   * refund the ledger rejects is parked for the next sweep.
   */
  async releaseEscrow(session: Session<unknown>): Promise<void> {
    const entries = [...session.escrow];
    session.escrow.clear();
    for (const [userId, amount] of entries) {
      if (amount <= 0) {
        continue;
      }
      const refund = { sessionId: session.sessionId, userId, amount };
      if (!(await this.refund(refund))) {
        this.parkedRefunds.push(refund);
        this.notifier.notify(
          `🚨 Escrow refund of ${amount} credits to <@${userId}> failed (session ${session.sessionId}). It will be retried.`
        );
      }
    }
  }

  private async retryParkedRefunds(): Promise<void> {
    const due = this.parkedRefunds.splice(0);
    for (const refund of due) {
      if (await this.refund(refund)) {
        logger.info(`Parked refund of ${refund.amount} to ${refund.userId} landed (session ${refund.sessionId})`);
      } else {
        this.parkedRefunds.push(refund);
      }
    }
  }

  private async refund({ sessionId, userId, amount }: ParkedRefund): Promise<boolean> {
    try {
      await this.wallet.credit(userId, amount, LedgerReason.ESCROW_REFUND);
      return true;
    } catch (error) {
      logger.error(`Escrow refund failed for ${userId} (session ${sessionId}):`, error);
      return false;
    }
  }
}

function initialState(kind: SessionKind): SessionState {
  switch (kind) {
    case SessionKind.DUEL:
      return 'open';
    case SessionKind.REDBLACK:
    case SessionKind.BLACKJACK:
      return 'awaiting_bet';
    case SessionKind.SALE:
    case SessionKind.TRADE:
      return 'pending';
  }
}
