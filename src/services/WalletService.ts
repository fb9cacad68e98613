import { z } from 'zod';
import type { KeyValueStore } from '../lib/store.js';
import type { Account, AuditSink, OperatorNotifier } from '../lib/types.js';
import { GameKind, LedgerReason, STORE_KEYS } from '../constants.js';
import { KeyedMutex } from '../lib/lock.js';
import { InsufficientFundsError, TransientStoreError, ValidationError } from '../lib/errors.js';
import { safeLogger as logger } from '../lib/safe-logger.js';

const gameCountersSchema = z.object({
  played: z.number().int().nonnegative(),
  won: z.number().int().nonnegative(),
});

/**
 * Persisted account record (JSON under `user:<id>`)
 */
const accountSchema = z.object({
  id: z.string().min(1),
  balance: z.number().int().nonnegative(),
  stats: z.record(z.nativeEnum(GameKind), gameCountersSchema).default({}),
});

export function serializeAccount(account: Account): string {
  return JSON.stringify({ id: account.id, balance: account.balance, stats: account.stats });
}

/**
 * Parse a stored account record
 * An unreadable record is a store failure, never a zero balance
 */
export function parseAccount(raw: string): Account {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new TransientStoreError('parse account', error);
  }
  const parsed = accountSchema.safeParse(json);
  if (!parsed.success) {
    throw new TransientStoreError('parse account', parsed.error);
  }
  return parsed.data;
}

export function emptyAccount(userId: string): Account {
  return { id: userId, balance: 0, stats: {} };
}

function assertPositiveAmount(amount: number, what: string): void {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new ValidationError(`${what} must be a positive whole number.`);
  }
}

export interface WalletServiceOptions {
  audit?: AuditSink;
  notifier?: OperatorNotifier;
}

/**
 * WalletService is the credit ledger: the single source of truth for balances
 *
 * - Accounts are created lazily (absent record = balance 0) and never deleted
 * - Every mutation is a read-modify-write under a per-account lock, re-reading
 *   the store each time; nothing is cached between calls
 * - Balances are clamped at 0 after every adjustment
 * - Store retries are handled by the RetryingStore the service is given
 */
export class WalletService {
  private readonly locks = new KeyedMutex();
  private readonly audit: AuditSink;
  private readonly notifier: OperatorNotifier;

  constructor(
    private readonly store: KeyValueStore,
    options: WalletServiceOptions = {}
  ) {
    this.audit = options.audit ?? {
      record: (entry) =>
        logger.debug(
          `Ledger: ${entry.userId} ${entry.delta >= 0 ? '+' : ''}${entry.delta} (${entry.oldBalance} -> ${entry.newBalance}) [${entry.reason}]`
        ),
    };
    this.notifier = options.notifier ?? { notify: (message) => logger.error(message) };
  }

  private key(userId: string): string {
    return `${STORE_KEYS.ACCOUNT}${userId}`;
  }

  /**
   * Strict read of a user's account
   * @throws TransientStoreError when the store stays unavailable
   */
  async getAccount(userId: string): Promise<Account> {
    const raw = await this.store.get(this.key(userId));
    return raw === null ? emptyAccount(userId) : parseAccount(raw);
  }

  /**
   * Get user's current balance
   * Fails open: a store outage reads as 0 so games are not blocked
   *
   * @param userId - Discord user ID
   */
  async getBalance(userId: string): Promise<number> {
    try {
      return (await this.getAccount(userId)).balance;
    } catch (error) {
      if (error instanceof TransientStoreError) {
        logger.error(`Balance read failed for ${userId}, reporting 0:`, error.originalError ?? error);
        return 0;
      }
      throw error;
    }
  }

  /**
   * Apply a signed delta, flooring the result at 0
   * A debit larger than the balance is not rejected: the balance becomes 0
   *
   * @param userId - Discord user ID
   * @param delta - Amount to add/subtract (negative for deductions)
   * @param reason - Audit reason
   * @returns New balance after update
   */
  async adjust(userId: string, delta: number, reason: LedgerReason): Promise<number> {
    if (!Number.isSafeInteger(delta)) {
      throw new ValidationError('Amount must be a whole number.');
    }
    const account = await this.mutate(userId, reason, (current) => ({
      ...current,
      balance: Math.max(0, current.balance + delta),
    }));
    return account.balance;
  }

  /**
   * Set the balance to an absolute value (admin correction)
   * Read and write happen under one account lock.
   *
   * @returns New balance
   */
  async setBalance(userId: string, target: number, reason: LedgerReason): Promise<number> {
    if (!Number.isSafeInteger(target) || target < 0) {
      throw new ValidationError('Balance must be a non-negative whole number.');
    }
    const account = await this.mutate(userId, reason, (current) => ({ ...current, balance: target }));
    return account.balance;
  }

  /**
   * Add credits (winnings, refunds, grants)
   */
  async credit(userId: string, amount: number, reason: LedgerReason): Promise<number> {
    assertPositiveAmount(amount, 'Amount');
    return this.adjust(userId, amount, reason);
  }

  /**
   * Take credits only if the balance covers them (bets, escrow, purchases)
   *
   * @throws InsufficientFundsError without touching the account
   * @returns New balance after the debit
   */
  async debit(userId: string, amount: number, reason: LedgerReason): Promise<number> {
    assertPositiveAmount(amount, 'Amount');
    const account = await this.mutate(userId, reason, (current) => {
      if (current.balance < amount) {
        throw new InsufficientFundsError(current.balance, amount);
      }
      return { ...current, balance: current.balance - amount };
    });
    return account.balance;
  }

  /**
   * Move credits between users: debit the sender, then credit the receiver
   *
   * The two halves are separate writes. If the credit fails the debit is
   * reversed; if that reversal fails too an operator notice is raised, since
   * the credits are then out of circulation.
   */
  async transfer(
    senderId: string,
    receiverId: string,
    amount: number
  ): Promise<{ senderBalance: number; receiverBalance: number }> {
    assertPositiveAmount(amount, 'Transfer amount');
    if (senderId === receiverId) {
      throw new ValidationError('You cannot transfer credits to yourself.');
    }

    const senderBalance = await this.debit(senderId, amount, LedgerReason.TRANSFER_SENT);

    let receiverBalance: number;
    try {
      receiverBalance = await this.credit(receiverId, amount, LedgerReason.TRANSFER_RECEIVED);
    } catch (error) {
      await this.compensate(senderId, amount, `transfer ${senderId} -> ${receiverId}`);
      throw error;
    }

    logger.info(`Transfer: ${senderId} -> ${receiverId} (${amount} credits)`);
    return { senderBalance, receiverBalance };
  }

  /**
   * Give credits back after the second half of a multi-step operation failed
   * @returns true when the credits were restored
   */
  async compensate(userId: string, amount: number, context: string): Promise<boolean> {
    try {
      await this.credit(userId, amount, LedgerReason.COMPENSATION);
      this.notifier.notify(`⚠️ ${context} failed midway; ${amount} credits returned to <@${userId}>.`);
      return true;
    } catch (error) {
      logger.error(`Compensation failed for ${userId}:`, error);
      this.notifier.notify(`🚨 ${context} failed midway and ${amount} credits owed to <@${userId}> could not be returned.`);
      return false;
    }
  }

  /**
   * Increment played (and won) counters for a game
   */
  async recordGame(userId: string, game: GameKind, won: boolean): Promise<void> {
    await this.mutate(userId, null, (current) => {
      const counters = current.stats[game] ?? { played: 0, won: 0 };
      return {
        ...current,
        stats: {
          ...current.stats,
          [game]: { played: counters.played + 1, won: counters.won + (won ? 1 : 0) },
        },
      };
    });
  }

  /**
   * Read-modify-write cycle under the account lock
   * `reason` null means a stats-only change with no audit entry
   */
  private async mutate(
    userId: string,
    reason: LedgerReason | null,
    apply: (current: Account) => Account
  ): Promise<Account> {
    return this.locks.runExclusive(userId, async () => {
      const current = await this.getAccount(userId);
      const next = apply(current);

      try {
        await this.store.set(this.key(userId), serializeAccount(next));
      } catch (error) {
        if (error instanceof TransientStoreError) {
          this.notifier.notify(
            `🚨 Ledger write lost for <@${userId}>` +
              (reason ? ` (${reason}, ${current.balance} -> ${next.balance})` : ' (stats update)') +
              '. The change was not applied.'
          );
        }
        throw error;
      }

      const delta = next.balance - current.balance;
      if (reason && delta !== 0) {
        this.audit.record({
          userId,
          oldBalance: current.balance,
          newBalance: next.balance,
          delta,
          reason,
          at: new Date(),
        });
      }
      return next;
    });
  }
}
