import type { WalletService } from '../services/WalletService.js';
import { LedgerReason } from '../constants.js';
import { ValidationError } from './errors.js';
import { safeLogger as logger } from './safe-logger.js';

/**
 * `+` adds, `-` removes (floored at 0), `=` sets the balance
 */
export type MassOperationMode = '+' | '-' | '=';

export interface MassOperation {
  mode: MassOperationMode;
  amount: number;
}

export type MassAdjustOutcome =
  | { userId: string; ok: true; balance: number }
  | { userId: string; ok: false; error: unknown };

const OPERATION_PATTERN = /^([+\-=])(\d+)$/;
const USER_ID_PATTERN = /<@!?(\d{15,21})>|\b(\d{15,21})\b/g;

/**
 * Parse an operation such as `+100`, `-25` or `=0`
 */
export function parseMassOperation(text: string): MassOperation {
  const match = OPERATION_PATTERN.exec(text.trim());
  if (!match) {
    throw new ValidationError('The operation must be +, - or = followed by a whole number, like +100 or =0.');
  }
  const amount = Number.parseInt(match[2], 10);
  if (!Number.isSafeInteger(amount)) {
    throw new ValidationError('That amount is too large.');
  }
  const mode = match[1] === '+' ? '+' : match[1] === '-' ? '-' : '=';
  return { mode, amount };
}

/**
 * Discord user IDs from mentions or raw IDs, in order, without duplicates
 */
export function parseUserIds(text: string): string[] {
  const ids: string[] = [];
  for (const match of text.matchAll(USER_ID_PATTERN)) {
    const id = match[1] ?? match[2];
    if (id && !ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
}

function applyOne(wallet: WalletService, userId: string, { mode, amount }: MassOperation): Promise<number> {
  switch (mode) {
    case '+':
      return wallet.adjust(userId, amount, LedgerReason.ADMIN_GRANT);
    case '-':
      return wallet.adjust(userId, -amount, LedgerReason.ADMIN_GRANT);
    case '=':
      return wallet.setBalance(userId, amount, LedgerReason.ADMIN_SET);
  }
}

/**
 * Apply one operation to every user in turn
 * A user whose update fails is reported and the rest still run.
 */
export async function applyMassOperation(
  wallet: WalletService,
  userIds: readonly string[],
  operation: MassOperation
): Promise<MassAdjustOutcome[]> {
  const outcomes: MassAdjustOutcome[] = [];
  for (const userId of userIds) {
    try {
      outcomes.push({ userId, ok: true, balance: await applyOne(wallet, userId, operation) });
    } catch (error) {
      logger.error(`Mass adjustment ${operation.mode}${operation.amount} failed for ${userId}:`, error);
      outcomes.push({ userId, ok: false, error });
    }
  }
  return outcomes;
}
