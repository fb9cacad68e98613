/**
 * Economy error taxonomy
 *
 * Every rejection a player can trigger is an EconomyError. Commands reply with
 * `message` as-is, so messages are written for the player, not the operator.
 */
export abstract class EconomyError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed arguments or out-of-range amounts
 */
export class ValidationError extends EconomyError {
  readonly code = 'validation';
}

export class InsufficientFundsError extends EconomyError {
  readonly code = 'insufficient_funds';

  constructor(
    readonly balance: number,
    readonly required: number
  ) {
    super(`Insufficient credits. Your balance is ${balance}, but ${required} is required.`);
  }
}

/**
 * Unknown session, item or case
 */
export class NotFoundError extends EconomyError {
  readonly code = 'not_found';
}

export class DailyLimitError extends EconomyError {
  readonly code = 'daily_limit';

  constructor(
    readonly action: string,
    readonly limit: number
  ) {
    super(`Daily limit reached: you can ${action} at most ${limit} times per day.`);
  }
}

/**
 * Acting on someone else's prompt, or on your own two-party challenge
 */
export class ForbiddenActionError extends EconomyError {
  readonly code = 'forbidden';
}

/**
 * A session was claimed or resolved by another path first
 */
export class ConcurrencyConflictError extends EconomyError {
  readonly code = 'conflict';

  constructor(message = 'This action was already handled.') {
    super(message);
  }
}

/**
 * The backing store was unreachable or returned an unusable record
 */
export class TransientStoreError extends EconomyError {
  readonly code = 'store_unavailable';

  constructor(
    readonly operation: string,
    readonly originalError?: unknown
  ) {
    super('The credit store is temporarily unavailable. Please try again later.');
  }
}

export function isEconomyError(error: unknown): error is EconomyError {
  return error instanceof EconomyError;
}
