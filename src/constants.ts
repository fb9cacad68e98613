/**
 * Session kinds tracked by the session registry
 */
export enum SessionKind {
  DUEL = 'duel',
  REDBLACK = 'redblack',
  SALE = 'sale',
  TRADE = 'trade',
  BLACKJACK = 'blackjack',
}

/**
 * Games that keep played/won counters on the account record
 */
export enum GameKind {
  DUEL = 'duel',
  REDBLACK = 'redblack',
  BLACKJACK = 'blackjack',
}

/**
 * Reasons attached to every ledger adjustment (audit trail)
 */
export enum LedgerReason {
  // Betting
  DUEL_ESCROW = 'duel_escrow',
  DUEL_WON = 'duel_won',
  REDBLACK_BET = 'redblack_bet',
  REDBLACK_WON = 'redblack_won',
  BLACKJACK_BET = 'blackjack_bet',
  BLACKJACK_WON = 'blackjack_won',
  BLACKJACK_PUSH = 'blackjack_push',

  // Refunds
  ESCROW_REFUND = 'escrow_refund',
  COMPENSATION = 'compensation',

  // Cases and items
  CASE_PURCHASE = 'case_purchase',
  ITEM_SALE = 'item_sale',
  TRADE_PAYMENT = 'trade_payment',
  TRADE_PROCEEDS = 'trade_proceeds',

  // Economy
  TRANSFER_SENT = 'transfer_sent',
  TRANSFER_RECEIVED = 'transfer_received',
  ADMIN_GRANT = 'admin_grant',
  ADMIN_SET = 'admin_set',
  VOICE_REWARD = 'voice_reward',
}

/**
 * Ledger store configuration
 */
export const STORE_CONFIG = {
  // Attempts per store operation (first try included)
  MAX_ATTEMPTS: 3,
  // Fixed delay between attempts
  RETRY_BACKOFF_MS: 200,
} as const;

/**
 * Session lifetimes (in minutes)
 * How long a challenge, round or confirmation prompt stays actionable
 */
export const SESSION_TTL_MINUTES: Record<SessionKind, number> = {
  [SessionKind.DUEL]: 15,
  [SessionKind.REDBLACK]: 15,
  [SessionKind.SALE]: 2,
  [SessionKind.TRADE]: 5,
  [SessionKind.BLACKJACK]: 15,
} as const;

/**
 * Red/black round configuration
 */
export const REDBLACK_CONFIG = {
  SIDES: ['red', 'black'] as const,
  // Cosmetic reveal frames shown before the result
  REVEAL_FRAMES: 5,
  REVEAL_FRAME_DELAY_MS: 500,
} as const;

/**
 * Blackjack configuration
 */
export const BLACKJACK_CONFIG = {
  // Dealer draws until reaching this total
  DEALER_STAND_VALUE: 17,
  BUST_THRESHOLD: 21,
} as const;

/**
 * Case (loot box) configuration
 */
export const CASE_CONFIG = {
  // Items drawn per opened case
  DRAW_COUNT: 3,
  // Opens and purchases allowed per user per UTC day
  DAILY_OPEN_LIMIT: 5,
  DAILY_PURCHASE_LIMIT: 5,
  // Bank restock
  BANK_STOCK_PER_CASE: 10,
  BANK_REFILL_HOURS: 12,
} as const;

/**
 * Daily counters expire a day after they are created
 */
export const DAILY_COUNTER_TTL_SECONDS = 24 * 60 * 60;

/**
 * Price feed configuration
 */
export const PRICE_CONFIG = {
  RECOMPUTE_INTERVAL_MINUTES: 15,
  // Reference samples kept for the rolling average
  HISTORY_WINDOW_HOURS: 24,
  // Deviation from the average is clamped to this magnitude
  MAX_DEVIATION: 0.5,
  // Fallback base price for a rarity missing from the table
  DEFAULT_BASE_PRICE: 10,
} as const;

/**
 * Voice presence rewards
 */
export const VOICE_CONFIG = {
  CREDITS_PER_MINUTE: 1,
  TICK_INTERVAL_MS: 60_000,
} as const;

/**
 * Leaderboard configuration
 */
export const LEADERBOARD_CONFIG = {
  DEFAULT_LIMIT: 5,
} as const;

/**
 * Store key prefixes
 */
export const STORE_KEYS = {
  ACCOUNT: 'user:',
  INVENTORY: 'inventory:',
  CASE_BANK: 'case_bank',
  DAILY: 'daily:',
} as const;
