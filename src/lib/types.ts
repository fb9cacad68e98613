import { GameKind, LedgerReason, SessionKind } from '../constants.js';

/**
 * Played/won counters for one game
 */
export interface GameCounters {
  played: number;
  won: number;
}

/**
 * Account record (one per Discord user)
 * Balance is never negative
 */
export interface Account {
  id: string;
  balance: number;
  stats: Partial<Record<GameKind, GameCounters>>;
}

/**
 * One successful non-zero balance adjustment
 */
export interface AuditEntry {
  userId: string;
  oldBalance: number;
  newBalance: number;
  delta: number;
  reason: LedgerReason;
  at: Date;
}

/**
 * Destination of ledger audit entries
 */
export interface AuditSink {
  record(entry: AuditEntry): void;
}

/**
 * Operator-facing failure notices (lost writes, failed compensations)
 */
export interface OperatorNotifier {
  notify(message: string): void;
}

/**
 * Lifecycle state shared by all session variants
 */
export type SessionState =
  | 'open'
  | 'accepted'
  | 'awaiting_bet'
  | 'in_progress'
  | 'pending'
  | 'resolved'
  | 'expired';

/**
 * Ephemeral in-memory session (duel, red/black or blackjack round, sale or trade prompt)
 */
export interface Session<TData = Record<string, unknown>> {
  sessionId: string;
  kind: SessionKind;
  ownerId: string;
  state: SessionState;
  createdAt: Date;
  expiresAt: Date;
  /** Credits debited per participant and not yet released */
  escrow: Map<string, number>;
  data: TData;
}

export type RedBlackSide = 'red' | 'black';

export interface DuelData {
  bet: number;
  opponentId: string | null;
}

export interface RedBlackData {
  side: RedBlackSide | null;
  amount: number;
}

/**
 * Playing card; rank 2-14 (11=J, 12=Q, 13=K, 14=A)
 */
export interface Card {
  rank: number;
  suit: string;
}

export interface BlackjackData {
  bet: number;
  /** Undealt cards, drawn from the end */
  deck: Card[];
  playerCards: Card[];
  dealerCards: Card[];
}

export interface SaleData {
  itemId: string;
  quantity: number;
  /** Payout quoted when the sale was requested */
  payout: number;
}

export interface TradeData {
  buyerId: string;
  itemId: string;
  quantity: number;
  price: number;
}

/**
 * Rarity tier (draw weight and pricing)
 */
export interface RarityTier {
  tag: string;
  weight: number;
  basePrice: number;
  volatility: number;
  color: number;
  emoji: string;
}

/**
 * Collectible item
 */
export interface CatalogItem {
  id: string;
  name: string;
  description: string;
  rarity: string;
  collection: string;
}

/**
 * Openable container
 */
export interface CaseDefinition {
  id: string;
  name: string;
  collections: string[];
  price: number;
}

/**
 * Per-user holdings
 */
export interface Inventory {
  items: Record<string, number>;
  cases: Record<string, number>;
}

/**
 * Shared case stock
 */
export interface CaseBank {
  stock: Record<string, number>;
  lastRefilled: string;
}

/**
 * Leaderboard entry
 */
export interface LeaderboardEntry {
  user_id: string;
  balance: number;
  rank: number;
}
