/**
 * Standard 52-card deck and blackjack hand values
 */
import type { Card } from './types.js';

const SUITS = ['♠️', '♥️', '♦️', '♣️'] as const;
const RANK_DISPLAY: Record<number, string> = {
  11: 'J',
  12: 'Q',
  13: 'K',
  14: 'A',
};

/**
 * Create a new shuffled 52-card deck
 */
export function createDeck(random: () => number = Math.random): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (let rank = 2; rank <= 14; rank++) {
      deck.push({ rank, suit });
    }
  }
  return shuffle(deck, random);
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle(deck: readonly Card[], random: () => number = Math.random): Card[] {
  const shuffled = [...deck];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * Face cards count 10, an ace 11 (demoted by handValue)
 */
export function cardValue(card: Card): number {
  if (card.rank >= 11 && card.rank <= 13) return 10;
  if (card.rank === 14) return 11;
  return card.rank;
}

/**
 * Best total of a hand: aces count 11 until that would bust, then 1
 */
export function handValue(cards: readonly Card[]): number {
  let total = 0;
  let aces = 0;

  for (const card of cards) {
    if (card.rank === 14) aces++;
    total += cardValue(card);
  }

  // Demote aces from 11 to 1 as needed
  while (total > 21 && aces > 0) {
    total -= 10;
    aces--;
  }

  return total;
}

export function formatCard(card: Card): string {
  const rank = RANK_DISPLAY[card.rank] ?? card.rank.toString();
  return `${rank}${card.suit}`;
}

export function formatCards(cards: readonly Card[]): string {
  return cards.map((card) => formatCard(card)).join(' ');
}
