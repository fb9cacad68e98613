import { describe, expect, it } from 'vitest';
import { createDeck, formatCard, formatCards, handValue } from '../../src/lib/cards.js';
import type { Card } from '../../src/lib/types.js';

const hand = (...ranks: number[]): Card[] => ranks.map((rank) => ({ rank, suit: '♥️' }));

describe('cards', () => {
  it('builds 52 distinct cards', () => {
    const deck = createDeck();
    expect(deck).toHaveLength(52);
    expect(new Set(deck.map((card) => `${card.rank}${card.suit}`)).size).toBe(52);
  });

  it('counts face cards as 10', () => {
    expect(handValue(hand(11, 12))).toBe(20);
    expect(handValue(hand(13, 5))).toBe(15);
  });

  it('counts an ace as 11 until that would bust', () => {
    expect(handValue(hand(14, 13))).toBe(21);
    expect(handValue(hand(14, 14))).toBe(12);
    expect(handValue(hand(14, 9, 5))).toBe(15);
    expect(handValue(hand(14, 14, 9))).toBe(21);
  });

  it('formats ranks with their suit', () => {
    expect(formatCard({ rank: 14, suit: '♠️' })).toBe('A♠️');
    expect(formatCards(hand(10, 12))).toBe('10♥️ Q♥️');
  });
});
