/**
 * Card.ts
 * Card representation for Texas Hold'em
 *
 * Immutable card type with suit and rank.
 */

import { EngineErrors } from './EngineErrors';

// ============================================================================
// Types
// ============================================================================

export type Suit = 'clubs' | 'diamonds' | 'hearts' | 'spades';

export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;
// 11 = Jack, 12 = Queen, 13 = King, 14 = Ace

export interface Card {
  readonly suit: Suit;
  readonly rank: Rank;
}

// ============================================================================
// Constants
// ============================================================================

export const SUITS: readonly Suit[] = ['clubs', 'diamonds', 'hearts', 'spades'];

export const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];

export const RANK_NAMES: Record<Rank, string> = {
  2: '2',
  3: '3',
  4: '4',
  5: '5',
  6: '6',
  7: '7',
  8: '8',
  9: '9',
  10: 'T',
  11: 'J',
  12: 'Q',
  13: 'K',
  14: 'A',
};

export const SUIT_SYMBOLS: Record<Suit, string> = {
  clubs: '♣',
  diamonds: '♦',
  hearts: '♥',
  spades: '♠',
};

const SUIT_BY_CHAR: Record<string, Suit> = {
  c: 'clubs',
  d: 'diamonds',
  h: 'hearts',
  s: 'spades',
};

const RANK_BY_CHAR: Record<string, Rank> = {
  A: 14,
  K: 13,
  Q: 12,
  J: 11,
  T: 10,
  '10': 10,
};

// ============================================================================
// Functions
// ============================================================================

export function isRank(value: number): value is Rank {
  return Number.isInteger(value) && value >= 2 && value <= 14;
}

/**
 * Create a card
 */
export function createCard(suit: Suit, rank: Rank): Card {
  return { suit, rank };
}

/**
 * Rank value with the ace played low (1). Only the wheel uses it.
 */
export function lowAceValue(card: Card): number {
  return card.rank === 14 ? 1 : card.rank;
}

/**
 * Format card for display (e.g., "A♠", "K♥")
 */
export function formatCard(card: Card): string {
  return `${RANK_NAMES[card.rank]}${SUIT_SYMBOLS[card.suit]}`;
}

export function formatCards(cards: readonly Card[]): string {
  return cards.map(formatCard).join(' ');
}

/**
 * Total order over cards: rank first, then suit (clubs < diamonds < hearts < spades)
 */
export function compareCards(a: Card, b: Card): number {
  if (a.rank !== b.rank) return a.rank - b.rank;
  return SUITS.indexOf(a.suit) - SUITS.indexOf(b.suit);
}

/**
 * Check if two cards are equal
 */
export function cardsEqual(a: Card, b: Card): boolean {
  return a.suit === b.suit && a.rank === b.rank;
}

/**
 * Parse card from string notation (e.g., "As", "Kh", "2c", "10d")
 */
export function parseCard(notation: string): Card | null {
  const trimmed = notation.trim();
  if (trimmed.length < 2) return null;

  const rankChar = trimmed.slice(0, -1).toUpperCase();
  const suit = SUIT_BY_CHAR[trimmed.slice(-1).toLowerCase()];
  if (suit === undefined) return null;

  const named = RANK_BY_CHAR[rankChar];
  if (named !== undefined) {
    return createCard(suit, named);
  }

  if (!/^[2-9]$/.test(rankChar)) return null;
  const num = parseInt(rankChar, 10);
  return isRank(num) ? createCard(suit, num) : null;
}

/**
 * Parse a whitespace- or comma-separated card list ("As Kd 7h")
 *
 * @throws HandEvaluationError on the first unreadable card
 */
export function parseCards(notation: string): Card[] {
  const tokens = notation.split(/[\s,]+/).filter(t => t.length > 0);
  return tokens.map(token => {
    const card = parseCard(token);
    if (card === null) {
      throw EngineErrors.invalidCard(token);
    }
    return card;
  });
}
