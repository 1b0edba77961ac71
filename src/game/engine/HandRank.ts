/**
 * HandRank.ts
 * Hand ranking types for Texas Hold'em
 *
 * Defines the 10 standard poker hand rankings and their tie-break fields.
 */

import { Card, Rank } from './Card';

// ============================================================================
// Types
// ============================================================================

/**
 * Hand category (1 = worst, 10 = best)
 */
export type HandCategory =
  | 1  // High Card
  | 2  // One Pair
  | 3  // Two Pair
  | 4  // Three of a Kind
  | 5  // Straight
  | 6  // Flush
  | 7  // Full House
  | 8  // Four of a Kind
  | 9  // Straight Flush
  | 10; // Royal Flush

/**
 * Category-specific tie-break fields, tagged by kind
 */
export type HandDetail =
  | { readonly kind: 'high-card'; readonly ranks: readonly Rank[] }
  | { readonly kind: 'one-pair'; readonly pair: Rank; readonly kickers: readonly Rank[] }
  | { readonly kind: 'two-pair'; readonly highPair: Rank; readonly lowPair: Rank; readonly kicker: Rank }
  | { readonly kind: 'three-of-a-kind'; readonly trips: Rank; readonly kickers: readonly Rank[] }
  | { readonly kind: 'straight'; readonly high: Rank }
  | { readonly kind: 'flush'; readonly ranks: readonly Rank[] }
  | { readonly kind: 'full-house'; readonly trips: Rank; readonly pair: Rank }
  | { readonly kind: 'four-of-a-kind'; readonly quads: Rank; readonly kicker: Rank }
  | { readonly kind: 'straight-flush'; readonly high: Rank }
  | { readonly kind: 'royal-flush' };

export type HandKind = HandDetail['kind'];

/**
 * Complete hand evaluation result
 */
export interface HandRank {
  /** Hand category (1-10) */
  readonly category: HandCategory;
  /** Tie-break fields */
  readonly detail: HandDetail;
  /** Tie-break values in priority order, derived from detail */
  readonly kickers: readonly number[];
  /** Human-readable description */
  readonly description: string;
  /** The five cards that make the hand */
  readonly cards: readonly Card[];
}

// ============================================================================
// Constants
// ============================================================================

export const HAND_CATEGORY_BY_KIND: Record<HandKind, HandCategory> = {
  'high-card': 1,
  'one-pair': 2,
  'two-pair': 3,
  'three-of-a-kind': 4,
  'straight': 5,
  'flush': 6,
  'full-house': 7,
  'four-of-a-kind': 8,
  'straight-flush': 9,
  'royal-flush': 10,
};

// ============================================================================
// Naming
// ============================================================================

export function getRankName(rank: Rank): string {
  switch (rank) {
    case 14: return 'Ace';
    case 13: return 'King';
    case 12: return 'Queen';
    case 11: return 'Jack';
    default: return rank.toString();
  }
}

export function getRankNamePlural(rank: Rank): string {
  switch (rank) {
    case 6: return 'Sixes';
    default: return getRankName(rank) + 's';
  }
}

// ============================================================================
// Functions
// ============================================================================

/**
 * Flatten the detail into the comparison vector
 */
export function tieBreakValues(detail: HandDetail): number[] {
  switch (detail.kind) {
    case 'royal-flush':
      return [14];
    case 'straight-flush':
    case 'straight':
      return [detail.high];
    case 'four-of-a-kind':
      return [detail.quads, detail.kicker];
    case 'full-house':
      return [detail.trips, detail.pair];
    case 'flush':
    case 'high-card':
      return [...detail.ranks];
    case 'three-of-a-kind':
      return [detail.trips, ...detail.kickers];
    case 'two-pair':
      return [detail.highPair, detail.lowPair, detail.kicker];
    case 'one-pair':
      return [detail.pair, ...detail.kickers];
  }
}

export function describeHand(detail: HandDetail): string {
  switch (detail.kind) {
    case 'royal-flush':
      return 'Royal Flush';
    case 'straight-flush':
      return `Straight Flush, ${getRankName(detail.high)} high`;
    case 'four-of-a-kind':
      return `Four of a Kind, ${getRankNamePlural(detail.quads)}`;
    case 'full-house':
      return `Full House, ${getRankNamePlural(detail.trips)} full of ${getRankNamePlural(detail.pair)}`;
    case 'flush':
      return `Flush, ${getRankName(detail.ranks[0])} high`;
    case 'straight':
      return `Straight, ${getRankName(detail.high)} high`;
    case 'three-of-a-kind':
      return `Three of a Kind, ${getRankNamePlural(detail.trips)}`;
    case 'two-pair':
      return `Two Pair, ${getRankNamePlural(detail.highPair)} and ${getRankNamePlural(detail.lowPair)}`;
    case 'one-pair':
      return `Pair of ${getRankNamePlural(detail.pair)}`;
    case 'high-card':
      return `High Card, ${getRankName(detail.ranks[0])}`;
  }
}

/**
 * Create a HandRank object
 */
export function createHandRank(detail: HandDetail, cards: readonly Card[]): HandRank {
  return {
    category: HAND_CATEGORY_BY_KIND[detail.kind],
    detail,
    kickers: tieBreakValues(detail),
    description: describeHand(detail),
    cards,
  };
}

/**
 * Compare two hand ranks
 * Returns: negative if a < b, positive if a > b, 0 if equal
 */
export function compareHandRanks(a: HandRank, b: HandRank): number {
  if (a.category !== b.category) {
    return a.category - b.category;
  }

  const maxKickers = Math.max(a.kickers.length, b.kickers.length);
  for (let i = 0; i < maxKickers; i++) {
    const aKicker = a.kickers[i] ?? 0;
    const bKicker = b.kickers[i] ?? 0;
    if (aKicker !== bKicker) {
      return aKicker - bKicker;
    }
  }

  return 0;
}

/**
 * Exact equality: same category and every tie-break field
 */
export function handRanksEqual(a: HandRank, b: HandRank): boolean {
  return compareHandRanks(a, b) === 0;
}
