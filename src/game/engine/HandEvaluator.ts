/**
 * HandEvaluator.ts
 * Hand evaluation for Texas Hold'em
 *
 * Evaluates the best 5-card hand from five or more cards.
 * Uses brute-force combination approach for correctness.
 */

import { Card, Rank, cardsEqual, compareCards, formatCard, lowAceValue } from './Card';
import { HandRank, HandDetail, createHandRank, compareHandRanks } from './HandRank';
import { EngineErrors } from './EngineErrors';

// ============================================================================
// Types
// ============================================================================

/**
 * Input for winner determination
 */
export interface HandForComparison {
  readonly playerId: string;
  readonly cards: readonly Card[];
}

export interface WinnerResult {
  readonly winnerIndices: readonly number[];
  readonly winnerIds: readonly string[];
  readonly bestHandRank: HandRank;
  readonly isTie: boolean;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Every subset of `size` items, in input order
 */
function subsetsOfSize<T>(items: readonly T[], size: number, start = 0): T[][] {
  if (size === 0) return [[]];
  const subsets: T[][] = [];
  for (let i = start; i <= items.length - size; i++) {
    for (const tail of subsetsOfSize(items, size - 1, i + 1)) {
      subsets.push([items[i], ...tail]);
    }
  }
  return subsets;
}

/**
 * Count occurrences of each rank
 */
function countRanks(cards: readonly Card[]): Map<Rank, number> {
  const counts = new Map<Rank, number>();
  for (const card of cards) {
    counts.set(card.rank, (counts.get(card.rank) ?? 0) + 1);
  }
  return counts;
}

/**
 * Check if cards form a flush (all same suit)
 */
function isFlush(cards: readonly Card[]): boolean {
  if (cards.length === 0) return false;
  const suit = cards[0].suit;
  return cards.every(c => c.suit === suit);
}

/**
 * Check if cards form a straight and return high card
 * Returns null if not a straight
 * Handles A-2-3-4-5 (wheel) as rank 5 high
 */
function getStraightHighCard(cards: readonly Card[]): Rank | null {
  const ranks = Array.from(new Set(cards.map(c => c.rank))).sort((a, b) => a - b);

  if (ranks.length !== 5) return null;

  if (ranks[4] - ranks[0] === 4) {
    return ranks[4];
  }

  // Wheel: with the ace counted as 1 the five values run 1..5
  const lowValues = cards.map(lowAceValue).sort((a, b) => a - b);
  if (lowValues.every((value, i) => value === i + 1)) {
    return 5;
  }

  return null;
}

function assertDistinct(cards: readonly Card[]): void {
  for (let i = 0; i < cards.length; i++) {
    for (let j = i + 1; j < cards.length; j++) {
      if (cardsEqual(cards[i], cards[j])) {
        throw EngineErrors.duplicateCard(formatCard(cards[i]));
      }
    }
  }
}

// ============================================================================
// 5-Card Hand Evaluation
// ============================================================================

/**
 * Classify exactly five cards
 */
export function classifyFiveCards(cards: readonly Card[]): HandRank {
  if (cards.length !== 5) {
    throw EngineErrors.wrongCardCount(5, cards.length);
  }

  const flush = isFlush(cards);
  const straightHigh = getStraightHighCard(cards);

  // Rank groups by count desc, then rank desc
  const groups = Array.from(countRanks(cards).entries()).sort((a, b) => {
    if (b[1] !== a[1]) return b[1] - a[1];
    return b[0] - a[0];
  });
  const counts = groups.map(g => g[1]);
  const ranks = groups.map(g => g[0]);

  const sorted = [...cards].sort((a, b) => compareCards(b, a));
  const descending = sorted.map(c => c.rank);

  let detail: HandDetail;

  if (flush && straightHigh !== null) {
    detail = straightHigh === 14
      ? { kind: 'royal-flush' }
      : { kind: 'straight-flush', high: straightHigh };
  } else if (counts[0] === 4) {
    detail = { kind: 'four-of-a-kind', quads: ranks[0], kicker: ranks[1] };
  } else if (counts[0] === 3 && counts[1] === 2) {
    detail = { kind: 'full-house', trips: ranks[0], pair: ranks[1] };
  } else if (flush) {
    detail = { kind: 'flush', ranks: descending };
  } else if (straightHigh !== null) {
    detail = { kind: 'straight', high: straightHigh };
  } else if (counts[0] === 3) {
    detail = { kind: 'three-of-a-kind', trips: ranks[0], kickers: [ranks[1], ranks[2]] };
  } else if (counts[0] === 2 && counts[1] === 2) {
    // Groups of equal count are already rank-descending
    detail = { kind: 'two-pair', highPair: ranks[0], lowPair: ranks[1], kicker: ranks[2] };
  } else if (counts[0] === 2) {
    detail = { kind: 'one-pair', pair: ranks[0], kickers: [ranks[1], ranks[2], ranks[3]] };
  } else {
    detail = { kind: 'high-card', ranks: descending };
  }

  // Wheel shows the ace at the bottom
  const ordered = straightHigh === 5
    ? [...sorted.slice(1), sorted[0]]
    : sorted;

  return createHandRank(detail, ordered);
}

// ============================================================================
// Main API
// ============================================================================

/**
 * Evaluate the best 5-card hand from five or more cards
 */
export function evaluateHand(cards: readonly Card[]): HandRank {
  if (cards.length < 5) {
    throw EngineErrors.notEnoughCards(cards.length);
  }
  assertDistinct(cards);

  if (cards.length === 5) {
    return classifyFiveCards(cards);
  }

  let bestRank: HandRank | null = null;
  for (const combo of subsetsOfSize(cards, 5)) {
    const rank = classifyFiveCards(combo);
    if (bestRank === null || compareHandRanks(rank, bestRank) > 0) {
      bestRank = rank;
    }
  }

  if (bestRank === null) {
    throw EngineErrors.notEnoughCards(cards.length);
  }
  return bestRank;
}

/**
 * Evaluate hole cards together with the board
 */
export function evaluateHandWithCommunity(
  holeCards: readonly Card[],
  communityCards: readonly Card[]
): HandRank {
  return evaluateHand([...holeCards, ...communityCards]);
}

/**
 * Compare two hands (each five or more cards)
 * Returns: -1 if a loses, 0 if tie, 1 if a wins
 */
export function compareHands(a: readonly Card[], b: readonly Card[]): -1 | 0 | 1 {
  const result = compareHandRanks(evaluateHand(a), evaluateHand(b));
  if (result < 0) return -1;
  if (result > 0) return 1;
  return 0;
}

/**
 * Determine winner(s) from multiple hands
 *
 * @throws HandEvaluationError if no hands provided
 */
export function determineWinners(hands: readonly HandForComparison[]): WinnerResult {
  if (hands.length === 0) {
    throw EngineErrors.noHands();
  }

  const evaluated = hands.map((h, index) => ({
    index,
    playerId: h.playerId,
    rank: evaluateHand(h.cards),
  }));

  let bestRank = evaluated[0].rank;
  let winners = [evaluated[0]];

  for (let i = 1; i < evaluated.length; i++) {
    const comparison = compareHandRanks(evaluated[i].rank, bestRank);
    if (comparison > 0) {
      bestRank = evaluated[i].rank;
      winners = [evaluated[i]];
    } else if (comparison === 0) {
      winners.push(evaluated[i]);
    }
  }

  return {
    winnerIndices: winners.map(w => w.index),
    winnerIds: winners.map(w => w.playerId),
    bestHandRank: bestRank,
    isTie: winners.length > 1,
  };
}
