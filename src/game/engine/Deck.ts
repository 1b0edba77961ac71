/**
 * Deck.ts
 * Standard 52-card deck with shuffle and deal
 *
 * Uses Fisher-Yates shuffle over an injectable random source.
 * Immutable operations return new deck state.
 */

import { Card, SUITS, RANKS, createCard, cardsEqual, formatCard } from './Card';
import { EngineErrors } from './EngineErrors';

// ============================================================================
// Types
// ============================================================================

export interface Deck {
  readonly cards: readonly Card[];
  readonly dealt: number; // Number of cards dealt from top
}

/**
 * Returns a float in [0, 1)
 */
export type RandomSource = () => number;

// ============================================================================
// Functions
// ============================================================================

/**
 * Create a fresh 52-card deck (unshuffled)
 */
export function createDeck(): Deck {
  const cards: Card[] = [];

  for (const suit of SUITS) {
    for (const rank of RANKS) {
      cards.push(createCard(suit, rank));
    }
  }

  return { cards, dealt: 0 };
}

/**
 * Build a deck in a fixed order (top card first)
 */
export function createStackedDeck(cards: readonly Card[]): Deck {
  for (let i = 0; i < cards.length; i++) {
    for (let j = i + 1; j < cards.length; j++) {
      if (cardsEqual(cards[i], cards[j])) {
        throw EngineErrors.duplicateCard(formatCard(cards[i]));
      }
    }
  }
  return { cards: [...cards], dealt: 0 };
}

/**
 * Deterministic generator (mulberry32) for reproducible shuffles
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Shuffle the deck using Fisher-Yates algorithm
 * Returns a new shuffled deck
 */
export function shuffleDeck(deck: Deck, random: RandomSource = Math.random): Deck {
  const cards = [...deck.cards];

  for (let i = cards.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [cards[i], cards[j]] = [cards[j], cards[i]];
  }

  return { cards, dealt: 0 };
}

/**
 * Deal n cards from the top of the deck
 * Returns [dealt cards, new deck state]
 */
export function dealCards(deck: Deck, count: number): [Card[], Deck] {
  const remaining = deck.cards.length - deck.dealt;

  if (count > remaining) {
    throw EngineErrors.invalidTable(`cannot deal ${count} cards, only ${remaining} remaining`);
  }

  const dealtCards = deck.cards.slice(deck.dealt, deck.dealt + count);
  return [dealtCards, { cards: deck.cards, dealt: deck.dealt + count }];
}

/**
 * Discard the top card
 */
export function burnCard(deck: Deck): Deck {
  return dealCards(deck, 1)[1];
}

/**
 * Get remaining card count
 */
export function remainingCards(deck: Deck): number {
  return deck.cards.length - deck.dealt;
}

/**
 * Create and shuffle a new deck
 */
export function createShuffledDeck(random: RandomSource = Math.random): Deck {
  return shuffleDeck(createDeck(), random);
}
