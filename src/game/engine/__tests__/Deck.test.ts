/**
 * Deck.test.ts
 */

import {
  createDeck,
  createStackedDeck,
  createShuffledDeck,
  createSeededRandom,
  dealCards,
  burnCard,
  remainingCards,
} from '../Deck';
import { formatCard, formatCards, parseCards } from '../Card';
import { HandEvaluationError, InvalidTableError } from '../EngineErrors';

describe('Deck', () => {
  test('fresh deck holds 52 distinct cards', () => {
    const deck = createDeck();
    expect(deck.cards).toHaveLength(52);
    expect(new Set(deck.cards.map(formatCard)).size).toBe(52);
  });

  test('same seed shuffles the same order', () => {
    const a = createShuffledDeck(createSeededRandom(7));
    const b = createShuffledDeck(createSeededRandom(7));
    const c = createShuffledDeck(createSeededRandom(8));
    expect(a.cards).toEqual(b.cards);
    expect(a.cards).not.toEqual(c.cards);
  });

  test('deals from the top without mutating the deck', () => {
    const deck = createStackedDeck(parseCards('As Kd 7h 2c'));
    const [cards, rest] = dealCards(deck, 2);

    expect(formatCards(cards)).toBe('A♠ K♦');
    expect(remainingCards(rest)).toBe(2);
    expect(remainingCards(deck)).toBe(4);
  });

  test('burn discards the top card', () => {
    const deck = burnCard(createStackedDeck(parseCards('As Kd 7h')));
    expect(formatCards(dealCards(deck, 1)[0])).toBe('K♦');
  });

  test('cannot deal more than remain', () => {
    const deck = createStackedDeck(parseCards('As Kd'));
    expect(() => dealCards(deck, 3)).toThrow(InvalidTableError);
  });

  test('stacked deck rejects duplicates', () => {
    expect(() => createStackedDeck(parseCards('As Kd As'))).toThrow(HandEvaluationError);
  });
});
