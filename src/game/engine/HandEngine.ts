/**
 * HandEngine.ts
 * Drives one hand from forced bets to payouts
 *
 * antes/blinds → hole cards → preflop, flop, turn, river → showdown → payouts
 *
 * Synchronous between decisions; only the decision source may be async.
 * Ledgers and betting rounds are created per hand and discarded after it.
 */

import { Card } from './Card';
import { Deck, RandomSource, createShuffledDeck, dealCards, burnCard } from './Deck';
import { HandRank } from './HandRank';
import { evaluateHandWithCommunity } from './HandEvaluator';
import { EngineConfig, EngineConfigInput } from './EngineConfig';
import { EngineErrors } from './EngineErrors';
import {
  PlayerId,
  Street,
  STREETS,
  TableSeating,
  getPlayersInHand,
  resetForNewHand,
  seatOrderFromButton,
  startStreet,
} from './TableState';
import { BettingRound, ActionRecord, postAntes, postBlinds } from './BettingRound';
import {
  GameEventEmitter,
  GameEventListener,
  HandId,
  RecordedGameEvent,
  createGameEventEmitter,
} from './GameEvents';
import { PotLedger, DistributionResult } from '../../economy/Pot';
import { PotTier, TierAward } from '../../economy/SidePot';
import { DecisionSource } from '../controller/DecisionSource';

// ============================================================================
// Types
// ============================================================================

export interface HandEngineOptions {
  readonly config?: EngineConfig | EngineConfigInput;
  /** Shuffle source when no deck is supplied to playHand */
  readonly random?: RandomSource;
}

export interface HandResult {
  readonly handId: HandId;
  readonly handNumber: number;
  readonly reason: 'showdown' | 'all-fold';
  /** Players who received chips */
  readonly winnerIds: readonly PlayerId[];
  readonly payouts: ReadonlyMap<PlayerId, number>;
  readonly pots: readonly PotTier[];
  readonly awards: readonly TierAward[];
  readonly communityCards: readonly Card[];
  /** Evaluated hands at showdown; empty when the hand ended by folds */
  readonly hands: ReadonlyMap<PlayerId, HandRank>;
  readonly finalStacks: ReadonlyMap<PlayerId, number>;
  readonly actions: readonly ActionRecord[];
  readonly events: readonly RecordedGameEvent[];
}

const COMMUNITY_CARDS_BY_STREET: Record<Street, number> = {
  preflop: 0,
  flop: 3,
  turn: 1,
  river: 1,
};

// ============================================================================
// Hand Engine
// ============================================================================

export class HandEngine {
  private readonly config: EngineConfig;
  private readonly random: RandomSource;
  private readonly eventEmitter: GameEventEmitter;
  private handNumber: number;

  constructor(options: HandEngineOptions = {}) {
    this.config = options.config instanceof EngineConfig
      ? options.config
      : new EngineConfig(options.config);
    this.random = options.random ?? Math.random;
    this.eventEmitter = createGameEventEmitter();
    this.handNumber = 0;
  }

  getConfig(): EngineConfig {
    return this.config;
  }

  /**
   * Subscribe to events
   */
  onEvent(listener: GameEventListener): () => void {
    return this.eventEmitter.on(listener);
  }

  getEventHistory(): readonly RecordedGameEvent[] {
    return this.eventEmitter.getHistory();
  }

  /**
   * Play a complete hand on the given seating
   *
   * @param deck pre-arranged deck; shuffled from the random source when omitted
   */
  async playHand(
    seating: TableSeating,
    decisions: DecisionSource,
    deck?: Deck
  ): Promise<HandResult> {
    const players = seating.players;
    for (const player of players) {
      if (player.stack <= 0) {
        throw EngineErrors.invalidTable(`player ${player.id} has no chips`);
      }
    }

    const handNumber = ++this.handNumber;
    const handId: HandId = `hand_${handNumber}`;
    this.eventEmitter.clear();
    resetForNewHand(players);

    const chipsBefore = players.reduce((sum, p) => sum + p.stack, 0);

    this.eventEmitter.emit({
      type: 'HAND_STARTED',
      handId,
      handNumber,
      dealerIndex: seating.dealerIndex,
      smallBlindIndex: seating.smallBlindIndex,
      bigBlindIndex: seating.bigBlindIndex,
      playerIds: players.map(p => p.id),
      stacks: Object.fromEntries(players.map(p => [p.id, p.stack])),
    });

    const ledger = new PotLedger();
    postAntes(seating, this.config, ledger, { events: this.eventEmitter, handId });
    postBlinds(seating, this.config, ledger, { events: this.eventEmitter, handId });

    let currentDeck = this.dealHoleCards(seating, deck ?? createShuffledDeck(this.random));
    this.eventEmitter.emit({
      type: 'HOLE_CARDS_DEALT',
      handId,
      playerIds: players.map(p => p.id),
    });

    const communityCards: Card[] = [];
    const actions: ActionRecord[] = [];

    for (const street of STREETS) {
      if (getPlayersInHand(players).length <= 1) break;

      if (street !== 'preflop') {
        currentDeck = burnCard(currentDeck);
        const [cards, rest] = dealCards(currentDeck, COMMUNITY_CARDS_BY_STREET[street]);
        currentDeck = rest;
        communityCards.push(...cards);
        startStreet(players);
      }

      this.eventEmitter.emit({
        type: 'STREET_STARTED',
        handId,
        street,
        communityCards: [...communityCards],
        potTotal: ledger.getTotal(),
      });

      // Completes immediately when fewer than two players can act
      const round = new BettingRound({
        street,
        seating,
        config: this.config,
        ledger,
        events: this.eventEmitter,
        handId,
        communityCards: [...communityCards],
      });

      while (!round.isComplete()) {
        const context = round.getDecisionContext();
        if (!context) break;
        const action = await decisions.decide(context);
        round.act(context.playerId, action);
      }
      actions.push(...round.getActions());
    }

    const pots = ledger.derivePots();
    this.eventEmitter.emit({ type: 'POTS_DERIVED', handId, pots });

    const live = getPlayersInHand(players);
    const hands = new Map<PlayerId, HandRank>();
    let distribution: DistributionResult;

    if (live.length <= 1) {
      distribution = ledger.distribute(hands);
    } else {
      for (const player of live) {
        hands.set(player.id, evaluateHandWithCommunity(player.holeCards, communityCards));
      }
      distribution = ledger.distribute(hands, { oddChipOrder: seatOrderFromButton(seating) });
    }

    for (const player of players) {
      player.stack += distribution.payouts.get(player.id) ?? 0;
      player.currentBet = 0;
    }

    const chipsAfter = players.reduce((sum, p) => sum + p.stack, 0);
    if (chipsAfter !== chipsBefore) {
      throw EngineErrors.potInvariant('chips were created or destroyed during the hand', {
        before: chipsBefore,
        after: chipsAfter,
      });
    }

    for (const award of distribution.awards) {
      const winningHand = hands.get(award.winnerIds[0]);
      this.eventEmitter.emit({
        type: 'POT_AWARDED',
        handId,
        award,
        winningHandDescription: winningHand ? winningHand.description : null,
      });
    }

    const winnerIds = Array.from(distribution.payouts.entries())
      .filter(([, amount]) => amount > 0)
      .map(([playerId]) => playerId);
    const reason = distribution.uncontested ? 'all-fold' : 'showdown';
    const finalStacks = new Map(players.map(p => [p.id, p.stack]));

    this.eventEmitter.emit({
      type: 'HAND_ENDED',
      handId,
      reason,
      winnerIds,
      finalStacks: Object.fromEntries(finalStacks),
    });

    return {
      handId,
      handNumber,
      reason,
      winnerIds,
      payouts: distribution.payouts,
      pots,
      awards: distribution.awards,
      communityCards,
      hands,
      finalStacks,
      actions,
      events: this.eventEmitter.getHistory(),
    };
  }

  /**
   * Two cards each, one at a time, starting left of the button
   */
  private dealHoleCards(seating: TableSeating, deck: Deck): Deck {
    const order = seatOrderFromButton(seating);
    let current = deck;
    for (let pass = 0; pass < 2; pass++) {
      for (const playerId of order) {
        const player = seating.players.find(p => p.id === playerId);
        if (!player) continue;
        const [cards, rest] = dealCards(current, 1);
        player.holeCards.push(...cards);
        current = rest;
      }
    }
    return current;
  }
}
