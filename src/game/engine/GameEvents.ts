/**
 * GameEvents.ts
 * Events emitted during a hand
 *
 * Events are immutable records of state changes.
 * Used for hand history, statistics and replay.
 */

import { PlayerId, Street } from './TableState';
import { Card } from './Card';
import { PlayerAction, EffectiveAction } from './ActionNormalizer';
import { PotTier, TierAward } from '../../economy/SidePot';

// ============================================================================
// Event Types
// ============================================================================

export type HandId = string;

export type GameEventType =
  | 'HAND_STARTED'
  | 'ANTE_POSTED'
  | 'BLIND_POSTED'
  | 'HOLE_CARDS_DEALT'
  | 'STREET_STARTED'
  | 'PLAYER_ACTED'
  | 'BETTING_ROUND_COMPLETE'
  | 'POTS_DERIVED'
  | 'POT_AWARDED'
  | 'HAND_ENDED';

// ============================================================================
// Base Event Interface
// ============================================================================

export interface BaseGameEvent {
  readonly type: GameEventType;
  readonly handId: HandId;
}

/**
 * Stamp added by the emitter
 */
export interface EventStamp {
  readonly sequence: number;
  readonly timestamp: number;
}

// ============================================================================
// Specific Events
// ============================================================================

export interface HandStartedEvent extends BaseGameEvent {
  readonly type: 'HAND_STARTED';
  readonly handNumber: number;
  readonly dealerIndex: number;
  readonly smallBlindIndex: number;
  readonly bigBlindIndex: number;
  readonly playerIds: readonly PlayerId[];
  readonly stacks: Readonly<Record<PlayerId, number>>;
}

export interface AntePostedEvent extends BaseGameEvent {
  readonly type: 'ANTE_POSTED';
  readonly playerId: PlayerId;
  readonly amount: number;
  readonly isAllIn: boolean;
}

export interface BlindPostedEvent extends BaseGameEvent {
  readonly type: 'BLIND_POSTED';
  readonly playerId: PlayerId;
  readonly blind: 'small' | 'big';
  readonly amount: number;
  readonly isAllIn: boolean;
}

export interface HoleCardsDealtEvent extends BaseGameEvent {
  readonly type: 'HOLE_CARDS_DEALT';
  readonly playerIds: readonly PlayerId[];
}

export interface StreetStartedEvent extends BaseGameEvent {
  readonly type: 'STREET_STARTED';
  readonly street: Street;
  readonly communityCards: readonly Card[];
  readonly potTotal: number;
}

/**
 * Player has acted; requested and executed action may differ
 */
export interface PlayerActedEvent extends BaseGameEvent {
  readonly type: 'PLAYER_ACTED';
  readonly street: Street;
  readonly playerId: PlayerId;
  readonly requested: PlayerAction;
  readonly effective: EffectiveAction;
  readonly normalized: boolean;
  readonly violation?: string;
  readonly chipsAdded: number;
  readonly playerStack: number;
  readonly potTotal: number;
}

export interface BettingRoundCompleteEvent extends BaseGameEvent {
  readonly type: 'BETTING_ROUND_COMPLETE';
  readonly street: Street;
  readonly potTotal: number;
  readonly livePlayerCount: number;
}

export interface PotsDerivedEvent extends BaseGameEvent {
  readonly type: 'POTS_DERIVED';
  readonly pots: readonly PotTier[];
}

export interface PotAwardedEvent extends BaseGameEvent {
  readonly type: 'POT_AWARDED';
  readonly award: TierAward;
  readonly winningHandDescription: string | null;
}

export interface HandEndedEvent extends BaseGameEvent {
  readonly type: 'HAND_ENDED';
  readonly reason: 'showdown' | 'all-fold';
  readonly winnerIds: readonly PlayerId[];
  readonly finalStacks: Readonly<Record<PlayerId, number>>;
}

// ============================================================================
// Event Union Type
// ============================================================================

export type GameEvent =
  | HandStartedEvent
  | AntePostedEvent
  | BlindPostedEvent
  | HoleCardsDealtEvent
  | StreetStartedEvent
  | PlayerActedEvent
  | BettingRoundCompleteEvent
  | PotsDerivedEvent
  | PotAwardedEvent
  | HandEndedEvent;

export type RecordedGameEvent = GameEvent & EventStamp;

// ============================================================================
// Event Listener Types
// ============================================================================

export type GameEventListener = (event: RecordedGameEvent) => void;

export interface GameEventEmitter {
  on(listener: GameEventListener): () => void;
  emit(event: GameEvent): RecordedGameEvent;
  getHistory(): readonly RecordedGameEvent[];
  clear(): void;
}

/**
 * Simple event emitter implementation
 *
 * Sequence numbers are per emitter. A throwing listener is reported
 * and does not stop the others.
 */
export function createGameEventEmitter(): GameEventEmitter {
  const listeners: Set<GameEventListener> = new Set();
  const history: RecordedGameEvent[] = [];
  let sequence = 0;

  return {
    on(listener: GameEventListener): () => void {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },

    emit(event: GameEvent): RecordedGameEvent {
      const stamp: EventStamp = { sequence: ++sequence, timestamp: Date.now() };
      const recorded: RecordedGameEvent = Object.assign({}, event, stamp);
      history.push(recorded);
      for (const listener of listeners) {
        try {
          listener(recorded);
        } catch (error) {
          console.error('Error in game event listener:', error);
        }
      }
      return recorded;
    },

    getHistory(): readonly RecordedGameEvent[] {
      return [...history];
    },

    clear(): void {
      history.length = 0;
      sequence = 0;
    },
  };
}

/**
 * Narrow the history to one event type
 */
export function eventsOfType<T extends GameEventType>(
  history: readonly RecordedGameEvent[],
  type: T
): (Extract<GameEvent, { type: T }> & EventStamp)[] {
  const result: (Extract<GameEvent, { type: T }> & EventStamp)[] = [];
  for (const event of history) {
    if (isEventOfType(event, type)) {
      result.push(event);
    }
  }
  return result;
}

function isEventOfType<T extends GameEventType>(
  event: RecordedGameEvent,
  type: T
): event is Extract<GameEvent, { type: T }> & EventStamp {
  return event.type === type;
}
