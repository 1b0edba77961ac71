/**
 * BettingRound.ts
 * Betting round state machine for one street
 *
 * Requested actions pass through normalizeAction; the round executes the
 * effective action, moves chips into the ledger and tracks who may still
 * act or raise. Antes and blinds are posted by the helpers at the bottom.
 */

import { Card } from './Card';
import { EngineConfig } from './EngineConfig';
import { EngineErrors } from './EngineErrors';
import {
  PlayerId,
  SeatPlayer,
  Street,
  TableSeating,
  getFirstToActIndex,
  getPlayersInHand,
  getActingPlayers,
} from './TableState';
import {
  PlayerAction,
  EffectiveAction,
  ActionBounds,
  normalizeAction,
  getAmountToCall,
  getMaxRaiseTo,
  getMinRaiseTo,
  getFixedRaiseTo,
  canRaise,
} from './ActionNormalizer';
import { GameEventEmitter, HandId } from './GameEvents';
import { PotLedger } from '../../economy/Pot';

// ============================================================================
// Types
// ============================================================================

export interface BettingRoundOptions {
  readonly street: Street;
  readonly seating: TableSeating;
  readonly config: EngineConfig;
  readonly ledger: PotLedger;
  readonly events?: GameEventEmitter;
  readonly handId?: HandId;
  /** Defaults to the first seat to act on the street */
  readonly startIndex?: number;
  /** Bet everyone must match; defaults to the big blind preflop, else 0 */
  readonly openingBet?: number;
  readonly communityCards?: readonly Card[];
}

/**
 * What a decision source sees when asked to act
 */
export interface DecisionContext {
  readonly street: Street;
  readonly playerId: PlayerId;
  readonly holeCards: readonly Card[];
  readonly communityCards: readonly Card[];
  readonly stack: number;
  readonly currentBet: number;
  readonly highestBet: number;
  readonly amountToCall: number;
  readonly minRaiseIncrement: number;
  /** Smallest legal raise-to, or the all-in amount when that is less */
  readonly minRaiseTo: number;
  readonly maxRaiseTo: number;
  readonly potTotal: number;
  readonly canCheck: boolean;
  readonly canRaise: boolean;
  /** Fixed-limit bet size for the street, null in no-limit */
  readonly limitBetSize: number | null;
}

export interface ActionRecord {
  readonly street: Street;
  readonly playerId: PlayerId;
  readonly requested: PlayerAction;
  readonly effective: EffectiveAction;
  readonly adjusted: boolean;
  readonly violation?: string;
  /** Chips moved from stack to pot by this action */
  readonly chipsAdded: number;
  /** Raise met the minimum increment and reopened the action */
  readonly fullRaise: boolean;
  readonly playerStack: number;
  readonly highestBet: number;
}

export interface BettingRoundState {
  readonly street: Street;
  readonly highestBet: number;
  readonly minRaiseIncrement: number;
  readonly betsThisStreet: number;
  readonly raiseClosed: readonly PlayerId[];
  readonly acted: readonly PlayerId[];
  readonly currentPlayerId: PlayerId | null;
  readonly isComplete: boolean;
  readonly actions: readonly ActionRecord[];
}

// ============================================================================
// Betting Round
// ============================================================================

export class BettingRound {
  readonly street: Street;
  private readonly players: readonly SeatPlayer[];
  private readonly config: EngineConfig;
  private readonly ledger: PotLedger;
  private readonly events?: GameEventEmitter;
  private readonly handId: HandId;
  private readonly communityCards: readonly Card[];

  private highestBet: number;
  private minRaiseIncrement: number;
  private betsThisStreet: number;
  private raiseClosed: Set<PlayerId>;
  private acted: Set<PlayerId>;
  private currentIndex: number;
  private complete: boolean;
  private actions: ActionRecord[];

  constructor(options: BettingRoundOptions) {
    this.street = options.street;
    this.players = options.seating.players;
    this.config = options.config;
    this.ledger = options.ledger;
    this.events = options.events;
    this.handId = options.handId ?? 'hand';
    this.communityCards = options.communityCards ?? [];

    const openingBet = options.openingBet
      ?? (options.street === 'preflop' ? options.config.bigBlind : 0);
    const postedBets = getPlayersInHand(this.players).map(p => p.currentBet);
    this.highestBet = Math.max(openingBet, ...postedBets);

    this.minRaiseIncrement = this.config.isFixedLimit
      ? this.config.limitBetSize(this.street)
      : this.config.bigBlind;

    // A posted blind counts as the first bet of the street
    this.betsThisStreet = this.config.isFixedLimit && this.street === 'preflop' && this.highestBet > 0
      ? 1
      : 0;

    this.raiseClosed = new Set();
    this.acted = new Set();
    this.actions = [];
    this.complete = false;

    const start = options.startIndex ?? getFirstToActIndex(options.seating, options.street);
    this.currentIndex = this.findNextToAct(start - 1);
    this.updateCompletion();
  }

  // ============================================================================
  // Queries
  // ============================================================================

  isComplete(): boolean {
    return this.complete;
  }

  getCurrentPlayer(): SeatPlayer | null {
    if (this.complete || this.currentIndex === -1) return null;
    return this.players[this.currentIndex];
  }

  getHighestBet(): number {
    return this.highestBet;
  }

  getMinRaiseIncrement(): number {
    return this.minRaiseIncrement;
  }

  getActions(): readonly ActionRecord[] {
    return [...this.actions];
  }

  /**
   * Betting limits for the player to act
   */
  getActionBounds(): ActionBounds | null {
    const player = this.getCurrentPlayer();
    if (!player) return null;
    return this.boundsFor(player);
  }

  getDecisionContext(): DecisionContext | null {
    const player = this.getCurrentPlayer();
    if (!player) return null;

    const bounds = this.boundsFor(player);
    const maxRaiseTo = getMaxRaiseTo(bounds);
    const target = this.config.isFixedLimit ? getFixedRaiseTo(bounds) : getMinRaiseTo(bounds);

    return {
      street: this.street,
      playerId: player.id,
      holeCards: player.holeCards,
      communityCards: this.communityCards,
      stack: player.stack,
      currentBet: player.currentBet,
      highestBet: this.highestBet,
      amountToCall: Math.min(getAmountToCall(bounds), player.stack),
      minRaiseIncrement: this.minRaiseIncrement,
      minRaiseTo: Math.min(target, maxRaiseTo),
      maxRaiseTo: this.config.isFixedLimit ? Math.min(target, maxRaiseTo) : maxRaiseTo,
      potTotal: this.ledger.getTotal(),
      canCheck: getAmountToCall(bounds) === 0,
      canRaise: canRaise(bounds),
      limitBetSize: this.config.isFixedLimit ? this.config.limitBetSize(this.street) : null,
    };
  }

  getState(): BettingRoundState {
    const current = this.getCurrentPlayer();
    return {
      street: this.street,
      highestBet: this.highestBet,
      minRaiseIncrement: this.minRaiseIncrement,
      betsThisStreet: this.betsThisStreet,
      raiseClosed: Array.from(this.raiseClosed),
      acted: Array.from(this.acted),
      currentPlayerId: current ? current.id : null,
      isComplete: this.complete,
      actions: this.getActions(),
    };
  }

  // ============================================================================
  // Actions
  // ============================================================================

  /**
   * Apply an action for the player to act
   *
   * @throws IllegalActionError when out of turn, after completion, or
   *         for an illegal request under strictActions
   */
  act(playerId: PlayerId, action: PlayerAction): ActionRecord {
    if (this.complete) {
      throw EngineErrors.roundComplete(this.street);
    }
    const player = this.getCurrentPlayer();
    if (!player || player.id !== playerId) {
      throw EngineErrors.notPlayersTurn(playerId, player ? player.id : null);
    }

    const normalized = normalizeAction(action, this.boundsFor(player));
    if (normalized.violation !== undefined && this.config.strictActions) {
      throw EngineErrors.illegalAction(playerId, action.type, normalized.violation);
    }

    let chipsAdded = 0;
    let fullRaise = false;
    const effective = normalized.effective;

    switch (effective.type) {
      case 'fold':
        player.folded = true;
        this.ledger.markFolded(player.id);
        break;

      case 'check':
        break;

      case 'call':
        chipsAdded = this.commit(player, effective.amount);
        break;

      case 'raise': {
        chipsAdded = this.commit(player, effective.raiseTo - player.currentBet);
        const increment = effective.raiseTo - this.highestBet;
        fullRaise = increment >= this.minRaiseIncrement;

        if (fullRaise) {
          if (!this.config.isFixedLimit) {
            this.minRaiseIncrement = increment;
          }
          this.betsThisStreet++;
          this.raiseClosed.clear();
          this.acted.clear();
        } else {
          // Short all-in: whoever already acted may only call
          for (const id of this.acted) {
            this.raiseClosed.add(id);
          }
        }
        this.highestBet = effective.raiseTo;
        break;
      }
    }

    this.acted.add(player.id);

    const record: ActionRecord = {
      street: this.street,
      playerId: player.id,
      requested: normalized.requested,
      effective,
      adjusted: normalized.adjusted,
      ...(normalized.violation !== undefined ? { violation: normalized.violation } : {}),
      chipsAdded,
      fullRaise,
      playerStack: player.stack,
      highestBet: this.highestBet,
    };
    this.actions.push(record);

    this.events?.emit({
      type: 'PLAYER_ACTED',
      handId: this.handId,
      street: this.street,
      playerId: player.id,
      requested: record.requested,
      effective,
      normalized: record.adjusted,
      ...(record.violation !== undefined ? { violation: record.violation } : {}),
      chipsAdded,
      playerStack: player.stack,
      potTotal: this.ledger.getTotal(),
    });

    this.currentIndex = this.findNextToAct(this.currentIndex);
    this.updateCompletion();

    return record;
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private boundsFor(player: SeatPlayer): ActionBounds {
    const capped = this.config.isFixedLimit && this.betsThisStreet >= this.config.maxBetsPerStreet;
    return {
      highestBet: this.highestBet,
      playerBet: player.currentBet,
      stack: player.stack,
      minRaiseIncrement: this.minRaiseIncrement,
      raiseAllowed: !capped && !this.raiseClosed.has(player.id),
      structure: this.config.structure,
      limitBetSize: this.config.limitBetSize(this.street),
    };
  }

  private commit(player: SeatPlayer, amount: number): number {
    const chips = Math.min(amount, player.stack);
    player.stack -= chips;
    player.currentBet += chips;
    player.totalBetThisHand += chips;
    if (player.stack === 0) {
      player.allIn = true;
    }
    this.ledger.addContribution(player.id, chips, this.street);
    return chips;
  }

  private needsToAct(player: SeatPlayer): boolean {
    if (player.folded || player.allIn) return false;
    return !this.acted.has(player.id) || player.currentBet < this.highestBet;
  }

  /**
   * Next seat after fromIndex that still owes an action, or -1
   */
  private findNextToAct(fromIndex: number): number {
    const count = this.players.length;
    for (let i = 1; i <= count; i++) {
      const index = (((fromIndex + i) % count) + count) % count;
      if (this.needsToAct(this.players[index])) {
        return index;
      }
    }
    return -1;
  }

  private updateCompletion(): void {
    if (this.complete) return;

    const live = getPlayersInHand(this.players);
    const acting = getActingPlayers(this.players);

    const done =
      live.length <= 1 ||
      this.currentIndex === -1 ||
      (acting.length === 1 && acting[0].currentBet >= this.highestBet) ||
      acting.every(p => this.acted.has(p.id) && p.currentBet === this.highestBet);

    if (!done) return;

    this.complete = true;
    this.currentIndex = -1;
    this.events?.emit({
      type: 'BETTING_ROUND_COMPLETE',
      handId: this.handId,
      street: this.street,
      potTotal: this.ledger.getTotal(),
      livePlayerCount: live.length,
    });
  }
}

// ============================================================================
// Forced Bets
// ============================================================================

export interface ForcedBetEvents {
  readonly events?: GameEventEmitter;
  readonly handId?: HandId;
}

function postForcedBet(
  player: SeatPlayer,
  amount: number,
  ledger: PotLedger,
  countsAsBet: boolean
): number {
  const chips = Math.min(amount, player.stack);
  player.stack -= chips;
  player.totalBetThisHand += chips;
  if (countsAsBet) {
    player.currentBet += chips;
  }
  if (player.stack === 0) {
    player.allIn = true;
  }
  ledger.addContribution(player.id, chips, 'preflop');
  return chips;
}

/**
 * Post antes as dead money; they do not count toward the preflop bet
 */
export function postAntes(
  seating: TableSeating,
  config: EngineConfig,
  ledger: PotLedger,
  options: ForcedBetEvents = {}
): Map<PlayerId, number> {
  const posted = new Map<PlayerId, number>();
  if (config.ante === 0) return posted;

  for (const player of seating.players) {
    if (player.stack === 0) continue;
    const amount = postForcedBet(player, config.ante, ledger, false);
    posted.set(player.id, amount);
    options.events?.emit({
      type: 'ANTE_POSTED',
      handId: options.handId ?? 'hand',
      playerId: player.id,
      amount,
      isAllIn: player.allIn,
    });
  }
  return posted;
}

/**
 * Post small and big blind; a short stack posts what it has
 */
export function postBlinds(
  seating: TableSeating,
  config: EngineConfig,
  ledger: PotLedger,
  options: ForcedBetEvents = {}
): { smallBlind: number; bigBlind: number } {
  const blinds = [
    { index: seating.smallBlindIndex, blind: 'small' as const, size: config.smallBlind },
    { index: seating.bigBlindIndex, blind: 'big' as const, size: config.bigBlind },
  ];
  const posted = { smallBlind: 0, bigBlind: 0 };

  for (const { index, blind, size } of blinds) {
    const player = seating.players[index];
    const amount = postForcedBet(player, size, ledger, true);
    if (blind === 'small') {
      posted.smallBlind = amount;
    } else {
      posted.bigBlind = amount;
    }
    options.events?.emit({
      type: 'BLIND_POSTED',
      handId: options.handId ?? 'hand',
      playerId: player.id,
      blind,
      amount,
      isAllIn: player.allIn,
    });
  }
  return posted;
}
