/**
 * TableState.ts
 * Seating and player records for one table
 *
 * The table provider owns seat assignment. The engine mutates the
 * chip and status fields of the records it is handed.
 */

import { Card } from './Card';
import { EngineErrors } from './EngineErrors';

// ============================================================================
// Types
// ============================================================================

export type PlayerId = string;

export type Street = 'preflop' | 'flop' | 'turn' | 'river';

export const STREETS: readonly Street[] = ['preflop', 'flop', 'turn', 'river'];

export interface SeatPlayer {
  readonly id: PlayerId;
  readonly name: string;
  readonly seat: number;
  stack: number;
  /** Bet in the current betting round */
  currentBet: number;
  /** Total committed across all streets of this hand */
  totalBetThisHand: number;
  folded: boolean;
  allIn: boolean;
  holeCards: Card[];
}

export interface TableSeating {
  /** Occupied seats in seating order */
  readonly players: readonly SeatPlayer[];
  readonly dealerIndex: number;
  readonly smallBlindIndex: number;
  readonly bigBlindIndex: number;
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create initial player
 */
export function createSeatPlayer(
  id: PlayerId,
  name: string,
  stack: number,
  seat: number
): SeatPlayer {
  return {
    id,
    name,
    seat,
    stack,
    currentBet: 0,
    totalBetThisHand: 0,
    folded: false,
    allIn: false,
    holeCards: [],
  };
}

/**
 * Get small blind position
 * Heads-up: dealer is SB
 * 3+ players: left of dealer is SB
 */
export function getSmallBlindIndex(playerCount: number, dealerIndex: number): number {
  return playerCount === 2 ? dealerIndex : (dealerIndex + 1) % playerCount;
}

/**
 * Get big blind position (left of small blind)
 */
export function getBigBlindIndex(playerCount: number, dealerIndex: number): number {
  return (getSmallBlindIndex(playerCount, dealerIndex) + 1) % playerCount;
}

/**
 * Build seating with blind positions derived from the button
 */
export function createSeating(
  players: readonly SeatPlayer[],
  dealerIndex = 0
): TableSeating {
  if (players.length < 2) {
    throw EngineErrors.invalidTable(`need at least 2 players, got ${players.length}`);
  }
  if (!Number.isInteger(dealerIndex) || dealerIndex < 0 || dealerIndex >= players.length) {
    throw EngineErrors.invalidTable(`dealer index ${dealerIndex} out of range`);
  }
  const ids = new Set(players.map(p => p.id));
  if (ids.size !== players.length) {
    throw EngineErrors.invalidTable('player ids must be unique');
  }

  return {
    players,
    dealerIndex,
    smallBlindIndex: getSmallBlindIndex(players.length, dealerIndex),
    bigBlindIndex: getBigBlindIndex(players.length, dealerIndex),
  };
}

// ============================================================================
// State Query Functions
// ============================================================================

/**
 * Players still contesting the pot (not folded)
 */
export function getPlayersInHand(players: readonly SeatPlayer[]): SeatPlayer[] {
  return players.filter(p => !p.folded);
}

/**
 * Players who can still act (not folded, not all-in)
 */
export function getActingPlayers(players: readonly SeatPlayer[]): SeatPlayer[] {
  return players.filter(p => !p.folded && !p.allIn);
}

/**
 * Player ids in seat order starting left of the button
 */
export function seatOrderFromButton(seating: TableSeating): PlayerId[] {
  const count = seating.players.length;
  const order: PlayerId[] = [];
  for (let i = 1; i <= count; i++) {
    order.push(seating.players[(seating.dealerIndex + i) % count].id);
  }
  return order;
}

/**
 * First seat to act on a street
 */
export function getFirstToActIndex(seating: TableSeating, street: Street): number {
  const anchor = street === 'preflop' ? seating.bigBlindIndex : seating.dealerIndex;
  return (anchor + 1) % seating.players.length;
}

// ============================================================================
// State Update Functions
// ============================================================================

/**
 * Clear current-street bets before a new betting round
 */
export function startStreet(players: readonly SeatPlayer[]): void {
  for (const player of players) {
    player.currentBet = 0;
  }
}

/**
 * Clear per-hand state; stacks carry over
 */
export function resetForNewHand(players: readonly SeatPlayer[]): void {
  for (const player of players) {
    player.currentBet = 0;
    player.totalBetThisHand = 0;
    player.folded = false;
    player.allIn = false;
    player.holeCards = [];
  }
}
