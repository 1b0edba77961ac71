/**
 * ActionNormalizer.ts
 * Maps a requested action onto the nearest legal one
 *
 * Pure function of the request and the betting bounds. The betting
 * round decides whether a violation is downgraded or rejected.
 */

import { BettingStructure } from './EngineConfig';

// ============================================================================
// Types
// ============================================================================

export type ActionType = 'fold' | 'check' | 'call' | 'raise' | 'all-in';

export const ACTION_TYPES: readonly ActionType[] = ['fold', 'check', 'call', 'raise', 'all-in'];

/**
 * Action as submitted by a decision source.
 * For a raise, amount is the total bet to raise to on this street.
 */
export interface PlayerAction {
  readonly type: ActionType;
  readonly amount?: number;
}

/**
 * Betting limits for the player to act
 */
export interface ActionBounds {
  readonly highestBet: number;
  readonly playerBet: number;
  readonly stack: number;
  readonly minRaiseIncrement: number;
  /** False when raising is closed for this player or the street is capped */
  readonly raiseAllowed: boolean;
  readonly structure: BettingStructure;
  /** Fixed-limit bet size for the street (ignored in no-limit) */
  readonly limitBetSize: number;
}

/**
 * Action the round actually executes
 * - call.amount: chips added to the player's bet
 * - raise.raiseTo: player's total bet after the raise
 */
export type EffectiveAction =
  | { readonly type: 'fold' }
  | { readonly type: 'check' }
  | { readonly type: 'call'; readonly amount: number; readonly allIn: boolean }
  | { readonly type: 'raise'; readonly raiseTo: number; readonly allIn: boolean };

export interface NormalizedAction {
  readonly requested: PlayerAction;
  readonly effective: EffectiveAction;
  /** Effective action differs from the request */
  readonly adjusted: boolean;
  /** Set when the request was illegal rather than merely imprecise */
  readonly violation?: string;
}

// ============================================================================
// Bounds Helpers
// ============================================================================

export function getAmountToCall(bounds: ActionBounds): number {
  return Math.max(0, bounds.highestBet - bounds.playerBet);
}

export function getMaxRaiseTo(bounds: ActionBounds): number {
  return bounds.playerBet + bounds.stack;
}

export function getMinRaiseTo(bounds: ActionBounds): number {
  return bounds.highestBet + bounds.minRaiseIncrement;
}

/**
 * Raise target under fixed-limit
 */
export function getFixedRaiseTo(bounds: ActionBounds): number {
  return bounds.highestBet === 0 ? bounds.limitBetSize : bounds.highestBet + bounds.limitBetSize;
}

/**
 * Whether the player holds more than the call
 */
export function canRaise(bounds: ActionBounds): boolean {
  return bounds.raiseAllowed && bounds.stack > getAmountToCall(bounds);
}

// ============================================================================
// Normalization
// ============================================================================

function checkOrCall(bounds: ActionBounds): EffectiveAction {
  const toCall = getAmountToCall(bounds);
  if (toCall === 0) {
    return { type: 'check' };
  }
  const amount = Math.min(toCall, bounds.stack);
  return { type: 'call', amount, allIn: amount === bounds.stack };
}

function sameAction(requested: PlayerAction, effective: EffectiveAction): boolean {
  switch (effective.type) {
    case 'fold':
    case 'check':
      return requested.type === effective.type;
    case 'call':
      return requested.type === 'call' || (requested.type === 'all-in' && effective.allIn);
    case 'raise':
      if (requested.type === 'all-in') return effective.allIn;
      return requested.type === 'raise' && requested.amount === effective.raiseTo;
  }
}

function result(
  requested: PlayerAction,
  effective: EffectiveAction,
  violation?: string
): NormalizedAction {
  const adjusted = violation !== undefined || !sameAction(requested, effective);
  return violation === undefined
    ? { requested, effective, adjusted }
    : { requested, effective, adjusted, violation };
}

function raiseTo(requested: PlayerAction, bounds: ActionBounds, target: number): NormalizedAction {
  const maxRaiseTo = getMaxRaiseTo(bounds);
  const clamped = Math.min(target, maxRaiseTo);
  const allIn = clamped === maxRaiseTo;

  if (clamped <= bounds.highestBet) {
    const violation = allIn
      ? 'stack does not cover a raise'
      : `raise to ${clamped} does not exceed the current bet of ${bounds.highestBet}`;
    return result(requested, checkOrCall(bounds), violation);
  }
  if (clamped < getMinRaiseTo(bounds) && !allIn) {
    return result(requested, checkOrCall(bounds),
      `raise to ${clamped} is below the minimum of ${getMinRaiseTo(bounds)}`);
  }
  return result(requested, { type: 'raise', raiseTo: clamped, allIn });
}

/**
 * Normalize a requested action against the current bounds
 *
 * Downgrades:
 * - check facing a bet -> fold
 * - call with nothing to call -> check
 * - raise while raising is closed or capped -> call
 * - raise to at most the current bet, or an undersized non-all-in raise -> call
 * - raise above the stack -> all-in
 * - raise without an amount -> minimum raise
 * - fixed-limit raise or all-in -> fixed raise size
 */
export function normalizeAction(requested: PlayerAction, bounds: ActionBounds): NormalizedAction {
  const toCall = getAmountToCall(bounds);

  switch (requested.type) {
    case 'fold':
      return result(requested, { type: 'fold' });

    case 'check':
      if (toCall === 0) {
        return result(requested, { type: 'check' });
      }
      return result(requested, { type: 'fold' }, `cannot check facing a bet of ${toCall}`);

    case 'call':
      return result(requested, checkOrCall(bounds));

    case 'all-in': {
      if (getMaxRaiseTo(bounds) <= bounds.highestBet) {
        return result(requested, checkOrCall(bounds));
      }
      if (!bounds.raiseAllowed) {
        return result(requested, checkOrCall(bounds), 'no further raise is allowed');
      }
      if (bounds.structure === 'fixed-limit') {
        return raiseTo(requested, bounds, getFixedRaiseTo(bounds));
      }
      return raiseTo(requested, bounds, getMaxRaiseTo(bounds));
    }

    case 'raise': {
      if (!bounds.raiseAllowed) {
        return result(requested, checkOrCall(bounds), 'no further raise is allowed');
      }
      if (bounds.structure === 'fixed-limit') {
        return raiseTo(requested, bounds, getFixedRaiseTo(bounds));
      }
      if (requested.amount === undefined) {
        return raiseTo(requested, bounds, getMinRaiseTo(bounds));
      }
      if (!Number.isInteger(requested.amount) || requested.amount < 0) {
        return result(requested, checkOrCall(bounds),
          `raise amount must be a non-negative integer, got ${requested.amount}`);
      }
      return raiseTo(requested, bounds, requested.amount);
    }
  }
}
