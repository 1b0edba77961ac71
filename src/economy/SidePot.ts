/**
 * SidePot.ts
 * Side pot calculation for all-in scenarios
 *
 * Calculates pot tiers when players commit different amounts.
 *
 * Algorithm:
 * 1. Collect the distinct positive contribution levels (ascending)
 * 2. Peel off one tier per level: (level - previous level) * contributors at or above it
 * 3. Each tier is contested by the non-folded players who reached its level
 *
 * Example:
 * Player A: 1000
 * Player B: 500 (all-in)
 * Player C: 200 (all-in)
 *
 * Results in:
 * - Main pot: 600 (200 * 3) - A, B, C eligible
 * - Side pot 1: 600 ((500-200) * 2) - A, B eligible
 * - Side pot 2: 500 (1000-500) - A only
 *
 * A tier nobody live can win (every contributor at that level folded)
 * is carried forward, and what is still orphaned at the top is merged
 * into the highest tier that has an eligible player.
 */

import { PlayerId } from '../game/engine/TableState';
import { HandRank, compareHandRanks } from '../game/engine/HandRank';
import { EngineErrors } from '../game/engine/EngineErrors';

// ============================================================================
// Types
// ============================================================================

export interface PlayerContributionInfo {
  readonly playerId: PlayerId;
  readonly totalContribution: number;
  readonly isFolded: boolean;
}

export interface PotTier {
  /** 0 is the main pot */
  readonly index: number;
  readonly amount: number;
  /** The contribution threshold for this tier */
  readonly contributionLevel: number;
  readonly eligiblePlayers: readonly PlayerId[];
  /** Everyone whose chips are in this tier, folded or not */
  readonly contributors: readonly PlayerId[];
}

export interface SidePotResult {
  readonly pots: readonly PotTier[];
  readonly totalAmount: number;
}

export interface TierAward {
  readonly tierIndex: number;
  readonly amount: number;
  readonly winnerIds: readonly PlayerId[];
  readonly amountPerWinner: number;
  /** Odd chips that can't be split evenly */
  readonly remainder: number;
  readonly oddChipWinner: PlayerId | null;
}

export interface SettlementResult {
  readonly awards: readonly TierAward[];
  readonly totalAwarded: number;
  readonly playerPayouts: ReadonlyMap<PlayerId, number>;
}

// ============================================================================
// Side Pot Calculator
// ============================================================================

export class SidePotCalculator {
  /**
   * Calculate pot tiers from player contributions
   *
   * @throws PotInvariantError when chips are committed but every contributor folded
   */
  static calculate(contributions: readonly PlayerContributionInfo[]): SidePotResult {
    const validContributions = contributions.filter(c => c.totalContribution > 0);

    if (validContributions.length === 0) {
      return { pots: [], totalAmount: 0 };
    }

    const levels = [...new Set(validContributions.map(c => c.totalContribution))]
      .sort((a, b) => a - b);

    const pots: { amount: number; level: number; eligible: PlayerId[]; contributors: PlayerId[] }[] = [];
    let carried = 0;
    let carriedContributors = new Set<PlayerId>();
    let previousLevel = 0;

    for (const level of levels) {
      const reached = validContributions.filter(c => c.totalContribution >= level);
      const amount = (level - previousLevel) * reached.length + carried;
      const eligible = reached.filter(c => !c.isFolded).map(c => c.playerId);
      for (const c of reached) {
        carriedContributors.add(c.playerId);
      }
      previousLevel = level;

      if (eligible.length === 0) {
        carried = amount;
        continue;
      }

      pots.push({
        amount,
        level,
        eligible,
        contributors: [...carriedContributors],
      });
      carried = 0;
      carriedContributors = new Set();
    }

    if (carried > 0) {
      const last = pots[pots.length - 1];
      if (last === undefined) {
        throw EngineErrors.potInvariant('no live player is eligible for any pot tier', {
          total: carried,
        });
      }
      last.amount += carried;
      last.contributors = [...new Set([...last.contributors, ...carriedContributors])];
    }

    const tiers: PotTier[] = pots.map((p, index) => ({
      index,
      amount: p.amount,
      contributionLevel: p.level,
      eligiblePlayers: p.eligible,
      contributors: p.contributors,
    }));

    return {
      pots: tiers,
      totalAmount: tiers.reduce((sum, t) => sum + t.amount, 0),
    };
  }

  /**
   * Settle tiers and determine payouts
   *
   * @param winnersByTier tier index to winner ids (eligible players only)
   * @param oddChipOrder player ids in seat order starting left of the button
   */
  static settle(
    sidePotResult: SidePotResult,
    winnersByTier: ReadonlyMap<number, readonly PlayerId[]>,
    oddChipOrder: readonly PlayerId[] = []
  ): SettlementResult {
    const awards: TierAward[] = [];
    const playerPayouts = new Map<PlayerId, number>();

    for (const pot of sidePotResult.pots) {
      const winners = winnersByTier.get(pot.index);

      if (!winners || winners.length === 0) {
        throw EngineErrors.potInvariant(`no winners specified for pot tier ${pot.index}`, {
          tierIndex: pot.index,
        });
      }

      for (const winnerId of winners) {
        if (!pot.eligiblePlayers.includes(winnerId)) {
          throw EngineErrors.potInvariant(
            `player ${winnerId} is not eligible for pot tier ${pot.index}`,
            { tierIndex: pot.index, playerId: winnerId }
          );
        }
      }

      const ordered = SidePotCalculator.orderForOddChips(winners, oddChipOrder);
      const split = SidePotCalculator.splitPot(pot.amount, ordered);
      const amountPerWinner = Math.floor(pot.amount / ordered.length);
      const remainder = pot.amount - amountPerWinner * ordered.length;

      awards.push({
        tierIndex: pot.index,
        amount: pot.amount,
        winnerIds: ordered,
        amountPerWinner,
        remainder,
        oddChipWinner: remainder > 0 ? ordered[0] : null,
      });

      for (const [winnerId, amount] of split) {
        playerPayouts.set(winnerId, (playerPayouts.get(winnerId) ?? 0) + amount);
      }
    }

    const totalAwarded = Array.from(playerPayouts.values()).reduce(
      (sum, amount) => sum + amount,
      0
    );

    return { awards, totalAwarded, playerPayouts };
  }

  /**
   * Split pot evenly among winners with the remainder to the first winner
   */
  static splitPot(amount: number, winnerIds: readonly PlayerId[]): Map<PlayerId, number> {
    if (winnerIds.length === 0) {
      return new Map();
    }

    const payouts = new Map<PlayerId, number>();
    const amountPerWinner = Math.floor(amount / winnerIds.length);
    const remainder = amount - amountPerWinner * winnerIds.length;

    for (const winnerId of winnerIds) {
      payouts.set(winnerId, amountPerWinner);
    }

    if (remainder > 0) {
      const firstWinner = winnerIds[0];
      payouts.set(firstWinner, (payouts.get(firstWinner) ?? 0) + remainder);
    }

    return payouts;
  }

  /**
   * Sort winners by seat order; players missing from the order go last, by id
   */
  static orderForOddChips(
    winnerIds: readonly PlayerId[],
    oddChipOrder: readonly PlayerId[]
  ): PlayerId[] {
    const position = (id: PlayerId): number => {
      const index = oddChipOrder.indexOf(id);
      return index === -1 ? Number.MAX_SAFE_INTEGER : index;
    };
    return [...winnerIds].sort((a, b) => {
      const diff = position(a) - position(b);
      if (diff !== 0) return diff;
      if (a === b) return 0;
      return a < b ? -1 : 1;
    });
  }

  /**
   * Verify pot amounts match total contributions
   */
  static verifyConservation(
    contributions: readonly PlayerContributionInfo[],
    sidePotResult: SidePotResult
  ): boolean {
    const totalContributions = contributions.reduce(
      (sum, c) => sum + c.totalContribution,
      0
    );
    return totalContributions === sidePotResult.totalAmount;
  }
}

// ============================================================================
// Helper functions for showdown integration
// ============================================================================

/**
 * Determine winners for each tier: eligible players holding the best hand
 *
 * @throws PotInvariantError when an eligible player has no evaluated hand
 */
export function determineWinnersPerTier(
  sidePotResult: SidePotResult,
  hands: ReadonlyMap<PlayerId, HandRank>
): Map<number, readonly PlayerId[]> {
  const winnersByTier = new Map<number, readonly PlayerId[]>();

  for (const pot of sidePotResult.pots) {
    let best: HandRank | null = null;
    let winners: PlayerId[] = [];

    for (const playerId of pot.eligiblePlayers) {
      const hand = hands.get(playerId);
      if (hand === undefined) {
        throw EngineErrors.potInvariant(`no hand supplied for eligible player ${playerId}`, {
          tierIndex: pot.index,
          playerId,
        });
      }
      const comparison = best === null ? 1 : compareHandRanks(hand, best);
      if (comparison > 0) {
        best = hand;
        winners = [playerId];
      } else if (comparison === 0) {
        winners.push(playerId);
      }
    }

    winnersByTier.set(pot.index, winners);
  }

  return winnersByTier;
}
