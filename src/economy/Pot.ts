/**
 * Pot.ts
 * Contribution ledger for a single hand
 *
 * Tracks chips committed per player and per street, derives pot tiers
 * and distributes them at showdown. Works with SidePot.ts for the tier
 * arithmetic.
 *
 * Key concepts:
 * - Contribution: cumulative chips a player has committed this hand
 * - Street contribution: the part committed on one street
 * - Folded players keep their chips in the pot but cannot win it
 */

import { PlayerId, Street } from '../game/engine/TableState';
import { HandRank } from '../game/engine/HandRank';
import { EngineErrors } from '../game/engine/EngineErrors';
import {
  PotTier,
  TierAward,
  SidePotCalculator,
  PlayerContributionInfo,
  determineWinnersPerTier,
} from './SidePot';

// ============================================================================
// Types
// ============================================================================

export interface DistributeOptions {
  /** Player ids in seat order starting left of the button */
  readonly oddChipOrder?: readonly PlayerId[];
}

export interface DistributionResult {
  readonly payouts: ReadonlyMap<PlayerId, number>;
  readonly awards: readonly TierAward[];
  readonly total: number;
  /** Pot went to the last player standing without a showdown */
  readonly uncontested: boolean;
}

// ============================================================================
// Pot Ledger
// ============================================================================

export class PotLedger {
  private contributionsByPlayer: Map<PlayerId, number>;
  private contributionsByStreet: Map<Street, Map<PlayerId, number>>;
  private foldedPlayers: Set<PlayerId>;

  constructor() {
    this.contributionsByPlayer = new Map();
    this.contributionsByStreet = new Map();
    this.foldedPlayers = new Set();
  }

  /**
   * Register chips committed by a player
   *
   * @throws InvalidAmountError for negative or fractional amounts
   */
  addContribution(playerId: PlayerId, amount: number, street: Street = 'preflop'): void {
    if (!Number.isInteger(amount) || amount < 0) {
      throw EngineErrors.invalidAmount(amount, 'contribution must be a non-negative integer');
    }

    this.contributionsByPlayer.set(playerId, this.getContribution(playerId) + amount);

    let streetContrib = this.contributionsByStreet.get(street);
    if (!streetContrib) {
      streetContrib = new Map();
      this.contributionsByStreet.set(street, streetContrib);
    }
    streetContrib.set(playerId, (streetContrib.get(playerId) ?? 0) + amount);
  }

  /**
   * Remove player from contention; their chips stay in the pot
   */
  markFolded(playerId: PlayerId): void {
    this.foldedPlayers.add(playerId);
  }

  isFolded(playerId: PlayerId): boolean {
    return this.foldedPlayers.has(playerId);
  }

  getFoldedPlayers(): PlayerId[] {
    return Array.from(this.foldedPlayers);
  }

  getContribution(playerId: PlayerId): number {
    return this.contributionsByPlayer.get(playerId) ?? 0;
  }

  getContributions(): ReadonlyMap<PlayerId, number> {
    return new Map(this.contributionsByPlayer);
  }

  getTotal(): number {
    let total = 0;
    for (const amount of this.contributionsByPlayer.values()) {
      total += amount;
    }
    return total;
  }

  getStreetTotal(street: Street): number {
    const streetContrib = this.contributionsByStreet.get(street);
    if (!streetContrib) return 0;
    let total = 0;
    for (const amount of streetContrib.values()) {
      total += amount;
    }
    return total;
  }

  getStreetContribution(playerId: PlayerId, street: Street): number {
    return this.contributionsByStreet.get(street)?.get(playerId) ?? 0;
  }

  /**
   * Contributors who have not folded
   */
  getLivePlayers(): PlayerId[] {
    return Array.from(this.contributionsByPlayer.keys()).filter(id => !this.foldedPlayers.has(id));
  }

  /**
   * Derive main pot and side pots from the current contributions
   */
  derivePots(): PotTier[] {
    const result = SidePotCalculator.calculate(this.toContributionInfo());
    if (!SidePotCalculator.verifyConservation(this.toContributionInfo(), result)) {
      throw EngineErrors.potInvariant('pot tiers do not sum to contributions', {
        total: this.getTotal(),
        tiers: result.totalAmount,
      });
    }
    return [...result.pots];
  }

  /**
   * Award every tier to the best eligible hand(s)
   *
   * @param hands evaluated hands of the players still live
   * @throws PotInvariantError when payouts do not conserve chips
   */
  distribute(
    hands: ReadonlyMap<PlayerId, HandRank>,
    options: DistributeOptions = {}
  ): DistributionResult {
    const total = this.getTotal();
    const live = this.getLivePlayers();

    if (total === 0) {
      return { payouts: new Map(), awards: [], total: 0, uncontested: live.length <= 1 };
    }

    if (live.length === 1) {
      const winner = live[0];
      return {
        payouts: new Map([[winner, total]]),
        awards: [{
          tierIndex: 0,
          amount: total,
          winnerIds: [winner],
          amountPerWinner: total,
          remainder: 0,
          oddChipWinner: null,
        }],
        total,
        uncontested: true,
      };
    }

    const sidePots = SidePotCalculator.calculate(this.toContributionInfo());
    const winnersByTier = determineWinnersPerTier(sidePots, hands);
    const settlement = SidePotCalculator.settle(sidePots, winnersByTier, options.oddChipOrder);

    if (settlement.totalAwarded !== total) {
      throw EngineErrors.potInvariant('payouts do not equal contributions', {
        total,
        awarded: settlement.totalAwarded,
      });
    }

    return {
      payouts: settlement.playerPayouts,
      awards: settlement.awards,
      total,
      uncontested: false,
    };
  }

  /**
   * Price of a call relative to the pot after calling
   */
  getPotOdds(callAmount: number): number {
    if (callAmount <= 0) return 0;
    return callAmount / (this.getTotal() + callAmount);
  }

  /**
   * Rake on the current pot: percentage of the total, floored, capped
   */
  calculateRake(percentage: number, cap: number): number {
    if (percentage < 0 || percentage > 100) {
      throw EngineErrors.invalidAmount(percentage, 'rake percentage must be between 0 and 100');
    }
    return Math.max(0, Math.min(Math.floor(this.getTotal() * percentage / 100), cap));
  }

  /**
   * Clear all state for the next hand
   */
  reset(): void {
    this.contributionsByPlayer.clear();
    this.contributionsByStreet.clear();
    this.foldedPlayers.clear();
  }

  private toContributionInfo(): PlayerContributionInfo[] {
    return Array.from(this.contributionsByPlayer.entries()).map(([playerId, totalContribution]) => ({
      playerId,
      totalContribution,
      isFolded: this.foldedPlayers.has(playerId),
    }));
  }
}
