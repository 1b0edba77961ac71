/**
 * Economy Module
 *
 * Per-hand contribution ledger, pot tiers and showdown distribution.
 */

export {
  PotLedger,
  DistributeOptions,
  DistributionResult,
} from './Pot';

export {
  SidePotCalculator,
  PlayerContributionInfo,
  PotTier,
  SidePotResult,
  TierAward,
  SettlementResult,
  determineWinnersPerTier,
} from './SidePot';
