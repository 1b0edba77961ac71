/**
 * Game Engine
 *
 * Core Texas Hold'em rules: cards, hand evaluation, betting rounds.
 */

// Card primitives
export * from './Card';
export * from './Deck';

// Errors and configuration
export * from './EngineErrors';
export * from './EngineConfig';

// Hand evaluation
export * from './HandRank';
export * from './HandEvaluator';

// Game state
export * from './TableState';
export * from './ActionNormalizer';
export * from './BettingRound';
export * from './GameEvents';

// Orchestration
export * from './HandEngine';
