/**
 * DecisionSource.ts
 * Capability interface for whoever chooses a player's action
 *
 * The engine only asks for an action; policies (human input, bots)
 * live outside it. Two simple sources ship with the engine:
 * - Scripted: replays queued actions per player
 * - Passive: check when possible, otherwise call
 */

import { PlayerId } from '../engine/TableState';
import { PlayerAction } from '../engine/ActionNormalizer';
import { DecisionContext } from '../engine/BettingRound';

// ============================================================================
// Types
// ============================================================================

export interface DecisionSource {
  decide(context: DecisionContext): PlayerAction | Promise<PlayerAction>;
}

// ============================================================================
// Passive Source
// ============================================================================

/**
 * Never folds, never raises
 */
export class PassiveDecisionSource implements DecisionSource {
  decide(context: DecisionContext): PlayerAction {
    return context.canCheck ? { type: 'check' } : { type: 'call' };
  }
}

// ============================================================================
// Scripted Source
// ============================================================================

/**
 * Replays queued actions in order for each player.
 * When a player's queue runs dry the fallback decides.
 */
export class ScriptedDecisionSource implements DecisionSource {
  private queues: Map<PlayerId, PlayerAction[]>;
  private fallback: DecisionSource;

  constructor(
    script: Readonly<Record<PlayerId, readonly PlayerAction[]>> = {},
    fallback: DecisionSource = new PassiveDecisionSource()
  ) {
    this.queues = new Map();
    this.fallback = fallback;
    for (const [playerId, actions] of Object.entries(script)) {
      this.queues.set(playerId, [...actions]);
    }
  }

  remaining(playerId: PlayerId): number {
    return this.queues.get(playerId)?.length ?? 0;
  }

  decide(context: DecisionContext): PlayerAction | Promise<PlayerAction> {
    const next = this.queues.get(context.playerId)?.shift();
    return next ?? this.fallback.decide(context);
  }
}
