/**
 * runScenario.ts
 * Replays a scenario through the engine and builds the JSON report
 */

import { parseCards, formatCards } from '../game/engine/Card';
import { HandRank } from '../game/engine/HandRank';
import { evaluateHand } from '../game/engine/HandEvaluator';
import { EngineConfig } from '../game/engine/EngineConfig';
import {
  PlayerId,
  createSeatPlayer,
  createSeating,
  seatOrderFromButton,
  startStreet,
} from '../game/engine/TableState';
import { BettingRound, ActionRecord, postAntes, postBlinds } from '../game/engine/BettingRound';
import { PotLedger } from '../economy/Pot';
import { PotTier, TierAward } from '../economy/SidePot';
import { Scenario } from './scenario';

// ============================================================================
// Types
// ============================================================================

export interface EvaluationReport {
  readonly cards: string;
  readonly category: string;
  readonly description: string;
  readonly bestFive: string;
}

export interface ScenarioReport {
  readonly configHash: string;
  readonly total: number;
  readonly contributions: Record<PlayerId, number>;
  readonly folded: readonly PlayerId[];
  readonly pots: readonly PotTier[];
  readonly actions?: readonly ActionRecord[];
  readonly stacks?: Record<PlayerId, number>;
  readonly evaluations?: readonly EvaluationReport[];
  readonly distribution?: {
    readonly payouts: Record<PlayerId, number>;
    readonly awards: readonly TierAward[];
    readonly uncontested: boolean;
  };
}

// ============================================================================
// Functions
// ============================================================================

function toEvaluationReport(cards: string, rank: HandRank): EvaluationReport {
  return {
    cards,
    category: rank.detail.kind,
    description: rank.description,
    bestFive: formatCards(rank.cards),
  };
}

/**
 * Seat order starting left of the button, for tables given only by ids
 */
function orderFromButton(seatIds: readonly PlayerId[], dealerIndex: number): PlayerId[] {
  if (seatIds.length < 2) return [...seatIds];
  const seats = seatIds.map((id, i) => createSeatPlayer(id, id, 0, i));
  return seatOrderFromButton(createSeating(seats, dealerIndex));
}

/**
 * Run a parsed scenario
 *
 * @throws EngineError for anything the engine rejects
 */
export function runScenario(scenario: Scenario): ScenarioReport {
  const config = new EngineConfig(scenario.config);
  const ledger = new PotLedger();
  let oddChipOrder: PlayerId[];
  let actions: ActionRecord[] | undefined;
  let stacks: Record<PlayerId, number> | undefined;

  if (scenario.streets.length > 0) {
    const players = scenario.players.map((p, i) => createSeatPlayer(p.id, p.name ?? p.id, p.stack, i));
    const seating = createSeating(players, scenario.dealerIndex);
    postAntes(seating, config, ledger);
    postBlinds(seating, config, ledger);

    actions = [];
    for (const entry of scenario.streets) {
      if (entry.street !== 'preflop') {
        startStreet(players);
      }
      const round = new BettingRound({ street: entry.street, seating, config, ledger });
      for (const step of entry.actions) {
        const action = step.amount === undefined
          ? { type: step.action }
          : { type: step.action, amount: step.amount };
        actions.push(round.act(step.player, action));
      }
    }
    oddChipOrder = seatOrderFromButton(seating);
    stacks = Object.fromEntries(players.map(p => [p.id, p.stack]));
  } else {
    const contributions = scenario.contributions ?? {};
    for (const [playerId, amount] of Object.entries(contributions)) {
      ledger.addContribution(playerId, amount);
    }
    const seatIds = scenario.players.length > 0
      ? scenario.players.map(p => p.id)
      : Object.keys(contributions);
    oddChipOrder = orderFromButton(seatIds, scenario.dealerIndex);
  }

  for (const playerId of scenario.folded) {
    ledger.markFolded(playerId);
  }

  const evaluations = scenario.evaluate.map(cards => toEvaluationReport(cards, evaluateHand(parseCards(cards))));

  let distribution: ScenarioReport['distribution'];
  if (scenario.hands !== undefined) {
    const board = scenario.board === undefined ? [] : parseCards(scenario.board);
    const hands = new Map<PlayerId, HandRank>();
    for (const [playerId, notation] of Object.entries(scenario.hands)) {
      if (ledger.isFolded(playerId)) continue;
      hands.set(playerId, evaluateHand([...parseCards(notation), ...board]));
    }
    const result = ledger.distribute(hands, { oddChipOrder });
    distribution = {
      payouts: Object.fromEntries(result.payouts),
      awards: result.awards,
      uncontested: result.uncontested,
    };
  }

  return {
    configHash: config.configHash,
    total: ledger.getTotal(),
    contributions: Object.fromEntries(ledger.getContributions()),
    folded: ledger.getFoldedPlayers(),
    pots: ledger.derivePots(),
    ...(actions !== undefined ? { actions } : {}),
    ...(stacks !== undefined ? { stacks } : {}),
    ...(evaluations.length > 0 ? { evaluations } : {}),
    ...(distribution !== undefined ? { distribution } : {}),
  };
}
