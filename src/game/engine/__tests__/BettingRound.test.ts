/**
 * BettingRound.test.ts
 * Tests for the per-street betting state machine
 *
 * Test coverage:
 * - Turn order and completion
 * - Big blind option and reopened action
 * - Short all-in raises that do not reopen betting
 * - Fixed-limit bet sizes and the raise cap
 * - Forced bets
 */

import { BettingRound, postAntes, postBlinds } from '../BettingRound';
import { EngineConfig, EngineConfigInput } from '../EngineConfig';
import { EngineError, EngineErrorCode, IllegalActionError } from '../EngineErrors';
import { createGameEventEmitter, eventsOfType } from '../GameEvents';
import { SeatPlayer, Street, TableSeating, createSeatPlayer, createSeating, startStreet } from '../TableState';
import { PotLedger } from '../../../economy/Pot';

// ============================================================================
// Test Setup
// ============================================================================

interface Table {
  seating: TableSeating;
  ledger: PotLedger;
  config: EngineConfig;
}

function createTable(stacks: number[], configInput: EngineConfigInput = {}): Table {
  const players: SeatPlayer[] = stacks.map((stack, i) => createSeatPlayer(`p${i}`, `Player ${i}`, stack, i));
  return {
    seating: createSeating(players, 0),
    ledger: new PotLedger(),
    config: new EngineConfig(configInput),
  };
}

function openRound(table: Table, street: Street): BettingRound {
  if (street !== 'preflop') {
    startStreet(table.seating.players);
  }
  return new BettingRound({ street, seating: table.seating, config: table.config, ledger: table.ledger });
}

function expectEngineError(fn: () => unknown, code: EngineErrorCode): void {
  try {
    fn();
    throw new Error('expected an engine error');
  } catch (error) {
    expect(error).toBeInstanceOf(EngineError);
    if (error instanceof EngineError) {
      expect(error.code).toBe(code);
    }
  }
}

// ============================================================================
// Turn Order
// ============================================================================

describe('BettingRound - turn order', () => {
  it('completes after everyone checks', () => {
    const table = createTable([1000, 1000, 1000]);
    const round = openRound(table, 'flop');

    expect(round.getCurrentPlayer()?.id).toBe('p1');
    round.act('p1', { type: 'check' });
    expect(round.getCurrentPlayer()?.id).toBe('p2');
    round.act('p2', { type: 'check' });
    round.act('p0', { type: 'check' });

    expect(round.isComplete()).toBe(true);
    expect(round.getCurrentPlayer()).toBeNull();
    expect(round.getDecisionContext()).toBeNull();
  });

  it('gives the big blind an option when everyone limps', () => {
    const table = createTable([1000, 1000, 1000]);
    postBlinds(table.seating, table.config, table.ledger);
    const round = openRound(table, 'preflop');

    expect(round.getHighestBet()).toBe(10);
    expect(round.getCurrentPlayer()?.id).toBe('p0');
    round.act('p0', { type: 'call' });
    round.act('p1', { type: 'call' });

    expect(round.isComplete()).toBe(false);
    const context = round.getDecisionContext();
    expect(context?.playerId).toBe('p2');
    expect(context?.canCheck).toBe(true);
    expect(context?.amountToCall).toBe(0);
  });

  it('reopens the action when the big blind raises', () => {
    const table = createTable([1000, 1000, 1000]);
    postBlinds(table.seating, table.config, table.ledger);
    const round = openRound(table, 'preflop');

    round.act('p0', { type: 'call' });
    round.act('p1', { type: 'call' });
    const raise = round.act('p2', { type: 'raise', amount: 30 });

    expect(raise.chipsAdded).toBe(20);
    expect(raise.fullRaise).toBe(true);
    expect(round.getMinRaiseIncrement()).toBe(20);
    expect(round.getCurrentPlayer()?.id).toBe('p0');

    round.act('p0', { type: 'call' });
    round.act('p1', { type: 'call' });

    expect(round.isComplete()).toBe(true);
    expect(table.ledger.getTotal()).toBe(90);
  });

  it('ends when all but one player folds', () => {
    const table = createTable([1000, 1000, 1000]);
    const round = openRound(table, 'flop');

    round.act('p1', { type: 'raise', amount: 40 });
    round.act('p2', { type: 'fold' });
    round.act('p0', { type: 'fold' });

    expect(round.isComplete()).toBe(true);
    expect(table.ledger.getFoldedPlayers()).toEqual(['p2', 'p0']);
  });
});

// ============================================================================
// Raises
// ============================================================================

describe('BettingRound - raises', () => {
  it('a full re-raise lets the original bettor raise again', () => {
    const table = createTable([1000, 1000, 1000]);
    const round = openRound(table, 'flop');

    round.act('p1', { type: 'raise', amount: 50 });
    round.act('p2', { type: 'raise', amount: 150 });
    round.act('p0', { type: 'fold' });

    const context = round.getDecisionContext();
    expect(context?.canRaise).toBe(true);
    expect(context?.minRaiseTo).toBe(250);
    expect(round.act('p1', { type: 'raise', amount: 250 }).fullRaise).toBe(true);
  });

  it('a short all-in does not reopen raising for players who already acted', () => {
    const table = createTable([1000, 1000, 130]);
    const round = openRound(table, 'flop');

    round.act('p1', { type: 'raise', amount: 100 });
    const shove = round.act('p2', { type: 'all-in' });
    expect(shove.effective).toEqual({ type: 'raise', raiseTo: 130, allIn: true });
    expect(shove.fullRaise).toBe(false);
    expect(round.getMinRaiseIncrement()).toBe(100);

    round.act('p0', { type: 'call' });

    const context = round.getDecisionContext();
    expect(context?.playerId).toBe('p1');
    expect(context?.amountToCall).toBe(30);
    expect(context?.canRaise).toBe(false);

    const record = round.act('p1', { type: 'raise', amount: 400 });
    expect(record.effective).toEqual({ type: 'call', amount: 30, allIn: false });
    expect(record.violation).toBe('no further raise is allowed');
    expect(round.isComplete()).toBe(true);
    expect(table.ledger.getTotal()).toBe(390);
  });

  it('an undersized raise is played as a call', () => {
    const table = createTable([1000, 1000, 1000]);
    const round = openRound(table, 'flop');

    round.act('p1', { type: 'raise', amount: 40 });
    const record = round.act('p2', { type: 'raise', amount: 60 });

    expect(record.effective).toEqual({ type: 'call', amount: 40, allIn: false });
    expect(record.adjusted).toBe(true);
    expect(record.violation).toBe('raise to 60 is below the minimum of 80');
  });
});

// ============================================================================
// Errors
// ============================================================================

describe('BettingRound - errors', () => {
  it('rejects illegal actions in strict mode', () => {
    const table = createTable([1000, 1000, 1000], { strictActions: true });
    const round = openRound(table, 'flop');

    round.act('p1', { type: 'raise', amount: 20 });
    expect(() => round.act('p2', { type: 'check' })).toThrow(IllegalActionError);
    expectEngineError(() => round.act('p2', { type: 'check' }), EngineErrorCode.ILLEGAL_ACTION);
    expect(round.getCurrentPlayer()?.id).toBe('p2');
  });

  it('rejects an action out of turn', () => {
    const table = createTable([1000, 1000, 1000]);
    const round = openRound(table, 'flop');
    expectEngineError(() => round.act('p2', { type: 'check' }), EngineErrorCode.NOT_PLAYERS_TURN);
  });

  it('rejects an action after the round completes', () => {
    const table = createTable([1000, 1000]);
    const round = openRound(table, 'flop');
    round.act('p1', { type: 'check' });
    round.act('p0', { type: 'check' });
    expectEngineError(() => round.act('p1', { type: 'check' }), EngineErrorCode.ROUND_COMPLETE);
  });
});

// ============================================================================
// Fixed Limit
// ============================================================================

describe('BettingRound - fixed-limit', () => {
  it('caps the flop at four bets', () => {
    const table = createTable([1000, 1000, 1000], { structure: 'fixed-limit' });
    const round = openRound(table, 'flop');

    expect(round.act('p1', { type: 'raise', amount: 500 }).highestBet).toBe(10);
    expect(round.act('p2', { type: 'raise' }).highestBet).toBe(20);
    expect(round.act('p0', { type: 'raise' }).highestBet).toBe(30);
    expect(round.act('p1', { type: 'raise' }).highestBet).toBe(40);

    const capped = round.act('p2', { type: 'raise' });
    expect(capped.effective).toEqual({ type: 'call', amount: 20, allIn: false });
    expect(capped.violation).toBe('no further raise is allowed');

    round.act('p0', { type: 'call' });
    expect(round.isComplete()).toBe(true);
    expect(table.ledger.getTotal()).toBe(120);
  });

  it('counts the big blind as the first preflop bet', () => {
    const table = createTable([1000, 1000, 1000], { structure: 'fixed-limit' });
    postBlinds(table.seating, table.config, table.ledger);
    const round = openRound(table, 'preflop');

    expect(round.getState().betsThisStreet).toBe(1);
    expect(round.act('p0', { type: 'raise' }).highestBet).toBe(20);
    expect(round.act('p1', { type: 'raise' }).highestBet).toBe(30);
    expect(round.act('p2', { type: 'raise' }).highestBet).toBe(40);
    expect(round.getDecisionContext()?.canRaise).toBe(false);

    round.act('p0', { type: 'call' });
    round.act('p1', { type: 'call' });
    expect(round.isComplete()).toBe(true);
    expect(table.ledger.getTotal()).toBe(120);
  });

  it('uses the doubled bet size on the turn', () => {
    const table = createTable([1000, 1000], { structure: 'fixed-limit' });
    const round = openRound(table, 'turn');

    expect(round.getDecisionContext()?.limitBetSize).toBe(20);
    expect(round.act('p1', { type: 'raise' }).highestBet).toBe(20);
  });
});

// ============================================================================
// Forced Bets
// ============================================================================

describe('BettingRound - forced bets', () => {
  it('a short big blind does not lower the bet to match', () => {
    const table = createTable([1000, 1000, 6]);
    const posted = postBlinds(table.seating, table.config, table.ledger);
    const round = openRound(table, 'preflop');

    expect(posted).toEqual({ smallBlind: 5, bigBlind: 6 });
    expect(round.getHighestBet()).toBe(10);
    expect(round.getDecisionContext()?.amountToCall).toBe(10);
  });

  it('an all-in small blind heads-up leaves nothing to decide', () => {
    const table = createTable([3, 1000]);
    postBlinds(table.seating, table.config, table.ledger);
    const round = openRound(table, 'preflop');

    expect(round.isComplete()).toBe(true);
    expect(round.getCurrentPlayer()).toBeNull();
    expect(table.ledger.getTotal()).toBe(13);
  });

  it('antes go to the pot but not to the current bet', () => {
    const table = createTable([1000, 1000, 1000], { ante: 2 });
    const antes = postAntes(table.seating, table.config, table.ledger);
    postBlinds(table.seating, table.config, table.ledger);

    const [p0, p1, p2] = table.seating.players;
    expect(antes.get('p0')).toBe(2);
    expect(p0.currentBet).toBe(0);
    expect(p0.totalBetThisHand).toBe(2);
    expect(p1.currentBet).toBe(5);
    expect(p1.totalBetThisHand).toBe(7);
    expect(p2.stack).toBe(988);
    expect(table.ledger.getTotal()).toBe(21);
  });
});

// ============================================================================
// Events
// ============================================================================

describe('BettingRound - events', () => {
  it('emits one event per action and one on completion', () => {
    const table = createTable([1000, 1000, 1000]);
    const events = createGameEventEmitter();
    postBlinds(table.seating, table.config, table.ledger, { events, handId: 'hand_1' });
    const round = new BettingRound({
      street: 'preflop',
      seating: table.seating,
      config: table.config,
      ledger: table.ledger,
      events,
      handId: 'hand_1',
    });

    round.act('p0', { type: 'check' });
    round.act('p1', { type: 'call' });
    round.act('p2', { type: 'check' });

    const history = events.getHistory();
    expect(eventsOfType(history, 'BLIND_POSTED')).toHaveLength(2);
    const acted = eventsOfType(history, 'PLAYER_ACTED');
    expect(acted).toHaveLength(3);
    expect(acted[0].effective).toEqual({ type: 'fold' });
    expect(acted[0].violation).toBe('cannot check facing a bet of 10');
    expect(eventsOfType(history, 'BETTING_ROUND_COMPLETE')).toHaveLength(1);
    expect(history.map(e => e.sequence)).toEqual([1, 2, 3, 4, 5, 6]);
  });
});
