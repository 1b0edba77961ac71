/**
 * HandEngine.test.ts
 * Full-hand tests with stacked decks and scripted decisions
 */

import { HandEngine } from '../HandEngine';
import { parseCards, formatCards } from '../Card';
import { createStackedDeck, createSeededRandom } from '../Deck';
import { InvalidTableError } from '../EngineErrors';
import { eventsOfType, RecordedGameEvent } from '../GameEvents';
import { createSeatPlayer, createSeating, TableSeating } from '../TableState';
import { ScriptedDecisionSource, PassiveDecisionSource } from '../../controller/DecisionSource';

// ============================================================================
// Test Setup
// ============================================================================

function threeHanded(stacks: [number, number, number] = [1000, 1000, 1000]): TableSeating {
  return createSeating(
    stacks.map((stack, i) => createSeatPlayer(`p${i}`, `Player ${i}`, stack, i)),
    0
  );
}

/**
 * Hole cards go p1, p2, p0 twice (left of the button first):
 * p0 As Ad, p1 Kh Kd, p2 7c 2d. Board 9s 8h 4c Jd Qs.
 */
const ACES_WIN_DECK = parseCards('Kh 7c As Kd 2d Ad 3c 9s 8h 4c 5c Jd 6c Qs');

function stackedAcesDeck() {
  return createStackedDeck(ACES_WIN_DECK);
}

function chipsOf(seating: TableSeating): number {
  return seating.players.reduce((sum, p) => sum + p.stack, 0);
}

// ============================================================================
// Showdown
// ============================================================================

describe('HandEngine - showdown', () => {
  it('checks down and awards the pot to the best hand', async () => {
    const engine = new HandEngine();
    const seating = threeHanded();
    const result = await engine.playHand(seating, new PassiveDecisionSource(), stackedAcesDeck());

    expect(result.reason).toBe('showdown');
    expect(result.winnerIds).toEqual(['p0']);
    expect(result.payouts.get('p0')).toBe(30);
    expect(formatCards(result.communityCards)).toBe('9♠ 8♥ 4♣ J♦ Q♠');
    expect(result.hands.get('p0')?.description).toBe('Pair of Aces');
    expect(result.finalStacks.get('p0')).toBe(1020);
    expect(result.finalStacks.get('p1')).toBe(990);
    expect(result.finalStacks.get('p2')).toBe(990);
    expect(chipsOf(seating)).toBe(3000);
  });

  it('splits main and side pots after an all-in', async () => {
    const engine = new HandEngine();
    const seating = threeHanded([100, 1000, 1000]);
    const decisions = new ScriptedDecisionSource({
      p0: [{ type: 'all-in' }],
      p1: [{ type: 'call' }, { type: 'raise', amount: 200 }],
    });
    const result = await engine.playHand(seating, decisions, stackedAcesDeck());

    expect(result.pots.map(p => p.amount)).toEqual([300, 400]);
    expect(result.pots[1].eligiblePlayers).toEqual(['p1', 'p2']);
    expect(result.payouts.get('p0')).toBe(300);
    expect(result.payouts.get('p1')).toBe(400);
    expect(result.finalStacks.get('p0')).toBe(300);
    expect(result.finalStacks.get('p1')).toBe(1100);
    expect(result.finalStacks.get('p2')).toBe(700);
    expect(chipsOf(seating)).toBe(2100);
  });

  it('gives the odd chip to the first tied winner left of the button', async () => {
    const engine = new HandEngine({ config: { ante: 1 } });
    const seating = threeHanded();
    const deck = createStackedDeck(parseCards('2c 3d 4h 5c 6d 7h 8c As Ks Qs 9c Js 2h Ts'));
    const decisions = new ScriptedDecisionSource({ p0: [{ type: 'fold' }] });
    const result = await engine.playHand(seating, decisions, deck);

    // Folded ante stays in a 3-chip tier below the 20 chips of blinds
    expect(result.awards.map(a => a.amount)).toEqual([3, 20]);
    expect(result.awards[0].oddChipWinner).toBe('p1');
    expect(result.awards[1].remainder).toBe(0);
    expect(result.payouts.get('p1')).toBe(12);
    expect(result.payouts.get('p2')).toBe(11);
    expect(result.finalStacks.get('p0')).toBe(999);
    expect(result.finalStacks.get('p1')).toBe(1001);
    expect(result.finalStacks.get('p2')).toBe(1000);
  });
});

// ============================================================================
// Folds
// ============================================================================

describe('HandEngine - folds', () => {
  it('ends preflop when everyone folds to the big blind', async () => {
    const engine = new HandEngine();
    const seating = threeHanded();
    const decisions = new ScriptedDecisionSource({
      p0: [{ type: 'fold' }],
      p1: [{ type: 'fold' }],
    });
    const result = await engine.playHand(seating, decisions, stackedAcesDeck());

    expect(result.reason).toBe('all-fold');
    expect(result.winnerIds).toEqual(['p2']);
    expect(result.communityCards).toEqual([]);
    expect(result.hands.size).toBe(0);
    expect(result.finalStacks.get('p1')).toBe(995);
    expect(result.finalStacks.get('p2')).toBe(1005);
    expect(decisions.remaining('p0')).toBe(0);
  });
});

// ============================================================================
// Lifecycle
// ============================================================================

describe('HandEngine - lifecycle', () => {
  it('rejects a seat without chips', async () => {
    const engine = new HandEngine();
    const seating = threeHanded([1000, 0, 1000]);
    await expect(engine.playHand(seating, new PassiveDecisionSource())).rejects.toThrow(InvalidTableError);
  });

  it('numbers hands and restarts the event history', async () => {
    const engine = new HandEngine();
    const seating = threeHanded();
    const first = await engine.playHand(seating, new PassiveDecisionSource(), stackedAcesDeck());
    const second = await engine.playHand(seating, new PassiveDecisionSource(), stackedAcesDeck());

    expect(first.handId).toBe('hand_1');
    expect(second.handId).toBe('hand_2');
    expect(second.handNumber).toBe(2);
    expect(second.events[0].sequence).toBe(1);
    expect(engine.getEventHistory()).toHaveLength(second.events.length);
  });

  it('emits the hand from start to end', async () => {
    const engine = new HandEngine();
    const seen: RecordedGameEvent[] = [];
    engine.onEvent(event => seen.push(event));
    const result = await engine.playHand(threeHanded(), new PassiveDecisionSource(), stackedAcesDeck());

    expect(seen).toHaveLength(result.events.length);
    expect(result.events[0].type).toBe('HAND_STARTED');
    expect(result.events[result.events.length - 1].type).toBe('HAND_ENDED');
    expect(eventsOfType(result.events, 'STREET_STARTED').map(e => e.street))
      .toEqual(['preflop', 'flop', 'turn', 'river']);
    expect(eventsOfType(result.events, 'POT_AWARDED')[0].winningHandDescription).toBe('Pair of Aces');
  });

  it('deals the same hand from the same seed', async () => {
    const first = await new HandEngine({ random: createSeededRandom(42) })
      .playHand(threeHanded(), new PassiveDecisionSource());
    const second = await new HandEngine({ random: createSeededRandom(42) })
      .playHand(threeHanded(), new PassiveDecisionSource());

    expect(second.communityCards).toEqual(first.communityCards);
    expect(second.payouts).toEqual(first.payouts);
  });
});
