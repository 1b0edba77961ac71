/**
 * scenario.ts
 * JSON scenario format read by the command line tool
 */

import { Street, STREETS, PlayerId } from '../game/engine/TableState';
import { ActionType, ACTION_TYPES } from '../game/engine/ActionNormalizer';
import { BettingStructure, EngineConfigInput } from '../game/engine/EngineConfig';

// ============================================================================
// Types
// ============================================================================

export interface ScenarioPlayer {
  readonly id: PlayerId;
  readonly name?: string;
  readonly stack: number;
}

export interface ScenarioAction {
  readonly player: PlayerId;
  readonly action: ActionType;
  readonly amount?: number;
}

export interface ScenarioStreet {
  readonly street: Street;
  readonly actions: readonly ScenarioAction[];
}

export interface Scenario {
  readonly config?: EngineConfigInput;
  readonly players: readonly ScenarioPlayer[];
  readonly dealerIndex: number;
  readonly streets: readonly ScenarioStreet[];
  readonly contributions?: Readonly<Record<PlayerId, number>>;
  readonly folded: readonly PlayerId[];
  /** Cards per player, e.g. "As Kd"; combined with board when given */
  readonly hands?: Readonly<Record<PlayerId, string>>;
  readonly board?: string;
  /** Card lists to evaluate on their own */
  readonly evaluate: readonly string[];
}

export class ScenarioError extends Error {
  constructor(path: string, reason: string) {
    super(`Invalid scenario at ${path}: ${reason}`);
    this.name = 'ScenarioError';
    Object.setPrototypeOf(this, ScenarioError.prototype);
  }
}

// ============================================================================
// Field Readers
// ============================================================================

type JsonObject = { readonly [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw new ScenarioError(path, 'expected an object');
  }
  return value;
}

function readArray(value: unknown, path: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    throw new ScenarioError(path, 'expected an array');
  }
  return value;
}

function readString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ScenarioError(path, 'expected a non-empty string');
  }
  return value;
}

function readChips(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ScenarioError(path, 'expected a non-negative integer');
  }
  return value;
}

function readOptional<T>(
  obj: JsonObject,
  key: string,
  path: string,
  reader: (value: unknown, path: string) => T
): T | undefined {
  const value = obj[key];
  return value === undefined ? undefined : reader(value, `${path}.${key}`);
}

function isStreet(value: unknown): value is Street {
  return STREETS.some(s => s === value);
}

function isActionType(value: unknown): value is ActionType {
  return ACTION_TYPES.some(t => t === value);
}

function isStructure(value: unknown): value is BettingStructure {
  return value === 'no-limit' || value === 'fixed-limit';
}

// ============================================================================
// Section Parsers
// ============================================================================

function parseConfig(value: unknown, path: string): EngineConfigInput {
  const obj = readObject(value, path);
  const rawStructure = obj.structure;
  let structure: BettingStructure | undefined;
  if (rawStructure !== undefined) {
    if (!isStructure(rawStructure)) {
      throw new ScenarioError(`${path}.structure`, `unknown structure '${String(rawStructure)}'`);
    }
    structure = rawStructure;
  }
  const rawStrict = obj.strictActions;
  let strict: boolean | undefined;
  if (rawStrict !== undefined) {
    if (typeof rawStrict !== 'boolean') {
      throw new ScenarioError(`${path}.strictActions`, 'expected a boolean');
    }
    strict = rawStrict;
  }

  let limitMultipliers: Partial<Record<Street, number>> | undefined;
  if (obj.limitMultipliers !== undefined) {
    const raw = readObject(obj.limitMultipliers, `${path}.limitMultipliers`);
    limitMultipliers = {};
    for (const [key, multiplier] of Object.entries(raw)) {
      if (!isStreet(key)) {
        throw new ScenarioError(`${path}.limitMultipliers.${key}`, 'unknown street');
      }
      limitMultipliers[key] = readChips(multiplier, `${path}.limitMultipliers.${key}`);
    }
  }

  return {
    smallBlind: readOptional(obj, 'smallBlind', path, readChips),
    bigBlind: readOptional(obj, 'bigBlind', path, readChips),
    ante: readOptional(obj, 'ante', path, readChips),
    maxBetsPerStreet: readOptional(obj, 'maxBetsPerStreet', path, readChips),
    structure,
    strictActions: strict,
    limitMultipliers,
  };
}

function parsePlayer(value: unknown, path: string): ScenarioPlayer {
  const obj = readObject(value, path);
  return {
    id: readString(obj.id, `${path}.id`),
    name: readOptional(obj, 'name', path, readString),
    stack: readChips(obj.stack, `${path}.stack`),
  };
}

function parseAction(value: unknown, path: string, players: ReadonlySet<PlayerId>): ScenarioAction {
  const obj = readObject(value, path);
  const player = readString(obj.player, `${path}.player`);
  if (!players.has(player)) {
    throw new ScenarioError(`${path}.player`, `unknown player '${player}'`);
  }
  const action = obj.action;
  if (!isActionType(action)) {
    throw new ScenarioError(`${path}.action`, `unknown action '${String(action)}'`);
  }
  const amount = readOptional(obj, 'amount', path, readChips);
  return amount === undefined ? { player, action } : { player, action, amount };
}

function parseStreet(value: unknown, path: string, players: ReadonlySet<PlayerId>): ScenarioStreet {
  const obj = readObject(value, path);
  const street = obj.street;
  if (!isStreet(street)) {
    throw new ScenarioError(`${path}.street`, `unknown street '${String(street)}'`);
  }
  const actions = readArray(obj.actions ?? [], `${path}.actions`)
    .map((a, i) => parseAction(a, `${path}.actions[${i}]`, players));
  return { street, actions };
}

function parseStringRecord(value: unknown, path: string): Record<string, string> {
  const obj = readObject(value, path);
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(obj)) {
    result[key] = readString(entry, `${path}.${key}`);
  }
  return result;
}

function parseChipRecord(value: unknown, path: string): Record<string, number> {
  const obj = readObject(value, path);
  const result: Record<string, number> = {};
  for (const [key, entry] of Object.entries(obj)) {
    result[key] = readChips(entry, `${path}.${key}`);
  }
  return result;
}

// ============================================================================
// Main API
// ============================================================================

/**
 * Validate parsed JSON into a scenario
 *
 * @throws ScenarioError naming the offending path
 */
export function parseScenario(json: unknown): Scenario {
  const root = readObject(json, '$');

  const players = readArray(root.players ?? [], '$.players')
    .map((p, i) => parsePlayer(p, `$.players[${i}]`));
  const playerIds = new Set(players.map(p => p.id));
  if (playerIds.size !== players.length) {
    throw new ScenarioError('$.players', 'player ids must be unique');
  }

  const streets = readArray(root.streets ?? [], '$.streets')
    .map((s, i) => parseStreet(s, `$.streets[${i}]`, playerIds));
  if (streets.length > 0 && players.length < 2) {
    throw new ScenarioError('$.players', 'replaying streets needs at least 2 players');
  }

  const folded = readArray(root.folded ?? [], '$.folded')
    .map((f, i) => readString(f, `$.folded[${i}]`));

  const evaluate = readArray(root.evaluate ?? [], '$.evaluate')
    .map((e, i) => readString(e, `$.evaluate[${i}]`));

  return {
    config: readOptional(root, 'config', '$', parseConfig),
    players,
    dealerIndex: readOptional(root, 'dealerIndex', '$', readChips) ?? 0,
    streets,
    contributions: readOptional(root, 'contributions', '$', parseChipRecord),
    folded,
    hands: readOptional(root, 'hands', '$', parseStringRecord),
    board: readOptional(root, 'board', '$', readString),
    evaluate,
  };
}
