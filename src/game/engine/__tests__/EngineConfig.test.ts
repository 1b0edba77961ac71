/**
 * EngineConfig.test.ts
 */

import { EngineConfig, DEFAULT_ENGINE_CONFIG } from '../EngineConfig';
import { InvalidConfigError } from '../EngineErrors';

describe('EngineConfig', () => {
  test('uses defaults', () => {
    const config = new EngineConfig();
    expect(config.smallBlind).toBe(DEFAULT_ENGINE_CONFIG.smallBlind);
    expect(config.bigBlind).toBe(10);
    expect(config.ante).toBe(0);
    expect(config.structure).toBe('no-limit');
    expect(config.isFixedLimit).toBe(false);
    expect(config.strictActions).toBe(false);
  });

  test('limit bet size doubles on the turn and river', () => {
    const config = new EngineConfig({ bigBlind: 20, smallBlind: 10, structure: 'fixed-limit' });
    expect(config.limitBetSize('preflop')).toBe(20);
    expect(config.limitBetSize('flop')).toBe(20);
    expect(config.limitBetSize('turn')).toBe(40);
    expect(config.limitBetSize('river')).toBe(40);
  });

  test('partial limit multipliers keep the other streets', () => {
    const config = new EngineConfig({ limitMultipliers: { river: 3 } });
    expect(config.limitBetSize('river')).toBe(30);
    expect(config.limitBetSize('turn')).toBe(20);
  });

  test('rejects invalid values', () => {
    expect(() => new EngineConfig({ bigBlind: 0 })).toThrow(InvalidConfigError);
    expect(() => new EngineConfig({ smallBlind: 20, bigBlind: 10 })).toThrow(
      "Invalid engine configuration 'smallBlind': 20 exceeds big blind 10"
    );
    expect(() => new EngineConfig({ ante: 1.5 })).toThrow(InvalidConfigError);
    expect(() => new EngineConfig({ maxBetsPerStreet: 0 })).toThrow(InvalidConfigError);
  });

  test('hash is stable and tracks changes', () => {
    const a = new EngineConfig({ ante: 1 });
    const b = new EngineConfig({ ante: 1 });
    expect(a.configHash).toBe(b.configHash);
    expect(a.configHash).toHaveLength(8);
    expect(a.withUpdates({ ante: 2 }).configHash).not.toBe(a.configHash);
  });

  test('withUpdates leaves the original untouched', () => {
    const base = new EngineConfig();
    const updated = base.withUpdates({ structure: 'fixed-limit' });
    expect(base.isFixedLimit).toBe(false);
    expect(updated.isFixedLimit).toBe(true);
    expect(updated.toJSON().bigBlind).toBe(10);
  });
});
