/**
 * EngineConfig.ts
 * Immutable rules configuration for one table
 *
 * Blinds, antes, betting structure and action strictness.
 * Serializable and hashable.
 */

import { Street } from './TableState';
import { EngineErrors } from './EngineErrors';

// ============================================================================
// Types
// ============================================================================

export type BettingStructure = 'no-limit' | 'fixed-limit';

export interface EngineConfigData {
  readonly smallBlind: number;
  readonly bigBlind: number;
  readonly ante: number;
  readonly structure: BettingStructure;
  /** Fixed-limit cap on bets plus raises per street */
  readonly maxBetsPerStreet: number;
  /** Fixed-limit bet size per street, in big blinds */
  readonly limitMultipliers: Readonly<Record<Street, number>>;
  /** Reject illegal actions instead of downgrading them */
  readonly strictActions: boolean;
}

export type EngineConfigInput = Partial<Omit<EngineConfigData, 'limitMultipliers'>> & {
  readonly limitMultipliers?: Partial<Record<Street, number>>;
};

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_LIMIT_MULTIPLIERS: Readonly<Record<Street, number>> = {
  preflop: 1,
  flop: 1,
  turn: 2,
  river: 2,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfigData = {
  smallBlind: 5,
  bigBlind: 10,
  ante: 0,
  structure: 'no-limit',
  maxBetsPerStreet: 4,
  limitMultipliers: DEFAULT_LIMIT_MULTIPLIERS,
  strictActions: false,
};

// ============================================================================
// EngineConfig Class
// ============================================================================

export class EngineConfig {
  private readonly data: EngineConfigData;
  private readonly hash: string;

  constructor(data: EngineConfigInput = {}) {
    this.data = this.buildConfig(data);
    this.validateConfig(this.data);
    this.hash = this.computeHash(this.data);
  }

  /**
   * Build complete config from partial data
   */
  private buildConfig(partial: EngineConfigInput): EngineConfigData {
    return {
      smallBlind: partial.smallBlind ?? DEFAULT_ENGINE_CONFIG.smallBlind,
      bigBlind: partial.bigBlind ?? DEFAULT_ENGINE_CONFIG.bigBlind,
      ante: partial.ante ?? DEFAULT_ENGINE_CONFIG.ante,
      structure: partial.structure ?? DEFAULT_ENGINE_CONFIG.structure,
      maxBetsPerStreet: partial.maxBetsPerStreet ?? DEFAULT_ENGINE_CONFIG.maxBetsPerStreet,
      limitMultipliers: { ...DEFAULT_LIMIT_MULTIPLIERS, ...partial.limitMultipliers },
      strictActions: partial.strictActions ?? DEFAULT_ENGINE_CONFIG.strictActions,
    };
  }

  private validateConfig(config: EngineConfigData): void {
    const chipFields = ['smallBlind', 'bigBlind', 'ante'] as const;
    for (const field of chipFields) {
      const value = config[field];
      if (!Number.isInteger(value) || value < 0) {
        throw EngineErrors.invalidConfig(field, `must be a non-negative integer, got ${value}`);
      }
    }
    if (config.bigBlind <= 0) {
      throw EngineErrors.invalidConfig('bigBlind', 'must be positive');
    }
    if (config.smallBlind > config.bigBlind) {
      throw EngineErrors.invalidConfig(
        'smallBlind',
        `${config.smallBlind} exceeds big blind ${config.bigBlind}`
      );
    }
    if (config.structure !== 'no-limit' && config.structure !== 'fixed-limit') {
      throw EngineErrors.invalidConfig('structure', `unknown structure '${String(config.structure)}'`);
    }
    if (!Number.isInteger(config.maxBetsPerStreet) || config.maxBetsPerStreet < 1) {
      throw EngineErrors.invalidConfig('maxBetsPerStreet', 'must be a positive integer');
    }
    for (const [street, multiplier] of Object.entries(config.limitMultipliers)) {
      if (!Number.isInteger(multiplier) || multiplier < 1) {
        throw EngineErrors.invalidConfig(`limitMultipliers.${street}`, 'must be a positive integer');
      }
    }
  }

  /**
   * 32-bit FNV-1a over the serialized config, as 8 hex digits
   */
  private computeHash(config: EngineConfigData): string {
    const text = JSON.stringify(config);
    let hash = 0x811c9dc5;
    for (let i = 0; i < text.length; i++) {
      hash ^= text.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193) >>> 0;
    }
    return hash.toString(16).padStart(8, '0');
  }

  // ============================================================================
  // Getters
  // ============================================================================

  get smallBlind(): number {
    return this.data.smallBlind;
  }

  get bigBlind(): number {
    return this.data.bigBlind;
  }

  get ante(): number {
    return this.data.ante;
  }

  get structure(): BettingStructure {
    return this.data.structure;
  }

  get isFixedLimit(): boolean {
    return this.data.structure === 'fixed-limit';
  }

  get maxBetsPerStreet(): number {
    return this.data.maxBetsPerStreet;
  }

  get strictActions(): boolean {
    return this.data.strictActions;
  }

  get configHash(): string {
    return this.hash;
  }

  // ============================================================================
  // Methods
  // ============================================================================

  /**
   * Fixed bet size for a street
   */
  limitBetSize(street: Street): number {
    return this.data.bigBlind * this.data.limitMultipliers[street];
  }

  /**
   * Create a new config with updated values (immutable)
   */
  withUpdates(updates: EngineConfigInput): EngineConfig {
    return new EngineConfig({
      ...this.data,
      ...updates,
      limitMultipliers: { ...this.data.limitMultipliers, ...updates.limitMultipliers },
    });
  }

  toJSON(): EngineConfigData {
    return { ...this.data };
  }
}
