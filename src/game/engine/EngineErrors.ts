/**
 * EngineErrors.ts
 * Error types for the rules engine
 *
 * Every failure the engine can surface carries a machine-readable code.
 * The orchestrator decides how to present them.
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum EngineErrorCode {
  // Hand evaluation
  INVALID_HAND_INPUT = 'INVALID_HAND_INPUT',
  INVALID_CARD = 'INVALID_CARD',

  // Betting
  ILLEGAL_ACTION = 'ILLEGAL_ACTION',
  NOT_PLAYERS_TURN = 'NOT_PLAYERS_TURN',
  ROUND_COMPLETE = 'ROUND_COMPLETE',

  // Pot accounting
  INVALID_AMOUNT = 'INVALID_AMOUNT',
  POT_INVARIANT_VIOLATION = 'POT_INVARIANT_VIOLATION',

  // Setup
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_TABLE = 'INVALID_TABLE',
}

// ============================================================================
// Base Error Class
// ============================================================================

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: EngineErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

export class HandEvaluationError extends EngineError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: EngineErrorCode = EngineErrorCode.INVALID_HAND_INPUT
  ) {
    super(code, message, details);
    this.name = 'HandEvaluationError';
    Object.setPrototypeOf(this, HandEvaluationError.prototype);
  }
}

export class IllegalActionError extends EngineError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: EngineErrorCode = EngineErrorCode.ILLEGAL_ACTION
  ) {
    super(code, message, details);
    this.name = 'IllegalActionError';
    Object.setPrototypeOf(this, IllegalActionError.prototype);
  }
}

export class InvalidAmountError extends EngineError {
  constructor(amount: number, reason: string) {
    super(
      EngineErrorCode.INVALID_AMOUNT,
      `Invalid amount ${amount}: ${reason}`,
      { amount, reason }
    );
    this.name = 'InvalidAmountError';
    Object.setPrototypeOf(this, InvalidAmountError.prototype);
  }
}

export class PotInvariantError extends EngineError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(
      EngineErrorCode.POT_INVARIANT_VIOLATION,
      `Pot invariant violated: ${reason}`,
      details
    );
    this.name = 'PotInvariantError';
    Object.setPrototypeOf(this, PotInvariantError.prototype);
  }
}

export class InvalidConfigError extends EngineError {
  constructor(field: string, reason: string) {
    super(
      EngineErrorCode.INVALID_CONFIG,
      `Invalid engine configuration '${field}': ${reason}`,
      { field, reason }
    );
    this.name = 'InvalidConfigError';
    Object.setPrototypeOf(this, InvalidConfigError.prototype);
  }
}

export class InvalidTableError extends EngineError {
  constructor(reason: string) {
    super(EngineErrorCode.INVALID_TABLE, `Invalid table: ${reason}`, { reason });
    this.name = 'InvalidTableError';
    Object.setPrototypeOf(this, InvalidTableError.prototype);
  }
}

// ============================================================================
// Error Factory
// ============================================================================

export const EngineErrors = {
  notEnoughCards: (count: number) =>
    new HandEvaluationError(`Need at least 5 cards, got ${count}`, { count }),

  wrongCardCount: (expected: number, count: number) =>
    new HandEvaluationError(`Must have exactly ${expected} cards, got ${count}`, {
      expected,
      count,
    }),

  noHands: () => new HandEvaluationError('No hands to compare'),

  duplicateCard: (card: string) =>
    new HandEvaluationError(`Card ${card} appears more than once`, { card }),

  invalidCard: (notation: string) =>
    new HandEvaluationError(
      `Cannot parse card '${notation}'`,
      { notation },
      EngineErrorCode.INVALID_CARD
    ),

  illegalAction: (playerId: string, action: string, reason: string) =>
    new IllegalActionError(`Illegal ${action} by ${playerId}: ${reason}`, {
      playerId,
      action,
      reason,
    }),

  notPlayersTurn: (playerId: string, expected: string | null) =>
    new IllegalActionError(
      `It is not ${playerId}'s turn to act (waiting on ${expected ?? 'nobody'})`,
      { playerId, expected },
      EngineErrorCode.NOT_PLAYERS_TURN
    ),

  roundComplete: (street: string) =>
    new IllegalActionError(
      `Betting round on the ${street} is already complete`,
      { street },
      EngineErrorCode.ROUND_COMPLETE
    ),

  invalidAmount: (amount: number, reason: string) =>
    new InvalidAmountError(amount, reason),

  potInvariant: (reason: string, details?: Record<string, unknown>) =>
    new PotInvariantError(reason, details),

  invalidConfig: (field: string, reason: string) =>
    new InvalidConfigError(field, reason),

  invalidTable: (reason: string) => new InvalidTableError(reason),
};
