// utils/errors/gameValidationError.ts
export type GameErrorCode = 'INVALID_BET' | 'INSUFFICIENT_BALANCE' | 'NOT_SPLITTABLE' | 'NOT_DOUBLEABLE';

export interface GameErrorDetails {
  participant?: string;
  amount?: number;
  balance?: number;
  cards?: string[];
  context?: Record<string, unknown>;
}

/**
 * A participant action that failed validation. Thrown before any state is touched,
 * so the caller can re-prompt or fall back without cleaning up.
 */
export class GameValidationError extends Error {
  constructor(
    public readonly code: GameErrorCode,
    message: string,
    public readonly details: GameErrorDetails = {},
  ) {
    super(message);
    this.name = 'GameValidationError';
  }
}

export class InvalidBetError extends GameValidationError {
  constructor(message: string, details?: GameErrorDetails) {
    super('INVALID_BET', message, details);
    this.name = 'InvalidBetError';
  }
}

export class InsufficientBalanceError extends GameValidationError {
  constructor(message: string, details?: GameErrorDetails) {
    super('INSUFFICIENT_BALANCE', message, details);
    this.name = 'InsufficientBalanceError';
  }
}

export class NotSplittableError extends GameValidationError {
  constructor(message: string, details?: GameErrorDetails) {
    super('NOT_SPLITTABLE', message, details);
    this.name = 'NotSplittableError';
  }
}

export class NotDoubleableError extends GameValidationError {
  constructor(message: string, details?: GameErrorDetails) {
    super('NOT_DOUBLEABLE', message, details);
    this.name = 'NotDoubleableError';
  }
}
