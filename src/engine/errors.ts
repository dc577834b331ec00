import type { Outcome } from '../types/valuation.js';

export type EngineErrorCode = 'INVALID_ODDS' | 'INVALID_INPUT' | 'INVALID_SETTINGS';

/**
 * Base class for validation failures raised by the engine.
 * The engine never catches these itself; callers decide whether to skip, log or abort.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(message: string, code: EngineErrorCode) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
  }
}

export class InvalidOddsError extends EngineError {
  readonly outcome: Outcome;
  readonly value: number | string;

  constructor(outcome: Outcome, value: number | string, reason = 'must be a decimal price above 1.0') {
    super(`Invalid ${outcome} odds ${String(value)}: ${reason}`, 'INVALID_ODDS');
    this.name = 'InvalidOddsError';
    this.outcome = outcome;
    this.value = value;
  }
}

export class InvalidInputError extends EngineError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
    this.field = field;
  }
}

export class InvalidSettingsError extends EngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid engine settings: ${issues.join('; ')}`, 'INVALID_SETTINGS');
    this.name = 'InvalidSettingsError';
    this.issues = issues;
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}
