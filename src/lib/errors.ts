// Error taxonomy for the signal pipeline.
// Every error here is terminal for a single candidate only; stages convert them into tagged results.

import type { ParseErrorKind, PlanFailureReason, ValidationError } from '../types';

export class SignalParseError extends Error {
  readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind, message: string) {
    super(message);
    this.name = 'SignalParseError';
    this.kind = kind;
  }
}

/** Raised by market-data and instrument collaborators when LTP or lot size is unavailable */
export class MarketDataUnavailableError extends Error {
  readonly reason: PlanFailureReason = 'MISSING_MARKET_DATA';

  constructor(message: string) {
    super(message);
    this.name = 'MarketDataUnavailableError';
  }
}

export class ConfigError extends Error {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super(`Invalid configuration: ${errors.map((e) => `${e.field} ${e.message}`).join('; ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
