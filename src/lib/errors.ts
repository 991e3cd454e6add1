/**
 * Forecast Errors
 *
 * Validation failures abort the call that raised them. A scoring failure
 * keeps the predictions produced before it so callers can still show them.
 */

import type { PredictionRecord } from '../types';

export type ForecastErrorCode = 'INSUFFICIENT_HISTORY' | 'INVALID_INPUT' | 'SCORING_FAILURE';

export abstract class ForecastError extends Error {
  abstract readonly code: ForecastErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InsufficientHistoryError extends ForecastError {
  readonly code = 'INSUFFICIENT_HISTORY';

  constructor(
    readonly targetWeek: number,
    readonly availableWeeks: number
  ) {
    super(
      `At least 2 active weeks are required before week ${targetWeek}, found ${availableWeeks}`
    );
  }
}

export class InvalidInputError extends ForecastError {
  readonly code = 'INVALID_INPUT';

  constructor(
    readonly field: string,
    reason: string
  ) {
    super(`Invalid ${field}: ${reason}`);
  }
}

export class ScoringFailureError extends ForecastError {
  readonly code = 'SCORING_FAILURE';

  constructor(
    readonly step: number,
    readonly partialPredictions: PredictionRecord[],
    reason: string,
    cause?: unknown
  ) {
    super(`Scoring failed at step ${step}: ${reason}`, { cause });
  }
}

/**
 * Flatten any thrown value to a log-friendly message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
