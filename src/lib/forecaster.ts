/**
 * Forecasting Module
 *
 * Recursive multi-step box-office forecaster:
 * - each step scores the feature vector for the next active week
 * - the step's output becomes pseudo-history for the following steps
 * - every prediction records whether its lag inputs were real or predicted,
 *   since forecast error compounds across PREDICTED steps
 */

import type { FeatureVector, MovieInfo, PredictionRecord, Provenance, Round } from '../types';
import { InsufficientHistoryError, InvalidInputError, ScoringFailureError, errorMessage } from './errors';
import { buildFeatures } from './featureBuilder';
import { createRatioPolicy, type DerivationPolicy } from './derivationPolicy';
import { getForecastConfig } from './config';
import { activeWeeks } from './roundSegmenter';
import type { ScoringFunction } from './scoring';

// Model version for tracking
// v1.0.0: Recursive lag forecaster with provenance tracking
// v1.1.0: Confidence band on each prediction, pluggable audience/screens policy
export const MODEL_VERSION = '1.1.0';

export interface ForecastOptions {
  score: ScoringFunction;
  policy?: DerivationPolicy;
  confidenceMargin?: number;
  maxHorizon?: number;
}

/**
 * Forecast loop state. `pseudoHistory` is replaced, never mutated, on each step.
 */
export interface ForecastState {
  phase: Provenance;
  step: number;
  lastRealActiveWeek: number;
  pseudoHistory: readonly PredictionRecord[];
}

export function initialState(round: Round): ForecastState {
  const realActive = activeWeeks(round);
  if (realActive.length < 2) {
    throw new InsufficientHistoryError(realActive.length + 1, realActive.length);
  }

  return {
    phase: 'REAL',
    step: 0,
    lastRealActiveWeek: realActive[realActive.length - 1].activeWeekIndex ?? realActive.length,
    pseudoHistory: [],
  };
}

/**
 * Append a prediction. Every later step takes its lag-1 from this
 * prediction, so the phase is PREDICTED from here on.
 */
export function advanceState(state: ForecastState, record: PredictionRecord): ForecastState {
  return {
    phase: 'PREDICTED',
    step: state.step + 1,
    lastRealActiveWeek: state.lastRealActiveWeek,
    pseudoHistory: [...state.pseudoHistory, record],
  };
}

export function targetWeekFor(state: ForecastState): number {
  return state.lastRealActiveWeek + state.step + 1;
}

function provenanceOf(features: FeatureVector): Provenance {
  const { week1, week2 } = features.meta.lagSources;
  return week1 === 'REAL' && week2 === 'REAL' ? 'REAL' : 'PREDICTED';
}

function scoreStep(
  score: ScoringFunction,
  features: FeatureVector,
  state: ForecastState
): number {
  let raw: unknown;
  try {
    raw = score(features);
  } catch (error) {
    throw new ScoringFailureError(
      state.step,
      [...state.pseudoHistory],
      errorMessage(error),
      error
    );
  }

  if (typeof raw !== 'number' || !Number.isFinite(raw)) {
    throw new ScoringFailureError(
      state.step,
      [...state.pseudoHistory],
      `scorer returned ${String(raw)}`
    );
  }

  return Math.max(0, raw);
}

export function calculateDeclineRate(predicted: number, previous: number): number {
  if (previous === 0) return 0;
  return (predicted - previous) / previous;
}

/**
 * Forecast `horizon` active weeks past the round's last real week
 */
export function forecast(
  round: Round,
  movieInfo: MovieInfo,
  horizon: number,
  options: ForecastOptions
): PredictionRecord[] {
  const config = getForecastConfig();
  const maxHorizon = options.maxHorizon ?? config.maxHorizon;
  const confidenceMargin = options.confidenceMargin ?? config.confidenceMargin;
  const policy = options.policy ?? createRatioPolicy();

  if (!Number.isInteger(horizon) || horizon < 1 || horizon > maxHorizon) {
    throw new InvalidInputError('horizon', `expected an integer in [1, ${maxHorizon}], got ${horizon}`);
  }

  let state = initialState(round);

  while (state.step < horizon) {
    const targetWeek = targetWeekFor(state);
    const features = buildFeatures(round, movieInfo, targetWeek, state.pseudoHistory);
    const predictedBoxoffice = scoreStep(options.score, features, state);

    const context = { features, step: state.step };
    const record: PredictionRecord = {
      targetWeek,
      predictedBoxoffice,
      predictedAudience: policy.deriveAudience(predictedBoxoffice, context),
      predictedScreens: policy.deriveScreens(predictedBoxoffice, context),
      declineRate: calculateDeclineRate(predictedBoxoffice, features.boxofficeWeek1),
      provenance: provenanceOf(features),
      confidenceLower: Math.max(0, predictedBoxoffice * (1 - confidenceMargin)),
      confidenceUpper: predictedBoxoffice * (1 + confidenceMargin),
    };

    if (state.phase === 'PREDICTED' && record.provenance === 'REAL') {
      // Steps after the first always consume at least one prediction
      throw new Error(`Provenance regressed to REAL at step ${state.step}`);
    }

    state = advanceState(state, record);
  }

  return [...state.pseudoHistory];
}
