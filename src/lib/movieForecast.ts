/**
 * Movie Forecast Service
 *
 * Runs the full pipeline for one movie:
 * raw weeks → rounds → latest round → recursive forecast → decline warnings
 */

import type { MovieInfo, PredictionRecord, Round, TierTable, WarningVerdict } from '../types';
import { ForecastError, InsufficientHistoryError, ScoringFailureError } from './errors';
import { calculateOpeningStrength, openingStrength } from './featureBuilder';
import { forecast, MODEL_VERSION } from './forecaster';
import { latestRound, segmentRounds } from './roundSegmenter';
import { classifyForecast } from './declineWarning';
import type { DerivationPolicy } from './derivationPolicy';
import type { ScoringFunction } from './scoring';
import type { BoxOfficeDataSource } from './sheetSource';
import type { WarningThresholds } from './config';

export type MovieForecastStatus = 'ok' | 'no_data' | 'failed';

export interface MovieForecast {
  movieId: string;
  status: MovieForecastStatus;
  modelVersion: string;
  round: Round | null;
  openingStrength: number | null;
  predictions: PredictionRecord[];
  // One per prediction; empty when no tier table is available
  warnings: WarningVerdict[];
  error: string | null;
}

export interface MovieForecastDeps {
  source: BoxOfficeDataSource;
  score: ScoringFunction;
  tierTable?: () => TierTable | null;
  policy?: DerivationPolicy;
  thresholds?: WarningThresholds;
  confidenceMargin?: number;
  maxHorizon?: number;
}

function emptyForecast(movieId: string, status: MovieForecastStatus, error: string): MovieForecast {
  return {
    movieId,
    status,
    modelVersion: MODEL_VERSION,
    round: null,
    openingStrength: null,
    predictions: [],
    warnings: [],
    error,
  };
}

function warningsFor(
  deps: MovieForecastDeps,
  strength: number,
  predictions: PredictionRecord[]
): WarningVerdict[] {
  const table = deps.tierTable?.() ?? null;
  if (!table) return [];
  return classifyForecast(table, strength, predictions, deps.thresholds).map((p) => p.warning);
}

function forecastRound(
  deps: MovieForecastDeps,
  movieId: string,
  round: Round,
  info: MovieInfo,
  horizon: number
): MovieForecast {
  const strength = openingStrength(calculateOpeningStrength(round, info.releaseDate));
  const base = {
    movieId,
    modelVersion: MODEL_VERSION,
    round,
    openingStrength: strength,
  };

  try {
    const predictions = forecast(round, info, horizon, {
      score: deps.score,
      policy: deps.policy,
      confidenceMargin: deps.confidenceMargin,
      maxHorizon: deps.maxHorizon,
    });
    return {
      ...base,
      status: 'ok',
      predictions,
      warnings: warningsFor(deps, strength, predictions),
      error: null,
    };
  } catch (error) {
    if (error instanceof ScoringFailureError) {
      return {
        ...base,
        status: 'failed',
        predictions: error.partialPredictions,
        warnings: warningsFor(deps, strength, error.partialPredictions),
        error: error.message,
      };
    }
    throw error;
  }
}

/**
 * Forecast the next `horizon` active weeks of a movie's latest round.
 * Forecast errors become a status on the result; data source errors propagate.
 */
export async function forecastMovie(
  deps: MovieForecastDeps,
  movieId: string,
  horizon: number
): Promise<MovieForecast> {
  const info = await deps.source.getMovieInfo(movieId);
  if (!info) {
    return emptyForecast(movieId, 'no_data', `No movie info for ${movieId}`);
  }

  try {
    const rawWeeks = await deps.source.getRawWeeks(movieId);
    const round = latestRound(segmentRounds(rawWeeks, { releaseDate: info.releaseDate }));
    if (!round) {
      return emptyForecast(movieId, 'no_data', `No revenue weeks for ${movieId}`);
    }

    return forecastRound(deps, movieId, round, info, horizon);
  } catch (error) {
    if (error instanceof InsufficientHistoryError) {
      return emptyForecast(movieId, 'no_data', error.message);
    }
    if (error instanceof ForecastError) {
      return emptyForecast(movieId, 'failed', error.message);
    }
    throw error;
  }
}
