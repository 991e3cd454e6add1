/**
 * Feature Builder
 *
 * Computes the feature vector for one target week of a round:
 * - lag features from the two most recent active weeks (real first, then predictions)
 * - gap features counting skipped calendar weeks
 * - opening strength of the round
 * - release date encodings and static movie attributes
 */

import type {
  FeatureMetadata,
  FeatureName,
  FeatureValues,
  FeatureVector,
  MovieInfo,
  PredictionRecord,
  Provenance,
  Round,
  WeekRecord,
} from '../types';
import { InsufficientHistoryError, InvalidInputError } from './errors';
import { inclusiveDaysBetween } from './dateRange';
import { activeWeeks } from './roundSegmenter';

const DEFAULT_OPEN_WEEK1_DAYS = 7;

// Column names the scoring models were trained on, in training order
export const MODEL_COLUMNS: ReadonlyArray<[FeatureName, string]> = [
  ['roundIndex', 'round_idx'],
  ['currentWeekActiveIdx', 'current_week_active_idx'],
  ['gapRealWeek2to1', 'gap_real_week_2to1'],
  ['gapRealWeek1toCurrent', 'gap_real_week_1tocurrent'],
  ['boxofficeWeek2', 'boxoffice_week_2'],
  ['boxofficeWeek1', 'boxoffice_week_1'],
  ['audienceWeek2', 'audience_week_2'],
  ['audienceWeek1', 'audience_week_1'],
  ['screensWeek2', 'screens_week_2'],
  ['screensWeek1', 'screens_week_1'],
  ['openWeek1Days', 'open_week1_days'],
  ['openWeek1Boxoffice', 'open_week1_boxoffice'],
  ['openWeek1BoxofficeDailyAvg', 'open_week1_boxoffice_daily_avg'],
  ['openWeek2Boxoffice', 'open_week2_boxoffice'],
  ['releaseYear', 'release_year'],
  ['releaseMonth', 'release_month'],
  ['filmLengthMinutes', 'film_length'],
  ['isRestricted', 'is_restricted'],
  ['releaseMonthSin', 'release_month_sin'],
  ['releaseMonthCos', 'release_month_cos'],
];

/**
 * One entry of the combined real + predicted history
 */
interface HistoryPoint {
  activeWeekIndex: number;
  realWeekIndex: number;
  boxoffice: number;
  audience: number;
  screens: number;
  source: Provenance;
}

export interface OpeningStrength {
  openWeek1Days: number;
  openWeek1Boxoffice: number;
  openWeek1BoxofficeDailyAvg: number;
  openWeek2Boxoffice: number;
  usedDefaultDays: boolean;
}

/**
 * Cyclic month encoding so December and January stay adjacent
 */
export function encodeMonthCyclical(month: number): { sin: number; cos: number } {
  return {
    sin: Math.sin((2 * Math.PI * month) / 12),
    cos: Math.cos((2 * Math.PI * month) / 12),
  };
}

/**
 * Opening strength of a round, from its first two active weeks
 */
export function calculateOpeningStrength(round: Round, releaseDate: Date): OpeningStrength {
  const active = activeWeeks(round);
  const week1 = active[0];
  const week2 = active[1];

  if (!week1) {
    throw new InsufficientHistoryError(1, 0);
  }

  let openWeek1Days = DEFAULT_OPEN_WEEK1_DAYS;
  let usedDefaultDays = true;
  if (week1.dateRange) {
    const days = inclusiveDaysBetween(releaseDate, week1.dateRange.end);
    openWeek1Days = Math.max(1, Math.min(7, days));
    usedDefaultDays = false;
  }

  return {
    openWeek1Days,
    openWeek1Boxoffice: week1.boxoffice,
    openWeek1BoxofficeDailyAvg: week1.boxoffice / openWeek1Days,
    openWeek2Boxoffice: week2?.boxoffice ?? 0,
    usedDefaultDays,
  };
}

/**
 * Cohort metric used for tier lookup: mean of week-1 daily average and week-2 revenue
 */
export function openingStrength(
  features: Pick<FeatureValues, 'openWeek1BoxofficeDailyAvg' | 'openWeek2Boxoffice'>
): number {
  return (features.openWeek1BoxofficeDailyAvg + features.openWeek2Boxoffice) / 2;
}

function toHistoryPoint(week: WeekRecord): HistoryPoint {
  return {
    activeWeekIndex: week.activeWeekIndex ?? 0,
    realWeekIndex: week.realWeekIndex,
    boxoffice: week.boxoffice,
    audience: week.audience,
    screens: week.screens,
    source: 'REAL',
  };
}

/**
 * Real active weeks before the target, then predictions after the last real week.
 * Predicted points have no calendar anchor and are assumed contiguous.
 */
function buildHistory(
  round: Round,
  targetWeek: number,
  pseudoHistory: readonly PredictionRecord[]
): HistoryPoint[] {
  const history = activeWeeks(round)
    .filter((w) => (w.activeWeekIndex ?? 0) < targetWeek)
    .map(toHistoryPoint);

  const lastRealActive = history.length > 0 ? history[history.length - 1].activeWeekIndex : 0;

  const predictions = [...pseudoHistory]
    .filter((p) => p.targetWeek > lastRealActive && p.targetWeek < targetWeek)
    .sort((a, b) => a.targetWeek - b.targetWeek);

  for (const prediction of predictions) {
    const previous = history[history.length - 1];
    history.push({
      activeWeekIndex: prediction.targetWeek,
      realWeekIndex: (previous?.realWeekIndex ?? 0) + 1,
      boxoffice: prediction.predictedBoxoffice,
      audience: prediction.predictedAudience,
      screens: prediction.predictedScreens,
      source: 'PREDICTED',
    });
  }

  return history;
}

/**
 * Calendar index of the target week. Uses the round's own week when it
 * exists (back-testing); otherwise projects forward from lag-1.
 */
function targetRealWeekIndex(round: Round, targetWeek: number, lag1: HistoryPoint): number {
  const known = round.weeks.find((w) => w.activeWeekIndex === targetWeek);
  if (known) return known.realWeekIndex;

  const lastWeek = round.weeks[round.weeks.length - 1];
  const pendingZeroWeeks =
    round.isOpen && lag1.source === 'REAL' && lastWeek?.realWeekIndex === lag1.realWeekIndex
      ? round.trailingZeroWeeks
      : 0;

  return lag1.realWeekIndex + (targetWeek - lag1.activeWeekIndex) + pendingZeroWeeks;
}

function assertPositiveRealLag(point: HistoryPoint, field: string): void {
  if (point.source === 'REAL' && point.boxoffice <= 0) {
    throw new InvalidInputError(
      field,
      `active week ${point.activeWeekIndex} has boxoffice ${point.boxoffice}`
    );
  }
}

/**
 * Validate and freeze a feature vector
 */
export function createFeatureVector(values: FeatureValues, meta: FeatureMetadata): FeatureVector {
  for (const [name] of MODEL_COLUMNS) {
    const value: unknown = values[name];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new InvalidInputError(name, `expected a finite number, got ${String(value)}`);
    }
  }

  return Object.freeze({
    ...values,
    meta: Object.freeze({
      defaultsApplied: [...meta.defaultsApplied],
      lagSources: { ...meta.lagSources },
    }),
  });
}

/**
 * Build the feature vector for `targetWeek` (an active week index) in a round
 */
export function buildFeatures(
  round: Round,
  movieInfo: MovieInfo,
  targetWeek: number,
  pseudoHistory: readonly PredictionRecord[] = []
): FeatureVector {
  if (!Number.isInteger(targetWeek) || targetWeek < 1) {
    throw new InvalidInputError('targetWeek', `expected a positive integer, got ${targetWeek}`);
  }

  const history = buildHistory(round, targetWeek, pseudoHistory);
  if (history.length < 2) {
    throw new InsufficientHistoryError(targetWeek, history.length);
  }

  const lag1 = history[history.length - 1];
  const lag2 = history[history.length - 2];
  assertPositiveRealLag(lag1, 'boxoffice_week_1');
  assertPositiveRealLag(lag2, 'boxoffice_week_2');

  const opening = calculateOpeningStrength(round, movieInfo.releaseDate);
  const month = movieInfo.releaseDate.getUTCMonth() + 1;
  const { sin, cos } = encodeMonthCyclical(month);

  const defaultsApplied: string[] = [];
  if (opening.usedDefaultDays) defaultsApplied.push('open_week1_days');

  return createFeatureVector(
    {
      roundIndex: round.roundIndex,
      currentWeekActiveIdx: targetWeek,

      boxofficeWeek1: lag1.boxoffice,
      boxofficeWeek2: lag2.boxoffice,
      audienceWeek1: lag1.audience,
      audienceWeek2: lag2.audience,
      screensWeek1: lag1.screens,
      screensWeek2: lag2.screens,

      gapRealWeek2to1: Math.max(0, lag1.realWeekIndex - lag2.realWeekIndex - 1),
      gapRealWeek1toCurrent: Math.max(
        0,
        targetRealWeekIndex(round, targetWeek, lag1) - lag1.realWeekIndex - 1
      ),

      openWeek1Days: opening.openWeek1Days,
      openWeek1Boxoffice: opening.openWeek1Boxoffice,
      openWeek1BoxofficeDailyAvg: opening.openWeek1BoxofficeDailyAvg,
      openWeek2Boxoffice: opening.openWeek2Boxoffice,

      filmLengthMinutes: movieInfo.filmLengthMinutes,
      isRestricted: movieInfo.isRestricted ? 1 : 0,

      releaseYear: movieInfo.releaseDate.getUTCFullYear(),
      releaseMonth: month,
      releaseMonthSin: sin,
      releaseMonthCos: cos,
    },
    {
      defaultsApplied,
      lagSources: { week1: lag1.source, week2: lag2.source },
    }
  );
}

/**
 * Flatten a feature vector to the model's snake_case columns
 */
export function toModelRow(features: FeatureVector): Record<string, number> {
  const row: Record<string, number> = {};
  for (const [name, column] of MODEL_COLUMNS) {
    row[column] = features[name];
  }
  return row;
}
