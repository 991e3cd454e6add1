/**
 * Decline Warning Classifier
 *
 * Compares a predicted week-over-week decline with the historical average of
 * movies that opened at a similar strength:
 * - NORMAL: declining no more than 30% faster than the cohort
 * - ATTENTION: 30-50% faster
 * - CRITICAL: more than 50% faster
 * - UNKNOWN: the cohort has no history for that week
 */

import type {
  PredictionRecord,
  PredictionWithWarning,
  TierTable,
  WarningLevel,
  WarningVerdict,
} from '../types';
import { averageDeclineRate, tierFor } from './declineStatistics';
import { DEFAULT_WARNING_THRESHOLDS, type WarningThresholds } from './config';

// Averages closer to zero than this give no meaningful ratio
const NEAR_ZERO_AVERAGE = 0.01;

export function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/**
 * How much faster than average the movie declines, relative to the average.
 * -0.80 against -0.40 gives 1.0 (twice as fast); slower decline is negative.
 */
export function calculateSpeedRatio(predicted: number, average: number): number {
  if (Math.abs(average) < NEAR_ZERO_AVERAGE) return 0;
  return (average - predicted) / Math.abs(average);
}

function levelFor(
  predicted: number,
  average: number,
  speedRatio: number,
  thresholds: WarningThresholds
): WarningLevel {
  if (predicted >= average) return 'NORMAL';
  if (speedRatio < thresholds.attentionRatio) return 'NORMAL';
  if (speedRatio < thresholds.criticalRatio) return 'ATTENTION';
  return 'CRITICAL';
}

function messageFor(level: WarningLevel, predicted: number, average: number, speedRatio: number): string {
  if (level === 'NORMAL') {
    return `Predicted decline ${formatRate(predicted)}, in line with the historical average ${formatRate(average)}`;
  }
  return `Predicted decline ${formatRate(predicted)}, ${Math.round(speedRatio * 100)}% faster than the historical average ${formatRate(average)}`;
}

export function classifyWarning(
  table: TierTable,
  openingStrength: number,
  activeWeek: number,
  predictedDeclineRate: number,
  thresholds: WarningThresholds = DEFAULT_WARNING_THRESHOLDS
): WarningVerdict {
  const tier = tierFor(table, openingStrength);
  const average = averageDeclineRate(table, tier, activeWeek);

  if (average === null) {
    return {
      level: 'UNKNOWN',
      message: `No historical decline data for ${tier} in week ${activeWeek}`,
      tier,
      predictedDeclineRate,
      historicalAverageDeclineRate: null,
      speedRatio: null,
    };
  }

  const speedRatio = calculateSpeedRatio(predictedDeclineRate, average);
  const level = levelFor(predictedDeclineRate, average, speedRatio, thresholds);

  return {
    level,
    message: messageFor(level, predictedDeclineRate, average, speedRatio),
    tier,
    predictedDeclineRate,
    historicalAverageDeclineRate: average,
    speedRatio,
  };
}

/**
 * Attach a verdict to every prediction of a forecast
 */
export function classifyForecast(
  table: TierTable,
  openingStrength: number,
  predictions: readonly PredictionRecord[],
  thresholds: WarningThresholds = DEFAULT_WARNING_THRESHOLDS
): PredictionWithWarning[] {
  return predictions.map((prediction) => ({
    ...prediction,
    warning: classifyWarning(
      table,
      openingStrength,
      prediction.targetWeek,
      prediction.declineRate,
      thresholds
    ),
  }));
}
