/**
 * Scoring Functions
 *
 * A scorer maps a feature vector to next-week revenue. The forecaster treats
 * it as opaque; the implementations here are the reference models:
 * - linear model read from a coefficients file
 * - log-linear decay trend over the two lag weeks
 * - weighted blend of several scorers
 */

import { promises as fs } from 'fs';
import { SimpleLinearRegression } from 'ml-regression-simple-linear';
import type { FeatureVector } from '../types';
import { toModelRow } from './featureBuilder';

export type ScoringFunction = (features: FeatureVector) => number;

export interface LinearModel {
  intercept: number;
  coefficients: Record<string, number>;
}

export interface WeightedScorer {
  scorer: ScoringFunction;
  weight: number;
}

function isRecordOfNumbers(value: unknown): value is Record<string, number> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every((v) => typeof v === 'number' && Number.isFinite(v));
}

export function parseLinearModel(value: unknown): LinearModel {
  if (typeof value !== 'object' || value === null) {
    throw new Error('Linear model must be an object');
  }

  const intercept: unknown = Reflect.get(value, 'intercept');
  const coefficients: unknown = Reflect.get(value, 'coefficients');

  if (typeof intercept !== 'number' || !Number.isFinite(intercept)) {
    throw new Error('Linear model is missing a numeric intercept');
  }
  if (!isRecordOfNumbers(coefficients)) {
    throw new Error('Linear model coefficients must map column names to numbers');
  }

  return { intercept, coefficients };
}

/**
 * Load a linear model from a JSON file: { intercept, coefficients: { column: weight } }
 */
export async function loadLinearModel(path: string): Promise<LinearModel> {
  const raw = await fs.readFile(path, 'utf-8');
  const model = parseLinearModel(JSON.parse(raw));
  console.log(
    `[scoring] Loaded linear model from ${path} (${Object.keys(model.coefficients).length} coefficients)`
  );
  return model;
}

export function createLinearScorer(model: LinearModel): ScoringFunction {
  return (features) => {
    const row = toModelRow(features);
    let prediction = model.intercept;

    for (const [column, weight] of Object.entries(model.coefficients)) {
      const value = row[column];
      if (value === undefined) {
        throw new Error(`Model column "${column}" is not a known feature`);
      }
      prediction += weight * value;
    }

    return prediction;
  };
}

/**
 * Fit log(revenue) over the two lag weeks, placed on the calendar by their gaps,
 * and extrapolate to the target week. Revenue tends to decay exponentially.
 */
export function createTrendScorer(): ScoringFunction {
  return (features) => {
    if (features.boxofficeWeek1 <= 0 || features.boxofficeWeek2 <= 0) {
      return 0;
    }

    const x2 = 0;
    const x1 = x2 + 1 + features.gapRealWeek2to1;
    const xTarget = x1 + 1 + features.gapRealWeek1toCurrent;

    const regression = new SimpleLinearRegression(
      [x2, x1],
      [Math.log(features.boxofficeWeek2), Math.log(features.boxofficeWeek1)]
    );

    return Math.exp(regression.intercept + regression.slope * xTarget);
  };
}

export function createBlendedScorer(scorers: WeightedScorer[]): ScoringFunction {
  const totalWeight = scorers.reduce((sum, s) => sum + s.weight, 0);
  if (scorers.length === 0 || totalWeight <= 0) {
    throw new RangeError('Blended scorer needs at least one positive weight');
  }

  return (features) =>
    scorers.reduce((sum, { scorer, weight }) => sum + scorer(features) * weight, 0) / totalWeight;
}
