/**
 * Tests for Scoring Functions
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  createBlendedScorer,
  createLinearScorer,
  createTrendScorer,
  loadLinearModel,
  parseLinearModel,
} from '../scoring';
import { buildFeatures } from '../featureBuilder';
import { segmentRounds } from '../roundSegmenter';
import { movieInfo, weeksFrom } from './helpers';

function featuresFor(boxoffice: number[], targetWeek: number) {
  const [round] = segmentRounds(weeksFrom(boxoffice));
  return buildFeatures(round, movieInfo, targetWeek);
}

describe('Scoring', () => {
  describe('Trend scorer', () => {
    it('should extrapolate exponential decay one week ahead', () => {
      const score = createTrendScorer();

      expect(score(featuresFor([1000000, 500000], 3))).toBeCloseTo(250000, 3);
    });

    it('should place lag weeks by their calendar gap', () => {
      const score = createTrendScorer();
      // lag-2 at real week 1, lag-1 at real week 3, target at real week 4
      const features = featuresFor([1000000, 0, 250000, 125000], 3);

      expect(features.gapRealWeek2to1).toBe(1);
      expect(score(features)).toBeCloseTo(125000, 3);
    });
  });

  describe('Linear scorer', () => {
    it('should apply coefficients to the model columns', () => {
      const score = createLinearScorer({
        intercept: 1000,
        coefficients: { boxoffice_week_1: 0.5, screens_week_1: 10 },
      });
      const features = featuresFor([1000000, 600000], 3);

      // screens for week 2 are 100 - 5
      expect(score(features)).toBe(1000 + 300000 + 950);
    });

    it('should reject unknown columns', () => {
      const score = createLinearScorer({ intercept: 0, coefficients: { popcorn_sales: 1 } });

      expect(() => score(featuresFor([1000, 800], 3))).toThrow('Model column "popcorn_sales" is not a known feature');
    });

    it('should validate a parsed model file', () => {
      expect(parseLinearModel({ intercept: 2, coefficients: { round_idx: 1 } })).toEqual({
        intercept: 2,
        coefficients: { round_idx: 1 },
      });
      expect(() => parseLinearModel({ intercept: 'x', coefficients: {} })).toThrow('numeric intercept');
      expect(() => parseLinearModel({ intercept: 1, coefficients: { a: 'b' } })).toThrow('coefficients');
      expect(() => parseLinearModel(null)).toThrow('must be an object');
    });

    it('should load a model from disk', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scoring-'));
      const file = path.join(dir, 'model.json');
      await fs.writeFile(file, JSON.stringify({ intercept: 5, coefficients: { boxoffice_week_1: 1 } }));
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

      try {
        const model = await loadLinearModel(file);
        expect(model.intercept).toBe(5);
        expect(createLinearScorer(model)(featuresFor([1000, 800], 3))).toBe(805);
      } finally {
        log.mockRestore();
        await fs.rm(dir, { recursive: true, force: true });
      }
    });
  });

  describe('Blended scorer', () => {
    it('should take the weighted mean of its scorers', () => {
      const score = createBlendedScorer([
        { scorer: () => 100, weight: 3 },
        { scorer: () => 200, weight: 1 },
      ]);

      expect(score(featuresFor([1000, 800], 3))).toBe(125);
    });

    it('should require a positive total weight', () => {
      expect(() => createBlendedScorer([])).toThrow(RangeError);
      expect(() => createBlendedScorer([{ scorer: () => 1, weight: 0 }])).toThrow(RangeError);
    });
  });
});
