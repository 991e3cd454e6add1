/**
 * Tests for Decline Warning Classifier
 */

import type { PredictionRecord, TierTable } from '../../types';
import { calculateSpeedRatio, classifyForecast, classifyWarning, formatRate } from '../declineWarning';

const stats = (mean: number) => ({ mean, median: mean, std: 0.1, count: 12 });

const table: TierTable = {
  version: 1,
  computedAt: '2024-12-01T00:00:00.000Z',
  quantiles: { p25: 100, p75: 500, p90: 900 },
  tiers: {
    tier_1: { 3: stats(-0.5) },
    tier_2: { 3: stats(-0.4), 4: stats(-0.35), 5: stats(0) },
    tier_3: {},
    tier_4: { 3: stats(-0.3) },
  },
  corpusSize: 48,
  movieCount: 12,
};

describe('Decline Warning Classifier', () => {
  describe('Speed ratio', () => {
    it('should be positive when declining faster than average', () => {
      expect(calculateSpeedRatio(-0.8, -0.4)).toBe(1);
      expect(calculateSpeedRatio(-0.42, -0.4)).toBeCloseTo(0.05);
      expect(calculateSpeedRatio(-0.2, -0.4)).toBeCloseTo(-0.5);
    });

    it('should be zero when the average is zero', () => {
      expect(calculateSpeedRatio(-0.5, 0)).toBe(0);
    });
  });

  describe('Levels', () => {
    it('should flag twice the average decline as CRITICAL', () => {
      const verdict = classifyWarning(table, 300, 3, -0.8);

      expect(verdict.tier).toBe('tier_2');
      expect(verdict.level).toBe('CRITICAL');
      expect(verdict.speedRatio).toBe(1);
      expect(verdict.historicalAverageDeclineRate).toBe(-0.4);
      expect(verdict.message).toBe(
        'Predicted decline -80.0%, 100% faster than the historical average -40.0%'
      );
    });

    it('should treat a slightly faster decline as NORMAL', () => {
      const verdict = classifyWarning(table, 300, 3, -0.42);

      expect(verdict.level).toBe('NORMAL');
      expect(verdict.speedRatio).toBeCloseTo(0.05);
      expect(verdict.message).toBe(
        'Predicted decline -42.0%, in line with the historical average -40.0%'
      );
    });

    it('should raise ATTENTION between the two thresholds', () => {
      // (-0.4 - -0.56) / 0.4 = 0.4
      const verdict = classifyWarning(table, 300, 3, -0.56);

      expect(verdict.level).toBe('ATTENTION');
      expect(verdict.message).toBe(
        'Predicted decline -56.0%, 40% faster than the historical average -40.0%'
      );
    });

    it('should stay NORMAL when declining slower than average', () => {
      expect(classifyWarning(table, 300, 3, -0.1).level).toBe('NORMAL');
      expect(classifyWarning(table, 300, 3, 0.2).level).toBe('NORMAL');
    });

    it('should use the tier of the opening strength', () => {
      const verdict = classifyWarning(table, 50, 3, -0.6);

      expect(verdict.tier).toBe('tier_1');
      expect(verdict.historicalAverageDeclineRate).toBe(-0.5);
      expect(verdict.level).toBe('NORMAL');
    });

    it('should honor custom thresholds', () => {
      const verdict = classifyWarning(table, 300, 3, -0.56, { attentionRatio: 0.1, criticalRatio: 0.2 });

      expect(verdict.level).toBe('CRITICAL');
    });
  });

  describe('Unknown history', () => {
    it('should return UNKNOWN when the tier has no data for the week', () => {
      const verdict = classifyWarning(table, 600, 3, -0.9);

      expect(verdict).toEqual({
        level: 'UNKNOWN',
        message: 'No historical decline data for tier_3 in week 3',
        tier: 'tier_3',
        predictedDeclineRate: -0.9,
        historicalAverageDeclineRate: null,
        speedRatio: null,
      });
    });

    it('should return UNKNOWN for a week past the table', () => {
      expect(classifyWarning(table, 300, 12, -0.5).level).toBe('UNKNOWN');
    });
  });

  describe('Forecast classification', () => {
    it('should attach a verdict to every prediction', () => {
      const predictions = [3, 4].map((targetWeek): PredictionRecord => ({
        targetWeek,
        predictedBoxoffice: 1000,
        predictedAudience: 3,
        predictedScreens: 20,
        declineRate: -0.8,
        provenance: targetWeek === 3 ? 'REAL' : 'PREDICTED',
        confidenceLower: 850,
        confidenceUpper: 1150,
      }));
      const results = classifyForecast(table, 300, predictions);

      expect(results).toHaveLength(2);
      expect(results[0].targetWeek).toBe(3);
      expect(results[0].warning.historicalAverageDeclineRate).toBe(-0.4);
      expect(results[1].warning.historicalAverageDeclineRate).toBe(-0.35);
      expect(results.map((r) => r.warning.level)).toEqual(['CRITICAL', 'CRITICAL']);
    });
  });

  describe('Formatting', () => {
    it('should format rates as percentages with one decimal', () => {
      expect(formatRate(-0.4)).toBe('-40.0%');
      expect(formatRate(0.125)).toBe('12.5%');
    });
  });
});
