/**
 * Tests for Tier Table Recompute Job
 */

import type { MovieInfo, RawWeek } from '../../types';
import { loadMovieSeries, recomputeTierTableJob } from '../recomputeTierTable';
import { TierTableStore } from '../../lib/declineStatistics';
import { buildHistoricalCorpus } from '../../lib/trainingRows';
import type { BoxOfficeDataSource } from '../../lib/sheetSource';

const info: MovieInfo = {
  releaseDate: new Date(Date.UTC(2024, 0, 5)),
  filmLengthMinutes: 95,
  isRestricted: true,
};

function weeks(values: number[]): RawWeek[] {
  return values.map((boxoffice, i) => ({
    week: i + 1,
    boxoffice,
    audience: boxoffice / 200,
    screens: 50,
    dateRange: null,
  }));
}

const data: Record<string, RawWeek[]> = {
  steady: weeks([700, 560, 420, 280]),
  brief: weeks([900, 0, 0, 0, 300]),
  broken: weeks([100, -1]),
  unknown: weeks([500, 400, 300]),
};

const source: BoxOfficeDataSource = {
  listMovieIds: async () => Object.keys(data),
  getRawWeeks: async (movieId) => data[movieId] ?? [],
  getMovieInfo: async (movieId) => (movieId === 'unknown' ? null : info),
};

describe('Tier Table Recompute Job', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should load only rounds long enough to back-test', async () => {
    const errors: string[] = [];
    const series = await loadMovieSeries(source, errors);

    expect(series.map((s) => s.movieId)).toEqual(['steady']);
    expect(errors).toEqual(['broken: Invalid boxoffice: week 2 has -1', 'unknown: no movie info']);
  });

  it('should publish a table built from the derived corpus', async () => {
    const store = new TierTableStore();
    const { result, table } = await recomputeTierTableJob(store, async (errors) => {
      const series = await loadMovieSeries(source, errors);
      return { corpus: buildHistoricalCorpus(series), moviesLoaded: series.length };
    });

    expect(store.current()).toBe(table);
    expect(result.moviesLoaded).toBe(1);
    // steady yields weeks 3 and 4
    expect(result.corpusSize).toBe(2);
    expect(result.movieCount).toBe(1);
    expect(result.errors).toHaveLength(2);
    expect(table.tiers.tier_4[3].mean).toBe(-0.25);
    expect(table.tiers.tier_4[4].mean).toBe(-1 / 3);
  });

  it('should leave the previous table in place when the corpus is empty', async () => {
    const store = new TierTableStore();
    const previous = store.recompute([{ openingStrength: 10, activeWeek: 3, declineRate: -0.2 }]);

    await expect(
      recomputeTierTableJob(store, async () => ({ corpus: [], moviesLoaded: 0 }))
    ).rejects.toThrow('Invalid corpus: no usable entries');
    expect(store.current()).toBe(previous);
  });
});
