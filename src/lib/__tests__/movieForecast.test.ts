/**
 * Tests for Movie Forecast Service
 */

import type { MovieInfo, RawWeek, TierTable } from '../../types';
import { forecastMovie, type MovieForecastDeps } from '../movieForecast';
import { createRatioPolicy } from '../derivationPolicy';
import type { BoxOfficeDataSource } from '../sheetSource';
import { movieInfo, weeksFrom } from './helpers';

class MemorySource implements BoxOfficeDataSource {
  constructor(
    private readonly weeks: Record<string, RawWeek[]>,
    private readonly info: Record<string, MovieInfo>
  ) {}

  async listMovieIds(): Promise<string[]> {
    return Object.keys(this.weeks);
  }

  async getRawWeeks(movieId: string): Promise<RawWeek[]> {
    return this.weeks[movieId] ?? [];
  }

  async getMovieInfo(movieId: string): Promise<MovieInfo | null> {
    return this.info[movieId] ?? null;
  }
}

const table: TierTable = {
  version: 1,
  computedAt: '2024-12-01T00:00:00.000Z',
  quantiles: { p25: 100, p75: 500, p90: 900 },
  tiers: {
    tier_1: {},
    tier_2: {},
    tier_3: {},
    tier_4: { 3: { mean: -0.3, median: -0.3, std: 0.1, count: 8 } },
  },
  corpusSize: 8,
  movieCount: 8,
};

const source = new MemorySource(
  {
    hit: weeksFrom([1400000, 700000]),
    rerun: weeksFrom([900000, 600000, 0, 0, 0, 70000, 35000]),
    short: weeksFrom([500000]),
    orphan: weeksFrom([1000, 900]),
  },
  { hit: movieInfo, rerun: movieInfo, short: movieInfo }
);

function deps(overrides: Partial<MovieForecastDeps> = {}): MovieForecastDeps {
  return {
    source,
    score: (features) => features.boxofficeWeek1 * 0.5,
    tierTable: () => table,
    policy: createRatioPolicy({ averageTicketPrice: 300, screenRetention: 0.9, minScreens: 20 }),
    ...overrides,
  };
}

describe('Movie Forecast Service', () => {
  it('should forecast the latest round and classify each week', async () => {
    const result = await forecastMovie(deps(), 'hit', 2);

    expect(result.status).toBe('ok');
    expect(result.error).toBeNull();
    expect(result.predictions.map((p) => p.predictedBoxoffice)).toEqual([350000, 175000]);
    // (1400000 / 7 + 700000) / 2
    expect(result.openingStrength).toBe(450000);
    expect(result.warnings.map((w) => w.level)).toEqual(['CRITICAL', 'UNKNOWN']);
  });

  it('should use the most recent round of a re-released movie', async () => {
    const result = await forecastMovie(deps(), 'rerun', 1);

    expect(result.round?.roundIndex).toBe(2);
    expect(result.predictions[0].predictedBoxoffice).toBe(17500);
  });

  it('should skip warnings when no tier table is available', async () => {
    const result = await forecastMovie(deps({ tierTable: () => null }), 'hit', 1);

    expect(result.status).toBe('ok');
    expect(result.predictions).toHaveLength(1);
    expect(result.warnings).toEqual([]);
  });

  it('should report no data for a movie with too little history', async () => {
    const result = await forecastMovie(deps(), 'short', 1);

    expect(result.status).toBe('no_data');
    expect(result.predictions).toEqual([]);
    expect(result.error).toBe('At least 2 active weeks are required before week 2, found 1');
  });

  it('should report no data for a movie without info', async () => {
    const result = await forecastMovie(deps(), 'orphan', 1);

    expect(result.status).toBe('no_data');
    expect(result.error).toBe('No movie info for orphan');
  });

  it('should keep partial predictions when scoring fails', async () => {
    let calls = 0;
    const result = await forecastMovie(
      deps({
        score: () => {
          calls++;
          if (calls > 1) throw new Error('model crashed');
          return 350000;
        },
      }),
      'hit',
      3
    );

    expect(result.status).toBe('failed');
    expect(result.predictions).toHaveLength(1);
    expect(result.warnings).toHaveLength(1);
    expect(result.error).toBe('Scoring failed at step 1: model crashed');
  });

  it('should report invalid input as a failure', async () => {
    const result = await forecastMovie(deps(), 'hit', 0);

    expect(result.status).toBe('failed');
    expect(result.error).toMatch(/^Invalid horizon/);
  });

  it('should let data source errors propagate', async () => {
    const broken = new MemorySource({}, { x: movieInfo });
    broken.getRawWeeks = async () => {
      throw new Error('disk unavailable');
    };

    await expect(forecastMovie(deps({ source: broken }), 'x', 1)).rejects.toThrow('disk unavailable');
  });
});
