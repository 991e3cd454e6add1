/**
 * Tier Table Recompute Job
 *
 * Rebuilds the decline statistics from the historical corpus and refreshes
 * the cache file. The corpus is read from CORPUS_PATH when set; otherwise it
 * is derived by back-testing every movie in the weekly workbook.
 */

import type { HistoricalCorpusEntry, MovieSeries, TierTable } from '../types';
import { getForecastConfig, type ForecastConfig } from '../lib/config';
import { TierTableStore } from '../lib/declineStatistics';
import { buildHistoricalCorpus } from '../lib/trainingRows';
import { segmentRounds } from '../lib/roundSegmenter';
import { readCorpusWorkbook, WorkbookDataSource, type BoxOfficeDataSource } from '../lib/sheetSource';
import { errorMessage } from '../lib/errors';

// Rounds shorter than this are too short to back-test
const TRAINING_MIN_WEEKS = 3;

export interface RecomputeJobResult {
  moviesLoaded: number;
  corpusSize: number;
  movieCount: number;
  errors: string[];
}

/**
 * Load and segment every movie of a data source; movies that fail are reported, not fatal
 */
export async function loadMovieSeries(
  source: BoxOfficeDataSource,
  errors: string[] = []
): Promise<MovieSeries[]> {
  const series: MovieSeries[] = [];

  for (const movieId of await source.listMovieIds()) {
    try {
      const info = await source.getMovieInfo(movieId);
      if (!info) {
        errors.push(`${movieId}: no movie info`);
        continue;
      }

      const rounds = segmentRounds(await source.getRawWeeks(movieId), {
        releaseDate: info.releaseDate,
        minRealWeeks: TRAINING_MIN_WEEKS,
        minActiveWeeks: TRAINING_MIN_WEEKS,
      });
      if (rounds.length > 0) {
        series.push({ movieId, info, rounds });
      }
    } catch (error) {
      errors.push(`${movieId}: ${errorMessage(error)}`);
    }
  }

  return series;
}

/**
 * Recompute the tier table into `store`
 */
export async function recomputeTierTableJob(
  store: TierTableStore,
  loadCorpus: (errors: string[]) => Promise<{ corpus: HistoricalCorpusEntry[]; moviesLoaded: number }>
): Promise<{ result: RecomputeJobResult; table: TierTable }> {
  const errors: string[] = [];
  const { corpus, moviesLoaded } = await loadCorpus(errors);
  console.log(`[recomputeTierTable] Corpus has ${corpus.length} entries`);

  const table = store.recompute(corpus);
  console.log(
    `[recomputeTierTable] Quantiles P25=${table.quantiles.p25.toFixed(1)} P75=${table.quantiles.p75.toFixed(1)} P90=${table.quantiles.p90.toFixed(1)}`
  );

  return {
    result: {
      moviesLoaded,
      corpusSize: table.corpusSize,
      movieCount: table.movieCount,
      errors,
    },
    table,
  };
}

export function corpusLoaderFor(config: ForecastConfig) {
  return async (errors: string[]) => {
    if (config.corpusPath) {
      const corpus = readCorpusWorkbook(config.corpusPath);
      return { corpus, moviesLoaded: new Set(corpus.map((e) => e.movieId)).size };
    }

    const source = WorkbookDataSource.fromFiles(config.weeksPath, config.moviesPath);
    const series = await loadMovieSeries(source, errors);
    return { corpus: buildHistoricalCorpus(series), moviesLoaded: series.length };
  };
}

/**
 * Run job with logging
 */
export async function runRecomputeTierTable(
  config: ForecastConfig = getForecastConfig()
): Promise<RecomputeJobResult> {
  const startTime = Date.now();

  try {
    console.log('[recomputeTierTable] Starting tier table recompute...');
    const store = new TierTableStore();
    const { result } = await recomputeTierTableJob(store, corpusLoaderFor(config));
    await store.saveToCache(config.tierTableCachePath);

    console.log(`[recomputeTierTable] Complete in ${Date.now() - startTime}ms`);
    if (result.errors.length > 0) {
      console.warn(`[recomputeTierTable] Errors (${result.errors.length}):`, result.errors.slice(0, 10));
    }

    return result;
  } catch (error) {
    console.error('[recomputeTierTable] Recompute failed:', error);
    throw error;
  }
}

// Allow running directly
if (require.main === module) {
  runRecomputeTierTable()
    .then(() => process.exit(0))
    .catch(() => process.exit(1));
}
