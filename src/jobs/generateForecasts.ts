/**
 * Forecast Generation Job
 *
 * Forecasts the next weeks of every movie in the weekly workbook and writes
 * the results, with decline warnings, to a JSON file.
 * Movies are processed one at a time; a failing movie is recorded and skipped.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { getForecastConfig, type ForecastConfig } from '../lib/config';
import { MODEL_VERSION } from '../lib/forecaster';
import { forecastMovie, type MovieForecast, type MovieForecastDeps } from '../lib/movieForecast';
import { createLinearScorer, createTrendScorer, loadLinearModel, type ScoringFunction } from '../lib/scoring';
import { createRatioPolicy } from '../lib/derivationPolicy';
import { TierTableStore } from '../lib/declineStatistics';
import { WorkbookDataSource } from '../lib/sheetSource';
import { lastActiveWeek } from '../lib/roundSegmenter';
import { errorMessage } from '../lib/errors';

export interface ForecastJobResult {
  moviesProcessed: number;
  forecastsGenerated: number;
  predictionsGenerated: number;
  noData: number;
  failed: number;
  warningCounts: Record<string, number>;
  errors: string[];
}

export interface ForecastJobOutput {
  result: ForecastJobResult;
  forecasts: MovieForecast[];
}

/**
 * Forecast every movie the data source lists
 */
export async function generateForecastsJob(
  deps: MovieForecastDeps,
  horizon: number
): Promise<ForecastJobOutput> {
  const result: ForecastJobResult = {
    moviesProcessed: 0,
    forecastsGenerated: 0,
    predictionsGenerated: 0,
    noData: 0,
    failed: 0,
    warningCounts: {},
    errors: [],
  };
  const forecasts: MovieForecast[] = [];

  const movieIds = await deps.source.listMovieIds();
  console.log(`[generateForecasts] Forecasting ${movieIds.length} movies, horizon ${horizon}`);

  for (const movieId of movieIds) {
    result.moviesProcessed++;

    try {
      const movieForecast = await forecastMovie(deps, movieId, horizon);
      forecasts.push(movieForecast);
      result.predictionsGenerated += movieForecast.predictions.length;

      for (const warning of movieForecast.warnings) {
        result.warningCounts[warning.level] = (result.warningCounts[warning.level] ?? 0) + 1;
      }

      if (movieForecast.status === 'ok') {
        result.forecastsGenerated++;
      } else if (movieForecast.status === 'no_data') {
        result.noData++;
      } else {
        result.failed++;
        result.errors.push(`${movieId}: ${movieForecast.error ?? 'unknown error'}`);
      }
    } catch (error) {
      result.failed++;
      result.errors.push(`${movieId}: ${errorMessage(error)}`);
    }
  }

  console.log(
    `[generateForecasts] ${result.forecastsGenerated} ok, ${result.noData} without data, ${result.failed} failed`
  );

  return { result, forecasts };
}

function toOutputRecord(forecast: MovieForecast) {
  return {
    movieId: forecast.movieId,
    status: forecast.status,
    roundIndex: forecast.round?.roundIndex ?? null,
    lastActiveWeek: forecast.round ? lastActiveWeek(forecast.round)?.activeWeekIndex ?? null : null,
    openingStrength: forecast.openingStrength,
    predictions: forecast.predictions.map((prediction, i) => ({
      ...prediction,
      warning: forecast.warnings[i] ?? null,
    })),
    error: forecast.error,
  };
}

/**
 * Write forecasts and the run summary to a JSON file
 */
export async function saveForecasts(
  path: string,
  output: ForecastJobOutput,
  durationMs: number
): Promise<void> {
  const document = {
    modelVersion: MODEL_VERSION,
    generatedAt: new Date().toISOString(),
    run: {
      durationMs,
      ...output.result,
      errors: output.result.errors.slice(0, 100),
    },
    forecasts: output.forecasts.map(toOutputRecord),
  };

  await fs.mkdir(dirname(path), { recursive: true });
  await fs.writeFile(path, JSON.stringify(document, null, 2), 'utf-8');
  console.log(`[generateForecasts] Saved ${output.forecasts.length} forecasts to ${path}`);
}

async function createScorer(config: ForecastConfig): Promise<ScoringFunction> {
  if (!config.modelPath) {
    console.log('[generateForecasts] MODEL_PATH not set, using trend scorer');
    return createTrendScorer();
  }
  return createLinearScorer(await loadLinearModel(config.modelPath));
}

/**
 * Run job with logging
 */
export async function runForecastJob(config: ForecastConfig = getForecastConfig()): Promise<ForecastJobResult> {
  const startTime = Date.now();

  try {
    console.log('[generateForecasts] Starting forecast generation...');

    const store = new TierTableStore();
    if (!(await store.loadFromCache(config.tierTableCachePath))) {
      console.warn(
        `[generateForecasts] No tier table at ${config.tierTableCachePath}, decline warnings are skipped`
      );
    }

    const output = await generateForecastsJob(
      {
        source: WorkbookDataSource.fromFiles(config.weeksPath, config.moviesPath),
        score: await createScorer(config),
        tierTable: () => store.current(),
        policy: createRatioPolicy(config),
        thresholds: config.warningThresholds,
        confidenceMargin: config.confidenceMargin,
        maxHorizon: config.maxHorizon,
      },
      config.horizon
    );

    const duration = Date.now() - startTime;
    await saveForecasts(config.forecastOutputPath, output, duration);
    console.log(`[generateForecasts] Forecast generation complete in ${duration}ms`);

    if (output.result.errors.length > 0) {
      console.warn(
        `[generateForecasts] Errors (${output.result.errors.length}):`,
        output.result.errors.slice(0, 10)
      );
    }

    return output.result;
  } catch (error) {
    console.error('[generateForecasts] Forecast generation failed:', error);
    throw error;
  }
}

// Allow running directly
if (require.main === module) {
  runForecastJob()
    .then(() => process.exit(0))
    .catch(() => process.exit(1));
}
