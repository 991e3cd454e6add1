/**
 * Print a movie's rounds, forecast and decline warnings
 *
 * Usage: tsx scripts/analyze-movie.ts <movieId> [horizon]
 */

import { getForecastConfig, type ForecastConfig } from '../src/lib/config';
import { TierTableStore } from '../src/lib/declineStatistics';
import { createRatioPolicy } from '../src/lib/derivationPolicy';
import { formatRate } from '../src/lib/declineWarning';
import { formatDateRange } from '../src/lib/dateRange';
import { forecastMovie } from '../src/lib/movieForecast';
import { segmentRounds } from '../src/lib/roundSegmenter';
import { createLinearScorer, createTrendScorer, loadLinearModel } from '../src/lib/scoring';
import { WorkbookDataSource } from '../src/lib/sheetSource';

export async function main(
  args: string[] = process.argv.slice(2),
  config: ForecastConfig = getForecastConfig()
): Promise<void> {
  const movieId = args[0];
  if (!movieId) {
    console.log('Usage: tsx scripts/analyze-movie.ts <movieId> [horizon]');
    process.exitCode = 1;
    return;
  }

  const horizon = args[1] ? Number(args[1]) : config.horizon;
  const source = WorkbookDataSource.fromFiles(config.weeksPath, config.moviesPath);
  const info = await source.getMovieInfo(movieId);

  if (!info) {
    console.log('Movie not found:', movieId);
    return;
  }

  const store = new TierTableStore();
  await store.loadFromCache(config.tierTableCachePath);

  console.log('='.repeat(60));
  console.log(`${movieId} - Box Office Analysis`);
  console.log('='.repeat(60));
  console.log(`  Released: ${info.releaseDate.toISOString().split('T')[0]}`);
  console.log(`  Length: ${info.filmLengthMinutes} min, restricted: ${info.isRestricted ? 'yes' : 'no'}`);

  const rounds = segmentRounds(await source.getRawWeeks(movieId), { releaseDate: info.releaseDate });
  console.log('');
  console.log(`Rounds: ${rounds.length}`);
  rounds.forEach((round) => {
    console.log(`  Round ${round.roundIndex}${round.isOpen ? ' (open)' : ''}:`);
    round.weeks.forEach((w) =>
      console.log(
        `    real ${w.realWeekIndex} / active ${w.activeWeekIndex ?? '-'}: ${w.boxoffice.toLocaleString()}` +
          (w.dateRange ? ` (${formatDateRange(w.dateRange)})` : '')
      )
    );
  });

  const result = await forecastMovie(
    {
      source,
      score: config.modelPath ? createLinearScorer(await loadLinearModel(config.modelPath)) : createTrendScorer(),
      tierTable: () => store.current(),
      policy: createRatioPolicy(config),
      thresholds: config.warningThresholds,
      confidenceMargin: config.confidenceMargin,
      maxHorizon: config.maxHorizon,
    },
    movieId,
    horizon
  );

  console.log('');
  console.log(`Forecast (${result.status}):`);
  if (result.error) console.log(`  Error: ${result.error}`);
  result.predictions.forEach((p, i) => {
    const warning = result.warnings[i];
    console.log(
      `  Week ${p.targetWeek} [${p.provenance}]: ${Math.round(p.predictedBoxoffice).toLocaleString()} ` +
        `(${formatRate(p.declineRate)})` +
        (warning ? ` ${warning.level}: ${warning.message}` : '')
    );
  });
}

if (require.main === module) {
  main().catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
