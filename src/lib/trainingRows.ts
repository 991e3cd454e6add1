/**
 * Training Rows
 *
 * Back-tests the feature builder over complete historical rounds. Every active
 * week from the third on becomes one row: the features as they would have been
 * built before that week, plus what actually happened. The rows double as the
 * historical corpus for the decline statistics.
 */

import type { FeatureVector, HistoricalCorpusEntry, MovieSeries, Round } from '../types';
import { buildFeatures, openingStrength } from './featureBuilder';
import { activeWeeks } from './roundSegmenter';
import { calculateDeclineRate } from './forecaster';

const MIN_ROUND_WEEKS = 3;
const FIRST_TRAINING_WEEK = 3;

export interface TrainingRow {
  movieId: string;
  roundIndex: number;
  activeWeek: number;
  realWeek: number;
  features: FeatureVector;
  actualBoxoffice: number;
  actualAudience: number;
  actualScreens: number;
  declineRate: number;
}

function isTrainable(round: Round): boolean {
  return round.weeks.length >= MIN_ROUND_WEEKS && activeWeeks(round).length >= MIN_ROUND_WEEKS;
}

export function buildTrainingRows(series: MovieSeries): TrainingRow[] {
  const rows: TrainingRow[] = [];

  for (const round of series.rounds.filter(isTrainable)) {
    for (const week of activeWeeks(round)) {
      const activeWeek = week.activeWeekIndex;
      if (activeWeek === null || activeWeek < FIRST_TRAINING_WEEK) continue;

      const features = buildFeatures(round, series.info, activeWeek);
      rows.push({
        movieId: series.movieId,
        roundIndex: round.roundIndex,
        activeWeek,
        realWeek: week.realWeekIndex,
        features,
        actualBoxoffice: week.boxoffice,
        actualAudience: week.audience,
        actualScreens: week.screens,
        declineRate: calculateDeclineRate(week.boxoffice, features.boxofficeWeek1),
      });
    }
  }

  return rows;
}

export function toCorpusEntry(row: TrainingRow): HistoricalCorpusEntry {
  return {
    movieId: row.movieId,
    openingStrength: openingStrength(row.features),
    activeWeek: row.activeWeek,
    declineRate: row.declineRate,
  };
}

export function buildHistoricalCorpus(series: Iterable<MovieSeries>): HistoricalCorpusEntry[] {
  const corpus: HistoricalCorpusEntry[] = [];
  for (const movie of series) {
    for (const row of buildTrainingRows(movie)) {
      corpus.push(toCorpusEntry(row));
    }
  }
  return corpus;
}
