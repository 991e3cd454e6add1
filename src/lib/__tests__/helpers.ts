import type { MovieInfo, RawWeek } from '../../types';
import { parseDateRange } from '../dateRange';

export function utcDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

export const movieInfo: MovieInfo = {
  releaseDate: utcDate(2024, 11, 8),
  filmLengthMinutes: 110,
  isRestricted: false,
};

/**
 * Raw weeks from revenue values; audience and screens are derived so every
 * revenue week has some, ranges are omitted
 */
export function weeksFrom(boxoffice: number[]): RawWeek[] {
  return boxoffice.map((value, i) => ({
    week: i + 1,
    boxoffice: value,
    audience: Math.round(value / 250),
    screens: value > 0 ? 100 - i * 5 : 0,
    dateRange: null,
  }));
}

export function week(
  n: number,
  boxoffice: number,
  audience: number,
  screens: number,
  range: string | null = null
): RawWeek {
  return { week: n, boxoffice, audience, screens, dateRange: parseDateRange(range) };
}
