/**
 * Workbook Data Source
 *
 * Reads weekly box-office records, movie info and historical corpora from
 * spreadsheet files (first sheet of each workbook, header row = column names):
 * - weeks: movie_id, week, boxoffice, audience, screens, week_range
 * - movies: movie_id, release_date, film_length, is_restricted, rating, region
 * - corpus: movie_id, opening_strength, active_week, decline_rate
 */

import * as XLSX from 'xlsx';
import type { HistoricalCorpusEntry, MovieInfo, RawWeek } from '../types';
import { parseDate, parseDateRange } from './dateRange';

const DEFAULT_FILM_LENGTH_MINUTES = 120;
const RESTRICTED_RATINGS = new Set(['R', 'NC-17', 'RESTRICTED']);

type Cell = string | number | boolean | Date | null | undefined;

/**
 * Read-side interface the forecasting service depends on
 */
export interface BoxOfficeDataSource {
  listMovieIds(): Promise<string[]>;
  getRawWeeks(movieId: string): Promise<RawWeek[]>;
  getMovieInfo(movieId: string): Promise<MovieInfo | null>;
}

export interface WeekRow {
  movie_id: Cell;
  week: Cell;
  boxoffice?: Cell;
  audience?: Cell;
  screens?: Cell;
  week_range?: Cell;
}

export interface MovieRow {
  movie_id: Cell;
  release_date: Cell;
  film_length?: Cell;
  is_restricted?: Cell;
  rating?: Cell;
  region?: Cell;
}

export interface CorpusRow {
  movie_id?: Cell;
  opening_strength: Cell;
  active_week: Cell;
  decline_rate: Cell;
}

function isBlank(value: Cell): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Numeric cell; blanks become 0, thousands separators are stripped.
 * Unparseable text becomes NaN so validation downstream rejects it.
 */
export function toNumber(value: Cell): number {
  if (isBlank(value)) return 0;
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return Number.NaN;
  return Number(value.replace(/,/g, '').trim());
}

function toText(value: Cell): string | null {
  if (isBlank(value)) return null;
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

function toBoolean(value: Cell): boolean | null {
  if (isBlank(value)) return null;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (value instanceof Date) return null;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n'].includes(normalized)) return false;
  return null;
}

export function parseWeekRows(rows: WeekRow[]): Map<string, RawWeek[]> {
  const byMovie = new Map<string, RawWeek[]>();

  for (const row of rows) {
    const movieId = toText(row.movie_id);
    if (!movieId) continue;

    const week: RawWeek = {
      week: toNumber(row.week),
      boxoffice: toNumber(row.boxoffice),
      audience: toNumber(row.audience),
      screens: toNumber(row.screens),
      dateRange: parseDateRange(toText(row.week_range)),
    };

    const weeks = byMovie.get(movieId) ?? [];
    weeks.push(week);
    byMovie.set(movieId, weeks);
  }

  return byMovie;
}

export function parseMovieRows(rows: MovieRow[]): Map<string, MovieInfo> {
  const movies = new Map<string, MovieInfo>();

  for (const row of rows) {
    const movieId = toText(row.movie_id);
    if (!movieId) continue;

    const releaseDate = parseDate(
      row.release_date instanceof Date || typeof row.release_date === 'number'
        ? row.release_date
        : toText(row.release_date)
    );
    if (!releaseDate) {
      console.warn(`[sheetSource] Skipping movie ${movieId}: invalid release_date "${String(row.release_date)}"`);
      continue;
    }

    const filmLength = toNumber(row.film_length);
    const rating = toText(row.rating);

    movies.set(movieId, {
      releaseDate,
      filmLengthMinutes:
        Number.isFinite(filmLength) && filmLength > 0 ? filmLength : DEFAULT_FILM_LENGTH_MINUTES,
      isRestricted:
        toBoolean(row.is_restricted) ?? (rating !== null && RESTRICTED_RATINGS.has(rating.toUpperCase())),
      rating,
      region: toText(row.region),
    });
  }

  return movies;
}

export function parseCorpusRows(rows: CorpusRow[]): HistoricalCorpusEntry[] {
  const entries: HistoricalCorpusEntry[] = [];
  let skipped = 0;

  for (const row of rows) {
    const entry: HistoricalCorpusEntry = {
      openingStrength: toNumber(row.opening_strength),
      activeWeek: toNumber(row.active_week),
      declineRate: toNumber(row.decline_rate),
    };
    const movieId = toText(row.movie_id);
    if (movieId) entry.movieId = movieId;

    const missing =
      isBlank(row.opening_strength) || isBlank(row.active_week) || isBlank(row.decline_rate);
    const malformed =
      !Number.isFinite(entry.openingStrength) ||
      !Number.isFinite(entry.declineRate) ||
      !Number.isInteger(entry.activeWeek) ||
      entry.activeWeek < 1;
    if (missing || malformed) {
      skipped++;
      continue;
    }
    entries.push(entry);
  }

  if (skipped > 0) {
    console.warn(`[sheetSource] Skipped ${skipped} corpus rows with missing or invalid values`);
  }

  return entries;
}

/**
 * Rows of a workbook's first sheet (or the named one)
 */
export function readSheetRows<T>(workbook: XLSX.WorkBook, sheetName?: string): T[] {
  const name = sheetName ?? workbook.SheetNames[0];
  const sheet = name === undefined ? undefined : workbook.Sheets[name];
  if (!sheet) {
    throw new Error(`Workbook has no sheet ${sheetName ? `"${sheetName}"` : ''}`.trim());
  }
  return XLSX.utils.sheet_to_json<T>(sheet, { defval: null });
}

export function readWorkbookFile(path: string): XLSX.WorkBook {
  return XLSX.readFile(path, { cellDates: true });
}

export function readCorpusWorkbook(path: string): HistoricalCorpusEntry[] {
  const entries = parseCorpusRows(readSheetRows<CorpusRow>(readWorkbookFile(path)));
  console.log(`[sheetSource] Read ${entries.length} corpus entries from ${path}`);
  return entries;
}

/**
 * In-memory data source over parsed workbook rows
 */
export class WorkbookDataSource implements BoxOfficeDataSource {
  constructor(
    private readonly weeks: Map<string, RawWeek[]>,
    private readonly movies: Map<string, MovieInfo>
  ) {}

  static fromWorkbooks(weeksBook: XLSX.WorkBook, moviesBook: XLSX.WorkBook): WorkbookDataSource {
    return new WorkbookDataSource(
      parseWeekRows(readSheetRows<WeekRow>(weeksBook)),
      parseMovieRows(readSheetRows<MovieRow>(moviesBook))
    );
  }

  static fromFiles(weeksPath: string, moviesPath: string): WorkbookDataSource {
    const source = WorkbookDataSource.fromWorkbooks(
      readWorkbookFile(weeksPath),
      readWorkbookFile(moviesPath)
    );
    console.log(`[sheetSource] Loaded ${source.weeks.size} movies from ${weeksPath}`);
    return source;
  }

  async listMovieIds(): Promise<string[]> {
    return [...this.weeks.keys()].sort();
  }

  async getRawWeeks(movieId: string): Promise<RawWeek[]> {
    return (this.weeks.get(movieId) ?? []).map((week) => ({ ...week }));
  }

  async getMovieInfo(movieId: string): Promise<MovieInfo | null> {
    return this.movies.get(movieId) ?? null;
  }
}
