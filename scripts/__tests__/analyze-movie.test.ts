/**
 * Tests for the analyze-movie script
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import * as XLSX from 'xlsx';
import { getForecastConfig } from '../../src/lib/config';
import { main } from '../analyze-movie';

function writeWorkbook(file: string, rows: Record<string, string | number | null>[]): void {
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, XLSX.utils.json_to_sheet(rows), 'Sheet1');
  XLSX.writeFile(book, file);
}

describe('analyze-movie', () => {
  let dir: string;
  let log: jest.SpyInstance;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'analyze-movie-'));
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    process.exitCode = undefined;
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should print usage and set a failing exit code without a movie id', async () => {
    await main([], getForecastConfig({}));

    expect(log).toHaveBeenCalledWith('Usage: tsx scripts/analyze-movie.ts <movieId> [horizon]');
    expect(process.exitCode).toBe(1);
  });

  it('should reject when the weekly workbook is missing', async () => {
    const config = getForecastConfig({
      BOXOFFICE_WEEKS_PATH: path.join(dir, 'missing-weeks.xlsx'),
      MOVIES_PATH: path.join(dir, 'missing-movies.xlsx'),
    });

    await expect(main(['A1'], config)).rejects.toThrow();
  });

  it('should report a movie that is not in the workbook', async () => {
    const weeksPath = path.join(dir, 'weeks.xlsx');
    const moviesPath = path.join(dir, 'movies.xlsx');
    writeWorkbook(weeksPath, [
      { movie_id: 'A1', week: 1, boxoffice: 1000, audience: 4, screens: 10, week_range: null },
    ]);
    writeWorkbook(moviesPath, [{ movie_id: 'A1', release_date: '2024-11-08', film_length: 100 }]);

    await main(['Z9'], getForecastConfig({ BOXOFFICE_WEEKS_PATH: weeksPath, MOVIES_PATH: moviesPath }));

    expect(log).toHaveBeenCalledWith('Movie not found:', 'Z9');
  });
});
