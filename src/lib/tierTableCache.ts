/**
 * Tier Table Cache
 *
 * Persists the computed tier table as a JSON document so forecasting runs
 * don't have to re-read the historical corpus. Week keys are stored as
 * `week_<n>`; the flat `tiers` map keeps only the mean decline rate, while
 * `week_stats` carries the full statistics.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import type { Tier, TierQuantiles, TierTable, TierWeekStats } from '../types';
import { TIERS } from '../types';

interface TierTableDocument {
  version: number;
  computed_at: string;
  quantiles: TierQuantiles;
  tiers: Record<Tier, Record<string, number>>;
  week_stats: Record<Tier, Record<string, TierWeekStats>>;
  corpus_size: number;
  movie_count: number;
}

const WEEK_KEY = /^week_(\d+)$/;

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFinite(source: object, key: string, context: string): number {
  const value: unknown = Reflect.get(source, key);
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${context}.${key} must be a finite number`);
  }
  return value;
}

function readString(source: object, key: string): string {
  const value: unknown = Reflect.get(source, key);
  if (typeof value !== 'string') {
    throw new Error(`${key} must be a string`);
  }
  return value;
}

function readObject(source: object, key: string, context: string): object {
  const value: unknown = Reflect.get(source, key);
  if (!isObject(value)) {
    throw new Error(`${context}.${key} must be an object`);
  }
  return value;
}

function parseWeekStats(value: unknown, context: string): TierWeekStats {
  if (!isObject(value)) {
    throw new Error(`${context} must be an object`);
  }
  return {
    mean: readFinite(value, 'mean', context),
    median: readFinite(value, 'median', context),
    std: readFinite(value, 'std', context),
    count: readFinite(value, 'count', context),
  };
}

export function serializeTierTable(table: TierTable): TierTableDocument {
  const tiers: Record<Tier, Record<string, number>> = {
    tier_1: {},
    tier_2: {},
    tier_3: {},
    tier_4: {},
  };
  const weekStats: Record<Tier, Record<string, TierWeekStats>> = {
    tier_1: {},
    tier_2: {},
    tier_3: {},
    tier_4: {},
  };

  for (const tier of TIERS) {
    for (const [week, stats] of Object.entries(table.tiers[tier])) {
      tiers[tier][`week_${week}`] = stats.mean;
      weekStats[tier][`week_${week}`] = { ...stats };
    }
  }

  return {
    version: table.version,
    computed_at: table.computedAt,
    quantiles: { ...table.quantiles },
    tiers,
    week_stats: weekStats,
    corpus_size: table.corpusSize,
    movie_count: table.movieCount,
  };
}

/**
 * Validate a parsed cache document and convert it back to a tier table.
 * Documents without `week_stats` only know the means; the other statistics
 * are zero-filled.
 */
export function deserializeTierTable(value: unknown): TierTable {
  if (!isObject(value)) {
    throw new Error('Tier table document must be an object');
  }

  const quantilesSource = readObject(value, 'quantiles', 'document');
  const tiersSource = readObject(value, 'tiers', 'document');
  const statsValue: unknown = Reflect.get(value, 'week_stats');
  const statsSource = isObject(statsValue) ? statsValue : null;

  const tiers: Record<Tier, Record<number, TierWeekStats>> = {
    tier_1: {},
    tier_2: {},
    tier_3: {},
    tier_4: {},
  };

  for (const tier of TIERS) {
    const means: unknown = Reflect.get(tiersSource, tier);
    if (means === undefined) continue;
    if (!isObject(means)) {
      throw new Error(`tiers.${tier} must be an object`);
    }
    const stats: unknown = statsSource ? Reflect.get(statsSource, tier) : undefined;

    for (const key of Object.keys(means)) {
      const match = WEEK_KEY.exec(key);
      if (!match) {
        throw new Error(`tiers.${tier} has an unexpected key "${key}"`);
      }
      const mean = readFinite(means, key, `tiers.${tier}`);
      const weekStats: unknown = isObject(stats) ? Reflect.get(stats, key) : undefined;

      tiers[tier][Number(match[1])] =
        weekStats === undefined
          ? { mean, median: 0, std: 0, count: 0 }
          : { ...parseWeekStats(weekStats, `week_stats.${tier}.${key}`), mean };
    }
  }

  return {
    version: readFinite(value, 'version', 'document'),
    computedAt: readString(value, 'computed_at'),
    quantiles: {
      p25: readFinite(quantilesSource, 'p25', 'quantiles'),
      p75: readFinite(quantilesSource, 'p75', 'quantiles'),
      p90: readFinite(quantilesSource, 'p90', 'quantiles'),
    },
    tiers,
    corpusSize: readFinite(value, 'corpus_size', 'document'),
    movieCount: readFinite(value, 'movie_count', 'document'),
  };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && Reflect.get(error, 'code') === 'ENOENT';
}

/**
 * Read the cached tier table. Returns null when there is no cache or it can't be parsed.
 */
export async function getCachedTierTable(path: string): Promise<TierTable | null> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    console.error('[tierTableCache] Error reading cache:', error);
    return null;
  }

  try {
    const table = deserializeTierTable(JSON.parse(raw));
    console.log(
      `[tierTableCache] Loaded tier table computed at ${table.computedAt} (${table.movieCount} movies)`
    );
    return table;
  } catch (error) {
    console.error('[tierTableCache] Ignoring malformed cache:', error);
    return null;
  }
}

/**
 * Write the tier table to the cache file
 */
export async function saveTierTable(path: string, table: TierTable): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true });
  await fs.writeFile(path, JSON.stringify(serializeTierTable(table), null, 2), 'utf-8');
  console.log(`[tierTableCache] Saved tier table to ${path}`);
}

/**
 * Remove the cache file (forces a recompute on the next run)
 */
export async function clearTierTableCache(path: string): Promise<void> {
  await fs.rm(path, { force: true });
  console.log('[tierTableCache] Cache cleared');
}
