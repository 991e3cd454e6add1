/**
 * Decline Statistics
 *
 * Historical decline rates by cohort. Movies are bucketed into four tiers by
 * opening strength (P25 / P75 / P90 cut points); each tier keeps per-week
 * decline statistics.
 *
 * Tables are frozen snapshots. Recomputing builds a new snapshot and swaps
 * the store's reference, so readers never see a half-built table.
 */

import { mean, median, sampleStandardDeviation } from 'simple-statistics';
import type {
  HistoricalCorpusEntry,
  Tier,
  TierQuantiles,
  TierTable,
  TierWeekStats,
} from '../types';
import { TIERS } from '../types';
import { InvalidInputError } from './errors';
import { getCachedTierTable, saveTierTable } from './tierTableCache';

export const TIER_TABLE_VERSION = 1;

function isUsable(entry: HistoricalCorpusEntry): boolean {
  return (
    Number.isFinite(entry.openingStrength) &&
    Number.isFinite(entry.declineRate) &&
    Number.isInteger(entry.activeWeek) &&
    entry.activeWeek >= 1
  );
}

/**
 * One opening strength per movie (its first entry); entries without a movie
 * id each count once.
 */
function strengthsPerMovie(entries: HistoricalCorpusEntry[]): number[] {
  const seen = new Set<string>();
  const strengths: number[] = [];

  for (const entry of entries) {
    if (entry.movieId !== undefined) {
      if (seen.has(entry.movieId)) continue;
      seen.add(entry.movieId);
    }
    strengths.push(entry.openingStrength);
  }

  return strengths;
}

/**
 * Quantile with linear interpolation between the closest ranks
 * (position (n - 1) * p in the sorted values)
 */
export function linearQuantile(values: number[], p: number): number {
  if (values.length === 0) {
    throw new InvalidInputError('values', 'quantile of an empty list');
  }

  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * p;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (position - lower) * (sorted[upper] - sorted[lower]);
}

export function tierForQuantiles(quantiles: TierQuantiles, strength: number): Tier {
  if (strength < quantiles.p25) return 'tier_1';
  if (strength < quantiles.p75) return 'tier_2';
  if (strength < quantiles.p90) return 'tier_3';
  return 'tier_4';
}

function summarize(rates: number[]): TierWeekStats {
  return {
    mean: mean(rates),
    median: median(rates),
    std: rates.length >= 2 ? sampleStandardDeviation(rates) : 0,
    count: rates.length,
  };
}

function emptyTiers(): Record<Tier, Record<number, TierWeekStats>> {
  return { tier_1: {}, tier_2: {}, tier_3: {}, tier_4: {} };
}

export function freezeTierTable(table: TierTable): TierTable {
  const tiers = emptyTiers();
  for (const tier of TIERS) {
    const weeks: Record<number, TierWeekStats> = {};
    for (const [week, stats] of Object.entries(table.tiers[tier])) {
      weeks[Number(week)] = Object.freeze({ ...stats });
    }
    tiers[tier] = Object.freeze(weeks);
  }

  return Object.freeze({
    ...table,
    quantiles: Object.freeze({ ...table.quantiles }),
    tiers: Object.freeze(tiers),
  });
}

/**
 * Build a tier table from a historical corpus
 */
export function computeTierTable(corpus: Iterable<HistoricalCorpusEntry>): TierTable {
  const entries = Array.from(corpus).filter(isUsable);
  if (entries.length === 0) {
    throw new InvalidInputError('corpus', 'no usable entries');
  }

  const strengths = strengthsPerMovie(entries);
  const quantiles: TierQuantiles = {
    p25: linearQuantile(strengths, 0.25),
    p75: linearQuantile(strengths, 0.75),
    p90: linearQuantile(strengths, 0.9),
  };

  const buckets = new Map<Tier, Map<number, number[]>>();
  for (const entry of entries) {
    const tier = tierForQuantiles(quantiles, entry.openingStrength);
    const weeks = buckets.get(tier) ?? new Map<number, number[]>();
    const rates = weeks.get(entry.activeWeek) ?? [];
    rates.push(entry.declineRate);
    weeks.set(entry.activeWeek, rates);
    buckets.set(tier, weeks);
  }

  const tiers = emptyTiers();
  for (const tier of TIERS) {
    const weeks = buckets.get(tier);
    if (!weeks) continue;
    for (const week of [...weeks.keys()].sort((a, b) => a - b)) {
      tiers[tier][week] = summarize(weeks.get(week) ?? []);
    }
  }

  return freezeTierTable({
    version: TIER_TABLE_VERSION,
    computedAt: new Date().toISOString(),
    quantiles,
    tiers,
    corpusSize: entries.length,
    movieCount: strengths.length,
  });
}

export function tierFor(table: TierTable, openingStrength: number): Tier {
  return tierForQuantiles(table.quantiles, openingStrength);
}

/**
 * Mean decline rate for a tier and active week; null when the corpus never had one
 */
export function averageDeclineRate(table: TierTable, tier: Tier, activeWeek: number): number | null {
  return table.tiers[tier][activeWeek]?.mean ?? null;
}

/**
 * Holds the current tier table snapshot
 */
export class TierTableStore {
  private snapshot: TierTable | null;

  constructor(initial: TierTable | null = null) {
    this.snapshot = initial ? freezeTierTable(initial) : null;
  }

  current(): TierTable | null {
    return this.snapshot;
  }

  require(): TierTable {
    if (!this.snapshot) {
      throw new Error('Tier table has not been computed or loaded');
    }
    return this.snapshot;
  }

  publish(table: TierTable): TierTable {
    const next = freezeTierTable(table);
    this.snapshot = next;
    return next;
  }

  recompute(corpus: Iterable<HistoricalCorpusEntry>): TierTable {
    return this.publish(computeTierTable(corpus));
  }

  async loadFromCache(path: string): Promise<TierTable | null> {
    const cached = await getCachedTierTable(path);
    return cached ? this.publish(cached) : null;
  }

  async saveToCache(path: string): Promise<void> {
    await saveTierTable(path, this.require());
  }
}
