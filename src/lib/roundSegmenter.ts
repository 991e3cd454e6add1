/**
 * Round Segmenter
 *
 * Splits a movie's weekly records into theatrical runs ("rounds"):
 * - 3 or more consecutive zero-revenue weeks end a run; those weeks belong to no round
 * - up to 2 zero weeks inside a run are kept but get no active week index
 * - trailing zero weeks are trimmed so every round ends on a revenue week
 */

import type { RawWeek, Round, WeekRecord } from '../types';
import { InvalidInputError } from './errors';

const ROUND_BREAK_STREAK = 3;

export interface SegmentOptions {
  /** Weeks whose range ends before this date are pre-release screenings */
  releaseDate?: Date | null;
  minRealWeeks?: number;
  minActiveWeeks?: number;
}

interface WeekGroup {
  weeks: RawWeek[];
  closed: boolean;
}

function assertWeek(week: RawWeek): void {
  for (const field of ['boxoffice', 'audience', 'screens'] as const) {
    const value = week[field];
    if (!Number.isFinite(value) || value < 0) {
      throw new InvalidInputError(field, `week ${week.week} has ${value}`);
    }
  }
}

function isReleased(week: RawWeek, releaseDate: Date | null | undefined): boolean {
  if (!releaseDate || !week.dateRange) return true;
  return week.dateRange.end.getTime() >= releaseDate.getTime();
}

/**
 * Group weeks by the zero-streak rule
 */
function groupByZeroStreak(weeks: RawWeek[]): WeekGroup[] {
  const groups: WeekGroup[] = [];
  let current: RawWeek[] = [];
  let zeroStreak = 0;

  for (const week of weeks) {
    zeroStreak = week.boxoffice === 0 ? zeroStreak + 1 : 0;

    if (zeroStreak >= ROUND_BREAK_STREAK) {
      if (current.length > 0) {
        groups.push({ weeks: current, closed: true });
        current = [];
      }
      continue;
    }

    current.push(week);
  }

  if (current.length > 0) {
    groups.push({ weeks: current, closed: false });
  }

  return groups;
}

function buildRound(group: WeekGroup, roundIndex: number, trailingZeroWeeks: number): Round {
  let activeIdx = 0;

  const weeks: WeekRecord[] = group.weeks.map((week, i) => {
    const hasRevenue = week.boxoffice > 0;
    if (hasRevenue) activeIdx++;

    return Object.freeze({
      realWeekIndex: i + 1,
      activeWeekIndex: hasRevenue ? activeIdx : null,
      boxoffice: week.boxoffice,
      audience: week.audience,
      screens: week.screens,
      dateRange: week.dateRange,
      roundIndex,
    });
  });

  return Object.freeze({
    roundIndex,
    weeks: Object.freeze(weeks),
    trailingZeroWeeks,
    isOpen: !group.closed,
  });
}

/**
 * Segment a movie's raw weeks into rounds.
 * Returns an empty list when the movie never earned revenue.
 */
export function segmentRounds(rawWeeks: RawWeek[], options: SegmentOptions = {}): Round[] {
  const minRealWeeks = options.minRealWeeks ?? 1;
  const minActiveWeeks = options.minActiveWeeks ?? 1;

  rawWeeks.forEach(assertWeek);

  const released = [...rawWeeks]
    .sort((a, b) => a.week - b.week)
    .filter((week) => isReleased(week, options.releaseDate));

  const candidates: Array<{ group: WeekGroup; trailingZeroWeeks: number }> = [];

  for (const group of groupByZeroStreak(released)) {
    let end = group.weeks.length;
    while (end > 0 && group.weeks[end - 1].boxoffice === 0) end--;
    if (end === 0) continue;

    const trimmed = group.weeks.slice(0, end);
    const activeCount = trimmed.filter((w) => w.boxoffice > 0).length;
    if (trimmed.length < minRealWeeks || activeCount < minActiveWeeks) continue;

    candidates.push({
      group: { weeks: trimmed, closed: group.closed },
      trailingZeroWeeks: group.weeks.length - end,
    });
  }

  return candidates.map(({ group, trailingZeroWeeks }, i) =>
    buildRound(group, i + 1, trailingZeroWeeks)
  );
}

export function activeWeeks(round: Round): WeekRecord[] {
  return round.weeks.filter((w) => w.activeWeekIndex !== null);
}

export function lastActiveWeek(round: Round): WeekRecord | null {
  const active = activeWeeks(round);
  return active.length > 0 ? active[active.length - 1] : null;
}

export function latestRound(rounds: Round[]): Round | null {
  return rounds.length > 0 ? rounds[rounds.length - 1] : null;
}
