/**
 * Date helpers for box-office week ranges
 *
 * Ranges arrive as "2024-11-08~2024-11-14" (also accepted: " - " separators
 * and "/" inside dates). All dates are normalized to UTC midnight.
 */

import type { DateRange } from '../types';

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/;

/**
 * Parse a release date. Accepts Date objects, ISO-like strings, or Excel
 * serial day numbers (as spreadsheet cells sometimes deliver them).
 */
export function parseDate(value: Date | string | number | null | undefined): Date | null {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return new Date(Date.UTC(value.getFullYear(), value.getMonth(), value.getDate()));
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    // Excel dates are days since 1899-12-30
    const excelEpoch = Date.UTC(1899, 11, 30);
    return new Date(excelEpoch + Math.floor(value) * DAY_MS);
  }

  const match = ISO_DATE.exec(value.trim());
  if (!match) return null;

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  // Reject overflow like 2024-02-31
  if (date.getUTCMonth() !== Number(month) - 1) return null;
  return date;
}

export function parseDateRange(value: string | null | undefined): DateRange | null {
  if (!value) return null;

  const parts = value.split(/\s*~\s*|\s+[-–]\s+/);
  if (parts.length !== 2) return null;

  const start = parseDate(parts[0]);
  const end = parseDate(parts[1]);
  if (!start || !end || end.getTime() < start.getTime()) return null;

  return { start, end };
}

export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function formatDateRange(range: DateRange): string {
  return `${formatDate(range.start)}~${formatDate(range.end)}`;
}

/**
 * Whole days from `from` to `to`, counting both ends
 */
export function inclusiveDaysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / DAY_MS) + 1;
}
