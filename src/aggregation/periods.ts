/**
 * Calendar period keys.
 * Weeks follow ISO 8601: Monday start, week 1 holds the year's first Thursday.
 */

import { UnsupportedGranularityError } from '../errors';

import type { Granularity, PeriodKey } from '../types';

const DAY_MS = 86_400_000;
const LOCAL_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;

const GRANULARITY_ALIASES = new Map<string, Granularity>([
  ['m', 'month'],
  ['month', 'month'],
  ['q', 'quarter'],
  ['quarter', 'quarter'],
  ['w', 'week'],
  ['week', 'week'],
  ['y', 'year'],
  ['year', 'year'],
]);

/**
 * Resolve a granularity token. Accepts the full names and the short codes
 * W, M, Q and Y, case-insensitively.
 *
 * @throws UnsupportedGranularityError for anything else
 */
export function parseGranularity(token: string): Granularity {
  const granularity = GRANULARITY_ALIASES.get(token.trim().toLowerCase());
  if (!granularity) {
    throw new UnsupportedGranularityError(token);
  }
  return granularity;
}

/**
 * Get ISO week number and week-numbering year of a calendar date.
 */
export function getIsoWeek(
  year: number,
  month: number,
  day: number,
): { week: number; year: number } {
  const d = new Date(Date.UTC(year, month - 1, day));
  // Set to nearest Thursday: current date + 4 - current day number (make Sunday=7)
  d.setUTCDate(d.getUTCDate() + 4 - (d.getUTCDay() || 7));
  const yearStart = new Date(Date.UTC(d.getUTCFullYear(), 0, 1));
  const week = Math.ceil(((d.getTime() - yearStart.getTime()) / DAY_MS + 1) / 7);
  return { week, year: d.getUTCFullYear() };
}

/**
 * 52 or 53. December 28th always falls in the last ISO week of its year.
 */
export function weeksInIsoYear(year: number): number {
  return getIsoWeek(year, 12, 28).week;
}

const LABEL_FORMATS: Record<Granularity, (year: string, index: number) => string> = {
  month: (year, index) => `${year}-${String(index).padStart(2, '0')}`,
  quarter: (year, index) => `${year}-Q${String(index)}`,
  week: (year, index) => `${year}-W${String(index).padStart(2, '0')}`,
  year: (year) => year,
};

export function makePeriodKey(granularity: Granularity, year: number, index: number): PeriodKey {
  const label = LABEL_FORMATS[granularity](String(year).padStart(4, '0'), index);
  return { granularity, index, label, year };
}

/**
 * Bucket of a YYYY-MM-DD local date.
 *
 * @throws RangeError if `localDate` is not a valid calendar date
 */
export function periodKeyOf(localDate: string, granularity: Granularity): PeriodKey {
  const match = LOCAL_DATE_REGEX.exec(localDate);
  if (!match) {
    throw new RangeError(`Invalid local date: "${localDate}". Expected YYYY-MM-DD`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  switch (granularity) {
    case 'week': {
      const iso = getIsoWeek(year, month, day);
      return makePeriodKey('week', iso.year, iso.week);
    }
    case 'month': {
      return makePeriodKey('month', year, month);
    }
    case 'quarter': {
      return makePeriodKey('quarter', year, Math.ceil(month / 3));
    }
    case 'year': {
      return makePeriodKey('year', year, 1);
    }
  }
}

function periodsPerYear(granularity: Granularity, year: number): number {
  switch (granularity) {
    case 'week': {
      return weeksInIsoYear(year);
    }
    case 'month': {
      return 12;
    }
    case 'quarter': {
      return 4;
    }
    case 'year': {
      return 1;
    }
  }
}

/**
 * The period immediately after `key`.
 */
export function nextPeriod(key: PeriodKey): PeriodKey {
  if (key.index < periodsPerYear(key.granularity, key.year)) {
    return makePeriodKey(key.granularity, key.year, key.index + 1);
  }
  return makePeriodKey(key.granularity, key.year + 1, 1);
}

/**
 * Chronological order by (year, index).
 */
export function comparePeriodKeys(a: PeriodKey, b: PeriodKey): number {
  return a.year === b.year ? a.index - b.index : a.year - b.year;
}

/**
 * Every period from `first` to `last`, both included.
 * Empty when `last` precedes `first`.
 */
export function periodRange(first: PeriodKey, last: PeriodKey): PeriodKey[] {
  const range: PeriodKey[] = [];
  for (let key = first; comparePeriodKeys(key, last) <= 0; key = nextPeriod(key)) {
    range.push(key);
  }
  return range;
}
