/**
 * CSV rendering (RFC 4180: CRLF line breaks, quoted fields where needed).
 * Absent values are empty cells; a zero stays `0`.
 */

import { METRIC_NAMES } from '../aggregation/summary';

import type { PeriodBucket, SeriesField, WorkoutMetricName, WorkoutRecord } from '../types';

type Cell = number | string | undefined;

const LINE_BREAK = '\r\n';

const WORKOUT_METRIC_COLUMNS: readonly WorkoutMetricName[] = [
  'distanceKm',
  'energyKcal',
  'avgHeartRateBpm',
  'avgPowerWatts',
  'avgMets',
  'elevationAscendedM',
];

const WORKOUT_COLUMNS = [
  'activityType',
  'localDate',
  'startTime',
  'endTime',
  'durationSeconds',
  ...WORKOUT_METRIC_COLUMNS,
  'sourceName',
  'routeReference',
  'metadata',
];

const SERIES_FIELDS: readonly SeriesField[] = ['recordCount', ...METRIC_NAMES];

/**
 * Quote a cell when it holds a comma, a quote or a line break.
 */
export function escapeCsvCell(cell: Cell): string {
  if (cell === undefined) return '';
  const text = typeof cell === 'number' ? String(cell) : cell;
  return /[",\r\n]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

function toCsv(rows: readonly (readonly Cell[])[]): string {
  return rows.map((row) => row.map(escapeCsvCell).join(',')).join(LINE_BREAK) + LINE_BREAK;
}

/**
 * One row per workout, in input order. Metadata entries go in the last
 * column as a JSON array.
 */
export function workoutsToCsv(records: readonly WorkoutRecord[]): string {
  const rows: Cell[][] = [WORKOUT_COLUMNS];
  for (const record of records) {
    rows.push([
      record.activityType,
      record.localDate,
      record.startTime.toISOString(),
      record.endTime.toISOString(),
      record.durationSeconds,
      ...WORKOUT_METRIC_COLUMNS.map((metric) => record.metrics[metric]),
      record.sourceName,
      record.routeReference,
      record.metadata.length > 0 ? JSON.stringify(record.metadata) : undefined,
    ]);
  }
  return toCsv(rows);
}

/**
 * One row per period: label, workout count and the sum of every metric.
 * Smoothed columns are added when the buckets carry moving averages.
 */
export function periodSeriesToCsv(buckets: readonly PeriodBucket[]): string {
  const smoothed = buckets.some((bucket) => bucket.smoothed !== undefined);
  const header: Cell[] = [
    'period',
    'recordCount',
    ...METRIC_NAMES.map((metric) => `${metric}_sum`),
  ];
  if (smoothed) header.push(...SERIES_FIELDS.map((field) => `${field}_smoothed`));

  const rows: Cell[][] = [header];
  for (const { period, smoothed: averages, summary } of buckets) {
    const row: Cell[] = [
      period.label,
      summary.recordCount,
      ...METRIC_NAMES.map((metric) => summary.metrics[metric]?.sum),
    ];
    if (smoothed) row.push(...SERIES_FIELDS.map((field) => averages?.[field]));
    rows.push(row);
  }
  return toCsv(rows);
}
