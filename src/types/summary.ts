/**
 * Aggregation result type definitions.
 */

import type { WorkoutMetricName } from './workout';

export type Granularity = 'month' | 'quarter' | 'week' | 'year';

export type DistanceUnit = 'km' | 'm' | 'mi';

/**
 * Every numeric field the aggregation engine summarizes.
 * Duration is always present on a record; the rest are optional metrics.
 */
export type MetricName = 'durationSeconds' | WorkoutMetricName;

/**
 * Calendar bucket identifier. Ordered by (year, index).
 *
 * `index` is the ISO week number, month (1-12), quarter (1-4) or 1 for years.
 * `label` is `2024-W03`, `2024-01`, `2024-Q1` or `2024`; labels sort
 * lexicographically in chronological order.
 */
export interface PeriodKey {
  granularity: Granularity;
  index: number;
  label: string;
  year: number;
}

export interface MetricStats {
  average: number;
  count: number;
  max: number;
  /** Start time (ISO) of the first record holding the maximum. */
  maxAt: string;
  min: number;
  /** Start time (ISO) of the first record holding the minimum. */
  minAt: string;
  sum: number;
}

export type MetricSummaries = Partial<Record<MetricName, MetricStats>>;

export interface Summary {
  metrics: MetricSummaries;
  recordCount: number;
}

/** Series fields that can be smoothed: every metric plus the workout count. */
export type SeriesField = 'recordCount' | MetricName;

export interface PeriodBucket {
  period: PeriodKey;
  summary: Summary;
  /** Trailing moving average per field; absent keys have no value yet. */
  smoothed?: Partial<Record<SeriesField, number>>;
}

export type ActivitySummaries = Record<string, Summary>;

export interface PeriodQueryOptions {
  /** Insert empty buckets for every period between the first and last observed. */
  dense?: boolean;
  /** Trailing window size (positive integer) for moving averages. */
  smoothingWindow?: number;
}

export interface RecordFilter {
  /** Activity type to keep; undefined or 'All' keeps every activity. */
  activityType?: string;
  /** Inclusive lower bound, YYYY-MM-DD, compared with `localDate`. */
  from?: string;
  /** Inclusive upper bound, YYYY-MM-DD, compared with `localDate`. */
  to?: string;
}
