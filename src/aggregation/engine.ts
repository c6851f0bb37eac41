/**
 * Aggregation engine.
 *
 * Pure functions over a snapshot of records: nothing here reads the store
 * or keeps state between calls, so concurrent queries cannot interfere.
 * Empty input yields an empty result, never an error.
 */

import { comparePeriodKeys, parseGranularity, periodKeyOf, periodRange } from './periods';
import { METRIC_NAMES, SummaryBuilder, emptySummary, summarize } from './summary';

import type {
  ActivitySummaries,
  PeriodBucket,
  PeriodKey,
  PeriodQueryOptions,
  SeriesField,
  Summary,
  WorkoutRecord,
} from '../types';

const SERIES_FIELDS: readonly SeriesField[] = ['recordCount', ...METRIC_NAMES];

/**
 * Summary per activity type, keyed in first-seen order.
 */
export function summarizeByActivity(records: readonly WorkoutRecord[]): ActivitySummaries {
  const builders = new Map<string, SummaryBuilder>();
  for (const record of records) {
    let builder = builders.get(record.activityType);
    if (!builder) {
      builder = new SummaryBuilder();
      builders.set(record.activityType, builder);
    }
    builder.add(record);
  }
  return Object.fromEntries(
    [...builders].map(([activityType, builder]) => [activityType, builder.build()]),
  );
}

/**
 * Summary for the whole record set.
 */
export function overviewTotals(records: readonly WorkoutRecord[]): Summary {
  return summarize(records);
}

/**
 * Chronological per-period summaries.
 *
 * Periods without workouts are left out unless `dense` is set, in which case
 * every period between the first and the last observed one is present.
 * With `smoothingWindow`, each bucket also carries the trailing moving average
 * of every series (workout count and per-metric sums) over that many buckets.
 *
 * @param granularity week, month, quarter or year (or W, M, Q, Y)
 * @throws UnsupportedGranularityError for any other granularity
 * @throws RangeError if `smoothingWindow` is not a positive integer
 */
export function summarizeByPeriod(
  records: readonly WorkoutRecord[],
  granularity: string,
  options: PeriodQueryOptions = {},
): PeriodBucket[] {
  const resolved = parseGranularity(granularity);
  const { dense = false, smoothingWindow } = options;
  if (smoothingWindow !== undefined) assertWindow(smoothingWindow);

  const groups = new Map<string, { builder: SummaryBuilder; period: PeriodKey }>();
  for (const record of records) {
    const period = periodKeyOf(record.localDate, resolved);
    let group = groups.get(period.label);
    if (!group) {
      group = { builder: new SummaryBuilder(), period };
      groups.set(period.label, group);
    }
    group.builder.add(record);
  }

  const observed = [...groups.values()].sort((a, b) => comparePeriodKeys(a.period, b.period));
  if (observed.length === 0) return [];

  const periods = dense
    ? periodRange(observed[0].period, observed[observed.length - 1].period)
    : observed.map((group) => group.period);

  const buckets: PeriodBucket[] = periods.map((period) => ({
    period,
    summary: groups.get(period.label)?.builder.build() ?? emptySummary(),
  }));

  if (smoothingWindow !== undefined) {
    applySmoothing(buckets, smoothingWindow);
  }
  return buckets;
}

/**
 * Trailing moving average.
 *
 * The first `window - 1` positions have no value. Inside a window an absent
 * value counts as 0, unless every value of the window is absent, in which
 * case the result is absent too.
 *
 * @throws RangeError if `window` is not a positive integer
 */
export function movingAverage(
  values: readonly (number | undefined)[],
  window: number,
): (number | undefined)[] {
  assertWindow(window);

  return values.map((_, index) => {
    if (index < window - 1) return undefined;
    let sum = 0;
    let present = 0;
    for (let i = index - window + 1; i <= index; i++) {
      const value = values[i];
      if (value === undefined) continue;
      sum += value;
      present++;
    }
    return present === 0 ? undefined : sum / window;
  });
}

function applySmoothing(buckets: PeriodBucket[], window: number): void {
  for (const bucket of buckets) bucket.smoothed = {};

  for (const field of SERIES_FIELDS) {
    const series = buckets.map((bucket) =>
      field === 'recordCount' ? bucket.summary.recordCount : bucket.summary.metrics[field]?.sum,
    );
    const averaged = movingAverage(series, window);
    buckets.forEach((bucket, index) => {
      const value = averaged[index];
      if (value !== undefined && bucket.smoothed) bucket.smoothed[field] = value;
    });
  }
}

function assertWindow(window: number): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`Smoothing window must be a positive integer, got ${String(window)}`);
  }
}
