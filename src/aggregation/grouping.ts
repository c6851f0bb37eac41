/**
 * Per-activity totals for breakdown views, with small categories folded
 * into a single "Others" entry.
 */

import { AggregationConfig } from '../config';
import { metricValue } from './summary';
import { convertDistance } from './units';

import type { DistanceUnit, MetricName, WorkoutRecord } from '../types';

export interface CategoryTotal {
  label: string;
  value: number;
}

export interface MetricTotalsOptions {
  /** Percent of the grand total below which the smallest categories merge. 0 disables. */
  combinationThreshold?: number;
  othersLabel?: string;
  /** Output unit for `distanceKm`; ignored for other metrics. */
  unit?: DistanceUnit;
}

/**
 * Sum of `metric` per activity type, largest first. Activities without any
 * value for the metric are left out.
 */
export function metricTotalsByActivity(
  records: readonly WorkoutRecord[],
  metric: MetricName,
  options: MetricTotalsOptions = {},
): CategoryTotal[] {
  const {
    combinationThreshold = AggregationConfig.combinationThresholdPercent,
    othersLabel = AggregationConfig.othersLabel,
    unit = AggregationConfig.defaultDistanceUnit,
  } = options;

  const totals = new Map<string, number>();
  for (const record of records) {
    const value = metricValue(record, metric);
    if (value === undefined) continue;
    totals.set(record.activityType, (totals.get(record.activityType) ?? 0) + value);
  }

  const data = [...totals].map(([label, value]) => ({
    label,
    value: metric === 'distanceKm' ? convertDistance(value, unit) : value,
  }));
  return groupSmallValues(data, combinationThreshold, othersLabel);
}

/**
 * Merge the smallest categories into `othersLabel` while their cumulative
 * sum stays within `thresholdPercent` of the total.
 *
 * Result is sorted by value, largest first, with the merged entry last.
 * A zero (or empty) total returns the input order unchanged.
 *
 * @example
 * groupSmallValues([{ label: 'A', value: 100 }, { label: 'B', value: 50 },
 *   { label: 'C', value: 5 }, { label: 'D', value: 3 }], 10)
 * // => A 100, B 50, Others 8
 */
export function groupSmallValues(
  data: readonly CategoryTotal[],
  thresholdPercent: number = AggregationConfig.combinationThresholdPercent,
  othersLabel: string = AggregationConfig.othersLabel,
): CategoryTotal[] {
  const total = data.reduce((sum, entry) => sum + entry.value, 0);
  if (total === 0) return data.map((entry) => ({ ...entry }));

  const limit = total * (thresholdPercent / 100);
  const ascending = [...data].sort((a, b) => a.value - b.value);

  const kept: CategoryTotal[] = [];
  let others = 0;
  for (const entry of ascending) {
    if (others + entry.value <= limit) {
      others += entry.value;
    } else {
      kept.push({ ...entry });
    }
  }

  kept.sort((a, b) => b.value - a.value);
  if (others > 0) kept.push({ label: othersLabel, value: others });
  return kept;
}
