/**
 * Metric accumulation shared by every summary operation.
 */

import type { MetricName, MetricStats, Summary, WorkoutRecord } from '../types';

/** Summarized fields, in the order they appear in results. */
export const METRIC_NAMES: readonly MetricName[] = [
  'durationSeconds',
  'distanceKm',
  'energyKcal',
  'avgHeartRateBpm',
  'avgPowerWatts',
  'avgMets',
  'elevationAscendedM',
];

export function metricValue(record: WorkoutRecord, metric: MetricName): number | undefined {
  return metric === 'durationSeconds' ? record.durationSeconds : record.metrics[metric];
}

export function emptySummary(): Summary {
  return { metrics: {}, recordCount: 0 };
}

interface Accumulator {
  count: number;
  max: number;
  maxAt: string;
  min: number;
  minAt: string;
  sum: number;
}

/**
 * Running summary over records added one at a time.
 * Ties on min/max keep the first record seen.
 */
export class SummaryBuilder {
  private readonly accumulators = new Map<MetricName, Accumulator>();
  private recordCount = 0;

  add(record: WorkoutRecord): this {
    this.recordCount++;
    for (const metric of METRIC_NAMES) {
      const value = metricValue(record, metric);
      if (value === undefined) continue;

      const current = this.accumulators.get(metric);
      if (!current) {
        const at = record.startTime.toISOString();
        this.accumulators.set(metric, {
          count: 1,
          max: value,
          maxAt: at,
          min: value,
          minAt: at,
          sum: value,
        });
        continue;
      }
      current.count++;
      current.sum += value;
      if (value < current.min) {
        current.min = value;
        current.minAt = record.startTime.toISOString();
      }
      if (value > current.max) {
        current.max = value;
        current.maxAt = record.startTime.toISOString();
      }
    }
    return this;
  }

  build(): Summary {
    const summary = emptySummary();
    summary.recordCount = this.recordCount;
    for (const metric of METRIC_NAMES) {
      const accumulator = this.accumulators.get(metric);
      if (accumulator) summary.metrics[metric] = toStats(accumulator);
    }
    return summary;
  }
}

function toStats(accumulator: Accumulator): MetricStats {
  return {
    average: accumulator.sum / accumulator.count,
    count: accumulator.count,
    max: accumulator.max,
    maxAt: accumulator.maxAt,
    min: accumulator.min,
    minAt: accumulator.minAt,
    sum: accumulator.sum,
  };
}

export function summarize(records: Iterable<WorkoutRecord>): Summary {
  const builder = new SummaryBuilder();
  for (const record of records) builder.add(record);
  return builder.build();
}
