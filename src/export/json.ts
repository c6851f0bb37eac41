/**
 * JSON export documents. Dates are ISO strings; absent metrics are
 * omitted keys.
 */

import type { PeriodBucket, WorkoutRecord } from '../types';

export interface ExportDocument<T> {
  count: number;
  data: readonly T[];
  generatedAt: string;
}

export function toExportDocument<T>(data: readonly T[], generatedAt = new Date()): ExportDocument<T> {
  return { count: data.length, data, generatedAt: generatedAt.toISOString() };
}

export function workoutsToJson(records: readonly WorkoutRecord[], generatedAt?: Date): string {
  return JSON.stringify(toExportDocument(records, generatedAt), null, 2);
}

export function periodSeriesToJson(buckets: readonly PeriodBucket[], generatedAt?: Date): string {
  return JSON.stringify(toExportDocument(buckets, generatedAt), null, 2);
}
