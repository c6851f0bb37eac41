import { AggregationConfig } from '../config';

import type { RecordFilter, WorkoutRecord } from '../types';

/**
 * Keep the records matching every given criterion.
 * Date bounds are inclusive and compared with the record's local date.
 */
export function filterRecords(
  records: readonly WorkoutRecord[],
  filter: RecordFilter = {},
): WorkoutRecord[] {
  const { from, to } = filter;
  const activityType =
    filter.activityType === AggregationConfig.allActivities ? undefined : filter.activityType;

  return records.filter(
    (record) =>
      (activityType === undefined || record.activityType === activityType) &&
      (from === undefined || record.localDate >= from) &&
      (to === undefined || record.localDate <= to),
  );
}
