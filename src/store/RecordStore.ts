/**
 * In-memory record store.
 *
 * Holds the workouts of the most recent load as one immutable snapshot.
 * `load` swaps the snapshot with a single assignment, so a reader sees
 * either the previous load or the new one, never a mix.
 */

import type { LoadStatus, StoreInfo, WorkoutRecord } from '../types';

export interface DateBounds {
  /** Earliest `localDate`, YYYY-MM-DD. */
  first: string;
  /** Latest `localDate`, YYYY-MM-DD. */
  last: string;
}

interface Snapshot {
  readonly info: Readonly<StoreInfo>;
  readonly records: readonly WorkoutRecord[];
}

const EMPTY_INFO: StoreInfo = { status: 'empty' };
const EMPTY_SNAPSHOT: Snapshot = { info: Object.freeze(EMPTY_INFO), records: Object.freeze([]) };

export class RecordStore {
  private snapshot: Snapshot = EMPTY_SNAPSHOT;

  /**
   * Replace the contents with `records`.
   * The array is copied and frozen; `loadedAt` defaults to now.
   */
  load(records: readonly WorkoutRecord[], info: StoreInfo): void {
    this.snapshot = Object.freeze({
      info: Object.freeze({ ...info, loadedAt: info.loadedAt ?? new Date() }),
      records: Object.freeze([...records]),
    });
  }

  /** Drop every record and go back to the `empty` status. */
  clear(): void {
    this.snapshot = EMPTY_SNAPSHOT;
  }

  all(): readonly WorkoutRecord[] {
    return this.snapshot.records;
  }

  count(): number {
    return this.snapshot.records.length;
  }

  status(): LoadStatus {
    return this.snapshot.info.status;
  }

  info(): Readonly<StoreInfo> {
    return this.snapshot.info;
  }

  /**
   * Distinct activity types in first-seen order.
   */
  activityTypes(): string[] {
    const seen = new Set<string>();
    for (const record of this.snapshot.records) {
      seen.add(record.activityType);
    }
    return [...seen];
  }

  /**
   * Earliest and latest local date, or undefined when the store is empty.
   */
  dateBounds(): DateBounds | undefined {
    const { records } = this.snapshot;
    if (records.length === 0) return undefined;

    let first = records[0].localDate;
    let last = first;
    for (const record of records) {
      if (record.localDate < first) first = record.localDate;
      if (record.localDate > last) last = record.localDate;
    }
    return { first, last };
  }
}
