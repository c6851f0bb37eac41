/**
 * Workout type definitions.
 * Types for workout records assembled from a tracker export document.
 */

/**
 * Numeric metrics a workout may carry. Every field is optional: a metric that
 * the source did not provide (or provided as garbage) is absent, never 0.
 */
export interface WorkoutMetrics {
  avgHeartRateBpm?: number;
  avgMets?: number;
  avgPowerWatts?: number;
  distanceKm?: number;
  elevationAscendedM?: number;
  energyKcal?: number;
}

export type WorkoutMetricName = keyof WorkoutMetrics;

export type MetadataValue = boolean | number | string;

/**
 * Key/value pair from the document, in document order.
 * Holds `MetadataEntry` elements and statistics the extractor does not map.
 */
export interface MetadataEntry {
  key: string;
  /** Attribute text exactly as written. */
  raw: string;
  /** Flag, number or converted quantity when the text reads as one; the text otherwise. */
  value: MetadataValue;
  unit?: string;
}

/**
 * One completed exercise session.
 * Created once the closing `</Workout>` tag is consumed, then frozen.
 */
export interface WorkoutRecord {
  activityType: string;
  durationSeconds: number;
  endTime: Date;
  /** YYYY-MM-DD as written in the start timestamp (the user's wall-clock date). */
  localDate: string;
  metadata: readonly MetadataEntry[];
  metrics: Readonly<WorkoutMetrics>;
  startTime: Date;
  routeReference?: string;
  sourceName?: string;
}
