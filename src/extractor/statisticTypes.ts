/**
 * Fixed lookup tables from document vocabulary to record fields.
 */

import { distanceToKm, energyToKcal, lengthToMeters } from './valueParser';

import type { WorkoutMetricName } from '../types';

export type StatisticAttribute = 'average' | 'maximum' | 'minimum' | 'sum' | 'value';

/** Every value-bearing attribute of a `WorkoutStatistics` element. */
export const STATISTIC_ATTRIBUTES: readonly StatisticAttribute[] = [
  'sum',
  'average',
  'minimum',
  'maximum',
  'value',
];

/**
 * Converts a coerced number into the field's canonical unit.
 * Returns undefined when the unit is not one the field understands.
 */
export type UnitConverter = (value: number, unit: string | undefined) => number | undefined;

export interface FieldMapping {
  field: WorkoutMetricName;
  convert: UnitConverter;
  /**
   * Values from several `WorkoutActivity` children add up (a per-leg total).
   * Otherwise the first activity value is kept.
   */
  cumulative?: boolean;
}

export interface StatisticMapping extends FieldMapping {
  /** Attributes read in order; the first one present is used. */
  attributes: readonly StatisticAttribute[];
}

const passThrough: UnitConverter = (value) => value;

const distance: StatisticMapping = {
  attributes: ['sum', 'value'],
  convert: distanceToKm,
  field: 'distanceKm',
};

const power: StatisticMapping = {
  attributes: ['average', 'value'],
  convert: passThrough,
  field: 'avgPowerWatts',
};

/**
 * Statistic types (with the HKQuantityTypeIdentifier prefix removed) that map
 * onto a record metric. Anything else is kept as raw metadata.
 */
export const STATISTIC_FIELDS: ReadonlyMap<string, StatisticMapping> = new Map<
  string,
  StatisticMapping
>([
  ['ActiveEnergyBurned', { attributes: ['sum', 'value'], convert: energyToKcal, field: 'energyKcal' }],
  ['CyclingPower', power],
  ['DistanceCrossCountrySkiing', distance],
  ['DistanceCycling', distance],
  ['DistanceDownhillSnowSports', distance],
  ['DistancePaddleSports', distance],
  ['DistanceRowing', distance],
  ['DistanceSkatingSports', distance],
  ['DistanceSwimming', distance],
  ['DistanceWalkingRunning', distance],
  ['DistanceWheelchair', distance],
  ['HeartRate', { attributes: ['average', 'value'], convert: passThrough, field: 'avgHeartRateBpm' }],
  ['RunningPower', power],
]);

/**
 * Metadata keys whose value also fills a record metric.
 * The entry itself is still kept in the raw metadata list.
 */
export const METADATA_FIELDS: ReadonlyMap<string, FieldMapping> = new Map<string, FieldMapping>([
  ['HKAverageMETs', { convert: passThrough, field: 'avgMets' }],
  [
    'HKElevationAscended',
    { convert: lengthToMeters, cumulative: true, field: 'elevationAscendedM' },
  ],
]);

export interface WorkoutTotalMapping extends FieldMapping {
  unitAttribute: string;
}

/**
 * Legacy totals carried as attributes of the workout element itself.
 * Used only when no statistic supplied the field.
 */
export const WORKOUT_TOTAL_FIELDS: ReadonlyMap<string, WorkoutTotalMapping> = new Map<
  string,
  WorkoutTotalMapping
>([
  ['totalDistance', { convert: distanceToKm, field: 'distanceKm', unitAttribute: 'totalDistanceUnit' }],
  [
    'totalEnergyBurned',
    { convert: energyToKcal, field: 'energyKcal', unitAttribute: 'totalEnergyBurnedUnit' },
  ],
]);
