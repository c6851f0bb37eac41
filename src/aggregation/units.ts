import type { DistanceUnit } from '../types';

const DISTANCE_FACTORS: Record<DistanceUnit, number> = {
  km: 1,
  m: 1000,
  mi: 1 / 1.609_344,
};

/**
 * Convert kilometres to `unit`.
 */
export function convertDistance(km: number, unit: DistanceUnit): number {
  return km * DISTANCE_FACTORS[unit];
}
