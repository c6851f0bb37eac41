/**
 * Attribute value coercion.
 * Everything in the export document is text; these helpers turn it into
 * typed values or `undefined` when the text does not hold what was expected.
 */

import type { MetadataValue } from '../types';

const DECIMAL_REGEX = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const TIMESTAMP_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?\s*(Z|[+-]\d{2}:?\d{2})?$/;

export interface ParsedQuantity {
  value: number;
  unit?: string;
}

export interface ParsedMetadataValue {
  value: MetadataValue;
  unit?: string;
}

export interface ParsedTimestamp {
  date: Date;
  /** YYYY-MM-DD exactly as written, before any timezone conversion. */
  localDate: string;
}

/**
 * Parse a decimal number. Rejects empty text, hex, `Infinity` and `NaN`.
 */
export function coerceNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const text = raw.trim();
  if (!DECIMAL_REGEX.test(text)) return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Parse an export timestamp such as "2024-01-15 08:30:00 -0700".
 * ISO 8601 forms are accepted too. A timestamp without an offset is read as UTC.
 */
export function parseExportTimestamp(raw: string | undefined): ParsedTimestamp | undefined {
  if (!raw) return undefined;
  const match = TIMESTAMP_REGEX.exec(raw.trim());
  if (!match) return undefined;

  const [, year, month, day, hours, minutes, seconds, zone] = match;
  const offset = normalizeOffset(zone);
  const date = new Date(`${year}-${month}-${day}T${hours}:${minutes}:${seconds}${offset}`);
  if (Number.isNaN(date.getTime())) return undefined;

  // Reject rollovers such as 2024-02-30 by checking the wall-clock date survives
  const monthNumber = Number(month);
  const dayNumber = Number(day);
  const calendarDate = new Date(Date.UTC(Number(year), monthNumber - 1, dayNumber));
  if (calendarDate.getUTCMonth() !== monthNumber - 1 || calendarDate.getUTCDate() !== dayNumber) {
    return undefined;
  }

  return { date, localDate: `${year}-${month}-${day}` };
}

function normalizeOffset(zone: string | undefined): string {
  if (!zone || zone === 'Z') return 'Z';
  if (zone.includes(':')) return zone;
  return `${zone.slice(0, 3)}:${zone.slice(3)}`;
}

const SECONDS_PER_DURATION_UNIT = new Map<string, number>([
  ['', 60],
  ['d', 86_400],
  ['h', 3600],
  ['hr', 3600],
  ['min', 60],
  ['ms', 0.001],
  ['s', 1],
  ['sec', 1],
]);

/**
 * Convert a duration to seconds. Unknown units yield `undefined`.
 */
export function durationToSeconds(value: number, unit: string): number | undefined {
  const factor = SECONDS_PER_DURATION_UNIT.get(unit);
  return factor === undefined ? undefined : value * factor;
}

const KM_PER_DISTANCE_UNIT = new Map<string, number>([
  ['cm', 0.000_01],
  ['ft', 0.000_304_8],
  ['km', 1],
  ['m', 0.001],
  ['mi', 1.609_344],
  ['yd', 0.000_914_4],
]);

/**
 * Convert a distance to kilometres. A missing unit is taken as km.
 */
export function distanceToKm(value: number, unit: string | undefined): number | undefined {
  const factor = KM_PER_DISTANCE_UNIT.get(unit ?? 'km');
  return factor === undefined ? undefined : value * factor;
}

const METERS_PER_LENGTH_UNIT = new Map<string, number>([
  ['cm', 0.01],
  ['ft', 0.3048],
  ['km', 1000],
  ['m', 1],
  ['mi', 1609.344],
]);

/**
 * Convert a length to metres. A missing unit is taken as m.
 */
export function lengthToMeters(value: number, unit: string | undefined): number | undefined {
  const factor = METERS_PER_LENGTH_UNIT.get(unit ?? 'm');
  return factor === undefined ? undefined : value * factor;
}

const KCAL_PER_ENERGY_UNIT = new Map<string, number>([
  ['Cal', 1],
  ['cal', 0.001],
  ['kJ', 1 / 4.184],
  ['kcal', 1],
]);

/**
 * Convert an energy amount to kilocalories. A missing unit is taken as kcal.
 */
export function energyToKcal(value: number, unit: string | undefined): number | undefined {
  const factor = KCAL_PER_ENERGY_UNIT.get(unit ?? 'kcal');
  return factor === undefined ? undefined : value * factor;
}

/**
 * Split "<number> <unit>" text and normalise the unit:
 * cm becomes m, % becomes a fraction, degF becomes degC.
 * A bare number comes back without a unit.
 */
export function parseQuantity(raw: string | undefined): ParsedQuantity | undefined {
  if (raw === undefined) return undefined;
  const text = raw.trim();
  if (!text) return undefined;

  const spaceIndex = text.indexOf(' ');
  if (spaceIndex === -1) {
    const value = coerceNumber(text);
    return value === undefined ? undefined : { value };
  }

  const value = coerceNumber(text.slice(0, spaceIndex));
  if (value === undefined) return undefined;
  const unit = text.slice(spaceIndex + 1).trim();

  switch (unit) {
    case 'cm': {
      return { unit: 'm', value: value / 100 };
    }
    case '%': {
      return { unit: '%', value: value / 100 };
    }
    case 'degF': {
      return { unit: 'degC', value: ((value - 32) * 5) / 9 };
    }
    default: {
      return { unit, value };
    }
  }
}

/**
 * Interpret a metadata value:
 * - empty text is absent
 * - a bare 0 or 1 is a boolean flag
 * - any other bare number is a number
 * - "<number> <unit>" is a converted quantity (see `parseQuantity`)
 * - anything else stays text
 */
export function parseMetadataValue(raw: string | undefined): ParsedMetadataValue | undefined {
  if (!raw) return undefined;

  const quantity = parseQuantity(raw);
  if (!quantity) return { value: raw };

  if (quantity.unit === undefined) {
    if (quantity.value === 0) return { value: false };
    if (quantity.value === 1) return { value: true };
  }
  return quantity;
}
