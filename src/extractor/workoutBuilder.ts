/**
 * Transient accumulator for one workout element.
 *
 * Collects the workout's attributes and the values of its nested children
 * while the element is open, and turns them into a frozen `WorkoutRecord`
 * once the closing tag has been seen.
 */

import { ExtractionConfig } from '../config';
import {
  METADATA_FIELDS,
  STATISTIC_ATTRIBUTES,
  STATISTIC_FIELDS,
  WORKOUT_TOTAL_FIELDS,
} from './statisticTypes';
import {
  coerceNumber,
  durationToSeconds,
  parseExportTimestamp,
  parseMetadataValue,
  parseQuantity,
} from './valueParser';

import type {
  ExtractionDiagnostic,
  MetadataEntry,
  WorkoutMetricName,
  WorkoutMetrics,
  WorkoutRecord,
} from '../types';
import type { FieldMapping } from './statisticTypes';
import type { ParsedTimestamp } from './valueParser';

export type Attributes = Readonly<Record<string, string>>;

/** Diagnostic without the workout ordinal, which the builder adds. */
export type BuilderDiagnostic = Omit<ExtractionDiagnostic, 'workoutIndex'>;

/**
 * Where a value came from. Statistics written directly under the workout win
 * over the per-activity copies nested in `WorkoutActivity`.
 */
export type ValueScope = 'activity' | 'workout';

export class WorkoutBuilder {
  private readonly directFields = new Set<WorkoutMetricName>();
  private readonly metadata: MetadataEntry[] = [];
  private readonly metrics: WorkoutMetrics = {};
  private routeReference?: string;

  constructor(
    readonly index: number,
    private readonly attributes: Attributes,
    private readonly line: number,
    private readonly report: (diagnostic: ExtractionDiagnostic) => void,
  ) {}

  /**
   * Merge a `WorkoutStatistics` element. Known types fill a metric through
   * the lookup table; unknown types are kept as raw metadata.
   */
  addStatistic(attributes: Attributes, line: number, scope: ValueScope): void {
    const rawType = attributes.type ?? '';
    const type = rawType.replace(ExtractionConfig.quantityTypePrefix, '');
    const mapping = STATISTIC_FIELDS.get(type);

    if (!mapping) {
      for (const attribute of STATISTIC_ATTRIBUTES) {
        const raw = attributes[attribute];
        if (raw === undefined) continue;
        const entry = { key: `${rawType}:${attribute}`, raw, value: coerceNumber(raw) ?? raw };
        this.metadata.push(withUnit(entry, attributes.unit));
      }
      return;
    }

    const attribute = mapping.attributes.find((name) => attributes[name] !== undefined);
    if (!attribute) return;

    const raw = attributes[attribute];
    const value = coerceNumber(raw);
    if (value === undefined) {
      this.diagnose({
        field: mapping.field,
        kind: 'coercion',
        line,
        message: `Non-numeric ${attribute} on statistic ${type}`,
        rawValue: raw,
      });
      return;
    }

    this.applyMapping(mapping, value, attributes.unit, line, raw, scope);
  }

  /**
   * Keep a `MetadataEntry` key/value pair with its value typed; a few keys
   * also fill a metric.
   */
  addMetadata(attributes: Attributes, line: number, scope: ValueScope): void {
    const key = attributes.key;
    if (key === undefined) return;
    const value = attributes.value ?? '';
    const parsed = parseMetadataValue(value);
    this.metadata.push(withUnit({ key, raw: value, value: parsed?.value ?? value }, parsed?.unit));

    const mapping = METADATA_FIELDS.get(key);
    if (!mapping) return;

    const quantity = parseQuantity(value);
    if (!quantity) {
      this.diagnose({
        field: mapping.field,
        kind: 'coercion',
        line,
        message: `Non-numeric metadata value for ${key}`,
        rawValue: value,
      });
      return;
    }
    this.applyMapping(mapping, quantity.value, quantity.unit, line, value, scope);
  }

  setRouteReference(path: string | undefined): void {
    if (path && this.routeReference === undefined) {
      this.routeReference = path;
    }
  }

  /**
   * Finalise into a frozen record, or `undefined` when the workout lacks a
   * usable time span (a `record-skipped` diagnostic is reported).
   */
  build(): WorkoutRecord | undefined {
    const start = this.readTimestamp('startDate');
    const end = this.readTimestamp('endDate');
    if (!start || !end) return undefined;

    if (end.date.getTime() < start.date.getTime()) {
      this.diagnose({
        field: 'endDate',
        kind: 'record-skipped',
        line: this.line,
        message: 'Workout ends before it starts',
        rawValue: this.attributes.endDate,
      });
      return undefined;
    }

    this.applyWorkoutTotals();

    const activityType = this.attributes.workoutActivityType
      ? this.attributes.workoutActivityType.replace(ExtractionConfig.activityTypePrefix, '')
      : ExtractionConfig.unknownActivityType;

    const record: WorkoutRecord = {
      activityType,
      durationSeconds: this.resolveDuration(start.date, end.date),
      endTime: end.date,
      localDate: start.localDate,
      metadata: Object.freeze(this.metadata.map((entry) => Object.freeze(entry))),
      metrics: Object.freeze({ ...this.metrics }),
      startTime: start.date,
    };
    if (this.routeReference !== undefined) record.routeReference = this.routeReference;
    if (this.attributes.sourceName !== undefined) record.sourceName = this.attributes.sourceName;

    return Object.freeze(record);
  }

  private applyMapping(
    mapping: FieldMapping,
    value: number,
    unit: string | undefined,
    line: number,
    raw: string,
    scope: ValueScope,
  ): void {
    const converted = mapping.convert(value, unit);
    if (converted === undefined) {
      this.diagnose({
        field: mapping.field,
        kind: 'unit',
        line,
        message: `Unsupported unit "${unit ?? ''}" for ${mapping.field}`,
        rawValue: raw,
      });
      return;
    }
    this.setMetric(mapping, converted, scope);
  }

  private applyWorkoutTotals(): void {
    for (const [attribute, mapping] of WORKOUT_TOTAL_FIELDS) {
      const raw = this.attributes[attribute];
      if (raw === undefined || this.metrics[mapping.field] !== undefined) continue;

      const value = coerceNumber(raw);
      if (value === undefined) {
        this.diagnose({
          field: mapping.field,
          kind: 'coercion',
          line: this.line,
          message: `Non-numeric ${attribute} on workout`,
          rawValue: raw,
        });
        continue;
      }
      this.applyMapping(mapping, value, this.attributes[mapping.unitAttribute], this.line, raw, 'workout');
    }
  }

  private diagnose(diagnostic: BuilderDiagnostic): void {
    this.report({ ...diagnostic, workoutIndex: this.index });
  }

  private readTimestamp(attribute: 'endDate' | 'startDate'): ParsedTimestamp | undefined {
    const raw = this.attributes[attribute];
    const parsed = parseExportTimestamp(raw);
    if (!parsed) {
      this.diagnose({
        field: attribute,
        kind: 'record-skipped',
        line: this.line,
        message: raw === undefined ? `Workout has no ${attribute}` : `Unparseable ${attribute}`,
        rawValue: raw,
      });
    }
    return parsed;
  }

  /**
   * Explicit `duration` (in `durationUnit`, minutes by default) wins when it
   * is a valid non-negative number in a known unit; otherwise the span
   * between start and end is used. No rounding is applied.
   */
  private resolveDuration(start: Date, end: Date): number {
    const spanSeconds = (end.getTime() - start.getTime()) / 1000;
    const raw = this.attributes.duration;
    if (raw === undefined) return spanSeconds;

    const value = coerceNumber(raw);
    if (value === undefined || value < 0) {
      this.diagnose({
        field: 'durationSeconds',
        kind: 'coercion',
        line: this.line,
        message: 'Invalid duration, using the start/end span',
        rawValue: raw,
      });
      return spanSeconds;
    }

    const unit = this.attributes.durationUnit ?? ExtractionConfig.defaultDurationUnit;
    const seconds = durationToSeconds(value, unit);
    if (seconds === undefined) {
      this.diagnose({
        field: 'durationSeconds',
        kind: 'unit',
        line: this.line,
        message: `Unsupported duration unit "${unit}", using the start/end span`,
        rawValue: raw,
      });
      return spanSeconds;
    }
    return seconds;
  }

  private setMetric(mapping: FieldMapping, value: number, scope: ValueScope): void {
    const { field } = mapping;
    if (scope === 'workout') {
      this.metrics[field] = value;
      this.directFields.add(field);
      return;
    }
    if (this.directFields.has(field)) return;

    const current = this.metrics[field];
    if (current === undefined) {
      this.metrics[field] = value;
    } else if (mapping.cumulative) {
      this.metrics[field] = current + value;
    }
  }
}

function withUnit(entry: MetadataEntry, unit: string | undefined): MetadataEntry {
  return unit === undefined ? entry : { ...entry, unit };
}
