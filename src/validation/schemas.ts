import { z } from 'zod';

import { AggregationConfig } from '../config';
import { METRIC_NAMES } from '../aggregation/summary';

import type { MetricName } from '../types';

const LOCAL_DATE = /^\d{4}-\d{2}-\d{2}$/;

const LocalDateSchema = z.string().regex(LOCAL_DATE, 'Expected a YYYY-MM-DD date');

// Query flags arrive as text; only the literal words are accepted
const BooleanFlagSchema = z
  .enum(['true', 'false'])
  .optional()
  .transform((value) => value === 'true');

const MetricNameSchema = z.string().transform((value, ctx): MetricName => {
  const metric = METRIC_NAMES.find((name) => name === value);
  if (metric === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown metric "${value}". Expected one of: ${METRIC_NAMES.join(', ')}`,
    });
    return z.NEVER;
  }
  return metric;
});

const DATE_ORDER_ISSUE = { message: '"from" must not be after "to"', path: ['from'] };

function datesInOrder(query: { from?: string; to?: string }): boolean {
  return !query.from || !query.to || query.from <= query.to;
}

// Body of POST /api/archive/load
export const LoadArchiveSchema = z.object({
  path: z.string().trim().min(1, 'path is required'),
});

// Filters shared by every read endpoint
export const RecordFilterSchema = z
  .object({
    activityType: z.string().min(1).optional(),
    from: LocalDateSchema.optional(),
    to: LocalDateSchema.optional(),
  })
  .refine(datesInOrder, DATE_ORDER_ISSUE);

const ExportFormatSchema = z.enum(['csv', 'json']).default('json');

export const PeriodQuerySchema = z
  .object({
    activityType: z.string().min(1).optional(),
    dense: BooleanFlagSchema,
    from: LocalDateSchema.optional(),
    // Validated by the engine so unknown values surface as UnsupportedGranularityError
    granularity: z.string().min(1).default(AggregationConfig.defaultGranularity),
    smoothing: z.coerce.number().int().positive().optional(),
    to: LocalDateSchema.optional(),
  })
  .refine(datesInOrder, DATE_ORDER_ISSUE);

export const TotalsQuerySchema = z
  .object({
    activityType: z.string().min(1).optional(),
    from: LocalDateSchema.optional(),
    metric: MetricNameSchema,
    threshold: z.coerce
      .number()
      .min(0)
      .max(100)
      .default(AggregationConfig.combinationThresholdPercent),
    to: LocalDateSchema.optional(),
    unit: z.enum(['km', 'm', 'mi']).default(AggregationConfig.defaultDistanceUnit),
  })
  .refine(datesInOrder, DATE_ORDER_ISSUE);

export const WorkoutExportQuerySchema = z
  .object({
    activityType: z.string().min(1).optional(),
    format: ExportFormatSchema,
    from: LocalDateSchema.optional(),
    to: LocalDateSchema.optional(),
  })
  .refine(datesInOrder, DATE_ORDER_ISSUE);

export const PeriodExportQuerySchema = z
  .object({
    activityType: z.string().min(1).optional(),
    dense: BooleanFlagSchema,
    format: ExportFormatSchema,
    from: LocalDateSchema.optional(),
    granularity: z.string().min(1).default(AggregationConfig.defaultGranularity),
    smoothing: z.coerce.number().int().positive().optional(),
    to: LocalDateSchema.optional(),
  })
  .refine(datesInOrder, DATE_ORDER_ISSUE);
