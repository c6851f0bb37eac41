/**
 * Centralized type exports.
 * All type definitions are exported from this index for consistent imports.
 */

// Extraction types
export type {
  DiagnosticKind,
  DiagnosticSink,
  ExtractionDiagnostic,
  ExtractionStats,
  LoadStatus,
  StoreInfo,
} from './extraction';

// Aggregation types
export type {
  ActivitySummaries,
  DistanceUnit,
  Granularity,
  MetricName,
  MetricStats,
  MetricSummaries,
  PeriodBucket,
  PeriodKey,
  PeriodQueryOptions,
  RecordFilter,
  SeriesField,
  Summary,
} from './summary';

// Workout types
export type {
  MetadataEntry,
  MetadataValue,
  WorkoutMetricName,
  WorkoutMetrics,
  WorkoutRecord,
} from './workout';
