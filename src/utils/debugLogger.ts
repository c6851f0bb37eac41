/**
 * Debug logging utilities for troubleshooting the load pipeline.
 * Enabled via DEBUG_LOGGING=true environment variable.
 *
 * Categories:
 * - ARCHIVE: Bundle inspection and document selection
 * - EXTRACT: Workout assembly progress
 * - COERCION: Field values dropped while building a record
 * - AGGREGATE: Summary query inputs and output sizes
 * - REQUEST: Validated query parameters
 * - RESPONSE: Outgoing response metadata
 */

import type { ExtractionDiagnostic, ExtractionStats } from '../types';
import type { LogContext, Logger } from './logger';

export type DebugCategory =
  | 'AGGREGATE'
  | 'ARCHIVE'
  | 'COERCION'
  | 'EXTRACT'
  | 'REQUEST'
  | 'RESPONSE';

/**
 * Check if debug logging is enabled.
 */
export function isDebugEnabled(): boolean {
  return process.env.DEBUG_LOGGING === 'true';
}

/**
 * Core debug logging function.
 * Only logs if DEBUG_LOGGING is enabled.
 */
export function debugLog(
  logger: Logger,
  category: DebugCategory,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled()) return;

  const context: LogContext = {
    debugCategory: category,
  };

  if (data !== undefined) {
    context.data = data;
  }

  logger.debug(`[DEBUG:${category}] ${message}`, context);
}

/**
 * Log which archive entries were considered as the export document.
 */
export function debugArchiveEntries(
  logger: Logger,
  archivePath: string,
  entryCount: number,
  candidates: readonly string[],
): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'ARCHIVE', 'Scanned archive entries', {
    archivePath,
    candidates,
    entryCount,
  });
}

/**
 * Log a dropped field or skipped record.
 * Logger is optional so the extractor can run without one.
 */
export function debugCoercion(logger: Logger | undefined, diagnostic: ExtractionDiagnostic): void {
  if (!isDebugEnabled() || !logger) return;

  debugLog(logger, 'COERCION', diagnostic.message, {
    field: diagnostic.field,
    kind: diagnostic.kind,
    line: diagnostic.line,
    rawValue: diagnostic.rawValue,
    workoutIndex: diagnostic.workoutIndex,
  });
}

/**
 * Log extraction totals after the document has been consumed.
 */
export function debugExtractionSummary(logger: Logger | undefined, stats: ExtractionStats): void {
  if (!isDebugEnabled() || !logger) return;

  debugLog(logger, 'EXTRACT', 'Extraction summary', { ...stats });
}

/**
 * Log an aggregation query and the size of what it produced.
 */
export function debugAggregation(
  logger: Logger,
  operation: string,
  details: { inputCount: number; outputCount: number; options?: LogContext },
): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'AGGREGATE', operation, details);
}

/**
 * Log validated request parameters.
 */
export function debugRequest(logger: Logger, query: unknown, metadata?: LogContext): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'REQUEST', 'Validated query', {
    query,
    ...metadata,
  });
}

/**
 * Log response metadata (never full bodies: exports can be large).
 */
export function debugResponse(logger: Logger, statusCode: number, metadata?: LogContext): void {
  if (!isDebugEnabled()) return;

  debugLog(logger, 'RESPONSE', `Response (${String(statusCode)})`, {
    statusCode,
    ...metadata,
  });
}
