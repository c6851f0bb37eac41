/**
 * Archive loader.
 *
 * Drives archive → extractor → store for one export bundle and applies the
 * partial-load policy: a structural error in the document still publishes
 * every workout completed before it, flagged `partial`. Archive errors and
 * cancellation leave the store as it was.
 */

import { withArchive } from './archive';
import { ExtractionConfig } from './config';
import { DocumentMalformedError, LoadCancelledError, LoadInProgressError } from './errors';
import { extractWorkouts } from './extractor';
import { logger as defaultLogger } from './utils/logger';

import type { ArchiveOptions } from './archive';
import type { RecordStore } from './store';
import type {
  DiagnosticSink,
  ExtractionDiagnostic,
  ExtractionStats,
  LoadStatus,
  WorkoutRecord,
} from './types';
import type { Logger } from './utils/logger';

export interface LoadOptions {
  /** Entry paths accepted as the export document. */
  documentPattern?: RegExp;
  logger?: Logger;
  onDiagnostic?: DiagnosticSink;
  /** Checked between records; aborting throws LoadCancelledError. */
  signal?: AbortSignal;
}

export interface LoadResult {
  count: number;
  /** The first diagnostics of the load (see `stats.diagnostics` for the total). */
  diagnostics: ExtractionDiagnostic[];
  documentPath: string;
  source: string;
  stats: ExtractionStats;
  status: Exclude<LoadStatus, 'empty'>;
  /** Present when the document was cut short. */
  error?: DocumentMalformedError;
}

const activeLoads = new WeakMap<RecordStore, string>();

/**
 * Whether a load into `store` is currently running.
 */
export function isLoading(store: RecordStore): boolean {
  return activeLoads.has(store);
}

/**
 * Load the workouts of the archive at `archivePath` into `store`.
 *
 * @throws ArchiveUnreadableError if the bundle cannot be opened
 * @throws ArchiveFormatError if it holds no single export document
 * @throws LoadCancelledError if `options.signal` aborts first
 * @throws LoadInProgressError if another load into `store` is running
 */
export async function loadArchive(
  archivePath: string,
  store: RecordStore,
  options: LoadOptions = {},
): Promise<LoadResult> {
  const running = activeLoads.get(store);
  if (running !== undefined) {
    throw new LoadInProgressError(running);
  }

  const log = (options.logger ?? defaultLogger).child({ archivePath });
  const archiveOptions: ArchiveOptions = { documentPattern: options.documentPattern, logger: log };
  const diagnostics: ExtractionDiagnostic[] = [];
  const records: WorkoutRecord[] = [];
  let stats: ExtractionStats = { diagnostics: 0, emitted: 0, skipped: 0, workoutsSeen: 0 };

  const onDiagnostic = (diagnostic: ExtractionDiagnostic) => {
    if (diagnostics.length < ExtractionConfig.maxReportedDiagnostics) {
      diagnostics.push(diagnostic);
    }
    options.onDiagnostic?.(diagnostic);
  };

  const throwIfAborted = () => {
    if (options.signal?.aborted) {
      throw new LoadCancelledError(archivePath, records.length);
    }
  };

  activeLoads.set(store, archivePath);
  const timer = log.startTimer('Loading archive');
  try {
    throwIfAborted();

    return await withArchive(
      archivePath,
      async (handle): Promise<LoadResult> => {
        const base = { diagnostics, documentPath: handle.documentPath, source: archivePath };
        try {
          for await (const record of extractWorkouts(handle.stream, {
            logger: log,
            onComplete: (final) => {
              stats = final;
            },
            onDiagnostic,
          })) {
            throwIfAborted();
            records.push(record);
          }
        } catch (error) {
          if (!(error instanceof DocumentMalformedError)) throw error;

          store.load(records, { error: error.message, source: archivePath, status: 'partial' });
          timer.end('warn', 'Archive partially loaded', {
            count: records.length,
            line: error.line,
          });
          return { ...base, count: records.length, error, stats, status: 'partial' };
        }

        throwIfAborted();
        store.load(records, { source: archivePath, status: 'complete' });
        timer.end('info', 'Archive loaded', {
          count: records.length,
          diagnostics: stats.diagnostics,
          skipped: stats.skipped,
        });
        return { ...base, count: records.length, stats, status: 'complete' };
      },
      archiveOptions,
    );
  } finally {
    activeLoads.delete(store);
  }
}
