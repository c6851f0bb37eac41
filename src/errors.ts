/**
 * Analyzer errors.
 *
 * Typed failures for loading and querying workout exports. Field-level
 * problems inside a workout are diagnostics, not errors; everything here
 * aborts the operation that raised it.
 *
 * @example
 * ```typescript
 * try {
 *   await loadArchive(path, store);
 * } catch (error) {
 *   if (error instanceof ArchiveFormatError) {
 *     // bundle opened but holds no export document
 *   }
 * }
 * ```
 */

import { HttpStatus } from './config';

/**
 * Stable identifiers for error categorization.
 */
export enum ErrorCode {
  ARCHIVE_UNREADABLE = 'ARCHIVE_UNREADABLE',
  ARCHIVE_FORMAT = 'ARCHIVE_FORMAT',
  DOCUMENT_MALFORMED = 'DOCUMENT_MALFORMED',
  UNSUPPORTED_GRANULARITY = 'UNSUPPORTED_GRANULARITY',
  LOAD_CANCELLED = 'LOAD_CANCELLED',
  LOAD_IN_PROGRESS = 'LOAD_IN_PROGRESS',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base class for all analyzer errors.
 */
export class AnalyzerError extends Error {
  readonly code: ErrorCode;
  readonly metadata: Record<string, string>;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      cause?: Error;
      metadata?: Record<string, string>;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'AnalyzerError';
    this.code = code;
    this.metadata = options.metadata ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Returns a formatted error string: [CODE] message: cause
   */
  toString(): string {
    if (this.cause instanceof Error) {
      return `[${this.code}] ${this.message}: ${this.cause.message}`;
    }
    return `[${this.code}] ${this.message}`;
  }

  /**
   * Converts to a JSON-serializable object for logging and API responses.
   */
  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      metadata: this.metadata,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

/**
 * The container itself cannot be opened or decompressed.
 */
export class ArchiveUnreadableError extends AnalyzerError {
  constructor(archivePath: string, cause?: Error) {
    super(ErrorCode.ARCHIVE_UNREADABLE, `Cannot read archive ${archivePath}`, {
      cause,
      metadata: { archivePath },
    });
    this.name = 'ArchiveUnreadableError';
  }
}

export type ArchiveFormatReason = 'ambiguous' | 'missing';

/**
 * The container opens but has no (or more than one) export document.
 */
export class ArchiveFormatError extends AnalyzerError {
  readonly reason: ArchiveFormatReason;
  readonly candidates: readonly string[];

  constructor(archivePath: string, reason: ArchiveFormatReason, candidates: readonly string[] = []) {
    const message =
      reason === 'missing'
        ? `Archive ${archivePath} contains no export document`
        : `Archive ${archivePath} contains ${String(candidates.length)} export documents`;
    super(ErrorCode.ARCHIVE_FORMAT, message, {
      metadata: { archivePath, candidates: candidates.join(','), reason },
    });
    this.name = 'ArchiveFormatError';
    this.reason = reason;
    this.candidates = candidates;
  }
}

/**
 * The export document is not well-formed XML (truncated, mismatched tags,
 * undeclared entities, unreadable bytes). Records yielded before the failure
 * remain valid.
 */
export class DocumentMalformedError extends AnalyzerError {
  readonly line: number;
  readonly column: number;
  readonly recordsEmitted: number;

  constructor(
    message: string,
    position: { column: number; line: number; recordsEmitted: number },
    cause?: Error,
  ) {
    super(ErrorCode.DOCUMENT_MALFORMED, message, {
      cause,
      metadata: {
        column: String(position.column),
        line: String(position.line),
        recordsEmitted: String(position.recordsEmitted),
      },
    });
    this.name = 'DocumentMalformedError';
    this.line = position.line;
    this.column = position.column;
    this.recordsEmitted = position.recordsEmitted;
  }
}

/**
 * A period query asked for a bucket size outside week/month/quarter/year.
 */
export class UnsupportedGranularityError extends AnalyzerError {
  readonly granularity: string;

  constructor(granularity: string) {
    super(ErrorCode.UNSUPPORTED_GRANULARITY, `Unsupported granularity: "${granularity}"`, {
      metadata: { granularity },
    });
    this.name = 'UnsupportedGranularityError';
    this.granularity = granularity;
  }
}

/**
 * A load was aborted by its caller before the store was replaced.
 */
export class LoadCancelledError extends AnalyzerError {
  constructor(archivePath: string, recordsRead: number) {
    super(ErrorCode.LOAD_CANCELLED, `Load of ${archivePath} was cancelled`, {
      metadata: { archivePath, recordsRead: String(recordsRead) },
    });
    this.name = 'LoadCancelledError';
  }
}

/**
 * A second load was requested while one is still running.
 */
export class LoadInProgressError extends AnalyzerError {
  constructor(currentSource: string) {
    super(ErrorCode.LOAD_IN_PROGRESS, `A load of ${currentSource} is already running`, {
      metadata: { currentSource },
    });
    this.name = 'LoadInProgressError';
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Type guard for AnalyzerError.
 */
export function isAnalyzerError(err: unknown): err is AnalyzerError {
  return err instanceof AnalyzerError;
}

/**
 * Extracts the error code from an error.
 * Returns INTERNAL_ERROR if not an AnalyzerError.
 */
export function getErrorCode(err: unknown): ErrorCode {
  if (err instanceof AnalyzerError) {
    return err.code;
  }
  return ErrorCode.INTERNAL_ERROR;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.ARCHIVE_UNREADABLE]: HttpStatus.BAD_REQUEST,
  [ErrorCode.ARCHIVE_FORMAT]: HttpStatus.UNPROCESSABLE_ENTITY,
  [ErrorCode.DOCUMENT_MALFORMED]: HttpStatus.UNPROCESSABLE_ENTITY,
  [ErrorCode.UNSUPPORTED_GRANULARITY]: HttpStatus.BAD_REQUEST,
  [ErrorCode.LOAD_CANCELLED]: HttpStatus.REQUEST_TIMEOUT,
  [ErrorCode.LOAD_IN_PROGRESS]: HttpStatus.CONFLICT,
  [ErrorCode.INTERNAL_ERROR]: HttpStatus.INTERNAL_SERVER_ERROR,
};

/**
 * Map an error to the HTTP status the API answers with.
 */
export function httpStatusForError(err: unknown): number {
  return STATUS_BY_CODE[getErrorCode(err)];
}

/**
 * Normalise an unknown thrown value to an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
