/**
 * Streaming workout extractor.
 *
 * Walks the export document with a strict SAX parser and yields one frozen
 * `WorkoutRecord` per `<Workout>` element, as soon as its closing tag has been
 * read. Only the workout currently open is held in memory.
 *
 * The DOCTYPE is read but never processed: declared entities are not
 * expanded and nothing outside the document is fetched. A reference to an
 * entity the parser does not know is a structural error.
 */

import * as sax from 'sax';
import { TextDecoder } from 'util';

import { ExtractionConfig } from '../config';
import { DocumentMalformedError, isAnalyzerError, toError } from '../errors';
import { debugCoercion, debugExtractionSummary, debugLog } from '../utils/debugLogger';
import { WorkoutBuilder } from './workoutBuilder';

import type {
  DiagnosticSink,
  ExtractionDiagnostic,
  ExtractionStats,
  WorkoutRecord,
} from '../types';
import type { Logger } from '../utils/logger';
import type { Attributes } from './workoutBuilder';

export interface ExtractOptions {
  logger?: Logger;
  /** Called once per dropped field or skipped workout. */
  onDiagnostic?: DiagnosticSink;
  /** Called with the final counts once the document ends (also on failure). */
  onComplete?: (stats: ExtractionStats) => void;
}

/** Children of a workout whose statistics and metadata count toward it. */
const VALUE_PARENTS = new Set<string>([ExtractionConfig.workoutTag, 'WorkoutActivity']);

interface ParseFailure {
  column: number;
  line: number;
  message: string;
  cause?: Error;
}

/**
 * Yield every workout of the document read from `source`.
 *
 * `source` is any async iterable of byte or string chunks, usually the
 * stream of an `ArchiveHandle`. The generator is single pass.
 *
 * @throws DocumentMalformedError once the records completed before a
 *   structural error (or a failed read) have been yielded
 */
export async function* extractWorkouts(
  source: AsyncIterable<unknown>,
  options: ExtractOptions = {},
): AsyncGenerator<WorkoutRecord, void, undefined> {
  const log = options.logger;
  const parser = sax.parser(true, { position: true });
  // fatal: invalid UTF-8 is a structural error, never replaced with U+FFFD
  const decoder = new TextDecoder('utf-8', { fatal: true });
  const ready: WorkoutRecord[] = [];
  const stats: ExtractionStats = { diagnostics: 0, emitted: 0, skipped: 0, workoutsSeen: 0 };

  let builder: WorkoutBuilder | undefined;
  let failure: ParseFailure | undefined;
  let sawRoot = false;
  // Element names open inside the current workout, outermost first
  const path: string[] = [];

  const report = (diagnostic: ExtractionDiagnostic) => {
    stats.diagnostics++;
    if (diagnostic.kind === 'record-skipped') stats.skipped++;
    debugCoercion(log, diagnostic);
    options.onDiagnostic?.(diagnostic);
  };

  const fail = (message: string, cause?: Error) => {
    failure ??= {
      cause,
      column: parser.column + 1,
      line: parser.line + 1,
      message,
    };
  };

  parser.onerror = (error) => {
    fail(firstLine(error.message), error);
  };

  parser.onopentag = (tag) => {
    if (failure) return;
    sawRoot = true;
    const line = parser.line + 1;

    if (!builder) {
      if (tag.name === ExtractionConfig.workoutTag) {
        builder = new WorkoutBuilder(stats.workoutsSeen, readAttributes(tag), line, report);
        stats.workoutsSeen++;
      }
      return;
    }

    const parent = path.length > 0 ? path[path.length - 1] : ExtractionConfig.workoutTag;
    path.push(tag.name);
    const scope = path.includes('WorkoutActivity') ? 'activity' : 'workout';

    switch (tag.name) {
      case 'WorkoutStatistics': {
        if (VALUE_PARENTS.has(parent)) builder.addStatistic(readAttributes(tag), line, scope);
        break;
      }
      case 'MetadataEntry': {
        if (VALUE_PARENTS.has(parent)) builder.addMetadata(readAttributes(tag), line, scope);
        break;
      }
      case 'FileReference': {
        if (parent === 'WorkoutRoute') builder.setRouteReference(readAttributes(tag).path);
        break;
      }
      default: {
        break;
      }
    }
  };

  parser.onclosetag = (name) => {
    if (failure || !builder) return;
    if (path.length > 0) {
      path.pop();
      return;
    }
    if (name !== ExtractionConfig.workoutTag) return;

    const record = builder.build();
    builder = undefined;
    if (record) ready.push(record);

    if (stats.workoutsSeen % ExtractionConfig.progressInterval === 0) {
      log?.info('Extraction progress', {
        emitted: stats.emitted + ready.length,
        workoutsSeen: stats.workoutsSeen,
      });
    }
  };

  const write = (text: string) => {
    if (failure || !text) return;
    try {
      parser.write(text);
    } catch (error) {
      const err = toError(error);
      fail(firstLine(err.message), err);
    }
  };

  const decode = (chunk: unknown, final = false): string => {
    if (failure) return '';
    try {
      return final ? decoder.decode() : decodeChunk(decoder, chunk);
    } catch (error) {
      if (!(error instanceof TypeError)) throw error;
      fail(`Invalid UTF-8 in document: ${firstLine(error.message)}`, error);
      return '';
    }
  };

  function* flush(): Generator<WorkoutRecord> {
    while (ready.length > 0) {
      const record = ready.shift();
      if (record) {
        stats.emitted++;
        yield record;
      }
    }
  }

  try {
    try {
      for await (const chunk of source) {
        write(decode(chunk));
        yield* flush();
        if (failure) break;
      }
    } catch (error) {
      if (isAnalyzerError(error)) throw error;
      const err = toError(error);
      fail(`Document could not be read: ${err.message}`, err);
    }

    if (!failure) {
      write(decode(undefined, true));
      try {
        parser.close();
      } catch (error) {
        const err = toError(error);
        fail(firstLine(err.message), err);
      }
      yield* flush();
    }

    if (!failure && !sawRoot) {
      fail('Document has no root element');
    }

    if (failure) {
      log?.warn('Export document is malformed', {
        column: failure.column,
        emitted: stats.emitted,
        line: failure.line,
      });
      throw new DocumentMalformedError(
        failure.message,
        { column: failure.column, line: failure.line, recordsEmitted: stats.emitted },
        failure.cause,
      );
    }

    if (stats.diagnostics > 0) {
      log?.warn('Some workout fields were dropped during extraction', { ...stats });
    }
    if (log) debugLog(log, 'EXTRACT', 'Document fully consumed');
  } finally {
    debugExtractionSummary(log, stats);
    options.onComplete?.(stats);
  }
}

/**
 * Collect every workout of `source` into an array.
 * On a structural error the records read so far are lost; use
 * `extractWorkouts` directly when they matter.
 */
export async function extractAll(
  source: AsyncIterable<unknown>,
  options: ExtractOptions = {},
): Promise<WorkoutRecord[]> {
  const records: WorkoutRecord[] = [];
  for await (const record of extractWorkouts(source, options)) {
    records.push(record);
  }
  return records;
}

function decodeChunk(decoder: TextDecoder, chunk: unknown): string {
  if (typeof chunk === 'string') return chunk;
  if (chunk instanceof Uint8Array) return decoder.decode(chunk, { stream: true });
  throw new RangeError(`Unsupported chunk type: ${typeof chunk}`);
}

function readAttributes(tag: sax.QualifiedTag | sax.Tag): Attributes {
  const attributes: Record<string, string> = {};
  for (const name of Object.keys(tag.attributes)) {
    const value: sax.QualifiedAttribute | string = tag.attributes[name];
    attributes[name] = typeof value === 'string' ? value : value.value;
  }
  return attributes;
}

function firstLine(message: string): string {
  const newline = message.indexOf('\n');
  return newline === -1 ? message : message.slice(0, newline);
}
