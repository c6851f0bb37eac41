/**
 * Archive accessor.
 *
 * Locates the export document inside a ZIP bundle and exposes it as a
 * forward-only byte stream. Nothing is extracted to disk. The archive's file
 * descriptor is owned by the returned handle and released by `close()`.
 */

import * as fs from 'node:fs';
import { PassThrough } from 'node:stream';

import { Open, Parse } from 'unzipper';

import { ArchiveConfig } from '../config';
import { ArchiveFormatError, ArchiveUnreadableError, toError } from '../errors';
import { debugArchiveEntries } from '../utils/debugLogger';
import { logger as defaultLogger } from '../utils/logger';

import type { Readable } from 'node:stream';
import type { CentralDirectory, Entry } from 'unzipper';
import type { Logger } from '../utils/logger';

export interface ArchiveHandle {
  readonly archivePath: string;
  readonly documentPath: string;
  /** Uncompressed bytes of the export document. Single pass. */
  readonly stream: Readable;
  readonly closed: boolean;
  /** Release the archive's file descriptor. Safe to call more than once. */
  close: () => void;
}

export interface ArchiveOptions {
  /** Entry paths accepted as the export document. */
  documentPattern?: RegExp;
  logger?: Logger;
}

/**
 * Read the central directory and return the path of the single entry that
 * matches the export document convention.
 *
 * @throws ArchiveUnreadableError if the file is missing or not a ZIP container
 * @throws ArchiveFormatError if zero or several entries match
 */
export async function locateExportDocument(
  archivePath: string,
  options: ArchiveOptions = {},
): Promise<string> {
  const log = options.logger ?? defaultLogger;
  const pattern = options.documentPattern ?? ArchiveConfig.documentPattern;

  let directory: CentralDirectory;
  try {
    directory = await Open.file(archivePath);
  } catch (error) {
    throw new ArchiveUnreadableError(archivePath, toError(error));
  }

  const candidates = directory.files
    .filter((file) => file.type === 'File' && pattern.test(file.path))
    .map((file) => file.path);

  debugArchiveEntries(log, archivePath, directory.files.length, candidates);

  if (candidates.length === 0) {
    throw new ArchiveFormatError(archivePath, 'missing');
  }
  if (candidates.length > 1) {
    throw new ArchiveFormatError(archivePath, 'ambiguous', candidates);
  }
  return candidates[0];
}

/**
 * Open the export document of an archive for streaming.
 * The caller must `close()` the handle; prefer `withArchive`.
 */
export async function openArchive(
  archivePath: string,
  options: ArchiveOptions = {},
): Promise<ArchiveHandle> {
  const log = options.logger ?? defaultLogger;
  const documentPath = await locateExportDocument(archivePath, options);

  const source = fs.createReadStream(archivePath);
  const entries = source.pipe(Parse());
  const document = new PassThrough();
  let found = false;
  let settled = false;
  let closed = false;

  const fail = (error: Error) => {
    if (settled) return;
    settled = true;
    document.destroy(error);
  };

  // Read, ZIP structure and decompression failures all mean the container is unreadable
  const unreadable = (error: unknown) => {
    fail(new ArchiveUnreadableError(archivePath, toError(error)));
  };

  source.on('error', unreadable);
  entries.on('error', unreadable);
  entries.on('entry', (entry: Entry) => {
    if (!found && entry.path === documentPath) {
      found = true;
      entry.on('error', unreadable);
      entry.pipe(document);
      return;
    }
    entry.autodrain();
  });
  entries.on('close', () => {
    if (!found) {
      fail(new ArchiveFormatError(archivePath, 'missing'));
    }
  });
  document.on('end', () => {
    settled = true;
  });

  log.debug('Opened archive', { archivePath, documentPath });

  return {
    archivePath,
    documentPath,
    stream: document,
    get closed() {
      return closed;
    },
    close: () => {
      if (closed) return;
      closed = true;
      settled = true;
      document.destroy();
      entries.destroy();
      source.destroy();
      log.debug('Closed archive', { archivePath });
    },
  };
}

/**
 * Scoped access to an archive's export document.
 * The handle is closed on every exit path, including a throwing callback.
 */
export async function withArchive<T>(
  archivePath: string,
  fn: (handle: ArchiveHandle) => Promise<T>,
  options: ArchiveOptions = {},
): Promise<T> {
  const handle = await openArchive(archivePath, options);
  try {
    return await fn(handle);
  } finally {
    handle.close();
  }
}
