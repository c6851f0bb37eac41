import { readFile, writeFile } from 'node:fs/promises';

import {
  ArchiveFormatError,
  ArchiveUnreadableError,
  DocumentMalformedError,
  LoadCancelledError,
  LoadInProgressError,
} from '../errors';
import { isLoading, loadArchive } from '../loader';
import { RecordStore } from '../store';
import {
  DOCUMENT_PATH,
  exportDocument,
  makeRecord,
  makeTempDir,
  quietLogger,
  removeTempDir,
  runXml,
  workoutXml,
  writeArchive,
} from './helpers';

describe('loadArchive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('loads every workout of a well-formed archive', async () => {
    const archivePath = await writeArchive(dir, {
      [DOCUMENT_PATH]: exportDocument([runXml('2024-01-15'), runXml('2024-01-16')].join('\n')),
    });
    const store = new RecordStore();

    const result = await loadArchive(archivePath, store, { logger: quietLogger });

    expect(result).toMatchObject({
      count: 2,
      documentPath: DOCUMENT_PATH,
      source: archivePath,
      status: 'complete',
    });
    expect(result.error).toBeUndefined();
    expect(store.status()).toBe('complete');
    expect(store.count()).toBe(2);
    expect(store.info().source).toBe(archivePath);
  });

  it('publishes the prefix of a truncated document as partial', async () => {
    const complete = exportDocument([runXml('2024-01-15'), runXml('2024-01-16')].join('\n'));
    const truncated = complete.slice(0, complete.indexOf('</HealthData>')) + '<Workout start';
    const archivePath = await writeArchive(dir, { [DOCUMENT_PATH]: truncated });
    const store = new RecordStore();

    const result = await loadArchive(archivePath, store, { logger: quietLogger });

    expect(result.status).toBe('partial');
    expect(result.count).toBe(2);
    expect(result.error).toBeInstanceOf(DocumentMalformedError);
    expect(store.status()).toBe('partial');
    expect(store.count()).toBe(2);
    expect(store.info().error).toBe(result.error?.message);
  });

  it('reports diagnostics without failing the load', async () => {
    const archivePath = await writeArchive(dir, {
      [DOCUMENT_PATH]: exportDocument(
        [
          workoutXml({ startDate: '2024-01-15 08:00:00 +0000' }),
          runXml('2024-01-16'),
        ].join('\n'),
      ),
    });
    const store = new RecordStore();
    const seen: string[] = [];

    const result = await loadArchive(archivePath, store, {
      logger: quietLogger,
      onDiagnostic: (diagnostic) => seen.push(diagnostic.kind),
    });

    expect(result.status).toBe('complete');
    expect(result.count).toBe(1);
    expect(result.stats).toEqual({ diagnostics: 1, emitted: 1, skipped: 1, workoutsSeen: 2 });
    expect(result.diagnostics).toHaveLength(1);
    expect(seen).toEqual(['record-skipped']);
  });

  it('leaves the store untouched when the archive has no export document', async () => {
    const archivePath = await writeArchive(dir, { 'other/file.txt': 'x' });
    const store = new RecordStore();
    store.load([makeRecord()], { source: 'previous.zip', status: 'complete' });

    await expect(loadArchive(archivePath, store, { logger: quietLogger })).rejects.toBeInstanceOf(
      ArchiveFormatError,
    );

    expect(store.info().source).toBe('previous.zip');
    expect(store.count()).toBe(1);
    expect(isLoading(store)).toBe(false);
  });

  it('fails without publishing anything when the document cannot be decompressed', async () => {
    const archivePath = await writeArchive(dir, {
      [DOCUMENT_PATH]: exportDocument([runXml('2024-01-15'), runXml('2024-01-16')].join('\n')),
    });
    const bytes = await readFile(archivePath);
    // The document's compressed data follows its local header name and extra field
    const nameAt = bytes.indexOf(DOCUMENT_PATH);
    const dataAt = nameAt + DOCUMENT_PATH.length + bytes.readUInt16LE(nameAt - 2);
    bytes.fill(0xff, dataAt, dataAt + 4);
    await writeFile(archivePath, bytes);
    const store = new RecordStore();
    store.load([makeRecord()], { source: 'previous.zip', status: 'complete' });

    await expect(loadArchive(archivePath, store, { logger: quietLogger })).rejects.toBeInstanceOf(
      ArchiveUnreadableError,
    );

    expect(store.status()).toBe('complete');
    expect(store.info().source).toBe('previous.zip');
    expect(store.count()).toBe(1);
  });

  it('cancels through an abort signal and keeps the previous snapshot', async () => {
    const archivePath = await writeArchive(dir, {
      [DOCUMENT_PATH]: exportDocument(runXml('2024-01-15')),
    });
    const store = new RecordStore();
    const controller = new AbortController();
    controller.abort();

    await expect(
      loadArchive(archivePath, store, { logger: quietLogger, signal: controller.signal }),
    ).rejects.toBeInstanceOf(LoadCancelledError);

    expect(store.status()).toBe('empty');
  });

  it('rejects a second load into the same store while one is running', async () => {
    const archivePath = await writeArchive(dir, {
      [DOCUMENT_PATH]: exportDocument(runXml('2024-01-15')),
    });
    const store = new RecordStore();

    const first = loadArchive(archivePath, store, { logger: quietLogger });
    expect(isLoading(store)).toBe(true);

    await expect(loadArchive(archivePath, store, { logger: quietLogger })).rejects.toBeInstanceOf(
      LoadInProgressError,
    );
    await expect(first).resolves.toMatchObject({ count: 1, status: 'complete' });
    expect(isLoading(store)).toBe(false);
  });
});
