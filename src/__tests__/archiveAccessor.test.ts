import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { locateExportDocument, openArchive, withArchive } from '../archive';
import { ArchiveFormatError, ArchiveUnreadableError } from '../errors';
import {
  DOCUMENT_PATH,
  exportDocument,
  makeTempDir,
  quietLogger,
  removeTempDir,
  runXml,
  writeArchive,
} from './helpers';

import type { Readable } from 'node:stream';
import type { ArchiveHandle } from '../archive';

async function readText(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('archive accessor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('streams the export document out of the bundle', async () => {
    const document = exportDocument(runXml('2024-01-15'));
    const archivePath = await writeArchive(dir, {
      'apple_health_export/export_cda.xml': '<ClinicalDocument/>',
      'apple_health_export/workout-routes/route_2024-01-15.gpx': '<gpx/>',
      [DOCUMENT_PATH]: document,
    });

    const handle = await openArchive(archivePath, { logger: quietLogger });
    try {
      expect(handle.documentPath).toBe(DOCUMENT_PATH);
      expect(await readText(handle.stream)).toBe(document);
    } finally {
      handle.close();
    }
  });

  it('reports a bundle without export document', async () => {
    const archivePath = await writeArchive(dir, { 'notes/readme.txt': 'hello' });

    const error: unknown = await openArchive(archivePath, { logger: quietLogger }).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(ArchiveFormatError);
    expect(error).toMatchObject({ candidates: [], reason: 'missing' });
  });

  it('reports a bundle with several export documents', async () => {
    const archivePath = await writeArchive(dir, {
      'first/export.xml': '<HealthData/>',
      'second/export.xml': '<HealthData/>',
    });

    const error: unknown = await locateExportDocument(archivePath, {
      documentPattern: /(^|\/)export\.xml$/,
      logger: quietLogger,
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ArchiveFormatError);
    expect(error).toMatchObject({
      candidates: ['first/export.xml', 'second/export.xml'],
      reason: 'ambiguous',
    });
  });

  it('reports a missing file as unreadable', async () => {
    await expect(
      openArchive(path.join(dir, 'absent.zip'), { logger: quietLogger }),
    ).rejects.toBeInstanceOf(ArchiveUnreadableError);
  });

  it('reports a file that is not a ZIP container as unreadable', async () => {
    const archivePath = path.join(dir, 'garbage.zip');
    await writeFile(archivePath, 'this is not a zip archive at all');

    await expect(openArchive(archivePath, { logger: quietLogger })).rejects.toBeInstanceOf(
      ArchiveUnreadableError,
    );
  });

  it('closes idempotently', async () => {
    const archivePath = await writeArchive(dir, { [DOCUMENT_PATH]: exportDocument('') });

    const handle = await openArchive(archivePath, { logger: quietLogger });
    expect(handle.closed).toBe(false);

    handle.close();
    handle.close();

    expect(handle.closed).toBe(true);
    expect(handle.stream.destroyed).toBe(true);
  });

  it('releases the handle when the scoped callback throws', async () => {
    const archivePath = await writeArchive(dir, { [DOCUMENT_PATH]: exportDocument('') });
    let seen: ArchiveHandle | undefined;

    await expect(
      withArchive(
        archivePath,
        async (handle) => {
          seen = handle;
          await Promise.resolve();
          throw new Error('consumer failed');
        },
        { logger: quietLogger },
      ),
    ).rejects.toThrow('consumer failed');

    expect(seen?.closed).toBe(true);
  });

  it('returns the callback result and closes afterwards', async () => {
    const document = exportDocument(runXml('2024-01-15'));
    const archivePath = await writeArchive(dir, { [DOCUMENT_PATH]: document });
    let seen: ArchiveHandle | undefined;

    const length = await withArchive(
      archivePath,
      async (handle) => {
        seen = handle;
        return (await readText(handle.stream)).length;
      },
      { logger: quietLogger },
    );

    expect(length).toBe(document.length);
    expect(seen?.closed).toBe(true);
  });
});
