import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import JSZip from 'jszip';

import { Logger } from '../utils/logger';
import '../types/express';

import type { Request, Response } from 'express';
import type { WorkoutRecord } from '../types';

export const DOCUMENT_PATH = 'apple_health_export/export.xml';

/** Logger that only lets errors through, to keep test output readable. */
export const quietLogger = new Logger({ minLevel: 'error' });

/**
 * Wrap workout elements in a minimal export document with a DOCTYPE
 * carrying an internal subset, as real exports do.
 */
export function exportDocument(body: string): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!DOCTYPE HealthData [',
    '<!ELEMENT HealthData (ExportDate,Me,(Record|Workout)*)>',
    '<!ATTLIST HealthData locale CDATA #REQUIRED>',
    ']>',
    '<HealthData locale="en_US">',
    '<ExportDate value="2024-03-01 10:00:00 +0000"/>',
    body,
    '</HealthData>',
    '',
  ].join('\n');
}

export function workoutXml(attributes: Record<string, string>, children = ''): string {
  const attrs = Object.entries(attributes)
    .map(([name, value]) => `${name}="${value}"`)
    .join(' ');
  return children ? `<Workout ${attrs}>\n${children}\n</Workout>` : `<Workout ${attrs}/>`;
}

/** A 30 minute run on the given local date. */
export function runXml(localDate: string, children = ''): string {
  return workoutXml(
    {
      duration: '30',
      durationUnit: 'min',
      endDate: `${localDate} 08:30:00 +0000`,
      sourceName: 'Watch',
      startDate: `${localDate} 08:00:00 +0000`,
      workoutActivityType: 'HKWorkoutActivityTypeRunning',
    },
    children,
  );
}

/**
 * Yield `text` as UTF-8 byte chunks of `size` bytes. Multi-byte characters
 * may be split across chunks.
 */
export async function* byteChunks(text: string, size = 64): AsyncGenerator<Buffer> {
  const bytes = Buffer.from(text, 'utf8');
  for (let offset = 0; offset < bytes.length; offset += size) {
    await Promise.resolve();
    yield bytes.subarray(offset, offset + size);
  }
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), 'workout-analyzer-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { force: true, recursive: true });
}

/**
 * Write a ZIP archive holding `files` (path → content) and return its path.
 */
export async function writeArchive(
  dir: string,
  files: Record<string, string>,
  name = 'export.zip',
): Promise<string> {
  const zip = new JSZip();
  for (const [filePath, content] of Object.entries(files)) {
    zip.file(filePath, content);
  }
  const buffer = await zip.generateAsync({ compression: 'DEFLATE', type: 'nodebuffer' });
  const archivePath = path.join(dir, name);
  await writeFile(archivePath, buffer);
  return archivePath;
}

export interface RecordOverrides extends Partial<Omit<WorkoutRecord, 'metrics'>> {
  metrics?: WorkoutRecord['metrics'];
  /** Clock time of the start on `localDate`, HH:MM. */
  time?: string;
}

/**
 * Build a frozen record starting at `time` (08:00 by default) UTC on `localDate`.
 */
export function makeRecord(overrides: RecordOverrides = {}): WorkoutRecord {
  const { time = '08:00', ...fields } = overrides;
  const localDate = fields.localDate ?? '2024-01-15';
  const startTime = fields.startTime ?? new Date(`${localDate}T${time}:00.000Z`);
  const durationSeconds = fields.durationSeconds ?? 1800;

  return Object.freeze({
    activityType: 'Running',
    durationSeconds,
    endTime: new Date(startTime.getTime() + durationSeconds * 1000),
    localDate,
    metadata: [],
    metrics: {},
    startTime,
    ...fields,
  });
}

export interface MockResponse {
  body: unknown;
  contentType?: string;
  filename?: string;
  headers: Record<string, string>;
  headersSent: boolean;
  statusCode: number;
  writableEnded: boolean;
  attachment: jest.Mock;
  json: jest.Mock;
  on: jest.Mock;
  send: jest.Mock;
  setHeader: jest.Mock;
  status: jest.Mock;
  type: jest.Mock;
}

export function createMockResponse(): MockResponse {
  const res: MockResponse = {
    attachment: jest.fn((filename: string) => {
      res.filename = filename;
      return res;
    }),
    body: undefined,
    headers: {},
    headersSent: false,
    json: jest.fn((body: unknown) => {
      res.body = body;
      res.headersSent = true;
      res.writableEnded = true;
      return res;
    }),
    on: jest.fn(() => res),
    send: jest.fn((body: unknown) => {
      res.body = body;
      res.headersSent = true;
      res.writableEnded = true;
      return res;
    }),
    setHeader: jest.fn((name: string, value: string) => {
      res.headers[name] = value;
      return res;
    }),
    status: jest.fn((code: number) => {
      res.statusCode = code;
      return res;
    }),
    statusCode: 200,
    type: jest.fn((contentType: string) => {
      res.contentType = contentType;
      return res;
    }),
    writableEnded: false,
  };
  return res;
}

export function createMockRequest(init: {
  body?: unknown;
  headers?: Record<string, string>;
  query?: Record<string, string>;
} = {}): Partial<Request> {
  return {
    body: init.body,
    headers: init.headers ?? {},
    log: quietLogger,
    method: 'GET',
    path: '/api/test',
    query: init.query ?? {},
  };
}

/**
 * View the mocks through the express types the handlers take.
 */
export function asExpress(req: Partial<Request>, res: MockResponse): [Request, Response] {
  return [req as Request, res as unknown as Response];
}
