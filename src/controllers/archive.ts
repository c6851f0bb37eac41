import { HttpStatus } from '../config';
import { isLoading, loadArchive } from '../loader';
import '../types/express';
import { debugResponse } from '../utils/debugLogger';
import { LoadArchiveSchema } from '../validation/schemas';
import { sendError, validate } from './respond';

import type { Request, Response } from 'express';
import type { LoadResult } from '../loader';
import type { RecordStore } from '../store';

export interface ArchiveControllerOptions {
  /** Entry paths accepted as the export document. */
  documentPattern?: RegExp;
}

function toLoadResponse(result: LoadResult) {
  return {
    count: result.count,
    diagnostics: result.diagnostics,
    documentPath: result.documentPath,
    error: result.error && {
      column: result.error.column,
      line: result.error.line,
      message: result.error.message,
      recordsEmitted: result.error.recordsEmitted,
    },
    source: result.source,
    stats: result.stats,
    status: result.status,
  };
}

export function createArchiveController(store: RecordStore, options: ArchiveControllerOptions = {}) {
  /**
   * POST /api/archive/load
   * Replaces the store with the workouts of the archive at `path` on this
   * machine. 207 when the document was cut short and only a prefix loaded.
   */
  const load = async (req: Request, res: Response): Promise<void> => {
    const body = validate(LoadArchiveSchema, req.body, req, res);
    if (!body) return;

    const { log } = req;
    const abort = new AbortController();
    const cancel = () => {
      abort.abort();
    };
    req.timeoutSignal?.addEventListener('abort', cancel, { once: true });
    res.on('close', () => {
      if (!res.writableEnded) cancel();
    });

    try {
      const result = await loadArchive(body.path, store, {
        documentPattern: options.documentPattern,
        logger: log,
        signal: abort.signal,
      });
      const statusCode = result.status === 'partial' ? HttpStatus.MULTI_STATUS : HttpStatus.OK;
      debugResponse(log, statusCode, { count: result.count, status: result.status });
      res.status(statusCode).json(toLoadResponse(result));
    } catch (error) {
      sendError(req, res, error, 'Failed to load archive');
    } finally {
      req.timeoutSignal?.removeEventListener('abort', cancel);
    }
  };

  /**
   * GET /api/archive/status
   */
  const status = (_req: Request, res: Response): void => {
    const info = store.info();
    res.status(HttpStatus.OK).json({
      activityTypes: store.activityTypes(),
      count: store.count(),
      dateBounds: store.dateBounds() ?? null,
      error: info.error ?? null,
      loadedAt: info.loadedAt?.toISOString() ?? null,
      loading: isLoading(store),
      source: info.source ?? null,
      status: info.status,
    });
  };

  return { load, status };
}
