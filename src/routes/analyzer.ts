import { Router } from 'express';

import { createArchiveController } from '../controllers/archive';
import { createExportController } from '../controllers/exports';
import { createSummaryController } from '../controllers/summaries';
import { requireWriteAuth } from '../middleware/auth';
import { requestTimeout } from '../middleware/requestTimeout';

import type { ArchiveControllerOptions } from '../controllers/archive';
import type { RecordStore } from '../store';

/**
 * Every /api route, bound to one record store.
 */
export function createAnalyzerRouter(
  store: RecordStore,
  options: ArchiveControllerOptions = {},
): Router {
  const router = Router();
  const archive = createArchiveController(store, options);
  const summaries = createSummaryController(store);
  const exports = createExportController(store);

  router.post('/archive/load', requireWriteAuth, requestTimeout, archive.load);
  router.get('/archive/status', archive.status);

  router.get('/workouts', summaries.listWorkouts);
  router.get('/summary/overview', summaries.overview);
  router.get('/summary/activities', summaries.activities);
  router.get('/summary/periods', summaries.periods);
  router.get('/totals/activities', summaries.totals);

  router.get('/export/workouts', exports.exportWorkouts);
  router.get('/export/periods', exports.exportPeriods);

  return router;
}
