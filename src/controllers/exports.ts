import { filterRecords, parseGranularity, summarizeByPeriod } from '../aggregation';
import { HttpStatus } from '../config';
import { periodSeriesToCsv, periodSeriesToJson, workoutsToCsv, workoutsToJson } from '../export';
import '../types/express';
import { debugResponse } from '../utils/debugLogger';
import { PeriodExportQuerySchema, WorkoutExportQuerySchema } from '../validation/schemas';
import { sendError, validate } from './respond';

import type { Request, Response } from 'express';
import type { RecordStore } from '../store';

type ExportFormat = 'csv' | 'json';

function sendDocument(res: Response, format: ExportFormat, baseName: string, body: string): void {
  res
    .status(HttpStatus.OK)
    .type(format === 'csv' ? 'text/csv' : 'application/json')
    .attachment(`${baseName}.${format}`)
    .send(body);
}

export function createExportController(store: RecordStore) {
  /**
   * GET /api/export/workouts?format=csv|json
   */
  const exportWorkouts = (req: Request, res: Response): void => {
    const query = validate(WorkoutExportQuerySchema, req.query, req, res);
    if (!query) return;

    const records = filterRecords(store.all(), query);
    const body = query.format === 'csv' ? workoutsToCsv(records) : workoutsToJson(records);
    debugResponse(req.log, HttpStatus.OK, { count: records.length, format: query.format });
    sendDocument(res, query.format, 'workouts', body);
  };

  /**
   * GET /api/export/periods?format=csv|json&granularity=month
   */
  const exportPeriods = (req: Request, res: Response): void => {
    const query = validate(PeriodExportQuerySchema, req.query, req, res);
    if (!query) return;

    try {
      const granularity = parseGranularity(query.granularity);
      const buckets = summarizeByPeriod(filterRecords(store.all(), query), granularity, {
        dense: query.dense,
        smoothingWindow: query.smoothing,
      });
      const body = query.format === 'csv' ? periodSeriesToCsv(buckets) : periodSeriesToJson(buckets);
      debugResponse(req.log, HttpStatus.OK, { count: buckets.length, format: query.format });
      sendDocument(res, query.format, `periods-${granularity}`, body);
    } catch (error) {
      sendError(req, res, error, 'Failed to export periods');
    }
  };

  return { exportPeriods, exportWorkouts };
}
