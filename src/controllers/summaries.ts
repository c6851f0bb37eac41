import {
  filterRecords,
  metricTotalsByActivity,
  overviewTotals,
  parseGranularity,
  summarizeByActivity,
  summarizeByPeriod,
} from '../aggregation';
import { HttpStatus } from '../config';
import '../types/express';
import { debugAggregation } from '../utils/debugLogger';
import { PeriodQuerySchema, RecordFilterSchema, TotalsQuerySchema } from '../validation/schemas';
import { sendError, validate } from './respond';

import type { Request, Response } from 'express';
import type { RecordStore } from '../store';

export function createSummaryController(store: RecordStore) {
  /**
   * GET /api/workouts
   */
  const listWorkouts = (req: Request, res: Response): void => {
    const filter = validate(RecordFilterSchema, req.query, req, res);
    if (!filter) return;

    const records = filterRecords(store.all(), filter);
    res.status(HttpStatus.OK).json({ count: records.length, data: records });
  };

  /**
   * GET /api/summary/overview
   */
  const overview = (req: Request, res: Response): void => {
    const filter = validate(RecordFilterSchema, req.query, req, res);
    if (!filter) return;

    const records = filterRecords(store.all(), filter);
    res.status(HttpStatus.OK).json(overviewTotals(records));
  };

  /**
   * GET /api/summary/activities
   */
  const activities = (req: Request, res: Response): void => {
    const filter = validate(RecordFilterSchema, req.query, req, res);
    if (!filter) return;

    const records = filterRecords(store.all(), filter);
    const summaries = summarizeByActivity(records);
    debugAggregation(req.log, 'summarizeByActivity', {
      inputCount: records.length,
      outputCount: Object.keys(summaries).length,
    });
    res.status(HttpStatus.OK).json(summaries);
  };

  /**
   * GET /api/summary/periods?granularity=week|month|quarter|year
   * Optional `smoothing` (window size) and `dense=true`.
   */
  const periods = (req: Request, res: Response): void => {
    const query = validate(PeriodQuerySchema, req.query, req, res);
    if (!query) return;

    try {
      const granularity = parseGranularity(query.granularity);
      const records = filterRecords(store.all(), query);
      const buckets = summarizeByPeriod(records, granularity, {
        dense: query.dense,
        smoothingWindow: query.smoothing,
      });
      debugAggregation(req.log, 'summarizeByPeriod', {
        inputCount: records.length,
        options: { dense: query.dense, granularity, smoothing: query.smoothing },
        outputCount: buckets.length,
      });
      res.status(HttpStatus.OK).json({ buckets, granularity });
    } catch (error) {
      sendError(req, res, error, 'Failed to summarize by period');
    }
  };

  /**
   * GET /api/totals/activities?metric=distanceKm
   * Per-activity sums with the smallest activities merged into "Others".
   */
  const totals = (req: Request, res: Response): void => {
    const query = validate(TotalsQuerySchema, req.query, req, res);
    if (!query) return;

    const records = filterRecords(store.all(), query);
    const data = metricTotalsByActivity(records, query.metric, {
      combinationThreshold: query.threshold,
      unit: query.unit,
    });
    debugAggregation(req.log, 'metricTotalsByActivity', {
      inputCount: records.length,
      options: { metric: query.metric, threshold: query.threshold },
      outputCount: data.length,
    });
    res.status(HttpStatus.OK).json({
      data,
      metric: query.metric,
      unit: query.metric === 'distanceKm' ? query.unit : undefined,
    });
  };

  return { activities, listWorkouts, overview, periods, totals };
}
