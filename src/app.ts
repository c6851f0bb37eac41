import cors from 'cors';
import express from 'express';

import { CorsConfig, HttpStatus, ServerConfig } from './config';
import { createRateLimit } from './middleware/rateLimit';
import { requestLogger } from './middleware/requestLogger';
import { createAnalyzerRouter } from './routes/analyzer';
import { toError } from './errors';
import './types/express';

import type { NextFunction, Request, Response } from 'express';
import type { ArchiveControllerOptions } from './controllers/archive';
import type { RecordStore } from './store';

/**
 * Build the HTTP application around `store`. Listening is left to the caller.
 */
export function createApp(store: RecordStore, options: ArchiveControllerOptions = {}) {
  const app = express();
  app.disable('x-powered-by'); // Prevent version disclosure

  // eslint-disable-next-line sonarjs/cors -- read-only analytics API, writes need a token
  app.use(
    cors({
      allowedHeaders: CorsConfig.allowedHeaders,
      methods: CorsConfig.allowedMethods,
      origin: CorsConfig.origins,
    }),
  );

  // Everything after the logger can rely on req.log
  app.use(requestLogger);
  app.use(createRateLimit());
  app.use(express.json({ limit: ServerConfig.bodyLimit }));

  app.use('/api', createAnalyzerRouter(store, options));

  app.get('/health', (_req: Request, res: Response) => {
    res.status(HttpStatus.OK).send('OK');
  });

  app.use((req: Request, res: Response) => {
    res.status(HttpStatus.NOT_FOUND).json({ error: `Not found: ${req.method} ${req.path}` });
  });

  // Body parser failures (bad JSON, oversized payloads) carry their own status
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = toError(err);
    const status =
      'status' in error && typeof error.status === 'number'
        ? error.status
        : HttpStatus.INTERNAL_SERVER_ERROR;
    req.log.warn('Request failed before reaching a controller', { reason: error.message, status });
    if (res.headersSent) return;
    res.status(status).json({ error: error.message });
  });

  return app;
}
