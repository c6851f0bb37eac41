/**
 * Request timeout middleware.
 * Answers 408 once the processing time is exceeded and aborts
 * `req.timeoutSignal` so long-running work (an archive load) can stop.
 */

import { HttpStatus, RequestConfig } from '../config';
import '../types/express';

import type { NextFunction, Request, Response } from 'express';

/**
 * Create a request timeout middleware with configurable timeout.
 */
export function createRequestTimeout(timeoutMs: number = RequestConfig.timeoutMs) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const controller = new AbortController();
    req.timeoutSignal = controller.signal;
    req.socket.setTimeout(timeoutMs);

    const timer = setTimeout(() => {
      controller.abort();
      if (!res.headersSent) {
        req.log.warn('Request timeout exceeded', {
          method: req.method,
          path: req.path,
          timeoutMs,
        });
        res.status(HttpStatus.REQUEST_TIMEOUT).json({
          error: 'Request timeout',
          message: `Request processing exceeded ${String(timeoutMs / 1000)} seconds`,
        });
      }
    }, timeoutMs);

    res.on('finish', () => {
      clearTimeout(timer);
    });

    res.on('close', () => {
      clearTimeout(timer);
    });

    next();
  };
}

/**
 * Default request timeout middleware (REQUEST_TIMEOUT_MS, 10 minutes by default).
 */
export const requestTimeout = createRequestTimeout();
