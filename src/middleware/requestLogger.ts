import { AuthConfig } from '../config';
import '../types/express';
import { logger as rootLogger } from '../utils/logger';
import { readHeader } from './auth';

import type { NextFunction, Request, Response } from 'express';
import type { LogContext } from '../utils/logger';

/**
 * Generate a unique correlation ID for request tracing.
 */
function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 8);
  return `req-${timestamp}-${random}`;
}

/**
 * Mask sensitive header values for safe logging.
 */
export function maskSensitiveValue(value: string): string {
  if (!value) return '';
  if (value.startsWith(AuthConfig.tokenPrefix) && value.length > 6) {
    return `${AuthConfig.tokenPrefix}****${value.slice(-4)}`;
  }
  return '****';
}

/**
 * Extract safe headers for logging (masks sensitive values).
 */
function getSafeHeaders(req: Request): LogContext {
  const headers: LogContext = {};

  if (req.headers['content-type']) {
    headers.contentType = req.headers['content-type'];
  }
  if (req.headers['user-agent']) {
    headers.userAgent = req.headers['user-agent'];
  }
  // Log presence of api-key but never the value
  const apiKey = readHeader(req, AuthConfig.headerName);
  if (apiKey) {
    headers.hasApiKey = true;
    headers.apiKeyPrefix = maskSensitiveValue(apiKey);
  }

  return headers;
}

/**
 * Request logging middleware.
 * Generates correlation ID, attaches logger to request, logs request and
 * completion once the response has been sent.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  req.correlationId = generateCorrelationId();
  req.startTime = Date.now();
  req.log = rootLogger.child({}, req.correlationId);

  req.log.info('Incoming request', {
    headers: getSafeHeaders(req),
    ip: req.ip ?? req.socket.remoteAddress,
    method: req.method,
    path: req.path,
    query: Object.keys(req.query).length > 0 ? req.query : undefined,
  });

  res.on('finish', () => {
    const durationMs = Date.now() - req.startTime;
    const statusCode = res.statusCode;
    const logLevel = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';

    req.log[logLevel]('Request completed', {
      contentLength: res.get('content-length'),
      durationMs,
      method: req.method,
      path: req.path,
      statusCode,
    });
  });

  next();
}
