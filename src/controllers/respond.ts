/**
 * Shared request validation and error responses for the controllers.
 */

import { HttpStatus } from '../config';
import { getErrorCode, httpStatusForError, isAnalyzerError, toError } from '../errors';
import '../types/express';
import { debugRequest } from '../utils/debugLogger';

import type { Request, Response } from 'express';
import type { z } from 'zod';

/**
 * Parse `input` with `schema`. On failure a 400 with the zod issues is sent
 * and `undefined` returned; the caller just returns.
 */
export function validate<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  input: unknown,
  req: Request,
  res: Response,
): Output | undefined {
  const result = schema.safeParse(input);
  if (!result.success) {
    req.log.warn('Invalid request', { errors: result.error.issues, path: req.path });
    res.status(HttpStatus.BAD_REQUEST).json({
      details: result.error.issues,
      error: 'Invalid request format',
    });
    return undefined;
  }
  debugRequest(req.log, result.data, { path: req.path });
  return result.data;
}

/**
 * Answer with the status mapped from the error's code.
 * Analyzer errors expose their code and metadata; anything else is a 500.
 */
export function sendError(req: Request, res: Response, error: unknown, message: string): void {
  const status = httpStatusForError(error);
  if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
    req.log.error(message, error);
  } else {
    req.log.warn(message, { code: getErrorCode(error), reason: toError(error).message });
  }

  if (res.headersSent) return;

  if (isAnalyzerError(error)) {
    res.status(status).json({ code: error.code, error: error.message, metadata: error.metadata });
    return;
  }
  res.status(status).json({
    error: message,
    message: toError(error).message,
  });
}
