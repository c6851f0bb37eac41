import { timingSafeEqual } from 'node:crypto';

import { AuthConfig, HttpStatus } from '../config';
import '../types/express';

import type { NextFunction, Request, Response } from 'express';

/**
 * Read a single-valued header; repeated headers count as missing.
 */
export function readHeader(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Determine the reason for auth failure (for logging purposes only).
 */
function getAuthFailureReason(token: string | undefined): string {
  if (!token) return 'missing_token';
  if (!token.startsWith(AuthConfig.tokenPrefix)) return 'invalid_format';
  return 'token_mismatch';
}

/**
 * Timing-safe token comparison.
 */
function isValidToken(provided: string, expected: string): boolean {
  const providedBuf = Buffer.from(provided);
  const expectedBuf = Buffer.from(expected);
  if (providedBuf.length !== expectedBuf.length) {
    return false;
  }
  return timingSafeEqual(providedBuf, expectedBuf);
}

/**
 * Guards the routes that replace the loaded archive.
 * The expected token is read from WRITE_TOKEN on every request.
 */
export const requireWriteAuth = (req: Request, res: Response, next: NextFunction): void => {
  const token = readHeader(req, AuthConfig.headerName);
  const writeToken = process.env[AuthConfig.tokenEnvVar] ?? '';

  if (
    !token ||
    !writeToken ||
    !token.startsWith(AuthConfig.tokenPrefix) ||
    !isValidToken(token, writeToken)
  ) {
    req.log.warn('Write authentication failed', {
      path: req.path,
      reason: getAuthFailureReason(token),
    });
    res.status(HttpStatus.UNAUTHORIZED).json({ error: 'Unauthorized: Invalid write token' });
    return;
  }

  req.log.debug('Write authentication successful');
  next();
};
