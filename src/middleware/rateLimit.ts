/**
 * In-memory rate limiting middleware.
 * Fixed window per client IP; counters are per process.
 */

import { HttpStatus, RateLimitConfig } from '../config';
import '../types/express';

import type { NextFunction, Request, Response } from 'express';

export interface RateLimitOptions {
  /** Maximum number of requests allowed in the time window */
  maxRequests: number;
  /** Paths that are never limited (e.g., health checks) */
  skipPaths?: readonly string[];
  /** Time window in milliseconds */
  windowMs: number;
}

export interface RateLimiter {
  (req: Request, res: Response, next: NextFunction): void;
  /** Forget every client's counter. */
  reset: () => void;
}

interface WindowCounter {
  count: number;
  resetTime: number;
}

const DEFAULT_OPTIONS: RateLimitOptions = {
  maxRequests: RateLimitConfig.maxRequests,
  skipPaths: RateLimitConfig.skipPaths,
  windowMs: RateLimitConfig.windowMs,
};

/**
 * Get client IP address from request.
 * Honours X-Forwarded-For (first hop) and X-Real-IP.
 */
export function getClientIp(req: Request): string {
  const forwardedFor = req.headers['x-forwarded-for'];
  if (forwardedFor) {
    const ips = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
    return ips.split(',')[0].trim();
  }

  const realIp = req.headers['x-real-ip'];
  if (realIp) {
    return Array.isArray(realIp) ? realIp[0] : realIp;
  }

  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/**
 * Create a rate limiting middleware with its own counters.
 */
export function createRateLimit(options: Partial<RateLimitOptions> = {}): RateLimiter {
  const settings = { ...DEFAULT_OPTIONS, ...options };
  const counters = new Map<string, WindowCounter>();

  // Drop expired windows every two windows; never keeps the process alive
  const sweep = setInterval(() => {
    const now = Date.now();
    for (const [key, counter] of counters) {
      if (counter.resetTime <= now) counters.delete(key);
    }
  }, settings.windowMs * 2);
  sweep.unref();

  const limiter = (req: Request, res: Response, next: NextFunction): void => {
    if (settings.skipPaths?.includes(req.path)) {
      next();
      return;
    }

    const clientIp = getClientIp(req);
    const now = Date.now();

    let counter = counters.get(clientIp);
    if (!counter || counter.resetTime <= now) {
      counter = { count: 0, resetTime: now + settings.windowMs };
      counters.set(clientIp, counter);
    }
    counter.count++;

    const remaining = Math.max(0, settings.maxRequests - counter.count);
    const resetSeconds = Math.ceil((counter.resetTime - now) / 1000);

    res.setHeader('X-RateLimit-Limit', String(settings.maxRequests));
    res.setHeader('X-RateLimit-Remaining', String(remaining));
    res.setHeader('X-RateLimit-Reset', String(resetSeconds));

    if (counter.count > settings.maxRequests) {
      req.log.warn('Rate limit exceeded', {
        clientIp,
        limit: settings.maxRequests,
        path: req.path,
        requests: counter.count,
        resetIn: resetSeconds,
      });

      res.setHeader('Retry-After', String(resetSeconds));
      res.status(HttpStatus.TOO_MANY_REQUESTS).json({
        error: 'Too many requests',
        message: `Rate limit exceeded. Try again in ${String(resetSeconds)} seconds.`,
        retryAfter: resetSeconds,
      });
      return;
    }

    next();
  };

  return Object.assign(limiter, {
    reset: () => {
      counters.clear();
    },
  });
}
