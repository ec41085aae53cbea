/**
 * In-memory sliding-window rate limiter middleware.
 *
 * Guards the token endpoint against credential stuffing. Keyed by client
 * address; single-process only.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, rateLimitedError } from '../domain/errors';

export interface RateLimitOptions {
  /** Maximum requests allowed within the window. Default: 60 */
  maxRequests?: number;
  /** Window duration in milliseconds. Default: 60_000 (1 minute) */
  windowMs?: number;
  now?: () => number;
}

/**
 * Create a rate-limiting middleware.
 *
 * Sets RateLimit-Limit and RateLimit-Remaining on every response, and
 * Retry-After with a 429 once the window is full.
 */
export function rateLimit(options: RateLimitOptions = {}) {
  const maxRequests = options.maxRequests ?? 60;
  const windowMs = options.windowMs ?? 60_000;
  const now = options.now ?? Date.now;
  const windows = new Map<string, number[]>();

  // Drop idle clients so the map does not grow without bound
  const sweep = setInterval(() => {
    const cutoff = now() - windowMs;
    for (const [key, timestamps] of windows) {
      const live = timestamps.filter((t) => t > cutoff);
      if (live.length === 0) windows.delete(key);
      else windows.set(key, live);
    }
  }, windowMs);
  sweep.unref();

  return (req: Request, res: Response, next: NextFunction) => {
    const key = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const at = now();
    const timestamps = (windows.get(key) ?? []).filter((t) => t > at - windowMs);
    windows.set(key, timestamps);

    res.set('RateLimit-Limit', String(maxRequests));

    if (timestamps.length >= maxRequests) {
      const retryAfterMs = timestamps[0] + windowMs - at;
      res.set('RateLimit-Remaining', '0');
      res.set('Retry-After', String(Math.ceil(retryAfterMs / 1000)));
      res.status(429).json(apiError(rateLimitedError(retryAfterMs, maxRequests, windowMs)));
      return;
    }

    timestamps.push(at);
    res.set('RateLimit-Remaining', String(maxRequests - timestamps.length));
    next();
  };
}
