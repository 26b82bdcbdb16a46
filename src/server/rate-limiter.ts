/**
 * Per-address request limiter for the snapshot routes, built on express-rate-limit.
 */

import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';

export interface PriceRateLimitConfig {
  /** Accepted requests per address inside one window */
  limit: number;
  /** Window length in ms (default: 60000) */
  windowMs?: number;
  /** Called with the caller's address for every refused request */
  onLimited?: (remoteAddress: string) => void;
}

export function createPriceRateLimiter(config: PriceRateLimitConfig): RateLimitRequestHandler {
  if (!Number.isInteger(config.limit) || config.limit <= 0) {
    throw new Error(`Rate limit must be a positive integer, got ${config.limit}`);
  }

  return rateLimit({
    windowMs: config.windowMs ?? 60_000,
    limit: config.limit,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res, _next, options) => {
      config.onLimited?.(req.ip ?? req.socket.remoteAddress ?? 'unknown');
      res.status(options.statusCode).json({ error: 'rate limit exceeded' });
    },
  });
}
