import type { RequestHandler } from 'express';
import { rateLimit } from 'express-rate-limit';

import { env } from '../../config/env.js';
import { requestLog } from './request-logger.js';
import type { ErrorResponse } from './error-handler.js';

export interface RateLimitOptions {
  windowMs: number;
  limit: number;
}

/**
 * Per-client limiter for the metadata endpoints.
 * The service keeps no state between requests, so the in-memory store is per instance.
 */
export function createRateLimiter({ windowMs, limit }: RateLimitOptions): RequestHandler {
  return rateLimit({
    windowMs,
    limit,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    handler: (req, res) => {
      requestLog(res).warn({ ip: req.ip, path: req.path, limit }, 'Rate limit exceeded');
      const response: ErrorResponse = {
        error: 'Too Many Requests',
        message: `At most ${limit} requests per ${Math.round(windowMs / 1000)}s are allowed`,
        timestamp: new Date().toISOString(),
        path: req.path
      };
      res.status(429).json(response);
    }
  });
}

const passThrough: RequestHandler = (_req, _res, next) => next();

export const apiRateLimiter: RequestHandler = env.isTest
  ? passThrough
  : createRateLimiter({ windowMs: env.RATE_LIMIT_WINDOW_MS, limit: env.RATE_LIMIT_MAX });
