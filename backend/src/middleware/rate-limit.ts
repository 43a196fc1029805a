/**
 * Rate Limiting Middleware
 *
 * Per-IP fixed-window limiting for the webhook route (in-memory store).
 * Returns 429 Too Many Requests with Retry-After and the standard
 * RateLimit-* headers.
 */

import rateLimit from 'express-rate-limit';
import type { Options, RateLimitRequestHandler } from 'express-rate-limit';
import type { NextFunction, Request, Response } from 'express';
import { logHelpers } from '../utils/logger';

export interface RateLimiterConfig {
  windowMs: number;
  max: number;
  prefix: string;
}

function rateLimitExceededHandler(prefix: string) {
  return (req: Request, res: Response, _next: NextFunction, options: Options): void => {
    const retryAfter = Math.ceil(options.windowMs / 1000);

    logHelpers.security('rate_limit_exceeded', 'medium', {
      limiter: prefix,
      path: req.path,
      method: req.method,
      ip: req.ip,
      retryAfter,
    });

    res.setHeader('Retry-After', String(retryAfter));
    res.status(options.statusCode).json({
      success: false,
      error: {
        code: 'RATE_LIMITED',
        message: 'Rate limit exceeded. Please try again later.',
        retryAfter,
      },
    });
  };
}

export function createRateLimiter(config: RateLimiterConfig): RateLimitRequestHandler {
  return rateLimit({
    windowMs: config.windowMs,
    limit: config.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: rateLimitExceededHandler(config.prefix),
  });
}

export function createWebhookRateLimiter(perMinute: number): RateLimitRequestHandler {
  return createRateLimiter({ windowMs: 60 * 1000, max: perMinute, prefix: 'webhook' });
}
