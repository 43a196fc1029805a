/**
 * Correlation ID Middleware
 *
 * Generates or extracts correlation IDs for request tracing.
 * Correlation IDs are automatically included in all log entries within the request scope.
 */

import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { asyncLocalStorage, logHelpers } from '../utils/logger';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

/**
 * Header name for correlation ID
 */
export const CORRELATION_ID_HEADER = 'x-correlation-id';

const MAX_CORRELATION_ID_LENGTH = 128;

/**
 * Middleware to generate/extract correlation ID and attach to request
 */
export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.get(CORRELATION_ID_HEADER);
  const correlationId =
    incoming && incoming.length <= MAX_CORRELATION_ID_LENGTH ? incoming : randomUUID();

  asyncLocalStorage.run({ correlationId }, () => {
    res.setHeader(CORRELATION_ID_HEADER, correlationId);
    req.correlationId = correlationId;

    const startTime = Date.now();

    logHelpers.apiRequest(req.method, req.path, {
      query: req.query,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    });

    res.on('finish', () => {
      logHelpers.apiResponse(req.method, req.path, res.statusCode, Date.now() - startTime);
    });

    next();
  });
}

/**
 * Get correlation ID from current request context
 */
export function getCorrelationId(): string | undefined {
  return asyncLocalStorage.getStore()?.correlationId;
}
