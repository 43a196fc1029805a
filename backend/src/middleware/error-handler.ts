/**
 * Error Handler Middleware
 *
 * Global error handling with structured logging and standardized responses.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { ApiError, ValidationError } from '../models/errors/api-error';
import { errorResponse } from '../utils/response';
import { logger } from '../utils/logger';
import { zodErrorDetails } from './validation';

export interface ErrorHandlerOptions {
  /** Include internal messages and stacks in 500 responses */
  exposeInternals: boolean;
}

/** body-parser signals an oversized body with `type: 'entity.too.large'` */
function isPayloadTooLarge(err: Error): boolean {
  return Reflect.get(err, 'type') === 'entity.too.large';
}

/**
 * Global error handler middleware
 * Transforms all errors into consistent API responses
 */
export function createErrorHandler(options: ErrorHandlerOptions): ErrorRequestHandler {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      const validationError = new ValidationError('Request validation failed', zodErrorDetails(err));

      logger.warn('Validation error', {
        path: req.path,
        method: req.method,
        errors: validationError.details,
      });

      errorResponse(res, validationError);
      return;
    }

    if (err instanceof ApiError) {
      const level = err.statusCode >= 500 ? 'error' : 'warn';
      logger.log(level, 'API error', {
        code: err.code,
        message: err.message,
        statusCode: err.statusCode,
        path: req.path,
        method: req.method,
        ...(err.statusCode >= 500 && { stack: err.stack }),
      });

      errorResponse(res, err);
      return;
    }

    if (isPayloadTooLarge(err)) {
      logger.warn('Request body too large', { path: req.path, method: req.method });
      res.status(413).json({
        success: false,
        error: { code: 'PAYLOAD_TOO_LARGE', message: err.message },
      });
      return;
    }

    logger.error('Unexpected error', {
      message: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
    });

    res.status(500).json({
      success: false,
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: options.exposeInternals ? err.message : 'Internal server error',
        ...(options.exposeInternals && { stack: err.stack }),
      },
    });
  };
}

/**
 * 404 handler for unknown routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', {
    path: req.path,
    method: req.method,
  });

  res.status(404).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: 'Route not found',
      path: req.path,
    },
  });
}
