/**
 * Validation Middleware
 *
 * Centralized Zod schema validation for query and params.
 * Passes a ValidationError to next() if validation fails.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import type { ZodTypeAny } from 'zod';
import { ValidationError } from '../models/errors/api-error';

interface ValidationSchemas {
  query?: ZodTypeAny;
  params?: ZodTypeAny;
}

export function zodErrorDetails(error: ZodError): Array<{ path: string; message: string; code: string }> {
  return error.errors.map((err) => ({
    path: err.path.join('.'),
    message: err.message,
    code: err.code,
  }));
}

/**
 * Validate request using Zod schemas. Controllers parse again with the
 * same schema to obtain typed values; the middleware only gates the route.
 */
export function validateRequest(schemas: ValidationSchemas) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      schemas.query?.parse(req.query);
      schemas.params?.parse(req.params);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        next(new ValidationError('Request validation failed', zodErrorDetails(error)));
      } else {
        next(error);
      }
    }
  };
}
