/**
 * Base Controller
 *
 * Provides common functionality for all controllers:
 * - Standardized response formatting
 * - Pagination helpers
 */

import type { Response } from 'express';
import type { PaginationMeta } from '../models/dtos/common.dto';
import { acceptedResponse, successResponse } from '../utils/response';

export class BaseController {
  /**
   * Send successful response with data
   */
  protected success<T>(res: Response, data: T, meta?: Record<string, unknown>) {
    return successResponse(res, data, meta);
  }

  /**
   * Send accepted response (202)
   */
  protected accepted<T>(res: Response, data: T, meta?: Record<string, unknown>) {
    return acceptedResponse(res, data, meta);
  }

  /**
   * Build offset pagination metadata
   */
  protected buildPaginationMeta(limit: number, offset: number, total: number): PaginationMeta {
    return {
      total,
      limit,
      offset,
      hasMore: offset + limit < total,
    };
  }
}
