/**
 * Common DTOs
 *
 * Shared data transfer objects used across the API.
 */

import { z } from 'zod';

// ============================================================================
// Pagination
// ============================================================================

export const OffsetPaginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export type OffsetPaginationQuery = z.infer<typeof OffsetPaginationQuerySchema>;

export interface PaginationMeta {
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

// ============================================================================
// API Response Envelope
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
  meta?: Record<string, unknown>;
}

export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    reason?: string;
    field?: string | null;
    details?: unknown;
  };
}

// ============================================================================
// Health Check
// ============================================================================

export interface HealthCheckResponse {
  status: 'healthy' | 'degraded';
  timestamp: string;
  version: string;
  uptime: number;
  services: {
    database: ServiceHealth;
    redis: ServiceHealth;
  };
  dispatch: {
    sinks: string[];
    inFlight: number;
  };
  memory: NodeJS.MemoryUsage;
}

export interface ServiceHealth {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}
