import { z } from 'zod';
import { sinkNameSchema } from '@trailhook/shared';
import type { NormalizedRecord, SinkName } from '@trailhook/shared';
import { OffsetPaginationQuerySchema } from './common.dto';
import type { PaginationMeta } from './common.dto';

// ============================================================================
// Query / request schemas
// ============================================================================

/** Path param for endpoints addressed by idempotency key (SHA-256 hex) */
export const IdempotencyKeyParamsSchema = z.object({
  idempotencyKey: z
    .string()
    .regex(/^[0-9a-f]{64}$/, 'idempotencyKey must be a 64-character lowercase hex SHA-256 digest'),
});

export type IdempotencyKeyParams = z.infer<typeof IdempotencyKeyParamsSchema>;

/** Query params for GET /deliveries/failed */
export const FailedDeliveriesQuerySchema = OffsetPaginationQuerySchema.extend({
  sink: sinkNameSchema.optional(),
});

export type FailedDeliveriesQuery = z.infer<typeof FailedDeliveriesQuerySchema>;

// ============================================================================
// Response types (documentation / OpenAPI)
// ============================================================================

export interface WebhookAckResponse {
  idempotencyKey: string;
  /** true when the event had already been accepted earlier */
  duplicate: boolean;
  receivedAt: string;
}

export interface EventLookupResponse {
  idempotencyKey: string;
  receivedAt: string;
  appendedAt: string;
  rawBody: {
    encoding: 'base64';
    size: number;
    data: string;
  };
  record: NormalizedRecord;
}

export interface LedgerEntryResponse {
  idempotencyKey: string;
  sink: SinkName;
  state: 'pending' | 'delivered' | 'failed';
  reason: string | null;
  attempts: number;
  updatedAt: string;
}

export interface FailedDeliveriesResponse {
  entries: LedgerEntryResponse[];
  pagination: PaginationMeta;
}
