/**
 * Deliveries Controller
 *
 * Read side of the delivery ledger:
 *   GET /api/v1/deliveries/failed          — failed (key, sink) pairs, newest first
 *   GET /api/v1/deliveries/:idempotencyKey — every sink's status for one event
 *
 * Re-driving failed deliveries is handled outside this service; these
 * endpoints are what such a process reads.
 */

import type { Request, Response } from 'express';
import { BaseController } from './base.controller';
import type { DeliveryLedger } from '../services/delivery-ledger.service';
import type { LedgerEntry } from '../repositories';
import { FailedDeliveriesQuerySchema, IdempotencyKeyParamsSchema } from '../models/dtos/webhook.dto';
import type { FailedDeliveriesResponse, LedgerEntryResponse } from '../models/dtos/webhook.dto';
import { logger } from '../utils/logger';

export function toLedgerEntryResponse(entry: LedgerEntry): LedgerEntryResponse {
  return {
    idempotencyKey: entry.idempotencyKey,
    sink: entry.sink,
    state: entry.status.state,
    reason: entry.status.state === 'failed' ? entry.status.reason : null,
    attempts: entry.attempts,
    updatedAt: entry.updatedAt,
  };
}

export class DeliveriesController extends BaseController {
  constructor(private readonly ledger: DeliveryLedger) {
    super();
  }

  async listFailed(req: Request, res: Response): Promise<Response> {
    const { sink, limit, offset } = FailedDeliveriesQuerySchema.parse(req.query);

    const result = await this.ledger.listFailed({ sink, limit, offset });

    const response: FailedDeliveriesResponse = {
      entries: result.entries.map(toLedgerEntryResponse),
      pagination: this.buildPaginationMeta(limit, offset, result.total),
    };

    logger.debug('Failed deliveries listed', {
      sink,
      total: result.total,
      returned: result.entries.length,
    });

    return this.success(res, response);
  }

  async listForEvent(req: Request, res: Response): Promise<Response> {
    const { idempotencyKey } = IdempotencyKeyParamsSchema.parse(req.params);

    const entries = await this.ledger.listForKey(idempotencyKey);

    return this.success(res, { idempotencyKey, deliveries: entries.map(toLedgerEntryResponse) });
  }
}
