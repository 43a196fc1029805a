/**
 * Events Controller
 *
 * Read side of the durability log, for audit and replay tooling:
 *   GET /api/v1/events/:idempotencyKey
 */

import type { Request, Response } from 'express';
import { BaseController } from './base.controller';
import type { DurabilityLog } from '../services/durability-log.service';
import { IdempotencyKeyParamsSchema } from '../models/dtos/webhook.dto';
import type { EventLookupResponse } from '../models/dtos/webhook.dto';
import { NotFoundError } from '../models/errors/api-error';

export class EventsController extends BaseController {
  constructor(private readonly log: DurabilityLog) {
    super();
  }

  async getEvent(req: Request, res: Response): Promise<Response> {
    const { idempotencyKey } = IdempotencyKeyParamsSchema.parse(req.params);

    const entry = await this.log.lookup(idempotencyKey);
    if (!entry) {
      throw new NotFoundError('Event');
    }

    const response: EventLookupResponse = {
      idempotencyKey: entry.idempotencyKey,
      receivedAt: entry.raw.receivedAt,
      appendedAt: entry.appendedAt,
      rawBody: {
        encoding: 'base64',
        size: entry.raw.body.length,
        data: entry.raw.body.toString('base64'),
      },
      record: entry.record,
    };

    return this.success(res, response);
  }
}
