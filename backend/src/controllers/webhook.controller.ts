/**
 * Webhook Controller
 *
 * POST {WEBHOOK_PATH}
 * Receives the raw body of a location webhook, hands it to the ingestion
 * service and maps the outcome onto HTTP:
 *   ack    → 202 (also for duplicates)
 *   reject → 400 with reason and field
 *   DurabilityError → 500 via the error handler; the sender retries
 */

import type { Request, Response } from 'express';
import { BaseController } from './base.controller';
import type { IngestionService } from '../services/ingestion.service';
import type { WebhookAckResponse } from '../models/dtos/webhook.dto';
import { ValidationError } from '../models/errors/api-error';

export class WebhookController extends BaseController {
  constructor(private readonly ingestion: IngestionService) {
    super();
  }

  async receive(req: Request, res: Response): Promise<Response> {
    const receivedAt = new Date().toISOString();
    // express.raw leaves `{}` when there is no body at all
    const body: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

    const outcome = await this.ingestion.handle(body, { receivedAt });

    if (outcome.kind === 'reject') {
      throw ValidationError.fromIssue(outcome.issue);
    }

    const response: WebhookAckResponse = {
      idempotencyKey: outcome.idempotencyKey,
      duplicate: outcome.duplicate,
      receivedAt: outcome.receivedAt,
    };

    return this.accepted(res, response);
  }
}
