/**
 * Webhook Routes
 *
 * The body is read raw (any content type, up to 1 MB) so the exact bytes
 * the sender produced can be persisted and hashed.
 */

import express, { Router } from 'express';
import type { RequestHandler } from 'express';
import type { WebhookController } from '../controllers/webhook.controller';
import { asyncHandler } from '../utils/async-handler';

export const WEBHOOK_BODY_LIMIT = '1mb';

export function createWebhookRouter(
  path: string,
  controller: WebhookController,
  rateLimiter: RequestHandler
): Router {
  const router = Router();

  /**
   * @openapi
   * /webhook-endpoint:
   *   post:
   *     tags: [Webhook]
   *     summary: Receive a location webhook event
   *     description: |
   *       Accepts one JSON event describing a user location update, geofence
   *       transition or trip change. The response is sent once the event is
   *       durably stored; delivery to downstream sinks happens afterwards.
   *
   *       Re-sending the same event is safe: the response is 202 with
   *       `duplicate: true` and nothing is delivered twice.
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/WebhookEvent'
   *     responses:
   *       202:
   *         description: Event accepted
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/WebhookAck'
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   *       413:
   *         description: Body larger than 1 MB
   *       429:
   *         $ref: '#/components/responses/RateLimitError'
   *       500:
   *         description: Event could not be stored; retry the delivery
   */
  router.post(
    path,
    rateLimiter,
    express.raw({ type: () => true, limit: WEBHOOK_BODY_LIMIT }),
    asyncHandler(controller.receive.bind(controller))
  );

  return router;
}
