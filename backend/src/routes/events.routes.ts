/**
 * Event Lookup Routes
 *
 * Endpoints:
 *   GET /api/v1/events/:idempotencyKey — stored raw body + normalized record
 */

import { Router } from 'express';
import type { EventsController } from '../controllers/events.controller';
import { validateRequest } from '../middleware/validation';
import { asyncHandler } from '../utils/async-handler';
import { IdempotencyKeyParamsSchema } from '../models/dtos/webhook.dto';

export function createEventsRouter(controller: EventsController): Router {
  const router = Router();

  /**
   * @openapi
   * /api/v1/events/{idempotencyKey}:
   *   get:
   *     tags: [Events]
   *     summary: Look up an accepted event in the durability log
   *     parameters:
   *       - $ref: '#/components/parameters/IdempotencyKeyPath'
   *     responses:
   *       200:
   *         description: Stored event returned
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   *       404:
   *         $ref: '#/components/responses/NotFoundError'
   */
  router.get(
    '/:idempotencyKey',
    validateRequest({ params: IdempotencyKeyParamsSchema }),
    asyncHandler(controller.getEvent.bind(controller))
  );

  return router;
}
