/**
 * Delivery Ledger Routes
 *
 * Endpoints:
 *   GET /api/v1/deliveries/failed          — failed deliveries (paginated, filterable by sink)
 *   GET /api/v1/deliveries/:idempotencyKey — per-sink status of one event
 */

import { Router } from 'express';
import type { DeliveriesController } from '../controllers/deliveries.controller';
import { validateRequest } from '../middleware/validation';
import { asyncHandler } from '../utils/async-handler';
import { FailedDeliveriesQuerySchema, IdempotencyKeyParamsSchema } from '../models/dtos/webhook.dto';

export function createDeliveriesRouter(controller: DeliveriesController): Router {
  const router = Router();

  /**
   * @openapi
   * /api/v1/deliveries/failed:
   *   get:
   *     tags: [Deliveries]
   *     summary: List deliveries that exhausted their retries
   *     parameters:
   *       - name: sink
   *         in: query
   *         schema:
   *           type: string
   *           enum: [lookup, archive, stream, warehouse]
   *       - name: limit
   *         in: query
   *         schema:
   *           type: integer
   *           default: 50
   *           minimum: 1
   *           maximum: 100
   *       - name: offset
   *         in: query
   *         schema:
   *           type: integer
   *           default: 0
   *     responses:
   *       200:
   *         description: Failed ledger entries returned
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   */
  router.get(
    '/failed',
    validateRequest({ query: FailedDeliveriesQuerySchema }),
    asyncHandler(controller.listFailed.bind(controller))
  );

  /**
   * @openapi
   * /api/v1/deliveries/{idempotencyKey}:
   *   get:
   *     tags: [Deliveries]
   *     summary: Delivery status of one event across sinks
   *     description: Sinks that do not take the event (e.g. stream for non-geofence events) have no entry.
   *     parameters:
   *       - $ref: '#/components/parameters/IdempotencyKeyPath'
   *     responses:
   *       200:
   *         description: Ledger entries returned
   *       400:
   *         $ref: '#/components/responses/ValidationError'
   */
  router.get(
    '/:idempotencyKey',
    validateRequest({ params: IdempotencyKeyParamsSchema }),
    asyncHandler(controller.listForEvent.bind(controller))
  );

  return router;
}
