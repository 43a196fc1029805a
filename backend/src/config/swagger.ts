/**
 * Swagger/OpenAPI Configuration
 *
 * API documentation using OpenAPI 3.0 specification. Path definitions live
 * in @openapi blocks beside the routes.
 */

import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';

const errorSchemaRef = { $ref: '#/components/schemas/Error' };

const swaggerDefinition = {
  openapi: '3.0.0',
  info: {
    title: 'Trailhook Ingestion API',
    version: '1.0.0',
    description: `
Webhook receiver for user location, geofence and trip events.

Each accepted event is normalized, stored durably under an idempotency key and
acknowledged; it is then delivered in the background to the lookup store
(Redis), the raw archive (S3), the geofence stream (Kinesis) and, when enabled,
the warehouse queue (SQS).

## Correlation IDs

All requests/responses include a \`X-Correlation-Id\` header for distributed tracing.
    `,
    license: {
      name: 'Proprietary',
    },
  },
  servers: [
    {
      url: 'http://localhost:3000',
      description: 'Development server',
    },
  ],
  tags: [
    { name: 'Webhook', description: 'Event ingestion' },
    { name: 'Events', description: 'Durability log lookup' },
    { name: 'Deliveries', description: 'Per-sink delivery status' },
  ],
  components: {
    schemas: {
      Error: {
        type: 'object',
        properties: {
          success: { type: 'boolean', example: false },
          error: {
            type: 'object',
            properties: {
              code: { type: 'string', example: 'VALIDATION_ERROR' },
              message: { type: 'string', example: 'location.latitude must be between -90 and 90, got 200' },
              reason: {
                type: 'string',
                enum: ['MissingField', 'OutOfRange', 'BadTimestamp', 'TypeMismatch', 'MalformedJson', 'Inconsistent'],
              },
              field: { type: 'string', nullable: true, example: 'location.latitude' },
              details: { type: 'object' },
            },
            required: ['code', 'message'],
          },
        },
        required: ['success', 'error'],
      },
      WebhookEvent: {
        type: 'object',
        required: ['location'],
        properties: {
          id: { type: 'string', description: 'Source event id; used as the idempotency source when present' },
          location: {
            type: 'object',
            required: ['user_id', 'latitude', 'longitude', 'event_type'],
            properties: {
              user_id: { type: 'string', example: '12345' },
              latitude: { type: 'number', minimum: -90, maximum: 90, example: 37.7749 },
              longitude: { type: 'number', minimum: -180, maximum: 180, example: -122.4194 },
              timestamp: {
                type: 'string',
                description: 'ISO-8601 or epoch seconds/milliseconds; defaults to receipt time',
              },
              event_type: {
                type: 'string',
                enum: [
                  'location_update',
                  'geofence_enter',
                  'geofence_exit',
                  'trip_started',
                  'trip_updated',
                  'trip_completed',
                ],
              },
            },
          },
          trip: { type: 'object' },
          user: { type: 'object' },
        },
      },
      WebhookAck: {
        type: 'object',
        properties: {
          success: { type: 'boolean', example: true },
          data: {
            type: 'object',
            properties: {
              idempotencyKey: { type: 'string' },
              duplicate: { type: 'boolean' },
              receivedAt: { type: 'string', format: 'date-time' },
            },
          },
        },
      },
    },
    parameters: {
      IdempotencyKeyPath: {
        name: 'idempotencyKey',
        in: 'path',
        required: true,
        schema: { type: 'string', pattern: '^[0-9a-f]{64}$' },
      },
    },
    responses: {
      NotFoundError: {
        description: 'Resource not found',
        content: { 'application/json': { schema: errorSchemaRef } },
      },
      ValidationError: {
        description: 'Invalid request data',
        content: { 'application/json': { schema: errorSchemaRef } },
      },
      RateLimitError: {
        description: 'Rate limit exceeded',
        headers: {
          'Retry-After': {
            schema: { type: 'integer' },
            description: 'Seconds to wait before retrying',
          },
        },
        content: { 'application/json': { schema: errorSchemaRef } },
      },
    },
  },
};

export function createSwaggerSpec(apiVersion: string): object {
  return swaggerJsdoc({
    swaggerDefinition: {
      ...swaggerDefinition,
      info: { ...swaggerDefinition.info, version: apiVersion },
    },
    apis: [path.join(__dirname, '../routes/*.{ts,js}')],
  });
}
