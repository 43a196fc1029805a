/**
 * Express application
 *
 * Wiring only: every collaborator is passed in, so tests can build the
 * app around in-memory stores and fake sinks.
 */

import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import swaggerUi from 'swagger-ui-express';
import type { AppConfig } from './config/env';
import { createSwaggerSpec } from './config/swagger';
import { DeliveriesController } from './controllers/deliveries.controller';
import { EventsController } from './controllers/events.controller';
import { HealthController } from './controllers/health.controller';
import type { HealthProbes } from './controllers/health.controller';
import { WebhookController } from './controllers/webhook.controller';
import { correlationMiddleware } from './middleware/correlation';
import { createErrorHandler, notFoundHandler } from './middleware/error-handler';
import { createWebhookRateLimiter } from './middleware/rate-limit';
import { createDeliveriesRouter } from './routes/deliveries.routes';
import { createEventsRouter } from './routes/events.routes';
import { createWebhookRouter } from './routes/webhook.routes';
import type { DeliveryLedger } from './services/delivery-ledger.service';
import type { DurabilityLog } from './services/durability-log.service';
import type { IngestionService } from './services/ingestion.service';
import { asyncHandler } from './utils/async-handler';
import { stream } from './utils/logger';

export interface AppDependencies {
  config: Readonly<AppConfig>;
  ingestion: IngestionService;
  log: DurabilityLog;
  ledger: DeliveryLedger;
  health: HealthProbes;
}

export function createApp({ config, ingestion, log, ledger, health }: AppDependencies): Express {
  const app = express();
  const apiPrefix = `/api/${config.apiVersion}`;

  const webhookController = new WebhookController(ingestion);
  const eventsController = new EventsController(log);
  const deliveriesController = new DeliveriesController(ledger);
  const healthController = new HealthController(health, config.apiVersion);

  // Security middleware
  app.use(helmet());

  // Correlation ID middleware (must be early in chain for request tracing)
  app.use(correlationMiddleware);

  app.use(
    cors({
      origin: config.allowedOrigins,
      credentials: true,
    })
  );

  // Morgan -> Winston; silent under test along with the logger itself
  if (config.nodeEnv !== 'test') {
    app.use(morgan('combined', { stream }));
  }

  // Health check endpoint (no rate limit)
  app.get('/health', asyncHandler(healthController.checkHealth.bind(healthController)));

  // API Documentation (Swagger UI)
  const swaggerSpec = createSwaggerSpec(config.apiVersion);
  app.use('/api-docs', swaggerUi.serve);
  app.get(
    '/api-docs',
    swaggerUi.setup(swaggerSpec, {
      customCss: '.swagger-ui .topbar { display: none }',
      customSiteTitle: 'Trailhook Ingestion API',
    })
  );
  app.get('/api-docs.json', (_req, res) => {
    res.json(swaggerSpec);
  });

  // Webhook ingestion (raw body, per-IP rate limit)
  app.use(
    createWebhookRouter(config.webhookPath, webhookController, createWebhookRateLimiter(config.rateLimitPerMinute))
  );

  app.use(`${apiPrefix}/events`, createEventsRouter(eventsController));
  app.use(`${apiPrefix}/deliveries`, createDeliveriesRouter(deliveriesController));

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(createErrorHandler({ exposeInternals: config.nodeEnv !== 'production' }));

  return app;
}
