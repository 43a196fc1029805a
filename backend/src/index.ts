/**
 * Trailhook Ingestion Server
 *
 * Bootstrap: load configuration, build clients, stores and sinks, start
 * the HTTP server, and drain in-flight dispatches on shutdown.
 */

import dotenv from 'dotenv';
import type { Server } from 'http';
import { createApp } from './app';
import { createAwsClients, destroyAwsClients } from './config/aws';
import { loadConfig } from './config/env';
import { createRedisClient, disconnectRedis, maskRedisUrl } from './config/redis';
import { createSupabaseClient } from './config/supabase';
import { createRepositories } from './repositories';
import { DeliveryLedger } from './services/delivery-ledger.service';
import { DurabilityLog } from './services/durability-log.service';
import { IngestionService } from './services/ingestion.service';
import { SinkDispatcher } from './services/sink-dispatcher.service';
import { buildSinks } from './sinks';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

const config = loadConfig();
if (config.logLevel) {
  logger.level = config.logLevel;
}

const supabase = createSupabaseClient(config.supabase);
const repositories = createRepositories(supabase);
const redis = createRedisClient(config.redis);
const aws = createAwsClients(config.aws);

const { sinks, archive } = buildSinks(
  config.sinks,
  {
    redis: { hSet: (key, field, value) => redis.hSet(key, field, value) },
    s3: { send: (command, options) => aws.s3.send(command, options) },
    kinesis: { send: (command, options) => aws.kinesis.send(command, options) },
    sqs: { send: (command, options) => aws.sqs.send(command, options) },
  },
  {
    bucket: config.aws.bucket,
    streamName: config.aws.streamName,
    warehouseQueueUrl: config.aws.warehouseQueueUrl,
  }
);

const log = new DurabilityLog(repositories.webhookLog);
const ledger = new DeliveryLedger(repositories.deliveryLedger);
const dispatcher = new SinkDispatcher(sinks, ledger, config.retry);
const ingestion = new IngestionService({
  log,
  dispatcher,
  rejectedArchive: config.archiveRejectedPayloads ? archive : null,
});

const app = createApp({
  config,
  ingestion,
  log,
  ledger,
  health: {
    database: () => log.ping(),
    redis: async () => {
      await redis.ping();
    },
    dispatch: () => ({ sinks: dispatcher.sinkNames, inFlight: dispatcher.pending }),
  },
});

let server: Server | undefined;

async function start(): Promise<void> {
  try {
    await redis.connect();
  } catch (error) {
    logger.error('Redis connection failed', {
      error: error instanceof Error ? error.message : 'Unknown error',
      url: maskRedisUrl(config.redis.url),
    });
    if (config.nodeEnv === 'production') {
      throw error;
    }
    logger.warn('Continuing without Redis; lookup deliveries will fail until it is reachable');
  }

  server = app.listen(config.port, () => {
    logger.info('Ingestion API started', {
      port: config.port,
      apiVersion: config.apiVersion,
      environment: config.nodeEnv,
      webhook: config.webhookPath,
      sinks: dispatcher.sinkNames,
      healthCheck: `http://localhost:${config.port}/health`,
      apiDocs: `http://localhost:${config.port}/api-docs`,
    });
  });
}

function closeServer(): Promise<void> {
  return new Promise((resolve) => {
    if (!server) {
      resolve();
      return;
    }
    server.close((error) => {
      if (error) {
        logger.warn('HTTP server close reported an error', { error: error.message });
      }
      resolve();
    });
  });
}

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info(`${signal} received, shutting down gracefully`, { inFlight: dispatcher.pending });

  await closeServer();
  await dispatcher.drain();
  await disconnectRedis(redis);
  destroyAwsClients(aws);

  logger.info('Shutdown complete');
  process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
  });
}

start().catch((error: unknown) => {
  logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
