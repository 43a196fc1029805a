/**
 * Application Configuration
 *
 * Parses the process environment once at start-up into an immutable
 * AppConfig. Components receive the slice they need through their
 * constructors; nothing below the bootstrap reads process.env.
 */

import { z } from 'zod';

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1'));

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).optional(),
    API_VERSION: z.string().min(1).default('v1'),
    WEBHOOK_PATH: z.string().startsWith('/').default('/webhook-endpoint'),
    ALLOWED_ORIGINS: z.string().optional(),
    RATE_LIMIT_WEBHOOK: z.coerce.number().int().positive().default(600),

    SUPABASE_URL: z.string().url(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),

    REDIS_URL: z.string().min(1).default('redis://localhost:6379'),

    AWS_REGION: z.string().min(1).default('us-east-1'),
    AWS_ACCESS_KEY_ID: z.string().optional(),
    AWS_SECRET_ACCESS_KEY: z.string().optional(),
    S3_BUCKET: z.string().min(1).default('trailhook-raw-events'),
    KINESIS_STREAM_NAME: z.string().min(1).default('location-stream'),
    WAREHOUSE_QUEUE_URL: z.string().url().optional(),

    SINK_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(5),
    SINK_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(200),
    SINK_BACKOFF_CAP_MS: z.coerce.number().int().min(0).default(10_000),
    SINK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    SINK_LOOKUP_ENABLED: booleanFlag(true),
    SINK_ARCHIVE_ENABLED: booleanFlag(true),
    SINK_STREAM_ENABLED: booleanFlag(true),
    SINK_WAREHOUSE_ENABLED: booleanFlag(false),
    ARCHIVE_REJECTED_PAYLOADS: booleanFlag(false),
  })
  .refine((env) => !env.SINK_WAREHOUSE_ENABLED || env.WAREHOUSE_QUEUE_URL !== undefined, {
    message: 'WAREHOUSE_QUEUE_URL is required when SINK_WAREHOUSE_ENABLED is true',
    path: ['WAREHOUSE_QUEUE_URL'],
  })
  .refine((env) => env.SINK_BACKOFF_CAP_MS >= env.SINK_BACKOFF_BASE_MS, {
    message: 'SINK_BACKOFF_CAP_MS must be >= SINK_BACKOFF_BASE_MS',
    path: ['SINK_BACKOFF_CAP_MS'],
  });

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

export interface SinkToggles {
  lookup: boolean;
  archive: boolean;
  stream: boolean;
  warehouse: boolean;
}

export interface AppConfig {
  nodeEnv: 'development' | 'production' | 'test';
  port: number;
  logLevel: string | undefined;
  apiVersion: string;
  webhookPath: string;
  allowedOrigins: string[];
  rateLimitPerMinute: number;
  supabase: { url: string; serviceRoleKey: string };
  redis: { url: string };
  aws: {
    region: string;
    credentials: { accessKeyId: string; secretAccessKey: string } | undefined;
    bucket: string;
    streamName: string;
    warehouseQueueUrl: string | undefined;
  };
  retry: RetryPolicy;
  sinks: SinkToggles;
  archiveRejectedPayloads: boolean;
}

/** Recursively freezes a plain object tree. */
export function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Validates the environment and returns a frozen configuration.
 * Throws with every offending variable listed when validation fails.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((e) => `${e.path.join('.') || 'env'}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;

  return deepFreeze<AppConfig>({
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    apiVersion: e.API_VERSION,
    webhookPath: e.WEBHOOK_PATH,
    allowedOrigins: e.ALLOWED_ORIGINS?.split(',').map((o) => o.trim()).filter(Boolean) ?? [
      'http://localhost:3001',
    ],
    rateLimitPerMinute: e.RATE_LIMIT_WEBHOOK,
    supabase: { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY },
    redis: { url: e.REDIS_URL },
    aws: {
      region: e.AWS_REGION,
      credentials:
        e.AWS_ACCESS_KEY_ID && e.AWS_SECRET_ACCESS_KEY
          ? { accessKeyId: e.AWS_ACCESS_KEY_ID, secretAccessKey: e.AWS_SECRET_ACCESS_KEY }
          : undefined,
      bucket: e.S3_BUCKET,
      streamName: e.KINESIS_STREAM_NAME,
      warehouseQueueUrl: e.WAREHOUSE_QUEUE_URL,
    },
    retry: {
      maxAttempts: e.SINK_MAX_ATTEMPTS,
      baseDelayMs: e.SINK_BACKOFF_BASE_MS,
      maxDelayMs: e.SINK_BACKOFF_CAP_MS,
      timeoutMs: e.SINK_TIMEOUT_MS,
    },
    sinks: {
      lookup: e.SINK_LOOKUP_ENABLED,
      archive: e.SINK_ARCHIVE_ENABLED,
      stream: e.SINK_STREAM_ENABLED,
      warehouse: e.SINK_WAREHOUSE_ENABLED,
    },
    archiveRejectedPayloads: e.ARCHIVE_REJECTED_PAYLOADS,
  });
}
