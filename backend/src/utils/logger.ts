/**
 * Structured Logger
 *
 * Winston-based logger with:
 * - JSON format for production, colorized console for development
 * - Correlation IDs for request tracing
 * - Log rotation with daily rotation and size limits
 * - Sensitive data filtering
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { AsyncLocalStorage } from 'async_hooks';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

// Async local storage for correlation IDs
export const asyncLocalStorage = new AsyncLocalStorage<{ correlationId: string }>();

/**
 * Sensitive field patterns to redact from logs
 */
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'apiKey',
  'api_key',
  'secret',
  'authorization',
  'cookie',
  'session',
  'access_key',
  'accessKeyId',
  'private_key',
  'service_role',
  'serviceRoleKey',
];

const MAX_STRING_LENGTH = 500;

/** Keys winston and this module own; never sanitized. */
const RESERVED_KEYS = new Set(['level', 'message', 'timestamp', 'correlationId', 'service', 'environment', 'stack']);

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_FIELDS.some((field) => lowerKey.includes(field.toLowerCase()));
}

/**
 * Sanitize sensitive data from log metadata
 */
export function sanitizeData(data: unknown): unknown {
  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    // Don't log long strings that might contain sensitive data
    if (data.length > MAX_STRING_LENGTH) {
      return `[String of length ${data.length}]`;
    }
    return data;
  }

  if (Buffer.isBuffer(data)) {
    return `[Buffer of length ${data.length}]`;
  }

  if (Array.isArray(data)) {
    return data.map(sanitizeData);
  }

  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }

  if (typeof data === 'object') {
    const sanitized: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      sanitized[key] = isSensitiveKey(key) ? '[REDACTED]' : sanitizeData(value);
    }

    return sanitized;
  }

  return data;
}

/**
 * Adds the correlation ID and sanitizes metadata in place so winston's
 * internal symbol keys survive.
 */
const correlationFormat = winston.format((info) => {
  const store = asyncLocalStorage.getStore();

  if (store?.correlationId) {
    info.correlationId = store.correlationId;
  }

  for (const key of Object.keys(info)) {
    if (RESERVED_KEYS.has(key)) continue;
    info[key] = isSensitiveKey(key) ? '[REDACTED]' : sanitizeData(info[key]);
  }

  return info;
});

/**
 * Custom format for development (readable console output with correlation ID)
 */
const devFormat = printf(({ level, message, timestamp, correlationId, ...metadata }) => {
  let msg = `${timestamp}`;

  if (correlationId) {
    msg += ` [${correlationId}]`;
  }

  msg += ` [${level}]: ${message}`;

  // Filter out service and environment from metadata display
  const { service, environment, ...rest } = metadata;

  if (Object.keys(rest).length > 0) {
    msg += ` ${JSON.stringify(rest)}`;
  }

  return msg;
});

// Determine environment
const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';

const LOG_LEVEL = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

const baseFormat = combine(
  errors({ stack: true }),
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  correlationFormat()
);

const transports: winston.transport[] = [];

// Console transport (always enabled)
transports.push(
  new winston.transports.Console({
    format: isDevelopment ? combine(colorize(), devFormat) : combine(json()),
    silent: isTest,
  })
);

// Production file transports with rotation
if (!isDevelopment && !isTest) {
  transports.push(
    new DailyRotateFile({
      filename: 'logs/error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: json(),
      maxSize: '20m',
      maxFiles: '30d',
      zippedArchive: true,
    })
  );

  // Delivery failures and acks land here; kept longer for re-drive audits
  transports.push(
    new DailyRotateFile({
      filename: 'logs/combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      format: json(),
      maxSize: '20m',
      maxFiles: '30d',
      zippedArchive: true,
    })
  );
}

export const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: baseFormat,
  defaultMeta: {
    service: 'trailhook-ingest',
    environment: process.env.NODE_ENV || 'development',
  },
  transports,
  exitOnError: false,
});

/**
 * Log with correlation ID from async local storage
 */
export function logWithCorrelation(
  level: 'error' | 'warn' | 'info' | 'debug',
  message: string,
  meta?: Record<string, unknown>
): void {
  const store = asyncLocalStorage.getStore();

  logger[level](message, {
    ...meta,
    correlationId: store?.correlationId,
  });
}

// Stream for Morgan HTTP logging
export const stream = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

/**
 * Helper functions for common log scenarios
 */
export const logHelpers = {
  apiRequest: (method: string, path: string, meta?: Record<string, unknown>) => {
    logWithCorrelation('debug', `API Request: ${method} ${path}`, meta);
  },

  apiResponse: (method: string, path: string, statusCode: number, duration: number) => {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    logWithCorrelation(level, `API Response: ${method} ${path}`, {
      statusCode,
      duration: `${duration}ms`,
    });
  },

  dbQuery: (operation: string, table: string, duration?: number) => {
    logWithCorrelation('debug', `DB Query: ${operation} on ${table}`, {
      duration: duration !== undefined ? `${duration}ms` : undefined,
    });
  },

  /**
   * Log delivery outcome for one (record, sink) pair
   */
  delivery: (
    sink: string,
    idempotencyKey: string,
    outcome: 'delivered' | 'failed' | 'skipped',
    meta?: Record<string, unknown>
  ) => {
    const level = outcome === 'failed' ? 'error' : 'info';
    logWithCorrelation(level, `Delivery ${outcome}: ${sink}`, { sink, idempotencyKey, ...meta });
  },

  security: (event: string, severity: 'low' | 'medium' | 'high', meta?: Record<string, unknown>) => {
    const level = severity === 'high' ? 'error' : severity === 'medium' ? 'warn' : 'info';
    logWithCorrelation(level, `Security: ${event}`, { severity, ...meta });
  },
};
