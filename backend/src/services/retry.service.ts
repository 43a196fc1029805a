/**
 * Retry Service
 *
 * Bounded exponential backoff with jitter, shared by the durability log
 * (transient storage errors only) and the sink dispatcher (every error).
 *
 * Delay formula per failed attempt n (1-indexed):
 *   delay = min(base * 2^(n-1), maxDelay) + jitter
 *   jitter = uniform random in [0, min(base * 0.5, 500ms)]
 *
 * `maxAttempts` counts the first call: maxAttempts = 3 means one call
 * plus at most two retries.
 */

import { logger } from '../utils/logger';
import { errorMessage } from '../models/errors/api-error';

export interface RetryOptions {
  /** Maximum number of attempts (including the first). Default: 5 */
  maxAttempts?: number;
  /** Base delay in ms for the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Hard cap on delay in ms. Default: 30_000 */
  maxDelayMs?: number;
  /** Label used in log messages to identify the operation. */
  context?: string;
  /** Override the transient-error classifier. */
  isRetryable?: (error: unknown) => boolean;
}

const DEFAULTS = {
  maxAttempts: 5,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
} as const;

/**
 * Returns true if the error represents a transient condition that is safe to
 * retry. Validation, constraint and permission errors always fail again.
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const msg = error.message.toLowerCase();

  return (
    // Network / DNS
    msg.includes('econnrefused') ||
    msg.includes('etimedout') ||
    msg.includes('enotfound') ||
    msg.includes('enetunreach') ||
    msg.includes('econnreset') ||
    msg.includes('fetch failed') ||
    msg.includes('network') ||
    msg.includes('timeout') ||
    // PostgreSQL transient conditions
    msg.includes('deadlock') ||
    msg.includes('could not serialize') ||
    msg.includes('too many connections') ||
    msg.includes('connection terminated') ||
    msg.includes('connection refused') ||
    msg.includes('server closed the connection') ||
    // Supabase / PostgREST gateway
    msg.includes('upstream connect error') ||
    msg.includes('temporarily unavailable') ||
    msg.includes('service unavailable')
  );
}

/** Classifier for callers that retry every failure. */
export const retryAlways = (): boolean => true;

/**
 * @param attempt 1-indexed attempt number that just failed.
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponential = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
  const jitterCap = Math.min(baseDelayMs * 0.5, 500);
  const jitter = Math.random() * jitterCap;
  return Math.round(exponential + jitter);
}

/**
 * Executes `operation` with exponential backoff + jitter on retryable errors.
 *
 * Non-retryable errors are thrown immediately. When all attempts are
 * exhausted the last error is re-thrown.
 *
 * @example
 * await retryWithBackoff(() => store.insertIfAbsent(row), {
 *   context: 'durability-log.append',
 *   maxAttempts: 3,
 * });
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
  const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
  const context = options.context ?? 'operation';
  const classifier = options.isRetryable ?? isTransientError;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const result = await operation(attempt);

      if (attempt > 1) {
        logger.info('Retry succeeded', { context, attempt, maxAttempts });
      }

      return result;
    } catch (error) {
      lastError = error;

      if (!classifier(error)) {
        logger.warn('Non-retryable error — not retrying', {
          context,
          attempt,
          error: errorMessage(error),
        });
        throw error;
      }

      if (attempt === maxAttempts) {
        logger.error('All retry attempts exhausted', {
          context,
          attempts: attempt,
          finalError: errorMessage(error),
        });
        break;
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs);

      logger.warn('Retryable error — backing off', {
        context,
        attempt,
        maxAttempts,
        delayMs,
        reason: errorMessage(error),
      });

      await sleep(delayMs);
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
