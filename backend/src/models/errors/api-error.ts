/**
 * API Error Hierarchy
 *
 * Provides typed error classes for different error scenarios.
 * All HTTP-facing errors extend ApiError with a statusCode and optional details.
 */

import type { SinkName } from '@trailhook/shared';

export class ApiError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, code?: string, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code || this.name;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Why a payload was rejected. The first four come from field checks;
 * MalformedJson from parsing; Inconsistent from cross-field invariants.
 */
export type ValidationReason =
  | 'MissingField'
  | 'OutOfRange'
  | 'BadTimestamp'
  | 'TypeMismatch'
  | 'MalformedJson'
  | 'Inconsistent';

export interface ValidationIssue {
  reason: ValidationReason;
  /** Dotted path of the offending field, or null for whole-payload problems */
  field: string | null;
  message: string;
}

export class ValidationError extends ApiError {
  public readonly reason: ValidationReason | null;
  public readonly field: string | null;

  constructor(message: string, details?: unknown, issue?: ValidationIssue) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.reason = issue?.reason ?? null;
    this.field = issue?.field ?? null;
  }

  static fromIssue(issue: ValidationIssue): ValidationError {
    return new ValidationError(issue.message, undefined, issue);
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

export class DatabaseError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'DATABASE_ERROR', details);
  }
}

/**
 * The durability log could not persist or read an entry. Fatal for the
 * request; the webhook sender is expected to retry the delivery.
 */
export class DurabilityError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'DURABILITY_ERROR', details);
  }
}

/**
 * A single delivery attempt to a sink failed. Never reaches the HTTP layer:
 * the dispatcher retries it and records the final outcome in the ledger.
 */
export class SinkDeliveryError extends Error {
  public readonly sink: SinkName;

  constructor(sink: SinkName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SinkDeliveryError';
    this.sink = sink;
  }
}

export class SinkTimeoutError extends SinkDeliveryError {
  constructor(sink: SinkName, timeoutMs: number) {
    super(sink, `${sink} sink timeout after ${timeoutMs}ms`);
    this.name = 'SinkTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
