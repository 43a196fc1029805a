/**
 * Payload Coercion Table
 *
 * Webhook senders are loose about types: coordinates arrive as strings,
 * booleans as "TRUE", timestamps as ISO strings or epoch numbers. Every
 * field the normalizer reads goes through exactly one entry of `coerce`.
 */

import { LOCATION_EVENT_TYPES, parseInstant } from '@trailhook/shared';
import type { LocationEventType } from '@trailhook/shared';
import type { ValidationIssue, ValidationReason } from '../models/errors/api-error';

export interface CoercionFailure {
  success: false;
  issue: ValidationIssue;
}

export type Coerced<T> = { success: true; value: T } | CoercionFailure;

/** Event type spellings seen from upstream senders. */
const EVENT_TYPE_ALIASES: ReadonlyMap<string, LocationEventType> = new Map([
  ['user.entered_geofence', 'geofence_enter'],
  ['user.exited_geofence', 'geofence_exit'],
  ['user.updated_location', 'location_update'],
]);

const TRUE_STRINGS = new Set(['true', '1', 'yes']);
const FALSE_STRINGS = new Set(['false', '0', 'no']);

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function fail(reason: ValidationReason, field: string | null, message: string): CoercionFailure {
  return { success: false, issue: { reason, field, message } };
}

function ok<T>(value: T): Coerced<T> {
  return { success: true, value };
}

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: unknown, field: string, required: boolean): Coerced<string | null> {
  if (isAbsent(value) || (typeof value === 'string' && value.trim() === '')) {
    return required ? fail('MissingField', field, `${field} is required`) : ok(null);
  }
  if (typeof value === 'string') return ok(value.trim());
  if (typeof value === 'number' && Number.isFinite(value)) return ok(String(value));
  return fail('TypeMismatch', field, `${field} must be a string, got ${typeName(value)}`);
}

function readInstant(value: unknown, field: string, required: boolean): Coerced<string | null> {
  if (isAbsent(value) || value === '') {
    return required ? fail('MissingField', field, `${field} is required`) : ok(null);
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    return fail('TypeMismatch', field, `${field} must be a timestamp, got ${typeName(value)}`);
  }
  const instant = parseInstant(value);
  if (instant === null) {
    return fail('BadTimestamp', field, `${field} is not a valid timestamp: ${String(value)}`);
  }
  return ok(instant);
}

export const coerce = {
  string(value: unknown, field: string): Coerced<string> {
    const result = readString(value, field, true);
    if (!result.success) return result;
    return result.value === null ? fail('MissingField', field, `${field} is required`) : ok(result.value);
  },

  optionalString(value: unknown, field: string): Coerced<string | null> {
    return readString(value, field, false);
  },

  number(value: unknown, field: string): Coerced<number> {
    if (isAbsent(value) || value === '') {
      return fail('MissingField', field, `${field} is required`);
    }
    if (typeof value === 'number') {
      return Number.isFinite(value)
        ? ok(value)
        : fail('TypeMismatch', field, `${field} must be a finite number`);
    }
    if (typeof value === 'string' && NUMERIC_PATTERN.test(value.trim())) {
      return ok(Number(value.trim()));
    }
    return fail('TypeMismatch', field, `${field} must be numeric, got ${typeName(value)}`);
  },

  instant(value: unknown, field: string): Coerced<string> {
    const result = readInstant(value, field, true);
    if (!result.success) return result;
    return result.value === null ? fail('MissingField', field, `${field} is required`) : ok(result.value);
  },

  optionalInstant(value: unknown, field: string): Coerced<string | null> {
    return readInstant(value, field, false);
  },

  boolean(value: unknown, field: string): Coerced<boolean> {
    if (isAbsent(value) || value === '') {
      return fail('MissingField', field, `${field} is required`);
    }
    if (typeof value === 'boolean') return ok(value);
    if (value === 1 || value === 0) return ok(value === 1);
    if (typeof value === 'string') {
      const lowered = value.trim().toLowerCase();
      if (TRUE_STRINGS.has(lowered)) return ok(true);
      if (FALSE_STRINGS.has(lowered)) return ok(false);
    }
    return fail('TypeMismatch', field, `${field} must be a boolean, got ${String(value)}`);
  },

  eventType(value: unknown, field: string): Coerced<LocationEventType> {
    const result = coerce.string(value, field);
    if (!result.success) return result;

    const lowered = result.value.toLowerCase();
    const alias = EVENT_TYPE_ALIASES.get(lowered);
    if (alias) return ok(alias);

    const known = LOCATION_EVENT_TYPES.find((type) => type === lowered);
    if (known) return ok(known);

    return fail(
      'TypeMismatch',
      field,
      `${field} must be one of ${LOCATION_EVENT_TYPES.join(', ')}; got ${result.value}`
    );
  },

  /** Nested object; absent yields null so callers decide whether it is required. */
  object(value: unknown, field: string): Coerced<Record<string, unknown> | null> {
    if (isAbsent(value)) return ok(null);
    if (isPlainObject(value)) return ok(value);
    return fail('TypeMismatch', field, `${field} must be an object, got ${typeName(value)}`);
  },
};
