/**
 * Payload Normalizer
 *
 * Turns an inbound webhook body into a NormalizedRecord or a single
 * ValidationIssue. Pure: no I/O, no logging, nothing thrown.
 *
 * Inbound shape:
 *   { id?, live?, location: {...}, trip?: {...}, user?: {...} }
 *
 * Defaults:
 *   location.timestamp  → receipt time of the raw event
 *   trip/user.user_id   → location.user_id
 *   user.event_id       → top-level id
 *   user.created_at     → location event timestamp
 *   user.live           → top-level live
 */

import { isNotBefore, isValidLatitude, isValidLongitude, LATITUDE_RANGE, LONGITUDE_RANGE } from '@trailhook/shared';
import type { LocationRecord, NormalizedRecord, RawEvent, TripRecord, UserRecord } from '@trailhook/shared';
import { coerce, fail, isPlainObject } from './payload-coercion';
import type { Coerced, CoercionFailure } from './payload-coercion';

export type ParseResult = { success: true; payload: Record<string, unknown> } | CoercionFailure;

export type NormalizationResult = { success: true; record: NormalizedRecord } | CoercionFailure;

export type NormalizeOutcome =
  | { success: true; record: NormalizedRecord; payload: Record<string, unknown> }
  | CoercionFailure;

export interface NormalizeOptions {
  /** UTC ISO instant used when the payload carries no event timestamp */
  receivedAt: string;
}

/**
 * Parses raw bytes as a single JSON object.
 */
export function parsePayload(body: Buffer | string): ParseResult {
  const text = typeof body === 'string' ? body : body.toString('utf8');

  if (text.trim() === '') {
    return fail('MalformedJson', null, 'Request body is empty');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return fail('MalformedJson', null, `Malformed JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isPlainObject(parsed)) {
    return fail('TypeMismatch', null, 'Payload must be a single JSON object');
  }

  return { success: true, payload: parsed };
}

/**
 * Parse and normalize in one step.
 */
export function normalize(raw: RawEvent): NormalizeOutcome {
  const parsed = parsePayload(raw.body);
  if (!parsed.success) return parsed;

  const normalized = normalizePayload(parsed.payload, { receivedAt: raw.receivedAt });
  if (!normalized.success) return normalized;

  return { success: true, record: normalized.record, payload: parsed.payload };
}

export function normalizePayload(
  payload: Record<string, unknown>,
  options: NormalizeOptions
): NormalizationResult {
  const location = normalizeLocation(payload.location, options.receivedAt);
  if (!location.success) return location;

  const trip = normalizeTrip(payload.trip, location.value);
  if (!trip.success) return trip;

  const user = normalizeUser(payload, location.value);
  if (!user.success) return user;

  return {
    success: true,
    record: { location: location.value, trip: trip.value, user: user.value },
  };
}

function normalizeLocation(value: unknown, receivedAt: string): Coerced<LocationRecord> {
  const section = coerce.object(value, 'location');
  if (!section.success) return section;
  if (section.value === null) return fail('MissingField', 'location', 'location is required');
  const location = section.value;

  const userId = coerce.string(location.user_id, 'location.user_id');
  if (!userId.success) return userId;

  const latitude = coerce.number(location.latitude, 'location.latitude');
  if (!latitude.success) return latitude;
  if (!isValidLatitude(latitude.value)) {
    return fail(
      'OutOfRange',
      'location.latitude',
      `location.latitude must be between ${LATITUDE_RANGE.min} and ${LATITUDE_RANGE.max}, got ${latitude.value}`
    );
  }

  const longitude = coerce.number(location.longitude, 'location.longitude');
  if (!longitude.success) return longitude;
  if (!isValidLongitude(longitude.value)) {
    return fail(
      'OutOfRange',
      'location.longitude',
      `location.longitude must be between ${LONGITUDE_RANGE.min} and ${LONGITUDE_RANGE.max}, got ${longitude.value}`
    );
  }

  const eventType = coerce.eventType(location.event_type, 'location.event_type');
  if (!eventType.success) return eventType;

  const timestamp = coerce.optionalInstant(location.timestamp, 'location.timestamp');
  if (!timestamp.success) return timestamp;

  return {
    success: true,
    value: {
      user_id: userId.value,
      latitude: latitude.value,
      longitude: longitude.value,
      event_timestamp: timestamp.value ?? receivedAt,
      event_type: eventType.value,
    },
  };
}

/** Sub-record user ids may be omitted, but when present must match location.user_id. */
function resolveUserId(value: unknown, field: string, expected: string): Coerced<string> {
  const userId = coerce.optionalString(value, field);
  if (!userId.success) return userId;
  if (userId.value !== null && userId.value !== expected) {
    return fail('Inconsistent', field, `${field} (${userId.value}) does not match location.user_id (${expected})`);
  }
  return { success: true, value: expected };
}

function normalizeTrip(value: unknown, location: LocationRecord): Coerced<TripRecord | null> {
  const section = coerce.object(value, 'trip');
  if (!section.success) return section;
  if (section.value === null) return { success: true, value: null };
  const trip = section.value;

  const tripId = coerce.string(trip.trip_id, 'trip.trip_id');
  if (!tripId.success) return tripId;

  const externalId = coerce.optionalString(trip.external_id, 'trip.external_id');
  if (!externalId.success) return externalId;

  const userId = resolveUserId(trip.user_id, 'trip.user_id', location.user_id);
  if (!userId.success) return userId;

  const createdAt = coerce.instant(trip.created_at, 'trip.created_at');
  if (!createdAt.success) return createdAt;

  const updatedAt = coerce.instant(trip.updated_at, 'trip.updated_at');
  if (!updatedAt.success) return updatedAt;
  if (!isNotBefore(updatedAt.value, createdAt.value)) {
    return fail('Inconsistent', 'trip.updated_at', 'trip.updated_at must not be earlier than trip.created_at');
  }

  const startedAt = coerce.optionalInstant(trip.started_at, 'trip.started_at');
  if (!startedAt.success) return startedAt;

  const routeSessionType = coerce.optionalString(trip.route_session_type, 'trip.route_session_type');
  if (!routeSessionType.success) return routeSessionType;

  return {
    success: true,
    value: {
      trip_id: tripId.value,
      external_id: externalId.value,
      user_id: userId.value,
      created_at: createdAt.value,
      updated_at: updatedAt.value,
      started_at: startedAt.value,
      route_session_type: routeSessionType.value,
    },
  };
}

function normalizeUser(payload: Record<string, unknown>, location: LocationRecord): Coerced<UserRecord | null> {
  const section = coerce.object(payload.user, 'user');
  if (!section.success) return section;
  if (section.value === null) return { success: true, value: null };
  const user = section.value;

  const userId = resolveUserId(user.user_id, 'user.user_id', location.user_id);
  if (!userId.success) return userId;

  const eventId = coerce.string(user.event_id ?? payload.id, 'user.event_id');
  if (!eventId.success) return eventId;

  const createdAt = coerce.optionalInstant(user.created_at, 'user.created_at');
  if (!createdAt.success) return createdAt;

  const live = coerce.boolean(user.live ?? payload.live, 'user.live');
  if (!live.success) return live;

  return {
    success: true,
    value: {
      user_id: userId.value,
      event_id: eventId.value,
      created_at: createdAt.value ?? location.event_timestamp,
      live: live.value,
    },
  };
}
