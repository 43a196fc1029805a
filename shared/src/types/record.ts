import type { LocationRecord } from './location';
import type { TripRecord } from './trip';
import type { UserRecord } from './user';

/**
 * Canonical form of an inbound webhook event. `location` is always present;
 * `trip` and `user` only when the payload carried them.
 */
export interface NormalizedRecord {
  location: LocationRecord;
  trip: TripRecord | null;
  user: UserRecord | null;
}

/** Inbound payload exactly as received. */
export interface RawEvent {
  body: Buffer;
  /** UTC ISO-8601 receipt instant */
  receivedAt: string;
}

/** SHA-256 hex digest derived from the raw payload */
export type IdempotencyKey = string;

export const SINK_NAMES = ['lookup', 'archive', 'stream', 'warehouse'] as const;

export type SinkName = (typeof SINK_NAMES)[number];

export type DeliveryStatus =
  | { state: 'pending' }
  | { state: 'delivered' }
  | { state: 'failed'; reason: string };
