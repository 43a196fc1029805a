import type { NormalizedRecord, RawEvent } from '@trailhook/shared';
import type { RetryPolicy } from '../../src/config/env';
import type { LogHandle } from '../../src/services/durability-log.service';

export const RECEIVED_AT = '2024-05-01T10:00:05.000Z';

/** Retry policy with no waiting, so exhaustion tests stay fast */
export const FAST_RETRY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 0,
  maxDelayMs: 0,
  timeoutMs: 1_000,
};

/** Ledger retry settings with no waiting */
export const FAST_LEDGER = { baseDelayMs: 0, maxDelayMs: 0 } as const;

export function locationPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    location: {
      user_id: '12345',
      latitude: 37.7749,
      longitude: -122.4194,
      timestamp: '2024-05-01T10:00:00Z',
      event_type: 'location_update',
      ...overrides,
    },
  };
}

export function body(payload: unknown): Buffer {
  return Buffer.from(JSON.stringify(payload), 'utf8');
}

export function rawEvent(payload: unknown, receivedAt = RECEIVED_AT): RawEvent {
  return { body: body(payload), receivedAt };
}

export function record(overrides: Partial<NormalizedRecord['location']> = {}): NormalizedRecord {
  return {
    location: {
      user_id: '12345',
      latitude: 37.7749,
      longitude: -122.4194,
      event_timestamp: '2024-05-01T10:00:00.000Z',
      event_type: 'location_update',
      ...overrides,
    },
    trip: null,
    user: null,
  };
}

export function handle(key: string, rec: NormalizedRecord = record()): LogHandle {
  return {
    id: '1',
    idempotencyKey: key,
    raw: rawEvent({ location: rec.location }),
    record: rec,
    appendedAt: '2024-05-01T10:00:06.000Z',
  };
}

/** 64-char hex key for route tests */
export function hexKey(char: string): string {
  return char.repeat(64);
}
