/**
 * Lookup Store Sink (Redis)
 *
 * Upserts the LocationRecord into a per-user hash:
 *   key   = location:{user_id}
 *   field = event timestamp (UTC ISO)
 *   value = JSON location record + idempotency key
 *
 * HSET overwrites the field, so a redelivery leaves exactly one entry.
 */

import type { NormalizedRecord, SinkName } from '@trailhook/shared';
import { SinkDeliveryError, errorMessage } from '../models/errors/api-error';
import type { Sink, SinkDelivery } from './sink';

/** The slice of the Redis client this sink calls. */
export interface LocationHashClient {
  hSet(key: string, field: string, value: string): Promise<number>;
}

export function lookupKey(userId: string, prefix = 'location'): string {
  return `${prefix}:${userId}`;
}

export class LookupStoreSink implements Sink {
  readonly name: SinkName = 'lookup';
  readonly nativeDedup = true;

  constructor(
    private readonly client: LocationHashClient,
    private readonly keyPrefix = 'location'
  ) {}

  accepts(_record: NormalizedRecord): boolean {
    return true;
  }

  async deliver({ idempotencyKey, record }: SinkDelivery, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      throw new SinkDeliveryError(this.name, 'delivery aborted before write');
    }

    const { location } = record;
    const value = JSON.stringify({
      ...location,
      trip_id: record.trip?.trip_id ?? null,
      idempotency_key: idempotencyKey,
    });

    try {
      await this.client.hSet(lookupKey(location.user_id, this.keyPrefix), location.event_timestamp, value);
    } catch (err) {
      throw new SinkDeliveryError(this.name, `Redis HSET failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
