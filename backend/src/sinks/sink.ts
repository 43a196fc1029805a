import type { IdempotencyKey, NormalizedRecord, RawEvent, SinkName } from '@trailhook/shared';

/** What a sink receives for one accepted event. */
export interface SinkDelivery {
  idempotencyKey: IdempotencyKey;
  raw: RawEvent;
  record: NormalizedRecord;
}

/**
 * A downstream consumer of accepted events. Implementations perform one
 * delivery attempt per `deliver` call and throw on failure; retries,
 * timeouts and status tracking belong to the dispatcher.
 */
export interface Sink {
  readonly name: SinkName;
  /**
   * True when a repeated delivery with the same idempotency key cannot
   * create a second downstream effect (upsert, write-once key).
   */
  readonly nativeDedup: boolean;
  /** Sinks may take only a subset of events; others are never attempted. */
  accepts(record: NormalizedRecord): boolean;
  deliver(delivery: SinkDelivery, signal: AbortSignal): Promise<void>;
}
