/**
 * Stream Sink (Kinesis)
 *
 * Publishes geofence events only; everything else is not applicable.
 * Partition key = user_id, so one user's events land on one shard in
 * publish order. Kinesis has no dedup: the dispatcher's ledger check is
 * what prevents a second publish for an already-delivered key.
 */

import { PutRecordCommand } from '@aws-sdk/client-kinesis';
import type { PutRecordCommandOutput } from '@aws-sdk/client-kinesis';
import { isGeofenceEvent } from '@trailhook/shared';
import type { NormalizedRecord, SinkName } from '@trailhook/shared';
import { SinkDeliveryError, errorMessage } from '../models/errors/api-error';
import type { Sink, SinkDelivery } from './sink';

/** The slice of KinesisClient this sink calls. */
export interface RecordStreamClient {
  send(command: PutRecordCommand, options?: { abortSignal?: AbortSignal }): Promise<PutRecordCommandOutput>;
}

export function streamPayload({ idempotencyKey, record }: SinkDelivery): string {
  return JSON.stringify({
    idempotency_key: idempotencyKey,
    ...record.location,
    trip_id: record.trip?.trip_id ?? null,
  });
}

export class StreamSink implements Sink {
  readonly name: SinkName = 'stream';
  readonly nativeDedup = false;

  constructor(
    private readonly client: RecordStreamClient,
    private readonly streamName: string
  ) {}

  accepts(record: NormalizedRecord): boolean {
    return isGeofenceEvent(record.location.event_type);
  }

  async deliver(delivery: SinkDelivery, signal: AbortSignal): Promise<void> {
    try {
      await this.client.send(
        new PutRecordCommand({
          StreamName: this.streamName,
          PartitionKey: delivery.record.location.user_id,
          Data: Buffer.from(streamPayload(delivery), 'utf8'),
        }),
        { abortSignal: signal }
      );
    } catch (err) {
      throw new SinkDeliveryError(this.name, `Kinesis PutRecord failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
