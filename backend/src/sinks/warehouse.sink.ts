/**
 * Warehouse Sink (SQS)
 *
 * Enqueues the normalized record for the batch loader, wrapped in a
 * versioned envelope. On FIFO queues the idempotency key doubles as the
 * deduplication id and the user id as the message group.
 */

import { SendMessageCommand } from '@aws-sdk/client-sqs';
import type { SendMessageCommandOutput } from '@aws-sdk/client-sqs';
import type { NormalizedRecord, SinkName } from '@trailhook/shared';
import { SinkDeliveryError, errorMessage } from '../models/errors/api-error';
import type { Sink, SinkDelivery } from './sink';

export const WAREHOUSE_ENVELOPE_SCHEMA = 'trailhook.record.v1';

/** The slice of SQSClient this sink calls. */
export interface QueueClient {
  send(command: SendMessageCommand, options?: { abortSignal?: AbortSignal }): Promise<SendMessageCommandOutput>;
}

export function warehouseEnvelope({ idempotencyKey, raw, record }: SinkDelivery): string {
  return JSON.stringify({
    schema: WAREHOUSE_ENVELOPE_SCHEMA,
    metadata: {
      idempotencyKey,
      receivedAt: raw.receivedAt,
    },
    record,
  });
}

export class WarehouseSink implements Sink {
  readonly name: SinkName = 'warehouse';
  readonly nativeDedup: boolean;

  constructor(
    private readonly client: QueueClient,
    private readonly queueUrl: string
  ) {
    this.nativeDedup = queueUrl.endsWith('.fifo');
  }

  accepts(_record: NormalizedRecord): boolean {
    return true;
  }

  async deliver(delivery: SinkDelivery, signal: AbortSignal): Promise<void> {
    try {
      await this.client.send(
        new SendMessageCommand({
          QueueUrl: this.queueUrl,
          MessageBody: warehouseEnvelope(delivery),
          MessageAttributes: {
            idempotencyKey: { DataType: 'String', StringValue: delivery.idempotencyKey },
            eventType: { DataType: 'String', StringValue: delivery.record.location.event_type },
          },
          ...(this.nativeDedup && {
            MessageDeduplicationId: delivery.idempotencyKey,
            MessageGroupId: delivery.record.location.user_id,
          }),
        }),
        { abortSignal: signal }
      );
    } catch (err) {
      throw new SinkDeliveryError(this.name, `SQS SendMessage failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
