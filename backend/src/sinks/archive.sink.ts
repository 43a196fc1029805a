/**
 * Archive Sink (S3)
 *
 * Stores the raw body of every accepted event as a write-once object:
 *   raw/{idempotency_key}.json
 *
 * `IfNoneMatch: '*'` makes the PUT conditional; a 412 on redelivery means
 * the object is already archived and counts as success.
 *
 * Optionally also archives rejected payloads under
 *   rejected/{sha256(body)}.json
 * for audit; those never reach structured sinks.
 */

import { PutObjectCommand, S3ServiceException } from '@aws-sdk/client-s3';
import type { PutObjectCommandOutput } from '@aws-sdk/client-s3';
import type { NormalizedRecord, SinkName } from '@trailhook/shared';
import { SinkDeliveryError, errorMessage } from '../models/errors/api-error';
import type { ValidationIssue } from '../models/errors/api-error';
import { sha256Hex } from '../services/idempotency.service';
import { logger } from '../utils/logger';
import type { Sink, SinkDelivery } from './sink';

/** The slice of S3Client this sink calls. */
export interface ObjectStoreClient {
  send(command: PutObjectCommand, options?: { abortSignal?: AbortSignal }): Promise<PutObjectCommandOutput>;
}

export function archiveKey(idempotencyKey: string): string {
  return `raw/${idempotencyKey}.json`;
}

export function rejectedArchiveKey(body: Buffer): string {
  return `rejected/${sha256Hex(body)}.json`;
}

function isAlreadyExists(err: unknown): boolean {
  return (
    err instanceof S3ServiceException &&
    (err.name === 'PreconditionFailed' || err.$metadata.httpStatusCode === 412)
  );
}

export class ArchiveSink implements Sink {
  readonly name: SinkName = 'archive';
  readonly nativeDedup = true;

  constructor(
    private readonly client: ObjectStoreClient,
    private readonly bucket: string
  ) {}

  accepts(_record: NormalizedRecord): boolean {
    return true;
  }

  async deliver({ idempotencyKey, raw, record }: SinkDelivery, signal: AbortSignal): Promise<void> {
    const key = archiveKey(idempotencyKey);

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: raw.body,
          ContentType: 'application/json',
          IfNoneMatch: '*',
          Metadata: {
            'received-at': raw.receivedAt,
            'user-id': record.location.user_id,
            'event-type': record.location.event_type,
          },
        }),
        { abortSignal: signal }
      );
    } catch (err) {
      if (isAlreadyExists(err)) {
        logger.debug('Archive object already exists', { key });
        return;
      }
      throw new SinkDeliveryError(this.name, `S3 PutObject failed for ${key}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /**
   * Audit copy of a payload the normalizer rejected. Single attempt; the
   * caller decides what to do with a failure.
   */
  async archiveRejected(body: Buffer, issue: ValidationIssue, receivedAt: string): Promise<void> {
    const key = rejectedArchiveKey(body);

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentType: 'application/octet-stream',
          IfNoneMatch: '*',
          Metadata: {
            'received-at': receivedAt,
            'rejection-reason': issue.reason,
            'rejection-field': issue.field ?? '',
          },
        })
      );
    } catch (err) {
      if (isAlreadyExists(err)) return;
      throw new SinkDeliveryError(this.name, `S3 PutObject failed for ${key}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
