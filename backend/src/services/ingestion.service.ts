/**
 * Ingestion Service
 *
 * The request-path half of the pipeline:
 *   normalize → derive idempotency key → durable append → ack
 * Fan-out to sinks starts after the append, for new and duplicate events
 * alike, and is not awaited: a slow or failing sink never delays or fails
 * the acknowledgement.
 */

import type { IdempotencyKey, RawEvent } from '@trailhook/shared';
import type { ValidationIssue } from '../models/errors/api-error';
import { errorMessage } from '../models/errors/api-error';
import { logger } from '../utils/logger';
import type { DurabilityLog } from './durability-log.service';
import { deriveIdempotencyKey } from './idempotency.service';
import { normalize } from './normalizer.service';
import type { SinkDispatcher } from './sink-dispatcher.service';

export type IngestOutcome =
  | { kind: 'ack'; idempotencyKey: IdempotencyKey; duplicate: boolean; receivedAt: string }
  | { kind: 'reject'; issue: ValidationIssue };

/** Audit store for payloads that failed normalization. */
export interface RejectedPayloadArchive {
  archiveRejected(body: Buffer, issue: ValidationIssue, receivedAt: string): Promise<void>;
}

export interface IngestionDeps {
  log: DurabilityLog;
  dispatcher: SinkDispatcher;
  rejectedArchive?: RejectedPayloadArchive | null;
  clock?: () => Date;
}

export class IngestionService {
  private readonly log: DurabilityLog;
  private readonly dispatcher: SinkDispatcher;
  private readonly rejectedArchive: RejectedPayloadArchive | null;
  private readonly clock: () => Date;

  constructor(deps: IngestionDeps) {
    this.log = deps.log;
    this.dispatcher = deps.dispatcher;
    this.rejectedArchive = deps.rejectedArchive ?? null;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Throws DurabilityError when the event could not be persisted; the
   * sender should retry in that case.
   */
  async handle(body: Buffer, context: { receivedAt?: string } = {}): Promise<IngestOutcome> {
    const raw: RawEvent = {
      body: Buffer.from(body),
      receivedAt: context.receivedAt ?? this.clock().toISOString(),
    };

    const normalized = normalize(raw);
    if (!normalized.success) {
      const { issue } = normalized;
      logger.warn('Webhook payload rejected', {
        reason: issue.reason,
        field: issue.field,
        message: issue.message,
        bytes: raw.body.length,
      });
      this.archiveRejected(raw, issue);
      return { kind: 'reject', issue };
    }

    const key = deriveIdempotencyKey(normalized.payload);
    const { handle, created } = await this.log.append(key, raw, normalized.record);

    // Duplicates are dispatched too: an earlier append may have committed
    // without its dispatch ever running. Delivered sinks are skipped.
    this.dispatcher.dispatch(handle).catch((err: unknown) => {
      logger.error('Dispatch failed unexpectedly', { idempotencyKey: key, error: errorMessage(err) });
    });

    return {
      kind: 'ack',
      idempotencyKey: key,
      duplicate: !created,
      receivedAt: handle.raw.receivedAt,
    };
  }

  private archiveRejected(raw: RawEvent, issue: ValidationIssue): void {
    if (!this.rejectedArchive) return;

    this.rejectedArchive.archiveRejected(raw.body, issue, raw.receivedAt).catch((err: unknown) => {
      logger.warn('Failed to archive rejected payload', { reason: issue.reason, error: errorMessage(err) });
    });
  }
}
