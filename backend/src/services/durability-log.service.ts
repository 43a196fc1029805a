/**
 * Durability Log
 *
 * Canonical, append-only home of every accepted webhook event. An append
 * returns only after the raw body and normalized record are persisted
 * together; that moment is the boundary of the "accepted" guarantee.
 *
 * Idempotency:
 *   • Appends for the same key are serialized in process (KeyedLock) and
 *     at the database (UNIQUE idempotency_key + ON CONFLICT DO NOTHING).
 *   • A repeated append is a no-op that returns the existing handle with
 *     `created: false`.
 */

import type { IdempotencyKey, NormalizedRecord, RawEvent } from '@trailhook/shared';
import type { LogEntry, WebhookLogStore } from '../repositories';
import { DurabilityError, errorMessage } from '../models/errors/api-error';
import { KeyedLock } from '../utils/keyed-lock';
import { logger } from '../utils/logger';
import { retryWithBackoff } from './retry.service';
import { sha256Hex } from './idempotency.service';

/** Read-only view of a stored entry handed to the dispatcher. */
export type LogHandle = Readonly<LogEntry>;

export interface AppendResult {
  handle: LogHandle;
  /** false when the key was already present and nothing was written */
  created: boolean;
}

export interface DurabilityLogOptions {
  /** Storage attempts per append / lookup (transient errors only). Default: 3 */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export class DurabilityLog {
  private readonly locks = new KeyedLock();
  private readonly retry: Required<DurabilityLogOptions>;

  constructor(
    private readonly store: WebhookLogStore,
    options: DurabilityLogOptions = {}
  ) {
    this.retry = {
      maxAttempts: options.maxAttempts ?? 3,
      baseDelayMs: options.baseDelayMs ?? 100,
      maxDelayMs: options.maxDelayMs ?? 1_000,
    };
  }

  async append(key: IdempotencyKey, raw: RawEvent, record: NormalizedRecord): Promise<AppendResult> {
    return this.locks.run(key, async () => {
      try {
        const result = await retryWithBackoff(
          () =>
            this.store.insertIfAbsent({
              idempotencyKey: key,
              raw,
              rawSha256: sha256Hex(raw.body),
              record,
            }),
          { ...this.retry, context: 'durability-log.append' }
        );

        if (result.created) {
          logger.info('Event appended to durability log', {
            idempotencyKey: key,
            userId: record.location.user_id,
            eventType: record.location.event_type,
          });
        } else {
          logger.info('Duplicate event, durability log entry already exists', {
            idempotencyKey: key,
            firstReceivedAt: result.entry.raw.receivedAt,
          });
        }

        return { handle: Object.freeze(result.entry), created: result.created };
      } catch (err) {
        throw new DurabilityError(`Durability log append failed: ${errorMessage(err)}`, {
          idempotencyKey: key,
        });
      }
    });
  }

  async lookup(key: IdempotencyKey): Promise<LogHandle | null> {
    try {
      const entry = await retryWithBackoff(() => this.store.findByKey(key), {
        ...this.retry,
        context: 'durability-log.lookup',
      });
      return entry ? Object.freeze(entry) : null;
    } catch (err) {
      throw new DurabilityError(`Durability log lookup failed: ${errorMessage(err)}`, {
        idempotencyKey: key,
      });
    }
  }

  async ping(): Promise<void> {
    await this.store.ping();
  }
}
