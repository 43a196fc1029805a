/**
 * Delivery Ledger
 *
 * Tracks the latest delivery status of every (idempotency key, sink) pair.
 * Writes for one pair are serialized in process so the last attempt's
 * outcome is the one that sticks. Transient storage errors are retried;
 * a write that still fails is logged and reported to the caller as
 * `false`. It never surfaces to the webhook sender.
 */

import type { DeliveryStatus, IdempotencyKey, SinkName } from '@trailhook/shared';
import type {
  DeliveryLedgerStore,
  FailedListOptions,
  FailedListResult,
  LedgerEntry,
} from '../repositories';
import { errorMessage } from '../models/errors/api-error';
import { KeyedLock } from '../utils/keyed-lock';
import { logger } from '../utils/logger';
import { retryWithBackoff } from './retry.service';

export interface DeliveryLedgerOptions {
  now?: () => Date;
  /** Storage attempts per status write (transient errors only). Default: 3 */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export class DeliveryLedger {
  private readonly locks = new KeyedLock();
  private readonly now: () => Date;
  private readonly retry: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number };

  constructor(
    private readonly store: DeliveryLedgerStore,
    options: DeliveryLedgerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.retry = {
      maxAttempts: options.maxAttempts ?? 3,
      baseDelayMs: options.baseDelayMs ?? 100,
      maxDelayMs: options.maxDelayMs ?? 1_000,
    };
  }

  async statusOf(key: IdempotencyKey, sink: SinkName): Promise<LedgerEntry | null> {
    return this.store.get(key, sink);
  }

  async listForKey(key: IdempotencyKey): Promise<LedgerEntry[]> {
    return this.store.listForKey(key);
  }

  async listFailed(options: FailedListOptions): Promise<FailedListResult> {
    return this.store.listFailed(options);
  }

  markPending(key: IdempotencyKey, sink: SinkName): Promise<boolean> {
    return this.record(key, sink, { state: 'pending' }, 0);
  }

  markDelivered(key: IdempotencyKey, sink: SinkName, attempts: number): Promise<boolean> {
    return this.record(key, sink, { state: 'delivered' }, attempts);
  }

  markFailed(key: IdempotencyKey, sink: SinkName, reason: string, attempts: number): Promise<boolean> {
    return this.record(key, sink, { state: 'failed', reason }, attempts);
  }

  private async record(
    key: IdempotencyKey,
    sink: SinkName,
    status: DeliveryStatus,
    attempts: number
  ): Promise<boolean> {
    return this.locks.run(`${key}:${sink}`, async () => {
      const entry: LedgerEntry = {
        idempotencyKey: key,
        sink,
        status,
        attempts,
        updatedAt: this.now().toISOString(),
      };
      try {
        await retryWithBackoff(() => this.store.upsert(entry), {
          ...this.retry,
          context: `delivery-ledger.${status.state}`,
        });
        return true;
      } catch (err) {
        logger.error('Delivery ledger write failed', {
          idempotencyKey: key,
          sink,
          state: status.state,
          error: errorMessage(err),
        });
        return false;
      }
    });
  }
}
