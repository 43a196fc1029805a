/**
 * Sink Dispatcher
 *
 * Fans one durability-log entry out to every applicable sink. Sinks are
 * delivered to concurrently and independently: each gets its own retry
 * budget, its own per-attempt timeout and its own ledger entry, and one
 * sink's failure never changes another's outcome.
 *
 * Per sink:
 *   1. ledger says delivered → skip (no second side effect)
 *   2. mark pending
 *   3. up to maxAttempts attempts, each bounded by timeoutMs, with
 *      exponential backoff between them
 *   4. mark delivered, or failed(reason of the last attempt)
 *
 * `dispatch` never rejects. Concurrent calls for the same key share the
 * run already in flight.
 */

import type { DeliveryStatus, IdempotencyKey, SinkName } from '@trailhook/shared';
import type { RetryPolicy } from '../config/env';
import { SinkTimeoutError, errorMessage } from '../models/errors/api-error';
import type { Sink, SinkDelivery } from '../sinks';
import { logHelpers, logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import type { DeliveryLedger } from './delivery-ledger.service';
import type { LogHandle } from './durability-log.service';
import { retryAlways, retryWithBackoff } from './retry.service';

export type DispatchResult = Map<SinkName, DeliveryStatus>;

export class SinkDispatcher {
  private readonly inFlight = new Map<IdempotencyKey, Promise<DispatchResult>>();

  constructor(
    private readonly sinks: readonly Sink[],
    private readonly ledger: DeliveryLedger,
    private readonly policy: RetryPolicy
  ) {}

  get sinkNames(): SinkName[] {
    return this.sinks.map((sink) => sink.name);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /**
   * A call for a key that is already in flight joins the running dispatch
   * and gets its result; `sinks` is then ignored. Sinks the running
   * dispatch does not cover are picked up by the next dispatch of the key.
   */
  dispatch(handle: LogHandle, sinks: readonly Sink[] = this.sinks): Promise<DispatchResult> {
    const key = handle.idempotencyKey;
    const existing = this.inFlight.get(key);
    if (existing) {
      logger.debug('Dispatch already in flight, joining', { idempotencyKey: key });
      return existing;
    }

    const run = this.run(handle, sinks).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  /** Resolves once every dispatch started so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight.values()]);
    }
  }

  private async run(handle: LogHandle, sinks: readonly Sink[]): Promise<DispatchResult> {
    const delivery: SinkDelivery = {
      idempotencyKey: handle.idempotencyKey,
      raw: handle.raw,
      record: handle.record,
    };

    const applicable = sinks.filter((sink) => sink.accepts(handle.record));
    const outcomes = await Promise.all(
      applicable.map(async (sink): Promise<[SinkName, DeliveryStatus]> => [
        sink.name,
        await this.deliverTo(sink, delivery),
      ])
    );

    const result: DispatchResult = new Map(outcomes);
    logger.info('Dispatch complete', {
      idempotencyKey: handle.idempotencyKey,
      outcomes: Object.fromEntries([...result].map(([name, status]) => [name, status.state])),
    });
    return result;
  }

  private async deliverTo(sink: Sink, delivery: SinkDelivery): Promise<DeliveryStatus> {
    const key = delivery.idempotencyKey;

    try {
      const previous = await this.ledger.statusOf(key, sink.name);
      if (previous?.status.state === 'delivered') {
        logHelpers.delivery(sink.name, key, 'skipped', { reason: 'already delivered' });
        return { state: 'delivered' };
      }
    } catch (err) {
      // Without the ledger a sink lacking native dedup could publish twice.
      if (!sink.nativeDedup) {
        const reason = `ledger unavailable: ${errorMessage(err)}`;
        logHelpers.delivery(sink.name, key, 'failed', { reason, attempts: 0 });
        return { state: 'failed', reason };
      }
      logger.warn('Ledger read failed; delivering to deduplicating sink anyway', {
        idempotencyKey: key,
        sink: sink.name,
        error: errorMessage(err),
      });
    }

    await this.ledger.markPending(key, sink.name);

    let attempts = 0;
    try {
      await retryWithBackoff(
        (attempt) => {
          attempts = attempt;
          return withTimeout(
            (signal) => sink.deliver(delivery, signal),
            this.policy.timeoutMs,
            () => new SinkTimeoutError(sink.name, this.policy.timeoutMs)
          );
        },
        {
          maxAttempts: this.policy.maxAttempts,
          baseDelayMs: this.policy.baseDelayMs,
          maxDelayMs: this.policy.maxDelayMs,
          context: `sink.${sink.name}`,
          isRetryable: retryAlways,
        }
      );
    } catch (err) {
      const reason = errorMessage(err);
      await this.ledger.markFailed(key, sink.name, reason, attempts);
      logHelpers.delivery(sink.name, key, 'failed', { reason, attempts });
      return { state: 'failed', reason };
    }

    await this.ledger.markDelivered(key, sink.name, attempts);
    logHelpers.delivery(sink.name, key, 'delivered', { attempts });
    return { state: 'delivered' };
  }
}
