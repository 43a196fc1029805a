/**
 * Delivery Ledger Repository
 *
 * One row per (idempotency_key, sink) holding the latest delivery status.
 * Writes are upserts on the composite primary key; the last write wins.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { deliveryStateSchema, sinkNameSchema } from '@trailhook/shared';
import type { DeliveryStatus, IdempotencyKey, SinkName } from '@trailhook/shared';
import { BaseRepository } from './base.repository';

export interface LedgerEntry {
  idempotencyKey: IdempotencyKey;
  sink: SinkName;
  status: DeliveryStatus;
  /** Attempts made in the most recent dispatch */
  attempts: number;
  updatedAt: string;
}

export interface FailedListOptions {
  sink?: SinkName;
  limit: number;
  offset: number;
}

export interface FailedListResult {
  entries: LedgerEntry[];
  total: number;
}

export interface DeliveryLedgerStore {
  get(key: IdempotencyKey, sink: SinkName): Promise<LedgerEntry | null>;
  upsert(entry: LedgerEntry): Promise<void>;
  listForKey(key: IdempotencyKey): Promise<LedgerEntry[]>;
  listFailed(options: FailedListOptions): Promise<FailedListResult>;
}

const LedgerRowSchema = z.object({
  idempotency_key: z.string(),
  sink: sinkNameSchema,
  status: deliveryStateSchema,
  attempts: z.number().int().nonnegative(),
  reason: z.string().nullable(),
  updated_at: z.string(),
});

type LedgerRow = z.infer<typeof LedgerRowSchema>;

function toStatus(row: LedgerRow): DeliveryStatus {
  if (row.status === 'failed') {
    return { state: 'failed', reason: row.reason ?? 'unknown' };
  }
  return { state: row.status };
}

export class DeliveryLedgerRepository extends BaseRepository implements DeliveryLedgerStore {
  constructor(supabase: SupabaseClient) {
    super(supabase, 'delivery_ledger');
  }

  private rowToEntry(row: unknown): LedgerEntry {
    const parsed = this.parseRow(LedgerRowSchema, row);
    return {
      idempotencyKey: parsed.idempotency_key,
      sink: parsed.sink,
      status: toStatus(parsed),
      attempts: parsed.attempts,
      updatedAt: new Date(parsed.updated_at).toISOString(),
    };
  }

  async get(key: IdempotencyKey, sink: SinkName): Promise<LedgerEntry | null> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .select('*')
      .eq('idempotency_key', key)
      .eq('sink', sink)
      .maybeSingle();

    if (error) {
      this.fail('read', error, { idempotencyKey: key, sink });
    }

    return data === null ? null : this.rowToEntry(data);
  }

  async upsert(entry: LedgerEntry): Promise<void> {
    const started = Date.now();

    const { error } = await this.supabase.from(this.tableName).upsert(
      {
        idempotency_key: entry.idempotencyKey,
        sink: entry.sink,
        status: entry.status.state,
        attempts: entry.attempts,
        reason: entry.status.state === 'failed' ? entry.status.reason.substring(0, 2000) : null,
        updated_at: entry.updatedAt,
      },
      { onConflict: 'idempotency_key,sink' }
    );

    if (error) {
      this.fail('upsert', error, { idempotencyKey: entry.idempotencyKey, sink: entry.sink });
    }

    this.timed('upsert', started, undefined);
  }

  async listForKey(key: IdempotencyKey): Promise<LedgerEntry[]> {
    const { data, error } = await this.supabase
      .from(this.tableName)
      .select('*')
      .eq('idempotency_key', key)
      .order('sink', { ascending: true });

    if (error) {
      this.fail('list', error, { idempotencyKey: key });
    }

    const rows: unknown[] = data ?? [];
    return rows.map((row) => this.rowToEntry(row));
  }

  async listFailed(options: FailedListOptions): Promise<FailedListResult> {
    let query = this.supabase
      .from(this.tableName)
      .select('*', { count: 'exact' })
      .eq('status', 'failed')
      .order('updated_at', { ascending: false })
      .range(options.offset, options.offset + options.limit - 1);

    if (options.sink) {
      query = query.eq('sink', options.sink);
    }

    const { data, error, count } = await query;

    if (error) {
      this.fail('list failed', error, { sink: options.sink });
    }

    const rows: unknown[] = data ?? [];
    return {
      entries: rows.map((row) => this.rowToEntry(row)),
      total: count ?? 0,
    };
  }
}
