/**
 * Webhook Log Repository
 *
 * Append-only store behind the durability log. One row holds the raw body
 * (base64) and the normalized record together, so readers never observe
 * one without the other. `idempotency_key` is UNIQUE; inserts use
 * ON CONFLICT DO NOTHING and fall back to reading the existing row.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { normalizedRecordSchema } from '@trailhook/shared';
import type { IdempotencyKey, NormalizedRecord, RawEvent } from '@trailhook/shared';
import { BaseRepository } from './base.repository';
import { DatabaseError } from '../models/errors/api-error';

export interface LogEntry {
  id: string;
  idempotencyKey: IdempotencyKey;
  raw: RawEvent;
  record: NormalizedRecord;
  appendedAt: string;
}

export interface NewLogEntry {
  idempotencyKey: IdempotencyKey;
  raw: RawEvent;
  rawSha256: string;
  record: NormalizedRecord;
}

export interface InsertResult {
  entry: LogEntry;
  created: boolean;
}

export interface WebhookLogStore {
  /** Inserts unless a row with the same key exists; returns the stored row either way. */
  insertIfAbsent(entry: NewLogEntry): Promise<InsertResult>;
  findByKey(key: IdempotencyKey): Promise<LogEntry | null>;
  ping(): Promise<void>;
}

const WebhookLogRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  idempotency_key: z.string(),
  raw_body_base64: z.string(),
  received_at: z.string(),
  normalized_record: normalizedRecordSchema,
  created_at: z.string(),
});

type WebhookLogRow = z.infer<typeof WebhookLogRowSchema>;

function rowToEntry(row: WebhookLogRow): LogEntry {
  return {
    id: row.id,
    idempotencyKey: row.idempotency_key,
    raw: {
      body: Buffer.from(row.raw_body_base64, 'base64'),
      receivedAt: new Date(row.received_at).toISOString(),
    },
    record: row.normalized_record,
    appendedAt: new Date(row.created_at).toISOString(),
  };
}

export class WebhookLogRepository extends BaseRepository implements WebhookLogStore {
  constructor(supabase: SupabaseClient) {
    super(supabase, 'webhook_log');
  }

  async insertIfAbsent(entry: NewLogEntry): Promise<InsertResult> {
    const started = Date.now();
    const { location } = entry.record;

    const { data, error } = await this.supabase
      .from(this.tableName)
      .upsert(
        {
          idempotency_key: entry.idempotencyKey,
          raw_body_base64: entry.raw.body.toString('base64'),
          raw_sha256: entry.rawSha256,
          received_at: entry.raw.receivedAt,
          normalized_record: entry.record,
          user_id: location.user_id,
          event_type: location.event_type,
          event_timestamp: location.event_timestamp,
        },
        { onConflict: 'idempotency_key', ignoreDuplicates: true }
      )
      .select('*');

    if (error) {
      this.fail('insert', error, { idempotencyKey: entry.idempotencyKey });
    }

    const inserted: unknown[] = data ?? [];
    if (inserted.length > 0) {
      return this.timed('insert', started, {
        entry: rowToEntry(this.parseRow(WebhookLogRowSchema, inserted[0])),
        created: true,
      });
    }

    // Conflict: another writer already stored this key
    const existing = await this.findByKey(entry.idempotencyKey);
    if (!existing) {
      throw new DatabaseError('webhook_log insert skipped as duplicate but no row was found', {
        idempotencyKey: entry.idempotencyKey,
      });
    }

    return this.timed('insert (duplicate)', started, { entry: existing, created: false });
  }

  async findByKey(key: IdempotencyKey): Promise<LogEntry | null> {
    const started = Date.now();

    const { data, error } = await this.supabase
      .from(this.tableName)
      .select('*')
      .eq('idempotency_key', key)
      .maybeSingle();

    if (error) {
      this.fail('read', error, { idempotencyKey: key });
    }

    if (data === null) return this.timed('read', started, null);

    return this.timed('read', started, rowToEntry(this.parseRow(WebhookLogRowSchema, data)));
  }
}
