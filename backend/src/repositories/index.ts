/**
 * Repository Index
 *
 * Central export point for all repositories.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { WebhookLogRepository } from './webhook-log.repository';
import { DeliveryLedgerRepository } from './delivery-ledger.repository';

export { BaseRepository } from './base.repository';
export { WebhookLogRepository } from './webhook-log.repository';
export type { LogEntry, NewLogEntry, InsertResult, WebhookLogStore } from './webhook-log.repository';
export { DeliveryLedgerRepository } from './delivery-ledger.repository';
export type {
  LedgerEntry,
  DeliveryLedgerStore,
  FailedListOptions,
  FailedListResult,
} from './delivery-ledger.repository';

/**
 * Holds all repository instances for a given Supabase client.
 */
export class RepositoryContainer {
  public readonly webhookLog: WebhookLogRepository;
  public readonly deliveryLedger: DeliveryLedgerRepository;

  constructor(supabase: SupabaseClient) {
    this.webhookLog = new WebhookLogRepository(supabase);
    this.deliveryLedger = new DeliveryLedgerRepository(supabase);
  }
}

export function createRepositories(supabase: SupabaseClient): RepositoryContainer {
  return new RepositoryContainer(supabase);
}
