/**
 * Supabase Database Configuration
 *
 * Service-role client for the durability log and delivery ledger tables.
 * Sessions are never persisted: the backend is the only caller.
 */

import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './env';
import { logger } from '../utils/logger';

export function createSupabaseClient(config: AppConfig['supabase']): SupabaseClient {
  const client = createClient(config.url, config.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });

  logger.info('Supabase client initialized', { url: config.url });
  return client;
}
