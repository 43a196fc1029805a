/**
 * Base Repository
 *
 * Shared plumbing for Supabase-backed repositories: table name, error
 * translation into DatabaseError, and connectivity checks.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ZodType, ZodTypeDef } from 'zod';
import { DatabaseError } from '../models/errors/api-error';
import { logger, logHelpers } from '../utils/logger';

interface PostgrestErrorLike {
  message: string;
  code?: string;
}

export abstract class BaseRepository {
  protected supabase: SupabaseClient;
  protected tableName: string;

  constructor(supabase: SupabaseClient, tableName: string) {
    this.supabase = supabase;
    this.tableName = tableName;
  }

  /**
   * Throws a DatabaseError carrying the driver message so transient
   * conditions stay recognisable to the retry classifier.
   */
  protected fail(operation: string, error: PostgrestErrorLike, meta?: Record<string, unknown>): never {
    logger.error(`Failed to ${operation} ${this.tableName}`, {
      ...meta,
      code: error.code,
      error: error.message,
    });
    throw new DatabaseError(`Failed to ${operation} ${this.tableName}: ${error.message}`, {
      code: error.code,
    });
  }

  /**
   * Validates a row returned by PostgREST against the table's row schema.
   */
  protected parseRow<T>(schema: ZodType<T, ZodTypeDef, unknown>, row: unknown): T {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      logger.error(`Malformed ${this.tableName} row`, {
        issues: parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      });
      throw new DatabaseError(`Malformed ${this.tableName} row`);
    }
    return parsed.data;
  }

  protected timed<T>(operation: string, started: number, result: T): T {
    logHelpers.dbQuery(operation, this.tableName, Date.now() - started);
    return result;
  }

  /**
   * Lightweight connectivity probe used by the health check.
   */
  async ping(): Promise<void> {
    const { error } = await this.supabase.from(this.tableName).select('*', { head: true, count: 'exact' }).limit(1);
    if (error) {
      this.fail('ping', error);
    }
  }
}
