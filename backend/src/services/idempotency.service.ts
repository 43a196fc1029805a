/**
 * Idempotency Key Derivation
 *
 * Webhook senders retry deliveries, so every accepted event is keyed by a
 * value derived from the payload itself:
 *
 *   • Source event id present  → sha256("source:" + id)
 *     (top-level `id`, else `user.event_id`)
 *   • No source event id       → sha256("payload:" + canonical JSON)
 *
 * Canonical JSON sorts object keys recursively, so re-serialized or
 * re-indented replays of the same event map to the same key.
 */

import { createHash } from 'crypto';
import type { IdempotencyKey } from '@trailhook/shared';
import { isPlainObject } from './payload-coercion';

const SOURCE_PREFIX = 'source:';
const PAYLOAD_PREFIX = 'payload:';

export function sha256Hex(input: string | Buffer): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * JSON serialization with recursively sorted object keys.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }

  if (isPlainObject(value)) {
    const obj = value;
    const entries = Object.keys(obj)
      .filter((key) => obj[key] !== undefined)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(obj[key])}`);
    return `{${entries.join(',')}}`;
  }

  return JSON.stringify(value) ?? 'null';
}

/**
 * Returns the sender's own event id, if the payload carries one.
 */
export function extractSourceEventId(payload: Record<string, unknown>): string | null {
  const candidates: unknown[] = [payload.id];
  if (isPlainObject(payload.user)) {
    candidates.push(payload.user.event_id);
  }

  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate.trim() !== '') return candidate.trim();
    if (typeof candidate === 'number' && Number.isFinite(candidate)) return String(candidate);
  }

  return null;
}

export function deriveIdempotencyKey(payload: Record<string, unknown>): IdempotencyKey {
  const sourceId = extractSourceEventId(payload);

  if (sourceId !== null) {
    return sha256Hex(`${SOURCE_PREFIX}${sourceId}`);
  }

  return sha256Hex(`${PAYLOAD_PREFIX}${canonicalJson(payload)}`);
}
