import { describe, it, expect } from '@jest/globals';
import { createHash } from 'crypto';
import {
  canonicalJson,
  deriveIdempotencyKey,
  extractSourceEventId,
  sha256Hex,
} from '../../src/services/idempotency.service';
import { locationPayload } from '../helpers/fixtures';

const sha = (s: string) => createHash('sha256').update(s).digest('hex');

describe('canonicalJson()', () => {
  it('sorts keys recursively and keeps array order', () => {
    expect(canonicalJson({ b: 1, a: { d: [3, 1], c: null } })).toBe('{"a":{"c":null,"d":[3,1]},"b":1}');
  });

  it('drops undefined properties', () => {
    expect(canonicalJson({ a: undefined, b: 'x' })).toBe('{"b":"x"}');
  });
});

describe('extractSourceEventId()', () => {
  it('prefers the top-level id', () => {
    expect(extractSourceEventId({ id: ' evt-1 ', user: { event_id: 'evt-2' } })).toBe('evt-1');
  });

  it('falls back to user.event_id', () => {
    expect(extractSourceEventId({ user: { event_id: 77 } })).toBe('77');
  });

  it('returns null when neither is usable', () => {
    expect(extractSourceEventId({ id: '', user: 'nope' })).toBeNull();
  });
});

describe('deriveIdempotencyKey()', () => {
  it('hashes the source id when present', () => {
    expect(deriveIdempotencyKey({ id: 'evt-1', ...locationPayload() })).toBe(sha('source:evt-1'));
  });

  it('ignores the rest of the payload when a source id is present', () => {
    const first = deriveIdempotencyKey({ id: 'evt-1', ...locationPayload({ latitude: 1 }) });
    const second = deriveIdempotencyKey({ id: 'evt-1', ...locationPayload({ latitude: 2 }) });
    expect(first).toBe(second);
  });

  it('hashes canonical JSON when no source id is present', () => {
    const payload = { location: { user_id: '1', latitude: 0 } };
    expect(deriveIdempotencyKey(payload)).toBe(sha('payload:{"location":{"latitude":0,"user_id":"1"}}'));
  });

  it('is insensitive to key order', () => {
    const a: Record<string, unknown> = JSON.parse('{"location":{"user_id":"1","latitude":0}}');
    const b: Record<string, unknown> = JSON.parse('{"location":{"latitude":0,"user_id":"1"}}');
    expect(deriveIdempotencyKey(a)).toBe(deriveIdempotencyKey(b));
  });

  it('differs for different payloads', () => {
    expect(deriveIdempotencyKey(locationPayload({ latitude: 1 }))).not.toBe(
      deriveIdempotencyKey(locationPayload({ latitude: 2 }))
    );
  });

  it('produces 64-char lowercase hex', () => {
    expect(sha256Hex('x')).toMatch(/^[0-9a-f]{64}$/);
  });
});
