/**
 * Epoch values below this are read as seconds, above it as milliseconds.
 * 1e11 seconds is roughly the year 5138; 1e11 ms is early 1973.
 */
const EPOCH_SECONDS_CUTOFF = 1e11;

const NUMERIC_PATTERN = /^-?\d+(\.\d+)?$/;

/** Years a four-digit ISO string and a Postgres TIMESTAMPTZ both hold. */
const MIN_YEAR = 1;
const MAX_YEAR = 9999;

/**
 * Parses an ISO-8601 string or an epoch value (seconds or milliseconds,
 * as a number or numeric string) into a UTC ISO-8601 string.
 * Returns null when the value cannot be read as an instant.
 */
export function parseInstant(value: string | number): string | null {
  if (typeof value === 'number') {
    return fromEpoch(value);
  }

  const trimmed = value.trim();
  if (trimmed === '') return null;

  if (NUMERIC_PATTERN.test(trimmed)) {
    return fromEpoch(Number(trimmed));
  }

  return toIsoInstant(Date.parse(trimmed));
}

function fromEpoch(value: number): string | null {
  if (!Number.isFinite(value)) return null;
  return toIsoInstant(Math.abs(value) < EPOCH_SECONDS_CUTOFF ? value * 1000 : value);
}

function toIsoInstant(ms: number): string | null {
  const date = new Date(ms);
  if (Number.isNaN(date.getTime())) return null;
  const year = date.getUTCFullYear();
  return year < MIN_YEAR || year > MAX_YEAR ? null : date.toISOString();
}

/**
 * Returns true when ISO instant `later` is at or after `earlier`.
 */
export function isNotBefore(later: string, earlier: string): boolean {
  return Date.parse(later) >= Date.parse(earlier);
}
