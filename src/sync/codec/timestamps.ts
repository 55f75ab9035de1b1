/**
 * Timestamp normalization for remote documents.
 *
 * Remote timestamps arrive as ISO strings (Postgres `timestamptz` in JSON),
 * epoch milliseconds, `Date` objects, or `{ seconds, nanoseconds }` objects
 * exported from document databases. Every one of them is turned into a `Date`
 * before any comparison against a local `last_modified`.
 */

function readNumber(source: Record<string, unknown>, ...keys: string[]): number | null {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validDate(date: Date): Date | null {
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Normalize a remote timestamp. Returns null when the value is not a
 * timestamp in any supported representation.
 */
export function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return validDate(new Date(value.getTime()));
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? validDate(new Date(value)) : null;
  }

  if (typeof value === 'string') {
    if (value.trim() === '') return null;
    return validDate(new Date(value));
  }

  if (isRecord(value)) {
    const seconds = readNumber(value, 'seconds', '_seconds');
    if (seconds === null) return null;
    const nanoseconds = readNumber(value, 'nanoseconds', '_nanoseconds') ?? 0;
    return validDate(new Date(seconds * 1000 + Math.floor(nanoseconds / 1_000_000)));
  }

  return null;
}

export function toIsoString(date: Date): string {
  return date.toISOString();
}
