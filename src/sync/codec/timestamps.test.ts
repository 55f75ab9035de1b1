import { describe, expect, it } from 'vitest';
import { toDate, toIsoString } from './timestamps';

describe('toDate', () => {
  it('should parse ISO strings', () => {
    expect(toDate('2024-03-01T10:00:00.000Z')?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
  });

  it('should parse Postgres timestamptz text with an offset', () => {
    expect(toDate('2024-03-01T10:00:00.123+00:00')?.toISOString()).toBe('2024-03-01T10:00:00.123Z');
  });

  it('should accept epoch milliseconds', () => {
    expect(toDate(Date.UTC(2024, 2, 1, 10))?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
  });

  it('should accept seconds/nanoseconds objects', () => {
    const seconds = Date.UTC(2024, 2, 1, 10) / 1000;
    expect(toDate({ seconds, nanoseconds: 250_000_000 })?.toISOString()).toBe('2024-03-01T10:00:00.250Z');
    expect(toDate({ _seconds: seconds, _nanoseconds: 0 })?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
  });

  it('should copy Date instances', () => {
    const original = new Date('2024-03-01T10:00:00.000Z');
    const copy = toDate(original);

    expect(copy).not.toBe(original);
    expect(copy?.getTime()).toBe(original.getTime());
  });

  it('should return null for values that are not timestamps', () => {
    expect(toDate(undefined)).toBeNull();
    expect(toDate(null)).toBeNull();
    expect(toDate('')).toBeNull();
    expect(toDate('yesterday-ish')).toBeNull();
    expect(toDate(Number.NaN)).toBeNull();
    expect(toDate({ nanoseconds: 5 })).toBeNull();
    expect(toDate(['2024-03-01'])).toBeNull();
  });
});

describe('toIsoString', () => {
  it('should format in UTC with milliseconds', () => {
    expect(toIsoString(new Date(Date.UTC(2024, 0, 5, 13)))).toBe('2024-01-05T13:00:00.000Z');
  });
});
