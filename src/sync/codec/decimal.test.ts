import { describe, expect, it } from 'vitest';
import { normalizeDecimal, parseDecimal } from './decimal';

describe('normalizeDecimal', () => {
  it('should strip redundant zeros', () => {
    expect(normalizeDecimal('0100.50')).toBe('100.5');
    expect(normalizeDecimal('12.000')).toBe('12');
    expect(normalizeDecimal('0.05')).toBe('0.05');
  });

  it('should canonicalize signs', () => {
    expect(normalizeDecimal('+5')).toBe('5');
    expect(normalizeDecimal('-0.00')).toBe('0');
    expect(normalizeDecimal('-42.10')).toBe('-42.1');
  });

  it('should trim surrounding whitespace', () => {
    expect(normalizeDecimal('  7.25 ')).toBe('7.25');
  });

  it('should reject anything that is not a plain decimal', () => {
    expect(normalizeDecimal('')).toBeNull();
    expect(normalizeDecimal('1e3')).toBeNull();
    expect(normalizeDecimal('12.')).toBeNull();
    expect(normalizeDecimal('1,000')).toBeNull();
    expect(normalizeDecimal('abc')).toBeNull();
  });
});

describe('parseDecimal', () => {
  it('should keep decimal strings exact', () => {
    expect(parseDecimal('1234567890.123456789')).toBe('1234567890.123456789');
  });

  it('should convert legacy numeric amounts', () => {
    expect(parseDecimal(150)).toBe('150');
    expect(parseDecimal(19.99)).toBe('19.99');
  });

  it('should reject non-finite and exponent-sized numbers', () => {
    expect(parseDecimal(Number.POSITIVE_INFINITY)).toBeNull();
    expect(parseDecimal(1e21)).toBeNull();
  });

  it('should reject other types', () => {
    expect(parseDecimal(null)).toBeNull();
    expect(parseDecimal(true)).toBeNull();
    expect(parseDecimal({ amount: '1' })).toBeNull();
  });
});
