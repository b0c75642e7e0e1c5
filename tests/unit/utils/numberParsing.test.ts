import { describe, it, expect } from 'vitest';
import { formatKwh, normalizeGermanDecimal, parseKwhValue } from '../../../src/utils/numberParsing';

describe('normalizeGermanDecimal', () => {
  it('2573.1 -> 2573.1', () => {
    expect(normalizeGermanDecimal('2573.1')).toBe(2573.1);
  });

  it('2.573,1 -> 2573.1 (dot thousands, comma decimal)', () => {
    expect(normalizeGermanDecimal('2.573,1')).toBe(2573.1);
  });

  it('2,573.1 -> 2573.1 (right-most separator is the decimal one)', () => {
    expect(normalizeGermanDecimal('2,573.1')).toBe(2573.1);
  });

  it('1.234.567,89 -> 1234567.89', () => {
    expect(normalizeGermanDecimal('1.234.567,89')).toBe(1234567.89);
  });

  it('73,5 -> 73.5 (comma with 1-2 trailing digits is decimal)', () => {
    expect(normalizeGermanDecimal('73,5')).toBe(73.5);
  });

  it('12,345 -> 12345 (comma with 3 trailing digits groups thousands)', () => {
    expect(normalizeGermanDecimal('12,345')).toBe(12345);
  });

  it('2.573 -> 2573 (dot with 3 trailing digits groups thousands)', () => {
    expect(normalizeGermanDecimal('2.573')).toBe(2573);
  });

  it('1.234.56 -> null (several decimal-looking separators)', () => {
    expect(normalizeGermanDecimal('1.234.56')).toBeNull();
  });

  it('1,234,56 -> null (several decimal-looking commas)', () => {
    expect(normalizeGermanDecimal('1,234,56')).toBeNull();
  });

  it('keeps plain integers', () => {
    expect(normalizeGermanDecimal('850')).toBe(850);
  });

  it('tolerates surrounding and non-breaking spaces', () => {
    expect(normalizeGermanDecimal(' 2.573,1\u00A0')).toBe(2573.1);
  });

  it('abc -> null', () => {
    expect(normalizeGermanDecimal('abc')).toBeNull();
  });

  it('empty -> null', () => {
    expect(normalizeGermanDecimal('')).toBeNull();
  });

  it('exponent notation is not a number token', () => {
    expect(normalizeGermanDecimal('1e5')).toBeNull();
  });
});

describe('parseKwhValue', () => {
  it('accepts values strictly inside (1, 100000)', () => {
    expect(parseKwhValue('99.999')).toBe(99999);
    expect(parseKwhValue('1,5')).toBe(1.5);
  });

  it('rejects the bounds themselves', () => {
    expect(parseKwhValue('1,0')).toBeNull();
    expect(parseKwhValue('100.000')).toBeNull();
  });

  it('rejects values whose one-decimal rendering hits a bound', () => {
    expect(parseKwhValue('1,04')).toBeNull();
    expect(parseKwhValue('99.999,96')).toBeNull();
  });

  it('rejects customer-number sized values', () => {
    expect(parseKwhValue('123456')).toBeNull();
  });

  it('honours a custom range', () => {
    expect(parseKwhValue('150000', { min: 1, max: 1000000 })).toBe(150000);
  });

  it('accepts numbers as-is', () => {
    expect(parseKwhValue(2573.1)).toBe(2573.1);
    expect(parseKwhValue(Number.NaN)).toBeNull();
  });
});

describe('formatKwh', () => {
  it('always renders one fractional digit', () => {
    expect(formatKwh(2573)).toBe('2573.0');
    expect(formatKwh(2573.1)).toBe('2573.1');
    expect(formatKwh(1234567.89)).toBe('1234567.9');
  });
});
