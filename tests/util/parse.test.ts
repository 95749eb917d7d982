import { describe, it, expect } from 'vitest';
import { cleanText, parseBuiltYear, parseInteger, parseMoney, parseNumber } from '../../src/util/parse.js';

describe('parse helpers', () => {
  describe('parseMoney', () => {
    it('should strip currency symbols and separators', () => {
      expect(parseMoney('$450,000')).toBe(450000);
      expect(parseMoney(' $ 1,250.50 ')).toBe(1250.5);
    });

    it('should expand k and M suffixes', () => {
      expect(parseMoney('450K')).toBe(450000);
      expect(parseMoney('$1.2M')).toBe(1200000);
    });

    it('should pass finite non-negative numbers through', () => {
      expect(parseMoney(300000)).toBe(300000);
      expect(parseMoney(-5)).toBeUndefined();
    });

    it('should return undefined without digits', () => {
      expect(parseMoney('Contact agent')).toBeUndefined();
      expect(parseMoney('')).toBeUndefined();
      expect(parseMoney(null)).toBeUndefined();
    });
  });

  it('should parse the first integer in a string', () => {
    expect(parseInteger('Built 1998')).toBe(1998);
    expect(parseInteger('2,450 sqft')).toBe(2450);
    expect(parseInteger('none')).toBeUndefined();
  });

  it('should parse decimal numbers', () => {
    expect(parseNumber('1.75 in')).toBe(1.75);
    expect(parseNumber(70)).toBe(70);
    expect(parseNumber('n/a')).toBeUndefined();
  });

  describe('parseBuiltYear', () => {
    const asOf = new Date(2024, 5, 1);

    it('should accept plausible years', () => {
      expect(parseBuiltYear('Year Built: 2009', asOf)).toBe(2009);
      expect(parseBuiltYear(2025, asOf)).toBe(2025);
    });

    it('should reject years out of range', () => {
      expect(parseBuiltYear('1700', asOf)).toBeUndefined();
      expect(parseBuiltYear(2026, asOf)).toBeUndefined();
    });
  });

  it('should collapse whitespace', () => {
    expect(cleanText('  Roof   replacement\n tear-off ')).toBe('Roof replacement tear-off');
    expect(cleanText('   ')).toBeUndefined();
  });
});
