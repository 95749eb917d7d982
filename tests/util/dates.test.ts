import { describe, it, expect } from 'vitest';
import {
  daysBetween,
  daysSince,
  formatDateISO,
  formatReportStamp,
  parseDate,
  parseReportStamp,
  toDateString,
} from '../../src/util/dates.js';

describe('date utilities', () => {
  it('should parse ISO and common US layouts', () => {
    expect(toDateString('2024-03-15')).toBe('2024-03-15');
    expect(toDateString('03/15/2024')).toBe('2024-03-15');
    expect(toDateString('3/5/2024')).toBe('2024-03-05');
    expect(toDateString('March 5, 2024')).toBe('2024-03-05');
  });

  it('should return null for unparseable input', () => {
    expect(parseDate('soon')).toBeNull();
    expect(parseDate('')).toBeNull();
    expect(toDateString(undefined)).toBeUndefined();
  });

  it('should count whole days between instants', () => {
    const start = new Date('2024-03-01T00:00:00Z');
    expect(daysBetween(start, new Date('2024-03-11T00:00:00Z'))).toBe(10);
    expect(daysBetween(start, new Date('2024-03-11T23:00:00Z'))).toBe(10);
    expect(daysBetween(new Date('2024-03-11T00:00:00Z'), start)).toBe(-10);
  });

  it('should compute days since a date string', () => {
    expect(daysSince('2024-03-01T00:00:00Z', new Date('2024-03-31T00:00:00Z'))).toBe(30);
    expect(daysSince('unknown', new Date())).toBeNull();
  });

  it('should round-trip the storm report stamp', () => {
    const date = parseReportStamp('240315');
    expect(date).not.toBeNull();
    expect(date ? formatDateISO(date) : null).toBe('2024-03-15');
    expect(formatReportStamp(new Date(2024, 2, 15))).toBe('240315');
    expect(parseReportStamp('2403')).toBeNull();
  });
});
