/**
 * Date utilities for source date parsing and day arithmetic
 */

import { format, parse, parseISO, isValid } from 'date-fns';

const MS_PER_DAY = 1000 * 60 * 60 * 24;

// Non-ISO layouts seen on county and listing pages
const FALLBACK_FORMATS = ['MM/dd/yyyy', 'M/d/yyyy', 'MM-dd-yyyy', 'yyyy/MM/dd', 'MMM d, yyyy', 'MMMM d, yyyy'];

/**
 * Parse various date formats into a Date object
 */
export function parseDate(dateStr: string | null | undefined): Date | null {
  if (!dateStr) {
    return null;
  }

  const trimmed = dateStr.trim();
  if (!trimmed) {
    return null;
  }

  // Try ISO format first
  const isoDate = parseISO(trimmed);
  if (isValid(isoDate)) {
    return isoDate;
  }

  const reference = new Date(2000, 0, 1);
  for (const layout of FALLBACK_FORMATS) {
    const date = parse(trimmed, layout, reference);
    if (isValid(date)) {
      return date;
    }
  }

  return null;
}

/**
 * Normalize a source date to yyyy-MM-dd, or undefined when unparseable
 */
export function toDateString(dateStr: string | null | undefined): string | undefined {
  const date = parseDate(dateStr);
  return date ? formatDateISO(date) : undefined;
}

/**
 * Format date as ISO string (YYYY-MM-DD) in local time
 */
export function formatDateISO(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Whole days elapsed from `date` to `asOf` (negative when `date` is later)
 */
export function daysBetween(date: Date, asOf: Date): number {
  return Math.floor((asOf.getTime() - date.getTime()) / MS_PER_DAY);
}

/**
 * Days since a source date string, or null when it cannot be parsed
 */
export function daysSince(dateStr: string | null | undefined, asOf: Date): number | null {
  const date = parseDate(dateStr);
  return date ? daysBetween(date, asOf) : null;
}

/**
 * Parse the YYMMDD stamp used in storm report file names (e.g. 240315_rpts.csv)
 */
export function parseReportStamp(stamp: string): Date | null {
  if (!/^\d{6}$/.test(stamp)) {
    return null;
  }
  const date = parse(stamp, 'yyMMdd', new Date(2000, 0, 1));
  return isValid(date) ? date : null;
}

/**
 * Format a date as the YYMMDD report stamp
 */
export function formatReportStamp(date: Date): string {
  return format(date, 'yyMMdd');
}

