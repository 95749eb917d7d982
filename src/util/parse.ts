/**
 * Field parsing helpers shared by the extractors
 */

/**
 * Parse a money string such as "$450,000", "450K" or "1.2M".
 * Returns undefined for anything without digits.
 */
export function parseMoney(value: string | number | null | undefined): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : undefined;
  }
  if (!value) {
    return undefined;
  }

  const match = value
    .replace(/[$,\s]/g, '')
    .match(/(\d+(?:\.\d+)?)([kKmM])?/);
  if (!match || !match[1]) {
    return undefined;
  }

  let amount = parseFloat(match[1]);
  const suffix = match[2]?.toLowerCase();
  if (suffix === 'k') amount *= 1_000;
  if (suffix === 'm') amount *= 1_000_000;

  return Number.isFinite(amount) ? Math.round(amount * 100) / 100 : undefined;
}

/**
 * Parse the first integer in a string ("Built 1998" -> 1998)
 */
export function parseInteger(value: string | number | null | undefined): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined;
  }
  if (!value) {
    return undefined;
  }
  const match = value.replace(/,/g, '').match(/-?\d+/);
  return match ? parseInt(match[0], 10) : undefined;
}

/**
 * Parse a decimal number, ignoring surrounding text
 */
export function parseNumber(value: string | number | null | undefined): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (!value) {
    return undefined;
  }
  const match = value.replace(/,/g, '').match(/-?\d+(?:\.\d+)?/);
  return match ? parseFloat(match[0]) : undefined;
}

/**
 * A plausible construction year, or undefined
 */
export function parseBuiltYear(value: string | number | null | undefined, asOf: Date = new Date()): number | undefined {
  const year = parseInteger(value);
  if (year === undefined || year < 1800 || year > asOf.getFullYear() + 1) {
    return undefined;
  }
  return year;
}

/**
 * Trim and collapse whitespace; empty strings become undefined
 */
export function cleanText(value: string | null | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const cleaned = value.replace(/\s+/g, ' ').trim();
  return cleaned || undefined;
}
