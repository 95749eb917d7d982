/**
 * Address normalization utilities
 */

/**
 * Normalize an address string for consistent matching
 */
export function normalizeAddress(address: string | null | undefined): string | undefined {
  if (!address) {
    return undefined;
  }

  const normalized = address
    .trim()
    .toUpperCase()
    .replace(/[.,]/g, ' ')
    // Remove extra whitespace
    .replace(/\s+/g, ' ')
    // Normalize common abbreviations
    .replace(/\bSTREET\b/g, 'ST')
    .replace(/\bAVENUE\b/g, 'AVE')
    .replace(/\bBOULEVARD\b/g, 'BLVD')
    .replace(/\bROAD\b/g, 'RD')
    .replace(/\bDRIVE\b/g, 'DR')
    .replace(/\bLANE\b/g, 'LN')
    .replace(/\bCOURT\b/g, 'CT')
    .replace(/\bPLACE\b/g, 'PL')
    .replace(/\bCIRCLE\b/g, 'CIR')
    .replace(/\bPARKWAY\b/g, 'PKWY')
    .replace(/\bTRAIL\b/g, 'TRL')
    .replace(/\bNORTHEAST\b/g, 'NE')
    .replace(/\bNORTHWEST\b/g, 'NW')
    .replace(/\bSOUTHEAST\b/g, 'SE')
    .replace(/\bSOUTHWEST\b/g, 'SW')
    .replace(/\bNORTH\b/g, 'N')
    .replace(/\bSOUTH\b/g, 'S')
    .replace(/\bEAST\b/g, 'E')
    .replace(/\bWEST\b/g, 'W')
    .trim();

  return normalized || undefined;
}

export interface AddressComponents {
  street?: string;
  city?: string;
  state?: string;
  postalCode?: string;
}

/**
 * Split "123 Main St, Dallas, TX 75201" into its parts.
 * Returns only the parts it could find.
 */
export function parseAddressComponents(address: string | null | undefined): AddressComponents {
  if (!address) {
    return {};
  }

  const match = address.match(/^\s*(.+?),\s*([^,]+?),\s*([A-Za-z]{2})\s*(\d{5})(?:-\d{4})?\s*$/);
  if (match && match[1] && match[2] && match[3] && match[4]) {
    return {
      street: match[1].trim(),
      city: match[2].trim(),
      state: match[3].toUpperCase(),
      postalCode: match[4],
    };
  }

  const zip = address.match(/\b(\d{5})(?:-\d{4})?\s*$/);
  return zip && zip[1] ? { postalCode: zip[1] } : {};
}

/**
 * Reduce a ZIP or ZIP+4 string to its first five digits
 */
export function normalizePostalCode(value: string | null | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const digits = value.replace(/\D/g, '').slice(0, 5);
  return digits.length === 5 ? digits : undefined;
}

/**
 * Canonical county key: lowercase, no trailing "County"
 */
export function normalizeCounty(value: string | null | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const cleaned = value
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/\s+county$/, '')
    .trim();
  return cleaned || undefined;
}

/**
 * Canonical city key: trimmed, lowercase, single spaces
 */
export function normalizeCity(value: string | null | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const cleaned = value.trim().toLowerCase().replace(/\s+/g, ' ');
  return cleaned || undefined;
}
