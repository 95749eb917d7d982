/**
 * Page selectors and column aliases used by the HTML extractors
 */

export const LISTING_SELECTORS = {
  card: '[data-listing-id]',
  address: '[data-field="address"], .listing-address, address',
  price: '[data-field="price"], .listing-price, .price',
  daysOnMarket: '[data-field="days-on-market"], .days-on-market',
  yearBuilt: '[data-field="year-built"], .year-built',
  propertyType: '[data-field="property-type"], .property-type',
  jsonLd: 'script[type="application/ld+json"]',
} as const;

export const LISTING_JSON_LD_TYPES = ['SingleFamilyResidence', 'Residence', 'House', 'Apartment', 'Product'];

export const ASSESSOR_TABLE = 'table.property-results';
export const PERMIT_TABLE = 'table.permit-results';

// Lowercased header text -> field
export const ASSESSOR_COLUMNS: Record<string, readonly string[]> = {
  accountNumber: ['account', 'account #', 'account number', 'account no', 'property id', 'parcel id'],
  ownerName: ['owner', 'owner name'],
  address: ['address', 'property address', 'situs address', 'site address'],
  city: ['city'],
  postalCode: ['zip', 'zip code', 'postal code'],
  value: ['appraised value', 'market value', 'total value', 'value'],
  builtYear: ['year built', 'yr built', 'built'],
  propertyType: ['property type', 'type', 'class', 'state code'],
  lastSaleDate: ['last sale', 'sale date', 'deed date'],
};

export const PERMIT_COLUMNS: Record<string, readonly string[]> = {
  permitId: ['permit #', 'permit number', 'permit no', 'permit', 'permit id'],
  dateFiled: ['date filed', 'filed', 'issue date', 'issued', 'application date'],
  permitType: ['permit type', 'type', 'work type'],
  workDescription: ['description', 'work description', 'scope of work', 'scope'],
  address: ['address', 'property address', 'site address', 'location'],
  city: ['city'],
  postalCode: ['zip', 'zip code', 'postal code'],
  value: ['valuation', 'job value', 'estimated value', 'value'],
};

// A permit is kept when its type or description mentions one of these
export const ROOFING_PERMIT_KEYWORDS = [
  'roof',
  'reroof',
  're-roof',
  'shingle',
  'storm',
  'hail',
  'wind damage',
  'gutter',
];

// ...or when its valuation is above this
export const PERMIT_MIN_VALUE = 10_000;
