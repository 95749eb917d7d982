import { describe, it, expect } from 'vitest';
import { AssessorExtractor } from '../../src/extractors/assessor.js';

const FETCHED_AT = '2024-06-01T00:00:00.000Z';
const URL = 'https://example.com/property-search?zip=75024';

describe('AssessorExtractor', () => {
  const extractor = new AssessorExtractor();

  it('should read the results table through header aliases', () => {
    const html = `
      <table class="property-results" data-county="Collin">
        <thead>
          <tr><th>Account #</th><th>Owner Name</th><th>Property Address</th><th>Market Value</th><th>Year Built</th><th>Sale Date</th></tr>
        </thead>
        <tbody>
          <tr><td>R-1001</td><td>Jane Doe</td><td>4521 Preston Rd, Plano, TX 75024</td><td>$450,000</td><td>2009</td><td>03/01/2024</td></tr>
          <tr><td></td><td>Missing Account</td><td>1 Elm St</td><td>$100,000</td><td>1990</td><td></td></tr>
        </tbody>
      </table>`;

    expect(extractor.extract(html, URL, FETCHED_AT)).toEqual([
      {
        sourceType: 'assessor',
        sourceUrl: URL,
        fetchedAt: FETCHED_AT,
        accountNumber: 'R-1001',
        ownerName: 'Jane Doe',
        address: '4521 Preston Rd',
        city: 'Plano',
        state: 'TX',
        postalCode: '75024',
        county: 'Collin',
        value: 450000,
        builtYear: 2009,
        lastSaleDate: '2024-03-01',
      },
    ]);
  });

  it('should prefer a data-field attribute over the header', () => {
    const html = `
      <table class="property-results">
        <tr><th>Ref</th><th>Where</th></tr>
        <tbody>
          <tr><td data-field="accountNumber">R-2002</td><td data-field="postalCode">75093</td></tr>
        </tbody>
      </table>`;

    const records = extractor.extract(html, URL, FETCHED_AT);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ accountNumber: 'R-2002', postalCode: '75093', state: 'TX' });
  });

  it('should yield nothing for pages without results', () => {
    expect(extractor.tryExtract('<p>No records found</p>', URL, FETCHED_AT)).toEqual({ records: [] });
  });
});
