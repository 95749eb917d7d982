import { describe, it, expect } from 'vitest';
import { PermitExtractor, isRoofingRelated } from '../../src/extractors/permit.js';

const FETCHED_AT = '2024-06-01T00:00:00.000Z';
const URL = 'https://example.com/permits?city=dallas';

describe('PermitExtractor', () => {
  const extractor = new PermitExtractor();

  it('should keep roofing permits and high-value permits', () => {
    const html = `
      <table class="permit-results" data-city="Dallas" data-county="Dallas">
        <thead>
          <tr><th>Permit #</th><th>Issue Date</th><th>Permit Type</th><th>Description</th><th>Address</th><th>Valuation</th></tr>
        </thead>
        <tbody>
          <tr><td>BP-1</td><td>05/20/2024</td><td>Residential</td><td>Roof replacement - tear off</td><td>100 Elm St</td><td>$18,500</td></tr>
          <tr><td>BP-2</td><td>05/21/2024</td><td>Residential</td><td>Interior remodel</td><td>200 Oak St</td><td>$4,000</td></tr>
          <tr><td>BP-3</td><td>05/22/2024</td><td>Pool</td><td>Pool construction</td><td>300 Pine St</td><td>$45,000</td></tr>
        </tbody>
      </table>`;

    const records = extractor.extract(html, URL, FETCHED_AT);
    expect(records.map(record => record.permitId)).toEqual(['BP-1', 'BP-3']);
    expect(records[0]).toEqual({
      sourceType: 'permit',
      sourceUrl: URL,
      fetchedAt: FETCHED_AT,
      permitId: 'BP-1',
      dateFiled: '2024-05-20',
      permitType: 'Residential',
      workDescription: 'Roof replacement - tear off',
      address: '100 Elm St',
      city: 'Dallas',
      state: 'TX',
      county: 'Dallas',
      value: 18500,
    });
  });

  it('should match roofing keywords or valuation', () => {
    expect(isRoofingRelated({ workDescription: 'Hail damage repair' })).toBe(true);
    expect(isRoofingRelated({ permitType: 'RE-ROOF' })).toBe(true);
    expect(isRoofingRelated({ workDescription: 'Fence', value: 10000 })).toBe(false);
    expect(isRoofingRelated({ workDescription: 'Addition', value: 10001 })).toBe(true);
  });
});
