import { describe, expect, it } from 'vitest';
import { RecordParseError, datasetConfigSchema, type PageContext } from '@harvest/parser-sdk';
import { decodeStreamChunks, extractBalancedJson, vehiclesParser } from '../src/index.js';

function streamScript(payload: string): string {
  return `<script>self.__next_f.push([1,${JSON.stringify(payload)}])</script>`;
}

const config = datasetConfigSchema.parse({
  id: 'used-cars',
  listingUrlTemplate: 'https://example.com/used-cars?page={page}',
  indexName: 'vehicles',
});

const context: PageContext = {
  config,
  page: 1,
  url: 'https://example.com/used-cars?page=1',
  contentType: 'text/html',
};

const itemList = {
  '@context': 'https://schema.org',
  '@type': 'ItemList',
  itemListElement: [
    {
      '@type': 'ListItem',
      position: 1,
      url: '/used-car/infiniti/qx50/2015/715957',
      mainEntity: { '@type': 'Car', name: '2015 Infiniti QX50' },
    },
  ],
};

const listingHtml = `<html><body>
${streamScript(
  [
    '5:{"id":715957,"make":"infiniti","model":"qx50","price":30500,"mileage":"120,000","createdAt":"2024-01-09T10:00:00.000Z"}',
    '6:{"id":800001,"make":"acme","price":12000}',
    `7:${JSON.stringify(itemList)}`,
    '8:{"id":"menu","label":"Navigation"}',
  ].join('\n'),
)}
</body></html>`;

describe('stream helpers', () => {
  it('decodes pushed chunks', () => {
    expect(decodeStreamChunks(streamScript('a:"quoted" \\ text'))).toEqual(['a:"quoted" \\ text']);
  });

  it('ignores braces inside strings', () => {
    expect(extractBalancedJson('{"a":"}{","b":{"c":1}} trailing')).toBe('{"a":"}{","b":{"c":1}}');
    expect(extractBalancedJson('{"open":')).toBeNull();
  });
});

describe('vehiclesParser.parseListing', () => {
  it('joins summaries with ItemList metadata', () => {
    const stubs = vehiclesParser.parseListing(listingHtml, context);

    expect(stubs.map((stub) => stub.identifier)).toEqual(['715957', '800001']);
    expect(stubs[0]).toEqual({
      identifier: '715957',
      sourceUrl: 'https://example.com/used-cars?page=1',
      detailUrl: 'https://example.com/used-car/infiniti/qx50/2015/715957',
      listingCategory: undefined,
      fields: {
        id: '715957',
        make: 'infiniti',
        model: 'qx50',
        price: 30500,
        mileage: '120,000',
        createdAt: '2024-01-09T10:00:00.000Z',
        detail_position: 1,
        detail_entity_types: ['Car'],
        detail_name: '2015 Infiniti QX50',
        source_page: 1,
      },
    });
    expect(stubs[1]?.detailUrl).toBeUndefined();
  });

  it('returns nothing for a page without listings', () => {
    expect(vehiclesParser.parseListing('<html><body>No cars</body></html>', context)).toEqual([]);
  });
});

describe('vehiclesParser.parseDetail', () => {
  const stub = {
    identifier: '715957',
    sourceUrl: 'https://example.com/used-cars?page=1',
    fields: {},
  };

  const car = {
    '@context': 'https://schema.org',
    '@type': ['Car', 'Product'],
    name: 'Infiniti QX50 2015 3.7',
    vehicleIdentificationNumber: 'TESTVIN0001',
    color: 'White',
    vehicleEngine: { fuelType: 'Petrol' },
    offers: { price: '30,500', priceCurrency: 'AED' },
    mileageFromOdometer: { value: '120000', unitCode: 'KMT' },
  };

  it('flattens the streamed Car entity', () => {
    const detail = vehiclesParser.parseDetail?.(`<html>${streamScript(`9:${JSON.stringify(car)}`)}</html>`, stub);

    expect(detail).toMatchObject({
      detail_entity_types: ['Car', 'Product'],
      detail_name: 'Infiniti QX50 2015 3.7',
      detail_vehicle_identification_number: 'TESTVIN0001',
      detail_color: 'White',
      detail_engine_fuel_type: 'Petrol',
      detail_offer_price: 30500,
      detail_offer_currency: 'AED',
      detail_mileage_value: 120000,
      detail_mileage_unit: 'KMT',
    });
  });

  it('falls back to JSON-LD', () => {
    const html = `<script type="application/ld+json">${JSON.stringify({ ...car, '@type': 'Car' })}</script>`;
    expect(vehiclesParser.parseDetail?.(html, stub)).toMatchObject({ detail_entity_types: ['Car'] });
  });

  it('throws a parse error when the page has no vehicle data', () => {
    expect(() => vehiclesParser.parseDetail?.('<html></html>', stub)).toThrow(RecordParseError);
  });
});
