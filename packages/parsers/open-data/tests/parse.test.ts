import { describe, expect, it } from 'vitest';
import { datasetConfigSchema, type DatasetConfigInput, type PageContext } from '@harvest/parser-sdk';
import {
  csvToRows,
  detectFormat,
  jsonPayloadToRows,
  openDataParser,
  prepareDatasetUrl,
  resolveDataUrl,
  rowHash,
} from '../src/index.js';

const dateWindow = { from: '2024-01-07', to: '2024-01-10' };

function contextFor(overrides: Partial<DatasetConfigInput> = {}, contentType = 'application/json'): PageContext {
  return {
    config: datasetConfigSchema.parse({
      id: 'transactions',
      listingUrlTemplate: 'https://example.com/data?FromDate={fromDate}&ToDate={toDate}',
      indexName: 'open_data',
      idFields: ['txn_id'],
      dateField: 'instance_date',
      ...overrides,
    }),
    page: 1,
    url: 'https://example.com/data?FromDate=2024-01-07&ToDate=2024-01-10',
    contentType,
  };
}

describe('prepareDatasetUrl', () => {
  it('substitutes placeholders', () => {
    expect(
      prepareDatasetUrl('https://example.com/data?FromDate={fromDate}&ToDate={toDate}&format=json', dateWindow),
    ).toBe('https://example.com/data?FromDate=2024-01-07&ToDate=2024-01-10&format=json');
  });

  it('overwrites known query parameters', () => {
    expect(prepareDatasetUrl('https://example.com/data?start=x&end=y', dateWindow)).toBe(
      'https://example.com/data?start=2024-01-07&end=2024-01-10',
    );
  });

  it('appends the window when the URL names none', () => {
    expect(prepareDatasetUrl('https://example.com/data.csv', dateWindow)).toBe(
      'https://example.com/data.csv?FromDate=2024-01-07&ToDate=2024-01-10',
    );
  });

  it('drops the lower bound of an open window', () => {
    const open = { from: null, to: '2024-01-10' };
    expect(prepareDatasetUrl('https://example.com/data?fromDate={fromDate}&toDate={toDate}', open)).toBe(
      'https://example.com/data?toDate=2024-01-10',
    );
    expect(prepareDatasetUrl('https://example.com/data.csv', open)).toBe('https://example.com/data.csv?ToDate=2024-01-10');
  });
});

describe('payload rows', () => {
  it('keys array rows by column', () => {
    const payload = {
      columns: [{ dataIndex: 'txn_id' }, { title: 'Amount' }],
      rows: [['T1', 100, 'extra'], { txn_id: 'T2', Amount: 5 }],
    };

    expect(jsonPayloadToRows(payload)).toEqual([
      { txn_id: 'T1', Amount: 100, column_2: 'extra' },
      { txn_id: 'T2', Amount: 5 },
    ]);
  });

  it('finds nested tables and row arrays', () => {
    expect(jsonPayloadToRows({ result: { grid: { headers: ['a', 'b'], body: { items: [[1, 2]] } } } })).toEqual([
      { a: 1, b: 2 },
    ]);
    expect(jsonPayloadToRows({ records: [{ a: 1 }, 'junk'] })).toEqual([{ a: 1 }]);
    expect(jsonPayloadToRows('nothing')).toEqual([]);
  });

  it('reads CSV with a header row', () => {
    expect(csvToRows('id,date,amount\n1,2024-01-08,10\n\n2,2024-01-09, 20 \n')).toEqual([
      { id: '1', date: '2024-01-08', amount: '10' },
      { id: '2', date: '2024-01-09', amount: '20' },
    ]);
  });

  it('detects the payload format', () => {
    expect(detectFormat('[]', 'text/plain')).toBe('json');
    expect(detectFormat('a,b\n1,2', 'text/csv; charset=utf-8')).toBe('csv');
    expect(detectFormat('<html></html>', '')).toBe('html');
    expect(detectFormat('a,b\n1,2', 'text/plain')).toBe('csv');
  });
});

describe('openDataParser.parseListing', () => {
  it('builds stubs from JSON rows', () => {
    const body = JSON.stringify({
      data: [
        { txn_id: 'T1', instance_date: '2024-01-08', area: ' Marina ' },
        { txn_id: '', instance_date: '2024-01-09', area: 'NULL' },
      ],
    });
    const context = contextFor();

    const stubs = openDataParser.parseListing(body, context);

    expect(stubs[0]).toEqual({
      identifier: 'T1',
      sourceUrl: context.url,
      fields: {
        txn_id: 'T1',
        instance_date: '2024-01-08',
        area: 'Marina',
        _dataset: 'transactions',
        _source_url: context.url,
      },
    });
    expect(stubs[1]?.identifier).toBe(rowHash({ txn_id: null, instance_date: '2024-01-09', area: null }));
    expect(stubs[1]?.identifier).toHaveLength(64);
  });

  it('hashes rows independently of key order', () => {
    expect(rowHash({ a: 1, b: 'x' })).toBe(rowHash({ b: 'x', a: 1 }));
    expect(rowHash({ a: 1 })).not.toBe(rowHash({ a: 2 }));
  });

  it('reads a table embedded in the portal page', () => {
    const nextData = {
      props: {
        pageProps: {
          datasets: [{ slug: 'transactions', title: 'Transactions', table: { columns: ['id', 'date'], rows: [[1, '2024-01-09']] } }],
        },
      },
    };
    const html = `<html><script id="__NEXT_DATA__" type="application/json">${JSON.stringify(nextData)}</script></html>`;

    const stubs = openDataParser.parseListing(html, contextFor({ idFields: ['id'] }, 'text/html'));

    expect(stubs.map((stub) => stub.identifier)).toEqual(['1']);
    expect(stubs[0]?.fields.date).toBe('2024-01-09');
  });

  it('rejects portal entries that only link a download', () => {
    const nextData = { props: { datasets: [{ slug: 'transactions', downloadUrl: 'https://example.com/t.csv' }] } };
    const html = `<html><script id="__NEXT_DATA__" type="application/json">${JSON.stringify(nextData)}</script></html>`;

    expect(() => openDataParser.parseListing(html, contextFor({}, 'text/html'))).toThrow(
      'Dataset transactions is published as a download at https://example.com/t.csv',
    );
  });
});

describe('resolveDataUrl', () => {
  function portalPage(node: Record<string, unknown>): string {
    const nextData = { props: { pageProps: { datasets: [{ slug: 'transactions', ...node }] } } };
    return `<html><script id="__NEXT_DATA__" type="application/json">${JSON.stringify(nextData)}</script></html>`;
  }

  it('follows a download link with the window applied', () => {
    const context = { ...contextFor({}, 'text/html'), url: 'https://portal.example.com/open-data' };

    expect(resolveDataUrl(portalPage({ dataUrl: '/files/transactions.csv?lang=en' }), context, dateWindow)).toBe(
      'https://portal.example.com/files/transactions.csv?lang=en&FromDate=2024-01-07&ToDate=2024-01-10',
    );
  });

  it('leaves embedded tables and raw payloads to parseListing', () => {
    const table = portalPage({ table: { columns: ['id'], rows: [[1]] }, downloadUrl: 'https://example.com/t.csv' });

    expect(resolveDataUrl(table, contextFor({}, 'text/html'), dateWindow)).toBeUndefined();
    expect(resolveDataUrl('{"data":[]}', contextFor(), dateWindow)).toBeUndefined();
  });

  it('is wired into the parser', () => {
    expect(openDataParser.resolveDataUrl).toBe(resolveDataUrl);
  });
});

describe('openDataParser windowing', () => {
  it('derives timestamp candidates from the date column', () => {
    expect(openDataParser.timestampFields(contextFor().config)).toEqual([
      'instance_date',
      'instance_date',
      'INSTANCE_DATE',
    ]);
  });

  it('fills the page and the window into the dataset URL', () => {
    const { config } = contextFor({ listingUrlTemplate: 'https://example.com/data?page={page}&from={fromDate}&to={toDate}' });

    expect(openDataParser.pageUrl(config, 2, dateWindow)).toBe('https://example.com/data?page=2&from=2024-01-07&to=2024-01-10');
  });
});
