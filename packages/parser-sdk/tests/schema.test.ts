import { describe, expect, it, vi } from 'vitest';
import { datasetConfigSchema, pipelineConfigSchema, validateStubs } from '../src/schema.js';
import { fillTemplate } from '../src/factory.js';

describe('datasetConfigSchema', () => {
  it('applies defaults', () => {
    const config = datasetConfigSchema.parse({
      id: 'cars',
      listingUrlTemplate: 'https://example.com/cars?page={page}',
      indexName: 'vehicles',
    });

    expect(config).toMatchObject({
      maxPages: 1,
      delay: { minMs: 1500, maxMs: 4000 },
      retryCount: 3,
      challengeRetries: 3,
      bufferDays: 3,
      timeoutMs: 20_000,
      ordering: 'recency',
      shortCircuitThreshold: 1,
    });
  });

  it('rejects an inverted delay range', () => {
    const result = datasetConfigSchema.safeParse({
      id: 'cars',
      listingUrlTemplate: 'https://example.com',
      indexName: 'vehicles',
      delay: { minMs: 5000, maxMs: 1000 },
    });

    expect(result.success).toBe(false);
  });

  it('rejects a threshold of zero', () => {
    const result = datasetConfigSchema.safeParse({
      id: 'cars',
      listingUrlTemplate: 'https://example.com',
      indexName: 'vehicles',
      shortCircuitThreshold: 0,
    });

    expect(result.success).toBe(false);
  });
});

describe('pipelineConfigSchema', () => {
  const dataset = { listingUrlTemplate: 'https://example.com', indexName: 'properties' };

  it('rejects duplicate dataset ids and unknown snapshot datasets', () => {
    const result = pipelineConfigSchema.safeParse({
      id: 'properties',
      name: 'Properties',
      parser: 'properties',
      schedule: { cron: '30 5 * * *' },
      datasets: [
        { ...dataset, id: 'sales' },
        { ...dataset, id: 'sales' },
      ],
      snapshots: [{ key: 'data/properties.json', datasets: ['sales', 'lettings'] }],
    });

    expect(result.success).toBe(false);
    const messages = result.success ? [] : result.error.issues.map((issue) => issue.message);
    expect(messages).toEqual([
      'duplicate dataset id: sales',
      'snapshot data/properties.json references unknown dataset: lettings',
    ]);
  });

  it('defaults the timezone and snapshots', () => {
    const pipeline = pipelineConfigSchema.parse({
      id: 'properties',
      name: 'Properties',
      parser: 'properties',
      schedule: { cron: '30 5 * * *' },
      datasets: [{ ...dataset, id: 'sales' }],
    });

    expect(pipeline.schedule.timezone).toBe('UTC');
    expect(pipeline.snapshots).toEqual([]);
  });
});

describe('validateStubs', () => {
  it('drops stubs without identifier or with a bad url', () => {
    const onInvalid = vi.fn();
    const valid = validateStubs(
      [
        { identifier: 'a', sourceUrl: 'https://example.com/a', fields: {} },
        { identifier: '', sourceUrl: 'https://example.com/b', fields: {} },
        { identifier: 'c', sourceUrl: 'not a url', fields: {} },
      ],
      { onInvalid },
    );

    expect(valid.map((stub) => stub.identifier)).toEqual(['a']);
    expect(onInvalid).toHaveBeenCalledTimes(2);
  });
});

describe('fillTemplate', () => {
  it('encodes values and keeps unknown placeholders', () => {
    expect(fillTemplate('https://example.com/search?q={query}&page={page}&x={other}', { query: 'a b', page: 2 })).toBe(
      'https://example.com/search?q=a%20b&page=2&x={other}',
    );
  });
});
