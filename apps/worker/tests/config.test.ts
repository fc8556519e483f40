import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadPipelines, loadWorkerConfig, readIntEnv, readRequiredEnv } from '../src/config.js';

describe('env helpers', () => {
  it('requires non-empty values', () => {
    expect(readRequiredEnv('DATABASE_URL', { DATABASE_URL: 'postgres://localhost/test' })).toBe('postgres://localhost/test');
    expect(() => readRequiredEnv('DATABASE_URL', { DATABASE_URL: '' })).toThrow(
      'DATABASE_URL environment variable is required',
    );
  });

  it('falls back on missing or invalid integers', () => {
    expect(readIntEnv('N', 5, { N: '12.7' })).toBe(12);
    expect(readIntEnv('N', 5, { N: '-1' })).toBe(5);
    expect(readIntEnv('N', 5, { N: 'many' })).toBe(5);
    expect(readIntEnv('N', 5, {})).toBe(5);
  });
});

describe('loadWorkerConfig', () => {
  it('applies defaults', () => {
    const config = loadWorkerConfig({ DATABASE_URL: 'postgres://localhost/test' });

    expect(config).toEqual({
      databaseUrl: 'postgres://localhost/test',
      databaseMaxConnections: 5,
      redisUrl: 'redis://localhost:6379',
      checkpointDir: resolve('.checkpoints'),
      pipelinesPath: resolve('config/pipelines.json'),
      storage: undefined,
    });
  });

  it('enables object storage when a bucket is set', () => {
    const config = loadWorkerConfig({
      DATABASE_URL: 'postgres://localhost/test',
      OBJECT_STORAGE_BUCKET: 'snapshots',
      OBJECT_STORAGE_ENDPOINT: 'https://storage.example.com',
      OBJECT_STORAGE_ACCESS_KEY_ID: 'test-key',
      OBJECT_STORAGE_SECRET_ACCESS_KEY: 'test-secret',
    });

    expect(config.storage).toEqual({
      bucket: 'snapshots',
      endpoint: 'https://storage.example.com',
      region: undefined,
      accessKeyId: 'test-key',
      secretAccessKey: 'test-secret',
    });
  });

  it('rejects a bucket without credentials', () => {
    expect(() =>
      loadWorkerConfig({ DATABASE_URL: 'postgres://localhost/test', OBJECT_STORAGE_BUCKET: 'snapshots' }),
    ).toThrow('OBJECT_STORAGE_ACCESS_KEY_ID environment variable is required');
  });
});

describe('loadPipelines', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pipelines-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const path = join(dir, 'pipelines.json');
    writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
    return path;
  }

  const dataset = { id: 'cars', listingUrlTemplate: 'https://example.com/list?page={page}', indexName: 'vehicles' };

  it('parses and applies schema defaults', () => {
    const path = writeConfig({
      pipelines: [{ id: 'vehicles', name: 'Vehicles', parser: 'vehicles', schedule: { cron: '0 5 * * *' }, datasets: [dataset] }],
    });

    const [pipeline] = loadPipelines(path);

    expect(pipeline?.schedule).toEqual({ cron: '0 5 * * *', timezone: 'UTC' });
    expect(pipeline?.datasets[0]?.maxPages).toBe(1);
    expect(pipeline?.snapshots).toEqual([]);
  });

  it('reports schema issues with their path', () => {
    const path = writeConfig({
      pipelines: [{ id: 'vehicles', name: 'Vehicles', parser: 'vehicles', schedule: { cron: '0 5 * * *' }, datasets: [] }],
    });

    expect(() => loadPipelines(path)).toThrow(
      `Invalid pipeline config ${path}: pipelines.0.datasets: Array must contain at least 1 element(s)`,
    );
  });

  it('rejects duplicate pipeline ids', () => {
    const entry = { id: 'vehicles', name: 'Vehicles', parser: 'vehicles', schedule: { cron: '0 5 * * *' }, datasets: [dataset] };
    const path = writeConfig({ pipelines: [entry, entry] });

    expect(() => loadPipelines(path)).toThrow('Duplicate pipeline id: vehicles');
  });

  it('wraps unreadable files', () => {
    const path = writeConfig('{ not json');

    expect(() => loadPipelines(path)).toThrow(`Unable to read pipeline config ${path}`);
    expect(() => loadPipelines(join(dir, 'missing.json'))).toThrow('Unable to read pipeline config');
  });
});
