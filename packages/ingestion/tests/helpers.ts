import { vi } from 'vitest';
import {
  ScrapeClient,
  datasetConfigSchema,
  fillTemplate,
  isRecord,
  type DatasetConfig,
  type DatasetConfigInput,
  type JsonRecord,
  type ListingStub,
  type PageContext,
  type PagedParser,
  type WindowedParser,
} from '@harvest/parser-sdk';
import type { Checkpoint, CheckpointStore, Listing, ListingIndex } from '../src/types.js';

export class MemoryListingIndex implements ListingIndex {
  readonly rows = new Map<string, Listing>();
  readonly existingCalls: string[][] = [];
  upsertCalls = 0;
  failingIdentifiers = new Set<string>();

  private key(indexName: string, dataset: string, identifier: string): string {
    return `${indexName}|${dataset}|${identifier}`;
  }

  async existing(indexName: string, dataset: string, identifiers: string[]): Promise<Set<string>> {
    this.existingCalls.push(identifiers);
    return new Set(identifiers.filter((id) => this.rows.has(this.key(indexName, dataset, id))));
  }

  async upsert(indexName: string, listing: Listing): Promise<void> {
    this.upsertCalls += 1;
    if (this.failingIdentifiers.has(listing.identifier)) {
      throw new Error('connection reset');
    }
    this.rows.set(this.key(indexName, listing.dataset, listing.identifier), listing);
  }

  async scan(indexName: string, dataset: string): Promise<Listing[]> {
    return [...this.rows.entries()]
      .filter(([key]) => key.startsWith(`${indexName}|${dataset}|`))
      .map(([, listing]) => listing);
  }
}

export class MemoryCheckpointStore implements CheckpointStore {
  readonly saved: Checkpoint[] = [];

  constructor(private readonly initial: Record<string, string | null> = {}) {}

  async load(dataset: string, bufferDays: number): Promise<Checkpoint> {
    const last = this.saved.filter((c) => c.dataset === dataset).at(-1);
    if (last) return { ...last, bufferDays };
    return { dataset, lastSeenMaxDate: this.initial[dataset] ?? null, bufferDays, updatedAt: null };
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    this.saved.push(checkpoint);
  }
}

export interface Route {
  status?: number;
  body: string;
  contentType?: string;
}

export function createFetchMock(routes: Record<string, Route | Route[]>) {
  const counters = new Map<string, number>();

  return vi.fn(async (input: string | URL | Request) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    const route = routes[url];
    if (!route) {
      return new Response('not found', { status: 404, headers: { 'content-type': 'text/plain' } });
    }

    const seen = counters.get(url) ?? 0;
    counters.set(url, seen + 1);
    const current = Array.isArray(route) ? (route[Math.min(seen, route.length - 1)] ?? { body: '' }) : route;

    return new Response(current.body, {
      status: current.status ?? 200,
      headers: { 'content-type': current.contentType ?? 'application/json' },
    });
  });
}

export function createClient(fetchMock: ReturnType<typeof createFetchMock>, sleep = vi.fn(async () => {})) {
  return new ScrapeClient({
    minDelayMs: 0,
    maxDelayMs: 0,
    fetchImpl: fetchMock as unknown as typeof fetch,
    sleepImpl: sleep,
    random: () => 0,
  });
}

export function datasetConfig(overrides: Partial<DatasetConfigInput> = {}): DatasetConfig {
  return datasetConfigSchema.parse({
    id: 'cars',
    listingUrlTemplate: 'https://example.com/list?page={page}',
    indexName: 'listings',
    maxPages: 2,
    ...overrides,
  });
}

function itemsOf(body: string): JsonRecord[] {
  const parsed: unknown = JSON.parse(body);
  if (!isRecord(parsed) || !Array.isArray(parsed.items)) return [];
  return parsed.items.filter(isRecord);
}

export const pagedParser: PagedParser = {
  manifest: { id: 'test-paged', name: 'Test paged', version: '0.1.0' },
  mode: 'paged',
  timestampFields: () => ['date'],
  numericFields: ['price'],
  authoritativeFields: ['price'],
  pageUrl: (config: DatasetConfig, page: number) => fillTemplate(config.listingUrlTemplate, { page }),
  parseListing(body: string, context: PageContext): ListingStub[] {
    return itemsOf(body).map((item) => ({
      identifier: String(item.id),
      sourceUrl: context.url,
      detailUrl: `https://example.com/item/${String(item.id)}`,
      fields: item,
    }));
  },
  parseDetail(body: string): JsonRecord {
    const parsed: unknown = JSON.parse(body);
    if (!isRecord(parsed)) throw new Error('detail is not an object');
    return parsed;
  },
};

export const windowedParser: WindowedParser = {
  manifest: { id: 'test-window', name: 'Test window', version: '0.1.0' },
  mode: 'date-window',
  timestampFields: () => ['date'],
  pageUrl: (config: DatasetConfig, page: number, window: { from: string | null; to: string }) =>
    fillTemplate(config.listingUrlTemplate, { page, fromDate: window.from ?? '', toDate: window.to }),
  parseListing(body: string, context: PageContext): ListingStub[] {
    return itemsOf(body).map((item) => ({
      identifier: String(item.id),
      sourceUrl: context.url,
      fields: item,
    }));
  },
};

export function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
