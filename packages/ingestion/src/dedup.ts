import type { ListingStub, PaginationMode } from '@harvest/parser-sdk';
import type { ListingIndex } from './types.js';

export interface GateOptions {
  index: ListingIndex;
  indexName: string;
  dataset: string;
  mode: PaginationMode;
  ordering: 'recency' | 'relevance';
  shortCircuitThreshold: number;
}

export interface GateResult {
  fresh: ListingStub[];
  seen: ListingStub[];
  /** Stubs repeating an identifier earlier on the same page. */
  duplicates: ListingStub[];
  shortCircuit: boolean;
}

/**
 * Split one listing page into fresh and already-indexed stubs.
 *
 * - Paged mode: one batched existence lookup per page. When results are
 *   ordered by recency and the seen ratio reaches the threshold, everything
 *   older is assumed indexed and paging stops.
 * - Date-window mode: the window already bounds the query, so every stub is
 *   fresh and the upsert handles repeats.
 */
export async function gatePage(stubs: ListingStub[], options: GateOptions): Promise<GateResult> {
  const unique: ListingStub[] = [];
  const duplicates: ListingStub[] = [];
  const identifiers = new Set<string>();

  for (const stub of stubs) {
    if (identifiers.has(stub.identifier)) {
      duplicates.push(stub);
      continue;
    }
    identifiers.add(stub.identifier);
    unique.push(stub);
  }

  if (options.mode === 'date-window' || unique.length === 0) {
    return { fresh: unique, seen: [], duplicates, shortCircuit: false };
  }

  const existing = await options.index.existing(options.indexName, options.dataset, [...identifiers]);

  const fresh: ListingStub[] = [];
  const seen: ListingStub[] = [];
  for (const stub of unique) {
    if (existing.has(stub.identifier)) {
      seen.push(stub);
    } else {
      fresh.push(stub);
    }
  }

  const shortCircuit =
    options.ordering === 'recency' && seen.length / unique.length >= options.shortCircuitThreshold;

  return { fresh, seen, duplicates, shortCircuit };
}
