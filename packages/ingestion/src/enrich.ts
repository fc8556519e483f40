import {
  ChallengeBlockedError,
  RecordParseError,
  type JsonRecord,
  type ListingStub,
  type PagedParser,
  type ScrapeClient,
} from '@harvest/parser-sdk';
import type { EnrichmentLevel, IngestionLogger } from './types.js';

export interface EnrichDependencies {
  parser: PagedParser;
  client: ScrapeClient;
  dataset: string;
  logger: IngestionLogger;
}

export interface EnrichOutcome {
  stub: ListingStub;
  enrichment: EnrichmentLevel;
  /** Set when the detail page could not be used. */
  failure?: 'parse' | 'http' | 'exhausted';
  error?: string;
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null || value === '') return true;
  return Array.isArray(value) && value.length === 0;
}

/**
 * Merge detail fields into the stub's fields. Populated stub fields win unless
 * listed as authoritative for the detail page.
 */
export function mergeDetail(
  fields: JsonRecord,
  detail: JsonRecord,
  authoritativeFields: readonly string[] = [],
): JsonRecord {
  const merged: JsonRecord = { ...fields };
  const authoritative = new Set(authoritativeFields);

  for (const [key, value] of Object.entries(detail)) {
    if (isEmpty(value)) continue;
    if (authoritative.has(key) || isEmpty(merged[key])) {
      merged[key] = value;
    }
  }

  return merged;
}

/**
 * Fetch and merge the detail page of a fresh stub.
 * A challenge block propagates; every other failure leaves a partial record.
 */
export async function enrichStub(stub: ListingStub, deps: EnrichDependencies): Promise<EnrichOutcome> {
  const { parser, client, dataset, logger } = deps;

  if (!stub.detailUrl || !parser.parseDetail) {
    return { stub, enrichment: 'none' };
  }

  const result = await client.fetch(stub.detailUrl, { purpose: 'detail', identifier: stub.identifier });

  switch (result.kind) {
    case 'blocked':
      throw new ChallengeBlockedError(stub.detailUrl, result.attempts);
    case 'failed': {
      const error = `Detail request failed with status ${result.status}`;
      logger.warn(`[enrich:${dataset}] ${error}`, { identifier: stub.identifier, url: stub.detailUrl });
      return { stub, enrichment: 'partial', failure: 'http', error };
    }
    case 'exhausted': {
      const error = `Detail request gave up after ${result.attempts} attempt(s)`;
      logger.warn(`[enrich:${dataset}] ${error}`, { identifier: stub.identifier, url: stub.detailUrl });
      return { stub, enrichment: 'partial', failure: 'exhausted', error };
    }
    case 'ok':
      break;
  }

  let detail: JsonRecord;
  try {
    detail = parser.parseDetail(result.page.body, stub);
  } catch (err) {
    const parseError =
      err instanceof RecordParseError
        ? err
        : new RecordParseError(stub.identifier, err instanceof Error ? err.message : String(err), err);
    logger.warn(`[enrich:${dataset}] ${parseError.message}`, { identifier: stub.identifier });
    return { stub, enrichment: 'partial', failure: 'parse', error: parseError.message };
  }

  return {
    stub: { ...stub, fields: mergeDetail(stub.fields, detail, parser.authoritativeFields) },
    enrichment: 'full',
  };
}
