import { createHash } from 'node:crypto';
import type { Database, ListingRow } from '@harvest/db';
import { listings } from '@harvest/db';
import { IndexWriteError } from '@harvest/parser-sdk';
import { and, asc, desc, eq, inArray, sql } from 'drizzle-orm';
import type { EnrichmentLevel, Listing, ListingIndex } from './types.js';

/**
 * Compute a SHA-256 hash of the listing content for change detection.
 * Extraction time is left out so an unchanged re-scrape hashes the same.
 */
export function computeContentHash(listing: Listing): string {
  const keys = Object.keys(listing.fields).sort();
  const fields = keys.map((key) => [key, listing.fields[key]]);
  const input = JSON.stringify([fields, listing.postedAtIso, listing.listingCategory, listing.detailUrl]);
  return createHash('sha256').update(input).digest('hex');
}

function toEnrichment(value: string): EnrichmentLevel {
  return value === 'full' || value === 'partial' ? value : 'none';
}

export function rowToListing(row: ListingRow): Listing {
  return {
    identifier: row.identifier,
    dataset: row.dataset,
    fields: row.fields,
    postedAtRaw: row.postedAtRaw,
    postedAtIso: row.postedAtIso,
    sourceUrl: row.sourceUrl,
    detailUrl: row.detailUrl,
    extractedAtIso: row.extractedAtIso,
    listingCategory: row.listingCategory,
    enrichment: toEnrichment(row.enrichment),
  };
}

/**
 * Postgres-backed listing index. Uniqueness is (index_name, dataset, identifier);
 * a repeated write updates the row in place.
 */
export function createDrizzleListingIndex(db: Database): ListingIndex {
  return {
    async existing(indexName, dataset, identifiers) {
      if (identifiers.length === 0) return new Set();

      const rows = await db
        .select({ identifier: listings.identifier })
        .from(listings)
        .where(
          and(
            eq(listings.indexName, indexName),
            eq(listings.dataset, dataset),
            inArray(listings.identifier, [...new Set(identifiers)]),
          ),
        );

      return new Set(rows.map((row) => row.identifier));
    },

    async upsert(indexName, listing) {
      await db
        .insert(listings)
        .values({
          indexName,
          dataset: listing.dataset,
          identifier: listing.identifier,
          listingCategory: listing.listingCategory,
          sourceUrl: listing.sourceUrl,
          detailUrl: listing.detailUrl,
          postedAtRaw: listing.postedAtRaw,
          postedAtIso: listing.postedAtIso,
          extractedAtIso: listing.extractedAtIso,
          enrichment: listing.enrichment,
          fields: listing.fields,
          contentHash: computeContentHash(listing),
        })
        .onConflictDoUpdate({
          target: [listings.indexName, listings.dataset, listings.identifier],
          set: {
            listingCategory: sql.raw(`excluded.listing_category`),
            sourceUrl: sql.raw(`excluded.source_url`),
            detailUrl: sql.raw(`excluded.detail_url`),
            postedAtRaw: sql.raw(`excluded.posted_at_raw`),
            postedAtIso: sql.raw(`excluded.posted_at_iso`),
            extractedAtIso: sql.raw(`excluded.extracted_at_iso`),
            enrichment: sql.raw(`excluded.enrichment`),
            fields: sql.raw(`excluded.fields`),
            contentHash: sql.raw(`excluded.content_hash`),
            updatedAt: sql.raw(
              `CASE WHEN listings.content_hash = excluded.content_hash THEN listings.updated_at ELSE now() END`,
            ),
          },
        });
    },

    async scan(indexName, dataset) {
      const rows = await db
        .select()
        .from(listings)
        .where(and(eq(listings.indexName, indexName), eq(listings.dataset, dataset)))
        .orderBy(desc(listings.postedAtIso), asc(listings.identifier));

      return rows.map(rowToListing);
    },
  };
}

export interface WriteOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export type WriteOutcome = { ok: true; attempts: number } | { ok: false; error: IndexWriteError };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Upsert one listing with bounded exponential backoff.
 * Exhausted retries come back as an outcome so the rest of the batch continues.
 */
export async function writeListing(
  index: ListingIndex,
  indexName: string,
  listing: Listing,
  options: WriteOptions = {},
): Promise<WriteOutcome> {
  const maxAttempts = options.maxAttempts ?? 3;
  const baseDelayMs = options.baseDelayMs ?? 250;
  const wait = options.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      await index.upsert(indexName, listing);
      return { ok: true, attempts: attempt };
    } catch (error) {
      lastError = error;
      if (attempt < maxAttempts) {
        await wait(baseDelayMs * 2 ** (attempt - 1));
      }
    }
  }

  return { ok: false, error: new IndexWriteError(listing.identifier, maxAttempts, lastError) };
}
