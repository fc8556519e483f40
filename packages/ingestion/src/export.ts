import { ExportError, type JsonRecord, type SnapshotTargetConfig } from '@harvest/parser-sdk';
import type { Listing, ListingIndex, ObjectStorage, SnapshotExportResult } from './types.js';

export interface ExportDependencies {
  index: ListingIndex;
  storage: ObjectStorage;
  /** Index name per dataset id. */
  indexNames: Record<string, string>;
}

/**
 * Flatten a listing into a snapshot document. Metadata columns are written
 * after the source fields, so they win on a name clash.
 */
export function toDocument(listing: Listing, projection?: readonly string[]): JsonRecord {
  const fields: JsonRecord = {};
  if (projection) {
    for (const name of projection) {
      if (name in listing.fields) {
        fields[name] = listing.fields[name];
      }
    }
  } else {
    Object.assign(fields, listing.fields);
  }

  return {
    ...fields,
    identifier: listing.identifier,
    dataset: listing.dataset,
    listing_category: listing.listingCategory,
    posted_at_raw: listing.postedAtRaw,
    posted_at_iso: listing.postedAtIso,
    extracted_at_iso: listing.extractedAtIso,
    source_url: listing.sourceUrl,
    detail_url: listing.detailUrl,
  };
}

/**
 * Scan every dataset of the target and replace the snapshot object with the
 * combined documents. An empty result is refused rather than uploaded.
 */
export async function exportSnapshot(
  target: SnapshotTargetConfig,
  deps: ExportDependencies,
): Promise<SnapshotExportResult> {
  const documents: JsonRecord[] = [];

  for (const dataset of target.datasets) {
    const indexName = deps.indexNames[dataset];
    if (!indexName) {
      throw new ExportError(target.key, `unknown dataset: ${dataset}`);
    }

    let rows: Listing[];
    try {
      rows = await deps.index.scan(indexName, dataset);
    } catch (error) {
      throw new ExportError(target.key, `scan of ${dataset} failed`, error);
    }

    for (const row of rows) {
      documents.push(toDocument(row, target.fields));
    }
  }

  if (documents.length === 0) {
    throw new ExportError(target.key, 'no documents to export');
  }

  try {
    await deps.storage.putJson({
      key: target.key,
      body: JSON.stringify(documents),
      contentType: 'application/json',
      cacheControl: target.cacheControl,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExportError(target.key, `upload failed: ${reason}`, error);
  }

  return { key: target.key, documents: documents.length };
}
