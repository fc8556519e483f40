import type { JsonRecord } from '@harvest/parser-sdk';

export type EnrichmentLevel = 'full' | 'partial' | 'none';

/**
 * A normalized listing ready for the index. Metadata is stamped on top of the
 * source-specific `fields`.
 */
export interface Listing {
  identifier: string;
  dataset: string;
  fields: JsonRecord;
  postedAtRaw: string | null;
  postedAtIso: string | null;
  sourceUrl: string;
  detailUrl: string | null;
  extractedAtIso: string;
  listingCategory: string | null;
  enrichment: EnrichmentLevel;
}

export interface Checkpoint {
  dataset: string;
  /** YYYY-MM-DD of the newest record seen so far, null before the first run. */
  lastSeenMaxDate: string | null;
  bufferDays: number;
  updatedAt: string | null;
}

export interface CheckpointStore {
  load(dataset: string, bufferDays: number): Promise<Checkpoint>;
  save(checkpoint: Checkpoint): Promise<void>;
}

/**
 * Document index keyed by (indexName, dataset, identifier).
 */
export interface ListingIndex {
  /** Returns the subset of `identifiers` already present. */
  existing(indexName: string, dataset: string, identifiers: string[]): Promise<Set<string>>;
  upsert(indexName: string, listing: Listing): Promise<void>;
  scan(indexName: string, dataset: string): Promise<Listing[]>;
}

export interface PutObjectInput {
  key: string;
  body: string;
  contentType: string;
  cacheControl: string;
}

export interface ObjectStorage {
  putJson(input: PutObjectInput): Promise<void>;
}

/**
 * Minimal logger interface. Defaults to console.
 */
export interface IngestionLogger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Per-dataset counts for observability.
 */
export interface DatasetStats {
  pages: number;
  stubs: number;
  duplicates: number;
  seen: number;
  fresh: number;
  enrichedFull: number;
  enrichedPartial: number;
  parseErrors: number;
  written: number;
  writeErrors: number;
}

export type DatasetStatus = 'completed' | 'short-circuited' | 'failed' | 'cancelled';

export interface DatasetRunResult {
  dataset: string;
  status: DatasetStatus;
  stats: DatasetStats;
  /** Newest posted date among written records, YYYY-MM-DD. */
  maxPostedDate: string | null;
  checkpoint: Checkpoint | null;
  errors: string[];
  durationMs: number;
}

export interface SnapshotExportResult {
  key: string;
  documents: number;
}

export interface PipelineRunResult {
  pipelineId: string;
  datasets: DatasetRunResult[];
  exports: SnapshotExportResult[];
  warnings: string[];
  failedDatasets: number;
  totalWritten: number;
  durationMs: number;
}

export interface PipelineDependencies {
  index: ListingIndex;
  checkpoints: CheckpointStore;
  storage?: ObjectStorage;
  logger?: IngestionLogger;
  signal?: AbortSignal;
  now?: () => Date;
}
