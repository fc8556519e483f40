import type { ScrapeClient } from './http-client.js';
import type { DatasetConfig } from './schema.js';

export type JsonRecord = Record<string, unknown>;

/**
 * Minimal record yielded by a listing page. Everything beyond the identifier and
 * URLs is source-specific and travels in `fields`.
 */
export interface ListingStub {
  identifier: string;
  sourceUrl: string;
  detailUrl?: string;
  listingCategory?: string;
  fields: JsonRecord;
}

export interface ListingPage {
  page: number;
  url: string;
  stubs: ListingStub[];
}

/**
 * Inclusive date window (YYYY-MM-DD) used by date-filtered sources.
 * `from` is null on a first run, when no checkpoint exists yet.
 */
export interface DateWindow {
  from: string | null;
  to: string;
}

export type PaginationMode = 'paged' | 'date-window';

export interface ParserManifest {
  id: string;
  name: string;
  version: string;
}

export interface PageContext {
  config: DatasetConfig;
  page: number;
  url: string;
  contentType: string;
}

interface BaseParser {
  manifest: ParserManifest;
  mode: PaginationMode;
  /** Candidate timestamp fields, highest priority first. */
  timestampFields(config: DatasetConfig): readonly string[];
  /** Fields the dashboard reads as numbers. */
  numericFields?: readonly string[];
  /** Fields rendered as plain text. */
  textFields?: readonly string[];
  parseListing(body: string, context: PageContext): ListingStub[];
}

export interface PagedParser extends BaseParser {
  mode: 'paged';
  pageUrl(config: DatasetConfig, page: number): string;
  parseDetail?(body: string, stub: ListingStub): JsonRecord;
  /** Detail fields allowed to overwrite a populated stub field. */
  authoritativeFields?: readonly string[];
}

export interface WindowedParser extends BaseParser {
  mode: 'date-window';
  pageUrl(config: DatasetConfig, page: number, window: DateWindow): string;
  /**
   * URL of the actual data when the fetched page only links to it, with the
   * window applied. The fetcher downloads it and parses that payload instead.
   */
  resolveDataUrl?(body: string, context: PageContext, window: DateWindow): string | undefined;
}

export type Parser = PagedParser | WindowedParser;

/**
 * Per-dataset run wiring: the validated config, its parser and the HTTP client
 * built from the config's delay and retry settings.
 */
export interface DatasetRun {
  config: DatasetConfig;
  parser: Parser;
  client: ScrapeClient;
}
