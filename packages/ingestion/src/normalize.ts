import { maybeFloat, type JsonRecord, type ListingStub } from '@harvest/parser-sdk';
import type { EnrichmentLevel, Listing } from './types.js';

/**
 * Trim whitespace and collapse multiple spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Strip HTML tags from a string. Block-level closings become line breaks
 * before the remaining tags are dropped; common entities are decoded.
 */
export function stripHtml(html: string): string {
  let text = html;

  text = text.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  text = text.replace(/<br\s*\/?>/gi, '\n');
  text = text.replace(/<\/(p|li|div|h[1-6])>/gi, '\n');
  text = text.replace(/<[^>]+>/g, '');
  text = decodeHtmlEntities(text);
  text = text.replace(/\n{3,}/g, '\n\n');

  return text
    .split('\n')
    .map((line) => line.trim())
    .join('\n')
    .trim();
}

/**
 * Decode a small set of common HTML entities.
 */
export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
}

export interface ParsedTimestamp {
  raw: string;
  iso: string;
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;
const DAY_FIRST = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/i;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;
// Below this an epoch value is read as seconds.
const EPOCH_MS_THRESHOLD = 100_000_000_000;

function utcDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

function validDate(date: Date): Date | null {
  return Number.isNaN(date.getTime()) ? null : date;
}

function parseEpoch(value: number): Date | null {
  if (!Number.isFinite(value) || value <= 0) return null;
  return validDate(new Date(value < EPOCH_MS_THRESHOLD ? value * 1000 : value));
}

function parseDateString(value: string): Date | null {
  const compact = COMPACT_DATE.exec(value);
  if (compact) {
    return utcDate(Number(compact[1]), Number(compact[2]), Number(compact[3]));
  }

  if (/^\d+(\.\d+)?$/.test(value)) {
    return parseEpoch(Number(value));
  }

  const dateOnly = DATE_ONLY.exec(value);
  if (dateOnly) {
    return utcDate(Number(dateOnly[1]), Number(dateOnly[2]), Number(dateOnly[3]));
  }

  const dayFirst = DAY_FIRST.exec(value);
  if (dayFirst) {
    return utcDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
  }

  if (ISO_DATE_TIME.test(value)) {
    const withSeparator = value.replace(' ', 'T');
    return validDate(new Date(HAS_ZONE.test(withSeparator) ? withSeparator : `${withSeparator}Z`));
  }

  return null;
}

/**
 * Parse a source timestamp into its raw string form and an ISO-8601 UTC value.
 * Values without a zone are read as UTC.
 */
export function parseTimestamp(value: unknown): ParsedTimestamp | null {
  if (value instanceof Date) {
    const date = validDate(value);
    return date ? { raw: date.toISOString(), iso: date.toISOString() } : null;
  }

  if (typeof value === 'number') {
    const date = parseEpoch(value);
    return date ? { raw: String(value), iso: date.toISOString() } : null;
  }

  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) return null;

  const date = parseDateString(trimmed);
  return date ? { raw: trimmed, iso: date.toISOString() } : null;
}

/**
 * First parseable timestamp among `candidates`, in priority order.
 */
export function pickTimestamp(fields: JsonRecord, candidates: readonly string[]): ParsedTimestamp | null {
  for (const name of candidates) {
    const parsed = parseTimestamp(fields[name]);
    if (parsed) return parsed;
  }

  return null;
}

/**
 * YYYY-MM-DD part of an ISO timestamp.
 */
export function isoDatePart(iso: string | null): string | null {
  if (!iso) return null;
  const match = /^(\d{4}-\d{2}-\d{2})/.exec(iso);
  return match?.[1] ?? null;
}

function cleanFields(fields: JsonRecord, numericFields: readonly string[], textFields: readonly string[]): JsonRecord {
  const cleaned: JsonRecord = { ...fields };

  for (const name of numericFields) {
    if (name in cleaned) {
      cleaned[name] = maybeFloat(cleaned[name]);
    }
  }

  for (const name of textFields) {
    const value = cleaned[name];
    if (typeof value === 'string') {
      const text = normalizeWhitespace(stripHtml(value));
      cleaned[name] = text || null;
    }
  }

  return cleaned;
}

export interface NormalizeContext {
  dataset: string;
  timestampFields: readonly string[];
  numericFields?: readonly string[];
  textFields?: readonly string[];
  listingCategory?: string;
  enrichment: EnrichmentLevel;
  extractedAt: Date;
}

/**
 * Turn an (enriched) stub into an index-ready listing.
 * Pure: no I/O.
 */
export function normalizeListing(stub: ListingStub, context: NormalizeContext): Listing {
  const fields = cleanFields(stub.fields, context.numericFields ?? [], context.textFields ?? []);
  const timestamp = pickTimestamp(fields, context.timestampFields);

  return {
    identifier: stub.identifier,
    dataset: context.dataset,
    fields,
    postedAtRaw: timestamp?.raw ?? null,
    postedAtIso: timestamp?.iso ?? null,
    sourceUrl: stub.sourceUrl,
    detailUrl: stub.detailUrl ?? null,
    extractedAtIso: context.extractedAt.toISOString(),
    listingCategory: stub.listingCategory ?? context.listingCategory ?? null,
    enrichment: context.enrichment,
  };
}
