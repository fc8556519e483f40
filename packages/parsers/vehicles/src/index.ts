import {
  RecordParseError,
  compact,
  defineParser,
  extractJsonLd,
  fillTemplate,
  isRecord,
  maybeInt,
  type DatasetConfig,
  type JsonRecord,
  type ListingStub,
  type PageContext,
} from '@harvest/parser-sdk';
import { DETAIL_FIELDS, flattenCarEntity, isCarEntity } from './entity.js';
import { decodeStreamChunks, extractLineObjects, extractObjects } from './stream.js';

export { decodeStreamChunks, extractBalancedJson } from './stream.js';
export { flattenCarEntity } from './entity.js';

const ITEM_LIST_PREFIX = '{"@context":"https://schema.org","@type":"ItemList"';
const CAR_ENTITY_PREFIX = '{"@context":"https://schema.org","@type":["Car"';
const SUMMARY_HINTS = ['price', 'make', 'model', 'mileage'];

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  return isRecord(value) && Object.keys(value).length === 0;
}

function absoluteUrl(url: unknown, base: string): string | undefined {
  if (typeof url !== 'string' || !url.trim()) return undefined;
  try {
    return new URL(url.trim(), base).toString();
  } catch {
    return undefined;
  }
}

/**
 * Summary cards keyed by listing id.
 */
export function parseSummaries(chunks: string[]): Map<string, JsonRecord> {
  const summaries = new Map<string, JsonRecord>();

  for (const chunk of chunks) {
    for (const candidate of extractLineObjects(chunk)) {
      const id = candidate.id;
      if ((typeof id !== 'string' && typeof id !== 'number') || String(id) === '') continue;
      if (!SUMMARY_HINTS.some((hint) => hint in candidate)) continue;

      summaries.set(String(id), { ...candidate, id: String(id) });
    }
  }

  return summaries;
}

function itemListsOf(html: string, chunks: string[]): JsonRecord[] {
  const lists: JsonRecord[] = [];
  for (const chunk of chunks) {
    lists.push(...extractObjects(chunk, ITEM_LIST_PREFIX));
  }
  for (const block of extractJsonLd(html)) {
    if (isRecord(block)) lists.push(block);
  }

  return lists.filter((node) => node['@type'] === 'ItemList');
}

/**
 * schema.org ItemList entries keyed by the listing id at the end of each URL.
 */
export function parseItemMeta(html: string, chunks: string[]): Map<string, JsonRecord> {
  const meta = new Map<string, JsonRecord>();

  for (const list of itemListsOf(html, chunks)) {
    const elements = Array.isArray(list.itemListElement) ? list.itemListElement : [];
    for (const element of elements) {
      if (!isRecord(element) || typeof element.url !== 'string' || !element.url) continue;

      const id = element.url.replace(/\/+$/, '').split('/').at(-1);
      if (!id) continue;

      const payload: JsonRecord = { detail_url: element.url };
      const position = maybeInt(element.position);
      if (position !== null) payload.detail_position = position;
      Object.assign(payload, flattenCarEntity(element.mainEntity));

      meta.set(id, { ...meta.get(id), ...payload });
    }
  }

  return meta;
}

/**
 * Merge ItemList metadata into a summary. Populated summary values stay and
 * the competing metadata value is kept under `<key>_meta`.
 */
function mergeSummary(summary: JsonRecord, meta: JsonRecord): JsonRecord {
  const row: JsonRecord = { ...summary };
  for (const [key, value] of Object.entries(meta)) {
    if (isEmpty(row[key])) {
      row[key] = value;
    } else {
      row[`${key}_meta`] = value;
    }
  }
  return row;
}

export function parseListingPage(html: string, context: PageContext): ListingStub[] {
  const chunks = decodeStreamChunks(html);
  const summaries = parseSummaries(chunks);
  const meta = parseItemMeta(html, chunks);
  const stubs: ListingStub[] = [];

  for (const [id, summary] of summaries) {
    const row = mergeSummary(summary, meta.get(id) ?? {});
    const detailUrl = absoluteUrl(row.detail_url ?? meta.get(id)?.detail_url, context.url);
    delete row.detail_url;

    stubs.push({
      identifier: id,
      sourceUrl: context.url,
      detailUrl,
      listingCategory: context.config.listingCategory,
      fields: compact({ ...row, source_page: context.page }),
    });
  }

  return stubs;
}

export function parseDetailPage(html: string, stub: ListingStub): JsonRecord {
  for (const chunk of decodeStreamChunks(html)) {
    for (const entity of extractObjects(chunk, CAR_ENTITY_PREFIX)) {
      return flattenCarEntity(entity);
    }
  }

  const entity = extractJsonLd(html).find(isCarEntity);
  if (entity) {
    return flattenCarEntity(entity);
  }

  throw new RecordParseError(stub.identifier, 'no structured vehicle data on detail page');
}

export const vehiclesParser = defineParser({
  manifest: {
    id: 'vehicles',
    name: 'Used vehicle marketplace',
    version: '1.0.0',
  },
  mode: 'paged',
  timestampFields: () => ['createdAt', 'publishedAt', 'postedAt', 'addedAt', 'discountAppliedAt'],
  numericFields: ['price', 'mileage', 'year', 'detail_offer_price', 'detail_mileage_value'],
  textFields: ['detail_description'],
  authoritativeFields: DETAIL_FIELDS,
  pageUrl: (config: DatasetConfig, page: number) => fillTemplate(config.listingUrlTemplate, { page }),
  parseListing: parseListingPage,
  parseDetail: parseDetailPage,
});
