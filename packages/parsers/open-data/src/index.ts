import { createHash } from 'node:crypto';
import {
  cleanScalar,
  defineParser,
  fillTemplate,
  loadNextData,
  type DatasetConfig,
  type DateWindow,
  type JsonRecord,
  type ListingStub,
  type PageContext,
} from '@harvest/parser-sdk';
import { csvToRows, extractDataUrl, extractTableNode, findDatasetNode, jsonPayloadToRows, tableToRows } from './payload.js';
import { prepareDatasetUrl } from './url.js';

export { prepareDatasetUrl } from './url.js';
export { csvToRows, jsonPayloadToRows, tableToRows } from './payload.js';

type PayloadFormat = 'json' | 'csv' | 'html';

export function detectFormat(body: string, contentType: string): PayloadFormat {
  const type = contentType.toLowerCase();
  const head = body.trimStart();

  if (type.includes('json') || head.startsWith('{') || head.startsWith('[')) return 'json';
  if (type.includes('csv')) return 'csv';
  if (type.includes('html') || head.startsWith('<')) return 'html';
  return 'csv';
}

function portalNode(html: string, config: DatasetConfig): JsonRecord {
  const node = findDatasetNode(loadNextData(html), config.id, config.portalTitle);
  if (!node) {
    throw new Error(`Dataset ${config.id} not found in portal page data`);
  }
  return node;
}

function portalRows(html: string, config: DatasetConfig): JsonRecord[] {
  const node = portalNode(html, config);

  const table = extractTableNode(node);
  if (table) return tableToRows(table);

  const dataUrl = extractDataUrl(node);
  if (dataUrl) {
    throw new Error(`Dataset ${config.id} is published as a download at ${dataUrl}`);
  }
  throw new Error(`Dataset ${config.id} has no table or downloadable data`);
}

/**
 * Download link of a portal entry that carries no embedded table, resolved
 * against the portal URL and narrowed to the window.
 */
export function resolveDataUrl(body: string, context: PageContext, window: DateWindow): string | undefined {
  if (detectFormat(body, context.contentType) !== 'html') return undefined;

  const node = portalNode(body, context.config);
  if (extractTableNode(node)) return undefined;

  const dataUrl = extractDataUrl(node);
  return dataUrl ? prepareDatasetUrl(new URL(dataUrl, context.url).toString(), window) : undefined;
}

export function parseRows(body: string, context: PageContext): JsonRecord[] {
  switch (detectFormat(body, context.contentType)) {
    case 'json': {
      const payload: unknown = JSON.parse(body);
      return jsonPayloadToRows(payload);
    }
    case 'html':
      return portalRows(body, context.config);
    case 'csv':
      return csvToRows(body);
  }
}

function cleanRow(row: JsonRecord): JsonRecord {
  const cleaned: JsonRecord = {};
  for (const [key, value] of Object.entries(row)) {
    cleaned[key] = cleanScalar(value);
  }
  return cleaned;
}

export function rowHash(row: JsonRecord): string {
  const sorted = Object.keys(row)
    .sort()
    .map((key) => [key, row[key]]);
  return createHash('sha256').update(JSON.stringify(sorted)).digest('hex');
}

/**
 * Configured identifier columns joined by `:`, or a content hash of the row
 * when any of them is empty.
 */
export function rowIdentifier(row: JsonRecord, idFields: readonly string[] | undefined): string {
  if (idFields && idFields.length > 0) {
    const parts = idFields.map((field) => row[field]);
    if (parts.every((part) => part !== null && part !== undefined && part !== '')) {
      return parts.map(String).join(':');
    }
  }
  return rowHash(row);
}

export function parseDatasetPage(body: string, context: PageContext): ListingStub[] {
  return parseRows(body, context).map((raw) => {
    const row = cleanRow(raw);
    return {
      identifier: rowIdentifier(row, context.config.idFields),
      sourceUrl: context.url,
      listingCategory: context.config.listingCategory,
      fields: { ...row, _dataset: context.config.id, _source_url: context.url },
    };
  });
}

export const openDataParser = defineParser({
  manifest: {
    id: 'open-data',
    name: 'Government open-data tables',
    version: '1.0.0',
  },
  mode: 'date-window',
  timestampFields: (config: DatasetConfig) => {
    const field = config.dateField;
    return field ? [field, field.toLowerCase(), field.toUpperCase()] : [];
  },
  pageUrl: (config: DatasetConfig, page: number, window: DateWindow) =>
    prepareDatasetUrl(fillTemplate(config.listingUrlTemplate, { page }), window),
  parseListing: parseDatasetPage,
  resolveDataUrl,
});
