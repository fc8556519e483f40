import { cleanScalar, isRecord, type JsonRecord } from '@harvest/parser-sdk';

/** Search-index fields that stay lists; every other list collapses to its first value. */
export const LIST_FIELDS: ReadonlySet<string> = new Set([
  'images',
  'pba_uaefields__private_amenities__c',
  'pba_uaefields__commercial_amenities__c',
]);

export type ListingSegment = 'sales' | 'lettings';

function normalizeValue(value: unknown, keepList: boolean): unknown {
  if (!Array.isArray(value)) return cleanScalar(value);

  const items = value.map(cleanScalar).filter((item) => item !== null);
  if (keepList) return items.length > 0 ? items : null;
  return items[0] ?? null;
}

export function flattenFields(fields: unknown): JsonRecord {
  if (!isRecord(fields)) return {};

  const flattened: JsonRecord = {};
  for (const [key, value] of Object.entries(fields)) {
    flattened[key] = normalizeValue(value, LIST_FIELDS.has(key));
  }
  return flattened;
}

export function normalizeSegment(segment: unknown): ListingSegment {
  if (typeof segment !== 'string') return 'sales';

  const normalized = segment.trim().toLowerCase();
  if (['rent', 'rental', 'lease'].includes(normalized) || normalized.includes('lett')) {
    return 'lettings';
  }
  return 'sales';
}

/**
 * Area names arrive as "`, Dubai Marina`" or as a single-element list.
 */
export function cleanLocation(value: unknown): string | null {
  const first = Array.isArray(value) ? value[0] : value;
  const text = cleanScalar(first);
  if (typeof text !== 'string') return null;

  const stripped = text.replace(/^[,\s]+/, '').trim();
  return stripped || null;
}

/**
 * Parse an ISO timestamp, assuming UTC when it carries no offset.
 */
export function toEpochAndIso(value: unknown): { epoch: number; iso: string } | null {
  const text = cleanScalar(value);
  if (typeof text !== 'string') return null;

  const normalized = text.replace(/^(\d{4}-\d{2}-\d{2}) (?=\d)/, '$1T');
  const zoned =
    /(Z|[+-]\d{2}:?\d{2})$/i.test(normalized) || !normalized.includes('T') ? normalized : `${normalized}Z`;
  const ms = Date.parse(zoned);
  if (Number.isNaN(ms)) return null;

  return { epoch: Math.floor(ms / 1000), iso: new Date(ms).toISOString() };
}
