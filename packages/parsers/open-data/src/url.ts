import type { DateWindow } from '@harvest/parser-sdk';

const FROM_PLACEHOLDERS = ['{fromDate}', '{FromDate}', '{fromdate}'];
const TO_PLACEHOLDERS = ['{toDate}', '{ToDate}', '{todate}'];
const FROM_KEYS = new Set(['fromdate', 'from', 'from_date', 'start', 'startdate']);
const TO_KEYS = new Set(['todate', 'to', 'to_date', 'end', 'enddate']);

function replaceAll(url: string, placeholders: readonly string[], value: string): string {
  return placeholders.reduce((result, placeholder) => result.split(placeholder).join(value), url);
}

/**
 * Apply a date window to a dataset URL. Placeholders are substituted, known
 * from/to query parameters are overwritten, and `FromDate`/`ToDate` are
 * appended when the URL names neither. An open window drops the lower bound.
 */
export function prepareDatasetUrl(url: string, window: DateWindow): string {
  const substituted = replaceAll(replaceAll(url, FROM_PLACEHOLDERS, window.from ?? ''), TO_PLACEHOLDERS, window.to);
  const parsed = new URL(substituted);
  const params = parsed.searchParams;

  let updated = false;
  for (const key of [...new Set(params.keys())]) {
    const lower = key.toLowerCase();
    if (FROM_KEYS.has(lower)) {
      if (window.from === null) {
        params.delete(key);
      } else {
        params.set(key, window.from);
      }
      updated = true;
    } else if (TO_KEYS.has(lower)) {
      params.set(key, window.to);
      updated = true;
    }
  }

  if (!updated) {
    if (window.from !== null) params.set('FromDate', window.from);
    params.set('ToDate', window.to);
  }

  return parsed.toString();
}
