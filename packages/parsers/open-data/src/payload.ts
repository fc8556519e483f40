import { parse } from 'csv-parse/sync';
import { isRecord, walkJson, type JsonRecord } from '@harvest/parser-sdk';

const TABLE_KEYS = ['tableData', 'grid', 'dataTable'];
const ROW_ARRAY_KEYS = ['data', 'rows', 'items', 'records'];
const COLUMN_NAME_KEYS = ['dataIndex', 'key', 'field', 'id', 'name', 'title', 'label'];
const DATA_URL_KEYS = ['downloadUrl', 'dataUrl', 'csvUrl', 'apiUrl'];

function truthy(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '' && value !== 0 && value !== false;
}

function columnNames(columns: unknown): string[] {
  if (!Array.isArray(columns)) return [];

  const names: string[] = [];
  for (const column of columns) {
    if (typeof column === 'string') {
      names.push(column);
    } else if (isRecord(column)) {
      const key = COLUMN_NAME_KEYS.find((name) => truthy(column[name]));
      if (key) names.push(String(column[key]));
    }
  }
  return names;
}

function firstTruthy(record: JsonRecord, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (truthy(record[key])) return record[key];
  }
  return undefined;
}

/**
 * Rows of a `{columns, rows}` style table. Array rows are keyed by column
 * name, or `column_<index>` past the last named column.
 */
export function tableToRows(table: JsonRecord): JsonRecord[] {
  const columns = columnNames(firstTruthy(table, ['columns', 'headers']));
  let data = firstTruthy(table, ['rows', 'data', 'body']);

  if (isRecord(data)) {
    const wrapped = data;
    const key = ['items', 'rows', 'data'].find((name) => Array.isArray(wrapped[name]));
    data = key ? wrapped[key] : undefined;
  }
  if (!Array.isArray(data)) return [];

  const rows: JsonRecord[] = [];
  for (const row of data) {
    if (isRecord(row)) {
      rows.push({ ...row });
    } else if (Array.isArray(row)) {
      const record: JsonRecord = {};
      row.forEach((value: unknown, index: number) => {
        record[columns[index] ?? `column_${index}`] = value;
      });
      rows.push(record);
    }
  }
  return rows;
}

function recordsOf(values: unknown[]): JsonRecord[] {
  return values.filter(isRecord);
}

/**
 * Locate tabular rows anywhere in a JSON payload: a table definition, a
 * well-known row array, or the first nested value that yields rows.
 */
export function jsonPayloadToRows(payload: unknown): JsonRecord[] {
  if (Array.isArray(payload)) return recordsOf(payload);
  if (!isRecord(payload)) return [];

  if ('columns' in payload && ('rows' in payload || 'data' in payload)) {
    return tableToRows(payload);
  }

  for (const key of ['table', ...TABLE_KEYS]) {
    const table = payload[key];
    if (isRecord(table)) return tableToRows(table);
  }

  for (const key of ROW_ARRAY_KEYS) {
    const rows = payload[key];
    if (Array.isArray(rows)) return recordsOf(rows);
  }

  for (const value of Object.values(payload)) {
    if (!isRecord(value) && !Array.isArray(value)) continue;
    const rows = jsonPayloadToRows(value);
    if (rows.length > 0) return rows;
  }

  return [];
}

export function csvToRows(body: string): JsonRecord[] {
  const records: unknown = parse(body, {
    columns: true,
    skip_empty_lines: true,
    bom: true,
    trim: true,
    relax_column_count: true,
  });
  return Array.isArray(records) ? recordsOf(records) : [];
}

/**
 * Find the dataset entry of a portal page by its slug or its title.
 */
export function findDatasetNode(payload: unknown, slug: string, title?: string): JsonRecord | undefined {
  const targetSlug = slug.toLowerCase();
  const targetTitle = title?.toLowerCase();

  for (const node of walkJson(payload)) {
    if (!isRecord(node)) continue;

    const nodeSlug = String(firstTruthy(node, ['slug', 'key', 'id']) ?? '').toLowerCase();
    const nodeTitle = String(firstTruthy(node, ['title', 'name', 'label']) ?? '').toLowerCase();
    if (nodeSlug === targetSlug || (targetTitle !== undefined && nodeTitle === targetTitle)) {
      return node;
    }
  }
  return undefined;
}

export function extractTableNode(node: JsonRecord): JsonRecord | undefined {
  for (const key of ['table', ...TABLE_KEYS]) {
    const value = node[key];
    if (isRecord(value)) return value;
  }

  for (const value of Object.values(node)) {
    if (!isRecord(value)) continue;
    const table = extractTableNode(value);
    if (table) return table;
  }
  return undefined;
}

export function extractDataUrl(node: JsonRecord): string | undefined {
  for (const key of DATA_URL_KEYS) {
    const value = node[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return undefined;
}
