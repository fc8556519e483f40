import { isRecord, type JsonRecord } from '@harvest/parser-sdk';

const STREAM_CHUNK_RE = /self\.__next_f\.push\(\[1,"((?:[^"\\]|\\.)*)"\]\)/g;

/**
 * Decode the string payloads Next.js streams into the page via
 * `self.__next_f.push([1, "..."])`.
 */
export function decodeStreamChunks(html: string): string[] {
  const chunks: string[] = [];

  for (const match of html.matchAll(STREAM_CHUNK_RE)) {
    const raw = match[1];
    if (!raw) continue;

    try {
      const decoded: unknown = JSON.parse(`"${raw}"`);
      if (typeof decoded === 'string' && decoded) {
        chunks.push(decoded);
      }
    } catch {
      // Chunks holding binary references are not JSON strings.
      continue;
    }
  }

  return chunks;
}

/**
 * The first balanced `{...}` prefix of `payload`, skipping braces inside strings.
 */
export function extractBalancedJson(payload: string): string | null {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < payload.length; i += 1) {
    const ch = payload[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth += 1;
    } else if (ch === '}') {
      depth -= 1;
      if (depth === 0) {
        return payload.slice(0, i + 1);
      }
    }
  }

  return null;
}

function parseObject(text: string | null): JsonRecord | undefined {
  if (!text) return undefined;

  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Every JSON object in `chunk` that starts with `prefix`.
 */
export function* extractObjects(chunk: string, prefix: string): Generator<JsonRecord> {
  let index = chunk.indexOf(prefix);

  while (index !== -1) {
    const candidate = extractBalancedJson(chunk.slice(index));
    if (!candidate) return;

    const parsed = parseObject(candidate);
    if (parsed) yield parsed;

    index = chunk.indexOf(prefix, index + prefix.length);
  }
}

/**
 * Objects on lines shaped like `<ref>:{...}`, the row format of a flight payload.
 */
export function* extractLineObjects(chunk: string): Generator<JsonRecord> {
  for (const line of chunk.split('\n')) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;

    const remainder = line.slice(colon + 1).trim().replace(/,$/, '');
    if (!remainder.startsWith('{')) continue;

    const parsed = parseObject(extractBalancedJson(remainder));
    if (parsed) yield parsed;
  }
}
