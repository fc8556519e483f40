import * as cheerio from 'cheerio';
import type { JsonRecord } from './types.js';
import { isRecord } from './values.js';

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Read the Next.js bootstrap payload embedded in a server-rendered page.
 */
export function loadNextData(html: string): JsonRecord {
  const $ = cheerio.load(html);
  const script = $('script#__NEXT_DATA__').first();
  if (script.length === 0) {
    throw new Error('Unable to locate __NEXT_DATA__ script');
  }

  const payload: unknown = JSON.parse(script.text());
  if (!isRecord(payload)) {
    throw new Error('__NEXT_DATA__ payload is not an object');
  }

  return payload;
}

/**
 * Collect every JSON-LD block of a page. Blocks that fail to parse are ignored.
 */
export function extractJsonLd(html: string): unknown[] {
  const $ = cheerio.load(html);
  const blocks: unknown[] = [];

  $('script[type="application/ld+json"]').each((_index, element) => {
    const text = $(element).text().trim();
    if (!text) return;

    const parsed = parseJson(text);
    if (Array.isArray(parsed)) {
      blocks.push(...parsed);
    } else if (parsed !== undefined) {
      blocks.push(parsed);
    }
  });

  return blocks;
}

/**
 * Breadth-first walk over every nested object and array element.
 */
export function* walkJson(node: unknown): Generator<unknown> {
  const queue: unknown[] = [node];

  while (queue.length > 0) {
    const current = queue.shift();
    yield current;

    if (Array.isArray(current)) {
      queue.push(...current);
    } else if (isRecord(current)) {
      queue.push(...Object.values(current));
    }
  }
}

/**
 * Follow a property path through nested objects, returning undefined on any miss.
 */
export function getPath(node: unknown, path: readonly string[]): unknown {
  let current: unknown = node;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}
