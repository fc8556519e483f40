import { ScrapeClient, type ScrapeClientOptions } from './http-client.js';
import type { DatasetConfig } from './schema.js';
import type { Parser } from './types.js';

/**
 * Typed helper for parser definitions.
 * Keeps parser declarations consistent without runtime overhead.
 */
export function defineParser<T extends Parser>(parser: T): T {
  return parser;
}

/**
 * Build the HTTP client for one dataset from its delay and retry settings.
 */
export function createDatasetClient(config: DatasetConfig, options: ScrapeClientOptions = {}): ScrapeClient {
  return new ScrapeClient({
    ...options,
    minDelayMs: config.delay.minMs,
    maxDelayMs: config.delay.maxMs,
    timeoutMs: config.timeoutMs,
    maxRetries: config.retryCount,
    challengeRetries: config.challengeRetries,
    challengeMarkers: config.challengeMarkers ?? options.challengeMarkers,
  });
}

/**
 * Substitute `{name}` placeholders in a URL template.
 * Placeholders without a value are left untouched.
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = values[name];
    return value === undefined ? placeholder : encodeURIComponent(String(value));
  });
}
