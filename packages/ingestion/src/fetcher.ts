import {
  PipelineCancelledError,
  validateStubs,
  type DateWindow,
  type DatasetRun,
  type FetchedPage,
  type ListingPage,
} from '@harvest/parser-sdk';
import type { IngestionLogger } from './types.js';

export interface FetchPagesOptions {
  window?: DateWindow;
  signal?: AbortSignal;
  logger: IngestionLogger;
}

export function throwIfCancelled(signal: AbortSignal | undefined, dataset: string): void {
  if (signal?.aborted) {
    throw new PipelineCancelledError(dataset);
  }
}

function pageUrlFor(run: DatasetRun, page: number, window: DateWindow | undefined): string {
  const { parser, config } = run;
  if (parser.mode === 'paged') {
    return parser.pageUrl(config, page);
  }

  if (!window) {
    throw new Error(`Dataset ${config.id} uses date-window pagination but no window was given`);
  }
  return parser.pageUrl(config, page, window);
}

async function followDataUrl(
  run: DatasetRun,
  fetched: FetchedPage,
  page: number,
  options: FetchPagesOptions,
): Promise<FetchedPage> {
  const { parser, config, client } = run;
  if (parser.mode !== 'date-window' || !parser.resolveDataUrl || !options.window) {
    return fetched;
  }

  const dataUrl = parser.resolveDataUrl(
    fetched.body,
    { config, page, url: fetched.url, contentType: fetched.contentType },
    options.window,
  );
  if (!dataUrl) {
    return fetched;
  }

  throwIfCancelled(options.signal, config.id);
  options.logger.info(`[fetch:${config.id}] Following data link on page ${page}`, { from: fetched.url, url: dataUrl });
  return client.getText(dataUrl, { purpose: 'listing' });
}

/**
 * Yield listing pages from page 1 up to `maxPages`, in source order.
 * Stops after the first empty page, or as soon as the consumer stops iterating.
 * Request and parse failures propagate: a broken listing page ends the dataset run.
 */
export async function* fetchPages(run: DatasetRun, options: FetchPagesOptions): AsyncGenerator<ListingPage> {
  const { config, parser, client } = run;

  for (let page = 1; page <= config.maxPages; page += 1) {
    throwIfCancelled(options.signal, config.id);

    const pageUrl = pageUrlFor(run, page, options.window);
    const fetched = await followDataUrl(run, await client.getText(pageUrl, { purpose: 'listing' }), page, options);
    const url = fetched.url;
    const parsed = parser.parseListing(fetched.body, {
      config,
      page,
      url,
      contentType: fetched.contentType,
    });

    const stubs = validateStubs(parsed, {
      onInvalid: (issues, stub) => {
        options.logger.warn(`[fetch:${config.id}] Dropped invalid stub on page ${page}`, {
          issues: issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
          stub,
        });
      },
    });

    yield { page, url, stubs };

    if (parsed.length === 0) {
      return;
    }
  }
}
