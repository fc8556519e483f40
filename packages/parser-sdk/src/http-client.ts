import { ChallengeBlockedError, PermanentHttpError, TransientNetworkError } from './errors.js';

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/json,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Cache-Control': 'no-cache',
  Pragma: 'no-cache',
};

export const DEFAULT_CHALLENGE_MARKERS: readonly string[] = [
  "i'm not a robot",
  'confirm you are human',
  'checking your browser',
  'cf-chl',
  'attention required',
  'just a moment...',
];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface FetchedPage {
  url: string;
  finalUrl: string;
  status: number;
  contentType: string;
  body: string;
}

/**
 * Classification of a single request attempt.
 */
export type AttemptOutcome =
  | { kind: 'ok'; page: FetchedPage }
  | { kind: 'retryable'; reason: 'challenge' | 'transient'; status?: number; retryAfterMs?: number; error?: unknown }
  | { kind: 'permanent'; status: number };

/**
 * Final result of `fetch` once the retry loop settles.
 */
export type FetchResult =
  | { kind: 'ok'; page: FetchedPage; attempts: number }
  | { kind: 'blocked'; url: string; attempts: number }
  | { kind: 'failed'; url: string; status: number; attempts: number }
  | { kind: 'exhausted'; url: string; attempts: number; status?: number; error?: unknown };

export interface FetchContext {
  purpose?: 'listing' | 'detail';
  identifier?: string;
}

export interface RetryEvent {
  url: string;
  reason: 'challenge' | 'transient';
  retry: number;
  waitMs: number;
  status?: number;
  context: FetchContext;
}

export interface ScrapeClientOptions {
  minDelayMs?: number;
  maxDelayMs?: number;
  timeoutMs?: number;
  maxRetries?: number;
  challengeRetries?: number;
  backoffBaseMs?: number;
  maxBackoffMs?: number;
  challengeBackoffMs?: number;
  maxChallengeBackoffMs?: number;
  challengeMarkers?: readonly string[];
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
  sleepImpl?: (ms: number) => Promise<void>;
  random?: () => number;
  onRetry?: (event: RetryEvent) => void;
}

interface RetryCounters {
  attempts: number;
  challengeRetries: number;
  transientRetries: number;
}

type Transition =
  | { to: 'backoff'; reason: 'challenge' | 'transient'; waitMs: number; status?: number }
  | { to: 'done'; result: FetchResult };

export class ScrapeClient {
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly challengeRetries: number;
  private readonly backoffBaseMs: number;
  private readonly maxBackoffMs: number;
  private readonly challengeBackoffMs: number;
  private readonly maxChallengeBackoffMs: number;
  private readonly challengeMarkers: readonly string[];
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly sleepImpl: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly onRetry?: (event: RetryEvent) => void;

  private sequence: Promise<void> = Promise.resolve();
  private lastRequestAt = 0;

  constructor(options: ScrapeClientOptions = {}) {
    this.minDelayMs = options.minDelayMs ?? 1500;
    this.maxDelayMs = options.maxDelayMs ?? 4000;
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.challengeRetries = options.challengeRetries ?? 3;
    this.backoffBaseMs = options.backoffBaseMs ?? 500;
    this.maxBackoffMs = options.maxBackoffMs ?? 30_000;
    this.challengeBackoffMs = options.challengeBackoffMs ?? 30_000;
    this.maxChallengeBackoffMs = options.maxChallengeBackoffMs ?? 5 * 60 * 1000;
    this.challengeMarkers = (options.challengeMarkers ?? DEFAULT_CHALLENGE_MARKERS).map((marker) => marker.toLowerCase());
    this.headers = { ...DEFAULT_HEADERS, ...options.headers };
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleepImpl = options.sleepImpl ?? sleep;
    this.random = options.random ?? Math.random;
    this.onRetry = options.onRetry;
  }

  /**
   * Request a URL, retrying challenges and transient failures.
   * Never throws for HTTP-level problems; the result says how the loop ended.
   */
  async fetch(url: string, context: FetchContext = {}): Promise<FetchResult> {
    return this.enqueue(async () => {
      const counters: RetryCounters = { attempts: 0, challengeRetries: 0, transientRetries: 0 };

      while (true) {
        await this.waitForRateWindow();
        counters.attempts += 1;

        const outcome = await this.attempt(url);
        const transition = this.transition(url, outcome, counters);
        if (transition.to === 'done') {
          return transition.result;
        }

        this.onRetry?.({
          url,
          reason: transition.reason,
          retry: transition.reason === 'challenge' ? counters.challengeRetries : counters.transientRetries,
          waitMs: transition.waitMs,
          status: transition.status,
          context,
        });
        await this.sleepImpl(transition.waitMs);
      }
    });
  }

  /**
   * Like `fetch`, but resolves to the body and throws a typed error otherwise.
   */
  async getText(url: string, context: FetchContext = {}): Promise<FetchedPage> {
    const result = await this.fetch(url, context);

    switch (result.kind) {
      case 'ok':
        return result.page;
      case 'blocked':
        throw new ChallengeBlockedError(url, result.attempts);
      case 'failed':
        throw new PermanentHttpError(url, result.status);
      case 'exhausted':
        throw new TransientNetworkError(url, result.attempts, result.status, result.error);
    }
  }

  private transition(url: string, outcome: AttemptOutcome, counters: RetryCounters): Transition {
    if (outcome.kind === 'ok') {
      return { to: 'done', result: { kind: 'ok', page: outcome.page, attempts: counters.attempts } };
    }

    if (outcome.kind === 'permanent') {
      return {
        to: 'done',
        result: { kind: 'failed', url, status: outcome.status, attempts: counters.attempts },
      };
    }

    if (outcome.reason === 'challenge') {
      if (counters.challengeRetries >= this.challengeRetries) {
        return { to: 'done', result: { kind: 'blocked', url, attempts: counters.attempts } };
      }

      const waitMs = this.getChallengeDelayMs(counters.challengeRetries);
      counters.challengeRetries += 1;
      return { to: 'backoff', reason: 'challenge', waitMs, status: outcome.status };
    }

    if (counters.transientRetries >= this.maxRetries) {
      return {
        to: 'done',
        result: {
          kind: 'exhausted',
          url,
          attempts: counters.attempts,
          status: outcome.status,
          error: outcome.error,
        },
      };
    }

    const waitMs = this.getRetryDelayMs(outcome.retryAfterMs, counters.transientRetries);
    counters.transientRetries += 1;
    return { to: 'backoff', reason: 'transient', waitMs, status: outcome.status };
  }

  private async attempt(url: string): Promise<AttemptOutcome> {
    let response: Response;
    let body: string;

    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: this.headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = await response.text();
    } catch (error) {
      return { kind: 'retryable', reason: 'transient', error };
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (this.isChallenge(contentType, body)) {
      return { kind: 'retryable', reason: 'challenge', status: response.status };
    }

    if (!response.ok) {
      if (response.status === 429 || response.status >= 500) {
        return {
          kind: 'retryable',
          reason: 'transient',
          status: response.status,
          retryAfterMs: this.parseRetryAfter(response.headers.get('retry-after')),
        };
      }

      return { kind: 'permanent', status: response.status };
    }

    return {
      kind: 'ok',
      page: {
        url,
        finalUrl: response.url || url,
        status: response.status,
        contentType,
        body,
      },
    };
  }

  private isChallenge(contentType: string, body: string): boolean {
    const type = contentType.toLowerCase();
    if (type && !type.includes('html')) {
      return false;
    }

    const lowered = body.toLowerCase();
    return this.challengeMarkers.some((marker) => lowered.includes(marker));
  }

  private parseRetryAfter(value: string | null): number | undefined {
    if (!value) return undefined;

    const seconds = Number(value);
    if (!Number.isFinite(seconds) || seconds < 0) {
      return undefined;
    }

    return Math.min(Math.round(seconds * 1000), this.maxBackoffMs);
  }

  private getRetryDelayMs(retryAfterMs: number | undefined, retry: number): number {
    if (retryAfterMs !== undefined) {
      return retryAfterMs;
    }

    const maxJitter = 250;
    const jitter = Math.floor(this.random() * maxJitter);
    return Math.min(this.backoffBaseMs * 2 ** retry + jitter, this.maxBackoffMs);
  }

  private getChallengeDelayMs(retry: number): number {
    return Math.min(this.challengeBackoffMs * 2 ** retry, this.maxChallengeBackoffMs);
  }

  private randomDelayMs(): number {
    if (this.maxDelayMs <= this.minDelayMs) {
      return this.minDelayMs;
    }

    const spread = this.maxDelayMs - this.minDelayMs;
    return this.minDelayMs + Math.floor(this.random() * (spread + 1));
  }

  private async waitForRateWindow(): Promise<void> {
    const now = Date.now();
    if (this.lastRequestAt === 0) {
      this.lastRequestAt = now;
      return;
    }

    const target = this.lastRequestAt + this.randomDelayMs();
    if (target > now) {
      await this.sleepImpl(target - now);
    }

    this.lastRequestAt = Date.now();
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.sequence.then(task, task);
    this.sequence = next.then(
      () => undefined,
      () => undefined,
    );

    return next;
  }
}
