/**
 * Bulletin HTTP Fetcher
 * Plain GET requests with retries, backoff and a politeness delay
 *
 * - 5xx, 429, timeouts and network errors are retried with exponential backoff
 * - other 4xx responses fail immediately
 * - consecutive requests start at least minDelayMs (+ jitter) apart,
 *   shared across every worker using the same fetcher
 * - Retry-After is honored up to the longest regular backoff (or timeoutMs)
 * - an aborted run signal stops retries and cancels the request in flight
 */

import { CancelledError, FetchError, errorMessage } from '../errors.js';
import type { FetchPolicy } from '../types.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface FetcherDeps {
  fetchImpl?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  random?: () => number;
}

export interface PageFetcher {
  /** Rejects with CancelledError once `signal` is aborted */
  fetch(url: string, signal?: AbortSignal): Promise<string>;
}

type AttemptResult =
  | { ok: true; body: string }
  | { ok: false; error: FetchError; retryAfterMs: number | null };

export const DEFAULT_FETCH_POLICY: FetchPolicy = {
  maxAttempts: 3,
  backoffMs: 1000,
  minDelayMs: 1000,
  jitterMs: 1000,
  timeoutMs: 15000,
  userAgent: 'Mozilla/5.0 (compatible; bulletin-catalog-scraper/1.0)',
};

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export class BulletinFetcher implements PageFetcher {
  private readonly fetchImpl: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly random: () => number;
  private nextSlotAt = 0;

  constructor(private readonly policy: FetchPolicy = DEFAULT_FETCH_POLICY, deps: FetcherDeps = {}) {
    this.fetchImpl = deps.fetchImpl ?? ((url, init) => fetch(url, init));
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? Date.now;
    this.random = deps.random ?? Math.random;
  }

  /**
   * GET a page and return its HTML
   */
  async fetch(url: string, signal?: AbortSignal): Promise<string> {
    const maxAttempts = Math.max(1, this.policy.maxAttempts);
    let lastError: FetchError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) throw new CancelledError(url);
      await this.waitForSlot();
      if (signal?.aborted) throw new CancelledError(url);

      const result = await this.attempt(url, attempt, signal);

      if (result.ok) return result.body;
      if (!result.error.transient) throw result.error;

      lastError = result.error;
      if (attempt < maxAttempts) {
        if (signal?.aborted) throw new CancelledError(url);
        const backoff = this.policy.backoffMs * 2 ** (attempt - 1);
        await this.sleep(result.retryAfterMs === null ? backoff : Math.min(result.retryAfterMs, this.maxRetryAfterMs()));
      }
    }

    throw new FetchError(
      url,
      `GET ${url} exhausted ${maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      true,
      maxAttempts,
      lastError?.status,
      { cause: lastError }
    );
  }

  private maxRetryAfterMs(): number {
    const longestBackoff = this.policy.backoffMs * 2 ** (Math.max(1, this.policy.maxAttempts) - 1);
    return Math.max(longestBackoff, this.policy.timeoutMs);
  }

  private async attempt(url: string, attempt: number, signal?: AbortSignal): Promise<AttemptResult> {
    const timeout = AbortSignal.timeout(this.policy.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.policy.userAgent,
          'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
        redirect: 'follow',
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });

      if (response.ok) {
        return { ok: true, body: await response.text() };
      }

      // Release the connection; the error body is not used
      await response.body?.cancel();

      const transient = response.status === 429 || response.status >= 500;
      return {
        ok: false,
        error: new FetchError(url, `GET ${url} -> ${response.status}`, transient, attempt, response.status),
        retryAfterMs: transient ? parseRetryAfter(response.headers.get('retry-after')) : null,
      };
    } catch (err) {
      if (signal?.aborted) throw new CancelledError(url);

      // Timeouts, DNS failures, resets, truncated bodies
      const reason = err instanceof Error && err.name === 'TimeoutError'
        ? `timed out after ${this.policy.timeoutMs}ms`
        : errorMessage(err);
      return {
        ok: false,
        error: new FetchError(url, `GET ${url} failed: ${reason}`, true, attempt, undefined, { cause: err }),
        retryAfterMs: null,
      };
    }
  }

  private async waitForSlot(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    // Reserve before awaiting so concurrent callers queue behind each other
    this.nextSlotAt = slot + this.policy.minDelayMs + Math.floor(this.random() * this.policy.jitterMs);
    if (slot > now) {
      await this.sleep(slot - now);
    }
  }
}

function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}
