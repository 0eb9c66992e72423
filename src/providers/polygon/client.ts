/**
 * Polygon-style aggregates client for 1-minute intraday bars.
 * Rate-limited, retries 429/5xx/network errors with backoff, never throws.
 */

import { requirePolygonApiKey, getEnvConfig } from '@/core/env';
import { getIntradayConfig } from '@/core/config';
import { errorMessage } from '@/core/errors';
import type { OHLCVBar } from '@/intraday/types';
import { sleep } from '@/utils/concurrency';
import { createChildLogger } from '@/utils/logger';
import { upstreamFailure, type FetchBarsResult, type MarketBarsClient, type UpstreamFailure } from '../types';
import { RateLimiter } from './rate_limiter';
import type { PolygonAggregateBar, PolygonAggregatesResponse } from './types';

const logger = createChildLogger('polygon');

const MAX_BACKOFF_MS = 30_000;

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface PolygonClientOptions {
  apiKey: string;
  endpoint?: string;
  maxRetries?: number;
  initialBackoffMs?: number;
  rateLimiter?: RateLimiter;
  fetchImpl?: FetchLike;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAggregatesResponse(value: unknown): value is PolygonAggregatesResponse {
  return isRecord(value) && (value.results === undefined || Array.isArray(value.results));
}

function isAggregateBar(value: unknown): value is PolygonAggregateBar {
  return (
    isRecord(value) &&
    typeof value.t === 'number' &&
    typeof value.o === 'number' &&
    typeof value.h === 'number' &&
    typeof value.l === 'number' &&
    typeof value.c === 'number' &&
    typeof value.v === 'number'
  );
}

export function toOHLCVBars(results: readonly unknown[]): OHLCVBar[] {
  return results.filter(isAggregateBar).map((bar) => ({
    timestamp: bar.t,
    open: bar.o,
    high: bar.h,
    low: bar.l,
    close: bar.c,
    volume: bar.v,
  }));
}

/** Retry-After as seconds or HTTP date, in ms. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const date = Date.parse(header);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

export class PolygonAggregatesClient implements MarketBarsClient {
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly rateLimiter: RateLimiter;
  private readonly fetchImpl: FetchLike | null;
  private requestCount = 0;

  constructor(options: PolygonClientOptions) {
    this.apiKey = options.apiKey;
    this.endpoint = (options.endpoint ?? 'https://api.polygon.io').replace(/\/+$/, '');
    this.maxRetries = options.maxRetries ?? 2;
    this.initialBackoffMs = options.initialBackoffMs ?? 1000;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.fetchImpl = options.fetchImpl ?? null;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  buildUrl(symbol: string, tradingDate: string): string {
    const ticker = encodeURIComponent(symbol.trim().toUpperCase());
    const url = new URL(
      `${this.endpoint}/v2/aggs/ticker/${ticker}/range/1/minute/${tradingDate}/${tradingDate}`
    );
    url.searchParams.set('adjusted', 'true');
    url.searchParams.set('sort', 'asc');
    url.searchParams.set('limit', '50000');
    url.searchParams.set('apiKey', this.apiKey);
    return url.toString();
  }

  private backoff(attempt: number): number {
    return Math.min(MAX_BACKOFF_MS, this.initialBackoffMs * Math.pow(2, attempt));
  }

  private request(url: string, signal?: AbortSignal): Promise<Response> {
    const doFetch: FetchLike = this.fetchImpl ?? ((input, init) => fetch(input, init));
    return this.rateLimiter.schedule(() => {
      this.requestCount++;
      return doFetch(url, { signal, headers: { Accept: 'application/json' } });
    });
  }

  async fetchBars(symbol: string, tradingDate: string, signal?: AbortSignal): Promise<FetchBarsResult> {
    const url = this.buildUrl(symbol, tradingDate);
    let lastFailure: UpstreamFailure = { kind: 'Unavailable', message: 'No request attempted' };

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (signal?.aborted) {
        return upstreamFailure('Unavailable', 'Request aborted');
      }

      let response: Response;
      try {
        response = await this.request(url, signal);
      } catch (error) {
        lastFailure = { kind: 'Unavailable', message: `Network error: ${errorMessage(error)}` };
        if (attempt < this.maxRetries && !signal?.aborted) {
          const backoffMs = this.backoff(attempt);
          logger.warn({ symbol, attempt, backoffMs, error: errorMessage(error) }, 'Aggregates request failed, retrying');
          await sleep(backoffMs);
        }
        continue;
      }

      if (response.status === 429) {
        lastFailure = { kind: 'RateLimited', message: 'Upstream rate limit exceeded', status: 429 };
        if (attempt < this.maxRetries) {
          const backoffMs = Math.min(
            MAX_BACKOFF_MS,
            parseRetryAfter(response.headers.get('retry-after')) ?? this.backoff(attempt)
          );
          logger.warn({ symbol, attempt, backoffMs }, 'Rate limited by upstream, backing off');
          await sleep(backoffMs);
        }
        continue;
      }

      if (response.status === 404) {
        return upstreamFailure('NotFound', `No aggregates for ${symbol} on ${tradingDate}`, 404);
      }

      if (response.status >= 500) {
        lastFailure = {
          kind: 'Unavailable',
          message: `Upstream error: ${response.status} ${response.statusText}`,
          status: response.status,
        };
        if (attempt < this.maxRetries) {
          const backoffMs = this.backoff(attempt);
          logger.warn({ symbol, attempt, backoffMs, status: response.status }, 'Upstream error, retrying');
          await sleep(backoffMs);
        }
        continue;
      }

      if (!response.ok) {
        return upstreamFailure(
          'Unavailable',
          `Upstream rejected request: ${response.status} ${response.statusText}`,
          response.status
        );
      }

      return this.parseBody(response, symbol, tradingDate);
    }

    logger.warn({ symbol, tradingDate, failure: lastFailure.kind }, 'Aggregates request gave up');
    return { ok: false, failure: lastFailure };
  }

  private async parseBody(response: Response, symbol: string, tradingDate: string): Promise<FetchBarsResult> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return upstreamFailure('Unavailable', `Invalid JSON from upstream: ${errorMessage(error)}`, response.status);
    }

    if (!isAggregatesResponse(body)) {
      return upstreamFailure('Unavailable', 'Unexpected aggregates payload', response.status);
    }

    const results = body.results ?? [];
    if (results.length === 0) {
      return upstreamFailure('NotFound', `No aggregates for ${symbol} on ${tradingDate}`, response.status);
    }

    return { ok: true, bars: toOHLCVBars(results) };
  }
}

let defaultClient: PolygonAggregatesClient | null = null;

export function getPolygonClient(): PolygonAggregatesClient {
  if (!defaultClient) {
    const env = getEnvConfig();
    const config = getIntradayConfig();
    defaultClient = new PolygonAggregatesClient({
      apiKey: requirePolygonApiKey(),
      endpoint: env.polygonApiEndpoint,
      maxRetries: config.max_retries,
      rateLimiter: new RateLimiter({
        maxRequestsPerMinute: config.max_requests_per_minute,
        maxConcurrent: config.max_concurrent_requests,
      }),
    });
  }
  return defaultClient;
}
