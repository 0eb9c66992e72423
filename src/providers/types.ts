/**
 * Upstream market data boundary.
 * Failures are returned as values so the cache can decide between stale and miss.
 */

import type { OHLCVBar } from '@/intraday/types';

export type UpstreamFailureKind = 'NotFound' | 'RateLimited' | 'Unavailable';

export interface UpstreamFailure {
  kind: UpstreamFailureKind;
  message: string;
  status?: number;
}

export type FetchBarsResult =
  | { ok: true; bars: OHLCVBar[] }
  | { ok: false; failure: UpstreamFailure };

export interface MarketBarsClient {
  /** 1-minute bars for one market-timezone trading date, ascending. */
  fetchBars(symbol: string, tradingDate: string, signal?: AbortSignal): Promise<FetchBarsResult>;
}

export function upstreamFailure(
  kind: UpstreamFailureKind,
  message: string,
  status?: number
): FetchBarsResult {
  return { ok: false, failure: status === undefined ? { kind, message } : { kind, message, status } };
}
