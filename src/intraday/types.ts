export interface OHLCVBar {
  /** Bar open time, epoch ms. */
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface IntradaySnapshot {
  symbol: string;
  /** Market-timezone calendar date, YYYY-MM-DD. */
  trading_date: string;
  /** Ascending by timestamp. */
  bars: readonly OHLCVBar[];
  fetched_at: number;
}

export type SnapshotSource = 'cache' | 'upstream' | 'stale';

export type SnapshotMissReason =
  | 'invalid_symbol'
  | 'not_found'
  | 'rate_limited'
  | 'unavailable'
  | 'timeout'
  | 'invalid_payload';

export type SnapshotLookup =
  | { kind: 'hit'; snapshot: IntradaySnapshot; source: SnapshotSource }
  | { kind: 'miss'; reason: SnapshotMissReason };

export type MarketSession = 'pre' | 'regular' | 'after' | 'overnight' | 'closed';

export interface IntradaySummary {
  symbol: string;
  trading_date: string;
  as_of: number | null;
  last_price: number | null;
  day_high: number | null;
  day_low: number | null;
  volume: number;
  bar_count: number;
  session: MarketSession;
  session_label: string;
}

export interface WarmTarget {
  id?: number;
  symbol: string;
}
