import { openDatabase, type SqliteDatabase } from '@/data/db';
import type { IntradaySnapshot, OHLCVBar } from '@/intraday/types';

/** 2026-03-10T00:00:00Z, a Tuesday. */
export const AUDIT_NOW = Date.parse('2026-03-10T00:00:00Z');

export function createTestDb(): SqliteDatabase {
  return openDatabase(':memory:');
}

export function insertTicker(db: SqliteDatabase, ticker: string, active: boolean = true): number {
  const result = db
    .prepare<[string, number]>('INSERT INTO tickers (ticker, active) VALUES (?, ?)')
    .run(ticker, active ? 1 : 0);
  return Number(result.lastInsertRowid);
}

export interface PriceRow {
  t: string;
  o?: number;
  h?: number;
  l?: number;
  c?: number;
  v?: number;
}

export function insertPrice(db: SqliteDatabase, tickerId: number, row: PriceRow): void {
  db.prepare<[number, string, number, number, number, number, number]>(
    'INSERT INTO ticker_price_histories (ticker_id, t, o, h, l, c, v) VALUES (?, ?, ?, ?, ?, ?, ?)'
  ).run(tickerId, row.t, row.o ?? 10, row.h ?? 11, row.l ?? 9, row.c ?? 10.5, row.v ?? 1000);
}

export function insertIndicator(db: SqliteDatabase, tickerId: number, t: string, indicator: string = 'rsi_14'): void {
  db.prepare<[number, string, string, number]>(
    'INSERT INTO ticker_indicators (ticker_id, t, indicator, value) VALUES (?, ?, ?, ?)'
  ).run(tickerId, t, indicator, 55);
}

export function insertFeatureSnapshot(
  db: SqliteDatabase,
  tickerId: number,
  t: string,
  indicators: string | null = '{"rsi_14":55}'
): void {
  db.prepare<[number, string, string | null]>(
    'INSERT INTO ticker_feature_snapshots (ticker_id, t, indicators) VALUES (?, ?, ?)'
  ).run(tickerId, t, indicators);
}

export function insertFeatureMetric(db: SqliteDatabase, tickerId: number, t: string): void {
  db.prepare<[number, string, number]>(
    'INSERT INTO ticker_feature_metrics (ticker_id, t, sharpe_60) VALUES (?, ?, ?)'
  ).run(tickerId, t, 1.2);
}

/** Every active ticker has one fresh row in each audited table. */
export function seedHealthyDataset(
  db: SqliteDatabase,
  tickers: readonly string[] = ['AAPL', 'MSFT', 'NVDA', 'AMZN'],
  t: string = '2026-03-09'
): number[] {
  return tickers.map((ticker) => {
    const id = insertTicker(db, ticker);
    insertPrice(db, id, { t });
    insertIndicator(db, id, t);
    insertFeatureSnapshot(db, id, t);
    insertFeatureMetric(db, id, t);
    return id;
  });
}

export function makeBar(timestamp: number, close: number = 100, overrides: Partial<OHLCVBar> = {}): OHLCVBar {
  return {
    timestamp,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 100,
    ...overrides,
  };
}

export function makeSnapshot(
  symbol: string,
  tradingDate: string,
  fetchedAt: number,
  bars: OHLCVBar[] = [makeBar(fetchedAt - 60_000)]
): IntradaySnapshot {
  return { symbol, trading_date: tradingDate, bars, fetched_at: fetchedAt };
}
