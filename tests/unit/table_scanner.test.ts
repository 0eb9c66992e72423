import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteAuditSource } from '@/audit/source';
import { TableScanner, parseTimestamp } from '@/audit/table_scanner';
import type { AuditRunContext, UniverseTicker } from '@/audit/types';
import { DEFAULT_AUDIT_CONFIG, DEFAULT_AUDIT_TABLES, type AuditTableConfig } from '@/core/config';
import type { SqliteDatabase } from '@/data/db';
import { AUDIT_NOW, createTestDb, insertIndicator, insertPrice, insertTicker } from '../helpers/fixtures';

function tableConfig(name: string): AuditTableConfig {
  const table = DEFAULT_AUDIT_TABLES.find((t) => t.table === name);
  if (!table) throw new Error(`unknown table ${name}`);
  return table;
}

function ctxFor(sample: readonly UniverseTicker[], detail: boolean = true): AuditRunContext {
  return { now: AUDIT_NOW, sample, sampleLimit: 0, detail, detailLimit: 25 };
}

class FailingStatsSource extends SqliteAuditSource {
  async tableStats(): Promise<never> {
    throw new Error('no such table: ticker_price_histories');
  }
}

describe('TableScanner', () => {
  let db: SqliteDatabase;
  let source: SqliteAuditSource;
  let scanner: TableScanner;
  let ids: number[];

  beforeEach(() => {
    db = createTestDb();
    source = new SqliteAuditSource(db);
    scanner = new TableScanner(source, DEFAULT_AUDIT_CONFIG);
    ids = ['AAPL', 'MSFT', 'NVDA', 'AMZN'].map((ticker) => insertTicker(db, ticker));
  });

  afterEach(() => {
    db.close();
  });

  it('scores partial coverage with a fresh newest row', async () => {
    for (const id of ids.slice(0, 3)) {
      insertPrice(db, id, { t: '2026-03-09' });
    }
    const sample = await source.listActiveTickers(0);

    const result = await scanner.scan(tableConfig('ticker_price_histories'), ctxFor(sample));

    expect(result).toEqual({
      table_name: 'ticker_price_histories',
      row_count: 3,
      completeness_ratio: 0.75,
      freshness_ratio: 1,
      health_percent: 82.5,
      status: 'WARN',
      critical: true,
      latest_at: '2026-03-09T00:00:00.000Z',
      tickers_with_data: 3,
      tickers_sampled: 4,
      error: null,
      missing_tickers: ['AMZN'],
    });
  });

  it('decays freshness once the newest row is older than the cadence', async () => {
    for (const id of ids) {
      insertIndicator(db, id, '2026-03-04');
    }
    const sample = await source.listActiveTickers(0);

    const result = await scanner.scan(tableConfig('ticker_indicators'), ctxFor(sample));

    expect(result.completeness_ratio).toBe(1);
    expect(result.freshness_ratio).toBe(0.5);
    expect(result.health_percent).toBe(85);
    expect(result.status).toBe('WARN');
  });

  it('fails an empty table', async () => {
    const sample = await source.listActiveTickers(0);

    const result = await scanner.scan(tableConfig('ticker_feature_metrics'), ctxFor(sample));

    expect(result.row_count).toBe(0);
    expect(result.latest_at).toBeNull();
    expect(result.freshness_ratio).toBe(0);
    expect(result.health_percent).toBe(0);
    expect(result.status).toBe('FAIL');
    expect(result.missing_tickers).toEqual(['AAPL', 'MSFT', 'NVDA', 'AMZN']);
  });

  it('keeps row counts exact when the ticker sample is limited', async () => {
    for (const id of ids.slice(0, 3)) {
      insertPrice(db, id, { t: '2026-03-09' });
    }
    const sample = await source.listActiveTickers(2);

    const result = await scanner.scan(tableConfig('ticker_price_histories'), ctxFor(sample));

    expect(result.row_count).toBe(3);
    expect(result.tickers_sampled).toBe(2);
    expect(result.completeness_ratio).toBe(1);
    expect(result.health_percent).toBe(100);
    expect(result.status).toBe('OK');
  });

  it('omits missing tickers when detail is off', async () => {
    const sample = await source.listActiveTickers(0);

    const result = await scanner.scan(tableConfig('ticker_price_histories'), ctxFor(sample, false));

    expect('missing_tickers' in result).toBe(false);
  });

  it('turns a scan error into a FAIL entry', async () => {
    const failing = new TableScanner(new FailingStatsSource(db), DEFAULT_AUDIT_CONFIG);
    const sample = await source.listActiveTickers(0);

    const result = await failing.scan(tableConfig('ticker_price_histories'), ctxFor(sample, false));

    expect(result).toEqual({
      table_name: 'ticker_price_histories',
      row_count: 0,
      completeness_ratio: 0,
      freshness_ratio: 0,
      health_percent: 0,
      status: 'FAIL',
      critical: true,
      latest_at: null,
      tickers_with_data: 0,
      tickers_sampled: 4,
      error: 'Scan of ticker_price_histories failed: no such table: ticker_price_histories',
    });
  });
});

describe('parseTimestamp', () => {
  it('reads epoch seconds and milliseconds', () => {
    expect(parseTimestamp(1_700_000_000)?.iso).toBe('2023-11-14T22:13:20.000Z');
    expect(parseTimestamp(1_700_000_000_000)?.iso).toBe('2023-11-14T22:13:20.000Z');
  });

  it('reads SQL datetimes as UTC', () => {
    expect(parseTimestamp('2026-03-09 12:30:00')?.iso).toBe('2026-03-09T12:30:00.000Z');
    expect(parseTimestamp('2026-03-09')?.iso).toBe('2026-03-09T00:00:00.000Z');
  });

  it('rejects empty and unparseable values', () => {
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp('not a date')).toBeNull();
    expect(parseTimestamp(Number.NaN)).toBeNull();
  });
});
