import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AuditEngine } from '@/audit/engine';
import { SqliteAuditSource } from '@/audit/source';
import { DEFAULT_AUDIT_CONFIG, DEFAULT_AUDIT_TABLES, type AuditConfig } from '@/core/config';
import { AuditInputError, StoreUnavailableError } from '@/core/errors';
import type { SqliteDatabase } from '@/data/db';
import {
  AUDIT_NOW,
  createTestDb,
  insertFeatureMetric,
  insertFeatureSnapshot,
  insertIndicator,
  insertTicker,
  seedHealthyDataset,
} from '../helpers/fixtures';

function engineFor(db: SqliteDatabase, config: AuditConfig = DEFAULT_AUDIT_CONFIG): AuditEngine {
  return new AuditEngine({
    source: new SqliteAuditSource(db),
    config,
    clock: () => AUDIT_NOW,
  });
}

describe('AuditEngine', () => {
  let db: SqliteDatabase;

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  it('grades a complete and fresh dataset as Excellent', async () => {
    seedHealthyDataset(db);

    const report = await engineFor(db).run(0, false);

    expect(Object.keys(report.tables)).toEqual(DEFAULT_AUDIT_TABLES.map((t) => t.table));
    for (const table of Object.values(report.tables)) {
      expect(table.health_percent).toBe(100);
      expect(table.status).toBe('OK');
      expect(table.error).toBeNull();
    }
    expect(report.overall).toEqual({ system_health_percent: 100, grade: 'Excellent' });
    expect(report.universe).toEqual({ total_tickers: 4, sampled_tickers: 4 });
    expect(report.parameters).toEqual({ sample_limit: 0, detail: false });
    expect(report.generated_at).toBe('2026-03-10T00:00:00.000Z');
  });

  it('weights the critical price table double in system health', async () => {
    seedHealthyDataset(db, ['AAPL', 'MSFT', 'NVDA']);
    const amzn = insertTicker(db, 'AMZN');
    insertIndicator(db, amzn, '2026-03-09');
    insertFeatureSnapshot(db, amzn, '2026-03-09');
    insertFeatureMetric(db, amzn, '2026-03-09');

    const report = await engineFor(db).run(0, false);

    expect(report.tables.ticker_price_histories.health_percent).toBe(82.5);
    expect(report.tables.ticker_price_histories.status).toBe('WARN');
    expect(report.overall).toEqual({ system_health_percent: 93, grade: 'Good' });
  });

  it('isolates a failing table scan and keeps the run going', async () => {
    seedHealthyDataset(db);
    const config: AuditConfig = {
      ...DEFAULT_AUDIT_CONFIG,
      tables: [
        ...DEFAULT_AUDIT_TABLES,
        { table: 'missing_table', timestamp_column: 't', cadence_hours: 96, decay_hours: 96, critical: false },
      ],
    };

    const report = await engineFor(db, config).run(0, false);

    expect(report.tables.missing_table).toMatchObject({
      status: 'FAIL',
      health_percent: 0,
      row_count: 0,
      error: 'Scan of missing_table failed: no such table: missing_table',
    });
    expect(report.tables.ticker_price_histories.status).toBe('OK');
    expect(report.overall).toEqual({ system_health_percent: 83.33, grade: 'Good' });
    expect(Object.keys(report.cross)).toHaveLength(10);
  });

  it('raises StoreUnavailableError when the store is closed', async () => {
    const engine = engineFor(db);
    db.close();

    await expect(engine.run(0, false)).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('rejects an invalid sample limit before touching the store', async () => {
    const engine = engineFor(db);
    db.close();

    await expect(engine.run(-1, false)).rejects.toBeInstanceOf(AuditInputError);
    await expect(engine.run(1.5, false)).rejects.toBeInstanceOf(AuditInputError);
  });

  it('samples the first N active tickers by id', async () => {
    seedHealthyDataset(db, ['AAPL', 'MSFT']);
    insertTicker(db, 'NVDA');
    insertTicker(db, 'AMZN');

    const report = await engineFor(db).run(2, true);

    expect(report.universe).toEqual({ total_tickers: 4, sampled_tickers: 2 });
    expect(report.tables.ticker_price_histories.completeness_ratio).toBe(1);
    expect(report.tables.ticker_price_histories.row_count).toBe(2);
    expect(report.tables.ticker_price_histories.missing_tickers).toEqual([]);
  });

  it('produces the same scores with and without detail', async () => {
    seedHealthyDataset(db, ['AAPL', 'MSFT', 'NVDA']);
    insertTicker(db, 'AMZN');
    const engine = engineFor(db);

    const plain = await engine.run(0, false);
    const detailed = await engine.run(0, true);

    for (const [name, table] of Object.entries(plain.tables)) {
      expect(detailed.tables[name].health_percent).toBe(table.health_percent);
      expect(detailed.tables[name].status).toBe(table.status);
    }
    expect(detailed.overall).toEqual(plain.overall);
    expect(detailed.tables.ticker_price_histories.missing_tickers).toEqual(['AMZN']);
  });

  it('grades an empty universe as Poor', async () => {
    const report = await engineFor(db).run(0, false);

    expect(report.universe).toEqual({ total_tickers: 0, sampled_tickers: 0 });
    expect(report.overall).toEqual({ system_health_percent: 0, grade: 'Poor' });
    for (const result of Object.values(report.cross)) {
      expect(result.anomaly_count).toBe(0);
    }
  });

  it('freezes the report', async () => {
    seedHealthyDataset(db);

    const report = await engineFor(db).run(0, false);

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.tables)).toBe(true);
    expect(Object.isFrozen(report.tables.ticker_price_histories)).toBe(true);
    expect(Object.isFrozen(report.cross)).toBe(true);
  });
});
