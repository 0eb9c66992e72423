/**
 * Read-only relational boundary for the audit.
 * SqliteAuditSource runs every query through better-sqlite3; the interface is
 * async so a networked store can stand in without touching the scanners.
 */

import type { SqliteDatabase } from '@/data/db';
import type { UniverseTicker } from './types';

export interface TableStats {
  rowCount: number;
  latest: string | number | null;
}

export interface IdentifiedCount {
  count: number;
  offenders: string[];
}

export interface AuditSource {
  /** Throws when the store cannot serve the audit at all. */
  probe(): Promise<void>;
  countActiveTickers(): Promise<number>;
  listActiveTickers(limit: number): Promise<UniverseTicker[]>;
  tableStats(table: string, timestampColumn: string): Promise<TableStats>;
  tickerIdsWithRows(table: string, tickerIds: readonly number[]): Promise<Set<number>>;
  orphanTickerIds(left: string, right: string, limit: number): Promise<IdentifiedCount>;
  rowsWithUnknownTicker(table: string, limit: number): Promise<IdentifiedCount>;
  duplicatePairs(table: string, timestampColumn: string, limit: number): Promise<IdentifiedCount>;
  emptyJsonRows(table: string, column: string, limit: number): Promise<IdentifiedCount>;
  ohlcViolations(table: string, limit: number): Promise<IdentifiedCount>;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const IN_CHUNK_SIZE = 500;

function ident(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Invalid SQL identifier: ${name}`);
  }
  return `"${name}"`;
}

function chunked<T>(arr: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < arr.length; i += size) {
    out.push(arr.slice(i, i + size));
  }
  return out;
}

export class SqliteAuditSource implements AuditSource {
  constructor(private readonly db: SqliteDatabase) {}

  async probe(): Promise<void> {
    this.db.prepare<[], { ok: number }>('SELECT COUNT(*) AS ok FROM tickers').get();
  }

  async countActiveTickers(): Promise<number> {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM tickers WHERE active = 1')
      .get();
    return row?.count ?? 0;
  }

  async listActiveTickers(limit: number): Promise<UniverseTicker[]> {
    if (limit > 0) {
      return this.db
        .prepare<[number], UniverseTicker>(
          'SELECT id, ticker FROM tickers WHERE active = 1 ORDER BY id ASC LIMIT ?'
        )
        .all(limit);
    }
    return this.db
      .prepare<[], UniverseTicker>('SELECT id, ticker FROM tickers WHERE active = 1 ORDER BY id ASC')
      .all();
  }

  async tableStats(table: string, timestampColumn: string): Promise<TableStats> {
    const row = this.db
      .prepare<[], { row_count: number; latest: string | number | null }>(
        `SELECT COUNT(*) AS row_count, MAX(${ident(timestampColumn)}) AS latest FROM ${ident(table)}`
      )
      .get();
    return { rowCount: row?.row_count ?? 0, latest: row?.latest ?? null };
  }

  async tickerIdsWithRows(table: string, tickerIds: readonly number[]): Promise<Set<number>> {
    const found = new Set<number>();
    for (const chunk of chunked(tickerIds, IN_CHUNK_SIZE)) {
      const placeholders = chunk.map(() => '?').join(', ');
      const rows = this.db
        .prepare<number[], { ticker_id: number }>(
          `SELECT DISTINCT ticker_id FROM ${ident(table)} WHERE ticker_id IN (${placeholders})`
        )
        .all(...chunk);
      for (const row of rows) found.add(row.ticker_id);
    }
    return found;
  }

  async orphanTickerIds(left: string, right: string, limit: number): Promise<IdentifiedCount> {
    const from = `
      FROM ${ident(left)} l
      WHERE NOT EXISTS (SELECT 1 FROM ${ident(right)} r WHERE r.ticker_id = l.ticker_id)
    `;
    const row = this.db
      .prepare<[], { count: number }>(`SELECT COUNT(DISTINCT l.ticker_id) AS count ${from}`)
      .get();
    const offenders = this.db
      .prepare<[number], { ticker_id: number }>(
        `SELECT DISTINCT l.ticker_id ${from} ORDER BY l.ticker_id ASC LIMIT ?`
      )
      .all(limit)
      .map((r) => `ticker_id=${r.ticker_id}`);
    return { count: row?.count ?? 0, offenders };
  }

  async rowsWithUnknownTicker(table: string, limit: number): Promise<IdentifiedCount> {
    const from = `
      FROM ${ident(table)} c
      WHERE NOT EXISTS (SELECT 1 FROM tickers p WHERE p.id = c.ticker_id)
    `;
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count ${from}`).get();
    const offenders = this.db
      .prepare<[number], { id: number; ticker_id: number }>(
        `SELECT c.id, c.ticker_id ${from} ORDER BY c.id ASC LIMIT ?`
      )
      .all(limit)
      .map((r) => `id=${r.id} ticker_id=${r.ticker_id}`);
    return { count: row?.count ?? 0, offenders };
  }

  async duplicatePairs(table: string, timestampColumn: string, limit: number): Promise<IdentifiedCount> {
    const groups = `
      SELECT ticker_id, ${ident(timestampColumn)} AS t, COUNT(*) AS n
      FROM ${ident(table)}
      GROUP BY ticker_id, ${ident(timestampColumn)}
      HAVING COUNT(*) > 1
    `;
    const row = this.db
      .prepare<[], { excess: number | null }>(`SELECT SUM(n - 1) AS excess FROM (${groups})`)
      .get();
    const offenders = this.db
      .prepare<[number], { ticker_id: number; t: string; n: number }>(
        `SELECT ticker_id, t, n FROM (${groups}) ORDER BY ticker_id ASC, t ASC LIMIT ?`
      )
      .all(limit)
      .map((r) => `ticker_id=${r.ticker_id} t=${r.t} rows=${r.n}`);
    return { count: row?.excess ?? 0, offenders };
  }

  async emptyJsonRows(table: string, column: string, limit: number): Promise<IdentifiedCount> {
    const col = ident(column);
    const from = `
      FROM ${ident(table)}
      WHERE ${col} IS NULL OR TRIM(${col}) IN ('', '[]', '{}', 'null')
    `;
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count ${from}`).get();
    const offenders = this.db
      .prepare<[number], { id: number; ticker_id: number }>(
        `SELECT id, ticker_id ${from} ORDER BY id ASC LIMIT ?`
      )
      .all(limit)
      .map((r) => `id=${r.id} ticker_id=${r.ticker_id}`);
    return { count: row?.count ?? 0, offenders };
  }

  async ohlcViolations(table: string, limit: number): Promise<IdentifiedCount> {
    const from = `
      FROM ${ident(table)}
      WHERE o IS NOT NULL AND h IS NOT NULL AND l IS NOT NULL AND c IS NOT NULL
        AND (l > o OR l > c OR h < o OR h < c OR l < 0)
    `;
    const row = this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count ${from}`).get();
    const offenders = this.db
      .prepare<[number], { id: number; ticker_id: number; t: string }>(
        `SELECT id, ticker_id, t ${from} ORDER BY id ASC LIMIT ?`
      )
      .all(limit)
      .map((r) => `id=${r.id} ticker_id=${r.ticker_id} t=${r.t}`);
    return { count: row?.count ?? 0, offenders };
  }
}
