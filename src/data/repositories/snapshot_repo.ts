/**
 * Intraday snapshot repository (SQLite).
 * Payloads are validated on read; a row that no longer matches the schema reads as missing.
 */

import { systemClock, type Clock } from '@/core/time';
import { freezeSnapshot, type SnapshotStore } from '@/intraday/snapshot_store';
import type { IntradaySnapshot } from '@/intraday/types';
import { createChildLogger } from '@/utils/logger';
import { validateIntradaySnapshot } from '@/validation/ajv_instance';
import { getDatabase, type SqliteDatabase } from '../db';

const logger = createChildLogger('snapshot_repo');

interface SnapshotRow {
  key: string;
  payload: string;
  expires_at: number;
}

export class SqliteSnapshotStore implements SnapshotStore {
  constructor(
    private readonly db: SqliteDatabase = getDatabase(),
    private readonly ttlMs: number = 72 * 60 * 60 * 1000,
    private readonly clock: Clock = systemClock
  ) {}

  async read(key: string): Promise<IntradaySnapshot | null> {
    const row = this.db
      .prepare<[string], SnapshotRow>(
        'SELECT key, payload, expires_at FROM intraday_snapshots WHERE key = ?'
      )
      .get(key);

    if (!row || row.expires_at <= this.clock()) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(row.payload);
    } catch (error) {
      logger.warn({ key, error: String(error) }, 'Stored snapshot is not valid JSON');
      return null;
    }

    const validation = validateIntradaySnapshot(parsed);
    if (!validation.valid) {
      logger.warn({ key, errors: validation.errors }, 'Stored snapshot failed schema validation');
      return null;
    }

    return freezeSnapshot(validation.data);
  }

  async write(key: string, snapshot: IntradaySnapshot): Promise<void> {
    const stmt = this.db.prepare<[string, string, string, string, number, number]>(`
      INSERT INTO intraday_snapshots (key, symbol, trading_date, payload, fetched_at, expires_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        symbol = excluded.symbol,
        trading_date = excluded.trading_date,
        payload = excluded.payload,
        fetched_at = excluded.fetched_at,
        expires_at = excluded.expires_at
    `);

    stmt.run(
      key,
      snapshot.symbol,
      snapshot.trading_date,
      JSON.stringify(snapshot),
      snapshot.fetched_at,
      this.clock() + this.ttlMs
    );
  }

  async purgeExpired(now: number = this.clock()): Promise<number> {
    const result = this.db
      .prepare<[number]>('DELETE FROM intraday_snapshots WHERE expires_at <= ?')
      .run(now);

    if (result.changes > 0) {
      logger.info({ removed: result.changes }, 'Purged expired intraday snapshots');
    }
    return result.changes;
  }

  count(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM intraday_snapshots')
      .get();
    return row?.count ?? 0;
  }
}
