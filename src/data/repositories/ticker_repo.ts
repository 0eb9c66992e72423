/**
 * Ticker universe lookups
 */

import type { WarmTarget } from '@/intraday/types';
import { getDatabase, type SqliteDatabase } from '../db';

/** Active tickers ordered by id; `limit` 0 means all. */
export function listActiveSymbols(limit: number = 0, db: SqliteDatabase = getDatabase()): WarmTarget[] {
  const sql = `SELECT id, ticker AS symbol FROM tickers WHERE active = 1 ORDER BY id ASC${limit > 0 ? ' LIMIT ?' : ''}`;
  const stmt = db.prepare<number[], { id: number; symbol: string }>(sql);
  return limit > 0 ? stmt.all(limit) : stmt.all();
}
