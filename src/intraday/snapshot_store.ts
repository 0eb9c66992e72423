/**
 * Key→snapshot storage behind the intraday cache.
 * Writes replace the whole entry; readers never observe a partial snapshot.
 */

import { systemClock, type Clock } from '@/core/time';
import type { IntradaySnapshot } from './types';

export interface SnapshotStore {
  /** Entry for `key`, or null when absent, expired or unreadable. */
  read(key: string): Promise<IntradaySnapshot | null>;
  write(key: string, snapshot: IntradaySnapshot): Promise<void>;
  /** Deletes entries whose retention has lapsed; resolves to the number removed. */
  purgeExpired(now?: number): Promise<number>;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function snapshotKey(namespace: string, symbol: string, tradingDate: string): string {
  return `${namespace}:${normalizeSymbol(symbol)}:${tradingDate}`;
}

export function freezeSnapshot(snapshot: IntradaySnapshot): IntradaySnapshot {
  return Object.freeze({
    symbol: snapshot.symbol,
    trading_date: snapshot.trading_date,
    fetched_at: snapshot.fetched_at,
    bars: Object.freeze(snapshot.bars.map((bar) => Object.freeze({ ...bar }))),
  });
}

interface MemoryEntry {
  snapshot: IntradaySnapshot;
  expiresAt: number;
}

export class MemorySnapshotStore implements SnapshotStore {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(
    private readonly ttlMs: number = 72 * 60 * 60 * 1000,
    private readonly clock: Clock = systemClock
  ) {}

  async read(key: string): Promise<IntradaySnapshot | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return null;
    }
    return entry.snapshot;
  }

  async write(key: string, snapshot: IntradaySnapshot): Promise<void> {
    this.entries.set(key, {
      snapshot: freezeSnapshot(snapshot),
      expiresAt: this.clock() + this.ttlMs,
    });
  }

  async purgeExpired(now: number = this.clock()): Promise<number> {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
