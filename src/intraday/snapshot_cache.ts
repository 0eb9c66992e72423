/**
 * Intraday snapshot cache.
 *
 * - an entry younger than the freshness window is served without an upstream call
 * - otherwise (or when forced) one upstream fetch per key is in flight at a time;
 *   concurrent callers join it and resolve to the same lookup
 * - a plain call never waits behind a forced fetch while a fresh entry exists
 * - a failed fetch never removes a stored entry: the prior snapshot is served,
 *   labelled stale once it is past the freshness window
 */

import { DEFAULT_INTRADAY_CONFIG, getIntradayConfig, normalizeIntradayConfig, type IntradayConfig } from '@/core/config';
import { errorMessage } from '@/core/errors';
import { marketDate, previousDates, systemClock, type Clock } from '@/core/time';
import type { MarketBarsClient, UpstreamFailureKind } from '@/providers/types';
import { runWithConcurrency } from '@/utils/concurrency';
import { createChildLogger } from '@/utils/logger';
import { validateIntradaySnapshot } from '@/validation/ajv_instance';
import { normalizeBars, summarizeSnapshot } from './bars';
import { freezeSnapshot, normalizeSymbol, snapshotKey, type SnapshotStore } from './snapshot_store';
import type {
  IntradaySnapshot,
  IntradaySummary,
  OHLCVBar,
  SnapshotLookup,
  SnapshotMissReason,
  WarmTarget,
} from './types';

const logger = createChildLogger('intraday.cache');

export interface SnapshotCacheOptions {
  store: SnapshotStore;
  client: MarketBarsClient;
  config?: Partial<IntradayConfig>;
  clock?: Clock;
}

type FetchOutcome =
  | { ok: true; snapshot: IntradaySnapshot }
  | { ok: false; reason: SnapshotMissReason; message: string };

const FAILURE_REASONS: Record<UpstreamFailureKind, SnapshotMissReason> = {
  NotFound: 'not_found',
  RateLimited: 'rate_limited',
  Unavailable: 'unavailable',
};

export class SnapshotCache {
  private readonly store: SnapshotStore;
  private readonly client: MarketBarsClient;
  private readonly config: IntradayConfig;
  private readonly clock: Clock;
  private readonly inFlight = new Map<string, Promise<SnapshotLookup>>();

  constructor(options: SnapshotCacheOptions) {
    this.store = options.store;
    this.client = options.client;
    this.config = options.config
      ? normalizeIntradayConfig({ ...DEFAULT_INTRADAY_CONFIG, ...options.config })
      : getIntradayConfig();
    this.clock = options.clock ?? systemClock;
  }

  /** Trading date in the market timezone for the current clock reading. */
  tradingDate(now: number = this.clock()): string {
    return marketDate(now, this.config.market_timezone);
  }

  keyFor(symbol: string, now: number = this.clock()): string {
    return snapshotKey(this.config.namespace, symbol, this.tradingDate(now));
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  async get(symbol: string, force: boolean = false): Promise<SnapshotLookup> {
    const normalized = normalizeSymbol(symbol);
    if (!normalized) {
      return { kind: 'miss', reason: 'invalid_symbol' };
    }

    const now = this.clock();
    const tradingDate = this.tradingDate(now);
    const key = snapshotKey(this.config.namespace, normalized, tradingDate);

    // forced calls join a running fetch; plain calls look for a fresh entry first
    const pending = this.inFlight.get(key);
    if (pending && force) return pending;

    const existing = await this.readEntry(key);
    if (existing && !force && this.isFresh(existing, this.clock())) {
      return { kind: 'hit', snapshot: existing, source: 'cache' };
    }

    // Another caller may have started the fetch while the store read was pending.
    const started = this.inFlight.get(key);
    if (started) return started;

    const flight = this.refresh(key, normalized, tradingDate, existing).finally(() => {
      if (this.inFlight.get(key) === flight) {
        this.inFlight.delete(key);
      }
    });
    this.inFlight.set(key, flight);
    return flight;
  }

  /** Refreshes many symbols with bounded concurrency; resolves to the number of hits. */
  async warmMany(
    items: ReadonlyArray<string | WarmTarget>,
    force: boolean = false
  ): Promise<number> {
    const symbols = [
      ...new Set(
        items
          .map((item) => normalizeSymbol(typeof item === 'string' ? item : item.symbol))
          .filter((symbol) => symbol.length > 0)
      ),
    ];
    if (symbols.length === 0) return 0;

    const startedAt = this.clock();
    const lookups = await runWithConcurrency(
      symbols,
      (symbol) => this.get(symbol, force),
      this.config.warm_concurrency
    );

    let hits = 0;
    const sources = { cache: 0, upstream: 0, stale: 0 };
    for (const lookup of lookups) {
      if (lookup.kind === 'hit') {
        hits += 1;
        sources[lookup.source] += 1;
      }
    }

    logger.info(
      { requested: symbols.length, hits, misses: symbols.length - hits, ...sources, elapsedMs: this.clock() - startedAt },
      'Intraday warm complete'
    );
    return hits;
  }

  summarize(snapshot: IntradaySnapshot): IntradaySummary {
    return summarizeSnapshot(snapshot, this.clock(), this.config.market_timezone);
  }

  private isFresh(snapshot: IntradaySnapshot, now: number): boolean {
    return now - snapshot.fetched_at < this.config.freshness_window_seconds * 1000;
  }

  private async readEntry(key: string): Promise<IntradaySnapshot | null> {
    try {
      return await this.store.read(key);
    } catch (error) {
      logger.warn({ key, error: errorMessage(error) }, 'Snapshot store read failed, treating as missing');
      return null;
    }
  }

  private async refresh(
    key: string,
    symbol: string,
    tradingDate: string,
    existing: IntradaySnapshot | null
  ): Promise<SnapshotLookup> {
    const outcome = await this.fetchWithTimeout(symbol, tradingDate);

    if (outcome.ok) {
      try {
        await this.store.write(key, outcome.snapshot);
      } catch (error) {
        logger.warn({ key, error: errorMessage(error) }, 'Snapshot store write failed');
      }
      logger.debug({ key, bars: outcome.snapshot.bars.length }, 'Intraday snapshot refreshed');
      return { kind: 'hit', snapshot: outcome.snapshot, source: 'upstream' };
    }

    if (existing) {
      const fresh = this.isFresh(existing, this.clock());
      logger.warn(
        { key, reason: outcome.reason, message: outcome.message, fetchedAt: existing.fetched_at, fresh },
        'Upstream fetch failed, serving stored snapshot'
      );
      return { kind: 'hit', snapshot: existing, source: fresh ? 'cache' : 'stale' };
    }

    const previous = await this.previousSession(symbol, tradingDate);
    if (previous) {
      logger.warn(
        { key, reason: outcome.reason, tradingDate: previous.trading_date },
        'Upstream fetch failed, serving previous session snapshot'
      );
      return { kind: 'hit', snapshot: previous, source: 'stale' };
    }

    logger.warn({ key, reason: outcome.reason, message: outcome.message }, 'Intraday snapshot unavailable');
    return { kind: 'miss', reason: outcome.reason };
  }

  private async previousSession(symbol: string, tradingDate: string): Promise<IntradaySnapshot | null> {
    for (const date of previousDates(tradingDate, this.config.previous_session_lookback_days)) {
      const snapshot = await this.readEntry(snapshotKey(this.config.namespace, symbol, date));
      if (snapshot) return snapshot;
    }
    return null;
  }

  private async fetchWithTimeout(symbol: string, tradingDate: string): Promise<FetchOutcome> {
    const controller = new AbortController();
    const timeoutMs = this.config.fetch_timeout_ms;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<FetchOutcome>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, reason: 'timeout', message: `Upstream fetch exceeded ${timeoutMs}ms` });
      }, timeoutMs);
    });

    const upstream = Promise.resolve()
      .then(() => this.client.fetchBars(symbol, tradingDate, controller.signal))
      .then(
        (result): FetchOutcome => {
          if (!result.ok) {
            return {
              ok: false,
              reason: FAILURE_REASONS[result.failure.kind],
              message: result.failure.message,
            };
          }
          return this.buildSnapshot(symbol, tradingDate, result.bars);
        },
        (error: unknown): FetchOutcome => ({
          ok: false,
          reason: 'unavailable',
          message: `Client error: ${errorMessage(error)}`,
        })
      );

    try {
      return await Promise.race([upstream, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private buildSnapshot(
    symbol: string,
    tradingDate: string,
    rawBars: readonly OHLCVBar[]
  ): FetchOutcome {
    const { bars, dropped } = normalizeBars(rawBars);
    if (dropped > 0) {
      logger.warn({ symbol, tradingDate, dropped }, 'Dropped invalid or duplicate bars');
    }
    if (bars.length === 0) {
      return { ok: false, reason: 'invalid_payload', message: 'Upstream returned no usable bars' };
    }

    const candidate: IntradaySnapshot = {
      symbol,
      trading_date: tradingDate,
      bars,
      fetched_at: this.clock(),
    };

    const validation = validateIntradaySnapshot(candidate);
    if (!validation.valid) {
      return { ok: false, reason: 'invalid_payload', message: validation.errors.join('; ') };
    }
    return { ok: true, snapshot: freezeSnapshot(validation.data) };
  }
}
