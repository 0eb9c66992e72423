#!/usr/bin/env tsx
/**
 * Intraday prefetch
 *
 * Refreshes today's 1-minute snapshots, meant to run once per minute from a scheduler.
 *
 * Usage:
 *   npx tsx scripts/intraday/prefetch_intraday.ts --symbol AAPL [--force]
 *   npx tsx scripts/intraday/prefetch_intraday.ts [--limit 500] [--concurrency 8] [--force]
 */

import '../load_env';
import { getIntradayConfig } from '../../src/core/config';
import { errorMessage } from '../../src/core/errors';
import { closeDatabase, getDatabase } from '../../src/data/db';
import { SqliteSnapshotStore } from '../../src/data/repositories/snapshot_repo';
import { listActiveSymbols } from '../../src/data/repositories/ticker_repo';
import { SnapshotCache } from '../../src/intraday/snapshot_cache';
import { getPolygonClient } from '../../src/providers/polygon/client';
import { createChildLogger } from '../../src/utils/logger';

const logger = createChildLogger('prefetch_intraday');

export interface PrefetchCliOptions {
  symbol: string | null;
  limit: number | null;
  concurrency: number | null;
  force: boolean;
}

function positiveInt(raw: string | undefined): number | null {
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : null;
}

export function parseArgs(argv: string[]): PrefetchCliOptions {
  const opts: PrefetchCliOptions = { symbol: null, limit: null, concurrency: null, force: false };

  for (let i = 2; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith('--')) continue;
    const [flag, inline] = arg.includes('=') ? arg.split('=', 2) : [arg, undefined];
    const takeValue = (): string | undefined => {
      if (inline !== undefined) return inline;
      i += 1;
      return argv[i];
    };

    switch (flag) {
      case '--force':
        opts.force = true;
        break;
      case '--symbol':
        opts.symbol = takeValue()?.trim().toUpperCase() || null;
        break;
      case '--limit':
        opts.limit = positiveInt(takeValue());
        break;
      case '--concurrency':
        opts.concurrency = positiveInt(takeValue());
        break;
      default:
        break;
    }
  }

  return opts;
}

async function main(): Promise<number> {
  const opts = parseArgs(process.argv);
  const config = getIntradayConfig();

  const cache = new SnapshotCache({
    store: new SqliteSnapshotStore(getDatabase(), config.store_ttl_hours * 60 * 60 * 1000),
    client: getPolygonClient(),
    config: { ...config, warm_concurrency: opts.concurrency ?? config.warm_concurrency },
  });

  try {
    if (opts.symbol) {
      const lookup = await cache.get(opts.symbol, opts.force);
      if (lookup.kind === 'miss') {
        console.error(`${opts.symbol}: no snapshot (${lookup.reason})`);
        return 1;
      }
      const summary = cache.summarize(lookup.snapshot);
      console.log(
        [
          `${summary.symbol} ${summary.trading_date}`,
          `source=${lookup.source}`,
          `bars=${summary.bar_count}`,
          `last=${summary.last_price ?? 'n/a'}`,
          `high=${summary.day_high ?? 'n/a'}`,
          `low=${summary.day_low ?? 'n/a'}`,
          `volume=${summary.volume}`,
          summary.session_label,
        ].join(' | ')
      );
      return 0;
    }

    const targets = listActiveSymbols(opts.limit ?? config.batch_limit);
    logger.info({ targets: targets.length, force: opts.force }, 'Prefetching intraday snapshots');
    const hits = await cache.warmMany(targets, opts.force);
    console.log(`Warmed ${hits}/${targets.length} symbols`);
    return 0;
  } catch (error) {
    console.error('Intraday prefetch failed:', errorMessage(error));
    return 1;
  } finally {
    closeDatabase();
  }
}

if (process.argv[1]?.includes('prefetch_intraday')) {
  main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error(error);
      process.exit(1);
    });
}
