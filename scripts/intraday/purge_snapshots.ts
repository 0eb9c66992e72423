#!/usr/bin/env tsx
/**
 * Deletes intraday snapshots past their retention.
 *
 * Usage: npx tsx scripts/intraday/purge_snapshots.ts
 */

import '../load_env';
import { getIntradayConfig } from '../../src/core/config';
import { closeDatabase, getDatabase } from '../../src/data/db';
import { SqliteSnapshotStore } from '../../src/data/repositories/snapshot_repo';

async function main(): Promise<void> {
  const config = getIntradayConfig();
  const store = new SqliteSnapshotStore(getDatabase(), config.store_ttl_hours * 60 * 60 * 1000);

  try {
    const removed = await store.purgeExpired();
    console.log(`Removed ${removed} expired snapshots, ${store.count()} remaining`);
  } finally {
    closeDatabase();
  }
}

main().catch((error: unknown) => {
  console.error('Snapshot purge failed:', error);
  process.exit(1);
});
