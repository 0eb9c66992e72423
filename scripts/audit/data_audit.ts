#!/usr/bin/env tsx
/**
 * Ticker data audit
 *
 * Scores health and cross-table consistency of the ingested ticker datasets.
 *
 * Usage:
 *   npx tsx scripts/audit/data_audit.ts [--limit N] [--detail] [--export]
 *
 * Exit codes: 0 report produced, 2 invalid input, 3 store unavailable, 1 anything else.
 */

import '../load_env';
import { runDataAudit } from '../../src/audit/engine';
import { renderAuditLines, type LineSeverity } from '../../src/audit/presenter';
import { exportAuditReport, logAuditReport } from '../../src/audit/report';
import { AuditInputError, StoreUnavailableError, errorMessage } from '../../src/core/errors';
import { closeDatabase } from '../../src/data/db';

export interface DataAuditCliOptions {
  limit: number;
  detail: boolean;
  export: boolean;
}

export function parseArgs(argv: string[]): DataAuditCliOptions {
  const opts: DataAuditCliOptions = { limit: 0, detail: false, export: false };

  for (let i = 2; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith('--')) continue;
    if (arg === '--detail') {
      opts.detail = true;
      continue;
    }
    if (arg === '--export') {
      opts.export = true;
      continue;
    }
    if (arg === '--limit') {
      opts.limit = Number(argv[i + 1]);
      i += 1;
      continue;
    }
    if (arg.startsWith('--limit=')) {
      opts.limit = Number(arg.split('=')[1]);
    }
  }

  return opts;
}

const PRINTERS: Record<LineSeverity, (text: string) => void> = {
  info: (text) => console.log(text),
  warn: (text) => console.warn(text),
  error: (text) => console.error(text),
};

async function main(): Promise<number> {
  const opts = parseArgs(process.argv);

  try {
    const report = await runDataAudit({ sampleLimit: opts.limit, detail: opts.detail });

    for (const line of renderAuditLines(report)) {
      PRINTERS[line.severity](line.text);
    }
    logAuditReport(report);

    if (opts.export) {
      const { filePath } = exportAuditReport(report);
      console.log(`\nReport exported: ${filePath}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof AuditInputError) {
      console.error(`Invalid input: ${error.message}`);
      console.error('Usage: npx tsx scripts/audit/data_audit.ts [--limit N] [--detail] [--export]');
      return 2;
    }
    if (error instanceof StoreUnavailableError) {
      console.error(`Store unavailable: ${error.message}`);
      return 3;
    }
    console.error('Data audit failed:', errorMessage(error));
    return 1;
  } finally {
    closeDatabase();
  }
}

if (process.argv[1]?.includes('data_audit')) {
  main()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error(error);
      process.exit(1);
    });
}
