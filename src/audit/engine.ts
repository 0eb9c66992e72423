/**
 * Data audit orchestration: table scans and cross-checks fan out with bounded
 * concurrency, then a single deterministic reduction builds the report.
 */

import { getAuditConfig, type AuditConfig } from '@/core/config';
import { AuditInputError, StoreUnavailableError, errorMessage } from '@/core/errors';
import { systemClock, type Clock } from '@/core/time';
import { getDatabase, type SqliteDatabase } from '@/data/db';
import { runWithConcurrency } from '@/utils/concurrency';
import { createChildLogger } from '@/utils/logger';
import { CrossCheckEngine, createDefaultCrossChecks } from './cross_checks';
import { gradeForHealth, systemHealthPercent } from './scoring';
import { SqliteAuditSource, type AuditSource } from './source';
import { TableScanner } from './table_scanner';
import type { AuditReport, AuditRunContext, TableAuditResult } from './types';

const logger = createChildLogger('audit');

export interface AuditEngineOptions {
  source: AuditSource;
  config?: AuditConfig;
  crossChecks?: CrossCheckEngine;
  clock?: Clock;
}

export class AuditEngine {
  private readonly source: AuditSource;
  private readonly config: AuditConfig;
  private readonly crossChecks: CrossCheckEngine;
  private readonly clock: Clock;
  private readonly scanner: TableScanner;

  constructor(options: AuditEngineOptions) {
    this.source = options.source;
    this.config = options.config ?? getAuditConfig();
    this.crossChecks = options.crossChecks ?? createDefaultCrossChecks(this.config.max_concurrency);
    this.clock = options.clock ?? systemClock;
    this.scanner = new TableScanner(this.source, this.config);
  }

  async run(sampleLimit: number = 0, detail: boolean = false): Promise<AuditReport> {
    if (!Number.isInteger(sampleLimit) || sampleLimit < 0) {
      throw new AuditInputError(`sample_limit must be a non-negative integer, got ${String(sampleLimit)}`);
    }

    const startedAt = Date.now();
    const now = this.clock();

    let totalTickers: number;
    let sample: AuditRunContext['sample'];
    try {
      await this.source.probe();
      totalTickers = await this.source.countActiveTickers();
      sample = await this.source.listActiveTickers(sampleLimit);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Audit store unavailable');
      throw new StoreUnavailableError(`Audit store unavailable: ${errorMessage(error)}`, error);
    }

    const ctx: AuditRunContext = {
      now,
      sample,
      sampleLimit,
      detail,
      detailLimit: this.config.detail_limit,
    };

    logger.info(
      { sampleLimit, detail, totalTickers, sampled: sample.length, tables: this.config.tables.length },
      'Starting data audit'
    );

    const [tableResults, cross] = await Promise.all([
      runWithConcurrency(
        this.config.tables,
        (table) => this.scanner.scan(table, ctx),
        this.config.max_concurrency
      ),
      this.crossChecks.runAll({ ...ctx, source: this.source }),
    ]);

    const report = buildReport({
      tableResults,
      cross,
      criticalWeight: this.config.critical_table_weight,
      sampleLimit,
      detail,
      totalTickers,
      sampledTickers: sample.length,
      generatedAt: new Date(now).toISOString(),
    });

    logger.info(
      {
        elapsedMs: Date.now() - startedAt,
        systemHealthPercent: report.overall.system_health_percent,
        grade: report.overall.grade,
        failedTables: tableResults.filter((t) => t.status === 'FAIL').map((t) => t.table_name),
      },
      'Data audit complete'
    );

    return report;
  }
}

interface BuildReportInput {
  tableResults: TableAuditResult[];
  cross: AuditReport['cross'];
  criticalWeight: number;
  sampleLimit: number;
  detail: boolean;
  totalTickers: number;
  sampledTickers: number;
  generatedAt: string;
}

function buildReport(input: BuildReportInput): AuditReport {
  const tables: AuditReport['tables'] = {};
  for (const result of input.tableResults) {
    tables[result.table_name] = result;
  }

  const systemHealth = systemHealthPercent(input.tableResults, input.criticalWeight);

  return deepFreeze<AuditReport>({
    tables,
    cross: input.cross,
    overall: {
      system_health_percent: systemHealth,
      grade: gradeForHealth(systemHealth),
    },
    parameters: {
      sample_limit: input.sampleLimit,
      detail: input.detail,
    },
    universe: {
      total_tickers: input.totalTickers,
      sampled_tickers: input.sampledTickers,
    },
    generated_at: input.generatedAt,
  });
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Stateless entry point used by the CLI and the scheduler. */
export async function runDataAudit(
  params: { sampleLimit?: number; detail?: boolean; db?: SqliteDatabase; clock?: Clock } = {}
): Promise<AuditReport> {
  const engine = new AuditEngine({
    source: new SqliteAuditSource(params.db ?? getDatabase()),
    clock: params.clock,
  });
  return engine.run(params.sampleLimit ?? 0, params.detail ?? false);
}
