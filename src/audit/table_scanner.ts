/**
 * Per-table health scan: exact row counts, sample-based completeness and
 * freshness of the newest row.
 */

import type { AuditTableConfig } from '@/core/config';
import { TableScanError, errorMessage } from '@/core/errors';
import { hoursBetween } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import type { AuditSource } from './source';
import {
  completenessRatio,
  freshnessRatio,
  healthPercent,
  round,
  statusForHealth,
  type HealthWeights,
} from './scoring';
import type { AuditRunContext, TableAuditResult } from './types';

const logger = createChildLogger('audit.table_scanner');

export interface ParsedTimestamp {
  iso: string;
  ms: number;
}

/** Accepts ISO strings, plain dates (read as UTC midnight) and epoch seconds or millis. */
export function parseTimestamp(value: string | number | null | undefined): ParsedTimestamp | null {
  if (value === null || value === undefined) return null;

  let ms: number;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    ms = value > 1_000_000_000_000 ? value : value * 1000;
  } else {
    const trimmed = value.trim();
    if (!trimmed) return null;
    ms = Date.parse(/^\d{4}-\d{2}-\d{2} \d/.test(trimmed) ? `${trimmed.replace(' ', 'T')}Z` : trimmed);
  }

  if (Number.isNaN(ms)) return null;
  return { iso: new Date(ms).toISOString(), ms };
}

export class TableScanner {
  constructor(
    private readonly source: AuditSource,
    private readonly weights: HealthWeights
  ) {}

  async scan(table: AuditTableConfig, ctx: AuditRunContext): Promise<TableAuditResult> {
    try {
      return await this.scanTable(table, ctx);
    } catch (error) {
      const failure = new TableScanError(table.table, error);
      logger.warn({ table: table.table, error: errorMessage(error) }, 'Table scan failed');
      return failedTableResult(table, ctx, failure.message);
    }
  }

  private async scanTable(table: AuditTableConfig, ctx: AuditRunContext): Promise<TableAuditResult> {
    const stats = await this.source.tableStats(table.table, table.timestamp_column);
    const sampleIds = ctx.sample.map((t) => t.id);
    const withRows = await this.source.tickerIdsWithRows(table.table, sampleIds);

    const latest = parseTimestamp(stats.latest);
    const ageHours = latest ? Math.max(0, hoursBetween(latest.ms, ctx.now)) : null;

    const completeness = completenessRatio(withRows.size, ctx.sample.length);
    const freshness = freshnessRatio(ageHours, table.cadence_hours, table.decay_hours);
    const health = healthPercent(completeness, freshness, this.weights);

    const result: TableAuditResult = {
      table_name: table.table,
      row_count: stats.rowCount,
      completeness_ratio: round(completeness, 4),
      freshness_ratio: round(freshness, 4),
      health_percent: health,
      status: statusForHealth(health),
      critical: table.critical,
      latest_at: latest?.iso ?? null,
      tickers_with_data: withRows.size,
      tickers_sampled: ctx.sample.length,
      error: null,
    };

    if (ctx.detail) {
      result.missing_tickers = ctx.sample
        .filter((t) => !withRows.has(t.id))
        .slice(0, ctx.detailLimit)
        .map((t) => t.ticker);
    }

    return result;
  }
}

function failedTableResult(
  table: AuditTableConfig,
  ctx: AuditRunContext,
  message: string
): TableAuditResult {
  const result: TableAuditResult = {
    table_name: table.table,
    row_count: 0,
    completeness_ratio: 0,
    freshness_ratio: 0,
    health_percent: 0,
    status: 'FAIL',
    critical: table.critical,
    latest_at: null,
    tickers_with_data: 0,
    tickers_sampled: ctx.sample.length,
    error: message,
  };
  if (ctx.detail) {
    result.missing_tickers = [];
  }
  return result;
}
