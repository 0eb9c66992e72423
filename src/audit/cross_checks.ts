/**
 * Independently registered cross-table consistency checks.
 * One failing check is reported as an error entry and never aborts the others.
 */

import { CrossCheckError, errorMessage } from '@/core/errors';
import { runWithConcurrency } from '@/utils/concurrency';
import { createChildLogger } from '@/utils/logger';
import type { AuditSource, IdentifiedCount } from './source';
import type { AuditRunContext, CrossCheckResult, CrossCheckSuccess } from './types';

const logger = createChildLogger('audit.cross_checks');

export interface CrossCheckContext extends AuditRunContext {
  source: AuditSource;
}

export type CrossCheck = (ctx: CrossCheckContext) => Promise<IdentifiedCount>;

interface RegisteredCheck {
  label: string;
  check: CrossCheck;
}

export class CrossCheckEngine {
  private readonly checks: RegisteredCheck[] = [];

  constructor(private readonly maxConcurrency: number = 4) {}

  register(label: string, check: CrossCheck): this {
    if (this.checks.some((c) => c.label === label)) {
      throw new Error(`Cross-check already registered: ${label}`);
    }
    this.checks.push({ label, check });
    return this;
  }

  labels(): string[] {
    return this.checks.map((c) => c.label);
  }

  async runAll(ctx: CrossCheckContext): Promise<Record<string, CrossCheckResult>> {
    const results = await runWithConcurrency(
      this.checks,
      (entry) => runOne(entry, ctx),
      this.maxConcurrency
    );

    const out: Record<string, CrossCheckResult> = {};
    for (const result of results) {
      out[result.label] = result;
    }
    return out;
  }
}

async function runOne(entry: RegisteredCheck, ctx: CrossCheckContext): Promise<CrossCheckResult> {
  try {
    const outcome = await entry.check(ctx);
    if (!Number.isInteger(outcome.count) || outcome.count < 0) {
      throw new Error(`invalid anomaly count ${String(outcome.count)}`);
    }

    const result: CrossCheckSuccess = {
      label: entry.label,
      status: 'ok',
      anomaly_count: outcome.count,
    };
    if (ctx.detail) {
      result.offenders = outcome.offenders.slice(0, ctx.detailLimit);
    }
    return result;
  } catch (error) {
    const failure = new CrossCheckError(entry.label, error);
    logger.warn({ label: entry.label, error: errorMessage(error) }, 'Cross-check failed');
    return {
      label: entry.label,
      status: 'error',
      anomaly_count: null,
      error: failure.message,
    };
  }
}

function offenderLimit(ctx: CrossCheckContext): number {
  return ctx.detail ? ctx.detailLimit : 0;
}

/** Sampled tickers with no row at all in `table`. */
export function missingTickersCheck(table: string): CrossCheck {
  return async (ctx) => {
    const ids = ctx.sample.map((t) => t.id);
    const withRows = await ctx.source.tickerIdsWithRows(table, ids);
    const missing = ctx.sample.filter((t) => !withRows.has(t.id));
    return {
      count: missing.length,
      offenders: missing.slice(0, offenderLimit(ctx)).map((t) => t.ticker),
    };
  };
}

export function orphansCheck(left: string, right: string): CrossCheck {
  return (ctx) => ctx.source.orphanTickerIds(left, right, offenderLimit(ctx));
}

export function unknownTickerCheck(table: string): CrossCheck {
  return (ctx) => ctx.source.rowsWithUnknownTicker(table, offenderLimit(ctx));
}

export function duplicatePairsCheck(table: string, timestampColumn: string = 't'): CrossCheck {
  return (ctx) => ctx.source.duplicatePairs(table, timestampColumn, offenderLimit(ctx));
}

export function emptyJsonCheck(table: string, column: string): CrossCheck {
  return (ctx) => ctx.source.emptyJsonRows(table, column, offenderLimit(ctx));
}

export function ohlcBoundsCheck(table: string): CrossCheck {
  return (ctx) => ctx.source.ohlcViolations(table, offenderLimit(ctx));
}

export function createDefaultCrossChecks(maxConcurrency: number = 4): CrossCheckEngine {
  return new CrossCheckEngine(maxConcurrency)
    .register('Tickers with no price history', missingTickersCheck('ticker_price_histories'))
    .register('Tickers missing indicators', missingTickersCheck('ticker_indicators'))
    .register('Tickers missing snapshots', missingTickersCheck('ticker_feature_snapshots'))
    .register('Tickers missing metrics', missingTickersCheck('ticker_feature_metrics'))
    .register(
      'Snapshots without matching metrics',
      orphansCheck('ticker_feature_snapshots', 'ticker_feature_metrics')
    )
    .register(
      'Metrics without matching snapshots',
      orphansCheck('ticker_feature_metrics', 'ticker_feature_snapshots')
    )
    .register('Price rows with unknown ticker', unknownTickerCheck('ticker_price_histories'))
    .register('Duplicate snapshot (ticker_id, t) pairs', duplicatePairsCheck('ticker_feature_snapshots'))
    .register('Snapshots with empty indicators JSON', emptyJsonCheck('ticker_feature_snapshots', 'indicators'))
    .register('Price bars violating OHLC bounds', ohlcBoundsCheck('ticker_price_histories'));
}
