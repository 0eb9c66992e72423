/**
 * Application configuration loaded from JSON files under config/
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { DEFAULT_MARKET_TIMEZONE } from './time';

export interface AuditTableConfig {
  table: string;
  timestamp_column: string;
  cadence_hours: number;
  decay_hours: number;
  critical: boolean;
}

export interface AuditConfig {
  tables: AuditTableConfig[];
  completeness_weight: number;
  freshness_weight: number;
  critical_table_weight: number;
  max_concurrency: number;
  detail_limit: number;
}

export interface IntradayConfig {
  namespace: string;
  freshness_window_seconds: number;
  fetch_timeout_ms: number;
  store_ttl_hours: number;
  market_timezone: string;
  warm_concurrency: number;
  batch_limit: number;
  previous_session_lookback_days: number;
  max_requests_per_minute: number;
  max_concurrent_requests: number;
  max_retries: number;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const DEFAULT_AUDIT_TABLES: AuditTableConfig[] = [
  { table: 'ticker_price_histories', timestamp_column: 't', cadence_hours: 96, decay_hours: 96, critical: true },
  { table: 'ticker_indicators', timestamp_column: 't', cadence_hours: 96, decay_hours: 96, critical: false },
  { table: 'ticker_feature_snapshots', timestamp_column: 't', cadence_hours: 96, decay_hours: 168, critical: false },
  { table: 'ticker_feature_metrics', timestamp_column: 't', cadence_hours: 96, decay_hours: 168, critical: false },
];

export const DEFAULT_AUDIT_CONFIG: AuditConfig = {
  tables: DEFAULT_AUDIT_TABLES,
  completeness_weight: 0.7,
  freshness_weight: 0.3,
  critical_table_weight: 2,
  max_concurrency: 4,
  detail_limit: 25,
};

export const DEFAULT_INTRADAY_CONFIG: IntradayConfig = {
  namespace: 'intraday:snap',
  freshness_window_seconds: 60,
  fetch_timeout_ms: 10_000,
  store_ttl_hours: 72,
  market_timezone: DEFAULT_MARKET_TIMEZONE,
  warm_concurrency: 8,
  batch_limit: 500,
  previous_session_lookback_days: 0,
  max_requests_per_minute: 300,
  max_concurrent_requests: 8,
  max_retries: 2,
};

type RawRecord = Record<string, unknown>;

function isRecord(raw: unknown): raw is RawRecord {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

function asRecord(raw: unknown): RawRecord {
  return isRecord(raw) ? raw : {};
}

function positiveNumber(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : fallback;
}

function nonNegativeInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : fallback;
}

function nonEmptyString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback;
}

function normalizeTable(raw: unknown): AuditTableConfig | null {
  const parsed = asRecord(raw);
  const table = typeof parsed.table === 'string' ? parsed.table.trim() : '';
  if (!IDENTIFIER.test(table)) return null;

  const timestampColumn = nonEmptyString(parsed.timestamp_column, 't');
  if (!IDENTIFIER.test(timestampColumn)) return null;

  return {
    table,
    timestamp_column: timestampColumn,
    cadence_hours: positiveNumber(parsed.cadence_hours, 96),
    decay_hours: positiveNumber(parsed.decay_hours, 96),
    critical: parsed.critical === true,
  };
}

export function normalizeAuditConfig(raw: unknown): AuditConfig {
  const parsed = asRecord(raw);
  const tables: AuditTableConfig[] = [];
  const seen = new Set<string>();

  if (Array.isArray(parsed.tables)) {
    for (const entry of parsed.tables) {
      const table = normalizeTable(entry);
      if (table && !seen.has(table.table)) {
        seen.add(table.table);
        tables.push(table);
      }
    }
  }

  let completeness = positiveNumber(parsed.completeness_weight, DEFAULT_AUDIT_CONFIG.completeness_weight);
  let freshness = positiveNumber(parsed.freshness_weight, DEFAULT_AUDIT_CONFIG.freshness_weight);
  const blend = completeness + freshness;
  completeness = completeness / blend;
  freshness = freshness / blend;

  return {
    tables: Array.isArray(parsed.tables) ? tables : DEFAULT_AUDIT_TABLES,
    completeness_weight: completeness,
    freshness_weight: freshness,
    critical_table_weight: positiveNumber(parsed.critical_table_weight, DEFAULT_AUDIT_CONFIG.critical_table_weight),
    max_concurrency: Math.max(1, nonNegativeInt(parsed.max_concurrency, DEFAULT_AUDIT_CONFIG.max_concurrency)),
    detail_limit: nonNegativeInt(parsed.detail_limit, DEFAULT_AUDIT_CONFIG.detail_limit),
  };
}

export function normalizeIntradayConfig(raw: unknown): IntradayConfig {
  const parsed = asRecord(raw);
  const d = DEFAULT_INTRADAY_CONFIG;

  return {
    namespace: nonEmptyString(parsed.namespace, d.namespace),
    freshness_window_seconds: positiveNumber(parsed.freshness_window_seconds, d.freshness_window_seconds),
    fetch_timeout_ms: positiveNumber(parsed.fetch_timeout_ms, d.fetch_timeout_ms),
    store_ttl_hours: positiveNumber(parsed.store_ttl_hours, d.store_ttl_hours),
    market_timezone: nonEmptyString(parsed.market_timezone, d.market_timezone),
    warm_concurrency: Math.max(1, nonNegativeInt(parsed.warm_concurrency, d.warm_concurrency)),
    batch_limit: nonNegativeInt(parsed.batch_limit, d.batch_limit),
    previous_session_lookback_days: nonNegativeInt(
      parsed.previous_session_lookback_days,
      d.previous_session_lookback_days
    ),
    max_requests_per_minute: Math.max(1, nonNegativeInt(parsed.max_requests_per_minute, d.max_requests_per_minute)),
    max_concurrent_requests: Math.max(1, nonNegativeInt(parsed.max_concurrent_requests, d.max_concurrent_requests)),
    max_retries: nonNegativeInt(parsed.max_retries, d.max_retries),
  };
}

function readJsonConfig(fileName: string): unknown {
  const configPath = join(process.cwd(), 'config', fileName);
  if (!existsSync(configPath)) return {};
  const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
  return parsed;
}

let cachedAuditConfig: AuditConfig | null = null;
let cachedIntradayConfig: IntradayConfig | null = null;

export function getAuditConfig(): AuditConfig {
  if (!cachedAuditConfig) {
    cachedAuditConfig = normalizeAuditConfig(readJsonConfig('audit.json'));
  }
  return cachedAuditConfig;
}

export function getIntradayConfig(): IntradayConfig {
  if (!cachedIntradayConfig) {
    cachedIntradayConfig = normalizeIntradayConfig(readJsonConfig('intraday.json'));
  }
  return cachedIntradayConfig;
}

export function resetConfig(): void {
  cachedAuditConfig = null;
  cachedIntradayConfig = null;
}
