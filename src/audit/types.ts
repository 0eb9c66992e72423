export type TableStatus = 'OK' | 'WARN' | 'FAIL';
export type SystemGrade = 'Excellent' | 'Good' | 'Poor';

export interface TableAuditResult {
  table_name: string;
  row_count: number;
  completeness_ratio: number;
  freshness_ratio: number;
  health_percent: number;
  status: TableStatus;
  critical: boolean;
  latest_at: string | null;
  tickers_with_data: number;
  tickers_sampled: number;
  error: string | null;
  missing_tickers?: string[];
}

export interface CrossCheckSuccess {
  label: string;
  status: 'ok';
  anomaly_count: number;
  offenders?: string[];
}

export interface CrossCheckFailure {
  label: string;
  status: 'error';
  anomaly_count: null;
  error: string;
}

export type CrossCheckResult = CrossCheckSuccess | CrossCheckFailure;

export interface AuditOverall {
  system_health_percent: number;
  grade: SystemGrade;
}

export interface AuditReport {
  tables: Record<string, TableAuditResult>;
  cross: Record<string, CrossCheckResult>;
  overall: AuditOverall;
  parameters: {
    sample_limit: number;
    detail: boolean;
  };
  universe: {
    total_tickers: number;
    sampled_tickers: number;
  };
  generated_at: string;
}

export interface UniverseTicker {
  id: number;
  ticker: string;
}

/**
 * Per-run context shared by every scan and check. Built once so that all
 * freshness math uses the same `now` and the same ticker sample.
 */
export interface AuditRunContext {
  now: number;
  sample: readonly UniverseTicker[];
  sampleLimit: number;
  detail: boolean;
  detailLimit: number;
}
