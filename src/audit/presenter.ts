/**
 * Plain-text rendering of an AuditReport for the CLI.
 */

import type { AuditReport, CrossCheckResult, SystemGrade, TableAuditResult, TableStatus } from './types';

/** Lets a caller pick a colour or stream per line without parsing the text. */
export type LineSeverity = 'info' | 'warn' | 'error';

export interface RenderedLine {
  text: string;
  severity: LineSeverity;
}

interface StatusPresentation {
  severity: LineSeverity;
  format: (label: string) => string;
}

export const STATUS_FORMATTERS: Record<TableStatus, StatusPresentation> = {
  OK: { severity: 'info', format: (label) => `[OK]   ${label}` },
  WARN: { severity: 'warn', format: (label) => `[WARN] ${label}` },
  FAIL: { severity: 'error', format: (label) => `[FAIL] ${label}` },
};

const GRADE_SEVERITY: Record<SystemGrade, LineSeverity> = {
  Excellent: 'info',
  Good: 'warn',
  Poor: 'error',
};

function percent(value: number): string {
  return `${value.toFixed(2)}%`;
}

function ratio(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function renderTableLine(result: TableAuditResult): string {
  const fields = [
    `rows=${result.row_count}`,
    `completeness=${ratio(result.completeness_ratio)}`,
    `freshness=${ratio(result.freshness_ratio)}`,
    `health=${percent(result.health_percent)}`,
    `latest=${result.latest_at ?? 'n/a'}`,
  ];
  if (result.critical) fields.push('critical');
  if (result.error) fields.push(`error=${result.error}`);

  return STATUS_FORMATTERS[result.status].format(`${result.table_name} | ${fields.join(' | ')}`);
}

export function renderCrossCheckLine(result: CrossCheckResult): string {
  if (result.status === 'error') {
    return `  ! ${result.label}: ERROR (${result.error})`;
  }
  const marker = result.anomaly_count === 0 ? '-' : '*';
  return `  ${marker} ${result.label}: ${result.anomaly_count}`;
}

export function crossCheckSeverity(result: CrossCheckResult): LineSeverity {
  if (result.status === 'error') return 'error';
  return result.anomaly_count === 0 ? 'info' : 'warn';
}

export function renderAuditLines(report: AuditReport): RenderedLine[] {
  const lines: RenderedLine[] = [];
  const info = (text: string): void => {
    lines.push({ text, severity: 'info' });
  };
  const sampleLabel =
    report.parameters.sample_limit > 0 ? `first ${report.parameters.sample_limit}` : 'all';

  info('Ticker data audit');
  info(`Generated at: ${report.generated_at}`);
  info(
    `Universe: ${report.universe.total_tickers} active tickers, sampled ${report.universe.sampled_tickers} (${sampleLabel})`
  );
  info('');
  info('Tables');

  for (const result of Object.values(report.tables)) {
    lines.push({ text: renderTableLine(result), severity: STATUS_FORMATTERS[result.status].severity });
    if (result.missing_tickers && result.missing_tickers.length > 0) {
      info(`       missing: ${result.missing_tickers.join(', ')}`);
    }
  }

  info('');
  info('Cross-checks');
  for (const result of Object.values(report.cross)) {
    lines.push({ text: renderCrossCheckLine(result), severity: crossCheckSeverity(result) });
    if (result.status === 'ok' && result.offenders && result.offenders.length > 0) {
      for (const offender of result.offenders) {
        info(`      ${offender}`);
      }
    }
  }

  info('');
  lines.push({
    text: `System health: ${percent(report.overall.system_health_percent)} (${report.overall.grade})`,
    severity: GRADE_SEVERITY[report.overall.grade],
  });

  return lines;
}

export function renderAuditReport(report: AuditReport): string[] {
  return renderAuditLines(report).map((line) => line.text);
}
