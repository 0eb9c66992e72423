import { describe, expect, it } from 'vitest';
import {
  STATUS_FORMATTERS,
  crossCheckSeverity,
  renderAuditLines,
  renderAuditReport,
  renderCrossCheckLine,
  renderTableLine,
} from '@/audit/presenter';
import type { AuditReport, TableAuditResult } from '@/audit/types';

const prices: TableAuditResult = {
  table_name: 'ticker_price_histories',
  row_count: 3,
  completeness_ratio: 0.75,
  freshness_ratio: 1,
  health_percent: 82.5,
  status: 'WARN',
  critical: true,
  latest_at: '2026-03-09T00:00:00.000Z',
  tickers_with_data: 3,
  tickers_sampled: 4,
  error: null,
  missing_tickers: ['AMZN'],
};

const report: AuditReport = {
  tables: { ticker_price_histories: prices },
  cross: {
    'Tickers with no price history': {
      label: 'Tickers with no price history',
      status: 'ok',
      anomaly_count: 1,
      offenders: ['AMZN'],
    },
    'Price bars violating OHLC bounds': {
      label: 'Price bars violating OHLC bounds',
      status: 'ok',
      anomaly_count: 0,
      offenders: [],
    },
    'Broken check': {
      label: 'Broken check',
      status: 'error',
      anomaly_count: null,
      error: 'Cross-check "Broken check" failed: exploded',
    },
  },
  overall: { system_health_percent: 82.5, grade: 'Good' },
  parameters: { sample_limit: 0, detail: true },
  universe: { total_tickers: 4, sampled_tickers: 4 },
  generated_at: '2026-03-10T00:00:00.000Z',
};

describe('audit presenter', () => {
  it('has a formatter for every status', () => {
    expect(Object.keys(STATUS_FORMATTERS)).toEqual(['OK', 'WARN', 'FAIL']);
    expect(STATUS_FORMATTERS.FAIL.format('x')).toBe('[FAIL] x');
  });

  it('maps each status to a severity', () => {
    expect(STATUS_FORMATTERS.OK.severity).toBe('info');
    expect(STATUS_FORMATTERS.WARN.severity).toBe('warn');
    expect(STATUS_FORMATTERS.FAIL.severity).toBe('error');
  });

  it('renders a table line', () => {
    expect(renderTableLine(prices)).toBe(
      '[WARN] ticker_price_histories | rows=3 | completeness=75.0% | freshness=100.0% | health=82.50% | latest=2026-03-09T00:00:00.000Z | critical'
    );
  });

  it('renders a failed table with its error', () => {
    const failed: TableAuditResult = {
      ...prices,
      table_name: 'ticker_indicators',
      row_count: 0,
      completeness_ratio: 0,
      freshness_ratio: 0,
      health_percent: 0,
      status: 'FAIL',
      critical: false,
      latest_at: null,
      error: 'Scan of ticker_indicators failed: disk I/O error',
    };

    expect(renderTableLine(failed)).toBe(
      '[FAIL] ticker_indicators | rows=0 | completeness=0.0% | freshness=0.0% | health=0.00% | latest=n/a | error=Scan of ticker_indicators failed: disk I/O error'
    );
  });

  it('renders cross-check lines', () => {
    expect(renderCrossCheckLine(report.cross['Tickers with no price history'])).toBe(
      '  * Tickers with no price history: 1'
    );
    expect(renderCrossCheckLine(report.cross['Price bars violating OHLC bounds'])).toBe(
      '  - Price bars violating OHLC bounds: 0'
    );
    expect(renderCrossCheckLine(report.cross['Broken check'])).toBe(
      '  ! Broken check: ERROR (Cross-check "Broken check" failed: exploded)'
    );
  });

  it('renders the whole report', () => {
    expect(renderAuditReport(report)).toEqual([
      'Ticker data audit',
      'Generated at: 2026-03-10T00:00:00.000Z',
      'Universe: 4 active tickers, sampled 4 (all)',
      '',
      'Tables',
      '[WARN] ticker_price_histories | rows=3 | completeness=75.0% | freshness=100.0% | health=82.50% | latest=2026-03-09T00:00:00.000Z | critical',
      '       missing: AMZN',
      '',
      'Cross-checks',
      '  * Tickers with no price history: 1',
      '      AMZN',
      '  - Price bars violating OHLC bounds: 0',
      '  ! Broken check: ERROR (Cross-check "Broken check" failed: exploded)',
      '',
      'System health: 82.50% (Good)',
    ]);
  });

  it('tags rendered lines with a severity', () => {
    const lines = renderAuditLines(report);

    expect(lines[5]).toEqual({
      text: '[WARN] ticker_price_histories | rows=3 | completeness=75.0% | freshness=100.0% | health=82.50% | latest=2026-03-09T00:00:00.000Z | critical',
      severity: 'warn',
    });
    expect(lines.filter((line) => line.severity === 'error').map((line) => line.text)).toEqual([
      '  ! Broken check: ERROR (Cross-check "Broken check" failed: exploded)',
    ]);
    expect(lines[lines.length - 1]).toEqual({ text: 'System health: 82.50% (Good)', severity: 'warn' });
  });

  it('rates cross-check lines by outcome', () => {
    expect(crossCheckSeverity(report.cross['Tickers with no price history'])).toBe('warn');
    expect(crossCheckSeverity(report.cross['Price bars violating OHLC bounds'])).toBe('info');
    expect(crossCheckSeverity(report.cross['Broken check'])).toBe('error');
  });
});
