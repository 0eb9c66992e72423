/**
 * Audit report sinks: schema-validated JSON export and the structured log sink.
 */

import { writeFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import { format } from 'date-fns';
import { createChildLogger, type Logger } from '@/utils/logger';
import { validateAuditReport } from '@/validation/ajv_instance';
import type { AuditReport } from './types';

const logger = createChildLogger('audit');

export interface ExportResult {
  filePath: string;
  bytes: number;
}

export function auditExportFileName(report: AuditReport): string {
  return `ticker_data_audit_${format(new Date(report.generated_at), 'yyyyMMdd_HHmmss')}.json`;
}

export function exportAuditReport(
  report: AuditReport,
  outputDir: string = join(process.cwd(), 'data', 'audits')
): ExportResult {
  const validation = validateAuditReport(report);
  if (!validation.valid) {
    throw new Error(`Audit report failed schema validation: ${validation.errors.join('; ')}`);
  }

  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }

  const filePath = join(outputDir, auditExportFileName(report));
  const content = JSON.stringify(report, null, 2);
  writeFileSync(filePath, content, 'utf-8');

  logger.info({ filePath }, 'Audit report exported');

  return { filePath, bytes: Buffer.byteLength(content, 'utf-8') };
}

/** Writes the full report as one structured record. */
export function logAuditReport(report: AuditReport, sink: Logger = logger): void {
  sink.info(
    {
      report,
      system_health_percent: report.overall.system_health_percent,
      grade: report.overall.grade,
    },
    'Data audit report'
  );
}
