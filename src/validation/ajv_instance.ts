/**
 * Ajv validation instance with schema validators.
 * Exported reports and stored snapshots must validate before they leave or enter the process.
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { AuditReport } from '@/audit/types';
import type { IntradaySnapshot } from '@/intraday/types';
import { loadSchema } from './schema_loader';

// Draft 2020-12
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

let auditReportValidator: ValidateFunction<AuditReport> | null = null;
let intradaySnapshotValidator: ValidateFunction<IntradaySnapshot> | null = null;

export function getAuditReportValidator(): ValidateFunction<AuditReport> {
  if (!auditReportValidator) {
    auditReportValidator = ajv.compile<AuditReport>(loadSchema('audit_report.v1'));
  }
  return auditReportValidator;
}

export function getIntradaySnapshotValidator(): ValidateFunction<IntradaySnapshot> {
  if (!intradaySnapshotValidator) {
    intradaySnapshotValidator = ajv.compile<IntradaySnapshot>(loadSchema('intraday_snapshot.v1'));
  }
  return intradaySnapshotValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function validateWith<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message ?? 'invalid'}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateAuditReport(data: unknown): ValidationResult<AuditReport> {
  return validateWith(getAuditReportValidator(), data);
}

export function validateIntradaySnapshot(data: unknown): ValidationResult<IntradaySnapshot> {
  return validateWith(getIntradaySnapshotValidator(), data);
}
