/**
 * Typed errors for the audit pipeline.
 * Upstream market-data failures are values (see providers/types), not exceptions.
 */

export type AppErrorCode =
  | 'AUDIT_INPUT'
  | 'STORE_UNAVAILABLE'
  | 'TABLE_SCAN_FAILURE'
  | 'CROSS_CHECK_FAILURE';

export class AppError extends Error {
  readonly code: AppErrorCode;

  constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class AuditInputError extends AppError {
  constructor(message: string) {
    super('AUDIT_INPUT', message);
  }
}

/** Infrastructure-wide failure: aborts the whole audit run. */
export class StoreUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('STORE_UNAVAILABLE', message, { cause });
  }
}

export class TableScanError extends AppError {
  readonly table: string;

  constructor(table: string, cause: unknown) {
    super('TABLE_SCAN_FAILURE', `Scan of ${table} failed: ${errorMessage(cause)}`, { cause });
    this.table = table;
  }
}

export class CrossCheckError extends AppError {
  readonly label: string;

  constructor(label: string, cause: unknown) {
    super('CROSS_CHECK_FAILURE', `Cross-check "${label}" failed: ${errorMessage(cause)}`, { cause });
    this.label = label;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
