/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export type SchemaName = 'audit_report.v1' | 'intraday_snapshot.v1';

export interface Schema {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
  [keyword: string]: unknown;
}

const schemaCache = new Map<SchemaName, Schema>();

function isSchema(value: unknown): value is Schema {
  return (
    typeof value === 'object' &&
    value !== null &&
    '$schema' in value &&
    typeof value.$schema === 'string' &&
    '$id' in value &&
    typeof value.$id === 'string' &&
    'type' in value &&
    typeof value.type === 'string'
  );
}

export function loadSchema(schemaName: SchemaName): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(process.cwd(), 'schemas', `${schemaName}.schema.json`);
  const parsed: unknown = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (!isSchema(parsed)) {
    throw new Error(`Schema ${schemaName} at ${schemaPath} is missing $schema, $id or type`);
  }

  schemaCache.set(schemaName, parsed);
  return parsed;
}
