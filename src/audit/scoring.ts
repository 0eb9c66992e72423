/**
 * Health scoring for audited tables.
 *
 * health = 100 * (completeness_weight * completeness + freshness_weight * freshness)
 * system = sum(w_i * health_i) / sum(w_i), w_i = critical_table_weight for critical tables else 1
 *
 * Status and grade are evaluated on the rounded percent that ends up in the report.
 */

import type { SystemGrade, TableStatus } from './types';

export const STATUS_OK_MIN = 95;
export const STATUS_WARN_MIN = 80;
export const GRADE_EXCELLENT_MIN = 95;
export const GRADE_GOOD_MIN = 80;

export interface HealthWeights {
  completeness_weight: number;
  freshness_weight: number;
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(max, value));
}

export function statusForHealth(healthPercent: number): TableStatus {
  if (healthPercent >= STATUS_OK_MIN) return 'OK';
  if (healthPercent >= STATUS_WARN_MIN) return 'WARN';
  return 'FAIL';
}

export function gradeForHealth(healthPercent: number): SystemGrade {
  if (healthPercent >= GRADE_EXCELLENT_MIN) return 'Excellent';
  if (healthPercent >= GRADE_GOOD_MIN) return 'Good';
  return 'Poor';
}

export function completenessRatio(withData: number, sampled: number): number {
  if (sampled <= 0) return 0;
  return clamp(withData / sampled, 0, 1);
}

/**
 * 1.0 while the newest row is within the ingestion cadence, then a linear
 * decay to 0 over `decayHours`. An empty table scores 0.
 */
export function freshnessRatio(
  ageHours: number | null,
  cadenceHours: number,
  decayHours: number
): number {
  if (ageHours === null || !Number.isFinite(ageHours)) return 0;
  if (ageHours <= cadenceHours) return 1;
  if (decayHours <= 0) return 0;
  return clamp(1 - (ageHours - cadenceHours) / decayHours, 0, 1);
}

export function healthPercent(
  completeness: number,
  freshness: number,
  weights: HealthWeights
): number {
  const blended =
    weights.completeness_weight * clamp(completeness, 0, 1) +
    weights.freshness_weight * clamp(freshness, 0, 1);
  return round(clamp(blended * 100, 0, 100), 2);
}

export function systemHealthPercent(
  entries: ReadonlyArray<{ health_percent: number; critical: boolean }>,
  criticalWeight: number
): number {
  let weighted = 0;
  let totalWeight = 0;
  for (const entry of entries) {
    const weight = entry.critical ? criticalWeight : 1;
    weighted += weight * clamp(entry.health_percent, 0, 100);
    totalWeight += weight;
  }
  if (totalWeight === 0) return 0;
  return round(clamp(weighted / totalWeight, 0, 100), 2);
}
