/**
 * Aggregates (bars) API response types
 */

export interface PolygonAggregateBar {
  t: number; // Bar open, epoch ms
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
  vw?: number; // Volume-weighted average price
  n?: number; // Trade count
}

export interface PolygonAggregatesResponse {
  ticker?: string;
  status?: string;
  adjusted?: boolean;
  queryCount?: number;
  resultsCount?: number;
  request_id?: string;
  results?: unknown[];
}
