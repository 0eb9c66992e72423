/**
 * Bar hygiene and derived intraday stats.
 */

import { DEFAULT_MARKET_TIMEZONE, readMarketClock } from '@/core/time';
import type { IntradaySnapshot, IntradaySummary, MarketSession, OHLCVBar } from './types';

export interface NormalizedBars {
  bars: OHLCVBar[];
  dropped: number;
}

function isNonNegativeFinite(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

export function isValidBar(bar: OHLCVBar): boolean {
  if (!Number.isInteger(bar.timestamp) || bar.timestamp < 0) return false;
  if (![bar.open, bar.high, bar.low, bar.close, bar.volume].every(isNonNegativeFinite)) return false;
  return bar.low <= Math.min(bar.open, bar.close) && bar.high >= Math.max(bar.open, bar.close);
}

/**
 * Drops invalid bars, keeps the last bar for a repeated timestamp and sorts ascending.
 */
export function normalizeBars(input: readonly OHLCVBar[]): NormalizedBars {
  const byTimestamp = new Map<number, OHLCVBar>();
  let dropped = 0;

  for (const bar of input) {
    if (!isValidBar(bar)) {
      dropped += 1;
      continue;
    }
    if (byTimestamp.has(bar.timestamp)) dropped += 1;
    byTimestamp.set(bar.timestamp, { ...bar });
  }

  const bars = [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
  return { bars, dropped };
}

// Market-time minute boundaries
const PRE_OPEN = 4 * 60;
const REGULAR_OPEN = 9 * 60 + 30;
const REGULAR_CLOSE = 16 * 60;
const AFTER_CLOSE = 20 * 60;

const SESSION_NAMES: Record<MarketSession, string> = {
  pre: 'Pre-market',
  regular: 'Regular session',
  after: 'After hours',
  overnight: 'Overnight',
  closed: 'Market closed',
};

export function classifySession(weekday: number, minutesOfDay: number): MarketSession {
  if (weekday === 0 || weekday === 6) return 'closed';
  if (minutesOfDay < PRE_OPEN || minutesOfDay >= AFTER_CLOSE) return 'overnight';
  if (minutesOfDay < REGULAR_OPEN) return 'pre';
  if (minutesOfDay < REGULAR_CLOSE) return 'regular';
  return 'after';
}

export function summarizeSnapshot(
  snapshot: IntradaySnapshot,
  now: number,
  timeZone: string = DEFAULT_MARKET_TIMEZONE
): IntradaySummary {
  const clock = readMarketClock(now, timeZone);
  const session = classifySession(clock.weekday, clock.minutesOfDay);
  const last = snapshot.bars.length > 0 ? snapshot.bars[snapshot.bars.length - 1] : null;

  let dayHigh: number | null = null;
  let dayLow: number | null = null;
  let volume = 0;
  for (const bar of snapshot.bars) {
    dayHigh = dayHigh === null ? bar.high : Math.max(dayHigh, bar.high);
    dayLow = dayLow === null ? bar.low : Math.min(dayLow, bar.low);
    volume += bar.volume;
  }

  return {
    symbol: snapshot.symbol,
    trading_date: snapshot.trading_date,
    as_of: last?.timestamp ?? null,
    last_price: last?.close ?? null,
    day_high: dayHigh,
    day_low: dayLow,
    volume,
    bar_count: snapshot.bars.length,
    session,
    session_label: `${SESSION_NAMES[session]} · ${clock.label}`,
  };
}
