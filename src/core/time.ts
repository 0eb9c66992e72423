/**
 * Time utilities for consistent date handling
 */

import { format, parseISO, subDays, isValid } from 'date-fns';

export const DEFAULT_MARKET_TIMEZONE = 'America/New_York';

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(parseISO(value));
}

/**
 * Calendar date (YYYY-MM-DD) of an instant as seen in the market timezone.
 */
export function marketDate(epochMs: number, timeZone: string = DEFAULT_MARKET_TIMEZONE): string {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  return formatter.format(new Date(epochMs));
}

export interface MarketClockReading {
  weekday: number; // 0 = Sunday
  minutesOfDay: number;
  label: string;
}

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

export function readMarketClock(
  epochMs: number,
  timeZone: string = DEFAULT_MARKET_TIMEZONE
): MarketClockReading {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    weekday: 'short',
    hour: '2-digit',
    minute: '2-digit',
  });
  const parts = formatter.formatToParts(new Date(epochMs));
  const hour = Number(parts.find((p) => p.type === 'hour')?.value ?? '0');
  const minute = Number(parts.find((p) => p.type === 'minute')?.value ?? '0');
  const weekdayName = parts.find((p) => p.type === 'weekday')?.value ?? 'Sun';

  const label = new Intl.DateTimeFormat('en-US', {
    timeZone,
    month: 'short',
    day: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
    timeZoneName: 'short',
  }).format(new Date(epochMs));

  return {
    weekday: Math.max(0, WEEKDAYS.indexOf(weekdayName)),
    minutesOfDay: hour * 60 + minute,
    label,
  };
}

/** Dates strictly before `dateStr`, most recent first; empty for a malformed date. */
export function previousDates(dateStr: string, count: number): string[] {
  if (!isIsoDate(dateStr)) return [];
  const base = parseISO(dateStr);
  const out: string[] = [];
  for (let i = 1; i <= count; i++) {
    out.push(formatDate(subDays(base, i)));
  }
  return out;
}

export function hoursBetween(fromMs: number, toMs: number): number {
  return (toMs - fromMs) / 3_600_000;
}
