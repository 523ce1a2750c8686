/**
 * Session window utilities
 *
 * Turns a relative `HH:mm`-`HH:mm` UTC window into absolute, frozen
 * boundaries for one symbol and trading day, and maps bar timestamps back to
 * the trading day they belong to.
 *
 * @packageDocumentation
 */

import type { SessionWindow, SessionWindowConfig } from '@session-sweep/contracts';

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

/**
 * Parses a time string in HH:mm format
 */
export function parseSessionTime(timeStr: string): { hours: number; minutes: number } | null {
  const parts = timeStr.trim().split(':');
  if (parts.length !== 2) {
    return null;
  }

  const [hoursPart = '', minutesPart = ''] = parts;
  if (!/^\d{1,2}$/.test(hoursPart) || !/^\d{2}$/.test(minutesPart)) {
    return null;
  }

  const hours = parseInt(hoursPart, 10);
  const minutes = parseInt(minutesPart, 10);

  if (hours > 23 || minutes > 59) {
    return null;
  }

  return { hours, minutes };
}

function minutesOfDay(timeStr: string): number {
  const parsed = parseSessionTime(timeStr);
  if (!parsed) {
    throw new Error(`Invalid time format: ${timeStr}. Expected HH:mm.`);
  }
  return parsed.hours * 60 + parsed.minutes;
}

function parseTradingDay(tradingDay: string): number {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(tradingDay)) {
    throw new Error(`Invalid date format: ${tradingDay}. Expected YYYY-MM-DD format.`);
  }
  const midnight = Date.parse(`${tradingDay}T00:00:00Z`);
  if (Number.isNaN(midnight)) {
    throw new Error(`Invalid date: ${tradingDay}`);
  }
  return midnight;
}

/**
 * Whether the window's end is not after its start, i.e. it opens the
 * evening before the trading day.
 */
export function crossesMidnight(cfg: SessionWindowConfig): boolean {
  return minutesOfDay(cfg.end) <= minutesOfDay(cfg.start);
}

/**
 * Formats a unix ms timestamp as its UTC calendar day, YYYY-MM-DD.
 */
export function formatTradingDay(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * Materializes the session window of a trading day.
 *
 * For a window crossing midnight (e.g. 22:00-06:00) the start falls on the
 * previous calendar day. The returned object is frozen.
 *
 * @throws {Error} If the date or either time is malformed
 *
 * @example
 * ```typescript
 * const window = materializeSessionWindow('2025-01-15', 'XAUUSD', { start: '00:00', end: '06:00' });
 * // window.start === Date.parse('2025-01-15T00:00:00Z')
 * // window.end   === Date.parse('2025-01-15T06:00:00Z')
 * ```
 */
export function materializeSessionWindow(
  tradingDay: string,
  symbol: string,
  cfg: SessionWindowConfig
): SessionWindow {
  if (symbol.trim().length === 0) {
    throw new Error('Invalid symbol: must be a non-empty string');
  }

  const midnight = parseTradingDay(tradingDay);
  const startMinutes = minutesOfDay(cfg.start);
  const endMinutes = minutesOfDay(cfg.end);

  const startDay = endMinutes <= startMinutes ? midnight - MS_PER_DAY : midnight;

  return Object.freeze({
    symbol: symbol.trim(),
    date: tradingDay,
    start: startDay + startMinutes * MS_PER_MINUTE,
    end: midnight + endMinutes * MS_PER_MINUTE,
  });
}

/**
 * Trading day a timestamp belongs to.
 *
 * Timestamps at or after the start time of a midnight-crossing window count
 * toward the next calendar day.
 */
export function tradingDayOf(timestamp: number, cfg: SessionWindowConfig): string {
  if (!crossesMidnight(cfg)) {
    return formatTradingDay(timestamp);
  }

  const dayStart = Math.floor(timestamp / MS_PER_DAY) * MS_PER_DAY;
  const minute = (timestamp - dayStart) / MS_PER_MINUTE;
  return minute >= minutesOfDay(cfg.start)
    ? formatTradingDay(dayStart + MS_PER_DAY)
    : formatTradingDay(dayStart);
}

/**
 * Half-open membership test: start <= t < end.
 */
export function isWithinWindow(window: SessionWindow, t: number): boolean {
  return t >= window.start && t < window.end;
}
