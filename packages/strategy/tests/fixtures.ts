/**
 * Shared bar and range fixtures for strategy tests.
 */

import type { AsianRange, MarketBar, SessionWindow } from '@session-sweep/contracts';

export const DAY = '2025-01-15';

/** Unix ms of HH:mm on the test day */
export function at(time: string, day: string = DAY): number {
  return Date.parse(`${day}T${time}:00Z`);
}

export function bar(
  time: string,
  open: number,
  high: number,
  low: number,
  close: number,
  volume = 100
): MarketBar {
  return { timestamp: at(time), open, high, low, close, volume };
}

export const ASIA_WINDOW: SessionWindow = Object.freeze({
  symbol: 'XAUUSD',
  date: DAY,
  start: at('00:00'),
  end: at('06:00'),
});

export function makeRange(high: number, low: number, extra: Partial<AsianRange> = {}): AsianRange {
  return {
    window: ASIA_WINDOW,
    high,
    low,
    midpoint: (high + low) / 2,
    barCount: 72,
    isValid: high > low,
    ...extra,
  };
}

/** M5 sweep bar of the reference scenario: takes the 2000.0 high by 0.6 */
export const SWEEP_BAR = bar('06:05', 1999.8, 2000.6, 1998.0, 1999.4);

/** M5 bar closing back inside the range at 1995.0 */
export const CLOSE_BACK_BAR = bar('06:10', 1999.4, 1999.5, 1994.8, 1995.0);

/**
 * M1 bars after the sweep. A swing low at 06:07 (1998.0) is confirmed by
 * 06:09 and broken by the 06:10 close at 1997.0.
 */
export const MICRO_BARS: MarketBar[] = [
  bar('06:05', 1999.8, 2000.6, 1999.5, 1999.6),
  bar('06:06', 1999.6, 1999.9, 1999.0, 1999.2),
  bar('06:07', 1999.2, 1999.4, 1998.0, 1998.5),
  bar('06:08', 1998.9, 1999.3, 1998.8, 1999.1),
  bar('06:09', 1999.3, 1999.6, 1999.2, 1999.4),
  bar('06:10', 1999.4, 1999.5, 1996.8, 1997.0),
];
