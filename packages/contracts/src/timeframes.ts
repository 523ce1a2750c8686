/**
 * @fileoverview Timeframe enumeration and utilities.
 *
 * Canonical bar timeframes used by the range, sweep and confirmation
 * detectors. The primary timeframe drives sweep detection; a finer one
 * drives micro structure confirmation.
 *
 * @module @session-sweep/contracts/timeframes
 */

/**
 * Supported bar timeframes.
 *
 * @invariant Declaration order is smallest to largest duration
 */
export enum Timeframe {
  /** 1-minute bars, used for micro structure */
  M1 = 'M1',
  /** 5-minute bars, default primary timeframe */
  M5 = 'M5',
  /** 15-minute bars */
  M15 = 'M15',
  /** 1-hour bars, used for ATR based thresholds */
  H1 = 'H1',
  /** 4-hour bars, used for higher timeframe bias */
  H4 = 'H4',
  /** Daily bars */
  D1 = 'D1',
}

const TIMEFRAME_MINUTES: Record<Timeframe, number> = {
  [Timeframe.M1]: 1,
  [Timeframe.M5]: 5,
  [Timeframe.M15]: 15,
  [Timeframe.H1]: 60,
  [Timeframe.H4]: 240,
  [Timeframe.D1]: 1440,
};

const TIMEFRAME_LABELS: Record<Timeframe, string> = {
  [Timeframe.M1]: '1 Minute',
  [Timeframe.M5]: '5 Minutes',
  [Timeframe.M15]: '15 Minutes',
  [Timeframe.H1]: '1 Hour',
  [Timeframe.H4]: '4 Hours',
  [Timeframe.D1]: 'Daily',
};

const ORDERED_TIMEFRAMES: readonly Timeframe[] = [
  Timeframe.M1,
  Timeframe.M5,
  Timeframe.M15,
  Timeframe.H1,
  Timeframe.H4,
  Timeframe.D1,
];

/**
 * Validates whether a string is a valid Timeframe enum value.
 *
 * @example
 * ```typescript
 * isValidTimeframe('M5')   // true
 * isValidTimeframe('M30')  // false
 * ```
 */
export function isValidTimeframe(value: string): value is Timeframe {
  return ORDERED_TIMEFRAMES.some((tf) => tf === value);
}

/**
 * Converts a timeframe to its duration in minutes.
 *
 * @example
 * ```typescript
 * timeframeToMinutes(Timeframe.M5)  // 5
 * timeframeToMinutes(Timeframe.D1)  // 1440
 * ```
 */
export function timeframeToMinutes(timeframe: Timeframe): number {
  return TIMEFRAME_MINUTES[timeframe];
}

/**
 * Converts a timeframe to its duration in milliseconds.
 */
export function timeframeToMs(timeframe: Timeframe): number {
  return TIMEFRAME_MINUTES[timeframe] * 60_000;
}

/**
 * Gets human-readable label for a timeframe.
 */
export function getTimeframeLabel(timeframe: Timeframe): string {
  return TIMEFRAME_LABELS[timeframe];
}

/**
 * Compares two timeframes by duration.
 *
 * @returns Negative if a < b, positive if a > b, zero if equal
 */
export function compareTimeframes(a: Timeframe, b: Timeframe): number {
  return ORDERED_TIMEFRAMES.indexOf(a) - ORDERED_TIMEFRAMES.indexOf(b);
}

/**
 * Parses a string into a Timeframe, throwing if invalid.
 *
 * @throws {Error} If value is not a valid timeframe
 */
export function parseTimeframe(value: string): Timeframe {
  const normalized = value.trim().toUpperCase();
  if (!isValidTimeframe(normalized)) {
    throw new Error(
      `Invalid timeframe: ${value}. Must be one of: ${ORDERED_TIMEFRAMES.join(', ')}`
    );
  }
  return normalized;
}

/**
 * Returns all supported timeframes in ascending order.
 */
export function getAllTimeframes(): Timeframe[] {
  return [...ORDERED_TIMEFRAMES];
}
