/**
 * Range Tracker
 *
 * Builds the reference (Asian) range from the bars that open inside a
 * session window, and grades its width.
 *
 * @packageDocumentation
 */

import type {
  AsianRange,
  MarketBar,
  RangeGrade,
  RangeGradeThresholds,
  Result,
  SessionWindow,
} from '@session-sweep/contracts';
import { InsufficientDataError, InvalidInputError, ok, err } from '@session-sweep/contracts';
import { isWithinWindow } from './session-window.js';

/**
 * Grade boundaries in pips, from the gold desk's range grading.
 */
export const DEFAULT_RANGE_GRADE_THRESHOLDS: RangeGradeThresholds = {
  noTrade: 30,
  tight: 49,
  normal: 150,
  wide: 180,
};

export interface RangeOptions {
  /** Minimum in-window bars before the range is trusted */
  minBars: number;
  /** Price of one pip; enables rangePips and grade */
  pipSize?: number;
  gradeThresholds?: RangeGradeThresholds;
}

/**
 * Distance between two prices in pips. Pip values are rounded to 6 decimals
 * to drop floating point noise.
 */
export function toPips(distance: number, pipSize: number): number {
  return roundPips(distance / pipSize);
}

export function roundPips(pips: number): number {
  return Math.round(pips * 1e6) / 1e6;
}

/**
 * Grades a range width.
 *
 * @example
 * ```typescript
 * gradeRange(25);  // 'NO_TRADE'
 * gradeRange(100); // 'NORMAL'
 * gradeRange(200); // 'EXTREME'
 * ```
 */
export function gradeRange(
  rangePips: number,
  thresholds: RangeGradeThresholds = DEFAULT_RANGE_GRADE_THRESHOLDS
): RangeGrade {
  if (rangePips < thresholds.noTrade) return 'NO_TRADE';
  if (rangePips <= thresholds.tight) return 'TIGHT';
  if (rangePips <= thresholds.normal) return 'NORMAL';
  if (rangePips <= thresholds.wide) return 'WIDE';
  return 'EXTREME';
}

/**
 * Computes the reference range over `[window.start, window.end)`.
 *
 * Bars outside the window are ignored. Returns an `InsufficientDataError`
 * when fewer than `minBars` bars fall inside the window and an
 * `InvalidInputError` when the bars are not in ascending timestamp order.
 * A degenerate range (high <= low) is returned with `isValid: false`.
 *
 * Pure: identical input always yields an identical range.
 */
export function computeRange(
  bars: readonly MarketBar[],
  window: SessionWindow,
  options: RangeOptions
): Result<AsianRange> {
  let high = -Infinity;
  let low = Infinity;
  let barCount = 0;
  let previous: number | null = null;

  for (const bar of bars) {
    if (previous !== null && bar.timestamp < previous) {
      return err(
        new InvalidInputError('Bars must be sorted ascending by timestamp', {
          symbol: window.symbol,
          timestamp: bar.timestamp,
          previous,
        })
      );
    }
    previous = bar.timestamp;

    if (!isWithinWindow(window, bar.timestamp)) {
      continue;
    }

    barCount++;
    if (bar.high > high) high = bar.high;
    if (bar.low < low) low = bar.low;
  }

  const required = Math.max(1, options.minBars);
  if (barCount < required) {
    return err(
      new InsufficientDataError(
        `Need at least ${required} bars inside the session window, got ${barCount}`,
        { required, received: barCount, symbol: window.symbol }
      )
    );
  }

  const range: AsianRange = {
    window,
    high,
    low,
    midpoint: (high + low) / 2,
    barCount,
    isValid: high > low,
  };

  if (options.pipSize !== undefined) {
    range.rangePips = toPips(high - low, options.pipSize);
    range.grade = gradeRange(range.rangePips, options.gradeThresholds);
  }

  return ok(range);
}
