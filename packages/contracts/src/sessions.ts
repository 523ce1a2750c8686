/**
 * @fileoverview Session window and reference range types.
 *
 * The reference range is built from every bar that opens inside a fixed UTC
 * session window (by default the Asian session, 00:00-06:00 UTC). Its high
 * and low are the liquidity pools the sweep detector watches once the window
 * has closed.
 *
 * @module @session-sweep/contracts/sessions
 */

/**
 * Relative session window configuration, HH:mm in UTC.
 *
 * A window whose end is not after its start crosses midnight; it then opens
 * on the calendar day before the trading day it belongs to.
 *
 * @example
 * ```typescript
 * const asia: SessionWindowConfig = { start: '00:00', end: '06:00' };
 * ```
 */
export interface SessionWindowConfig {
  /** Window start time in HH:mm (UTC) */
  start: string;
  /** Window end time in HH:mm (UTC, exclusive) */
  end: string;
}

/**
 * Materialized session window for one symbol and trading day.
 *
 * Immutable once created; `[start, end)` is half-open.
 */
export interface SessionWindow {
  /** Trading symbol */
  readonly symbol: string;
  /** Trading day in YYYY-MM-DD format (UTC) */
  readonly date: string;
  /** Window start, unix ms (inclusive) */
  readonly start: number;
  /** Window end, unix ms (exclusive) */
  readonly end: number;
}

/**
 * Asian range quality grade, from the range width in pips.
 *
 * - NO_TRADE: too tight to carry a reversal
 * - TIGHT: tradable with extra confirmation
 * - NORMAL: standard conditions
 * - WIDE: tradable with higher timeframe confluence
 * - EXTREME: wider than the maximum threshold
 */
export type RangeGrade = 'NO_TRADE' | 'TIGHT' | 'NORMAL' | 'WIDE' | 'EXTREME';

/**
 * Pip thresholds separating range grades (upper bounds, inclusive).
 */
export interface RangeGradeThresholds {
  /** Ranges below this are NO_TRADE */
  noTrade: number;
  /** Upper bound of TIGHT */
  tight: number;
  /** Upper bound of NORMAL */
  normal: number;
  /** Upper bound of WIDE; anything above is EXTREME */
  wide: number;
}

/**
 * Reference range computed over a session window.
 *
 * @invariant isValid implies high > low
 * @invariant midpoint === (high + low) / 2
 */
export interface AsianRange {
  /** Window the range was computed over */
  window: SessionWindow;
  /** Highest high of in-window bars */
  high: number;
  /** Lowest low of in-window bars */
  low: number;
  /** (high + low) / 2 */
  midpoint: number;
  /** Number of in-window bars */
  barCount: number;
  /** False when the range is degenerate (high <= low) */
  isValid: boolean;
  /** Range width in pips, when a pip size is known */
  rangePips?: number;
  /** Grade derived from rangePips */
  grade?: RangeGrade;
}
