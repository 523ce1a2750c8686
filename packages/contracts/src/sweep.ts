/**
 * @fileoverview Liquidity sweep types.
 *
 * @module @session-sweep/contracts/sweep
 */

import type { AsianRange } from './sessions.js';

/**
 * Side of the range that was breached.
 */
export type SweepDirection = 'upside' | 'downside';

/**
 * Resolution for a single bar that breaches both sides of the range.
 *
 * - `close-vs-midpoint`: the side the bar closed on relative to the range
 *   midpoint; a close exactly on the midpoint falls back to the larger
 *   excursion, then to upside
 * - `larger-excursion`: the side breached by the larger distance
 * - `reject`: surface an AmbiguousSweepError
 */
export type TieBreakPolicy = 'close-vs-midpoint' | 'larger-excursion' | 'reject';

/**
 * Handling of an opposite-side sweep while a sweep is still being confirmed.
 *
 * - `discard`: both sides swept; clear the sweep and stop looking for sweeps
 *   for the rest of the session
 * - `supersede`: replace the active sweep and restart confirmation
 */
export type OppositeSweepPolicy = 'discard' | 'supersede';

/**
 * A breach of the reference range by at least the configured threshold.
 */
export interface SweepEvent {
  /** Trading symbol */
  symbol: string;
  /** Breached side */
  direction: SweepDirection;
  /** Bar extreme that triggered the sweep */
  breachPrice: number;
  /** Open time of the triggering bar, unix ms */
  breachTime: number;
  /** Close of the triggering bar */
  breachClose: number;
  /** Threshold in price units that was applied */
  thresholdUsed: number;
  /** Range the sweep was measured against */
  range: AsianRange;
  /**
   * Furthest excursion beyond the range while the sweep is active.
   * Starts at breachPrice; only moves further away from the range.
   */
  extremePrice: number;
}

/**
 * Which component produced a dynamic sweep threshold.
 */
export type ThresholdComponent = 'fixed' | 'floor' | 'range' | 'atr';

/**
 * Resolved sweep threshold with its audit breakdown.
 */
export interface SweepThreshold {
  /** Threshold in price units */
  price: number;
  /** Threshold in pips, when a pip size is known */
  pips?: number;
  /** Component that set the threshold */
  component: ThresholdComponent;
  /** Candidate values in pips, for dynamic thresholds */
  candidates?: {
    floorPips: number;
    rangePips: number;
    atrPips: number;
  };
}
