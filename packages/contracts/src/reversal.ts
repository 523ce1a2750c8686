/**
 * @fileoverview Reversal confirmation types.
 *
 * A confirmation attempt is opened for every sweep and carries the partial
 * result of each sub-check. Sub-checks only ever move from failed to passed
 * during the lifetime of one sweep.
 *
 * @module @session-sweep/contracts/reversal
 */

import type { SweepEvent } from './sweep.js';

/**
 * Lifecycle of one confirmation attempt.
 */
export type ReversalStatus = 'pending' | 'confirmed' | 'expired';

/**
 * Where and when a sub-check passed.
 */
export interface CheckEvidence {
  /** Open time of the bar that satisfied the check, unix ms */
  at: number;
  /** Price that satisfied the check (close, or the broken pivot level) */
  price: number;
  /** Primary bars elapsed since the sweep bar when the check passed */
  barsSinceSweep: number;
}

/**
 * Displacement evidence, with the fraction of the excursion recovered.
 */
export interface DisplacementEvidence extends CheckEvidence {
  /** Move back from the extreme divided by the extreme-to-midpoint distance */
  fraction: number;
}

/**
 * Micro structure break evidence.
 */
export interface StructuralBreakEvidence extends CheckEvidence {
  /** Swing pivot that was broken */
  pivotPrice: number;
  /** Open time of the pivot bar */
  pivotTime: number;
  /** Kind of pivot broken */
  pivotType: 'high' | 'low';
}

/**
 * Confirmation attempt record for one sweep.
 *
 * @invariant closeBackInside === (closeBackInsideEvidence !== null)
 * @invariant status === 'confirmed' implies all three checks passed
 */
export interface ReversalConfirmation {
  /** Sweep being confirmed */
  sweep: SweepEvent;
  /** Current status */
  status: ReversalStatus;
  /** A primary bar closed back inside the range */
  closeBackInside: boolean;
  /** The move back covered the required excursion fraction in time */
  displacementOk: boolean;
  /** A finer-timeframe swing pivot was broken in the reversal direction */
  structuralBreak: boolean;
  closeBackInsideEvidence: CheckEvidence | null;
  displacementEvidence: DisplacementEvidence | null;
  structuralBreakEvidence: StructuralBreakEvidence | null;
  /** Time all checks passed, unix ms */
  confirmedAt: number | null;
  /** Time the lookahead budget ran out, unix ms */
  expiredAt: number | null;
  /** Primary bars evaluated since the sweep bar */
  barsEvaluated: number;
  /** Consecutive primary closes outside the range, counting the sweep bar */
  closesOutside: number;
  /** Expired because price was accepted outside the range (a breakout) */
  acceptanceOutside: boolean;
  /** Latest primary bar time evaluated (starts at the sweep bar time) */
  lastPrimaryTime: number;
  /** Latest micro bar time evaluated */
  lastMicroTime: number;
}

/**
 * Reversal confirmation parameters.
 *
 * @invariant lookaheadBars or lookaheadMinutes is set
 */
export interface ReversalConfig {
  /** Budget in primary bars after the sweep bar */
  lookaheadBars?: number;
  /** Budget in minutes after the sweep bar open time */
  lookaheadMinutes?: number;
  /** Minimum recovered fraction of the extreme-to-midpoint distance */
  displacementMinFraction: number;
  /** Displacement must happen within this many primary bars of the sweep */
  displacementMaxBars: number;
  /** Micro pivot left bars */
  pivotLeftBars: number;
  /** Micro pivot right bars */
  pivotRightBars: number;
  /**
   * Consecutive primary closes outside the range that turn the sweep into a
   * breakout. Unset disables the check.
   */
  acceptanceOutsideCloses?: number;
}

export const DEFAULT_REVERSAL_CONFIG: ReversalConfig = {
  lookaheadBars: 6,
  lookaheadMinutes: 30,
  displacementMinFraction: 0.5,
  displacementMaxBars: 3,
  pivotLeftBars: 2,
  pivotRightBars: 2,
  acceptanceOutsideCloses: 2,
};
