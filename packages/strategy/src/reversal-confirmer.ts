/**
 * Reversal Confirmer
 *
 * Confirms that a sweep has failed and price is reversing back through the
 * range. Three checks must pass, in order, inside a lookahead budget of
 * primary bars and/or minutes after the sweep bar:
 *
 * 1. close back inside: a primary bar closes within [range.low, range.high]
 * 2. displacement: a primary bar close has recovered at least
 *    `displacementMinFraction` of the distance from the sweep extreme to the
 *    range midpoint, no later than `displacementMaxBars` bars after the sweep
 * 3. structural break: a micro bar at or after the displacement bar closes
 *    beyond the most recent confirmed micro pivot
 *
 * Micro bars count toward the primary bar whose span they fall in, so a
 * break is only seen once that primary bar has been evaluated and never past
 * the last bar of the budget. Consecutive primary closes outside the range
 * (the sweep bar included) reaching `acceptanceOutsideCloses` mark the move
 * as a breakout and expire the attempt.
 *
 * The attempt record is never mutated; each evaluation returns a new record.
 * Checks only move from failed to passed, and bars at or before the last
 * evaluated timestamps are skipped, so evaluating the same input again is a
 * no-op.
 *
 * @packageDocumentation
 */

import {
  timeframeToMs,
  type AsianRange,
  type MarketBar,
  type ReversalConfig,
  type ReversalConfirmation,
  type SweepEvent,
  type Timeframe,
} from '@session-sweep/contracts';
import { extendSweep } from './sweep-detector.js';
import { findStructuralBreak } from './pivots.js';

const MS_PER_MINUTE = 60_000;

export interface ReversalInput {
  /** Primary timeframe bars, ascending. Bars up to the sweep bar are skipped. */
  primaryBars: readonly MarketBar[];
  /** Micro timeframe bars, ascending, including history for pivot detection */
  microBars: readonly MarketBar[];
  /** Timeframe of `primaryBars` */
  primaryTimeframe: Timeframe;
}

function closesOutside(range: AsianRange, close: number): boolean {
  return close > range.high || close < range.low;
}

/**
 * Opens a pending confirmation attempt for a sweep.
 */
export function startReversal(sweep: SweepEvent): ReversalConfirmation {
  return {
    sweep,
    status: 'pending',
    closeBackInside: false,
    displacementOk: false,
    structuralBreak: false,
    closeBackInsideEvidence: null,
    displacementEvidence: null,
    structuralBreakEvidence: null,
    confirmedAt: null,
    expiredAt: null,
    barsEvaluated: 0,
    closesOutside: closesOutside(sweep.range, sweep.breachClose) ? 1 : 0,
    acceptanceOutside: false,
    lastPrimaryTime: sweep.breachTime,
    lastMicroTime: Number.NEGATIVE_INFINITY,
  };
}

/**
 * Last instant (unix ms, inclusive) a bar may open at and still count, or
 * Infinity when only a bar budget is configured.
 */
export function reversalDeadline(attempt: ReversalConfirmation, config: ReversalConfig): number {
  return config.lookaheadMinutes === undefined
    ? Number.POSITIVE_INFINITY
    : attempt.sweep.breachTime + config.lookaheadMinutes * MS_PER_MINUTE;
}

function displacementFraction(sweep: SweepEvent, close: number): number {
  const span = Math.abs(sweep.extremePrice - sweep.range.midpoint);
  if (span === 0) return 0;
  const recovered =
    sweep.direction === 'upside' ? sweep.extremePrice - close : close - sweep.extremePrice;
  return recovered / span;
}

/**
 * Looks for the structural break among micro bars opening up to `upTo`.
 */
function evaluateMicro(
  attempt: ReversalConfirmation,
  microBars: readonly MarketBar[],
  upTo: number,
  config: ReversalConfig
): ReversalConfirmation {
  const displacement = attempt.displacementEvidence;
  if (!displacement || attempt.structuralBreak) {
    return attempt;
  }

  const fromTime = Math.max(displacement.at, attempt.lastMicroTime + 1);
  const found = findStructuralBreak(microBars, attempt.sweep.direction, fromTime, upTo, {
    leftBars: config.pivotLeftBars,
    rightBars: config.pivotRightBars,
  });

  if (found) {
    return {
      ...attempt,
      structuralBreak: true,
      structuralBreakEvidence: {
        at: found.at,
        price: found.price,
        barsSinceSweep: attempt.barsEvaluated,
        pivotPrice: found.pivot.price,
        pivotTime: found.pivot.timestamp,
        pivotType: found.pivot.type,
      },
      lastMicroTime: found.at,
    };
  }

  let lastMicroTime = attempt.lastMicroTime;
  for (const bar of microBars) {
    if (bar.timestamp > upTo) break;
    if (bar.timestamp > lastMicroTime) lastMicroTime = bar.timestamp;
  }
  return { ...attempt, lastMicroTime };
}

/**
 * Confirms once all checks passed, at the later of the primary bar and the
 * break.
 */
function settle(attempt: ReversalConfirmation, primaryTime: number): ReversalConfirmation {
  const breakEvidence = attempt.structuralBreakEvidence;
  if (attempt.closeBackInside && attempt.displacementOk && breakEvidence) {
    return { ...attempt, status: 'confirmed', confirmedAt: Math.max(primaryTime, breakEvidence.at) };
  }
  return attempt;
}

/**
 * Advances a confirmation attempt with newly available bars.
 *
 * A primary bar opening after the minute budget expires the attempt before
 * it is evaluated; the N-th primary bar expires it after evaluation when the
 * checks have not all passed. Confirmed and expired attempts are returned
 * unchanged.
 *
 * @example
 * ```typescript
 * let attempt = startReversal(sweep);
 * attempt = evaluateReversal(
 *   attempt,
 *   { primaryBars, microBars, primaryTimeframe: Timeframe.M5 },
 *   DEFAULT_REVERSAL_CONFIG
 * );
 * if (attempt.status === 'confirmed') {
 *   // all three checks passed
 * }
 * ```
 */
export function evaluateReversal(
  attempt: ReversalConfirmation,
  input: ReversalInput,
  config: ReversalConfig
): ReversalConfirmation {
  if (attempt.status !== 'pending') {
    return attempt;
  }

  const deadline = reversalDeadline(attempt, config);
  const primaryMs = timeframeToMs(input.primaryTimeframe);
  const microUpTo = (primaryTime: number): number => Math.min(primaryTime + primaryMs - 1, deadline);
  let next = attempt;

  for (const bar of input.primaryBars) {
    if (bar.timestamp <= next.lastPrimaryTime) continue;

    if (bar.timestamp > deadline) {
      return { ...next, status: 'expired', expiredAt: bar.timestamp };
    }

    const barsSinceSweep = next.barsEvaluated + 1;
    next = { ...next, barsEvaluated: barsSinceSweep, lastPrimaryTime: bar.timestamp };

    if (!next.closeBackInside) {
      next = { ...next, sweep: extendSweep(next.sweep, bar) };
    }

    const { range } = next.sweep;
    next = { ...next, closesOutside: closesOutside(range, bar.close) ? next.closesOutside + 1 : 0 };
    if (config.acceptanceOutsideCloses !== undefined && next.closesOutside >= config.acceptanceOutsideCloses) {
      return { ...next, status: 'expired', expiredAt: bar.timestamp, acceptanceOutside: true };
    }

    if (!next.closeBackInside && bar.close >= range.low && bar.close <= range.high) {
      next = {
        ...next,
        closeBackInside: true,
        closeBackInsideEvidence: { at: bar.timestamp, price: bar.close, barsSinceSweep },
      };
    }

    if (next.closeBackInside && !next.displacementOk && barsSinceSweep <= config.displacementMaxBars) {
      const fraction = displacementFraction(next.sweep, bar.close);
      if (fraction >= config.displacementMinFraction) {
        next = {
          ...next,
          displacementOk: true,
          displacementEvidence: { at: bar.timestamp, price: bar.close, barsSinceSweep, fraction },
        };
      }
    }

    next = evaluateMicro(next, input.microBars, microUpTo(bar.timestamp), config);
    next = settle(next, bar.timestamp);
    if (next.status === 'confirmed') {
      return next;
    }

    if (config.lookaheadBars !== undefined && barsSinceSweep >= config.lookaheadBars) {
      return { ...next, status: 'expired', expiredAt: bar.timestamp };
    }
  }

  // Micro bars that arrived after the latest primary bar
  next = evaluateMicro(next, input.microBars, microUpTo(next.lastPrimaryTime), config);
  return settle(next, next.lastPrimaryTime);
}

/**
 * Expires a pending attempt once `asOf` is past the minute budget. Used when
 * no further primary bar arrives to trigger expiry.
 */
export function expireReversalIfDue(
  attempt: ReversalConfirmation,
  asOf: number,
  config: ReversalConfig
): ReversalConfirmation {
  if (attempt.status !== 'pending' || asOf <= reversalDeadline(attempt, config)) {
    return attempt;
  }
  return { ...attempt, status: 'expired', expiredAt: asOf };
}
