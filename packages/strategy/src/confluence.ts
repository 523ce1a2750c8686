/**
 * Confluence Checker
 *
 * A confirmed reversal is only armed when every gate agrees. Gates are
 * side-effect free and each reports at most one failure reason; a gate
 * without the data it needs passes.
 *
 * @packageDocumentation
 */

import type { MarketBar, ReversalConfirmation } from '@session-sweep/contracts';
import { parseSessionTime } from './session-window.js';
import { classifyBias } from './indicators.js';

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

export interface NewsEvent {
  /** Release time, unix ms */
  time: number;
  /** Tier 1 events use the wider buffer */
  tier: 1 | 2 | 3;
  title: string;
}

/**
 * Everything the gates may look at. Supplied by the caller at check time.
 */
export interface MarketContext {
  /** Time of the check, unix ms */
  asOf: number;
  /** Current bid/ask spread in pips */
  spreadPips?: number;
  /** Scheduled releases around asOf */
  news?: readonly NewsEvent[];
  /** Recent micro timeframe bars, ascending */
  microBars?: readonly MarketBar[];
  /** Daily closes, ascending */
  d1Closes?: readonly number[];
  /** 4-hour closes, ascending */
  h4Closes?: readonly number[];
  /** ADX of the 15-minute timeframe */
  adx?: number;
}

export interface ConfluenceVerdict {
  passed: boolean;
  failures: string[];
}

export interface ConfluenceGate {
  readonly name: string;
  /** Failure reason, or null when the gate passes */
  evaluate(confirmation: ReversalConfirmation, context: MarketContext): string | null;
}

export interface ConfluenceChecker {
  check(confirmation: ReversalConfirmation, context: MarketContext): ConfluenceVerdict;
}

/**
 * Composes gates into a checker. No gates means every check passes.
 *
 * @example
 * ```typescript
 * const checker = createConfluenceChecker([rangeGradeGate(), maxSpreadGate(2)]);
 * const verdict = checker.check(confirmation, { asOf: bar.timestamp, spreadPips: 1.4 });
 * ```
 */
export function createConfluenceChecker(gates: readonly ConfluenceGate[] = []): ConfluenceChecker {
  return {
    check(confirmation, context) {
      const failures: string[] = [];
      for (const gate of gates) {
        const failure = gate.evaluate(confirmation, context);
        if (failure !== null) {
          failures.push(`${gate.name}: ${failure}`);
        }
      }
      return { passed: failures.length === 0, failures };
    },
  };
}

/**
 * Blocks ranges graded NO_TRADE or EXTREME.
 */
export function rangeGradeGate(): ConfluenceGate {
  return {
    name: 'range-grade',
    evaluate(confirmation) {
      const grade = confirmation.sweep.range.grade;
      return grade === 'NO_TRADE' || grade === 'EXTREME' ? `range graded ${grade}` : null;
    },
  };
}

export function maxSpreadGate(maxPips = 2): ConfluenceGate {
  return {
    name: 'spread',
    evaluate(_confirmation, context) {
      if (context.spreadPips === undefined || context.spreadPips <= maxPips) {
        return null;
      }
      return `spread ${context.spreadPips} pips exceeds ${maxPips}`;
    },
  };
}

/**
 * Blocks within `tier1Minutes` of a tier 1 release, or `otherMinutes` of any
 * other release (inclusive on both sides).
 */
export function newsBlackoutGate(tier1Minutes = 60, otherMinutes = 30): ConfluenceGate {
  return {
    name: 'news',
    evaluate(_confirmation, context) {
      for (const event of context.news ?? []) {
        const buffer = (event.tier === 1 ? tier1Minutes : otherMinutes) * MS_PER_MINUTE;
        if (Math.abs(context.asOf - event.time) <= buffer) {
          return `blackout around ${event.title}`;
        }
      }
      return null;
    },
  };
}

/**
 * Blocks within `bufferMinutes` of the daily auctions, given as HH:mm UTC.
 */
export function auctionBlackoutGate(
  times: readonly string[] = ['10:30', '15:00'],
  bufferMinutes = 15
): ConfluenceGate {
  const offsets = times.map((time) => {
    const parsed = parseSessionTime(time);
    if (!parsed) {
      throw new Error(`Invalid auction time: ${time}. Expected HH:mm.`);
    }
    return (parsed.hours * 60 + parsed.minutes) * MS_PER_MINUTE;
  });

  return {
    name: 'auction',
    evaluate(_confirmation, context) {
      const dayStart = Math.floor(context.asOf / MS_PER_DAY) * MS_PER_DAY;
      for (const [i, offset] of offsets.entries()) {
        if (Math.abs(context.asOf - (dayStart + offset)) <= bufferMinutes * MS_PER_MINUTE) {
          return `auction blackout around ${times[i] ?? ''} UTC`;
        }
      }
      return null;
    },
  };
}

/**
 * Blocks when the last micro bar's range is more than `multiplier` times the
 * mean range of the `baselineBars` bars before it.
 */
export function velocitySpikeGate(multiplier = 2, baselineBars = 5): ConfluenceGate {
  return {
    name: 'velocity',
    evaluate(_confirmation, context) {
      const bars = context.microBars ?? [];
      const latest = bars[bars.length - 1];
      const baseline = bars.slice(-(baselineBars + 1), -1);
      if (!latest || baseline.length < baselineBars) {
        return null;
      }

      const baselineRange =
        baseline.reduce((sum, bar) => sum + (bar.high - bar.low), 0) / baseline.length;
      if (baselineRange <= 0) {
        return null;
      }

      const ratio = (latest.high - latest.low) / baselineRange;
      return ratio > multiplier ? `velocity ${ratio.toFixed(2)}x baseline` : null;
    },
  };
}

/**
 * Blocks fading a trend both the daily and 4-hour bias agree on.
 */
export function htfBiasGate(period = 20, band = 0.001): ConfluenceGate {
  return {
    name: 'bias',
    evaluate(confirmation, context) {
      if (!context.d1Closes || !context.h4Closes) {
        return null;
      }

      const d1 = classifyBias(context.d1Closes, period, band);
      const h4 = classifyBias(context.h4Closes, period, band);
      const direction = confirmation.sweep.direction;

      if (direction === 'upside' && d1 === 'bullish' && h4 === 'bullish') {
        return 'fading a strong uptrend';
      }
      if (direction === 'downside' && d1 === 'bearish' && h4 === 'bearish') {
        return 'fading a strong downtrend';
      }
      return null;
    },
  };
}

/**
 * Blocks a counter-trend fade on a trend day: ADX above `adxThreshold` with
 * the 4-hour bias in the sweep direction.
 */
export function trendDayGate(adxThreshold = 25, period = 20, band = 0.001): ConfluenceGate {
  return {
    name: 'trend-day',
    evaluate(confirmation, context) {
      if (context.adx === undefined || context.adx <= adxThreshold || !context.h4Closes) {
        return null;
      }

      const h4 = classifyBias(context.h4Closes, period, band);
      const direction = confirmation.sweep.direction;
      if ((direction === 'upside' && h4 === 'bullish') || (direction === 'downside' && h4 === 'bearish')) {
        return `ADX ${context.adx} above ${adxThreshold}`;
      }
      return null;
    },
  };
}

/**
 * The full gate set with default parameters.
 */
export function defaultConfluenceGates(): ConfluenceGate[] {
  return [
    rangeGradeGate(),
    maxSpreadGate(),
    newsBlackoutGate(),
    auctionBlackoutGate(),
    velocitySpikeGate(),
    htfBiasGate(),
    trendDayGate(),
  ];
}
