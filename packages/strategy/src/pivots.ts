/**
 * Micro structure pivots for reversal confirmation
 *
 * Non-repainting swing pivot detection over a finer timeframe, and the
 * structural break test built on it: a bar closing beyond the most recent
 * confirmed pivot in the reversal direction.
 *
 * A pivot high at index i needs `leftBars` bars before it and `rightBars`
 * bars after it, all with strictly lower highs (mirrored for lows). It only
 * becomes usable once its last right bar has closed, so a pivot never
 * appears in hindsight.
 */

import type { MarketBar, SweepDirection } from '@session-sweep/contracts';

export interface PivotOptions {
  leftBars: number;
  rightBars: number;
}

export interface SwingPivot {
  /** Open time of the pivot bar */
  timestamp: number;
  price: number;
  type: 'high' | 'low';
  /** Index of the pivot bar in the input */
  index: number;
  /** Index of the bar that confirmed it */
  confirmedIndex: number;
}

export interface StructuralBreak {
  /** Open time of the breaking bar */
  at: number;
  /** Close of the breaking bar */
  price: number;
  pivot: SwingPivot;
  /** Index of the breaking bar in the input */
  index: number;
}

function isPivot(
  bars: readonly MarketBar[],
  index: number,
  type: 'high' | 'low',
  options: PivotOptions
): boolean {
  const bar = bars[index];
  if (!bar) return false;

  const from = index - options.leftBars;
  const to = index + options.rightBars;
  if (from < 0 || to >= bars.length) {
    return false;
  }

  for (let i = from; i <= to; i++) {
    if (i === index) continue;
    const other = bars[i];
    if (!other) return false;
    if (type === 'high' ? other.high >= bar.high : other.low <= bar.low) {
      return false;
    }
  }

  return true;
}

/**
 * Finds every confirmed swing pivot, ordered by pivot index (highs before
 * lows at the same index).
 *
 * @example
 * ```typescript
 * const pivots = findSwingPivots(m1Bars, { leftBars: 2, rightBars: 2 });
 * const lastLow = pivots.filter((p) => p.type === 'low').at(-1);
 * ```
 */
export function findSwingPivots(bars: readonly MarketBar[], options: PivotOptions): SwingPivot[] {
  const pivots: SwingPivot[] = [];

  for (let i = options.leftBars; i + options.rightBars < bars.length; i++) {
    const bar = bars[i];
    if (!bar) continue;

    for (const type of ['high', 'low'] as const) {
      if (isPivot(bars, i, type, options)) {
        pivots.push({
          timestamp: bar.timestamp,
          price: type === 'high' ? bar.high : bar.low,
          type,
          index: i,
          confirmedIndex: i + options.rightBars,
        });
      }
    }
  }

  return pivots;
}

/**
 * Pivot type a reversal must break: after an upside sweep price has to take
 * out a swing low, after a downside sweep a swing high.
 */
export function breakPivotType(sweepDirection: SweepDirection): 'high' | 'low' {
  return sweepDirection === 'upside' ? 'low' : 'high';
}

/**
 * Finds the first bar in `[fromTime, toTime]` that closes beyond the most
 * recent pivot confirmed before it.
 *
 * @returns The break, or null when no bar in the span breaks structure
 */
export function findStructuralBreak(
  bars: readonly MarketBar[],
  sweepDirection: SweepDirection,
  fromTime: number,
  toTime: number,
  options: PivotOptions
): StructuralBreak | null {
  const type = breakPivotType(sweepDirection);
  const pivots = findSwingPivots(bars, options).filter((p) => p.type === type);

  let pivotCursor = -1;
  for (let j = 0; j < bars.length; j++) {
    const bar = bars[j];
    if (!bar) continue;

    // Advance to the latest pivot confirmed strictly before this bar
    while (pivotCursor + 1 < pivots.length) {
      const next = pivots[pivotCursor + 1];
      if (!next || next.confirmedIndex >= j) break;
      pivotCursor++;
    }

    if (bar.timestamp < fromTime) continue;
    if (bar.timestamp > toTime) break;

    const pivot = pivots[pivotCursor];
    if (!pivot) continue;

    const broken = type === 'low' ? bar.close < pivot.price : bar.close > pivot.price;
    if (broken) {
      return { at: bar.timestamp, price: bar.close, pivot, index: j };
    }
  }

  return null;
}
