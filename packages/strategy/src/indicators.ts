/**
 * Indicator helpers used by the dynamic sweep threshold and confluence gates.
 */

import type { MarketBar } from '@session-sweep/contracts';

export type Bias = 'bullish' | 'bearish' | 'neutral';

/**
 * Mean of the last `period` values, or null when fewer are available.
 */
export function simpleMovingAverage(values: readonly number[], period: number): number | null {
  if (period <= 0 || values.length < period) {
    return null;
  }

  let sum = 0;
  for (let i = values.length - period; i < values.length; i++) {
    sum += values[i] ?? 0;
  }
  return sum / period;
}

/**
 * Average true range over the last `period` bars. Needs `period + 1` bars,
 * since each true range uses the previous close.
 *
 * @example
 * ```typescript
 * const atrH1 = averageTrueRange(h1Bars, 14);
 * ```
 */
export function averageTrueRange(bars: readonly MarketBar[], period = 14): number | null {
  if (period <= 0 || bars.length < period + 1) {
    return null;
  }

  const trueRanges: number[] = [];
  for (let i = bars.length - period; i < bars.length; i++) {
    const bar = bars[i];
    const previous = bars[i - 1];
    if (!bar || !previous) continue;
    trueRanges.push(
      Math.max(
        bar.high - bar.low,
        Math.abs(bar.high - previous.close),
        Math.abs(bar.low - previous.close)
      )
    );
  }

  return simpleMovingAverage(trueRanges, period);
}

/**
 * Classifies trend bias: the last close above the SMA by more than `band`
 * (a fraction, 0.001 = 0.1%) is bullish, below by more than `band` is
 * bearish. Too little history is neutral.
 */
export function classifyBias(closes: readonly number[], period = 20, band = 0.001): Bias {
  const sma = simpleMovingAverage(closes, period);
  const last = closes[closes.length - 1];
  if (sma === null || last === undefined) {
    return 'neutral';
  }

  if (last > sma * (1 + band)) return 'bullish';
  if (last < sma * (1 - band)) return 'bearish';
  return 'neutral';
}
