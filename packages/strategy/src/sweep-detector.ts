/**
 * Sweep Detector
 *
 * Classifies a bar that opens at or after the end of the session window as
 * an upside sweep, a downside sweep or nothing. Pure classification: the
 * range is never mutated.
 *
 * @packageDocumentation
 */

import type {
  AsianRange,
  MarketBar,
  Result,
  SweepDirection,
  SweepEvent,
  TieBreakPolicy,
} from '@session-sweep/contracts';
import { AmbiguousSweepError, ok, err } from '@session-sweep/contracts';

function resolveBothSides(
  range: AsianRange,
  bar: MarketBar,
  policy: TieBreakPolicy
): Result<SweepDirection, AmbiguousSweepError> {
  const upsideExcursion = bar.high - range.high;
  const downsideExcursion = range.low - bar.low;
  const larger: SweepDirection = upsideExcursion >= downsideExcursion ? 'upside' : 'downside';

  switch (policy) {
    case 'close-vs-midpoint':
      if (bar.close > range.midpoint) return ok('upside');
      if (bar.close < range.midpoint) return ok('downside');
      return ok(larger);

    case 'larger-excursion':
      return ok(larger);

    case 'reject':
      return err(
        new AmbiguousSweepError('Bar breached both sides of the range', {
          barTime: bar.timestamp,
          high: bar.high,
          low: bar.low,
        })
      );
  }
}

/**
 * Detects a sweep of the range by one bar.
 *
 * Upside: `bar.high >= range.high + threshold`; downside:
 * `bar.low <= range.low - threshold`. Both limits are inclusive. A bar that
 * satisfies both is resolved by `policy`.
 *
 * Returns `ok(null)` when the range is invalid, the bar opens before the
 * window end, or nothing was breached.
 *
 * @param threshold - Breach distance in price units
 */
export function detectSweep(
  range: AsianRange,
  bar: MarketBar,
  threshold: number,
  policy: TieBreakPolicy = 'close-vs-midpoint'
): Result<SweepEvent | null, AmbiguousSweepError> {
  if (!range.isValid || bar.timestamp < range.window.end) {
    return ok(null);
  }

  const upside = bar.high >= range.high + threshold;
  const downside = bar.low <= range.low - threshold;

  let direction: SweepDirection;
  if (upside && downside) {
    const resolved = resolveBothSides(range, bar, policy);
    if (!resolved.ok) {
      return resolved;
    }
    direction = resolved.value;
  } else if (upside) {
    direction = 'upside';
  } else if (downside) {
    direction = 'downside';
  } else {
    return ok(null);
  }

  const breachPrice = direction === 'upside' ? bar.high : bar.low;

  return ok({
    symbol: range.window.symbol,
    direction,
    breachPrice,
    breachTime: bar.timestamp,
    breachClose: bar.close,
    thresholdUsed: threshold,
    range,
    extremePrice: breachPrice,
  });
}

/**
 * Returns the sweep with its extreme pushed out by the bar, or the same
 * object when the bar does not trade further beyond the range.
 */
export function extendSweep(sweep: SweepEvent, bar: MarketBar): SweepEvent {
  if (sweep.direction === 'upside' && bar.high > sweep.extremePrice) {
    return { ...sweep, extremePrice: bar.high };
  }
  if (sweep.direction === 'downside' && bar.low < sweep.extremePrice) {
    return { ...sweep, extremePrice: bar.low };
  }
  return sweep;
}
