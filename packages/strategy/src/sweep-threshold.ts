/**
 * Sweep threshold resolution.
 *
 * @packageDocumentation
 */

import type { AsianRange, SweepThreshold } from '@session-sweep/contracts';
import { roundPips, toPips } from './range-tracker.js';

/**
 * How far beyond the range price must trade to count as a sweep.
 *
 * - `price`: fixed distance in price units
 * - `pips`: fixed distance in pips, converted with `pipSize`
 * - `dynamic`: max(floorPips, rangeFraction x range width, atrMultiple x ATR(H1)),
 *   all in pips
 */
export type SweepThresholdConfig =
  | { mode: 'price'; price: number }
  | { mode: 'pips'; pips: number; pipSize: number }
  | {
      mode: 'dynamic';
      pipSize: number;
      floorPips: number;
      rangeFraction: number;
      atrMultiple: number;
    };

/**
 * Resolves the threshold for a range.
 *
 * For the dynamic mode the winning component is reported, preferring floor,
 * then range, then ATR on ties. A missing ATR contributes 0.
 *
 * @example
 * ```typescript
 * resolveSweepThreshold(
 *   { mode: 'dynamic', pipSize: 0.1, floorPips: 10, rangeFraction: 0.09, atrMultiple: 0.5 },
 *   range, // 200 pips wide
 *   1.5    // ATR(H1) in price
 * );
 * // { price: 1.8, pips: 18, component: 'range', ... }
 * ```
 */
export function resolveSweepThreshold(
  config: SweepThresholdConfig,
  range: AsianRange,
  atrH1?: number
): SweepThreshold {
  switch (config.mode) {
    case 'price':
      return { price: config.price, component: 'fixed' };

    case 'pips':
      return {
        price: config.pips * config.pipSize,
        pips: config.pips,
        component: 'fixed',
      };

    case 'dynamic': {
      const widthPips = toPips(range.high - range.low, config.pipSize);
      const floorPips = config.floorPips;
      const rangePips = roundPips(widthPips * config.rangeFraction);
      const atrPips = atrH1 === undefined ? 0 : toPips(atrH1 * config.atrMultiple, config.pipSize);

      const pips = Math.max(floorPips, rangePips, atrPips);
      const component = pips === floorPips ? 'floor' : pips === rangePips ? 'range' : 'atr';

      return {
        price: pips * config.pipSize,
        pips,
        component,
        candidates: { floorPips, rangePips, atrPips },
      };
    }
  }
}
