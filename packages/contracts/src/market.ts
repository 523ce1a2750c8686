/**
 * @fileoverview Market data types and bar feed contract.
 *
 * Provider-agnostic bar records and the pull query implemented by bar feed
 * collaborators. All types are pure data structures with no I/O.
 *
 * @module @session-sweep/contracts/market
 */

import type { Timeframe } from './timeframes.js';

/**
 * A single OHLCV bar.
 *
 * @invariant high >= low
 * @invariant high >= open && high >= close
 * @invariant low <= open && low <= close
 * @invariant volume >= 0
 *
 * @example
 * ```typescript
 * const bar: MarketBar = {
 *   timestamp: Date.parse('2025-01-15T06:05:00Z'),
 *   open: 1999.8,
 *   high: 2000.6,
 *   low: 1999.5,
 *   close: 2000.2,
 *   volume: 850
 * };
 * ```
 */
export interface MarketBar {
  /** Bar open time, unix milliseconds (UTC) */
  timestamp: number;

  /** Opening price for the period */
  open: number;

  /** Highest price during the period */
  high: number;

  /** Lowest price during the period */
  low: number;

  /** Closing price for the period */
  close: number;

  /** Traded volume during the period */
  volume: number;
}

/**
 * Parameters for the `get_bars` pull query.
 *
 * @invariant from <= to
 */
export interface GetBarsParams {
  /** Symbol identifier (e.g., 'XAUUSD') */
  symbol: string;

  /** Timeframe for the bars */
  timeframe: Timeframe;

  /** Start of time range, unix ms (inclusive) */
  from: number;

  /** End of time range, unix ms (exclusive) */
  to: number;
}

/**
 * Pull-based bar source implemented outside the core (broker, cache, replay).
 *
 * Implementations must return bars sorted ascending by timestamp and
 * restricted to the requested symbol and timeframe.
 */
export interface BarFeed {
  getBars(params: GetBarsParams): Promise<MarketBar[]>;
}
