/**
 * @fileoverview Main entry point for @session-sweep/strategy package.
 *
 * Pure detectors of the session sweep core: session windows, the reference
 * range, sweeps, reversal confirmation and confluence gates.
 *
 * @module @session-sweep/strategy
 */

// Session windows
export {
  parseSessionTime,
  crossesMidnight,
  formatTradingDay,
  materializeSessionWindow,
  tradingDayOf,
  isWithinWindow,
} from './session-window.js';

// Range Tracker
export {
  DEFAULT_RANGE_GRADE_THRESHOLDS,
  computeRange,
  gradeRange,
  toPips,
  roundPips,
} from './range-tracker.js';
export type { RangeOptions } from './range-tracker.js';

// Sweeps
export { resolveSweepThreshold } from './sweep-threshold.js';
export type { SweepThresholdConfig } from './sweep-threshold.js';
export { detectSweep, extendSweep } from './sweep-detector.js';

// Micro structure
export { findSwingPivots, findStructuralBreak, breakPivotType } from './pivots.js';
export type { PivotOptions, SwingPivot, StructuralBreak } from './pivots.js';

// Reversal Confirmer
export {
  startReversal,
  evaluateReversal,
  expireReversalIfDue,
  reversalDeadline,
} from './reversal-confirmer.js';
export type { ReversalInput } from './reversal-confirmer.js';

// Confluence
export {
  createConfluenceChecker,
  defaultConfluenceGates,
  rangeGradeGate,
  maxSpreadGate,
  newsBlackoutGate,
  auctionBlackoutGate,
  velocitySpikeGate,
  htfBiasGate,
  trendDayGate,
} from './confluence.js';
export type {
  NewsEvent,
  MarketContext,
  ConfluenceVerdict,
  ConfluenceGate,
  ConfluenceChecker,
} from './confluence.js';

// Indicators
export { simpleMovingAverage, averageTrueRange, classifyBias } from './indicators.js';
export type { Bias } from './indicators.js';
