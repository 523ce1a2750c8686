/**
 * @fileoverview Main entry point for @session-sweep/contracts package.
 *
 * Exports all shared types, error classes and utilities of the session sweep core.
 *
 * @module @session-sweep/contracts
 */

// Timeframes
export {
  Timeframe,
  isValidTimeframe,
  timeframeToMinutes,
  timeframeToMs,
  getTimeframeLabel,
  compareTimeframes,
  parseTimeframe,
  getAllTimeframes,
} from './timeframes.js';

// Market data types
export type { MarketBar, GetBarsParams, BarFeed } from './market.js';

// Error classes and guards
export {
  SessionSweepError,
  InsufficientDataError,
  InvalidTransitionError,
  AmbiguousSweepError,
  ConfigurationError,
  InvalidInputError,
  isSessionSweepError,
  isInsufficientDataError,
  isInvalidTransitionError,
  isAmbiguousSweepError,
  isConfigurationError,
} from './errors.js';

// Result values
export type { Result, Ok, Err } from './result.js';
export { ok, err } from './result.js';

// Session window and range types
export type {
  SessionWindowConfig,
  SessionWindow,
  RangeGrade,
  RangeGradeThresholds,
  AsianRange,
} from './sessions.js';

// Sweep types
export type {
  SweepDirection,
  TieBreakPolicy,
  OppositeSweepPolicy,
  SweepEvent,
  ThresholdComponent,
  SweepThreshold,
} from './sweep.js';

// Reversal confirmation types
export type {
  ReversalStatus,
  CheckEvidence,
  DisplacementEvidence,
  StructuralBreakEvidence,
  ReversalConfirmation,
  ReversalConfig,
} from './reversal.js';

export { DEFAULT_REVERSAL_CONFIG } from './reversal.js';

// Session lifecycle
export type {
  SessionState,
  TransitionKind,
  TransitionEvent,
  SessionSnapshot,
} from './session-state.js';

export { SESSION_STATES } from './session-state.js';
