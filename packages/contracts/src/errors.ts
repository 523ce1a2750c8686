/**
 * @fileoverview Error taxonomy for the session sweep core.
 *
 * Structured error classes with machine-readable codes and contextual data.
 * Detectors hand these back inside `Result` values; the state machine
 * returns them from rejected transitions. None of them is thrown across the
 * session boundary except `ConfigurationError`, which is fatal at startup.
 *
 * @module @session-sweep/contracts/errors
 */

import type { SessionState } from './session-state.js';

/**
 * Base error class for all session sweep errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * const err = new SessionSweepError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class SessionSweepError extends Error {
  /** Machine-readable error code (e.g., 'INVALID_TRANSITION') */
  readonly code: string;

  /** Structured error data for debugging and retry logic */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Not enough bars to trust a computation. Recoverable: retry with more data.
 *
 * @example
 * ```typescript
 * new InsufficientDataError('Need at least 12 bars to build the range', {
 *   required: 12,
 *   received: 7,
 *   symbol: 'XAUUSD'
 * });
 * ```
 */
export class InsufficientDataError extends SessionSweepError {
  declare readonly data: {
    required: number;
    received: number;
    symbol: string;
    [key: string]: unknown;
  };

  constructor(
    message: string,
    data: { required: number; received: number; symbol: string; [key: string]: unknown }
  ) {
    super('INSUFFICIENT_DATA', message, data);
  }
}

/**
 * A state transition guard was violated. Signals a caller bug or a stale
 * event; the transition is never applied.
 */
export class InvalidTransitionError extends SessionSweepError {
  declare readonly data: {
    from: SessionState;
    to: SessionState;
    reason: string;
    [key: string]: unknown;
  };

  constructor(
    message: string,
    data: { from: SessionState; to: SessionState; reason: string; [key: string]: unknown }
  ) {
    super('INVALID_TRANSITION', message, data);
  }
}

/**
 * A single bar breached both sides of the range and the tie-break policy is
 * `reject`.
 */
export class AmbiguousSweepError extends SessionSweepError {
  declare readonly data: {
    barTime: number;
    high: number;
    low: number;
    [key: string]: unknown;
  };

  constructor(message: string, data: { barTime: number; high: number; low: number; [key: string]: unknown }) {
    super('AMBIGUOUS_SWEEP', message, data);
  }
}

/**
 * Missing or invalid configuration. Fatal at startup.
 */
export class ConfigurationError extends SessionSweepError {
  declare readonly data: {
    issues: string[];
    [key: string]: unknown;
  };

  constructor(message: string, data: { issues: string[]; [key: string]: unknown }) {
    super('CONFIGURATION', message, data);
  }
}

/**
 * Malformed input handed to a detector (unsorted bars, non-finite prices).
 */
export class InvalidInputError extends SessionSweepError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('INVALID_INPUT', message, data);
  }
}

/**
 * Type guard to check if an error is a SessionSweepError.
 *
 * @example
 * ```typescript
 * if (isSessionSweepError(err)) {
 *   logger.error('Rejected', { error_code: err.code });
 * }
 * ```
 */
export function isSessionSweepError(error: unknown): error is SessionSweepError {
  return error instanceof SessionSweepError;
}

export function isInsufficientDataError(error: unknown): error is InsufficientDataError {
  return error instanceof InsufficientDataError;
}

export function isInvalidTransitionError(error: unknown): error is InvalidTransitionError {
  return error instanceof InvalidTransitionError;
}

export function isAmbiguousSweepError(error: unknown): error is AmbiguousSweepError {
  return error instanceof AmbiguousSweepError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
