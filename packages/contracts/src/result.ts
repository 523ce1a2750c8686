/**
 * @fileoverview Result values returned by detectors and transitions.
 *
 * @module @session-sweep/contracts/result
 */

import type { SessionSweepError } from './errors.js';

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  error: E;
}

/**
 * Success or typed failure, used instead of exceptions at detector and
 * state machine boundaries.
 *
 * @example
 * ```typescript
 * const result = computeRange(bars, window, { minBars: 12 });
 * if (!result.ok) {
 *   logger.warn('Range not ready', { error_code: result.error.code });
 * }
 * ```
 */
export type Result<T, E extends Error = SessionSweepError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
