/**
 * @fileoverview Session lifecycle states and transition events.
 *
 * @module @session-sweep/contracts/session-state
 */

import type { AsianRange, SessionWindow } from './sessions.js';
import type { SweepEvent } from './sweep.js';
import type { ReversalConfirmation } from './reversal.js';

/**
 * Authoritative lifecycle state of one (symbol, trading day) session.
 */
export type SessionState = 'IDLE' | 'SWEPT' | 'CONFIRMED' | 'ARMED' | 'IN_TRADE' | 'COOLDOWN';

/**
 * All states, in lifecycle order.
 */
export const SESSION_STATES: readonly SessionState[] = [
  'IDLE',
  'SWEPT',
  'CONFIRMED',
  'ARMED',
  'IN_TRADE',
  'COOLDOWN',
];

/**
 * What caused a transition. Combined with the triggering timestamp it forms
 * the idempotence key of the event.
 */
export type TransitionKind =
  | 'range-attached'
  | 'sweep-detected'
  | 'sweep-discarded'
  | 'reversal-confirmed'
  | 'reversal-expired'
  | 'confluence-passed'
  | 'confluence-timeout'
  | 'entry-executed'
  | 'position-closed'
  | 'cooldown-elapsed'
  | 'reset';

/**
 * Structured event emitted for every applied transition.
 *
 * Consumed by persistence and by the execution collaborator that turns
 * ARMED into a real or simulated order.
 */
export interface TransitionEvent {
  symbol: string;
  /** Trading day, YYYY-MM-DD */
  tradingDay: string;
  fromState: SessionState;
  toState: SessionState;
  kind: TransitionKind;
  /** Time of the bar or external action that caused the transition, unix ms */
  timestamp: number;
  payload: Record<string, unknown>;
}

/**
 * Read-only view of a session.
 */
export interface SessionSnapshot {
  symbol: string;
  tradingDay: string;
  state: SessionState;
  window: SessionWindow;
  range: AsianRange | null;
  /** Why no range is attached after the window closed */
  rangeError: string | null;
  sweep: SweepEvent | null;
  confirmation: ReversalConfirmation | null;
  /** Failures reported by the last confluence check */
  confluenceFailures: string[];
  bothSidesSwept: boolean;
  cooldownUntil: number | null;
  lastBarTime: number | null;
  /** Completed IDLE→…→COOLDOWN→IDLE cycles */
  completedCycles: number;
  /** Time the session last returned to IDLE, unix ms */
  idleSince: number | null;
}
