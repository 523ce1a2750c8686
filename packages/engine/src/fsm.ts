/**
 * Session state machine.
 *
 * Every lifecycle change of a session goes through {@link applyTransition}:
 * it checks the transition table and the kind's guard, returns the next
 * record and the event to publish, and never mutates its input. A command
 * whose idempotence key (`kind@timestamp`) was already applied is ignored.
 */

import {
  InvalidTransitionError,
  SESSION_STATES,
  err,
  ok,
  type AsianRange,
  type ReversalConfirmation,
  type Result,
  type SessionState,
  type SweepEvent,
  type TransitionEvent,
  type TransitionKind,
} from '@session-sweep/contracts';
import type { ConfluenceVerdict } from '@session-sweep/strategy';

/**
 * Mutable-by-replacement state of one session.
 */
export interface SessionRecord {
  readonly symbol: string;
  readonly tradingDay: string;
  readonly state: SessionState;
  readonly range: AsianRange | null;
  readonly sweep: SweepEvent | null;
  readonly confirmation: ReversalConfirmation | null;
  readonly confirmedAt: number | null;
  readonly confluenceFailures: readonly string[];
  readonly bothSidesSwept: boolean;
  /** Directions already swept this trading day */
  readonly sweptDirections: readonly SweepEvent['direction'][];
  readonly cooldownUntil: number | null;
  readonly completedCycles: number;
  readonly idleSince: number | null;
  readonly appliedKeys: ReadonlySet<string>;
}

export type SessionCommand =
  | { kind: 'range-attached'; timestamp: number; range: AsianRange }
  | { kind: 'sweep-detected'; timestamp: number; confirmation: ReversalConfirmation }
  | { kind: 'sweep-discarded'; timestamp: number; reason: string; bothSidesSwept: boolean }
  | { kind: 'reversal-confirmed'; timestamp: number; confirmation: ReversalConfirmation }
  | { kind: 'reversal-expired'; timestamp: number; confirmation: ReversalConfirmation }
  | { kind: 'confluence-passed'; timestamp: number; verdict: ConfluenceVerdict }
  | { kind: 'confluence-timeout'; timestamp: number }
  | { kind: 'entry-executed'; timestamp: number; details?: Record<string, unknown> }
  | { kind: 'position-closed'; timestamp: number; cooldownUntil: number; details?: Record<string, unknown> }
  | { kind: 'cooldown-elapsed'; timestamp: number }
  | { kind: 'reset'; timestamp: number; reason: string };

interface TransitionRule {
  from: readonly SessionState[];
  to: SessionState;
}

/**
 * Allowed source states and target state per transition kind.
 */
export const TRANSITIONS: Readonly<Record<TransitionKind, TransitionRule>> = {
  'range-attached': { from: ['IDLE'], to: 'IDLE' },
  'sweep-detected': { from: ['IDLE'], to: 'SWEPT' },
  'sweep-discarded': { from: ['SWEPT'], to: 'IDLE' },
  'reversal-confirmed': { from: ['SWEPT'], to: 'CONFIRMED' },
  'reversal-expired': { from: ['SWEPT'], to: 'IDLE' },
  'confluence-passed': { from: ['CONFIRMED'], to: 'ARMED' },
  'confluence-timeout': { from: ['CONFIRMED'], to: 'IDLE' },
  'entry-executed': { from: ['ARMED'], to: 'IN_TRADE' },
  'position-closed': { from: ['IN_TRADE'], to: 'COOLDOWN' },
  'cooldown-elapsed': { from: ['COOLDOWN'], to: 'IDLE' },
  reset: { from: SESSION_STATES, to: 'IDLE' },
};

export interface TransitionOutcome {
  record: SessionRecord;
  /** Null when the command was a duplicate and nothing changed */
  event: TransitionEvent | null;
}

export function createSessionRecord(symbol: string, tradingDay: string, createdAt: number | null): SessionRecord {
  return {
    symbol,
    tradingDay,
    state: 'IDLE',
    range: null,
    sweep: null,
    confirmation: null,
    confirmedAt: null,
    confluenceFailures: [],
    bothSidesSwept: false,
    sweptDirections: [],
    cooldownUntil: null,
    completedCycles: 0,
    idleSince: createdAt,
    appliedKeys: new Set(),
  };
}

export function transitionKey(kind: TransitionKind, timestamp: number): string {
  return `${kind}@${timestamp}`;
}

/**
 * Applies a command to a record.
 *
 * @example
 * ```typescript
 * const result = applyTransition(record, { kind: 'confluence-timeout', timestamp });
 * if (result.ok && result.value.event) {
 *   bus.emit(result.value.event);
 * }
 * ```
 */
export function applyTransition(
  record: SessionRecord,
  command: SessionCommand
): Result<TransitionOutcome, InvalidTransitionError> {
  const key = transitionKey(command.kind, command.timestamp);
  if (record.appliedKeys.has(key)) {
    return ok({ record, event: null });
  }

  const rule = TRANSITIONS[command.kind];
  if (!rule.from.includes(record.state)) {
    return err(reject(record, rule.to, command, `${command.kind} is not allowed from ${record.state}`));
  }

  const guardFailure = checkGuard(record, command);
  if (guardFailure) {
    return err(reject(record, rule.to, command, guardFailure));
  }

  const appliedKeys = new Set(record.appliedKeys);
  appliedKeys.add(key);

  const next: SessionRecord = { ...update(record, command), state: rule.to, appliedKeys };
  const event: TransitionEvent = {
    symbol: record.symbol,
    tradingDay: record.tradingDay,
    fromState: record.state,
    toState: rule.to,
    kind: command.kind,
    timestamp: command.timestamp,
    payload: payloadOf(command),
  };

  return ok({ record: next, event });
}

function reject(
  record: SessionRecord,
  to: SessionState,
  command: SessionCommand,
  reason: string
): InvalidTransitionError {
  return new InvalidTransitionError(`Invalid transition ${record.state} -> ${to}: ${reason}`, {
    from: record.state,
    to,
    reason,
    kind: command.kind,
    symbol: record.symbol,
    tradingDay: record.tradingDay,
    timestamp: command.timestamp,
  });
}

function checkGuard(record: SessionRecord, command: SessionCommand): string | null {
  switch (command.kind) {
    case 'range-attached':
      if (record.range) return 'range already attached';
      return command.range.isValid ? null : 'range is not valid';

    case 'sweep-detected': {
      const direction = command.confirmation.sweep.direction;
      if (!record.range) return 'no range attached';
      if (!record.range.isValid) return 'range is not valid';
      if (record.bothSidesSwept) return 'both sides already swept';
      if (record.sweptDirections.includes(direction)) return `${direction} side already swept`;
      return null;
    }

    case 'reversal-confirmed':
      return command.confirmation.status === 'confirmed' ? null : 'confirmation has not passed';

    case 'reversal-expired':
      return command.confirmation.status === 'expired' ? null : 'confirmation has not expired';

    case 'confluence-passed':
      return command.verdict.passed ? null : 'confluence gates failed';

    case 'position-closed':
      return command.cooldownUntil >= command.timestamp ? null : 'cooldown ends before it starts';

    case 'cooldown-elapsed':
      return record.cooldownUntil !== null && command.timestamp >= record.cooldownUntil
        ? null
        : 'cooldown has not elapsed';

    default:
      return null;
  }
}

type RecordUpdate = Omit<SessionRecord, 'state' | 'appliedKeys'>;

function toIdle(record: SessionRecord, timestamp: number): RecordUpdate {
  return {
    ...record,
    sweep: null,
    confirmation: null,
    confirmedAt: null,
    confluenceFailures: [],
    cooldownUntil: null,
    idleSince: timestamp,
  };
}

function update(record: SessionRecord, command: SessionCommand): RecordUpdate {
  switch (command.kind) {
    case 'range-attached':
      return { ...record, range: command.range };

    case 'sweep-detected':
      return {
        ...record,
        sweep: command.confirmation.sweep,
        confirmation: command.confirmation,
        sweptDirections: [...record.sweptDirections, command.confirmation.sweep.direction],
        idleSince: null,
      };

    case 'sweep-discarded':
      return { ...toIdle(record, command.timestamp), bothSidesSwept: record.bothSidesSwept || command.bothSidesSwept };

    case 'reversal-confirmed':
      return {
        ...record,
        sweep: command.confirmation.sweep,
        confirmation: command.confirmation,
        confirmedAt: command.timestamp,
      };

    case 'reversal-expired':
    case 'confluence-timeout':
    case 'reset':
      return toIdle(record, command.timestamp);

    case 'confluence-passed':
      return { ...record, confluenceFailures: [] };

    case 'entry-executed':
      return record;

    case 'position-closed':
      return { ...record, cooldownUntil: command.cooldownUntil };

    case 'cooldown-elapsed':
      return { ...toIdle(record, command.timestamp), completedCycles: record.completedCycles + 1 };
  }
}

function payloadOf(command: SessionCommand): Record<string, unknown> {
  switch (command.kind) {
    case 'range-attached':
      return {
        high: command.range.high,
        low: command.range.low,
        midpoint: command.range.midpoint,
        barCount: command.range.barCount,
        grade: command.range.grade,
      };

    case 'sweep-detected': {
      const { sweep } = command.confirmation;
      return {
        direction: sweep.direction,
        breachPrice: sweep.breachPrice,
        breachTime: sweep.breachTime,
        thresholdUsed: sweep.thresholdUsed,
      };
    }

    case 'sweep-discarded':
      return { reason: command.reason, bothSidesSwept: command.bothSidesSwept };

    case 'reversal-confirmed':
      return {
        direction: command.confirmation.sweep.direction,
        extremePrice: command.confirmation.sweep.extremePrice,
        confirmedAt: command.confirmation.confirmedAt,
        barsEvaluated: command.confirmation.barsEvaluated,
      };

    case 'reversal-expired':
      return {
        expiredAt: command.confirmation.expiredAt,
        barsEvaluated: command.confirmation.barsEvaluated,
        closeBackInside: command.confirmation.closeBackInside,
        displacementOk: command.confirmation.displacementOk,
        structuralBreak: command.confirmation.structuralBreak,
        acceptanceOutside: command.confirmation.acceptanceOutside,
      };

    case 'confluence-passed':
      return { failures: command.verdict.failures };

    case 'entry-executed':
      return { ...command.details };

    case 'position-closed':
      return { ...command.details, cooldownUntil: command.cooldownUntil };

    case 'reset':
      return { reason: command.reason };

    case 'confluence-timeout':
    case 'cooldown-elapsed':
      return {};
  }
}
