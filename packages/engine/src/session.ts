/**
 * Trading session: one (symbol, trading day).
 *
 * Owns the bar buffers of its day and drives the detectors: the range when
 * the window closes, then sweeps, reversal confirmation and confluence.
 * Every state change goes through the state machine in `fsm.ts`.
 */

import {
  ok,
  timeframeToMs,
  type InvalidTransitionError,
  type MarketBar,
  type Result,
  type ReversalConfig,
  type SessionSnapshot,
  type SessionWindow,
  type SessionWindowConfig,
  type OppositeSweepPolicy,
  type SweepEvent,
  type SweepThreshold,
  type TieBreakPolicy,
  type Timeframe,
  type TransitionEvent,
} from '@session-sweep/contracts';
import type { Logger } from '@session-sweep/logger';
import {
  averageTrueRange,
  computeRange,
  detectSweep,
  evaluateReversal,
  expireReversalIfDue,
  materializeSessionWindow,
  resolveSweepThreshold,
  startReversal,
  type ConfluenceChecker,
  type MarketContext,
  type RangeOptions,
  type SweepThresholdConfig,
} from '@session-sweep/strategy';
import { applyTransition, createSessionRecord, type SessionCommand, type SessionRecord, type TransitionOutcome } from './fsm.js';

const MS_PER_MINUTE = 60_000;
const MS_PER_HOUR = 3_600_000;

/**
 * Why a bar was not processed.
 */
export type IgnoreReason =
  | 'duplicate'
  | 'out-of-order'
  | 'unsupported-timeframe'
  | 'session-evicted'
  | 'fault';

export interface IngestOutcome {
  accepted: boolean;
  reason?: IgnoreReason;
  /** Transitions applied while processing the bar, in order */
  events: TransitionEvent[];
  /** Set when reason is 'fault' */
  error?: Error;
}

export interface MarketContextRequest {
  symbol: string;
  tradingDay: string;
  asOf: number;
}

/**
 * Supplies spread, news and higher timeframe data for confluence checks.
 * Runs synchronously inside the session; fetch ahead of time.
 */
export type MarketContextProvider = (request: MarketContextRequest) => Omit<MarketContext, 'asOf'>;

/**
 * Resolved per-session settings, derived once from the engine config.
 */
export interface SessionSettings {
  window: SessionWindowConfig;
  primary: Timeframe;
  micro: Timeframe;
  range: RangeOptions;
  threshold: SweepThresholdConfig;
  atrPeriod: number;
  tieBreak: TieBreakPolicy;
  oppositePolicy: OppositeSweepPolicy;
  reversal: ReversalConfig;
  confluenceMaxWaitMinutes: number;
  cooldownMinutes: number;
}

export interface TradingSessionOptions {
  symbol: string;
  tradingDay: string;
  settings: SessionSettings;
  confluence: ConfluenceChecker;
  contextProvider?: MarketContextProvider;
  /** Hourly bars of the symbol, ascending, for ATR based thresholds */
  hourlyBars?: () => readonly MarketBar[];
  logger: Logger;
  emit: (event: TransitionEvent) => void;
  /** Time of the first input for the session, unix ms */
  createdAt: number;
}

export class TradingSession {
  readonly symbol: string;
  readonly tradingDay: string;
  readonly window: SessionWindow;

  private record: SessionRecord;
  /** Set once a range was computed, valid or degenerate */
  private rangeSettled = false;
  private rangeError: string | null = null;
  private sweepThreshold: SweepThreshold | null = null;
  private lastBarTime: number | null = null;

  private readonly lastSeen = new Map<Timeframe, number>();
  private readonly primaryBars: MarketBar[] = [];
  private readonly microBars: MarketBar[] = [];

  private readonly settings: SessionSettings;
  private readonly confluence: ConfluenceChecker;
  private readonly contextProvider?: MarketContextProvider;
  private readonly hourlyBars: () => readonly MarketBar[];
  private readonly logger: Logger;
  private readonly emit: (event: TransitionEvent) => void;

  constructor(options: TradingSessionOptions) {
    this.symbol = options.symbol;
    this.tradingDay = options.tradingDay;
    this.settings = options.settings;
    this.confluence = options.confluence;
    this.contextProvider = options.contextProvider;
    this.hourlyBars = options.hourlyBars ?? (() => []);
    this.logger = options.logger;
    this.emit = options.emit;
    this.window = materializeSessionWindow(options.tradingDay, options.symbol, options.settings.window);
    this.record = createSessionRecord(options.symbol, options.tradingDay, options.createdAt);
  }

  get state(): SessionRecord['state'] {
    return this.record.state;
  }

  /**
   * Processes one closed bar of the primary or micro timeframe.
   *
   * Bars at or before the last accepted bar of the same timeframe are
   * ignored, so redelivery never changes the outcome.
   */
  ingest(timeframe: Timeframe, bar: MarketBar): IngestOutcome {
    const buffer = this.bufferFor(timeframe);
    if (!buffer) {
      return { accepted: false, reason: 'unsupported-timeframe', events: [] };
    }

    const last = this.lastSeen.get(timeframe);
    if (last !== undefined && bar.timestamp <= last) {
      const reason = bar.timestamp === last ? 'duplicate' : 'out-of-order';
      this.logger.debug('Bar ignored', { timeframe, timestamp: bar.timestamp, reason });
      return { accepted: false, reason, events: [] };
    }

    this.lastSeen.set(timeframe, bar.timestamp);
    buffer.push(bar);
    this.lastBarTime = Math.max(this.lastBarTime ?? bar.timestamp, bar.timestamp);

    const events: TransitionEvent[] = [];
    this.attachRangeIfDue(bar.timestamp, timeframe === this.settings.primary, events);

    if (timeframe === this.settings.primary) {
      this.onPrimaryBar(bar, events);
    } else if (this.record.state === 'SWEPT') {
      this.evaluateConfirmation(bar.timestamp, events);
    }

    return { accepted: true, events };
  }

  /**
   * Applies time-based transitions when no bar arrives: range attachment
   * after the window closes, reversal expiry, confluence timeout and the
   * end of the cooldown.
   */
  tick(asOf: number): TransitionEvent[] {
    const events: TransitionEvent[] = [];
    this.attachRangeIfDue(asOf, false, events);

    const { state, confirmation, cooldownUntil } = this.record;

    if (state === 'SWEPT' && confirmation) {
      const next = expireReversalIfDue(confirmation, asOf, this.settings.reversal);
      if (next.status === 'expired') {
        this.apply({ kind: 'reversal-expired', timestamp: asOf, confirmation: next }, events);
      }
    } else if (state === 'CONFIRMED') {
      this.expireConfluenceIfDue(asOf, events);
    } else if (state === 'COOLDOWN' && cooldownUntil !== null && asOf >= cooldownUntil) {
      this.apply({ kind: 'cooldown-elapsed', timestamp: asOf }, events);
    }

    return events;
  }

  /**
   * ARMED -> IN_TRADE, reported by the execution collaborator.
   */
  markEntryExecuted(
    timestamp: number,
    details?: Record<string, unknown>
  ): Result<TransitionEvent | null, InvalidTransitionError> {
    return this.applyExternal({ kind: 'entry-executed', timestamp, details });
  }

  /**
   * IN_TRADE -> COOLDOWN; the cooldown runs from `timestamp`.
   */
  markPositionClosed(
    timestamp: number,
    details?: Record<string, unknown>
  ): Result<TransitionEvent | null, InvalidTransitionError> {
    const cooldownUntil = timestamp + this.settings.cooldownMinutes * MS_PER_MINUTE;
    return this.applyExternal({ kind: 'position-closed', timestamp, cooldownUntil, details });
  }

  reset(timestamp: number, reason: string): Result<TransitionEvent | null, InvalidTransitionError> {
    return this.applyExternal({ kind: 'reset', timestamp, reason });
  }

  /**
   * Called once a newer trading day's window has opened for the symbol.
   * Returns the session to IDLE unless a position is open or cooling down.
   */
  closeDay(asOf: number): TransitionEvent[] {
    const { state } = this.record;
    if (state === 'IDLE' || state === 'IN_TRADE' || state === 'COOLDOWN') {
      return [];
    }

    const events: TransitionEvent[] = [];
    this.apply({ kind: 'reset', timestamp: asOf, reason: 'new-session' }, events);
    return events;
  }

  /**
   * True once the session has sat in IDLE for the retention period, after
   * either a completed cycle or the start of a newer trading day.
   */
  isEvictable(asOf: number, retentionMs: number, newerDayExists: boolean): boolean {
    const { state, idleSince, completedCycles } = this.record;
    if (state !== 'IDLE' || idleSince === null || asOf - idleSince < retentionMs) {
      return false;
    }
    return completedCycles > 0 || newerDayExists;
  }

  snapshot(): SessionSnapshot {
    const { record } = this;
    return {
      symbol: this.symbol,
      tradingDay: this.tradingDay,
      state: record.state,
      window: this.window,
      range: record.range,
      rangeError: this.rangeError,
      sweep: record.sweep,
      confirmation: record.confirmation,
      confluenceFailures: [...record.confluenceFailures],
      bothSidesSwept: record.bothSidesSwept,
      cooldownUntil: record.cooldownUntil,
      lastBarTime: this.lastBarTime,
      completedCycles: record.completedCycles,
      idleSince: record.idleSince,
    };
  }

  private bufferFor(timeframe: Timeframe): MarketBar[] | null {
    if (timeframe === this.settings.primary) return this.primaryBars;
    if (timeframe === this.settings.micro) return this.microBars;
    return null;
  }

  private onPrimaryBar(bar: MarketBar, events: TransitionEvent[]): void {
    const { state, cooldownUntil } = this.record;

    if (state === 'SWEPT') {
      this.advanceSweep(bar, events);
    } else if (state === 'CONFIRMED') {
      if (!this.expireConfluenceIfDue(bar.timestamp, events)) {
        this.checkConfluence(bar.timestamp, events);
      }
    } else if (state === 'COOLDOWN' && cooldownUntil !== null && bar.timestamp >= cooldownUntil) {
      this.apply({ kind: 'cooldown-elapsed', timestamp: bar.timestamp }, events);
    }

    // A bar that returned the session to IDLE may open the next sweep
    if (this.record.state === 'IDLE') {
      this.detectNewSweep(bar, events);
    }
  }

  /**
   * Computes the range once the window's last primary bar has closed: on the
   * first primary bar at or after the window end, otherwise once a full
   * primary bar has passed it. Too few bars is retried on later input.
   */
  private attachRangeIfDue(asOf: number, primaryBar: boolean, events: TransitionEvent[]): void {
    if (this.rangeSettled) {
      return;
    }
    const dueAt = primaryBar ? this.window.end : this.window.end + timeframeToMs(this.settings.primary);
    if (asOf < dueAt) {
      return;
    }

    const result = computeRange(this.primaryBars, this.window, this.settings.range);
    if (!result.ok) {
      if (this.rangeError !== result.error.message) {
        this.logger.warn('Range unavailable', { error_code: result.error.code, ...result.error.data });
      }
      this.rangeError = result.error.message;
      return;
    }

    this.rangeSettled = true;
    const range = result.value;
    if (!range.isValid) {
      this.rangeError = 'Range is degenerate (high <= low)';
      this.logger.warn('Range unavailable', { high: range.high, low: range.low, bar_count: range.barCount });
      return;
    }

    this.rangeError = null;
    this.sweepThreshold = resolveSweepThreshold(this.settings.threshold, range, this.hourlyAtr());
    this.logger.debug('Sweep threshold resolved', { ...this.sweepThreshold });
    this.apply({ kind: 'range-attached', timestamp: this.window.end, range }, events);
  }

  /**
   * ATR over hourly bars that closed before the window ended.
   */
  private hourlyAtr(): number | undefined {
    if (this.settings.threshold.mode !== 'dynamic') {
      return undefined;
    }
    const closed = this.hourlyBars().filter((bar) => bar.timestamp + MS_PER_HOUR <= this.window.end);
    return averageTrueRange(closed, this.settings.atrPeriod) ?? undefined;
  }

  private detectNewSweep(bar: MarketBar, events: TransitionEvent[]): void {
    const sweep = this.sweepOn(bar);
    if (!sweep) {
      return;
    }
    if (this.record.sweptDirections.includes(sweep.direction)) {
      this.logger.debug('Side already swept today', { direction: sweep.direction, timestamp: bar.timestamp });
      return;
    }
    this.apply({ kind: 'sweep-detected', timestamp: bar.timestamp, confirmation: startReversal(sweep) }, events);
  }

  private sweepOn(bar: MarketBar): SweepEvent | null {
    const { range, bothSidesSwept } = this.record;
    if (!range || !this.sweepThreshold || bothSidesSwept) {
      return null;
    }

    const result = detectSweep(range, bar, this.sweepThreshold.price, this.settings.tieBreak);
    if (!result.ok) {
      this.logger.warn('Ambiguous sweep bar rejected', { error_code: result.error.code, ...result.error.data });
      return null;
    }
    return result.value;
  }

  /**
   * SWEPT on a primary bar: an opposite-side breach is handled by policy,
   * anything else feeds the confirmer.
   */
  private advanceSweep(bar: MarketBar, events: TransitionEvent[]): void {
    const active = this.record.sweep;
    const opposite = this.sweepOn(bar);

    if (active && opposite && opposite.direction !== active.direction) {
      if (this.settings.oppositePolicy === 'discard') {
        this.apply(
          { kind: 'sweep-discarded', timestamp: bar.timestamp, reason: 'opposite side swept', bothSidesSwept: true },
          events
        );
        return;
      }

      const discarded = this.apply(
        { kind: 'sweep-discarded', timestamp: bar.timestamp, reason: 'superseded', bothSidesSwept: false },
        events
      );
      if (discarded.ok) {
        this.detectNewSweep(bar, events);
      }
      return;
    }

    this.evaluateConfirmation(bar.timestamp, events);
  }

  private evaluateConfirmation(asOf: number, events: TransitionEvent[]): void {
    const current = this.record.confirmation;
    if (!current || current.status !== 'pending') {
      return;
    }

    const next = evaluateReversal(
      current,
      { primaryBars: this.primaryBars, microBars: this.microBars, primaryTimeframe: this.settings.primary },
      this.settings.reversal
    );

    if (next.status === 'confirmed') {
      const confirmed = this.apply(
        { kind: 'reversal-confirmed', timestamp: next.confirmedAt ?? asOf, confirmation: next },
        events
      );
      if (confirmed.ok) {
        this.checkConfluence(asOf, events);
      }
    } else if (next.status === 'expired') {
      if (next.acceptanceOutside) {
        this.logger.info('Sweep accepted outside the range', {
          closes_outside: next.closesOutside,
          timestamp: next.expiredAt,
        });
      }
      this.apply({ kind: 'reversal-expired', timestamp: next.expiredAt ?? asOf, confirmation: next }, events);
    } else if (next !== current) {
      // Partial progress is kept without a state change
      this.record = { ...this.record, sweep: next.sweep, confirmation: next };
    }
  }

  private checkConfluence(asOf: number, events: TransitionEvent[]): void {
    const { confirmation } = this.record;
    if (this.record.state !== 'CONFIRMED' || !confirmation) {
      return;
    }

    const provided = this.contextProvider?.({ symbol: this.symbol, tradingDay: this.tradingDay, asOf }) ?? {};
    const context: MarketContext = { microBars: this.microBars, ...provided, asOf };
    const verdict = this.confluence.check(confirmation, context);

    if (verdict.passed) {
      this.apply({ kind: 'confluence-passed', timestamp: asOf, verdict }, events);
      return;
    }

    this.record = { ...this.record, confluenceFailures: verdict.failures };
    this.logger.info('Confluence gates failed', { failures: verdict.failures, timestamp: asOf });
  }

  private expireConfluenceIfDue(asOf: number, events: TransitionEvent[]): boolean {
    const { confirmedAt } = this.record;
    const maxWaitMs = this.settings.confluenceMaxWaitMinutes * MS_PER_MINUTE;
    if (confirmedAt === null || asOf - confirmedAt <= maxWaitMs) {
      return false;
    }
    return this.apply({ kind: 'confluence-timeout', timestamp: asOf }, events).ok;
  }

  private applyExternal(command: SessionCommand): Result<TransitionEvent | null, InvalidTransitionError> {
    const result = this.apply(command, []);
    return result.ok ? ok(result.value.event) : result;
  }

  private apply(
    command: SessionCommand,
    events: TransitionEvent[]
  ): Result<TransitionOutcome, InvalidTransitionError> {
    const result = applyTransition(this.record, command);

    if (!result.ok) {
      this.logger.warn('Transition rejected', {
        error_code: result.error.code,
        kind: command.kind,
        reason: result.error.data.reason,
        timestamp: command.timestamp,
      });
      return result;
    }

    const { record, event } = result.value;
    this.record = record;

    if (event) {
      this.logger.info('Session transition', {
        kind: event.kind,
        from_state: event.fromState,
        to_state: event.toState,
        timestamp: event.timestamp,
      });
      events.push(event);
      this.emit(event);
    } else {
      this.logger.debug('Duplicate transition ignored', { kind: command.kind, timestamp: command.timestamp });
    }

    return result;
  }
}
