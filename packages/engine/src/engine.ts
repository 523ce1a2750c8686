/**
 * Sweep engine facade.
 *
 * Routes bars to the session of their (symbol, trading day), serializes
 * all work per session, publishes transitions and isolates faults: an
 * exception inside one session is logged and reported for that bar only.
 */

import {
  ConfigurationError,
  SessionSweepError,
  Timeframe,
  err,
  type BarFeed,
  type MarketBar,
  type Result,
  type SessionSnapshot,
  type TransitionEvent,
} from '@session-sweep/contracts';
import { createLogger, withSessionContext, type Logger } from '@session-sweep/logger';
import {
  createConfluenceChecker,
  defaultConfluenceGates,
  tradingDayOf,
  type ConfluenceChecker,
} from '@session-sweep/strategy';
import {
  toRangeOptions,
  toReversalConfig,
  toThresholdConfig,
  toWindowConfig,
  type EngineConfig,
} from './config/index.js';
import { TransitionBus, type TransitionListener } from './events.js';
import { SessionRegistry } from './registry.js';
import { SerialQueue } from './serial-queue.js';
import {
  TradingSession,
  type IngestOutcome,
  type MarketContextProvider,
  type SessionSettings,
} from './session.js';

const MS_PER_MINUTE = 60_000;
const HOURLY_HISTORY_LIMIT = 200;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export interface SweepEngineOptions {
  config: EngineConfig;
  /** Defaults to a logger built from `config.logging` */
  logger?: Logger;
  /** Pull source used by {@link SweepEngine.sync} */
  feed?: BarFeed;
  /** Defaults to the built-in gates */
  confluence?: ConfluenceChecker;
  contextProvider?: MarketContextProvider;
}

export interface SyncResult {
  /** Bars returned by the feed */
  bars: number;
  /** Bars the sessions accepted */
  accepted: number;
  events: TransitionEvent[];
}

export type ActionResult = Result<TransitionEvent | null, SessionSweepError>;

/**
 * Per-session settings derived from the engine configuration.
 */
export function sessionSettingsFrom(config: EngineConfig): SessionSettings {
  return {
    window: toWindowConfig(config),
    primary: config.timeframes.primary,
    micro: config.timeframes.micro,
    range: toRangeOptions(config),
    threshold: toThresholdConfig(config),
    atrPeriod: config.sweep.atrPeriod,
    tieBreak: config.sweep.tieBreak,
    oppositePolicy: config.sweep.oppositePolicy,
    reversal: toReversalConfig(config),
    confluenceMaxWaitMinutes: config.lifecycle.confluenceMaxWaitMinutes,
    cooldownMinutes: config.lifecycle.cooldownMinutes,
  };
}

/**
 * @example
 * ```typescript
 * const engine = new SweepEngine({ config: loadConfig(), feed });
 * engine.onTransition((event) => {
 *   if (event.toState === 'ARMED') executor.submit(event);
 * });
 *
 * await engine.ingest('XAUUSD', Timeframe.M5, bar);
 * ```
 */
export class SweepEngine {
  private readonly config: EngineConfig;
  private readonly settings: SessionSettings;
  private readonly logger: Logger;
  private readonly feed?: BarFeed;
  private readonly bus: TransitionBus;
  private readonly queue = new SerialQueue();
  private readonly registry: SessionRegistry;
  private readonly hourly = new Map<string, MarketBar[]>();

  constructor(options: SweepEngineOptions) {
    const { config } = options;
    const base =
      options.logger ??
      createLogger({
        level: config.logging.level,
        json: config.logging.format === 'json',
        filePath: config.logging.filePath,
      });

    this.config = config;
    this.settings = sessionSettingsFrom(config);
    this.logger = base.child({ component: 'engine' });
    this.feed = options.feed;
    this.bus = new TransitionBus(this.logger);

    const confluence = options.confluence ?? createConfluenceChecker(defaultConfluenceGates());
    const sessionLogger = base.child({ component: 'session' });

    this.registry = new SessionRegistry(
      (symbol, tradingDay, createdAt) =>
        new TradingSession({
          symbol,
          tradingDay,
          createdAt,
          settings: this.settings,
          confluence,
          contextProvider: options.contextProvider,
          hourlyBars: () => this.hourly.get(symbol) ?? [],
          logger: sessionLogger,
          emit: (event) => this.bus.emit('transition', event),
        }),
      this.logger
    );
  }

  /**
   * Subscribe to every applied transition.
   *
   * @returns Unsubscribe function
   */
  onTransition(listener: TransitionListener): () => void {
    return this.bus.on('transition', listener);
  }

  /**
   * Feed one closed bar.
   *
   * Primary and micro bars go to the session of their trading day; hourly
   * bars are kept per symbol for ATR based thresholds.
   */
  async ingest(symbol: string, timeframe: Timeframe, bar: MarketBar): Promise<IngestOutcome> {
    const { primary, micro } = this.settings;

    if (timeframe !== primary && timeframe !== micro) {
      if (timeframe === Timeframe.H1) {
        return this.recordHourly(symbol, bar);
      }
      this.logger.debug('Bar ignored', { symbol, timeframe, reason: 'unsupported-timeframe' });
      return { accepted: false, reason: 'unsupported-timeframe', events: [] };
    }

    const faulted = (error: Error): IngestOutcome => ({ accepted: false, reason: 'fault', events: [], error });

    let tradingDay: string;
    try {
      tradingDay = tradingDayOf(bar.timestamp, this.settings.window);
    } catch (error) {
      const fault = toError(error);
      this.logger.error('Bar rejected', { symbol, timeframe, error: fault.message });
      return faulted(fault);
    }

    return this.onSession<IngestOutcome>(symbol, tradingDay, (session) => session.ingest(timeframe, bar), {
      create: bar.timestamp,
      missing: () => ({ accepted: false, reason: 'session-evicted', events: [] }),
      fault: faulted,
    });
  }

  /**
   * Feed bars of one timeframe in order.
   */
  async ingestMany(symbol: string, timeframe: Timeframe, bars: readonly MarketBar[]): Promise<IngestOutcome[]> {
    const outcomes: IngestOutcome[] = [];
    for (const bar of bars) {
      outcomes.push(await this.ingest(symbol, timeframe, bar));
    }
    return outcomes;
  }

  /**
   * Pulls `[from, to)` from the bar feed and replays it in time order.
   * At equal timestamps hourly bars go first, then micro, then primary.
   *
   * @throws {ConfigurationError} When no feed was configured
   */
  async sync(symbol: string, from: number, to: number): Promise<SyncResult> {
    const feed = this.feed;
    if (!feed) {
      throw new ConfigurationError('No bar feed configured', { issues: ['feed: required for sync'] });
    }

    const { primary, micro, threshold } = this.settings;
    const timeframes: Timeframe[] =
      threshold.mode === 'dynamic' && primary !== Timeframe.H1 ? [Timeframe.H1, micro, primary] : [micro, primary];

    const batches = await Promise.all(
      timeframes.map(async (timeframe) => {
        const bars = await feed.getBars({ symbol, timeframe, from, to });
        return bars.map((bar) => ({ timeframe, bar }));
      })
    );

    const ordered = batches
      .flat()
      .sort(
        (a, b) =>
          a.bar.timestamp - b.bar.timestamp || timeframes.indexOf(a.timeframe) - timeframes.indexOf(b.timeframe)
      );

    let accepted = 0;
    const events: TransitionEvent[] = [];
    for (const { timeframe, bar } of ordered) {
      const outcome = await this.ingest(symbol, timeframe, bar);
      if (outcome.accepted) accepted++;
      events.push(...outcome.events);
    }

    this.logger.info('Sync complete', { symbol, from, to, bars: ordered.length, accepted, transitions: events.length });
    return { bars: ordered.length, accepted, events };
  }

  markEntryExecuted(
    symbol: string,
    tradingDay: string,
    timestamp: number,
    details?: Record<string, unknown>
  ): Promise<ActionResult> {
    return this.onExisting(symbol, tradingDay, (session) => session.markEntryExecuted(timestamp, details));
  }

  markPositionClosed(
    symbol: string,
    tradingDay: string,
    timestamp: number,
    details?: Record<string, unknown>
  ): Promise<ActionResult> {
    return this.onExisting(symbol, tradingDay, (session) => session.markPositionClosed(timestamp, details));
  }

  reset(symbol: string, tradingDay: string, timestamp: number, reason = 'manual'): Promise<ActionResult> {
    return this.onExisting(symbol, tradingDay, (session) => session.reset(timestamp, reason));
  }

  /**
   * Applies time-based transitions to every session, resets sessions whose
   * symbol has opened a newer trading day, then evicts sessions idle past
   * the retention period.
   */
  async tick(asOf: number): Promise<TransitionEvent[]> {
    const latest = this.registry.latestOpenDays(asOf);

    const ticks = this.registry.list().map((session) => {
      const superseded = (latest.get(session.symbol) ?? session.tradingDay) > session.tradingDay;
      return this.onSession(
        session.symbol,
        session.tradingDay,
        (s) => (superseded ? [...s.tick(asOf), ...s.closeDay(asOf)] : s.tick(asOf)),
        { missing: () => [], fault: () => [] }
      );
    });

    const events = (await Promise.all(ticks)).flat();
    this.registry.evict(asOf, this.config.lifecycle.retentionMinutes * MS_PER_MINUTE);
    return events;
  }

  snapshot(symbol: string, tradingDay: string): SessionSnapshot | null {
    return this.registry.get(symbol, tradingDay)?.snapshot() ?? null;
  }

  snapshots(): SessionSnapshot[] {
    return this.registry.list().map((session) => session.snapshot());
  }

  /**
   * Waits for queued work, then drops every listener.
   */
  async close(): Promise<void> {
    await this.queue.drain();
    this.bus.removeAllListeners();
  }

  private recordHourly(symbol: string, bar: MarketBar): IngestOutcome {
    const history = this.hourly.get(symbol) ?? [];
    const last = history[history.length - 1];

    if (last && bar.timestamp <= last.timestamp) {
      const reason = bar.timestamp === last.timestamp ? 'duplicate' : 'out-of-order';
      return { accepted: false, reason, events: [] };
    }

    history.push(bar);
    if (history.length > HOURLY_HISTORY_LIMIT) {
      history.shift();
    }
    this.hourly.set(symbol, history);
    return { accepted: true, events: [] };
  }

  private onExisting(
    symbol: string,
    tradingDay: string,
    action: (session: TradingSession) => ActionResult
  ): Promise<ActionResult> {
    const failed = (code: string, message: string): ActionResult =>
      err(new SessionSweepError(code, message, { symbol, tradingDay }));

    return this.onSession(symbol, tradingDay, action, {
      missing: () => failed('SESSION_NOT_FOUND', `No session for ${symbol} on ${tradingDay}`),
      fault: (error) => failed('SESSION_FAULT', error.message),
    });
  }

  /**
   * Runs `work` on the session's queue inside its logging context.
   */
  private onSession<T>(
    symbol: string,
    tradingDay: string,
    work: (session: TradingSession) => T,
    handlers: { create?: number; missing: () => T; fault: (error: Error) => T }
  ): Promise<T> {
    const key = SessionRegistry.key(symbol, tradingDay);

    return this.queue.run(key, () =>
      withSessionContext({ symbol, trading_day: tradingDay }, () => {
        try {
          const session =
            handlers.create === undefined
              ? this.registry.get(symbol, tradingDay)
              : this.registry.getOrCreate(symbol, tradingDay, handlers.create);
          if (!session) {
            return handlers.missing();
          }
          return work(session);
        } catch (error) {
          const fault = toError(error);
          this.logger.error('Session fault', {
            error: fault.message,
            stack: fault.stack,
            state: this.registry.get(symbol, tradingDay)?.state,
          });
          return handlers.fault(fault);
        }
      })
    );
  }
}
