/**
 * Session registry keyed by (symbol, trading day).
 */

import type { Logger } from '@session-sweep/logger';
import type { TradingSession } from './session.js';

export type SessionFactory = (symbol: string, tradingDay: string, createdAt: number) => TradingSession;

const MS_PER_DAY = 86_400_000;

export class SessionRegistry {
  private readonly sessions = new Map<string, TradingSession>();
  /**
   * Evicted keys and when they were evicted; late bars for them are refused
   * until the entry is pruned.
   */
  private readonly evicted = new Map<string, number>();

  constructor(
    private readonly factory: SessionFactory,
    private readonly logger: Logger
  ) {}

  static key(symbol: string, tradingDay: string): string {
    return `${symbol}|${tradingDay}`;
  }

  get(symbol: string, tradingDay: string): TradingSession | undefined {
    return this.sessions.get(SessionRegistry.key(symbol, tradingDay));
  }

  /**
   * Returns the session, creating it on first use. Null when the session
   * was already evicted.
   */
  getOrCreate(symbol: string, tradingDay: string, createdAt: number): TradingSession | null {
    const key = SessionRegistry.key(symbol, tradingDay);
    const existing = this.sessions.get(key);
    if (existing) {
      return existing;
    }
    if (this.evicted.has(key)) {
      return null;
    }

    const session = this.factory(symbol, tradingDay, createdAt);
    this.sessions.set(key, session);
    this.logger.info('Session created', { symbol, trading_day: tradingDay });
    return session;
  }

  list(): TradingSession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Latest trading day per symbol whose session window has opened by `asOf`.
   */
  latestOpenDays(asOf: number): Map<string, string> {
    const latest = new Map<string, string>();
    for (const session of this.sessions.values()) {
      if (session.window.start > asOf) continue;
      const current = latest.get(session.symbol);
      if (current === undefined || session.tradingDay > current) {
        latest.set(session.symbol, session.tradingDay);
      }
    }
    return latest;
  }

  /**
   * Removes sessions that have been idle for `retentionMs`. Eviction records
   * are kept for the retention period, and at least a day.
   *
   * @returns Keys of the evicted sessions
   */
  evict(asOf: number, retentionMs: number): string[] {
    const latest = this.latestOpenDays(asOf);
    const removed: string[] = [];

    for (const [key, session] of this.sessions) {
      const newerDayExists = (latest.get(session.symbol) ?? session.tradingDay) > session.tradingDay;
      if (session.isEvictable(asOf, retentionMs, newerDayExists)) {
        removed.push(key);
      }
    }

    for (const key of removed) {
      this.sessions.delete(key);
      this.evicted.set(key, asOf);
      this.logger.info('Session evicted', { session: key });
    }

    const horizon = Math.max(retentionMs, MS_PER_DAY);
    for (const [key, evictedAt] of this.evicted) {
      if (asOf - evictedAt >= horizon) {
        this.evicted.delete(key);
      }
    }

    return removed;
  }
}
