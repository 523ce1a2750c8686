/**
 * Shared bars, config and engine helpers for engine tests.
 *
 * The reference day builds a 2000.0 / 1990.0 range over 00:00-06:00 UTC from
 * 72 M5 bars; with a 0.5 threshold the 06:05 bar sweeps the high and the
 * 06:10 bar closes back inside while the M1 bars break a swing low.
 */

import { Timeframe, type BarFeed, type GetBarsParams, type MarketBar } from '@session-sweep/contracts';
import { createSilentLogger } from '@session-sweep/logger';
import { createConfluenceChecker } from '@session-sweep/strategy';
import { parseConfig, type EngineConfig, type EngineConfigInput } from '../src/config/index.js';
import { SweepEngine, type SweepEngineOptions } from '../src/engine.js';

export const DAY = '2025-01-15';
export const NEXT_DAY = '2025-01-16';
export const SYMBOL = 'XAUUSD';

/** Unix ms of HH:mm on the test day */
export function at(time: string, day: string = DAY): number {
  return Date.parse(`${day}T${time}:00Z`);
}

export function bar(
  time: string,
  open: number,
  high: number,
  low: number,
  close: number,
  day: string = DAY
): MarketBar {
  return { timestamp: at(time, day), open, high, low, close, volume: 100 };
}

/** A bar well inside the range */
export function quietBar(time: string, day: string = DAY): MarketBar {
  return bar(time, 1995, 1996, 1994, 1995, day);
}

/** 72 M5 bars from 00:00 to 05:55 with a 2000.0 high and a 1990.0 low */
export function asianBars(day: string = DAY): MarketBar[] {
  return Array.from({ length: 72 }, (_, i) => ({
    timestamp: at('00:00', day) + i * 300_000,
    open: 1995,
    high: i === 10 ? 2000.0 : 1998,
    low: i === 40 ? 1990.0 : 1992,
    close: 1995,
    volume: 100,
  }));
}

export const SWEEP_BAR = bar('06:05', 1999.8, 2000.6, 1998.0, 1999.4);
export const CLOSE_BACK_BAR = bar('06:10', 1999.4, 1999.5, 1994.8, 1995.0);

export const MICRO_BARS: MarketBar[] = [
  bar('06:05', 1999.8, 2000.6, 1999.5, 1999.6),
  bar('06:06', 1999.6, 1999.9, 1999.0, 1999.2),
  bar('06:07', 1999.2, 1999.4, 1998.0, 1998.5),
  bar('06:08', 1998.9, 1999.3, 1998.8, 1999.1),
  bar('06:09', 1999.3, 1999.6, 1999.2, 1999.4),
  bar('06:10', 1999.4, 1999.5, 1996.8, 1997.0),
];

export function testConfig(overrides: EngineConfigInput = {}): EngineConfig {
  return parseConfig({
    ...overrides,
    sweep: { thresholdPrice: 0.5, ...overrides.sweep },
  });
}

export function createTestEngine(
  overrides: EngineConfigInput = {},
  options: Omit<SweepEngineOptions, 'config'> = {}
): SweepEngine {
  return new SweepEngine({
    config: testConfig(overrides),
    logger: createSilentLogger(),
    confluence: createConfluenceChecker(),
    ...options,
  });
}

/** Builds the range and delivers the 06:00 bar that closes the window */
export async function buildRange(engine: SweepEngine, symbol: string = SYMBOL): Promise<void> {
  await engine.ingestMany(symbol, Timeframe.M5, asianBars());
  await engine.ingest(symbol, Timeframe.M5, quietBar('06:00'));
}

/** Plays the reference scenario up to the 06:10 primary bar */
export async function playReference(engine: SweepEngine, symbol: string = SYMBOL): Promise<void> {
  await buildRange(engine, symbol);
  await engine.ingest(symbol, Timeframe.M5, SWEEP_BAR);
  await engine.ingestMany(symbol, Timeframe.M1, MICRO_BARS);
  await engine.ingest(symbol, Timeframe.M5, CLOSE_BACK_BAR);
}

/**
 * In-process bar feed over fixed arrays.
 */
export class MemoryBarFeed implements BarFeed {
  readonly requests: GetBarsParams[] = [];

  constructor(private readonly bars: Partial<Record<Timeframe, MarketBar[]>>) {}

  async getBars(params: GetBarsParams): Promise<MarketBar[]> {
    this.requests.push(params);
    return (this.bars[params.timeframe] ?? []).filter(
      (b) => b.timestamp >= params.from && b.timestamp < params.to
    );
  }
}
