/**
 * Confluence Checker and indicator tests
 */

import { describe, it, expect } from 'vitest';
import type { MarketBar, RangeGrade, ReversalConfirmation, SweepDirection } from '@session-sweep/contracts';
import {
  createConfluenceChecker,
  rangeGradeGate,
  maxSpreadGate,
  newsBlackoutGate,
  auctionBlackoutGate,
  velocitySpikeGate,
  htfBiasGate,
  trendDayGate,
} from '../src/confluence.js';
import { simpleMovingAverage, averageTrueRange, classifyBias } from '../src/indicators.js';
import { startReversal } from '../src/reversal-confirmer.js';
import { at, makeRange } from './fixtures.js';

function confirmation(direction: SweepDirection = 'upside', grade?: RangeGrade): ReversalConfirmation {
  const range = makeRange(2000, 1990, grade ? { grade } : {});
  const breachPrice = direction === 'upside' ? 2000.6 : 1989.4;
  return {
    ...startReversal({
      symbol: 'XAUUSD',
      direction,
      breachPrice,
      breachTime: at('06:05'),
      breachClose: 1995,
      thresholdUsed: 0.5,
      range,
      extremePrice: breachPrice,
    }),
    status: 'confirmed',
    confirmedAt: at('06:10'),
  };
}

function rangeBar(minute: number, size: number): MarketBar {
  return { timestamp: at('06:00') + minute * 60_000, open: 1995, high: 1995 + size, low: 1995, close: 1995, volume: 10 };
}

const flat = Array.from({ length: 20 }, () => 100);
const rising = [...Array.from({ length: 19 }, () => 100), 110];
const falling = [...Array.from({ length: 19 }, () => 100), 90];

describe('createConfluenceChecker', () => {
  it('should pass with no gates', () => {
    expect(createConfluenceChecker().check(confirmation(), { asOf: at('06:10') })).toEqual({
      passed: true,
      failures: [],
    });
  });

  it('should collect failures in gate order', () => {
    const checker = createConfluenceChecker([maxSpreadGate(2), rangeGradeGate()]);
    const verdict = checker.check(confirmation('upside', 'NO_TRADE'), { asOf: at('06:10'), spreadPips: 2.5 });

    expect(verdict).toEqual({
      passed: false,
      failures: ['spread: spread 2.5 pips exceeds 2', 'range-grade: range graded NO_TRADE'],
    });
  });
});

describe('built-in gates', () => {
  const context = { asOf: at('06:10') };

  it('rangeGradeGate should pass tradable and ungraded ranges', () => {
    expect(rangeGradeGate().evaluate(confirmation('upside', 'NORMAL'), context)).toBeNull();
    expect(rangeGradeGate().evaluate(confirmation(), context)).toBeNull();
    expect(rangeGradeGate().evaluate(confirmation('upside', 'EXTREME'), context)).toBe('range graded EXTREME');
  });

  it('maxSpreadGate should accept the limit itself', () => {
    expect(maxSpreadGate(2).evaluate(confirmation(), { ...context, spreadPips: 2 })).toBeNull();
  });

  it('newsBlackoutGate should apply tiered buffers', () => {
    const gate = newsBlackoutGate(60, 30);
    const tier1 = { time: at('07:10'), tier: 1 as const, title: 'CPI' };
    const tier2 = { time: at('06:55'), tier: 2 as const, title: 'PMI' };

    expect(gate.evaluate(confirmation(), { ...context, news: [tier1] })).toBe('blackout around CPI');
    expect(gate.evaluate(confirmation(), { ...context, news: [tier2] })).toBeNull();
  });

  it('auctionBlackoutGate should block around auction times', () => {
    const gate = auctionBlackoutGate(['10:30', '15:00'], 15);

    expect(gate.evaluate(confirmation(), { asOf: at('10:40') })).toBe('auction blackout around 10:30 UTC');
    expect(gate.evaluate(confirmation(), { asOf: at('10:46') })).toBeNull();
    expect(gate.evaluate(confirmation(), { asOf: at('14:45') })).toBe('auction blackout around 15:00 UTC');
  });

  it('auctionBlackoutGate should reject malformed times', () => {
    expect(() => auctionBlackoutGate(['1030'])).toThrow('Invalid auction time');
  });

  it('velocitySpikeGate should compare the last bar with its baseline', () => {
    const gate = velocitySpikeGate(2, 5);
    const baseline = [0, 1, 2, 3, 4].map((m) => rangeBar(m, 1));

    expect(gate.evaluate(confirmation(), { ...context, microBars: [...baseline, rangeBar(5, 2.5)] })).toBe(
      'velocity 2.50x baseline'
    );
    expect(gate.evaluate(confirmation(), { ...context, microBars: [...baseline, rangeBar(5, 2)] })).toBeNull();
    expect(gate.evaluate(confirmation(), { ...context, microBars: baseline })).toBeNull();
  });

  it('htfBiasGate should block fading an aligned trend', () => {
    const gate = htfBiasGate();

    expect(gate.evaluate(confirmation('upside'), { ...context, d1Closes: rising, h4Closes: rising })).toBe(
      'fading a strong uptrend'
    );
    expect(gate.evaluate(confirmation('downside'), { ...context, d1Closes: falling, h4Closes: falling })).toBe(
      'fading a strong downtrend'
    );
    expect(gate.evaluate(confirmation('upside'), { ...context, d1Closes: rising, h4Closes: flat })).toBeNull();
    expect(gate.evaluate(confirmation('downside'), { ...context, d1Closes: rising, h4Closes: rising })).toBeNull();
  });

  it('trendDayGate should block counter-trend fades on high ADX', () => {
    const gate = trendDayGate(25);

    expect(gate.evaluate(confirmation('upside'), { ...context, adx: 30, h4Closes: rising })).toBe('ADX 30 above 25');
    expect(gate.evaluate(confirmation('upside'), { ...context, adx: 20, h4Closes: rising })).toBeNull();
    expect(gate.evaluate(confirmation('downside'), { ...context, adx: 30, h4Closes: rising })).toBeNull();
  });
});

describe('indicators', () => {
  it('simpleMovingAverage should average the last values', () => {
    expect(simpleMovingAverage([1, 2, 3, 4], 2)).toBe(3.5);
    expect(simpleMovingAverage([1], 2)).toBeNull();
  });

  it('averageTrueRange should include gaps from the previous close', () => {
    const bars: MarketBar[] = [
      { timestamp: 0, open: 10, high: 10.5, low: 9.5, close: 10, volume: 1 },
      { timestamp: 1, open: 10, high: 12, low: 9, close: 11, volume: 1 },
      { timestamp: 2, open: 11, high: 11.5, low: 10.5, close: 11, volume: 1 },
    ];

    expect(averageTrueRange(bars, 2)).toBe(2);
    expect(averageTrueRange(bars.slice(0, 2), 2)).toBeNull();
  });

  it('classifyBias should use the SMA band', () => {
    expect(classifyBias(rising)).toBe('bullish');
    expect(classifyBias(falling)).toBe('bearish');
    expect(classifyBias(flat)).toBe('neutral');
    expect(classifyBias([100, 110])).toBe('neutral');
  });
});
