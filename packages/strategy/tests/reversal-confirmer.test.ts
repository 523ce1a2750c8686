/**
 * Reversal Confirmer tests
 *
 * Range 2000.0 / 1990.0 built over 00:00-06:00 UTC, threshold 0.5, swept by
 * the 06:05 bar at 2000.6.
 */

import { describe, it, expect } from 'vitest';
import type { MarketBar, ReversalConfig, SweepEvent } from '@session-sweep/contracts';
import { DEFAULT_REVERSAL_CONFIG, Timeframe } from '@session-sweep/contracts';
import {
  startReversal,
  evaluateReversal,
  expireReversalIfDue,
  type ReversalInput,
} from '../src/reversal-confirmer.js';
import { detectSweep } from '../src/sweep-detector.js';
import { CLOSE_BACK_BAR, MICRO_BARS, SWEEP_BAR, at, bar, makeRange } from './fixtures.js';

function referenceSweep(): SweepEvent {
  const result = detectSweep(makeRange(2000.0, 1990.0), SWEEP_BAR, 0.5);
  if (!result.ok || !result.value) {
    throw new Error('reference sweep not detected');
  }
  return result.value;
}

function input(primaryBars: MarketBar[], microBars: MarketBar[]): ReversalInput {
  return { primaryBars, microBars, primaryTimeframe: Timeframe.M5 };
}

/** Budget checks only, without the breakout filter */
const NO_ACCEPTANCE: ReversalConfig = { ...DEFAULT_REVERSAL_CONFIG, acceptanceOutsideCloses: undefined };

/** M1 bars up to 06:09 (swing low 1998.0 at 06:07) plus a breaking bar at `time` */
function microBreakAt(time: string): MarketBar[] {
  return [...MICRO_BARS.slice(0, 5), bar(time, 1998.4, 1998.5, 1996.8, 1997.0)];
}

/** M5 bar well inside the range */
function insideBar(time: string): MarketBar {
  return bar(time, 1995.0, 1996.0, 1994.0, 1995.0);
}

/** M5 bars from 06:10 that all close above the range */
function barsOutside(count: number): MarketBar[] {
  return Array.from({ length: count }, (_, i) => ({
    timestamp: at('06:10') + i * 300_000,
    open: 2000.8,
    high: 2001.5,
    low: 2000.5,
    close: 2001.0,
    volume: 100,
  }));
}

describe('evaluateReversal', () => {
  it('should confirm when all three checks pass', () => {
    const attempt = evaluateReversal(
      startReversal(referenceSweep()),
      input([SWEEP_BAR, CLOSE_BACK_BAR], MICRO_BARS),
      DEFAULT_REVERSAL_CONFIG
    );

    expect(attempt.status).toBe('confirmed');
    expect(attempt.confirmedAt).toBe(at('06:10'));
    expect(attempt.barsEvaluated).toBe(1);
    expect(attempt.closeBackInsideEvidence).toEqual({ at: at('06:10'), price: 1995.0, barsSinceSweep: 1 });
    expect(attempt.displacementEvidence).toEqual({
      at: at('06:10'),
      price: 1995.0,
      barsSinceSweep: 1,
      fraction: 1,
    });
    expect(attempt.structuralBreakEvidence).toEqual({
      at: at('06:10'),
      price: 1997.0,
      barsSinceSweep: 1,
      pivotPrice: 1998.0,
      pivotTime: at('06:07'),
      pivotType: 'low',
    });
  });

  it('should keep partial results and confirm once micro bars arrive', () => {
    const partial = evaluateReversal(
      startReversal(referenceSweep()),
      input([SWEEP_BAR, CLOSE_BACK_BAR], MICRO_BARS.slice(0, 5)),
      DEFAULT_REVERSAL_CONFIG
    );

    expect(partial.status).toBe('pending');
    expect(partial.closeBackInside).toBe(true);
    expect(partial.displacementOk).toBe(true);
    expect(partial.structuralBreak).toBe(false);
    expect(partial.lastMicroTime).toBe(at('06:09'));

    const confirmed = evaluateReversal(
      partial,
      input([SWEEP_BAR, CLOSE_BACK_BAR], MICRO_BARS),
      DEFAULT_REVERSAL_CONFIG
    );

    expect(confirmed.status).toBe('confirmed');
    expect(confirmed.confirmedAt).toBe(at('06:10'));
    expect(confirmed.barsEvaluated).toBe(1);
  });

  it('should be a no-op when re-evaluated with the same bars', () => {
    const bars = input([SWEEP_BAR, CLOSE_BACK_BAR], MICRO_BARS.slice(0, 5));
    const once = evaluateReversal(startReversal(referenceSweep()), bars, DEFAULT_REVERSAL_CONFIG);
    const twice = evaluateReversal(once, bars, DEFAULT_REVERSAL_CONFIG);

    expect(twice).toEqual(once);
  });

  it('should expire at the end of the bar budget', () => {
    const attempt = evaluateReversal(
      startReversal(referenceSweep()),
      input([SWEEP_BAR, ...barsOutside(8)], []),
      NO_ACCEPTANCE
    );

    expect(attempt.status).toBe('expired');
    expect(attempt.expiredAt).toBe(at('06:35'));
    expect(attempt.barsEvaluated).toBe(6);
    expect(attempt.closeBackInside).toBe(false);
    expect(attempt.sweep.extremePrice).toBe(2001.5);
  });

  it('should expire on the minute budget', () => {
    const config: ReversalConfig = { ...NO_ACCEPTANCE, lookaheadBars: undefined, lookaheadMinutes: 10 };
    const attempt = evaluateReversal(
      startReversal(referenceSweep()),
      input(barsOutside(3), []),
      config
    );

    expect(attempt.status).toBe('expired');
    expect(attempt.expiredAt).toBe(at('06:20'));
    expect(attempt.barsEvaluated).toBe(2);
  });

  it('should expire as a breakout after consecutive closes outside the range', () => {
    const attempt = evaluateReversal(
      startReversal(referenceSweep()),
      input([SWEEP_BAR, ...barsOutside(8)], []),
      DEFAULT_REVERSAL_CONFIG
    );

    expect(attempt.status).toBe('expired');
    expect(attempt.acceptanceOutside).toBe(true);
    expect(attempt.closesOutside).toBe(2);
    expect(attempt.expiredAt).toBe(at('06:15'));
    expect(attempt.barsEvaluated).toBe(2);
  });

  it('should count a sweep bar that closed outside the range', () => {
    const sweep: SweepEvent = { ...referenceSweep(), breachClose: 2000.4 };
    const attempt = evaluateReversal(startReversal(sweep), input(barsOutside(1), []), DEFAULT_REVERSAL_CONFIG);

    expect(startReversal(sweep).closesOutside).toBe(1);
    expect(attempt.status).toBe('expired');
    expect(attempt.acceptanceOutside).toBe(true);
    expect(attempt.expiredAt).toBe(at('06:10'));
  });

  it('should reset the outside count on a close back inside', () => {
    const primaryBars = [...barsOutside(1), insideBar('06:15'), bar('06:20', 2000.8, 2001.5, 2000.5, 2001.0)];
    const attempt = evaluateReversal(startReversal(referenceSweep()), input(primaryBars, []), DEFAULT_REVERSAL_CONFIG);

    expect(attempt.status).toBe('pending');
    expect(attempt.closesOutside).toBe(1);
    expect(attempt.acceptanceOutside).toBe(false);
  });

  it('should ignore a micro break after the last bar of the budget', () => {
    const config: ReversalConfig = { ...DEFAULT_REVERSAL_CONFIG, lookaheadBars: 2, lookaheadMinutes: undefined };
    const attempt = evaluateReversal(
      startReversal(referenceSweep()),
      input([SWEEP_BAR, CLOSE_BACK_BAR, insideBar('06:15')], microBreakAt('06:40')),
      config
    );

    expect(attempt.status).toBe('expired');
    expect(attempt.expiredAt).toBe(at('06:15'));
    expect(attempt.barsEvaluated).toBe(2);
    expect(attempt.displacementOk).toBe(true);
    expect(attempt.structuralBreak).toBe(false);
  });

  it('should confirm no earlier than the micro break', () => {
    const attempt = evaluateReversal(
      startReversal(referenceSweep()),
      input([SWEEP_BAR, CLOSE_BACK_BAR], microBreakAt('06:12')),
      DEFAULT_REVERSAL_CONFIG
    );

    expect(attempt.status).toBe('confirmed');
    expect(attempt.structuralBreakEvidence?.at).toBe(at('06:12'));
    expect(attempt.confirmedAt).toBe(at('06:12'));
  });

  it('should wait for the primary bar that spans a later micro break', () => {
    const micro = microBreakAt('06:30');
    const partial = evaluateReversal(
      startReversal(referenceSweep()),
      input([SWEEP_BAR, CLOSE_BACK_BAR], micro),
      DEFAULT_REVERSAL_CONFIG
    );

    expect(partial.status).toBe('pending');
    expect(partial.structuralBreak).toBe(false);
    expect(partial.lastMicroTime).toBe(at('06:09'));

    const primaryBars = [
      SWEEP_BAR,
      CLOSE_BACK_BAR,
      insideBar('06:15'),
      insideBar('06:20'),
      insideBar('06:25'),
      insideBar('06:30'),
    ];
    const confirmed = evaluateReversal(partial, input(primaryBars, micro), DEFAULT_REVERSAL_CONFIG);

    expect(confirmed.status).toBe('confirmed');
    expect(confirmed.confirmedAt).toBe(at('06:30'));
    expect(confirmed.barsEvaluated).toBe(5);
    expect(confirmed.structuralBreakEvidence?.barsSinceSweep).toBe(5);
  });

  it('should reject slow displacement and never un-pass close back inside', () => {
    const config: ReversalConfig = { ...DEFAULT_REVERSAL_CONFIG, displacementMaxBars: 1 };
    const primaryBars = [
      bar('06:10', 2000.2, 2000.3, 1998.8, 1999.0),
      bar('06:15', 1999.0, 1999.2, 1994.5, 1995.0),
      ...barsOutside(6).slice(2),
    ];

    const attempt = evaluateReversal(startReversal(referenceSweep()), input(primaryBars, MICRO_BARS), config);

    expect(attempt.status).toBe('expired');
    expect(attempt.closeBackInside).toBe(true);
    expect(attempt.closeBackInsideEvidence?.at).toBe(at('06:10'));
    expect(attempt.displacementOk).toBe(false);
  });

  it('should leave settled attempts unchanged', () => {
    const expired = evaluateReversal(
      startReversal(referenceSweep()),
      input(barsOutside(6), []),
      DEFAULT_REVERSAL_CONFIG
    );
    const again = evaluateReversal(
      expired,
      input([CLOSE_BACK_BAR], MICRO_BARS),
      DEFAULT_REVERSAL_CONFIG
    );

    expect(again).toBe(expired);
  });
});

describe('expireReversalIfDue', () => {
  it('should expire only after the minute budget', () => {
    const attempt = startReversal(referenceSweep());

    expect(expireReversalIfDue(attempt, at('06:35'), DEFAULT_REVERSAL_CONFIG)).toBe(attempt);

    const expired = expireReversalIfDue(attempt, at('06:36'), DEFAULT_REVERSAL_CONFIG);
    expect(expired.status).toBe('expired');
    expect(expired.expiredAt).toBe(at('06:36'));
  });
});
