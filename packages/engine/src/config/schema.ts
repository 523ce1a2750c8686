/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { Timeframe, timeframeToMinutes } from '@session-sweep/contracts';

const timeString = z
  .string()
  .regex(/^([01]?\d|2[0-3]):[0-5]\d$/, 'Expected HH:mm (UTC)');

/**
 * Engine configuration schema
 */
export const configSchema = z.object({
  session: z
    .object({
      start: timeString.default('00:00'),
      end: timeString.default('06:00'),
      minBarsForRange: z.number().int().min(1).default(12),
    })
    .default({}),

  timeframes: z
    .object({
      primary: z.nativeEnum(Timeframe).default(Timeframe.M5),
      micro: z.nativeEnum(Timeframe).default(Timeframe.M1),
    })
    .default({})
    .refine((tf) => timeframeToMinutes(tf.micro) < timeframeToMinutes(tf.primary), {
      message: 'micro timeframe must be finer than the primary timeframe',
    }),

  sweep: z
    .object({
      thresholdPrice: z.number().positive().optional(),
      thresholdPips: z.number().positive().optional(),
      pipSize: z.number().positive().optional(),
      dynamic: z.boolean().default(false),
      floorPips: z.number().positive().default(10),
      rangeFraction: z.number().positive().max(1).default(0.09),
      atrMultiple: z.number().nonnegative().default(0.5),
      atrPeriod: z.number().int().min(1).default(14),
      tieBreak: z.enum(['close-vs-midpoint', 'larger-excursion', 'reject']).default('close-vs-midpoint'),
      oppositePolicy: z.enum(['discard', 'supersede']).default('discard'),
    })
    .default({})
    .superRefine((sweep, ctx) => {
      if (sweep.dynamic) {
        if (sweep.pipSize === undefined) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'dynamic threshold requires pipSize' });
        }
        return;
      }
      if (sweep.thresholdPrice !== undefined) {
        return;
      }
      if (sweep.thresholdPips === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'set thresholdPrice, thresholdPips with pipSize, or dynamic',
        });
      } else if (sweep.pipSize === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'thresholdPips requires pipSize' });
      }
    }),

  reversal: z
    .object({
      /** 0 disables the bar budget */
      lookaheadBars: z.number().int().min(0).default(6),
      /** 0 disables the minute budget */
      lookaheadMinutes: z.number().int().min(0).default(30),
      displacementMinFraction: z.number().positive().default(0.5),
      displacementMaxBars: z.number().int().min(1).default(3),
      pivotLeftBars: z.number().int().min(1).default(2),
      pivotRightBars: z.number().int().min(1).default(2),
      /** Consecutive primary closes outside the range that mean breakout; 0 disables */
      acceptanceOutsideCloses: z.number().int().min(0).default(2),
    })
    .default({})
    .refine((r) => r.lookaheadBars > 0 || r.lookaheadMinutes > 0, {
      message: 'lookaheadBars or lookaheadMinutes must be set',
    }),

  lifecycle: z
    .object({
      confluenceMaxWaitMinutes: z.number().int().min(1).default(30),
      cooldownMinutes: z.number().int().min(0).default(60),
      retentionMinutes: z.number().int().min(0).default(120),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type EngineConfig = z.infer<typeof configSchema>;

/**
 * Input accepted by the schema, before defaults
 */
export type EngineConfigInput = z.input<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  SESSION_START_UTC: 'session.start',
  SESSION_END_UTC: 'session.end',
  MIN_BARS_FOR_RANGE: 'session.minBarsForRange',
  PRIMARY_TIMEFRAME: 'timeframes.primary',
  MICRO_TIMEFRAME: 'timeframes.micro',
  SWEEP_THRESHOLD_PRICE: 'sweep.thresholdPrice',
  SWEEP_THRESHOLD_PIPS: 'sweep.thresholdPips',
  PIP_SIZE: 'sweep.pipSize',
  SWEEP_THRESHOLD_DYNAMIC: 'sweep.dynamic',
  SWEEP_THRESHOLD_FLOOR_PIPS: 'sweep.floorPips',
  SWEEP_THRESHOLD_RANGE_FRACTION: 'sweep.rangeFraction',
  SWEEP_THRESHOLD_ATR_MULTIPLE: 'sweep.atrMultiple',
  TIE_BREAK_POLICY: 'sweep.tieBreak',
  OPPOSITE_SWEEP_POLICY: 'sweep.oppositePolicy',
  REVERSAL_LOOKAHEAD_BARS: 'reversal.lookaheadBars',
  REVERSAL_LOOKAHEAD_MINUTES: 'reversal.lookaheadMinutes',
  DISPLACEMENT_MIN_FRACTION: 'reversal.displacementMinFraction',
  DISPLACEMENT_MAX_BARS: 'reversal.displacementMaxBars',
  PIVOT_LEFT_BARS: 'reversal.pivotLeftBars',
  PIVOT_RIGHT_BARS: 'reversal.pivotRightBars',
  ACCEPTANCE_OUTSIDE_CLOSES_LIMIT: 'reversal.acceptanceOutsideCloses',
  CONFLUENCE_MAX_WAIT_MINUTES: 'lifecycle.confluenceMaxWaitMinutes',
  COOLDOWN_MINUTES: 'lifecycle.cooldownMinutes',
  SESSION_RETENTION_MINUTES: 'lifecycle.retentionMinutes',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
};
