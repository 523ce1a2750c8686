/**
 * Configuration loading and management
 */

import { readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { ZodError } from 'zod';
import { ConfigurationError, type ReversalConfig, type SessionWindowConfig } from '@session-sweep/contracts';
import type { Logger } from '@session-sweep/logger';
import type { RangeOptions, SweepThresholdConfig } from '@session-sweep/strategy';
import { configSchema, envMapping, type EngineConfig, type EngineConfigInput } from './schema.js';

type ConfigValue = string | number | boolean | ConfigTree;
interface ConfigTree {
  [key: string]: ConfigValue;
}

export interface LoadConfigOptions {
  /** Variables to read. Defaults to process.env */
  env?: Record<string, string | undefined>;
  /** Optional .env file; variables in `env` take precedence */
  envFile?: string;
  logger?: Logger;
}

/**
 * Validate a configuration object and fill in defaults.
 *
 * @throws {ConfigurationError} When the input is invalid
 */
export function parseConfig(input: EngineConfigInput | ConfigTree): EngineConfig {
  const result = configSchema.safeParse(input);

  if (!result.success) {
    throw toConfigurationError(result.error);
  }

  return result.data;
}

/**
 * Load configuration from environment and defaults
 *
 * @throws {ConfigurationError} When a variable is invalid or the sweep threshold is missing
 */
export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
  const { env = process.env, envFile, logger } = options;
  const fileEnv = envFile ? dotenv.parse(readFileSync(envFile)) : {};
  const rawConfig: ConfigTree = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey] ?? fileEnv[envKey];
    if (value !== undefined) {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const config = parseConfig(rawConfig);

  if (logger) {
    logger.info('Configuration loaded', getConfigSummary(config));
  }

  return config;
}

/**
 * Sweep threshold settings in the form the detector takes
 */
export function toThresholdConfig(config: EngineConfig): SweepThresholdConfig {
  const { sweep } = config;

  if (sweep.dynamic && sweep.pipSize !== undefined) {
    return {
      mode: 'dynamic',
      pipSize: sweep.pipSize,
      floorPips: sweep.floorPips,
      rangeFraction: sweep.rangeFraction,
      atrMultiple: sweep.atrMultiple,
    };
  }
  if (sweep.thresholdPrice !== undefined) {
    return { mode: 'price', price: sweep.thresholdPrice };
  }
  if (sweep.thresholdPips !== undefined && sweep.pipSize !== undefined) {
    return { mode: 'pips', pips: sweep.thresholdPips, pipSize: sweep.pipSize };
  }

  throw new ConfigurationError('Sweep threshold is not configured', {
    issues: ['sweep: set thresholdPrice, thresholdPips with pipSize, or dynamic'],
  });
}

export function toReversalConfig(config: EngineConfig): ReversalConfig {
  const { lookaheadBars, lookaheadMinutes, acceptanceOutsideCloses, ...rest } = config.reversal;
  return {
    ...rest,
    lookaheadBars: lookaheadBars > 0 ? lookaheadBars : undefined,
    lookaheadMinutes: lookaheadMinutes > 0 ? lookaheadMinutes : undefined,
    acceptanceOutsideCloses: acceptanceOutsideCloses > 0 ? acceptanceOutsideCloses : undefined,
  };
}

export function toRangeOptions(config: EngineConfig): RangeOptions {
  return { minBars: config.session.minBarsForRange, pipSize: config.sweep.pipSize };
}

export function toWindowConfig(config: EngineConfig): SessionWindowConfig {
  return { start: config.session.start, end: config.session.end };
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: EngineConfig): Record<string, unknown> {
  return {
    session: `${config.session.start}-${config.session.end} UTC`,
    timeframes: `${config.timeframes.primary}/${config.timeframes.micro}`,
    threshold: toThresholdConfig(config).mode,
    tieBreak: config.sweep.tieBreak,
    oppositePolicy: config.sweep.oppositePolicy,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
    },
  };
}

function toConfigurationError(error: ZodError): ConfigurationError {
  const issues = error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
  return new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: ConfigTree, path: string, value: ConfigValue): void {
  const keys = path.split('.');
  let current = obj;

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i];
    if (!key) continue;
    const next = current[key];
    if (typeof next === 'object') {
      current = next;
    } else {
      const child: ConfigTree = {};
      current[key] = child;
      current = child;
    }
  }

  const lastKey = keys[keys.length - 1];
  if (lastKey) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): string | number | boolean {
  // Boolean
  if (value === 'true') return true;
  if (value === 'false') return false;

  // Number
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  // String
  return value;
}

// Re-export types
export type { EngineConfig, EngineConfigInput } from './schema.js';
export { configSchema, envMapping } from './schema.js';
