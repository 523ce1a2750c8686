/**
 * @fileoverview Type definitions for the session sweep logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Faults that stopped a session from processing a bar
 * - 'warn': Ignored input, rejected transitions, degraded data
 * - 'info': State transitions and lifecycle events
 * - 'debug': Per-bar detector decisions
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Output format. `json` emits one object per line; `pretty` is for terminals.
 */
export type LogFormat = 'json' | 'pretty';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/engine.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for file transport.
   * @example './logs/engine.log'
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Extra sink receiving formatted lines, e.g. a capture buffer.
   */
  stream?: NodeJS.WritableStream;

  /**
   * Suppress all output. Used by tests.
   * @default false
   */
  silent?: boolean;
}

/**
 * Structured log entry with standard fields.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;

  /** Trading symbol (e.g., "XAUUSD") */
  symbol?: string;

  /** Trading day, YYYY-MM-DD */
  trading_day?: string;

  /** Component or module name (typically from child logger) */
  component?: string;

  /** Session state before a transition */
  from_state?: string;

  /** Session state after a transition */
  to_state?: string;

  /** Bar open time the entry refers to (ISO 8601) */
  bar_time?: string;

  /** Operation duration in milliseconds */
  duration_ms?: number;

  /** Error code (when result is error) */
  error_code?: string;

  [key: string]: unknown;
}

/**
 * Child logger context fields.
 *
 * @example
 * ```typescript
 * const sessionLogger = logger.child({ component: 'session', symbol: 'XAUUSD' });
 * sessionLogger.info('Range attached'); // includes component and symbol
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  symbol?: string;
  trading_day?: string;
  [key: string]: unknown;
}

/**
 * Winston's Logger type, re-exported so consumers need not depend on winston.
 */
export type Logger = WinstonLogger;
