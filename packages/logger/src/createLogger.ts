/**
 * @fileoverview Logger factory.
 * Creates Winston logger instances with structured fields, secret redaction
 * and console, file or stream transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Engine started', { symbols: ['XAUUSD'] });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', json: false, filePath: './logs/engine.log' });
 *
 * const sessionLogger = logger.child({ component: 'session', symbol: 'XAUUSD' });
 * sessionLogger.debug('Bar ignored', { reason: 'duplicate' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    stream,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Order matters: redact first, then standard fields, then output format
  const logFormat = format.combine(
    redactSecrets(),
    standardFields,
    json ? format.json() : prettyPrint
  );

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: logFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(
      new winston.transports.Stream({
        stream,
        level,
        format: logFormat,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    exitOnError: false,
  });
}

/**
 * Creates a child logger that adds context fields to every entry.
 *
 * @example
 * ```typescript
 * const registryLogger = createChildLogger(logger, { component: 'registry' });
 * registryLogger.info('Session evicted', { symbol: 'XAUUSD', trading_day: '2025-01-14' });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * Logger that discards everything. Default for components created without one.
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'error', console: false, silent: true });
}
