/**
 * @fileoverview Public API exports for @session-sweep/logger
 */

// Core logger creation
export { createLogger, createChildLogger, createSilentLogger } from './createLogger.js';

// Formats and redaction
export {
  redactSecrets,
  redactSensitiveFields,
  isSensitiveFieldName,
  standardFields,
  prettyPrint,
} from './formats.js';

// Session context management
export {
  getSessionContext,
  withSessionContext,
  withSessionContextSync,
  setSessionContext,
} from './session-context.js';

// Type exports
export type {
  Logger,
  LoggerConfig,
  LogLevel,
  LogFormat,
  LogEntry,
  ChildLoggerContext,
} from './types.js';

export type { SessionContext } from './session-context.js';
