/**
 * @fileoverview Custom Winston formats.
 * Secret redaction, standard fields with session context injection, and
 * pretty-print output.
 */

import { format } from 'winston';
import { getSessionContext } from './session-context.js';

/**
 * Field names whose values never reach a transport. Matched case-insensitively.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/**
 * Core Winston fields that are never redacted.
 */
const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns a copy of a value with sensitive fields replaced, at any depth.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ feed: { apiKey: 'test-secret', host: 'localhost' } });
 * // { feed: { apiKey: '[REDACTED]', host: 'localhost' } }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }
  if (!isRecord(value)) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return result;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must run first in the chain.
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(info[key]);
  }
  return info;
});

/**
 * Winston format that adds a timestamp, expands errors, and injects
 * `symbol` and `trading_day` from the active session context.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),

  format.errors({ stack: true }),

  format((info) => {
    const context = getSessionContext();
    if (context) {
      if (info['symbol'] === undefined) {
        info['symbol'] = context.symbol;
      }
      if (info['trading_day'] === undefined) {
        info['trading_day'] = context.trading_day;
      }
    }
    return info;
  })()
);

/**
 * Winston format for human-readable output.
 *
 * @example
 * ```typescript
 * // [2025-01-15T06:05:00.000Z] info: Sweep detected symbol=XAUUSD trading_day=2025-01-15 direction="upside"
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, trading_day, ...rest } = info;

    const context: string[] = [];
    if (typeof component === 'string') context.push(`component=${component}`);
    if (typeof symbol === 'string') context.push(`symbol=${symbol}`);
    if (typeof trading_day === 'string') context.push(`trading_day=${trading_day}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['stack', 'splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    const stack = info['stack'];
    if (typeof stack === 'string') {
      return `${baseMsg}\n${stack}`;
    }

    return baseMsg;
  })
);
