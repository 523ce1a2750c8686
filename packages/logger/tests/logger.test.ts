/**
 * @fileoverview Tests for logger creation, redaction and session context
 */

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { createLogger, createChildLogger, createSilentLogger } from '../src/createLogger.js';
import { redactSensitiveFields, isSensitiveFieldName } from '../src/formats.js';
import {
  withSessionContext,
  getSessionContext,
  setSessionContext,
  withSessionContextSync,
} from '../src/session-context.js';
import type { LoggerConfig } from '../src/types.js';

function captureStream(): { stream: Writable; lines: () => Array<Record<string, unknown>> } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  const lines = (): Array<Record<string, unknown>> =>
    chunks
      .join('')
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line): Record<string, unknown> => JSON.parse(line));
  return { stream, lines };
}

const flush = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 50));

describe('createLogger', () => {
  it('should create a logger with basic configuration', () => {
    const config: LoggerConfig = { level: 'info', json: true, console: false };
    const logger = createLogger(config);

    expect(logger.level).toBe('info');
  });

  it('should support all log levels', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];

    for (const level of levels) {
      expect(createLogger({ level, console: false }).level).toBe(level);
    }
  });

  it('should write JSON lines with custom fields and timestamp', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    logger.info('Range attached', { high: 2000, low: 1990 });
    await flush();

    const [entry] = lines();
    expect(entry?.['message']).toBe('Range attached');
    expect(entry?.['level']).toBe('info');
    expect(entry?.['high']).toBe(2000);
    expect(entry?.['low']).toBe(1990);
    expect(typeof entry?.['timestamp']).toBe('string');
  });

  it('should include child logger context', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    createChildLogger(logger, { component: 'registry' }).info('Session created');
    await flush();

    expect(lines()[0]?.['component']).toBe('registry');
  });

  it('should respect log level filtering', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'warn', json: true, console: false, stream });

    logger.debug('Debug message');
    logger.info('Info message');
    logger.warn('Warn message');
    logger.error('Error message');
    await flush();

    expect(lines().map((entry) => entry['message'])).toEqual(['Warn message', 'Error message']);
  });

  it('should emit nothing when silent', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'debug', json: true, console: false, silent: true, stream });

    logger.error('Hidden');
    await flush();

    expect(lines()).toEqual([]);
    expect(createSilentLogger().silent).toBe(true);
  });

  it('should redact secrets before writing', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    logger.info('Feed configured', { apiKey: 'test-secret', feed: { host: 'localhost', token: 'test-token' } });
    await flush();

    const [entry] = lines();
    expect(entry?.['apiKey']).toBe('[REDACTED]');
    expect(entry?.['feed']).toEqual({ host: 'localhost', token: '[REDACTED]' });
  });

  it('should inject session context fields', async () => {
    const { stream, lines } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    await withSessionContext({ symbol: 'XAUUSD', trading_day: '2025-01-15' }, () => {
      logger.info('Sweep detected');
    });
    await flush();

    const [entry] = lines();
    expect(entry?.['symbol']).toBe('XAUUSD');
    expect(entry?.['trading_day']).toBe('2025-01-15');
  });
});

describe('redactSensitiveFields', () => {
  it('should redact nested keys and leave others', () => {
    expect(
      redactSensitiveFields({ list: [{ password: 'x', n: 1 }], symbol: 'XAUUSD' })
    ).toEqual({ list: [{ password: '[REDACTED]', n: 1 }], symbol: 'XAUUSD' });
  });

  it('should match field names case-insensitively', () => {
    expect(isSensitiveFieldName('API_KEY')).toBe(true);
    expect(isSensitiveFieldName('thresholdUsed')).toBe(false);
  });
});

describe('session context', () => {
  it('should be undefined outside a context', () => {
    expect(getSessionContext()).toBeUndefined();
    expect(setSessionContext({ state: 'IDLE' })).toBe(false);
  });

  it('should carry merged fields inside a context', () => {
    const state = withSessionContextSync({ symbol: 'EURUSD', trading_day: '2025-01-16' }, () => {
      setSessionContext({ state: 'SWEPT' });
      return getSessionContext()?.['state'];
    });

    expect(state).toBe('SWEPT');
  });
});
