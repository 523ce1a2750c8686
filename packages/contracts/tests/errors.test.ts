/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  SessionSweepError,
  InsufficientDataError,
  InvalidTransitionError,
  AmbiguousSweepError,
  ConfigurationError,
  InvalidInputError,
  isSessionSweepError,
  isInsufficientDataError,
  isInvalidTransitionError,
  isAmbiguousSweepError,
  isConfigurationError,
} from '../src/errors.js';
import { ok, err } from '../src/result.js';

describe('SessionSweepError', () => {
  it('should create error with code and message', () => {
    const error = new SessionSweepError('TEST_CODE', 'Test message');

    expect(error.name).toBe('SessionSweepError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.timestamp).toBeDefined();
    expect(error.stack).toBeDefined();
  });

  it('should include optional data', () => {
    const data = { foo: 'bar', count: 42 };
    const error = new SessionSweepError('TEST_CODE', 'Test message', data);

    expect(error.data).toEqual(data);
  });

  it('should have valid ISO timestamp', () => {
    const error = new SessionSweepError('TEST_CODE', 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new SessionSweepError('TEST_CODE', 'Test message', { key: 'value' });
    const json = error.toJSON();

    expect(json['name']).toBe('SessionSweepError');
    expect(json['code']).toBe('TEST_CODE');
    expect(json['message']).toBe('Test message');
    expect(json['data']).toEqual({ key: 'value' });
    expect(json['timestamp']).toBe(error.timestamp);
  });

  it('should be JSON stringifiable', () => {
    const error = new SessionSweepError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed: unknown = JSON.parse(JSON.stringify(error));

    expect(parsed).toMatchObject({ name: 'SessionSweepError', code: 'TEST_CODE', message: 'Test message' });
  });
});

describe('InsufficientDataError', () => {
  it('should carry required and received counts', () => {
    const error = new InsufficientDataError('Need more bars', {
      required: 12,
      received: 7,
      symbol: 'XAUUSD',
    });

    expect(error.name).toBe('InsufficientDataError');
    expect(error.code).toBe('INSUFFICIENT_DATA');
    expect(error.data.required).toBe(12);
    expect(error.data.received).toBe(7);
    expect(error.data.symbol).toBe('XAUUSD');
    expect(error).toBeInstanceOf(SessionSweepError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('InvalidTransitionError', () => {
  it('should record the rejected edge', () => {
    const error = new InvalidTransitionError('IDLE cannot move to ARMED', {
      from: 'IDLE',
      to: 'ARMED',
      reason: 'not-adjacent',
    });

    expect(error.code).toBe('INVALID_TRANSITION');
    expect(error.data.from).toBe('IDLE');
    expect(error.data.to).toBe('ARMED');
    expect(error.data.reason).toBe('not-adjacent');
  });
});

describe('AmbiguousSweepError and ConfigurationError', () => {
  it('should expose their codes', () => {
    const ambiguous = new AmbiguousSweepError('both sides', { barTime: 1, high: 2001, low: 1989 });
    const config = new ConfigurationError('bad config', { issues: ['minBarsForRange: too small'] });
    const input = new InvalidInputError('unsorted');

    expect(ambiguous.code).toBe('AMBIGUOUS_SWEEP');
    expect(config.code).toBe('CONFIGURATION');
    expect(config.data.issues).toEqual(['minBarsForRange: too small']);
    expect(input.code).toBe('INVALID_INPUT');
  });
});

describe('Type guards', () => {
  const insufficient = new InsufficientDataError('x', { required: 1, received: 0, symbol: 'X' });
  const transition = new InvalidTransitionError('x', { from: 'IDLE', to: 'ARMED', reason: 'x' });
  const ambiguous = new AmbiguousSweepError('x', { barTime: 0, high: 1, low: 0 });
  const config = new ConfigurationError('x', { issues: [] });

  it('should narrow each error class', () => {
    expect(isSessionSweepError(insufficient)).toBe(true);
    expect(isSessionSweepError(new Error('plain'))).toBe(false);
    expect(isInsufficientDataError(insufficient)).toBe(true);
    expect(isInsufficientDataError(transition)).toBe(false);
    expect(isInvalidTransitionError(transition)).toBe(true);
    expect(isAmbiguousSweepError(ambiguous)).toBe(true);
    expect(isConfigurationError(config)).toBe(true);
    expect(isConfigurationError('CONFIGURATION')).toBe(false);
  });
});

describe('Result helpers', () => {
  it('should build ok and err values', () => {
    expect(ok(5)).toEqual({ ok: true, value: 5 });
    const failure = err(new InvalidInputError('bad'));
    expect(failure.ok).toBe(false);
    expect(failure.error.code).toBe('INVALID_INPUT');
  });
});
