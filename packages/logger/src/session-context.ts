/**
 * @fileoverview Session context propagation using AsyncLocalStorage.
 *
 * The engine runs every unit of work for a (symbol, trading day) inside a
 * session context, so log lines written anywhere below it carry both keys
 * without threading them through every call.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Session context structure
 */
export interface SessionContext {
  symbol: string;
  /** Trading day, YYYY-MM-DD */
  trading_day: string;

  [key: string]: unknown;
}

const sessionContextStorage = new AsyncLocalStorage<SessionContext>();

/**
 * Get the current session context, or undefined outside one.
 */
export function getSessionContext(): SessionContext | undefined {
  return sessionContextStorage.getStore();
}

/**
 * Execute a function within a session context. The context follows every
 * async operation started by the function.
 *
 * @example
 * ```typescript
 * await withSessionContext({ symbol: 'XAUUSD', trading_day: '2025-01-15' }, async () => {
 *   logger.info('Processing bar'); // includes symbol and trading_day
 * });
 * ```
 */
export async function withSessionContext<T>(
  context: SessionContext,
  fn: () => Promise<T> | T
): Promise<T> {
  return sessionContextStorage.run({ ...context }, fn);
}

/**
 * Synchronous variant of {@link withSessionContext}.
 */
export function withSessionContextSync<T>(context: SessionContext, fn: () => T): T {
  return sessionContextStorage.run({ ...context }, fn);
}

/**
 * Merge fields into the current session context.
 *
 * @returns false if not in a session context
 */
export function setSessionContext(fields: Record<string, unknown>): boolean {
  const context = sessionContextStorage.getStore();
  if (!context) {
    return false;
  }

  Object.assign(context, fields);
  return true;
}
