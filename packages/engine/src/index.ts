/**
 * @fileoverview Main entry point for @session-sweep/engine package.
 *
 * Session state machine, registry and the engine facade that feeds bars
 * through the strategy detectors.
 *
 * @module @session-sweep/engine
 */

// Engine facade
export { SweepEngine, sessionSettingsFrom } from './engine.js';
export type { SweepEngineOptions, SyncResult, ActionResult } from './engine.js';

// Sessions
export { TradingSession } from './session.js';
export type {
  IgnoreReason,
  IngestOutcome,
  MarketContextProvider,
  MarketContextRequest,
  SessionSettings,
  TradingSessionOptions,
} from './session.js';
export { SessionRegistry } from './registry.js';
export type { SessionFactory } from './registry.js';

// State machine
export { TRANSITIONS, applyTransition, createSessionRecord, transitionKey } from './fsm.js';
export type { SessionCommand, SessionRecord, TransitionOutcome } from './fsm.js';

// Infrastructure
export { TransitionBus } from './events.js';
export type { TransitionEventType, TransitionListener } from './events.js';
export { SerialQueue } from './serial-queue.js';

// Configuration
export {
  loadConfig,
  parseConfig,
  getConfigSummary,
  toThresholdConfig,
  toReversalConfig,
  toRangeOptions,
  toWindowConfig,
  configSchema,
  envMapping,
} from './config/index.js';
export type { EngineConfig, EngineConfigInput, LoadConfigOptions } from './config/index.js';
