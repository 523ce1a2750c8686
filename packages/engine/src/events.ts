/**
 * Event bus for session transitions.
 *
 * Every applied transition is published here, in the order it was applied
 * for its session. Persistence and the execution collaborator (the one that
 * turns ARMED into an order) subscribe to it.
 */

import type { TransitionEvent } from '@session-sweep/contracts';
import type { Logger } from '@session-sweep/logger';

export type TransitionEventType = 'transition';

/**
 * Event listener callback for transition events.
 */
export type TransitionListener = (event: TransitionEvent) => void;

/**
 * Simple pub-sub bus for transition events.
 *
 * Listeners run synchronously. A throwing listener is logged and does not
 * stop the others or the session that emitted the event.
 *
 * Example:
 * ```typescript
 * const bus = new TransitionBus(logger);
 *
 * const unsubscribe = bus.on('transition', (event) => {
 *   if (event.toState === 'ARMED') {
 *     executor.submit(event);
 *   }
 * });
 *
 * // Later: stop listening
 * unsubscribe();
 * ```
 */
export class TransitionBus {
  private listeners: Map<TransitionEventType, TransitionListener[]>;

  constructor(private readonly logger: Logger) {
    this.listeners = new Map();
  }

  /**
   * Subscribe to transition events.
   *
   * @returns Unsubscribe function
   */
  on(eventType: TransitionEventType, listener: TransitionListener): () => void {
    const eventListeners = this.listeners.get(eventType) ?? [];
    eventListeners.push(listener);
    this.listeners.set(eventType, eventListeners);

    return () => {
      this.off(eventType, listener);
    };
  }

  off(eventType: TransitionEventType, listener: TransitionListener): void {
    const eventListeners = this.listeners.get(eventType) ?? [];
    const index = eventListeners.indexOf(listener);
    if (index !== -1) {
      eventListeners.splice(index, 1);
    }

    if (eventListeners.length === 0) {
      this.listeners.delete(eventType);
    } else {
      this.listeners.set(eventType, eventListeners);
    }
  }

  emit(eventType: TransitionEventType, event: TransitionEvent): void {
    // Snapshot so listeners may unsubscribe while being called
    const eventListeners = [...(this.listeners.get(eventType) ?? [])];

    for (const listener of eventListeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error('Transition listener failed', {
          kind: event.kind,
          from_state: event.fromState,
          to_state: event.toState,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  listenerCount(eventType: TransitionEventType): number {
    return this.listeners.get(eventType)?.length ?? 0;
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }
}
