// ============================================
// Event Bus - Type-Safe Local Pub/Sub
// ============================================

import type { GameEvent, GameEventType } from '@pong-arena/shared';

type EventOf<T extends GameEventType> = Extract<GameEvent, { type: T }>;
type EventHandler<T extends GameEventType> = (event: EventOf<T>) => void;
type Listener = (event: GameEvent) => void;

function isEventOf<T extends GameEventType>(event: GameEvent, type: T): event is EventOf<T> {
  return event.type === type;
}

/**
 * EventBus - how systems tell collaborators (score display, logging,
 * a renderer) about spawns, exits and score changes.
 */
export class EventBus {
  // Keyed by the caller's handler so off() can find the wrapped listener
  private handlers = new Map<GameEventType, Map<unknown, Listener>>();

  /**
   * Subscribe to an event (type-safe)
   * @returns unsubscribe function
   */
  on<T extends GameEventType>(type: T, handler: EventHandler<T>): () => void {
    let listeners = this.handlers.get(type);
    if (!listeners) {
      listeners = new Map();
      this.handlers.set(type, listeners);
    }
    listeners.set(handler, (event) => {
      if (isEventOf(event, type)) handler(event);
    });

    return () => this.off(type, handler);
  }

  /**
   * Subscribe to an event once (auto-unsubscribes after first call)
   */
  once<T extends GameEventType>(type: T, handler: EventHandler<T>): () => void {
    const wrappedHandler: EventHandler<T> = (event) => {
      this.off(type, wrappedHandler);
      handler(event);
    };
    return this.on(type, wrappedHandler);
  }

  off<T extends GameEventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  emit(event: GameEvent): void {
    const listeners = this.handlers.get(event.type);
    if (!listeners) return;

    // Copy so handlers may unsubscribe while we iterate
    for (const listener of [...listeners.values()]) {
      listener(event);
    }
  }

  /**
   * Clear all handlers (for shutdown/testing)
   */
  clear(): void {
    this.handlers.clear();
  }
}
