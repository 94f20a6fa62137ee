/**
 * Simple in-memory pub/sub event bus.
 * The governance service emits committed state changes here; the WebSocket
 * handler broadcasts them.
 */

export type EventType =
  | 'poll.created'
  | 'poll.voted'
  | 'poll.snapshot'
  | 'poll.ended'
  | 'poll.executed'
  | 'poll.expired'
  | 'stake.deposited'
  | 'stake.withdrawn'
  | 'config.updated';

export type EventCallback = (event: EventType, data: unknown) => void;

export type ListenerErrorHandler = (event: EventType, error: unknown) => void;

class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();
  private errorHandler: ListenerErrorHandler | null = null;

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Route listener failures somewhere visible. Without a handler they are
   * rethrown once every listener has run.
   */
  onListenerError(handler: ListenerErrorHandler | null): void {
    this.errorHandler = handler;
  }

  /**
   * Emit an event to all matching subscribers.
   */
  emit(event: EventType, data: unknown): void {
    const callbacks = [
      ...(this.listeners.get(event) ?? []),
      ...this.wildcardListeners,
    ];

    const failures: unknown[] = [];
    for (const cb of callbacks) {
      try {
        cb(event, data);
      } catch (error) {
        failures.push(error);
      }
    }

    if (failures.length === 0) return;
    if (!this.errorHandler) {
      throw failures[0];
    }
    for (const failure of failures) {
      this.errorHandler(event, failure);
    }
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
    this.errorHandler = null;
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
