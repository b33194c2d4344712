/**
 * Type-safe event emitter
 */

export type EventHandler<T = unknown> = (data: T) => void;
export type Unsubscribe = () => void;

type ListenerMap<TEvents> = {
  [K in keyof TEvents]?: Set<EventHandler<TEvents[K]>>;
};

export class TypedEventEmitter<TEvents extends Record<string, unknown>> {
  private listeners: ListenerMap<TEvents> = {};

  /**
   * Register an event handler; the returned function removes it again
   */
  on<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Unsubscribe {
    let handlers = this.listeners[event];
    if (!handlers) {
      handlers = new Set();
      this.listeners[event] = handlers;
    }
    handlers.add(handler);
    return () => this.off(event, handler);
  }

  off<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): void {
    const handlers = this.listeners[event];
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        delete this.listeners[event];
      }
    }
  }

  emit<K extends keyof TEvents>(event: K, data: TEvents[K]): void {
    const handlers = this.listeners[event];
    if (handlers) {
      // Copy so handlers may unsubscribe while being called
      for (const handler of Array.from(handlers)) {
        handler(data);
      }
    }
  }

  once<K extends keyof TEvents>(event: K, handler: EventHandler<TEvents[K]>): Unsubscribe {
    const onceHandler: EventHandler<TEvents[K]> = (data) => {
      this.off(event, onceHandler);
      handler(data);
    };
    return this.on(event, onceHandler);
  }

  /**
   * Remove all listeners for an event, or for every event
   */
  removeAllListeners(event?: keyof TEvents): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  listenerCount(event: keyof TEvents): number {
    return this.listeners[event]?.size ?? 0;
  }
}
