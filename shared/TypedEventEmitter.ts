import { relayLogger } from './RelayLogger';

export type EventHandler<T> = (payload: T) => void;

type HandlerTable<Events> = { [E in keyof Events]?: Set<EventHandler<Events[E]>> };

// Type-safe event emitter keyed by an event → payload map
export class TypedEventEmitter<Events extends object> {
  private handlers: HandlerTable<Events> = {};

  // Register event handler; returns a function that removes it
  on<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): () => void {
    let handlers = this.handlers[event];
    if (!handlers) {
      handlers = new Set<EventHandler<Events[E]>>();
      this.handlers[event] = handlers;
    }
    handlers.add(handler);
    return () => this.off(event, handler);
  }

  // Remove event handler
  off<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): void {
    const handlers = this.handlers[event];
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        delete this.handlers[event];
      }
    }
  }

  // Register one-time event handler
  once<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): () => void {
    const wrappedHandler: EventHandler<Events[E]> = (payload) => {
      this.off(event, wrappedHandler);
      handler(payload);
    };
    return this.on(event, wrappedHandler);
  }

  // Emit event with payload
  emit<E extends keyof Events>(event: E, payload: Events[E]): void {
    const handlers = this.handlers[event];
    if (handlers) {
      [...handlers].forEach(handler => {
        try {
          handler(payload);
        } catch (error) {
          relayLogger.error(`Error in event handler for ${String(event)}`, error, 'EVENTS');
        }
      });
    }
  }

  // Remove all handlers
  removeAllListeners(event?: keyof Events): void {
    if (event !== undefined) {
      delete this.handlers[event];
    } else {
      this.handlers = {};
    }
  }

  // Get listener count
  listenerCount(event: keyof Events): number {
    return this.handlers[event]?.size ?? 0;
  }
}
