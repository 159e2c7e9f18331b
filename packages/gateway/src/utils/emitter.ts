/**
 * Lightweight typed event emitter with disposer-based subscription.
 *
 * - `on()` returns a disposer function (call it to unsubscribe).
 * - `emit()` calls handlers with try/catch per handler so one failure
 *   does not prevent subsequent handlers from running. Failures go to
 *   `onError`.
 * - Handler lists are replaced, never mutated (snapshot semantics:
 *   registration/removal during emit does not affect the current emit).
 */

export type EventMap = Record<string, unknown[]>;

export type EmitterErrorHandler = (error: unknown, event: string) => void;

export interface Emitter<E extends EventMap> {
  /** Subscribe to an event. Returns a disposer function. */
  on<K extends keyof E & string>(event: K, handler: (...args: E[K]) => void): () => void;
  /** Emit an event, calling all handlers with try/catch isolation. */
  emit<K extends keyof E & string>(event: K, ...args: E[K]): void;
  /** Remove all handlers for a specific event, or all events if omitted. */
  clear(event?: keyof E & string): void;
}

type HandlerTable<E extends EventMap> = {
  [K in keyof E]?: readonly ((...args: E[K]) => void)[];
};

/**
 * Create a new typed emitter. `onError` receives every handler failure.
 */
export function createEmitter<E extends EventMap>(onError: EmitterErrorHandler): Emitter<E> {
  let handlers: HandlerTable<E> = {};

  return {
    on<K extends keyof E & string>(event: K, handler: (...args: E[K]) => void): () => void {
      handlers[event] = [...(handlers[event] ?? []), handler];

      let disposed = false;
      return () => {
        if (disposed) return;
        disposed = true;
        handlers[event] = (handlers[event] ?? []).filter((h) => h !== handler);
      };
    },

    emit<K extends keyof E & string>(event: K, ...args: E[K]): void {
      const list = handlers[event];
      if (!list || list.length === 0) return;
      for (const handler of list) {
        try {
          handler(...args);
        } catch (error) {
          onError(error, event);
        }
      }
    },

    clear(event?: keyof E & string): void {
      if (event !== undefined) {
        delete handlers[event];
      } else {
        handlers = {};
      }
    },
  };
}
