import type { Disposable, EventBus, EventMap, Logger } from "../types.ts";

type Listeners<E extends EventMap> = { [K in keyof E]?: Set<(data: E[K]) => void> };

/** Typed synchronous event emitter. Handler errors are logged, not rethrown. */
export class EventBusImpl<E extends EventMap> implements EventBus<E>, Disposable {
  private listeners: Listeners<E> = {};

  constructor(private readonly log: Logger) {}

  on<K extends keyof E & string>(event: K, handler: (data: E[K]) => void): Disposable {
    const handlers: Set<(data: E[K]) => void> = this.listeners[event] ?? new Set();
    this.listeners[event] = handlers;
    handlers.add(handler);
    return {
      dispose: () => {
        handlers.delete(handler);
        if (handlers.size === 0 && this.listeners[event] === handlers) {
          delete this.listeners[event];
        }
      },
    };
  }

  emit<K extends keyof E & string>(event: K, data: E[K]): void {
    const handlers: Set<(data: E[K]) => void> | undefined = this.listeners[event];
    if (!handlers) return;
    for (const handler of [...handlers]) {
      try {
        handler(data);
      } catch (err) {
        this.log.error(`"${event}" handler threw:`, err);
      }
    }
  }

  dispose(): void {
    this.listeners = {};
  }
}
