/**
 * Kernel types: infrastructure contracts shared by the controller,
 * the widget, and the renderers.
 */

// --- Disposable ---

export interface Disposable {
  dispose(): void;
}

// --- JSON Schema (subset used for option validation) ---

export interface JsonSchema {
  type: string;
  properties?: Record<string, JsonSchema & { description?: string }>;
  enum?: unknown[];
  minimum?: number;
  exclusiveMinimum?: number;
}

// --- EventBus ---

/** Maps event names to their payload types. */
export type EventMap = Record<string, unknown>;

export interface EventBus<E extends EventMap> {
  on<K extends keyof E & string>(event: K, handler: (data: E[K]) => void): Disposable;
  emit<K extends keyof E & string>(event: K, data: E[K]): void;
}

// --- Logger ---

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug?(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

// --- Managed timers / observers ---

export interface ManagedTimers {
  setTimeout(callback: () => void, ms: number): Disposable;
  requestAnimationFrame(callback: FrameRequestCallback): Disposable;
}

export interface ManagedObservers {
  intersection(target: Element, callback: (entries: IntersectionObserverEntry[]) => void, options?: IntersectionObserverInit): Disposable;
}
