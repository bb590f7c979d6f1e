/**
 * Managed Timers: wraps setTimeout/rAF with error boundaries and
 * bulk disposal when the owning dropdown is torn down.
 *
 * Resource cap: 20 active timers per owner. A dropdown only ever holds a
 * debounce timer and a frame callback or two, so hitting the cap means
 * something is leaking.
 */

import type { Disposable, Logger, ManagedTimers } from "../types.ts";

const MAX_TIMERS = 20;

export class ManagedTimersImpl implements ManagedTimers, Disposable {
  private active = new Set<Disposable>();

  constructor(
    private readonly owner: string,
    private readonly log: Logger,
  ) {}

  private checkCap(): void {
    if (this.active.size >= MAX_TIMERS) {
      throw new Error(`Timer limit exceeded (${MAX_TIMERS}) for "${this.owner}".`);
    }
  }

  setTimeout(callback: () => void, ms: number): Disposable {
    this.checkCap();
    const id = globalThis.setTimeout(() => {
      this.active.delete(disposable);
      try {
        callback();
      } catch (err) {
        this.log.error("Timer callback threw:", err);
      }
    }, ms);
    const disposable: Disposable = {
      dispose: () => {
        globalThis.clearTimeout(id);
        this.active.delete(disposable);
      },
    };
    this.active.add(disposable);
    return disposable;
  }

  requestAnimationFrame(callback: FrameRequestCallback): Disposable {
    this.checkCap();
    const id = globalThis.requestAnimationFrame((time) => {
      this.active.delete(disposable);
      try {
        callback(time);
      } catch (err) {
        this.log.error("rAF callback threw:", err);
      }
    });
    const disposable: Disposable = {
      dispose: () => {
        globalThis.cancelAnimationFrame(id);
        this.active.delete(disposable);
      },
    };
    this.active.add(disposable);
    return disposable;
  }

  dispose(): void {
    for (const d of [...this.active]) {
      d.dispose();
    }
    this.active.clear();
  }
}
