/**
 * Managed Observers: IntersectionObserver with
 * Disposable tracking, error boundaries, and auto-disconnect.
 */

import type { Disposable, Logger, ManagedObservers } from "../types.ts";

export class ManagedObserversImpl implements ManagedObservers, Disposable {
  private active = new Set<Disposable>();

  constructor(private readonly log: Logger) {}

  intersection(
    target: Element,
    callback: (entries: IntersectionObserverEntry[]) => void,
    options?: IntersectionObserverInit,
  ): Disposable {
    const observer = new IntersectionObserver((entries) => {
      try {
        callback(entries);
      } catch (err) {
        this.log.error("IntersectionObserver callback threw:", err);
      }
    }, options);
    observer.observe(target);
    return this.trackObserver(observer);
  }

  private trackObserver(observer: { disconnect(): void }): Disposable {
    const disposable: Disposable = {
      dispose: () => {
        observer.disconnect();
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
