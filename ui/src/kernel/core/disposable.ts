import type { Disposable, Logger } from "../types.ts";

/**
 * Collects Disposable instances and disposes all on dispose().
 * Items are released in reverse tracking order, so a later resource that
 * depends on an earlier one goes first.
 */
export class DisposableStore implements Disposable {
  private items: Disposable[] = [];
  private disposed = false;

  constructor(private readonly log?: Logger) {}

  track<T extends Disposable>(disposable: T): T {
    if (this.disposed) {
      // Store is gone: release the newcomer right away.
      this.release(disposable);
      return disposable;
    }
    this.items.push(disposable);
    return disposable;
  }

  /** Dispose a single tracked item early and stop tracking it. */
  untrack(disposable: Disposable): void {
    const idx = this.items.indexOf(disposable);
    if (idx < 0) return;
    this.items.splice(idx, 1);
    this.release(disposable);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const items = this.items.reverse();
    this.items = [];
    for (const item of items) {
      this.release(item);
    }
  }

  private release(item: Disposable): void {
    try {
      item.dispose();
    } catch (err) {
      if (this.log) this.log.error("dispose() threw:", err);
      else console.error("[dropdown] Disposable.dispose() threw:", err);
    }
  }
}
