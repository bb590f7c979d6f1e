/**
 * Selection model: single pick or an insertion-ordered multi set,
 * compared with the caller's equality.
 */

import type { SelectionMode, SelectionState } from "../types.ts";

export class SelectionModel<T> {
  private single: T | null;
  private multiple: T[] = [];

  constructor(
    readonly mode: SelectionMode,
    private readonly isEqual: (a: T, b: T) => boolean,
    initial: { single: T | null; multiple: readonly T[] },
  ) {
    this.single = initial.single;
    for (const item of initial.multiple) {
      if (!this.contains(item)) this.multiple.push(item);
    }
  }

  isSelected(item: T): boolean {
    if (this.mode === "single") {
      return this.single !== null && this.isEqual(this.single, item);
    }
    return this.contains(item);
  }

  /** Single mode: replace the pick. */
  pick(item: T): void {
    this.single = item;
  }

  /**
   * Multiple mode: add when absent, remove when present. Returns true when
   * the item is selected afterwards. Re-adding moves an item to the end.
   */
  toggle(item: T): boolean {
    const idx = this.multiple.findIndex((m) => this.isEqual(m, item));
    if (idx >= 0) {
      this.multiple.splice(idx, 1);
      return false;
    }
    this.multiple.push(item);
    return true;
  }

  get selectedItem(): T | null {
    return this.single;
  }

  get selectedItems(): T[] {
    return [...this.multiple];
  }

  snapshot(): SelectionState<T> {
    return { single: this.single, multiple: [...this.multiple] };
  }

  private contains(item: T): boolean {
    return this.multiple.some((m) => this.isEqual(m, item));
  }
}
