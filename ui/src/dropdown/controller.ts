/**
 * Selection & paging controller: owns the visible item list, the
 * loading/error flags, debounced search, load-more paging and the
 * selection set for one open overlay.
 *
 * Every fetch is tagged with the search generation it was started for.
 * A result (or failure) whose generation is no longer current is dropped
 * on arrival, so a slow response can never overwrite a newer search.
 * After dispose() every operation is a no-op and late results vanish.
 */

import type { ControllerEvents, ControllerOptions, DropdownSnapshot, PageState, SelectionMode } from "../types.ts";
import type { Disposable, Logger, ManagedTimers } from "../kernel/types.ts";
import { DisposableStore } from "../kernel/core/disposable.ts";
import { DropdownStateError, errorBoundary } from "../kernel/core/errors.ts";
import { EventBusImpl } from "../kernel/system/event-bus.ts";
import { ManagedTimersImpl } from "../kernel/system/timers.ts";
import { resolveControllerConfig } from "../kernel/system/configuration.ts";
import type { ResolvedControllerConfig } from "../kernel/system/configuration.ts";
import { SelectionModel } from "./selection.ts";
import { isPaginated, loadPage } from "./source.ts";
import { createPageState, resetForSearch } from "./state.ts";

export interface ControllerDeps {
  /** Timer source for the search debounce. Default: managed window timers. */
  timers?: ManagedTimers;
}

type CycleKind = "replace" | "append";

export class DropdownController<T> implements Disposable {
  private readonly state: PageState<T>;
  private readonly selection: SelectionModel<T>;
  private readonly events: EventBusImpl<ControllerEvents<T>>;
  private readonly store: DisposableStore;
  private readonly timers: ManagedTimers;
  private readonly log: Logger;

  private debounce: Disposable | null = null;
  private pendingQuery: string | null = null;
  /** What the failed cycle was doing, so retry() can repeat it. */
  private failedKind: CycleKind = "replace";
  private disposed = false;

  constructor(
    private readonly config: ResolvedControllerConfig<T>,
    deps: ControllerDeps = {},
  ) {
    this.log = config.log;
    this.store = new DisposableStore(this.log);
    this.events = this.store.track(new EventBusImpl<ControllerEvents<T>>(this.log));
    this.timers = deps.timers ?? this.store.track(new ManagedTimersImpl(config.id, this.log));
    this.state = createPageState<T>();
    this.selection = new SelectionModel<T>(config.mode, config.isEqual, {
      single: config.selectedItem,
      multiple: config.selectedItems,
    });
  }

  get mode(): SelectionMode {
    return this.config.mode;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** True while a debounced search is waiting to fire. */
  get hasPendingSearch(): boolean {
    return this.debounce !== null;
  }

  on<K extends keyof ControllerEvents<T> & string>(
    event: K,
    handler: (data: ControllerEvents<T>[K]) => void,
  ): Disposable {
    return this.events.on(event, handler);
  }

  getState(): DropdownSnapshot<T> {
    return {
      mode: this.config.mode,
      page: { ...this.state, items: [...this.state.items] },
      selection: this.selection.snapshot(),
    };
  }

  isSelected(item: T): boolean {
    return this.selection.isSelected(item);
  }

  // -- Loading ----------------------------------------------------------------

  /** Start the first fetch/filter cycle. Supersedes any cycle in flight. */
  initialize(initialQuery = ""): Promise<void> {
    if (this.disposed) return Promise.resolve();
    this.cancelPendingSearch();
    resetForSearch(this.state, initialQuery);
    return this.runCycle("replace");
  }

  /**
   * Debounced search. Only the last query of a burst fires; it starts a new
   * generation when it differs from the committed query.
   */
  search(query: string): void {
    if (this.disposed) return;
    this.debounce?.dispose();
    this.pendingQuery = query;
    this.debounce = this.timers.setTimeout(() => {
      this.debounce = null;
      void this.fireSearch();
    }, this.config.searchDebounceMs);
  }

  /** Fire a waiting debounced search now. */
  flushSearch(): Promise<void> {
    if (this.disposed || !this.debounce) return Promise.resolve();
    this.debounce.dispose();
    this.debounce = null;
    return this.fireSearch();
  }

  clearSearch(): void {
    this.search("");
  }

  /** Fetch and append the next page. No-op while loading or exhausted, and for static lists. */
  loadMore(): Promise<void> {
    if (this.disposed || this.state.isLoading || this.state.hasError || !this.state.hasMore) {
      return Promise.resolve();
    }
    if (!isPaginated(this.config.source)) return Promise.resolve();
    this.state.page++;
    return this.runCycle("append");
  }

  /** Repeat the failed fetch for the current page, query and generation. */
  retry(): Promise<void> {
    if (this.disposed || this.state.isLoading || !this.state.hasError) return Promise.resolve();
    return this.runCycle(this.failedKind);
  }

  // -- Selection --------------------------------------------------------------

  selectItem(item: T): void {
    if (this.disposed) return;

    if (this.config.mode === "single") {
      this.selection.pick(item);
      this.emitState();
      errorBoundary(this.log, "onChanged", () => this.config.onChanged?.(item));
      this.events.emit("close", { reason: "select" });
      return;
    }

    this.selection.toggle(item);
    const current = this.selection.selectedItems;
    this.emitState();
    this.events.emit("selectionchange", current);
    errorBoundary(this.log, "onSelectionChange", () => this.config.onSelectionChange?.(current));
  }

  /** Commit the temporary multi-selection and ask the overlay to close. */
  confirmMultiSelection(): void {
    if (this.disposed) return;
    if (this.config.mode !== "multiple") {
      throw new DropdownStateError("confirmMultiSelection() is only available in multiple mode.");
    }
    const committed = this.selection.selectedItems;
    errorBoundary(this.log, "onMultiChanged", () => this.config.onMultiChanged?.(committed));
    this.events.emit("close", { reason: "confirm" });
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.cancelPendingSearch();
    this.store.dispose();
  }

  // -- Internals --------------------------------------------------------------

  private cancelPendingSearch(): void {
    this.debounce?.dispose();
    this.debounce = null;
    this.pendingQuery = null;
  }

  private fireSearch(): Promise<void> {
    const query = this.pendingQuery;
    this.pendingQuery = null;
    if (this.disposed || query === null || query === this.state.query) return Promise.resolve();
    resetForSearch(this.state, query);
    this.log.debug?.("search committed", query);
    return this.runCycle("replace");
  }

  private isCurrent(generation: number): boolean {
    return !this.disposed && generation === this.state.generation;
  }

  private async runCycle(kind: CycleKind): Promise<void> {
    const { generation, page, query } = this.state;
    this.state.isLoading = true;
    this.state.hasError = false;
    this.state.error = null;
    this.emitState();

    try {
      const result = await loadPage(this.config.source, page, query, {
        itemsPerPage: this.config.itemsPerPage,
        label: this.config.itemLabel,
      });
      if (!this.isCurrent(generation)) {
        this.log.debug?.(`stale result discarded (generation ${generation}, page ${page})`);
        return;
      }
      this.state.items = kind === "append" ? [...this.state.items, ...result.items] : result.items;
      this.state.hasMore = result.hasMore;
    } catch (err) {
      if (!this.isCurrent(generation)) {
        this.log.debug?.(`stale failure discarded (generation ${generation}, page ${page})`);
        return;
      }
      // Query and detail go out as strings so a redacting logger hashes them.
      const detail = err instanceof Error ? err.message : String(err);
      this.log.warn(`Loading page ${page} failed (generation ${generation}):`, query, detail);
      this.failedKind = kind;
      this.state.hasError = true;
      this.state.error = err;
    }

    this.state.isLoading = false;
    this.emitState();
  }

  private emitState(): void {
    if (this.disposed) return;
    this.events.emit("state", this.getState());
  }
}

/** Resolve options and build a controller. Throws DropdownConfigError on bad options. */
export function createDropdownController<T>(
  options: ControllerOptions<T>,
  deps?: ControllerDeps,
): DropdownController<T> {
  return new DropdownController(resolveControllerConfig(options), deps);
}
