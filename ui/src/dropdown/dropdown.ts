/**
 * Dropdown widget: header button plus an overlay with a search field,
 * a paged list and (in multiple mode) a Done button.
 *
 * The widget owns the committed selection. Each time the overlay opens it
 * builds a fresh DropdownController seeded from that selection; closing the
 * overlay disposes the controller together with its timers, observers and
 * listeners. A multi-selection that was never confirmed is dropped on close.
 */

import type { DropdownOptions, DropdownSnapshot } from "../types.ts";
import type { Disposable, Logger, ManagedObservers, ManagedTimers } from "../kernel/types.ts";
import { DisposableStore } from "../kernel/core/disposable.ts";
import { errorBoundary } from "../kernel/core/errors.ts";
import { ManagedObserversImpl } from "../kernel/system/observers.ts";
import { ManagedTimersImpl } from "../kernel/system/timers.ts";
import { resolveDropdownConfig } from "../kernel/system/configuration.ts";
import type { ResolvedDropdownConfig } from "../kernel/system/configuration.ts";
import { PopoverManager } from "../kernel/ui/popover.ts";
import { el, headerText, replaceChildren } from "../render/helpers.ts";
import { renderHeader, updateHeader } from "../render/header.ts";
import { renderSearchField } from "../render/search-field.ts";
import { renderListBody } from "../render/list.ts";
import { DropdownController } from "./controller.ts";

export interface DropdownDeps {
  timers?: ManagedTimers;
  /** Observer factory, one per open overlay. */
  createObservers?: (log: Logger) => ManagedObservers & Disposable;
}

/** Everything that lives only while the overlay is open. */
interface OpenSession<T> {
  controller: DropdownController<T>;
  store: DisposableStore;
  observers: ManagedObservers & Disposable;
  panel: HTMLElement;
  body: HTMLElement;
  popover: Disposable;
  sentinelWatch: Disposable | null;
  activeIndex: number;
}

export class Dropdown<T> implements Disposable {
  private readonly config: ResolvedDropdownConfig<T>;
  private readonly log: Logger;
  private readonly timers: ManagedTimers;
  private readonly popovers: PopoverManager;
  private readonly store: DisposableStore;
  private readonly createObservers: (log: Logger) => ManagedObservers & Disposable;

  private readonly root: HTMLElement;
  private header: HTMLElement;
  private selected: T | null;
  private selectedList: T[];
  private enabled: boolean;
  private session: OpenSession<T> | null = null;
  private disposed = false;

  constructor(
    private readonly host: HTMLElement,
    options: DropdownOptions<T>,
    deps: DropdownDeps = {},
  ) {
    this.config = resolveDropdownConfig(options);
    this.log = this.config.log;
    this.store = new DisposableStore(this.log);
    this.timers = deps.timers ?? this.store.track(new ManagedTimersImpl(this.config.id, this.log));
    this.popovers = new PopoverManager(this.timers);
    this.createObservers = deps.createObservers ?? ((log) => new ManagedObserversImpl(log));
    this.selected = this.config.selectedItem;
    this.selectedList = [...this.config.selectedItems];
    this.enabled = this.config.enabled;

    this.root = el("div", "dropdown");
    this.root.dataset["dropdownId"] = this.config.id;
    this.header = this.buildHeader();
    this.root.appendChild(this.header);
    this.host.appendChild(this.root);
  }

  get isOpen(): boolean {
    return this.session !== null;
  }

  get selectedItem(): T | null {
    return this.selected;
  }

  get selectedItems(): T[] {
    return [...this.selectedList];
  }

  /** The live controller while open; null when closed. */
  get controller(): DropdownController<T> | null {
    return this.session?.controller ?? null;
  }

  get element(): HTMLElement {
    return this.root;
  }

  toggle(): void {
    if (this.session) this.close();
    else this.open();
  }

  open(): void {
    if (this.disposed || !this.enabled || this.session) return;

    const store = new DisposableStore(this.log);
    const controller = store.track(
      new DropdownController<T>(
        {
          ...this.config,
          selectedItem: this.selected,
          selectedItems: this.selectedList,
          onChanged: (item) => this.commitSingle(item),
          onMultiChanged: (items) => this.commitMultiple(items),
        },
        { timers: this.timers },
      ),
    );
    const observers = store.track(this.createObservers(this.log));

    const panel = el("div", "dropdown-panel");
    if (this.config.mode === "multiple") panel.classList.add("multiple");
    panel.appendChild(this.buildSearchField(controller));
    const body = el("div", "dropdown-body-slot");
    panel.appendChild(body);
    if (this.config.mode === "multiple") panel.appendChild(this.buildDoneButton(controller));

    const popover = this.popovers.showPopover(this.config.id, {
      anchor: this.header,
      content: panel,
      height: this.config.dropdownHeight,
      onDismiss: () => this.teardown(),
    });

    const session: OpenSession<T> = {
      controller,
      store,
      observers,
      panel,
      body,
      popover,
      sentinelWatch: null,
      activeIndex: -1,
    };
    this.session = session;

    store.track(controller.on("state", (snapshot) => this.renderBody(session, snapshot)));
    store.track(controller.on("close", () => this.close()));

    this.refreshHeader();
    // initialize() flips to loading synchronously, which renders the first body.
    void controller.initialize();
    panel.querySelector<HTMLInputElement>(".dropdown-search-input")?.focus();
  }

  close(): void {
    // Disposing the popover runs teardown() through onDismiss.
    this.session?.popover.dispose();
  }

  /** Replace the committed single selection from outside (e.g. form reset). */
  setSelectedItem(item: T | null): void {
    this.selected = item;
    this.refreshHeader();
  }

  /** Replace the committed multi-selection from outside. */
  setSelectedItems(items: readonly T[]): void {
    this.selectedList = [...items];
    this.refreshHeader();
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled) this.close();
    this.replaceHeader();
  }

  dispose(): void {
    if (this.disposed) return;
    this.close();
    this.disposed = true;
    this.store.dispose();
    this.root.remove();
  }

  // -- Selection commits ------------------------------------------------------

  private commitSingle(item: T | null): void {
    this.selected = item;
    this.refreshHeader();
    errorBoundary(this.log, "onChanged", () => this.config.onChanged?.(item));
  }

  private commitMultiple(items: T[]): void {
    this.selectedList = [...items];
    this.refreshHeader();
    errorBoundary(this.log, "onMultiChanged", () => this.config.onMultiChanged?.(items));
  }

  // -- Header -----------------------------------------------------------------

  private headerState(): { text: string; isPlaceholder: boolean } {
    const multiple = this.config.mode === "multiple";
    const isPlaceholder = multiple ? this.selectedList.length === 0 : this.selected === null;
    const text = headerText(this.selected, this.selectedList, multiple, this.config.itemLabel, this.config.hintText);
    return { text, isPlaceholder };
  }

  private buildHeader(): HTMLElement {
    const custom = this.config.renderers.renderHeader;
    const customNode = custom && errorBoundary(this.log, "renderHeader", () => custom(this.selected, this.selectedList));
    const header =
      customNode ||
      renderHeader({
        ...this.headerState(),
        enabled: this.enabled,
        expanded: this.session !== null,
        listboxId: `${this.config.id}-listbox`,
      });
    if (customNode && !this.enabled) customNode.classList.add("disabled");
    header.addEventListener("click", () => {
      if (this.enabled) this.toggle();
    });
    return header;
  }

  private replaceHeader(): void {
    const next = this.buildHeader();
    this.header.replaceWith(next);
    this.header = next;
  }

  private refreshHeader(): void {
    if (this.config.renderers.renderHeader) {
      // Custom headers are rebuilt; keep the popover anchored to the live node.
      if (!this.session) this.replaceHeader();
      return;
    }
    updateHeader(this.header, { ...this.headerState(), expanded: this.session !== null });
  }

  // -- Overlay ----------------------------------------------------------------

  private buildSearchField(controller: DropdownController<T>): HTMLElement {
    const custom = this.config.renderers.renderSearchField;
    const node =
      custom &&
      errorBoundary(this.log, "renderSearchField", () =>
        custom(
          (query) => this.search(controller, query),
          () => controller.clearSearch(),
        ),
      );
    if (node) return node;
    return renderSearchField({
      placeholder: this.config.searchHintText,
      onSearch: (query) => this.search(controller, query),
      onSubmit: () => void controller.flushSearch(),
      onClear: () => controller.clearSearch(),
      onNavigate: (e) => this.handleNavigation(e),
    });
  }

  /** A new query drops the highlight; its row belongs to the previous results. */
  private search(controller: DropdownController<T>, query: string): void {
    if (this.session) this.session.activeIndex = -1;
    controller.search(query);
  }

  private buildDoneButton(controller: DropdownController<T>): HTMLElement {
    const done = el("button", "dropdown-done", this.config.doneButtonText);
    done.type = "button";
    done.addEventListener("click", (e) => {
      e.stopPropagation();
      controller.confirmMultiSelection();
    });
    return done;
  }

  private renderBody(session: OpenSession<T>, snapshot: DropdownSnapshot<T>): void {
    if (this.session !== session) return;
    const { controller } = session;
    if (session.activeIndex >= snapshot.page.items.length) session.activeIndex = -1;

    const body = renderListBody({
      snapshot,
      label: this.config.itemLabel,
      isSelected: (item) => controller.isSelected(item),
      activeIndex: session.activeIndex,
      listboxId: `${this.config.id}-listbox`,
      noResultsText: this.config.noResultsText,
      errorText: this.config.errorText,
      renderers: this.config.renderers,
      log: this.log,
      onTap: (item) => controller.selectItem(item),
      onRetry: () => void controller.retry(),
    });

    // Keep scroll position across re-renders (load-more appends below).
    const scrollTop = session.body.scrollTop;
    replaceChildren(session.body, body.root);
    session.body.scrollTop = scrollTop;

    if (session.sentinelWatch) session.store.untrack(session.sentinelWatch);
    session.sentinelWatch = null;
    if (body.sentinel) {
      session.sentinelWatch = session.store.track(
        session.observers.intersection(
          body.sentinel,
          (entries) => {
            if (entries.some((entry) => entry.isIntersecting)) void controller.loadMore();
          },
          { root: session.body, rootMargin: "0px 0px 50px 0px" },
        ),
      );
    }
  }

  /** ArrowUp/ArrowDown move the highlight; Enter picks it. Returns true when handled. */
  private handleNavigation(e: KeyboardEvent): boolean {
    const session = this.session;
    if (!session) return false;
    const { items } = session.controller.getState().page;
    if (items.length === 0) return false;

    if (e.key === "ArrowDown" || e.key === "ArrowUp") {
      e.preventDefault();
      const step = e.key === "ArrowDown" ? 1 : -1;
      const start = session.activeIndex < 0 && step < 0 ? items.length : session.activeIndex;
      session.activeIndex = (start + step + items.length) % items.length;
      this.renderBody(session, session.controller.getState());
      session.body.querySelector(".dropdown-row.active")?.scrollIntoView?.({ block: "nearest" });
      return true;
    }

    if (e.key === "Enter" && session.activeIndex >= 0) {
      // Let Enter flush the pending query instead of picking from stale rows.
      if (session.controller.hasPendingSearch) return false;
      const item = items[session.activeIndex];
      if (item === undefined) return false;
      e.preventDefault();
      session.controller.selectItem(item);
      return true;
    }
    return false;
  }

  private teardown(): void {
    const session = this.session;
    if (!session) return;
    this.session = null;
    session.store.dispose();
    this.refreshHeader();
  }
}
