/**
 * Overlay list body: picks one of loading / error / empty / rows from a
 * controller snapshot and renders it. Custom renderers win over the
 * defaults; a renderer that throws falls back to the default.
 */

import DOMPurify from "dompurify";
import type { DropdownRenderers, DropdownSnapshot } from "../types.ts";
import type { Logger } from "../kernel/types.ts";
import { errorBoundary } from "../kernel/core/errors.ts";
import { el } from "./helpers.ts";
import { renderEmptyState, renderErrorState, renderLoadingSpinner } from "./common.ts";
import { CHECKBOX_CHECKED_ICON, CHECKBOX_ICON, CHECK_ICON } from "./icons.ts";

export type ListView = "loading" | "error" | "empty" | "items";

export interface ListBodyOptions<T> {
  snapshot: DropdownSnapshot<T>;
  label: (item: T) => string;
  isSelected: (item: T) => boolean;
  /** Keyboard-highlighted row, -1 for none. */
  activeIndex: number;
  listboxId: string;
  noResultsText: string;
  errorText: string;
  renderers: DropdownRenderers<T>;
  log: Logger;
  onTap: (item: T) => void;
  onRetry: () => void;
}

export interface ListBody {
  root: HTMLElement;
  view: ListView;
  /** Present while more pages can be loaded; scrolling it into view loads the next page. */
  sentinel: HTMLElement | null;
}

export function pickListView<T>(snapshot: DropdownSnapshot<T>): ListView {
  const { page } = snapshot;
  if (page.isLoading && page.items.length === 0) return "loading";
  if (page.hasError) return "error";
  if (page.items.length === 0) return "empty";
  return "items";
}

export function renderListBody<T>(opts: ListBodyOptions<T>): ListBody {
  const { snapshot, renderers, log } = opts;
  const root = el("div", "dropdown-body");
  const view = pickListView(snapshot);

  switch (view) {
    case "loading": {
      const custom = renderers.renderLoading;
      root.appendChild((custom && errorBoundary(log, "renderLoading", custom)) || renderLoadingSpinner());
      return { root, view, sentinel: null };
    }
    case "error": {
      const custom = renderers.renderError;
      const node = custom && errorBoundary(log, "renderError", () => custom(snapshot.page.error, opts.onRetry));
      root.appendChild(node || renderErrorState(opts.errorText, opts.onRetry));
      return { root, view, sentinel: null };
    }
    case "empty": {
      const custom = renderers.renderEmpty;
      const node = custom && errorBoundary(log, "renderEmpty", () => custom(snapshot.page.query));
      root.appendChild(node || renderEmptyState(opts.noResultsText));
      return { root, view, sentinel: null };
    }
    case "items":
      break;
  }

  const list = el("ul", "dropdown-list");
  list.id = opts.listboxId;
  list.setAttribute("role", "listbox");
  if (snapshot.mode === "multiple") list.setAttribute("aria-multiselectable", "true");

  snapshot.page.items.forEach((item, index) => {
    const selected = opts.isSelected(item);
    const onTap = () => opts.onTap(item);
    const custom = renderers.renderItem;
    const node =
      (custom && errorBoundary(log, "renderItem", () => custom(item, selected, onTap))) ||
      renderItemRow({
        label: opts.label(item),
        html: renderers.itemHtml ? errorBoundary(log, "itemHtml", () => renderers.itemHtml?.(item)) : undefined,
        selected,
        multiple: snapshot.mode === "multiple",
        onTap,
      });
    const row = el("li", "dropdown-row");
    row.setAttribute("role", "option");
    row.setAttribute("aria-selected", String(selected));
    row.dataset["index"] = String(index);
    if (index === opts.activeIndex) row.classList.add("active");
    row.appendChild(node);
    list.appendChild(row);
  });

  root.appendChild(list);

  // Trailing spinner while the next page is on its way.
  if (snapshot.page.isLoading && snapshot.page.hasMore) {
    root.appendChild(renderLoadingSpinner(true));
  }

  let sentinel: HTMLElement | null = null;
  if (!snapshot.page.isLoading && snapshot.page.hasMore) {
    sentinel = el("div", "dropdown-sentinel");
    sentinel.setAttribute("aria-hidden", "true");
    root.appendChild(sentinel);
  }

  return { root, view, sentinel };
}

export interface ItemRowOptions {
  label: string;
  /** Label HTML; sanitized before it touches the DOM. */
  html?: string;
  selected: boolean;
  multiple: boolean;
  onTap: () => void;
}

export function renderItemRow(opts: ItemRowOptions): HTMLElement {
  const row = el("div", "dropdown-item");
  if (opts.selected) row.classList.add("selected");

  if (opts.multiple) {
    const box = el("span", "dropdown-item-checkbox");
    box.innerHTML = opts.selected ? CHECKBOX_CHECKED_ICON : CHECKBOX_ICON;
    row.appendChild(box);
  }

  const text = el("span", "dropdown-item-label");
  if (opts.html !== undefined) {
    text.innerHTML = DOMPurify.sanitize(opts.html);
  } else {
    text.textContent = opts.label;
  }
  row.appendChild(text);

  // Single mode marks the pick with a trailing check.
  if (opts.selected && !opts.multiple) {
    const check = el("span", "dropdown-item-check");
    check.innerHTML = CHECK_ICON;
    row.appendChild(check);
  }

  row.addEventListener("click", (e) => {
    e.stopPropagation();
    opts.onTap();
  });
  return row;
}
