import type { Logger, LogLevel } from "./kernel/types.ts";

/**
 * Remote page loader. `page` is 1-based; `query` is null when the search
 * field is empty. A page shorter than `itemsPerPage` ends pagination.
 */
export type FetchPage<T> = (page: number, query: string | null) => Promise<T[]>;

export type SelectionMode = "single" | "multiple";

/** Where items come from: a fixed list filtered in memory, or a page loader. */
export type DataSource<T> =
  | { kind: "static"; items: readonly T[] }
  | { kind: "remote"; fetchPage: FetchPage<T> };

/** Visible list state for one open overlay. */
export interface PageState<T> {
  items: readonly T[];
  /** Last page requested, 1-based. */
  page: number;
  hasMore: boolean;
  isLoading: boolean;
  hasError: boolean;
  /** The failure behind `hasError`, kept for custom error renderers. */
  error: unknown;
  /** Committed (post-debounce) search query. */
  query: string;
  /** Bumped on every effective search; results from older generations are dropped. */
  generation: number;
}

export interface SelectionState<T> {
  single: T | null;
  /** Insertion order of toggles. */
  multiple: readonly T[];
}

export interface DropdownSnapshot<T> {
  mode: SelectionMode;
  page: Readonly<PageState<T>>;
  selection: Readonly<SelectionState<T>>;
}

/** Events emitted by DropdownController. */
export type ControllerEvents<T> = {
  /** Any change to page or selection state. */
  state: DropdownSnapshot<T>;
  /** Multi-selection toggled; carries the full temporary set. */
  selectionchange: readonly T[];
  /** The overlay should close (single pick or confirmed multi-selection). */
  close: { reason: "select" | "confirm" };
};

// -- Options ------------------------------------------------------------------

export interface ControllerOptions<T> {
  /** Fixed item list, filtered locally. */
  items?: readonly T[];
  /** Remote page loader. Takes precedence over `items` when both are given. */
  fetchPage?: FetchPage<T>;
  /** Display label; also the text local search matches against. Default `String(item)`. */
  itemLabel?: (item: T) => string;
  /** Selection membership test. Default SameValueZero. */
  isEqual?: (a: T, b: T) => boolean;
  enableMultiSelection?: boolean;
  /** Page size threshold for `hasMore`. Default 10. */
  itemsPerPage?: number;
  /** Search quiet interval in ms. Default 500. */
  searchDebounceMs?: number;
  selectedItem?: T | null;
  selectedItems?: readonly T[];
  /** Single mode: fired once per pick. */
  onChanged?: (item: T | null) => void;
  /** Multiple mode: fired once per confirmation with the committed list. */
  onMultiChanged?: (items: T[]) => void;
  /** Multiple mode: fired on every toggle with the temporary set. */
  onSelectionChange?: (items: T[]) => void;
  /** Logger to use, or false to silence. Default: a console logger scoped to `id`. */
  logger?: Logger | false;
  logLevel?: LogLevel;
  /** Hash string arguments in log output. */
  redactLogs?: boolean;
  /** Used as the log scope and DOM id prefix. */
  id?: string;
}

/**
 * Render overrides. Each returns a node the widget inserts as-is; the
 * controller never looks at what they produce.
 */
export interface DropdownRenderers<T> {
  renderHeader?: (selected: T | null, selectedItems: readonly T[]) => HTMLElement;
  renderItem?: (item: T, isSelected: boolean, onTap: () => void) => HTMLElement;
  renderSearchField?: (onSearch: (query: string) => void, clear: () => void) => HTMLElement;
  renderLoading?: () => HTMLElement;
  renderError?: (error: unknown, retry: () => void) => HTMLElement;
  renderEmpty?: (query: string) => HTMLElement;
  /** HTML for an item's label, sanitized before insertion. Ignored when renderItem is set. */
  itemHtml?: (item: T) => string;
}

export interface DropdownOptions<T> extends ControllerOptions<T>, DropdownRenderers<T> {
  /** When false the header ignores clicks and renders dimmed. Default true. */
  enabled?: boolean;
  hintText?: string;
  searchHintText?: string;
  doneButtonText?: string;
  noResultsText?: string;
  errorText?: string;
  /** Overlay height in px; also the threshold for flipping above the header. Default 300. */
  dropdownHeight?: number;
}
