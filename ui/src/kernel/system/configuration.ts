/**
 * Option resolution: validates caller options once at construction and
 * fills in defaults. Everything downstream reads the resolved object.
 */

import type { ControllerOptions, DataSource, DropdownOptions, DropdownRenderers } from "../../types.ts";
import type { JsonSchema, Logger, LogLevel } from "../types.ts";
import { DropdownConfigError } from "../core/errors.ts";
import { validateValue } from "../core/schema-validator.ts";
import { createLogger, silentLogger } from "./log.ts";

export const DEFAULT_ITEMS_PER_PAGE = 10;
export const DEFAULT_SEARCH_DEBOUNCE_MS = 500;
export const DEFAULT_DROPDOWN_HEIGHT = 300;

const CONTROLLER_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    items: { type: "array" },
    fetchPage: { type: "function" },
    itemLabel: { type: "function" },
    isEqual: { type: "function" },
    enableMultiSelection: { type: "boolean" },
    itemsPerPage: { type: "integer", minimum: 1 },
    searchDebounceMs: { type: "integer", minimum: 0 },
    selectedItems: { type: "array" },
    onChanged: { type: "function" },
    onMultiChanged: { type: "function" },
    onSelectionChange: { type: "function" },
    logLevel: { type: "string", enum: ["debug", "info", "warn", "error"] },
    redactLogs: { type: "boolean" },
    id: { type: "string" },
  },
};

const WIDGET_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    enabled: { type: "boolean" },
    hintText: { type: "string" },
    searchHintText: { type: "string" },
    doneButtonText: { type: "string" },
    noResultsText: { type: "string" },
    errorText: { type: "string" },
    dropdownHeight: { type: "number", exclusiveMinimum: 0 },
  },
};

export interface ResolvedControllerConfig<T> {
  id: string;
  source: DataSource<T>;
  mode: "single" | "multiple";
  itemLabel: (item: T) => string;
  isEqual: (a: T, b: T) => boolean;
  itemsPerPage: number;
  searchDebounceMs: number;
  selectedItem: T | null;
  selectedItems: readonly T[];
  onChanged?: (item: T | null) => void;
  onMultiChanged?: (items: T[]) => void;
  onSelectionChange?: (items: T[]) => void;
  log: Logger;
}

export interface ResolvedDropdownConfig<T> extends ResolvedControllerConfig<T> {
  renderers: DropdownRenderers<T>;
  enabled: boolean;
  hintText: string;
  searchHintText: string;
  doneButtonText: string;
  noResultsText: string;
  errorText: string;
  dropdownHeight: number;
}

/** SameValueZero, the equality Array.prototype.includes uses. */
export function sameValueZero<T>(a: T, b: T): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

export function defaultLabel(item: unknown): string {
  return String(item);
}

let nextId = 1;

function resolveLogger(id: string, logger: Logger | false | undefined, level?: LogLevel, redact?: boolean): Logger {
  if (logger === false) return silentLogger;
  if (logger) return logger;
  return createLogger(id, { level, redact });
}

function resolveSource<T>(options: ControllerOptions<T>, log: Logger): DataSource<T> {
  const { items, fetchPage } = options;
  if (fetchPage) {
    if (items) log.warn("Both items and fetchPage given; items are ignored.");
    return { kind: "remote", fetchPage };
  }
  if (items) return { kind: "static", items: [...items] };
  throw new DropdownConfigError(["either items or fetchPage must be provided"]);
}

export function resolveControllerConfig<T>(options: ControllerOptions<T>): ResolvedControllerConfig<T> {
  const check = validateValue(CONTROLLER_SCHEMA, options);
  if (!check.valid) throw new DropdownConfigError(check.errors);

  const id = options.id ?? `dropdown-${nextId++}`;
  const log = resolveLogger(id, options.logger, options.logLevel, options.redactLogs);
  const source = resolveSource(options, log);

  return {
    id,
    source,
    mode: options.enableMultiSelection ? "multiple" : "single",
    itemLabel: options.itemLabel ?? defaultLabel,
    isEqual: options.isEqual ?? sameValueZero,
    itemsPerPage: options.itemsPerPage ?? DEFAULT_ITEMS_PER_PAGE,
    searchDebounceMs: options.searchDebounceMs ?? DEFAULT_SEARCH_DEBOUNCE_MS,
    selectedItem: options.selectedItem ?? null,
    selectedItems: options.selectedItems ? [...options.selectedItems] : [],
    onChanged: options.onChanged,
    onMultiChanged: options.onMultiChanged,
    onSelectionChange: options.onSelectionChange,
    log,
  };
}

export function resolveDropdownConfig<T>(options: DropdownOptions<T>): ResolvedDropdownConfig<T> {
  const check = validateValue(WIDGET_SCHEMA, options);
  if (!check.valid) throw new DropdownConfigError(check.errors);

  const base = resolveControllerConfig(options);
  return {
    ...base,
    renderers: {
      renderHeader: options.renderHeader,
      renderItem: options.renderItem,
      renderSearchField: options.renderSearchField,
      renderLoading: options.renderLoading,
      renderError: options.renderError,
      renderEmpty: options.renderEmpty,
      itemHtml: options.itemHtml,
    },
    enabled: options.enabled ?? true,
    hintText: options.hintText ?? "Select",
    searchHintText: options.searchHintText ?? "Search...",
    doneButtonText: options.doneButtonText ?? "Done",
    noResultsText: options.noResultsText ?? "No items found",
    errorText: options.errorText ?? "Failed to load items",
    dropdownHeight: options.dropdownHeight ?? DEFAULT_DROPDOWN_HEIGHT,
  };
}
