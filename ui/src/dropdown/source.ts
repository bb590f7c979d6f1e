/**
 * Data source adapters: local filtering for static lists and page
 * fetching for remote loaders. Both resolve to the same page shape.
 */

import type { DataSource } from "../types.ts";
import { FetchFailure } from "../kernel/core/errors.ts";

export interface PageResult<T> {
  items: T[];
  hasMore: boolean;
}

/**
 * Case-insensitive substring match on labels. An empty query returns the
 * full list in original order.
 */
export function filterItems<T>(items: readonly T[], query: string, label: (item: T) => string): T[] {
  if (!query) return [...items];
  const needle = query.toLowerCase();
  return items.filter((item) => label(item).toLowerCase().includes(needle));
}

/** True when the source can serve more than one page. */
export function isPaginated<T>(source: DataSource<T>): boolean {
  return source.kind === "remote";
}

/**
 * Load one page. Static sources ignore `page` and never report more;
 * remote sources report more while a full page comes back.
 * Failures are rethrown as FetchFailure.
 */
export async function loadPage<T>(
  source: DataSource<T>,
  page: number,
  query: string,
  opts: { itemsPerPage: number; label: (item: T) => string },
): Promise<PageResult<T>> {
  if (source.kind === "static") {
    try {
      return { items: filterItems(source.items, query, opts.label), hasMore: false };
    } catch (err) {
      // A throwing itemLabel lands here.
      throw new FetchFailure(page, query, err);
    }
  }

  let items: T[];
  try {
    items = await source.fetchPage(page, query === "" ? null : query);
  } catch (err) {
    throw new FetchFailure(page, query, err);
  }
  if (!Array.isArray(items)) {
    throw new FetchFailure(page, query, new TypeError("fetchPage did not resolve to an array"));
  }
  return { items, hasMore: items.length >= opts.itemsPerPage };
}
