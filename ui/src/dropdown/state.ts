/**
 * Page state: one per open overlay.
 */

import type { PageState } from "../types.ts";

export function createPageState<T>(query = ""): PageState<T> {
  return {
    items: [],
    page: 1,
    hasMore: false,
    isLoading: false,
    hasError: false,
    error: null,
    query,
    generation: 0,
  };
}

/** Reset for a new search generation: page 1, empty list. */
export function resetForSearch<T>(state: PageState<T>, query: string): void {
  state.items = [];
  state.page = 1;
  state.hasMore = false;
  state.hasError = false;
  state.error = null;
  state.query = query;
  state.generation++;
}
