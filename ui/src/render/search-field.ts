/**
 * Default search field: text input with a clear button that shows while
 * there is text. Enter submits immediately instead of waiting out the
 * debounce.
 */

import { el } from "./helpers.ts";
import { CLOSE_ICON, SEARCH_ICON } from "./icons.ts";

export interface SearchFieldOptions {
  placeholder: string;
  onSearch: (query: string) => void;
  onSubmit: () => void;
  onClear: () => void;
  /** Arrow/Enter handling for the list, forwarded from the input. */
  onNavigate?: (e: KeyboardEvent) => boolean;
}

export function renderSearchField(options: SearchFieldOptions): HTMLElement {
  const root = el("div", "dropdown-search");

  const icon = el("span", "dropdown-search-icon");
  icon.innerHTML = SEARCH_ICON;
  root.appendChild(icon);

  const input = el("input", "dropdown-search-input");
  input.type = "text";
  input.placeholder = options.placeholder;
  input.autocomplete = "off";
  input.setAttribute("aria-label", options.placeholder);
  root.appendChild(input);

  const clear = el("button", "dropdown-search-clear hidden");
  clear.type = "button";
  clear.title = "Clear";
  clear.innerHTML = CLOSE_ICON;
  root.appendChild(clear);

  const syncClear = () => clear.classList.toggle("hidden", input.value.length === 0);

  input.addEventListener("input", () => {
    syncClear();
    options.onSearch(input.value);
  });

  input.addEventListener("keydown", (e) => {
    if (options.onNavigate?.(e)) return;
    if (e.key === "Enter") {
      e.preventDefault();
      options.onSubmit();
    }
  });

  clear.addEventListener("click", (e) => {
    e.stopPropagation();
    input.value = "";
    syncClear();
    options.onClear();
    input.focus();
  });

  return root;
}
