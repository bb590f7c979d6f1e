import { el } from "./helpers.ts";

export function renderEmptyState(text: string): HTMLElement {
  const node = el("div", "empty-state", text);
  node.dataset["emptyState"] = "";
  return node;
}

export function renderLoadingSpinner(compact?: boolean): HTMLElement {
  const wrapper = el("div", compact ? "dropdown-loading compact" : "dropdown-loading");
  wrapper.setAttribute("role", "progressbar");
  wrapper.setAttribute("aria-busy", "true");
  wrapper.innerHTML = `<div class="spinner"></div>`;
  return wrapper;
}

export function renderErrorState(text: string, onRetry: () => void): HTMLElement {
  const wrapper = el("div", "dropdown-error");
  wrapper.setAttribute("role", "alert");
  wrapper.appendChild(el("span", "dropdown-error-text", text));

  const retry = el("button", "dropdown-retry", "Retry");
  retry.type = "button";
  retry.addEventListener("click", (e) => {
    e.stopPropagation();
    onRetry();
  });
  wrapper.appendChild(retry);
  return wrapper;
}
