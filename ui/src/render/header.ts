/**
 * Dropdown header: the button that shows the current selection and
 * toggles the overlay.
 */

import { el } from "./helpers.ts";
import { CHEVRON_DOWN_ICON } from "./icons.ts";

export interface HeaderOptions {
  text: string;
  /** True when `text` is the hint rather than a selection. */
  isPlaceholder: boolean;
  enabled: boolean;
  expanded: boolean;
  /** Id of the listbox the header controls, for aria-controls. */
  listboxId: string;
}

export function renderHeader(options: HeaderOptions): HTMLButtonElement {
  const header = el("button", "dropdown-header");
  header.type = "button";
  header.disabled = !options.enabled;
  header.setAttribute("aria-haspopup", "listbox");
  header.setAttribute("aria-expanded", String(options.expanded));
  header.setAttribute("aria-controls", options.listboxId);
  if (!options.enabled) header.classList.add("disabled");

  const text = el("span", "dropdown-header-text", options.text);
  if (options.isPlaceholder) text.classList.add("placeholder");
  header.appendChild(text);

  const arrow = el("span", "dropdown-header-arrow");
  arrow.innerHTML = CHEVRON_DOWN_ICON;
  header.appendChild(arrow);

  return header;
}

/** Update an existing default header in place. */
export function updateHeader(header: HTMLElement, options: Pick<HeaderOptions, "text" | "isPlaceholder" | "expanded">): void {
  header.setAttribute("aria-expanded", String(options.expanded));
  const text = header.querySelector<HTMLElement>(".dropdown-header-text");
  if (!text) return;
  text.textContent = options.text;
  text.classList.toggle("placeholder", options.isPlaceholder);
}
