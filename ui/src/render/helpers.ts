// -- DOM helpers --------------------------------------------------------------

export function el<K extends keyof HTMLElementTagNameMap>(
  tag: K,
  className?: string,
  text?: string,
): HTMLElementTagNameMap[K] {
  const node = document.createElement(tag);
  if (className) node.className = className;
  if (text) node.textContent = text;
  return node;
}

/** Replace all children of `parent` with `nodes`. */
export function replaceChildren(parent: HTMLElement, ...nodes: Node[]): void {
  while (parent.firstChild) parent.removeChild(parent.firstChild);
  for (const node of nodes) parent.appendChild(node);
}

// -- Labels -------------------------------------------------------------------

/** Header text: hint when empty, otherwise the label(s) of the selection. */
export function headerText<T>(
  selected: T | null,
  selectedItems: readonly T[],
  multiple: boolean,
  label: (item: T) => string,
  hint: string,
): string {
  if (multiple) {
    return selectedItems.length > 0 ? selectedItems.map(label).join(", ") : hint;
  }
  return selected !== null ? label(selected) : hint;
}
