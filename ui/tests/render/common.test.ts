import { describe, test, expect, vi } from "vitest";
import { renderEmptyState, renderErrorState, renderLoadingSpinner } from "../../src/render/common.ts";

/**
 * Tests for render/common: renderEmptyState, renderLoadingSpinner, renderErrorState.
 */

describe("renderEmptyState", () => {
  test("creates a div with the empty-state class and text", () => {
    const el = renderEmptyState("No items found");
    expect(el.tagName).toBe("DIV");
    expect(el.className).toBe("empty-state");
    expect(el.textContent).toBe("No items found");
  });

  test("has data-empty-state attribute", () => {
    expect(renderEmptyState("Empty").hasAttribute("data-empty-state")).toBe(true);
  });
});

describe("renderLoadingSpinner", () => {
  test("full-height by default", () => {
    const el = renderLoadingSpinner();
    expect(el.className).toBe("dropdown-loading");
    expect(el.getAttribute("role")).toBe("progressbar");
    expect(el.querySelector(".spinner")).not.toBeNull();
  });

  test("compact variant for the list footer", () => {
    expect(renderLoadingSpinner(true).classList.contains("compact")).toBe(true);
  });
});

describe("renderErrorState", () => {
  test("shows the text with a retry button", () => {
    const el = renderErrorState("Failed to load items", () => {});
    expect(el.getAttribute("role")).toBe("alert");
    expect(el.querySelector(".dropdown-error-text")?.textContent).toBe("Failed to load items");
    expect(el.querySelector(".dropdown-retry")?.textContent).toBe("Retry");
  });

  test("retry click calls back without bubbling", () => {
    const onRetry = vi.fn();
    const outer = vi.fn();
    const parent = document.createElement("div");
    parent.addEventListener("click", outer);
    parent.appendChild(renderErrorState("x", onRetry));

    parent.querySelector<HTMLButtonElement>(".dropdown-retry")?.click();
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(outer).not.toHaveBeenCalled();
  });
});
