import { describe, test, expect } from "vitest";
import { el, headerText, replaceChildren } from "../../src/render/helpers.ts";

describe("el", () => {
  test("creates a typed element with class and text", () => {
    const node = el("button", "dropdown-retry", "Retry");
    expect(node.tagName).toBe("BUTTON");
    expect(node.className).toBe("dropdown-retry");
    expect(node.textContent).toBe("Retry");
  });

  test("leaves class and text empty when omitted", () => {
    const node = el("span");
    expect(node.className).toBe("");
    expect(node.textContent).toBe("");
  });
});

describe("replaceChildren", () => {
  test("swaps out every child", () => {
    const parent = document.createElement("div");
    parent.append(document.createElement("i"), document.createElement("b"));
    const next = document.createElement("p");
    replaceChildren(parent, next);
    expect(parent.childNodes.length).toBe(1);
    expect(parent.firstChild).toBe(next);
  });

  test("with no nodes empties the parent", () => {
    const parent = document.createElement("div");
    parent.textContent = "old";
    replaceChildren(parent);
    expect(parent.childNodes.length).toBe(0);
  });
});

describe("headerText", () => {
  const label = (n: { name: string }) => n.name;

  test("single mode shows the hint until something is picked", () => {
    expect(headerText(null, [], false, label, "Select")).toBe("Select");
    expect(headerText({ name: "Kiwi" }, [], false, label, "Select")).toBe("Kiwi");
  });

  test("multiple mode joins labels in order", () => {
    expect(headerText(null, [{ name: "Kiwi" }, { name: "Lime" }], true, label, "Select")).toBe("Kiwi, Lime");
    expect(headerText(null, [], true, label, "Select")).toBe("Select");
  });

  test("multiple mode ignores the single pick", () => {
    expect(headerText({ name: "Kiwi" }, [], true, label, "Pick some")).toBe("Pick some");
  });
});
