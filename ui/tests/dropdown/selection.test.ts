import { describe, test, expect } from "vitest";
import { SelectionModel } from "../../src/dropdown/selection.ts";
import { sameValueZero } from "../../src/kernel/system/configuration.ts";

const empty = { single: null, multiple: [] };

describe("SelectionModel — single", () => {
  test("pick replaces the selection", () => {
    const model = new SelectionModel<string>("single", sameValueZero, empty);
    model.pick("a");
    model.pick("b");
    expect(model.selectedItem).toBe("b");
    expect(model.isSelected("b")).toBe(true);
    expect(model.isSelected("a")).toBe(false);
  });

  test("nothing is selected initially", () => {
    const model = new SelectionModel<string>("single", sameValueZero, empty);
    expect(model.isSelected("a")).toBe(false);
    expect(model.snapshot()).toEqual({ single: null, multiple: [] });
  });
});

describe("SelectionModel — multiple", () => {
  test("toggle adds then removes and reports the result", () => {
    const model = new SelectionModel<string>("multiple", sameValueZero, empty);
    expect(model.toggle("a")).toBe(true);
    expect(model.toggle("a")).toBe(false);
    expect(model.selectedItems).toEqual([]);
  });

  test("keeps toggle order; re-adding moves to the end", () => {
    const model = new SelectionModel<string>("multiple", sameValueZero, { single: null, multiple: ["a", "b"] });
    model.toggle("a");
    model.toggle("a");
    expect(model.selectedItems).toEqual(["b", "a"]);
  });

  test("uses the given equality", () => {
    type Row = { id: number; name: string };
    const byId = (x: Row, y: Row) => x.id === y.id;
    const model = new SelectionModel<Row>("multiple", byId, { single: null, multiple: [{ id: 1, name: "old" }] });
    expect(model.isSelected({ id: 1, name: "renamed" })).toBe(true);
    model.toggle({ id: 1, name: "renamed" });
    expect(model.selectedItems).toEqual([]);
  });

  test("returned lists are copies", () => {
    const model = new SelectionModel<string>("multiple", sameValueZero, empty);
    model.toggle("a");
    model.selectedItems.push("x");
    expect(model.selectedItems).toEqual(["a"]);
  });
});
