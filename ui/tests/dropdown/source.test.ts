import { describe, test, expect, vi } from "vitest";
import { filterItems, isPaginated, loadPage } from "../../src/dropdown/source.ts";
import { FetchFailure } from "../../src/kernel/core/errors.ts";
import type { DataSource } from "../../src/types.ts";

const label = (s: string) => s;
const opts = { itemsPerPage: 2, label };

describe("filterItems", () => {
  test("empty query keeps everything in order", () => {
    const items = ["b", "a"];
    const out = filterItems(items, "", label);
    expect(out).toEqual(["b", "a"]);
    expect(out).not.toBe(items);
  });

  test("case-insensitive substring match", () => {
    expect(filterItems(["Apple", "Banana", "Cherry"], "AN", label)).toEqual(["Banana"]);
    expect(filterItems(["Apple", "Banana", "Cherry"], "e", label)).toEqual(["Apple", "Cherry"]);
  });
});

describe("isPaginated", () => {
  test("only remote sources page", () => {
    expect(isPaginated<string>({ kind: "static", items: [] })).toBe(false);
    expect(isPaginated<string>({ kind: "remote", fetchPage: async () => [] })).toBe(true);
  });
});

describe("loadPage", () => {
  test("static source filters and never has more", async () => {
    const source: DataSource<string> = { kind: "static", items: ["Kiwi", "Lime", "Lemon"] };
    expect(await loadPage(source, 1, "le", opts)).toEqual({ items: ["Lemon"], hasMore: false });
  });

  test("remote source passes null for an empty query", async () => {
    const fetchPage = vi.fn(async () => ["a", "b"]);
    await loadPage({ kind: "remote", fetchPage }, 1, "", opts);
    expect(fetchPage).toHaveBeenCalledWith(1, null);
  });

  test("a full page means more may follow", async () => {
    const source: DataSource<string> = { kind: "remote", fetchPage: async () => ["a", "b"] };
    expect(await loadPage(source, 3, "q", opts)).toEqual({ items: ["a", "b"], hasMore: true });
  });

  test("a short page is the last", async () => {
    const source: DataSource<string> = { kind: "remote", fetchPage: async () => ["a"] };
    expect((await loadPage(source, 1, "", opts)).hasMore).toBe(false);
  });

  test("rejections become FetchFailure", async () => {
    const source: DataSource<string> = {
      kind: "remote",
      fetchPage: async () => {
        throw new Error("503");
      },
    };
    await expect(loadPage(source, 2, "q", opts)).rejects.toThrow(FetchFailure);
    await expect(loadPage(source, 2, "q", opts)).rejects.toThrow("Fetching page 2 failed: 503");
  });

  test("a synchronous throw from fetchPage is wrapped too", async () => {
    const source: DataSource<string> = {
      kind: "remote",
      fetchPage: () => {
        throw new Error("sync");
      },
    };
    await expect(loadPage(source, 1, "", opts)).rejects.toThrow("Fetching page 1 failed: sync");
  });
});
