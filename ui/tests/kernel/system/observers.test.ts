import { describe, test, expect, vi, afterEach } from "vitest";
import { ManagedObserversImpl } from "../../../src/kernel/system/observers.ts";
import { recordingLogger } from "../../helpers/mocks.ts";

/** Captures the callbacks handed to the observer constructors. */
function captureObservers() {
  const created: { kind: string; callback: (entries: never[]) => void; disconnect: ReturnType<typeof vi.fn> }[] = [];
  class FakeObserver {
    disconnect = vi.fn();
    constructor(kind: string, callback: (entries: never[]) => void) {
      created.push({ kind, callback, disconnect: this.disconnect });
    }
    observe() {}
    unobserve() {}
    takeRecords() { return []; }
  }
  vi.stubGlobal(
    "IntersectionObserver",
    class extends FakeObserver {
      constructor(cb: (entries: never[]) => void) { super("intersection", cb); }
    },
  );
  return created;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("ManagedObserversImpl", () => {
  test("intersection forwards entries", () => {
    const created = captureObservers();
    const obs = new ManagedObserversImpl(recordingLogger());
    const fn = vi.fn();
    obs.intersection(document.createElement("div"), fn);
    created[0]?.callback([]);
    expect(created[0]?.kind).toBe("intersection");
    expect(fn).toHaveBeenCalledWith([]);
  });

  test("a throwing callback is logged", () => {
    const created = captureObservers();
    const log = recordingLogger();
    const obs = new ManagedObserversImpl(log);
    obs.intersection(document.createElement("div"), () => {
      throw new Error("layout");
    });
    expect(() => created[0]?.callback([])).not.toThrow();
    expect(log.entries.map((e) => e.message)).toEqual(["IntersectionObserver callback threw:"]);
  });

  test("disposing one subscription disconnects it", () => {
    const created = captureObservers();
    const obs = new ManagedObserversImpl(recordingLogger());
    const sub = obs.intersection(document.createElement("div"), () => {});
    sub.dispose();
    expect(created[0]?.disconnect).toHaveBeenCalledTimes(1);
  });

  test("dispose disconnects everything", () => {
    const created = captureObservers();
    const obs = new ManagedObserversImpl(recordingLogger());
    obs.intersection(document.createElement("div"), () => {});
    obs.intersection(document.createElement("div"), () => {});
    obs.dispose();
    expect(created.map((c) => c.disconnect.mock.calls.length)).toEqual([1, 1]);
  });
});
