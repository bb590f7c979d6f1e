import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import { ManagedTimersImpl } from "../../../src/kernel/system/timers.ts";
import { recordingLogger } from "../../helpers/mocks.ts";

let timers: ManagedTimersImpl;
let log: ReturnType<typeof recordingLogger>;

beforeEach(() => {
  vi.useFakeTimers();
  log = recordingLogger();
  timers = new ManagedTimersImpl("dropdown-test", log);
});

afterEach(() => {
  timers.dispose();
  vi.useRealTimers();
});

describe("ManagedTimersImpl — setTimeout", () => {
  test("fires after the delay", () => {
    const fn = vi.fn();
    timers.setTimeout(fn, 100);
    vi.advanceTimersByTime(99);
    expect(fn).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test("a fired timer frees its cap slot", () => {
    for (let i = 0; i < 19; i++) timers.setTimeout(() => {}, 100_000);
    timers.setTimeout(() => {}, 10);
    vi.advanceTimersByTime(10);
    expect(() => timers.setTimeout(() => {}, 1)).not.toThrow();
  });

  test("dispose before firing cancels it", () => {
    const fn = vi.fn();
    const d = timers.setTimeout(fn, 50);
    d.dispose();
    vi.advanceTimersByTime(100);
    expect(fn).not.toHaveBeenCalled();
  });

  test("a throwing callback is logged", () => {
    timers.setTimeout(() => {
      throw new Error("tick");
    }, 5);
    expect(() => vi.advanceTimersByTime(5)).not.toThrow();
    expect(log.entries.map((e) => e.message)).toEqual(["Timer callback threw:"]);
  });
});

describe("ManagedTimersImpl — limits and disposal", () => {
  test("throws at 20 active timers", () => {
    for (let i = 0; i < 20; i++) timers.setTimeout(() => {}, 100_000);
    expect(() => timers.setTimeout(() => {}, 1)).toThrow('Timer limit exceeded (20) for "dropdown-test".');
  });

  test("disposed timers free cap space", () => {
    const first = timers.setTimeout(() => {}, 100_000);
    for (let i = 0; i < 19; i++) timers.setTimeout(() => {}, 100_000);
    first.dispose();
    expect(() => timers.setTimeout(() => {}, 1)).not.toThrow();
  });

  test("requestAnimationFrame counts toward the cap", () => {
    for (let i = 0; i < 20; i++) timers.setTimeout(() => {}, 100_000);
    expect(() => timers.requestAnimationFrame(() => {})).toThrow(/limit exceeded/);
  });

  test("dispose cancels every pending callback", () => {
    const fn = vi.fn();
    timers.setTimeout(fn, 10);
    timers.setTimeout(fn, 20);
    timers.requestAnimationFrame(fn);

    timers.dispose();
    vi.advanceTimersByTime(100);
    expect(fn).not.toHaveBeenCalled();
  });
});
