import { describe, test, expect, vi, beforeEach } from "vitest";
import { EventBusImpl } from "../../../src/kernel/system/event-bus.ts";
import { recordingLogger } from "../../helpers/mocks.ts";

type Events = {
  picked: string;
  count: number;
};

let log: ReturnType<typeof recordingLogger>;
let bus: EventBusImpl<Events>;

beforeEach(() => {
  log = recordingLogger();
  bus = new EventBusImpl<Events>(log);
});

describe("EventBusImpl", () => {
  test("on + emit delivers the payload", () => {
    const fn = vi.fn();
    bus.on("picked", fn);
    bus.emit("picked", "Apple");
    expect(fn).toHaveBeenCalledWith("Apple");
  });

  test("events are independent", () => {
    const fn = vi.fn();
    bus.on("count", fn);
    bus.emit("picked", "Apple");
    expect(fn).not.toHaveBeenCalled();
  });

  test("dispose unsubscribes", () => {
    const fn = vi.fn();
    const sub = bus.on("picked", fn);
    sub.dispose();
    bus.emit("picked", "Apple");
    expect(fn).not.toHaveBeenCalled();
  });

  test("disposing one subscription keeps the others", () => {
    const first = vi.fn();
    const second = vi.fn();
    const sub = bus.on("picked", first);
    bus.on("picked", second);
    sub.dispose();
    bus.emit("picked", "Apple");
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledWith("Apple");
  });

  test("resubscribing after the last handler left still delivers", () => {
    const fn = vi.fn();
    bus.on("count", () => {}).dispose();
    bus.on("count", fn);
    bus.emit("count", 3);
    expect(fn).toHaveBeenCalledWith(3);
  });

  test("a throwing handler is logged and others still run", () => {
    const second = vi.fn();
    bus.on("picked", () => {
      throw new Error("bad");
    });
    bus.on("picked", second);
    bus.emit("picked", "x");
    expect(second).toHaveBeenCalledTimes(1);
    expect(log.entries.map((e) => e.message)).toEqual(['"picked" handler threw:']);
  });

  test("a handler added during emit waits for the next emit", () => {
    const late = vi.fn();
    bus.on("count", () => {
      bus.on("count", late);
    });
    bus.emit("count", 1);
    expect(late).not.toHaveBeenCalled();
    bus.emit("count", 2);
    expect(late).toHaveBeenCalledWith(2);
  });

  test("dispose drops all listeners", () => {
    const fn = vi.fn();
    bus.on("picked", fn);
    bus.on("count", fn);
    bus.dispose();
    bus.emit("picked", "x");
    bus.emit("count", 1);
    expect(fn).not.toHaveBeenCalled();
  });
});
