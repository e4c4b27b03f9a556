import { describe, it, expect, vi, afterEach } from "vitest";

import { TypedEventEmitter } from "../events/emitter.js";

interface TestEvents {
  sample: (x: number, y: number) => void;
  done: (label: string) => void;
}

/** Concrete class exposing emit for testing. */
class TestEmitter extends TypedEventEmitter<TestEvents> {
  constructor() {
    super("TestEmitter");
  }

  public doEmit<E extends keyof TestEvents & string>(
    event: E,
    ...args: Parameters<TestEvents[E]>
  ): boolean {
    return this.emit(event, ...args);
  }
}

describe("TypedEventEmitter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("calls handlers in registration order with all arguments", () => {
    const emitter = new TestEmitter();
    const calls: string[] = [];
    emitter.on("sample", (x, y) => calls.push(`a:${x},${y}`));
    emitter.on("sample", (x, y) => calls.push(`b:${x},${y}`));
    emitter.doEmit("sample", 3, 4);
    expect(calls).toEqual(["a:3,4", "b:3,4"]);
  });

  it("returns false when nobody listens", () => {
    const emitter = new TestEmitter();
    expect(emitter.doEmit("done", "x")).toBe(false);
  });

  it("on() returns an unsubscribe function", () => {
    const emitter = new TestEmitter();
    const handler = vi.fn();
    const off = emitter.on("done", handler);
    off();
    emitter.doEmit("done", "ignored");
    expect(handler).not.toHaveBeenCalled();
    expect(emitter.listenerCount("done")).toBe(0);
  });

  it("off() is a no-op for unknown handlers", () => {
    const emitter = new TestEmitter();
    expect(() => emitter.off("done", () => {})).not.toThrow();
  });

  it("removeAllListeners clears one event or all", () => {
    const emitter = new TestEmitter();
    emitter.on("sample", () => {});
    emitter.on("done", () => {});
    emitter.removeAllListeners("sample");
    expect(emitter.listenerCount("sample")).toBe(0);
    expect(emitter.listenerCount("done")).toBe(1);
    emitter.removeAllListeners();
    expect(emitter.listenerCount("done")).toBe(0);
  });

  it("logs a throwing listener and keeps calling the rest", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const emitter = new TestEmitter();
    const after = vi.fn();
    const boom = new Error("boom");
    emitter.on("done", () => {
      throw boom;
    });
    emitter.on("done", after);

    expect(emitter.doEmit("done", "x")).toBe(true);
    expect(after).toHaveBeenCalledWith("x");
    expect(errorSpy).toHaveBeenCalledWith('TestEmitter: listener threw during "done"', boom);
  });

  it("a handler removed during emit still runs in that emit", () => {
    const emitter = new TestEmitter();
    const second = vi.fn();
    emitter.on("done", () => emitter.off("done", second));
    emitter.on("done", second);
    emitter.doEmit("done", "first");
    emitter.doEmit("done", "second");
    expect(second).toHaveBeenCalledTimes(1);
  });
});
