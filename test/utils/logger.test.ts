import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from "../../src/utils/logger.js";

describe("logger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("writes scoped lines with metadata to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("debug");

    createLogger("executor").warn("Subtask failed", { id: "a" });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ \[WARN\] \[executor\] Subtask failed \{"id":"a"\}$/);
  });

  it("drops lines below the current level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("warn");

    const log = createLogger();
    log.info("hidden");
    log.error("shown");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toMatch(/\[ERROR\] shown$/);
  });

  it("silences everything at silent", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("silent");
    createLogger().error("nothing");
    expect(spy).not.toHaveBeenCalled();
  });

  it("recognises level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
