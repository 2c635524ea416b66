import { describe, it, expect, vi, afterEach } from "vitest";
import { createLogger, getLogLevel, setLogLevel, withLogLevel } from "../log.ts";

describe("createLogger", () => {
  const initial = getLogLevel();
  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("writes category-tagged lines to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("debug");
    createLogger("mic").info("calibrated");
    expect(spy).toHaveBeenCalledTimes(1);
    const line = String(spy.mock.calls[0][0]);
    expect(line).toMatch(/\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[INFO\] \[mic\]/);
    expect(line.endsWith(" calibrated")).toBe(true);
  });

  it("passes data as JSON", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("debug");
    createLogger("stt").warn("slow", { ms: 900 });
    expect(spy.mock.calls[0][1]).toBe('{"ms":900}');
  });

  it("drops lines below the threshold", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("warn");
    const log = createLogger("x");
    log.debug("a");
    log.info("b");
    log.error("c");
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("silent drops everything", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("silent");
    createLogger("x").error("nope");
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("withLogLevel", () => {
  const initial = getLogLevel();
  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("mutes warnings while the callback runs and restores the level after", async () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("info");
    const log = createLogger("listener");

    const result = await withLogLevel("silent", async () => {
      log.warn("audio error, recalibrating");
      return getLogLevel();
    });

    expect(result).toBe("silent");
    expect(spy).not.toHaveBeenCalled();
    expect(getLogLevel()).toBe("info");
  });

  it("restores the level when the callback throws", async () => {
    setLogLevel("debug");
    await expect(
      withLogLevel("silent", async () => {
        throw new Error("loop failed");
      }),
    ).rejects.toThrow("loop failed");
    expect(getLogLevel()).toBe("debug");
  });
});
