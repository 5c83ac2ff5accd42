import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { logger, setLogLevel, getLogLevel, parseLogLevel, isLogLevel, formatLine } from "../../logger";

describe("logger", () => {
  const origLevel = getLogLevel();
  beforeEach(() => {
    setLogLevel("trace");
  });
  afterEach(() => {
    setLogLevel(origLevel);
  });

  it("respects log levels and formats output", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => { /* no-op */ });
    logger.info("hello", 123);
    expect(spy).toHaveBeenCalled();
    spy.mockRestore();
  });

  it("can silence lower levels", () => {
    setLogLevel("error");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => { /* no-op */ });
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => { /* no-op */ });
    logger.debug("nope");
    logger.error("boom");
    expect(logSpy).not.toHaveBeenCalled();
    expect(errSpy).toHaveBeenCalled();
    logSpy.mockRestore();
    errSpy.mockRestore();
  });

  it("sends warnings to console.warn", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => { /* no-op */ });
    logger.warn("careful");
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining("[WARN] careful"));
    warnSpy.mockRestore();
  });
});

describe("logger.formatLine", () => {
  it("prefixes timestamp and level and joins the arguments", () => {
    const now = new Date("2024-05-01T10:00:00.000Z");
    expect(formatLine("debug", "surface", ["a", 3], now)).toBe("[2024-05-01T10:00:00.000Z] [DEBUG] surface a 3");
    expect(formatLine("info", "only", [], now)).toBe("[2024-05-01T10:00:00.000Z] [INFO] only");
  });
});

describe("logger.parseLogLevel", () => {
  it("accepts known levels case-insensitively", () => {
    expect(parseLogLevel("WARN")).toBe("warn");
    expect(parseLogLevel(" trace ")).toBe("trace");
  });

  it("falls back on unknown or missing values", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose", "debug")).toBe("debug");
    expect(parseLogLevel(3)).toBe("info");
    expect(isLogLevel("error")).toBe(true);
    expect(isLogLevel("fatal")).toBe(false);
  });
});
