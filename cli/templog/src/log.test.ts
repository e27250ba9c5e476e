import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, getLogLevel, parseLogLevel, RateLimitedLog, setLogLevel } from "./log.js";

describe("createLogger", () => {
  const initial = getLogLevel();
  afterEach(() => setLogLevel(initial));

  it("writes scoped lines and routes warnings to stderr", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    setLogLevel("info");
    const log = createLogger("store");
    log.debug("hidden");
    log.info("hello");
    log.warn("careful");
    expect(out).toHaveBeenCalledTimes(1);
    expect(out.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z INFO  \[store\] hello$/);
    expect(err).toHaveBeenCalledTimes(1);
    expect(err.mock.calls[0][0]).toMatch(/ WARN  \[store\] careful$/);
  });

  it("parses level names", () => {
    expect(parseLogLevel(" Debug ")).toBe("debug");
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe("RateLimitedLog", () => {
  it("emits the first message and summarizes the suppressed ones", () => {
    let now = 0;
    const lines: string[] = [];
    const limited = new RateLimitedLog((msg) => lines.push(msg), 60_000, () => now);

    expect(limited.emit("disk full")).toBe(true);
    now = 10;
    expect(limited.emit("disk full")).toBe(false);
    now = 20;
    expect(limited.emit("disk full")).toBe(false);
    expect(limited.pending).toBe(2);
    now = 60_000;
    expect(limited.emit("disk still full")).toBe(true);

    expect(lines).toEqual(["disk full", "disk still full (2 similar suppressed)"]);
    expect(limited.pending).toBe(0);
  });
});
