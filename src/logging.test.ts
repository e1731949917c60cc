import { describe, it, expect, vi } from "vitest";
import { createConsoleLogger, filterLogger, isLogLevel, silentLogger } from "./logging.js";

describe("createConsoleLogger", () => {
  it("prefixes levels and drops messages below the threshold", () => {
    const sink = vi.fn();
    const logger = createConsoleLogger("warn", sink);
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    expect(sink.mock.calls).toEqual([["[warn] w"], ["[error] e"]]);
  });

  it("writes info messages without a prefix", () => {
    const sink = vi.fn();
    createConsoleLogger("debug", sink).info("hello");
    createConsoleLogger("debug", sink).debug("details");
    expect(sink.mock.calls).toEqual([["hello"], ["[debug] details"]]);
  });
});

describe("filterLogger", () => {
  it("drops everything when silent", () => {
    const inner = { ...silentLogger, error: vi.fn() };
    filterLogger(inner, "silent").error("boom");
    expect(inner.error).not.toHaveBeenCalled();
  });
});

describe("isLogLevel", () => {
  it("accepts only known level names", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("toString")).toBe(false);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
