import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, getLogLevel, setLogLevel } from "./logger";

describe("createLogger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("prefixes lines with the scope", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("Retry").info("waiting");
    expect(log).toHaveBeenCalledWith("[Retry] waiting");
  });

  it("routes levels to matching console methods with context", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger("CircuitBreaker");

    logger.warn("slow", { attempt: 2 });
    logger.error("down", {});

    expect(warn).toHaveBeenCalledWith("[CircuitBreaker] slow", { attempt: 2 });
    expect(error).toHaveBeenCalledWith("[CircuitBreaker] down");
  });

  it("drops messages below the current level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger("Test");

    logger.debug("hidden");
    setLogLevel("warn");
    logger.info("also hidden");
    expect(getLogLevel()).toBe("warn");
    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });
});
