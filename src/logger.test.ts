import { describe, it, expect, vi, afterEach } from "vitest";
import { createConsoleLogger, parseLogLevel } from "./logger.js";

describe("parseLogLevel", () => {
  it("accepts known levels in any case", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel(" warn ")).toBe("warn");
  });

  it("falls back to info", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose")).toBe("info");
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes lines with level and component", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createConsoleLogger("SessionManager").info("Registered c1");
    expect(log).toHaveBeenCalledWith("[INFO] [SessionManager] Registered c1");
  });

  it("drops lines below the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createConsoleLogger("Server", "warn");

    logger.info("hidden");
    logger.warn("shown");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[WARN] [Server] shown");
  });
});
