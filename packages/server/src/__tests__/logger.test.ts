import { describe, it, expect, beforeEach } from "vitest";
import { parseConfig, resetConfig, setConfig } from "../config.js";
import { createRequestLogger, getLogger, resetLogger } from "../lib/logger.js";

describe("Logger", () => {
  beforeEach(() => {
    resetConfig();
    resetLogger();
  });

  it("should create a logger with the configured level", () => {
    setConfig(parseConfig({ logLevel: "warn" }));
    expect(getLogger().level).toBe("warn");
  });

  it("should reuse the logger until reset", () => {
    setConfig(parseConfig({}));
    const first = getLogger();
    expect(getLogger()).toBe(first);
    resetLogger();
    expect(getLogger()).not.toBe(first);
  });

  it("should create a request child logger with correlation ID", () => {
    setConfig(parseConfig({}));
    const child = createRequestLogger("test-req-123");
    expect(child.bindings().requestId).toBe("test-req-123");
  });
});
