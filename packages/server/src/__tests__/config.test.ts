import { describe, it, expect, afterEach } from "vitest";
import { configFromEnv, getConfig, parseConfig, resetConfig, setConfig } from "../config.js";

describe("config", () => {
  afterEach(() => {
    resetConfig();
  });

  it("should apply defaults", () => {
    const config = parseConfig({});
    expect(config).toEqual({
      port: 3000,
      nodeEnv: "development",
      logLevel: "info",
      logFormat: "json",
      paymentFailureRate: 0.1,
      cryptoCongestionRate: 0.15,
      cryptoCongestionFailureRate: 0.3,
      notificationFailureRate: 0.05,
      isProduction: false,
      isDevelopment: true,
    });
  });

  it("should read environment variables", () => {
    const config = parseConfig(
      configFromEnv({
        PORT: "8080",
        NODE_ENV: "production",
        LOG_LEVEL: "",
        PAYMENT_FAILURE_RATE: "0.25",
        NOTIFICATION_FAILURE_RATE: "0",
      })
    );

    expect(config.port).toBe(8080);
    expect(config.isProduction).toBe(true);
    expect(config.logLevel).toBe("info");
    expect(config.paymentFailureRate).toBe(0.25);
    expect(config.notificationFailureRate).toBe(0);
  });

  it("should reject rates outside [0, 1]", () => {
    expect(() => parseConfig({ paymentFailureRate: "1.5" })).toThrow();
    expect(() => parseConfig({ cryptoCongestionRate: -0.1 })).toThrow();
  });

  it("should reject unknown log formats", () => {
    expect(() => parseConfig({ logFormat: "xml" })).toThrow();
  });

  it("should return the config set for tests", () => {
    const config = parseConfig({ port: 4000 });
    setConfig(config);
    expect(getConfig()).toBe(config);
  });
});
