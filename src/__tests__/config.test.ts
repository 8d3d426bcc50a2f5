import { describe, expect, it } from "vitest";
import { loadConfig } from "../config";
import { ConfigError } from "../errors";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ DB_PATH: "/tmp/test.db" });
    expect(config).toEqual({
      databasePath: "/tmp/test.db",
      port: 8080,
      lookup: {
        dporBaseUrl: "https://dporweb.dpor.virginia.gov/LicenseLookup",
        timeoutMs: 15000,
        minIntervalMs: 1200
      },
      retry: { maxAttempts: 3, baseDelayMs: 2000, factor: 2, maxDelayMs: 30000 },
      matching: { nameThreshold: 0.75 }
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      DB_PATH: ":memory:",
      RETRY_MAX_ATTEMPTS: "5",
      LOOKUP_MIN_INTERVAL_MS: "2500",
      NAME_MATCH_THRESHOLD: "0.8"
    });
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.lookup.minIntervalMs).toBe(2500);
    expect(config.matching.nameThreshold).toBe(0.8);
  });

  it("rejects malformed numbers", () => {
    expect(() => loadConfig({ LOOKUP_TIMEOUT_MS: "soon" })).toThrow(ConfigError);
    expect(() => loadConfig({ NAME_MATCH_THRESHOLD: "1.5" })).toThrow(
      "NAME_MATCH_THRESHOLD must be between 0 and 1, got 1.5"
    );
  });

  it("requires whole numbers for the port and attempt count", () => {
    expect(() => loadConfig({ RETRY_MAX_ATTEMPTS: "2.5" })).toThrow(
      'RETRY_MAX_ATTEMPTS must be a whole number, got "2.5"'
    );
    expect(() => loadConfig({ PORT: "8080.5" })).toThrow(ConfigError);
  });
});
