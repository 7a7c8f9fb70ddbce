import { describe, it, expect } from "vitest";
import { loadConfig } from "@/config";
import { ConfigError } from "@/errors";

describe("loadConfig", () => {
  it("should default to the mock provider", () => {
    expect(loadConfig({})).toEqual({
      provider: "mock",
      openaiApiKey: null,
      openaiBaseUrl: "https://api.openai.com/v1",
      embeddingModel: "text-embedding-3-small",
      completionModel: "gpt-4o",
      capabilityTimeoutMs: 20000,
      maxBulletsPerRole: 5,
      dbPath: null,
      logLevel: "info",
    });
  });

  it("should read overrides", () => {
    const config = loadConfig({
      PROVIDER: "OpenAI",
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://localhost:8080/v1",
      CAPABILITY_TIMEOUT_MS: "500",
      MAX_BULLETS_PER_ROLE: "3",
      DB_PATH: "data/test.db",
      LOG_LEVEL: "DEBUG",
    });

    expect(config.provider).toBe("openai");
    expect(config.openaiApiKey).toBe("test-secret");
    expect(config.openaiBaseUrl).toBe("http://localhost:8080/v1");
    expect(config.capabilityTimeoutMs).toBe(500);
    expect(config.maxBulletsPerRole).toBe(3);
    expect(config.dbPath).toBe("data/test.db");
    expect(config.logLevel).toBe("debug");
  });

  it("should require an API key for the openai provider", () => {
    expect(() => loadConfig({ PROVIDER: "openai" })).toThrow(
      "Configuration error: OPENAI_API_KEY is required when PROVIDER=openai",
    );
  });

  it("should reject unknown providers", () => {
    expect(() => loadConfig({ PROVIDER: "cohere" })).toThrow(ConfigError);
  });

  it("should reject non-positive integers", () => {
    expect(() => loadConfig({ CAPABILITY_TIMEOUT_MS: "abc" })).toThrow(
      'Configuration error: CAPABILITY_TIMEOUT_MS must be a positive integer, got "abc"',
    );
    expect(() => loadConfig({ MAX_BULLETS_PER_ROLE: "0" })).toThrow(ConfigError);
  });

  it("should reject integers above the timer limit", () => {
    expect(loadConfig({ CAPABILITY_TIMEOUT_MS: "2147483647" }).capabilityTimeoutMs).toBe(
      2147483647,
    );
    expect(() => loadConfig({ CAPABILITY_TIMEOUT_MS: "2147483648" })).toThrow(
      'Configuration error: CAPABILITY_TIMEOUT_MS must be at most 2147483647, got "2147483648"',
    );
  });

  it("should fall back to info for unknown log levels", () => {
    expect(loadConfig({ LOG_LEVEL: "verbose" }).logLevel).toBe("info");
  });
});
