import { describe, expect, it } from "vitest";
import { type AppConfig, loadConfig } from "../config";

/** Loads config and fails the test on Err */
const mustLoad = (env: Record<string, string | undefined>): AppConfig => {
  const result = loadConfig(env);
  if (result.isErr) {
    throw new Error(result.error);
  }
  return result.value;
};

describe("loadConfig - defaults", () => {
  it("should return defaults for an empty environment", () => {
    expect(mustLoad({})).toEqual({
      host: "0.0.0.0",
      port: 8000,
      mode: "dev",
      logChunking: "none",
      logDir: undefined,
      allowedOrigins: ["*"],
      enableStatic: true,
      staticDir: "./static",
      diagnostics: false,
      rateLimit: undefined,
    });
  });

  it("should treat empty strings as unset", () => {
    const config = mustLoad({ PORT: "", MODE: "", ENABLE_STATIC: "" });

    expect(config.port).toBe(8000);
    expect(config.mode).toBe("dev");
    expect(config.enableStatic).toBe(true);
  });

  it("should ignore unrelated variables", () => {
    expect(mustLoad({ PATH: "/usr/bin", HOME: "/root" }).port).toBe(8000);
  });
});

describe("loadConfig - parsing", () => {
  it("should parse every supported variable", () => {
    const config = mustLoad({
      HOST: "127.0.0.1",
      PORT: "3000",
      MODE: "prod",
      LOG_CHUNKING: "daily",
      LOG_DIR: "/var/log/tasks",
      ALLOWED_ORIGINS: "https://a.com, https://b.com",
      ENABLE_STATIC: "false",
      STATIC_DIR: "./public",
      DIAGNOSTICS: "yes",
      RATE_LIMIT_HEADER: "x-client-id",
      RATE_LIMIT_MAX: "10",
      RATE_LIMIT_WINDOW_MS: "60000",
    });

    expect(config).toEqual({
      host: "127.0.0.1",
      port: 3000,
      mode: "prod",
      logChunking: "daily",
      logDir: "/var/log/tasks",
      allowedOrigins: ["https://a.com", "https://b.com"],
      enableStatic: false,
      staticDir: "./public",
      diagnostics: true,
      rateLimit: { header: "x-client-id", max: 10, windowMs: 60_000 },
    });
  });

  it("should accept booleans case-insensitively", () => {
    expect(mustLoad({ DIAGNOSTICS: "TRUE" }).diagnostics).toBe(true);
    expect(mustLoad({ ENABLE_STATIC: "0" }).enableStatic).toBe(false);
  });

  it("should use rate limit defaults once a header is set", () => {
    expect(mustLoad({ RATE_LIMIT_HEADER: "x-api-key" }).rateLimit).toEqual({
      header: "x-api-key",
      max: 100,
      windowMs: 900_000,
    });
  });
});

describe("loadConfig - errors", () => {
  it("should reject a non-numeric port", () => {
    const result = loadConfig({ PORT: "eighty" });

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error).toContain("PORT");
    }
  });

  it("should reject a port out of range", () => {
    expect(loadConfig({ PORT: "70000" }).isErr).toBe(true);
  });

  it("should reject an unknown mode", () => {
    const result = loadConfig({ MODE: "verbose" });

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error).toContain("MODE");
    }
  });

  it("should reject a malformed boolean", () => {
    const result = loadConfig({ DIAGNOSTICS: "maybe" });

    expect(result.isErr).toBe(true);
    if (result.isErr) {
      expect(result.error).toBe(
        "Invalid configuration: DIAGNOSTICS: Expected true/false, received 'maybe'"
      );
    }
  });

  it("should report every invalid variable", () => {
    const result = loadConfig({ PORT: "x", MODE: "y" });

    if (result.isErr) {
      expect(result.error).toContain("PORT");
      expect(result.error).toContain("MODE");
    } else {
      throw new Error("expected Err");
    }
  });
});
