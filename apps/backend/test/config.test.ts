import { describe, expect, test } from "vitest";
import { loadConfig, MAX_TIMEOUT_SECONDS } from "../src/config.js";

describe("loadConfig", () => {
  test("uses defaults when nothing is configured", () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      auditLogDir: "data/audit",
      defaultProvider: "anthropic",
      defaultTimeoutSeconds: 300,
      killGraceMs: 2000
    });
  });

  test("reads configured values", () => {
    expect(
      loadConfig({
        PORT: "8080",
        AUDIT_LOG_DIR: "/var/log/bridge",
        DEFAULT_PROVIDER: "gemini",
        DEFAULT_TIMEOUT_SECONDS: "120",
        KILL_GRACE_MS: "500"
      })
    ).toEqual({
      port: 8080,
      auditLogDir: "/var/log/bridge",
      defaultProvider: "gemini",
      defaultTimeoutSeconds: 120,
      killGraceMs: 500
    });
  });

  test("falls back to defaults for invalid numbers and blank strings", () => {
    const config = loadConfig({
      PORT: "not-a-port",
      DEFAULT_TIMEOUT_SECONDS: "-5",
      KILL_GRACE_MS: "0",
      DEFAULT_PROVIDER: "   "
    });

    expect(config.port).toBe(3001);
    expect(config.defaultTimeoutSeconds).toBe(300);
    expect(config.killGraceMs).toBe(2000);
    expect(config.defaultProvider).toBe("anthropic");
  });

  test("falls back to the default timeout when it exceeds the timer limit", () => {
    expect(loadConfig({ DEFAULT_TIMEOUT_SECONDS: "3000000" }).defaultTimeoutSeconds).toBe(300);
    expect(
      loadConfig({ DEFAULT_TIMEOUT_SECONDS: String(MAX_TIMEOUT_SECONDS) }).defaultTimeoutSeconds
    ).toBe(2_147_483);
  });
});
