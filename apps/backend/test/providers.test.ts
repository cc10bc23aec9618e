import { describe, expect, test } from "vitest";
import {
  listProviderProfiles,
  PROVIDER_PROFILES,
  resolveProvider,
  resolveProviderFamily
} from "../src/providers.js";

describe("resolveProvider", () => {
  test("maps vendor and model family names onto the matching CLI profile", () => {
    expect(resolveProvider("anthropic")).toBe(PROVIDER_PROFILES.anthropic);
    expect(resolveProvider("claude-3-opus")).toBe(PROVIDER_PROFILES.anthropic);
    expect(resolveProvider("google")).toBe(PROVIDER_PROFILES.google);
    expect(resolveProvider("gemini-1.5-pro")).toBe(PROVIDER_PROFILES.google);
    expect(resolveProvider("OpenAI")).toBe(PROVIDER_PROFILES.openai);
    expect(resolveProvider("gpt-4o")).toBe(PROVIDER_PROFILES.openai);
    expect(resolveProvider("codex")).toBe(PROVIDER_PROFILES.openai);
  });

  test("matches case-insensitively", () => {
    const expected = resolveProvider("claude-3");
    expect(resolveProvider("Anthropic")).toBe(expected);
    expect(resolveProvider("ANTHROPIC")).toBe(expected);
    expect(resolveProvider("anthropic")).toBe(expected);
  });

  test("falls back to the default profile for unknown identifiers", () => {
    expect(resolveProviderFamily("unknown-vendor-123")).toBe("anthropic");
    expect(resolveProvider("unknown-vendor-123")).toBe(PROVIDER_PROFILES.anthropic);
    expect(resolveProvider("")).toBe(PROVIDER_PROFILES.anthropic);
  });

  test("uses the first matching family when several keywords appear", () => {
    expect(resolveProviderFamily("claude-vs-gpt")).toBe("anthropic");
    expect(resolveProviderFamily("gemini-via-openai-proxy")).toBe("google");
  });

  test("returns the same frozen profile on repeated calls", () => {
    const first = resolveProvider("gemini");
    const second = resolveProvider("gemini");
    expect(second).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.argumentTemplate)).toBe(true);
  });

  test("exposes each CLI convention", () => {
    expect(PROVIDER_PROFILES.anthropic).toEqual({
      executableName: "claude",
      argumentTemplate: ["-p"],
      displayName: "Claude"
    });
    expect(PROVIDER_PROFILES.google).toEqual({
      executableName: "gemini",
      argumentTemplate: ["-y", "-p"],
      displayName: "Gemini"
    });
    expect(PROVIDER_PROFILES.openai).toEqual({
      executableName: "codex",
      argumentTemplate: ["exec"],
      displayName: "Codex"
    });
    expect(listProviderProfiles().map((entry) => entry.family)).toEqual([
      "anthropic",
      "google",
      "openai"
    ]);
  });
});
