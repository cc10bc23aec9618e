import { describe, expect, test, vi } from "vitest";
import { isProviderAvailable, probeExecutable } from "../src/availability.js";

describe("isProviderAvailable", () => {
  test("probes the executable of the resolved provider", () => {
    const probe = vi.fn(() => true);

    expect(isProviderAvailable("Gemini-2.0-flash", probe)).toBe(true);
    expect(probe).toHaveBeenCalledWith("gemini");
  });

  test("probes the default executable for unknown providers", () => {
    const probe = vi.fn(() => false);

    expect(isProviderAvailable("unknown-vendor-123", probe)).toBe(false);
    expect(probe).toHaveBeenCalledWith("claude");
  });

  test("returns false when the probe throws", () => {
    const probe = vi.fn((): boolean => {
      throw new Error("probe crashed");
    });

    expect(isProviderAvailable("openai", probe)).toBe(false);
  });
});

describe("probeExecutable", () => {
  test("returns false for an executable that is not on the PATH", () => {
    expect(probeExecutable("structured-cli-bridge-missing-tool")).toBe(false);
  });
});
