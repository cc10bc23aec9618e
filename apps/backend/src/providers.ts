export type ProviderFamily = "anthropic" | "google" | "openai";

export interface InvocationProfile {
  readonly executableName: string;
  readonly argumentTemplate: readonly string[];
  readonly displayName: string;
}

const profile = (
  executableName: string,
  argumentTemplate: string[],
  displayName: string
): InvocationProfile =>
  Object.freeze({
    executableName,
    argumentTemplate: Object.freeze([...argumentTemplate]),
    displayName
  });

export const PROVIDER_PROFILES: Readonly<Record<ProviderFamily, InvocationProfile>> = Object.freeze({
  anthropic: profile("claude", ["-p"], "Claude"),
  google: profile("gemini", ["-y", "-p"], "Gemini"),
  openai: profile("codex", ["exec"], "Codex")
});

export const DEFAULT_PROVIDER_FAMILY: ProviderFamily = "anthropic";

// Checked in order; the first family with a matching keyword wins.
const FAMILY_KEYWORDS: ReadonlyArray<readonly [ProviderFamily, readonly string[]]> = [
  ["anthropic", ["anthropic", "claude"]],
  ["google", ["google", "gemini"]],
  ["openai", ["openai", "gpt", "codex"]]
];

export function resolveProviderFamily(identifier: string): ProviderFamily {
  const normalized = identifier.toLowerCase();
  for (const [family, keywords] of FAMILY_KEYWORDS) {
    if (keywords.some((keyword) => normalized.includes(keyword))) {
      return family;
    }
  }
  return DEFAULT_PROVIDER_FAMILY;
}

export function resolveProvider(identifier: string): InvocationProfile {
  return PROVIDER_PROFILES[resolveProviderFamily(identifier)];
}

export function listProviderProfiles(): Array<{ family: ProviderFamily } & InvocationProfile> {
  return FAMILY_KEYWORDS.map(([family]) => ({ family, ...PROVIDER_PROFILES[family] }));
}
