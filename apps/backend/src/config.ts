export interface BridgeConfig {
  port: number;
  auditLogDir: string;
  defaultProvider: string;
  defaultTimeoutSeconds: number;
  killGraceMs: number;
}

const DEFAULT_PORT = 3001;
const DEFAULT_AUDIT_LOG_DIR = "data/audit";
const DEFAULT_PROVIDER = "anthropic";
export const DEFAULT_TIMEOUT_SECONDS = 300;
export const DEFAULT_KILL_GRACE_MS = 2_000;
// Node timers hold at most 2^31-1 ms; longer delays fire immediately.
export const MAX_TIMEOUT_SECONDS = Math.floor(2_147_483_647 / 1000);

export const isValidTimeoutSeconds = (value: number): boolean =>
  Number.isFinite(value) && value > 0 && value <= MAX_TIMEOUT_SECONDS;

const readPositiveNumber = (raw: string | undefined, fallback: number): number => {
  if (!raw || raw.trim().length === 0) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const readTimeoutSeconds = (raw: string | undefined): number => {
  const parsed = readPositiveNumber(raw, DEFAULT_TIMEOUT_SECONDS);
  return isValidTimeoutSeconds(parsed) ? parsed : DEFAULT_TIMEOUT_SECONDS;
};

const readString = (raw: string | undefined, fallback: string): string => {
  const trimmed = raw?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : fallback;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  return {
    port: readPositiveNumber(env.PORT, DEFAULT_PORT),
    auditLogDir: readString(env.AUDIT_LOG_DIR, DEFAULT_AUDIT_LOG_DIR),
    defaultProvider: readString(env.DEFAULT_PROVIDER, DEFAULT_PROVIDER),
    defaultTimeoutSeconds: readTimeoutSeconds(env.DEFAULT_TIMEOUT_SECONDS),
    killGraceMs: readPositiveNumber(env.KILL_GRACE_MS, DEFAULT_KILL_GRACE_MS)
  };
}
