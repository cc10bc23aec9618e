import { spawnSync } from "node:child_process";
import { logger } from "./logger.js";
import { resolveProvider } from "./providers.js";

export type ExecutableProbe = (executableName: string) => boolean;

export const probeExecutable: ExecutableProbe = (executableName) => {
  const probe = process.platform === "win32" ? "where" : "which";
  const result = spawnSync(probe, [executableName], { stdio: "ignore" });
  if (result.error) {
    logger.debug({ executableName, error: result.error }, "executable probe failed");
    return false;
  }
  return result.status === 0;
};

export function isProviderAvailable(
  identifier: string,
  probe: ExecutableProbe = probeExecutable
): boolean {
  const { executableName } = resolveProvider(identifier);
  try {
    return probe(executableName);
  } catch (error) {
    logger.debug({ executableName, error }, "executable probe threw");
    return false;
  }
}
