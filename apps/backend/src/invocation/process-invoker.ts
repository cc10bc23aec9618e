import { spawn, type SpawnOptions } from "node:child_process";
import type { Readable } from "node:stream";
import { DEFAULT_KILL_GRACE_MS, isValidTimeoutSeconds, MAX_TIMEOUT_SECONDS } from "../config.js";
import { logger } from "../logger.js";
import type { InvocationProfile } from "../providers.js";
import {
  ExecutionFailedError,
  InvocationTimeoutError,
  type ProcessFailure,
  ToolNotFoundError
} from "./errors.js";
import type { ProcessOutcome } from "./types.js";

/** The slice of `ChildProcess` the invoker relies on. */
export interface ChildHandle {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: "error", listener: (error: Error) => void): this;
}

export type SpawnFunction = (command: string, args: string[], options: SpawnOptions) => ChildHandle;

export interface ProcessInvokerOptions {
  spawn?: SpawnFunction;
  killGraceMs?: number;
  signal?: AbortSignal;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

type Termination = "timeout" | "aborted" | "read_error";

const spawnChild: SpawnFunction = (command, args, options) => spawn(command, args, options);

const errorCode = (error: Error): string | undefined => {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
};

export function invokeProcess(
  profile: InvocationProfile,
  augmentedPrompt: string,
  timeoutSeconds: number,
  options: ProcessInvokerOptions = {}
): Promise<ProcessOutcome> {
  const command = profile.executableName;
  const args = [...profile.argumentTemplate, augmentedPrompt];
  const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  const startedAt = Date.now();
  if (!isValidTimeoutSeconds(timeoutSeconds)) {
    return Promise.reject(
      new RangeError(
        `timeoutSeconds must be greater than 0 and at most ${MAX_TIMEOUT_SECONDS}: ${timeoutSeconds}`
      )
    );
  }

  return new Promise((resolve) => {
    if (options.signal?.aborted) {
      resolve({
        ok: false,
        error: new ExecutionFailedError("invocation aborted", "", null, null)
      });
      return;
    }

    let child: ChildHandle;
    try {
      child = (options.spawn ?? spawnChild)(command, args, {
        stdio: ["ignore", "pipe", "pipe"],
        cwd: options.cwd,
        env: options.env,
        windowsHide: true
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      resolve({
        ok: false,
        error: new ExecutionFailedError(`failed to start ${command}: ${message}`, "", null, null)
      });
      return;
    }

    let stdout = "";
    let stderr = "";
    let settled = false;
    let exited = false;
    let termination: Termination | null = null;
    let readError: Error | null = null;
    let killTimer: NodeJS.Timeout | undefined;

    const releaseStreams = (): void => {
      child.stdout?.destroy();
      child.stderr?.destroy();
    };

    const finish = (outcome: ProcessOutcome): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timeoutTimer);
      clearTimeout(killTimer);
      options.signal?.removeEventListener("abort", onAbort);
      resolve(outcome);
    };

    const terminationFailure = (
      reason: Termination,
      code: number | null,
      signal: NodeJS.Signals | null
    ): ProcessFailure => {
      switch (reason) {
        case "timeout":
          return new InvocationTimeoutError(timeoutSeconds, Date.now() - startedAt);
        case "aborted":
          return new ExecutionFailedError("invocation aborted", stderr.trim(), code, signal);
        case "read_error":
          return new ExecutionFailedError(
            `failed to read output of ${command}: ${readError?.message ?? "unknown error"}`,
            stderr.trim(),
            code,
            signal
          );
      }
    };

    const terminate = (reason: Termination): void => {
      if (termination || settled) {
        return;
      }
      termination = reason;
      if (exited) {
        // The child is gone but something still holds its pipes open.
        releaseStreams();
        finish({ ok: false, error: terminationFailure(reason, null, null) });
        return;
      }
      logger.debug({ command, pid: child.pid, reason }, "terminating cli process");
      child.kill("SIGTERM");
      killTimer = setTimeout(() => {
        child.kill("SIGKILL");
      }, killGraceMs);
    };

    const onAbort = (): void => {
      terminate("aborted");
    };

    const timeoutTimer = setTimeout(() => {
      terminate("timeout");
    }, timeoutSeconds * 1000);

    options.signal?.addEventListener("abort", onAbort, { once: true });

    // Multi-byte characters may arrive split across chunks.
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: Buffer | string) => {
      stdout += chunk.toString();
    });
    child.stderr?.on("data", (chunk: Buffer | string) => {
      stderr += chunk.toString();
    });
    const onStreamError = (error: Error): void => {
      readError = error;
      terminate("read_error");
    };
    child.stdout?.on("error", onStreamError);
    child.stderr?.on("error", onStreamError);

    child.on("error", (error) => {
      if (termination) {
        logger.warn({ command, error }, "failed to signal cli process");
        return;
      }
      if (errorCode(error) === "ENOENT") {
        finish({ ok: false, error: new ToolNotFoundError(command) });
        return;
      }
      finish({
        ok: false,
        error: new ExecutionFailedError(
          `failed to run ${command}: ${error.message}`,
          stderr.trim(),
          null,
          null
        )
      });
    });

    child.on("exit", (code, signal) => {
      exited = true;
      if (termination) {
        releaseStreams();
        finish({ ok: false, error: terminationFailure(termination, code, signal) });
      }
    });

    child.on("close", (code, signal) => {
      if (termination) {
        finish({ ok: false, error: terminationFailure(termination, code, signal) });
        return;
      }
      if (code !== 0) {
        const trimmedStderr = stderr.trim();
        const status = code === null ? `signal ${signal ?? "unknown"}` : `exit code ${code}`;
        finish({
          ok: false,
          error: new ExecutionFailedError(
            `CLI command failed (${status}): ${trimmedStderr}`,
            trimmedStderr,
            code,
            signal
          )
        });
        return;
      }
      finish({
        ok: true,
        value: {
          stdout: stdout.trim(),
          stderr,
          exitCode: 0,
          timedOut: false
        }
      });
    });
  });
}
