import { randomUUID } from "node:crypto";
import type { z } from "zod";
import { NoopAuditSink, type AuditSink } from "../audit.js";
import { isProviderAvailable, type ExecutableProbe, probeExecutable } from "../availability.js";
import {
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_TIMEOUT_SECONDS,
  isValidTimeoutSeconds,
  MAX_TIMEOUT_SECONDS
} from "../config.js";
import { extractJson } from "../extraction.js";
import { logger } from "../logger.js";
import { materialize } from "../materialize.js";
import { augmentPrompt, type SchemaDescriptor } from "../prompt.js";
import { type InvocationProfile, resolveProvider } from "../providers.js";
import { invokeProcess, type ProcessInvokerOptions } from "./process-invoker.js";
import type { ProcessOutcome, TypedResult } from "./types.js";

export type ProcessRunner = (
  profile: InvocationProfile,
  augmentedPrompt: string,
  timeoutSeconds: number,
  options: ProcessInvokerOptions
) => Promise<ProcessOutcome>;

export interface StructuredInvocationRequest<S extends SchemaDescriptor> {
  prompt: string;
  schema: S;
  provider?: string;
  timeoutSeconds?: number;
  traceId?: string;
  requestId?: string;
  signal?: AbortSignal;
}

interface StructuredInvocationServiceOptions {
  audit?: AuditSink;
  defaultProvider?: string;
  defaultTimeoutSeconds?: number;
  killGraceMs?: number;
  runProcess?: ProcessRunner;
  probe?: ExecutableProbe;
}

export class StructuredInvocationService {
  private readonly audit: AuditSink;
  private readonly defaultProvider: string;
  private readonly defaultTimeoutSeconds: number;
  private readonly killGraceMs: number;
  private readonly runProcess: ProcessRunner;
  private readonly probe: ExecutableProbe;

  constructor(options: StructuredInvocationServiceOptions = {}) {
    this.audit = options.audit ?? new NoopAuditSink();
    this.defaultProvider = options.defaultProvider ?? "anthropic";
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.runProcess = options.runProcess ?? invokeProcess;
    this.probe = options.probe ?? probeExecutable;
  }

  async invoke<S extends SchemaDescriptor>(
    request: StructuredInvocationRequest<S>
  ): Promise<TypedResult<z.output<S>>> {
    const traceId = request.traceId ?? randomUUID();
    const requestId = request.requestId ?? randomUUID();
    const provider = request.provider ?? this.defaultProvider;
    const timeoutSeconds = request.timeoutSeconds ?? this.defaultTimeoutSeconds;
    if (!isValidTimeoutSeconds(timeoutSeconds)) {
      throw new RangeError(
        `timeoutSeconds must be greater than 0 and at most ${MAX_TIMEOUT_SECONDS}: ${timeoutSeconds}`
      );
    }

    const profile = resolveProvider(provider);
    const auditPayload = {
      provider,
      executableName: profile.executableName,
      timeoutSeconds,
      promptLength: request.prompt.length
    };

    await this.audit.record({
      eventType: "structured_invocation_requested",
      actor: "structured_invocation_service",
      traceId,
      requestId,
      payload: auditPayload
    });
    logger.debug({ ...auditPayload, traceId, requestId }, "structured invocation started");

    let result: TypedResult<z.output<S>>;
    try {
      const augmentedPrompt = augmentPrompt(request.prompt, request.schema);
      const outcome = await this.runProcess(profile, augmentedPrompt, timeoutSeconds, {
        killGraceMs: this.killGraceMs,
        signal: request.signal
      });
      result = outcome.ok
        ? materialize(extractJson(outcome.value.stdout), request.schema, outcome.value.stdout)
        : outcome;
    } catch (error) {
      await this.audit.record({
        eventType: "structured_invocation_failed",
        actor: "structured_invocation_service",
        traceId,
        requestId,
        payload: {
          ...auditPayload,
          kind: "UNEXPECTED",
          error: error instanceof Error ? error.message : String(error)
        }
      });
      throw error;
    }

    if (result.ok) {
      logger.info({ ...auditPayload, traceId, requestId }, "structured invocation completed");
      await this.audit.record({
        eventType: "structured_invocation_completed",
        actor: "structured_invocation_service",
        traceId,
        requestId,
        payload: auditPayload
      });
    } else {
      logger.warn(
        { ...auditPayload, traceId, requestId, kind: result.error.kind, error: result.error.message },
        "structured invocation failed"
      );
      await this.audit.record({
        eventType: "structured_invocation_failed",
        actor: "structured_invocation_service",
        traceId,
        requestId,
        payload: {
          ...auditPayload,
          kind: result.error.kind,
          error: result.error.message
        }
      });
    }
    return result;
  }

  isAvailable(provider: string): boolean {
    return isProviderAvailable(provider, this.probe);
  }
}

export function unwrapResult<T>(result: TypedResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
