import type { ProcessFailure, StructuredInvocationFailure } from "./errors.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export interface RawProcessOutput {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly timedOut: boolean;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type ProcessOutcome = Result<RawProcessOutput, ProcessFailure>;

export type TypedResult<T> = Result<T, StructuredInvocationFailure>;
