export type FailureKind =
  | "TOOL_NOT_FOUND"
  | "TIMEOUT"
  | "EXECUTION_FAILED"
  | "EXTRACTION_FAILED"
  | "SCHEMA_MISMATCH";

export abstract class StructuredInvocationError extends Error {
  abstract readonly kind: FailureKind;

  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ToolNotFoundError extends StructuredInvocationError {
  readonly kind = "TOOL_NOT_FOUND";

  constructor(public readonly executableName: string) {
    super(`CLI tool '${executableName}' not found. Please ensure it's installed and in PATH.`, 503);
  }
}

export class InvocationTimeoutError extends StructuredInvocationError {
  readonly kind = "TIMEOUT";

  constructor(
    public readonly timeoutSeconds: number,
    public readonly elapsedMs: number
  ) {
    super(`CLI command timed out after ${timeoutSeconds} seconds`, 504);
  }
}

export class ExecutionFailedError extends StructuredInvocationError {
  readonly kind = "EXECUTION_FAILED";

  constructor(
    message: string,
    public readonly stderr: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null
  ) {
    super(message, 502);
  }
}

export const PREVIEW_LENGTH = 500;

export class ExtractionFailedError extends StructuredInvocationError {
  readonly kind = "EXTRACTION_FAILED";
  readonly preview: string;

  constructor(rawText: string) {
    const preview = rawText.slice(0, PREVIEW_LENGTH);
    super(`Could not extract valid JSON from CLI response: ${preview}`, 502);
    this.preview = preview;
  }
}

export interface SchemaIssue {
  path: string;
  code: string;
  message: string;
}

export class SchemaMismatchError extends StructuredInvocationError {
  readonly kind = "SCHEMA_MISMATCH";

  constructor(public readonly issues: SchemaIssue[]) {
    super(`Response does not match schema: ${formatIssues(issues)}`, 422);
  }
}

export type ProcessFailure = ToolNotFoundError | InvocationTimeoutError | ExecutionFailedError;

export type StructuredInvocationFailure =
  | ProcessFailure
  | ExtractionFailedError
  | SchemaMismatchError;

export function formatIssues(issues: SchemaIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ");
}
