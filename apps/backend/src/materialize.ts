import type { z } from "zod";
import {
  ExtractionFailedError,
  type SchemaIssue,
  SchemaMismatchError
} from "./invocation/errors.js";
import type { JsonObject, TypedResult } from "./invocation/types.js";
import type { SchemaDescriptor } from "./prompt.js";

const formatPath = (path: ReadonlyArray<PropertyKey>): string =>
  path.length === 0 ? "(root)" : path.map((segment) => String(segment)).join(".");

export function toSchemaIssues(error: z.ZodError): SchemaIssue[] {
  return error.issues.map((issue) => ({
    path: formatPath(issue.path),
    code: issue.code,
    message: issue.message
  }));
}

/**
 * Turns an extracted value into the caller-facing result. `rawText` is only
 * used for the preview carried by an extraction failure.
 */
export function materialize<S extends SchemaDescriptor>(
  value: JsonObject | undefined,
  schema: S,
  rawText: string
): TypedResult<z.output<S>> {
  if (value === undefined) {
    return { ok: false, error: new ExtractionFailedError(rawText) };
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, error: new SchemaMismatchError(toSchemaIssues(parsed.error)) };
  }
  return { ok: true, value: parsed.data };
}
