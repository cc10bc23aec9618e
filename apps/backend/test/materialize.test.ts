import { describe, expect, test } from "vitest";
import { z } from "zod";
import {
  ExtractionFailedError,
  PREVIEW_LENGTH,
  SchemaMismatchError
} from "../src/invocation/errors.js";
import { materialize } from "../src/materialize.js";

const decisionSchema = z.object({
  action: z.enum(["buy", "sell", "hold"]),
  quantity: z.number().int(),
  confidence: z.number()
});

describe("materialize", () => {
  test("returns the validated value", () => {
    const result = materialize(
      { action: "buy", quantity: 10, confidence: 0.8 },
      decisionSchema,
      "raw"
    );
    expect(result).toEqual({
      ok: true,
      value: { action: "buy", quantity: 10, confidence: 0.8 }
    });
  });

  test("reports an extraction failure with a bounded preview", () => {
    const rawText = "x".repeat(PREVIEW_LENGTH + 100);
    const result = materialize(undefined, decisionSchema, rawText);

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toBeInstanceOf(ExtractionFailedError);
    expect(result.error.kind).toBe("EXTRACTION_FAILED");
    if (result.error instanceof ExtractionFailedError) {
      expect(result.error.preview).toBe("x".repeat(PREVIEW_LENGTH));
    }
  });

  test("reports schema mismatches with the offending paths", () => {
    const result = materialize(
      { action: "short", quantity: 1.5 },
      decisionSchema,
      "raw"
    );

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toBeInstanceOf(SchemaMismatchError);
    expect(result.error.kind).toBe("SCHEMA_MISMATCH");
    expect(result.error.statusCode).toBe(422);
    if (result.error instanceof SchemaMismatchError) {
      expect(result.error.issues.map((issue) => issue.path)).toEqual([
        "action",
        "quantity",
        "confidence"
      ]);
      expect(result.error.issues[0]?.code).toBe("invalid_value");
      expect(result.error.issues[2]?.code).toBe("invalid_type");
    }
  });

  test("uses the parsed output of the schema", () => {
    const schema = z.object({ ticker: z.string().transform((value) => value.toUpperCase()) });
    expect(materialize({ ticker: "aapl", extra: true }, schema, "raw")).toEqual({
      ok: true,
      value: { ticker: "AAPL" }
    });
  });
});
