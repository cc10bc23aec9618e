import { z } from "zod";

/**
 * Expected shape of a structured response. The same schema steers the prompt
 * (through its JSON Schema rendering) and validates the recovered value.
 */
export type SchemaDescriptor = z.ZodType;

export function describeSchema(schema: SchemaDescriptor): string {
  // Types without a JSON Schema form (dates, transforms) render as an open schema.
  const jsonSchema = z.toJSONSchema(schema, { unrepresentable: "any" });
  return JSON.stringify(jsonSchema, null, 2);
}

/**
 * Appends the JSON instruction block to the caller's prompt. The original text
 * is kept verbatim at the start of the result.
 */
export function augmentPrompt(userPrompt: string, schema: SchemaDescriptor): string {
  return [
    userPrompt,
    "",
    "IMPORTANT: You must respond with valid JSON that matches this schema:",
    describeSchema(schema),
    "",
    "Respond ONLY with the JSON object, no markdown code blocks, no explanation."
  ].join("\n");
}
