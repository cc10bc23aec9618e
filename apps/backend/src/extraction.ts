import type { JsonObject } from "./invocation/types.js";

export type ExtractionStrategy = (text: string) => JsonObject | undefined;

const TYPED_FENCE = /```json\b\s*([\s\S]*?)\s*```/i;
const GENERIC_FENCE = /```[\w-]*\s*([\s\S]*?)\s*```/;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export function parseJsonObject(candidate: string): JsonObject | undefined {
  if (!candidate) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export const parseDirect: ExtractionStrategy = (text) => parseJsonObject(text.trim());

export const parseTypedFence: ExtractionStrategy = (text) => {
  const match = TYPED_FENCE.exec(text);
  return match ? parseJsonObject(match[1]) : undefined;
};

export const parseGenericFence: ExtractionStrategy = (text) => {
  const match = GENERIC_FENCE.exec(text);
  return match ? parseJsonObject(match[1]) : undefined;
};

export const parseBraceSpan: ExtractionStrategy = (text) => {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) {
    return undefined;
  }
  return parseJsonObject(text.slice(start, end + 1));
};

// Highest confidence first.
export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  parseDirect,
  parseTypedFence,
  parseGenericFence,
  parseBraceSpan
];

export function extractJson(text: string): JsonObject | undefined {
  const content = text.trim();
  for (const strategy of EXTRACTION_STRATEGIES) {
    const value = strategy(content);
    if (value) {
      return value;
    }
  }
  return undefined;
}
