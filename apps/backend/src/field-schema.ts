import { z } from "zod";

export type FieldType = "string" | "number" | "integer" | "boolean" | "array" | "object";

export interface FieldDescriptor {
  type: FieldType;
  required?: boolean;
  description?: string;
  enum?: string[];
  items?: FieldDescriptor;
  fields?: Record<string, FieldDescriptor>;
}

export type FieldMap = Record<string, FieldDescriptor>;

export const fieldDescriptorSchema: z.ZodType<FieldDescriptor> = z.lazy(() =>
  z
    .object({
      type: z.enum(["string", "number", "integer", "boolean", "array", "object"]),
      required: z.boolean().optional(),
      description: z.string().optional(),
      enum: z.array(z.string()).min(1).optional(),
      items: fieldDescriptorSchema.optional(),
      fields: fieldMapSchema.optional()
    })
    .refine((field) => field.enum === undefined || field.type === "string", {
      message: "enum is only supported on string fields",
      path: ["enum"]
    })
);

const hasNoProtoKey = (value: unknown): boolean =>
  typeof value !== "object" || value === null || !Object.hasOwn(value, "__proto__");

// Checked on the raw object: records drop a __proto__ key while parsing.
export const fieldMapSchema = z
  .unknown()
  .refine(hasNoProtoKey, { message: "__proto__ is not a valid field name" })
  .pipe(z.record(z.string(), fieldDescriptorSchema));

function fieldToSchema(field: FieldDescriptor): z.ZodType {
  let schema: z.ZodType;
  switch (field.type) {
    case "string":
      schema = field.enum && field.enum.length > 0 ? z.enum(field.enum) : z.string();
      break;
    case "number":
      schema = z.number();
      break;
    case "integer":
      schema = z.number().int();
      break;
    case "boolean":
      schema = z.boolean();
      break;
    case "array":
      schema = z.array(field.items ? fieldToSchema(field.items) : z.unknown());
      break;
    case "object":
      schema = field.fields ? schemaFromFields(field.fields) : z.record(z.string(), z.unknown());
      break;
  }
  if (field.description) {
    schema = schema.describe(field.description);
  }
  return field.required === false ? schema.optional() : schema;
}

/** Builds an object schema; every field is required unless marked `required: false`. */
export function schemaFromFields(fields: FieldMap) {
  const shape: Record<string, z.ZodType> = Object.fromEntries(
    Object.entries(fields).map(([name, field]) => [name, fieldToSchema(field)])
  );
  return z.object(shape);
}
