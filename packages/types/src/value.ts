import { z } from 'zod';

export type JsonPrimitive = null | boolean | number | string;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export const JsonPrimitiveSchema = z.union([z.null(), z.boolean(), z.number(), z.string()]);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    JsonPrimitiveSchema,
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

/** Validate an untrusted, already-decoded document as a JSON value tree. */
export function parseJsonValue(input: unknown): JsonValue {
  return JsonValueSchema.parse(input);
}

// --- Relative delta ---

export const RelativeDeltaSchema = z.object({
  years: z.number().int().optional(),
  months: z.number().int().optional(),
  days: z.number().int().optional(),
}).strict();
export type RelativeDelta = z.infer<typeof RelativeDeltaSchema>;
