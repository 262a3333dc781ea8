import { z } from "zod"

export const jsonValueSchema = z.json()

export const jsonObjectSchema = z.record(z.string(), jsonValueSchema)

/** Any value a JSON document can hold. */
export type JsonValue = z.infer<typeof jsonValueSchema>

/** A JSON object: field name to JSON value. Configuration records have this shape. */
export type JsonObject = z.infer<typeof jsonObjectSchema>

/**
 * Top-level shape check for decoded JSON. Nested values are not walked, so
 * use it on `JSON.parse` output, or validate with `jsonObjectSchema` first.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
