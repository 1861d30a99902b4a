/**
 * Document schema types.
 */

/** Value types a schema property can require. */
export type SchemaType = "string" | "number" | "integer" | "boolean" | "array" | "object" | "null";

export const SCHEMA_TYPES: readonly SchemaType[] = [
  "string",
  "number",
  "integer",
  "boolean",
  "array",
  "object",
  "null",
];

export interface PropertySchema {
  /** Required type, or any of several types. */
  type: SchemaType | SchemaType[];
}

/**
 * Schema checked on every inserted or replaced document.
 *
 * @example
 * ```typescript
 * const schema: DocumentSchema = {
 *   required: ["email"],
 *   properties: { email: { type: "string" }, age: { type: ["integer", "null"] } },
 * };
 * ```
 */
export interface DocumentSchema {
  /** Top-level fields that must be present. */
  required?: string[];
  /** Type constraints on fields, checked when the field is present. */
  properties?: Record<string, PropertySchema>;
}
