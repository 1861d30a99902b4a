/**
 * Validation of documents against a {@link DocumentSchema}.
 */
import type { Document, Value } from "../types.ts";
import { getValueByPath, isDocument } from "../document-utils.ts";
import { InvalidDocumentError } from "../errors.ts";
import { SCHEMA_TYPES, type DocumentSchema, type SchemaType } from "./types.ts";

/**
 * Collect every way a document breaks a schema. A required field holding
 * `null` counts as missing.
 *
 * @returns One message per violation; empty when the document is valid
 */
export function validateDocument(doc: Document, schema: DocumentSchema): string[] {
  const violations: string[] = [];

  for (const field of schema.required ?? []) {
    const value = getValueByPath(doc, field);
    if (value === undefined || value === null) {
      violations.push(`missing required field '${field}'`);
    }
  }

  for (const [field, property] of Object.entries(schema.properties ?? {})) {
    const value = getValueByPath(doc, field);
    if (value === undefined) {
      continue;
    }
    const types = Array.isArray(property.type) ? property.type : [property.type];
    if (!types.some((type) => matchesSchemaType(value, type))) {
      violations.push(`field '${field}' must be of type ${types.join(" or ")}`);
    }
  }

  return violations;
}

/**
 * Throw when a document breaks a schema.
 *
 * @throws InvalidDocumentError listing all violations
 */
export function assertValidDocument(doc: Document, schema: DocumentSchema | undefined): void {
  if (!schema) {
    return;
  }
  const violations = validateDocument(doc, schema);
  if (violations.length > 0) {
    throw new InvalidDocumentError(violations);
  }
}

/**
 * Check a schema's own shape, so a bad schema fails when it is set rather
 * than on the next insert.
 *
 * @throws Error describing the first problem
 */
export function checkSchema(schema: DocumentSchema): void {
  if (schema.required !== undefined && !Array.isArray(schema.required)) {
    throw new Error("schema.required must be an array of field names");
  }
  for (const [field, property] of Object.entries(schema.properties ?? {})) {
    const types = Array.isArray(property.type) ? property.type : [property.type];
    for (const type of types) {
      if (!SCHEMA_TYPES.includes(type)) {
        throw new Error(`Unknown schema type '${String(type)}' for field '${field}'`);
      }
    }
  }
}

function matchesSchemaType(value: Value, type: SchemaType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return isDocument(value);
    case "null":
      return value === null;
  }
}
