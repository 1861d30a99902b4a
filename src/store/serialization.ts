/**
 * Text encoding of documents at the store boundary.
 */
import type { Document, Value } from "../types.ts";
import { setField } from "../document-utils.ts";
import { StoreError } from "../errors.ts";

/**
 * Encode a document as JSON text.
 */
export function serializeDocument(doc: Document): string {
  return JSON.stringify(doc);
}

/**
 * Decode JSON text produced by {@link serializeDocument}.
 *
 * @throws StoreError when the text is not JSON or not a document
 */
export function deserializeDocument(text: string): Document {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new StoreError("Stored document is not valid JSON", { cause: error });
  }
  return toDocument(parsed);
}

/**
 * Check that parsed JSON is a document and type it as one.
 *
 * @throws StoreError for anything that is not a JSON object
 */
export function toDocument(raw: unknown): Document {
  const value = toValue(raw);
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw new StoreError("Stored value is not a document");
  }
  return value;
}

function toValue(raw: unknown): Value {
  if (raw === null || typeof raw === "boolean" || typeof raw === "string") {
    return raw;
  }
  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) {
      throw new StoreError("Stored number is not finite");
    }
    return raw;
  }
  if (Array.isArray(raw)) {
    return raw.map((item: unknown) => toValue(item));
  }
  if (typeof raw === "object") {
    const doc: Document = {};
    for (const [key, item] of Object.entries(raw)) {
      setField(doc, key, toValue(item));
    }
    return doc;
  }
  throw new StoreError(`Unsupported stored value of type ${typeof raw}`);
}
