/**
 * Operand evaluation for pipeline stages.
 *
 * The pipeline understands two kinds of operand: a field reference, written
 * as a string starting with `$`, and a constant.
 */
import type { Document, Value } from "../types.ts";
import { getValueByPath, isDocument } from "../document-utils.ts";
import { InvalidQueryError } from "../errors.ts";

/**
 * Check if a value is a field reference such as `"$price"`.
 */
export function isFieldReference(value: Value | undefined): value is string {
  return typeof value === "string" && value.startsWith("$") && value.length > 1;
}

/**
 * Evaluate an operand against a document.
 *
 * @returns The referenced field (`undefined` when missing), or the constant
 *
 * @example
 * ```typescript
 * evaluateOperand("$a.b", { a: { b: 2 } }); // 2
 * evaluateOperand(1, { a: { b: 2 } });      // 1
 * ```
 */
export function evaluateOperand(operand: Value, doc: Document): Value | undefined {
  if (isFieldReference(operand)) {
    return getValueByPath(doc, operand.slice(1));
  }
  return operand;
}

/**
 * Evaluate a `$concat` argument: a list of field references and literals
 * joined into one string. Missing and null operands render as an empty string.
 */
export function evaluateConcat(parts: Value, doc: Document): string {
  if (!Array.isArray(parts)) {
    throw new InvalidQueryError("$concat requires an array");
  }

  let result = "";
  for (const part of parts) {
    const value = evaluateOperand(part, doc);
    if (value === undefined || value === null) {
      continue;
    }
    if (Array.isArray(value) || isDocument(value)) {
      throw new InvalidQueryError("$concat only supports strings, numbers and booleans");
    }
    result += String(value);
  }
  return result;
}
