/**
 * Value model helpers: dotted-path access, structural equality, cloning and
 * ordering of document values.
 *
 * Dotted paths address nested documents only. A segment is always a map key,
 * never an array index, so `"items.0"` looks up a key named `"0"`.
 */
import type { Document, Value } from "./types.ts";

/**
 * Check whether a value is a document (a plain mapping, not an array or null).
 */
export function isDocument(value: Value | undefined): value is Document {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Get a value from a document using a dotted path.
 *
 * @description
 * Resolves each segment as a key of the current document. Returns `undefined`
 * (missing) as soon as a segment is absent or the current value is not a
 * document. An explicit `null` is returned as `null`.
 *
 * @param doc - The document to read from
 * @param path - Dotted path such as `"address.city"`
 * @returns The value at the path, or `undefined` when it does not resolve
 *
 * @example
 * ```typescript
 * getValueByPath({ a: { b: 1 } }, "a.b");   // 1
 * getValueByPath({ a: [{ b: 1 }] }, "a.b"); // undefined
 * getValueByPath({ a: null }, "a");         // null
 * ```
 */
export function getValueByPath(doc: Document, path: string): Value | undefined {
  let current: Value | undefined = doc;
  for (const segment of path.split(".")) {
    if (!isDocument(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Assign an own field. A `__proto__` key is defined rather than assigned, since
 * assignment would replace the prototype.
 */
export function setField(doc: Document, key: string, value: Value): void {
  if (key === "__proto__") {
    Object.defineProperty(doc, key, { value, enumerable: true, writable: true, configurable: true });
  } else {
    doc[key] = value;
  }
}

/**
 * Set a value in a document using a dotted path, creating intermediate
 * documents as needed. A non-document intermediate is overwritten.
 *
 * @example
 * ```typescript
 * const doc = { a: 5 };
 * setValueByPath(doc, "a.b.c", 1); // doc is now { a: { b: { c: 1 } } }
 * ```
 */
export function setValueByPath(doc: Document, path: string, value: Value): void {
  const segments = path.split(".");
  const last = segments.pop() ?? path;
  let current = doc;

  for (const segment of segments) {
    const next = Object.hasOwn(current, segment) ? current[segment] : undefined;
    if (isDocument(next)) {
      current = next;
    } else {
      const created: Document = {};
      setField(current, segment, created);
      current = created;
    }
  }

  setField(current, last, value);
}

/**
 * Remove the value at a dotted path. No-op when the parent does not resolve
 * to a document.
 */
export function deleteValueByPath(doc: Document, path: string): void {
  const segments = path.split(".");
  const last = segments.pop() ?? path;
  const parent = segments.length === 0 ? doc : getValueByPath(doc, segments.join("."));

  if (isDocument(parent)) {
    delete parent[last];
  }
}

/**
 * Structural equality of two values.
 *
 * Missing (`undefined`) only equals missing. Numbers compare by numeric value.
 * Arrays compare element-wise in order. Documents compare by key set and
 * per-key values, regardless of key order.
 */
export function valuesEqual(a: Value | undefined, b: Value | undefined): boolean {
  if (a === b) {
    return true;
  }
  if (a === undefined || b === undefined || a === null || b === null) {
    return false;
  }

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, i) => valuesEqual(item, b[i]));
  }

  if (isDocument(a)) {
    if (!isDocument(b)) {
      return false;
    }
    const keysA = Object.keys(a);
    if (keysA.length !== Object.keys(b).length) {
      return false;
    }
    return keysA.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Deep copy of a value. Key insertion order is preserved.
 */
export function cloneValue<T extends Value>(value: T): T;
export function cloneValue(value: Value): Value {
  if (Array.isArray(value)) {
    return value.map((item) => cloneValue(item));
  }
  if (isDocument(value)) {
    return cloneDocument(value);
  }
  return value;
}

/**
 * Deep copy of a document.
 */
export function cloneDocument(doc: Document): Document {
  const copy: Document = {};
  for (const [key, value] of Object.entries(doc)) {
    setField(copy, key, cloneValue(value));
  }
  return copy;
}

/**
 * Type ordering used by sorting and by `$min`/`$max`.
 * Missing and null sort first, then numbers, strings, documents, arrays and
 * booleans.
 */
export function getTypeOrder(value: Value | undefined): number {
  if (value === undefined || value === null) return 0;
  if (typeof value === "number") return 1;
  if (typeof value === "string") return 2;
  if (Array.isArray(value)) return 4;
  if (typeof value === "boolean") return 5;
  return 3;
}

/**
 * Total order over values, including missing. Returns a negative number,
 * zero or a positive number.
 *
 * Values of different types compare by {@link getTypeOrder}. Strings compare
 * by code unit, arrays element-wise then by length, documents entry by entry
 * in key order.
 */
export function compareValues(a: Value | undefined, b: Value | undefined): number {
  const typeDiff = getTypeOrder(a) - getTypeOrder(b);
  if (typeDiff !== 0) {
    return typeDiff;
  }

  if (typeof a === "number" && typeof b === "number") {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
      const cmp = compareValues(a[i], b[i]);
      if (cmp !== 0) return cmp;
    }
    return a.length - b.length;
  }
  if (isDocument(a) && isDocument(b)) {
    const entriesA = Object.entries(a);
    const entriesB = Object.entries(b);
    const length = Math.min(entriesA.length, entriesB.length);
    for (let i = 0; i < length; i++) {
      const [keyA, valueA] = entriesA[i];
      const [keyB, valueB] = entriesB[i];
      if (keyA !== keyB) return keyA < keyB ? -1 : 1;
      const cmp = compareValues(valueA, valueB);
      if (cmp !== 0) return cmp;
    }
    return entriesA.length - entriesB.length;
  }

  // null/null or missing/missing
  return 0;
}

/**
 * Compare two values of the same orderable primitive type.
 * Returns `undefined` when the pair is not orderable (different types,
 * null, missing, arrays or documents).
 */
export function compareOrderable(a: Value | undefined, b: Value | undefined): number | undefined {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  return undefined;
}

/**
 * Canonical string for a value, equal for structurally equal values.
 * Used to bucket documents by key.
 */
export function canonicalKey(value: Value | undefined): string {
  if (value === undefined) {
    return "missing";
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalKey(item)).join(",")}]`;
  }
  if (isDocument(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalKey(value[key])}`).join(",")}}`;
  }
  return JSON.stringify(value);
}
