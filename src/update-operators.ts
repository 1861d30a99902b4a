/**
 * Update operators: turn a document and an update specification into a new
 * document. The input document is never mutated.
 */
import type { Document, UpdateOperatorName, UpdateSpec, Value } from "./types.ts";
import { UPDATE_OPERATORS } from "./types.ts";
import {
  cloneDocument,
  cloneValue,
  deleteValueByPath,
  getValueByPath,
  isDocument,
  setValueByPath,
  valuesEqual,
} from "./document-utils.ts";
import { matchesElementCondition } from "./query-matcher.ts";
import { InvalidUpdateError } from "./errors.ts";

const KNOWN_OPERATORS: ReadonlySet<string> = new Set(UPDATE_OPERATORS);

function isUpdateOperator(key: string): key is UpdateOperatorName {
  return KNOWN_OPERATORS.has(key);
}

/**
 * Check the shape of an update specification without applying it:
 * every key must be a known operator mapped to a document of `path: argument`.
 *
 * @throws InvalidUpdateError naming the offending operator
 */
export function validateUpdate(update: UpdateSpec): void {
  if (!isDocument(update)) {
    throw new InvalidUpdateError("update must be a document of update operators");
  }
  for (const [op, fields] of Object.entries(update)) {
    if (!isUpdateOperator(op)) {
      throw new InvalidUpdateError(`Unknown update operator: ${op}`);
    }
    if (!isDocument(fields)) {
      throw new InvalidUpdateError(`${op} requires a document of field paths`);
    }
  }
}

/**
 * Apply update operators to a document.
 *
 * @description
 * Works on a deep copy. Operators are applied in the order their keys appear
 * in the update. `$setOnInsert` is skipped here; upserts apply it through
 * {@link buildUpsertDocument}.
 *
 * `_id` may not change, except on the seed document of an upsert
 * (`isUpsert` true), where an operator may set it.
 *
 * @param doc - The document to update (not mutated)
 * @param update - Update specification
 * @param isUpsert - Whether the document is the seed of an upsert insert
 * @returns The updated copy
 * @throws InvalidUpdateError on malformed updates or values of the wrong type
 *
 * @example
 * ```typescript
 * applyUpdateOperators(
 *   { _id: "a", tags: ["x", "y"], n: 2 },
 *   { $inc: { n: 1 }, $push: { tags: "z" } }
 * );
 * // { _id: "a", tags: ["x", "y", "z"], n: 3 }
 * ```
 */
export function applyUpdateOperators(
  doc: Document,
  update: UpdateSpec,
  isUpsert = false
): Document {
  validateUpdate(update);
  const result = cloneDocument(doc);

  for (const [op, fields] of Object.entries(update)) {
    if (!isUpdateOperator(op) || !isDocument(fields)) {
      continue;
    }
    for (const [path, arg] of Object.entries(fields)) {
      applyOperator(result, op, path, arg);
    }
  }

  if (!isUpsert && !valuesEqual(doc._id, result._id)) {
    throw new InvalidUpdateError(
      "Performing an update on the path '_id' would modify the immutable field '_id'"
    );
  }

  return result;
}

function applyOperator(doc: Document, op: UpdateOperatorName, path: string, arg: Value): void {
  switch (op) {
    case "$set":
      setValueByPath(doc, path, cloneValue(arg));
      return;

    case "$unset":
      deleteValueByPath(doc, path);
      return;

    case "$inc":
    case "$mul": {
      if (typeof arg !== "number") {
        throw new InvalidUpdateError(`${op} requires a numeric argument for field: ${path}`);
      }
      const current = getValueByPath(doc, path) ?? 0;
      if (typeof current !== "number") {
        throw new InvalidUpdateError(`${op} requires numeric field: ${path}`);
      }
      setValueByPath(doc, path, op === "$inc" ? current + arg : current * arg);
      return;
    }

    case "$rename": {
      if (typeof arg !== "string" || arg.length === 0) {
        throw new InvalidUpdateError(`$rename target must be a non-empty string: ${path}`);
      }
      const current = getValueByPath(doc, path);
      if (current === undefined || arg === path) {
        return;
      }
      deleteValueByPath(doc, path);
      setValueByPath(doc, arg, current);
      return;
    }

    case "$push":
    case "$addToSet": {
      const target = getArrayForUpdate(doc, op, path);
      for (const item of eachValues(op, arg)) {
        if (op === "$push" || !target.some((existing) => valuesEqual(existing, item))) {
          target.push(item);
        }
      }
      setValueByPath(doc, path, target);
      return;
    }

    case "$pull": {
      const target = getArrayForUpdate(doc, op, path);
      const condition = arg;
      const kept = isDocument(condition)
        ? target.filter((element) => !matchesElementCondition(element, condition))
        : target.filter((element) => !valuesEqual(element, condition));
      setValueByPath(doc, path, kept);
      return;
    }

    case "$pullAll": {
      const removed = arg;
      if (!Array.isArray(removed)) {
        throw new InvalidUpdateError(`$pullAll requires an array argument: ${path}`);
      }
      const target = getArrayForUpdate(doc, op, path);
      setValueByPath(
        doc,
        path,
        target.filter((element) => !removed.some((value) => valuesEqual(element, value)))
      );
      return;
    }

    case "$pop": {
      const target = getArrayForUpdate(doc, op, path);
      // An empty array is left alone whatever the direction
      if (target.length > 0) {
        if (arg === 1) {
          target.pop();
        } else if (arg === -1) {
          target.shift();
        } else {
          throw new InvalidUpdateError(`$pop value must be 1 or -1: ${path}`);
        }
      }
      setValueByPath(doc, path, target);
      return;
    }

    case "$setOnInsert":
      return;
  }
}

/**
 * Read the array an array operator works on. A missing target counts as an
 * empty array.
 */
function getArrayForUpdate(doc: Document, op: string, path: string): Value[] {
  const current = getValueByPath(doc, path);
  if (current === undefined) {
    return [];
  }
  if (!Array.isArray(current)) {
    throw new InvalidUpdateError(`${op} requires array field: ${path}`);
  }
  return current;
}

/**
 * Values appended by `$push`/`$addToSet`: the `$each` list, or the bare argument.
 */
function eachValues(op: string, arg: Value): Value[] {
  if (isDocument(arg) && "$each" in arg) {
    const extra = Object.keys(arg).filter((key) => key !== "$each");
    if (extra.length > 0) {
      throw new InvalidUpdateError(`Unsupported ${op} modifier: ${extra[0]}`);
    }
    const items = arg.$each;
    if (!Array.isArray(items)) {
      throw new InvalidUpdateError(`${op} $each requires an array`);
    }
    return items.map((item) => cloneValue(item));
  }
  return [cloneValue(arg)];
}

/**
 * Build the document inserted by an upsert: `{ _id }`, then the
 * `$setOnInsert` fields, then the remaining operators.
 *
 * @example
 * ```typescript
 * buildUpsertDocument("a1", { $set: { x: 1 }, $setOnInsert: { y: 2 } });
 * // { _id: "a1", y: 2, x: 1 }
 * ```
 */
export function buildUpsertDocument(id: string, update: UpdateSpec): Document {
  validateUpdate(update);
  const seed: Document = { _id: id };

  const onInsert = update.$setOnInsert;
  if (isDocument(onInsert)) {
    for (const [path, value] of Object.entries(onInsert)) {
      setValueByPath(seed, path, cloneValue(value));
    }
  }

  return applyUpdateOperators(seed, update, true);
}

/**
 * Validate that a replacement document has no update operators.
 *
 * @throws InvalidUpdateError if a top-level key starts with `$`
 */
export function validateReplacement(replacement: Document): void {
  if (!isDocument(replacement)) {
    throw new InvalidUpdateError("replacement must be a document");
  }
  for (const key of Object.keys(replacement)) {
    if (key.startsWith("$")) {
      throw new InvalidUpdateError(`Replacement document must not contain update operators: ${key}`);
    }
  }
}
