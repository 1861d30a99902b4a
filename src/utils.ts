/**
 * Projection and sorting helpers shared by the cursor and the pipeline.
 */
import type { Document, ProjectionSpec, SortSpec, Value } from "./types.ts";
import {
  cloneDocument,
  cloneValue,
  compareValues,
  deleteValueByPath,
  getValueByPath,
  isDocument,
  setValueByPath,
} from "./document-utils.ts";
import { InvalidQueryError } from "./errors.ts";

export type ProjectionMode = "inclusion" | "exclusion" | "passthrough";

/**
 * Work out whether a projection includes or excludes fields.
 *
 * `_id` may be excluded in an inclusion projection. Any other mix of
 * inclusion and exclusion is rejected.
 *
 * @throws InvalidQueryError when inclusion and exclusion are mixed
 */
export function getProjectionMode(projection: ProjectionSpec | undefined): ProjectionMode {
  if (projection === undefined) {
    return "passthrough";
  }
  if (!isDocument(projection)) {
    throw new InvalidQueryError("projection must be a document");
  }

  let hasInclusion = false;
  let hasExclusion = false;

  for (const [key, value] of Object.entries(projection)) {
    if (value !== 0 && value !== 1 && typeof value !== "boolean") {
      throw new InvalidQueryError(`projection value for ${key} must be 0, 1, true or false`);
    }
    const included = value === 1 || value === true;
    if (key === "_id") {
      continue;
    }
    if (included) {
      hasInclusion = true;
    } else {
      hasExclusion = true;
    }
  }

  if (hasInclusion && hasExclusion) {
    throw new InvalidQueryError("Cannot do exclusion on a field in an inclusion projection");
  }
  if (hasInclusion) {
    return "inclusion";
  }
  const excludesId = projection._id === 0 || projection._id === false;
  if (hasExclusion || excludesId) {
    return "exclusion";
  }
  // Only `_id: 1`: keeps just the identifier
  return Object.keys(projection).length > 0 ? "inclusion" : "passthrough";
}

/**
 * Apply a projection to a document, returning a new document.
 *
 * @example
 * ```typescript
 * applyProjection({ _id: "a", name: "x", age: 3 }, { name: 1 });
 * // { _id: "a", name: "x" }
 * applyProjection({ _id: "a", name: "x", age: 3 }, { age: 0 });
 * // { _id: "a", name: "x" }
 * ```
 */
export function applyProjection(doc: Document, projection: ProjectionSpec | undefined): Document {
  const mode = getProjectionMode(projection);
  if (mode === "passthrough" || projection === undefined) {
    return cloneDocument(doc);
  }

  if (mode === "exclusion") {
    const result = cloneDocument(doc);
    for (const [path, value] of Object.entries(projection)) {
      if (value === 0 || value === false) {
        deleteValueByPath(result, path);
      }
    }
    return result;
  }

  const result: Document = {};
  const excludeId = projection._id === 0 || projection._id === false;
  if (!excludeId && doc._id !== undefined) {
    result._id = cloneValue(doc._id);
  }
  for (const [path, value] of Object.entries(projection)) {
    if (path === "_id" || !(value === 1 || value === true)) {
      continue;
    }
    const fieldValue = getValueByPath(doc, path);
    if (fieldValue !== undefined) {
      setValueByPath(result, path, cloneValue(fieldValue));
    }
  }
  return result;
}

/**
 * Validate a sort specification.
 *
 * @throws InvalidQueryError when a direction is not 1 or -1
 */
export function validateSortSpec(sort: Value | undefined): asserts sort is SortSpec {
  if (!isDocument(sort)) {
    throw new InvalidQueryError("sort specification must be a document");
  }
  for (const [key, direction] of Object.entries(sort)) {
    if (direction !== 1 && direction !== -1) {
      throw new InvalidQueryError(`sort direction for ${key} must be 1 or -1`);
    }
  }
}

/**
 * Sort documents by several keys.
 *
 * Runs one stable sort per key, from the last key to the first, so the first
 * key is the primary order and earlier order survives ties. Missing and null
 * sort before every other value.
 *
 * @returns A new array; the input is not reordered
 */
export function sortDocuments<T extends Document>(docs: readonly T[], sort: SortSpec): T[] {
  return sortBy(docs, sort, (doc) => doc);
}

/**
 * Sort arbitrary items by the documents they carry, with the same ordering as
 * {@link sortDocuments}.
 */
export function sortBy<T>(items: readonly T[], sort: SortSpec, toDocument: (item: T) => Document): T[] {
  const sorted = [...items];
  for (const [path, direction] of Object.entries(sort).reverse()) {
    sorted.sort(
      (a, b) =>
        direction *
        compareValues(getValueByPath(toDocument(a), path), getValueByPath(toDocument(b), path))
    );
  }
  return sorted;
}
