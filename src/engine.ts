/**
 * Engine entry points with an explicit result type.
 *
 * These wrap the query matcher, update applier, pipeline and cursor so that a
 * caller can branch on `result.ok` and `result.error.kind` instead of catching.
 * Only shelfdb errors are turned into results; anything else is a bug and is
 * rethrown.
 *
 * @example
 * ```typescript
 * const result = applyUpdate(doc, { $inc: { n: 1 } });
 * if (!result.ok) {
 *   switch (result.error.kind) {
 *     case "InvalidUpdate":
 *       return reject(result.error.message);
 *   }
 * }
 * ```
 */
import type { Document, Filter, FindOptions, Pipeline, UpdateSpec } from "./types.ts";
import { ShelfError } from "./errors.ts";
import { matchesFilter } from "./query-matcher.ts";
import { applyUpdateOperators } from "./update-operators.ts";
import { runAggregation } from "./aggregation/index.ts";
import { ShelfCursor } from "./cursor.ts";

export type Result<T, E extends ShelfError = ShelfError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Run `fn`, turning a thrown ShelfError into a failed result.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    if (error instanceof ShelfError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * Unwrap a result, throwing its error when it failed.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/** Does `doc` satisfy `query`? Fails with InvalidQuery. */
export function match(doc: Document, query: Filter): Result<boolean> {
  return attempt(() => matchesFilter(doc, query));
}

/** Apply an update to a copy of `doc`. Fails with InvalidUpdate. */
export function applyUpdate(doc: Document, update: UpdateSpec, isUpsert = false): Result<Document> {
  return attempt(() => applyUpdateOperators(doc, update, isUpsert));
}

/** Run a pipeline over `docs`. Fails with InvalidQuery. */
export function runPipeline(docs: readonly Document[], pipeline: Pipeline): Result<Document[]> {
  return attempt(() => runAggregation(docs, pipeline));
}

/** Build a cursor over matched documents. Fails with InvalidQuery. */
export function createCursor(docs: readonly Document[], options: FindOptions = {}): Result<ShelfCursor> {
  return attempt(() => new ShelfCursor(docs, options));
}
