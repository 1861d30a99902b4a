/**
 * Aggregation pipeline interpreter.
 */
import type { Document, Pipeline, Value } from "../types.ts";
import {
  canonicalKey,
  cloneDocument,
  cloneValue,
  getValueByPath,
  isDocument,
  setField,
  setValueByPath,
} from "../document-utils.ts";
import { matchesFilter, validateFilter } from "../query-matcher.ts";
import { sortDocuments, validateSortSpec } from "../utils.ts";
import { InvalidQueryError } from "../errors.ts";
import { createAccumulator, type Accumulator } from "./accumulators.ts";
import { evaluateConcat, evaluateOperand, isFieldReference } from "./expression.ts";

/**
 * Run an aggregation pipeline over a sequence of documents.
 *
 * @description
 * Stages run strictly in order, each consuming the previous stage's output.
 * Supported stages: `$match`, `$project`, `$sort`, `$skip`, `$limit`,
 * `$group`, `$count` and `$unwind`. Input documents are copied first and
 * never mutated.
 *
 * @param docs - Input documents
 * @param pipeline - Ordered list of single-key stage documents
 * @returns The documents produced by the last stage
 * @throws InvalidQueryError for unknown stages or malformed stage arguments
 *
 * @example
 * ```typescript
 * runAggregation(
 *   [{ cat: "a", v: 1 }, { cat: "a", v: 3 }, { cat: "b", v: 5 }],
 *   [{ $group: { _id: "$cat", total: { $sum: "$v" } } }]
 * );
 * // [{ _id: "a", total: 4 }, { _id: "b", total: 5 }]
 * ```
 */
export function runAggregation(docs: readonly Document[], pipeline: Pipeline): Document[] {
  if (!Array.isArray(pipeline)) {
    throw new InvalidQueryError("pipeline must be an array of stages");
  }

  let current = docs.map((doc) => cloneDocument(doc));
  for (const stage of pipeline) {
    current = executeStage(current, stage);
  }
  return current;
}

function executeStage(docs: Document[], stage: Value): Document[] {
  if (!isDocument(stage)) {
    throw new InvalidQueryError("Each pipeline stage must be a document");
  }
  const entries = Object.entries(stage);
  if (entries.length !== 1) {
    throw new InvalidQueryError("A pipeline stage specification object must contain exactly one field");
  }
  const [name, spec] = entries[0];

  switch (name) {
    case "$match":
      return execMatch(docs, spec);
    case "$project":
      return execProject(docs, spec);
    case "$sort":
      validateSortSpec(spec);
      return sortDocuments(docs, spec);
    case "$skip": {
      const n = toCount(name, spec);
      return n > 0 ? docs.slice(n) : docs;
    }
    case "$limit": {
      const n = toCount(name, spec);
      return n > 0 ? docs.slice(0, n) : docs;
    }
    case "$group":
      return execGroup(docs, spec);
    case "$count":
      return [{ count: docs.length }];
    case "$unwind":
      return execUnwind(docs, spec);
    default:
      throw new InvalidQueryError(`Unrecognized pipeline stage name: '${name}'`);
  }
}

function execMatch(docs: Document[], spec: Value): Document[] {
  const filter = spec;
  if (!isDocument(filter)) {
    throw new InvalidQueryError("$match requires a query document");
  }
  validateFilter(filter);
  return docs.filter((doc) => matchesFilter(doc, filter));
}

function toCount(stageName: string, spec: Value): number {
  if (typeof spec !== "number" || !Number.isFinite(spec)) {
    throw new InvalidQueryError(`${stageName} requires a number`);
  }
  return Math.floor(spec);
}

/**
 * `$project`: build each output document from its field specifications.
 * `0`/`false` fields are ignored; there is no implicit `_id`.
 */
function execProject(docs: Document[], spec: Value): Document[] {
  if (!isDocument(spec)) {
    throw new InvalidQueryError("$project requires a document");
  }
  const fields = Object.entries(spec);

  return docs.map((doc) => {
    const result: Document = {};
    for (const [field, expr] of fields) {
      const value = evaluateProjectField(doc, field, expr);
      if (value !== undefined) {
        setValueByPath(result, field, value);
      }
    }
    return result;
  });
}

function evaluateProjectField(doc: Document, field: string, expr: Value): Value | undefined {
  if (expr === 1 || expr === true) {
    const value = getValueByPath(doc, field);
    return value === undefined ? undefined : cloneValue(value);
  }
  if (expr === 0 || expr === false) {
    return undefined;
  }
  if (isFieldReference(expr)) {
    const value = evaluateOperand(expr, doc);
    return value === undefined ? undefined : cloneValue(value);
  }
  if (isDocument(expr)) {
    const keys = Object.keys(expr);
    if (keys.length === 1 && keys[0] === "$literal") {
      return cloneValue(expr.$literal);
    }
    if (keys.length === 1 && keys[0] === "$concat") {
      return evaluateConcat(expr.$concat, doc);
    }
    throw new InvalidQueryError(`Invalid $project expression for field '${field}': ${keys.join(", ")}`);
  }
  throw new InvalidQueryError(
    `Invalid $project value for field '${field}'; use 1, 0, a field reference, $literal or $concat`
  );
}

interface GroupBucket {
  id: Value;
  accumulators: [string, Accumulator][];
}

/**
 * `$group`: bucket documents by the evaluated `_id` and reduce each bucket
 * with its accumulators. Buckets come out in first-seen order.
 */
function execGroup(docs: Document[], spec: Value): Document[] {
  if (!isDocument(spec)) {
    throw new InvalidQueryError("$group requires a document");
  }
  const idExpr = spec._id ?? null;
  const fieldSpecs = Object.entries(spec).filter(([field]) => field !== "_id");
  for (const [field, accSpec] of fieldSpecs) {
    // Accumulator specs are checked even when there is no input
    createAccumulator(field, accSpec);
  }

  const buckets = new Map<string, GroupBucket>();
  for (const doc of docs) {
    const id = evaluateOperand(idExpr, doc) ?? null;
    const key = canonicalKey(id);

    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = {
        id: cloneValue(id),
        accumulators: fieldSpecs.map(([field, accSpec]): [string, Accumulator] => [
          field,
          createAccumulator(field, accSpec),
        ]),
      };
      buckets.set(key, bucket);
    }
    for (const [, accumulator] of bucket.accumulators) {
      accumulator.accumulate(doc);
    }
  }

  return Array.from(buckets.values(), (bucket) => {
    const result: Document = { _id: bucket.id };
    for (const [field, accumulator] of bucket.accumulators) {
      setField(result, field, accumulator.getResult());
    }
    return result;
  });
}

/**
 * `$unwind`: one output document per element of the array at the path.
 * Documents where the path is missing or not an array are dropped.
 */
function execUnwind(docs: Document[], spec: Value): Document[] {
  const rawPath = isDocument(spec) ? spec.path : spec;
  if (typeof rawPath !== "string" || rawPath.length === 0) {
    throw new InvalidQueryError("$unwind requires a field path");
  }
  const path = rawPath.startsWith("$") ? rawPath.slice(1) : rawPath;

  const result: Document[] = [];
  for (const doc of docs) {
    const items = getValueByPath(doc, path);
    if (!Array.isArray(items)) {
      continue;
    }
    for (const item of items) {
      const unwound = cloneDocument(doc);
      setValueByPath(unwound, path, cloneValue(item));
      result.push(unwound);
    }
  }
  return result;
}
