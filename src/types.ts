/**
 * Common types and interfaces for shelfdb.
 */

/**
 * Any value a document can hold.
 * A missing field is represented by `undefined`, never by `null`.
 */
export type Value = null | boolean | number | string | Value[] | Document;

/**
 * A mapping of string keys to values.
 * Documents stored in a collection conventionally carry a string `_id`.
 */
export interface Document {
  [key: string]: Value;
}

/**
 * Query specification.
 * Top-level keys are either logical operators (`$and`, `$or`, `$nor`, `$not`)
 * or dotted field paths mapped to a literal or an operator document.
 *
 * @example
 * ```typescript
 * const filter: Filter = { age: { $gte: 18, $lt: 65 }, "address.city": "Leeds" };
 * ```
 */
export type Filter = Document;

/**
 * Update specification: update operators mapped to `{ path: argument }` documents.
 *
 * @example
 * ```typescript
 * const update: UpdateSpec = { $inc: { n: 1 }, $push: { tags: "z" } };
 * ```
 */
export type UpdateSpec = Document;

/** Update operators understood by the update applier. */
export const UPDATE_OPERATORS = [
  "$set",
  "$unset",
  "$inc",
  "$mul",
  "$rename",
  "$push",
  "$pull",
  "$pullAll",
  "$addToSet",
  "$pop",
  "$setOnInsert",
] as const;

export type UpdateOperatorName = (typeof UPDATE_OPERATORS)[number];

/** A single pipeline stage: a document with exactly one `$stage` key. */
export type PipelineStage = Document;

/** Ordered list of pipeline stages. */
export type Pipeline = PipelineStage[];

/** Sort direction per dotted path. Key order gives precedence. */
export type SortSpec = Record<string, 1 | -1>;

/**
 * Projection: `1`/`true` includes a path, `0`/`false` excludes it.
 * Inclusion and exclusion may not be mixed, except for `_id: 0`.
 */
export type ProjectionSpec = Record<string, 0 | 1 | boolean>;

/** Options for find operations. */
export interface FindOptions {
  projection?: ProjectionSpec;
  sort?: SortSpec;
  skip?: number;
  limit?: number;
}

export interface FindOneOptions {
  projection?: ProjectionSpec;
  sort?: SortSpec;
  skip?: number;
}

export interface UpdateOptions {
  /** Insert a seeded document when nothing matches. */
  upsert?: boolean;
}

export type ReturnDocument = "before" | "after";

export interface FindOneAndUpdateOptions {
  sort?: SortSpec;
  projection?: ProjectionSpec;
  upsert?: boolean;
  /** Which image to return. Defaults to `"after"`. */
  returnDocument?: ReturnDocument;
}

export type FindOneAndReplaceOptions = FindOneAndUpdateOptions;

export interface FindOneAndDeleteOptions {
  sort?: SortSpec;
  projection?: ProjectionSpec;
}

export interface InsertOneResult {
  acknowledged: boolean;
  insertedId: string;
}

export interface InsertManyResult {
  acknowledged: boolean;
  insertedCount: number;
  insertedIds: Record<number, string>;
}

export interface UpdateResult {
  acknowledged: boolean;
  matchedCount: number;
  modifiedCount: number;
  upsertedCount: number;
  upsertedId: string | null;
}

export interface DeleteResult {
  acknowledged: boolean;
  deletedCount: number;
}

/**
 * Operations accepted by `bulkWrite`, one key per request.
 *
 * @example
 * ```typescript
 * await collection.bulkWrite([
 *   { insertOne: { document: { _id: "a", n: 1 } } },
 *   { updateOne: { filter: { _id: "a" }, update: { $inc: { n: 1 } } } },
 *   { deleteMany: { filter: { stale: true } } },
 * ]);
 * ```
 */
export type BulkWriteOperation =
  | { insertOne: { document: Document } }
  | { updateOne: { filter: Filter; update: UpdateSpec; upsert?: boolean } }
  | { updateMany: { filter: Filter; update: UpdateSpec; upsert?: boolean } }
  | { replaceOne: { filter: Filter; replacement: Document; upsert?: boolean } }
  | { deleteOne: { filter: Filter } }
  | { deleteMany: { filter: Filter } };

export interface BulkWriteResult {
  acknowledged: boolean;
  insertedCount: number;
  matchedCount: number;
  modifiedCount: number;
  deletedCount: number;
  upsertedCount: number;
  /** Generated or supplied identifiers keyed by request index. */
  insertedIds: Record<number, string>;
  upsertedIds: Record<number, string>;
}
