import { ObjectId } from "bson";
import type {
  BulkWriteOperation,
  BulkWriteResult,
  DeleteResult,
  Document,
  Filter,
  FindOneAndDeleteOptions,
  FindOneAndReplaceOptions,
  FindOneAndUpdateOptions,
  FindOneOptions,
  FindOptions,
  InsertManyResult,
  InsertOneResult,
  Pipeline,
  SortSpec,
  UpdateOptions,
  UpdateResult,
  UpdateSpec,
  Value,
} from "./types.ts";
import { cloneDocument, getValueByPath, isDocument, valuesEqual } from "./document-utils.ts";
import { matchesFilter, validateFilter } from "./query-matcher.ts";
import {
  applyUpdateOperators,
  buildUpsertDocument,
  validateReplacement,
  validateUpdate,
} from "./update-operators.ts";
import { runAggregation } from "./aggregation/index.ts";
import { ShelfCursor } from "./cursor.ts";
import { applyProjection, getProjectionMode, sortBy, validateSortSpec } from "./utils.ts";
import {
  DocumentNotFoundError,
  InvalidDocumentError,
  InvalidQueryError,
  InvalidUpdateError,
} from "./errors.ts";
import { Mutex } from "./mutex.ts";
import { Logger, createSilentLogger } from "./logger.ts";
import { assertValidDocument, checkSchema, type DocumentSchema } from "./schema/index.ts";
import type { DocumentStore, StoredDocument } from "./store/index.ts";

export interface CollectionOptions {
  /** Checked on insert, replace and upsert. */
  schema?: DocumentSchema;
  logger?: Logger;
  /** Generates `_id` for documents that have none. Defaults to ObjectId hex strings. */
  idFactory?: () => string;
}

interface WriteOutcome {
  matchedCount: number;
  modifiedCount: number;
  upsertedId: string | null;
}

/**
 * ShelfCollection runs queries, updates and pipelines over the documents of
 * one {@link DocumentStore}.
 *
 * Every operation scans the store, evaluates in process, then writes changed
 * documents back. Operations on one collection object run one at a time; writers
 * that bypass this object (another process, another collection over the same
 * store) are not coordinated with.
 *
 * @example
 * ```typescript
 * const users = new ShelfCollection(new MemoryStore());
 * await users.insertOne({ name: "Ada", age: 36 });
 * const adult = await users.findOne({ age: { $gte: 18 } });
 * ```
 */
export class ShelfCollection {
  private readonly store: DocumentStore;
  private readonly mutex = new Mutex();
  private readonly logger: Logger;
  private readonly idFactory: () => string;
  private schema: DocumentSchema | undefined;

  /**
   * Create a collection over a store.
   *
   * @param store - Where documents are kept; the caller owns and closes it
   * @param options - Schema, logger and identifier generator
   *
   * @example
   * ```typescript
   * const store = new SqliteStore({ filePath: ":memory:", table: "users" });
   * const users = new ShelfCollection(store, {
   *   schema: { required: ["email"], properties: { email: { type: "string" } } },
   * });
   * ```
   */
  constructor(store: DocumentStore, options: CollectionOptions = {}) {
    this.store = store;
    this.logger = options.logger ?? createSilentLogger();
    this.idFactory = options.idFactory ?? (() => new ObjectId().toHexString());
    this.setSchema(options.schema);
  }

  /**
   * Replace the schema checked on writes. `undefined` removes it.
   * Documents already stored are not re-checked.
   */
  setSchema(schema: DocumentSchema | undefined): void {
    if (schema) {
      checkSchema(schema);
    }
    this.schema = schema;
  }

  // ==================== Private Helpers ====================

  /**
   * Run one operation under the collection mutex and log its outcome.
   */
  private execute<T>(op: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const started = Date.now();
      try {
        const result = await fn();
        this.logger.operation(`collection.${op}`, Date.now() - started);
        return result;
      } catch (error) {
        this.logger.operation(`collection.${op}`, Date.now() - started, error, "warn");
        throw error;
      }
    });
  }

  private async findMatches(filter: Filter, firstOnly = false): Promise<StoredDocument[]> {
    validateFilter(filter);
    const rows = await this.store.scan();
    const matches: StoredDocument[] = [];
    for (const row of rows) {
      if (matchesFilter(row.document, filter)) {
        matches.push(row);
        if (firstOnly) {
          break;
        }
      }
    }
    return matches;
  }

  private async findFirstMatch(
    filter: Filter,
    sort: SortSpec | undefined
  ): Promise<StoredDocument | undefined> {
    if (sort === undefined) {
      const matches = await this.findMatches(filter, true);
      return matches.length > 0 ? matches[0] : undefined;
    }
    validateSortSpec(sort);
    const ordered = sortBy(await this.findMatches(filter), sort, (row) => row.document);
    return ordered.length > 0 ? ordered[0] : undefined;
  }

  /**
   * Check and complete a document about to be inserted: schema first, then an
   * `_id` when it has none.
   */
  private prepareNewDocument(doc: Document): { id: string; document: Document } {
    if (!isDocument(doc)) {
      throw new InvalidDocumentError(["document must be an object"]);
    }
    assertValidDocument(doc, this.schema);

    const document = doc._id === undefined ? { _id: this.idFactory(), ...cloneDocument(doc) } : cloneDocument(doc);
    const id = document._id;
    if (typeof id !== "string") {
      throw new InvalidDocumentError(["_id must be a string"]);
    }
    return { id, document };
  }

  private async insertDocument(doc: Document): Promise<string> {
    const { id, document } = this.prepareNewDocument(doc);
    await this.store.insert(id, document);
    return id;
  }

  private async upsertDocument(update: UpdateSpec): Promise<{ id: string; document: Document }> {
    const seeded = buildUpsertDocument(this.idFactory(), update);
    const prepared = this.prepareNewDocument(seeded);
    await this.store.insert(prepared.id, prepared.document);
    return prepared;
  }

  private async performUpdate(
    filter: Filter,
    update: UpdateSpec,
    options: UpdateOptions,
    limitOne: boolean
  ): Promise<WriteOutcome> {
    validateUpdate(update);
    const matches = await this.findMatches(filter, limitOne);

    let modifiedCount = 0;
    let written = 0;
    try {
      for (const { rowKey, document } of matches) {
        const updated = applyUpdateOperators(document, update);
        // Counted as modified only when the content changed; the write always happens
        if (!valuesEqual(document, updated)) {
          modifiedCount++;
        }
        await this.store.update(rowKey, updated);
        written++;
      }
    } catch (error) {
      if (written > 0) {
        this.logger.warn("collection.update.partial", {
          written,
          matched: matches.length,
          err_message: error instanceof Error ? error.message : String(error),
        });
      }
      throw error;
    }

    if (matches.length === 0 && options.upsert) {
      const { id } = await this.upsertDocument(update);
      return { matchedCount: 0, modifiedCount: 0, upsertedId: id };
    }

    return { matchedCount: matches.length, modifiedCount, upsertedId: null };
  }

  /**
   * Build the document that replaces `existing`, keeping its `_id`.
   */
  private buildReplacement(existing: Document, replacement: Document): Document {
    if (replacement._id !== undefined && !valuesEqual(replacement._id, existing._id)) {
      throw new InvalidUpdateError(
        "The _id field cannot be changed by a replacement"
      );
    }
    const document: Document = { _id: existing._id, ...cloneDocument(replacement) };
    assertValidDocument(document, this.schema);
    return document;
  }

  private async performReplace(
    filter: Filter,
    replacement: Document,
    options: UpdateOptions
  ): Promise<WriteOutcome> {
    validateReplacement(replacement);
    const [match] = await this.findMatches(filter, true);

    if (match === undefined) {
      if (!options.upsert) {
        return { matchedCount: 0, modifiedCount: 0, upsertedId: null };
      }
      const id = await this.insertDocument(replacement);
      return { matchedCount: 0, modifiedCount: 0, upsertedId: id };
    }

    const document = this.buildReplacement(match.document, replacement);
    await this.store.update(match.rowKey, document);
    return {
      matchedCount: 1,
      modifiedCount: valuesEqual(match.document, document) ? 0 : 1,
      upsertedId: null,
    };
  }

  private async performDelete(filter: Filter, limitOne: boolean): Promise<number> {
    const matches = await this.findMatches(filter, limitOne);
    for (const { rowKey } of matches) {
      await this.store.delete(rowKey);
    }
    return matches.length;
  }

  // ==================== Insert Operations ====================

  /**
   * Insert a single document.
   *
   * A document without `_id` gets one from the identifier factory.
   *
   * @returns The identifier of the inserted document
   * @throws InvalidDocumentError if the schema rejects the document or `_id` is not a string
   * @throws DuplicateKeyError if the `_id` is already stored
   *
   * @example
   * ```typescript
   * const { insertedId } = await collection.insertOne({ name: "Ada" });
   * await collection.insertOne({ _id: "user-1", name: "Grace" });
   * ```
   */
  async insertOne(doc: Document): Promise<InsertOneResult> {
    return this.execute("insertOne", async () => ({
      acknowledged: true,
      insertedId: await this.insertDocument(doc),
    }));
  }

  /**
   * Insert documents one after another.
   *
   * Not atomic: when one insert fails the error is raised and the documents
   * before it stay inserted. Use {@link bulkWrite} for all-or-nothing inserts.
   *
   * @example
   * ```typescript
   * const result = await collection.insertMany([{ name: "A" }, { name: "B" }]);
   * console.log(result.insertedIds); // { 0: "...", 1: "..." }
   * ```
   */
  async insertMany(docs: Document[]): Promise<InsertManyResult> {
    return this.execute("insertMany", async () => {
      if (!Array.isArray(docs)) {
        throw new InvalidDocumentError(["insertMany requires an array of documents"]);
      }
      const insertedIds: Record<number, string> = {};
      for (const [index, doc] of docs.entries()) {
        try {
          insertedIds[index] = await this.insertDocument(doc);
        } catch (error) {
          if (index > 0) {
            this.logger.warn("collection.insertMany.partial", { inserted: index, total: docs.length });
          }
          throw error;
        }
      }
      return { acknowledged: true, insertedCount: docs.length, insertedIds };
    });
  }

  // ==================== Query Operations ====================

  /**
   * Find the first document matching the filter, or null.
   *
   * @param filter - Query filter (default: matches everything)
   * @param options - Projection, sort and skip deciding which match is returned
   *
   * @example
   * ```typescript
   * const latest = await collection.findOne({ status: "active" }, { sort: { createdAt: -1 } });
   * ```
   */
  async findOne(filter: Filter = {}, options: FindOneOptions = {}): Promise<Document | null> {
    return this.execute("findOne", async () => {
      const matches = await this.findMatches(filter);
      const cursor = new ShelfCursor(
        matches.map((row) => row.document),
        { ...options, limit: 1 }
      );
      return cursor.first();
    });
  }

  /**
   * Like {@link findOne}, but a missing match is an error.
   *
   * @throws DocumentNotFoundError when nothing matches
   */
  async findOneOrFail(filter: Filter = {}, options: FindOneOptions = {}): Promise<Document> {
    const doc = await this.findOne(filter, options);
    if (doc === null) {
      throw new DocumentNotFoundError(`No document matches ${JSON.stringify(filter)}`);
    }
    return doc;
  }

  /**
   * Find all documents matching the filter.
   *
   * The returned cursor holds a snapshot of the matches; sort, skip, limit and
   * projection can be given here or chained on the cursor.
   *
   * @example
   * ```typescript
   * const cursor = await collection.find({ age: { $gte: 18 } }, { projection: { name: 1 } });
   * const names = cursor.sort({ name: 1 }).limit(10).toArray();
   * ```
   */
  async find(filter: Filter = {}, options: FindOptions = {}): Promise<ShelfCursor> {
    return this.execute("find", async () => {
      const matches = await this.findMatches(filter);
      return new ShelfCursor(
        matches.map((row) => row.document),
        options
      );
    });
  }

  /**
   * Count documents matching the filter.
   */
  async countDocuments(filter: Filter = {}): Promise<number> {
    return this.execute("countDocuments", async () => (await this.findMatches(filter)).length);
  }

  /**
   * Distinct values of a field across matching documents.
   *
   * Array values contribute their elements. Values are unique by structural
   * equality and come out in first-seen order; documents without the field
   * contribute nothing.
   *
   * @example
   * ```typescript
   * // [{ tags: ["a", "b"] }, { tags: ["b", "c"] }, { tags: "d" }]
   * await collection.distinct("tags"); // ["a", "b", "c", "d"]
   * ```
   */
  async distinct(field: string, filter: Filter = {}): Promise<Value[]> {
    return this.execute("distinct", async () => {
      const values: Value[] = [];
      const add = (value: Value): void => {
        if (!values.some((existing) => valuesEqual(existing, value))) {
          values.push(value);
        }
      };

      for (const { document } of await this.findMatches(filter)) {
        const value = getValueByPath(document, field);
        if (value === undefined) {
          continue;
        }
        if (Array.isArray(value)) {
          value.forEach(add);
        } else {
          add(value);
        }
      }
      return values;
    });
  }

  // ==================== Delete Operations ====================

  /**
   * Delete the first document matching the filter.
   */
  async deleteOne(filter: Filter): Promise<DeleteResult> {
    return this.execute("deleteOne", async () => ({
      acknowledged: true,
      deletedCount: await this.performDelete(filter, true),
    }));
  }

  /**
   * Delete every document matching the filter.
   *
   * @example
   * ```typescript
   * const { deletedCount } = await collection.deleteMany({ expired: true });
   * ```
   */
  async deleteMany(filter: Filter): Promise<DeleteResult> {
    return this.execute("deleteMany", async () => ({
      acknowledged: true,
      deletedCount: await this.performDelete(filter, false),
    }));
  }

  // ==================== Update Operations ====================

  /**
   * Update the first document matching the filter.
   *
   * With `upsert` and no match, inserts a document seeded with a new `_id`,
   * then the `$setOnInsert` fields, then the other operators.
   *
   * @throws InvalidUpdateError for malformed updates or values of the wrong type
   *
   * @example
   * ```typescript
   * await collection.updateOne({ _id: "a" }, { $inc: { n: 1 }, $push: { tags: "z" } });
   *
   * const result = await collection.updateOne(
   *   { email: "ada@example.com" },
   *   { $set: { visits: 1 }, $setOnInsert: { createdBy: "signup" } },
   *   { upsert: true }
   * );
   * console.log(result.upsertedId);
   * ```
   */
  async updateOne(filter: Filter, update: UpdateSpec, options: UpdateOptions = {}): Promise<UpdateResult> {
    return this.execute("updateOne", async () =>
      toUpdateResult(await this.performUpdate(filter, update, options, true))
    );
  }

  /**
   * Update every document matching the filter.
   *
   * Not atomic: documents are written one at a time, and when one fails the
   * error is raised with the earlier documents already written.
   * `modifiedCount` counts documents whose content changed; every matched
   * document is written regardless.
   */
  async updateMany(filter: Filter, update: UpdateSpec, options: UpdateOptions = {}): Promise<UpdateResult> {
    return this.execute("updateMany", async () =>
      toUpdateResult(await this.performUpdate(filter, update, options, false))
    );
  }

  /**
   * Replace the first document matching the filter.
   *
   * The stored `_id` is kept; a replacement may repeat it but not change it.
   *
   * @throws InvalidUpdateError if the replacement has `$` keys or a different `_id`
   *
   * @example
   * ```typescript
   * await collection.replaceOne({ _id: "a" }, { name: "Ada Lovelace", age: 36 });
   * ```
   */
  async replaceOne(
    filter: Filter,
    replacement: Document,
    options: UpdateOptions = {}
  ): Promise<UpdateResult> {
    return this.execute("replaceOne", async () =>
      toUpdateResult(await this.performReplace(filter, replacement, options))
    );
  }

  // ==================== FindOneAnd* Operations ====================

  /**
   * Update the first matching document and return it.
   *
   * @param options - `returnDocument` picks the image: `"after"` (default) or `"before"`
   * @returns The chosen image, or null when nothing matched (and no upsert happened)
   *
   * @example
   * ```typescript
   * const counter = await collection.findOneAndUpdate(
   *   { _id: "orders" },
   *   { $inc: { seq: 1 } },
   *   { upsert: true }
   * );
   * ```
   */
  async findOneAndUpdate(
    filter: Filter,
    update: UpdateSpec,
    options: FindOneAndUpdateOptions = {}
  ): Promise<Document | null> {
    return this.execute("findOneAndUpdate", async () => {
      validateUpdate(update);
      getProjectionMode(options.projection);
      const returnAfter = (options.returnDocument ?? "after") === "after";
      const match = await this.findFirstMatch(filter, options.sort);

      if (match === undefined) {
        if (!options.upsert) {
          return null;
        }
        const { document } = await this.upsertDocument(update);
        return returnAfter ? applyProjection(document, options.projection) : null;
      }

      const updated = applyUpdateOperators(match.document, update);
      await this.store.update(match.rowKey, updated);
      return applyProjection(returnAfter ? updated : match.document, options.projection);
    });
  }

  /**
   * Delete the first matching document and return it, or null.
   */
  async findOneAndDelete(filter: Filter, options: FindOneAndDeleteOptions = {}): Promise<Document | null> {
    return this.execute("findOneAndDelete", async () => {
      getProjectionMode(options.projection);
      const match = await this.findFirstMatch(filter, options.sort);
      if (match === undefined) {
        return null;
      }
      await this.store.delete(match.rowKey);
      return applyProjection(match.document, options.projection);
    });
  }

  /**
   * Replace the first matching document and return it.
   *
   * @param options - `returnDocument` picks the image: `"after"` (default) or `"before"`
   */
  async findOneAndReplace(
    filter: Filter,
    replacement: Document,
    options: FindOneAndReplaceOptions = {}
  ): Promise<Document | null> {
    return this.execute("findOneAndReplace", async () => {
      validateReplacement(replacement);
      getProjectionMode(options.projection);
      const returnAfter = (options.returnDocument ?? "after") === "after";
      const match = await this.findFirstMatch(filter, options.sort);

      if (match === undefined) {
        if (!options.upsert) {
          return null;
        }
        const { id, document } = this.prepareNewDocument(replacement);
        await this.store.insert(id, document);
        return returnAfter ? applyProjection(document, options.projection) : null;
      }

      const document = this.buildReplacement(match.document, replacement);
      await this.store.update(match.rowKey, document);
      return applyProjection(returnAfter ? document : match.document, options.projection);
    });
  }

  // ==================== Aggregation ====================

  /**
   * Run an aggregation pipeline over every document in the collection.
   *
   * @example
   * ```typescript
   * const totals = await orders.aggregate([
   *   { $match: { status: "paid" } },
   *   { $group: { _id: "$customer", total: { $sum: "$amount" } } },
   *   { $sort: { total: -1 } },
   * ]);
   * ```
   */
  async aggregate(pipeline: Pipeline): Promise<Document[]> {
    return this.execute("aggregate", async () => {
      const rows = await this.store.scan();
      return runAggregation(
        rows.map((row) => row.document),
        pipeline
      );
    });
  }

  // ==================== Bulk Operations ====================

  /**
   * Run several writes in order inside one store transaction.
   *
   * When any request fails the whole batch is rolled back and that request's
   * error is raised.
   *
   * @example
   * ```typescript
   * const result = await collection.bulkWrite([
   *   { insertOne: { document: { _id: "a", n: 1 } } },
   *   { updateOne: { filter: { _id: "b" }, update: { $set: { n: 2 } }, upsert: true } },
   *   { deleteOne: { filter: { _id: "old" } } },
   * ]);
   * console.log(result.insertedCount, result.upsertedIds); // 1 { 1: "..." }
   * ```
   */
  async bulkWrite(operations: BulkWriteOperation[]): Promise<BulkWriteResult> {
    return this.execute("bulkWrite", async () => {
      if (!Array.isArray(operations)) {
        throw new InvalidQueryError("bulkWrite requires an array of operations");
      }

      const result: BulkWriteResult = {
        acknowledged: true,
        insertedCount: 0,
        matchedCount: 0,
        modifiedCount: 0,
        deletedCount: 0,
        upsertedCount: 0,
        insertedIds: {},
        upsertedIds: {},
      };

      await this.store.beginTransaction();
      let index = 0;
      try {
        for (; index < operations.length; index++) {
          await this.applyBulkOperation(operations[index], index, result);
        }
        await this.store.commit();
      } catch (error) {
        this.logger.warn("collection.bulkWrite.rollback", {
          index,
          err_message: error instanceof Error ? error.message : String(error),
        });
        try {
          await this.store.rollback();
        } catch (rollbackError) {
          this.logger.error("collection.bulkWrite.rollback_failed", {
            err_message: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
          });
        }
        throw error;
      }

      return result;
    });
  }

  private async applyBulkOperation(
    operation: BulkWriteOperation,
    index: number,
    result: BulkWriteResult
  ): Promise<void> {
    if ("insertOne" in operation) {
      result.insertedIds[index] = await this.insertDocument(operation.insertOne.document);
      result.insertedCount++;
      return;
    }
    if ("deleteOne" in operation) {
      result.deletedCount += await this.performDelete(operation.deleteOne.filter, true);
      return;
    }
    if ("deleteMany" in operation) {
      result.deletedCount += await this.performDelete(operation.deleteMany.filter, false);
      return;
    }

    let outcome: WriteOutcome;
    if ("updateOne" in operation) {
      const { filter, update, upsert } = operation.updateOne;
      outcome = await this.performUpdate(filter, update, { upsert }, true);
    } else if ("updateMany" in operation) {
      const { filter, update, upsert } = operation.updateMany;
      outcome = await this.performUpdate(filter, update, { upsert }, false);
    } else if ("replaceOne" in operation) {
      const { filter, replacement, upsert } = operation.replaceOne;
      outcome = await this.performReplace(filter, replacement, { upsert });
    } else {
      throw new InvalidQueryError(`Unknown bulkWrite operation at index ${index}`);
    }

    result.matchedCount += outcome.matchedCount;
    result.modifiedCount += outcome.modifiedCount;
    if (outcome.upsertedId !== null) {
      result.upsertedIds[index] = outcome.upsertedId;
      result.upsertedCount++;
    }
  }
}

function toUpdateResult(outcome: WriteOutcome): UpdateResult {
  return {
    acknowledged: true,
    matchedCount: outcome.matchedCount,
    modifiedCount: outcome.modifiedCount,
    upsertedCount: outcome.upsertedId === null ? 0 : 1,
    upsertedId: outcome.upsertedId,
  };
}
