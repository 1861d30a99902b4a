export { ShelfCollection } from "./collection.ts";
export type { CollectionOptions } from "./collection.ts";
export { openCollection } from "./open.ts";
export type { OpenCollectionOptions, OpenedCollection } from "./open.ts";
export { ShelfCursor } from "./cursor.ts";
export {
  ShelfError,
  InvalidQueryError,
  InvalidUpdateError,
  DuplicateKeyError,
  DocumentNotFoundError,
  StoreError,
  InvalidDocumentError,
  ERROR_CODES,
} from "./errors.ts";
export type { ErrorKind } from "./errors.ts";

// Engine entry points
export { match, applyUpdate, runPipeline, createCursor, attempt, unwrap } from "./engine.ts";
export type { Result } from "./engine.ts";
export { matchesFilter, validateFilter } from "./query-matcher.ts";
export { applyUpdateOperators, buildUpsertDocument, validateReplacement } from "./update-operators.ts";
export { runAggregation } from "./aggregation/index.ts";
export {
  getValueByPath,
  setValueByPath,
  deleteValueByPath,
  valuesEqual,
  cloneDocument,
  cloneValue,
  compareValues,
} from "./document-utils.ts";

// Stores
export { MemoryStore, JsonFileStore, SqliteStore, openStore } from "./store/index.ts";
export type {
  DocumentStore,
  RowKey,
  StoredDocument,
  JsonFileStoreOptions,
  SqliteStoreOptions,
} from "./store/index.ts";

// Ambient
export { Logger, createSilentLogger } from "./logger.ts";
export type { LogLevel, LogSink } from "./logger.ts";
export { loadConfig } from "./config.ts";
export type { ShelfConfig, StoreKind } from "./config.ts";
export type { DocumentSchema, PropertySchema, SchemaType } from "./schema/index.ts";

export type {
  Value,
  Document,
  Filter,
  UpdateSpec,
  Pipeline,
  PipelineStage,
  SortSpec,
  ProjectionSpec,
  FindOptions,
  FindOneOptions,
  UpdateOptions,
  ReturnDocument,
  FindOneAndUpdateOptions,
  FindOneAndReplaceOptions,
  FindOneAndDeleteOptions,
  InsertOneResult,
  InsertManyResult,
  UpdateResult,
  DeleteResult,
  BulkWriteOperation,
  BulkWriteResult,
} from "./types.ts";
