import { ShelfCollection } from "./collection.ts";
import { loadConfig, type ShelfConfig } from "./config.ts";
import { Logger } from "./logger.ts";
import type { DocumentSchema } from "./schema/index.ts";
import { openStore, type DocumentStore } from "./store/index.ts";

export interface OpenCollectionOptions {
  /** Defaults to {@link loadConfig} over `process.env`. */
  config?: ShelfConfig;
  /** Defaults to a stderr logger at the configured level. */
  logger?: Logger;
  schema?: DocumentSchema;
}

export interface OpenedCollection {
  collection: ShelfCollection;
  /** Close this when done with the collection. */
  store: DocumentStore;
}

/**
 * Open a store from configuration and wrap it in a collection.
 * `name` selects the table of a SQLite store or the file of a json store.
 *
 * @example
 * ```typescript
 * const { collection, store } = await openCollection("users");
 * try {
 *   await collection.insertOne({ name: "Ada" });
 * } finally {
 *   await store.close();
 * }
 * ```
 */
export async function openCollection(
  name: string,
  options: OpenCollectionOptions = {}
): Promise<OpenedCollection> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? new Logger(config.logLevel);
  const store = await openStore(config, { logger, collection: name });
  return {
    collection: new ShelfCollection(store, { logger, schema: options.schema }),
    store,
  };
}
