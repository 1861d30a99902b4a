/**
 * Document stores for shelfdb.
 */
import type { ShelfConfig } from "../config.ts";
import type { Logger } from "../logger.ts";
import type { DocumentStore } from "./document-store.ts";
import { JsonFileStore, collectionFilePath } from "./json-file-store.ts";
import { MemoryStore } from "./memory-store.ts";
import { SqliteStore } from "./sqlite-store.ts";

export type { DocumentStore, RowKey, StoredDocument } from "./document-store.ts";
export { MemoryStore, JsonFileStore, SqliteStore, collectionFilePath };
export type { JsonFileStoreOptions } from "./json-file-store.ts";
export type { SqliteStoreOptions } from "./sqlite-store.ts";

/**
 * Open the store named by a configuration.
 *
 * @param config - Loaded configuration
 * @param options - `collection` selects the SQLite table, or for the json
 *   store a file of its own beside `config.path` (see {@link collectionFilePath});
 *   the memory store ignores it
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const store = await openStore(config, { collection: "orders" });
 * ```
 */
export async function openStore(
  config: ShelfConfig,
  options: { logger?: Logger; collection?: string } = {}
): Promise<DocumentStore> {
  switch (config.store) {
    case "memory":
      return new MemoryStore();
    case "json":
      return JsonFileStore.open(
        options.collection === undefined ? config.path : collectionFilePath(config.path, options.collection),
        { logger: options.logger }
      );
    case "sqlite":
      return new SqliteStore({
        filePath: config.path,
        wal: config.wal,
        table: options.collection,
        logger: options.logger,
      });
  }
}
