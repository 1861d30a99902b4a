import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { StoreError, toStoreError } from "../errors.ts";
import { Logger, createSilentLogger } from "../logger.ts";
import { MemoryStore, type MemoryStoreState } from "./memory-store.ts";
import { toDocument } from "./serialization.ts";

export interface JsonFileStoreOptions {
  logger?: Logger;
}

/**
 * Document store persisted as one JSON file.
 *
 * The file is read once by {@link JsonFileStore.open} and rewritten in full
 * after every write outside a transaction and after every commit. A missing
 * file is an empty store; the file and its directory are created on the first
 * write.
 *
 * @example
 * ```typescript
 * const store = await JsonFileStore.open("./data/users.json");
 * const users = new ShelfCollection(store);
 * ```
 */
export class JsonFileStore extends MemoryStore {
  readonly filePath: string;
  private readonly logger: Logger;

  private constructor(filePath: string, logger: Logger) {
    super();
    this.filePath = filePath;
    this.logger = logger;
  }

  /**
   * Open a store backed by `filePath`.
   *
   * @throws StoreError if the file exists but cannot be read or parsed
   */
  static async open(filePath: string, options: JsonFileStoreOptions = {}): Promise<JsonFileStore> {
    const store = new JsonFileStore(filePath, options.logger ?? createSilentLogger());
    const state = await store.readState();
    if (state) {
      store.importState(state);
    }
    store.logger.info("store.open", { kind: "json", path: filePath, documents: state?.rows.length ?? 0 });
    return store;
  }

  override async close(): Promise<void> {
    await super.close();
    this.logger.info("store.close", { kind: "json", path: this.filePath });
  }

  protected override async persist(): Promise<void> {
    try {
      await this.writeState();
    } catch (error) {
      throw toStoreError(`Failed to write ${this.filePath}`, error);
    }
  }

  // ==================== Private Helpers ====================

  private async readState(): Promise<MemoryStoreState | null> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw toStoreError(`Failed to read ${this.filePath}`, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StoreError(`${this.filePath} is not valid JSON`, { cause: error });
    }
    return parseState(parsed, this.filePath);
  }

  private async writeState(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    // Write beside the target, then rename over it
    const tempPath = `${this.filePath}.tmp`;
    await writeFile(tempPath, JSON.stringify(this.exportState(), null, 2));
    await rename(tempPath, this.filePath);
  }
}

const COLLECTION_NAME = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/**
 * File holding one named collection next to a base store path:
 * `./data/shelf.json` and `users` give `./data/shelf.users.json`.
 *
 * @throws StoreError if the name could escape the directory
 */
export function collectionFilePath(basePath: string, collection: string): string {
  if (!COLLECTION_NAME.test(collection)) {
    throw new StoreError(`Invalid collection name: ${collection}`);
  }
  const ext = extname(basePath);
  return join(dirname(basePath), `${basename(basePath, ext)}.${collection}${ext || ".json"}`);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function parseState(raw: unknown, filePath: string): MemoryStoreState {
  if (typeof raw !== "object" || raw === null || !("rows" in raw) || !Array.isArray(raw.rows)) {
    throw new StoreError(`${filePath} does not contain a document store`);
  }

  const rawRows: unknown[] = raw.rows;
  const rows: MemoryStoreState["rows"] = [];
  let maxRowKey = 0;
  for (const row of rawRows) {
    if (
      typeof row !== "object" ||
      row === null ||
      !("rowKey" in row) ||
      !("id" in row) ||
      !("document" in row) ||
      typeof row.rowKey !== "number" ||
      typeof row.id !== "string"
    ) {
      throw new StoreError(`${filePath} has a malformed row`);
    }
    rows.push({ rowKey: row.rowKey, id: row.id, document: toDocument(row.document) });
    maxRowKey = Math.max(maxRowKey, row.rowKey);
  }

  const storedNext = "nextRowKey" in raw && typeof raw.nextRowKey === "number" ? raw.nextRowKey : 0;
  return { nextRowKey: Math.max(storedNext, maxRowKey + 1), rows };
}
