import Database from "better-sqlite3";
import type { Statement } from "better-sqlite3";
import type { Document } from "../types.ts";
import { DuplicateKeyError, StoreError, toStoreError } from "../errors.ts";
import { Logger, createSilentLogger } from "../logger.ts";
import type { DocumentStore, RowKey, StoredDocument } from "./document-store.ts";
import { deserializeDocument, serializeDocument } from "./serialization.ts";

export interface SqliteStoreOptions {
  /** Database file, or `:memory:`. */
  filePath: string;
  /** Table holding the documents. Defaults to `documents`. */
  table?: string;
  /** Enable write-ahead logging (ignored for `:memory:`). Defaults to true. */
  wal?: boolean;
  readOnly?: boolean;
  /** Log every SQL statement at debug level. */
  verbose?: boolean;
  logger?: Logger;
}

interface DocumentRow {
  id: number;
  document: string;
}

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Document store backed by a SQLite table through better-sqlite3.
 *
 * One row per document: an auto-increment row key, the `_id` under a UNIQUE
 * constraint, and the document as JSON text. Several stores may share one
 * database file by using different tables.
 *
 * @example
 * ```typescript
 * const store = new SqliteStore({ filePath: "./data/app.sqlite", table: "users" });
 * const users = new ShelfCollection(store);
 * ```
 */
export class SqliteStore implements DocumentStore {
  private readonly db: Database.Database;
  private readonly table: string;
  private readonly logger: Logger;
  private readonly filePath: string;
  private readonly statements: {
    scan: Statement<[], DocumentRow>;
    insert: Statement<[string, string]>;
    update: Statement<[string | null, string, number]>;
    delete: Statement<[number]>;
  };

  /**
   * Open (and if needed create) the database and its table.
   *
   * @throws StoreError if the database cannot be opened or the table name is invalid
   */
  constructor(options: SqliteStoreOptions) {
    this.filePath = options.filePath;
    this.table = options.table ?? "documents";
    this.logger = options.logger ?? createSilentLogger();

    if (!TABLE_NAME.test(this.table)) {
      throw new StoreError(`Invalid table name: ${this.table}`);
    }

    try {
      const logger = this.logger;
      this.db = new Database(options.filePath, {
        readonly: options.readOnly ?? false,
        verbose: options.verbose ? (sql: unknown) => logger.debug("sqlite.statement", { sql }) : undefined,
      });

      if ((options.wal ?? true) && !options.readOnly && options.filePath !== ":memory:") {
        this.db.pragma("journal_mode = WAL");
      }

      if (!options.readOnly) {
        this.db.exec(
          `CREATE TABLE IF NOT EXISTS ${this.table} (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            _id TEXT UNIQUE,
            document TEXT NOT NULL
          )`
        );
      }

      this.statements = {
        scan: this.db.prepare<[], DocumentRow>(`SELECT id, document FROM ${this.table} ORDER BY id`),
        insert: this.db.prepare<[string, string]>(
          `INSERT INTO ${this.table} (_id, document) VALUES (?, ?)`
        ),
        update: this.db.prepare<[string | null, string, number]>(
          `UPDATE ${this.table} SET _id = ?, document = ? WHERE id = ?`
        ),
        delete: this.db.prepare<[number]>(`DELETE FROM ${this.table} WHERE id = ?`),
      };
    } catch (error) {
      throw toStoreError(`Failed to open SQLite database ${options.filePath}`, error);
    }

    this.logger.info("store.open", { kind: "sqlite", path: this.filePath, table: this.table });
  }

  async scan(): Promise<StoredDocument[]> {
    const rows = this.run("scan", () => this.statements.scan.all());
    return rows.map((row) => ({ rowKey: row.id, document: deserializeDocument(row.document) }));
  }

  async insert(id: string, document: Document): Promise<RowKey> {
    const info = this.run("insert", () => this.statements.insert.run(id, serializeDocument(document)), id);
    return Number(info.lastInsertRowid);
  }

  async update(rowKey: RowKey, document: Document): Promise<void> {
    const id = typeof document._id === "string" ? document._id : null;
    const info = this.run(
      "update",
      () => this.statements.update.run(id, serializeDocument(document), rowKey),
      id ?? undefined
    );
    if (info.changes === 0) {
      throw new StoreError(`No document stored at row ${rowKey}`);
    }
  }

  async delete(rowKey: RowKey): Promise<void> {
    const info = this.run("delete", () => this.statements.delete.run(rowKey));
    if (info.changes === 0) {
      throw new StoreError(`No document stored at row ${rowKey}`);
    }
  }

  async beginTransaction(): Promise<void> {
    if (this.db.inTransaction) {
      throw new StoreError("A transaction is already in progress");
    }
    this.run("begin", () => this.db.exec("BEGIN"));
  }

  async commit(): Promise<void> {
    if (!this.db.inTransaction) {
      throw new StoreError("No transaction in progress");
    }
    this.run("commit", () => this.db.exec("COMMIT"));
  }

  async rollback(): Promise<void> {
    if (!this.db.inTransaction) {
      throw new StoreError("No transaction in progress");
    }
    this.run("rollback", () => this.db.exec("ROLLBACK"));
  }

  async close(): Promise<void> {
    if (!this.db.open) {
      return;
    }
    this.run("close", () => this.db.close());
    this.logger.info("store.close", { kind: "sqlite", path: this.filePath, table: this.table });
  }

  /**
   * Run a statement, mapping a UNIQUE violation on `_id` to DuplicateKeyError
   * and anything else to StoreError.
   */
  private run<T>(operation: string, fn: () => T, id?: string): T {
    try {
      return fn();
    } catch (error) {
      if (id !== undefined && isUniqueViolation(error)) {
        throw new DuplicateKeyError(id);
      }
      throw toStoreError(`SQLite ${operation} failed on ${this.table}`, error);
    }
  }
}

function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "SQLITE_CONSTRAINT_UNIQUE" || error.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}
