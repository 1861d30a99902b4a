import type { Document } from "../types.ts";
import { cloneDocument } from "../document-utils.ts";
import { DuplicateKeyError, StoreError } from "../errors.ts";
import type { DocumentStore, RowKey, StoredDocument } from "./document-store.ts";

export interface StoredRow {
  id: string;
  document: Document;
}

/** Serializable state of a memory store. */
export interface MemoryStoreState {
  nextRowKey: number;
  rows: Array<{ rowKey: RowKey } & StoredRow>;
}

/**
 * In-process document store.
 *
 * Rows live in a Map keyed by an auto-incrementing row key, with a second map
 * enforcing `_id` uniqueness. A transaction snapshots the state and rollback
 * restores it.
 *
 * @example
 * ```typescript
 * const store = new MemoryStore();
 * const collection = new ShelfCollection(store);
 * ```
 */
export class MemoryStore implements DocumentStore {
  protected rows = new Map<RowKey, StoredRow>();
  protected ids = new Map<string, RowKey>();
  protected nextRowKey = 1;
  private snapshot: MemoryStoreState | null = null;
  private closed = false;

  async scan(): Promise<StoredDocument[]> {
    this.assertOpen();
    return Array.from(this.rows, ([rowKey, row]) => ({
      rowKey,
      document: cloneDocument(row.document),
    }));
  }

  async insert(id: string, document: Document): Promise<RowKey> {
    this.assertOpen();
    if (this.ids.has(id)) {
      throw new DuplicateKeyError(id);
    }
    const rowKey = this.nextRowKey++;
    this.rows.set(rowKey, { id, document: cloneDocument(document) });
    this.ids.set(id, rowKey);
    await this.persistOrUndo(() => {
      this.rows.delete(rowKey);
      this.ids.delete(id);
      this.nextRowKey = rowKey;
    });
    return rowKey;
  }

  async update(rowKey: RowKey, document: Document): Promise<void> {
    this.assertOpen();
    const row = this.getRow(rowKey);
    const id = typeof document._id === "string" ? document._id : row.id;
    const owner = this.ids.get(id);
    if (owner !== undefined && owner !== rowKey) {
      throw new DuplicateKeyError(id);
    }
    this.ids.delete(row.id);
    this.ids.set(id, rowKey);
    this.rows.set(rowKey, { id, document: cloneDocument(document) });
    await this.persistOrUndo(() => {
      this.ids.delete(id);
      this.ids.set(row.id, rowKey);
      this.rows.set(rowKey, row);
    });
  }

  async delete(rowKey: RowKey): Promise<void> {
    this.assertOpen();
    const row = this.getRow(rowKey);
    this.rows.delete(rowKey);
    this.ids.delete(row.id);
    await this.persistOrUndo(() => {
      this.rows.set(rowKey, row);
      this.ids.set(row.id, rowKey);
    });
  }

  async beginTransaction(): Promise<void> {
    this.assertOpen();
    if (this.snapshot) {
      throw new StoreError("A transaction is already in progress");
    }
    this.snapshot = this.exportState();
  }

  async commit(): Promise<void> {
    this.assertOpen();
    if (!this.snapshot) {
      throw new StoreError("No transaction in progress");
    }
    // Cleared only once persisted; a failed commit can still be rolled back
    await this.persist();
    this.snapshot = null;
  }

  async rollback(): Promise<void> {
    this.assertOpen();
    if (!this.snapshot) {
      throw new StoreError("No transaction in progress");
    }
    this.importState(this.snapshot);
    this.snapshot = null;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Called after every write outside a transaction and on commit. Subclasses
   * persist here. A write whose persist fails is undone in memory.
   */
  protected async persist(): Promise<void> {}

  protected exportState(): MemoryStoreState {
    return {
      nextRowKey: this.nextRowKey,
      rows: Array.from(this.rows, ([rowKey, row]) => ({
        rowKey,
        id: row.id,
        document: cloneDocument(row.document),
      })),
    };
  }

  protected importState(state: MemoryStoreState): void {
    this.rows = new Map();
    this.ids = new Map();
    for (const { rowKey, id, document } of state.rows) {
      if (this.ids.has(id)) {
        throw new StoreError(`Stored data has duplicate _id ${JSON.stringify(id)}`);
      }
      this.rows.set(rowKey, { id, document: cloneDocument(document) });
      this.ids.set(id, rowKey);
    }
    this.nextRowKey = state.nextRowKey;
  }

  private async persistOrUndo(undo: () => void): Promise<void> {
    if (this.snapshot) {
      return;
    }
    try {
      await this.persist();
    } catch (error) {
      undo();
      throw error;
    }
  }

  private getRow(rowKey: RowKey): StoredRow {
    const row = this.rows.get(rowKey);
    if (!row) {
      throw new StoreError(`No document stored at row ${rowKey}`);
    }
    return row;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreError("Store is closed");
    }
  }
}
