/**
 * Contract between the collection façade and whatever keeps documents.
 */
import type { Document } from "../types.ts";

/** Store-assigned key of one stored row. */
export type RowKey = number;

export interface StoredDocument {
  rowKey: RowKey;
  document: Document;
}

/**
 * A document store.
 *
 * Documents cross this boundary as copies: a store never hands out a reference
 * to its own state and never keeps a reference to a caller's document.
 *
 * Stores raise `DuplicateKeyError` when an `_id` is taken and
 * `StoreError` for every other failure, including an unknown row key.
 */
export interface DocumentStore {
  /** Full snapshot of every stored document, in any order. */
  scan(): Promise<StoredDocument[]>;

  /** Insert a document under its identifier and return the new row key. */
  insert(id: string, document: Document): Promise<RowKey>;

  /** Replace the document stored at a row key. */
  update(rowKey: RowKey, document: Document): Promise<void>;

  delete(rowKey: RowKey): Promise<void>;

  /** Start an atomic batch. Batches do not nest. */
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;

  close(): Promise<void>;
}
