/**
 * Error classes for shelfdb.
 *
 * Every failure the engine raises is a {@link ShelfError}. The `kind` field
 * is a discriminant so callers can switch on it instead of chains of
 * `instanceof` checks.
 */

/**
 * Numeric codes and code names carried by shelfdb errors.
 */
export const ERROR_CODES = {
  INVALID_QUERY: { code: 2, codeName: "BadValue" },
  INVALID_UPDATE: { code: 9, codeName: "FailedToParse" },
  DOCUMENT_NOT_FOUND: { code: 47, codeName: "NoMatchingDocument" },
  INVALID_DOCUMENT: { code: 121, codeName: "DocumentValidationFailure" },
  STORE_FAILURE: { code: 8, codeName: "UnknownError" },
  DUPLICATE_KEY: { code: 11000, codeName: "DuplicateKey" },
} as const;

export type ErrorKind =
  | "InvalidQuery"
  | "InvalidUpdate"
  | "DuplicateKey"
  | "DocumentNotFound"
  | "StoreError"
  | "InvalidDocument";

/**
 * Base class of every error raised by the engine, the façade and the stores.
 */
export abstract class ShelfError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly code: number;
  abstract readonly codeName: string;
}

/**
 * Malformed query, projection, sort or pipeline.
 *
 * @example
 * ```typescript
 * await collection.find({ age: { $between: [1, 2] } });
 * // InvalidQueryError: unknown operator: $between
 * ```
 */
export class InvalidQueryError extends ShelfError {
  readonly kind = "InvalidQuery";
  readonly code = ERROR_CODES.INVALID_QUERY.code;
  readonly codeName = ERROR_CODES.INVALID_QUERY.codeName;

  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}

/**
 * Malformed update, or an update that cannot be applied to the current
 * document (for example `$inc` on a string).
 */
export class InvalidUpdateError extends ShelfError {
  readonly kind = "InvalidUpdate";
  readonly code = ERROR_CODES.INVALID_UPDATE.code;
  readonly codeName = ERROR_CODES.INVALID_UPDATE.codeName;

  constructor(message: string) {
    super(message);
    this.name = "InvalidUpdateError";
  }
}

/**
 * Error thrown when an identifier is already taken in the store.
 *
 * @example
 * ```typescript
 * try {
 *   await collection.insertOne({ _id: "a" });
 *   await collection.insertOne({ _id: "a" }); // Duplicate!
 * } catch (err) {
 *   if (err instanceof DuplicateKeyError) {
 *     console.log("Duplicate _id:", err.keyValue._id);
 *   }
 * }
 * ```
 */
export class DuplicateKeyError extends ShelfError {
  readonly kind = "DuplicateKey";
  readonly code = ERROR_CODES.DUPLICATE_KEY.code;
  readonly codeName = ERROR_CODES.DUPLICATE_KEY.codeName;

  /** The duplicate key value that caused the error */
  readonly keyValue: { _id: string };

  constructor(id: string) {
    super(`E11000 duplicate key error dup key: { _id: ${JSON.stringify(id)} }`);
    this.name = "DuplicateKeyError";
    this.keyValue = { _id: id };
  }
}

/**
 * Raised by operations that require a match, such as `findOneOrFail`.
 */
export class DocumentNotFoundError extends ShelfError {
  readonly kind = "DocumentNotFound";
  readonly code = ERROR_CODES.DOCUMENT_NOT_FOUND.code;
  readonly codeName = ERROR_CODES.DOCUMENT_NOT_FOUND.codeName;

  constructor(message = "No document matches the filter") {
    super(message);
    this.name = "DocumentNotFoundError";
  }
}

/**
 * Failure inside a document store. The original error is kept as `cause`.
 */
export class StoreError extends ShelfError {
  readonly kind = "StoreError";
  readonly code = ERROR_CODES.STORE_FAILURE.code;
  readonly codeName = ERROR_CODES.STORE_FAILURE.codeName;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

/**
 * Document rejected by the collection's schema, or carrying a non-string `_id`.
 */
export class InvalidDocumentError extends ShelfError {
  readonly kind = "InvalidDocument";
  readonly code = ERROR_CODES.INVALID_DOCUMENT.code;
  readonly codeName = ERROR_CODES.INVALID_DOCUMENT.codeName;

  /** Every violation found, one message each. */
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`Document failed validation: ${violations.join("; ")}`);
    this.name = "InvalidDocumentError";
    this.violations = violations;
  }
}

/**
 * Wrap an unknown failure as a StoreError unless it already is a ShelfError.
 */
export function toStoreError(message: string, error: unknown): ShelfError {
  if (error instanceof ShelfError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new StoreError(`${message}: ${detail}`, { cause: error });
}
