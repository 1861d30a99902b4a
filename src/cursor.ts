import type { Document, FindOptions, ProjectionSpec, SortSpec } from "./types.ts";
import { applyProjection, getProjectionMode, sortDocuments, validateSortSpec } from "./utils.ts";
import { cloneDocument } from "./document-utils.ts";

/**
 * ShelfCursor post-processes a matched set of documents: sort, then skip,
 * then limit, then projection.
 *
 * The cursor holds its own copy of the matched documents. It is synchronous
 * and can be iterated any number of times; each pass recomputes the result
 * from the held set and yields fresh copies.
 *
 * @example
 * ```typescript
 * const cursor = await collection.find({ status: "active" });
 * const page = cursor.sort({ createdAt: -1 }).skip(20).limit(10).toArray();
 *
 * for (const doc of cursor.project({ name: 1 })) {
 *   console.log(doc.name);
 * }
 * ```
 */
export class ShelfCursor implements Iterable<Document> {
  private readonly documents: Document[];
  private sortSpec: SortSpec | undefined;
  private skipCount = 0;
  private limitCount = 0;
  private projection: ProjectionSpec | undefined;

  /**
   * Create a cursor over matched documents.
   *
   * @param documents - Documents that matched the query
   * @param options - Initial sort, skip, limit and projection
   * @throws InvalidQueryError for an invalid sort or projection
   */
  constructor(documents: readonly Document[], options: FindOptions = {}) {
    this.documents = documents.map((doc) => cloneDocument(doc));
    if (options.sort !== undefined) this.sort(options.sort);
    if (options.skip !== undefined) this.skip(options.skip);
    if (options.limit !== undefined) this.limit(options.limit);
    if (options.projection !== undefined) this.project(options.projection);
  }

  /**
   * Sort by one or more dotted paths. Key order gives precedence.
   */
  sort(spec: SortSpec): this {
    validateSortSpec(spec);
    this.sortSpec = spec;
    return this;
  }

  /**
   * Skip the first `n` documents. Negative values count as 0.
   */
  skip(n: number): this {
    this.skipCount = clampCount(n);
    return this;
  }

  /**
   * Return at most `n` documents. 0 (or a negative value) means no limit.
   */
  limit(n: number): this {
    this.limitCount = clampCount(n);
    return this;
  }

  /**
   * Project each returned document.
   *
   * @throws InvalidQueryError if inclusion and exclusion are mixed
   */
  project(projection: ProjectionSpec): this {
    getProjectionMode(projection);
    this.projection = projection;
    return this;
  }

  *[Symbol.iterator](): Iterator<Document> {
    const ordered = this.sortSpec ? sortDocuments(this.documents, this.sortSpec) : this.documents;
    const end = this.limitCount > 0 ? this.skipCount + this.limitCount : ordered.length;

    for (let i = this.skipCount; i < Math.min(end, ordered.length); i++) {
      yield applyProjection(ordered[i], this.projection);
    }
  }

  /**
   * Materialize the results.
   *
   * @param length - Return at most this many documents
   */
  toArray(length?: number): Document[] {
    const results: Document[] = [];
    for (const doc of this) {
      if (length !== undefined && results.length >= length) {
        break;
      }
      results.push(doc);
    }
    return results;
  }

  /** First result, or null when there is none. */
  first(): Document | null {
    const [doc] = this.toArray(1);
    return doc ?? null;
  }

  /**
   * Number of documents the cursor yields, after skip and limit.
   */
  count(): number {
    return this.toArray().length;
  }
}

function clampCount(n: number): number {
  if (!Number.isFinite(n) || n <= 0) {
    return 0;
  }
  return Math.floor(n);
}
