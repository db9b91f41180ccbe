/**
 * Backend contract behind the record store.
 *
 * Drivers are allowed to throw: the `RecordStore` wrapping them is the
 * boundary that turns failures into "no result" sentinels.
 */

export type Document = Record<string, unknown>;

/** A document as read back, carrying its store-assigned id. */
export type StoredDocument = Document & { readonly _id: string };

/**
 * Field/direction pairs; `-1` sorts descending.
 *
 * Values compare with JSONB ordering: numbers numerically, strings
 * lexically, and across types null < string < number < boolean <
 * array < object. Dates compare as their ISO strings. Documents
 * missing the field sort last in either direction.
 */
export type SortSpec = ReadonlyArray<readonly [field: string, direction: 1 | -1]>;

export interface FindOptions {
  limit?: number | undefined;
  sort?: SortSpec | undefined;
}

export interface UpdateSpec {
  $set?: Document;
}

export interface DocumentDriver {
  /** Resolves when the backend answers; rejects otherwise. */
  ping(): Promise<void>;
  /** Inserts documents in order and returns their ids in the same order. */
  insert(collection: string, documents: readonly Document[]): Promise<string[]>;
  /**
   * Returns documents whose fields contain every field of `filter`.
   * Nested objects match partially, arrays match when every filter
   * element is present.
   */
  find(collection: string, filter: Document, options: FindOptions): Promise<StoredDocument[]>;
  /** Merges `set` into the first matching document. Resolves false when none matched. */
  updateOne(collection: string, filter: Document, set: Document): Promise<boolean>;
  close(): Promise<void>;
}
