/**
 * Document-store capability the core runs against
 *
 * Collections are named, independently addressable sets of JSON documents.
 * Every stored document carries a store-assigned `_id`; ids sort in insertion
 * order, and `find`/`aggregate` return documents in that order.
 */

import type { DocumentData, Filter, IndexDefinition, Stage, StoredDocument } from "../types.js";

/**
 * Name of the primary index every collection reports
 */
export const ID_INDEX_NAME = "_id_";

export interface DocumentStore {
  listCollections(): Promise<string[]>;

  hasCollection(collection: string): Promise<boolean>;

  /** Create an empty collection; no-op when it exists */
  createCollection(collection: string): Promise<void>;

  /** Remove a collection with its documents and indexes; no-op when absent */
  dropCollection(collection: string): Promise<void>;

  insertOne(collection: string, doc: DocumentData): Promise<StoredDocument>;

  insertMany(collection: string, docs: DocumentData[]): Promise<StoredDocument[]>;

  findOne(collection: string, filter: Filter): Promise<StoredDocument | undefined>;

  find(collection: string, filter?: Filter): Promise<StoredDocument[]>;

  /**
   * Replace the document with the given id, keeping the id
   * @throws DocumentNotFoundError when no such document exists
   */
  replaceOne(collection: string, id: string, doc: DocumentData): Promise<StoredDocument>;

  /** @returns whether a document was removed */
  deleteOne(collection: string, id: string): Promise<boolean>;

  /** @returns number of documents removed */
  deleteMany(collection: string, filter: Filter): Promise<number>;

  /** Count the documents that come out of a pipeline */
  count(collection: string, stages: readonly Stage[]): Promise<number>;

  aggregate(collection: string, stages: readonly Stage[]): Promise<StoredDocument[]>;

  /** Distinct values found under a dot path, array elements flattened */
  distinct(collection: string, field: string): Promise<unknown[]>;

  /** Physical indexes, always including the primary `_id_` index */
  listIndexes(collection: string): Promise<IndexDefinition[]>;

  /** Build a secondary index; no-op when one with the same name exists */
  createIndex(collection: string, definition: IndexDefinition): Promise<void>;

  /** Drop a secondary index; no-op when absent */
  dropIndex(collection: string, name: string): Promise<void>;
}
