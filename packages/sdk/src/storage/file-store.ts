/**
 * File-backed document store
 *
 * Layout:
 *   <root>/<collection>/<_id>.json            one canonical JSON file per document
 *   <root>/<collection>/_indexes/<name>.json  sidecar secondary indexes
 *
 * Invariants:
 * - Document and index files are written atomically (write-then-rename)
 * - Writes and index builds are serialized per collection via mutex
 * - Every write keeps all of the collection's sidecar indexes in step
 * - `_id`s sort in insertion order, so listing files yields insertion order
 */

import { randomBytes } from "node:crypto";
import * as path from "node:path";
import { CollectionNotFoundError, DocumentNotFoundError, ValidationError, errorCode } from "../errors.js";
import { isPlainObject, stableStringify } from "../format.js";
import {
  atomicWrite,
  directoryExists,
  ensureDirectory,
  listDirectories,
  listFiles,
  readJsonDocument,
  removeDirectory,
  removeDocument,
} from "../io.js";
import { logger } from "../observability/logs.js";
import { resolvePath, runPipeline } from "../query.js";
import type {
  DocumentData,
  Filter,
  IndexDefinition,
  Stage,
  StoredDocument,
} from "../types.js";
import { ID_INDEX_NAME, type DocumentStore } from "./document-store.js";
import { MutexMap } from "./mutex.js";
import {
  SidecarIndexSchema,
  buildSidecarIndex,
  indexedField,
  lookupSidecarIndex,
  updateSidecarIndex,
  type SidecarIndex,
} from "./sidecar-index.js";

const SAFE_SEGMENT = /^[A-Za-z0-9_.@:-]+$/;
const INDEX_DIR = "_indexes";

export interface FileDocumentStoreOptions {
  /** Data directory; created on first write */
  root: string;
  /** JSON indentation for document files (default: 2) */
  indent?: number;
}

function checkSegment(value: string, label: string): void {
  if (!SAFE_SEGMENT.test(value) || value.startsWith(".") || value === INDEX_DIR) {
    throw new ValidationError(`Invalid ${label}: "${value}"`);
  }
}

function toStoredDocument(value: unknown): StoredDocument | undefined {
  if (!isPlainObject(value) || typeof value._id !== "string") {
    return undefined;
  }
  return { ...value, _id: value._id };
}

export class FileDocumentStore implements DocumentStore {
  readonly #root: string;
  readonly #indent: number;
  readonly #locks = new MutexMap();
  #lastTimestamp = 0;
  #sequence = 0;

  constructor(options: FileDocumentStoreOptions) {
    this.#root = options.root;
    this.#indent = options.indent ?? 2;
  }

  get root(): string {
    return this.#root;
  }

  async listCollections(): Promise<string[]> {
    return listDirectories(this.#root);
  }

  async hasCollection(collection: string): Promise<boolean> {
    checkSegment(collection, "collection name");
    return directoryExists(this.#collectionDir(collection));
  }

  async createCollection(collection: string): Promise<void> {
    checkSegment(collection, "collection name");
    await ensureDirectory(this.#collectionDir(collection));
  }

  async dropCollection(collection: string): Promise<void> {
    checkSegment(collection, "collection name");
    await this.#locks.withLock(collection, async () => {
      await removeDirectory(this.#collectionDir(collection));
    });
    logger.debug("store.collection.drop", { container: collection });
  }

  async insertOne(collection: string, doc: DocumentData): Promise<StoredDocument> {
    const [stored] = await this.insertMany(collection, [doc]);
    if (!stored) {
      throw new Error("insertMany returned no document");
    }
    return stored;
  }

  async insertMany(collection: string, docs: DocumentData[]): Promise<StoredDocument[]> {
    checkSegment(collection, "collection name");

    return this.#locks.withLock(collection, async () => {
      const indexes = await this.#readIndexes(collection);
      const inserted: StoredDocument[] = [];

      for (const doc of docs) {
        const stored: StoredDocument = { ...doc, _id: this.#nextId() };
        await this.#writeDocument(collection, stored);
        for (const index of indexes) {
          updateSidecarIndex(index, stored._id, undefined, stored);
        }
        inserted.push(stored);
      }

      await this.#writeIndexes(collection, indexes);
      return inserted;
    });
  }

  async findOne(collection: string, filter: Filter): Promise<StoredDocument | undefined> {
    const [first] = await this.aggregate(collection, [{ $match: filter }, { $limit: 1 }]);
    return first;
  }

  async find(collection: string, filter: Filter = {}): Promise<StoredDocument[]> {
    return this.aggregate(collection, [{ $match: filter }]);
  }

  async replaceOne(collection: string, id: string, doc: DocumentData): Promise<StoredDocument> {
    checkSegment(collection, "collection name");
    checkSegment(id, "document id");

    return this.#locks.withLock(collection, async () => {
      const before = await this.#readDocument(collection, id);
      if (!before) {
        throw new DocumentNotFoundError(this.#documentPath(collection, id));
      }

      const after: StoredDocument = { ...doc, _id: id };
      await this.#writeDocument(collection, after);

      const indexes = await this.#readIndexes(collection);
      for (const index of indexes) {
        updateSidecarIndex(index, id, before, after);
      }
      await this.#writeIndexes(collection, indexes);
      return after;
    });
  }

  async deleteOne(collection: string, id: string): Promise<boolean> {
    checkSegment(collection, "collection name");
    checkSegment(id, "document id");

    return this.#locks.withLock(collection, async () => {
      const removed = await this.#deleteUnlocked(collection, [id]);
      return removed === 1;
    });
  }

  async deleteMany(collection: string, filter: Filter): Promise<number> {
    checkSegment(collection, "collection name");

    return this.#locks.withLock(collection, async () => {
      const docs = runPipeline(await this.#loadAll(collection), [{ $match: filter }]);
      return this.#deleteUnlocked(collection, docs.map((d) => d._id));
    });
  }

  async count(collection: string, stages: readonly Stage[]): Promise<number> {
    const docs = await this.aggregate(collection, stages);
    return docs.length;
  }

  async aggregate(collection: string, stages: readonly Stage[]): Promise<StoredDocument[]> {
    checkSegment(collection, "collection name");
    const candidates = await this.#candidates(collection, stages);
    return runPipeline(candidates, stages);
  }

  async distinct(collection: string, field: string): Promise<unknown[]> {
    const docs = await this.find(collection);
    const seen = new Map<string, unknown>();
    for (const doc of docs) {
      for (const value of resolvePath(doc, field)) {
        for (const item of Array.isArray(value) ? value : [value]) {
          seen.set(stableStringify(item, 0), item);
        }
      }
    }
    return [...seen.values()];
  }

  async listIndexes(collection: string): Promise<IndexDefinition[]> {
    checkSegment(collection, "collection name");
    const indexes = await this.#readIndexes(collection);
    return [
      { name: ID_INDEX_NAME, keys: { _id: 1 } },
      ...indexes.map(({ name, keys }) => ({ name, keys })),
    ];
  }

  async createIndex(collection: string, definition: IndexDefinition): Promise<void> {
    checkSegment(collection, "collection name");
    checkSegment(definition.name, "index name");
    indexedField(definition.keys);
    if (definition.name === ID_INDEX_NAME) {
      throw new ValidationError(`Index name ${ID_INDEX_NAME} is reserved`);
    }

    await this.#locks.withLock(collection, async () => {
      // A build must not bring back a collection dropped while it waited
      if (!(await directoryExists(this.#collectionDir(collection)))) {
        throw new CollectionNotFoundError(collection);
      }
      const existing = await this.#readIndex(collection, definition.name);
      if (existing) {
        return;
      }

      const startTime = performance.now();
      const docs = await this.#loadAll(collection);
      const index = buildSidecarIndex(definition, docs);
      await this.#writeIndex(collection, index);

      logger.info("store.index.build", {
        container: collection,
        field: definition.name,
        details: {
          durationMs: (performance.now() - startTime).toFixed(2),
          docs: docs.length,
          keys: Object.keys(index.entries).length,
        },
      });
    });
  }

  async dropIndex(collection: string, name: string): Promise<void> {
    checkSegment(collection, "collection name");
    checkSegment(name, "index name");
    if (name === ID_INDEX_NAME) {
      throw new ValidationError(`Cannot drop the ${ID_INDEX_NAME} index`);
    }

    await this.#locks.withLock(collection, async () => {
      await removeDocument(this.#indexPath(collection, name));
    });
  }

  /**
   * Time-ordered id: hex millis, per-millisecond sequence, random suffix
   */
  #nextId(): string {
    const now = Math.max(Date.now(), this.#lastTimestamp);
    if (now === this.#lastTimestamp) {
      this.#sequence++;
    } else {
      this.#lastTimestamp = now;
      this.#sequence = 0;
    }
    return (
      now.toString(16).padStart(12, "0") +
      this.#sequence.toString(16).padStart(6, "0") +
      randomBytes(4).toString("hex")
    );
  }

  /**
   * Documents the pipeline has to look at. A leading `$match` with a scalar
   * equality on an indexed field narrows the scan to that index bucket.
   */
  async #candidates(collection: string, stages: readonly Stage[]): Promise<StoredDocument[]> {
    const [first] = stages;
    if (first && "$match" in first) {
      const indexes = await this.#readIndexes(collection);
      for (const index of indexes) {
        const [field, kind] = indexedField(index.keys);
        if (kind === "text") continue;
        const value = first.$match[field];
        if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
          const ids = lookupSidecarIndex(index, value);
          logger.debug("store.index.hit", {
            container: collection,
            field: index.name,
            details: { candidates: ids.length },
          });
          const docs: StoredDocument[] = [];
          for (const id of ids) {
            const doc = await this.#readDocument(collection, id);
            if (doc) docs.push(doc);
          }
          return docs;
        }
      }
    }
    return this.#loadAll(collection);
  }

  async #deleteUnlocked(collection: string, ids: string[]): Promise<number> {
    const indexes = await this.#readIndexes(collection);
    let removed = 0;

    for (const id of ids) {
      const before = await this.#readDocument(collection, id);
      if (!before) continue;
      await removeDocument(this.#documentPath(collection, id));
      for (const index of indexes) {
        updateSidecarIndex(index, id, before, undefined);
      }
      removed++;
    }

    if (removed > 0) {
      await this.#writeIndexes(collection, indexes);
    }
    return removed;
  }

  async #loadAll(collection: string): Promise<StoredDocument[]> {
    const files = await listFiles(this.#collectionDir(collection), ".json");
    const docs: StoredDocument[] = [];
    for (const file of files) {
      const doc = await this.#readDocument(collection, path.basename(file, ".json"));
      if (doc) docs.push(doc);
    }
    return docs;
  }

  async #readDocument(collection: string, id: string): Promise<StoredDocument | undefined> {
    const filePath = this.#documentPath(collection, id);
    let raw: unknown;
    try {
      raw = await readJsonDocument(filePath);
    } catch (err) {
      if (err instanceof DocumentNotFoundError) {
        return undefined;
      }
      throw err;
    }

    const doc = toStoredDocument(raw);
    if (!doc) {
      logger.warn("store.document.invalid", {
        container: collection,
        message: `Skipping ${filePath}: not a stored document`,
      });
    }
    return doc;
  }

  async #writeDocument(collection: string, doc: StoredDocument): Promise<void> {
    await atomicWrite(
      this.#documentPath(collection, doc._id),
      stableStringify(doc, this.#indent, "preserve")
    );
  }

  async #readIndex(collection: string, name: string): Promise<SidecarIndex | undefined> {
    const indexPath = this.#indexPath(collection, name);
    let raw: unknown;
    try {
      raw = await readJsonDocument(indexPath);
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        return undefined;
      }
      throw err;
    }
    const parsed = SidecarIndexSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn("store.index.corrupt", {
        container: collection,
        field: name,
        message: parsed.error.message,
      });
      return undefined;
    }
    return parsed.data;
  }

  async #readIndexes(collection: string): Promise<SidecarIndex[]> {
    const files = await listFiles(path.join(this.#collectionDir(collection), INDEX_DIR), ".json");
    const indexes: SidecarIndex[] = [];
    for (const file of files) {
      const index = await this.#readIndex(collection, path.basename(file, ".json"));
      if (index) indexes.push(index);
    }
    return indexes;
  }

  async #writeIndex(collection: string, index: SidecarIndex): Promise<void> {
    await atomicWrite(this.#indexPath(collection, index.name), stableStringify(index, this.#indent));
  }

  async #writeIndexes(collection: string, indexes: SidecarIndex[]): Promise<void> {
    for (const index of indexes) {
      await this.#writeIndex(collection, index);
    }
  }

  #collectionDir(collection: string): string {
    return path.join(this.#root, collection);
  }

  #documentPath(collection: string, id: string): string {
    return path.join(this.#root, collection, `${id}.json`);
  }

  #indexPath(collection: string, name: string): string {
    return path.join(this.#root, collection, INDEX_DIR, `${name}.json`);
  }
}
