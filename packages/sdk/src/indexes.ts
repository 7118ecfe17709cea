/**
 * Index lifecycle manager
 *
 * Secondary indexes are built in the background as chores. Physical index
 * names follow `annotation.<field>_<suffix>` and are reverse-mapped by the last
 * `_`, so names this manager did not create are recognized and skipped.
 *
 * Invariants:
 * - At most one live (CREATED/RUNNING) chore per (container, field, kind)
 * - Submission is a synchronous test-and-set; a second submission while a
 *   chore is live returns that chore and schedules nothing
 * - A failing build ends its chore FAILED with the error recorded; the failure
 *   never escapes the worker
 */

import { ANNOTATION_FIELD_PREFIX } from "./compiler.js";
import { IndexNotFoundError, UnknownIndexKindError } from "./errors.js";
import { logger } from "./observability/logs.js";
import type { DocumentStore } from "./storage/document-store.js";
import { BackgroundTask, type BackgroundTaskOptions, type TaskProgress } from "./tasks/task.js";
import type { WorkerPool } from "./tasks/pool.js";
import { TaskRegistry } from "./tasks/registry.js";
import type { IndexChoreSummary, IndexConfig, IndexKeyValue, IndexKind } from "./types.js";
import type { UriFactory } from "./uris.js";
import { validateField } from "./validation.js";

interface IndexKindSpec {
  /** Key value handed to the document store */
  keyValue: IndexKeyValue;
  /** Physical index name suffix */
  suffix: string;
}

const INDEX_KINDS: Readonly<Record<IndexKind, IndexKindSpec>> = {
  hashed: { keyValue: "hashed", suffix: "hashed" },
  ascending: { keyValue: 1, suffix: "1" },
  descending: { keyValue: -1, suffix: "-1" },
  text: { keyValue: "text", suffix: "text" },
};

export const INDEX_TYPES: readonly IndexKind[] = ["hashed", "ascending", "descending", "text"];

/**
 * Parse an index kind, ignoring case
 * @throws UnknownIndexKindError naming the supported kinds
 */
export function parseIndexKind(input: string): IndexKind {
  const lowered = input.toLowerCase();
  const kind = INDEX_TYPES.find((k) => k === lowered);
  if (!kind) {
    throw new UnknownIndexKindError(input, INDEX_TYPES);
  }
  return kind;
}

export function indexName(field: string, kind: IndexKind): string {
  return `${ANNOTATION_FIELD_PREFIX}${field}_${INDEX_KINDS[kind].suffix}`;
}

/**
 * Recover (field, kind) from a physical index name
 * @returns undefined for names this manager does not produce
 */
export function parseIndexName(name: string): { field: string; kind: IndexKind } | undefined {
  if (!name.startsWith(ANNOTATION_FIELD_PREFIX)) return undefined;

  const separator = name.lastIndexOf("_");
  if (separator <= ANNOTATION_FIELD_PREFIX.length) return undefined;

  const field = name.slice(ANNOTATION_FIELD_PREFIX.length, separator);
  const suffix = name.slice(separator + 1);
  const kind = INDEX_TYPES.find((k) => INDEX_KINDS[k].suffix === suffix);
  return kind ? { field, kind } : undefined;
}

/**
 * Background build of one physical index
 */
export class IndexChore extends BackgroundTask {
  readonly containerName: string;
  readonly field: string;
  readonly indexType: IndexKind;
  readonly #store: DocumentStore;

  constructor(
    store: DocumentStore,
    containerName: string,
    field: string,
    indexType: IndexKind,
    options: BackgroundTaskOptions = {}
  ) {
    super(options);
    this.#store = store;
    this.containerName = containerName;
    this.field = field;
    this.indexType = indexType;
  }

  get indexName(): string {
    return indexName(this.field, this.indexType);
  }

  protected async execute(progress: TaskProgress<never>): Promise<void> {
    progress.setTotal(1);
    await this.#store.createIndex(this.containerName, {
      name: this.indexName,
      keys: { [ANNOTATION_FIELD_PREFIX + this.field]: INDEX_KINDS[this.indexType].keyValue },
    });
    progress.advance();
  }

  protected describe(): string {
    return `index ${this.indexName} on ${this.containerName}`;
  }

  override summary(): Readonly<IndexChoreSummary> {
    return Object.freeze({
      ...super.summary(),
      containerName: this.containerName,
      field: this.field,
      indexType: this.indexType,
    });
  }
}

export interface IndexManagerOptions {
  /** How long finished chores stay retrievable, in milliseconds */
  ttlMs?: number;
  now?: () => number;
}

export class IndexManager {
  readonly #store: DocumentStore;
  readonly #pool: WorkerPool;
  readonly #uris: UriFactory;
  readonly #options: IndexManagerOptions;
  readonly #chores = new TaskRegistry<string, IndexChore>();

  constructor(
    store: DocumentStore,
    pool: WorkerPool,
    uris: UriFactory,
    options: IndexManagerOptions = {}
  ) {
    this.#store = store;
    this.#pool = pool;
    this.#uris = uris;
    this.#options = options;
  }

  /**
   * Submit an index build, or return the live chore already building it
   * @throws UnknownIndexKindError for an unsupported kind
   */
  startIndexCreation(containerName: string, field: string, kind: string): IndexChore {
    const indexType = parseIndexKind(kind);
    validateField(field);

    const { task, created } = this.#chores.putIfAbsent(
      this.#key(containerName, field, indexType),
      () =>
        new IndexChore(this.#store, containerName, field, indexType, {
          ttlMs: this.#options.ttlMs,
          now: this.#options.now,
        }),
      (existing) => existing.isLive
    );

    if (created) {
      logger.info("index.chore.start", {
        container: containerName,
        field,
        details: { id: task.id, indexType },
      });
      this.#pool.submit(task);
    } else {
      logger.debug("index.chore.reuse", { container: containerName, field, details: { id: task.id } });
    }
    return task;
  }

  getIndexChore(containerName: string, field: string, kind: string): IndexChore | undefined {
    return this.#chores.get(this.#key(containerName, field, parseIndexKind(kind)));
  }

  /**
   * Drop the physical index; dropping a missing index is not an error
   *
   * Only a finished chore for the key is forgotten. A live chore stays
   * registered, so a resubmission while it runs still returns it.
   */
  async deleteIndex(containerName: string, field: string, kind: string): Promise<void> {
    const indexType = parseIndexKind(kind);
    await this.#store.dropIndex(containerName, indexName(field, indexType));
    const key = this.#key(containerName, field, indexType);
    this.#chores.deleteWhere((chore, choreKey) => choreKey === key && !chore.isLive);
    logger.info("index.drop", { container: containerName, field, details: { indexType } });
  }

  async listIndexes(containerName: string): Promise<IndexConfig[]> {
    const definitions = await this.#store.listIndexes(containerName);
    const configs: IndexConfig[] = [];
    for (const { name } of definitions) {
      const parsed = parseIndexName(name);
      if (parsed) {
        configs.push(this.#config(containerName, parsed.field, parsed.kind));
      }
    }
    return configs;
  }

  /**
   * @throws IndexNotFoundError when no such physical index exists
   */
  async getIndexConfig(containerName: string, field: string, kind: string): Promise<IndexConfig> {
    const indexType = parseIndexKind(kind);
    const wanted = indexName(field, indexType);
    const definitions = await this.#store.listIndexes(containerName);
    if (!definitions.some((d) => d.name === wanted)) {
      throw new IndexNotFoundError(containerName, field, indexType);
    }
    return this.#config(containerName, field, indexType);
  }

  /**
   * Forget every finished chore of a container
   */
  forgetContainer(containerName: string): void {
    this.#chores.deleteWhere((chore) => chore.containerName === containerName && !chore.isLive);
  }

  #config(containerName: string, field: string, kind: IndexKind): IndexConfig {
    return { field, type: kind, url: this.#uris.indexUrl(containerName, field, kind) };
  }

  #key(containerName: string, field: string, kind: IndexKind): string {
    return JSON.stringify([containerName, field, kind]);
  }
}
