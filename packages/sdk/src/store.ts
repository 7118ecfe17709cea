/**
 * AnnoStore facade
 *
 * The external interface of the annotation store. Every call takes the caller's
 * principal (undefined for anonymous) and passes the access gate with the
 * operation's fixed role set before doing any work.
 */

import * as path from "node:path";
import { compileQueryOrThrow } from "./compiler.js";
import {
  ADMIN_ONLY,
  ADMIN_OR_EDITOR,
  ANY_ROLE,
  AccessGate,
  describePrincipal,
  samePrincipal,
} from "./access.js";
import { resolveConfig, type AnnoStoreConfig, type AnnoStoreOptions } from "./config.js";
import { ContainerService, type ContainerUser, type CreateContainerRequest } from "./containers.js";
import { parseEnvelope, withAnnotationId } from "./envelope.js";
import {
  ContainerNotFoundError,
  IndexNotFoundError,
  NotAuthorizedError,
  TaskNotFoundError,
} from "./errors.js";
import { IndexManager, parseIndexKind } from "./indexes.js";
import { logger } from "./observability/logs.js";
import { DocumentRoleStore } from "./roles.js";
import { SearchManager, buildAnnotationPage, validatePageNumber } from "./search.js";
import type { DocumentStore } from "./storage/document-store.js";
import { FileDocumentStore } from "./storage/file-store.js";
import { ContainerSearchTask } from "./tasks/container-search-task.js";
import { WorkerPool } from "./tasks/pool.js";
import { TaskRegistry } from "./tasks/registry.js";
import type {
  AnnotationIdentifier,
  AnnotationPage,
  AnnotationRecord,
  ContainerInfo,
  DocumentData,
  IndexChoreSummary,
  IndexConfig,
  Principal,
  Query,
  SearchCreated,
  SearchInfo,
  SearchTaskSummary,
  UserEntry,
} from "./types.js";
import { UriFactory } from "./uris.js";
import { UserStore, type AddUsersResult } from "./users.js";

/**
 * Annotation store operations, each guarded by the access gate
 *
 * @example
 * ```typescript
 * const store = openAnnoStore({ root: "./data" });
 * const container = await store.createContainer(SUPERUSER, { name: "letters" });
 * await store.addAnnotation(SUPERUSER, "letters", { body: { type: "Page" } });
 *
 * const search = await store.createSearch(SUPERUSER, "letters", { "body.type": "Page" });
 * const page = await store.getSearchPage(SUPERUSER, "letters", search.id, 0);
 * ```
 */
export interface AnnoStore {
  readonly config: Readonly<AnnoStoreConfig>;
  readonly uris: UriFactory;

  authenticate(apiKey: string): Promise<Principal | undefined>;

  // Containers
  createContainer(principal: Principal | undefined, request?: CreateContainerRequest): Promise<ContainerInfo>;
  getContainer(principal: Principal | undefined, containerName: string): Promise<ContainerInfo>;
  deleteContainer(
    principal: Principal | undefined,
    containerName: string,
    options?: { force?: boolean }
  ): Promise<void>;
  setAnonymousReadAccess(
    principal: Principal | undefined,
    containerName: string,
    readOnlyForAnonymousUsers: boolean
  ): Promise<void>;
  getMyContainers(principal: Principal | undefined): Promise<Record<string, string[]>>;

  // Annotations
  addAnnotation(
    principal: Principal | undefined,
    containerName: string,
    annotation: unknown,
    options?: { name?: string }
  ): Promise<AnnotationIdentifier>;
  batchUpload(
    principal: Principal | undefined,
    containerName: string,
    annotations: readonly unknown[]
  ): Promise<AnnotationIdentifier[]>;
  getAnnotation(
    principal: Principal | undefined,
    containerName: string,
    annotationName: string
  ): Promise<AnnotationRecord>;
  updateAnnotation(
    principal: Principal | undefined,
    containerName: string,
    annotationName: string,
    etag: string,
    annotation: unknown
  ): Promise<AnnotationIdentifier>;
  deleteAnnotation(
    principal: Principal | undefined,
    containerName: string,
    annotationName: string,
    etag?: string
  ): Promise<void>;
  getFieldCounts(principal: Principal | undefined, containerName: string): Promise<Record<string, number>>;
  getDistinctFieldValues(
    principal: Principal | undefined,
    containerName: string,
    field: string
  ): Promise<unknown[]>;

  // Container users
  getContainerUsers(principal: Principal | undefined, containerName: string): Promise<ContainerUser[]>;
  addContainerUsers(
    principal: Principal | undefined,
    containerName: string,
    users: readonly ContainerUser[]
  ): Promise<void>;
  removeContainerUser(
    principal: Principal | undefined,
    containerName: string,
    userName: string
  ): Promise<void>;

  // Users
  listUsers(principal: Principal | undefined): Promise<string[]>;
  addUsers(principal: Principal | undefined, users: readonly UserEntry[]): Promise<AddUsersResult>;
  deleteUser(principal: Principal | undefined, userName: string): Promise<void>;

  // Search
  createSearch(principal: Principal | undefined, containerName: string, query: Query): Promise<SearchCreated>;
  getSearchPage(
    principal: Principal | undefined,
    containerName: string,
    searchId: string,
    page: number
  ): Promise<AnnotationPage>;
  getSearchInfo(principal: Principal | undefined, containerName: string, searchId: string): Promise<SearchInfo>;

  // Global search
  startGlobalSearch(principal: Principal | undefined, query: Query): Promise<SearchTaskSummary>;
  getGlobalSearchStatus(principal: Principal | undefined, taskId: string): Promise<SearchTaskSummary>;
  getGlobalSearchResultPage(
    principal: Principal | undefined,
    taskId: string,
    page: number
  ): Promise<AnnotationPage>;

  // Indexes
  addIndex(
    principal: Principal | undefined,
    containerName: string,
    field: string,
    kind: string
  ): Promise<IndexChoreSummary>;
  getIndexStatus(
    principal: Principal | undefined,
    containerName: string,
    field: string,
    kind: string
  ): Promise<IndexChoreSummary>;
  getIndex(
    principal: Principal | undefined,
    containerName: string,
    field: string,
    kind: string
  ): Promise<IndexConfig>;
  listIndexes(principal: Principal | undefined, containerName: string): Promise<IndexConfig[]>;
  deleteIndex(
    principal: Principal | undefined,
    containerName: string,
    field: string,
    kind: string
  ): Promise<void>;

  /**
   * Wait for running index builds and global searches to finish
   */
  close(): Promise<void>;
}

class FileAnnoStore implements AnnoStore {
  readonly config: Readonly<AnnoStoreConfig>;
  readonly uris: UriFactory;
  readonly #documents: DocumentStore;
  readonly #gate: AccessGate;
  readonly #users: UserStore;
  readonly #containers: ContainerService;
  readonly #searches: SearchManager;
  readonly #indexes: IndexManager;
  readonly #pool: WorkerPool;
  readonly #globalSearches = new TaskRegistry<string, ContainerSearchTask>();
  readonly #now: (() => number) | undefined;

  constructor(options: AnnoStoreOptions) {
    const config = resolveConfig(options);
    this.config = Object.freeze(config);
    this.#now = options.now;

    this.#documents =
      options.documentStore ??
      new FileDocumentStore({ root: path.resolve(config.root), indent: config.indent });
    this.uris = new UriFactory(config.externalBaseUrl);
    this.#pool = new WorkerPool(config.workerConcurrency);

    const roles = new DocumentRoleStore(this.#documents);
    this.#gate = new AccessGate(roles);
    this.#users = new UserStore(this.#documents, roles, { rootApiKey: config.rootApiKey });
    this.#containers = new ContainerService(this.#documents, roles, this.uris, { now: options.now });
    this.#searches = new SearchManager(this.#documents, this.uris, {
      pageSize: config.pageSize,
      rangeSelectorType: config.rangeSelectorType,
      ttlMs: config.searchCache.ttlMs,
      maxSize: config.searchCache.maxSize,
      now: options.now,
    });
    this.#indexes = new IndexManager(this.#documents, this.#pool, this.uris, {
      ttlMs: config.taskTtlMs,
      now: options.now,
    });
  }

  authenticate(apiKey: string): Promise<Principal | undefined> {
    return this.#users.authenticate(apiKey);
  }

  // Containers

  async createContainer(
    principal: Principal | undefined,
    request: CreateContainerRequest = {}
  ): Promise<ContainerInfo> {
    if (principal === undefined) {
      throw new NotAuthorizedError("No authentication found");
    }
    return this.#containers.createContainer(
      request,
      principal.kind === "user" ? principal.name : undefined
    );
  }

  async getContainer(principal: Principal | undefined, containerName: string): Promise<ContainerInfo> {
    await this.#authorizeRead(principal, containerName);
    return this.#containers.getContainer(containerName);
  }

  async deleteContainer(
    principal: Principal | undefined,
    containerName: string,
    options: { force?: boolean } = {}
  ): Promise<void> {
    await this.#gate.authorize(principal, containerName, ADMIN_ONLY, false);
    await this.#containers.deleteContainer(containerName, options);
    this.#indexes.forgetContainer(containerName);
  }

  async setAnonymousReadAccess(
    principal: Principal | undefined,
    containerName: string,
    readOnlyForAnonymousUsers: boolean
  ): Promise<void> {
    await this.#gate.authorize(principal, containerName, ADMIN_ONLY, false);
    await this.#containers.setAnonymousReadAccess(containerName, readOnlyForAnonymousUsers);
  }

  async getMyContainers(principal: Principal | undefined): Promise<Record<string, string[]>> {
    if (principal === undefined) {
      throw new NotAuthorizedError("No authentication found");
    }
    return this.#containers.getMyContainers(principal);
  }

  // Annotations

  async addAnnotation(
    principal: Principal | undefined,
    containerName: string,
    annotation: unknown,
    options: { name?: string } = {}
  ): Promise<AnnotationIdentifier> {
    await this.#gate.authorize(principal, containerName, ADMIN_OR_EDITOR, false);
    return this.#containers.addAnnotation(containerName, annotation, options);
  }

  async batchUpload(
    principal: Principal | undefined,
    containerName: string,
    annotations: readonly unknown[]
  ): Promise<AnnotationIdentifier[]> {
    await this.#gate.authorize(principal, containerName, ADMIN_OR_EDITOR, false);
    return this.#containers.batchUpload(containerName, annotations);
  }

  async getAnnotation(
    principal: Principal | undefined,
    containerName: string,
    annotationName: string
  ): Promise<AnnotationRecord> {
    await this.#authorizeRead(principal, containerName);
    return this.#containers.getAnnotation(containerName, annotationName);
  }

  async updateAnnotation(
    principal: Principal | undefined,
    containerName: string,
    annotationName: string,
    etag: string,
    annotation: unknown
  ): Promise<AnnotationIdentifier> {
    await this.#gate.authorize(principal, containerName, ADMIN_OR_EDITOR, false);
    return this.#containers.updateAnnotation(containerName, annotationName, etag, annotation);
  }

  async deleteAnnotation(
    principal: Principal | undefined,
    containerName: string,
    annotationName: string,
    etag?: string
  ): Promise<void> {
    await this.#gate.authorize(principal, containerName, ADMIN_OR_EDITOR, false);
    await this.#containers.deleteAnnotation(containerName, annotationName, etag);
  }

  async getFieldCounts(
    principal: Principal | undefined,
    containerName: string
  ): Promise<Record<string, number>> {
    await this.#authorizeRead(principal, containerName);
    return this.#containers.getFieldCounts(containerName);
  }

  async getDistinctFieldValues(
    principal: Principal | undefined,
    containerName: string,
    field: string
  ): Promise<unknown[]> {
    await this.#authorizeRead(principal, containerName);
    return this.#containers.getDistinctFieldValues(containerName, field);
  }

  // Container users

  async getContainerUsers(
    principal: Principal | undefined,
    containerName: string
  ): Promise<ContainerUser[]> {
    await this.#gate.authorize(principal, containerName, ADMIN_ONLY, false);
    return this.#containers.getContainerUsers(containerName);
  }

  async addContainerUsers(
    principal: Principal | undefined,
    containerName: string,
    users: readonly ContainerUser[]
  ): Promise<void> {
    await this.#gate.authorize(principal, containerName, ADMIN_ONLY, false);
    await this.#containers.addContainerUsers(containerName, users);
  }

  async removeContainerUser(
    principal: Principal | undefined,
    containerName: string,
    userName: string
  ): Promise<void> {
    await this.#gate.authorize(principal, containerName, ADMIN_ONLY, false);
    await this.#containers.removeContainerUser(containerName, userName);
  }

  // Users

  async listUsers(principal: Principal | undefined): Promise<string[]> {
    this.#requireSuperuser(principal);
    return this.#users.listUsers();
  }

  async addUsers(principal: Principal | undefined, users: readonly UserEntry[]): Promise<AddUsersResult> {
    this.#requireSuperuser(principal);
    return this.#users.addUsers(users);
  }

  async deleteUser(principal: Principal | undefined, userName: string): Promise<void> {
    this.#requireSuperuser(principal);
    await this.#users.deleteUser(userName);
  }

  // Search

  async createSearch(
    principal: Principal | undefined,
    containerName: string,
    query: Query
  ): Promise<SearchCreated> {
    await this.#authorizeRead(principal, containerName);
    return this.#searches.create(containerName, query);
  }

  async getSearchPage(
    principal: Principal | undefined,
    containerName: string,
    searchId: string,
    page: number
  ): Promise<AnnotationPage> {
    await this.#authorizeRead(principal, containerName);
    return this.#searches.getPage(containerName, searchId, page);
  }

  async getSearchInfo(
    principal: Principal | undefined,
    containerName: string,
    searchId: string
  ): Promise<SearchInfo> {
    await this.#authorizeRead(principal, containerName);
    return this.#searches.getInfo(containerName, searchId);
  }

  // Global search

  async startGlobalSearch(principal: Principal | undefined, query: Query): Promise<SearchTaskSummary> {
    const stages = compileQueryOrThrow(query, { rangeSelectorType: this.config.rangeSelectorType });
    const containerNames = await this.#readableContainers(principal);

    const task = new ContainerSearchTask(
      { store: this.#documents, query, stages, containerNames, owner: principal },
      { ttlMs: this.config.taskTtlMs, now: this.#now }
    );
    this.#globalSearches.purgeExpired();
    this.#globalSearches.set(task.id, task);
    this.#pool.submit(task);

    logger.info("search.global.start", {
      details: { id: task.id, containers: containerNames.length, owner: describePrincipal(principal) },
    });
    return task.summary();
  }

  async getGlobalSearchStatus(principal: Principal | undefined, taskId: string): Promise<SearchTaskSummary> {
    return this.#globalSearch(principal, taskId).summary();
  }

  async getGlobalSearchResultPage(
    principal: Principal | undefined,
    taskId: string,
    page: number
  ): Promise<AnnotationPage> {
    validatePageNumber(page);
    const task = this.#globalSearch(principal, taskId);
    const results = task.results;
    const pageSize = this.config.pageSize;

    const items: Array<DocumentData & { id: string }> = [];
    for (const hit of results.slice(page * pageSize, (page + 1) * pageSize)) {
      const envelope = parseEnvelope(hit.document, hit.containerName);
      if (envelope) {
        items.push(
          withAnnotationId(
            envelope.annotation,
            this.uris.annotationUrl(hit.containerName, envelope.annotation_name)
          )
        );
      }
    }

    return buildAnnotationPage({
      pageUrl: (n) => this.uris.globalSearchPageUrl(taskId, n),
      partOf: this.uris.globalSearchUrl(taskId),
      page,
      pageSize,
      total: results.length,
      items,
    });
  }

  // Indexes

  async addIndex(
    principal: Principal | undefined,
    containerName: string,
    field: string,
    kind: string
  ): Promise<IndexChoreSummary> {
    await this.#gate.authorize(principal, containerName, ADMIN_ONLY, false);
    parseIndexKind(kind);
    await this.#requireContainer(containerName);
    return this.#indexes.startIndexCreation(containerName, field, kind).summary();
  }

  async getIndexStatus(
    principal: Principal | undefined,
    containerName: string,
    field: string,
    kind: string
  ): Promise<IndexChoreSummary> {
    await this.#gate.authorize(principal, containerName, ADMIN_ONLY, false);
    const chore = this.#indexes.getIndexChore(containerName, field, kind);
    if (!chore) {
      throw new IndexNotFoundError(containerName, field, parseIndexKind(kind));
    }
    return chore.summary();
  }

  async getIndex(
    principal: Principal | undefined,
    containerName: string,
    field: string,
    kind: string
  ): Promise<IndexConfig> {
    await this.#gate.authorize(principal, containerName, ADMIN_ONLY, false);
    parseIndexKind(kind);
    await this.#requireContainer(containerName);
    return this.#indexes.getIndexConfig(containerName, field, kind);
  }

  async listIndexes(principal: Principal | undefined, containerName: string): Promise<IndexConfig[]> {
    await this.#authorizeRead(principal, containerName);
    await this.#requireContainer(containerName);
    return this.#indexes.listIndexes(containerName);
  }

  async deleteIndex(
    principal: Principal | undefined,
    containerName: string,
    field: string,
    kind: string
  ): Promise<void> {
    await this.#gate.authorize(principal, containerName, ADMIN_ONLY, false);
    parseIndexKind(kind);
    await this.#requireContainer(containerName);
    await this.#indexes.deleteIndex(containerName, field, kind);
  }

  async close(): Promise<void> {
    await this.#pool.onIdle();
  }

  // Internals

  async #authorizeRead(principal: Principal | undefined, containerName: string): Promise<void> {
    const anonymousAllowed =
      principal === undefined && (await this.#containers.isReadableAnonymously(containerName));
    await this.#gate.authorize(principal, containerName, ANY_ROLE, anonymousAllowed);
  }

  #requireSuperuser(principal: Principal | undefined): void {
    if (principal === undefined) {
      throw new NotAuthorizedError("No authentication found");
    }
    if (principal.kind !== "superuser") {
      throw new NotAuthorizedError(
        `User ${principal.name} does not have access rights to this endpoint`
      );
    }
  }

  async #requireContainer(containerName: string): Promise<void> {
    if (!(await this.#containers.exists(containerName))) {
      throw new ContainerNotFoundError(containerName);
    }
  }

  async #readableContainers(principal: Principal | undefined): Promise<string[]> {
    const all = await this.#containers.listContainerNames();
    if (principal?.kind === "superuser") {
      return all;
    }

    const readable: string[] = [];
    for (const name of all) {
      const anonymousAllowed =
        principal === undefined && (await this.#containers.isReadableAnonymously(name));
      if (await this.#gate.isAuthorized(principal, name, ANY_ROLE, anonymousAllowed)) {
        readable.push(name);
      }
    }
    return readable;
  }

  /**
   * Only the principal that started a global search, or the superuser, may read it
   */
  #globalSearch(principal: Principal | undefined, taskId: string): ContainerSearchTask {
    const task = this.#globalSearches.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    if (principal?.kind !== "superuser" && !samePrincipal(principal, task.owner)) {
      throw new NotAuthorizedError(
        `${describePrincipal(principal)} did not start search ${taskId}`
      );
    }
    return task;
  }
}

/**
 * Open an annotation store
 * @throws ValidationError for invalid options
 */
export function openAnnoStore(options: AnnoStoreOptions): AnnoStore {
  return new FileAnnoStore(options);
}
