/**
 * AnnoStore service adapter
 * Binds the sdk store to the caller's principal and applies the server's safety limits
 */

import type {
  AnnoStore,
  AnnotationIdentifier,
  AnnotationPage,
  AnnotationRecord,
  ContainerInfo,
  CreateContainerRequest,
  IndexChoreSummary,
  IndexConfig,
  Principal,
  Query,
  SearchCreated,
  SearchInfo,
  SearchTaskSummary,
} from "@annostore/sdk";
import { ValidationError, describePrincipal } from "@annostore/sdk";
import { logger } from "../observability/logger.js";

// Maximum annotation size in bytes (1MB)
const MAX_ANNOTATION_SIZE = 1024 * 1024;

export class AnnoStoreService {
  readonly #store: AnnoStore;
  readonly #principal: Principal | undefined;

  constructor(store: AnnoStore, principal: Principal | undefined) {
    this.#store = store;
    this.#principal = principal;
    logger.info("service.init", {
      principal: describePrincipal(principal),
      base_url: store.config.externalBaseUrl,
    });
  }

  get principal(): Principal | undefined {
    return this.#principal;
  }

  async createContainer(request: CreateContainerRequest): Promise<ContainerInfo> {
    return this.#store.createContainer(this.#principal, request);
  }

  async getContainer(containerName: string): Promise<ContainerInfo> {
    return this.#store.getContainer(this.#principal, containerName);
  }

  /**
   * Store an annotation
   * Validates its serialized size before writing
   */
  async addAnnotation(
    containerName: string,
    annotation: Record<string, unknown>,
    name?: string
  ): Promise<AnnotationIdentifier> {
    const byteLength = Buffer.byteLength(JSON.stringify(annotation), "utf8");
    if (byteLength > MAX_ANNOTATION_SIZE) {
      throw new ValidationError(
        `Annotation too large: ${byteLength} bytes exceeds limit of ${MAX_ANNOTATION_SIZE} bytes`
      );
    }
    return this.#store.addAnnotation(this.#principal, containerName, annotation, { name });
  }

  async getAnnotation(containerName: string, annotationName: string): Promise<AnnotationRecord> {
    return this.#store.getAnnotation(this.#principal, containerName, annotationName);
  }

  async createSearch(containerName: string, query: Query): Promise<SearchCreated> {
    return this.#store.createSearch(this.#principal, containerName, query);
  }

  async getSearchPage(containerName: string, searchId: string, page: number): Promise<AnnotationPage> {
    return this.#store.getSearchPage(this.#principal, containerName, searchId, page);
  }

  async getSearchInfo(containerName: string, searchId: string): Promise<SearchInfo> {
    return this.#store.getSearchInfo(this.#principal, containerName, searchId);
  }

  async addIndex(containerName: string, field: string, kind: string): Promise<IndexChoreSummary> {
    return this.#store.addIndex(this.#principal, containerName, field, kind);
  }

  async getIndexStatus(containerName: string, field: string, kind: string): Promise<IndexChoreSummary> {
    return this.#store.getIndexStatus(this.#principal, containerName, field, kind);
  }

  async listIndexes(containerName: string): Promise<IndexConfig[]> {
    return this.#store.listIndexes(this.#principal, containerName);
  }

  async deleteIndex(containerName: string, field: string, kind: string): Promise<void> {
    await this.#store.deleteIndex(this.#principal, containerName, field, kind);
  }

  async startGlobalSearch(query: Query): Promise<SearchTaskSummary> {
    return this.#store.startGlobalSearch(this.#principal, query);
  }

  async getGlobalSearchStatus(searchId: string): Promise<SearchTaskSummary> {
    return this.#store.getGlobalSearchStatus(this.#principal, searchId);
  }

  async getGlobalSearchPage(searchId: string, page: number): Promise<AnnotationPage> {
    return this.#store.getGlobalSearchResultPage(this.#principal, searchId, page);
  }
}
