/**
 * Search cache and pager
 *
 * A search is compiled and counted once, then kept in a bounded cache. Pages
 * re-run the stored stages against live data with a skip/limit suffix, while
 * `total` and the prev/next links use the hit count frozen at creation.
 * Count and pages are not taken from one snapshot.
 */

import { randomUUID } from "node:crypto";
import { ExpiringLruCache } from "./cache.js";
import { compileQueryOrThrow } from "./compiler.js";
import { parseEnvelope, withAnnotationId } from "./envelope.js";
import { ContainerNotFoundError, SearchNotFoundError, ValidationError } from "./errors.js";
import { logger } from "./observability/logs.js";
import type { DocumentStore } from "./storage/document-store.js";
import type {
  AnnotationPage,
  DocumentData,
  MatchStage,
  Query,
  SearchCreated,
  SearchInfo,
} from "./types.js";
import type { UriFactory } from "./uris.js";

export const ANNOTATION_PAGE_CONTEXT: readonly string[] = [
  "http://www.w3.org/ns/anno.jsonld",
  "http://www.w3.org/ns/ldp.jsonld",
];

/**
 * A compiled query with its frozen hit count
 */
export interface CompiledSearch {
  id: string;
  containerName: string;
  query: Query;
  stages: readonly MatchStage[];
  totalHits: number;
}

export interface SearchManagerOptions {
  pageSize: number;
  rangeSelectorType?: string;
  /** Idle time after which a search is forgotten, in milliseconds */
  ttlMs?: number;
  /** Live searches kept before the least recently used is evicted */
  maxSize?: number;
  now?: () => number;
}

/**
 * Check a requested page number
 * @throws ValidationError unless it is a non-negative integer
 */
export function validatePageNumber(page: number): void {
  if (!Number.isInteger(page) || page < 0) {
    throw new ValidationError(`Page number must be a non-negative integer, got ${page}`);
  }
}

export interface PageParts {
  /** URL of page `n` of the search */
  pageUrl: (page: number) => string;
  partOf: string;
  page: number;
  pageSize: number;
  total: number;
  items: Array<DocumentData & { id: string }>;
}

/**
 * Assemble a page; `prev` is null on page 0, `next` once the frozen total is reached
 */
export function buildAnnotationPage(parts: PageParts): AnnotationPage {
  const startIndex = parts.page * parts.pageSize;
  const hasNext = startIndex + parts.items.length < parts.total;
  return {
    "@context": [...ANNOTATION_PAGE_CONTEXT],
    id: parts.pageUrl(parts.page),
    type: "AnnotationPage",
    partOf: parts.partOf,
    startIndex,
    total: parts.total,
    items: parts.items,
    prev: parts.page > 0 ? parts.pageUrl(parts.page - 1) : null,
    next: hasNext ? parts.pageUrl(parts.page + 1) : null,
  };
}

export class SearchManager {
  readonly #store: DocumentStore;
  readonly #uris: UriFactory;
  readonly #pageSize: number;
  readonly #rangeSelectorType: string | undefined;
  readonly #searches: ExpiringLruCache<string, CompiledSearch>;

  constructor(store: DocumentStore, uris: UriFactory, options: SearchManagerOptions) {
    this.#store = store;
    this.#uris = uris;
    this.#pageSize = options.pageSize;
    this.#rangeSelectorType = options.rangeSelectorType;
    this.#searches = new ExpiringLruCache({
      ttlMs: options.ttlMs,
      maxSize: options.maxSize,
      now: options.now,
    });
  }

  get pageSize(): number {
    return this.#pageSize;
  }

  /**
   * Compile, count and cache a search
   * @throws QueryCompilationError before touching storage
   * @throws ContainerNotFoundError
   */
  async create(containerName: string, query: Query): Promise<SearchCreated> {
    const stages = compileQueryOrThrow(query, { rangeSelectorType: this.#rangeSelectorType });
    if (!(await this.#store.hasCollection(containerName))) {
      throw new ContainerNotFoundError(containerName);
    }

    const totalHits = await this.#store.count(containerName, stages);
    const id = randomUUID();
    this.#searches.set(id, { id, containerName, query, stages, totalHits });

    logger.info("search.create", {
      container: containerName,
      details: { id, totalHits, stages: stages.length, cache: this.#searches.stats() },
    });

    return {
      id,
      totalHits,
      location: this.#uris.searchUrl(containerName, id),
      infoLocation: this.#uris.searchInfoUrl(containerName, id),
    };
  }

  /**
   * @throws ValidationError for a bad page number
   * @throws SearchNotFoundError when unknown, expired or created for another container
   */
  async getPage(containerName: string, searchId: string, page: number): Promise<AnnotationPage> {
    validatePageNumber(page);
    const search = this.#lookup(containerName, searchId);

    const docs = await this.#store.aggregate(containerName, [
      ...search.stages,
      { $skip: page * this.#pageSize },
      { $limit: this.#pageSize },
    ]);

    const items: Array<DocumentData & { id: string }> = [];
    for (const doc of docs) {
      const envelope = parseEnvelope(doc, containerName);
      if (envelope) {
        items.push(
          withAnnotationId(
            envelope.annotation,
            this.#uris.annotationUrl(containerName, envelope.annotation_name)
          )
        );
      }
    }

    return buildAnnotationPage({
      pageUrl: (n) => this.#uris.searchPageUrl(containerName, searchId, n),
      partOf: this.#uris.searchUrl(containerName, searchId),
      page,
      pageSize: this.#pageSize,
      total: search.totalHits,
      items,
    });
  }

  /**
   * @throws SearchNotFoundError when unknown, expired or created for another container
   */
  getInfo(containerName: string, searchId: string): SearchInfo {
    const search = this.#lookup(containerName, searchId);
    return { query: search.query, totalHits: search.totalHits };
  }

  #lookup(containerName: string, searchId: string): CompiledSearch {
    const search = this.#searches.get(searchId);
    if (!search || search.containerName !== containerName) {
      throw new SearchNotFoundError(searchId);
    }
    return search;
  }
}
