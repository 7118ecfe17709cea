/**
 * Search across several containers as one background task
 *
 * Each container is one sub-unit. A container that fails (deleted meanwhile,
 * unreadable documents) contributes one error and the task carries on.
 */

import type { DocumentStore } from "../storage/document-store.js";
import type { Principal, Query, SearchTaskSummary, Stage, StoredDocument } from "../types.js";
import { BackgroundTask, type BackgroundTaskOptions, type TaskProgress } from "./task.js";

export interface ContainerSearchHit {
  containerName: string;
  document: StoredDocument;
}

export interface ContainerSearchTaskInit {
  store: DocumentStore;
  query: Query;
  /** Compiled form of `query` */
  stages: readonly Stage[];
  containerNames: readonly string[];
  /** Caller that started the search; undefined for anonymous */
  owner: Principal | undefined;
}

export class ContainerSearchTask extends BackgroundTask<ContainerSearchHit> {
  readonly query: Query;
  readonly owner: Principal | undefined;
  readonly containerNames: readonly string[];
  readonly #store: DocumentStore;
  readonly #stages: readonly Stage[];

  constructor(init: ContainerSearchTaskInit, options: BackgroundTaskOptions = {}) {
    super(options);
    this.#store = init.store;
    this.#stages = init.stages;
    this.query = init.query;
    this.owner = init.owner;
    this.containerNames = Object.freeze([...init.containerNames]);
  }

  protected async execute(progress: TaskProgress<ContainerSearchHit>): Promise<void> {
    progress.setTotal(this.containerNames.length);

    for (const containerName of this.containerNames) {
      try {
        if (!(await this.#store.hasCollection(containerName))) {
          throw new Error("container not found");
        }
        const documents = await this.#store.aggregate(containerName, this.#stages);
        progress.addResults(documents.map((document) => ({ containerName, document })));
      } catch (err) {
        progress.addError(`${containerName}: ${err instanceof Error ? err.message : String(err)}`);
      } finally {
        progress.advance();
      }
    }
  }

  protected describe(): string {
    return `search over ${this.containerNames.length} container(s)`;
  }

  override summary(): Readonly<SearchTaskSummary> {
    return Object.freeze({
      ...super.summary(),
      query: this.query,
      containersToSearch: this.containerNames,
    });
  }
}
