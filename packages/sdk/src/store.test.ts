/**
 * Tests for the AnnoStore facade: access rules per operation, index and
 * global-search flows
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openAnnoStore, type AnnoStore } from "./store.js";
import { SUPERUSER, namedUser } from "./access.js";
import {
  ContainerNotFoundError,
  IndexNotFoundError,
  NotAuthorizedError,
  QueryCompilationError,
  TaskNotFoundError,
  UnknownIndexKindError,
  ValidationError,
} from "./errors.js";
import { FileDocumentStore } from "./storage/file-store.js";
import { logger } from "./observability/logs.js";
import type { IndexDefinition } from "./types.js";

/**
 * Holds every index build until `release` is called
 */
class HeldIndexStore extends FileDocumentStore {
  #release: () => void = () => undefined;
  readonly #held = new Promise<void>((resolve) => {
    this.#release = resolve;
  });

  release(): void {
    this.#release();
  }

  override async createIndex(collection: string, definition: IndexDefinition): Promise<void> {
    await this.#held;
    await super.createIndex(collection, definition);
  }
}

const ada = namedUser("ada");
const ed = namedUser("ed");
const gus = namedUser("gus");
const stranger = namedUser("stranger");

describe("AnnoStore", () => {
  let root: string;
  let store: AnnoStore;

  beforeEach(async () => {
    logger.setEnabled(false);
    root = await mkdtemp(join(tmpdir(), "annostore-facade-"));
    store = openAnnoStore({ root, rootApiKey: "root-secret", pageSize: 10 });

    await store.addUsers(SUPERUSER, [
      { userName: "ada", apiKey: "test-secret-ada" },
      { userName: "ed", apiKey: "test-secret-ed" },
      { userName: "gus", apiKey: "test-secret-gus" },
      { userName: "stranger", apiKey: "test-secret-stranger" },
    ]);
    await store.createContainer(ada, { name: "letters" });
    await store.addContainerUsers(ada, "letters", [
      { userName: "ed", role: "EDITOR" },
      { userName: "gus", role: "GUEST" },
    ]);
    await store.addAnnotation(ed, "letters", { body: { type: "Page" } }, { name: "p1" });
  });

  afterEach(async () => {
    await store.close();
    logger.setEnabled(true);
    await rm(root, { recursive: true, force: true });
  });

  it("should reject invalid options", () => {
    expect(() => openAnnoStore({ root, pageSize: 0 })).toThrow(ValidationError);
  });

  describe("authentication", () => {
    it("should map API keys to principals", async () => {
      expect(await store.authenticate("root-secret")).toEqual(SUPERUSER);
      expect(await store.authenticate("test-secret-gus")).toEqual(gus);
      expect(await store.authenticate("wrong")).toBeUndefined();
    });
  });

  describe("role enforcement", () => {
    it("should let a guest search and read", async () => {
      const search = await store.createSearch(gus, "letters", { "body.type": "Page" });

      expect(search.totalHits).toBe(1);
      expect((await store.getSearchPage(gus, "letters", search.id, 0)).items).toHaveLength(1);
      expect(await store.getSearchInfo(gus, "letters", search.id)).toEqual({
        query: { "body.type": "Page" },
        totalHits: 1,
      });
      expect((await store.getAnnotation(gus, "letters", "p1")).annotation.body).toEqual({
        type: "Page",
      });
      expect(await store.listIndexes(gus, "letters")).toEqual([]);
    });

    it("should refuse a guest index mutation, content mutation and user management", async () => {
      await expect(store.addIndex(gus, "letters", "body.type", "hashed")).rejects.toBeInstanceOf(
        NotAuthorizedError
      );
      await expect(store.deleteIndex(gus, "letters", "body.type", "hashed")).rejects.toBeInstanceOf(
        NotAuthorizedError
      );
      await expect(store.addAnnotation(gus, "letters", { n: 1 })).rejects.toBeInstanceOf(
        NotAuthorizedError
      );
      await expect(store.getContainerUsers(gus, "letters")).rejects.toBeInstanceOf(
        NotAuthorizedError
      );
      await expect(store.listUsers(gus)).rejects.toThrow(
        "User gus does not have access rights to this endpoint"
      );
    });

    it("should let an editor change content but not manage the container", async () => {
      await store.addAnnotation(ed, "letters", { n: 1 });

      await expect(store.deleteContainer(ed, "letters", { force: true })).rejects.toBeInstanceOf(
        NotAuthorizedError
      );
      await expect(store.addIndex(ed, "letters", "n", "ascending")).rejects.toBeInstanceOf(
        NotAuthorizedError
      );
    });

    it("should refuse a principal without a role on every operation", async () => {
      await expect(store.createSearch(stranger, "letters", { n: 1 })).rejects.toThrow(
        "User stranger does not have access rights to this endpoint"
      );
      await expect(store.getContainer(stranger, "letters")).rejects.toBeInstanceOf(
        NotAuthorizedError
      );
      await expect(store.listIndexes(stranger, "letters")).rejects.toBeInstanceOf(
        NotAuthorizedError
      );
    });

    it("should admit anonymous readers only where the container allows it", async () => {
      await expect(store.createSearch(undefined, "letters", { n: 1 })).rejects.toThrow(
        "No authentication found"
      );

      await store.setAnonymousReadAccess(ada, "letters", true);

      const search = await store.createSearch(undefined, "letters", { "body.type": "Page" });
      expect(search.totalHits).toBe(1);
      await expect(store.addAnnotation(undefined, "letters", { n: 1 })).rejects.toThrow(
        "No authentication found"
      );
      await expect(store.createContainer(undefined, { name: "mine" })).rejects.toBeInstanceOf(
        NotAuthorizedError
      );
    });

    it("should let the superuser do anything", async () => {
      await store.addAnnotation(SUPERUSER, "letters", { n: 1 });
      expect((await store.getContainer(SUPERUSER, "letters")).annotationCount).toBe(2);
      expect(await store.listUsers(SUPERUSER)).toEqual(["ada", "ed", "gus", "stranger"]);
    });

    it("should revoke access when a user is deleted", async () => {
      await store.deleteUser(SUPERUSER, "gus");

      await expect(store.createSearch(gus, "letters", { n: 1 })).rejects.toBeInstanceOf(
        NotAuthorizedError
      );
    });

    it("should report containers by role", async () => {
      expect(await store.getMyContainers(gus)).toEqual({ GUEST: ["letters"] });
      expect(await store.getMyContainers(SUPERUSER)).toEqual({ ROOT: ["letters"] });
      await expect(store.getMyContainers(undefined)).rejects.toBeInstanceOf(NotAuthorizedError);
    });
  });

  describe("indexes", () => {
    it("should build an index in the background and report its status", async () => {
      const started = await store.addIndex(ada, "letters", "body.type", "hashed");
      expect(started.containerName).toBe("letters");
      expect(started.indexType).toBe("hashed");

      await store.close();

      const status = await store.getIndexStatus(ada, "letters", "body.type", "hashed");
      expect(status.id).toBe(started.id);
      expect(status.state).toBe("DONE");
      expect(await store.getIndex(ada, "letters", "body.type", "hashed")).toEqual({
        field: "body.type",
        type: "hashed",
        url: "http://localhost:8080/services/letters/indexes/body.type/hashed",
      });
      expect(await store.listIndexes(gus, "letters")).toHaveLength(1);
    });

    it("should return the same chore for concurrent submissions", async () => {
      const held = new HeldIndexStore({ root });
      const heldStore = openAnnoStore({ root, documentStore: held });

      const [first, second] = await Promise.all([
        heldStore.addIndex(SUPERUSER, "letters", "body.type", "hashed"),
        heldStore.addIndex(SUPERUSER, "letters", "body.type", "hashed"),
      ]);
      expect(second.id).toBe(first.id);

      held.release();
      await heldStore.close();
      expect((await heldStore.getIndexStatus(SUPERUSER, "letters", "body.type", "hashed")).state).toBe(
        "DONE"
      );
    });

    it("should fail a pending build whose container was removed", async () => {
      const held = new HeldIndexStore({ root });
      const heldStore = openAnnoStore({ root, documentStore: held });

      const chore = await heldStore.addIndex(SUPERUSER, "letters", "body.type", "hashed");
      await heldStore.deleteContainer(SUPERUSER, "letters", { force: true });
      held.release();
      await heldStore.close();

      const status = await heldStore.getIndexStatus(SUPERUSER, "letters", "body.type", "hashed");
      expect(status.id).toBe(chore.id);
      expect(status.state).toBe("FAILED");
      expect(status.errors).toEqual(["Collection 'letters' does not exist"]);
      expect(await held.hasCollection("letters")).toBe(false);
      await expect(heldStore.createSearch(SUPERUSER, "letters", { "body.type": "Page" })).rejects.toBeInstanceOf(
        ContainerNotFoundError
      );
    });

    it("should validate the kind and the container", async () => {
      await expect(store.addIndex(ada, "letters", "body.type", "btree")).rejects.toBeInstanceOf(
        UnknownIndexKindError
      );
      await expect(store.addIndex(SUPERUSER, "missing", "body.type", "hashed")).rejects.toBeInstanceOf(
        ContainerNotFoundError
      );
    });

    it("should report missing chores and indexes as not found", async () => {
      await expect(
        store.getIndexStatus(ada, "letters", "body.type", "text")
      ).rejects.toBeInstanceOf(IndexNotFoundError);
      await expect(store.getIndex(ada, "letters", "body.type", "text")).rejects.toBeInstanceOf(
        IndexNotFoundError
      );
    });

    it("should delete an index and its chore", async () => {
      await store.addIndex(ada, "letters", "body.type", "hashed");
      await store.close();

      await store.deleteIndex(ada, "letters", "body.type", "hashed");

      expect(await store.listIndexes(ada, "letters")).toEqual([]);
      await expect(
        store.getIndexStatus(ada, "letters", "body.type", "hashed")
      ).rejects.toBeInstanceOf(IndexNotFoundError);
    });
  });

  describe("global search", () => {
    beforeEach(async () => {
      await store.createContainer(SUPERUSER, { name: "notes" });
      await store.addAnnotation(SUPERUSER, "notes", { body: { type: "Page" } }, { name: "n1" });
    });

    it("should search only the containers the caller can read", async () => {
      const started = await store.startGlobalSearch(gus, { "body.type": "Page" });
      expect(started.containersToSearch).toEqual(["letters"]);

      await store.close();

      const status = await store.getGlobalSearchStatus(gus, started.id);
      expect(status.state).toBe("DONE");
      expect(status.resultCount).toBe(1);

      const page = await store.getGlobalSearchResultPage(gus, started.id, 0);
      expect(page.items.map((item) => item.id)).toEqual([
        "http://localhost:8080/w3c/letters/p1",
      ]);
      expect(page.partOf).toBe(`http://localhost:8080/global/search/${started.id}`);
      expect(page.next).toBeNull();
    });

    it("should search every container for the superuser", async () => {
      const started = await store.startGlobalSearch(SUPERUSER, { "body.type": "Page" });
      await store.close();

      const page = await store.getGlobalSearchResultPage(SUPERUSER, started.id, 0);
      expect(page.items.map((item) => item.id)).toEqual([
        "http://localhost:8080/w3c/letters/p1",
        "http://localhost:8080/w3c/notes/n1",
      ]);
      expect(page.total).toBe(2);
    });

    it("should keep a search private to the principal that started it", async () => {
      const started = await store.startGlobalSearch(gus, { "body.type": "Page" });
      await store.close();

      await expect(store.getGlobalSearchStatus(ed, started.id)).rejects.toBeInstanceOf(
        NotAuthorizedError
      );
      expect((await store.getGlobalSearchStatus(SUPERUSER, started.id)).id).toBe(started.id);
      await expect(store.getGlobalSearchStatus(gus, "no-such-task")).rejects.toBeInstanceOf(
        TaskNotFoundError
      );
    });

    it("should reject an invalid query before starting", async () => {
      await expect(store.startGlobalSearch(gus, { ":unknown": {} })).rejects.toBeInstanceOf(
        QueryCompilationError
      );
    });
  });
});

describe("end to end", () => {
  let root: string;
  let store: AnnoStore;

  beforeEach(async () => {
    logger.setEnabled(false);
    root = await mkdtemp(join(tmpdir(), "annostore-e2e-"));
    store = openAnnoStore({ root });
  });

  afterEach(async () => {
    await store.close();
    logger.setEnabled(true);
    await rm(root, { recursive: true, force: true });
  });

  it("should find a stored annotation and nothing for a non-matching query", async () => {
    await store.createContainer(SUPERUSER, { name: "C" });
    const added = await store.addAnnotation(SUPERUSER, "C", { body: { type: "Page" } });

    const hit = await store.createSearch(SUPERUSER, "C", { "body.type": "Page" });
    expect(hit.totalHits).toBe(1);

    const page = await store.getSearchPage(SUPERUSER, "C", hit.id, 0);
    expect(page.items).toEqual([
      { body: { type: "Page" }, id: `http://localhost:8080/w3c/C/${added.annotationName}` },
    ]);
    expect(page.prev).toBeNull();
    expect(page.next).toBeNull();

    const miss = await store.createSearch(SUPERUSER, "C", { "body.type": "Line" });
    expect(miss.totalHits).toBe(0);

    const empty = await store.getSearchPage(SUPERUSER, "C", miss.id, 0);
    expect(empty.items).toEqual([]);
    expect(empty.next).toBeNull();
  });
});
