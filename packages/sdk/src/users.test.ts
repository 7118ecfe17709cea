import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { UserStore } from "./users.js";
import { DocumentRoleStore } from "./roles.js";
import { UserNotFoundError, ValidationError } from "./errors.js";
import { FileDocumentStore } from "./storage/file-store.js";
import { logger } from "./observability/logs.js";

describe("UserStore", () => {
  let root: string;
  let roles: DocumentRoleStore;
  let users: UserStore;

  beforeEach(async () => {
    logger.setEnabled(false);
    root = await mkdtemp(join(tmpdir(), "annostore-users-"));
    const documents = new FileDocumentStore({ root });
    roles = new DocumentRoleStore(documents);
    users = new UserStore(documents, roles, { rootApiKey: "root-secret" });
  });

  afterEach(async () => {
    logger.setEnabled(true);
    await rm(root, { recursive: true, force: true });
  });

  it("should authenticate the root key as the superuser", async () => {
    expect(await users.authenticate("root-secret")).toEqual({ kind: "superuser" });
  });

  it("should authenticate registered keys as their user", async () => {
    await users.addUsers([{ userName: "alice", apiKey: "test-secret-a" }]);

    expect(await users.authenticate("test-secret-a")).toEqual({ kind: "user", name: "alice" });
    expect(await users.authenticate("unknown-key")).toBeUndefined();
    expect(await users.authenticate("")).toBeUndefined();
  });

  it("should reject taken names and keys and add the rest", async () => {
    const first = await users.addUsers([
      { userName: "alice", apiKey: "test-secret-a" },
      { userName: "bob", apiKey: "test-secret-b" },
    ]);
    expect(first).toEqual({ added: ["alice", "bob"], rejected: [] });

    const second = await users.addUsers([
      { userName: "alice", apiKey: "test-secret-x" },
      { userName: "carol", apiKey: "test-secret-a" },
      { userName: "dave", apiKey: "root-secret" },
      { userName: "erin", apiKey: "test-secret-e" },
    ]);
    expect(second).toEqual({
      added: ["erin"],
      rejected: [
        { userName: "alice", reason: "user name already taken" },
        { userName: "carol", reason: "api key already taken" },
        { userName: "dave", reason: "api key already taken" },
      ],
    });

    expect(await users.listUsers()).toEqual(["alice", "bob", "erin"]);
  });

  it("should refuse malformed entries", async () => {
    await expect(users.addUsers([{ userName: "alice", apiKey: "" }])).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(users.addUsers([{ userName: " alice", apiKey: "k" }])).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it("should delete a user with their role assignments", async () => {
    await users.addUsers([{ userName: "alice", apiKey: "test-secret-a" }]);
    await roles.setRole("letters", "alice", "EDITOR");

    await users.deleteUser("alice");

    expect(await users.listUsers()).toEqual([]);
    expect(await users.authenticate("test-secret-a")).toBeUndefined();
    expect(await roles.getRole("letters", "alice")).toBeUndefined();
  });

  it("should report deleting an unknown user", async () => {
    await expect(users.deleteUser("nobody")).rejects.toBeInstanceOf(UserNotFoundError);
  });
});
