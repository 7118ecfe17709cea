/**
 * Integration tests for CLI commands
 * Runs the command tree in-process against a temp store root
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createTempStoreRoot, removeDir } from "@annostore/testkit";
import { runCli } from "../src/program.js";
import type { CliIo } from "../src/lib/io.js";

interface CliRun {
  exitCode: number;
  stdout: string;
  stderr: string;
}

describe("CLI", () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempStoreRoot("annostore-cli-");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  async function cli(args: string[], stdin?: string, env: NodeJS.ProcessEnv = {}): Promise<CliRun> {
    let stdout = "";
    let stderr = "";
    const io: CliIo = {
      stdout: (text) => {
        stdout += text;
      },
      stderr: (text) => {
        stderr += text;
      },
      readStdin: async () => stdin ?? "",
      isStdinTTY: () => stdin === undefined,
      isStderrTTY: () => false,
    };

    const exitCode = await runCli(["--root", root, ...args], { io, env });
    return { exitCode, stdout, stderr };
  }

  async function seed(): Promise<void> {
    await cli(["container", "create", "letters", "--label", "Letters"]);
    await cli(["annotation", "add", "letters", "--name", "p1", "--data", '{"body":{"type":"Page"}}']);
  }

  describe("container", () => {
    it("should create and show a container", async () => {
      const created = await cli(["container", "create", "letters", "--label", "Letters"]);

      expect(created.exitCode).toBe(0);
      expect(JSON.parse(created.stdout)).toMatchObject({
        id: "http://localhost:8080/w3c/letters/",
        name: "letters",
        label: "Letters",
        annotationCount: 0,
        readOnlyForAnonymousUsers: false,
      });

      const shown = await cli(["container", "show", "letters"]);
      expect(shown.exitCode).toBe(0);
      expect(JSON.parse(shown.stdout)).toMatchObject({ name: "letters", annotationCount: 0 });
    });

    it("should include field counts on request", async () => {
      await seed();

      const shown = await cli(["container", "show", "letters", "--fields"]);

      expect(JSON.parse(shown.stdout)).toMatchObject({
        annotationCount: 1,
        fieldCounts: { body: 1, "body.type": 1 },
      });
    });

    it("should exit 2 for a missing container", async () => {
      const shown = await cli(["container", "show", "missing"]);

      expect(shown.exitCode).toBe(2);
      expect(shown.stdout).toBe("");
      expect(shown.stderr).toBe("Error: Annotation container 'missing' not found\n");
    });

    it("should only remove a non-empty container with --force", async () => {
      await seed();

      const refused = await cli(["container", "rm", "letters"]);
      expect(refused.exitCode).toBe(1);
      expect(refused.stderr).toBe(
        "Error: Container 'letters' still holds 1 annotation(s); delete them first or force\n"
      );

      const removed = await cli(["container", "rm", "letters", "--force"]);
      expect(removed.exitCode).toBe(0);
      expect(removed.stdout).toBe("Removed container letters\n");

      expect((await cli(["container", "show", "letters"])).exitCode).toBe(2);
    });

    it("should stay silent with --quiet", async () => {
      await cli(["container", "create", "letters"]);

      const removed = await cli(["--quiet", "container", "rm", "letters"]);

      expect(removed.exitCode).toBe(0);
      expect(removed.stdout).toBe("");
    });
  });

  describe("annotation", () => {
    it("should add from --data and read it back", async () => {
      await cli(["container", "create", "letters"]);

      const added = await cli(["annotation", "add", "letters", "--name", "p1", "--data", '{"body":"x"}']);
      expect(added.exitCode).toBe(0);
      expect(JSON.parse(added.stdout)).toMatchObject({ containerName: "letters", annotationName: "p1" });

      const fetched = await cli(["annotation", "get", "letters", "p1", "--raw"]);
      expect(fetched.exitCode).toBe(0);
      expect(fetched.stdout.trim().split("\n")).toHaveLength(1);
      expect(JSON.parse(fetched.stdout).annotation).toEqual({
        body: "x",
        id: "http://localhost:8080/w3c/letters/p1",
      });
    });

    it("should add from stdin and from a file", async () => {
      await cli(["container", "create", "letters"]);
      const file = join(root, "annotation.json");
      await writeFile(file, '{"body":"from file"}', "utf8");

      const fromStdin = await cli(["annotation", "add", "letters", "--name", "s1"], '{"body":"from stdin"}');
      const fromFile = await cli(["annotation", "add", "letters", "--name", "f1", "--file", file]);

      expect(fromStdin.exitCode).toBe(0);
      expect(fromFile.exitCode).toBe(0);
      expect(JSON.parse((await cli(["annotation", "get", "letters", "f1"])).stdout).annotation.body).toBe(
        "from file"
      );
    });

    it("should refuse conflicting or missing input", async () => {
      await cli(["container", "create", "letters"]);

      const both = await cli(["annotation", "add", "letters", "--file", "a.json", "--data", "{}"]);
      expect(both.exitCode).toBe(1);
      expect(both.stderr).toBe("Error: Cannot use both --file and --data; choose one or use stdin\n");

      const none = await cli(["annotation", "add", "letters"]);
      expect(none.exitCode).toBe(1);
      expect(none.stderr).toBe("Error: No input provided. Use --file, --data, or pipe JSON to stdin\n");

      const empty = await cli(["annotation", "add", "letters"], "  ");
      expect(empty.stderr).toBe("Error: stdin is empty\n");
    });

    it("should remove an annotation", async () => {
      await seed();

      const removed = await cli(["annotation", "rm", "letters", "p1"]);

      expect(removed.stdout).toBe("Removed letters/p1\n");
      expect((await cli(["annotation", "get", "letters", "p1"])).exitCode).toBe(2);
    });
  });

  describe("search", () => {
    it("should print the first page of hits", async () => {
      await seed();

      const searched = await cli(["search", "letters", "--data", '{"body.type":"Page"}']);

      expect(searched.exitCode).toBe(0);
      const page = JSON.parse(searched.stdout);
      expect(page.items).toEqual([{ body: { type: "Page" }, id: "http://localhost:8080/w3c/letters/p1" }]);
      expect(page.prev).toBeNull();
      expect(page.next).toBeNull();
    });

    it("should print the hit count with --info", async () => {
      await seed();

      const searched = await cli(["search", "letters", "--info", "--data", '{"body.type":"Line"}']);

      expect(JSON.parse(searched.stdout)).toMatchObject({ totalHits: 0 });
    });

    it("should exit 1 for an invalid query", async () => {
      await seed();

      const searched = await cli(["search", "letters", "--data", '{":nope":1}']);

      expect(searched.exitCode).toBe(1);
      expect(searched.stderr).toContain("Error: Invalid query: unknown query function ':nope'");
    });

    it("should reject a query that is not an object", async () => {
      await seed();

      const searched = await cli(["search", "letters", "--data", "[1]"]);

      expect(searched.exitCode).toBe(1);
      expect(searched.stderr).toBe("Error: Query must be a JSON object\n");
    });
  });

  describe("index", () => {
    it("should build, list, show and drop an index", async () => {
      await seed();

      const added = await cli(["index", "add", "letters", "body.type", "hashed"]);
      expect(added.exitCode).toBe(0);
      expect(JSON.parse(added.stdout)).toMatchObject({
        containerName: "letters",
        field: "body.type",
        indexType: "hashed",
        state: "DONE",
      });

      const listed = await cli(["index", "list", "letters"]);
      expect(listed.stdout).toBe("body.type\thashed\n");

      const status = await cli(["index", "status", "letters", "body.type", "hashed"]);
      expect(JSON.parse(status.stdout)).toEqual({
        field: "body.type",
        type: "hashed",
        url: "http://localhost:8080/services/letters/indexes/body.type/hashed",
      });

      const removed = await cli(["index", "rm", "letters", "body.type", "hashed"]);
      expect(removed.stdout).toBe("Removed hashed index on letters.body.type\n");
      expect((await cli(["index", "list", "letters"])).stdout).toBe("");
      expect((await cli(["index", "status", "letters", "body.type", "hashed"])).exitCode).toBe(2);
    });

    it("should exit 1 for an unknown index type", async () => {
      await seed();

      const added = await cli(["index", "add", "letters", "body.type", "btree"]);

      expect(added.exitCode).toBe(1);
      expect(added.stderr).toBe(
        "Error: Unknown index type btree; expected index types: hashed, ascending, descending, text\n"
      );
    });
  });

  describe("users and roles", () => {
    it("should act with the rights of the --user it is given", async () => {
      await seed();
      expect((await cli(["user", "add", "ada", "--key", "test-secret-ada"])).stdout).toBe("Added user ada\n");
      expect((await cli(["role", "set", "letters", "ada", "guest"])).stdout).toBe("ada is GUEST in letters\n");

      const searched = await cli(["--user", "ada", "search", "letters", "--data", '{"body.type":"Page"}']);
      expect(searched.exitCode).toBe(0);

      const refused = await cli(["--user", "ada", "index", "add", "letters", "body.type", "hashed"]);
      expect(refused.exitCode).toBe(3);
      expect(refused.stderr).toBe("Error: User ada does not have access rights to this endpoint\n");
    });

    it("should act as ANNOSTORE_USER when no --user is given", async () => {
      await seed();
      await cli(["user", "add", "ada", "--key", "test-secret-ada"]);
      await cli(["role", "set", "letters", "ada", "guest"]);

      const refused = await cli(["index", "add", "letters", "body.type", "hashed"], undefined, {
        ANNOSTORE_USER: "ada",
      });

      expect(refused.exitCode).toBe(3);
      expect(refused.stderr).toBe("Error: User ada does not have access rights to this endpoint\n");
    });

    it("should exit 2 for an unknown --user", async () => {
      await seed();

      const run = await cli(["--user", "ghost", "container", "show", "letters"]);

      expect(run.exitCode).toBe(2);
      expect(run.stderr).toBe("Error: User 'ghost' not found\n");
    });

    it("should list and remove users and roles", async () => {
      await seed();
      await cli(["user", "add", "ada", "--key", "test-secret-ada"]);
      await cli(["user", "add", "ed", "--key", "test-secret-ed"]);
      await cli(["role", "set", "letters", "ed", "EDITOR"]);
      await cli(["role", "set", "letters", "ada", "ADMIN"]);

      expect((await cli(["user", "list"])).stdout).toBe("ada\ned\n");
      expect((await cli(["role", "list", "letters"])).stdout).toBe("ada\tADMIN\ned\tEDITOR\n");

      expect((await cli(["role", "rm", "letters", "ed"])).stdout).toBe("Removed ed from letters\n");
      expect((await cli(["user", "rm", "ada"])).stdout).toBe("Removed user ada\n");

      expect((await cli(["user", "list", "--json"])).stdout).toBe('[\n  "ed"\n]\n');
      expect((await cli(["role", "list", "letters", "--json"])).stdout).toBe("[]\n");
    });

    it("should report a rejected user", async () => {
      await cli(["user", "add", "ada", "--key", "test-secret-ada"]);

      const again = await cli(["user", "add", "ada", "--key", "test-secret-other"]);

      expect(again.exitCode).toBe(1);
      expect(again.stderr).toBe("Error: User 'ada' not added: user name already taken\n");
    });

    it("should reject an unknown role as a usage error", async () => {
      await seed();

      const run = await cli(["role", "set", "letters", "ada", "owner"]);

      expect(run.exitCode).toBe(1);
      expect(run.stderr).toContain("role must be one of ADMIN, EDITOR, GUEST");
    });
  });

  describe("program", () => {
    it("should print the version", async () => {
      const run = await cli(["--version"]);

      expect(run.exitCode).toBe(0);
      expect(run.stdout).toBe("0.1.0\n");
    });

    it("should exit 1 for an unknown command", async () => {
      const run = await cli(["frobnicate"]);

      expect(run.exitCode).toBe(1);
      expect(run.stderr).toContain("unknown command 'frobnicate'");
    });

    it("should write timing lines with --verbose", async () => {
      const run = await cli(["--verbose", "container", "create", "letters"]);

      expect(run.exitCode).toBe(0);
      expect(run.stderr).toMatch(/^metric cli\.container\.create duration_ms=\d+ success=true$/m);
    });
  });
});
