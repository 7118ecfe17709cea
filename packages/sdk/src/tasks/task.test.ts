import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BackgroundTask, type BackgroundTaskOptions, type TaskProgress } from "./task.js";
import { ContainerSearchTask } from "./container-search-task.js";
import { FileDocumentStore } from "../storage/file-store.js";
import { logger } from "../observability/logs.js";

/**
 * Runs each step as one sub-unit; a throwing step is reported and skipped
 */
class StepTask extends BackgroundTask<number> {
  readonly #steps: Array<() => Promise<number>>;
  readonly #escape: Error | undefined;

  constructor(steps: Array<() => Promise<number>>, options: BackgroundTaskOptions & { escape?: Error } = {}) {
    super(options);
    this.#steps = steps;
    this.#escape = options.escape;
  }

  protected async execute(progress: TaskProgress<number>): Promise<void> {
    progress.setTotal(this.#steps.length);
    for (const [i, step] of this.#steps.entries()) {
      try {
        progress.addResults([await step()]);
      } catch (err) {
        progress.addError(`step ${i}: ${err instanceof Error ? err.message : String(err)}`);
      } finally {
        progress.advance();
      }
    }
    if (this.#escape) {
      throw this.#escape;
    }
  }

  protected describe(): string {
    return "steps";
  }
}

describe("BackgroundTask", () => {
  let clock: number;
  const now = (): number => clock;

  beforeEach(() => {
    logger.setEnabled(false);
    clock = 1_000;
  });

  afterEach(() => {
    logger.setEnabled(true);
  });

  it("should start CREATED with an empty summary", () => {
    const task = new StepTask([], { now, id: "task-1" });
    const summary = task.summary();

    expect(summary).toEqual({
      id: "task-1",
      state: "CREATED",
      createdAt: "1970-01-01T00:00:01.000Z",
      startedAt: null,
      finishedAt: null,
      expiresAfter: null,
      processingTimeInMillis: 0,
      totalUnits: 0,
      unitsProcessed: 0,
      resultCount: 0,
      errors: [],
    });
    expect(task.isLive).toBe(true);
  });

  it("should run to DONE and record timing and expiry", async () => {
    const task = new StepTask(
      [
        async () => {
          clock += 50;
          return 7;
        },
      ],
      { now, ttlMs: 100 }
    );

    await task.run();
    const summary = task.summary();

    expect(summary.state).toBe("DONE");
    expect(summary.startedAt).toBe("1970-01-01T00:00:01.000Z");
    expect(summary.finishedAt).toBe("1970-01-01T00:00:01.050Z");
    expect(summary.expiresAfter).toBe("1970-01-01T00:00:01.150Z");
    expect(summary.processingTimeInMillis).toBe(50);
    expect(summary.totalUnits).toBe(1);
    expect(summary.unitsProcessed).toBe(1);
    expect(task.results).toEqual([7]);
    expect(task.isLive).toBe(false);
  });

  it("should isolate a failing sub-unit and still reach DONE", async () => {
    const task = new StepTask(
      [async () => 1, async () => Promise.reject(new Error("unit broke")), async () => 3],
      { now }
    );

    await task.run();
    const summary = task.summary();

    expect(summary.state).toBe("DONE");
    expect(summary.errors).toEqual(["step 1: unit broke"]);
    expect(summary.unitsProcessed).toBe(3);
    expect(summary.resultCount).toBe(2);
    expect(task.results).toEqual([1, 3]);
  });

  it("should end FAILED when an error escapes the routine", async () => {
    const task = new StepTask([async () => 1], { now, escape: new Error("boom") });

    await expect(task.run()).resolves.toBeUndefined();

    const summary = task.summary();
    expect(summary.state).toBe("FAILED");
    expect(summary.errors).toEqual(["boom"]);
    expect(summary.finishedAt).toBe("1970-01-01T00:00:01.000Z");
  });

  it("should run the routine only once", async () => {
    let calls = 0;
    const task = new StepTask([
      async () => {
        calls++;
        return calls;
      },
    ]);

    await task.run();
    await task.run();

    expect(calls).toBe(1);
    expect(task.state).toBe("DONE");
    expect(task.results).toEqual([1]);
  });

  it("should hand out frozen copies that do not follow the live state", async () => {
    const task = new StepTask([async () => 1], { now });
    const before = task.summary();

    await task.run();

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.state).toBe("CREATED");
    expect(task.summary().state).toBe("DONE");
  });

  it("should expire only after the TTL has passed since finishing", async () => {
    const task = new StepTask([], { now, ttlMs: 100 });
    expect(task.isExpired(5_000)).toBe(false);

    await task.run();

    expect(task.isExpired(1_099)).toBe(false);
    expect(task.isExpired(1_100)).toBe(true);
  });
});

describe("ContainerSearchTask", () => {
  let root: string;
  let store: FileDocumentStore;

  beforeEach(async () => {
    logger.setEnabled(false);
    root = await mkdtemp(join(tmpdir(), "annostore-task-"));
    store = new FileDocumentStore({ root });

    await store.insertMany("letters", [
      { annotation_name: "a", annotation: { body: "x" } },
      { annotation_name: "b", annotation: { body: "y" } },
    ]);
    await store.insertMany("notes", [{ annotation_name: "c", annotation: { body: "x" } }]);
  });

  afterEach(async () => {
    logger.setEnabled(true);
    await rm(root, { recursive: true, force: true });
  });

  it("should collect hits per container and report a missing one without failing", async () => {
    const task = new ContainerSearchTask({
      store,
      query: { body: "x" },
      stages: [{ $match: { "annotation.body": "x" } }],
      containerNames: ["letters", "gone", "notes"],
      owner: undefined,
    });

    await task.run();
    const summary = task.summary();

    expect(summary.state).toBe("DONE");
    expect(summary.errors).toEqual(["gone: container not found"]);
    expect(summary.totalUnits).toBe(3);
    expect(summary.unitsProcessed).toBe(3);
    expect(summary.query).toEqual({ body: "x" });
    expect(summary.containersToSearch).toEqual(["letters", "gone", "notes"]);
    expect(task.results.map((hit) => [hit.containerName, hit.document.annotation_name])).toEqual([
      ["letters", "a"],
      ["notes", "c"],
    ]);
  });
});
