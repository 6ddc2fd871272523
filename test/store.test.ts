import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RunStore, type StoredRun } from "../src/persistence/store.js";

function makeRun(runId: string, startedAt: number, overrides: Partial<StoredRun> = {}): StoredRun {
  return {
    runId,
    question: `question ${runId}`,
    status: "answered",
    strategy: "aggregation",
    answer: "<answer>42</answer>",
    warning: false,
    tasks: [
      { id: "task_1", description: "extract", taskType: "independent", dependencies: [], status: "succeeded", output: "40, 2" },
      { id: "task_2", description: "sum", taskType: "aggregate", dependencies: ["task_1"], status: "succeeded", output: "42" },
    ],
    startedAt,
    finishedAt: startedAt + 10,
    ...overrides,
  };
}

describe("RunStore", () => {
  let store: RunStore;

  beforeEach(async () => {
    store = await RunStore.open(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("round-trips a run", async () => {
    const run = makeRun("r1", 1000);
    await store.insert(run);
    expect(await store.get("r1")).toEqual(run);
  });

  it("keeps optional fields absent", async () => {
    await store.insert(makeRun("r1", 1000, { strategy: undefined, answer: undefined, finishedAt: undefined, status: "planning", tasks: [] }));
    const stored = await store.get("r1");
    expect(stored?.strategy).toBeUndefined();
    expect(stored?.answer).toBeUndefined();
    expect(stored?.finishedAt).toBeUndefined();
    expect(stored?.status).toBe("planning");
  });

  it("replaces a run on re-insert", async () => {
    await store.insert(makeRun("r1", 1000, { status: "executing" }));
    await store.insert(makeRun("r1", 1000, { status: "partial", warning: true, error: "one branch failed" }));

    expect(await store.list()).toHaveLength(1);
    expect(await store.get("r1")).toMatchObject({ status: "partial", warning: true, error: "one branch failed" });
  });

  it("lists most recent first with a limit", async () => {
    await store.insert(makeRun("old", 1000));
    await store.insert(makeRun("new", 3000));
    await store.insert(makeRun("mid", 2000));

    expect((await store.list()).map((r) => r.runId)).toEqual(["new", "mid", "old"]);
    expect((await store.list(2)).map((r) => r.runId)).toEqual(["new", "mid"]);
  });

  it("deletes runs", async () => {
    await store.insert(makeRun("a", 1000));
    await store.insert(makeRun("b", 2000));
    await store.insert(makeRun("c", 3000));

    expect(await store.delete("a")).toBe(true);
    expect(await store.delete("a")).toBe(false);
    expect(await store.deleteOlderThan(2500)).toBe(1);
    expect(await store.deleteAll()).toBe(1);
    expect(await store.get("c")).toBeUndefined();
  });

  it("keeps runs in a database file across reopen", async () => {
    const dir = mkdtempSync(join(tmpdir(), "tableqa-store-"));
    try {
      const path = join(dir, "runs.db");
      const first = await RunStore.open(path);
      await first.insert(makeRun("r1", 1000));
      first.close();

      const second = await RunStore.open(path);
      expect((await second.list()).map((r) => r.runId)).toEqual(["r1"]);
      second.close();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
