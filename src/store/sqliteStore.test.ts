import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RunSummary } from "../types";
import { InMemoryStore } from "./memoryStore";
import { SqliteStore } from "./sqliteStore";
import { RunStore } from "./types";

const SUMMARY: RunSummary = {
  scanned: 10,
  matched: 3,
  malformed: 3,
  rejected: {
    crawl_excluded: 1,
    domain_excluded: 1,
    required_substring_missing: 1,
    forbidden_substring_present: 1,
  },
  partitions: 2,
  partsWritten: 2,
};

const STORES: Array<[string, () => RunStore]> = [
  ["SqliteStore", () => new SqliteStore(":memory:")],
  ["InMemoryStore", () => new InMemoryStore()],
];

describe.each(STORES)("%s", (_name, createStore) => {
  let store: RunStore;

  beforeEach(() => {
    store = createStore();
  });

  afterEach(async () => {
    await store.close();
  });

  it("tracks a run from start to completion", async () => {
    await store.startRun({ runId: "run_a", startedAt: "2024-01-01T00:00:00.000Z", destinationUri: "data/extract", dryRun: false });
    expect(await store.listRuns(10)).toEqual([
      { runId: "run_a", startedAt: "2024-01-01T00:00:00.000Z", status: "running", destinationUri: "data/extract", dryRun: false },
    ]);

    await store.finishRun("run_a", { status: "completed", finishedAt: "2024-01-01T00:05:00.000Z", summary: SUMMARY });

    const [run] = await store.listRuns(10);
    expect(run).toMatchObject({ status: "completed", finishedAt: "2024-01-01T00:05:00.000Z", summary: SUMMARY });
    expect(run.error).toBeUndefined();
  });

  it("keeps the failure message", async () => {
    await store.startRun({ runId: "run_a", startedAt: "2024-01-01T00:00:00.000Z", destinationUri: "data/extract", dryRun: true });
    await store.finishRun("run_a", { status: "failed", finishedAt: "2024-01-01T00:01:00.000Z", error: "source unavailable" });

    const [run] = await store.listRuns(1);
    expect(run).toMatchObject({ status: "failed", dryRun: true, error: "source unavailable" });
    expect(run.summary).toBeUndefined();
  });

  it("lists newest runs first and reports stats", async () => {
    await store.startRun({ runId: "run_a", startedAt: "2024-01-01T00:00:00.000Z", destinationUri: "data/extract", dryRun: false });
    await store.finishRun("run_a", { status: "completed", finishedAt: "2024-01-01T00:05:00.000Z", summary: SUMMARY });
    await store.startRun({ runId: "run_b", startedAt: "2024-01-02T00:00:00.000Z", destinationUri: "data/extract", dryRun: false });
    await store.finishRun("run_b", { status: "failed", finishedAt: "2024-01-02T00:01:00.000Z", error: "boom" });
    await store.startRun({ runId: "run_c", startedAt: "2024-01-03T00:00:00.000Z", destinationUri: "data/extract", dryRun: false });

    expect((await store.listRuns(2)).map((run) => run.runId)).toEqual(["run_c", "run_b"]);
    expect(await store.getStats()).toEqual({
      totalRuns: 3,
      running: 1,
      completed: 1,
      failed: 1,
      lastCompletedAt: "2024-01-01T00:05:00.000Z",
    });
  });
});
