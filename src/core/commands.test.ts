import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppConfig } from "../config";
import { DEFAULT_CONFIG } from "../config/loadConfig";
import { InMemoryObjectStore, LocalDatasetTarget, S3DatasetTarget } from "../dataset";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { InMemorySource } from "../source";
import { InMemoryStore } from "../store";
import { ExtractManifest } from "../types";
import { CommandContext, runExtract, runInspect, runStatus } from "./commands";

const quietLogger = new Logger({ component: "test", runId: "run_test", minLevel: "error" }, () => undefined);

class RecordingSink implements Sink {
  readonly published: ExtractManifest[] = [];
  failWith?: Error;

  async publishExtractCompleted(manifests: ExtractManifest[]): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.published.push(...manifests);
  }
}

const SOURCE = new InMemorySource({
  "a.jsonl": [
    {
      url: "https://www.amazon.com/laptop-1",
      warc_filename: "crawl-data/CC-MAIN-2022-05/segments/1/warc/part-00001.warc.gz",
      warc_record_offset: 1024,
      warc_record_length: 2048,
      fetch_time: "20220120100000",
      crawl: "CC-MAIN-2022-05",
      url_host_registered_domain: "amazon.com",
    },
    {
      url: "https://www.amazon.com/laptop-1/reviews",
      warc_filename: "crawl-data/CC-MAIN-2022-05/segments/1/warc/part-00001.warc.gz",
      warc_record_offset: 4096,
      warc_record_length: 2048,
      fetch_time: "20220120100000",
      crawl: "CC-MAIN-2022-05",
      url_host_registered_domain: "amazon.com",
    },
  ],
});

describe("commands", () => {
  let root: string;
  let config: AppConfig;
  let store: InMemoryStore;
  let sink: RecordingSink;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "commands-"));
    config = {
      ...DEFAULT_CONFIG,
      destinationUri: path.join(root, "extract"),
      outputDirs: { manifests: path.join(root, "manifests"), tmp: path.join(root, "tmp") },
      storePath: ":memory:",
    };
    store = new InMemoryStore();
    sink = new RecordingSink();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function context(runId: string): CommandContext {
    return { runId, config, store, sink, logger: quietLogger, metrics: new MetricsRegistry() };
  }

  it("records a completed run and notifies the sink", async () => {
    const outcome = await runExtract(context("run_a"), { dryRun: false, source: SOURCE });

    expect(outcome.summary.matched).toBe(1);
    expect(sink.published.map((manifest) => manifest.runId)).toEqual(["run_a"]);
    const [run] = await store.listRuns(10);
    expect(run).toMatchObject({ runId: "run_a", status: "completed", dryRun: false, destinationUri: config.destinationUri });
    expect(run.summary?.scanned).toBe(2);
  });

  it("does not notify on a dry run", async () => {
    await runExtract(context("run_a"), { dryRun: true, source: SOURCE });

    expect(sink.published).toEqual([]);
    expect((await store.listRuns(1))[0]).toMatchObject({ status: "completed", dryRun: true });
  });

  it("marks the run failed when notification fails", async () => {
    sink.failWith = new Error("queue unavailable");

    await expect(runExtract(context("run_a"), { dryRun: false, source: SOURCE })).rejects.toThrow("queue unavailable");

    expect((await store.listRuns(1))[0]).toMatchObject({ status: "failed", error: "queue unavailable" });
  });

  it("reads back a local dataset on inspect", async () => {
    await runExtract(context("run_a"), { dryRun: false, source: SOURCE });

    const report = await runInspect(context("run_b"));

    expect(report.manifest?.runId).toBe("run_a");
    expect(report.rowsRead).toBe(1);
  });

  it("inspects a remote dataset through its manifest only", async () => {
    const objectStore = new InMemoryObjectStore();
    const target = new S3DatasetTarget("s3://test-bucket/extracts", {
      rowGroupSize: 10,
      tmpDir: config.outputDirs.tmp,
      logger: quietLogger,
      objectStore,
    });
    await runExtract(context("run_a"), { dryRun: false, source: SOURCE, target });

    const report = await runInspect(context("run_b"), target);

    expect(report.manifest?.destinationUri).toBe("s3://test-bucket/extracts");
    expect(report.rowsRead).toBeUndefined();
  });

  it("returns an empty report before anything is published", async () => {
    const report = await runInspect(context("run_a"), new LocalDatasetTarget(path.join(root, "missing"), { rowGroupSize: 10, logger: quietLogger }));

    expect(report).toEqual({});
  });

  it("summarizes recorded runs", async () => {
    await runExtract(context("run_a"), { dryRun: true, source: SOURCE });
    sink.failWith = new Error("queue unavailable");
    await expect(runExtract(context("run_b"), { dryRun: false, source: SOURCE })).rejects.toThrow();

    const { stats, runs } = await runStatus(context("run_c"));

    expect(stats).toMatchObject({ totalRuns: 2, running: 0, completed: 1, failed: 1 });
    expect(runs).toHaveLength(2);
  });
});
