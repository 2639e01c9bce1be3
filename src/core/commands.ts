import { AppConfig } from "../config";
import { DatasetTarget, LocalDatasetTarget, createDatasetTarget, readDataset } from "../dataset";
import { ExtractionOutcome, runExtractor } from "../extract";
import { createFilterSpec } from "../filter";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { IndexSource, createSource } from "../source";
import { RunRecord, RunStats, RunStore } from "../store";
import { ExtractManifest } from "../types";
import { errorMessage } from "./errors";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: RunStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
}

export interface ExtractCommandOptions {
  dryRun: boolean;
  source?: IndexSource;
  target?: DatasetTarget;
}

export async function runExtract(ctx: CommandContext, options: ExtractCommandOptions): Promise<ExtractionOutcome> {
  const spec = createFilterSpec(ctx.config.filter);
  const source = options.source ?? createSource(ctx.config, { logger: ctx.logger.child("source"), metrics: ctx.metrics });
  const target = options.target ?? createDatasetTarget(ctx.config, { logger: ctx.logger.child("dataset") });

  await ctx.store.startRun({
    runId: ctx.runId,
    startedAt: new Date().toISOString(),
    destinationUri: target.uri,
    dryRun: options.dryRun,
  });
  ctx.logger.info("extract_start", {
    source: source.describe(),
    destinationUri: target.uri,
    dryRun: options.dryRun,
    allowedCrawls: spec.allowedCrawls.size,
    allowedDomains: [...spec.allowedDomains],
  });

  try {
    const outcome = await runExtractor({
      runId: ctx.runId,
      spec,
      source,
      target,
      logger: ctx.logger,
      metrics: ctx.metrics,
      concurrency: ctx.config.extractConcurrency,
      dryRun: options.dryRun,
    });

    if (outcome.manifest) {
      await ctx.sink.publishExtractCompleted([outcome.manifest]);
    }
    await ctx.store.finishRun(ctx.runId, {
      status: "completed",
      finishedAt: new Date().toISOString(),
      summary: outcome.summary,
    });
    ctx.logger.info("extract_complete", {
      destinationUri: target.uri,
      dryRun: options.dryRun,
      ...outcome.summary,
    });
    return outcome;
  } catch (error) {
    await ctx.store.finishRun(ctx.runId, {
      status: "failed",
      finishedAt: new Date().toISOString(),
      error: errorMessage(error),
    });
    throw error;
  }
}

export interface InspectReport {
  manifest?: ExtractManifest;
  /** Rows read back from the part files; local destinations only. */
  rowsRead?: number;
}

export async function runInspect(ctx: CommandContext, target?: DatasetTarget): Promise<InspectReport> {
  const dataset = target ?? createDatasetTarget(ctx.config, { logger: ctx.logger.child("dataset") });
  ctx.logger.info("inspect_start", { destinationUri: dataset.uri });

  if (dataset instanceof LocalDatasetTarget) {
    const published = await readDataset(dataset);
    if (!published) {
      ctx.logger.warn("inspect_no_dataset", { destinationUri: dataset.uri });
      return {};
    }
    const rowsRead = published.records.length;
    if (rowsRead !== published.manifest.rowCount) {
      ctx.logger.warn("inspect_row_count_mismatch", { expected: published.manifest.rowCount, rowsRead });
    }
    ctx.logger.info("inspect_complete", {
      runId: published.manifest.runId,
      publishedAt: published.manifest.publishedAt,
      parts: published.manifest.parts.length,
      rowCount: published.manifest.rowCount,
      rowsRead,
    });
    return { manifest: published.manifest, rowsRead };
  }

  const manifest = await dataset.readManifest();
  if (!manifest) {
    ctx.logger.warn("inspect_no_dataset", { destinationUri: dataset.uri });
    return {};
  }
  ctx.logger.info("inspect_complete", {
    runId: manifest.runId,
    publishedAt: manifest.publishedAt,
    parts: manifest.parts.length,
    rowCount: manifest.rowCount,
  });
  return { manifest };
}

export async function runStatus(ctx: CommandContext, limit = 10): Promise<{ stats: RunStats; runs: RunRecord[] }> {
  ctx.logger.info("status_start");
  const stats = await ctx.store.getStats();
  const runs = await ctx.store.listRuns(limit);
  for (const run of runs) {
    ctx.logger.info("status_run", {
      runId: run.runId,
      status: run.status,
      destinationUri: run.destinationUri,
      dryRun: run.dryRun,
      startedAt: run.startedAt,
      finishedAt: run.finishedAt,
      matched: run.summary?.matched,
      error: run.error,
    });
  }
  ctx.logger.info("status_complete", { stats });
  return { stats, runs };
}
