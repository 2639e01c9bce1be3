import { processWithConcurrency } from "../core/concurrency";
import { errorMessage } from "../core/errors";
import { PartWriter, DatasetTarget, StagedDataset } from "../dataset/types";
import { FilterSpec, snapshotFilter } from "../filter";
import { Logger, MetricsRegistry } from "../observability";
import { IndexSource, SourcePartition } from "../source/types";
import { EXTRACT_COLUMNS, ExtractManifest, PartInfo, RejectReason, RunSummary } from "../types";
import { selectRecords } from "./selectRecords";

export interface ExtractorDeps {
  runId: string;
  spec: FilterSpec;
  source: IndexSource;
  target: DatasetTarget;
  logger: Logger;
  metrics: MetricsRegistry;
  concurrency: number;
  dryRun?: boolean;
  now?: () => Date;
}

export interface ExtractionOutcome {
  summary: RunSummary;
  /** Absent on dry runs. */
  manifest?: ExtractManifest;
}

export function emptySummary(): RunSummary {
  return {
    scanned: 0,
    matched: 0,
    malformed: 0,
    rejected: {
      crawl_excluded: 0,
      domain_excluded: 0,
      required_substring_missing: 0,
      forbidden_substring_present: 0,
    },
    partitions: 0,
    partsWritten: 0,
  };
}

function totalRejected(rejected: Record<RejectReason, number>): number {
  return Object.values(rejected).reduce((sum, value) => sum + value, 0);
}

export async function runExtractor(deps: ExtractorDeps): Promise<ExtractionOutcome> {
  const { runId, spec, source, target, logger, metrics } = deps;
  const now = deps.now ?? (() => new Date());
  const summary = emptySummary();
  const parts: PartInfo[] = [];

  const partitions = await source.listPartitions(spec);
  summary.partitions = partitions.length;
  metrics.setGauge("partitions_listed", partitions.length);
  logger.info("extract_partitions_listed", {
    source: source.describe(),
    partitions: partitions.length,
    concurrency: deps.concurrency,
    dryRun: deps.dryRun ?? false,
  });

  const staged = deps.dryRun ? undefined : await target.begin(runId);
  let firstError: unknown;

  const scanPartition = async (partition: SourcePartition, stagedDataset: StagedDataset | undefined): Promise<void> => {
    const stopTimer = metrics.startTimer("partition_scan_ms");
    let writer: PartWriter | undefined;
    let matched = 0;

    try {
      const records = selectRecords(partition.scan(), spec, {
        onScanned: () => {
          summary.scanned += 1;
          metrics.incrementCounter("records_scanned");
        },
        onMalformed: (reason) => {
          summary.malformed += 1;
          metrics.incrementCounter("records_malformed");
          logger.debug("extract_record_malformed", { partitionId: partition.id, reason });
        },
        onRejected: (reason) => {
          summary.rejected[reason] += 1;
          metrics.incrementCounter("records_rejected");
        },
      });

      for await (const record of records) {
        if (firstError !== undefined) {
          return;
        }
        if (stagedDataset) {
          writer ??= await stagedDataset.openPart(partition.id);
          await writer.append(record);
        }
        matched += 1;
        summary.matched += 1;
        metrics.incrementCounter("records_matched");
      }

      if (writer) {
        parts.push(await writer.close());
        writer = undefined;
        metrics.incrementCounter("parts_written");
      }
    } catch (error) {
      metrics.incrementCounter("partitions_failed");
      logger.error("extract_partition_failed", { partitionId: partition.id, error: errorMessage(error) });
      throw error;
    } finally {
      if (writer) {
        await discardPart(writer, logger);
      }
    }

    metrics.incrementCounter("partitions_completed");
    logger.info("extract_partition_complete", { partitionId: partition.id, matched, durationMs: stopTimer() });
  };

  // Workers stop picking up partitions after the first failure; staging is
  // discarded only once every in-flight partition has settled.
  await processWithConcurrency(partitions, deps.concurrency, async (partition) => {
    if (firstError !== undefined) {
      return;
    }
    metrics.adjustGauge("partitions_in_flight", 1);
    try {
      await scanPartition(partition, staged);
    } catch (error) {
      firstError ??= error;
    } finally {
      metrics.adjustGauge("partitions_in_flight", -1);
    }
  });

  if (firstError !== undefined) {
    if (staged) {
      await discardStaging(staged, logger);
    }
    throw firstError;
  }

  summary.partsWritten = parts.length;
  logger.info("extract_scan_complete", {
    scanned: summary.scanned,
    matched: summary.matched,
    rejected: totalRejected(summary.rejected),
    malformed: summary.malformed,
  });

  if (!staged) {
    return { summary };
  }

  const sortedParts = [...parts].sort((a, b) => a.fileName.localeCompare(b.fileName));
  const manifest: ExtractManifest = {
    version: "v1",
    runId,
    destinationUri: target.uri,
    format: "parquet",
    columns: [...EXTRACT_COLUMNS],
    parts: sortedParts,
    rowCount: sortedParts.reduce((sum, part) => sum + part.rowCount, 0),
    filter: snapshotFilter(spec),
    publishedAt: now().toISOString(),
  };

  try {
    await metrics.time("publish_ms", () => staged.publish(manifest));
  } catch (error) {
    await discardStaging(staged, logger);
    throw error;
  }

  return { summary, manifest };
}

async function discardPart(writer: PartWriter, logger: Logger): Promise<void> {
  try {
    await writer.discard();
  } catch (discardError) {
    logger.warn("extract_part_discard_failed", { partitionId: writer.partitionId, error: errorMessage(discardError) });
  }
}

async function discardStaging(staged: StagedDataset, logger: Logger): Promise<void> {
  try {
    await staged.abort();
  } catch (abortError) {
    logger.error("extract_staging_discard_failed", { error: errorMessage(abortError) });
  }
}
