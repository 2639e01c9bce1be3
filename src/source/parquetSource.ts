import fs from "node:fs";
import path from "node:path";
import { ParquetReader } from "@dsnp/parquetjs";
import { SourceUnavailableError, errorMessage } from "../core/errors";
import { FilterSpec } from "../filter";
import { Logger } from "../observability";
import { IndexSource, SourcePartition } from "./types";

const PARQUET_EXTENSION = ".parquet";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads Hive-style `key=value` directory segments, e.g. `crawl=CC-MAIN-2022-05/subset=warc`. */
export function parsePartitionValues(relativePath: string): Record<string, string> {
  const values: Record<string, string> = {};
  const segments = relativePath.split(/[\\/]/).slice(0, -1);
  for (const segment of segments) {
    const separator = segment.indexOf("=");
    if (separator <= 0) {
      continue;
    }
    values[segment.slice(0, separator)] = decodeURIComponent(segment.slice(separator + 1));
  }
  return values;
}

async function listParquetFiles(root: string): Promise<string[]> {
  const entries = await fs.promises.readdir(root, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listParquetFiles(fullPath)));
    } else if (entry.isFile() && entry.name.endsWith(PARQUET_EXTENSION)) {
      files.push(fullPath);
    }
  }
  return files;
}

async function* readParquetRows(filePath: string, partitionValues: Record<string, string>): AsyncGenerator<unknown> {
  let reader: ParquetReader;
  try {
    reader = await ParquetReader.openFile(filePath);
  } catch (error) {
    throw new SourceUnavailableError(filePath, `cannot open parquet file: ${errorMessage(error)}`, { cause: error });
  }

  try {
    const cursor = reader.getCursor();
    while (true) {
      const row: unknown = await cursor.next();
      if (!row) {
        break;
      }
      yield isRecord(row) ? { ...partitionValues, ...row } : row;
    }
  } finally {
    await reader.close();
  }
}

/**
 * Scans a local copy of the columnar URL index. Each file is a partition;
 * directories for crawls outside the filter are never opened. Every subset
 * is scanned: the filter has no subset predicate.
 */
export class ParquetIndexSource implements IndexSource {
  private readonly roots: string[];
  private readonly logger: Logger;

  constructor(roots: string[], logger: Logger) {
    this.roots = roots.map((root) => path.resolve(root));
    this.logger = logger;
  }

  describe(): string {
    return `parquet:${this.roots.join(",")}`;
  }

  async listPartitions(spec: FilterSpec): Promise<SourcePartition[]> {
    const partitions: SourcePartition[] = [];
    let pruned = 0;

    for (const root of this.roots) {
      let stat: fs.Stats;
      try {
        stat = await fs.promises.stat(root);
      } catch (error) {
        throw new SourceUnavailableError(root, `source path not readable: ${errorMessage(error)}`, { cause: error });
      }

      const baseDir = stat.isDirectory() ? root : path.dirname(root);
      const files = stat.isDirectory() ? await listParquetFiles(root) : [root];
      for (const filePath of files) {
        const relativePath = path.relative(baseDir, filePath);
        const partitionValues = parsePartitionValues(relativePath);
        if (partitionValues.crawl !== undefined && !spec.allowedCrawls.has(partitionValues.crawl)) {
          pruned += 1;
          continue;
        }

        partitions.push({
          id: relativePath,
          scan: () => readParquetRows(filePath, partitionValues),
        });
      }
    }

    this.logger.info("parquet_partitions_listed", { partitions: partitions.length, pruned });
    return partitions;
  }
}
