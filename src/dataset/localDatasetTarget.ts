import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DestinationWriteError, errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { ExtractManifest } from "../types";
import { MANIFEST_FILE, parseManifest, partFileName } from "./manifest";
import { ParquetPartWriter } from "./parquetPart";
import { DatasetTarget, PartWriter, StagedDataset } from "./types";

export interface LocalDatasetTargetOptions {
  rowGroupSize: number;
  logger: Logger;
}

export function resolveLocalPath(uri: string): string {
  return path.resolve(uri.startsWith("file://") ? fileURLToPath(uri) : uri);
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.promises.access(target);
    return true;
  } catch {
    return false;
  }
}

interface LocalStagingPaths {
  destinationDir: string;
  stagingDir: string;
}

class LocalStagedDataset implements StagedDataset {
  private readonly uri: string;
  private readonly destinationDir: string;
  private readonly stagingDir: string;
  private readonly runId: string;
  private readonly options: LocalDatasetTargetOptions;
  private nextSequence = 0;

  constructor(uri: string, paths: LocalStagingPaths, runId: string, options: LocalDatasetTargetOptions) {
    this.uri = uri;
    this.destinationDir = paths.destinationDir;
    this.stagingDir = paths.stagingDir;
    this.runId = runId;
    this.options = options;
  }

  async openPart(partitionId: string): Promise<PartWriter> {
    const fileName = partFileName(this.runId, this.nextSequence);
    this.nextSequence += 1;
    try {
      return await ParquetPartWriter.open({
        partitionId,
        fileName,
        filePath: path.join(this.stagingDir, fileName),
        rowGroupSize: this.options.rowGroupSize,
      });
    } catch (error) {
      throw new DestinationWriteError(this.uri, `cannot create part ${fileName}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Swaps the staging directory into place. The previous dataset is moved
   * aside first and restored if the swap fails.
   */
  async publish(manifest: ExtractManifest): Promise<void> {
    const previousDir = `${this.destinationDir}.previous-${this.runId}`;
    let movedAside = false;

    try {
      await fs.promises.writeFile(path.join(this.stagingDir, MANIFEST_FILE), `${JSON.stringify(manifest, null, 2)}\n`, "utf-8");

      if (await pathExists(this.destinationDir)) {
        await fs.promises.rename(this.destinationDir, previousDir);
        movedAside = true;
      }
      await fs.promises.rename(this.stagingDir, this.destinationDir);
    } catch (error) {
      if (movedAside && !(await pathExists(this.destinationDir))) {
        try {
          await fs.promises.rename(previousDir, this.destinationDir);
        } catch (restoreError) {
          this.options.logger.error("dataset_restore_failed", {
            destinationUri: this.uri,
            previousDir,
            error: errorMessage(restoreError),
          });
        }
      }
      throw new DestinationWriteError(this.uri, `publish failed: ${errorMessage(error)}`, { cause: error });
    }

    if (movedAside) {
      await fs.promises.rm(previousDir, { recursive: true, force: true });
    }
    this.options.logger.info("dataset_published", {
      destinationUri: this.uri,
      parts: manifest.parts.length,
      rowCount: manifest.rowCount,
    });
  }

  async abort(): Promise<void> {
    await fs.promises.rm(this.stagingDir, { recursive: true, force: true });
    this.options.logger.warn("dataset_staging_discarded", { destinationUri: this.uri, stagingDir: this.stagingDir });
  }
}

/** A destination directory on the local filesystem (plain path or file:// URI). */
export class LocalDatasetTarget implements DatasetTarget {
  readonly uri: string;
  readonly directory: string;
  private readonly options: LocalDatasetTargetOptions;

  constructor(uri: string, options: LocalDatasetTargetOptions) {
    this.uri = uri;
    this.directory = resolveLocalPath(uri);
    this.options = options;
  }

  async begin(runId: string): Promise<StagedDataset> {
    const stagingDir = `${this.directory}.staging-${runId}`;
    try {
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
      await fs.promises.mkdir(stagingDir, { recursive: true });
    } catch (error) {
      throw new DestinationWriteError(this.uri, `cannot create staging directory: ${errorMessage(error)}`, { cause: error });
    }
    return new LocalStagedDataset(this.uri, { destinationDir: this.directory, stagingDir }, runId, this.options);
  }

  async readManifest(): Promise<ExtractManifest | undefined> {
    const manifestPath = path.join(this.directory, MANIFEST_FILE);
    if (!(await pathExists(manifestPath))) {
      return undefined;
    }
    const manifest = parseManifest(await fs.promises.readFile(manifestPath, "utf-8"));
    if (!manifest) {
      throw new Error(`Invalid manifest at ${manifestPath}`);
    }
    return manifest;
  }
}
