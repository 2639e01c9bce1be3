import fs from "node:fs";
import path from "node:path";
import { ConfigError, DestinationWriteError, errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { ExtractManifest, ExtractRecord, PartInfo } from "../types";
import { MANIFEST_FILE, parseManifest, partFileName } from "./manifest";
import { ObjectStore, S3Location, parseS3Uri } from "./objectStore";
import { ParquetPartWriter } from "./parquetPart";
import { DatasetTarget, PartWriter, StagedDataset } from "./types";

export interface S3DatasetTargetOptions {
  rowGroupSize: number;
  tmpDir: string;
  logger: Logger;
  objectStore: ObjectStore;
}

const PARQUET_CONTENT_TYPE = "application/vnd.apache.parquet";

/** Writes locally, uploads on close. */
class UploadingPartWriter implements PartWriter {
  readonly partitionId: string;
  private readonly inner: ParquetPartWriter;
  private readonly upload: (filePath: string, fileName: string) => Promise<void>;

  constructor(inner: ParquetPartWriter, upload: (filePath: string, fileName: string) => Promise<void>) {
    this.partitionId = inner.partitionId;
    this.inner = inner;
    this.upload = upload;
  }

  async append(record: ExtractRecord): Promise<void> {
    await this.inner.append(record);
  }

  async close(): Promise<PartInfo> {
    const info = await this.inner.close();
    await this.upload(this.inner.filePath, this.inner.fileName);
    await fs.promises.rm(this.inner.filePath, { force: true });
    return info;
  }

  async discard(): Promise<void> {
    await this.inner.discard();
  }
}

class S3StagedDataset implements StagedDataset {
  private readonly uri: string;
  private readonly location: S3Location;
  private readonly workDir: string;
  private readonly runId: string;
  private readonly options: S3DatasetTargetOptions;
  private readonly uploadedKeys: string[] = [];
  private nextSequence = 0;

  constructor(uri: string, location: S3Location, workDir: string, runId: string, options: S3DatasetTargetOptions) {
    this.uri = uri;
    this.location = location;
    this.workDir = workDir;
    this.runId = runId;
    this.options = options;
  }

  async openPart(partitionId: string): Promise<PartWriter> {
    const fileName = partFileName(this.runId, this.nextSequence);
    this.nextSequence += 1;

    let inner: ParquetPartWriter;
    try {
      inner = await ParquetPartWriter.open({
        partitionId,
        fileName,
        filePath: path.join(this.workDir, fileName),
        rowGroupSize: this.options.rowGroupSize,
      });
    } catch (error) {
      throw new DestinationWriteError(this.uri, `cannot create part ${fileName}: ${errorMessage(error)}`, { cause: error });
    }

    return new UploadingPartWriter(inner, async (filePath, name) => {
      const key = `${this.location.prefix}${name}`;
      try {
        await this.options.objectStore.putObject(key, await fs.promises.readFile(filePath), PARQUET_CONTENT_TYPE);
      } catch (error) {
        throw new DestinationWriteError(this.uri, `upload of ${key} failed: ${errorMessage(error)}`, { cause: error });
      }
      this.uploadedKeys.push(key);
    });
  }

  /**
   * The manifest goes up only after every part; objects from earlier runs
   * are deleted only after the manifest is in place.
   */
  async publish(manifest: ExtractManifest): Promise<void> {
    const { objectStore, logger } = this.options;
    const manifestKey = `${this.location.prefix}${MANIFEST_FILE}`;

    try {
      await objectStore.putObject(manifestKey, `${JSON.stringify(manifest, null, 2)}\n`, "application/json");
    } catch (error) {
      throw new DestinationWriteError(this.uri, `manifest upload failed: ${errorMessage(error)}`, { cause: error });
    }

    const keep = new Set([...this.uploadedKeys, manifestKey]);
    try {
      const stale = (await objectStore.listKeys(this.location.prefix)).filter((key) => !keep.has(key));
      await objectStore.deleteKeys(stale);
      logger.info("dataset_published", {
        destinationUri: this.uri,
        parts: manifest.parts.length,
        rowCount: manifest.rowCount,
        staleObjectsDeleted: stale.length,
      });
    } catch (error) {
      // The manifest already names the new parts; leftovers are removed by the next run.
      logger.warn("dataset_stale_cleanup_failed", { destinationUri: this.uri, error: errorMessage(error) });
    } finally {
      await fs.promises.rm(this.workDir, { recursive: true, force: true });
    }
  }

  async abort(): Promise<void> {
    try {
      await this.options.objectStore.deleteKeys(this.uploadedKeys);
    } finally {
      await fs.promises.rm(this.workDir, { recursive: true, force: true });
    }
    this.options.logger.warn("dataset_staging_discarded", {
      destinationUri: this.uri,
      uploadedPartsDeleted: this.uploadedKeys.length,
    });
  }
}

/** A destination prefix in S3 (`s3://bucket/prefix/`). */
export class S3DatasetTarget implements DatasetTarget {
  readonly uri: string;
  readonly location: S3Location;
  private readonly options: S3DatasetTargetOptions;

  constructor(uri: string, options: S3DatasetTargetOptions) {
    this.uri = uri;
    this.location = parseS3Uri(uri);
    if (this.location.prefix.length === 0) {
      // Publishing deletes everything else under the prefix.
      throw new ConfigError(`S3 destination needs a key prefix, not a bare bucket: ${uri}`);
    }
    this.options = options;
  }

  async begin(runId: string): Promise<StagedDataset> {
    let workDir: string;
    try {
      const tmpRoot = path.resolve(this.options.tmpDir);
      await fs.promises.mkdir(tmpRoot, { recursive: true });
      workDir = await fs.promises.mkdtemp(path.join(tmpRoot, `${runId}-`));
    } catch (error) {
      throw new DestinationWriteError(this.uri, `cannot create local work directory: ${errorMessage(error)}`, { cause: error });
    }
    return new S3StagedDataset(this.uri, this.location, workDir, runId, this.options);
  }

  async readManifest(): Promise<ExtractManifest | undefined> {
    const raw = await this.options.objectStore.getObject(`${this.location.prefix}${MANIFEST_FILE}`);
    if (raw === undefined) {
      return undefined;
    }
    const manifest = parseManifest(raw);
    if (!manifest) {
      throw new Error(`Invalid manifest under ${this.uri}`);
    }
    return manifest;
  }
}
