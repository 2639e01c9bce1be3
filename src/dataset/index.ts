import path from "node:path";
import { S3Client } from "@aws-sdk/client-s3";
import { AppConfig } from "../config";
import { Logger } from "../observability";
import { ExtractManifest, ExtractRecord } from "../types";
import { LocalDatasetTarget } from "./localDatasetTarget";
import { ObjectStore, S3ObjectStore, parseS3Uri } from "./objectStore";
import { readPartFile } from "./parquetPart";
import { S3DatasetTarget } from "./s3DatasetTarget";
import { DatasetTarget } from "./types";

export interface DatasetTargetDeps {
  logger: Logger;
  objectStore?: ObjectStore;
}

export function isS3Uri(uri: string): boolean {
  return uri.startsWith("s3://");
}

export function createDatasetTarget(config: AppConfig, deps: DatasetTargetDeps): DatasetTarget {
  const uri = config.destinationUri;
  if (isS3Uri(uri)) {
    const objectStore = deps.objectStore ?? new S3ObjectStore(parseS3Uri(uri).bucket, new S3Client({ region: config.awsRegion }));
    return new S3DatasetTarget(uri, {
      rowGroupSize: config.rowGroupSize,
      tmpDir: config.outputDirs.tmp,
      logger: deps.logger,
      objectStore,
    });
  }

  return new LocalDatasetTarget(uri, {
    rowGroupSize: config.rowGroupSize,
    logger: deps.logger,
  });
}

export interface PublishedDataset {
  manifest: ExtractManifest;
  records: ExtractRecord[];
}

/** Reads a published local dataset back through its manifest. */
export async function readDataset(target: LocalDatasetTarget): Promise<PublishedDataset | undefined> {
  const manifest = await target.readManifest();
  if (!manifest) {
    return undefined;
  }

  const records: ExtractRecord[] = [];
  for (const part of manifest.parts) {
    records.push(...(await readPartFile(path.join(target.directory, part.fileName))));
  }
  return { manifest, records };
}

export * from "./localDatasetTarget";
export * from "./manifest";
export * from "./memoryObjectStore";
export * from "./objectStore";
export * from "./parquetPart";
export * from "./s3DatasetTarget";
export * from "./types";
