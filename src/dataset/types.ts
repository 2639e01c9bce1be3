import { ExtractManifest, ExtractRecord, PartInfo } from "../types";

export interface PartWriter {
  readonly partitionId: string;
  append(record: ExtractRecord): Promise<void>;
  close(): Promise<PartInfo>;
  /** Closes and deletes the part without publishing it. */
  discard(): Promise<void>;
}

/** Output of one run that is not visible at the destination until `publish`. */
export interface StagedDataset {
  openPart(partitionId: string): Promise<PartWriter>;
  publish(manifest: ExtractManifest): Promise<void>;
  abort(): Promise<void>;
}

export interface DatasetTarget {
  readonly uri: string;
  begin(runId: string): Promise<StagedDataset>;
  readManifest(): Promise<ExtractManifest | undefined>;
}
