import { FilterSpec } from "../filter";

/**
 * A unit of the index that one worker scans end to end. Rows come out
 * untyped; the extractor validates them.
 */
export interface SourcePartition {
  id: string;
  scan(): AsyncIterable<unknown>;
}

export interface IndexSource {
  describe(): string;
  /** Partitions the filter can rule out entirely may be omitted. */
  listPartitions(spec: FilterSpec): Promise<SourcePartition[]>;
}
