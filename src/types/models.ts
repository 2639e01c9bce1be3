/**
 * One capture row of the crawl URL index. Column names follow the columnar
 * cc-index table so rows read from Parquet need no renaming.
 */
export interface IndexRecord {
  url: string;
  warc_filename: string;
  warc_record_offset: number;
  warc_record_length: number;
  fetch_time: Date;
  crawl: string;
  url_host_registered_domain: string;
}

/** The five columns written to the extract; `crawl` and the domain are filter-only. */
export type ExtractRecord = Pick<IndexRecord, "url" | "warc_filename" | "warc_record_offset" | "warc_record_length" | "fetch_time">;

export const EXTRACT_COLUMNS = ["url", "warc_filename", "warc_record_offset", "warc_record_length", "fetch_time"] as const;

export type RejectReason =
  | "crawl_excluded"
  | "domain_excluded"
  | "required_substring_missing"
  | "forbidden_substring_present";

export interface PartInfo {
  partitionId: string;
  fileName: string;
  rowCount: number;
}

export interface FilterSnapshot {
  allowedCrawls: string[];
  allowedDomains: string[];
  requiredSubstring: string;
  forbiddenSubstrings: string[];
}

export interface ExtractManifest {
  version: "v1";
  runId: string;
  destinationUri: string;
  format: "parquet";
  columns: string[];
  parts: PartInfo[];
  rowCount: number;
  filter: FilterSnapshot;
  publishedAt: string;
}

export interface RunSummary {
  scanned: number;
  matched: number;
  malformed: number;
  rejected: Record<RejectReason, number>;
  partitions: number;
  partsWritten: number;
}

export type RunStatus = "running" | "completed" | "failed";
