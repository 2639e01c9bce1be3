export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  partitionId?: string;
  destinationUri?: string;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "records_scanned"
  | "records_matched"
  | "records_rejected"
  | "records_malformed"
  | "partitions_completed"
  | "partitions_failed"
  | "parts_written";

export type MetricGaugeName = "partitions_listed" | "partitions_in_flight";

export type MetricTimerName = "partition_scan_ms" | "publish_ms" | "source_request_ms";
