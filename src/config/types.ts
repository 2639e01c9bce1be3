import { LogLevel } from "../observability/types";

export type SourceType = "cdx_api" | "parquet" | "jsonl";

export type OutputFormat = "parquet";

export interface FilterConfig {
  allowedCrawls: string[];
  allowedDomains: string[];
  requiredSubstring: string;
  forbiddenSubstrings: string[];
}

export interface OutputDirs {
  manifests: string;
  tmp: string;
}

export interface AppConfig {
  filter: FilterConfig;
  destinationUri: string;
  outputFormat: OutputFormat;
  sourceType: SourceType;
  sourcePaths: string[];
  cdxApiBaseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxSourceAttempts: number;
  sourceRetryDelayMs: number;
  extractConcurrency: number;
  rowGroupSize: number;
  awsRegion?: string;
  logLevel: LogLevel;
  outputDirs: OutputDirs;
  storePath: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "filter" | "outputDirs">> & {
  filter?: Partial<FilterConfig>;
  outputDirs?: Partial<OutputDirs>;
};
