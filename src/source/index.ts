import { AppConfig } from "../config";
import { FetchLike } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { CdxApiSource } from "./cdxApiSource";
import { JsonlIndexSource } from "./jsonlSource";
import { ParquetIndexSource } from "./parquetSource";
import { IndexSource } from "./types";

export interface SourceDeps {
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchLike;
}

export function createSource(config: AppConfig, deps: SourceDeps): IndexSource {
  switch (config.sourceType) {
    case "cdx_api":
      return new CdxApiSource({
        baseUrl: config.cdxApiBaseUrl,
        userAgent: config.userAgent,
        requestTimeoutMs: config.requestTimeoutMs,
        maxAttempts: config.maxSourceAttempts,
        retryDelayMs: config.sourceRetryDelayMs,
        ignoreHttpsErrors: config.ignoreHttpsErrors,
        fetchFn: deps.fetchFn,
        logger: deps.logger,
        metrics: deps.metrics,
      });
    case "parquet":
      return new ParquetIndexSource(config.sourcePaths, deps.logger);
    case "jsonl":
      return new JsonlIndexSource(config.sourcePaths);
    default:
      throw new Error(`Unsupported source type: ${String(config.sourceType)}`);
  }
}

export * from "./cdxApiSource";
export * from "./jsonlSource";
export * from "./memorySource";
export * from "./parquetSource";
export * from "./types";
