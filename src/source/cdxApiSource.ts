import { FetchLike, createFetch, isRetriableStatus, sleep } from "../core/fetch";
import { SourceUnavailableError, errorMessage } from "../core/errors";
import { FilterSpec } from "../filter";
import { Logger, MetricsRegistry } from "../observability";
import { IndexSource, SourcePartition } from "./types";

export interface CdxApiSourceOptions {
  baseUrl: string;
  userAgent: string;
  requestTimeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
  logger: Logger;
  metrics: MetricsRegistry;
}

const NO_CAPTURES = "No Captures found";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Maps an index-server line onto the columnar index's column names. The
 * registered domain comes from the partition: every capture of a
 * `matchType=domain` query shares it.
 */
export function toIndexRow(line: string, crawl: string, registeredDomain: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return line;
  }
  if (!isRecord(parsed)) {
    return parsed;
  }

  return {
    url: parsed.url,
    warc_filename: parsed.filename,
    warc_record_offset: parsed.offset,
    warc_record_length: parsed.length,
    fetch_time: parsed.timestamp,
    crawl,
    url_host_registered_domain: registeredDomain,
  };
}

export class CdxApiSource implements IndexSource {
  private readonly options: CdxApiSourceOptions;
  private readonly fetchFn: FetchLike;
  private readonly baseUrl: string;

  constructor(options: CdxApiSourceOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? createFetch(options.ignoreHttpsErrors ?? false);
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  describe(): string {
    return `cdx_api:${this.baseUrl}`;
  }

  async listPartitions(spec: FilterSpec): Promise<SourcePartition[]> {
    const partitions: SourcePartition[] = [];
    for (const crawl of spec.allowedCrawls) {
      for (const domain of spec.allowedDomains) {
        const id = `${crawl}/${domain}`;
        partitions.push({
          id,
          scan: () => this.scanPartition(id, crawl, domain),
        });
      }
    }
    return partitions;
  }

  private async *scanPartition(partitionId: string, crawl: string, domain: string): AsyncGenerator<unknown> {
    const endpoint = `${this.baseUrl}/${crawl}-index`;
    const pageCount = await this.fetchPageCount(partitionId, endpoint, domain);
    this.options.logger.debug("cdx_partition_pages", { partitionId, pageCount });

    for (let page = 0; page < pageCount; page += 1) {
      const body = await this.request(partitionId, this.buildUrl(endpoint, domain, { page: String(page) }));
      if (body === undefined) {
        return;
      }

      for (const line of body.split("\n")) {
        const trimmed = line.trim();
        if (trimmed.length === 0) {
          continue;
        }
        yield toIndexRow(trimmed, crawl, domain);
      }
    }
  }

  private async fetchPageCount(partitionId: string, endpoint: string, domain: string): Promise<number> {
    const body = await this.request(partitionId, this.buildUrl(endpoint, domain, { showNumPages: "true" }));
    if (body === undefined) {
      return 0;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      throw new SourceUnavailableError(partitionId, `unexpected page count response: ${errorMessage(error)}`, { cause: error });
    }

    const pages = isRecord(parsed) ? parsed.pages : parsed;
    if (typeof pages !== "number" || !Number.isInteger(pages) || pages < 0) {
      throw new SourceUnavailableError(partitionId, `unexpected page count response: ${body.slice(0, 200)}`);
    }
    return pages;
  }

  private buildUrl(endpoint: string, domain: string, extra: Record<string, string>): string {
    const params = new URLSearchParams({
      url: domain,
      matchType: "domain",
      output: "json",
      ...extra,
    });
    return `${endpoint}?${params.toString()}`;
  }

  /** Resolves to undefined when the index has no captures for the query. */
  private async request(partitionId: string, url: string): Promise<string | undefined> {
    const { logger, metrics, maxAttempts, retryDelayMs, requestTimeoutMs, userAgent } = this.options;

    for (let attempt = 1; ; attempt += 1) {
      const stopTimer = metrics.startTimer("source_request_ms");
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), requestTimeoutMs);
      let failure: string;

      try {
        const response = await this.fetchFn(url, {
          method: "GET",
          headers: {
            "user-agent": userAgent,
            accept: "application/json",
          },
          signal: controller.signal,
        });
        const body = await response.text();

        if (response.ok) {
          return body;
        }
        if (response.status === 404 && body.includes(NO_CAPTURES)) {
          return undefined;
        }
        if (!isRetriableStatus(response.status)) {
          throw new SourceUnavailableError(partitionId, `HTTP ${response.status} from ${url}: ${body.slice(0, 200)}`);
        }
        failure = `HTTP ${response.status}`;
      } catch (error) {
        if (error instanceof SourceUnavailableError) {
          throw error;
        }
        failure = errorMessage(error);
      } finally {
        clearTimeout(timeout);
        stopTimer();
      }

      if (attempt >= maxAttempts) {
        throw new SourceUnavailableError(partitionId, `index request failed after ${attempt} attempts: ${failure}`);
      }

      const delayMs = retryDelayMs * 2 ** (attempt - 1);
      logger.warn("source_request_retry", { partitionId, url, attempt, delayMs, error: failure });
      await sleep(delayMs);
    }
  }
}
