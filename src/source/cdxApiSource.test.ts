import { describe, expect, it } from "vitest";
import { SourceUnavailableError } from "../core/errors";
import { HttpResponseLike } from "../core/fetch";
import { createFilterSpec } from "../filter";
import { Logger, MetricsRegistry } from "../observability";
import { CdxApiSource, toIndexRow } from "./cdxApiSource";

const spec = createFilterSpec({
  allowedCrawls: ["CC-MAIN-2022-05"],
  allowedDomains: ["amazon.com"],
  requiredSubstring: "laptop",
  forbiddenSubstrings: [],
});

const quietLogger = new Logger({ component: "test", runId: "run_test", minLevel: "error" }, () => undefined);

function respond(status: number, body: string): HttpResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => body,
  };
}

function captureLine(url: string, timestamp: string): string {
  return JSON.stringify({
    urlkey: "com,amazon)/laptop",
    timestamp,
    url,
    mime: "text/html",
    status: "200",
    length: "2048",
    offset: "1024",
    filename: "crawl-data/CC-MAIN-2022-05/segments/1/warc/part-00001.warc.gz",
  });
}

function createSource(handler: (url: string) => HttpResponseLike | Promise<HttpResponseLike>, maxAttempts = 3) {
  const requested: string[] = [];
  const metrics = new MetricsRegistry();
  const source = new CdxApiSource({
    baseUrl: "https://index.example.test/",
    userAgent: "test-agent",
    requestTimeoutMs: 1_000,
    maxAttempts,
    retryDelayMs: 0,
    logger: quietLogger,
    metrics,
    fetchFn: async (url) => {
      requested.push(url);
      return handler(url);
    },
  });
  return { source, requested, metrics };
}

async function collect(rows: AsyncIterable<unknown>): Promise<unknown[]> {
  const out: unknown[] = [];
  for await (const row of rows) {
    out.push(row);
  }
  return out;
}

describe("toIndexRow", () => {
  it("maps index server fields onto index column names", () => {
    expect(toIndexRow(captureLine("https://www.amazon.com/laptop-1", "20220120100000"), "CC-MAIN-2022-05", "amazon.com")).toEqual({
      url: "https://www.amazon.com/laptop-1",
      warc_filename: "crawl-data/CC-MAIN-2022-05/segments/1/warc/part-00001.warc.gz",
      warc_record_offset: "1024",
      warc_record_length: "2048",
      fetch_time: "20220120100000",
      crawl: "CC-MAIN-2022-05",
      url_host_registered_domain: "amazon.com",
    });
  });

  it("passes unparseable lines through unchanged", () => {
    expect(toIndexRow("{not json", "CC-MAIN-2022-05", "amazon.com")).toBe("{not json");
  });
});

describe("CdxApiSource", () => {
  it("lists one partition per crawl and domain", async () => {
    const { source } = createSource(() => respond(200, "0"));
    const wide = createFilterSpec({
      allowedCrawls: ["CC-MAIN-2022-05", "CC-MAIN-2023-14"],
      allowedDomains: ["amazon.com", "walmart.com"],
      requiredSubstring: "laptop",
      forbiddenSubstrings: [],
    });

    const partitions = await source.listPartitions(wide);

    expect(partitions.map((partition) => partition.id)).toEqual([
      "CC-MAIN-2022-05/amazon.com",
      "CC-MAIN-2022-05/walmart.com",
      "CC-MAIN-2023-14/amazon.com",
      "CC-MAIN-2023-14/walmart.com",
    ]);
    expect(source.describe()).toBe("cdx_api:https://index.example.test");
  });

  it("reads every page of a domain query", async () => {
    const { source, requested } = createSource((url) => {
      if (url.includes("showNumPages=true")) {
        return respond(200, JSON.stringify({ pages: 2, pageSize: 5, blocks: 2 }));
      }
      if (url.endsWith("page=0")) {
        return respond(200, `${captureLine("https://www.amazon.com/laptop-1", "20220120100000")}\n\n`);
      }
      return respond(200, captureLine("https://www.amazon.com/laptop-2", "20220121100000"));
    });

    const [partition] = await source.listPartitions(spec);
    const rows = await collect(partition.scan());

    expect(requested).toEqual([
      "https://index.example.test/CC-MAIN-2022-05-index?url=amazon.com&matchType=domain&output=json&showNumPages=true",
      "https://index.example.test/CC-MAIN-2022-05-index?url=amazon.com&matchType=domain&output=json&page=0",
      "https://index.example.test/CC-MAIN-2022-05-index?url=amazon.com&matchType=domain&output=json&page=1",
    ]);
    expect(rows).toHaveLength(2);
    expect(rows[1]).toMatchObject({ url: "https://www.amazon.com/laptop-2", crawl: "CC-MAIN-2022-05" });
  });

  it("treats a no-captures response as an empty partition", async () => {
    const { source, requested } = createSource(() => respond(404, "No Captures found for: amazon.com"));

    const [partition] = await source.listPartitions(spec);

    expect(await collect(partition.scan())).toEqual([]);
    expect(requested).toHaveLength(1);
  });

  it("retries transient failures", async () => {
    let calls = 0;
    const { source, metrics } = createSource((url) => {
      calls += 1;
      if (calls === 1) {
        return respond(503, "slow down");
      }
      if (calls === 2) {
        throw new Error("socket hang up");
      }
      return url.includes("showNumPages") ? respond(200, "1") : respond(200, captureLine("https://www.amazon.com/laptop-1", "20220120100000"));
    });

    const [partition] = await source.listPartitions(spec);

    expect(await collect(partition.scan())).toHaveLength(1);
    expect(calls).toBe(4);
    expect(metrics.getTimerSummaries().source_request_ms.count).toBe(4);
  });

  it("fails once attempts are exhausted", async () => {
    const { source, requested } = createSource(() => respond(500, "boom"), 2);

    const [partition] = await source.listPartitions(spec);

    await expect(collect(partition.scan())).rejects.toThrow(
      "CC-MAIN-2022-05/amazon.com: index request failed after 2 attempts: HTTP 500",
    );
    expect(requested).toHaveLength(2);
  });

  it("does not retry client errors", async () => {
    const { source, requested } = createSource(() => respond(400, "bad request"));

    const [partition] = await source.listPartitions(spec);

    await expect(collect(partition.scan())).rejects.toBeInstanceOf(SourceUnavailableError);
    expect(requested).toHaveLength(1);
  });

  it("rejects a page count it cannot read", async () => {
    const { source } = createSource(() => respond(200, "<html>maintenance</html>"));

    const [partition] = await source.listPartitions(spec);

    await expect(collect(partition.scan())).rejects.toThrow("unexpected page count response");
  });
});
