import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigError } from "../core/errors";
import { DEFAULT_CONFIG, loadConfig, parseConfigOverrides, toList } from "./loadConfig";

const tempDirs: string[] = [];

function writeConfigFile(contents: unknown): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "cie-config-"));
  tempDirs.push(dir);
  const filePath = path.join(dir, "config.json");
  fs.writeFileSync(filePath, typeof contents === "string" ? contents : JSON.stringify(contents), "utf-8");
  return filePath;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("loadConfig", () => {
  it("returns the defaults of the laptop extract when nothing is overridden", () => {
    const config = loadConfig(undefined, {});

    expect(config.filter.allowedCrawls).toHaveLength(9);
    expect(config.filter.allowedCrawls[0]).toBe("CC-MAIN-2020-05");
    expect(config.filter.allowedCrawls[8]).toBe("CC-MAIN-2024-38");
    expect(config.filter.allowedDomains).toEqual(["amazon.com", "walmart.com"]);
    expect(config.filter.requiredSubstring).toBe("laptop");
    expect(config.filter.forbiddenSubstrings).toEqual([
      "reviews",
      "store",
      "blogs",
      "track",
      "corporate",
      "browse",
      "category",
    ]);
    expect(config.outputFormat).toBe("parquet");
    expect(config.sourceType).toBe("cdx_api");
  });

  it("layers the config file over the defaults", () => {
    const configPath = writeConfigFile({
      destinationUri: "s3://bucket/extract/",
      filter: { allowedDomains: ["bestbuy.com"] },
      outputDirs: { manifests: "out/manifests" },
      extractConcurrency: 3,
    });

    const config = loadConfig(configPath, {});

    expect(config.destinationUri).toBe("s3://bucket/extract/");
    expect(config.filter.allowedDomains).toEqual(["bestbuy.com"]);
    expect(config.filter.requiredSubstring).toBe("laptop");
    expect(config.outputDirs).toEqual({ manifests: "out/manifests", tmp: DEFAULT_CONFIG.outputDirs.tmp });
    expect(config.extractConcurrency).toBe(3);
  });

  it("lets environment variables win over the config file", () => {
    const configPath = writeConfigFile({ destinationUri: "from-file", extractConcurrency: 3 });

    const config = loadConfig(configPath, {
      DESTINATION_URI: "from-env",
      EXTRACT_CONCURRENCY: "5",
      ALLOWED_CRAWLS: "CC-MAIN-2022-05, CC-MAIN-2022-33",
      FORBIDDEN_SUBSTRINGS: "",
      SOURCE_TYPE: "JSONL",
      SOURCE_PATHS: "a.jsonl,b.jsonl",
      IGNORE_HTTPS_ERRORS: "yes",
    });

    expect(config.destinationUri).toBe("from-env");
    expect(config.extractConcurrency).toBe(5);
    expect(config.filter.allowedCrawls).toEqual(["CC-MAIN-2022-05", "CC-MAIN-2022-33"]);
    expect(config.filter.forbiddenSubstrings).toEqual([]);
    expect(config.sourceType).toBe("jsonl");
    expect(config.sourcePaths).toEqual(["a.jsonl", "b.jsonl"]);
    expect(config.ignoreHttpsErrors).toBe(true);
  });

  it("ignores numeric env values that do not parse", () => {
    const config = loadConfig(undefined, { ROW_GROUP_SIZE: "lots" });
    expect(config.rowGroupSize).toBe(DEFAULT_CONFIG.rowGroupSize);
  });

  it("rejects an unknown source type from the environment", () => {
    expect(() => loadConfig(undefined, { SOURCE_TYPE: "athena" })).toThrow(ConfigError);
  });

  it("rejects file sources without paths", () => {
    expect(() => loadConfig(undefined, { SOURCE_TYPE: "parquet" })).toThrow(
      "sourceType parquet needs at least one source path",
    );
  });

  it("rejects an empty crawl allow list", () => {
    expect(() => loadConfig(undefined, { ALLOWED_CRAWLS: " , " })).toThrow(
      "filter.allowedCrawls must name at least one crawl",
    );
  });

  it("rejects fractional or non-positive counts from a config file", () => {
    expect(() => loadConfig(writeConfigFile({ extractConcurrency: 1.5 }), {})).toThrow(
      "extractConcurrency must be a positive integer, got 1.5",
    );
    expect(() => loadConfig(writeConfigFile({ maxSourceAttempts: 2.5 }), {})).toThrow(
      "maxSourceAttempts must be a positive integer, got 2.5",
    );
    expect(() => loadConfig(writeConfigFile({ rowGroupSize: 0 }), {})).toThrow("rowGroupSize must be a positive integer, got 0");
  });

  it("reports a missing config file", () => {
    expect(() => loadConfig("/nonexistent/cie-config.json", {})).toThrow(/Config file not found/);
  });

  it("reports a config file that is not JSON", () => {
    const configPath = writeConfigFile("{ not json");
    expect(() => loadConfig(configPath, {})).toThrow(/Config file is not valid JSON/);
  });
});

describe("parseConfigOverrides", () => {
  it("rejects fields of the wrong type", () => {
    expect(() => parseConfigOverrides({ extractConcurrency: "4" })).toThrow('Config field "extractConcurrency" must be a number');
    expect(() => parseConfigOverrides({ filter: { allowedDomains: "amazon.com" } })).toThrow(
      'Config field "allowedDomains" must be an array of strings',
    );
  });

  it("rejects output formats other than parquet", () => {
    expect(() => parseConfigOverrides({ outputFormat: "csv" })).toThrow("Unsupported outputFormat: csv");
  });

  it("rejects a top-level array", () => {
    expect(() => parseConfigOverrides([])).toThrow("Config file must contain a JSON object");
  });
});

describe("toList", () => {
  it("splits, trims and drops empty entries", () => {
    expect(toList(" a, ,b ,", [])).toEqual(["a", "b"]);
  });

  it("keeps the fallback when unset", () => {
    expect(toList(undefined, ["x"])).toEqual(["x"]);
  });
});
