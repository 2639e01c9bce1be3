import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SourceUnavailableError } from "../core/errors";
import { DEFAULT_CONFIG } from "../config/loadConfig";
import { createFilterSpec } from "../filter";
import { JsonlIndexSource } from "./jsonlSource";

const spec = createFilterSpec(DEFAULT_CONFIG.filter);

describe("JsonlIndexSource", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-source-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("yields one row per non-empty line and passes bad lines through", async () => {
    const file = path.join(dir, "index-00.jsonl");
    fs.writeFileSync(file, ['{"url":"https://www.amazon.com/laptop-1"}', "", "not json", '{"url":"https://www.walmart.com/laptop-2"}', ""].join("\n"));

    const source = new JsonlIndexSource([file]);
    const [partition] = await source.listPartitions(spec);
    const rows: unknown[] = [];
    for await (const row of partition.scan()) {
      rows.push(row);
    }

    expect(partition.id).toBe("index-00.jsonl");
    expect(rows).toEqual([
      { url: "https://www.amazon.com/laptop-1" },
      "not json",
      { url: "https://www.walmart.com/laptop-2" },
    ]);
  });

  it("fails listing when a file is missing", async () => {
    const source = new JsonlIndexSource([path.join(dir, "missing.jsonl")]);

    await expect(source.listPartitions(spec)).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});
