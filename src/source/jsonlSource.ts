import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { SourceUnavailableError, errorMessage } from "../core/errors";
import { FilterSpec } from "../filter";
import { IndexSource, SourcePartition } from "./types";

async function* readJsonLines(filePath: string): AsyncGenerator<unknown> {
  const stream = fs.createReadStream(filePath, { encoding: "utf-8" });
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }
      try {
        yield JSON.parse(trimmed);
      } catch {
        // Unparseable lines surface as malformed rows.
        yield trimmed;
      }
    }
  } catch (error) {
    throw new SourceUnavailableError(filePath, `read failed: ${errorMessage(error)}`, { cause: error });
  } finally {
    lines.close();
    stream.destroy();
  }
}

export class JsonlIndexSource implements IndexSource {
  private readonly files: string[];

  constructor(files: string[]) {
    this.files = files.map((file) => path.resolve(file));
  }

  describe(): string {
    return `jsonl:${this.files.join(",")}`;
  }

  async listPartitions(_spec: FilterSpec): Promise<SourcePartition[]> {
    for (const file of this.files) {
      try {
        await fs.promises.access(file, fs.constants.R_OK);
      } catch (error) {
        throw new SourceUnavailableError(file, `source file not readable: ${errorMessage(error)}`, { cause: error });
      }
    }

    return this.files.map((file) => ({
      id: path.basename(file),
      scan: () => readJsonLines(file),
    }));
  }
}
