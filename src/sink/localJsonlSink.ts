import fs from "node:fs";
import path from "node:path";
import { ExtractManifest } from "../types";
import { Sink } from "./types";

export class LocalJsonlSink implements Sink {
  readonly extractsPath: string;
  private readonly manifestsDir: string;

  constructor(manifestsDir: string) {
    this.manifestsDir = path.resolve(manifestsDir);
    this.extractsPath = path.join(this.manifestsDir, "extracts.jsonl");
  }

  async publishExtractCompleted(manifests: ExtractManifest[]): Promise<void> {
    if (manifests.length === 0) {
      return;
    }

    await fs.promises.mkdir(this.manifestsDir, { recursive: true });
    const notifiedAt = new Date().toISOString();
    const content = manifests.map((manifest) => JSON.stringify({ notifiedAt, ...manifest })).join("\n") + "\n";
    await fs.promises.appendFile(this.extractsPath, content, "utf-8");
  }
}
