import { ExtractManifest } from "../types";

/** Downstream notification of published extracts. */
export interface Sink {
  publishExtractCompleted(manifests: ExtractManifest[]): Promise<void>;
}
