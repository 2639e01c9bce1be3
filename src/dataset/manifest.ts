import { ExtractManifest, PartInfo } from "../types";

export const MANIFEST_FILE = "_manifest.json";

export function partFileName(runId: string, sequence: number): string {
  return `part-${String(sequence).padStart(5, "0")}-${runId}.parquet`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isPartInfo(value: unknown): value is PartInfo {
  return isRecord(value) && isString(value.partitionId) && isString(value.fileName) && isCount(value.rowCount);
}

export function isExtractManifest(value: unknown): value is ExtractManifest {
  if (!isRecord(value)) {
    return false;
  }
  const { filter, parts } = value;
  return (
    value.version === "v1" &&
    value.format === "parquet" &&
    isString(value.runId) &&
    isString(value.destinationUri) &&
    isStringList(value.columns) &&
    Array.isArray(parts) &&
    parts.every(isPartInfo) &&
    isCount(value.rowCount) &&
    isString(value.publishedAt) &&
    isRecord(filter) &&
    isStringList(filter.allowedCrawls) &&
    isStringList(filter.allowedDomains) &&
    typeof filter.requiredSubstring === "string" &&
    isStringList(filter.forbiddenSubstrings)
  );
}

export function parseManifest(raw: string): ExtractManifest | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  return isExtractManifest(parsed) ? parsed : undefined;
}
