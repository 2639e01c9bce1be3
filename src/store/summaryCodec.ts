import { RunSummary } from "../types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function parseRunSummary(raw: string | null): RunSummary | undefined {
  if (!raw) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) {
    return undefined;
  }

  const { scanned, matched, malformed, rejected, partitions, partsWritten } = parsed;
  if (!isRecord(rejected)) {
    return undefined;
  }
  const { crawl_excluded, domain_excluded, required_substring_missing, forbidden_substring_present } = rejected;

  if (
    !isCount(scanned) ||
    !isCount(matched) ||
    !isCount(malformed) ||
    !isCount(partitions) ||
    !isCount(partsWritten) ||
    !isCount(crawl_excluded) ||
    !isCount(domain_excluded) ||
    !isCount(required_substring_missing) ||
    !isCount(forbidden_substring_present)
  ) {
    return undefined;
  }

  return {
    scanned,
    matched,
    malformed,
    rejected: { crawl_excluded, domain_excluded, required_substring_missing, forbidden_substring_present },
    partitions,
    partsWritten,
  };
}
