import { FilterConfig } from "../config/types";
import { ConfigError } from "../core/errors";
import { ExtractRecord, FilterSnapshot, IndexRecord, RejectReason } from "../types";

/**
 * Immutable predicate set for one run. Substrings and domains are stored
 * lower-cased; crawl ids are matched exactly. Crawl ids and domains are
 * trimmed, substrings are not.
 */
export interface FilterSpec {
  readonly allowedCrawls: ReadonlySet<string>;
  readonly allowedDomains: ReadonlySet<string>;
  readonly requiredSubstring: string;
  readonly forbiddenSubstrings: readonly string[];
}

export type FilterDecision = "match" | RejectReason;

export type FilterableRecord = Pick<IndexRecord, "url" | "crawl" | "url_host_registered_domain">;

function uniqueNonEmpty(values: readonly string[]): string[] {
  return [...new Set(values.filter((value) => value.length > 0))];
}

export function createFilterSpec(config: FilterConfig): FilterSpec {
  const allowedCrawls = uniqueNonEmpty(config.allowedCrawls.map((crawl) => crawl.trim()));
  const allowedDomains = uniqueNonEmpty(config.allowedDomains.map((domain) => domain.trim().toLowerCase()));
  // Substrings are kept verbatim apart from case: " store" and "store" match differently.
  const requiredSubstring = config.requiredSubstring.toLowerCase();
  const forbiddenSubstrings = uniqueNonEmpty(config.forbiddenSubstrings.map((substring) => substring.toLowerCase()));

  if (allowedCrawls.length === 0) {
    throw new ConfigError("FilterSpec needs at least one allowed crawl");
  }
  if (allowedDomains.length === 0) {
    throw new ConfigError("FilterSpec needs at least one allowed domain");
  }
  if (requiredSubstring.length === 0) {
    throw new ConfigError("FilterSpec needs a non-empty required substring");
  }

  return Object.freeze({
    allowedCrawls: new Set(allowedCrawls),
    allowedDomains: new Set(allowedDomains),
    requiredSubstring,
    forbiddenSubstrings: Object.freeze(forbiddenSubstrings),
  });
}

/** Returns "match" or the first predicate the record fails, in evaluation order. */
export function evaluateRecord(spec: FilterSpec, record: FilterableRecord): FilterDecision {
  if (!spec.allowedCrawls.has(record.crawl)) {
    return "crawl_excluded";
  }
  if (!spec.allowedDomains.has(record.url_host_registered_domain.toLowerCase())) {
    return "domain_excluded";
  }

  const url = record.url.toLowerCase();
  if (!url.includes(spec.requiredSubstring)) {
    return "required_substring_missing";
  }
  if (spec.forbiddenSubstrings.some((substring) => url.includes(substring))) {
    return "forbidden_substring_present";
  }
  return "match";
}

export function matchesFilter(spec: FilterSpec, record: FilterableRecord): boolean {
  return evaluateRecord(spec, record) === "match";
}

export function projectRecord(record: IndexRecord): ExtractRecord {
  return {
    url: record.url,
    warc_filename: record.warc_filename,
    warc_record_offset: record.warc_record_offset,
    warc_record_length: record.warc_record_length,
    fetch_time: record.fetch_time,
  };
}

export function snapshotFilter(spec: FilterSpec): FilterSnapshot {
  return {
    allowedCrawls: [...spec.allowedCrawls],
    allowedDomains: [...spec.allowedDomains],
    requiredSubstring: spec.requiredSubstring,
    forbiddenSubstrings: [...spec.forbiddenSubstrings],
  };
}
