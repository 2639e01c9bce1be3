import { IndexRecord } from "../types";

export type ParseIndexRecordResult = { ok: true; record: IndexRecord } | { ok: false; reason: string };

const CDX_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;
const SQL_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}(\.\d+)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function toValidDate(epochMs: number): Date | undefined {
  const date = new Date(epochMs);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Accepts the timestamp shapes the supported sources produce: Parquet
 * TIMESTAMP columns (Date), epoch millis, ISO-8601, `YYYY-MM-DD HH:MM:SS`
 * (UTC) and 14-digit CDX timestamps.
 */
export function parseFetchTime(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return toValidDate(value.getTime());
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? toValidDate(value) : undefined;
  }
  if (typeof value === "bigint") {
    return toValidDate(Number(value));
  }
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  const cdx = CDX_TIMESTAMP.exec(trimmed);
  if (cdx) {
    const [, year, month, day, hour, minute, second] = cdx;
    return toValidDate(Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second)));
  }
  if (SQL_TIMESTAMP.test(trimmed)) {
    return toValidDate(Date.parse(`${trimmed.replace(" ", "T")}Z`));
  }
  if (trimmed.length === 0) {
    return undefined;
  }
  return toValidDate(Date.parse(trimmed));
}

export function parseNonNegativeInteger(value: unknown): number | undefined {
  let parsed: number;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "bigint") {
    parsed = Number(value);
  } else if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    parsed = Number(value.trim());
  } else {
    return undefined;
  }
  return Number.isSafeInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

export function parseIndexRecord(raw: unknown): ParseIndexRecordResult {
  if (!isRecord(raw)) {
    return { ok: false, reason: "not_an_object" };
  }

  const { url, warc_filename, crawl, url_host_registered_domain } = raw;
  if (!isNonEmptyString(url)) {
    return { ok: false, reason: "missing_url" };
  }
  if (!isNonEmptyString(warc_filename)) {
    return { ok: false, reason: "missing_warc_filename" };
  }

  const offset = parseNonNegativeInteger(raw.warc_record_offset);
  if (offset === undefined) {
    return { ok: false, reason: "invalid_warc_record_offset" };
  }
  const length = parseNonNegativeInteger(raw.warc_record_length);
  if (length === undefined) {
    return { ok: false, reason: "invalid_warc_record_length" };
  }

  const fetchTime = parseFetchTime(raw.fetch_time);
  if (!fetchTime) {
    return { ok: false, reason: "invalid_fetch_time" };
  }
  if (!isNonEmptyString(crawl)) {
    return { ok: false, reason: "missing_crawl" };
  }
  if (!isNonEmptyString(url_host_registered_domain)) {
    return { ok: false, reason: "missing_url_host_registered_domain" };
  }

  return {
    ok: true,
    record: {
      url,
      warc_filename,
      warc_record_offset: offset,
      warc_record_length: length,
      fetch_time: fetchTime,
      crawl,
      url_host_registered_domain,
    },
  };
}
