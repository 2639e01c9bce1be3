import { ExtractManifest } from "../../types";

export function makeManifest(runId: string): ExtractManifest {
  return {
    version: "v1",
    runId,
    destinationUri: "s3://test-bucket/extracts/laptops",
    format: "parquet",
    columns: ["url", "warc_filename", "warc_record_offset", "warc_record_length", "fetch_time"],
    parts: [{ partitionId: "CC-MAIN-2022-05/amazon.com", fileName: `part-00000-${runId}.parquet`, rowCount: 3 }],
    rowCount: 3,
    filter: {
      allowedCrawls: ["CC-MAIN-2022-05"],
      allowedDomains: ["amazon.com"],
      requiredSubstring: "laptop",
      forbiddenSubstrings: ["reviews"],
    },
    publishedAt: "2024-01-01T00:00:00.000Z",
  };
}
