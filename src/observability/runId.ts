import crypto from "node:crypto";

// Run ids end up in part file names and S3 keys, so keep them path-safe.
export function createRunId(now = new Date()): string {
  const suffix = crypto.randomBytes(3).toString("hex");
  return `run_${now.toISOString().replace(/[:.]/g, "-")}_${suffix}`;
}
