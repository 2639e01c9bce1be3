#!/usr/bin/env node
import { runCli } from "./cli";
import { ExtractorError, ExtractorErrorCode } from "./core/errors";

const EXIT_CODES: Record<ExtractorErrorCode, number> = {
  config_invalid: 2,
  source_unavailable: 3,
  destination_write_failed: 4,
};

function exitCodeFor(error: unknown): number {
  return error instanceof ExtractorError ? EXIT_CODES[error.code] : 1;
}

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof ExtractorError ? ` [${error.code}]` : "";
  console.error(`fatal${code}: ${message}`);
  process.exitCode = exitCodeFor(error);
});
