import { AppConfig, SourceType, resolveConfig, validateConfig } from "../config";
import { runExtract, runInspect, runStatus } from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";

export type CommandName = "extract" | "inspect" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  dryRun: boolean;
  configPath?: string;
  sourceType?: SourceType;
  inputs: string[];
  destinationUri?: string;
  concurrency?: number;
  limit?: number;
}

const HELP_TEXT = `
Usage:
  crawl-index-extractor <command> [options]

Commands:
  extract          Scan the index, filter, and publish the Parquet extract
  inspect          Read back the published extract at the destination
  status           Show recent runs

Options:
  --config <path>         Optional path to JSON config file
  --source <type>         Index source: cdx_api, parquet or jsonl
  --input <path>          Source file or directory (repeatable)
  --destination <uri>     Output directory, file:// or s3:// URI
  --concurrency <n>       Partitions scanned in parallel
  --dry-run               Scan and count without writing (extract)
  --limit <n>             Number of runs to show (status)
  -h, --help              Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "extract" || raw === "inspect" || raw === "status") {
    return raw;
  }
  return undefined;
}

function parseSourceType(raw: string | undefined): SourceType | undefined {
  if (raw === "cdx_api" || raw === "parquet" || raw === "jsonl") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function optionValues(argv: string[], flag: string): string[] {
  const values: string[] = [];
  argv.forEach((arg, index) => {
    const next = argv[index + 1];
    if (arg === flag && next !== undefined) {
      values.push(next);
    }
  });
  return values;
}

function positiveInt(raw: string | undefined): number | undefined {
  const parsed = raw ? Number.parseInt(raw, 10) : Number.NaN;
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const rawSource = optionValue(argv, "--source");
  const sourceType = parseSourceType(rawSource);
  if (rawSource !== undefined && !sourceType) {
    return "help";
  }

  return {
    command,
    dryRun: argv.includes("--dry-run"),
    configPath: optionValue(argv, "--config"),
    sourceType,
    inputs: optionValues(argv, "--input"),
    destinationUri: optionValue(argv, "--destination"),
    concurrency: positiveInt(optionValue(argv, "--concurrency")),
    limit: positiveInt(optionValue(argv, "--limit")),
  };
}

/** CLI flags take precedence over the loaded configuration. */
export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    sourceType: parsed.sourceType ?? config.sourceType,
    sourcePaths: parsed.inputs.length > 0 ? parsed.inputs : config.sourcePaths,
    destinationUri: parsed.destinationUri ?? config.destinationUri,
    extractConcurrency: parsed.concurrency ?? config.extractConcurrency,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = validateConfig(applyCliOverrides(resolveConfig(parsed.configPath), parsed));
  const runId = createRunId();
  const store = createStore(config);
  const sink = createSink(config);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const context = { runId, config, store, sink, logger, metrics };

  logger.info("command_start", {
    command: parsed.command,
    dryRun: parsed.dryRun,
    sourceType: config.sourceType,
    destinationUri: config.destinationUri,
    concurrency: config.extractConcurrency,
  });

  try {
    switch (parsed.command) {
      case "extract":
        await runExtract({ ...context, logger: logger.child("extract") }, { dryRun: parsed.dryRun });
        break;
      case "inspect":
        await runInspect({ ...context, logger: logger.child("inspect") });
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") }, parsed.limit);
        break;
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    await store.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
