import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { parseLogLevel } from "../observability/logger";
import { AppConfig, ConfigOverrides, FilterConfig, OutputDirs, OutputFormat, SourceType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  filter: {
    allowedCrawls: [
      "CC-MAIN-2020-05",
      "CC-MAIN-2020-29",
      "CC-MAIN-2021-17",
      "CC-MAIN-2021-39",
      "CC-MAIN-2022-05",
      "CC-MAIN-2022-33",
      "CC-MAIN-2023-14",
      "CC-MAIN-2023-40",
      "CC-MAIN-2024-38",
    ],
    allowedDomains: ["amazon.com", "walmart.com"],
    requiredSubstring: "laptop",
    forbiddenSubstrings: ["reviews", "store", "blogs", "track", "corporate", "browse", "category"],
  },
  destinationUri: "data/extract",
  outputFormat: "parquet",
  sourceType: "cdx_api",
  sourcePaths: [],
  cdxApiBaseUrl: "https://index.commoncrawl.org",
  userAgent: "crawl-index-extractor/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 60_000,
  maxSourceAttempts: 5,
  sourceRetryDelayMs: 2_000,
  extractConcurrency: 1,
  rowGroupSize: 4096,
  awsRegion: undefined,
  logLevel: "info",
  outputDirs: {
    manifests: "data/manifests",
    tmp: "data/tmp",
  },
  storePath: "data/runs.sqlite",
};

const SOURCE_TYPES: readonly SourceType[] = ["cdx_api", "parquet", "jsonl"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isSourceType(value: unknown): value is SourceType {
  return typeof value === "string" && SOURCE_TYPES.some((type) => type === value);
}

function pickString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`Config field "${key}" must be a string`);
  }
  return value;
}

function pickNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`Config field "${key}" must be a number`);
  }
  return value;
}

function pickBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`Config field "${key}" must be a boolean`);
  }
  return value;
}

function pickStringArray(source: Record<string, unknown>, key: string): string[] | undefined {
  const value = source[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isStringArray(value)) {
    throw new ConfigError(`Config field "${key}" must be an array of strings`);
  }
  return value;
}

export function parseConfigOverrides(value: unknown): ConfigOverrides {
  if (!isRecord(value)) {
    throw new ConfigError("Config file must contain a JSON object");
  }

  const rawSourceType = value.sourceType;
  let sourceType: SourceType | undefined;
  if (rawSourceType !== undefined) {
    if (!isSourceType(rawSourceType)) {
      throw new ConfigError(`Unsupported sourceType: ${String(rawSourceType)}`);
    }
    sourceType = rawSourceType;
  }

  const rawOutputFormat = value.outputFormat;
  let outputFormat: OutputFormat | undefined;
  if (rawOutputFormat !== undefined) {
    if (rawOutputFormat !== "parquet") {
      throw new ConfigError(`Unsupported outputFormat: ${String(rawOutputFormat)}`);
    }
    outputFormat = "parquet";
  }

  const logLevel = pickString(value, "logLevel");
  const overrides: ConfigOverrides = {
    destinationUri: pickString(value, "destinationUri"),
    outputFormat,
    sourceType,
    sourcePaths: pickStringArray(value, "sourcePaths"),
    cdxApiBaseUrl: pickString(value, "cdxApiBaseUrl"),
    userAgent: pickString(value, "userAgent"),
    ignoreHttpsErrors: pickBoolean(value, "ignoreHttpsErrors"),
    requestTimeoutMs: pickNumber(value, "requestTimeoutMs"),
    maxSourceAttempts: pickNumber(value, "maxSourceAttempts"),
    sourceRetryDelayMs: pickNumber(value, "sourceRetryDelayMs"),
    extractConcurrency: pickNumber(value, "extractConcurrency"),
    rowGroupSize: pickNumber(value, "rowGroupSize"),
    awsRegion: pickString(value, "awsRegion"),
    logLevel: logLevel === undefined ? undefined : parseLogLevel(logLevel, DEFAULT_CONFIG.logLevel),
    storePath: pickString(value, "storePath"),
  };

  const rawFilter = value.filter;
  if (rawFilter !== undefined) {
    if (!isRecord(rawFilter)) {
      throw new ConfigError('Config field "filter" must be an object');
    }
    const filter: Partial<FilterConfig> = {
      allowedCrawls: pickStringArray(rawFilter, "allowedCrawls"),
      allowedDomains: pickStringArray(rawFilter, "allowedDomains"),
      requiredSubstring: pickString(rawFilter, "requiredSubstring"),
      forbiddenSubstrings: pickStringArray(rawFilter, "forbiddenSubstrings"),
    };
    overrides.filter = filter;
  }

  const rawOutputDirs = value.outputDirs;
  if (rawOutputDirs !== undefined) {
    if (!isRecord(rawOutputDirs)) {
      throw new ConfigError('Config field "outputDirs" must be an object');
    }
    const outputDirs: Partial<OutputDirs> = {
      manifests: pickString(rawOutputDirs, "manifests"),
      tmp: pickString(rawOutputDirs, "tmp"),
    };
    overrides.outputDirs = outputDirs;
  }

  return overrides;
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath} (${error instanceof Error ? error.message : String(error)})`);
  }
  return parseConfigOverrides(parsed);
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function toList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) {
    return fallback;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function validateConfig(config: AppConfig): AppConfig {
  if (config.filter.allowedCrawls.length === 0) {
    throw new ConfigError("filter.allowedCrawls must name at least one crawl");
  }
  if (config.filter.allowedDomains.length === 0) {
    throw new ConfigError("filter.allowedDomains must name at least one domain");
  }
  if (config.filter.requiredSubstring.length === 0) {
    throw new ConfigError("filter.requiredSubstring must not be empty");
  }
  if (config.destinationUri.trim().length === 0) {
    throw new ConfigError("destinationUri must not be empty");
  }
  if (config.sourceType !== "cdx_api" && config.sourcePaths.length === 0) {
    throw new ConfigError(`sourceType ${config.sourceType} needs at least one source path`);
  }
  const counts = {
    extractConcurrency: config.extractConcurrency,
    maxSourceAttempts: config.maxSourceAttempts,
    rowGroupSize: config.rowGroupSize,
  };
  for (const [name, value] of Object.entries(counts)) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${name} must be a positive integer, got ${value}`);
    }
  }
  return config;
}

// Precedence: environment, then config file, then defaults. Not validated; callers
// layering CLI flags on top validate afterwards.
export function resolveConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const file = readConfigFile(configPath);
  const fileFilter = file.filter ?? {};
  const fileDirs = file.outputDirs ?? {};

  const envSourceType = env.SOURCE_TYPE?.trim().toLowerCase();
  if (envSourceType !== undefined && envSourceType !== "" && !isSourceType(envSourceType)) {
    throw new ConfigError(`Unsupported SOURCE_TYPE: ${envSourceType}`);
  }

  const defaults = DEFAULT_CONFIG;
  return {
    filter: {
      allowedCrawls: toList(env.ALLOWED_CRAWLS, fileFilter.allowedCrawls ?? defaults.filter.allowedCrawls),
      allowedDomains: toList(env.ALLOWED_DOMAINS, fileFilter.allowedDomains ?? defaults.filter.allowedDomains),
      requiredSubstring: env.REQUIRED_SUBSTRING ?? fileFilter.requiredSubstring ?? defaults.filter.requiredSubstring,
      forbiddenSubstrings: toList(
        env.FORBIDDEN_SUBSTRINGS,
        fileFilter.forbiddenSubstrings ?? defaults.filter.forbiddenSubstrings,
      ),
    },
    destinationUri: env.DESTINATION_URI ?? file.destinationUri ?? defaults.destinationUri,
    outputFormat: file.outputFormat ?? defaults.outputFormat,
    sourceType: isSourceType(envSourceType) ? envSourceType : (file.sourceType ?? defaults.sourceType),
    sourcePaths: toList(env.SOURCE_PATHS, file.sourcePaths ?? defaults.sourcePaths),
    cdxApiBaseUrl: env.CDX_API_BASE_URL ?? file.cdxApiBaseUrl ?? defaults.cdxApiBaseUrl,
    userAgent: env.USER_AGENT ?? file.userAgent ?? defaults.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, file.ignoreHttpsErrors ?? defaults.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, file.requestTimeoutMs ?? defaults.requestTimeoutMs),
    maxSourceAttempts: toInt(env.MAX_SOURCE_ATTEMPTS, file.maxSourceAttempts ?? defaults.maxSourceAttempts),
    sourceRetryDelayMs: toInt(env.SOURCE_RETRY_DELAY_MS, file.sourceRetryDelayMs ?? defaults.sourceRetryDelayMs),
    extractConcurrency: toInt(env.EXTRACT_CONCURRENCY, file.extractConcurrency ?? defaults.extractConcurrency),
    rowGroupSize: toInt(env.ROW_GROUP_SIZE, file.rowGroupSize ?? defaults.rowGroupSize),
    awsRegion: env.AWS_REGION ?? file.awsRegion ?? defaults.awsRegion,
    logLevel: parseLogLevel(env.LOG_LEVEL, file.logLevel ?? defaults.logLevel),
    storePath: env.STORE_PATH ?? file.storePath ?? defaults.storePath,
    outputDirs: {
      manifests: env.OUTPUT_MANIFESTS_DIR ?? fileDirs.manifests ?? defaults.outputDirs.manifests,
      tmp: env.OUTPUT_TMP_DIR ?? fileDirs.tmp ?? defaults.outputDirs.tmp,
    },
  };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  return validateConfig(resolveConfig(configPath, env));
}

export { DEFAULT_CONFIG };
