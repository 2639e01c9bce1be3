export type ExtractorErrorCode = "config_invalid" | "source_unavailable" | "destination_write_failed";

export class ExtractorError extends Error {
  readonly code: ExtractorErrorCode;

  constructor(code: ExtractorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ExtractorError {
  constructor(message: string) {
    super("config_invalid", message);
  }
}

/** The index could not be scanned: missing files, unreachable index server, retries exhausted. */
export class SourceUnavailableError extends ExtractorError {
  readonly sourceId: string;

  constructor(sourceId: string, message: string, options?: { cause?: unknown }) {
    super("source_unavailable", `${sourceId}: ${message}`, options);
    this.sourceId = sourceId;
  }
}

export class DestinationWriteError extends ExtractorError {
  readonly destinationUri: string;

  constructor(destinationUri: string, message: string, options?: { cause?: unknown }) {
    super("destination_write_failed", `${destinationUri}: ${message}`, options);
    this.destinationUri = destinationUri;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
