/**
 * Typed error catalogue. Every error the CLI reports to the user is one of
 * these; the `code` stays stable across releases.
 */

export class RagError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// Reference errors

export class NoPriorIndexError extends RagError {
  constructor() {
    super(
      "NO_PRIOR_INDEX",
      "No index in cache yet.\nCreate one first with:\n  rag index PATH_OR_GLOB",
    );
  }
}

export class NotIndexedError extends RagError {
  constructor(reference: string, key: string) {
    super(
      "NOT_INDEXED",
      `No index cached for this key:\n  ${key}\nCreate it first with:\n  rag index "${reference}"`,
      { reference, key },
    );
  }
}

export class NotPreviouslyIndexedError extends RagError {
  constructor(reference: string, key: string) {
    super(
      "NOT_PREVIOUSLY_INDEXED",
      `${key} was not previously indexed; use index instead:\n  rag index "${reference}"`,
      { reference, key },
    );
  }
}

export class NoEligibleFilesError extends RagError {
  constructor(reference: string, supportedExtensions: readonly string[]) {
    super(
      "NO_ELIGIBLE_FILES",
      `No supported files found for: ${reference}\nSupported extensions: ${[...supportedExtensions].sort().join(", ")}`,
      { reference },
    );
  }
}

// Per-file and per-call failures

export class ConversionError extends RagError {
  constructor(path: string, reason: string) {
    super("CONVERSION_FAILED", `Could not convert ${path}: ${reason}`, { path });
  }
}

export class RequestRejectedError extends RagError {
  constructor(
    operation: string,
    serviceMessage: string,
    public readonly status?: number,
  ) {
    super(
      "REQUEST_REJECTED",
      `Request rejected during ${operation}${status ? ` (${status})` : ""}: ${serviceMessage}`,
      { operation, status },
    );
  }
}

export class IngestionFailedError extends RagError {
  constructor(reference: string, failedCount: number, indexId?: string) {
    const orphan = indexId ? `\nRemote index ${indexId} was created but is not cached.` : "";
    super(
      "INGESTION_FAILED",
      `None of the ${failedCount} file(s) for ${reference} could be ingested.${orphan}`,
      { reference, failedCount, indexId },
    );
  }
}

// Cache errors

export class CacheConsistencyError extends RagError {
  constructor(key: string, expected: string, actual: string | undefined) {
    super(
      "CACHE_CONSISTENCY",
      `Cache entry for ${key} points to ${actual ?? "nothing"}, expected ${expected}. Refusing to mix file sets.`,
      { key, expected, actual },
    );
  }
}

export class CacheFileError extends RagError {
  constructor(path: string, reason: string) {
    super(
      "CACHE_FILE_INVALID",
      `Cache file ${path} is unreadable: ${reason}\nFix or remove it, then retry.`,
      { path },
    );
  }
}

// Startup errors

export class MissingCredentialsError extends RagError {
  constructor() {
    super(
      "MISSING_CREDENTIALS",
      "OpenAI API key not found.\n" +
        "Set OPENAI_API_KEY or add a line to ~/.authinfo:\n" +
        "  machine api.openai.com login apikey password YOUR_KEY",
    );
  }
}

export class ConfigError extends RagError {
  constructor(source: string, reason: string) {
    super("CONFIG_INVALID", `Invalid configuration in ${source}: ${reason}`, { source });
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
