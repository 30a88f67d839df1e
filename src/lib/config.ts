import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse } from "yaml";
import { ConfigError, describeError, isMissingFile } from "./errors.js";
import { expandUserPath } from "./reference.js";

/**
 * Extensions the retrieval service accepts. `.org` is converted to Markdown
 * before upload.
 */
export const SUPPORTED_EXTENSIONS: readonly string[] = [
  ".pdf", ".txt", ".md", ".rtf",
  ".docx", ".pptx",
  ".csv", ".tsv",
  ".html", ".htm",
  ".json", ".xml",
  ".org",
];

/** Coarse characters-per-token heuristic, not calibrated per model. */
export const CHARS_PER_TOKEN = 4;

export const DEFAULT_CACHE_FILENAME = ".rag_vector_stores.json";

export interface RagConfig {
  cacheFile: string;
  model: string;
  maxResults: number;
  /** USD per 1M embedding tokens */
  embedPricePerMillion: number;
  pandocCommand: string;
}

export interface ConfigSources {
  env?: NodeJS.ProcessEnv;
  home?: string;
}

export function defaultConfig(home: string = homedir()): RagConfig {
  return {
    cacheFile: join(home, DEFAULT_CACHE_FILENAME),
    model: "gpt-4.1-mini",
    maxResults: 8,
    embedPricePerMillion: 0.02,
    pandocCommand: "pandoc",
  };
}

export function configFilePath(sources: ConfigSources = {}): string {
  const env = sources.env ?? process.env;
  const home = sources.home ?? homedir();
  return env.RAG_CONFIG ?? join(home, ".config", "rag-sessions", "config.yaml");
}

function readString(value: unknown, field: string, source: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(source, `${field} must be a non-empty string`);
  }
  return value;
}

function readNumber(
  value: unknown,
  field: string,
  source: string,
  check: (n: number) => boolean
): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || !check(value)) {
    throw new ConfigError(source, `${field} has an invalid value: ${String(value)}`);
  }
  return value;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Applies a parsed YAML config file on top of `base`.
 */
export function applyConfigFile(base: RagConfig, raw: unknown, source: string, sources: ConfigSources = {}): RagConfig {
  if (raw === undefined || raw === null) return base;
  if (!isMapping(raw)) {
    throw new ConfigError(source, "expected a mapping at the top level");
  }

  const cacheFile = readString(raw.cacheFile, "cacheFile", source);
  return {
    cacheFile: cacheFile ? expandUserPath(cacheFile, sources) : base.cacheFile,
    model: readString(raw.model, "model", source) ?? base.model,
    maxResults:
      readNumber(raw.maxResults, "maxResults", source, (n) => Number.isInteger(n) && n > 0) ?? base.maxResults,
    embedPricePerMillion:
      readNumber(raw.embedPricePerMillion, "embedPricePerMillion", source, (n) => n >= 0) ??
      base.embedPricePerMillion,
    pandocCommand: readString(raw.pandocCommand, "pandocCommand", source) ?? base.pandocCommand,
  };
}

/**
 * Resolves configuration: defaults, then the YAML config file (if present),
 * then environment overrides.
 */
export async function loadConfig(sources: ConfigSources = {}): Promise<RagConfig> {
  const env = sources.env ?? process.env;
  const home = sources.home ?? homedir();
  let config = defaultConfig(home);

  const path = configFilePath({ env, home });
  let content: string | undefined;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (!isMissingFile(error)) {
      throw new ConfigError(path, describeError(error));
    }
  }

  if (content !== undefined) {
    let raw: unknown;
    try {
      raw = parse(content);
    } catch (error) {
      throw new ConfigError(path, describeError(error));
    }
    config = applyConfigFile(config, raw, path, { env, home });
  }

  if (env.RAG_CACHE_FILE) {
    config = { ...config, cacheFile: expandUserPath(env.RAG_CACHE_FILE, { env, home }) };
  }
  if (env.RAG_MODEL) {
    config = { ...config, model: env.RAG_MODEL };
  }

  return config;
}
