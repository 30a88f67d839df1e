import { Flags } from "@oclif/core";
import { createInterface } from "node:readline/promises";
import { loadConfig, type RagConfig } from "./config.js";
import { PandocConverter } from "./converter.js";
import { loadApiKey } from "./credentials.js";
import { describeError } from "./errors.js";
import { IndexResolver, type Confirm } from "./index-resolver.js";
import { IngestionPipeline } from "./ingestion-pipeline.js";
import type { Output } from "./output.js";
import { OpenAIRetrievalService, type RetrievalService } from "./retrieval-service.js";
import { JsonFileCachePersistence, SessionCacheStore } from "./session-cache.js";

/**
 * Common flags shared by all commands.
 */
export const commonFlags = {
  verbose: Flags.boolean({
    char: "v",
    description: "Show detailed output with colors",
    default: false,
  }),
  "cache-file": Flags.string({
    description: "Path to the session cache file (default: ~/.rag_vector_stores.json)",
  }),
};

/**
 * Flags for commands that upload files (index, extend).
 */
export const ingestFlags = {
  ...commonFlags,
  yes: Flags.boolean({
    char: "y",
    description: "Skip the cost confirmation prompt",
    default: false,
  }),
};

/**
 * Flags for commands that ask questions (ask, chat).
 */
export const answerFlags = {
  ...commonFlags,
  model: Flags.string({
    char: "m",
    description: "Model used to answer (default from config)",
  }),
  also: Flags.string({
    char: "a",
    description: "Additional index reference to search (repeatable)",
    multiple: true,
  }),
};

export interface Runtime {
  out: Output;
  config: RagConfig;
  store: SessionCacheStore;
  resolver: IndexResolver;
  /** Present when the command asked for the remote service */
  service?: RetrievalService;
}

/**
 * Loads config and the session cache, and (when `withService` is set)
 * credentials plus the remote client. Missing credentials abort here,
 * before anything else runs.
 */
export async function createRuntime(
  out: Output,
  flags: { "cache-file"?: string },
  options: { withService: boolean }
): Promise<Runtime> {
  const loaded = await loadConfig();
  const config = flags["cache-file"] ? { ...loaded, cacheFile: flags["cache-file"] } : loaded;

  const service = options.withService ? new OpenAIRetrievalService(await loadApiKey()) : undefined;
  const store = await SessionCacheStore.open(new JsonFileCachePersistence(config.cacheFile));
  out.info(`Cache file: ${store.location}`);

  const pipeline = service
    ? new IngestionPipeline({ service, converter: new PandocConverter(config.pandocCommand), out })
    : undefined;

  const resolver = new IndexResolver({
    store,
    out,
    pricing: { pricePerMillion: config.embedPricePerMillion },
    pipeline,
  });

  return { out, config, store, resolver, service };
}

/**
 * Same as createRuntime with the service guaranteed present.
 */
export async function createServiceRuntime(
  out: Output,
  flags: { "cache-file"?: string }
): Promise<Runtime & { service: RetrievalService }> {
  const runtime = await createRuntime(out, flags, { withService: true });
  const { service } = runtime;
  if (!service) {
    throw new Error("Retrieval service was not initialised");
  }
  return { ...runtime, service };
}

export function isAffirmative(answer: string): boolean {
  return ["y", "yes"].includes(answer.trim().toLowerCase());
}

/**
 * Prints the cost estimate and asks on the terminal, unless `assumeYes`.
 */
export function createConfirm(out: Output, assumeYes: boolean): Confirm {
  return async (estimateLines) => {
    out.header("=== Embedding cost estimate ===");
    for (const line of estimateLines) {
      console.log(line);
    }
    if (assumeYes) return true;

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      return isAffirmative(await rl.question("Proceed with this approximate cost? [y/N]: "));
    } finally {
      rl.close();
    }
  };
}

/**
 * Reports an error and exits non-zero.
 */
export function failAndExit(out: Output, error: unknown): never {
  out.error(describeError(error));
  process.exit(1);
}

/**
 * Resolves the main reference plus any `--also` references, dropping
 * duplicates while keeping order.
 */
export async function resolveIndexIds(resolver: IndexResolver, references: string[]): Promise<string[]> {
  const ids: string[] = [];
  for (const reference of references) {
    const id = await resolver.resolve(reference);
    if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}
