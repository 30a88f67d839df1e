/**
 * Index Resolver
 *
 * Entry point for every command: turns a user reference into exactly one
 * remote index id, creating or extending the index through the ingestion
 * pipeline when asked to. The resolver mutates the store in memory only;
 * the command saves it once it is done.
 */

import { SUPPORTED_EXTENSIONS } from "./config.js";
import { estimateCost, type Pricing } from "./cost-estimator.js";
import {
  IngestionFailedError,
  NoEligibleFilesError,
  NoPriorIndexError,
  NotIndexedError,
  NotPreviouslyIndexedError,
} from "./errors.js";
import { collectFiles } from "./file-collector.js";
import { formatEstimate } from "./formatting.js";
import { partitionFiles, type IngestionPipeline, type IngestResult } from "./ingestion-pipeline.js";
import type { Output } from "./output.js";
import {
  canonicalize,
  classifyReference,
  type KeyedReference,
  type ReferenceEnvironment,
} from "./reference.js";
import type { SessionCacheStore, SessionEntry } from "./session-cache.js";

/** Shows the estimate lines and asks the user whether to go ahead. */
export type Confirm = (estimateLines: string[]) => Promise<boolean>;

export interface IngestOptions {
  confirm: Confirm;
  /** Re-index even when the key already has an index */
  force?: boolean;
}

export type IndexOutcome =
  | { status: "existing"; key?: string; indexId: string }
  | { status: "created"; key: string; indexId: string; result: IngestResult; replaced?: string }
  | { status: "cancelled"; key: string };

export type ExtendOutcome =
  | { status: "extended"; indexId: string; result: IngestResult }
  | { status: "up-to-date"; indexId: string }
  | { status: "cancelled"; indexId: string };

export interface IndexResolverOptions {
  store: SessionCacheStore;
  out: Output;
  pricing: Pricing;
  /** Needed only by index() and extend() */
  pipeline?: IngestionPipeline;
  environment?: ReferenceEnvironment;
}

const MAX_DISPLAY_NAME = 64;

/**
 * Human-readable name for a new remote index, derived from its key.
 */
export function displayNameFor(key: string): string {
  const name = `rag: ${key}`;
  if (name.length <= MAX_DISPLAY_NAME) return name;
  return `rag: …${key.slice(key.length - (MAX_DISPLAY_NAME - 6))}`;
}

export class IndexResolver {
  private readonly store: SessionCacheStore;
  private readonly out: Output;
  private readonly pricing: Pricing;
  private readonly pipeline?: IngestionPipeline;
  private readonly environment: ReferenceEnvironment;

  constructor(options: IndexResolverOptions) {
    this.store = options.store;
    this.out = options.out;
    this.pricing = options.pricing;
    this.pipeline = options.pipeline;
    this.environment = options.environment ?? {};
  }

  /**
   * Resolves a reference that must already be indexed (ask, chat, files).
   */
  async resolve(reference: string): Promise<string> {
    const classified = await classifyReference(reference, this.environment);
    switch (classified.kind) {
      case "auto":
        return this.lastUsed();
      case "explicit":
        return classified.indexId;
      case "directory":
      case "glob": {
        const indexId = this.store.lookup(classified.key);
        if (!indexId) {
          throw new NotIndexedError(reference, classified.key);
        }
        return indexId;
      }
    }
  }

  /**
   * Resolves a reference, creating its index when the key is not cached yet
   * (or when `force` asks for a fresh one).
   */
  async index(reference: string, options: IngestOptions): Promise<IndexOutcome> {
    const classified = await classifyReference(reference, this.environment);
    if (classified.kind === "auto" || classified.kind === "explicit") {
      return { status: "existing", indexId: await this.resolve(reference) };
    }

    const { key } = classified;
    const existing = this.store.lookup(key);
    if (existing && !options.force) {
      return { status: "existing", key, indexId: existing };
    }
    if (existing) {
      this.out.warn(`${key} is already indexed as ${existing}; building a new index`);
    }

    const files = await this.collectEligible(reference, classified);
    if (!(await this.confirmCost(files, options.confirm))) {
      return { status: "cancelled", key };
    }

    const result = await this.requirePipeline().ingest(files, {
      mode: "create",
      displayName: displayNameFor(key),
    });
    if (result.succeeded.length === 0) {
      throw new IngestionFailedError(reference, result.failed.length, result.indexId);
    }

    const replaced = this.store.recordNew(key, result.indexId);
    this.store.addIndexedFiles(result.indexId, result.succeeded);
    if (replaced) {
      this.out.warn(`Replaced ${replaced} for ${key}; its file list stays in the cache`);
    }

    return { status: "created", key, indexId: result.indexId, result, replaced };
  }

  /**
   * Adds files matching `newFiles` to the index of a previously indexed
   * reference. Files already ingested into that index are left out.
   */
  async extend(reference: string, newFiles: string, options: IngestOptions): Promise<ExtendOutcome> {
    const classified = await classifyReference(reference, this.environment);

    let key: string | undefined;
    let indexId: string;
    switch (classified.kind) {
      case "auto":
        indexId = this.lastUsed();
        break;
      case "explicit":
        indexId = classified.indexId;
        break;
      case "directory":
      case "glob": {
        const stored = this.store.lookup(classified.key);
        if (!stored) {
          throw new NotPreviouslyIndexedError(reference, classified.key);
        }
        key = classified.key;
        indexId = stored;
        break;
      }
    }

    const target = await canonicalize(newFiles, this.environment);
    if (target.kind === "auto") {
      throw new NoEligibleFilesError(newFiles, SUPPORTED_EXTENSIONS);
    }

    const candidates = await this.collectEligible(newFiles, target);
    const already = this.store.indexedFiles(indexId);
    const fresh = candidates.filter((path) => !already.has(path));

    if (fresh.length === 0) {
      this.out.success("No new files to index; all of them are already in this index");
      // Still counts as use of this index
      this.store.recordExtend(key, indexId, []);
      return { status: "up-to-date", indexId };
    }

    this.out.success(`Found ${fresh.length} new file(s) to add`);
    if (!(await this.confirmCost(fresh, options.confirm))) {
      return { status: "cancelled", indexId };
    }

    const result = await this.requirePipeline().ingest(fresh, { mode: "extend", indexId });
    if (result.succeeded.length === 0) {
      throw new IngestionFailedError(reference, result.failed.length);
    }

    this.store.recordExtend(key, indexId, result.succeeded);
    return { status: "extended", indexId, result };
  }

  list(): SessionEntry[] {
    return this.store.listAll();
  }

  /**
   * Files recorded as ingested for the index a reference resolves to.
   */
  async files(reference: string): Promise<{ indexId: string; files: string[] }> {
    const indexId = await this.resolve(reference);
    return { indexId, files: [...this.store.indexedFiles(indexId)].sort() };
  }

  private lastUsed(): string {
    const last = this.store.lookupLast();
    if (!last) {
      throw new NoPriorIndexError();
    }
    return last;
  }

  private requirePipeline(): IngestionPipeline {
    if (!this.pipeline) {
      throw new Error("IndexResolver was created without an ingestion pipeline");
    }
    return this.pipeline;
  }

  private async collectEligible(reference: string, target: KeyedReference): Promise<string[]> {
    const { supported, unsupported } = partitionFiles(await collectFiles(target));

    if (supported.length === 0) {
      throw new NoEligibleFilesError(reference, SUPPORTED_EXTENSIONS);
    }

    if (unsupported.length > 0) {
      this.out.warn(`Skipping ${unsupported.length} file(s) with unsupported extensions:`);
      for (const path of unsupported) {
        this.out.detail(path);
      }
    }

    this.out.success(`Found ${supported.length} supported file(s)`);
    return supported;
  }

  private async confirmCost(files: string[], confirm: Confirm): Promise<boolean> {
    const estimate = await estimateCost(files, this.pricing);
    for (const { path, reason } of estimate.skipped) {
      this.out.warn(`Could not read ${path} for the estimate: ${reason}`);
    }
    return confirm(formatEstimate(estimate, this.pricing.pricePerMillion));
  }
}
