/**
 * Ingestion Pipeline
 *
 * Uploads a batch of files into a remote index, one file at a time and in
 * order. A failing file is recorded and the batch moves on; the caller gets
 * the full accounting back and decides what zero successes means.
 */

import { extname } from "node:path";
import { SUPPORTED_EXTENSIONS } from "./config.js";
import { withTempDir, type DocumentConverter } from "./converter.js";
import { ConversionError, NoEligibleFilesError, RequestRejectedError, describeError } from "./errors.js";
import type { Output } from "./output.js";
import type { RetrievalService } from "./retrieval-service.js";

export type IngestTarget =
  | { mode: "create"; displayName: string }
  | { mode: "extend"; indexId: string };

export type FailureKind = "conversion" | "rejected" | "unexpected";

export interface IngestFailure {
  path: string;
  kind: FailureKind;
  reason: string;
}

export interface IngestResult {
  indexId: string;
  succeeded: string[];
  failed: IngestFailure[];
  /** Unsupported extensions, never attempted */
  skipped: string[];
}

export function isSupported(path: string, extensions: readonly string[] = SUPPORTED_EXTENSIONS): boolean {
  return extensions.includes(extname(path).toLowerCase());
}

export function partitionFiles(
  files: readonly string[],
  extensions: readonly string[] = SUPPORTED_EXTENSIONS
): { supported: string[]; unsupported: string[] } {
  const supported: string[] = [];
  const unsupported: string[] = [];
  for (const file of files) {
    (isSupported(file, extensions) ? supported : unsupported).push(file);
  }
  return { supported, unsupported };
}

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof ConversionError) return "conversion";
  if (error instanceof RequestRejectedError) return "rejected";
  return "unexpected";
}

export interface IngestionPipelineOptions {
  service: RetrievalService;
  converter: DocumentConverter;
  out: Output;
  extensions?: readonly string[];
}

type FileOutcome = { ok: true; fileId: string } | { ok: false; failure: IngestFailure };

export class IngestionPipeline {
  private readonly service: RetrievalService;
  private readonly converter: DocumentConverter;
  private readonly out: Output;
  private readonly extensions: readonly string[];

  constructor(options: IngestionPipelineOptions) {
    this.service = options.service;
    this.converter = options.converter;
    this.out = options.out;
    this.extensions = options.extensions ?? SUPPORTED_EXTENSIONS;
  }

  async ingest(files: readonly string[], target: IngestTarget): Promise<IngestResult> {
    const { supported, unsupported } = partitionFiles(files, this.extensions);

    if (supported.length === 0) {
      throw new NoEligibleFilesError(
        target.mode === "create" ? target.displayName : target.indexId,
        this.extensions
      );
    }

    // Creation failure is fatal: nothing has been uploaded yet
    let indexId: string;
    if (target.mode === "create") {
      indexId = await this.service.createIndex(target.displayName);
      this.out.success(`Created index ${indexId}`);
    } else {
      indexId = target.indexId;
    }

    this.out.info(`Uploading ${supported.length} file(s) to ${indexId}...`);

    const succeeded: string[] = [];
    const failed: IngestFailure[] = [];

    for (const path of supported) {
      const outcome = await this.ingestOne(indexId, path);
      if (outcome.ok) {
        succeeded.push(path);
      } else {
        failed.push(outcome.failure);
      }
    }

    return { indexId, succeeded, failed, skipped: unsupported };
  }

  private async ingestOne(indexId: string, path: string): Promise<FileOutcome> {
    try {
      const { fileId } = this.converter.needsConversion(path)
        ? await withTempDir("rag-convert-", async (dir) => {
            const converted = await this.converter.convert(path, dir);
            return this.service.uploadFile(indexId, converted);
          })
        : await this.service.uploadFile(indexId, path);

      this.out.fileUploaded(path, fileId);
      return { ok: true, fileId };
    } catch (error) {
      const failure: IngestFailure = { path, kind: classifyFailure(error), reason: describeError(error) };
      this.out.fileFailed(path, failure.reason);
      return { ok: false, failure };
    }
  }
}
