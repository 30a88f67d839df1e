/**
 * Session Cache Store - maps canonical keys to remote index ids.
 *
 * The whole cache is one JSON document. It is loaded once, mutated in
 * memory while a command runs, and flushed by an explicit save() at the end
 * of the command. Writes go to a temp file that is renamed over the target.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { CacheConsistencyError, CacheFileError, describeError, isMissingFile } from "./errors.js";

export interface CacheDocument {
  /** canonical key -> index id */
  sessions: Record<string, string>;
  /** index id -> absolute paths already ingested */
  files_per_vs: Record<string, string[]>;
  /** most recently created or extended index id */
  _last: string | null;
}

export interface SessionEntry {
  key: string;
  indexId: string;
  fileCount: number;
  lastUsed: boolean;
}

export interface CachePersistence {
  /** Returns undefined when nothing has been stored yet. */
  read(): Promise<string | undefined>;
  write(content: string): Promise<void>;
  readonly location: string;
}

export function emptyCacheDocument(): CacheDocument {
  return { sessions: {}, files_per_vs: {}, _last: null };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringMap(value: unknown, field: string, source: string): Record<string, string> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new CacheFileError(source, `"${field}" must be an object`);
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new CacheFileError(source, `"${field}.${key}" must be a string`);
    }
    result[key] = entry;
  }
  return result;
}

function readFileSets(value: unknown, source: string): Record<string, string[]> {
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new CacheFileError(source, `"files_per_vs" must be an object`);
  }
  const result: Record<string, string[]> = {};
  for (const [indexId, entry] of Object.entries(value)) {
    if (!Array.isArray(entry) || !entry.every((item): item is string => typeof item === "string")) {
      throw new CacheFileError(source, `"files_per_vs.${indexId}" must be a list of paths`);
    }
    result[indexId] = entry;
  }
  return result;
}

function readLast(value: unknown, source: string): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") {
    throw new CacheFileError(source, `"_last" must be a string or null`);
  }
  return value;
}

/**
 * Parses cache file content, accepting both the current layout and the older
 * flat `{ "<key>": "<id>", "_last": "<id>" }` layout.
 * Fields this version does not know about are kept and written back.
 */
export function parseCacheDocument(
  content: string,
  source: string
): { document: CacheDocument; extra: Record<string, unknown>; migrated: boolean } {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new CacheFileError(source, describeError(error));
  }

  if (!isRecord(raw)) {
    throw new CacheFileError(source, "top level must be an object");
  }

  if ("sessions" in raw || "files_per_vs" in raw) {
    const { sessions, files_per_vs, _last, ...extra } = raw;
    return {
      document: {
        sessions: readStringMap(sessions, "sessions", source),
        files_per_vs: readFileSets(files_per_vs, source),
        _last: readLast(_last, source),
      },
      extra,
      migrated: false,
    };
  }

  // Legacy flat layout
  const document = emptyCacheDocument();
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith("_")) continue;
    if (typeof value !== "string") {
      throw new CacheFileError(source, `"${key}" must map to an index id`);
    }
    document.sessions[key] = value;
  }
  document._last = readLast(raw._last, source);
  return { document, extra: {}, migrated: true };
}

export class JsonFileCachePersistence implements CachePersistence {
  constructor(public readonly location: string) {}

  async read(): Promise<string | undefined> {
    try {
      return await readFile(this.location, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw new CacheFileError(this.location, describeError(error));
    }
  }

  async write(content: string): Promise<void> {
    const tempPath = `${this.location}.${process.pid}.tmp`;
    await mkdir(dirname(this.location), { recursive: true });
    try {
      await writeFile(tempPath, content, "utf-8");
      await rename(tempPath, this.location);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}

export class MemoryCachePersistence implements CachePersistence {
  readonly location = "<memory>";
  writes = 0;

  constructor(public content?: string) {}

  async read(): Promise<string | undefined> {
    return this.content;
  }

  async write(content: string): Promise<void> {
    this.content = content;
    this.writes++;
  }
}

export class SessionCacheStore {
  private dirty: boolean;

  constructor(
    private readonly persistence: CachePersistence,
    private readonly document: CacheDocument = emptyCacheDocument(),
    private readonly extra: Record<string, unknown> = {},
    migrated = false
  ) {
    this.dirty = migrated;
  }

  /**
   * Loads the store. A missing cache yields an empty one.
   */
  static async open(persistence: CachePersistence): Promise<SessionCacheStore> {
    const content = await persistence.read();
    if (content === undefined) {
      return new SessionCacheStore(persistence);
    }
    const { document, extra, migrated } = parseCacheDocument(content, persistence.location);
    return new SessionCacheStore(persistence, document, extra, migrated);
  }

  get location(): string {
    return this.persistence.location;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  lookup(key: string): string | undefined {
    return Object.hasOwn(this.document.sessions, key) ? this.document.sessions[key] : undefined;
  }

  lookupLast(): string | undefined {
    return this.document._last ?? undefined;
  }

  /**
   * Records a freshly created index for `key` and makes it the last used one.
   * Returns the id it replaced, if any. The replaced id keeps its file set.
   */
  recordNew(key: string, indexId: string): string | undefined {
    const previous = this.lookup(key);
    this.document.sessions[key] = indexId;
    this.document._last = indexId;
    this.dirty = true;
    return previous !== indexId ? previous : undefined;
  }

  /**
   * Adds newly ingested files to an existing index.
   * When a key is given it must already map to `indexId`; an explicit-id
   * reference has no key and skips that check.
   */
  recordExtend(key: string | undefined, indexId: string, files: Iterable<string>): void {
    if (key !== undefined) {
      const stored = this.lookup(key);
      if (stored !== indexId) {
        throw new CacheConsistencyError(key, indexId, stored);
      }
    }
    this.addIndexedFiles(indexId, files);
    this.document._last = indexId;
    this.dirty = true;
  }

  addIndexedFiles(indexId: string, files: Iterable<string>): void {
    const combined = this.indexedFiles(indexId);
    for (const file of files) {
      combined.add(resolve(file));
    }
    this.document.files_per_vs[indexId] = [...combined].sort();
    this.dirty = true;
  }

  indexedFiles(indexId: string): Set<string> {
    const files = Object.hasOwn(this.document.files_per_vs, indexId)
      ? this.document.files_per_vs[indexId]
      : [];
    return new Set(files);
  }

  listAll(): SessionEntry[] {
    const last = this.document._last;
    return Object.entries(this.document.sessions).map(([key, indexId]) => ({
      key,
      indexId,
      fileCount: this.indexedFiles(indexId).size,
      lastUsed: indexId === last,
    }));
  }

  serialize(): string {
    const { sessions, files_per_vs, _last } = this.document;
    return JSON.stringify({ ...this.extra, sessions, files_per_vs, _last }, null, 2) + "\n";
  }

  /**
   * Writes the document back if anything changed. Returns true if it wrote.
   */
  async save(): Promise<boolean> {
    if (!this.dirty) return false;
    await this.persistence.write(this.serialize());
    this.dirty = false;
    return true;
  }
}
