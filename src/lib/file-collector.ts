import fg from "fast-glob";
import { realpath } from "node:fs/promises";
import { resolve } from "node:path";
import { isMissingFile } from "./errors.js";
import type { KeyedReference } from "./reference.js";

/**
 * Pattern that enumerates the files a canonical key denotes: everything
 * under a directory, or the glob itself.
 */
export function toFilePattern(reference: KeyedReference): string {
  if (reference.kind === "directory") {
    return `${fg.convertPathToPattern(reference.key)}/**/*`;
  }
  return reference.key;
}

async function realFilePath(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (error) {
    // Removed between the glob and here
    if (isMissingFile(error)) return resolve(path);
    throw error;
  }
}

/**
 * Lists the regular files a reference matches as sorted, unique real paths,
 * so the same file reached through a symlink compares equal. Hidden files
 * are left out, matching shell glob behaviour.
 */
export async function collectFiles(reference: KeyedReference): Promise<string[]> {
  const matched = await fg(toFilePattern(reference), {
    absolute: true,
    onlyFiles: true,
    dot: false,
    followSymbolicLinks: true,
    suppressErrors: true,
  });
  const real = await Promise.all(matched.map(realFilePath));
  return [...new Set(real)].sort();
}
