import fg from "fast-glob";
import { realpath, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { resolve, sep } from "node:path";

/** Sentinel reference that points at the most recently used index. */
export const AUTO_REFERENCE = "auto";

/** Remote vector store ids all start with this prefix. */
export const EXPLICIT_ID_PREFIX = "vs_";

export type Reference =
  | { kind: "auto" }
  | { kind: "explicit"; indexId: string }
  | { kind: "directory"; key: string }
  | { kind: "glob"; key: string };

export type CanonicalReference = Exclude<Reference, { kind: "explicit" }>;

export type KeyedReference = Extract<Reference, { key: string }>;

export interface ReferenceEnvironment {
  env?: NodeJS.ProcessEnv;
  home?: string;
  cwd?: string;
}

/**
 * Expands `$VAR`, `${VAR}` and a leading `~`.
 * Unknown variables are left as typed.
 */
export function expandUserPath(input: string, environment: ReferenceEnvironment = {}): string {
  const env = environment.env ?? process.env;
  const home = environment.home ?? homedir();

  const withVars = input.replace(/\$(\w+)|\$\{(\w+)\}/g, (match, bare?: string, braced?: string) => {
    const name = bare ?? braced;
    if (!name) return match;
    const value = env[name];
    return value === undefined ? match : value;
  });

  if (withVars === "~") return home;
  if (withVars.startsWith("~/") || withVars.startsWith(`~${sep}`)) {
    return home + withVars.slice(1);
  }
  return withVars;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    // Missing or unreadable paths are treated as glob patterns
    return false;
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Escapes the leading segments that exist on disk, so characters such as
 * `(` or `[` in the cwd, the home directory or a variable's value are taken
 * literally. The remaining segments stay glob syntax.
 */
async function toGlobKey(absolute: string): Promise<string> {
  const segments = toForwardSlashes(absolute).split("/");
  let literal = 1;
  while (literal < segments.length && (await pathExists(segments.slice(0, literal + 1).join("/")))) {
    literal++;
  }
  const prefix = segments.slice(0, literal).join("/");
  return [prefix && fg.convertPathToPattern(prefix), ...segments.slice(literal)].join("/");
}

function toForwardSlashes(path: string): string {
  return sep === "\\" ? path.split(sep).join("/") : path;
}

function stripTrailingSeparators(path: string): string {
  const stripped = path.replace(/[\\/]+$/, "");
  return stripped || path;
}

/**
 * Turns a user reference into a stable cache key.
 *
 * Directories become their real absolute path. Anything else is a glob and
 * keeps its pattern form (made absolute with its existing leading directories
 * escaped, never expanded to matches), so a pattern that matches nothing
 * today maps to the same key later.
 */
export async function canonicalize(
  reference: string,
  environment: ReferenceEnvironment = {}
): Promise<CanonicalReference> {
  if (reference === AUTO_REFERENCE) {
    return { kind: "auto" };
  }

  const expanded = expandUserPath(reference, environment);
  const absolute = resolve(environment.cwd ?? process.cwd(), expanded);

  if (await isDirectory(absolute)) {
    const real = await realpath(absolute);
    return { kind: "directory", key: toForwardSlashes(stripTrailingSeparators(real)) };
  }

  return { kind: "glob", key: await toGlobKey(absolute) };
}

/**
 * Single classification step for every user-facing reference.
 */
export async function classifyReference(
  reference: string,
  environment: ReferenceEnvironment = {}
): Promise<Reference> {
  if (reference.startsWith(EXPLICIT_ID_PREFIX)) {
    return { kind: "explicit", indexId: reference };
  }
  return canonicalize(reference, environment);
}
