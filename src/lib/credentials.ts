import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { MissingCredentialsError, isMissingFile } from "./errors.js";

const AUTHINFO_PATTERN = /machine\s+api\.openai\.com.*password\s+(\S+)/;

/**
 * Finds the API key in netrc-style authinfo content:
 *
 *   machine api.openai.com login apikey password KEY
 */
export function parseAuthinfo(content: string): string | undefined {
  for (const line of content.split("\n")) {
    const match = AUTHINFO_PATTERN.exec(line);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

/**
 * OPENAI_API_KEY wins; ~/.authinfo is the fallback.
 */
export async function loadApiKey(
  sources: { env?: NodeJS.ProcessEnv; home?: string } = {}
): Promise<string> {
  const env = sources.env ?? process.env;
  if (env.OPENAI_API_KEY) {
    return env.OPENAI_API_KEY;
  }

  const path = join(sources.home ?? homedir(), ".authinfo");
  let content: string | undefined;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }

  const key = content === undefined ? undefined : parseAuthinfo(content);
  if (!key) {
    throw new MissingCredentialsError();
  }
  return key;
}
