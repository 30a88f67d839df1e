/**
 * Cost Estimator
 *
 * Rough one-off embedding cost for a set of files. Pure: reads files, never
 * talks to the network, never prompts.
 */

import { readFile } from "node:fs/promises";
import { CHARS_PER_TOKEN } from "./config.js";
import { describeError } from "./errors.js";

export interface CostEstimate {
  charCount: number;
  approxTokens: number;
  approxCostUsd: number;
  /** Files that could not be read at all */
  skipped: Array<{ path: string; reason: string }>;
}

export interface Pricing {
  /** USD per 1M tokens */
  pricePerMillion: number;
}

const utf8 = new TextDecoder("utf-8", { fatal: false, ignoreBOM: true });

function decodeDroppingInvalid(bytes: Uint8Array): string {
  return utf8.decode(bytes).replace(/\uFFFD/g, "");
}

/**
 * Decodes as UTF-8 and drops undecodable bytes instead of failing.
 *
 * The decoder turns invalid sequences into U+FFFD, so genuine U+FFFD
 * characters (EF BF BD, which always starts a sequence) are split out first
 * and kept.
 */
export function decodeLenient(bytes: Uint8Array): string {
  const parts: string[] = [];
  let start = 0;
  for (let i = 0; i + 2 < bytes.length; i++) {
    if (bytes[i] === 0xef && bytes[i + 1] === 0xbf && bytes[i + 2] === 0xbd) {
      parts.push(decodeDroppingInvalid(bytes.subarray(start, i)));
      start = i + 3;
      i += 2;
    }
  }
  parts.push(decodeDroppingInvalid(bytes.subarray(start)));
  return parts.join("\uFFFD");
}

/**
 * Counts Unicode code points (a surrogate pair is one character).
 */
export function countCharacters(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    // Low surrogates belong to the preceding high surrogate
    if (code < 0xdc00 || code > 0xdfff) {
      count++;
    }
  }
  return count;
}

export function tokensForCharacters(charCount: number): number {
  return Math.floor(charCount / CHARS_PER_TOKEN);
}

export function costForTokens(tokens: number, pricing: Pricing): number {
  return (tokens / 1_000_000) * pricing.pricePerMillion;
}

export async function estimateCost(files: Iterable<string>, pricing: Pricing): Promise<CostEstimate> {
  let charCount = 0;
  const skipped: CostEstimate["skipped"] = [];

  for (const path of files) {
    try {
      const bytes = await readFile(path);
      charCount += countCharacters(decodeLenient(bytes));
    } catch (error) {
      skipped.push({ path, reason: describeError(error) });
    }
  }

  const approxTokens = tokensForCharacters(charCount);
  return {
    charCount,
    approxTokens,
    approxCostUsd: costForTokens(approxTokens, pricing),
    skipped,
  };
}
