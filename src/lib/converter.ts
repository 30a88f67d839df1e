/**
 * Document conversion before upload.
 *
 * Org-mode files are not accepted by the retrieval service, so they are
 * converted to Markdown with the pandoc CLI (assumed to be in PATH).
 */

import { spawn } from "node:child_process";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, extname, join } from "node:path";
import { ConversionError } from "./errors.js";

export interface DocumentConverter {
  needsConversion(path: string): boolean;
  /** Writes a converted copy of `sourcePath` into `outDir` and returns its path. */
  convert(sourcePath: string, outDir: string): Promise<string>;
}

/**
 * Runs `fn` with a fresh temp directory that is removed on every exit path.
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export class PandocConverter implements DocumentConverter {
  constructor(private readonly command: string = "pandoc") {}

  needsConversion(path: string): boolean {
    return extname(path).toLowerCase() === ".org";
  }

  async convert(sourcePath: string, outDir: string): Promise<string> {
    const target = join(outDir, basename(sourcePath, extname(sourcePath)) + ".md");

    await new Promise<void>((resolve, reject) => {
      const proc = spawn(this.command, [sourcePath, "-o", target], {
        stdio: ["ignore", "ignore", "pipe"],
      });

      let stderr = "";
      proc.stderr.on("data", (data) => {
        stderr += data;
      });

      proc.on("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "ENOENT") {
          reject(
            new ConversionError(
              sourcePath,
              `${this.command} not found. Install pandoc to convert .org files to Markdown.`
            )
          );
        } else {
          reject(new ConversionError(sourcePath, error.message));
        }
      });

      proc.on("close", (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        const detail = stderr.trim();
        reject(
          new ConversionError(
            sourcePath,
            `${this.command} exited with code ${code}${detail ? `: ${detail}` : ""}`
          )
        );
      });
    });

    return target;
  }
}
