import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { execSync } from "node:child_process";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PandocConverter, withTempDir } from "./converter.js";
import { ConversionError } from "./errors.js";

function hasPandoc(): boolean {
  try {
    execSync("pandoc --version", { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
}

const describePandoc = hasPandoc() ? describe : describe.skip;

describe("withTempDir", () => {
  it("removes the directory after success", async () => {
    let seen = "";
    const result = await withTempDir("rag-test-", async (dir) => {
      seen = dir;
      await writeFile(join(dir, "x.md"), "x");
      return 42;
    });

    expect(result).toBe(42);
    expect(existsSync(seen)).toBe(false);
  });

  it("removes the directory when the callback throws", async () => {
    let seen = "";
    await expect(
      withTempDir("rag-test-", async (dir) => {
        seen = dir;
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(existsSync(seen)).toBe(false);
  });
});

describe("PandocConverter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rag-convert-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("only converts org files", () => {
    const converter = new PandocConverter();
    expect(converter.needsConversion("/notes/todo.org")).toBe(true);
    expect(converter.needsConversion("/notes/TODO.ORG")).toBe(true);
    expect(converter.needsConversion("/notes/readme.md")).toBe(false);
  });

  it("reports a missing converter binary", async () => {
    const source = join(dir, "a.org");
    await writeFile(source, "* Heading\n");
    const converter = new PandocConverter("rag-missing-converter-binary");

    const error = await converter.convert(source, dir).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConversionError);
    expect(String(error)).toContain("rag-missing-converter-binary not found");
  });

  it("reports a non-zero exit", async () => {
    const source = join(dir, "a.org");
    await writeFile(source, "* Heading\n");
    const converter = new PandocConverter("false");

    await expect(converter.convert(source, dir)).rejects.toThrow(
      `Could not convert ${source}: false exited with code 1`
    );
  });

  describePandoc("with pandoc installed", () => {
    it("writes a Markdown copy into the output dir", async () => {
      const source = join(dir, "notes.org");
      await writeFile(source, "* Title\n\nSome text\n");

      const target = await new PandocConverter().convert(source, dir);

      expect(target).toBe(join(dir, "notes.md"));
      expect(await readFile(target, "utf-8")).toContain("Title");
    });
  });
});
