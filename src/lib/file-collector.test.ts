import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, realpath, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { collectFiles, toFilePattern } from "./file-collector.js";
import { canonicalize } from "./reference.js";

describe("toFilePattern", () => {
  it("matches everything under a directory", () => {
    expect(toFilePattern({ kind: "directory", key: "/home/tester/notes" })).toBe("/home/tester/notes/**/*");
  });

  it("uses a glob key as is", () => {
    expect(toFilePattern({ kind: "glob", key: "/home/tester/notes/*.md" })).toBe("/home/tester/notes/*.md");
  });
});

describe("collectFiles", () => {
  let root: string;

  beforeEach(async () => {
    root = await realpath(await mkdtemp(join(tmpdir(), "rag-collect-test-")));
    await mkdir(join(root, "sub"));
    await writeFile(join(root, "b.md"), "b");
    await writeFile(join(root, "a.txt"), "a");
    await writeFile(join(root, "sub", "c.md"), "c");
    await writeFile(join(root, ".hidden.md"), "h");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("lists a directory recursively, sorted, without hidden files", async () => {
    expect(await collectFiles({ kind: "directory", key: root })).toEqual([
      join(root, "a.txt"),
      join(root, "b.md"),
      join(root, "sub", "c.md"),
    ]);
  });

  it("expands a glob", async () => {
    expect(await collectFiles({ kind: "glob", key: `${root}/**/*.md` })).toEqual([
      join(root, "b.md"),
      join(root, "sub", "c.md"),
    ]);
  });

  it("treats special characters in a directory name literally", async () => {
    const odd = join(root, "notes [draft]");
    await mkdir(odd);
    await writeFile(join(odd, "x.md"), "x");

    expect(await collectFiles({ kind: "directory", key: odd })).toEqual([join(odd, "x.md")]);
  });

  it("expands a relative glob under a cwd with special characters", async () => {
    const odd = join(root, "My Notes (2024)");
    await mkdir(odd);
    await writeFile(join(odd, "a.md"), "a");

    const reference = await canonicalize("*.md", { env: {}, home: root, cwd: odd });
    if (reference.kind !== "glob") throw new Error(`expected a glob, got ${reference.kind}`);

    expect(await collectFiles(reference)).toEqual([join(odd, "a.md")]);
  });

  it("reports files reached through a symlink by their real path", async () => {
    await symlink(root, join(root, "link"));

    expect(await collectFiles({ kind: "glob", key: `${root}/link/*.md` })).toEqual([join(root, "b.md")]);
  });

  it("returns nothing for a glob without matches", async () => {
    expect(await collectFiles({ kind: "glob", key: `${root}/*.pdf` })).toEqual([]);
  });
});
