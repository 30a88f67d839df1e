import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, realpath, rm, symlink } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { canonicalize, classifyReference, expandUserPath, type ReferenceEnvironment } from "./reference.js";

describe("expandUserPath", () => {
  const environment: ReferenceEnvironment = { env: { DATA: "/data" }, home: "/home/tester" };

  it("expands a bare tilde", () => {
    expect(expandUserPath("~", environment)).toBe("/home/tester");
  });

  it("expands a leading ~/", () => {
    expect(expandUserPath("~/notes/a.md", environment)).toBe("/home/tester/notes/a.md");
  });

  it("leaves a tilde in the middle alone", () => {
    expect(expandUserPath("a~/b", environment)).toBe("a~/b");
  });

  it("expands $VAR and ${VAR}", () => {
    expect(expandUserPath("$DATA/x", environment)).toBe("/data/x");
    expect(expandUserPath("${DATA}/y", environment)).toBe("/data/y");
  });

  it("keeps unknown variables as typed", () => {
    expect(expandUserPath("$NOPE/x", environment)).toBe("$NOPE/x");
  });
});

describe("canonicalize", () => {
  let home: string;
  let environment: ReferenceEnvironment;

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), "rag-ref-test-"));
    await mkdir(join(home, "notes"));
    environment = { env: { HOME: home }, home, cwd: home };
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  it("returns the auto variant for the sentinel", async () => {
    expect(await canonicalize("auto", environment)).toEqual({ kind: "auto" });
  });

  it("gives every spelling of a directory the same key", async () => {
    const expected = await realpath(join(home, "notes"));
    const spellings = [
      "~/notes",
      "$HOME/notes",
      "${HOME}/notes",
      join(home, "notes"),
      join(home, "notes") + "/",
      "notes",
      "./notes/",
      "~/notes/../notes",
    ];

    for (const spelling of spellings) {
      expect(await canonicalize(spelling, environment)).toEqual({ kind: "directory", key: expected });
    }
  });

  it("resolves symlinked directories to their target", async () => {
    await symlink(join(home, "notes"), join(home, "link"));
    const expected = await realpath(join(home, "notes"));

    expect(await canonicalize("~/link", environment)).toEqual({ kind: "directory", key: expected });
  });

  it("keeps glob patterns unexpanded but absolute", async () => {
    expect(await canonicalize("~/notes/**/*.md", environment)).toEqual({
      kind: "glob",
      key: `${home}/notes/**/*.md`,
    });
    expect(await canonicalize("docs/*.md", environment)).toEqual({
      kind: "glob",
      key: `${home}/docs/*.md`,
    });
  });

  it("escapes special characters in the directories a glob starts from", async () => {
    const folder = join(home, "My Notes (2024)");
    await mkdir(folder);

    expect(await canonicalize("*.md", { ...environment, cwd: folder })).toEqual({
      kind: "glob",
      key: `${home}/My Notes \\(2024\\)/*.md`,
    });
    expect(await canonicalize("~/My Notes (2024)/**/*.md", environment)).toEqual({
      kind: "glob",
      key: `${home}/My Notes \\(2024\\)/**/*.md`,
    });
  });

  it("is stable across repeated calls", async () => {
    const first = await canonicalize("$HOME/notes/*.{md,org}", environment);
    const second = await canonicalize("$HOME/notes/*.{md,org}", environment);
    expect(second).toEqual(first);
  });

  it("treats a missing path as a glob", async () => {
    expect(await canonicalize("~/missing", environment)).toEqual({
      kind: "glob",
      key: `${home}/missing`,
    });
  });
});

describe("classifyReference", () => {
  it("passes explicit index ids through", async () => {
    expect(await classifyReference("vs_abc123")).toEqual({ kind: "explicit", indexId: "vs_abc123" });
  });

  it("recognises auto", async () => {
    expect(await classifyReference("auto")).toEqual({ kind: "auto" });
  });
});
