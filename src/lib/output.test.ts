import { describe, it, expect, beforeEach, vi, afterEach } from "vitest";
import { Output } from "./output.js";

describe("Output", () => {
  let output: Output;
  let consoleSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  describe("verbose mode", () => {
    beforeEach(() => {
      output = new Output({ verbose: true });
    });

    it("info logs in verbose mode", () => {
      output.info("Test message");
      expect(consoleSpy).toHaveBeenCalled();
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Test message");
    });

    it("fileUploaded includes the file id", () => {
      output.fileUploaded("/notes/a.md", "file_123");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("/notes/a.md");
      expect(calls).toContain("file_id=file_123");
    });

    it("summary prints a block with counts", () => {
      output.fileUploaded("/notes/a.md", "file_1");
      output.fileFailed("/notes/b.org", "pandoc not found");
      output.summary("Indexed");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Uploaded: 1");
      expect(calls).toContain("Failed: 1");
    });
  });

  describe("non-verbose mode", () => {
    beforeEach(() => {
      output = new Output({ verbose: false });
    });

    it("info does not log", () => {
      output.info("Test message");
      expect(consoleSpy).not.toHaveBeenCalled();
    });

    it("fileUploaded prints a plain OK line", () => {
      output.fileUploaded("/notes/a.md", "file_123");
      expect(consoleSpy).toHaveBeenCalledWith("  OK: /notes/a.md");
    });

    it("summary prints one line with the failure count", () => {
      output.fileUploaded("/notes/a.md", "file_1");
      output.fileUploaded("/notes/b.md", "file_2");
      output.fileFailed("/notes/c.org", "pandoc not found");
      consoleSpy.mockClear();

      output.summary("Indexed");

      const last = String(consoleSpy.mock.calls[consoleSpy.mock.calls.length - 1][0]);
      expect(last).toMatch(/^Indexed: 2 file\(s\) uploaded in \d+\.\ds\. 1 failed\.$/);
    });

    it("summary omits the failure count when nothing failed", () => {
      output.fileUploaded("/notes/a.md", "file_1");
      consoleSpy.mockClear();

      output.summary("Extended");

      const last = String(consoleSpy.mock.calls[consoleSpy.mock.calls.length - 1][0]);
      expect(last).toMatch(/^Extended: 1 file\(s\) uploaded in \d+\.\ds\.$/);
    });
  });

  describe("always visible methods", () => {
    beforeEach(() => {
      output = new Output({ verbose: false });
    });

    it("success always logs", () => {
      output.success("Success message");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Success message");
    });

    it("warn always logs", () => {
      output.warn("Warning message");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Warning message");
    });

    it("error always logs", () => {
      output.error("Error message");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("Error message");
    });

    it("fileFailed always logs path and reason", () => {
      output.fileFailed("/notes/c.org", "pandoc not found");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("/notes/c.org");
      expect(calls).toContain("pandoc not found");
    });

    it("detail always logs", () => {
      output.detail("/notes/photo.png");
      const calls = consoleSpy.mock.calls.flat().join(" ");
      expect(calls).toContain("/notes/photo.png");
    });
  });
});
