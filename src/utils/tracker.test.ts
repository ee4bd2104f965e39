import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { z } from "zod";
import { Tracker } from "./tracker";
import { ArchiveError, ParseError, RecoveryError } from "./errors";

describe("Tracker", () => {
  // ==========================================================================
  // Error mapping
  // ==========================================================================
  describe("trackError", () => {
    it("maps converter errors to their code", () => {
      const tracker = new Tracker();
      tracker.trackError("a.py", new ParseError("invalid syntax", 3, 2, "a.py"), "file");
      tracker.trackError("b.py", new ArchiveError("cannot archive b.py: disk full"), "file");

      expect(tracker.getFileIssues()).toEqual([
        { type: "file", path: "a.py", reason: "parse-error", details: "a.py:3:2: invalid syntax" },
        { type: "file", path: "b.py", reason: "archive-error", details: "cannot archive b.py: disk full" },
      ]);
    });

    it("falls back to the read or write context for other errors", () => {
      const tracker = new Tracker();
      tracker.trackError("a.py", new Error("EACCES"), "file");
      tracker.trackError("b.py", new Error("ENOSPC"), "file", "write");

      expect(tracker.getFileIssues().map((issue) => issue.reason)).toEqual([
        "read-error",
        "write-error",
      ]);
    });

    it("classifies configuration errors", () => {
      const tracker = new Tracker();
      const invalid = z.object({ quiet: z.boolean() }).safeParse({ quiet: "yes" });
      tracker.trackError("config.json", invalid.error, "resource");
      tracker.trackError("other.json", new SyntaxError("Unexpected token"), "resource");

      expect(tracker.getResourceIssues().map((issue) => issue.reason)).toEqual([
        "schema-validation",
        "invalid-json",
      ]);
      expect(tracker.getResourceIssues()[0].details).toMatch(/^quiet: /);
    });

    it("keeps the failure kind of recovery errors", () => {
      const tracker = new Tracker();
      tracker.trackError("a.py", new RecoveryError("checksum mismatch", "a.py", "checksum-mismatch"), "recovery");
      tracker.trackError("b.py", new Error("EPERM"), "recovery");

      expect(tracker.getRecoveryIssues().map((issue) => issue.reason)).toEqual([
        "checksum-mismatch",
        "restore-failed",
      ]);
    });
  });

  // ==========================================================================
  // Counters
  // ==========================================================================
  describe("counters", () => {
    it("sums bindings over rewritten files", () => {
      const tracker = new Tracker();
      tracker.setTotalFiles(3);
      tracker.incrementRewritten(2);
      tracker.incrementRewritten(1);
      tracker.incrementUnchanged();

      const stats = tracker.getStats();
      expect(stats.totalFiles).toBe(3);
      expect(stats.rewrittenFiles).toBe(2);
      expect(stats.unchangedFiles).toBe(1);
      expect(stats.bindings).toBe(3);
      expect(tracker.hasFailures()).toBe(false);
    });

    it("fails the run on failed files or skipped records", () => {
      const failed = new Tracker();
      failed.incrementFailed();
      expect(failed.hasFailures()).toBe(true);

      const skipped = new Tracker();
      skipped.incrementSkipped();
      expect(skipped.hasFailures()).toBe(true);
    });
  });

  // ==========================================================================
  // Export
  // ==========================================================================
  describe("exportStats", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "decorport-stats-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("writes the summary, grouped issues and planned changes", async () => {
      const tracker = new Tracker();
      tracker.setTotalFiles(2);
      tracker.incrementFailed();
      tracker.trackError("a.py", new ParseError("invalid syntax", 1, 1, "a.py"), "file");
      tracker.trackPlannedChange({ path: "b.py", line: 4, binding: "_decorator_0", expression: "(x)" });

      const output = join(dir, "nested", "stats.json");
      await tracker.exportStats(output);
      const exported: unknown = JSON.parse(await readFile(output, "utf-8"));

      expect(exported).toMatchObject({
        summary: { totalFiles: 2, failedFiles: 1 },
        issues: {
          file: {
            "parse-error": [
              { type: "file", path: "a.py", reason: "parse-error", details: "a.py:1:1: invalid syntax" },
            ],
          },
          resource: {},
          recovery: {},
        },
        plannedChanges: [{ path: "b.py", line: 4, binding: "_decorator_0", expression: "(x)" }],
      });
    });
  });
});
