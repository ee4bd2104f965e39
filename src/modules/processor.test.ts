import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { process } from "./processor";
import { scan } from "./scanner";
import type { ConversionContext, DecorportConfig, RunOptions } from "../types";
import { Logger, Tracker, loadDefaultConfig } from "../utils";

const HOISTED = "@(d if c else e)\ndef f(): pass\n";
const HOISTED_OUTPUT = "_decorator_0 = (d if c else e)\n\n\n@_decorator_0\ndef f(): pass\n";
const CONFORMING = "@d\ndef f(): pass\n";
const BROKEN = "@d\nx = 1\n";

let dir: string;
let src: string;
let logged: string[];

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "decorport-process-"));
  src = join(dir, "src");
  await mkdir(src);
  logged = [];
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function context(run: Partial<RunOptions> = {}, archive = true): ConversionContext {
  const defaults = loadDefaultConfig();
  const config: DecorportConfig = {
    ...defaults,
    concurrency: 4,
    archive: { ...defaults.archive, enabled: archive, path: join(dir, "archive") },
  };
  return {
    config,
    run: {
      paths: [src],
      dryRun: false,
      simple: false,
      recover: null,
      cleanup: "none",
      statsPath: null,
      verbose: false,
      ...run,
    },
    tracker: new Tracker(),
    logger: new Logger("warn", (line) => logged.push(line)),
  };
}

// mod3 fails to parse, even modules need rewriting, odd ones conform
async function writeTenModules(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    const text = i === 3 ? BROKEN : i % 2 === 0 ? HOISTED : CONFORMING;
    await writeFile(join(src, `mod${i}.py`), text);
  }
}

async function read(name: string): Promise<string> {
  return readFile(join(src, name), "utf-8");
}

describe("process", () => {
  it("isolates a failing file from the rest of the pool", async () => {
    await writeTenModules();
    const ctx = context();
    const progress: number[] = [];
    ctx.onProgress = (completed) => progress.push(completed);

    await scan(ctx);
    await process(ctx);

    const stats = ctx.tracker.getStats();
    expect(stats.totalFiles).toBe(10);
    expect(stats.rewrittenFiles).toBe(5);
    expect(stats.unchangedFiles).toBe(4);
    expect(stats.failedFiles).toBe(1);
    expect(ctx.tracker.hasFailures()).toBe(true);
    expect(progress).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);

    expect(await read("mod0.py")).toBe(HOISTED_OUTPUT);
    expect(await read("mod1.py")).toBe(CONFORMING);
    expect(await read("mod3.py")).toBe(BROKEN);
    expect(await read("mod8.py")).toBe(HOISTED_OUTPUT);

    expect(ctx.tracker.getFileIssues()).toEqual([
      {
        type: "file",
        path: "mod3.py",
        reason: "parse-error",
        details: `${join(src, "mod3.py")}:2:1: expected 'def', 'async def' or 'class' after decorator`,
      },
    ]);
    expect(logged).toHaveLength(1);
    expect(logged[0]).toContain("Failed to convert mod3.py");
  });

  it("walks each job through its states", async () => {
    await writeTenModules();
    const ctx = context();

    await scan(ctx);
    await process(ctx);

    const history = (name: string) => ctx.jobs?.find((job) => job.descriptor.relativePath === name)?.history;
    expect(history("mod0.py")).toEqual([
      "pending",
      "parsed",
      "planned",
      "rewritten",
      "archived",
      "written",
      "done",
    ]);
    expect(history("mod1.py")).toEqual(["pending", "parsed", "planned", "no-change", "done"]);
    expect(history("mod3.py")).toEqual(["pending", "failed"]);
  });

  it("archives every original it overwrites", async () => {
    await writeTenModules();
    const ctx = context();

    await scan(ctx);
    await process(ctx);

    const archive = ctx.archive;
    if (!archive) throw new Error("expected an archive");
    const listing = await archive.list();
    expect(listing.records.map((record) => record.path).sort()).toEqual([
      "mod0.py",
      "mod2.py",
      "mod4.py",
      "mod6.py",
      "mod8.py",
    ]);
    expect(ctx.tracker.getStats().archivedFiles).toBe(5);
  });

  it("reports planned bindings without touching files in a dry run", async () => {
    await writeFile(join(src, "a.py"), "x = 1\n\n@(d if c else e)\n@e[0]\ndef f(): pass\n");
    await writeFile(join(src, "b.py"), CONFORMING);
    const ctx = context({ dryRun: true });

    await scan(ctx);
    await process(ctx);

    expect(await read("a.py")).toBe("x = 1\n\n@(d if c else e)\n@e[0]\ndef f(): pass\n");
    expect(ctx.archive).toBeNull();
    expect(ctx.jobs?.map((job) => job.state)).toEqual(["planned", "planned"]);
    expect(ctx.tracker.getStats().plannedChanges).toEqual([
      { path: "a.py", line: 3, binding: "_decorator_0", expression: "(d if c else e)" },
      { path: "a.py", line: 4, binding: "_decorator_1", expression: "e[0]" },
    ]);
  });

  it("rewrites in place without archiving when archiving is off", async () => {
    await writeFile(join(src, "a.py"), HOISTED);
    const ctx = context({}, false);

    await scan(ctx);
    await process(ctx);

    expect(await read("a.py")).toBe(HOISTED_OUTPUT);
    expect(ctx.archive).toBeNull();
    expect(ctx.jobs?.[0].history).not.toContain("archived");
  });

  it("leaves the original untouched when it cannot be archived", async () => {
    await writeFile(join(src, "a.py"), HOISTED);
    // a regular file where the archive root should be
    await writeFile(join(dir, "archive"), "occupied\n");
    const ctx = context();

    await scan(ctx);
    await process(ctx);

    expect(await read("a.py")).toBe(HOISTED);
    expect(ctx.jobs?.[0].history).toEqual(["pending", "parsed", "planned", "rewritten", "failed"]);
    expect(ctx.tracker.getFileIssues()).toHaveLength(1);
    expect(ctx.tracker.getFileIssues()[0]).toMatchObject({ path: "a.py", reason: "archive-error" });
    expect(ctx.tracker.getFileIssues()[0].details).toContain("cannot create archive");
    expect(ctx.tracker.hasFailures()).toBe(true);
  });

  it("requires the scanner to run first", async () => {
    await expect(process(context())).rejects.toThrow("Scanner must run before processor");
  });
});
