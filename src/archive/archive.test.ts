import { appendFile, mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { basename, join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createArchive, openArchive, recover } from "./index";
import { MANIFEST_FILE } from "./directory-backend";
import type { ArchiveConfig } from "../types";
import { ArchiveError } from "../utils/errors";
import { fileExists } from "../utils/fs";

let dir: string;
let src: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "decorport-archive-"));
  src = join(dir, "src");
  await mkdir(join(src, "pkg"), { recursive: true });
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function archiveConfig(format: ArchiveConfig["format"]): ArchiveConfig {
  return { enabled: true, path: join(dir, "archive"), format };
}

async function source(relative: string, text: string): Promise<string> {
  const file = join(src, relative);
  await writeFile(file, text);
  return file;
}

describe("directory archive", () => {
  it("creates nothing until the first file is archived", async () => {
    const archive = await createArchive(archiveConfig("directory"), src);

    expect(basename(archive.location)).toMatch(/^archive-\d{8}T\d{6}-[0-9a-z]{4}$/);
    expect(await fileExists(archive.location)).toBe(false);
  });

  it("mirrors the original and journals a record", async () => {
    const file = await source("pkg/a.py", "x = 1\n");
    const archive = await createArchive(archiveConfig("directory"), src);

    const record = await archive.put(file, await readFile(file));

    expect(record).toMatchObject({ path: "pkg/a.py", size: 6, destination: "files/pkg/a.py" });
    expect(await readFile(join(archive.location, "files", "pkg", "a.py"), "utf-8")).toBe("x = 1\n");
    expect(await archive.list()).toEqual({ records: [record], invalid: [] });
  });

  it("keeps every concurrent append on its own line", async () => {
    const files = await Promise.all(
      ["a", "b", "c", "d", "e"].map((name) => source(`${name}.py`, `${name} = 1\n`)),
    );
    const archive = await createArchive(archiveConfig("directory"), src);

    await Promise.all(files.map(async (file) => archive.put(file, await readFile(file))));

    const listing = await archive.list();
    expect(listing.invalid).toEqual([]);
    expect(listing.records.map((record) => record.path).sort()).toEqual([
      "a.py",
      "b.py",
      "c.py",
      "d.py",
      "e.py",
    ]);
  });

  it("refuses files outside the base", async () => {
    const outside = join(dir, "elsewhere.py");
    await writeFile(outside, "y = 2\n");
    const archive = await createArchive(archiveConfig("directory"), src);

    await expect(archive.put(outside, await readFile(outside))).rejects.toThrow(ArchiveError);
  });

  it("gives each run its own location", async () => {
    const first = await createArchive(archiveConfig("directory"), src);
    const file = await source("a.py", "a = 1\n");
    await first.put(file, await readFile(file));

    const second = await createArchive(archiveConfig("directory"), src);
    expect(second.location).not.toBe(first.location);
  });
});

describe("bundle archive", () => {
  it("stores numbered entries in a single file", async () => {
    const a = await source("a.py", "a = 1\n");
    const b = await source("pkg/b.py", "b = 2\n");
    const archive = await createArchive(archiveConfig("bundle"), src);

    const first = await archive.put(a, await readFile(a));
    const second = await archive.put(b, await readFile(b));

    const name = basename(archive.location);
    expect(name).toMatch(/^archive-\d{8}T\d{6}-[0-9a-z]{4}\.jsonl$/);
    expect(first.destination).toBe(`${name}#0`);
    expect(second.destination).toBe(`${name}#1`);
    expect(second.path).toBe("pkg/b.py");

    const reopened = await openArchive(archive.location);
    expect(reopened.format).toBe("bundle");
    expect((await reopened.get(second)).toString("utf-8")).toBe("b = 2\n");
  });

  it("reads content back from the bundle file only", async () => {
    const a = await source("a.py", "a = 1\n");
    const archive = await createArchive(archiveConfig("bundle"), src);
    const record = await archive.put(a, await readFile(a));

    const [header] = (await readFile(archive.location, "utf-8")).split("\n");
    await writeFile(archive.location, `${header}\n`);

    await expect(archive.get(record)).rejects.toThrow(`bundle holds no content for ${record.path}`);
  });
});

describe("openArchive", () => {
  it("rejects a missing location", async () => {
    await expect(openArchive(join(dir, "nope"))).rejects.toThrow(/does not exist$/);
  });

  it("rejects a file that is not a journal", async () => {
    const file = join(dir, "notes.jsonl");
    await writeFile(file, "hello\n");
    await expect(openArchive(file)).rejects.toThrow(`${file} is not a decorport archive`);
  });
});

describe("recover", () => {
  it("restores byte-identical originals and removes the emptied archive", async () => {
    const original = "@(a if c else b)\r\ndef f(): pass\r\n";
    const file = await source("pkg/a.py", original);
    const archive = await createArchive(archiveConfig("directory"), src);
    await archive.put(file, await readFile(file));
    await writeFile(file, "rewritten\n");

    const result = await recover(await openArchive(archive.location), { cleanup: "directory" });

    expect(await readFile(file, "utf-8")).toBe(original);
    expect(result.restored.map((record) => record.path)).toEqual(["pkg/a.py"]);
    expect(result.skipped).toEqual([]);
    expect(await fileExists(archive.location)).toBe(false);
    expect(await fileExists(archive.root)).toBe(false);
  });

  it("restores a bundle and deletes it", async () => {
    const file = await source("a.py", "a = 1\n");
    const archive = await createArchive(archiveConfig("bundle"), src);
    await archive.put(file, await readFile(file));
    await rm(file);

    const result = await recover(await openArchive(archive.location), { cleanup: "directory" });

    expect(await readFile(file, "utf-8")).toBe("a = 1\n");
    expect(result.removed).toContain(archive.location);
    expect(await fileExists(archive.root)).toBe(false);
  });

  it("leaves the archive alone without a cleanup level", async () => {
    const file = await source("a.py", "a = 1\n");
    const archive = await createArchive(archiveConfig("directory"), src);
    await archive.put(file, await readFile(file));

    const result = await recover(await openArchive(archive.location), { cleanup: "none" });

    expect(result.removed).toEqual([]);
    expect(await fileExists(join(archive.location, MANIFEST_FILE))).toBe(true);
  });

  it("skips a corrupted record and restores the rest", async () => {
    const good = await source("good.py", "good = 1\n");
    const bad = await source("bad.py", "bad = 1\n");
    const archive = await createArchive(archiveConfig("directory"), src);
    await archive.put(good, await readFile(good));
    await archive.put(bad, await readFile(bad));
    await writeFile(join(archive.location, "files", "bad.py"), "tampered\n");
    await writeFile(good, "changed\n");
    await writeFile(bad, "changed\n");

    const skipped: string[] = [];
    const result = await recover(await openArchive(archive.location), {
      cleanup: "files",
      onSkipped: (error) => skipped.push(error.failure),
    });

    expect(await readFile(good, "utf-8")).toBe("good = 1\n");
    expect(await readFile(bad, "utf-8")).toBe("changed\n");
    expect(skipped).toEqual(["checksum-mismatch"]);
    expect(result.skipped[0].message).toBe("checksum mismatch for bad.py, archived copy is corrupted");
    // the journal still describes the skipped record
    expect(await fileExists(join(archive.location, MANIFEST_FILE))).toBe(true);
    expect(await fileExists(join(archive.location, "files", "good.py"))).toBe(false);
  });

  it("reports invalid journal lines by line number", async () => {
    const file = await source("a.py", "a = 1\n");
    const archive = await createArchive(archiveConfig("directory"), src);
    await archive.put(file, await readFile(file));
    await appendFile(join(archive.location, MANIFEST_FILE), "not json\n");

    const result = await recover(await openArchive(archive.location), { cleanup: "none" });

    expect(result.restored).toHaveLength(1);
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0].path).toBe("line 3");
    expect(result.skipped[0].failure).toBe("invalid-record");
    expect(result.skipped[0].message).toMatch(/^invalid record on line 3: /);
  });
});
