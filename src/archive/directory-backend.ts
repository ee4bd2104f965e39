/**
 * Directory archive backend
 * `<root>/archive-<stamp>-<id>/files/<relative path>` mirrors each original,
 * `manifest.jsonl` beside it lists the records.
 */

import { mkdir, readFile, rm, writeFile } from "fs/promises";
import path from "node:path";
import { ArchiveError, RecoveryError } from "../utils/errors";
import { Journal, relativeRecordPath, sha256, verifyChecksum } from "./journal";
import {
  ArchiveRecordSchema,
  type Archive,
  type ArchiveListing,
  type ArchiveRecord,
} from "./types";

export const MANIFEST_FILE = "manifest.jsonl";
const FILES_DIR = "files";

export class DirectoryArchive implements Archive {
  readonly format = "directory";
  private readonly journal: Journal;
  private created: Promise<void> | null = null;

  constructor(
    readonly root: string,
    readonly location: string,
    readonly base: string,
  ) {
    this.journal = new Journal(path.join(location, MANIFEST_FILE));
  }

  create(): Promise<void> {
    this.created ??= (async () => {
      try {
        await mkdir(path.join(this.location, FILES_DIR), { recursive: true });
        await this.journal.create({
          kind: "decorport-archive",
          version: 1,
          format: this.format,
          base: this.base,
          createdAt: new Date().toISOString(),
        });
      } catch (error) {
        throw new ArchiveError(`cannot create archive ${this.location}`, { cause: error });
      }
    })();
    return this.created;
  }

  async put(sourcePath: string, bytes: Uint8Array): Promise<ArchiveRecord> {
    await this.create();

    const relative = relativeRecordPath(this.base, sourcePath);
    const destination = `${FILES_DIR}/${relative}`;
    const target = this.artifactPath(destination);
    const record: ArchiveRecord = {
      path: relative,
      checksum: sha256(bytes),
      size: bytes.length,
      archivedAt: new Date().toISOString(),
      destination,
    };

    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, bytes, { flag: "wx" });
      // read the copy back before anyone is allowed to overwrite the original
      if (!verifyChecksum(record, await readFile(target))) {
        throw new Error("archived copy does not match the original bytes");
      }
      await this.journal.append(record);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ArchiveError(`cannot archive ${sourcePath}: ${reason}`, { cause: error });
    }

    return record;
  }

  async list(): Promise<ArchiveListing> {
    const { lines } = await this.journal.read(ArchiveRecordSchema);
    const listing: ArchiveListing = { records: [], invalid: [] };

    for (const { line, entry, reason } of lines) {
      if (entry) listing.records.push(entry);
      else listing.invalid.push({ line, reason: reason ?? "invalid record" });
    }
    return listing;
  }

  async get(record: ArchiveRecord): Promise<Buffer> {
    try {
      return await readFile(this.artifactPath(record.destination));
    } catch (error) {
      throw new RecoveryError(
        `archived copy of ${record.path} is missing`,
        record.path,
        "missing-content",
        { cause: error },
      );
    }
  }

  verify(record: ArchiveRecord, bytes: Uint8Array): boolean {
    return verifyChecksum(record, bytes);
  }

  async remove(record: ArchiveRecord): Promise<void> {
    await rm(this.artifactPath(record.destination), { force: true });
  }

  async dispose(): Promise<string[]> {
    await rm(this.journal.file, { force: true });
    return [this.journal.file];
  }

  private artifactPath(destination: string): string {
    const target = path.resolve(this.location, ...destination.split("/"));
    const relative = path.relative(this.location, target);
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new ArchiveError(`archive destination ${destination} leaves ${this.location}`);
    }
    return target;
  }
}
