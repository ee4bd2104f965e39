/**
 * Bundle archive backend
 * One `<root>/archive-<stamp>-<id>.jsonl` file; every record line carries the
 * original bytes as base64.
 */

import { mkdir, rm } from "fs/promises";
import path from "node:path";
import { ArchiveError, RecoveryError } from "../utils/errors";
import { Journal, relativeRecordPath, sha256, verifyChecksum } from "./journal";
import {
  BundleEntrySchema,
  type Archive,
  type ArchiveListing,
  type ArchiveRecord,
  type BundleEntry,
} from "./types";

export class BundleArchive implements Archive {
  readonly format = "bundle";
  private readonly journal: Journal;
  private created: Promise<void> | null = null;
  private sequence = 0;
  // filled by list(); put() does not keep content in memory
  private contents = new Map<string, string>();

  constructor(
    readonly root: string,
    readonly location: string,
    readonly base: string,
  ) {
    this.journal = new Journal(location);
  }

  create(): Promise<void> {
    this.created ??= (async () => {
      try {
        await mkdir(path.dirname(this.location), { recursive: true });
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
    const content = Buffer.from(bytes).toString("base64");
    const entry: BundleEntry = {
      path: relative,
      checksum: sha256(bytes),
      size: bytes.length,
      archivedAt: new Date().toISOString(),
      destination: `${path.basename(this.location)}#${this.sequence++}`,
      content,
    };

    try {
      await this.journal.append(entry);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ArchiveError(`cannot archive ${sourcePath}: ${reason}`, { cause: error });
    }

    const { content: _content, ...record } = entry;
    return record;
  }

  async list(): Promise<ArchiveListing> {
    const { lines } = await this.journal.read(BundleEntrySchema);
    const listing: ArchiveListing = { records: [], invalid: [] };

    this.contents.clear();
    for (const { line, entry, reason } of lines) {
      if (!entry) {
        listing.invalid.push({ line, reason: reason ?? "invalid record" });
        continue;
      }
      const { content, ...record } = entry;
      this.contents.set(record.destination, content);
      listing.records.push(record);
    }
    return listing;
  }

  async get(record: ArchiveRecord): Promise<Buffer> {
    if (!this.contents.has(record.destination)) {
      await this.list();
    }

    const content = this.contents.get(record.destination);
    if (content === undefined) {
      throw new RecoveryError(
        `bundle holds no content for ${record.path}`,
        record.path,
        "missing-content",
      );
    }
    return Buffer.from(content, "base64");
  }

  verify(record: ArchiveRecord, bytes: Uint8Array): boolean {
    return verifyChecksum(record, bytes);
  }

  // Content lives inside the bundle, so it goes with the bundle in dispose()
  async remove(record: ArchiveRecord): Promise<void> {
    this.contents.delete(record.destination);
  }

  async dispose(): Promise<string[]> {
    await rm(this.location, { force: true });
    this.contents.clear();
    return [this.location];
  }
}
