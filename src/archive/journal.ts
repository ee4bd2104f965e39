/**
 * Append-only JSON-lines journal
 * Appends are queued so concurrent workers never interleave partial lines.
 */

import { createHash } from "node:crypto";
import { appendFile, readFile, writeFile } from "fs/promises";
import path from "node:path";
import type { z } from "zod";
import { ArchiveError } from "../utils/errors";
import { ArchiveHeaderSchema, type ArchiveHeader, type ArchiveRecord } from "./types";

export function sha256(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}

export function verifyChecksum(record: ArchiveRecord, bytes: Uint8Array): boolean {
  return bytes.length === record.size && sha256(bytes) === record.checksum;
}

/**
 * Record path for a file: relative to base, "/" separated, never escaping base
 */
export function relativeRecordPath(base: string, sourcePath: string): string {
  const relative = path.relative(base, path.resolve(sourcePath));
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new ArchiveError(`${sourcePath} is outside the archive base ${base}`);
  }
  return relative.split(path.sep).join("/");
}

/**
 * Original location of a record, refusing paths that leave the base
 */
export function resolveRecordPath(base: string, recordPath: string): string {
  const target = path.resolve(base, ...recordPath.split("/"));
  const relative = path.relative(base, target);
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new ArchiveError(`record path ${recordPath} leaves the archive base`);
  }
  return target;
}

export interface JournalLine<T> {
  line: number;
  entry?: T;
  reason?: string;
}

export class Journal {
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly file: string) {}

  /** Write the header; fails if the journal already exists */
  async create(header: ArchiveHeader): Promise<void> {
    await writeFile(this.file, JSON.stringify(header) + "\n", { flag: "wx" });
  }

  append(entry: object): Promise<void> {
    const next = this.tail.then(() => appendFile(this.file, JSON.stringify(entry) + "\n"));
    // keep the queue going; the failure itself reaches the caller through `next`
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  async readHeader(): Promise<ArchiveHeader> {
    const { header } = await this.load();
    return header;
  }

  async read<T>(schema: z.ZodType<T>): Promise<{ header: ArchiveHeader; lines: JournalLine<T>[] }> {
    const { header, rest } = await this.load();

    const lines: JournalLine<T>[] = [];
    rest.forEach((text, index) => {
      if (text.trim() === "") return;
      const line = index + 2;
      const parsed = schema.safeParse(parseJson(text));
      if (parsed.success) {
        lines.push({ line, entry: parsed.data });
      } else {
        lines.push({ line, reason: parsed.error.issues.map((issue) => issue.message).join("; ") });
      }
    });

    return { header, lines };
  }

  private async load(): Promise<{ header: ArchiveHeader; rest: string[] }> {
    let content: string;
    try {
      content = await readFile(this.file, "utf-8");
    } catch (error) {
      throw new ArchiveError(`cannot read archive journal ${this.file}`, { cause: error });
    }

    const [first = "", ...rest] = content.split("\n");
    const header = ArchiveHeaderSchema.safeParse(parseJson(first));
    if (!header.success) {
      throw new ArchiveError(`${this.file} is not a decorport archive`);
    }
    return { header: header.data, rest };
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
