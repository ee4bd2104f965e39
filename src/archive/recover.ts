/**
 * Recovery
 * Restores every valid record of an archive to its original path. A bad
 * record is skipped and reported; the others are still restored.
 */

import { mkdir, writeFile } from "fs/promises";
import path from "node:path";
import type { CleanupLevel, RecoveryResult } from "../types";
import { ArchiveError, RecoveryError } from "../utils/errors";
import { pruneEmptyTree, removeEmptyDirectories } from "../utils/fs";
import { resolveRecordPath } from "./journal";
import type { Archive, ArchiveRecord } from "./types";

export interface RecoverOptions {
  cleanup: CleanupLevel;
  onRestored?: (record: ArchiveRecord, target: string) => void;
  onSkipped?: (error: RecoveryError) => void;
}

async function restoreRecord(archive: Archive, record: ArchiveRecord): Promise<string> {
  let target: string;
  try {
    target = resolveRecordPath(archive.base, record.path);
  } catch (error) {
    if (error instanceof ArchiveError) {
      throw new RecoveryError(error.message, record.path, "invalid-record", { cause: error });
    }
    throw error;
  }

  const bytes = await archive.get(record);
  if (!archive.verify(record, bytes)) {
    throw new RecoveryError(
      `checksum mismatch for ${record.path}, archived copy is corrupted`,
      record.path,
      "checksum-mismatch",
    );
  }

  try {
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, bytes);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RecoveryError(`cannot restore ${target}: ${reason}`, record.path, "restore-failed", {
      cause: error,
    });
  }

  return target;
}

export async function recover(archive: Archive, options: RecoverOptions): Promise<RecoveryResult> {
  const result: RecoveryResult = { restored: [], skipped: [], removed: [] };
  const skip = (error: RecoveryError) => {
    result.skipped.push(error);
    options.onSkipped?.(error);
  };

  const listing = await archive.list();
  for (const { line, reason } of listing.invalid) {
    skip(new RecoveryError(`invalid record on line ${line}: ${reason}`, `line ${line}`, "invalid-record"));
  }

  for (const record of listing.records) {
    try {
      const target = await restoreRecord(archive, record);
      result.restored.push(record);
      options.onRestored?.(record, target);
    } catch (error) {
      if (!(error instanceof RecoveryError)) throw error;
      skip(error);
    }
  }

  if (options.cleanup === "none") return result;

  for (const record of result.restored) {
    await archive.remove(record);
    result.removed.push(record.destination);
  }

  // skipped records still need the journal that describes them
  if (result.skipped.length === 0) {
    result.removed.push(...(await archive.dispose()));
  }

  if (options.cleanup === "directory") {
    if (archive.format === "directory") {
      result.removed.push(...(await pruneEmptyTree(archive.location)));
    }
    result.removed.push(...(await removeEmptyDirectories(archive.root, archive.root)));
  }

  return result;
}
