/**
 * Archive factory
 * Creates a fresh run-scoped archive for a conversion, or opens an existing
 * one for recovery.
 */

import { readdir, stat } from "fs/promises";
import path from "node:path";
import type { ArchiveConfig } from "../types";
import { ArchiveError } from "../utils/errors";
import { IdGenerator } from "../utils/id-generator";
import { BundleArchive } from "./bundle-backend";
import { DirectoryArchive, MANIFEST_FILE } from "./directory-backend";
import { Journal } from "./journal";
import type { Archive } from "./types";

export type { Archive, ArchiveFormat, ArchiveListing, ArchiveRecord } from "./types";
export { recover } from "./recover";
export type { RecoverOptions } from "./recover";

async function existingRunNames(root: string): Promise<string[]> {
  try {
    return await readdir(root);
  } catch {
    return [];
  }
}

/**
 * New archive for one conversion run; nothing is written until the first put
 */
export async function createArchive(config: ArchiveConfig, base: string): Promise<Archive> {
  const root = path.resolve(config.path);
  const name = IdGenerator.fromRunNames(await existingRunNames(root)).runName();

  return config.format === "bundle"
    ? new BundleArchive(root, path.join(root, `${name}.jsonl`), base)
    : new DirectoryArchive(root, path.join(root, name), base);
}

/**
 * Open a run directory (holding a manifest) or a bundle file
 */
export async function openArchive(location: string): Promise<Archive> {
  const resolved = path.resolve(location);

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(resolved)).isDirectory();
  } catch (error) {
    throw new ArchiveError(`archive ${location} does not exist`, { cause: error });
  }

  const journalFile = isDirectory ? path.join(resolved, MANIFEST_FILE) : resolved;
  const header = await new Journal(journalFile).readHeader();
  const root = path.dirname(resolved);

  if (isDirectory && header.format === "directory") {
    return new DirectoryArchive(root, resolved, header.base);
  }
  if (!isDirectory && header.format === "bundle") {
    return new BundleArchive(root, resolved, header.base);
  }
  throw new ArchiveError(`${location} holds a ${header.format} archive in the wrong layout`);
}
