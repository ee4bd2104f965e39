/**
 * Scanner Module
 * Discovers source files from the positional paths and builds file descriptors
 */

import glob from "fast-glob";
import { realpath } from "fs/promises";
import path from "node:path";
import { commonDirectory, fileExists, isDirectory } from "../utils";
import type { ConversionContext, FileDescriptor } from "../types";

function isInside(file: string, directory: string): boolean {
  const relative = path.relative(directory, file);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

// Keyed by real path: a symlink and its target are one file, named by the
// first path in sort order
async function addFile(found: Map<string, string>, file: string): Promise<void> {
  // a dangling link keeps its own path; reading it fails later as a job error
  const real = await realpath(file).catch(() => file);
  const known = found.get(real);
  if (known === undefined || file.localeCompare(known) < 0) {
    found.set(real, file);
  }
}

/**
 * Scans the given paths for source files and populates context
 *
 * Writes to context:
 * - files: sorted, de-duplicated descriptors
 * - base: deepest directory holding every file
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const { config, run, logger } = ctx;
  const archiveRoot = path.resolve(config.archive.path);
  const patterns = config.scan.extensions.map((extension) => `**/*${extension}`);
  const found = new Map<string, string>();

  for (const input of run.paths) {
    const resolved = path.resolve(input);

    if (await isDirectory(resolved)) {
      // Discover sources using fast-glob
      const matches = await glob(patterns, {
        cwd: resolved,
        absolute: true,
        onlyFiles: true,
        ignore: config.scan.ignore,
      });
      for (const match of matches) await addFile(found, path.normalize(match));
    } else if (await fileExists(resolved)) {
      // Explicitly named files are taken whatever their extension
      await addFile(found, resolved);
    } else {
      logger.warn(`No such file or directory: ${input}`);
    }
  }

  const sourcePaths = [...found.values()]
    .filter((file) => !isInside(file, archiveRoot))
    .sort((a, b) => a.localeCompare(b));

  const base = commonDirectory(sourcePaths);
  const files: FileDescriptor[] = sourcePaths.map((sourcePath) => ({
    sourcePath,
    relativePath: path.relative(base, sourcePath),
  }));

  logger.debug(`Found ${files.length} source file(s) under ${base}`);

  // Write to context
  ctx.files = files;
  ctx.base = base;
}
