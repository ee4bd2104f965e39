/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, readdir, rmdir, stat } from "fs/promises";
import { constants } from "node:fs";
import path from "node:path";

/**
 * Check if a file or directory exists
 */
export async function fileExists(target: string): Promise<boolean> {
  try {
    await access(target, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Remove `start` and its ancestors while they are empty, never going above `stop`
 * Returns the directories that were removed.
 */
export async function removeEmptyDirectories(start: string, stop: string): Promise<string[]> {
  const removed: string[] = [];
  const boundary = path.resolve(stop);
  let current = path.resolve(start);

  while (current === boundary || current.startsWith(boundary + path.sep)) {
    if (!(await isDirectory(current))) break;
    if ((await readdir(current)).length > 0) break;

    await rmdir(current);
    removed.push(current);

    if (current === boundary) break;
    current = path.dirname(current);
  }

  return removed;
}

/**
 * Remove every empty directory under `dir`, bottom-up, then `dir` itself if
 * it ended up empty
 */
export async function pruneEmptyTree(dir: string): Promise<string[]> {
  if (!(await isDirectory(dir))) return [];

  const removed: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    if (entry.isDirectory()) {
      removed.push(...(await pruneEmptyTree(path.join(dir, entry.name))));
    }
  }

  if ((await readdir(dir)).length === 0) {
    await rmdir(dir);
    removed.push(dir);
  }
  return removed;
}

/**
 * Deepest directory containing every given path
 */
export function commonDirectory(paths: readonly string[]): string {
  if (paths.length === 0) return process.cwd();

  const split = paths.map((p) => path.dirname(path.resolve(p)).split(path.sep));
  const shared: string[] = [];

  for (let index = 0; index < split[0].length; index++) {
    const segment = split[0][index];
    if (!split.every((parts) => parts[index] === segment)) break;
    shared.push(segment);
  }

  return shared.join(path.sep) || path.sep;
}
