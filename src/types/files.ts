/**
 * File-related type definitions
 */

import type { SourceVersion } from "../grammar/versions";

export type Linesep = "\n" | "\r\n" | "\r";

export type SourceEncoding = "utf-8" | "latin1";

/**
 * One unit of source text, immutable once read
 * `path` is null for the standard stream unit.
 */
export interface SourceUnit {
  readonly path: string | null;
  readonly text: string;
  readonly encoding: SourceEncoding;
  readonly version: SourceVersion;
  readonly linesep: Linesep; // first line terminator in the text
  readonly indentation: string; // first indentation step in the text
}

export interface FileDescriptor {
  // Scanner fills these fields:
  sourcePath: string; // Absolute path to the source file
  relativePath: string; // Relative path from the scan base (for display)
}
