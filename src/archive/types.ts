/**
 * Archive type definitions with Zod schemas
 * Both backends keep an append-only JSON-lines journal: one header line, then
 * one line per archived file.
 */

import { z } from "zod";

export const ARCHIVE_FORMATS = ["directory", "bundle"] as const;
export type ArchiveFormat = (typeof ARCHIVE_FORMATS)[number];

export const JOURNAL_VERSION = 1;

export const ArchiveHeaderSchema = z.object({
  kind: z.literal("decorport-archive"),
  version: z.literal(JOURNAL_VERSION),
  format: z.enum(ARCHIVE_FORMATS),
  base: z.string().min(1), // absolute directory the record paths are relative to
  createdAt: z.string(),
});

export const ArchiveRecordSchema = z.object({
  path: z.string().min(1), // relative to the header's base, "/" separated
  checksum: z.string().regex(/^[0-9a-f]{64}$/, "checksum must be a sha256 hex digest"),
  size: z.number().int().nonnegative(),
  archivedAt: z.string(),
  destination: z.string().min(1), // where the bytes live inside the archive
});

export const BundleEntrySchema = ArchiveRecordSchema.extend({
  content: z.string(), // base64
});

export type ArchiveHeader = z.infer<typeof ArchiveHeaderSchema>;
export type ArchiveRecord = z.infer<typeof ArchiveRecordSchema>;
export type BundleEntry = z.infer<typeof BundleEntrySchema>;

/**
 * Records read back from an archive; lines that failed validation are
 * reported separately so recovery can skip them
 */
export interface ArchiveListing {
  records: ArchiveRecord[];
  invalid: Array<{ line: number; reason: string }>;
}

export interface Archive {
  readonly format: ArchiveFormat;
  readonly root: string; // archive root shared by all runs
  readonly location: string; // this run's directory or bundle file
  readonly base: string;

  /** Create the run's storage; safe to call more than once */
  create(): Promise<void>;
  /** Copy original bytes into the archive before they are overwritten */
  put(sourcePath: string, bytes: Uint8Array): Promise<ArchiveRecord>;
  list(): Promise<ArchiveListing>;
  get(record: ArchiveRecord): Promise<Buffer>;
  verify(record: ArchiveRecord, bytes: Uint8Array): boolean;
  /** Delete the stored copy of one record */
  remove(record: ArchiveRecord): Promise<void>;
  /** Delete the journal (and bundle) once nothing in it is needed */
  dispose(): Promise<string[]>;
}
