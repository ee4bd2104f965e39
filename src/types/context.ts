/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { DecorportConfig } from "./config";
import type { FileDescriptor } from "./files";
import type { ConversionJob, RecoveryResult } from "./pipeline";
import type { Archive } from "../archive/types";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  RecoveryIssue,
  FileIssueReason,
  ResourceIssueReason,
  RecoveryIssueReason,
  PlannedChange,
  ProcessingStats,
} from "../utils/tracker";

// "files" drops restored archive artifacts, "directory" also prunes emptied directories
export type CleanupLevel = "none" | "files" | "directory";

/**
 * Per-invocation switches that are not part of the persisted configuration
 */
export interface RunOptions {
  paths: string[];
  dryRun: boolean;
  simple: false | { file: string | null }; // file null reads standard input
  recover: string | null;
  cleanup: CleanupLevel;
  statsPath: string | null;
  verbose: boolean;
}

export interface ConversionContext {
  // Input - provided at initialization, frozen
  config: Readonly<DecorportConfig>;
  run: Readonly<RunOptions>;

  tracker: Tracker;
  logger: Logger;

  // Called after every finished job
  onProgress?: (completed: number, total: number) => void;

  files?: FileDescriptor[]; // Scanner output
  base?: string; // Common ancestor of all files, archive paths are relative to it
  jobs?: ConversionJob[]; // Processor output
  archive?: Archive | null; // Processor output, null when archiving is off
  recovery?: RecoveryResult; // Recovery output
}
