/**
 * Pipeline module data types
 */

import type { ArchiveRecord } from "../archive/types";
import type { RewritePlan } from "../rewrite/planner";
import type { RecoveryError } from "../utils/errors";
import type { FileDescriptor } from "./files";

// ============================================================================
// Processor Module
// ============================================================================

export type JobState =
  | "pending"
  | "parsed"
  | "planned"
  | "no-change"
  | "rewritten"
  | "archived"
  | "written"
  | "done"
  | "failed";

export interface ConversionJob {
  descriptor: FileDescriptor;
  state: JobState;
  history: JobState[]; // every state entered, in order
  plan?: RewritePlan;
  record?: ArchiveRecord;
  error?: unknown;
}

// ============================================================================
// Recovery Module
// ============================================================================

export interface RecoveryResult {
  restored: ArchiveRecord[];
  skipped: RecoveryError[];
  removed: string[]; // archive artifacts and directories deleted by cleanup
}
