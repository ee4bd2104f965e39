/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { ZodError } from "zod";
import { isDecorportError, RecoveryError, type RecoveryFailure } from "./errors";

// ============================================================================
// Issue types
// ============================================================================

export type FileIssueReason =
  | "parse-error"
  | "unsupported-construct"
  | "emit-error"
  | "archive-error"
  | "read-error"
  | "write-error";

export type ResourceIssueReason = "schema-validation" | "invalid-json" | "read-error";

export type RecoveryIssueReason = RecoveryFailure;

export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export interface RecoveryIssue {
  type: "recovery";
  path: string;
  reason: RecoveryIssueReason;
  details: string;
}

export type Issue = FileIssue | ResourceIssue | RecoveryIssue;
export type IssueType = Issue["type"];

/** One hoisted binding a dry run would insert */
export interface PlannedChange {
  path: string;
  line: number;
  binding: string;
  expression: string;
}

export interface ProcessingStats {
  totalFiles: number;
  rewrittenFiles: number;
  unchangedFiles: number;
  failedFiles: number;
  archivedFiles: number;
  bindings: number;
  restoredRecords: number;
  skippedRecords: number;
  plannedChanges: PlannedChange[];
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => `${e.path.join(".") || "<root>"}: ${e.message}`).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  return { reason: "read-error", details: describe(error) };
}

function mapFileError(error: unknown, context: "read" | "write"): IssueInfo<FileIssueReason> {
  const details = describe(error);

  if (isDecorportError(error)) {
    switch (error.code) {
      case "parse-error":
      case "unsupported-construct":
      case "emit-error":
      case "archive-error":
        return { reason: error.code, details };
      default:
        break;
    }
  }

  return { reason: context === "write" ? "write-error" : "read-error", details };
}

function mapRecoveryError(error: unknown): IssueInfo<RecoveryIssueReason> {
  if (error instanceof RecoveryError) {
    return { reason: error.failure, details: error.message };
  }
  return { reason: "restore-failed", details: describe(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private rewrittenFiles = 0;
  private unchangedFiles = 0;
  private failedFiles = 0;
  private archivedFiles = 0;
  private bindings = 0;
  private restoredRecords = 0;
  private skippedRecords = 0;
  private plannedChanges: PlannedChange[] = [];
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementRewritten(bindings: number): void {
    this.rewrittenFiles++;
    this.bindings += bindings;
  }

  incrementUnchanged(): void {
    this.unchangedFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  incrementArchived(): void {
    this.archivedFiles++;
  }

  incrementRestored(): void {
    this.restoredRecords++;
  }

  incrementSkipped(): void {
    this.skippedRecords++;
  }

  trackPlannedChange(change: PlannedChange): void {
    this.plannedChanges.push(change);
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(
    path: string,
    error: unknown,
    type: IssueType,
    context: "read" | "write" = "read",
  ): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error, context);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
      case "recovery": {
        const { reason, details } = mapRecoveryError(error);
        this.issues.push({ type: "recovery", path, reason, details });
        break;
      }
    }
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[] {
    return this.issues;
  }

  getFileIssues(): FileIssue[] {
    return this.issues.filter((issue): issue is FileIssue => issue.type === "file");
  }

  getResourceIssues(): ResourceIssue[] {
    return this.issues.filter((issue): issue is ResourceIssue => issue.type === "resource");
  }

  getRecoveryIssues(): RecoveryIssue[] {
    return this.issues.filter((issue): issue is RecoveryIssue => issue.type === "recovery");
  }

  // ============================================================================
  // Results
  // ============================================================================

  /** Whether the run should exit with a non-zero status */
  hasFailures(): boolean {
    return this.failedFiles > 0 || this.skippedRecords > 0;
  }

  getStats(): ProcessingStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      rewrittenFiles: this.rewrittenFiles,
      unchangedFiles: this.unchangedFiles,
      failedFiles: this.failedFiles,
      archivedFiles: this.archivedFiles,
      bindings: this.bindings,
      restoredRecords: this.restoredRecords,
      skippedRecords: this.skippedRecords,
      plannedChanges: this.plannedChanges,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputPath: string): Promise<void> {
    const { issues, plannedChanges, ...summary } = this.getStats();

    const exported = {
      summary,
      issues: this.groupIssuesByTypeAndReason(issues),
      plannedChanges,
    };

    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(issues: Issue[]): Record<IssueType, Record<string, Issue[]>> {
    const grouped: Record<IssueType, Record<string, Issue[]>> = {
      file: {},
      resource: {},
      recovery: {},
    };

    for (const issue of issues) {
      const byReason = grouped[issue.type];
      (byReason[issue.reason] ??= []).push(issue);
    }

    return grouped;
  }
}
