/**
 * Central type exports
 */

// Configuration
export type {
  ArchiveConfig,
  ConvertConfig,
  ScanConfig,
  LoggingConfig,
  LogLevel,
  DecorportConfig,
  PartialDecorportConfig,
} from "./config";
export {
  ConvertConfigSchema,
  DecorportConfigSchema,
  PartialDecorportConfigSchema,
} from "./config";

// Files
export type { Linesep, SourceEncoding, SourceUnit, FileDescriptor } from "./files";

// Context
export type {
  ConversionContext,
  RunOptions,
  CleanupLevel,
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
} from "./context";

// Pipeline
export type { JobState, ConversionJob, RecoveryResult } from "./pipeline";

// Tracker
export { Tracker } from "../utils/tracker";
