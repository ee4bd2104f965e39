/**
 * Utility exports
 */

// Filesystem utilities
export {
  fileExists,
  isDirectory,
  removeEmptyDirectories,
  pruneEmptyTree,
  commonDirectory,
} from "./fs";

// Source conventions
export {
  LINESEPS,
  detectEncoding,
  decodeSource,
  encodeSource,
  detectLinesep,
  detectIndentation,
  indentUnit,
} from "./detect";

// Config utilities
export { loadConfig, getUserConfigPath, loadDefaultConfig, mergeConfig } from "./load-config";
export type { ConfigError } from "./load-config";
export {
  CliOptionsSchema,
  ENV_VARIABLES,
  resolveConfig,
  resolveOptions,
  effectiveLogLevel,
} from "./options";
export type { CliOptions, ResolvedOptions } from "./options";

// Concurrency
export { runPool, defaultPoolSize } from "./pool";

// Errors
export {
  DecorportError,
  ParseError,
  UnsupportedConstructError,
  EmitError,
  ArchiveError,
  RecoveryError,
  ArgumentError,
  isDecorportError,
} from "./errors";

// Classes
export { IdGenerator } from "./id-generator";
export { Logger } from "./logger";
export { Tracker } from "./tracker";
