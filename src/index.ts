/**
 * decorport library entry
 * Conversion of source text, classification of decorators and archive access
 * without going through the command line.
 */

export {
  convert,
  convertUnit,
  createSourceUnit,
  readSourceUnit,
  DEFAULT_CONVERT_OPTIONS,
} from "./rewrite/convert";
export type { ConvertOptions, ConversionResult } from "./rewrite/convert";
export type { Binding, Edit, RewritePlan } from "./rewrite/planner";

export { classify, describeExpression, isConforming } from "./grammar/classifier";
export type { Classification, DecoratorSite } from "./grammar/classifier";
export { SOURCE_VERSIONS, LATEST_SOURCE_VERSION, isSourceVersion } from "./grammar/versions";
export type { SourceVersion } from "./grammar/versions";

export { createArchive, openArchive, recover } from "./archive";
export type { Archive, ArchiveFormat, ArchiveRecord, RecoverOptions } from "./archive";

export {
  DecorportError,
  ParseError,
  UnsupportedConstructError,
  EmitError,
  ArchiveError,
  RecoveryError,
  ArgumentError,
  isDecorportError,
} from "./utils/errors";

export type { SourceUnit, DecorportConfig, CleanupLevel, RecoveryResult } from "./types";
