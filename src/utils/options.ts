/**
 * Option resolution
 * Layers environment variables and command-line flags over the loaded
 * configuration and freezes the result. Precedence, highest first:
 * flag > environment > custom config > user config > defaults.
 */

import { z } from "zod";
import { isSourceVersion, SOURCE_VERSIONS } from "../grammar/versions";
import type {
  CleanupLevel,
  DecorportConfig,
  LogLevel,
  PartialDecorportConfig,
  RunOptions,
} from "../types";
import { ConvertConfigSchema, DecorportConfigSchema } from "../types";
import { ArgumentError } from "./errors";
import { mergeConfig } from "./load-config";

// ============================================================================
// Raw inputs
// ============================================================================

export const CliOptionsSchema = z.object({
  quiet: z.boolean().optional(),
  concurrency: z.string().optional(),
  dryRun: z.boolean().optional(),
  simple: z.union([z.boolean(), z.string()]).optional(),
  archive: z.boolean().optional(),
  archivePath: z.string().optional(),
  archiveFormat: z.string().optional(),
  recover: z.string().optional(),
  removeArchive: z.boolean().optional(),
  removeArchiveDir: z.boolean().optional(),
  sourceVersion: z.string().optional(),
  linesep: z.string().optional(),
  indentation: z.string().optional(),
  pep8: z.boolean().optional(),
  bindingPrefix: z.string().optional(),
  config: z.string().optional(),
  stats: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

// Settings that can come from either a flag or an environment variable
interface RawSettings {
  quiet?: string | boolean;
  concurrency?: string;
  archive?: string | boolean;
  archivePath?: string;
  archiveFormat?: string;
  sourceVersion?: string;
  linesep?: string;
  indentation?: string;
  pep8?: string | boolean;
  bindingPrefix?: string;
}

type SettingKey = keyof RawSettings;

export const ENV_VARIABLES: Record<SettingKey, string> = {
  quiet: "DECORPORT_QUIET",
  concurrency: "DECORPORT_CONCURRENCY",
  archive: "DECORPORT_DO_ARCHIVE",
  archivePath: "DECORPORT_ARCHIVE_PATH",
  archiveFormat: "DECORPORT_ARCHIVE_FORMAT",
  sourceVersion: "DECORPORT_SOURCE_VERSION",
  linesep: "DECORPORT_LINESEP",
  indentation: "DECORPORT_INDENTATION",
  pep8: "DECORPORT_PEP8",
  bindingPrefix: "DECORPORT_BINDING_PREFIX",
};

const FLAGS: Record<SettingKey, string> = {
  quiet: "--quiet",
  concurrency: "--concurrency",
  archive: "--archive",
  archivePath: "--archive-path",
  archiveFormat: "--archive-format",
  sourceVersion: "--source-version",
  linesep: "--linesep",
  indentation: "--indentation",
  pep8: "--pep8",
  bindingPrefix: "--binding-prefix",
};

// ============================================================================
// Value parsers
// ============================================================================

const TRUE_VALUES = new Set(["1", "true", "yes", "y", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "n", "off"]);

export function parseBoolean(value: string | boolean, origin: string): boolean {
  if (typeof value === "boolean") return value;

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ArgumentError(`${origin}: expected a boolean, got '${value}'`);
}

export function parseConcurrency(value: string, origin: string): number {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed) && Number(trimmed) > 0) {
    return Number(trimmed);
  }
  throw new ArgumentError(`${origin}: expected a positive integer, got '${value}'`);
}

/**
 * `t`/`tab` for tabs, otherwise a positive number of spaces
 */
export function parseIndentation(value: string, origin: string): number | "tab" {
  const normalized = value.trim().toLowerCase();
  if (normalized === "t" || normalized === "tab") return "tab";
  if (/^\d+$/.test(normalized) && Number(normalized) > 0) return Number(normalized);
  throw new ArgumentError(
    `${origin}: expected a number of spaces or 't' for tabs, got '${value}'`,
  );
}

export function parseLinesep(value: string, origin: string): "LF" | "CRLF" | "CR" {
  const normalized = value.trim().toUpperCase();
  if (normalized === "LF" || normalized === "CRLF" || normalized === "CR") {
    return normalized;
  }
  throw new ArgumentError(`${origin}: expected one of LF, CRLF, CR, got '${value}'`);
}

function parseArchiveFormat(value: string, origin: string): "directory" | "bundle" {
  const normalized = value.trim().toLowerCase();
  if (normalized === "directory" || normalized === "bundle") return normalized;
  throw new ArgumentError(`${origin}: expected 'directory' or 'bundle', got '${value}'`);
}

function parseSourceVersion(value: string, origin: string) {
  const normalized = value.trim();
  if (isSourceVersion(normalized)) return normalized;
  throw new ArgumentError(
    `${origin}: unsupported source version '${value}' (expected one of ${SOURCE_VERSIONS.join(", ")})`,
  );
}

function parseBindingPrefix(value: string, origin: string): string {
  const result = ConvertConfigSchema.shape.bindingPrefix.safeParse(value);
  if (result.success) return result.data;
  throw new ArgumentError(`${origin}: ${result.error.issues.map((i) => i.message).join("; ")}`);
}

// ============================================================================
// Layers
// ============================================================================

export function readEnvironment(env: NodeJS.ProcessEnv): RawSettings {
  const raw: RawSettings = {};
  for (const [key, variable] of Object.entries(ENV_VARIABLES)) {
    const value = env[variable];
    if (value === undefined || value === "") continue;
    switch (key) {
      case "quiet":
      case "concurrency":
      case "archive":
      case "archivePath":
      case "archiveFormat":
      case "sourceVersion":
      case "linesep":
      case "indentation":
      case "pep8":
      case "bindingPrefix":
        raw[key] = value;
        break;
    }
  }
  return raw;
}

/**
 * Turn raw flag or environment values into a partial config layer
 */
export function toConfigLayer(
  raw: RawSettings,
  origin: (key: SettingKey) => string,
): PartialDecorportConfig {
  const layer: PartialDecorportConfig = {};
  const archive: NonNullable<PartialDecorportConfig["archive"]> = {};
  const convert: NonNullable<PartialDecorportConfig["convert"]> = {};

  if (raw.quiet !== undefined) layer.quiet = parseBoolean(raw.quiet, origin("quiet"));
  if (raw.concurrency !== undefined) {
    layer.concurrency = parseConcurrency(raw.concurrency, origin("concurrency"));
  }

  if (raw.archive !== undefined) archive.enabled = parseBoolean(raw.archive, origin("archive"));
  if (raw.archivePath !== undefined) {
    if (raw.archivePath.trim() === "") {
      throw new ArgumentError(`${origin("archivePath")}: archive path must not be empty`);
    }
    archive.path = raw.archivePath;
  }
  if (raw.archiveFormat !== undefined) {
    archive.format = parseArchiveFormat(raw.archiveFormat, origin("archiveFormat"));
  }

  if (raw.sourceVersion !== undefined) {
    convert.sourceVersion = parseSourceVersion(raw.sourceVersion, origin("sourceVersion"));
  }
  if (raw.linesep !== undefined) convert.linesep = parseLinesep(raw.linesep, origin("linesep"));
  if (raw.indentation !== undefined) {
    convert.indentation = parseIndentation(raw.indentation, origin("indentation"));
  }
  if (raw.pep8 !== undefined) convert.pep8 = parseBoolean(raw.pep8, origin("pep8"));
  if (raw.bindingPrefix !== undefined) {
    convert.bindingPrefix = parseBindingPrefix(raw.bindingPrefix, origin("bindingPrefix"));
  }

  if (Object.keys(archive).length > 0) layer.archive = archive;
  if (Object.keys(convert).length > 0) layer.convert = convert;
  return layer;
}

// ============================================================================
// Resolution
// ============================================================================

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === "object") deepFreeze(child);
  }
  return Object.freeze(value);
}

function cleanupLevel(cli: CliOptions): CleanupLevel {
  if (cli.removeArchiveDir) return "directory";
  if (cli.removeArchive) return "files";
  return "none";
}

function runOptions(cli: CliOptions, paths: string[]): RunOptions {
  const simple = cli.simple === undefined || cli.simple === false
    ? false
    : { file: typeof cli.simple === "string" ? cli.simple : null };
  const recover = cli.recover ?? null;
  const cleanup = cleanupLevel(cli);

  if (simple && paths.length > 0) {
    throw new ArgumentError("source paths cannot be combined with --simple; pass the file to --simple");
  }
  if (simple && recover !== null) {
    throw new ArgumentError("--simple cannot be combined with --recover");
  }
  if (cleanup !== "none" && recover === null) {
    throw new ArgumentError("--remove-archive and --remove-archive-dir require --recover");
  }
  if (!simple && recover === null && paths.length === 0) {
    throw new ArgumentError("no source paths given");
  }

  return {
    paths,
    dryRun: cli.dryRun ?? false,
    simple,
    recover,
    cleanup,
    statsPath: cli.stats ?? null,
    verbose: cli.verbose ?? false,
  };
}

export interface ResolvedOptions {
  readonly config: Readonly<DecorportConfig>;
  readonly run: Readonly<RunOptions>;
}

/**
 * Apply the environment and flag layers to the loaded configuration
 */
export function resolveConfig(
  base: DecorportConfig,
  cli: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): DecorportConfig {
  const envLayer = toConfigLayer(readEnvironment(env), (key) => ENV_VARIABLES[key]);
  const cliLayer = toConfigLayer(cli, (key) => FLAGS[key]);
  const merged = mergeConfig(mergeConfig(base, envLayer), cliLayer);

  const result = DecorportConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ArgumentError(`invalid configuration: ${details}`);
  }
  return result.data;
}

/**
 * Build the single immutable configuration for a run
 */
export function resolveOptions(
  base: DecorportConfig,
  cli: CliOptions,
  paths: string[],
  env: NodeJS.ProcessEnv = process.env,
): ResolvedOptions {
  const config = resolveConfig(base, cli, env);
  return deepFreeze({ config, run: runOptions(cli, paths) });
}

/**
 * Threshold for the logger: verbose wins, quiet keeps warnings and errors
 */
export function effectiveLogLevel(config: DecorportConfig, verbose: boolean): LogLevel {
  if (verbose) return "debug";
  if (config.quiet && (config.logging.level === "debug" || config.logging.level === "info")) {
    return "warn";
  }
  return config.logging.level;
}
