/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";
import { SOURCE_VERSIONS } from "../grammar/versions";

// Zod schemas
export const ArchiveConfigSchema = z.object({
  enabled: z.boolean(),
  path: z.string().min(1),
  // "directory": mirrored files + manifest, "bundle": one JSON-lines file
  format: z.enum(["directory", "bundle"]),
});

export const ConvertConfigSchema = z.object({
  sourceVersion: z.enum(SOURCE_VERSIONS),
  // null means detected per file
  linesep: z.enum(["LF", "CRLF", "CR"]).nullable(),
  // spaces per level or "tab"; null means the definition's own indentation is reused
  indentation: z.union([z.number().int().positive(), z.literal("tab")]).nullable(),
  pep8: z.boolean(),
  bindingPrefix: z
    .string()
    .regex(/^[A-Za-z_]\w*$/, "binding prefix must be a valid identifier")
    .refine((value) => !value.startsWith("__"), {
      message: "binding prefix must not start with a double underscore",
    }),
});

export const ScanConfigSchema = z.object({
  extensions: z.array(z.string().regex(/^\.\w+$/)).min(1),
  ignore: z.array(z.string()),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const DecorportConfigSchema = z.object({
  quiet: z.boolean(),
  // null means one worker per available CPU
  concurrency: z.number().int().positive().nullable(),
  archive: ArchiveConfigSchema,
  convert: ConvertConfigSchema,
  scan: ScanConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialDecorportConfigSchema = DecorportConfigSchema.partial().extend({
  archive: ArchiveConfigSchema.partial().optional(),
  convert: ConvertConfigSchema.partial().optional(),
  scan: ScanConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type ArchiveConfig = z.infer<typeof ArchiveConfigSchema>;
export type ConvertConfig = z.infer<typeof ConvertConfigSchema>;
export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type DecorportConfig = z.infer<typeof DecorportConfigSchema>;
export type PartialDecorportConfig = z.infer<typeof PartialDecorportConfigSchema>;
export type LogLevel = LoggingConfig["level"];
