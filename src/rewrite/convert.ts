/**
 * Converter
 * Classifier → Planner → Emitter for a single source unit. Pure: no file
 * system access, the orchestrator hands in bytes and takes text back.
 */

import { classify, type Classification } from "../grammar/classifier";
import { LATEST_SOURCE_VERSION, type SourceVersion } from "../grammar/versions";
import type { ConvertConfig, Linesep, SourceEncoding, SourceUnit } from "../types";
import {
  LINESEPS,
  decodeSource,
  detectEncoding,
  detectIndentation,
  detectLinesep,
  indentUnit,
} from "../utils/detect";
import { emit, type EmitStyle } from "./emitter";
import { planRewrite, type RewritePlan } from "./planner";

export interface ConvertOptions {
  version: SourceVersion;
  linesep: Linesep | null;
  indentUnit: string | null;
  pep8: boolean;
  bindingPrefix: string;
}

export interface ConversionResult {
  unit: SourceUnit;
  classification: Classification;
  plan: RewritePlan;
  output: string;
  changed: boolean;
}

export const DEFAULT_CONVERT_OPTIONS: Readonly<ConvertOptions> = Object.freeze({
  version: LATEST_SOURCE_VERSION,
  linesep: null,
  indentUnit: null,
  pep8: true,
  bindingPrefix: "_decorator",
});

export function convertOptionsFromConfig(config: ConvertConfig): ConvertOptions {
  return {
    version: config.sourceVersion,
    linesep: config.linesep === null ? null : LINESEPS[config.linesep],
    indentUnit: indentUnit(config.indentation),
    pep8: config.pep8,
    bindingPrefix: config.bindingPrefix,
  };
}

export function createSourceUnit(
  text: string,
  path: string | null,
  version: SourceVersion,
  encoding: SourceEncoding = "utf-8",
): SourceUnit {
  return Object.freeze({
    path,
    text,
    encoding,
    version,
    linesep: detectLinesep(text),
    indentation: detectIndentation(text),
  });
}

/**
 * Decode raw file bytes into a source unit
 */
export function readSourceUnit(
  bytes: Uint8Array,
  path: string | null,
  version: SourceVersion,
): SourceUnit {
  const encoding = detectEncoding(bytes, path);
  return createSourceUnit(decodeSource(bytes, encoding, path), path, version, encoding);
}

export function emitStyle(unit: SourceUnit, options: ConvertOptions): EmitStyle {
  return { linesep: options.linesep ?? unit.linesep };
}

export function convertUnit(unit: SourceUnit, options: ConvertOptions): ConversionResult {
  const classification = classify(unit);
  const plan = planRewrite(classification, unit.text, options);

  if (plan.edits.length === 0) {
    return { unit, classification, plan, output: unit.text, changed: false };
  }

  const output = emit(unit.text, plan, emitStyle(unit, options));
  return { unit, classification, plan, output, changed: output !== unit.text };
}

/**
 * Convert source text to the restricted decorator grammar
 *
 * @example
 * convert("@(a if c else b)\ndef f(): pass\n", { pep8: false })
 * // "_decorator_0 = (a if c else b)\n@_decorator_0\ndef f(): pass\n"
 */
export function convert(
  text: string,
  options: Partial<ConvertOptions> = {},
  path: string | null = null,
): string {
  const resolved = { ...DEFAULT_CONVERT_OPTIONS, ...options };
  return convertUnit(createSourceUnit(text, path, resolved.version), resolved).output;
}
