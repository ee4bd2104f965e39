/**
 * Supported source grammar versions
 * Relaxed decorator expressions exist from 3.9 on, so nothing older is a valid
 * source dialect.
 */

export const SOURCE_VERSIONS = ["3.9", "3.10", "3.11", "3.12", "3.13"] as const;

export type SourceVersion = (typeof SOURCE_VERSIONS)[number];

export const LATEST_SOURCE_VERSION: SourceVersion =
  SOURCE_VERSIONS[SOURCE_VERSIONS.length - 1];

export function isSourceVersion(value: string): value is SourceVersion {
  return SOURCE_VERSIONS.some((version) => version === value);
}

/**
 * PEP 701: from 3.12 on, replacement fields may reuse the enclosing quote
 */
export function allowsNestedFStrings(version: SourceVersion): boolean {
  const [, minor] = version.split(".");
  return Number(minor) >= 12;
}
