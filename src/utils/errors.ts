/**
 * Error taxonomy
 * Every failure the converter raises on purpose carries a `code` so the
 * tracker can group issues without string matching.
 */

export type ErrorCode =
  | "parse-error"
  | "unsupported-construct"
  | "emit-error"
  | "archive-error"
  | "recovery-error"
  | "argument-error";

export abstract class DecorportError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Source cannot be parsed under the selected grammar version
 */
export class ParseError extends DecorportError {
  readonly code = "parse-error";

  constructor(
    readonly reason: string,
    readonly line: number,
    readonly column: number,
    readonly filename: string | null = null,
  ) {
    super(`${filename ?? "<stdin>"}:${line}:${column}: ${reason}`);
  }

  /** Same error, attributed to a file */
  withFilename(filename: string | null): ParseError {
    return new ParseError(this.reason, this.line, this.column, filename);
  }
}

export class UnsupportedConstructError extends DecorportError {
  readonly code = "unsupported-construct";

  constructor(
    message: string,
    readonly line: number,
  ) {
    super(`line ${line}: ${message}`);
  }
}

/**
 * A rewrite plan does not fit the text it is applied to
 */
export class EmitError extends DecorportError {
  readonly code = "emit-error";
}

export class ArchiveError extends DecorportError {
  readonly code = "archive-error";
}

export type RecoveryFailure = "invalid-record" | "missing-content" | "checksum-mismatch" | "restore-failed";

/**
 * One archive record could not be restored; the rest of the recovery goes on
 */
export class RecoveryError extends DecorportError {
  readonly code = "recovery-error";

  constructor(
    message: string,
    readonly path: string,
    readonly failure: RecoveryFailure,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Invalid command-line or environment configuration; aborts the run
 */
export class ArgumentError extends DecorportError {
  readonly code = "argument-error";
}

export function isDecorportError(error: unknown): error is DecorportError {
  return error instanceof DecorportError;
}
