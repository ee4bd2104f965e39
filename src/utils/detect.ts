/**
 * Source conventions detection
 * Encoding (PEP 263 cookie), line separator and indentation step of a unit.
 */

import type { Linesep, SourceEncoding } from "../types/files";
import { ParseError } from "./errors";

const UTF8_BOM = [0xef, 0xbb, 0xbf];
const CODING_COOKIE = /^[ \t\f]*#.*?coding[:=][ \t]*([-\w.]+)/;
const BLANK_OR_COMMENT = /^[ \t\f]*(#.*)?$/;

const ENCODING_ALIASES: Record<string, SourceEncoding> = {
  "utf-8": "utf-8",
  utf8: "utf-8",
  "utf_8": "utf-8",
  ascii: "utf-8",
  "us-ascii": "utf-8",
  "latin-1": "latin1",
  latin1: "latin1",
  "latin_1": "latin1",
  "iso-8859-1": "latin1",
  "iso8859-1": "latin1",
  "iso_8859_1": "latin1",
  l1: "latin1",
};

export const LINESEPS: Record<"LF" | "CRLF" | "CR", Linesep> = {
  LF: "\n",
  CRLF: "\r\n",
  CR: "\r",
};

function hasBom(bytes: Uint8Array): boolean {
  return UTF8_BOM.every((byte, index) => bytes[index] === byte);
}

/**
 * Encoding declared by the first two lines, utf-8 when none is
 */
export function detectEncoding(bytes: Uint8Array, path: string | null = null): SourceEncoding {
  if (hasBom(bytes)) return "utf-8";

  // The cookie itself is ASCII, so a byte-per-char view is enough to find it
  const head = Buffer.from(bytes.subarray(0, 1024)).toString("latin1");
  const [first = "", second = ""] = head.split(/\r\n|\r|\n/, 2);
  const candidates = BLANK_OR_COMMENT.test(first) ? [first, second] : [first];

  for (const [index, line] of candidates.entries()) {
    const match = CODING_COOKIE.exec(line);
    if (!match) continue;

    const declared = match[1].toLowerCase();
    const encoding = ENCODING_ALIASES[declared];
    if (!encoding) {
      throw new ParseError(`unsupported source encoding '${match[1]}'`, index + 1, 1, path);
    }
    return encoding;
  }

  return "utf-8";
}

/**
 * Decode source bytes; a BOM stays in the text so writing it back keeps it
 */
export function decodeSource(
  bytes: Uint8Array,
  encoding: SourceEncoding,
  path: string | null = null,
): string {
  if (encoding === "latin1") {
    return Buffer.from(bytes).toString("latin1");
  }

  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      throw new ParseError("source is not valid utf-8", 1, 1, path);
    }
    throw error;
  }
}

export function encodeSource(text: string, encoding: SourceEncoding): Buffer {
  return Buffer.from(text, encoding === "latin1" ? "latin1" : "utf8");
}

/**
 * First line terminator in the text, LF when there is none
 */
export function detectLinesep(text: string): Linesep {
  const match = /\r\n|\r|\n/.exec(text);
  if (!match) return "\n";
  return match[0] === "\r\n" ? "\r\n" : match[0] === "\r" ? "\r" : "\n";
}

/**
 * Leading whitespace of the first indented code line, four spaces when none
 */
export function detectIndentation(text: string): string {
  for (const line of text.split(/\r\n|\r|\n/)) {
    const match = /^([ \t]+)[^ \t#\f]/.exec(line);
    if (match) return match[1];
  }
  return "    ";
}

/**
 * Explicit indentation setting to the unit repeated per block level
 */
export function indentUnit(indentation: number | "tab" | null): string | null {
  if (indentation === null) return null;
  return indentation === "tab" ? "\t" : " ".repeat(indentation);
}
