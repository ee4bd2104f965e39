/**
 * Python lexer built on chevrotain
 * Produces the flat token stream; line structure and indentation are handled
 * by the logical-line builder.
 */

import { createToken, Lexer } from "chevrotain";
import type { CustomPatternMatcherReturn, TokenType } from "chevrotain";
import { ParseError } from "../utils/errors";
import { LineIndex } from "./line-index";
import { allowsNestedFStrings, type SourceVersion } from "./versions";

export type TokenKind = "name" | "number" | "string" | "op" | "newline";

export interface Token {
  kind: TokenKind;
  value: string;
  start: number; // inclusive offset
  end: number; // exclusive offset
}

// ============================================================================
// String matching
// ============================================================================

const STRING_PREFIX = /^(?:[rRuUfFbB]|[fFbB][rR]|[rR][fFbB])?(?=['"])/;

/**
 * Find the end offset of the string literal starting at `offset`, or -1
 */
export function scanString(
  text: string,
  offset: number,
  nestedFStrings: boolean,
): number {
  const prefix = STRING_PREFIX.exec(text.slice(offset, offset + 3));
  if (!prefix) return -1;

  const isFString = /[fF]/.test(prefix[0]);
  let pos = offset + prefix[0].length;
  const quote = text[pos];
  const triple = text.startsWith(quote.repeat(3), pos);
  const closing = triple ? quote.repeat(3) : quote;
  pos += closing.length;

  while (pos < text.length) {
    const char = text[pos];

    if (char === "\\") {
      pos += 2;
      continue;
    }
    if (!triple && (char === "\n" || char === "\r")) {
      return -1;
    }
    if (text.startsWith(closing, pos)) {
      return pos + closing.length;
    }
    if (isFString && nestedFStrings && char === "{") {
      if (text[pos + 1] === "{") {
        pos += 2;
        continue;
      }
      pos = scanReplacementField(text, pos + 1);
      if (pos < 0) return -1;
      continue;
    }
    pos++;
  }

  return -1;
}

/**
 * Skip an f-string replacement field body, returning the offset after its `}`
 */
function scanReplacementField(text: string, offset: number): number {
  let depth = 0;
  let pos = offset;

  while (pos < text.length) {
    const char = text[pos];

    if (char === "'" || char === '"') {
      const end = scanString(text, prefixStart(text, pos, offset), true);
      if (end < 0) return -1;
      pos = end;
      continue;
    }
    if (char === "(" || char === "[" || char === "{") {
      depth++;
    } else if (char === ")" || char === "]") {
      depth--;
    } else if (char === "}") {
      if (depth === 0) return pos + 1;
      depth--;
    }
    pos++;
  }

  return -1;
}

/**
 * Offset of a string prefix glued to the quote at `quote`, if any
 */
function prefixStart(text: string, quote: number, lowerBound: number): number {
  for (const length of [2, 1]) {
    const start = quote - length;
    if (start < lowerBound) continue;
    if (!STRING_PREFIX.test(text.slice(start, quote + 1))) continue;
    if (start > lowerBound && /\w/.test(text[start - 1])) continue;
    return start;
  }
  return quote;
}

function stringMatcher(nestedFStrings: boolean) {
  return (text: string, offset: number): CustomPatternMatcherReturn | null => {
    const end = scanString(text, offset, nestedFStrings);
    if (end < 0) return null;
    const match: CustomPatternMatcherReturn = [text.slice(offset, end)];
    return match;
  };
}

// ============================================================================
// Token definitions
// ============================================================================

const Newline = createToken({
  name: "Newline",
  pattern: /\r\n|\r|\n/,
  line_breaks: true,
});

const Whitespace = createToken({
  name: "Whitespace",
  pattern: /[ \t\f\uFEFF]+/,
  group: Lexer.SKIPPED,
});

const Continuation = createToken({
  name: "Continuation",
  pattern: /\\(?:\r\n|\r|\n)/,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

const Comment = createToken({
  name: "Comment",
  pattern: /#[^\r\n]*/,
  group: Lexer.SKIPPED,
});

const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern:
    /0[xX](?:_?[0-9a-fA-F])+|0[oO](?:_?[0-7])+|0[bB](?:_?[01])+|(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?[jJ]?/,
});

const Name = createToken({
  name: "Name",
  pattern: /[A-Za-z_\u0080-\uFFFF][\w\u0080-\uFFFF]*/,
});

const Operator = createToken({
  name: "Operator",
  pattern:
    /\*\*=|\/\/=|>>=|<<=|\.\.\.|->|:=|\*\*|\/\/|>>|<<|<=|>=|==|!=|[-+*/%&|^@]=|[()[\]{},:;.@=+\-*/%&|^~<>!]/,
});

function createStringToken(nestedFStrings: boolean): TokenType {
  return createToken({
    name: nestedFStrings ? "StringLiteralPep701" : "StringLiteral",
    pattern: stringMatcher(nestedFStrings),
    start_chars_hint: ["'", '"', "r", "R", "u", "U", "f", "F", "b", "B"],
    line_breaks: true,
  });
}

const KIND_BY_TOKEN = new Map<TokenType, TokenKind>([
  [Newline, "newline"],
  [NumberLiteral, "number"],
  [Name, "name"],
  [Operator, "op"],
]);

// ============================================================================
// Lexer
// ============================================================================

interface PythonLexer {
  lexer: Lexer;
  stringToken: TokenType;
}

const lexers = new Map<boolean, PythonLexer>();

function getLexer(nestedFStrings: boolean): PythonLexer {
  const cached = lexers.get(nestedFStrings);
  if (cached) return cached;

  const stringToken = createStringToken(nestedFStrings);
  const lexer = new Lexer(
    [
      Newline,
      Continuation,
      Whitespace,
      Comment,
      stringToken,
      NumberLiteral,
      Name,
      Operator,
    ],
    { positionTracking: "onlyOffset", safeMode: true },
  );

  const created = { lexer, stringToken };
  lexers.set(nestedFStrings, created);
  return created;
}

/**
 * Tokenize Python source text
 * Throws ParseError on the first character no token matches.
 */
export function tokenize(text: string, version: SourceVersion): Token[] {
  const { lexer, stringToken } = getLexer(allowsNestedFStrings(version));
  const result = lexer.tokenize(text);

  if (result.errors.length > 0) {
    const error = result.errors[0];
    const { line, column } = new LineIndex(text).position(error.offset);
    const char = text[error.offset];
    const reason =
      char === "'" || char === '"'
        ? "unterminated string literal"
        : `unexpected character ${JSON.stringify(char)}`;
    throw new ParseError(reason, line, column);
  }

  return result.tokens.map((token) => ({
    kind:
      token.tokenType === stringToken
        ? "string"
        : (KIND_BY_TOKEN.get(token.tokenType) ?? "op"),
    value: token.image,
    start: token.startOffset,
    end: token.startOffset + token.image.length,
  }));
}
