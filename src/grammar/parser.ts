/**
 * Module parser
 * Groups tokens into logical lines, checks bracket and indentation structure
 * and builds the statement tree. Only decorators are parsed down to
 * expressions; other statements keep their line.
 */

import { ParseError } from "../utils/errors";
import type {
  Decorator,
  DefinitionKeyword,
  DefinitionStatement,
  LogicalLine,
  Module,
  Statement,
  Suite,
} from "./ast";
import { parseExpression } from "./expression-parser";
import { tokenize, type Token } from "./lexer";
import { LineIndex } from "./line-index";
import type { SourceVersion } from "./versions";

interface RawLine extends LogicalLine {
  tokens: Token[];
}

const CLOSING: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

// ============================================================================
// Logical lines
// ============================================================================

function splitLogicalLines(text: string, tokens: Token[], lines: LineIndex): RawLine[] {
  const result: RawLine[] = [];
  const brackets: Token[] = [];
  let current: Token[] = [];

  const flush = () => {
    if (current.length === 0) return;
    const first = current[0];
    const last = current[current.length - 1];
    const { line } = lines.position(first.start);
    const lineStart = lines.lineStart(line);
    result.push({
      tokens: current,
      line,
      lineStart,
      indent: text.slice(lineStart, first.start).replace(/\uFEFF/g, ""),
      span: { start: first.start, end: last.end },
    });
    current = [];
  };

  for (const token of tokens) {
    if (token.kind === "newline") {
      if (brackets.length === 0) flush();
      continue;
    }

    if (token.kind === "op") {
      if (token.value === "(" || token.value === "[" || token.value === "{") {
        brackets.push(token);
      } else if (token.value in CLOSING) {
        const open = brackets.pop();
        if (!open || open.value !== CLOSING[token.value]) {
          const { line, column } = lines.position(token.start);
          const reason = open
            ? `closing parenthesis '${token.value}' does not match opening parenthesis '${open.value}'`
            : `unmatched '${token.value}'`;
          throw new ParseError(reason, line, column);
        }
      }
    }

    current.push(token);
  }

  if (brackets.length > 0) {
    const open = brackets[brackets.length - 1];
    const { line, column } = lines.position(open.start);
    throw new ParseError(`'${open.value}' was never closed`, line, column);
  }

  flush();
  return result;
}

// ============================================================================
// Statement tree
// ============================================================================

class ModuleParser {
  private index = 0;

  constructor(
    private readonly lines: RawLine[],
    private readonly positions: LineIndex,
  ) {}

  parse(): Suite {
    const suite = this.parseSuite("", 0, []);
    if (this.index < this.lines.length) {
      throw this.error("unindent does not match any outer indentation level", this.lines[this.index]);
    }
    return suite;
  }

  private error(reason: string, line: RawLine): ParseError {
    const { column } = this.positions.position(line.span.start);
    return new ParseError(reason, line.line, column);
  }

  private parseSuite(indent: string, depth: number, outer: string[]): Suite {
    const statements: Statement[] = [];

    while (this.index < this.lines.length) {
      const line = this.lines[this.index];

      if (line.indent !== indent) {
        if (line.indent.length > indent.length && line.indent.startsWith(indent)) {
          throw this.error("unexpected indent", line);
        }
        if (indent.startsWith(line.indent) && outer.includes(line.indent)) {
          break;
        }
        throw this.error(
          line.indent.length < indent.length
            ? "unindent does not match any outer indentation level"
            : "inconsistent use of tabs and spaces in indentation",
          line,
        );
      }

      statements.push(this.parseStatement(indent, depth, outer));
    }

    return { depth, indent, statements };
  }

  private parseStatement(indent: string, depth: number, outer: string[]): Statement {
    const line = this.lines[this.index];
    const first = line.tokens[0];

    if (first.kind === "op" && first.value === "@") {
      return this.parseDecorated(indent, depth, outer);
    }

    const definition = this.definitionKeyword(line);
    if (definition) {
      return this.parseDefinition(definition, [], indent, depth, outer);
    }

    this.index++;
    if (!opensBlock(line)) {
      return { kind: "simple", line };
    }
    return {
      kind: "compound",
      header: line,
      keyword: first.value,
      body: this.parseBody(line, indent, depth, outer),
    };
  }

  private parseDecorated(indent: string, depth: number, outer: string[]): Statement {
    const decorators: Decorator[] = [];

    while (this.index < this.lines.length) {
      const line = this.lines[this.index];
      const first = line.tokens[0];
      if (line.indent !== indent || first.kind !== "op" || first.value !== "@") break;

      decorators.push({
        line,
        at: { start: first.start, end: first.end },
        expression: parseExpression(line.tokens.slice(1), this.positions),
      });
      this.index++;
    }

    const next = this.lines[this.index];
    const definition = next && next.indent === indent ? this.definitionKeyword(next) : null;
    if (!definition) {
      const last = decorators[decorators.length - 1];
      throw this.error("expected 'def', 'async def' or 'class' after decorator", next ?? last.line);
    }

    return this.parseDefinition(definition, decorators, indent, depth, outer);
  }

  private parseDefinition(
    keyword: DefinitionKeyword,
    decorators: Decorator[],
    indent: string,
    depth: number,
    outer: string[],
  ): DefinitionStatement {
    const header = this.lines[this.index];
    const nameToken = header.tokens[keyword === "async def" ? 2 : 1];
    if (!nameToken || nameToken.kind !== "name") {
      throw this.error("expected a name", header);
    }

    this.index++;
    return {
      kind: "definition",
      keyword,
      name: nameToken.value,
      decorators,
      header,
      body: opensBlock(header) ? this.parseBody(header, indent, depth, outer) : null,
    };
  }

  private parseBody(header: RawLine, indent: string, depth: number, outer: string[]): Suite {
    const next = this.lines[this.index];
    if (!next || next.indent.length <= indent.length || !next.indent.startsWith(indent)) {
      throw this.error("expected an indented block", next ?? header);
    }
    return this.parseSuite(next.indent, depth + 1, [...outer, indent]);
  }

  private definitionKeyword(line: RawLine): DefinitionKeyword | null {
    const [first, second] = line.tokens;
    if (first.kind !== "name") return null;
    if (first.value === "def" || first.value === "class") return first.value;
    if (first.value === "async" && second?.kind === "name" && second.value === "def") {
      return "async def";
    }
    return null;
  }
}

function opensBlock(line: RawLine): boolean {
  const last = line.tokens[line.tokens.length - 1];
  return last.kind === "op" && last.value === ":";
}

// ============================================================================
// Identifiers
// ============================================================================

function collectIdentifiers(tokens: Token[]): Set<string> {
  const identifiers = new Set<string>();

  for (const token of tokens) {
    if (token.kind === "name") {
      identifiers.add(token.value);
    } else if (token.kind === "string" && /^[a-zA-Z]*[fF]/.test(token.value)) {
      for (const match of token.value.matchAll(/[A-Za-z_]\w*/g)) {
        identifiers.add(match[0]);
      }
    }
  }

  return identifiers;
}

/**
 * Parse a whole source file into its statement tree
 */
export function parseModule(text: string, version: SourceVersion): Module {
  const positions = new LineIndex(text);
  const tokens = tokenize(text, version);
  const lines = splitLogicalLines(text, tokens, positions);
  const body = new ModuleParser(lines, positions).parse();

  return { body, identifiers: collectIdentifiers(tokens) };
}
