/**
 * Recursive-descent parser for Python expressions
 * Covers the `namedexpr_test` grammar used in decorator position. Every node
 * carries the source span it was parsed from.
 */

import { ParseError, UnsupportedConstructError } from "../utils/errors";
import type {
  Argument,
  ComprehensionClause,
  Expression,
  NameExpression,
  Span,
} from "./ast";
import type { Token } from "./lexer";
import type { LineIndex } from "./line-index";

export const KEYWORDS = new Set([
  "False", "None", "True", "and", "as", "assert", "async", "await", "break",
  "class", "continue", "def", "del", "elif", "else", "except", "finally", "for",
  "from", "global", "if", "import", "in", "is", "lambda", "nonlocal", "not",
  "or", "pass", "raise", "return", "try", "while", "with", "yield",
]);

const COMPARISON_OPS = new Set(["<", ">", "==", ">=", "<=", "!="]);

/** Binary operator levels, loosest first; each level is left-associative */
const BINARY_LEVELS: ReadonlyArray<ReadonlySet<string>> = [
  new Set(["|"]),
  new Set(["^"]),
  new Set(["&"]),
  new Set(["<<", ">>"]),
  new Set(["+", "-"]),
  new Set(["*", "@", "/", "%", "//"]),
];

function isUnaryOperator(value: string): value is "+" | "-" | "~" {
  return value === "+" || value === "-" || value === "~";
}

export class ExpressionParser {
  private pos = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly lines: LineIndex,
  ) {}

  /**
   * Parse the whole token list as one `namedexpr_test`
   */
  parseAll(): Expression {
    if (this.tokens.length === 0) {
      throw this.error("expected an expression");
    }
    const expression = this.parseNamedExpression();
    if (this.pos < this.tokens.length) {
      throw this.error("invalid syntax");
    }
    return expression;
  }

  // ==========================================================================
  // Token helpers
  // ==========================================================================

  private peek(offset = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  private isOp(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token?.kind === "op" && token.value === value;
  }

  private isKeyword(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token?.kind === "name" && token.value === value;
  }

  private isIdentifier(offset = 0): boolean {
    const token = this.peek(offset);
    return token?.kind === "name" && !KEYWORDS.has(token.value);
  }

  private next(): Token {
    const token = this.peek();
    if (!token) throw this.error("unexpected end of expression");
    this.pos++;
    return token;
  }

  private expectOp(value: string): Token {
    if (!this.isOp(value)) {
      throw this.error(`expected '${value}'`);
    }
    return this.next();
  }

  private expectKeyword(value: string): Token {
    if (!this.isKeyword(value)) {
      throw this.error(`expected '${value}'`);
    }
    return this.next();
  }

  private expectIdentifier(): Token {
    if (!this.isIdentifier()) {
      throw this.error("expected a name");
    }
    return this.next();
  }

  private spanFrom(start: number): Span {
    return { start, end: this.tokens[this.pos - 1].end };
  }

  private startOffset(): number {
    const token = this.peek();
    if (!token) throw this.error("unexpected end of expression");
    return token.start;
  }

  private error(reason: string): ParseError {
    const token = this.peek() ?? this.tokens[this.tokens.length - 1];
    const offset = token ? (this.peek() ? token.start : token.end) : 0;
    const { line, column } = this.lines.position(offset);
    return new ParseError(reason, line, column);
  }

  // ==========================================================================
  // Tests
  // ==========================================================================

  private parseNamedExpression(): Expression {
    if (this.isIdentifier() && this.isOp(":=", 1)) {
      const start = this.startOffset();
      const token = this.next();
      const target: NameExpression = {
        kind: "name",
        id: token.value,
        span: { start: token.start, end: token.end },
      };
      this.next();
      const value = this.parseTest();
      return { kind: "named", target, value, span: this.spanFrom(start) };
    }
    return this.parseTest();
  }

  private parseTest(): Expression {
    if (this.isKeyword("lambda")) {
      return this.parseLambda(true);
    }

    const start = this.startOffset();
    const body = this.parseOrTest();
    if (!this.isKeyword("if")) {
      return body;
    }

    this.next();
    const test = this.parseOrTest();
    this.expectKeyword("else");
    const orelse = this.parseTest();
    return {
      kind: "conditional",
      body,
      test,
      orelse,
      span: this.spanFrom(start),
    };
  }

  /** `test_nocond`: no conditional expression at the top */
  private parseTestNoCond(): Expression {
    if (this.isKeyword("lambda")) {
      return this.parseLambda(false);
    }
    return this.parseOrTest();
  }

  private parseLambda(allowConditional: boolean): Expression {
    const start = this.startOffset();
    this.expectKeyword("lambda");

    const params: string[] = [];
    while (!this.isOp(":")) {
      if (this.isOp("*") || this.isOp("**")) {
        const marker = this.next().value;
        params.push(this.isIdentifier() ? marker + this.next().value : marker);
      } else if (this.isOp("/")) {
        params.push(this.next().value);
      } else {
        params.push(this.expectIdentifier().value);
        if (this.isOp("=")) {
          this.next();
          this.parseTest();
        }
      }
      if (!this.isOp(",")) break;
      this.next();
    }

    this.expectOp(":");
    const body = allowConditional ? this.parseTest() : this.parseTestNoCond();
    return { kind: "lambda", params, body, span: this.spanFrom(start) };
  }

  private parseOrTest(): Expression {
    return this.parseBoolean("or", () => this.parseAndTest());
  }

  private parseAndTest(): Expression {
    return this.parseBoolean("and", () => this.parseNotTest());
  }

  private parseBoolean(op: "and" | "or", operand: () => Expression): Expression {
    const start = this.startOffset();
    let left = operand();
    while (this.isKeyword(op)) {
      this.next();
      const right = operand();
      left = { kind: "boolean", op, left, right, span: this.spanFrom(start) };
    }
    return left;
  }

  private parseNotTest(): Expression {
    if (this.isKeyword("not")) {
      const start = this.startOffset();
      this.next();
      const operand = this.parseNotTest();
      return { kind: "unary", op: "not", operand, span: this.spanFrom(start) };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expression {
    const start = this.startOffset();
    const left = this.parseBinary(0);
    const ops: string[] = [];
    const comparators: Expression[] = [];

    for (;;) {
      const token = this.peek();
      if (!token) break;

      if (token.kind === "op" && COMPARISON_OPS.has(token.value)) {
        ops.push(this.next().value);
      } else if (this.isKeyword("in")) {
        ops.push(this.next().value);
      } else if (this.isKeyword("not") && this.isKeyword("in", 1)) {
        this.next();
        this.next();
        ops.push("not in");
      } else if (this.isKeyword("is")) {
        this.next();
        if (this.isKeyword("not")) {
          this.next();
          ops.push("is not");
        } else {
          ops.push("is");
        }
      } else {
        break;
      }
      comparators.push(this.parseBinary(0));
    }

    if (ops.length === 0) return left;
    return { kind: "compare", left, ops, comparators, span: this.spanFrom(start) };
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  private parseBinary(level: number): Expression {
    if (level >= BINARY_LEVELS.length) {
      return this.parseFactor();
    }

    const operators = BINARY_LEVELS[level];
    const start = this.startOffset();
    let left = this.parseBinary(level + 1);

    for (;;) {
      const token = this.peek();
      if (!token || token.kind !== "op" || !operators.has(token.value)) break;
      this.next();
      const right = this.parseBinary(level + 1);
      left = {
        kind: "binary",
        op: token.value,
        left,
        right,
        span: this.spanFrom(start),
      };
    }

    return left;
  }

  private parseFactor(): Expression {
    const token = this.peek();
    if (token?.kind === "op" && isUnaryOperator(token.value)) {
      const op = token.value;
      this.next();
      const operand = this.parseFactor();
      return { kind: "unary", op, operand, span: this.spanFrom(token.start) };
    }
    return this.parsePower();
  }

  private parsePower(): Expression {
    const start = this.startOffset();
    const base = this.parseAwaitPrimary();
    if (!this.isOp("**")) {
      return base;
    }
    this.next();
    const exponent = this.parseFactor();
    return {
      kind: "binary",
      op: "**",
      left: base,
      right: exponent,
      span: this.spanFrom(start),
    };
  }

  private parseAwaitPrimary(): Expression {
    if (this.isKeyword("await")) {
      const start = this.startOffset();
      this.next();
      const value = this.parsePrimary();
      return { kind: "await", value, span: this.spanFrom(start) };
    }
    return this.parsePrimary();
  }

  // ==========================================================================
  // Primaries
  // ==========================================================================

  private parsePrimary(): Expression {
    const start = this.startOffset();
    let expression = this.parseAtom();

    for (;;) {
      if (this.isOp(".")) {
        this.next();
        const attr = this.expectIdentifier().value;
        expression = {
          kind: "attribute",
          value: expression,
          attr,
          span: this.spanFrom(start),
        };
      } else if (this.isOp("(")) {
        this.next();
        const args = this.parseArguments();
        this.expectOp(")");
        expression = {
          kind: "call",
          func: expression,
          args,
          span: this.spanFrom(start),
        };
      } else if (this.isOp("[")) {
        this.next();
        const slices = this.parseSubscripts();
        this.expectOp("]");
        expression = {
          kind: "subscript",
          value: expression,
          slices,
          span: this.spanFrom(start),
        };
      } else {
        return expression;
      }
    }
  }

  private parseArguments(): Argument[] {
    const args: Argument[] = [];

    while (!this.isOp(")")) {
      if (this.isOp("*")) {
        this.next();
        args.push({ kind: "unpack", value: this.parseTest() });
      } else if (this.isOp("**")) {
        this.next();
        args.push({ kind: "unpack-keywords", value: this.parseTest() });
      } else if (this.isIdentifier() && this.isOp("=", 1)) {
        const name = this.next().value;
        this.next();
        args.push({ kind: "keyword", name, value: this.parseTest() });
      } else {
        const start = this.startOffset();
        const value = this.parseNamedExpression();
        if (this.isComprehensionStart()) {
          const clauses = this.parseComprehensionClauses();
          args.push({
            kind: "positional",
            value: {
              kind: "comprehension",
              display: "generator",
              element: value,
              value: null,
              clauses,
              span: this.spanFrom(start),
            },
          });
        } else {
          args.push({ kind: "positional", value });
        }
      }

      if (!this.isOp(",")) break;
      this.next();
    }

    return args;
  }

  private parseSubscripts(): Expression[] {
    const slices: Expression[] = [];

    while (!this.isOp("]")) {
      slices.push(this.parseSliceItem());
      if (!this.isOp(",")) break;
      this.next();
    }

    if (slices.length === 0) {
      throw this.error("expected a subscript");
    }
    return slices;
  }

  private parseSliceItem(): Expression {
    if (this.isOp("*")) {
      return this.parseStarred();
    }

    const start = this.startOffset();
    const lower = this.isOp(":") ? null : this.parseNamedExpression();
    if (!this.isOp(":")) {
      if (lower === null) throw this.error("expected a subscript");
      return lower;
    }

    this.next();
    const upper = this.endsSliceBound() ? null : this.parseTest();
    let step: Expression | null = null;
    if (this.isOp(":")) {
      this.next();
      step = this.endsSliceBound() ? null : this.parseTest();
    }
    return { kind: "slice", lower, upper, step, span: this.spanFrom(start) };
  }

  private endsSliceBound(): boolean {
    return this.isOp(":") || this.isOp(",") || this.isOp("]");
  }

  private parseStarred(): Expression {
    const start = this.startOffset();
    const double = this.next().value === "**";
    const value = this.parseBinary(0);
    return { kind: "starred", value, double, span: this.spanFrom(start) };
  }

  // ==========================================================================
  // Atoms
  // ==========================================================================

  private parseAtom(): Expression {
    const token = this.peek();
    if (!token) throw this.error("unexpected end of expression");

    switch (token.kind) {
      case "number":
        this.next();
        return { kind: "literal", literal: "number", span: this.spanFrom(token.start) };
      case "string":
        while (this.peek()?.kind === "string") this.next();
        return { kind: "literal", literal: "string", span: this.spanFrom(token.start) };
      case "name":
        return this.parseNameAtom(token);
      case "op":
        return this.parseBracketAtom(token);
      case "newline":
        throw this.error("invalid syntax");
    }
  }

  private parseNameAtom(token: Token): Expression {
    if (token.value === "True" || token.value === "False" || token.value === "None") {
      this.next();
      return { kind: "literal", literal: "constant", span: this.spanFrom(token.start) };
    }
    if (token.value === "yield") {
      const { line } = this.lines.position(token.start);
      throw new UnsupportedConstructError(
        "yield expressions in decorator position cannot be hoisted",
        line,
      );
    }
    if (KEYWORDS.has(token.value)) {
      throw this.error("invalid syntax");
    }
    this.next();
    return { kind: "name", id: token.value, span: this.spanFrom(token.start) };
  }

  private parseBracketAtom(token: Token): Expression {
    switch (token.value) {
      case "...":
        this.next();
        return { kind: "literal", literal: "ellipsis", span: this.spanFrom(token.start) };
      case "(":
        return this.parseParenthesised();
      case "[":
        return this.parseList();
      case "{":
        return this.parseBrace();
      default:
        throw this.error("invalid syntax");
    }
  }

  private parseParenthesised(): Expression {
    const start = this.startOffset();
    this.expectOp("(");

    if (this.isOp(")")) {
      this.next();
      return { kind: "tuple", elements: [], span: this.spanFrom(start) };
    }

    const first = this.isOp("*") ? this.parseStarred() : this.parseNamedExpression();

    if (this.isComprehensionStart()) {
      const clauses = this.parseComprehensionClauses();
      this.expectOp(")");
      return {
        kind: "comprehension",
        display: "generator",
        element: first,
        value: null,
        clauses,
        span: this.spanFrom(start),
      };
    }

    if (this.isOp(")")) {
      this.next();
      return { kind: "group", inner: first, span: this.spanFrom(start) };
    }

    const elements = [first, ...this.parseElementsUntil(")")];
    this.expectOp(")");
    return { kind: "tuple", elements, span: this.spanFrom(start) };
  }

  private parseList(): Expression {
    const start = this.startOffset();
    this.expectOp("[");

    if (this.isOp("]")) {
      this.next();
      return { kind: "display", display: "list", elements: [], span: this.spanFrom(start) };
    }

    const first = this.isOp("*") ? this.parseStarred() : this.parseNamedExpression();

    if (this.isComprehensionStart()) {
      const clauses = this.parseComprehensionClauses();
      this.expectOp("]");
      return {
        kind: "comprehension",
        display: "list",
        element: first,
        value: null,
        clauses,
        span: this.spanFrom(start),
      };
    }

    const elements = [first, ...this.parseElementsUntil("]")];
    this.expectOp("]");
    return { kind: "display", display: "list", elements, span: this.spanFrom(start) };
  }

  private parseBrace(): Expression {
    const start = this.startOffset();
    this.expectOp("{");

    if (this.isOp("}")) {
      this.next();
      return { kind: "display", display: "dict", elements: [], span: this.spanFrom(start) };
    }

    if (this.isOp("**")) {
      const elements = [this.parseStarred(), ...this.parseDictItemsUntilClose()];
      this.expectOp("}");
      return { kind: "display", display: "dict", elements, span: this.spanFrom(start) };
    }

    const first = this.isOp("*") ? this.parseStarred() : this.parseNamedExpression();

    if (this.isOp(":")) {
      this.next();
      const value = this.parseTest();

      if (this.isComprehensionStart()) {
        const clauses = this.parseComprehensionClauses();
        this.expectOp("}");
        return {
          kind: "comprehension",
          display: "dict",
          element: first,
          value,
          clauses,
          span: this.spanFrom(start),
        };
      }

      const elements = [first, value, ...this.parseDictItemsUntilClose()];
      this.expectOp("}");
      return { kind: "display", display: "dict", elements, span: this.spanFrom(start) };
    }

    if (this.isComprehensionStart()) {
      const clauses = this.parseComprehensionClauses();
      this.expectOp("}");
      return {
        kind: "comprehension",
        display: "set",
        element: first,
        value: null,
        clauses,
        span: this.spanFrom(start),
      };
    }

    const elements = [first, ...this.parseElementsUntil("}")];
    this.expectOp("}");
    return { kind: "display", display: "set", elements, span: this.spanFrom(start) };
  }

  /**
   * Remaining `, item` entries of a tuple, list or set display
   */
  private parseElementsUntil(close: string): Expression[] {
    const elements: Expression[] = [];
    while (this.isOp(",")) {
      this.next();
      if (this.isOp(close)) break;
      elements.push(this.isOp("*") ? this.parseStarred() : this.parseNamedExpression());
    }
    return elements;
  }

  /**
   * Remaining `, key: value` or `, **mapping` entries of a dict display
   */
  private parseDictItemsUntilClose(): Expression[] {
    const elements: Expression[] = [];
    while (this.isOp(",")) {
      this.next();
      if (this.isOp("}")) break;
      if (this.isOp("**")) {
        elements.push(this.parseStarred());
        continue;
      }
      elements.push(this.parseTest());
      this.expectOp(":");
      elements.push(this.parseTest());
    }
    return elements;
  }

  // ==========================================================================
  // Comprehensions
  // ==========================================================================

  private isComprehensionStart(): boolean {
    return (
      this.isKeyword("for") || (this.isKeyword("async") && this.isKeyword("for", 1))
    );
  }

  private parseComprehensionClauses(): ComprehensionClause[] {
    const clauses: ComprehensionClause[] = [];

    while (this.isComprehensionStart()) {
      const isAsync = this.isKeyword("async");
      if (isAsync) this.next();
      this.expectKeyword("for");

      const targets: Expression[] = [];
      do {
        if (targets.length > 0) this.next();
        if (this.isKeyword("in")) break;
        targets.push(this.isOp("*") ? this.parseStarred() : this.parseBinary(0));
      } while (this.isOp(","));

      this.expectKeyword("in");
      const iter = this.parseOrTest();

      const conditions: Expression[] = [];
      while (this.isKeyword("if")) {
        this.next();
        conditions.push(this.parseTestNoCond());
      }

      clauses.push({ isAsync, targets, iter, conditions });
    }

    return clauses;
  }
}

/**
 * Parse a decorator expression from the tokens following `@`
 */
export function parseExpression(tokens: readonly Token[], lines: LineIndex): Expression {
  return new ExpressionParser(tokens, lines).parseAll();
}
