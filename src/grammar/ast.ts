/**
 * Structural tree for Python sources
 * Expressions are fully modelled (decorators need their shape); statements
 * only as far as blocks, decorators and definitions go.
 */

export interface Span {
  start: number; // inclusive offset
  end: number; // exclusive offset
}

// ============================================================================
// Expressions
// ============================================================================

interface Node<K extends string> {
  kind: K;
  span: Span;
}

export interface NameExpression extends Node<"name"> {
  id: string;
}

export interface AttributeExpression extends Node<"attribute"> {
  value: Expression;
  attr: string;
}

export type Argument =
  | { kind: "positional"; value: Expression }
  | { kind: "keyword"; name: string; value: Expression }
  | { kind: "unpack"; value: Expression }
  | { kind: "unpack-keywords"; value: Expression };

export interface CallExpression extends Node<"call"> {
  func: Expression;
  args: Argument[];
}

export interface SubscriptExpression extends Node<"subscript"> {
  value: Expression;
  slices: Expression[];
}

export interface SliceExpression extends Node<"slice"> {
  lower: Expression | null;
  upper: Expression | null;
  step: Expression | null;
}

export interface LiteralExpression extends Node<"literal"> {
  literal: "number" | "string" | "ellipsis" | "constant";
}

export interface UnaryExpression extends Node<"unary"> {
  op: "+" | "-" | "~" | "not";
  operand: Expression;
}

export interface BinaryExpression extends Node<"binary"> {
  op: string;
  left: Expression;
  right: Expression;
}

export interface BooleanExpression extends Node<"boolean"> {
  op: "and" | "or";
  left: Expression;
  right: Expression;
}

export interface CompareExpression extends Node<"compare"> {
  left: Expression;
  ops: string[];
  comparators: Expression[];
}

export interface ConditionalExpression extends Node<"conditional"> {
  body: Expression;
  test: Expression;
  orelse: Expression;
}

export interface LambdaExpression extends Node<"lambda"> {
  params: string[];
  body: Expression;
}

export interface NamedExpression extends Node<"named"> {
  target: NameExpression;
  value: Expression;
}

export interface AwaitExpression extends Node<"await"> {
  value: Expression;
}

/** A single parenthesised expression: `(a)` */
export interface GroupExpression extends Node<"group"> {
  inner: Expression;
}

export interface TupleExpression extends Node<"tuple"> {
  elements: Expression[];
}

export interface DisplayExpression extends Node<"display"> {
  display: "list" | "set" | "dict";
  elements: Expression[];
}

export interface ComprehensionClause {
  isAsync: boolean;
  targets: Expression[];
  iter: Expression;
  conditions: Expression[];
}

export interface ComprehensionExpression extends Node<"comprehension"> {
  display: "list" | "set" | "dict" | "generator";
  element: Expression;
  value: Expression | null; // dict comprehensions only
  clauses: ComprehensionClause[];
}

export interface StarredExpression extends Node<"starred"> {
  value: Expression;
  double: boolean;
}

export type Expression =
  | NameExpression
  | AttributeExpression
  | CallExpression
  | SubscriptExpression
  | SliceExpression
  | LiteralExpression
  | UnaryExpression
  | BinaryExpression
  | BooleanExpression
  | CompareExpression
  | ConditionalExpression
  | LambdaExpression
  | NamedExpression
  | AwaitExpression
  | GroupExpression
  | TupleExpression
  | DisplayExpression
  | ComprehensionExpression
  | StarredExpression;

export type ExpressionKind = Expression["kind"];

// ============================================================================
// Statements
// ============================================================================

/**
 * One logical line: physical lines joined by brackets or backslashes
 */
export interface LogicalLine {
  line: number; // 1-based line of the first token
  lineStart: number; // offset of the first physical line
  indent: string; // leading whitespace of the first physical line
  span: Span; // first token start .. last token end
}

export type DefinitionKeyword = "def" | "async def" | "class";

export interface Decorator {
  line: LogicalLine;
  at: Span; // the `@` token
  expression: Expression;
}

export interface SimpleStatement {
  kind: "simple";
  line: LogicalLine;
}

export interface CompoundStatement {
  kind: "compound";
  header: LogicalLine;
  keyword: string;
  body: Suite | null; // null when the body shares the header line
}

export interface DefinitionStatement {
  kind: "definition";
  keyword: DefinitionKeyword;
  name: string;
  decorators: Decorator[];
  header: LogicalLine;
  body: Suite | null;
}

export type Statement = SimpleStatement | CompoundStatement | DefinitionStatement;

export interface Suite {
  depth: number; // 0 for the module body
  indent: string;
  statements: Statement[];
}

export interface Module {
  body: Suite;
  identifiers: ReadonlySet<string>;
}
