/**
 * Grammar Classifier
 * Decides for every decorator whether it fits the restricted pre-3.9 grammar:
 * `'@' dotted_name [ '(' [arglist] ')' ]`.
 */

import type { SourceUnit } from "../types";
import { ParseError } from "../utils/errors";
import type {
  Decorator,
  DefinitionStatement,
  Expression,
  Module,
  Statement,
  Suite,
} from "./ast";
import { parseModule } from "./parser";

export interface DecoratorSite {
  definition: {
    keyword: DefinitionStatement["keyword"];
    name: string;
    line: number;
  };
  decorator: Decorator;
  index: number; // position among the definition's decorators
  depth: number; // block depth of the definition, 0 at module level
  indent: string; // leading whitespace of the definition
  anchor: number; // offset of the line holding the first decorator
  conforming: boolean;
  shape: string;
}

export interface Classification {
  module: Module;
  sites: DecoratorSite[];
}

function assertNever(value: never): never {
  throw new Error(`Unhandled expression kind: ${JSON.stringify(value)}`);
}

function isDottedName(expression: Expression): boolean {
  switch (expression.kind) {
    case "name":
      return true;
    case "attribute":
      return isDottedName(expression.value);
    default:
      return false;
  }
}

/**
 * A dotted name, optionally followed by exactly one call
 */
export function isConforming(expression: Expression): boolean {
  if (expression.kind === "call") {
    return isDottedName(expression.func);
  }
  return isDottedName(expression);
}

/**
 * Human-readable name of an expression's shape, used in reports
 */
export function describeExpression(expression: Expression): string {
  switch (expression.kind) {
    case "name":
      return "name";
    case "attribute":
      return isDottedName(expression) ? "dotted name" : "attribute access";
    case "call":
      return isDottedName(expression.func) ? "call" : "chained call";
    case "subscript":
      return "subscript";
    case "slice":
      return "slice";
    case "literal":
      return `${expression.literal} literal`;
    case "unary":
      return expression.op === "not" ? "boolean operation" : "unary operation";
    case "binary":
      return "binary operation";
    case "boolean":
      return "boolean operation";
    case "compare":
      return "comparison";
    case "conditional":
      return "conditional expression";
    case "lambda":
      return "lambda";
    case "named":
      return "assignment expression";
    case "await":
      return "await expression";
    case "group":
      return "parenthesized expression";
    case "tuple":
      return "tuple";
    case "display":
      return `${expression.display} display`;
    case "comprehension":
      return `${expression.display} comprehension`;
    case "starred":
      return "starred expression";
    default:
      return assertNever(expression);
  }
}

function collectSites(suite: Suite, sites: DecoratorSite[]): void {
  for (const statement of suite.statements) {
    visitStatement(statement, suite, sites);
  }
}

function visitStatement(statement: Statement, suite: Suite, sites: DecoratorSite[]): void {
  switch (statement.kind) {
    case "simple":
      return;
    case "compound":
      if (statement.body) collectSites(statement.body, sites);
      return;
    case "definition": {
      const anchor = statement.decorators[0]?.line.lineStart ?? statement.header.lineStart;
      statement.decorators.forEach((decorator, index) => {
        sites.push({
          definition: {
            keyword: statement.keyword,
            name: statement.name,
            line: statement.header.line,
          },
          decorator,
          index,
          depth: suite.depth,
          indent: suite.indent,
          anchor,
          conforming: isConforming(decorator.expression),
          shape: describeExpression(decorator.expression),
        });
      });
      if (statement.body) collectSites(statement.body, sites);
      return;
    }
    default:
      return assertNever(statement);
  }
}

/**
 * Parse a source unit and classify every decorator in source order
 */
export function classify(unit: SourceUnit): Classification {
  let module: Module;
  try {
    module = parseModule(unit.text, unit.version);
  } catch (error) {
    if (error instanceof ParseError) throw error.withFilename(unit.path);
    throw error;
  }

  const sites: DecoratorSite[] = [];
  collectSites(module.body, sites);
  return { module, sites };
}
