/**
 * Rewrite Planner
 * Turns every non-conforming decorator into a hoisted binding placed right
 * before its definition, plus a replacement of the decorator expression with
 * a reference to that binding.
 */

import type { Classification, DecoratorSite } from "../grammar/classifier";
import { tokenize } from "../grammar/lexer";
import type { SourceVersion } from "../grammar/versions";
import { EmitError } from "../utils/errors";

export interface InsertEdit {
  kind: "insert";
  offset: number;
  indent: string; // leading whitespace of the definition
  statements: string[];
  blankLinesAfter: number;
}

export interface ReplaceEdit {
  kind: "replace";
  start: number;
  end: number;
  text: string;
}

export type Edit = InsertEdit | ReplaceEdit;

export interface Binding {
  name: string;
  expression: string;
  site: DecoratorSite;
}

export interface RewritePlan {
  edits: Edit[];
  bindings: Binding[];
}

export interface PlanOptions {
  version: SourceVersion;
  bindingPrefix: string;
  pep8: boolean;
  // re-indents continuation lines of multi-line bindings; null keeps them verbatim
  indentUnit: string | null;
}

/**
 * Deterministic fresh-name allocation: `<prefix>_0`, `<prefix>_1`, ...
 * skipping anything already used in the file.
 */
export class NameAllocator {
  private counter = 0;
  private readonly allocated = new Set<string>();

  constructor(
    private readonly prefix: string,
    private readonly used: ReadonlySet<string>,
  ) {}

  next(): string {
    let name: string;
    do {
      name = `${this.prefix}_${this.counter++}`;
    } while (this.used.has(name) || this.allocated.has(name));

    this.allocated.add(name);
    return name;
  }
}

function bindingSource(site: DecoratorSite, text: string): string {
  const { expression } = site.decorator;
  const source = text.slice(expression.span.start, expression.span.end);
  // `x = y := z` is not a statement; `x = (y := z)` is
  return expression.kind === "named" ? `(${source})` : source;
}

/**
 * Put every continuation line of a multi-line expression at `indent` plus one
 * `unit`. Lines that begin inside a string literal and blank lines are kept.
 */
export function reindentContinuations(
  source: string,
  indent: string,
  unit: string,
  version: SourceVersion,
): string {
  if (!/[\r\n]/.test(source)) return source;

  const strings = tokenize(source, version).filter((token) => token.kind === "string");
  const lineBreak = /\r\n|\r|\n/g;
  let result = "";
  let cursor = 0;
  let match: RegExpExecArray | null;

  while ((match = lineBreak.exec(source)) !== null) {
    const { index } = match;
    if (strings.some((token) => token.start < index && index < token.end)) continue;

    const lineStart = index + match[0].length;
    let contentStart = lineStart;
    while (contentStart < source.length && " \t\f".includes(source.charAt(contentStart))) {
      contentStart++;
    }
    if (contentStart === source.length || "\r\n".includes(source.charAt(contentStart))) continue;

    result += source.slice(cursor, lineStart) + indent + unit;
    cursor = contentStart;
  }

  return result + source.slice(cursor);
}

/**
 * Plan the rewrite of one classified unit
 * Returns an empty plan when every decorator conforms.
 */
export function planRewrite(
  classification: Classification,
  text: string,
  options: PlanOptions,
): RewritePlan {
  const allocator = new NameAllocator(options.bindingPrefix, classification.module.identifiers);
  const edits: Edit[] = [];
  const bindings: Binding[] = [];
  let group: InsertEdit | null = null;

  for (const site of classification.sites) {
    if (site.conforming) continue;

    // a byte order mark stays the first thing in the file
    const offset = site.anchor === 0 && text.startsWith("\uFEFF") ? 1 : site.anchor;

    if (!group || group.offset !== offset) {
      group = {
        kind: "insert",
        offset,
        indent: site.indent,
        statements: [],
        blankLinesAfter: options.pep8 ? (site.depth === 0 ? 2 : 1) : 0,
      };
      edits.push(group);
    }

    const name = allocator.next();
    const source = bindingSource(site, text);
    const expression =
      options.indentUnit === null
        ? source
        : reindentContinuations(source, site.indent, options.indentUnit, options.version);
    group.statements.push(`${name} = ${expression}`);
    bindings.push({ name, expression, site });

    const { span } = site.decorator.expression;
    edits.push({ kind: "replace", start: span.start, end: span.end, text: name });
  }

  return { edits, bindings };
}

export function editStart(edit: Edit): number {
  return edit.kind === "insert" ? edit.offset : edit.start;
}

export function editEnd(edit: Edit): number {
  return edit.kind === "insert" ? edit.offset : edit.end;
}

/**
 * Check that edits are ascending, non-overlapping and inside the text
 */
export function validatePlan(plan: RewritePlan, length: number): void {
  let previousEnd = 0;

  for (const edit of plan.edits) {
    const start = editStart(edit);
    const end = editEnd(edit);

    if (start < 0 || end > length || start > end) {
      throw new EmitError(`edit span ${start}..${end} is outside the text (length ${length})`);
    }
    if (start < previousEnd) {
      throw new EmitError(`edit span ${start}..${end} overlaps the previous edit ending at ${previousEnd}`);
    }
    previousEnd = end;
  }
}
