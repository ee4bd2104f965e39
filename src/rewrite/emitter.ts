/**
 * Formatting-Preserving Emitter
 * Copies every byte outside the edited spans verbatim and renders inserted
 * statements at the definition's own indentation with the configured line
 * separator.
 */

import type { Linesep } from "../types";
import { validatePlan, type InsertEdit, type RewritePlan } from "./planner";

export interface EmitStyle {
  linesep: Linesep;
}

function renderInsert(edit: InsertEdit, style: EmitStyle): string {
  const statements = edit.statements.map((statement) => edit.indent + statement + style.linesep);
  return statements.join("") + style.linesep.repeat(edit.blankLinesAfter);
}

/**
 * Apply a rewrite plan to the original text
 * Throws EmitError when the plan does not fit the text.
 */
export function emit(text: string, plan: RewritePlan, style: EmitStyle): string {
  if (plan.edits.length === 0) {
    return text;
  }

  validatePlan(plan, text.length);

  const parts: string[] = [];
  let cursor = 0;

  for (const edit of plan.edits) {
    if (edit.kind === "insert") {
      parts.push(text.slice(cursor, edit.offset), renderInsert(edit, style));
      cursor = edit.offset;
    } else {
      parts.push(text.slice(cursor, edit.start), edit.text);
      cursor = edit.end;
    }
  }

  parts.push(text.slice(cursor));
  return parts.join("");
}
