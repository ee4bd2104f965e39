import { describe, it, expect } from "vitest";
import { emit } from "./emitter";
import type { InsertEdit, RewritePlan } from "./planner";
import { EmitError } from "../utils/errors";

function insert(offset: number, statements: string[], overrides: Partial<InsertEdit> = {}): InsertEdit {
  return { kind: "insert", offset, indent: "", statements, blankLinesAfter: 0, ...overrides };
}

describe("emit", () => {
  it("returns the text untouched for an empty plan", () => {
    const text = "x  =  1 # odd spacing\r\n";
    expect(emit(text, { edits: [], bindings: [] }, { linesep: "\n" })).toBe(text);
  });

  it("copies everything outside the edits verbatim", () => {
    const text = "@(a)  # keep\ndef f(): pass\n";
    const plan: RewritePlan = {
      edits: [insert(0, ["b0 = (a)"]), { kind: "replace", start: 1, end: 4, text: "b0" }],
      bindings: [],
    };

    expect(emit(text, plan, { linesep: "\n" })).toBe(
      "b0 = (a)\n@b0  # keep\ndef f(): pass\n",
    );
  });

  it("indents bindings like the definition", () => {
    const text = "class C:\n\t@m\n\tdef f(self): pass\n";
    const plan: RewritePlan = {
      edits: [insert(9, ["b0 = m"], { indent: "\t", blankLinesAfter: 1 })],
      bindings: [],
    };

    expect(emit(text, plan, { linesep: "\n" })).toBe(
      "class C:\n\tb0 = m\n\n\t@m\n\tdef f(self): pass\n",
    );
  });

  it("ends every inserted statement with the configured line separator", () => {
    const plan: RewritePlan = {
      edits: [insert(0, ["b0 = x", "b1 = y"], { indent: "   " })],
      bindings: [],
    };

    expect(emit("z\n", plan, { linesep: "\r\n" })).toBe("   b0 = x\r\n   b1 = y\r\nz\n");
  });

  it("rejects a plan that does not fit the text", () => {
    const plan: RewritePlan = {
      edits: [{ kind: "replace", start: 2, end: 9, text: "x" }],
      bindings: [],
    };
    expect(() => emit("abc", plan, { linesep: "\n" })).toThrow(EmitError);
  });
});
