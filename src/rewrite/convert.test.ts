import { describe, it, expect } from "vitest";
import {
  convert,
  convertOptionsFromConfig,
  convertUnit,
  createSourceUnit,
  DEFAULT_CONVERT_OPTIONS,
  readSourceUnit,
} from "./convert";
import { parseModule } from "../grammar/parser";

const NO_PEP8 = { pep8: false };

describe("convert", () => {
  // ==========================================================================
  // Basic rewriting
  // ==========================================================================
  describe("rewriting", () => {
    it("leaves conforming decorators alone", () => {
      const text = "@a.b(x)\ndef f(): pass\n";
      expect(convert(text)).toBe(text);
    });

    it("hoists a conditional decorator", () => {
      expect(convert("@(a if cond else b)\ndef f(): pass\n", NO_PEP8)).toBe(
        "_decorator_0 = (a if cond else b)\n@_decorator_0\ndef f(): pass\n",
      );
    });

    it("separates the binding with blank lines in PEP 8 mode", () => {
      expect(convert("@(a if cond else b)\ndef f(): pass\n")).toBe(
        "_decorator_0 = (a if cond else b)\n\n\n@_decorator_0\ndef f(): pass\n",
      );
    });

    it("keeps decorator order when only the second is rewritten", () => {
      expect(convert("@a\n@(b)\ndef f(): pass\n", NO_PEP8)).toBe(
        "_decorator_0 = (b)\n@a\n@_decorator_0\ndef f(): pass\n",
      );
    });

    it("avoids names that already exist in the file", () => {
      expect(convert("_decorator_0 = 1\n@(a)\ndef f(): pass\n", NO_PEP8)).toBe(
        "_decorator_0 = 1\n_decorator_1 = (a)\n@_decorator_1\ndef f(): pass\n",
      );
    });

    it("keeps the binding inside the definition's block", () => {
      expect(convert("class C:\n    @x[0]\n    def m(self): pass\n")).toBe(
        "class C:\n    _decorator_0 = x[0]\n\n    @_decorator_0\n    def m(self): pass\n",
      );
    });

    it("wraps a named expression in parentheses", () => {
      expect(convert("@x := f\ndef g(): pass\n", NO_PEP8)).toBe(
        "_decorator_0 = (x := f)\n@_decorator_0\ndef g(): pass\n",
      );
    });

    it("keeps comments and multi-line expressions intact", () => {
      expect(convert("# header\n@(a +\n   b)  # why\ndef f(): pass\n", NO_PEP8)).toBe(
        "# header\n_decorator_0 = (a +\n   b)\n@_decorator_0  # why\ndef f(): pass\n",
      );
    });

    it("is idempotent", () => {
      const once = convert("@a[0]\n@b.c\nclass K: pass\n");
      expect(convert(once)).toBe(once);
    });

    it("uses a custom binding prefix", () => {
      expect(convert("@(a)\ndef f(): pass\n", { pep8: false, bindingPrefix: "_hoisted" })).toBe(
        "_hoisted_0 = (a)\n@_hoisted_0\ndef f(): pass\n",
      );
    });
  });

  // ==========================================================================
  // Formatting
  // ==========================================================================
  describe("formatting", () => {
    it("follows the file's CRLF line endings", () => {
      expect(convert("@(a)\r\ndef f(): pass\r\n", NO_PEP8)).toBe(
        "_decorator_0 = (a)\r\n@_decorator_0\r\ndef f(): pass\r\n",
      );
    });

    it("applies an explicit line separator to inserted lines only", () => {
      expect(convert("@(a)\r\ndef f(): pass\r\n", { pep8: false, linesep: "\n" })).toBe(
        "_decorator_0 = (a)\n@_decorator_0\r\ndef f(): pass\r\n",
      );
    });

    it.each<[string, string, string, string]>([
      [
        "space",
        "if x:\n    @(a if c else b)\n    def f(): pass\n",
        "  ",
        "if x:\n    _decorator_0 = (a if c else b)\n    @_decorator_0\n    def f(): pass\n",
      ],
      [
        "tab",
        "class C:\n\t@x[0]\n\tdef m(self): pass\n",
        "    ",
        "class C:\n\t_decorator_0 = x[0]\n\t@_decorator_0\n\tdef m(self): pass\n",
      ],
    ])("keeps a %s-indented block's own indentation under a different unit", (_, text, unit, expected) => {
      const output = convert(text, { pep8: false, indentUnit: unit });

      expect(output).toBe(expected);
      expect(() => parseModule(output, "3.12")).not.toThrow();
      expect(convert(output, { pep8: false, indentUnit: unit })).toBe(output);
    });

    it("indents continuation lines by the explicit unit", () => {
      const text = "def outer():\n    @(a +\n  b)\n    def f(): pass\n";
      const output = convert(text, { pep8: false, indentUnit: "  " });

      expect(output).toBe("def outer():\n    _decorator_0 = (a +\n      b)\n    @_decorator_0\n    def f(): pass\n");
      expect(() => parseModule(output, "3.12")).not.toThrow();
    });

    it("keeps a byte order mark first", () => {
      expect(convert("\uFEFF@(a)\ndef f(): pass\n", NO_PEP8)).toBe(
        "\uFEFF_decorator_0 = (a)\n@_decorator_0\ndef f(): pass\n",
      );
    });
  });
});

describe("convertUnit", () => {
  it("reports unchanged units", () => {
    const unit = createSourceUnit("@a\ndef f(): pass\n", "a.py", "3.12");
    const result = convertUnit(unit, DEFAULT_CONVERT_OPTIONS);

    expect(result.changed).toBe(false);
    expect(result.output).toBe(unit.text);
    expect(result.classification.sites).toHaveLength(1);
  });

  it("returns the bindings it introduced", () => {
    const unit = createSourceUnit("@(a)\n@b[1]\ndef f(): pass\n", "a.py", "3.12");
    const result = convertUnit(unit, { ...DEFAULT_CONVERT_OPTIONS, pep8: false });

    expect(result.changed).toBe(true);
    expect(result.plan.bindings.map((b) => `${b.name} = ${b.expression}`)).toEqual([
      "_decorator_0 = (a)",
      "_decorator_1 = b[1]",
    ]);
  });
});

describe("readSourceUnit", () => {
  it("decodes a latin-1 file declared by its coding cookie", () => {
    const bytes = Buffer.from("# -*- coding: latin-1 -*-\nname = 'caf\u00e9'\n", "latin1");
    const unit = readSourceUnit(bytes, "cafe.py", "3.12");

    expect(unit.encoding).toBe("latin1");
    expect(unit.text).toBe("# -*- coding: latin-1 -*-\nname = 'caf\u00e9'\n");
  });

  it("rejects bytes that are not utf-8", () => {
    expect(() => readSourceUnit(Uint8Array.from([0x40, 0xff]), null, "3.12")).toThrow(
      "<stdin>:1:1: source is not valid utf-8",
    );
  });

  it("records the detected conventions", () => {
    const unit = readSourceUnit(Buffer.from("if x:\r\n\ty = 1\r\n"), null, "3.12");
    expect(unit.linesep).toBe("\r\n");
    expect(unit.indentation).toBe("\t");
    expect(Object.isFrozen(unit)).toBe(true);
  });
});

describe("convertOptionsFromConfig", () => {
  it("maps configuration names to emitter values", () => {
    expect(
      convertOptionsFromConfig({
        sourceVersion: "3.11",
        linesep: "CRLF",
        indentation: "tab",
        pep8: false,
        bindingPrefix: "_d",
      }),
    ).toEqual({ version: "3.11", linesep: "\r\n", indentUnit: "\t", pep8: false, bindingPrefix: "_d" });
  });
});
