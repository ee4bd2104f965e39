import { describe, it, expect } from "vitest";
import {
  detectEncoding,
  detectIndentation,
  detectLinesep,
  encodeSource,
  indentUnit,
} from "./detect";
import { ParseError } from "./errors";

describe("detectEncoding", () => {
  it("defaults to utf-8", () => {
    expect(detectEncoding(Buffer.from("x = 1\n"))).toBe("utf-8");
  });

  it("lets a byte order mark win over a cookie", () => {
    expect(detectEncoding(Buffer.from("\uFEFF# coding: latin-1\n"))).toBe("utf-8");
  });

  it("reads a cookie on the second line after a comment", () => {
    const bytes = Buffer.from("#!/usr/bin/env python\n# vim: set fileencoding=iso-8859-1 :\n");
    expect(detectEncoding(bytes)).toBe("latin1");
  });

  it("ignores a cookie that follows code", () => {
    expect(detectEncoding(Buffer.from("x = 1\n# coding: latin-1\n"))).toBe("utf-8");
  });

  it("rejects encodings it cannot decode", () => {
    expect(() => detectEncoding(Buffer.from("# coding: klingon\n"), "k.py")).toThrow(
      new ParseError("unsupported source encoding 'klingon'", 1, 1, "k.py"),
    );
  });
});

describe("encodeSource", () => {
  it("writes text back in the unit's encoding", () => {
    expect([...encodeSource("é", "latin1")]).toEqual([0xe9]);
    expect([...encodeSource("é", "utf-8")]).toEqual([0xc3, 0xa9]);
  });
});

describe("detectLinesep", () => {
  it("takes the first terminator", () => {
    expect(detectLinesep("a\rb\r\n")).toBe("\r");
    expect(detectLinesep("a\r\nb\n")).toBe("\r\n");
  });

  it("falls back to LF", () => {
    expect(detectLinesep("abc")).toBe("\n");
  });
});

describe("detectIndentation", () => {
  it("skips blank and comment-only lines", () => {
    expect(detectIndentation("x\n\n    # comment\n  y\n")).toBe("  ");
  });

  it("falls back to four spaces", () => {
    expect(detectIndentation("x = 1\n")).toBe("    ");
  });
});

describe("indentUnit", () => {
  it("maps the indentation setting to a unit", () => {
    expect(indentUnit(2)).toBe("  ");
    expect(indentUnit("tab")).toBe("\t");
    expect(indentUnit(null)).toBeNull();
  });
});
