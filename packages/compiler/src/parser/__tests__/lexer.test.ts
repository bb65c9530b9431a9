import { describe, expect, it } from "vitest";
import { ParserSyntaxError } from "../errors.js";
import { tokenize } from "../lexer.js";

const kinds = (source: string) => tokenize(source, "t.py").map((token) => token.kind);

describe("lexer", () => {
  it("emits indentation tokens around blocks", () => {
    expect(kinds("def f(x):\n    return x\n")).toEqual([
      "name",
      "name",
      "op",
      "name",
      "op",
      "op",
      "newline",
      "indent",
      "name",
      "name",
      "newline",
      "dedent",
      "end",
    ]);
  });

  it("joins lines inside brackets", () => {
    const tokens = tokenize("x = (1,\n  2)\n", "t.py");
    expect(tokens.filter((token) => token.kind === "newline")).toHaveLength(1);
    expect(tokens.map((token) => token.value).slice(0, 7)).toEqual([
      "x",
      "=",
      "(",
      "1",
      ",",
      "2",
      ")",
    ]);
  });

  it("skips blank and comment lines", () => {
    expect(kinds("a\n\n# note\nb\n")).toEqual(["name", "newline", "name", "newline", "end"]);
  });

  it("keeps string prefixes in the raw token", () => {
    const [token] = tokenize("b'abc'\n", "t.py");
    expect(token?.kind).toBe("string");
    expect(token?.value).toBe("b'abc'");
  });

  it("tracks line numbers", () => {
    const tokens = tokenize("a = 1\nb = 2\n", "t.py");
    const b = tokens.find((token) => token.value === "b");
    expect(b?.line).toBe(2);
    expect(b?.start).toBe(6);
  });

  it("rejects inconsistent dedents", () => {
    expect(() => tokenize("if x:\n    y\n  z\n", "t.py")).toThrow(ParserSyntaxError);
    expect(() => tokenize("if x:\n    y\n  z\n", "t.py")).toThrow(
      "unindent does not match any outer indentation level",
    );
  });
});
