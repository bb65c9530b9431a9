import { describe, expect, it } from "vitest";
import { NodeStore, type NodeId } from "../ast.js";
import { ParserSyntaxError } from "../errors.js";
import { parseModule } from "../parser.js";

const SAMPLE = [
  '"""Sample module."""',
  "import os, sys as system",
  "from .util import helper as h",
  "",
  "@decorator",
  "def f(a, b=1, *args, key, **kw) -> int:",
  "    return a",
  "",
  "class C(Base, metaclass=Meta):",
  "    x = 1",
  "",
  'if __name__ == "__main__":',
  "    f(1)",
  "",
].join("\n");

const kindsOf = (store: NodeStore, ids: readonly NodeId[]) =>
  ids.map((id) => store.get(id).kind);

describe("parseModule", () => {
  const store = parseModule(SAMPLE, "sample.py");
  const [doc, imports, fromImport, fn, cls, entry] = store.body;

  it("parses top-level statements in order", () => {
    expect(kindsOf(store, store.body)).toEqual([
      "expr-stmt",
      "import",
      "import-from",
      "function-def",
      "class-def",
      "if",
    ]);
    expect(doc).toBeDefined();
  });

  it("records import aliases", () => {
    if (imports === undefined || fromImport === undefined) return;
    const plain = store.expect(imports, "import");
    expect(plain.names.map(({ name, asname }) => ({ name, asname }))).toEqual([
      { name: "os", asname: undefined },
      { name: "sys", asname: "system" },
    ]);

    const from = store.expect(fromImport, "import-from");
    expect(from.module).toBe("util");
    expect(from.level).toBe(1);
    expect(from.wildcard).toBe(false);
    expect(from.names[0]?.name).toBe("helper");
    expect(from.names[0]?.asname).toBe("h");
    expect(from.line).toBe(3);
  });

  it("starts decorated definitions at the decorator", () => {
    if (fn === undefined) return;
    const def = store.expect(fn, "function-def");
    expect(def.name).toBe("f");
    expect(def.line).toBe(6);
    expect(def.decorators).toHaveLength(1);
    expect(store.text(fn)).toBe(
      "@decorator\ndef f(a, b=1, *args, key, **kw) -> int:\n    return a",
    );
    expect(store.source.slice(def.nameSpan.start, def.nameSpan.end)).toBe("f");
  });

  it("classifies parameters", () => {
    if (fn === undefined) return;
    const def = store.expect(fn, "function-def");
    const params = def.params.map((id) => store.expect(id, "param"));
    expect(params.map((param) => [param.name, param.paramKind])).toEqual([
      ["a", "positional"],
      ["b", "positional"],
      ["args", "vararg"],
      ["key", "keyword-only"],
      ["kw", "kwarg"],
    ]);
    expect(params[1]?.default).toBeDefined();
  });

  it("separates class bases from keywords", () => {
    if (cls === undefined) return;
    const def = store.expect(cls, "class-def");
    expect(def.bases.map((id) => store.text(id))).toEqual(["Base"]);
    const keywords = def.keywords.map((id) => store.expect(id, "keyword"));
    expect(keywords.map((keyword) => keyword.arg)).toEqual(["metaclass"]);
    expect(store.text(cls)).toBe("class C(Base, metaclass=Meta):\n    x = 1");
  });

  it("parses comparisons with string constants", () => {
    if (entry === undefined) return;
    const node = store.expect(entry, "if");
    const test = store.expect(node.test, "compare");
    expect(store.expect(test.left, "name").id).toBe("__name__");
    expect(test.ops).toEqual(["=="]);
    const [right] = test.comparators;
    if (right === undefined) return;
    const constant = store.expect(right, "constant");
    expect(constant.constKind).toBe("string");
    expect(constant.text).toBe("__main__");
  });

  it("marks assignment targets as stores", () => {
    const module = parseModule("a, b = c\ndel d\n", "t.py");
    const [assign, del] = module.body;
    if (assign === undefined || del === undefined) return;
    const node = module.expect(assign, "assign");
    const [target] = node.targets;
    if (target === undefined) return;
    const tuple = module.expect(target, "tuple");
    expect(tuple.elts.map((id) => module.expect(id, "name").ctx)).toEqual(["store", "store"]);
    expect(module.expect(node.value, "name").ctx).toBe("load");

    const [deleted] = module.expect(del, "delete").targets;
    if (deleted === undefined) return;
    expect(module.expect(deleted, "name").ctx).toBe("del");
  });

  it("parses replacement fields of f-strings as expressions", () => {
    const module = parseModule('msg = f"{greet(name)}!"\n', "t.py");
    const names = Array.from(module.descendants(module.root))
      .map((id) => module.get(id))
      .flatMap((node) => (node.kind === "name" ? [node.id] : []));
    expect(names).toEqual(["msg", "greet", "name"]);
  });

  it("walks descendants in pre-order", () => {
    const module = parseModule("x = f(y)\n", "t.py");
    expect(kindsOf(module, Array.from(module.descendants(module.root)))).toEqual([
      "module",
      "assign",
      "name",
      "call",
      "name",
      "name",
    ]);
  });

  it("rejects match statements", () => {
    expect(() => parseModule("match x:\n    case 1:\n        pass\n", "t.py")).toThrow(
      "match statements are not supported",
    );
  });

  it("treats match as a name outside statements", () => {
    const module = parseModule("match = 1\n", "t.py");
    expect(kindsOf(module, module.body)).toEqual(["assign"]);
  });

  it("reports the location of syntax errors", () => {
    let caught: unknown;
    try {
      parseModule("x = 1\ny = )\n", "bad.py");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ParserSyntaxError);
    if (!(caught instanceof ParserSyntaxError)) return;
    expect(caught.location?.line).toBe(2);
    expect(caught.location?.filePath).toBe("bad.py");
  });
});
