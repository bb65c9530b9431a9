import { describe, expect, it } from "vitest";
import { parseModule } from "../../parser/index.js";
import { buildCatalog } from "../catalog.js";
import { findDynamicImports } from "../dynamic-imports.js";
import { resolveModule } from "../resolver.js";

const resolve = (source: string) =>
  resolveModule(buildCatalog({ store: parseModule(source, "main.py"), moduleId: "main" }));

describe("resolveModule", () => {
  it("resolves names to symbols, builtins or nothing", () => {
    const resolution = resolve("x = 1\nprint(x, missing)\n");
    const kinds = resolution.catalog.occurrences.map((occurrence, index) => [
      occurrence.name,
      resolution.names[index]?.kind,
    ]);
    expect(kinds).toEqual([
      ["x", "symbol"],
      ["print", "builtin"],
      ["x", "symbol"],
      ["missing", "unresolved"],
    ]);
    expect(resolution.issues.map((issue) => issue.kind)).toEqual(["unresolved-name"]);
  });

  it("flags unknown attributes of local classes", () => {
    const resolution = resolve(
      [
        "import os",
        "",
        "class Shape:",
        "    sides = 0",
        "    def area(self):",
        "        return self.sides",
        "",
        "square = Shape()",
        "print(square.sides, square.perimeter, os.getcwd())",
        "",
      ].join("\n"),
    );

    expect(resolution.issues).toHaveLength(1);
    const [issue] = resolution.issues;
    expect(issue?.kind).toBe("unknown-attribute");
    if (issue?.kind !== "unknown-attribute") return;
    expect(issue.attribute).toBe("perimeter");
    expect(issue.owner).toEqual({ kind: "class", name: "Shape" });
    expect(issue.line).toBe(9);
  });

  it("accepts attributes added after the class body", () => {
    const resolution = resolve(
      ["class Box:", "    pass", "", "Box.label = 'x'", "print(Box.label)", ""].join("\n"),
    );
    expect(resolution.issues).toEqual([]);
  });

  it("stays silent for classes with open attribute lookup", () => {
    const resolution = resolve(
      [
        "class Proxy:",
        "    def __getattr__(self, name):",
        "        return name",
        "",
        "proxy = Proxy()",
        "print(proxy.anything)",
        "",
      ].join("\n"),
    );
    expect(resolution.issues).toEqual([]);
  });

  it("does not see class attributes from methods", () => {
    const resolution = resolve(
      ["class C:", "    limit = 3", "    def f(self):", "        return limit", ""].join(
        "\n",
      ),
    );
    expect(resolution.issues.map((issue) => issue.kind)).toEqual(["unresolved-name"]);
  });

  it("does not check attributes of a variable bound more than once", () => {
    const resolution = resolve(
      [
        "class Foo:",
        "    pass",
        "",
        "def f():",
        "    x = Foo()",
        "    x = [1]",
        "    x.append(3)",
        "",
      ].join("\n"),
    );
    expect(resolution.issues).toEqual([]);
  });

  it("resolves a class-body load outside the class until the class binds it", () => {
    const resolution = resolve(
      ["DEBUG = True", "", "class Settings:", "    DEBUG = DEBUG", "    LEVEL = DEBUG", ""].join(
        "\n",
      ),
    );
    const { occurrences, table } = resolution.catalog;
    const scopeKindOf = (index: number) => {
      const resolved = resolution.names[index];
      if (resolved?.kind !== "symbol") return resolved?.kind;
      return table.getScope(table.getSymbol(resolved.symbol).scope).kind;
    };
    const loads = occurrences.flatMap((occurrence, index) =>
      occurrence.role === "load" ? [scopeKindOf(index)] : [],
    );

    expect(loads).toEqual(["module", "class"]);
    expect(resolution.issues).toEqual([]);
  });

  it("reports a class-body load of a name only the class binds", () => {
    const resolution = resolve(["class Settings:", "    DEBUG = DEBUG", ""].join("\n"));
    expect(resolution.issues.map((issue) => [issue.kind, issue.line])).toEqual([
      ["unresolved-name", 2],
    ]);
  });
});

describe("findDynamicImports", () => {
  it("finds __import__ and importlib.import_module calls", () => {
    const resolution = resolve(
      [
        "import importlib",
        'mod = importlib.import_module("plugins")',
        'other = __import__("extras")',
        "",
      ].join("\n"),
    );
    expect(
      findDynamicImports(resolution).map(({ call, via }) => [via, call.line]),
    ).toEqual([
      ["importlib.import_module", 2],
      ["__import__", 3],
    ]);
  });

  it("follows from-imports of import_module", () => {
    const resolution = resolve(
      ["from importlib import import_module", 'import_module("plugins")', ""].join("\n"),
    );
    expect(findDynamicImports(resolution).map(({ via }) => via)).toEqual([
      "importlib.import_module",
    ]);
  });
});
