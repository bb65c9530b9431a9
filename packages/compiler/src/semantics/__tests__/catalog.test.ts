import { describe, expect, it } from "vitest";
import { parseModule } from "../../parser/index.js";
import { buildCatalog, describeScope, slotOf } from "../catalog.js";

const catalogOf = (source: string) =>
  buildCatalog({ store: parseModule(source, "main.py"), moduleId: "main" });

describe("buildCatalog", () => {
  it("records module bindings with their roles", () => {
    const catalog = catalogOf(
      [
        "import os.path",
        "from ..pkg import thing as t",
        "",
        "def load(path):",
        "    return open(path)",
        "",
        "for item in items:",
        "    total = item",
        "",
      ].join("\n"),
    );
    const { table } = catalog;
    const record = (name: string) => {
      const [id] = slotOf(catalog, name);
      if (id === undefined) throw new Error(`no binding for ${name}`);
      return table.getSymbol(id);
    };

    expect(record("os").import).toEqual({
      form: "import",
      module: "os.path",
      level: 0,
      asname: undefined,
    });
    expect(record("t").import).toEqual({
      form: "from",
      module: "pkg",
      level: 2,
      name: "thing",
      asname: "t",
    });
    expect(record("load").kind).toBe("function");
    expect(record("load").role).toBe("definition");
    expect(record("item").role).toBe("statement");
    expect(record("total").role).toBe("statement");
    expect(catalog.importStatements).toHaveLength(2);
  });

  it("reports duplicate definitions in module scope", () => {
    const catalog = catalogOf(
      [
        "def load(path):",
        "    return path",
        "",
        "def load(path, mode):",
        "    return mode",
        "",
      ].join("\n"),
    );

    expect(catalog.duplicates).toHaveLength(1);
    const [duplicate] = catalog.duplicates;
    expect(duplicate?.name).toBe("load");
    expect(duplicate?.scope).toBe(catalog.table.rootScope);
    expect(
      duplicate?.symbols.map((id) => catalog.table.getSymbol(id).line),
    ).toEqual([1, 4]);
  });

  it("exempts overload variants from duplicate checks", () => {
    const catalog = catalogOf(
      [
        "@overload",
        "def f(x): ...",
        "@overload",
        "def f(x, y): ...",
        "def f(*args): ...",
        "",
      ].join("\n"),
    );

    expect(slotOf(catalog, "f")).toHaveLength(3);
    expect(catalog.duplicates).toEqual([]);
  });

  it("ignores conditional rebinding", () => {
    const catalog = catalogOf(
      ["value = 1", "if flag:", "    value = 2", ""].join("\n"),
    );
    expect(catalog.duplicates).toEqual([]);
    expect(
      slotOf(catalog, "value").map((id) => catalog.table.getSymbol(id).role),
    ).toEqual(["definition", "statement"]);
  });

  it("redirects global bindings to the module scope", () => {
    const catalog = catalogOf(
      ["counter = 0", "def bump():", "    global counter", "    counter += 1", ""].join(
        "\n",
      ),
    );
    const bindings = slotOf(catalog, "counter").map((id) => catalog.table.getSymbol(id));
    expect(bindings.map((record) => [record.line, record.role])).toEqual([
      [1, "definition"],
      [4, "statement"],
    ]);
  });

  it("collects instance attributes assigned through self", () => {
    const catalog = catalogOf(
      [
        "class Config(metaclass=Meta):",
        "    def __init__(self, name):",
        "        self.name = name",
        "",
      ].join("\n"),
    );
    const [info] = Array.from(catalog.classes.values());
    expect(info?.name).toBe("Config");
    expect(Array.from(info?.instanceAttributes ?? [])).toEqual(["name"]);
    expect(info?.hasMetaclass).toBe(true);
    expect(info?.definesGetattr).toBe(false);
    if (info) expect(describeScope(catalog, info.scope)).toBe("class Config");
  });

  it("indexes attribute chains by their head name", () => {
    const catalog = catalogOf('path = os.path.join("a")\n');
    expect(catalog.chains).toHaveLength(1);
    const [chain] = catalog.chains;
    expect(chain?.headName).toBe("os");
    expect(chain?.attrs.map((attr) => attr.name)).toEqual(["path", "join"]);
    expect(chain?.ctx).toBe("load");
    const head = chain === undefined ? undefined : catalog.occurrences[chain.headOccurrence];
    expect(head?.chain).toBe(0);
    expect(catalog.calls).toHaveLength(1);
  });

  it("tracks wildcard imports separately", () => {
    const catalog = catalogOf("from helpers import *\n");
    expect(catalog.wildcardImports).toHaveLength(1);
    expect(slotOf(catalog, "helpers")).toEqual([]);
  });
});
