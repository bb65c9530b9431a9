import { describe, expect, it } from "vitest";
import { createPosixPathAdapter, relativePosixPath } from "../posix-path.js";
import {
  absoluteImportName,
  moduleAncestry,
  moduleIdFromFile,
  topLevelName,
} from "../path.js";

const path = createPosixPathAdapter();

describe("posix paths", () => {
  it("normalizes and joins", () => {
    expect(path.join("/project", "pkg/../app", "./mod.py")).toBe("/project/app/mod.py");
    expect(path.resolve("main.py")).toBe("/main.py");
    expect(path.dirname("/project/main.py")).toBe("/project");
    expect(path.dirname("/")).toBe("/");
    expect(path.basename("/project/main.py", ".py")).toBe("main");
  });

  it("computes relative paths", () => {
    expect(relativePosixPath("/project", "/project/app/util.py")).toBe("app/util.py");
    expect(relativePosixPath("/project/app", "/project/main.py")).toBe("../main.py");
  });
});

describe("module names", () => {
  it("maps files to dotted module ids", () => {
    const root = "/project";
    expect(moduleIdFromFile({ root, filePath: "/project/main.py", path })).toBe("main");
    expect(moduleIdFromFile({ root, filePath: "/project/pkg/sub/mod.py", path })).toBe(
      "pkg.sub.mod",
    );
    expect(moduleIdFromFile({ root, filePath: "/project/pkg/__init__.py", path })).toBe("pkg");
    expect(moduleIdFromFile({ root, filePath: "/elsewhere/main.py", path })).toBeUndefined();
  });

  it("resolves relative imports against the importing package", () => {
    expect(
      absoluteImportName({
        importer: "app.service",
        importerIsPackage: false,
        module: "models",
        level: 1,
      }),
    ).toBe("app.models");
    expect(
      absoluteImportName({ importer: "app", importerIsPackage: true, module: "util", level: 1 }),
    ).toBe("app.util");
    expect(
      absoluteImportName({ importer: "app.sub.mod", importerIsPackage: false, level: 2 }),
    ).toBe("app");
    expect(
      absoluteImportName({ importer: "main", importerIsPackage: false, module: "x", level: 2 }),
    ).toBeUndefined();
    expect(absoluteImportName({ importer: "main", importerIsPackage: false, level: 1 })).toBe("");
  });

  it("lists enclosing packages", () => {
    expect(moduleAncestry("a.b.c")).toEqual(["a", "a.b", "a.b.c"]);
    expect(topLevelName("a.b.c")).toBe("a");
  });
});
