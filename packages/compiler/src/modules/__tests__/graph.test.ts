import { describe, expect, it } from "vitest";
import { DiagnosticError } from "../../diagnostics/index.js";
import { slotOf } from "../../semantics/catalog.js";
import { loadProgram } from "../graph.js";
import { createMemoryModuleHost } from "../memory-host.js";

const PROJECT = {
  "/project/main.py": [
    "from app.service import run",
    "import helpers",
    "",
    'if __name__ == "__main__":',
    "    run()",
    "",
  ].join("\n"),
  "/project/app/__init__.py": "",
  "/project/app/service.py": [
    "from .models import Model",
    "from . import util",
    "",
    "def run():",
    "    return Model(util.VALUE)",
    "",
  ].join("\n"),
  "/project/app/models.py": [
    "class Model:",
    "    def __init__(self, value):",
    "        self.value = value",
    "",
  ].join("\n"),
  "/project/app/util.py": "VALUE = 1\n",
  "/project/helpers.py": "import os\n",
};

const load = (files: Record<string, string>) =>
  loadProgram({
    entryPath: "/project/main.py",
    projectRoot: "/project",
    host: createMemoryModuleHost({ files }),
  });

const loadFailure = async (files: Record<string, string>): Promise<DiagnosticError> => {
  try {
    await load(files);
  } catch (error) {
    if (error instanceof DiagnosticError) return error;
    throw error;
  }
  throw new Error("expected the program to fail loading");
};

describe("loadProgram", () => {
  it("loads every module reachable from the entry", async () => {
    const program = await load(PROJECT);

    expect(program.entry).toBe("main");
    expect(Array.from(program.modules.keys())).toEqual([
      "main",
      "app",
      "app.service",
      "helpers",
      "app.models",
      "app.util",
    ]);
    expect(program.modules.get("app")?.isPackage).toBe(true);
    expect(program.modules.get("app.service")?.relativePath).toBe("app/service.py");
  });

  it("records import edges in source order", async () => {
    const program = await load(PROJECT);
    expect(program.edges.map(({ importer, target }) => `${importer}->${target}`)).toEqual([
      "main->app.service",
      "main->helpers",
      "app.service->app.models",
      "app.service->app",
      "app.service->app.util",
    ]);
  });

  it("orders modules the way the runtime finishes executing them", async () => {
    const program = await load(PROJECT);
    expect(program.executionOrder).toEqual([
      "app",
      "app.models",
      "app.util",
      "app.service",
      "helpers",
      "main",
    ]);
  });

  it("links import bindings to their definitions", async () => {
    const program = await load(PROJECT);
    const main = program.modules.get("main");
    const service = program.modules.get("app.service");
    const [run] = main ? slotOf(main.catalog, "run") : [];
    const [definition] = service ? slotOf(service.catalog, "run") : [];
    if (run === undefined || definition === undefined) {
      throw new Error("run is not bound");
    }

    expect(program.linker.follow({ moduleId: "main", symbol: run })).toEqual({
      kind: "symbol",
      ref: { moduleId: "app.service", symbol: definition },
    });
  });

  it("treats modules outside the project as external", async () => {
    const program = await load(PROJECT);
    const helpers = program.modules.get("helpers");
    const [os] = helpers ? slotOf(helpers.catalog, "os") : [];
    if (os === undefined) throw new Error("os is not bound");

    expect(program.linker.follow({ moduleId: "helpers", symbol: os })).toEqual({
      kind: "external",
      via: { moduleId: "helpers", symbol: os },
    });
  });

  it("reports missing internal modules", async () => {
    const error = await loadFailure({
      "/project/main.py": "import app.nothing\n",
      "/project/app/__init__.py": "",
    });
    expect(error.diagnostic.code).toBe("MD0001");
    expect(error.diagnostic.message).toBe("Unable to resolve module app.nothing");
    expect(error.diagnostic.related?.[0]?.message).toBe("Referenced from main.py");
  });

  it("reports names a package does not provide", async () => {
    const error = await loadFailure({
      "/project/main.py": "from app import missing\n",
      "/project/app/__init__.py": "",
    });
    expect(error.diagnostic.code).toBe("MD0003");
    expect(error.diagnostic.message).toBe(
      "Module app has no definition or submodule named missing",
    );
  });

  it("rejects relative imports above the project root", async () => {
    const error = await loadFailure({ "/project/main.py": "from .. import x\n" });
    expect(error.diagnostic.message).toBe(
      "relative import of level 2 reaches above the project root",
    );
  });

  it("collects wildcard imports and syntax errors across modules", async () => {
    const error = await loadFailure({
      "/project/main.py": "from helpers import *\nimport broken\n",
      "/project/helpers.py": "X = 1\n",
      "/project/broken.py": "def f(:\n",
    });
    expect(error.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      "UC0001",
      "PA0001",
    ]);
    expect(error.diagnostics[1]?.span.file).toBe("broken.py");
  });
});
