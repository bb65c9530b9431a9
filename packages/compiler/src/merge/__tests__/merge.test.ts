import { describe, expect, it } from "vitest";
import { DiagnosticError } from "../../diagnostics/index.js";
import { createMemoryModuleHost } from "../../modules/memory-host.js";
import { mergeProject } from "../../pipeline.js";

const lines = (...text: string[]) => `${text.join("\n")}\n`;

const withRoot = (files: Record<string, string>) =>
  Object.fromEntries(
    Object.entries(files).map(([path, text]): [string, string] => [`/project/${path}`, text]),
  );

const merge = (files: Record<string, string>) =>
  mergeProject({
    entryPath: "/project/main.py",
    host: createMemoryModuleHost({ files: withRoot(files) }),
  });

const mergeFailure = async (files: Record<string, string>): Promise<DiagnosticError> => {
  try {
    await merge(files);
  } catch (error) {
    if (error instanceof DiagnosticError) return error;
    throw error;
  }
  throw new Error("expected the merge to fail");
};

describe("mergeProject", () => {
  it("emits only what the entry point reaches, dependencies first", async () => {
    const result = await merge({
      "main.py": lines(
        "from utils import greet",
        "from models import User",
        "",
        'if __name__ == "__main__":',
        '    user = User("ada")',
        "    print(greet(user))",
      ),
      "utils.py": lines(
        "import os",
        "",
        'PREFIX = "Hello"',
        "",
        "def greet(user):",
        '    return PREFIX + ", " + user.name + os.sep',
        "",
        "def unused():",
        "    return 1",
      ),
      "models.py": lines(
        "class User:",
        "    def __init__(self, name):",
        "        self.name = name",
      ),
    });

    expect(result.code).toBe(
      lines(
        "import os",
        "",
        "# From models.py",
        "class User:",
        "    def __init__(self, name):",
        "        self.name = name",
        "",
        "# From utils.py",
        'PREFIX = "Hello"',
        "",
        "# From utils.py",
        "def greet(user):",
        '    return PREFIX + ", " + user.name + os.sep',
        "",
        'if __name__ == "__main__":',
        '    user = User("ada")',
        "    print(greet(user))",
      ),
    );
    expect(result.outputPath).toBe("/project/main_merged.py");
    expect(result.audit?.passed).toBe(true);
  });

  it("qualifies colliding names with their module", async () => {
    const result = await merge({
      "main.py": lines(
        "from a import helper",
        "from b import helper as b_helper",
        "",
        'if __name__ == "__main__":',
        "    print(helper(), b_helper())",
      ),
      "a.py": lines("def helper():", '    return "a"'),
      "b.py": lines("def helper():", '    return "b"'),
    });

    expect(result.code).toBe(
      lines(
        "# From a.py",
        "def a_helper():",
        '    return "a"',
        "",
        "# From b.py",
        "def b_helper():",
        '    return "b"',
        "",
        'if __name__ == "__main__":',
        "    print(a_helper(), b_helper())",
      ),
    );
    expect(Array.from(result.names.slots.values())).toEqual(["a_helper", "b_helper"]);
  });

  it("qualifies definitions that shadow a builtin another module reads", async () => {
    const result = await merge({
      "main.py": lines(
        "from fmt import format",
        "from report import show",
        "",
        'if __name__ == "__main__":',
        "    print(format(1), show(2))",
      ),
      "fmt.py": lines("def format(value):", "    return str(value)"),
      "report.py": lines("def show(value):", '    return format(value, "05d")'),
    });

    expect(result.code).toBe(
      lines(
        "# From fmt.py",
        "def fmt_format(value):",
        "    return str(value)",
        "",
        "# From report.py",
        "def show(value):",
        '    return format(value, "05d")',
        "",
        'if __name__ == "__main__":',
        "    print(fmt_format(1), show(2))",
      ),
    );
  });

  it("renames forward references written as strings", async () => {
    const result = await merge({
      "main.py": lines(
        "from service import load",
        "from admin import User",
        "",
        'if __name__ == "__main__":',
        "    print(load(), User())",
      ),
      "models.py": lines("class User:", "    pass"),
      "admin.py": lines("class User:", "    pass"),
      "service.py": lines(
        "from models import User",
        "",
        'def load() -> "User":',
        "    return User()",
      ),
    });

    expect(result.code).toBe(
      lines(
        "# From models.py",
        "class models_User:",
        "    pass",
        "",
        "# From service.py",
        'def load() -> "models_User":',
        "    return models_User()",
        "",
        "# From admin.py",
        "class admin_User:",
        "    pass",
        "",
        'if __name__ == "__main__":',
        "    print(load(), admin_User())",
      ),
    );
  });

  it("collapses module paths inside string annotations", async () => {
    const result = await merge({
      "main.py": lines(
        "from service import make",
        "from admin import User",
        "",
        'if __name__ == "__main__":',
        "    print(make(), User())",
      ),
      "models.py": lines("class User:", "    pass"),
      "admin.py": lines("class User:", "    pass"),
      "service.py": lines(
        "import models",
        "",
        "def make(template: 'models.User' = None):",
        "    return models.User()",
      ),
    });

    expect(result.code).toBe(
      lines(
        "# From models.py",
        "class models_User:",
        "    pass",
        "",
        "# From service.py",
        "def make(template: 'models_User' = None):",
        "    return models_User()",
        "",
        "# From admin.py",
        "class admin_User:",
        "    pass",
        "",
        'if __name__ == "__main__":',
        "    print(make(), admin_User())",
      ),
    );
  });

  it("collapses attribute access on merged modules", async () => {
    const result = await merge({
      "main.py": lines(
        "import config",
        "from pkg import tools",
        "",
        'if __name__ == "__main__":',
        "    print(config.NAME, tools.shout(config.NAME))",
      ),
      "config.py": lines('NAME = "demo"'),
      "pkg/__init__.py": "",
      "pkg/tools.py": lines("def shout(text):", "    return text.upper()"),
    });

    expect(result.code).toBe(
      lines(
        "# From config.py",
        'NAME = "demo"',
        "",
        "# From pkg/tools.py",
        "def shout(text):",
        "    return text.upper()",
        "",
        'if __name__ == "__main__":',
        "    print(NAME, shout(NAME))",
      ),
    );
  });

  it("keeps top-level statements of active modules in execution order", async () => {
    const result = await merge({
      "main.py": lines(
        "import registry",
        "from plugins import load_all",
        "",
        "load_all()",
        "",
        'if __name__ == "__main__":',
        "    print(registry.ITEMS)",
      ),
      "registry.py": lines("ITEMS = []", "", "def register(item):", "    ITEMS.append(item)"),
      "plugins.py": lines(
        "from registry import register",
        "",
        "def load_all():",
        '    register("alpha")',
        "",
        'register("core")',
      ),
    });

    expect(result.code).toBe(
      lines(
        "# From registry.py",
        "ITEMS = []",
        "",
        "# From registry.py",
        "def register(item):",
        "    ITEMS.append(item)",
        "",
        "# From plugins.py",
        "def load_all():",
        '    register("alpha")',
        "",
        "# From plugins.py",
        'register("core")',
        "",
        "# From main.py",
        "load_all()",
        "",
        'if __name__ == "__main__":',
        "    print(ITEMS)",
      ),
    );
  });

  it("re-aliases outside imports that collide with merged names", async () => {
    const result = await merge({
      "main.py": lines(
        "from clock import now",
        "from models import datetime",
        "",
        'if __name__ == "__main__":',
        "    print(now(), datetime())",
      ),
      "clock.py": lines("import datetime", "", "def now():", "    return datetime.datetime.now()"),
      "models.py": lines("def datetime():", '    return "model"'),
    });

    expect(result.code).toBe(
      lines(
        "import datetime as datetime_ext",
        "",
        "# From clock.py",
        "def now():",
        "    return datetime_ext.datetime.now()",
        "",
        "# From models.py",
        "def datetime():",
        '    return "model"',
        "",
        'if __name__ == "__main__":',
        "    print(now(), datetime())",
      ),
    );
  });

  it("rejects dotted imports whose package name is taken", async () => {
    const error = await mergeFailure({
      "main.py": lines(
        "from clock import here",
        "from models import os",
        "",
        'if __name__ == "__main__":',
        "    print(here(), os())",
      ),
      "clock.py": lines("import os.path", "", "def here():", '    return os.path.abspath(".")'),
      "models.py": lines("def os():", '    return "model"'),
    });

    expect(error.diagnostic.code).toBe("UC0005");
    expect(error.diagnostic.message).toBe(
      "import os.path binds os, which collides with a merged name and cannot be re-aliased",
    );
  });

  it("reports circular definitions", async () => {
    const error = await mergeFailure({
      "main.py": lines("from game import ping", "", 'if __name__ == "__main__":', "    ping(3)"),
      "game.py": lines(
        "def ping(n):",
        "    return pong(n - 1) if n else 0",
        "",
        "def pong(n):",
        "    return ping(n - 1) if n else 0",
      ),
    });

    expect(error.diagnostic.code).toBe("GR0001");
    expect(error.diagnostic.message).toBe("Circular dependency detected: ping -> pong -> ping");
    expect(error.diagnostic.span.file).toBe("game.py");
  });

  it("reports undefined names in any loaded module", async () => {
    const error = await mergeFailure({
      "main.py": lines("from util import f", "", 'if __name__ == "__main__":', "    f()"),
      "util.py": lines("def f():", "    return g()"),
    });

    expect(error.diagnostic.code).toBe("RS0001");
    expect(error.diagnostic.message).toBe("undefined name g");
    expect(error.diagnostic.span).toMatchObject({ file: "util.py", line: 2 });
  });

  it("reports duplicate module-level definitions at the last one", async () => {
    const error = await mergeFailure({
      "main.py": lines(
        "def run():",
        "    return 1",
        "",
        "def run():",
        "    return 2",
        "",
        'if __name__ == "__main__":',
        "    run()",
      ),
    });

    expect(error.diagnostic.code).toBe("SC0001");
    expect(error.diagnostic.message).toBe("run is defined more than once in module scope");
    expect(error.diagnostic.span.line).toBe(4);
    expect(error.diagnostic.related?.[0]?.span.line).toBe(1);
  });

  it("refuses modules used as values", async () => {
    const error = await mergeFailure({
      "main.py": lines("import config", "", 'if __name__ == "__main__":', "    print(config)"),
      "config.py": lines("DEBUG = False"),
    });

    expect(error.diagnostic.code).toBe("UC0003");
    expect(error.diagnostic.message).toBe(
      "module config is used as a value; only attribute access on merged modules is supported",
    );
  });

  it("refuses dynamic imports in selected code", async () => {
    const error = await mergeFailure({
      "main.py": lines('if __name__ == "__main__":', '    plugin = __import__("plugin")'),
    });

    expect(error.diagnostic.code).toBe("UC0002");
  });

  it("keeps entry assignments that nothing reads", async () => {
    const result = await merge({
      "main.py": lines("from setup import configure", "", "state = configure()", 'print("ready")'),
      "setup.py": lines("def configure():", '    print("configured")', "    return 1"),
    });

    expect(result.code).toBe(
      lines(
        "# From setup.py",
        "def configure():",
        '    print("configured")',
        "    return 1",
        "",
        "# From main.py",
        "state = configure()",
        "",
        "# From main.py",
        'print("ready")',
      ),
    );
  });

  it("refuses dynamic imports in entry assignments", async () => {
    const error = await mergeFailure({
      "main.py": lines("import importlib", "", 'plugin = importlib.import_module("json")'),
    });

    expect(error.diagnostic.code).toBe("UC0002");
    expect(error.diagnostic.message).toBe(
      "dynamic import through importlib.import_module() cannot be merged",
    );
  });

  it("orders a chain of imports across four modules", async () => {
    const result = await merge({
      "main.py": lines(
        "from processor import process",
        "",
        'if __name__ == "__main__":',
        '    print(process(" hi "))',
      ),
      "base.py": lines("def clean(text):", "    return text.strip()"),
      "formatter.py": lines(
        "from base import clean",
        "",
        "def fmt(text):",
        "    return clean(text).title()",
      ),
      "validator.py": lines(
        "from formatter import fmt",
        "",
        "def validate(text):",
        "    return len(fmt(text)) > 0",
      ),
      "processor.py": lines(
        "from validator import validate",
        "",
        "def process(text):",
        "    return validate(text)",
      ),
    });

    expect(result.order.map((key) => result.graph.units.get(key)?.names[0])).toEqual([
      "clean",
      "fmt",
      "validate",
      "process",
    ]);
    expect(result.code).toBe(
      lines(
        "# From base.py",
        "def clean(text):",
        "    return text.strip()",
        "",
        "# From formatter.py",
        "def fmt(text):",
        "    return clean(text).title()",
        "",
        "# From validator.py",
        "def validate(text):",
        "    return len(fmt(text)) > 0",
        "",
        "# From processor.py",
        "def process(text):",
        "    return validate(text)",
        "",
        'if __name__ == "__main__":',
        '    print(process(" hi "))',
      ),
    );
  });

  it("emits imported decorators before the definitions they decorate", async () => {
    const result = await merge({
      "main.py": lines("from jobs import run", "", 'if __name__ == "__main__":', "    print(run())"),
      "decorators.py": lines("def traced(fn):", "    return fn"),
      "jobs.py": lines(
        "from decorators import traced",
        "",
        "@traced",
        "def run():",
        '    return "done"',
      ),
    });

    expect(result.code).toBe(
      lines(
        "# From decorators.py",
        "def traced(fn):",
        "    return fn",
        "",
        "# From jobs.py",
        "@traced",
        "def run():",
        '    return "done"',
        "",
        'if __name__ == "__main__":',
        "    print(run())",
      ),
    );
  });

  it("merges both sides of an import fallback and drops the guard", async () => {
    const result = await merge({
      "main.py": lines(
        "from pkg.codec import encode",
        "",
        'if __name__ == "__main__":',
        '    print(encode("a"))',
      ),
      "pkg/__init__.py": "",
      "pkg/codec.py": lines(
        "try:",
        "    from .fast import encode",
        "except ImportError:",
        "    from .slow import encode",
      ),
      "pkg/fast.py": lines("def encode(text):", "    return text.upper()"),
      "pkg/slow.py": lines("def encode(text):", "    return text.lower()"),
    });

    expect(result.code).toBe(
      lines(
        "# From pkg/fast.py",
        "def pkg_fast_encode(text):",
        "    return text.upper()",
        "",
        "# From pkg/slow.py",
        "def pkg_slow_encode(text):",
        "    return text.lower()",
        "",
        'if __name__ == "__main__":',
        '    print(pkg_fast_encode("a"))',
      ),
    );
  });

  it("drops the main block of imported modules", async () => {
    const result = await merge({
      "main.py": lines(
        "from tool import helper",
        "",
        'if __name__ == "__main__":',
        "    print(helper())",
      ),
      "tool.py": lines(
        "def helper():",
        "    return 1",
        "",
        'if __name__ == "__main__":',
        '    print("tool")',
      ),
    });

    expect(result.code).toBe(
      lines(
        "# From tool.py",
        "def helper():",
        "    return 1",
        "",
        'if __name__ == "__main__":',
        "    print(helper())",
      ),
    );
  });

  it("rejects wildcard imports", async () => {
    const error = await mergeFailure({
      "main.py": lines("from helpers import *", "", 'if __name__ == "__main__":', "    run()"),
      "helpers.py": lines("def run():", "    return 1"),
    });

    expect(error.diagnostic.code).toBe("UC0001");
    expect(error.diagnostic.message).toBe(
      "wildcard import from helpers is not supported; import the needed names explicitly",
    );
  });

  it("binds a class attribute from the module the name was imported from", async () => {
    const result = await merge({
      "main.py": lines(
        "from config import Settings",
        "",
        'if __name__ == "__main__":',
        "    print(Settings.DEBUG)",
      ),
      "flags.py": lines("DEBUG = True"),
      "config.py": lines("from flags import DEBUG", "", "class Settings:", "    DEBUG = DEBUG"),
    });

    expect(result.code).toBe(
      lines(
        "# From flags.py",
        "DEBUG = True",
        "",
        "# From config.py",
        "class Settings:",
        "    DEBUG = DEBUG",
        "",
        'if __name__ == "__main__":',
        "    print(Settings.DEBUG)",
      ),
    );
  });

  it("skips verification when asked", async () => {
    const result = await mergeProject({
      entryPath: "/project/main.py",
      host: createMemoryModuleHost({
        files: withRoot({ "main.py": lines('if __name__ == "__main__":', "    pass") }),
      }),
      verify: false,
      outputPath: "/out/app.py",
    });

    expect(result.audit).toBeUndefined();
    expect(result.outputPath).toBe("/out/app.py");
    expect(result.code).toBe(lines('if __name__ == "__main__":', "    pass"));
  });
});
