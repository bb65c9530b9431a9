import { describe, expect, it } from "vitest";
import { createMemoryModuleHost } from "@pyfuse/compiler";
import { runCommand } from "../exec.js";

const lines = (...text: string[]) => `${text.join("\n")}\n`;

const createIo = (files: Record<string, string>) => {
  const host = createMemoryModuleHost({ files });
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    host,
    stdout,
    stderr,
    io: {
      host,
      stdout: (text: string) => stdout.push(text),
      stderr: (text: string) => stderr.push(text),
      readSource: (path: string) => host.files.get(path),
    },
  };
};

describe("runCommand merge", () => {
  it("writes the merged file beside the entry", async () => {
    const { host, stdout, stderr, io } = createIo({
      "/project/main.py": lines(
        "from util import greet",
        "",
        'if __name__ == "__main__":',
        '    greet("ada")',
      ),
      "/project/util.py": lines("def greet(name):", "    print(name)"),
    });

    const status = await runCommand(
      { command: "merge", entry: "/project/main.py", verify: true, color: false },
      io,
    );

    expect(status).toBe(0);
    expect(stderr).toEqual([]);
    expect(stdout).toEqual(["Merged 1 definitions into /project/main_merged.py"]);
    expect(host.files.get("/project/main_merged.py")).toBe(
      lines(
        "# From util.py",
        "def greet(name):",
        "    print(name)",
        "",
        'if __name__ == "__main__":',
        '    greet("ada")',
      ),
    );
  });

  it("honors an explicit output path", async () => {
    const { host, stdout, io } = createIo({
      "/project/main.py": lines('if __name__ == "__main__":', "    print(1)"),
    });

    const status = await runCommand(
      {
        command: "merge",
        entry: "/project/main.py",
        out: "/dist/app.py",
        verify: false,
        color: false,
      },
      io,
    );

    expect(status).toBe(0);
    expect(stdout).toEqual(["Merged 0 definitions into /dist/app.py"]);
    expect(host.files.has("/dist/app.py")).toBe(true);
  });

  it("prints diagnostics and writes nothing when the merge fails", async () => {
    const { host, stdout, stderr, io } = createIo({
      "/project/main.py": lines('if __name__ == "__main__":', "    print(missing)"),
    });

    const status = await runCommand(
      { command: "merge", entry: "/project/main.py", verify: true, color: false },
      io,
    );

    expect(status).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr[0]?.split("\n")).toEqual([
      "/project/main.py:2:11 ERROR [resolver] RS0001: undefined name missing",
      "  |",
      "2 |     print(missing)",
      "  |           ^^^^^^^ undefined name missing",
    ]);
    expect(host.files.has("/project/main_merged.py")).toBe(false);
  });
});

describe("runCommand audit", () => {
  it("prints warnings for a file that passes", async () => {
    const { stdout, stderr, io } = createIo({
      "/project/app.py": lines("from .utils import helper", "", "helper()"),
    });

    const status = await runCommand(
      { command: "audit", files: ["/project/app.py"], json: false },
      io,
    );

    expect(status).toBe(0);
    expect(stderr).toEqual([]);
    expect(stdout).toEqual([
      [
        "/project/app.py",
        "=== Warnings ===",
        "⚠ AU0002 relative import from .utils may break once the file is moved (line 1)",
      ].join("\n"),
    ]);
  });

  it("fails for unreadable and broken files", async () => {
    const { stdout, stderr, io } = createIo({
      "/project/bad.py": lines("print(missing)"),
    });

    const status = await runCommand(
      { command: "audit", files: ["/project/none.py", "/project/bad.py"], json: false },
      io,
    );

    expect(status).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      "Unable to read /project/none.py: File not found: /project/none.py",
      ["/project/bad.py", "=== Errors ===", "✗ RS0001 undefined name missing (line 1)"].join(
        "\n",
      ),
    ]);
  });

  it("emits structured reports as JSON", async () => {
    const { stdout, io } = createIo({
      "/project/ok.py": lines("VALUE = 1"),
    });

    const status = await runCommand(
      { command: "audit", files: ["/project/ok.py"], json: true },
      io,
    );

    expect(status).toBe(0);
    expect(JSON.parse(stdout[0] ?? "null")).toEqual([
      { path: "/project/ok.py", passed: true, errors: [], warnings: [] },
    ]);
  });
});
