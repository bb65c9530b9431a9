import { describe, expect, it } from "vitest";
import { Auditor, auditSource } from "../auditor.js";
import { formatAuditReport } from "../format.js";

const lines = (...text: string[]) => `${text.join("\n")}\n`;

const summary = (records: readonly { code: string; lines: readonly number[] }[]) =>
  records.map(({ code, lines: at }) => `${code}@${at.join(",")}`);

describe("Auditor", () => {
  it("passes a clean file", () => {
    const auditor = new Auditor();
    const passed = auditor.audit(
      lines("def main():", "    return 0", "", 'if __name__ == "__main__":', "    main()"),
      "clean.py",
    );

    expect(passed).toBe(true);
    const report = auditor.getReport();
    expect(report.path).toBe("clean.py");
    expect(formatAuditReport(report)).toBe("✓ Audit passed: no issues found");
  });

  it("reports every problem of a file in one pass", () => {
    const report = auditSource({
      path: "app.py",
      source: lines(
        "from .utils import helper",
        "",
        "def run():",
        "    return helper() + missing",
        "",
        "def run():",
        "    return missing",
        "",
        'if __name__ == "__main__":',
        "    run()",
        "",
        'if __name__ == "__main__":',
        "    run()",
      ),
    });

    expect(report.passed).toBe(false);
    expect(summary(report.errors)).toEqual(["SC0001@3,6", "RS0001@4,7", "AU0001@9,12"]);
    expect(summary(report.warnings)).toEqual(["AU0002@1"]);
    expect(formatAuditReport(report)).toBe(
      [
        "=== Errors ===",
        "✗ SC0001 run is defined more than once in module scope (lines 3, 6)",
        "✗ RS0001 undefined name missing (lines 4, 7)",
        '✗ AU0001 found 2 top-level `if __name__ == "__main__"` blocks; keep exactly one (lines 9, 12)',
        "",
        "=== Warnings ===",
        "⚠ AU0002 relative import from .utils may break once the file is moved (line 1)",
      ].join("\n"),
    );
  });

  it("warns about guarded and dynamic imports without failing", () => {
    const report = auditSource({
      path: "compat.py",
      source: lines(
        "try:",
        "    import simplejson as json",
        "except ImportError:",
        "    import json",
        "",
        "import importlib",
        "",
        'plugin = importlib.import_module("plugins")',
      ),
    });

    expect(report.passed).toBe(true);
    expect(report.errors).toEqual([]);
    expect(report.warnings.map((record) => [record.kind, record.lines[0]])).toEqual([
      ["guarded-import", 2],
      ["guarded-import", 4],
      ["dynamic-import", 8],
    ]);
    expect(report.warnings[0]?.message).toBe(
      "conditional import of json is processed unconditionally when merging",
    );
    expect(report.warnings[2]?.message).toBe(
      "dynamic import through importlib.import_module() is invisible to static analysis",
    );
  });

  it("treats duplicates inside a class as warnings", () => {
    const report = auditSource({
      path: "shape.py",
      source: lines(
        "class Shape:",
        "    def area(self):",
        "        return 0",
        "",
        "    def area(self):",
        "        return 1",
      ),
    });

    expect(report.passed).toBe(true);
    expect(report.warnings).toEqual([
      {
        kind: "duplicate-definition",
        code: "SC0001",
        severity: "warning",
        message: "area is defined more than once in class Shape",
        lines: [2, 5],
      },
    ]);
  });

  it("flags unknown attributes of local classes", () => {
    const report = auditSource({
      path: "box.py",
      source: lines("class Box:", "    size = 1", "", "print(Box.width)"),
    });

    expect(report.errors).toEqual([
      {
        kind: "unknown-attribute",
        code: "RS0002",
        severity: "error",
        message: "class Box has no attribute width",
        lines: [4],
      },
    ]);
  });

  it("accepts attribute calls on a variable that was rebound", () => {
    const report = auditSource({
      path: "rebind.py",
      source: lines(
        "class Foo:",
        "    pass",
        "",
        "def f():",
        "    x = Foo()",
        "    x = [1]",
        "    x.append(3)",
      ),
    });

    expect(report.passed).toBe(true);
    expect(report.errors).toEqual([]);
    expect(report.warnings).toEqual([]);
  });

  it("fails a class body that reads a name before anything binds it", () => {
    const report = auditSource({
      path: "settings.py",
      source: lines("class Settings:", "    DEBUG = DEBUG"),
    });

    expect(report.passed).toBe(false);
    expect(summary(report.errors)).toEqual(["RS0001@2"]);
    expect(report.errors[0]?.message).toBe("undefined name DEBUG");
  });

  it("stops at syntax errors", () => {
    const report = auditSource({ path: "broken.py", source: "x = 1\ndef broken(:\n" });

    expect(report.passed).toBe(false);
    expect(report.warnings).toEqual([]);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]?.kind).toBe("parse-failure");
    expect(report.errors[0]?.lines).toEqual([2]);
    expect(report.errors[0]?.message).toMatch(/^syntax error: /);
  });

  it("runs only the pattern checks it is given", () => {
    const auditor = new Auditor({ checks: [] });
    expect(auditor.audit("from . import sibling\n", "pkg.py")).toBe(true);
    expect(auditor.getReport().warnings).toEqual([]);
  });
});
