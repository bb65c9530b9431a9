import { describe, expect, it } from "vitest";
import {
  DiagnosticEmitter,
  DiagnosticError,
  diagnosticFromCode,
  diagnosticLines,
  formatDiagnostic,
  isDiagnosticCode,
  normalizeSpan,
} from "../index.js";

describe("diagnostic utilities", () => {
  it("formats diagnostics with the inferred phase and failure kind", () => {
    const diagnostic = diagnosticFromCode({
      code: "RS0001",
      params: { kind: "unresolved-name", name: "helper" },
      span: { file: "main.py", start: 4, end: 10, line: 2 },
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "main.py:2 ERROR [resolver] RS0001 UnresolvedReference: undefined name helper",
    );
  });

  it("falls back to offsets when the line is unknown", () => {
    const diagnostic = diagnosticFromCode({
      code: "MD0001",
      params: { kind: "missing-module", requested: "pkg.util" },
      span: { file: "main.py", start: 0, end: 0 },
    });

    expect(formatDiagnostic(diagnostic)).toBe(
      "main.py:0-0 ERROR [module-graph] MD0001 MissingModule: Unable to resolve module pkg.util",
    );
  });

  it("uses the registry phase for graph-level constructs", () => {
    const diagnostic = diagnosticFromCode({
      code: "UC0001",
      params: { kind: "wildcard-import", module: "helpers" },
      span: { file: "main.py", start: 0, end: 24, line: 1 },
    });
    expect(diagnostic.phase).toBe("graph");
    expect(diagnostic.failure).toBe("UnsupportedConstruct");
  });

  it("normalizes to the first available span", () => {
    const fallback = { file: "fallback", start: 0, end: 0 };
    const span = normalizeSpan(undefined, fallback);
    expect(span.file).toBe("fallback");
    expect(span.start).toBe(0);
  });

  it("carries registry hints onto diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "UC0002",
      params: { kind: "dynamic-import", callee: "__import__" },
      span: { file: "main.py", start: 0, end: 1, line: 1 },
    });
    expect(diagnostic.message).toBe("dynamic import through __import__() cannot be merged");
    expect(diagnostic.hints?.[0]?.message).toContain("static `import` statement");
  });

  it("joins cycle members in order", () => {
    const diagnostic = diagnosticFromCode({
      code: "GR0001",
      params: { kind: "circular-dependency", cycle: ["ping", "pong", "ping"] },
      span: { file: "main.py", start: 0, end: 1, line: 1 },
    });
    expect(diagnostic.message).toBe("Circular dependency detected: ping -> pong -> ping");
  });

  it("lists the lines of a diagnostic and its related notes", () => {
    const diagnostic = diagnosticFromCode({
      code: "SC0001",
      params: { kind: "duplicate-definition", name: "load", scope: "module scope" },
      span: { file: "main.py", start: 40, end: 44, line: 7 },
      related: [
        diagnosticFromCode({
          code: "SC0001",
          params: { kind: "previous-definition", name: "load" },
          span: { file: "main.py", start: 4, end: 8, line: 1 },
          severity: "note",
        }),
      ],
    });
    expect(diagnosticLines(diagnostic)).toEqual([1, 7]);
    expect(diagnostic.related?.[0]?.severity).toBe("note");
  });

  it("recognizes registered codes", () => {
    expect(isDiagnosticCode("GR0001")).toBe(true);
    expect(isDiagnosticCode("XX0000")).toBe(false);
  });
});

describe("DiagnosticEmitter", () => {
  it("only throws once an error has been reported", () => {
    const emitter = new DiagnosticEmitter();
    emitter.report(
      diagnosticFromCode({
        code: "AU0002",
        params: { kind: "relative-import", module: ".util" },
        span: { file: "main.py", start: 0, end: 1, line: 1 },
      }),
    );
    expect(() => emitter.throwIfErrors()).not.toThrow();

    emitter.report(
      diagnosticFromCode({
        code: "RS0001",
        params: { kind: "unresolved-name", name: "missing" },
        span: { file: "main.py", start: 5, end: 12, line: 3 },
      }),
    );

    let caught: unknown;
    try {
      emitter.throwIfErrors();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DiagnosticError);
    if (!(caught instanceof DiagnosticError)) return;
    expect(caught.diagnostic.code).toBe("RS0001");
    expect(caught.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      "AU0002",
      "RS0001",
    ]);
  });
});
