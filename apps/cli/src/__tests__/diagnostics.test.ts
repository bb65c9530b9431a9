import { describe, expect, it } from "vitest";
import { diagnosticFromCode } from "@pyfuse/compiler";
import { formatCliDiagnostic } from "../diagnostics.js";

const source = "x = 1\ny = helper()\n";

const readSource = (path: string) => (path === "/project/main.py" ? source : undefined);

const unresolved = () =>
  diagnosticFromCode({
    code: "RS0001",
    params: { kind: "unresolved-name", name: "helper" },
    span: { file: "main.py", start: 10, end: 16, line: 2 },
  });

describe("formatCliDiagnostic", () => {
  it("renders a snippet under the location", () => {
    expect(
      formatCliDiagnostic(unresolved(), { color: false, root: "/project", readSource }),
    ).toBe(
      [
        "/project/main.py:2:5 ERROR [resolver] RS0001: undefined name helper",
        "  |",
        "2 | y = helper()",
        "  |     ^^^^^^ undefined name helper",
      ].join("\n"),
    );
  });

  it("falls back to the span line when the source cannot be read", () => {
    expect(
      formatCliDiagnostic(unresolved(), {
        color: false,
        root: "/project",
        readSource: () => undefined,
      }),
    ).toBe("/project/main.py:2 ERROR [resolver] RS0001: undefined name helper");
  });

  it("appends related notes", () => {
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

    expect(
      formatCliDiagnostic(diagnostic, {
        color: false,
        root: "/project",
        readSource: () => undefined,
      }).split("\n"),
    ).toEqual([
      "/project/main.py:7 ERROR [binder] SC0001: load is defined more than once in module scope",
      "/project/main.py:1 NOTE [binder] SC0001: previous definition of load",
    ]);
  });

  it("lists registry hints last", () => {
    const diagnostic = diagnosticFromCode({
      code: "UC0002",
      params: { kind: "dynamic-import", callee: "__import__" },
      span: { file: "main.py", start: 0, end: 1, line: 1 },
    });
    const lines = formatCliDiagnostic(diagnostic, {
      color: false,
      root: "/project",
      readSource: () => undefined,
    }).split("\n");

    expect(lines.at(-1)).toBe(
      "hint: Replace the dynamic import with a static `import` statement so the merger can see the dependency.",
    );
  });

  it("colors the severity when enabled", () => {
    const header = formatCliDiagnostic(unresolved(), {
      root: "/project",
      readSource: () => undefined,
    });
    expect(header).toContain("\u001B[1m\u001B[31mERROR\u001B[0m\u001B[0m");
  });
});
