import {
  diagnosticFromCode,
  diagnosticLines,
  type Diagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import type { NodeId, TextSpan } from "../parser/index.js";
import { findDynamicImports } from "../semantics/dynamic-imports.js";
import { isEntryBlock } from "../semantics/patterns.js";
import type {
  AuditContext,
  AuditFindingKind,
  AuditRecord,
  PatternCheck,
} from "./types.js";

export const auditRecord = (
  kind: AuditFindingKind,
  diagnostic: Diagnostic,
): AuditRecord => ({
  kind,
  code: diagnostic.code,
  severity: diagnostic.severity === "error" ? "error" : "warning",
  message: diagnostic.message,
  lines: diagnosticLines(diagnostic),
});

export const auditSpan = (
  path: string,
  span: TextSpan,
  line: number,
): SourceSpan => ({ file: path, start: span.start, end: span.end, line });

export const multipleEntryBlocks: PatternCheck = {
  name: "multiple-entry-blocks",
  run: ({ path, store }) => {
    const blocks = store.body
      .filter((statement) => isEntryBlock(store, statement))
      .map((statement) => store.get(statement));
    const [first, ...others] = blocks;
    if (!first || others.length === 0) return [];

    return [
      auditRecord(
        "multiple-entry-blocks",
        diagnosticFromCode({
          code: "AU0001",
          params: { kind: "multiple-entry-blocks", count: blocks.length },
          span: auditSpan(path, first.span, first.line),
          related: others.map((block) =>
            diagnosticFromCode({
              code: "AU0001",
              params: { kind: "other-entry-block" },
              span: auditSpan(path, block.span, block.line),
              severity: "note",
            }),
          ),
        }),
      ),
    ];
  },
};

export const relativeImports: PatternCheck = {
  name: "relative-import",
  run: ({ path, store, catalog }) =>
    catalog.importStatements.flatMap((statement) => {
      const node = store.get(statement);
      if (node.kind !== "import-from" || node.level === 0) return [];
      const module = `${".".repeat(node.level)}${node.module ?? ""}`;
      return [
        auditRecord(
          "relative-import",
          diagnosticFromCode({
            code: "AU0002",
            params: { kind: "relative-import", module },
            span: auditSpan(path, node.span, node.line),
          }),
        ),
      ];
    }),
};

const isGuard = (context: AuditContext, statement: NodeId) => {
  const node = context.store.get(statement);
  if (node.kind === "try") return true;
  return node.kind === "if" && !isEntryBlock(context.store, statement);
};

export const guardedImports: PatternCheck = {
  name: "guarded-import",
  run: (context) => {
    const { path, store, catalog } = context;
    const { table } = catalog;
    return store.body
      .filter((statement) => isGuard(context, statement))
      .flatMap((statement) => Array.from(store.descendants(statement)))
      .flatMap((id) => {
        const node = store.get(id);
        if (node.kind !== "import" && node.kind !== "import-from") return [];
        if (table.scopeOf(id) !== table.rootScope) return [];
        const names = node.names.map((alias) => alias.asname ?? alias.name);
        return [
          auditRecord(
            "guarded-import",
            diagnosticFromCode({
              code: "AU0003",
              params: { kind: "guarded-import", names },
              span: auditSpan(path, node.span, node.line),
            }),
          ),
        ];
      });
  },
};

export const dynamicImports: PatternCheck = {
  name: "dynamic-import",
  run: ({ path, store, resolution }) =>
    findDynamicImports(resolution).map(({ call, via }) =>
      auditRecord(
        "dynamic-import",
        diagnosticFromCode({
          code: "AU0004",
          params: { kind: "dynamic-import", callee: via },
          span: auditSpan(path, store.get(call.node).span, call.line),
        }),
      ),
    ),
};

export const defaultPatternChecks: readonly PatternCheck[] = [
  multipleEntryBlocks,
  relativeImports,
  guardedImports,
  dynamicImports,
];
