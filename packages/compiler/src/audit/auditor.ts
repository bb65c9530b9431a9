import { diagnosticFromCode, type Diagnostic } from "../diagnostics/index.js";
import {
  ParserSyntaxError,
  parseModule,
  parserErrorLocation,
  type NodeStore,
} from "../parser/index.js";
import { incrementPerfCounter } from "../perf.js";
import { buildCatalog, describeScope, type ModuleCatalog } from "../semantics/catalog.js";
import { resolveModule, type ModuleResolution } from "../semantics/resolver.js";
import { auditRecord, auditSpan, defaultPatternChecks } from "./checks.js";
import type { AuditContext, AuditRecord, AuditReport, PatternCheck } from "./types.js";

const AUDIT_MODULE_ID = "__main__";

const byFirstLine = (left: AuditRecord, right: AuditRecord) =>
  (left.lines[0] ?? 0) - (right.lines[0] ?? 0);

type ParsedFile =
  | { ok: true; store: NodeStore }
  | { ok: false; record: AuditRecord };

const parseForAudit = (source: string, path: string): ParsedFile => {
  try {
    return { ok: true, store: parseModule(source, path) };
  } catch (error) {
    if (!(error instanceof ParserSyntaxError)) throw error;
    const location = parserErrorLocation(error);
    const index = location?.index ?? 0;
    return {
      ok: false,
      record: auditRecord(
        "parse-failure",
        diagnosticFromCode({
          code: "PA0001",
          params: { kind: "syntax-error", detail: error.message },
          span: { file: path, start: index, end: index, line: location?.line ?? 1 },
        }),
      ),
    };
  }
};

/** Stage 1: duplicate bindings. Module scope is an error, nested scopes a warning. */
const duplicateRecords = (catalog: ModuleCatalog, path: string): AuditRecord[] => {
  const { table } = catalog;
  return catalog.duplicates.map((duplicate) => {
    const records = duplicate.symbols.map((symbol) => table.getSymbol(symbol));
    const moduleScope = duplicate.scope === table.rootScope;
    const [first, ...rest] = records;
    const span = first
      ? auditSpan(path, first.span, first.line)
      : { file: path, start: 0, end: 0 };
    const diagnostic: Diagnostic = diagnosticFromCode({
      code: "SC0001",
      params: {
        kind: "duplicate-definition",
        name: duplicate.name,
        scope: describeScope(catalog, duplicate.scope),
      },
      span,
      severity: moduleScope ? "error" : "warning",
      related: rest.map((record) =>
        diagnosticFromCode({
          code: "SC0001",
          params: { kind: "previous-definition", name: record.name },
          span: auditSpan(path, record.span, record.line),
          severity: "note",
        }),
      ),
    });
    return auditRecord("duplicate-definition", diagnostic);
  });
};

/** Stage 2: unresolved names, one record per name, and unknown class attributes. */
const referenceRecords = (resolution: ModuleResolution, path: string): AuditRecord[] => {
  const unresolved = new Map<string, Diagnostic[]>();
  const records: AuditRecord[] = [];

  resolution.issues.forEach((issue) => {
    const span = auditSpan(path, issue.span, issue.line);
    if (issue.kind === "unresolved-name") {
      const sites = unresolved.get(issue.name) ?? [];
      sites.push(
        diagnosticFromCode({
          code: "RS0001",
          params: { kind: "unresolved-name", name: issue.name },
          span,
        }),
      );
      unresolved.set(issue.name, sites);
      return;
    }
    if (issue.kind === "unknown-attribute" && issue.owner.kind === "class") {
      records.push(
        auditRecord(
          "unknown-attribute",
          diagnosticFromCode({
            code: "RS0002",
            params: {
              kind: "unknown-class-attribute",
              owner: issue.owner.name,
              attribute: issue.attribute,
            },
            span,
          }),
        ),
      );
    }
  });

  unresolved.forEach(([first, ...rest]) => {
    if (!first) return;
    records.push(auditRecord("unresolved-name", { ...first, related: rest }));
  });
  return records;
};

/**
 * Single-file auditor. Every stage runs to completion so one pass reports
 * every problem; only syntax errors stop it early.
 */
export class Auditor {
  private readonly checks: readonly PatternCheck[];
  private report: AuditReport = { path: "<unknown>", passed: true, errors: [], warnings: [] };

  constructor({ checks = defaultPatternChecks }: { checks?: readonly PatternCheck[] } = {}) {
    this.checks = checks;
  }

  audit(sourceText: string, displayPath = "<unknown>"): boolean {
    this.report = this.run(sourceText, displayPath);
    incrementPerfCounter("audit.files");
    return this.report.passed;
  }

  getReport(): AuditReport {
    return this.report;
  }

  private run(source: string, path: string): AuditReport {
    const parsed = parseForAudit(source, path);
    if (!parsed.ok) {
      return { path, passed: false, errors: [parsed.record], warnings: [] };
    }

    const catalog = buildCatalog({ store: parsed.store, moduleId: AUDIT_MODULE_ID });
    const resolution = resolveModule(catalog);
    const context: AuditContext = { path, store: parsed.store, catalog, resolution };

    const findings = [
      ...duplicateRecords(catalog, path),
      ...referenceRecords(resolution, path),
      ...this.checks.flatMap((check) => check.run(context)),
    ];
    const errors = findings.filter((record) => record.severity === "error").sort(byFirstLine);
    const warnings = findings
      .filter((record) => record.severity === "warning")
      .sort(byFirstLine);
    return { path, passed: errors.length === 0, errors, warnings };
  }
}

export const auditSource = ({
  source,
  path,
  checks,
}: {
  source: string;
  path: string;
  checks?: readonly PatternCheck[];
}): AuditReport => {
  const auditor = new Auditor({ checks });
  auditor.audit(source, path);
  return auditor.getReport();
};
