import type { DiagnosticSeverity } from "../diagnostics/index.js";
import type { NodeStore } from "../parser/index.js";
import type { ModuleCatalog } from "../semantics/catalog.js";
import type { ModuleResolution } from "../semantics/resolver.js";

export type AuditFindingKind =
  | "parse-failure"
  | "duplicate-definition"
  | "unresolved-name"
  | "unknown-attribute"
  | "multiple-entry-blocks"
  | "relative-import"
  | "guarded-import"
  | "dynamic-import";

/** Errors and warnings share one shape. */
export interface AuditRecord {
  kind: AuditFindingKind;
  code: string;
  severity: Exclude<DiagnosticSeverity, "note">;
  message: string;
  /** 1-based, ascending, never empty. */
  lines: readonly number[];
}

export interface AuditReport {
  path: string;
  passed: boolean;
  errors: readonly AuditRecord[];
  warnings: readonly AuditRecord[];
}

export interface AuditContext {
  path: string;
  store: NodeStore;
  catalog: ModuleCatalog;
  resolution: ModuleResolution;
}

/** A whole-file pattern check; checks never depend on one another. */
export interface PatternCheck {
  name: string;
  run(context: AuditContext): AuditRecord[];
}
