export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "parser"
  | "module-graph"
  | "binder"
  | "resolver"
  | "graph"
  | "audit";

/** Failure taxonomy shared by the merge and audit front ends. */
export type FailureKind =
  | "ParseFailure"
  | "MissingModule"
  | "UnsupportedConstruct"
  | "DuplicateDefinition"
  | "UnresolvedReference"
  | "CircularDependency"
  | "MultipleEntryBlocks"
  | "RelativeImport"
  | "GuardedImport"
  | "DynamicImport";

export interface SourceSpan {
  file: string;
  start: number;
  end: number;
  /** 1-based line of `start`, when known. */
  line?: number;
}

export interface DiagnosticHint {
  message: string;
  docLink?: string;
}

export interface Diagnostic {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  failure?: FailureKind;
  hints?: readonly DiagnosticHint[];
}

export type DiagnosticInput = {
  code: string;
  message: string;
  span: SourceSpan;
  severity?: DiagnosticSeverity;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  failure?: FailureKind;
  hints?: readonly DiagnosticHint[];
};
