export * from "./types.js";
export * from "./registry.js";

import {
  type Diagnostic,
  type DiagnosticHint,
  type DiagnosticInput,
  type DiagnosticPhase,
  type DiagnosticSeverity,
  type SourceSpan,
} from "./types.js";
import {
  formatDiagnosticMessage,
  getDiagnosticDefinition,
  type DiagnosticCode,
  type DiagnosticParams,
} from "./registry.js";

const codePhasePrefixes: Record<string, DiagnosticPhase> = {
  PA: "parser",
  MD: "module-graph",
  SC: "binder",
  RS: "resolver",
  UC: "graph",
  GR: "graph",
  AU: "audit",
};

const inferPhase = (code: string): DiagnosticPhase | undefined => {
  const prefix = code.slice(0, 2).toUpperCase();
  return codePhasePrefixes[prefix];
};

export const createDiagnostic = ({
  severity,
  phase,
  ...input
}: DiagnosticInput): Diagnostic => ({
  ...input,
  severity: severity ?? "error",
  phase: phase ?? inferPhase(input.code),
});

type RegistryDiagnosticOptions<K extends DiagnosticCode> = {
  code: K;
  params: DiagnosticParams<K>;
  span: SourceSpan;
  related?: readonly Diagnostic[];
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

export const diagnosticFromCode = <K extends DiagnosticCode>(
  options: RegistryDiagnosticOptions<K>,
): Diagnostic => {
  const definition = getDiagnosticDefinition(options.code);
  return createDiagnostic({
    code: options.code,
    message: formatDiagnosticMessage(options.code, options.params),
    span: options.span,
    related: options.related,
    severity: options.severity ?? definition.severity,
    phase: options.phase ?? definition.phase,
    failure: definition.failure,
    hints: options.hints ?? definition.hints,
  });
};

type DiagnosticsCarrier = DiagnosticEmitter | { diagnostics: DiagnosticEmitter };

export type EmitDiagnosticOptions<K extends DiagnosticCode> =
  RegistryDiagnosticOptions<K> & { ctx: DiagnosticsCarrier };

const getEmitter = (carrier: DiagnosticsCarrier): DiagnosticEmitter =>
  "report" in carrier ? carrier : carrier.diagnostics;

/** Records a registry diagnostic and aborts the current run. */
export const emitDiagnostic = <K extends DiagnosticCode>(
  options: EmitDiagnosticOptions<K>,
): never => {
  const { ctx, ...rest } = options;
  return getEmitter(ctx).error(diagnosticFromCode(rest));
};

const formatLocation = (span: SourceSpan): string =>
  span.line === undefined
    ? `${span.file}:${span.start}-${span.end}`
    : `${span.file}:${span.line}`;

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const location = formatLocation(diagnostic.span);
  const severity = diagnostic.severity.toUpperCase();
  const phase = diagnostic.phase ? `[${diagnostic.phase}] ` : "";
  const failure = diagnostic.failure ? ` ${diagnostic.failure}` : "";
  return `${location} ${severity} ${phase}${diagnostic.code}${failure}: ${diagnostic.message}`;
};

export class DiagnosticError extends Error {
  diagnostic: Diagnostic;
  diagnostics: readonly Diagnostic[];

  constructor(diagnostic: Diagnostic, diagnostics?: readonly Diagnostic[]) {
    super(formatDiagnostic(diagnostic));
    this.name = "DiagnosticError";
    this.diagnostic = diagnostic;
    this.diagnostics =
      diagnostics && diagnostics.length > 0 ? [...diagnostics] : [diagnostic];
  }
}

export class DiagnosticEmitter {
  #diagnostics: Diagnostic[] = [];

  report(input: DiagnosticInput): Diagnostic {
    const diagnostic = createDiagnostic(input);
    this.#diagnostics.push(diagnostic);
    return diagnostic;
  }

  error(input: DiagnosticInput): never {
    const diagnostic = this.report(input);
    throw new DiagnosticError(diagnostic, this.#diagnostics);
  }

  /** Throws when any error-severity diagnostic has been reported. */
  throwIfErrors(): void {
    const first = this.#diagnostics.find(
      (diagnostic) => diagnostic.severity === "error",
    );
    if (first) {
      throw new DiagnosticError(first, this.#diagnostics);
    }
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.#diagnostics;
  }
}

export const normalizeSpan = (
  ...candidates: (SourceSpan | undefined)[]
): SourceSpan => {
  for (const span of candidates) {
    if (span) return span;
  }
  return { file: "<unknown>", start: 0, end: 0 };
};

/** Lines cited by a diagnostic: its own followed by each related one. */
export const diagnosticLines = (diagnostic: Diagnostic): number[] => {
  const lines = [diagnostic.span, ...(diagnostic.related ?? []).map((d) => d.span)]
    .map((span) => span.line)
    .filter((line): line is number => line !== undefined);
  return Array.from(new Set(lines)).sort((left, right) => left - right);
};
