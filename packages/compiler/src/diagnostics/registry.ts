import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
  FailureKind,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  failure: FailureKind;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const dynamicImportHint: DiagnosticHint = {
  message:
    "Replace the dynamic import with a static `import` statement so the merger can see the dependency.",
};

const cycleHint: DiagnosticHint = {
  message:
    "Move the shared logic into a third definition, or pass one definition to the other as an argument.",
};

type DiagnosticParamsMap = {
  PA0001: { kind: "syntax-error"; detail: string };
  MD0001:
    | { kind: "missing-module"; requested: string }
    | { kind: "referenced-from"; importer: string };
  MD0002: { kind: "load-failed"; path: string; errorMessage: string };
  MD0003:
    | { kind: "missing-import-target"; module: string; name: string }
    | { kind: "relative-beyond-top"; level: number };
  UC0001: { kind: "wildcard-import"; module: string };
  UC0002: { kind: "dynamic-import"; callee: string };
  UC0003: { kind: "module-as-value"; module: string };
  UC0004: { kind: "module-attribute-store"; module: string; attribute: string };
  UC0005: { kind: "dotted-import-collision"; module: string; name: string };
  SC0001:
    | { kind: "duplicate-definition"; name: string; scope: string }
    | { kind: "previous-definition"; name: string };
  RS0001: { kind: "unresolved-name"; name: string };
  RS0002:
    | { kind: "unknown-class-attribute"; owner: string; attribute: string }
    | { kind: "unknown-module-attribute"; module: string; attribute: string };
  GR0001: { kind: "circular-dependency"; cycle: readonly string[] };
  AU0001:
    | { kind: "multiple-entry-blocks"; count: number }
    | { kind: "other-entry-block" };
  AU0002: { kind: "relative-import"; module: string };
  AU0003: { kind: "guarded-import"; names: readonly string[] };
  AU0004: { kind: "dynamic-import"; callee: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  PA0001: {
    code: "PA0001",
    message: (params) => `syntax error: ${params.detail}`,
    failure: "ParseFailure",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PA0001"]>,
  MD0001: {
    code: "MD0001",
    message: (params) =>
      params.kind === "missing-module"
        ? `Unable to resolve module ${params.requested}`
        : `Referenced from ${params.importer}`,
    failure: "MissingModule",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0001"]>,
  MD0002: {
    code: "MD0002",
    message: (params) =>
      `Unable to load module ${params.path}: ${params.errorMessage}`,
    failure: "MissingModule",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0002"]>,
  MD0003: {
    code: "MD0003",
    message: (params) =>
      params.kind === "missing-import-target"
        ? `Module ${params.module} has no definition or submodule named ${params.name}`
        : `relative import of level ${params.level} reaches above the project root`,
    failure: "MissingModule",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0003"]>,
  UC0001: {
    code: "UC0001",
    message: (params) =>
      `wildcard import from ${params.module} is not supported; import the needed names explicitly`,
    failure: "UnsupportedConstruct",
    severity: "error",
    phase: "graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["UC0001"]>,
  UC0002: {
    code: "UC0002",
    message: (params) =>
      `dynamic import through ${params.callee}() cannot be merged`,
    failure: "UnsupportedConstruct",
    severity: "error",
    phase: "graph",
    hints: [dynamicImportHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["UC0002"]>,
  UC0003: {
    code: "UC0003",
    message: (params) =>
      `module ${params.module} is used as a value; only attribute access on merged modules is supported`,
    failure: "UnsupportedConstruct",
    severity: "error",
    phase: "graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["UC0003"]>,
  UC0004: {
    code: "UC0004",
    message: (params) =>
      `assignment to ${params.module}.${params.attribute} mutates a merged module`,
    failure: "UnsupportedConstruct",
    severity: "error",
    phase: "graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["UC0004"]>,
  UC0005: {
    code: "UC0005",
    message: (params) =>
      `import ${params.module} binds ${params.name}, which collides with a merged name and cannot be re-aliased`,
    failure: "UnsupportedConstruct",
    severity: "error",
    phase: "graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["UC0005"]>,
  SC0001: {
    code: "SC0001",
    message: (params) =>
      params.kind === "duplicate-definition"
        ? `${params.name} is defined more than once in ${params.scope}`
        : `previous definition of ${params.name}`,
    failure: "DuplicateDefinition",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SC0001"]>,
  RS0001: {
    code: "RS0001",
    message: (params) => `undefined name ${params.name}`,
    failure: "UnresolvedReference",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0001"]>,
  RS0002: {
    code: "RS0002",
    message: (params) =>
      params.kind === "unknown-class-attribute"
        ? `class ${params.owner} has no attribute ${params.attribute}`
        : `module ${params.module} has no attribute ${params.attribute}`,
    failure: "UnresolvedReference",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0002"]>,
  GR0001: {
    code: "GR0001",
    message: (params) =>
      `Circular dependency detected: ${params.cycle.join(" -> ")}`,
    failure: "CircularDependency",
    severity: "error",
    hints: [cycleHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["GR0001"]>,
  AU0001: {
    code: "AU0001",
    message: (params) =>
      params.kind === "multiple-entry-blocks"
        ? `found ${params.count} top-level \`if __name__ == "__main__"\` blocks; keep exactly one`
        : "another entry block is here",
    failure: "MultipleEntryBlocks",
    severity: "error",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AU0001"]>,
  AU0002: {
    code: "AU0002",
    message: (params) =>
      `relative import from ${params.module} may break once the file is moved`,
    failure: "RelativeImport",
    severity: "warning",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AU0002"]>,
  AU0003: {
    code: "AU0003",
    message: (params) =>
      `conditional import of ${params.names.join(", ")} is processed unconditionally when merging`,
    failure: "GuardedImport",
    severity: "warning",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AU0003"]>,
  AU0004: {
    code: "AU0004",
    message: (params) =>
      `dynamic import through ${params.callee}() is invisible to static analysis`,
    failure: "DynamicImport",
    severity: "warning",
    hints: [dynamicImportHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["AU0004"]>,
};

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const isDiagnosticCode = (value: string): value is DiagnosticCode =>
  Object.hasOwn(diagnosticsRegistry, value);
