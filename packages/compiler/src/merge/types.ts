import type { AuditReport } from "../audit/types.js";
import type { NodeId, TextSpan } from "../parser/index.js";
import type { ImportBinding } from "../semantics/binder/index.js";
import type { ModuleId, SymbolRef } from "../semantics/ids.js";
import type { ModuleResolution } from "../semantics/resolver.js";
import type { LoadedProgram } from "../modules/types.js";

/**
 * How a top-level statement takes part in the merge:
 * definitions are ordered topologically, statements keep execution order,
 * imports are rewritten away, inert statements are dropped.
 */
export type UnitKind = "definition" | "statement" | "entry" | "import" | "inert";

export interface TopLevelUnit {
  /** `${moduleId}@${statement}` */
  key: string;
  moduleId: ModuleId;
  statement: NodeId;
  kind: UnitKind;
  /** Module-scope names the statement binds, imports excluded. */
  names: readonly string[];
  line: number;
}

/** A module-scope name of one module. */
export interface SlotRef {
  moduleId: ModuleId;
  name: string;
}

export const slotKey = (slot: SlotRef): string => `${slot.moduleId}:${slot.name}`;

/** A module-scope import of something outside the project. */
export interface ExternalBinding {
  /** Identity used for de-duplication: form, module, name and alias. */
  key: string;
  binding: ImportBinding;
  /** Import symbol that first brought the binding into the program. */
  origin: SymbolRef;
  /** Name the binding introduces. */
  bound: string;
  /** Statement `import x` binding the package of a dotted path. */
  dottedPlain: boolean;
  /** Whether the import statement is itself a top-level statement. */
  header: boolean;
}

export const externalBindingKey = (binding: ImportBinding): string =>
  [binding.form, binding.module, binding.name ?? "", binding.asname ?? ""].join("|");

export type ReferenceTarget =
  | { kind: "slot"; slot: SlotRef }
  | { kind: "external"; binding: string };

/** Source text inside a unit that is replaced by the final name of its target. */
export interface UnitReference {
  span: TextSpan;
  text: string;
  target: ReferenceTarget;
  /** Chain collapses win over the head name they contain. */
  collapse: boolean;
}

/** Edge convention: `from` depends on `to`. */
export interface DependencyEdge {
  from: string;
  to: string;
}

export interface DependencyGraph {
  program: LoadedProgram;
  resolutions: ReadonlyMap<ModuleId, ModuleResolution>;
  units: ReadonlyMap<string, TopLevelUnit>;
  /** Selected units in discovery order. */
  selected: readonly string[];
  edges: readonly DependencyEdge[];
  /** Units emitted in the definitions section, discovery order. */
  definitions: readonly string[];
  /** Preserved executable statements, per module in source order. */
  statements: ReadonlyMap<ModuleId, readonly string[]>;
  entryBlock?: string;
  activeModules: ReadonlySet<ModuleId>;
  /** Names bound by selected units, in discovery order. */
  slots: readonly SlotRef[];
  /** Referenced external bindings, first seen first. */
  externals: ReadonlyMap<string, ExternalBinding>;
  references: ReadonlyMap<string, readonly UnitReference[]>;
  /** `from __future__` features of active modules. */
  futureFeatures: readonly string[];
}

export interface NamePlan {
  /** Final name per `slotKey`. */
  slots: ReadonlyMap<string, string>;
  /** Final local name per external binding key. */
  externals: ReadonlyMap<string, string>;
}

export interface MergeResult {
  code: string;
  outputPath: string;
  graph: DependencyGraph;
  names: NamePlan;
  order: readonly string[];
  /** Audit of the merged text, unless verification was turned off. */
  audit?: AuditReport;
}
