import { DiagnosticEmitter, diagnosticFromCode } from "../diagnostics/index.js";
import type { LoadedProgram } from "../modules/types.js";
import type { ModuleId } from "../semantics/ids.js";
import {
  slotKey,
  type DependencyGraph,
  type ExternalBinding,
  type NamePlan,
  type SlotRef,
} from "./types.js";

const modulePrefix = (moduleId: ModuleId): string =>
  moduleId.replace(/\./g, "_").replace(/\W/g, "_");

export const qualifiedSlotName = (slot: SlotRef): string => {
  const prefix = modulePrefix(slot.moduleId);
  return prefix ? `${prefix}_${slot.name}` : slot.name;
};

const uniqueName = (base: string, taken: ReadonlySet<string>) => {
  if (!taken.has(base)) return base;
  let counter = 2;
  while (taken.has(`${base}_${counter}`)) counter += 1;
  return `${base}_${counter}`;
};

const externalSuffix = (base: string, taken: ReadonlySet<string>) => {
  let candidate = `${base}_ext`;
  let counter = 2;
  while (taken.has(candidate)) {
    candidate = `${base}_ext${counter}`;
    counter += 1;
  }
  return candidate;
};

/**
 * Bindings that must share one local name: plain imports of the same
 * package, and alternatives that bind the same name in one module.
 */
const externalIdentities = (external: ExternalBinding): string[] => {
  const identities = [`${external.origin.moduleId}:${external.bound}`];
  if (external.binding.form === "import" && external.binding.asname === undefined) {
    identities.push(`plain:${external.bound}`);
  }
  return identities;
};

class ConflictResolver {
  private readonly graph: DependencyGraph;
  private readonly diagnostics = new DiagnosticEmitter();
  private readonly taken = new Set<string>();
  private readonly slots = new Map<string, string>();
  private readonly externals = new Map<string, string>();

  constructor(graph: DependencyGraph) {
    this.graph = graph;
  }

  resolve(): NamePlan {
    this.nameSlots();
    this.nameExternals();
    this.diagnostics.throwIfErrors();
    this.recordQualifiedNames(this.graph.program);
    return { slots: this.slots, externals: this.externals };
  }

  /** Modules whose selected code reads each builtin name. */
  private builtinReaders(): Map<string, Set<ModuleId>> {
    const readers = new Map<string, Set<ModuleId>>();
    this.graph.selected.forEach((key) => {
      const unit = this.graph.units.get(key);
      const resolution = unit && this.graph.resolutions.get(unit.moduleId);
      if (!unit || !resolution) return;
      resolution.catalog.occurrences.forEach((occurrence, index) => {
        if (occurrence.topLevel !== unit.statement) return;
        if (resolution.names[index]?.kind !== "builtin") return;
        const modules = readers.get(occurrence.name) ?? new Set<ModuleId>();
        modules.add(unit.moduleId);
        readers.set(occurrence.name, modules);
      });
    });
    return readers;
  }

  private nameSlots() {
    const counts = new Map<string, number>();
    this.graph.slots.forEach(({ name }) => counts.set(name, (counts.get(name) ?? 0) + 1));

    // A definition named like a builtin would capture another module's reads of it.
    const readers = this.builtinReaders();
    const shadowsBuiltin = (slot: SlotRef) =>
      Array.from(readers.get(slot.name) ?? []).some((moduleId) => moduleId !== slot.moduleId);

    const colliding: SlotRef[] = [];
    this.graph.slots.forEach((slot) => {
      if ((counts.get(slot.name) ?? 0) > 1 || shadowsBuiltin(slot)) {
        colliding.push(slot);
        return;
      }
      this.slots.set(slotKey(slot), slot.name);
      this.taken.add(slot.name);
    });

    colliding.forEach((slot) => {
      const name = uniqueName(qualifiedSlotName(slot), this.taken);
      this.slots.set(slotKey(slot), name);
      this.taken.add(name);
    });
  }

  private nameExternals() {
    const byIdentity = new Map<string, string>();

    this.graph.externals.forEach((external) => {
      const identities = externalIdentities(external);
      const own = this.slots.get(
        slotKey({ moduleId: external.origin.moduleId, name: external.bound }),
      );
      const shared = identities
        .map((identity) => byIdentity.get(identity))
        .find((name) => name !== undefined);
      const name = own ?? shared ?? this.freshExternalName(external);

      identities.forEach((identity) => byIdentity.set(identity, name));
      this.externals.set(external.key, name);
    });
  }

  private freshExternalName(external: ExternalBinding): string {
    if (!this.taken.has(external.bound)) {
      this.taken.add(external.bound);
      return external.bound;
    }

    if (external.dottedPlain) {
      const module = this.graph.program.modules.get(external.origin.moduleId);
      const record = module?.catalog.table.getSymbol(external.origin.symbol);
      this.diagnostics.report(
        diagnosticFromCode({
          code: "UC0005",
          params: {
            kind: "dotted-import-collision",
            module: external.binding.module,
            name: external.bound,
          },
          span: {
            file: module?.relativePath ?? external.origin.moduleId,
            start: record?.span.start ?? 0,
            end: record?.span.end ?? 0,
            line: record?.line,
          },
        }),
      );
      return external.bound;
    }

    const name = externalSuffix(external.bound, this.taken);
    this.taken.add(name);
    return name;
  }

  private recordQualifiedNames(program: LoadedProgram) {
    this.graph.slots.forEach((slot) => {
      const name = this.slots.get(slotKey(slot));
      const table = program.modules.get(slot.moduleId)?.catalog.table;
      if (name === undefined || !table) return;
      table
        .bindingsOf(slot.name, table.rootScope)
        .forEach((symbol) => table.setQualifiedName(symbol, name));
    });
  }
}

/**
 * Chooses the final name of every emitted module-scope binding. Names only
 * change when two included bindings share a bare name, or when a binding
 * would shadow a builtin that another module reads.
 */
export const resolveConflicts = (graph: DependencyGraph): NamePlan =>
  new ConflictResolver(graph).resolve();
