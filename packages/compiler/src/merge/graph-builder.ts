import {
  DiagnosticEmitter,
  diagnosticFromCode,
  type Diagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import { importBindings } from "../modules/graph.js";
import type { LoadedProgram, PyModule } from "../modules/types.js";
import type { NodeId, TextSpan } from "../parser/index.js";
import { incrementPerfCounter } from "../perf.js";
import { describeScope } from "../semantics/catalog.js";
import { findDynamicImports } from "../semantics/dynamic-imports.js";
import type { ModuleId, SymbolId, SymbolRef } from "../semantics/ids.js";
import { isFutureImport, stringAnnotations } from "../semantics/patterns.js";
import type { ModuleResolution, ResolutionIssue } from "../semantics/resolver.js";
import {
  externalBindingKey,
  slotKey,
  type DependencyEdge,
  type DependencyGraph,
  type ExternalBinding,
  type ReferenceTarget,
  type SlotRef,
  type TopLevelUnit,
  type UnitReference,
} from "./types.js";
import { collectUnits, unitKey } from "./units.js";

/** The entry module's assignments run even when nothing reads them. */
const isAssignment = (module: PyModule, unit: TopLevelUnit): boolean => {
  const { kind } = module.store.get(unit.statement);
  return kind === "assign" || kind === "ann-assign";
};

interface SymbolDependency {
  target?: ReferenceTarget;
  units: readonly string[];
}

class DependencyGraphBuilder {
  private readonly program: LoadedProgram;
  private readonly resolutions: ReadonlyMap<ModuleId, ModuleResolution>;
  private readonly diagnostics = new DiagnosticEmitter();
  private readonly units = new Map<string, TopLevelUnit>();
  private readonly unitsByModule = new Map<ModuleId, TopLevelUnit[]>();
  private readonly occurrencesByUnit = new Map<string, number[]>();
  private readonly chainsByUnit = new Map<string, number[]>();
  private readonly selected = new Set<string>();
  private readonly order: string[] = [];
  private readonly queue: string[] = [];
  private readonly active = new Set<ModuleId>();
  private readonly edges: DependencyEdge[] = [];
  private readonly edgeKeys = new Set<string>();
  private readonly externals = new Map<string, ExternalBinding>();
  private readonly references = new Map<string, UnitReference[]>();

  constructor({
    program,
    resolutions,
  }: {
    program: LoadedProgram;
    resolutions: ReadonlyMap<ModuleId, ModuleResolution>;
  }) {
    this.program = program;
    this.resolutions = resolutions;
  }

  build(): DependencyGraph {
    this.program.modules.forEach((module) => this.indexModule(module));
    this.program.modules.forEach((module) => this.validateModule(module));
    this.diagnostics.throwIfErrors();

    const entry = this.module(this.program.entry);
    this.activate(entry.id);
    this.unitsOf(entry.id)
      .filter((unit) => unit.kind === "definition" && isAssignment(entry, unit))
      .forEach((unit) => this.select(unit.key));
    const entryBlock = this.unitsOf(entry.id).find((unit) => unit.kind === "entry");
    if (entryBlock) this.select(entryBlock.key);

    let queueIndex = 0;
    while (queueIndex < this.queue.length) {
      const key = this.queue[queueIndex];
      queueIndex += 1;
      if (key !== undefined) this.expand(this.unit(key));
    }
    this.diagnostics.throwIfErrors();

    const mergedGuards = new Set(
      this.order.filter((key) => this.isMergedImportGuard(this.unit(key))),
    );
    const definitions = this.definitionSection().filter((key) => !mergedGuards.has(key));
    const hoisted = new Set([...definitions, ...mergedGuards]);
    const statements = new Map<ModuleId, string[]>();
    this.program.executionOrder.forEach((moduleId) => {
      const keys = this.unitsOf(moduleId)
        .filter((unit) => unit.kind === "statement" && this.selected.has(unit.key))
        .filter((unit) => !hoisted.has(unit.key))
        .map((unit) => unit.key);
      if (keys.length > 0) statements.set(moduleId, keys);
    });

    incrementPerfCounter("graph.units.selected", this.order.length);
    incrementPerfCounter("graph.edges", this.edges.length);

    return {
      program: this.program,
      resolutions: this.resolutions,
      units: this.units,
      selected: this.order,
      edges: this.edges,
      definitions,
      statements,
      entryBlock: entryBlock?.key,
      activeModules: this.active,
      slots: this.collectSlots(),
      externals: this.externals,
      references: this.references,
      futureFeatures: this.collectFutureFeatures(),
    };
  }

  // Lookup

  private module(moduleId: ModuleId): PyModule {
    const module = this.program.modules.get(moduleId);
    if (!module) {
      throw new Error(`module ${moduleId} was not loaded`);
    }
    return module;
  }

  private resolution(moduleId: ModuleId): ModuleResolution {
    const resolution = this.resolutions.get(moduleId);
    if (!resolution) {
      throw new Error(`module ${moduleId} was not resolved`);
    }
    return resolution;
  }

  private unit(key: string): TopLevelUnit {
    const unit = this.units.get(key);
    if (!unit) {
      throw new Error(`unknown unit ${key}`);
    }
    return unit;
  }

  private unitsOf(moduleId: ModuleId): readonly TopLevelUnit[] {
    return this.unitsByModule.get(moduleId) ?? [];
  }

  private indexModule(module: PyModule) {
    const units = collectUnits(module);
    this.unitsByModule.set(module.id, units);
    units.forEach((unit) => this.units.set(unit.key, unit));

    const push = (index: Map<string, number[]>, key: string, value: number) => {
      const list = index.get(key) ?? [];
      list.push(value);
      index.set(key, list);
    };
    module.catalog.occurrences.forEach((occurrence, index) =>
      push(this.occurrencesByUnit, unitKey(module.id, occurrence.topLevel), index),
    );
    module.catalog.chains.forEach((chain, index) =>
      push(this.chainsByUnit, unitKey(module.id, chain.topLevel), index),
    );
  }

  private span(module: PyModule, span: TextSpan, line: number): SourceSpan {
    return { file: module.relativePath, start: span.start, end: span.end, line };
  }

  // Whole-program validation

  private validateModule(module: PyModule) {
    const { catalog } = module;
    const { table } = catalog;

    catalog.duplicates
      .filter((duplicate) => duplicate.scope === table.rootScope)
      .forEach((duplicate) => {
        const records = duplicate.symbols.map((symbol) => table.getSymbol(symbol));
        const last = records.at(-1);
        if (!last) return;
        const related: Diagnostic[] = records.slice(0, -1).map((record) =>
          diagnosticFromCode({
            code: "SC0001",
            params: { kind: "previous-definition", name: record.name },
            span: this.span(module, record.span, record.line),
            severity: "note",
          }),
        );
        this.diagnostics.report(
          diagnosticFromCode({
            code: "SC0001",
            params: {
              kind: "duplicate-definition",
              name: duplicate.name,
              scope: describeScope(catalog, duplicate.scope),
            },
            span: this.span(module, last.span, last.line),
            related,
          }),
        );
      });

    this.resolution(module.id).issues.forEach((issue) =>
      this.reportResolutionIssue(module, issue, false),
    );
  }

  /** Name problems anywhere are fatal; module misuse only in selected code. */
  private reportResolutionIssue(
    module: PyModule,
    issue: ResolutionIssue,
    selected: boolean,
  ) {
    const span = this.span(module, issue.span, issue.line);
    switch (issue.kind) {
      case "unresolved-name":
        if (selected) return;
        this.diagnostics.report(
          diagnosticFromCode({
            code: "RS0001",
            params: { kind: "unresolved-name", name: issue.name },
            span,
          }),
        );
        return;
      case "unknown-attribute":
        if (selected) return;
        this.diagnostics.report(
          diagnosticFromCode({
            code: "RS0002",
            params:
              issue.owner.kind === "class"
                ? {
                    kind: "unknown-class-attribute",
                    owner: issue.owner.name,
                    attribute: issue.attribute,
                  }
                : {
                    kind: "unknown-module-attribute",
                    module: issue.owner.moduleId,
                    attribute: issue.attribute,
                  },
            span,
          }),
        );
        return;
      case "module-as-value":
        if (!selected) return;
        this.diagnostics.report(
          diagnosticFromCode({
            code: "UC0003",
            params: { kind: "module-as-value", module: issue.moduleId },
            span,
          }),
        );
        return;
      case "module-attribute-store":
        if (!selected) return;
        this.diagnostics.report(
          diagnosticFromCode({
            code: "UC0004",
            params: {
              kind: "module-attribute-store",
              module: issue.moduleId,
              attribute: issue.attribute,
            },
            span,
          }),
        );
        return;
    }
  }

  // Selection

  private select(key: string) {
    if (this.selected.has(key)) return;
    this.selected.add(key);
    this.order.push(key);
    this.queue.push(key);
  }

  /** An active module's executable statements run in the merged file too. */
  private activate(moduleId: ModuleId) {
    if (this.active.has(moduleId)) return;
    this.active.add(moduleId);
    this.unitsOf(moduleId)
      .filter((unit) => unit.kind === "statement")
      .forEach((unit) => this.select(unit.key));
  }

  private addEdge(from: string, to: string) {
    if (from === to) return;
    const key = `${from}->${to}`;
    if (this.edgeKeys.has(key)) return;
    this.edgeKeys.add(key);
    this.edges.push({ from, to });
  }

  private expand(unit: TopLevelUnit) {
    const module = this.module(unit.moduleId);
    const resolution = this.resolution(unit.moduleId);
    this.activate(unit.moduleId);

    resolution.issues
      .filter((issue) => issue.topLevel === unit.statement)
      .forEach((issue) => this.reportResolutionIssue(module, issue, true));
    findDynamicImports(resolution)
      .filter(({ call }) => call.topLevel === unit.statement)
      .forEach(({ call, via }) => {
        const node = module.store.get(call.node);
        this.diagnostics.report(
          diagnosticFromCode({
            code: "UC0002",
            params: { kind: "dynamic-import", callee: via },
            span: this.span(module, node.span, call.line),
          }),
        );
      });

    const references: UnitReference[] = [];
    const dependOn = (dependencies: readonly string[]) =>
      dependencies.forEach((dependency) => {
        this.addEdge(unit.key, dependency);
        this.select(dependency);
      });

    const { catalog } = module;
    (this.occurrencesByUnit.get(unit.key) ?? []).forEach((index) => {
      const occurrence = catalog.occurrences[index];
      const resolved = resolution.names[index];
      if (!occurrence || resolved?.kind !== "symbol") return;
      if (occurrence.chain !== undefined && resolution.links.has(occurrence.chain)) {
        return;
      }
      const record = catalog.table.getSymbol(resolved.symbol);
      if (occurrence.role === "def" && record.kind === "import") return;

      const dependency = this.followSymbol({
        moduleId: unit.moduleId,
        symbol: resolved.symbol,
      });
      if (dependency.target) {
        references.push({
          span: occurrence.span,
          text: occurrence.name,
          target: dependency.target,
          collapse: false,
        });
      }
      if (occurrence.role === "load" || occurrence.role === "del") {
        dependOn(dependency.units);
      }
    });

    (this.chainsByUnit.get(unit.key) ?? []).forEach((index) => {
      const link = resolution.links.get(index);
      if (!link) return;
      const name = this.symbolName(link.target);
      references.push({
        span: link.span,
        text: module.source.slice(link.span.start, link.span.end),
        target: { kind: "slot", slot: { moduleId: link.target.moduleId, name } },
        collapse: true,
      });
      dependOn(this.slotUnits({ moduleId: link.target.moduleId, name }, new Set()));
    });

    references.push(...this.annotationReferences(module, unit));
    this.references.set(unit.key, references);
  }

  /**
   * Names spelled inside string annotations follow their targets' final
   * names. Annotations are not evaluated when the definition runs, so the
   * targets are selected without an ordering edge.
   */
  private annotationReferences(module: PyModule, unit: TopLevelUnit): UnitReference[] {
    const { linker } = this.program;
    const { table } = module.catalog;

    return stringAnnotations(module.store, unit.statement).flatMap(
      ({ node, segments, start }): UnitReference[] => {
        const [head] = segments;
        if (head === undefined) return [];
        const symbol = table.resolve(head, table.scopeOf(node));
        if (symbol === undefined) return [];

        let link = linker.follow({ moduleId: module.id, symbol });
        let depth = 1;
        while (link.kind === "module") {
          const segment = segments[depth];
          if (segment === undefined) return [];
          const member = linker.memberOf(link.moduleId, segment);
          link = member.kind === "symbol" ? linker.follow(member.ref) : member;
          depth += 1;
        }

        if (depth === 1) {
          const dependency = this.followSymbol({ moduleId: module.id, symbol });
          dependency.units.forEach((key) => this.select(key));
          if (!dependency.target) return [];
          return [
            {
              span: { start, end: start + head.length },
              text: head,
              target: dependency.target,
              collapse: false,
            },
          ];
        }

        if (link.kind !== "symbol" || !this.isModuleScoped(link.ref)) return [];
        const slot = { moduleId: link.ref.moduleId, name: this.symbolName(link.ref) };
        this.slotUnits(slot, new Set()).forEach((key) => this.select(key));
        const text = segments.slice(0, depth).join(".");
        return [
          {
            span: { start, end: start + text.length },
            text,
            target: { kind: "slot", slot },
            collapse: true,
          },
        ];
      },
    );
  }

  // Symbol dependencies

  private symbolName(ref: SymbolRef): string {
    return this.module(ref.moduleId).catalog.table.getSymbol(ref.symbol).name;
  }

  private isModuleScoped(ref: SymbolRef): boolean {
    const { table } = this.module(ref.moduleId).catalog;
    return table.getSymbol(ref.symbol).scope === table.rootScope;
  }

  /** Records a module-scope import of an outside module as referenced. */
  private registerExternal(ref: SymbolRef): string | undefined {
    if (!this.isModuleScoped(ref)) return undefined;
    const module = this.module(ref.moduleId);
    const record = module.catalog.table.getSymbol(ref.symbol);
    if (!record.import) return undefined;

    const key = externalBindingKey(record.import);
    if (!this.externals.has(key)) {
      this.externals.set(key, {
        key,
        binding: record.import,
        origin: ref,
        bound: record.name,
        dottedPlain:
          record.import.form === "import" &&
          record.import.asname === undefined &&
          record.import.module.includes("."),
        header: this.unit(unitKey(ref.moduleId, record.topLevel)).kind === "import",
      });
    }
    return key;
  }

  private followSymbol(ref: SymbolRef): SymbolDependency {
    const module = this.module(ref.moduleId);
    const record = module.catalog.table.getSymbol(ref.symbol);

    if (record.kind === "import") {
      const link = this.program.linker.follow(ref);
      const nested = this.isModuleScoped(ref)
        ? this.slotUnits({ moduleId: ref.moduleId, name: record.name }, new Set())
        : [];
      if (link.kind === "symbol") {
        const slot = { moduleId: link.ref.moduleId, name: this.symbolName(link.ref) };
        return {
          target: { kind: "slot", slot },
          units: [...nested, ...this.slotUnits(slot, new Set())],
        };
      }
      if (link.kind === "external" && link.via) {
        const key = this.registerExternal(link.via);
        return {
          target: key === undefined ? undefined : { kind: "external", binding: key },
          units: nested,
        };
      }
      return { units: nested };
    }

    if (!this.isModuleScoped(ref)) return { units: [] };
    const slot = { moduleId: ref.moduleId, name: record.name };
    return { target: { kind: "slot", slot }, units: this.slotUnits(slot, new Set()) };
  }

  /**
   * Units that bind a module-scope name. Import bindings are followed to
   * every alternative they name; top-level import statements themselves
   * are never units of the merge.
   */
  private slotUnits(slot: SlotRef, seen: Set<string>): string[] {
    const key = slotKey(slot);
    if (seen.has(key)) return [];
    seen.add(key);

    const { table } = this.module(slot.moduleId).catalog;
    const units: string[] = [];
    table.bindingsOf(slot.name, table.rootScope).forEach((symbol: SymbolId) => {
      const record = table.getSymbol(symbol);
      const owner = unitKey(slot.moduleId, record.topLevel);
      if (record.kind !== "import") {
        units.push(owner);
        return;
      }
      if (this.unit(owner).kind !== "import") units.push(owner);

      // One hop at a time, so every alternative binding of the target counts.
      const { linker } = this.program;
      const ref = { moduleId: slot.moduleId, symbol };
      const target = linker.importTarget(ref);
      if (
        target?.kind === "member" &&
        linker.memberOf(target.moduleId, target.name).kind === "symbol"
      ) {
        units.push(...this.slotUnits({ moduleId: target.moduleId, name: target.name }, seen));
        return;
      }
      const link = linker.follow(ref);
      if (link.kind === "external" && link.via) this.registerExternal(link.via);
    });
    return Array.from(new Set(units));
  }

  // Sections

  /**
   * An `if` or `try` at module level holding nothing but imports of merged
   * modules; every import in it is rewritten to `pass`.
   */
  private isMergedImportGuard(unit: TopLevelUnit): boolean {
    const module = this.module(unit.moduleId);
    const { store, catalog } = module;

    const merged = (statement: NodeId): boolean => {
      const symbols = importBindings(catalog, statement);
      return (
        symbols.length > 0 &&
        symbols.every((symbol) => {
          const target = this.program.linker.importTarget({ moduleId: module.id, symbol });
          return target !== undefined && target.kind !== "external";
        })
      );
    };

    const onlyMergedImports = (statement: NodeId): boolean => {
      const node = store.get(statement);
      switch (node.kind) {
        case "import":
        case "import-from":
          return merged(statement);
        case "pass":
          return true;
        case "if":
          return [...node.body, ...node.orelse].every(onlyMergedImports);
        case "try":
          return [
            ...node.body,
            ...node.handlers.flatMap((handler) => store.expect(handler, "except-handler").body),
            ...node.orelse,
            ...node.finalbody,
          ].every(onlyMergedImports);
        default:
          return false;
      }
    };

    const { kind } = store.get(unit.statement);
    return (
      unit.kind === "statement" &&
      (kind === "if" || kind === "try") &&
      onlyMergedImports(unit.statement)
    );
  }

  /** Definitions, plus every statement a definition depends on. */
  private definitionSection(): string[] {
    const section = new Set(
      this.order.filter((key) => this.unit(key).kind === "definition"),
    );
    let changed = true;
    while (changed) {
      changed = false;
      this.edges.forEach(({ from, to }) => {
        if (section.has(from) && !section.has(to) && this.unit(to).kind === "statement") {
          section.add(to);
          changed = true;
        }
      });
    }
    return this.order.filter((key) => section.has(key));
  }

  private collectSlots(): SlotRef[] {
    const seen = new Set<string>();
    const slots: SlotRef[] = [];
    this.order.forEach((key) => {
      const unit = this.unit(key);
      unit.names.forEach((name) => {
        const slot = { moduleId: unit.moduleId, name };
        if (seen.has(slotKey(slot))) return;
        seen.add(slotKey(slot));
        slots.push(slot);
      });
    });
    return slots;
  }

  private collectFutureFeatures(): string[] {
    const features = new Set<string>();
    this.program.executionOrder
      .filter((moduleId) => this.active.has(moduleId))
      .forEach((moduleId) => {
        const { store } = this.module(moduleId);
        store.body
          .filter((statement: NodeId) => isFutureImport(store, statement))
          .forEach((statement) =>
            store
              .expect(statement, "import-from")
              .names.forEach((alias) => features.add(alias.name)),
          );
      });
    return Array.from(features);
  }
}

/**
 * Selects the top-level statements the entry point needs, transitively,
 * and records how each reference inside them must be rewritten.
 */
export const buildDependencyGraph = ({
  program,
  resolutions,
}: {
  program: LoadedProgram;
  resolutions: ReadonlyMap<ModuleId, ModuleResolution>;
}): DependencyGraph => new DependencyGraphBuilder({ program, resolutions }).build();
