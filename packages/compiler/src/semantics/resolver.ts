import type { NodeId, TextSpan } from "../parser/index.js";
import { isBuiltin } from "./builtins.js";
import type { ClassInfo, ModuleCatalog, NameOccurrence } from "./catalog.js";
import {
  symbolRefKey,
  type ModuleId,
  type ScopeId,
  type SymbolId,
  type SymbolRef,
} from "./ids.js";
import type { ProgramLinker } from "./linker.js";
import { isDunder } from "./patterns.js";

export type NameResolution =
  | { kind: "symbol"; symbol: SymbolId }
  | { kind: "builtin" }
  | { kind: "unresolved" };

/** What an expression stands for, as far as static analysis can tell. */
export type Denotation =
  | { kind: "class"; ref: SymbolRef }
  | { kind: "instance"; ref: SymbolRef }
  | { kind: "module"; moduleId: ModuleId }
  | { kind: "builtin"; name: string }
  | { kind: "external" }
  | { kind: "opaque" };

/**
 * An attribute chain whose first `depth` segments name a definition in
 * another module; the merge collapses them into that definition's name.
 */
export interface ChainLink {
  chain: number;
  depth: number;
  span: TextSpan;
  target: SymbolRef;
}

type IssueSite = { line: number; span: TextSpan; topLevel: NodeId };

export type ResolutionIssue = IssueSite &
  (
    | { kind: "unresolved-name"; occurrence: number; name: string }
    | {
        kind: "unknown-attribute";
        chain: number;
        attribute: string;
        owner:
          | { kind: "class"; name: string }
          | { kind: "module"; moduleId: ModuleId };
      }
    | { kind: "module-as-value"; moduleId: ModuleId }
    | { kind: "module-attribute-store"; moduleId: ModuleId; attribute: string }
  );

export interface ModuleResolution {
  moduleId: ModuleId;
  catalog: ModuleCatalog;
  /** Parallel to `catalog.occurrences`. */
  names: readonly NameResolution[];
  links: ReadonlyMap<number, ChainLink>;
  issues: readonly ResolutionIssue[];
  /** Occurrence index of a loaded or deleted name node. */
  occurrenceAt: ReadonlyMap<NodeId, number>;
  /** Chain index of a maximal attribute node. */
  chainAt: ReadonlyMap<NodeId, number>;
}

type Member = { kind: "symbol"; ref: SymbolRef } | { kind: "attribute" } | { kind: "open" };

type Step =
  | { kind: "ok"; denotation: Denotation; target?: SymbolRef }
  | { kind: "missing" };

interface ChainWalk {
  denotation: Denotation;
  link?: ChainLink;
  issue?: ResolutionIssue;
}

const OPAQUE: Denotation = { kind: "opaque" };

const isReference = (occurrence: NameOccurrence) =>
  occurrence.role === "load" || occurrence.role === "del";

/**
 * Resolves every name and attribute chain of a set of modules. Without a
 * linker each module stands alone and its imports denote external values.
 */
export class ProgramResolver {
  private readonly catalogs: ReadonlyMap<ModuleId, ModuleCatalog>;
  private readonly linker?: ProgramLinker;
  private readonly names = new Map<ModuleId, NameResolution[]>();
  private readonly chainIndexes = new Map<ModuleId, Map<NodeId, number>>();
  private readonly symbolDenotations = new Map<string, Denotation>();
  private readonly chainWalks = new Map<string, ChainWalk>();
  private readonly inProgress = new Set<string>();
  private readonly externalMembers = new Map<string, Set<string>>();

  constructor({
    catalogs,
    linker,
  }: {
    catalogs: ReadonlyMap<ModuleId, ModuleCatalog>;
    linker?: ProgramLinker;
  }) {
    this.catalogs = catalogs;
    this.linker = linker;
  }

  resolve(): Map<ModuleId, ModuleResolution> {
    this.catalogs.forEach((catalog) => this.registerExternalMembers(catalog));
    this.chainWalks.clear();
    this.symbolDenotations.clear();

    const resolutions = new Map<ModuleId, ModuleResolution>();
    this.catalogs.forEach((catalog, moduleId) =>
      resolutions.set(moduleId, this.validate(catalog)),
    );
    return resolutions;
  }

  denotationOf(ref: SymbolRef): Denotation {
    const key = symbolRefKey(ref);
    const cached = this.symbolDenotations.get(key);
    if (cached) return cached;
    if (this.inProgress.has(key)) return OPAQUE;

    this.inProgress.add(key);
    const denotation = this.computeSymbolDenotation(ref);
    this.inProgress.delete(key);
    this.symbolDenotations.set(key, denotation);
    return denotation;
  }

  classInfoOf(ref: SymbolRef): ClassInfo | undefined {
    const catalog = this.catalogOf(ref.moduleId);
    const record = catalog.table.getSymbol(ref.symbol);
    if (record.kind !== "class") return undefined;
    const scope = catalog.table.scopeOwnedBy(record.declaredAt);
    return scope === undefined ? undefined : catalog.classes.get(scope);
  }

  private catalogOf(moduleId: ModuleId): ModuleCatalog {
    const catalog = this.catalogs.get(moduleId);
    if (!catalog) {
      throw new Error(`module ${moduleId} has no catalog`);
    }
    return catalog;
  }

  // Names

  private namesOf(moduleId: ModuleId): NameResolution[] {
    const cached = this.names.get(moduleId);
    if (cached) return cached;

    const catalog = this.catalogOf(moduleId);
    const names = catalog.occurrences.map((occurrence) =>
      this.resolveOccurrence(catalog, occurrence),
    );
    this.names.set(moduleId, names);
    return names;
  }

  private resolveOccurrence(
    catalog: ModuleCatalog,
    occurrence: NameOccurrence,
  ): NameResolution {
    if (occurrence.role === "def") {
      if (occurrence.symbol === undefined) {
        throw new Error(`binding of ${occurrence.name} was never declared`);
      }
      return { kind: "symbol", symbol: occurrence.symbol };
    }
    return this.lookupName(catalog, occurrence.name, occurrence.scope, occurrence.node);
  }

  private lookupName(
    catalog: ModuleCatalog,
    name: string,
    scope: ScopeId,
    node?: NodeId,
  ): NameResolution {
    const symbol = catalog.table.resolve(name, scope, node);
    if (symbol !== undefined) return { kind: "symbol", symbol };
    return isBuiltin(name) ? { kind: "builtin" } : { kind: "unresolved" };
  }

  private chainIndexOf(moduleId: ModuleId): Map<NodeId, number> {
    const cached = this.chainIndexes.get(moduleId);
    if (cached) return cached;
    const index = new Map<NodeId, number>();
    this.catalogOf(moduleId).chains.forEach((chain, position) =>
      index.set(chain.node, position),
    );
    this.chainIndexes.set(moduleId, index);
    return index;
  }

  // Denotations

  private computeSymbolDenotation(ref: SymbolRef): Denotation {
    const catalog = this.catalogOf(ref.moduleId);
    const record = catalog.table.getSymbol(ref.symbol);
    // A name bound more than once may hold any of its values at a use.
    const rebound = catalog.table.bindingsOf(record.name, record.scope).length > 1;

    switch (record.kind) {
      case "class":
        return rebound ? OPAQUE : { kind: "class", ref };
      case "import": {
        if (!this.linker) return { kind: "external" };
        const link = this.linker.follow(ref);
        if (link.kind === "symbol") return this.denotationOf(link.ref);
        if (link.kind === "module") return link;
        return { kind: "external" };
      }
      case "variable":
        return record.value === undefined || rebound
          ? OPAQUE
          : this.valueDenotation(ref.moduleId, record.value);
      default:
        return OPAQUE;
    }
  }

  private valueDenotation(moduleId: ModuleId, value: NodeId): Denotation {
    const node = this.catalogOf(moduleId).store.get(value);
    if (node.kind === "call") {
      const callee = this.denoteExpression(moduleId, node.func);
      return callee.kind === "class" ? { kind: "instance", ref: callee.ref } : OPAQUE;
    }
    const aliased = this.denoteExpression(moduleId, value);
    return aliased.kind === "class" ? aliased : OPAQUE;
  }

  private denoteExpression(moduleId: ModuleId, id: NodeId): Denotation {
    const catalog = this.catalogOf(moduleId);
    const node = catalog.store.get(id);

    if (node.kind === "name") {
      const resolved = this.lookupName(catalog, node.id, catalog.table.scopeOf(id), id);
      return this.denoteResolution(moduleId, resolved, node.id);
    }
    if (node.kind === "attribute") {
      const chain = this.chainIndexOf(moduleId).get(id);
      return chain === undefined ? OPAQUE : this.walkChain(moduleId, chain).denotation;
    }
    return OPAQUE;
  }

  private denoteResolution(
    moduleId: ModuleId,
    resolution: NameResolution | undefined,
    name: string,
  ): Denotation {
    if (!resolution) return OPAQUE;
    switch (resolution.kind) {
      case "symbol":
        return this.denotationOf({ moduleId, symbol: resolution.symbol });
      case "builtin":
        return { kind: "builtin", name };
      case "unresolved":
        return OPAQUE;
    }
  }

  // Attribute chains

  private walkChain(moduleId: ModuleId, chainIndex: number): ChainWalk {
    const key = `${moduleId}:${chainIndex}`;
    const cached = this.chainWalks.get(key);
    if (cached) return cached;
    if (this.inProgress.has(key)) return { denotation: OPAQUE };

    this.inProgress.add(key);
    const walk = this.computeChainWalk(moduleId, chainIndex);
    this.inProgress.delete(key);
    this.chainWalks.set(key, walk);
    return walk;
  }

  private computeChainWalk(moduleId: ModuleId, chainIndex: number): ChainWalk {
    const catalog = this.catalogOf(moduleId);
    const chain = catalog.chains[chainIndex];
    if (!chain) {
      throw new Error(`chain ${chainIndex} missing from ${moduleId}`);
    }
    const headSpan = catalog.store.get(chain.head).span;

    let denotation = this.denoteResolution(
      moduleId,
      this.namesOf(moduleId)[chain.headOccurrence],
      chain.headName,
    );
    let link: ChainLink | undefined;
    const loaded = chain.ctx === "load" ? chain.attrs : chain.attrs.slice(0, -1);

    for (const [index, attr] of loaded.entries()) {
      const owner = denotation;
      const step = this.step(owner, attr.name);
      if (step.kind === "missing") {
        return {
          denotation: OPAQUE,
          link,
          issue: {
            kind: "unknown-attribute",
            chain: chainIndex,
            attribute: attr.name,
            owner:
              owner.kind === "module"
                ? { kind: "module", moduleId: owner.moduleId }
                : { kind: "class", name: this.ownerName(owner) },
            line: chain.line,
            span: attr.span,
            topLevel: chain.topLevel,
          },
        };
      }
      if (!link && owner.kind === "module" && step.target) {
        link = {
          chain: chainIndex,
          depth: index + 1,
          span: { start: headSpan.start, end: attr.span.end },
          target: step.target,
        };
      }
      denotation = step.denotation;
    }

    const last = chain.attrs.at(-1);
    if (chain.ctx !== "load" && last && denotation.kind === "module") {
      return {
        denotation: OPAQUE,
        link,
        issue: {
          kind: "module-attribute-store",
          moduleId: denotation.moduleId,
          attribute: last.name,
          line: chain.line,
          span: catalog.store.get(chain.node).span,
          topLevel: chain.topLevel,
        },
      };
    }
    if (chain.ctx === "load" && denotation.kind === "module") {
      return {
        denotation,
        link,
        issue: {
          kind: "module-as-value",
          moduleId: denotation.moduleId,
          line: chain.line,
          span: catalog.store.get(chain.node).span,
          topLevel: chain.topLevel,
        },
      };
    }
    return { denotation, link };
  }

  private ownerName(owner: Denotation): string {
    if (owner.kind !== "class" && owner.kind !== "instance") return "object";
    return this.classInfoOf(owner.ref)?.name ?? "object";
  }

  private step(owner: Denotation, name: string): Step {
    switch (owner.kind) {
      case "module":
        return this.moduleStep(owner.moduleId, name);
      case "class":
      case "instance": {
        if (isDunder(name)) return { kind: "ok", denotation: OPAQUE };
        const member = this.findMember(owner.ref, name, new Set());
        if (!member) return { kind: "missing" };
        return {
          kind: "ok",
          denotation: member.kind === "symbol" ? this.denotationOf(member.ref) : OPAQUE,
        };
      }
      default:
        return { kind: "ok", denotation: OPAQUE };
    }
  }

  private moduleStep(moduleId: ModuleId, name: string): Step {
    if (!this.linker) return { kind: "ok", denotation: OPAQUE };
    const member = this.linker.memberOf(moduleId, name);
    switch (member.kind) {
      case "symbol": {
        const followed = this.linker.follow(member.ref);
        if (followed.kind === "symbol") {
          return {
            kind: "ok",
            denotation: this.denotationOf(followed.ref),
            target: followed.ref,
          };
        }
        if (followed.kind === "module") return { kind: "ok", denotation: followed };
        if (followed.kind === "external") {
          return { kind: "ok", denotation: followed };
        }
        return { kind: "missing" };
      }
      case "module":
        return { kind: "ok", denotation: member };
      default:
        return { kind: "missing" };
    }
  }

  // Class members

  private findMember(
    classRef: SymbolRef,
    name: string,
    visited: Set<string>,
  ): Member | undefined {
    const key = symbolRefKey(classRef);
    if (visited.has(key)) return undefined;
    visited.add(key);

    const info = this.classInfoOf(classRef);
    if (!info) return { kind: "open" };

    const symbol = this.catalogOf(classRef.moduleId).table.lookupLocal(
      name,
      info.scope,
    );
    if (symbol !== undefined) {
      return { kind: "symbol", ref: { moduleId: classRef.moduleId, symbol } };
    }
    if (
      info.instanceAttributes.has(name) ||
      this.externalMembers.get(key)?.has(name)
    ) {
      return { kind: "attribute" };
    }
    if (info.hasMetaclass || info.definesGetattr) return { kind: "open" };

    for (const base of info.bases) {
      const denotation = this.denoteExpression(classRef.moduleId, base);
      if (denotation.kind === "builtin" && denotation.name === "object") continue;
      if (denotation.kind !== "class") return { kind: "open" };
      const found = this.findMember(denotation.ref, name, visited);
      if (found) return found;
    }
    return undefined;
  }

  /** `Cls.attr = value` and `obj.attr = value` add members to a local class. */
  private registerExternalMembers(catalog: ModuleCatalog) {
    catalog.chains.forEach((chain, index) => {
      const last = chain.attrs.at(-1);
      if (chain.ctx !== "store" || !last) return;
      const owner = this.walkChain(catalog.moduleId, index).denotation;
      if (owner.kind !== "class" && owner.kind !== "instance") return;
      const key = symbolRefKey(owner.ref);
      const members = this.externalMembers.get(key) ?? new Set<string>();
      members.add(last.name);
      this.externalMembers.set(key, members);
    });
  }

  // Validation

  private validate(catalog: ModuleCatalog): ModuleResolution {
    const { moduleId } = catalog;
    const names = this.namesOf(moduleId);
    const issues: ResolutionIssue[] = [];
    const links = new Map<number, ChainLink>();
    const occurrenceAt = new Map<NodeId, number>();

    catalog.occurrences.forEach((occurrence, index) => {
      if (!isReference(occurrence)) return;
      occurrenceAt.set(occurrence.node, index);
      const resolution = names[index];
      if (resolution?.kind === "unresolved") {
        issues.push({
          kind: "unresolved-name",
          occurrence: index,
          name: occurrence.name,
          line: occurrence.line,
          span: occurrence.span,
          topLevel: occurrence.topLevel,
        });
        return;
      }
      if (occurrence.chain !== undefined || resolution?.kind !== "symbol") return;
      const denotation = this.denotationOf({ moduleId, symbol: resolution.symbol });
      if (denotation.kind === "module") {
        issues.push({
          kind: "module-as-value",
          moduleId: denotation.moduleId,
          line: occurrence.line,
          span: occurrence.span,
          topLevel: occurrence.topLevel,
        });
      }
    });

    catalog.chains.forEach((_chain, index) => {
      const walk = this.walkChain(moduleId, index);
      if (walk.link) links.set(index, walk.link);
      if (walk.issue) issues.push(walk.issue);
    });

    return {
      moduleId,
      catalog,
      names,
      links,
      issues,
      occurrenceAt,
      chainAt: this.chainIndexOf(moduleId),
    };
  }
}

export const resolveProgram = ({
  catalogs,
  linker,
}: {
  catalogs: ReadonlyMap<ModuleId, ModuleCatalog>;
  linker?: ProgramLinker;
}): Map<ModuleId, ModuleResolution> =>
  new ProgramResolver({ catalogs, linker }).resolve();

/** Resolves one module on its own; its imports denote external values. */
export const resolveModule = (catalog: ModuleCatalog): ModuleResolution => {
  const resolution = resolveProgram({
    catalogs: new Map([[catalog.moduleId, catalog]]),
  }).get(catalog.moduleId);
  if (!resolution) {
    throw new Error(`module ${catalog.moduleId} was not resolved`);
  }
  return resolution;
};
