import type { ModuleCatalog } from "./catalog.js";
import { symbolRefKey, type ModuleId, type SymbolRef } from "./ids.js";

/** Where one import binding points, decided when the program is loaded. */
export type ImportTarget =
  | { kind: "module"; moduleId: ModuleId }
  | { kind: "member"; moduleId: ModuleId; name: string }
  | { kind: "external" };

export type LinkResult =
  | { kind: "symbol"; ref: SymbolRef }
  | { kind: "module"; moduleId: ModuleId }
  /** `via` is the import binding that leaves the program, when there is one. */
  | { kind: "external"; via?: SymbolRef }
  | { kind: "missing"; moduleId: ModuleId; name: string };

/**
 * Cross-module view of a loaded program: follows import aliases to the
 * definitions they name.
 */
export interface ProgramLinker {
  catalog(moduleId: ModuleId): ModuleCatalog | undefined;
  hasModule(moduleId: ModuleId): boolean;
  importTarget(ref: SymbolRef): ImportTarget | undefined;
  /** Module-scope binding `name` of a module, or its submodule `name`. */
  memberOf(moduleId: ModuleId, name: string): LinkResult;
  /** Follows import bindings until a non-import symbol, module or external. */
  follow(ref: SymbolRef): LinkResult;
}

export const createProgramLinker = ({
  catalogs,
  importTargets,
  namespacePackages = new Set(),
}: {
  catalogs: ReadonlyMap<ModuleId, ModuleCatalog>;
  /** Keyed by `symbolRefKey`. */
  importTargets: ReadonlyMap<string, ImportTarget>;
  /** Package directories without an `__init__` module. */
  namespacePackages?: ReadonlySet<ModuleId>;
}): ProgramLinker => {
  const hasModule = (moduleId: ModuleId) =>
    catalogs.has(moduleId) || namespacePackages.has(moduleId);

  const memberOf = (moduleId: ModuleId, name: string): LinkResult => {
    const catalog = catalogs.get(moduleId);
    const symbol = catalog?.table.lookupLocal(name, catalog.table.rootScope);
    if (symbol !== undefined) {
      return { kind: "symbol", ref: { moduleId, symbol } };
    }
    const submodule = moduleId ? `${moduleId}.${name}` : name;
    if (hasModule(submodule)) {
      return { kind: "module", moduleId: submodule };
    }
    return { kind: "missing", moduleId, name };
  };

  const follow = (start: SymbolRef): LinkResult => {
    const seen = new Set<string>();
    let current = start;

    while (true) {
      const key = symbolRefKey(current);
      const catalog = catalogs.get(current.moduleId);
      if (!catalog) {
        throw new Error(`no catalog for module ${current.moduleId}`);
      }
      const record = catalog.table.getSymbol(current.symbol);
      if (record.kind !== "import") {
        return { kind: "symbol", ref: current };
      }
      if (seen.has(key)) {
        return {
          kind: "missing",
          moduleId: current.moduleId,
          name: record.name,
        };
      }
      seen.add(key);

      const target = importTargets.get(key);
      if (!target || target.kind === "external") {
        return { kind: "external", via: current };
      }
      if (target.kind === "module") return target;

      const member = memberOf(target.moduleId, target.name);
      if (member.kind !== "symbol") return member;
      current = member.ref;
    }
  };

  return {
    catalog: (moduleId) => catalogs.get(moduleId),
    hasModule,
    importTarget: (ref) => importTargets.get(symbolRefKey(ref)),
    memberOf,
    follow,
  };
};
