import type { ModuleId } from "../semantics/ids.js";
import { moduleAncestry } from "./path.js";
import type { ModuleImportEdge, PyModule } from "./types.js";

/**
 * Order in which the runtime would first finish executing each module:
 * enclosing packages, then imports in source order, then the module. A
 * module already on the stack is skipped, so import cycles resolve to the
 * partial order the runtime also sees.
 */
export const computeExecutionOrder = ({
  entry,
  modules,
  edges,
}: {
  entry: ModuleId;
  modules: ReadonlyMap<ModuleId, PyModule>;
  edges: readonly ModuleImportEdge[];
}): ModuleId[] => {
  const importsOf = new Map<ModuleId, ModuleId[]>();
  edges.forEach(({ importer, target }) => {
    const targets = importsOf.get(importer) ?? [];
    targets.push(target);
    importsOf.set(importer, targets);
  });

  const order: ModuleId[] = [];
  const visited = new Set<ModuleId>();

  const visit = (moduleId: ModuleId) => {
    if (visited.has(moduleId)) return;
    visited.add(moduleId);

    moduleAncestry(moduleId).slice(0, -1).forEach(visit);
    importsOf.get(moduleId)?.forEach((target) => moduleAncestry(target).forEach(visit));
    if (modules.has(moduleId)) order.push(moduleId);
  };

  visit(entry);
  return order;
};
