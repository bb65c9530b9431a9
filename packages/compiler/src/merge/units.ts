import type { NodeId } from "../parser/index.js";
import type { PyModule } from "../modules/types.js";
import type { ModuleId } from "../semantics/ids.js";
import { isEntryBlock, isModuleDocstring } from "../semantics/patterns.js";
import type { TopLevelUnit, UnitKind } from "./types.js";

export const unitKey = (moduleId: ModuleId, statement: NodeId): string =>
  `${moduleId}@${statement}`;

const classify = (
  module: PyModule,
  statement: NodeId,
  names: readonly string[],
): UnitKind => {
  const { store } = module;
  if (isModuleDocstring(store, statement)) return "inert";
  if (isEntryBlock(store, statement)) return "entry";

  const node = store.get(statement);
  switch (node.kind) {
    case "import":
    case "import-from":
      return "import";
    case "function-def":
    case "class-def":
      return "definition";
    case "assign":
      return names.length > 0 ? "definition" : "statement";
    case "ann-assign":
      if (node.value === undefined) return "inert";
      return names.length > 0 ? "definition" : "statement";
    case "pass":
    case "global":
    case "nonlocal":
      return "inert";
    default:
      return "statement";
  }
};

/** One unit per top-level statement, in source order. */
export const collectUnits = (module: PyModule): TopLevelUnit[] => {
  const { store, catalog } = module;
  const { table } = catalog;
  const namesByStatement = new Map<NodeId, string[]>();

  for (const symbol of table.symbolsInScope(table.rootScope)) {
    const record = table.getSymbol(symbol);
    if (record.kind === "import") continue;
    const names = namesByStatement.get(record.topLevel) ?? [];
    if (!names.includes(record.name)) names.push(record.name);
    namesByStatement.set(record.topLevel, names);
  }

  return store.body.map((statement) => {
    const names = namesByStatement.get(statement) ?? [];
    return {
      key: unitKey(module.id, statement),
      moduleId: module.id,
      statement,
      kind: classify(module, statement, names),
      names,
      line: store.get(statement).line,
    };
  });
};

/** Name used for a unit in cycle reports. */
export const describeUnit = (unit: TopLevelUnit, relativePath: string): string =>
  unit.names[0] ?? `<statement at ${relativePath}:${unit.line}>`;
