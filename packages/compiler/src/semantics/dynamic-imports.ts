import type { CallSite } from "./catalog.js";
import type { ModuleResolution } from "./resolver.js";

export interface DynamicImport {
  call: CallSite;
  /** How the import was spelled, for messages. */
  via: "__import__" | "importlib.import_module";
}

const isImportlib = (module: string) => module === "importlib";

/**
 * Calls to `__import__`, `importlib.import_module` or a name bound by
 * `from importlib import import_module`.
 */
export const findDynamicImports = (resolution: ModuleResolution): DynamicImport[] => {
  const { catalog } = resolution;
  const found: DynamicImport[] = [];

  catalog.calls.forEach((call) => {
    const func = catalog.store.get(call.func);

    if (func.kind === "name") {
      const occurrence = resolution.occurrenceAt.get(call.func);
      const target = occurrence === undefined ? undefined : resolution.names[occurrence];
      if (func.id === "__import__" && target?.kind === "builtin") {
        found.push({ call, via: "__import__" });
        return;
      }
      if (target?.kind !== "symbol") return;
      const binding = catalog.table.getSymbol(target.symbol).import;
      if (
        binding?.form === "from" &&
        binding.level === 0 &&
        isImportlib(binding.module) &&
        binding.name === "import_module"
      ) {
        found.push({ call, via: "importlib.import_module" });
      }
      return;
    }

    const chainIndex = resolution.chainAt.get(call.func);
    const chain = chainIndex === undefined ? undefined : catalog.chains[chainIndex];
    if (!chain || chain.attrs.length !== 1 || chain.attrs[0]?.name !== "import_module") {
      return;
    }
    const head = resolution.names[chain.headOccurrence];
    if (head?.kind !== "symbol") return;
    const binding = catalog.table.getSymbol(head.symbol).import;
    if (binding?.form === "import" && isImportlib(binding.module)) {
      found.push({ call, via: "importlib.import_module" });
    }
  });

  return found;
};
