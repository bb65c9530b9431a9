import type { NodeId, NodeStore } from "../parser/index.js";
import type { ModuleCatalog } from "../semantics/catalog.js";
import type { ModuleId } from "../semantics/ids.js";
import type { ImportTarget, ProgramLinker } from "../semantics/linker.js";

export interface ModulePathAdapter {
  resolve(path: string): string;
  join(...parts: string[]): string;
  relative(from: string, to: string): string;
  dirname(path: string): string;
  basename(path: string, ext?: string): string;
  normalize?: (path: string) => string;
}

export interface ModuleHost {
  path: ModulePathAdapter;
  readFile(path: string): Promise<string>;
  writeFile(path: string, contents: string): Promise<void>;
  readDir(path: string): Promise<readonly string[]>;
  fileExists(path: string): Promise<boolean>;
  isDirectory(path: string): Promise<boolean>;
}

/** Where a dotted module name lives under the project root. */
export type ModuleLocation =
  | { kind: "file"; filePath: string; isPackage: boolean }
  | { kind: "namespace"; directory: string };

export interface PyModule {
  /** Dotted name relative to the project root; a package `__init__` takes the package's name. */
  id: ModuleId;
  filePath: string;
  /** Path relative to the project root with `/` separators. */
  relativePath: string;
  isPackage: boolean;
  source: string;
  store: NodeStore;
  catalog: ModuleCatalog;
}

export interface ModuleImportEdge {
  importer: ModuleId;
  statement: NodeId;
  target: ModuleId;
}

export interface LoadedProgram {
  root: string;
  entry: ModuleId;
  modules: ReadonlyMap<ModuleId, PyModule>;
  namespacePackages: ReadonlySet<ModuleId>;
  /** Keyed by `symbolRefKey` of each import binding. */
  importTargets: ReadonlyMap<string, ImportTarget>;
  edges: readonly ModuleImportEdge[];
  /** Depth-first post-order over imports in source order, entry last. */
  executionOrder: readonly ModuleId[];
  linker: ProgramLinker;
}
