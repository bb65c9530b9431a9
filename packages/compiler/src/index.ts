export * from "./diagnostics/index.js";
export { parseModule, NodeStore, ParserSyntaxError } from "./parser/index.js";
export type { NodeId, SyntaxNode, TextSpan } from "./parser/index.js";
export { buildCatalog, type ModuleCatalog } from "./semantics/catalog.js";
export {
  resolveModule,
  resolveProgram,
  type ModuleResolution,
  type ResolutionIssue,
} from "./semantics/resolver.js";
export { SymbolTable } from "./semantics/binder/index.js";
export { createFsModuleHost } from "./modules/fs-host.js";
export { createMemoryModuleHost } from "./modules/memory-host.js";
export { createPosixPathAdapter } from "./modules/posix-path.js";
export { loadProgram } from "./modules/graph.js";
export type { LoadedProgram, ModuleHost, PyModule } from "./modules/types.js";
export type {
  DependencyGraph,
  MergeResult,
  NamePlan,
  TopLevelUnit,
} from "./merge/types.js";
export {
  analyzeProgram,
  loadProject,
  MERGED_SUFFIX,
  mergedOutputPath,
  mergeProject,
  planMerge,
  verifyMergedSource,
  writeMergedFile,
  type LoadProjectOptions,
  type MergePlan,
  type MergeProjectOptions,
} from "./pipeline.js";
export * from "./audit/index.js";
export { isPerfEnabled } from "./perf.js";
