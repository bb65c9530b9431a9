import { Auditor } from "./audit/auditor.js";
import type { AuditReport } from "./audit/types.js";
import { DiagnosticError } from "./diagnostics/index.js";
import { resolveConflicts } from "./merge/conflicts.js";
import { emitMergedSource } from "./merge/emitter.js";
import { buildDependencyGraph } from "./merge/graph-builder.js";
import { orderDefinitions } from "./merge/orderer.js";
import type { DependencyGraph, MergeResult, NamePlan } from "./merge/types.js";
import { createFsModuleHost } from "./modules/fs-host.js";
import { loadProgram } from "./modules/graph.js";
import type { LoadedProgram, ModuleHost } from "./modules/types.js";
import {
  PhaseTimer,
  diffPerfCounters,
  logPerfSummary,
  snapshotPerfCounters,
} from "./perf.js";
import type { ModuleCatalog } from "./semantics/catalog.js";
import type { ModuleId } from "./semantics/ids.js";
import { resolveProgram, type ModuleResolution } from "./semantics/resolver.js";

export const MERGED_SUFFIX = "_merged";

export type LoadProjectOptions = {
  entryPath: string;
  /** Defaults to the directory of the entry file. */
  projectRoot?: string;
  host?: ModuleHost;
};

export type MergeProjectOptions = LoadProjectOptions & {
  /** Audit the merged text before returning it. Defaults to true. */
  verify?: boolean;
  /** Overrides `<entry dir>/<entry stem>_merged.py`. */
  outputPath?: string;
};

export type MergePlan = {
  graph: DependencyGraph;
  names: NamePlan;
  order: readonly string[];
};

export const loadProject = async ({
  entryPath,
  projectRoot,
  host = createFsModuleHost(),
}: LoadProjectOptions): Promise<LoadedProgram> =>
  loadProgram({
    entryPath,
    projectRoot: projectRoot ?? host.path.dirname(host.path.resolve(entryPath)),
    host,
  });

export const analyzeProgram = (
  program: LoadedProgram,
): Map<ModuleId, ModuleResolution> =>
  resolveProgram({
    catalogs: new Map(
      Array.from(program.modules.values()).map(
        (module): [ModuleId, ModuleCatalog] => [module.id, module.catalog],
      ),
    ),
    linker: program.linker,
  });

/** Selection, naming and ordering; nothing is rendered yet. */
export const planMerge = ({
  program,
  resolutions,
}: {
  program: LoadedProgram;
  resolutions: ReadonlyMap<ModuleId, ModuleResolution>;
}): MergePlan => {
  const graph = buildDependencyGraph({ program, resolutions });
  const names = resolveConflicts(graph);
  const order = orderDefinitions(graph);
  return { graph, names, order };
};

export const mergedOutputPath = (entryPath: string, host: ModuleHost): string => {
  const entryFile = host.path.resolve(entryPath);
  const stem = host.path.basename(entryFile, ".py");
  return host.path.join(host.path.dirname(entryFile), `${stem}${MERGED_SUFFIX}.py`);
};

export const verifyMergedSource = (code: string, path: string): AuditReport => {
  const auditor = new Auditor();
  auditor.audit(code, path);
  return auditor.getReport();
};

/**
 * Merges the program reachable from `entryPath` into one file. Fatal
 * problems throw a `DiagnosticError` carrying every diagnostic collected
 * by the failing phase.
 */
export const mergeProject = async ({
  entryPath,
  projectRoot,
  host = createFsModuleHost(),
  verify = true,
  outputPath,
}: MergeProjectOptions): Promise<MergeResult> => {
  const timer = new PhaseTimer();
  const countersBefore = snapshotPerfCounters();
  let success = false;
  let diagnostics = 0;

  try {
    const program = await timer.time("load", () =>
      loadProject({ entryPath, projectRoot, host }),
    );
    const resolutions = timer.timeSync("resolve", () => analyzeProgram(program));
    const { graph, names, order } = timer.timeSync("plan", () =>
      planMerge({ program, resolutions }),
    );
    const code = timer.timeSync("emit", () => emitMergedSource({ graph, names, order }));
    const target = outputPath ?? mergedOutputPath(entryPath, host);
    const audit = verify
      ? timer.timeSync("verify", () => verifyMergedSource(code, target))
      : undefined;

    success = audit?.passed ?? true;
    return { code, outputPath: target, graph, names, order, audit };
  } catch (error) {
    if (error instanceof DiagnosticError) {
      diagnostics = error.diagnostics.length;
    }
    throw error;
  } finally {
    logPerfSummary({
      entryPath,
      success,
      phasesMs: timer.phasesMs,
      counters: diffPerfCounters({ before: countersBefore, after: snapshotPerfCounters() }),
      diagnostics,
    });
  }
};

export const writeMergedFile = async ({
  result,
  host = createFsModuleHost(),
}: {
  result: Pick<MergeResult, "code" | "outputPath">;
  host?: ModuleHost;
}): Promise<string> => {
  await host.writeFile(result.outputPath, result.code);
  return result.outputPath;
};
