import { DiagnosticError, diagnosticFromCode } from "../diagnostics/index.js";
import type { DependencyGraph, TopLevelUnit } from "./types.js";
import { describeUnit } from "./units.js";

type Mark = "visiting" | "visited";

/**
 * Orders the definitions section so every dependency precedes its
 * dependents. Roots are visited in discovery order, so unrelated
 * definitions keep the order in which the entry point reached them.
 */
export const orderDefinitions = (graph: DependencyGraph): string[] => {
  const section = new Set(graph.definitions);
  const dependencies = new Map<string, string[]>();
  graph.edges.forEach(({ from, to }) => {
    if (!section.has(from) || !section.has(to)) return;
    const list = dependencies.get(from) ?? [];
    list.push(to);
    dependencies.set(from, list);
  });

  const marks = new Map<string, Mark>();
  const stack: string[] = [];
  const order: string[] = [];

  const describe = (key: string) => {
    const unit: TopLevelUnit | undefined = graph.units.get(key);
    if (!unit) return key;
    const path = graph.program.modules.get(unit.moduleId)?.relativePath ?? unit.moduleId;
    return describeUnit(unit, path);
  };

  const reportCycle = (key: string): never => {
    const start = stack.indexOf(key);
    const cycle = [...stack.slice(start), key].map(describe);
    const unit = graph.units.get(key);
    const module = unit ? graph.program.modules.get(unit.moduleId) : undefined;
    const node = unit && module ? module.store.get(unit.statement) : undefined;
    throw new DiagnosticError(
      diagnosticFromCode({
        code: "GR0001",
        params: { kind: "circular-dependency", cycle },
        span: {
          file: module?.relativePath ?? "<unknown>",
          start: node?.span.start ?? 0,
          end: node?.span.end ?? 0,
          line: unit?.line,
        },
      }),
    );
  };

  const visit = (key: string) => {
    const mark = marks.get(key);
    if (mark === "visited") return;
    if (mark === "visiting") reportCycle(key);

    marks.set(key, "visiting");
    stack.push(key);
    dependencies.get(key)?.forEach(visit);
    stack.pop();
    marks.set(key, "visited");
    order.push(key);
  };

  graph.definitions.forEach(visit);
  return order;
};
