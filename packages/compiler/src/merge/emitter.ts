import type { PyModule } from "../modules/types.js";
import { importBindings } from "../modules/graph.js";
import type { ImportAlias, NodeId, TextSpan } from "../parser/index.js";
import { symbolRefKey } from "../semantics/ids.js";
import {
  externalBindingKey,
  slotKey,
  type DependencyGraph,
  type ExternalBinding,
  type NamePlan,
  type ReferenceTarget,
  type TopLevelUnit,
  type UnitReference,
} from "./types.js";

interface TextEdit {
  span: TextSpan;
  text: string;
  /** Wins over edits it overlaps. */
  priority: number;
}

const renderAlias = (name: string, local: string | undefined) =>
  local === undefined ? name : `${name} as ${local}`;

/** `local` is omitted when the binding keeps the name it introduces. */
export const renderExternalImport = (external: ExternalBinding, local: string): string => {
  const { binding } = external;
  if (binding.form === "import") {
    const keepsName = binding.asname === undefined && local === external.bound;
    return `import ${renderAlias(binding.module, keepsName ? undefined : local)}`;
  }
  const imported = binding.name ?? external.bound;
  return `from ${binding.module} import ${renderAlias(
    imported,
    local === imported ? undefined : local,
  )}`;
};

const applyEdits = (text: string, offset: number, edits: readonly TextEdit[]) => {
  const ordered = [...edits].sort(
    (left, right) =>
      left.span.start - right.span.start || right.priority - left.priority,
  );
  let result = "";
  let cursor = 0;
  ordered.forEach((edit) => {
    const start = edit.span.start - offset;
    const end = edit.span.end - offset;
    if (start < cursor) return;
    result += text.slice(cursor, start) + edit.text;
    cursor = end;
  });
  return result + text.slice(cursor);
};

class MergedFileEmitter {
  private readonly graph: DependencyGraph;
  private readonly names: NamePlan;

  constructor({ graph, names }: { graph: DependencyGraph; names: NamePlan }) {
    this.graph = graph;
    this.names = names;
  }

  emit(order: readonly string[]): string {
    const parts: string[] = [];

    if (this.graph.futureFeatures.length > 0) {
      parts.push(`from __future__ import ${this.graph.futureFeatures.join(", ")}`);
    }

    const headerImports = this.headerImports();
    if (headerImports.length > 0) parts.push(headerImports.join("\n"));

    order.forEach((key) => {
      const unit = this.unit(key);
      parts.push(`# From ${this.module(unit).relativePath}\n${this.renderUnit(unit)}`);
    });

    const emitted = new Set<string>();
    this.graph.program.executionOrder.forEach((moduleId) => {
      const keys = this.graph.statements.get(moduleId);
      if (!keys) return;
      const rendered = keys
        .map((key) => this.renderUnit(this.unit(key)))
        .filter((text) => {
          if (emitted.has(text)) return false;
          emitted.add(text);
          return true;
        });
      if (rendered.length === 0) return;
      const module = this.graph.program.modules.get(moduleId);
      parts.push([`# From ${module?.relativePath ?? moduleId}`, ...rendered].join("\n"));
    });

    if (this.graph.entryBlock !== undefined) {
      parts.push(this.renderUnit(this.unit(this.graph.entryBlock)));
    }

    return `${parts.join("\n\n")}\n`;
  }

  private unit(key: string): TopLevelUnit {
    const unit = this.graph.units.get(key);
    if (!unit) {
      throw new Error(`unknown unit ${key}`);
    }
    return unit;
  }

  private module(unit: TopLevelUnit): PyModule {
    const module = this.graph.program.modules.get(unit.moduleId);
    if (!module) {
      throw new Error(`module ${unit.moduleId} was not loaded`);
    }
    return module;
  }

  private headerImports(): string[] {
    const lines: string[] = [];
    this.graph.externals.forEach((external) => {
      if (!external.header) return;
      const line = renderExternalImport(
        external,
        this.names.externals.get(external.key) ?? external.bound,
      );
      if (!lines.includes(line)) lines.push(line);
    });
    return lines;
  }

  private finalName(target: ReferenceTarget): string | undefined {
    return target.kind === "slot"
      ? this.names.slots.get(slotKey(target.slot))
      : this.names.externals.get(target.binding);
  }

  private referenceEdits(references: readonly UnitReference[]): TextEdit[] {
    return references.flatMap((reference) => {
      const name = this.finalName(reference.target);
      if (name === undefined) return [];
      if (!reference.collapse && name === reference.text) return [];
      return [{ span: reference.span, text: name, priority: reference.collapse ? 1 : 0 }];
    });
  }

  /** Imports inside retained code: merged targets go, outside modules stay. */
  private importEdits(module: PyModule, statement: NodeId): TextEdit[] {
    const { store, catalog } = module;
    const edits: TextEdit[] = [];

    for (const id of store.descendants(statement)) {
      const node = store.get(id);
      if (node.kind !== "import" && node.kind !== "import-from") continue;

      const symbols = importBindings(catalog, id);
      let changed = false;
      const kept: string[] = [];
      node.names.forEach((alias: ImportAlias, index) => {
        const symbol = symbols[index];
        const target =
          symbol === undefined
            ? undefined
            : this.graph.program.importTargets.get(
                symbolRefKey({ moduleId: module.id, symbol }),
              );
        if (target && target.kind !== "external") {
          changed = true;
          return;
        }

        const record = symbol === undefined ? undefined : catalog.table.getSymbol(symbol);
        const local = record?.import
          ? this.names.externals.get(externalBindingKey(record.import))
          : undefined;
        if (local !== undefined && record && local !== record.name) {
          changed = true;
          kept.push(renderAlias(alias.name, local));
          return;
        }
        kept.push(renderAlias(alias.name, alias.asname));
      });

      if (!changed) continue;
      let text = "pass";
      if (kept.length > 0) {
        text =
          node.kind === "import"
            ? `import ${kept.join(", ")}`
            : `from ${".".repeat(node.level)}${node.module ?? ""} import ${kept.join(", ")}`;
      }
      edits.push({ span: node.span, text, priority: 2 });
    }

    return edits;
  }

  private renderUnit(unit: TopLevelUnit): string {
    const module = this.module(unit);
    const { span } = module.store.get(unit.statement);
    const text = module.source.slice(span.start, span.end);
    const edits = [
      ...this.importEdits(module, unit.statement),
      ...this.referenceEdits(this.graph.references.get(unit.key) ?? []),
    ];
    return applyEdits(text, span.start, edits);
  }
}

/**
 * Renders the merged file. Every decision was made upstream; this only
 * slices source text and applies the planned renames.
 */
export const emitMergedSource = ({
  graph,
  names,
  order,
}: {
  graph: DependencyGraph;
  names: NamePlan;
  order: readonly string[];
}): string => new MergedFileEmitter({ graph, names }).emit(order);
