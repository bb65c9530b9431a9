import {
  DiagnosticEmitter,
  diagnosticFromCode,
  type SourceSpan,
} from "../diagnostics/index.js";
import {
  ParserSyntaxError,
  parseModule,
  parserErrorLocation,
  type ImportAlias,
  type NodeId,
  type TextSpan,
} from "../parser/index.js";
import { buildCatalog, type ModuleCatalog } from "../semantics/catalog.js";
import { symbolRefKey, type ModuleId, type SymbolId } from "../semantics/ids.js";
import { createProgramLinker, type ImportTarget } from "../semantics/linker.js";
import { incrementPerfCounter } from "../perf.js";
import { computeExecutionOrder } from "./execution-order.js";
import {
  absoluteImportName,
  isPackageFile,
  locateModule,
  moduleAncestry,
  moduleIdFromFile,
  relativeModulePath,
  ROOT_PACKAGE,
  topLevelName,
} from "./path.js";
import type {
  LoadedProgram,
  ModuleHost,
  ModuleImportEdge,
  ModuleLocation,
  PyModule,
} from "./types.js";

type LoadProgramOptions = {
  entryPath: string;
  projectRoot: string;
  host: ModuleHost;
};

type EnsuredModule = PyModule | "namespace" | undefined;

type ImportLinkRequest = {
  module: PyModule;
  statement: NodeId;
  alias: ImportAlias;
  line: number;
  symbol: SymbolId | undefined;
};

const formatErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Symbols bound by one import statement, in alias order. */
export const importBindings = (
  catalog: ModuleCatalog,
  statement: NodeId,
): SymbolId[] =>
  catalog.occurrences
    .filter(
      (occurrence) => occurrence.node === statement && occurrence.role === "def",
    )
    .map((occurrence) => {
      if (occurrence.symbol === undefined) {
        throw new Error(`import binding ${occurrence.name} was never declared`);
      }
      return occurrence.symbol;
    });

class ProgramLoader {
  private readonly host: ModuleHost;
  private readonly root: string;
  private readonly modules = new Map<ModuleId, PyModule>();
  private readonly namespaces = new Set<ModuleId>();
  private readonly failed = new Set<ModuleId>();
  private readonly locations = new Map<ModuleId, ModuleLocation | undefined>();
  private readonly importTargets = new Map<string, ImportTarget>();
  private readonly edges: ModuleImportEdge[] = [];
  private readonly diagnostics = new DiagnosticEmitter();
  private readonly pending: ModuleId[] = [];

  constructor({ host, root }: { host: ModuleHost; root: string }) {
    this.host = host;
    this.root = root;
  }

  async load(entryPath: string): Promise<LoadedProgram> {
    const entryFile = this.host.path.resolve(entryPath);
    const entry = moduleIdFromFile({
      root: this.root,
      filePath: entryFile,
      path: this.host.path,
    });
    if (entry === undefined) {
      return this.diagnostics.error(
        diagnosticFromCode({
          code: "MD0002",
          params: {
            kind: "load-failed",
            path: entryFile,
            errorMessage: `entry is outside the project root ${this.root}`,
          },
          span: { file: entryFile, start: 0, end: 0 },
        }),
      );
    }

    const loaded = await this.ensureModule(entry);
    if (!loaded) {
      this.diagnostics.throwIfErrors();
      return this.diagnostics.error(
        diagnosticFromCode({
          code: "MD0001",
          params: { kind: "missing-module", requested: entry },
          span: { file: entryFile, start: 0, end: 0 },
        }),
      );
    }

    let pendingIndex = 0;
    while (pendingIndex < this.pending.length) {
      const next = this.pending[pendingIndex];
      pendingIndex += 1;
      const module = next === undefined ? undefined : this.modules.get(next);
      if (!module) continue;
      incrementPerfCounter("loader.modules.linked");
      await this.linkImports(module);
    }

    this.diagnostics.throwIfErrors();

    return {
      root: this.root,
      entry,
      modules: this.modules,
      namespacePackages: this.namespaces,
      importTargets: this.importTargets,
      edges: this.edges,
      executionOrder: computeExecutionOrder({
        entry,
        modules: this.modules,
        edges: this.edges,
      }),
      linker: createProgramLinker({
        catalogs: new Map(
          Array.from(
            this.modules,
            ([id, module]): [ModuleId, ModuleCatalog] => [id, module.catalog],
          ),
        ),
        importTargets: this.importTargets,
        namespacePackages: this.namespaces,
      }),
    };
  }

  // Locating and parsing

  private async locate(moduleId: ModuleId): Promise<ModuleLocation | undefined> {
    if (this.locations.has(moduleId)) return this.locations.get(moduleId);
    const location = await locateModule({
      host: this.host,
      root: this.root,
      moduleId,
    });
    this.locations.set(moduleId, location);
    return location;
  }

  private async isInternal(moduleName: string): Promise<boolean> {
    return (await this.locate(topLevelName(moduleName))) !== undefined;
  }

  /** Loads a module after every enclosing package, the way the runtime does. */
  private async ensureModule(moduleId: ModuleId): Promise<EnsuredModule> {
    if (moduleId === ROOT_PACKAGE) {
      this.namespaces.add(ROOT_PACKAGE);
      return "namespace";
    }
    let loaded: EnsuredModule;
    for (const id of moduleAncestry(moduleId)) {
      loaded = await this.ensureSingle(id);
      if (!loaded) return undefined;
    }
    return loaded;
  }

  private async ensureSingle(moduleId: ModuleId): Promise<EnsuredModule> {
    const existing = this.modules.get(moduleId);
    if (existing) return existing;
    if (this.namespaces.has(moduleId)) return "namespace";
    if (this.failed.has(moduleId)) return undefined;

    const location = await this.locate(moduleId);
    if (!location) return undefined;
    if (location.kind === "namespace") {
      this.namespaces.add(moduleId);
      return "namespace";
    }

    const module = await this.parseFile(moduleId, location.filePath);
    if (!module) {
      this.failed.add(moduleId);
      return undefined;
    }
    this.modules.set(moduleId, module);
    this.pending.push(moduleId);
    return module;
  }

  private async parseFile(
    moduleId: ModuleId,
    filePath: string,
  ): Promise<PyModule | undefined> {
    const relativePath = relativeModulePath({
      root: this.root,
      filePath,
      path: this.host.path,
    });

    let source: string;
    try {
      source = await this.host.readFile(filePath);
    } catch (error) {
      this.diagnostics.report(
        diagnosticFromCode({
          code: "MD0002",
          params: {
            kind: "load-failed",
            path: relativePath,
            errorMessage: formatErrorMessage(error),
          },
          span: { file: relativePath, start: 0, end: 0 },
        }),
      );
      return undefined;
    }

    try {
      incrementPerfCounter("loader.modules.parsed");
      const store = parseModule(source, relativePath);
      const catalog = buildCatalog({ store, moduleId });
      this.reportWildcards(catalog, relativePath);
      return {
        id: moduleId,
        filePath,
        relativePath,
        isPackage: isPackageFile(filePath, this.host.path),
        source,
        store,
        catalog,
      };
    } catch (error) {
      if (!(error instanceof ParserSyntaxError)) throw error;
      const location = parserErrorLocation(error);
      this.diagnostics.report(
        diagnosticFromCode({
          code: "PA0001",
          params: { kind: "syntax-error", detail: error.message },
          span: {
            file: relativePath,
            start: location?.index ?? 0,
            end: location?.index ?? 0,
            line: location?.line,
          },
        }),
      );
      return undefined;
    }
  }

  private reportWildcards(catalog: ModuleCatalog, file: string) {
    catalog.wildcardImports.forEach((statement) => {
      const node = catalog.store.expect(statement, "import-from");
      this.diagnostics.report(
        diagnosticFromCode({
          code: "UC0001",
          params: {
            kind: "wildcard-import",
            module: `${".".repeat(node.level)}${node.module ?? ""}`,
          },
          span: {
            file,
            start: node.span.start,
            end: node.span.end,
            line: node.line,
          },
        }),
      );
    });
  }

  // Import edges

  private spanOf(
    module: PyModule,
    node: { span: TextSpan },
    line: number,
  ): SourceSpan {
    return {
      file: module.relativePath,
      start: node.span.start,
      end: node.span.end,
      line,
    };
  }

  private setTarget(
    module: PyModule,
    symbol: SymbolId | undefined,
    target: ImportTarget,
  ) {
    if (symbol === undefined) return;
    this.importTargets.set(symbolRefKey({ moduleId: module.id, symbol }), target);
  }

  /** A module that failed to parse has already been reported. */
  private hasFailed(moduleId: ModuleId): boolean {
    return moduleAncestry(moduleId).some((id) => this.failed.has(id));
  }

  private reportMissingModule(
    module: PyModule,
    requested: string,
    span: SourceSpan,
  ) {
    if (this.hasFailed(requested)) return;
    this.diagnostics.report(
      diagnosticFromCode({
        code: "MD0001",
        params: { kind: "missing-module", requested },
        span,
        related: [
          diagnosticFromCode({
            code: "MD0001",
            params: { kind: "referenced-from", importer: module.relativePath },
            span,
            severity: "note",
          }),
        ],
      }),
    );
  }

  private async linkImports(module: PyModule) {
    const { catalog } = module;
    for (const statement of catalog.importStatements) {
      const node = catalog.store.get(statement);
      const symbols = importBindings(catalog, statement);

      if (node.kind === "import") {
        for (const [index, alias] of node.names.entries()) {
          await this.linkPlainImport({
            module,
            statement,
            alias,
            line: node.line,
            symbol: symbols[index],
          });
        }
        continue;
      }
      if (node.kind !== "import-from" || node.wildcard) continue;

      const span = this.spanOf(module, node, node.line);
      const target = absoluteImportName({
        importer: module.id,
        importerIsPackage: module.isPackage,
        module: node.module,
        level: node.level,
      });
      if (target === undefined) {
        this.diagnostics.report(
          diagnosticFromCode({
            code: "MD0003",
            params: { kind: "relative-beyond-top", level: node.level },
            span,
          }),
        );
        continue;
      }

      const external =
        node.level === 0 &&
        (target === "__future__" || !(await this.isInternal(target)));
      if (external) {
        symbols.forEach((symbol) =>
          this.setTarget(module, symbol, { kind: "external" }),
        );
        continue;
      }

      if (!(await this.ensureModule(target))) {
        this.reportMissingModule(module, target || ".", span);
        continue;
      }
      this.edges.push({ importer: module.id, statement, target });

      for (const [index, alias] of node.names.entries()) {
        await this.linkFromImport({
          module,
          statement,
          source: target,
          alias,
          line: node.line,
          symbol: symbols[index],
        });
      }
    }
  }

  private async linkPlainImport({
    module,
    statement,
    alias,
    line,
    symbol,
  }: ImportLinkRequest) {
    if (!(await this.isInternal(alias.name))) {
      this.setTarget(module, symbol, { kind: "external" });
      return;
    }
    if (!(await this.ensureModule(alias.name))) {
      this.reportMissingModule(
        module,
        alias.name,
        this.spanOf(module, alias, line),
      );
      return;
    }
    this.edges.push({ importer: module.id, statement, target: alias.name });
    this.setTarget(module, symbol, {
      kind: "module",
      moduleId: alias.asname ? alias.name : topLevelName(alias.name),
    });
  }

  /** A binding in the source module wins over a submodule of the same name. */
  private async linkFromImport({
    module,
    statement,
    source,
    alias,
    line,
    symbol,
  }: ImportLinkRequest & { source: ModuleId }) {
    const sourceModule = this.modules.get(source);
    const table = sourceModule?.catalog.table;
    if (table && table.lookupLocal(alias.name, table.rootScope) !== undefined) {
      this.setTarget(module, symbol, {
        kind: "member",
        moduleId: source,
        name: alias.name,
      });
      return;
    }

    const submodule = source ? `${source}.${alias.name}` : alias.name;
    if (await this.ensureModule(submodule)) {
      this.edges.push({ importer: module.id, statement, target: submodule });
      this.setTarget(module, symbol, { kind: "module", moduleId: submodule });
      return;
    }
    if (this.hasFailed(submodule)) return;

    this.diagnostics.report(
      diagnosticFromCode({
        code: "MD0003",
        params: {
          kind: "missing-import-target",
          module: source || ".",
          name: alias.name,
        },
        span: this.spanOf(module, alias, line),
      }),
    );
  }
}

/**
 * Parses the entry module and every internal module it reaches, breadth
 * first. Fatal problems (parse failures, wildcard imports, missing modules)
 * are collected across the whole program before a `DiagnosticError` is
 * thrown.
 */
export const loadProgram = async ({
  entryPath,
  projectRoot,
  host,
}: LoadProgramOptions): Promise<LoadedProgram> =>
  new ProgramLoader({ host, root: host.path.resolve(projectRoot) }).load(entryPath);
