import {
  type ExprContext,
  type NodeId,
  type NodeStore,
  type TextSpan,
} from "../parser/index.js";
import { SymbolTable } from "./binder/index.js";
import type {
  BindingRole,
  ImportBinding,
  SymbolKind,
  SymbolRecord,
} from "./binder/index.js";
import type { ModuleId, ScopeId, SymbolId } from "./ids.js";
import { isExemptDecorator } from "./patterns.js";

export type OccurrenceRole = "load" | "store" | "del" | "def" | "global";

/** One appearance of a bare name. */
export interface NameOccurrence {
  node: NodeId;
  name: string;
  scope: ScopeId;
  role: OccurrenceRole;
  span: TextSpan;
  line: number;
  topLevel: NodeId;
  /** Bound symbol of a `def` occurrence. */
  symbol?: SymbolId;
  /** Set when the name heads an attribute chain. */
  chain?: number;
}

export interface ChainAttribute {
  name: string;
  span: TextSpan;
  node: NodeId;
}

/** A maximal `name.attr.attr…` chain. */
export interface AttributeChain {
  node: NodeId;
  head: NodeId;
  headName: string;
  /** Occurrence index of the head name. */
  headOccurrence: number;
  attrs: ChainAttribute[];
  ctx: ExprContext;
  scope: ScopeId;
  line: number;
  topLevel: NodeId;
}

export interface ClassInfo {
  node: NodeId;
  scope: ScopeId;
  name: string;
  bases: readonly NodeId[];
  /** Attributes assigned through the first parameter of a method. */
  instanceAttributes: Set<string>;
  hasMetaclass: boolean;
  definesGetattr: boolean;
}

export interface CallSite {
  node: NodeId;
  func: NodeId;
  scope: ScopeId;
  line: number;
  topLevel: NodeId;
}

export interface DuplicateRecord {
  scope: ScopeId;
  name: string;
  /** Every offending binding, in source order. */
  symbols: SymbolId[];
}

export interface ModuleCatalog {
  moduleId: ModuleId;
  store: NodeStore;
  table: SymbolTable;
  occurrences: readonly NameOccurrence[];
  chains: readonly AttributeChain[];
  classes: ReadonlyMap<ScopeId, ClassInfo>;
  calls: readonly CallSite[];
  duplicates: readonly DuplicateRecord[];
  /** Import statements anywhere in the module, in source order. */
  importStatements: readonly NodeId[];
  wildcardImports: readonly NodeId[];
}

interface MethodContext {
  classInfo: ClassInfo;
  selfName: string;
}

interface WalkContext {
  scope: ScopeId;
  topLevel: NodeId;
  /** Inside a compound statement of the current scope body. */
  nested: boolean;
  classInfo?: ClassInfo;
  method?: MethodContext;
}

interface DeferredBinding {
  record: Omit<SymbolRecord, "id" | "scope">;
  occurrence: NameOccurrence;
  target: { kind: "scope"; scope: ScopeId } | { kind: "nonlocal"; from: ScopeId };
}

type BindOptions = {
  node: NodeId;
  span: TextSpan;
  line: number;
  role: BindingRole;
  import?: ImportBinding;
  value?: NodeId;
  exempt?: boolean;
  scope?: ScopeId;
};

class CatalogBuilder {
  private readonly store: NodeStore;
  private readonly table: SymbolTable;
  private readonly occurrences: NameOccurrence[] = [];
  private readonly chains: AttributeChain[] = [];
  private readonly classes = new Map<ScopeId, ClassInfo>();
  private readonly calls: CallSite[] = [];
  private readonly importStatements: NodeId[] = [];
  private readonly wildcardImports: NodeId[] = [];
  private readonly deferred: DeferredBinding[] = [];

  constructor(store: NodeStore) {
    this.store = store;
    this.table = new SymbolTable({ rootOwner: store.root });
  }

  build(moduleId: ModuleId): ModuleCatalog {
    const { table } = this;
    table.recordNode(this.store.root, table.rootScope);
    this.store.body.forEach((statement) =>
      this.visitStatement(statement, {
        scope: table.rootScope,
        topLevel: statement,
        nested: false,
      }),
    );
    this.flushDeferred();
    this.classes.forEach((info) => {
      info.definesGetattr =
        table.lookupLocal("__getattr__", info.scope) !== undefined ||
        table.lookupLocal("__getattribute__", info.scope) !== undefined;
    });

    return {
      moduleId,
      store: this.store,
      table,
      occurrences: this.occurrences,
      chains: this.chains,
      classes: this.classes,
      calls: this.calls,
      duplicates: this.collectDuplicates(),
      importStatements: this.importStatements,
      wildcardImports: this.wildcardImports,
    };
  }

  // Bindings

  private bind(name: string, kind: SymbolKind, opts: BindOptions, ctx: WalkContext) {
    const scope = opts.scope ?? ctx.scope;
    const occurrence: NameOccurrence = {
      node: opts.node,
      name,
      scope,
      role: "def",
      span: opts.span,
      line: opts.line,
      topLevel: ctx.topLevel,
    };
    this.occurrences.push(occurrence);

    const record: Omit<SymbolRecord, "id" | "scope"> = {
      name,
      kind,
      declaredAt: opts.node,
      topLevel: ctx.topLevel,
      role: opts.role,
      line: opts.line,
      span: opts.span,
      import: opts.import,
      value: opts.value,
      exempt: opts.exempt,
    };

    const declared = this.table.declarationOf(scope, name);
    if (declared === "global") {
      this.deferred.push({
        record: { ...record, role: "statement" },
        occurrence,
        target: { kind: "scope", scope: this.table.rootScope },
      });
      return;
    }
    if (declared === "nonlocal") {
      this.deferred.push({
        record: { ...record, role: "statement" },
        occurrence,
        target: { kind: "nonlocal", from: scope },
      });
      return;
    }
    if (scope === this.table.rootScope && opts.role === "statement") {
      this.deferred.push({ record, occurrence, target: { kind: "scope", scope } });
      return;
    }

    occurrence.symbol = this.table.declare(record, scope);
  }

  /**
   * Statement bindings at module scope land after every definition, so a
   * name's first entry is its definition whenever it has one.
   */
  private flushDeferred() {
    this.deferred.forEach(({ record, occurrence, target }) => {
      const scope =
        target.kind === "scope"
          ? target.scope
          : this.nonlocalTarget(target.from, record.name);
      occurrence.symbol = this.table.declare(record, scope);
    });
  }

  private nonlocalTarget(from: ScopeId, name: string): ScopeId {
    let fallback: ScopeId | undefined;
    let scope = this.table.getScope(from).parent;
    while (scope !== null) {
      const info = this.table.getScope(scope);
      if (info.kind === "function") {
        if (this.table.lookupLocal(name, scope) !== undefined) return scope;
        fallback ??= scope;
      }
      scope = info.parent;
    }
    return fallback ?? this.table.rootScope;
  }

  private roleFor(ctx: WalkContext): BindingRole {
    return ctx.nested ? "statement" : "definition";
  }

  private nearestNonComprehension(scope: ScopeId): ScopeId {
    let current = scope;
    let info = this.table.getScope(current);
    while (info.kind === "comprehension" && info.parent !== null) {
      current = info.parent;
      info = this.table.getScope(current);
    }
    return current;
  }

  // Statements

  private visitBlock(body: readonly NodeId[], ctx: WalkContext) {
    body.forEach((statement) => this.visitStatement(statement, ctx));
  }

  private visitStatement(id: NodeId, ctx: WalkContext) {
    const node = this.store.get(id);
    this.table.recordNode(id, ctx.scope);
    const nested: WalkContext = { ...ctx, nested: true };

    switch (node.kind) {
      case "function-def": {
        node.decorators.forEach((decorator) => this.visitExpr(decorator, ctx));
        this.visitParamHeaders(node.params, ctx);
        if (node.returns !== undefined) this.visitExpr(node.returns, ctx);

        this.bind(
          node.name,
          "function",
          {
            node: id,
            span: node.nameSpan,
            line: node.line,
            role: this.roleFor(ctx),
            exempt: node.decorators.some((decorator) =>
              isExemptDecorator(this.store, decorator),
            ),
          },
          ctx,
        );

        const scope = this.table.createScope({
          parent: ctx.scope,
          kind: "function",
          owner: id,
          name: node.name,
        });
        const firstId = node.params[0];
        const first =
          firstId === undefined ? undefined : this.store.expect(firstId, "param");
        const inner: WalkContext = {
          scope,
          topLevel: ctx.topLevel,
          nested: false,
          method:
            ctx.classInfo && first?.paramKind === "positional"
              ? { classInfo: ctx.classInfo, selfName: first.name }
              : undefined,
        };
        this.bindParams(node.params, inner);
        this.visitBlock(node.body, inner);
        return;
      }

      case "class-def": {
        node.decorators.forEach((decorator) => this.visitExpr(decorator, ctx));
        node.bases.forEach((base) => this.visitExpr(base, ctx));
        node.keywords.forEach((keyword) => this.visitExpr(keyword, ctx));

        this.bind(
          node.name,
          "class",
          { node: id, span: node.nameSpan, line: node.line, role: this.roleFor(ctx) },
          ctx,
        );

        const scope = this.table.createScope({
          parent: ctx.scope,
          kind: "class",
          owner: id,
          name: node.name,
        });
        const info: ClassInfo = {
          node: id,
          scope,
          name: node.name,
          bases: node.bases,
          instanceAttributes: new Set(),
          hasMetaclass: node.keywords.some(
            (keyword) => this.store.expect(keyword, "keyword").arg === "metaclass",
          ),
          definesGetattr: false,
        };
        this.classes.set(scope, info);
        this.visitBlock(node.body, {
          scope,
          topLevel: ctx.topLevel,
          nested: false,
          classInfo: info,
        });
        return;
      }

      case "assign": {
        this.visitExpr(node.value, ctx);
        const single = node.targets.length === 1;
        node.targets.forEach((target) =>
          this.visitTarget(target, ctx, this.roleFor(ctx), single ? node.value : undefined),
        );
        return;
      }

      case "aug-assign": {
        this.visitExpr(node.value, ctx);
        const target = this.store.get(node.target);
        if (target.kind === "name") {
          this.pushNameOccurrence(node.target, target.id, "load", ctx);
          this.bind(
            target.id,
            "variable",
            { node: node.target, span: target.span, line: target.line, role: "statement" },
            ctx,
          );
          this.table.recordNode(node.target, ctx.scope);
        } else {
          this.visitExpr(node.target, ctx);
        }
        return;
      }

      case "ann-assign": {
        this.visitExpr(node.annotation, ctx);
        if (node.value !== undefined) this.visitExpr(node.value, ctx);
        const target = this.store.get(node.target);
        if (target.kind !== "name") {
          this.visitExpr(node.target, ctx);
          return;
        }
        this.table.recordNode(node.target, ctx.scope);
        const scopeKind = this.table.getScope(ctx.scope).kind;
        if (node.value !== undefined || scopeKind === "class") {
          this.bind(
            target.id,
            "variable",
            {
              node: node.target,
              span: target.span,
              line: target.line,
              role: this.roleFor(ctx),
              value: node.value,
            },
            ctx,
          );
        }
        return;
      }

      case "for":
        this.visitExpr(node.iter, ctx);
        this.visitTarget(node.target, ctx, "statement");
        this.visitBlock(node.body, nested);
        this.visitBlock(node.orelse, nested);
        return;

      case "while":
      case "if":
        this.visitExpr(node.test, ctx);
        this.visitBlock(node.body, nested);
        this.visitBlock(node.orelse, nested);
        return;

      case "with":
        node.items.forEach((itemId) => {
          const item = this.store.expect(itemId, "with-item");
          this.table.recordNode(itemId, ctx.scope);
          this.visitExpr(item.context, ctx);
          if (item.target !== undefined) {
            this.visitTarget(item.target, ctx, "statement");
          }
        });
        this.visitBlock(node.body, nested);
        return;

      case "try":
        this.visitBlock(node.body, nested);
        node.handlers.forEach((handlerId) => {
          const handler = this.store.expect(handlerId, "except-handler");
          this.table.recordNode(handlerId, ctx.scope);
          if (handler.type !== undefined) this.visitExpr(handler.type, ctx);
          if (handler.name) {
            this.bind(
              handler.name.name,
              "variable",
              {
                node: handlerId,
                span: handler.name.span,
                line: handler.line,
                role: "statement",
              },
              ctx,
            );
          }
          this.visitBlock(handler.body, nested);
        });
        this.visitBlock(node.orelse, nested);
        this.visitBlock(node.finalbody, nested);
        return;

      case "import":
        this.importStatements.push(id);
        node.names.forEach((alias) => {
          const bound = alias.asname ?? alias.name.split(".")[0] ?? alias.name;
          this.bind(
            bound,
            "import",
            {
              node: id,
              span: alias.span,
              line: node.line,
              role: this.roleFor(ctx),
              import: {
                form: "import",
                module: alias.name,
                level: 0,
                asname: alias.asname,
              },
            },
            ctx,
          );
        });
        return;

      case "import-from":
        this.importStatements.push(id);
        if (node.wildcard) {
          this.wildcardImports.push(id);
          return;
        }
        node.names.forEach((alias) =>
          this.bind(
            alias.asname ?? alias.name,
            "import",
            {
              node: id,
              span: alias.span,
              line: node.line,
              role: this.roleFor(ctx),
              import: {
                form: "from",
                module: node.module ?? "",
                level: node.level,
                name: alias.name,
                asname: alias.asname,
              },
            },
            ctx,
          ),
        );
        return;

      case "global":
      case "nonlocal":
        node.names.forEach(({ name, span }) => {
          this.table.declareName(ctx.scope, name, node.kind);
          this.occurrences.push({
            node: id,
            name,
            scope: ctx.scope,
            role: "global",
            span,
            line: node.line,
            topLevel: ctx.topLevel,
          });
        });
        return;

      case "delete":
        node.targets.forEach((target) => this.visitExpr(target, ctx));
        return;

      case "return":
      case "raise":
      case "assert":
      case "expr-stmt":
        this.store.children(id).forEach((child) => this.visitExpr(child, ctx));
        return;

      case "pass":
      case "break":
      case "continue":
        return;

      default:
        throw new Error(`unexpected statement kind ${node.kind}`);
    }
  }

  private visitParamHeaders(params: readonly NodeId[], ctx: WalkContext) {
    params.forEach((paramId) => {
      const param = this.store.expect(paramId, "param");
      this.table.recordNode(paramId, ctx.scope);
      if (param.annotation !== undefined) this.visitExpr(param.annotation, ctx);
      if (param.default !== undefined) this.visitExpr(param.default, ctx);
    });
  }

  private bindParams(params: readonly NodeId[], ctx: WalkContext) {
    params.forEach((paramId) => {
      const param = this.store.expect(paramId, "param");
      this.bind(
        param.name,
        "parameter",
        { node: paramId, span: param.span, line: param.line, role: "definition" },
        ctx,
      );
    });
  }

  private visitTarget(
    id: NodeId,
    ctx: WalkContext,
    role: BindingRole,
    value?: NodeId,
  ) {
    const node = this.store.get(id);
    switch (node.kind) {
      case "name":
        this.table.recordNode(id, ctx.scope);
        this.bind(
          node.id,
          "variable",
          { node: id, span: node.span, line: node.line, role, value },
          ctx,
        );
        return;
      case "tuple":
      case "list":
        this.table.recordNode(id, ctx.scope);
        node.elts.forEach((elt) => this.visitTarget(elt, ctx, role));
        return;
      case "starred":
        this.table.recordNode(id, ctx.scope);
        this.visitTarget(node.value, ctx, role);
        return;
      default:
        this.visitExpr(id, ctx);
    }
  }

  // Expressions

  private pushNameOccurrence(
    id: NodeId,
    name: string,
    role: OccurrenceRole,
    ctx: WalkContext,
  ): number {
    const node = this.store.get(id);
    if (
      role === "load" &&
      this.table.getScope(ctx.scope).kind === "class" &&
      this.table.lookupLocal(name, ctx.scope) === undefined
    ) {
      this.table.markEarlyClassLoad(id);
    }
    this.occurrences.push({
      node: id,
      name,
      scope: ctx.scope,
      role,
      span: node.span,
      line: node.line,
      topLevel: ctx.topLevel,
    });
    return this.occurrences.length - 1;
  }

  private visitExpr(id: NodeId, ctx: WalkContext) {
    const node = this.store.get(id);
    this.table.recordNode(id, ctx.scope);

    switch (node.kind) {
      case "name":
        this.pushNameOccurrence(id, node.id, node.ctx, ctx);
        return;

      case "attribute":
        this.visitAttribute(id, ctx);
        return;

      case "call":
        this.calls.push({
          node: id,
          func: node.func,
          scope: ctx.scope,
          line: node.line,
          topLevel: ctx.topLevel,
        });
        this.visitExpr(node.func, ctx);
        node.args.forEach((arg) => this.visitExpr(arg, ctx));
        node.keywords.forEach((keyword) => this.visitExpr(keyword, ctx));
        return;

      case "lambda": {
        this.visitParamHeaders(node.params, ctx);
        const scope = this.table.createScope({
          parent: ctx.scope,
          kind: "function",
          owner: id,
          name: "<lambda>",
        });
        const inner: WalkContext = { scope, topLevel: ctx.topLevel, nested: false };
        this.bindParams(node.params, inner);
        this.visitExpr(node.body, inner);
        return;
      }

      case "list-comp":
      case "set-comp":
      case "generator-exp":
        this.visitComprehension(id, node.generators, [node.elt], ctx);
        return;

      case "dict-comp":
        this.visitComprehension(id, node.generators, [node.key, node.value], ctx);
        return;

      case "named-expr": {
        this.visitExpr(node.value, ctx);
        const target = this.store.expect(node.target, "name");
        this.table.recordNode(node.target, ctx.scope);
        this.bind(
          target.id,
          "variable",
          {
            node: node.target,
            span: target.span,
            line: target.line,
            role: "statement",
            scope: this.nearestNonComprehension(ctx.scope),
          },
          ctx,
        );
        return;
      }

      default:
        this.store.children(id).forEach((child) => this.visitExpr(child, ctx));
    }
  }

  private visitAttribute(id: NodeId, ctx: WalkContext) {
    const outer = this.store.expect(id, "attribute");
    const attrs: ChainAttribute[] = [];
    let current: NodeId = id;
    let node = this.store.get(current);
    while (node.kind === "attribute") {
      this.table.recordNode(current, ctx.scope);
      attrs.unshift({ name: node.attr, span: node.attrSpan, node: current });
      current = node.value;
      node = this.store.get(current);
    }

    if (node.kind !== "name") {
      this.visitExpr(current, ctx);
      return;
    }

    this.table.recordNode(current, ctx.scope);
    const headOccurrence = this.pushNameOccurrence(current, node.id, "load", ctx);
    const chainIndex = this.chains.length;
    const occurrence = this.occurrences[headOccurrence];
    if (occurrence) occurrence.chain = chainIndex;
    this.chains.push({
      node: id,
      head: current,
      headName: node.id,
      headOccurrence,
      attrs,
      ctx: outer.ctx,
      scope: ctx.scope,
      line: outer.line,
      topLevel: ctx.topLevel,
    });

    const [first] = attrs;
    if (
      ctx.method &&
      outer.ctx === "store" &&
      attrs.length === 1 &&
      first &&
      node.id === ctx.method.selfName
    ) {
      ctx.method.classInfo.instanceAttributes.add(first.name);
    }
  }

  private visitComprehension(
    owner: NodeId,
    generators: readonly NodeId[],
    elements: readonly NodeId[],
    ctx: WalkContext,
  ) {
    const [firstId] = generators;
    if (firstId === undefined) {
      throw new Error("comprehension without generators");
    }
    this.visitExpr(this.store.expect(firstId, "comprehension").iter, ctx);

    const scope = this.table.createScope({
      parent: ctx.scope,
      kind: "comprehension",
      owner,
      name: "<comprehension>",
    });
    const inner: WalkContext = { ...ctx, scope, nested: true };
    generators.forEach((generatorId, index) => {
      const generator = this.store.expect(generatorId, "comprehension");
      this.table.recordNode(generatorId, scope);
      if (index > 0) this.visitExpr(generator.iter, inner);
      this.visitTarget(generator.target, inner, "statement");
      generator.ifs.forEach((condition) => this.visitExpr(condition, inner));
    });
    elements.forEach((element) => this.visitExpr(element, inner));
  }

  // Duplicates

  private countsAsDuplicate(id: SymbolId, scopeKind: string): boolean {
    const record = this.table.getSymbol(id);
    if (record.role !== "definition" || record.exempt) return false;
    if (scopeKind === "module") return true;
    return record.kind === "function" || record.kind === "class";
  }

  private collectDuplicates(): DuplicateRecord[] {
    const duplicates: DuplicateRecord[] = [];
    for (let scope = 0; scope < this.table.scopeCount; scope += 1) {
      const { kind } = this.table.getScope(scope);
      if (kind === "comprehension") continue;
      this.table.namesInScope(scope).forEach((name) => {
        const symbols = this.table
          .bindingsOf(name, scope)
          .filter((id) => this.countsAsDuplicate(id, kind));
        if (symbols.length > 1) {
          duplicates.push({ scope, name, symbols });
        }
      });
    }
    return duplicates;
  }
}

export const buildCatalog = ({
  store,
  moduleId,
}: {
  store: NodeStore;
  moduleId: ModuleId;
}): ModuleCatalog => new CatalogBuilder(store).build(moduleId);

/** Module-scope bindings of `name` (the name's slot). */
export const slotOf = (catalog: ModuleCatalog, name: string): readonly SymbolId[] =>
  catalog.table.bindingsOf(name, catalog.table.rootScope);

export const describeScope = (catalog: ModuleCatalog, scope: ScopeId): string => {
  const info = catalog.table.getScope(scope);
  switch (info.kind) {
    case "module":
      return "module scope";
    case "class":
      return `class ${info.name}`;
    case "function":
      return info.name === "<lambda>" ? "lambda" : `function ${info.name}`;
    case "comprehension":
      return "comprehension";
  }
};
