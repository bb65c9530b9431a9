import type { NodeId, ScopeId, SymbolId } from "../ids.js";
import type {
  DeclarationKind,
  ScopeInfo,
  SymbolRecord,
  SymbolTableInit,
} from "./types.js";

interface ScopeBucket {
  info: ScopeInfo;
  locals: SymbolId[];
  nameIndex: Map<string, SymbolId[]>;
  children: ScopeId[];
  declarations: Map<string, DeclarationKind>;
}

const ensureScopeExists = (
  bucket: ScopeBucket | undefined,
  scope: ScopeId,
): ScopeBucket => {
  if (!bucket) {
    throw new Error(`symbol table scope ${scope} does not exist`);
  }

  return bucket;
};

export class SymbolTable {
  private nextScope: ScopeId = 0;
  private nextSymbol: SymbolId = 0;
  private readonly scopeBuckets: ScopeBucket[] = [];
  private readonly symbolRecords: SymbolRecord[] = [];
  private readonly nodeScopes = new Map<NodeId, ScopeId>();
  private readonly ownedScopes = new Map<NodeId, ScopeId>();
  private readonly qualifiedNames = new Map<SymbolId, string>();
  private readonly earlyClassLoads = new Set<NodeId>();
  readonly rootScope: ScopeId;

  constructor(init: SymbolTableInit) {
    this.rootScope = this.createBucket({
      parent: null,
      kind: "module",
      owner: init.rootOwner,
      name: "<module>",
    });
  }

  private createBucket(info: Omit<ScopeInfo, "id">): ScopeId {
    const parent =
      info.parent === null ? undefined : this.scopeBuckets[info.parent];
    if (info.parent !== null && !parent) {
      throw new Error(
        `cannot create scope without registering parent ${info.parent}`,
      );
    }

    const id = this.nextScope++;
    this.scopeBuckets[id] = {
      info: { ...info, id },
      locals: [],
      nameIndex: new Map(),
      children: [],
      declarations: new Map(),
    };
    parent?.children.push(id);
    this.ownedScopes.set(info.owner, id);
    return id;
  }

  createScope(info: Omit<ScopeInfo, "id">): ScopeId {
    return this.createBucket(info);
  }

  declare(
    symbol: Omit<SymbolRecord, "id" | "scope">,
    scope: ScopeId = this.rootScope,
  ): SymbolId {
    const id = this.nextSymbol++;
    const record: SymbolRecord = { ...symbol, id, scope };
    this.symbolRecords[id] = record;

    const bucket = ensureScopeExists(this.scopeBuckets[scope], scope);
    bucket.locals.push(id);

    const hits = bucket.nameIndex.get(record.name);
    if (hits) {
      hits.push(id);
    } else {
      bucket.nameIndex.set(record.name, [id]);
    }

    return id;
  }

  /** Records a `global` or `nonlocal` statement for `name` in `scope`. */
  declareName(scope: ScopeId, name: string, kind: DeclarationKind): void {
    ensureScopeExists(this.scopeBuckets[scope], scope).declarations.set(
      name,
      kind,
    );
  }

  declarationOf(scope: ScopeId, name: string): DeclarationKind | undefined {
    return ensureScopeExists(this.scopeBuckets[scope], scope).declarations.get(
      name,
    );
  }

  /**
   * Marks a name load in a class body that runs before the class binds the
   * name; the runtime then looks it up outside the class.
   */
  markEarlyClassLoad(node: NodeId): void {
    this.earlyClassLoads.add(node);
  }

  recordNode(node: NodeId, scope: ScopeId): void {
    this.nodeScopes.set(node, scope);
  }

  /** Scope a node was visited in. */
  scopeOf(node: NodeId): ScopeId {
    const scope = this.nodeScopes.get(node);
    if (scope === undefined) {
      throw new Error(`node ${node} was never visited by the catalog`);
    }
    return scope;
  }

  /** Scope opened by a def, class, lambda or comprehension node. */
  scopeOwnedBy(node: NodeId): ScopeId | undefined {
    return this.ownedScopes.get(node);
  }

  getScope(id: ScopeId): Readonly<ScopeInfo> {
    return ensureScopeExists(this.scopeBuckets[id], id).info;
  }

  childScopes(id: ScopeId): readonly ScopeId[] {
    return ensureScopeExists(this.scopeBuckets[id], id).children;
  }

  get scopeCount(): number {
    return this.nextScope;
  }

  getSymbol(id: SymbolId): Readonly<SymbolRecord> {
    const record = this.symbolRecords[id];
    if (!record) {
      throw new Error(`symbol ${id} does not exist`);
    }

    return record;
  }

  /** All bindings of `name` made directly in `scope`, in declaration order. */
  bindingsOf(name: string, scope: ScopeId): readonly SymbolId[] {
    return (
      ensureScopeExists(this.scopeBuckets[scope], scope).nameIndex.get(name) ??
      []
    );
  }

  lookupLocal(name: string, scope: ScopeId): SymbolId | undefined {
    return this.bindingsOf(name, scope)[0];
  }

  /**
   * Walks the scope chain the way the runtime does: class bodies are only
   * visible to code written directly in them, and `global` / `nonlocal`
   * declarations redirect the lookup. `node` is the load being resolved,
   * when there is one.
   */
  resolve(name: string, fromScope: ScopeId, node?: NodeId): SymbolId | undefined {
    let scope: ScopeId | null = fromScope;
    let skipClasses = false;
    if (node !== undefined && this.earlyClassLoads.has(node)) {
      scope = this.getScope(fromScope).parent;
      skipClasses = true;
    }

    while (scope !== null) {
      const bucket = ensureScopeExists(this.scopeBuckets[scope], scope);
      const declared = bucket.declarations.get(name);
      if (declared === "global") {
        return this.lookupLocal(name, this.rootScope);
      }

      const visible = !(skipClasses && bucket.info.kind === "class");
      if (visible && declared === undefined) {
        const hits = bucket.nameIndex.get(name);
        if (hits && hits.length > 0) {
          return hits[0];
        }
      }

      skipClasses = true;
      scope = bucket.info.parent;
    }

    return undefined;
  }

  *symbolsInScope(scope: ScopeId): IterableIterator<SymbolId> {
    const bucket = ensureScopeExists(this.scopeBuckets[scope], scope);
    yield* bucket.locals;
  }

  namesInScope(scope: ScopeId): readonly string[] {
    return Array.from(
      ensureScopeExists(this.scopeBuckets[scope], scope).nameIndex.keys(),
    );
  }

  /** Qualified names are written once, by conflict resolution. */
  setQualifiedName(id: SymbolId, name: string): void {
    this.getSymbol(id);
    const existing = this.qualifiedNames.get(id);
    if (existing !== undefined) {
      throw new Error(
        `symbol ${id} already has qualified name ${existing}; refusing ${name}`,
      );
    }
    this.qualifiedNames.set(id, name);
  }

  qualifiedNameOf(id: SymbolId): string | undefined {
    return this.qualifiedNames.get(id);
  }
}
