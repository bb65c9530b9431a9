export type NodeId = number;

/** Half-open character range into the owning module's source. */
export interface TextSpan {
  start: number;
  end: number;
}

interface NodeBase {
  span: TextSpan;
  /** 1-based line of the construct's keyword or first token. */
  line: number;
}

export type ExprContext = "load" | "store" | "del";

export interface ImportAlias {
  /** Dotted module path (`import`) or imported member (`from … import`). */
  name: string;
  asname?: string;
  span: TextSpan;
}

export interface NamedSpan {
  name: string;
  span: TextSpan;
}

export type ParamKind = "positional" | "vararg" | "keyword-only" | "kwarg";

export type ConstantKind =
  | "number"
  | "string"
  | "bytes"
  | "none"
  | "true"
  | "false"
  | "ellipsis";

export interface ModuleNode extends NodeBase {
  kind: "module";
  body: NodeId[];
}

export interface FunctionDefNode extends NodeBase {
  kind: "function-def";
  name: string;
  nameSpan: TextSpan;
  isAsync: boolean;
  decorators: NodeId[];
  params: NodeId[];
  returns?: NodeId;
  body: NodeId[];
}

export interface ParamNode extends NodeBase {
  kind: "param";
  name: string;
  paramKind: ParamKind;
  annotation?: NodeId;
  default?: NodeId;
}

export interface ClassDefNode extends NodeBase {
  kind: "class-def";
  name: string;
  nameSpan: TextSpan;
  decorators: NodeId[];
  bases: NodeId[];
  keywords: NodeId[];
  body: NodeId[];
}

export interface ReturnNode extends NodeBase {
  kind: "return";
  value?: NodeId;
}

export interface DeleteNode extends NodeBase {
  kind: "delete";
  targets: NodeId[];
}

export interface AssignNode extends NodeBase {
  kind: "assign";
  targets: NodeId[];
  value: NodeId;
}

export interface AugAssignNode extends NodeBase {
  kind: "aug-assign";
  target: NodeId;
  op: string;
  value: NodeId;
}

export interface AnnAssignNode extends NodeBase {
  kind: "ann-assign";
  target: NodeId;
  annotation: NodeId;
  value?: NodeId;
}

export interface ForNode extends NodeBase {
  kind: "for";
  isAsync: boolean;
  target: NodeId;
  iter: NodeId;
  body: NodeId[];
  orelse: NodeId[];
}

export interface WhileNode extends NodeBase {
  kind: "while";
  test: NodeId;
  body: NodeId[];
  orelse: NodeId[];
}

export interface IfNode extends NodeBase {
  kind: "if";
  test: NodeId;
  body: NodeId[];
  orelse: NodeId[];
}

export interface WithNode extends NodeBase {
  kind: "with";
  isAsync: boolean;
  items: NodeId[];
  body: NodeId[];
}

export interface WithItemNode extends NodeBase {
  kind: "with-item";
  context: NodeId;
  target?: NodeId;
}

export interface RaiseNode extends NodeBase {
  kind: "raise";
  exc?: NodeId;
  cause?: NodeId;
}

export interface TryNode extends NodeBase {
  kind: "try";
  body: NodeId[];
  handlers: NodeId[];
  orelse: NodeId[];
  finalbody: NodeId[];
}

export interface ExceptHandlerNode extends NodeBase {
  kind: "except-handler";
  type?: NodeId;
  name?: NamedSpan;
  body: NodeId[];
}

export interface AssertNode extends NodeBase {
  kind: "assert";
  test: NodeId;
  msg?: NodeId;
}

export interface ImportNode extends NodeBase {
  kind: "import";
  names: ImportAlias[];
}

export interface ImportFromNode extends NodeBase {
  kind: "import-from";
  module?: string;
  level: number;
  names: ImportAlias[];
  wildcard: boolean;
}

export interface GlobalNode extends NodeBase {
  kind: "global";
  names: NamedSpan[];
}

export interface NonlocalNode extends NodeBase {
  kind: "nonlocal";
  names: NamedSpan[];
}

export interface ExprStmtNode extends NodeBase {
  kind: "expr-stmt";
  value: NodeId;
}

export interface PassNode extends NodeBase {
  kind: "pass";
}

export interface BreakNode extends NodeBase {
  kind: "break";
}

export interface ContinueNode extends NodeBase {
  kind: "continue";
}

export interface NameNode extends NodeBase {
  kind: "name";
  id: string;
  ctx: ExprContext;
}

export interface AttributeNode extends NodeBase {
  kind: "attribute";
  value: NodeId;
  attr: string;
  attrSpan: TextSpan;
  ctx: ExprContext;
}

export interface CallNode extends NodeBase {
  kind: "call";
  func: NodeId;
  args: NodeId[];
  keywords: NodeId[];
}

export interface KeywordNode extends NodeBase {
  kind: "keyword";
  /** Absent for `**mapping` arguments. */
  arg?: string;
  value: NodeId;
}

export interface SubscriptNode extends NodeBase {
  kind: "subscript";
  value: NodeId;
  slice: NodeId;
  ctx: ExprContext;
}

export interface SliceNode extends NodeBase {
  kind: "slice";
  lower?: NodeId;
  upper?: NodeId;
  step?: NodeId;
}

export interface BinOpNode extends NodeBase {
  kind: "bin-op";
  left: NodeId;
  op: string;
  right: NodeId;
}

export interface UnaryOpNode extends NodeBase {
  kind: "unary-op";
  op: string;
  operand: NodeId;
}

export interface BoolOpNode extends NodeBase {
  kind: "bool-op";
  op: "and" | "or";
  values: NodeId[];
}

export interface CompareNode extends NodeBase {
  kind: "compare";
  left: NodeId;
  ops: string[];
  comparators: NodeId[];
}

export interface IfExpNode extends NodeBase {
  kind: "if-exp";
  test: NodeId;
  body: NodeId;
  orelse: NodeId;
}

export interface LambdaNode extends NodeBase {
  kind: "lambda";
  params: NodeId[];
  body: NodeId;
}

export interface NamedExprNode extends NodeBase {
  kind: "named-expr";
  target: NodeId;
  value: NodeId;
}

export interface AwaitNode extends NodeBase {
  kind: "await";
  value: NodeId;
}

export interface YieldNode extends NodeBase {
  kind: "yield";
  value?: NodeId;
}

export interface YieldFromNode extends NodeBase {
  kind: "yield-from";
  value: NodeId;
}

export interface ConstantNode extends NodeBase {
  kind: "constant";
  constKind: ConstantKind;
  /** Source text of the literal. */
  raw: string;
  /** Literal contents with prefixes and quotes removed (strings only). */
  text?: string;
}

export interface FStringNode extends NodeBase {
  kind: "f-string";
  /** Expressions of every replacement field, nested specs included. */
  values: NodeId[];
}

export interface ListNode extends NodeBase {
  kind: "list";
  elts: NodeId[];
  ctx: ExprContext;
}

export interface TupleNode extends NodeBase {
  kind: "tuple";
  elts: NodeId[];
  ctx: ExprContext;
}

export interface SetNode extends NodeBase {
  kind: "set";
  elts: NodeId[];
}

export interface DictNode extends NodeBase {
  kind: "dict";
  /** `undefined` keys mark `**mapping` unpacking. */
  keys: (NodeId | undefined)[];
  values: NodeId[];
}

export interface StarredNode extends NodeBase {
  kind: "starred";
  value: NodeId;
  ctx: ExprContext;
}

export interface ListCompNode extends NodeBase {
  kind: "list-comp";
  elt: NodeId;
  generators: NodeId[];
}

export interface SetCompNode extends NodeBase {
  kind: "set-comp";
  elt: NodeId;
  generators: NodeId[];
}

export interface GeneratorExpNode extends NodeBase {
  kind: "generator-exp";
  elt: NodeId;
  generators: NodeId[];
}

export interface DictCompNode extends NodeBase {
  kind: "dict-comp";
  key: NodeId;
  value: NodeId;
  generators: NodeId[];
}

export interface ComprehensionNode extends NodeBase {
  kind: "comprehension";
  isAsync: boolean;
  target: NodeId;
  iter: NodeId;
  ifs: NodeId[];
}

export type StatementNode =
  | FunctionDefNode
  | ClassDefNode
  | ReturnNode
  | DeleteNode
  | AssignNode
  | AugAssignNode
  | AnnAssignNode
  | ForNode
  | WhileNode
  | IfNode
  | WithNode
  | RaiseNode
  | TryNode
  | AssertNode
  | ImportNode
  | ImportFromNode
  | GlobalNode
  | NonlocalNode
  | ExprStmtNode
  | PassNode
  | BreakNode
  | ContinueNode;

export type ExpressionNode =
  | NameNode
  | AttributeNode
  | CallNode
  | SubscriptNode
  | SliceNode
  | BinOpNode
  | UnaryOpNode
  | BoolOpNode
  | CompareNode
  | IfExpNode
  | LambdaNode
  | NamedExprNode
  | AwaitNode
  | YieldNode
  | YieldFromNode
  | ConstantNode
  | FStringNode
  | ListNode
  | TupleNode
  | SetNode
  | DictNode
  | StarredNode
  | ListCompNode
  | SetCompNode
  | GeneratorExpNode
  | DictCompNode;

export type SyntaxNode =
  | ModuleNode
  | StatementNode
  | ExpressionNode
  | ParamNode
  | WithItemNode
  | ExceptHandlerNode
  | KeywordNode
  | ComprehensionNode;

export type SyntaxKind = SyntaxNode["kind"];

export type NodeOfKind<K extends SyntaxKind> = Extract<SyntaxNode, { kind: K }>;

const assertNever = (value: never): never => {
  throw new Error(`unhandled syntax node ${JSON.stringify(value)}`);
};

const present = (...ids: (NodeId | undefined)[]): NodeId[] =>
  ids.filter((id): id is NodeId => id !== undefined);

/** Child node ids in source order. */
export const childrenOf = (node: SyntaxNode): NodeId[] => {
  switch (node.kind) {
    case "module":
      return [...node.body];
    case "function-def":
      return [...node.decorators, ...node.params, ...present(node.returns), ...node.body];
    case "param":
      return present(node.annotation, node.default);
    case "class-def":
      return [...node.decorators, ...node.bases, ...node.keywords, ...node.body];
    case "return":
      return present(node.value);
    case "delete":
      return [...node.targets];
    case "assign":
      return [...node.targets, node.value];
    case "aug-assign":
      return [node.target, node.value];
    case "ann-assign":
      return present(node.target, node.annotation, node.value);
    case "for":
      return [node.target, node.iter, ...node.body, ...node.orelse];
    case "while":
      return [node.test, ...node.body, ...node.orelse];
    case "if":
      return [node.test, ...node.body, ...node.orelse];
    case "with":
      return [...node.items, ...node.body];
    case "with-item":
      return present(node.context, node.target);
    case "raise":
      return present(node.exc, node.cause);
    case "try":
      return [...node.body, ...node.handlers, ...node.orelse, ...node.finalbody];
    case "except-handler":
      return [...present(node.type), ...node.body];
    case "assert":
      return present(node.test, node.msg);
    case "import":
    case "import-from":
    case "global":
    case "nonlocal":
    case "pass":
    case "break":
    case "continue":
    case "name":
    case "constant":
      return [];
    case "expr-stmt":
      return [node.value];
    case "attribute":
      return [node.value];
    case "call":
      return [node.func, ...node.args, ...node.keywords];
    case "keyword":
      return [node.value];
    case "subscript":
      return [node.value, node.slice];
    case "slice":
      return present(node.lower, node.upper, node.step);
    case "bin-op":
      return [node.left, node.right];
    case "unary-op":
      return [node.operand];
    case "bool-op":
      return [...node.values];
    case "compare":
      return [node.left, ...node.comparators];
    case "if-exp":
      return [node.body, node.test, node.orelse];
    case "lambda":
      return [...node.params, node.body];
    case "named-expr":
      return [node.target, node.value];
    case "await":
      return [node.value];
    case "yield":
      return present(node.value);
    case "yield-from":
      return [node.value];
    case "f-string":
      return [...node.values];
    case "list":
    case "tuple":
    case "set":
      return [...node.elts];
    case "dict":
      return node.keys.flatMap((key, index) => present(key, node.values[index]));
    case "starred":
      return [node.value];
    case "list-comp":
    case "set-comp":
    case "generator-exp":
      return [node.elt, ...node.generators];
    case "dict-comp":
      return [node.key, node.value, ...node.generators];
    case "comprehension":
      return [node.target, node.iter, ...node.ifs];
  }
  return assertNever(node);
};

/**
 * Arena that owns every node of one module. Nodes refer to their children by
 * id, so the store can be shared read-only between the merge and the audit.
 */
export class NodeStore {
  readonly file: string;
  readonly source: string;
  private readonly nodes: SyntaxNode[] = [];
  private rootId: NodeId | undefined;

  constructor({ file, source }: { file: string; source: string }) {
    this.file = file;
    this.source = source;
  }

  add(node: SyntaxNode): NodeId {
    const id = this.nodes.length;
    this.nodes.push(node);
    return id;
  }

  setRoot(id: NodeId) {
    this.expect(id, "module");
    this.rootId = id;
  }

  get root(): NodeId {
    if (this.rootId === undefined) {
      throw new Error(`node store for ${this.file} has no module root`);
    }
    return this.rootId;
  }

  get size() {
    return this.nodes.length;
  }

  get(id: NodeId): SyntaxNode {
    const node = this.nodes[id];
    if (!node) {
      throw new Error(`node ${id} does not exist in ${this.file}`);
    }
    return node;
  }

  expect<K extends SyntaxKind>(id: NodeId, kind: K): NodeOfKind<K> {
    const node = this.get(id);
    if (!isKind(node, kind)) {
      throw new Error(`expected ${kind} node at ${id}, found ${node.kind}`);
    }
    return node;
  }

  /** Top-level statements of the module. */
  get body(): readonly NodeId[] {
    return this.expect(this.root, "module").body;
  }

  children(id: NodeId): NodeId[] {
    return childrenOf(this.get(id));
  }

  text(id: NodeId): string {
    const { span } = this.get(id);
    return this.source.slice(span.start, span.end);
  }

  /** Pre-order walk of `id` and every descendant. */
  *descendants(id: NodeId): IterableIterator<NodeId> {
    const stack = [id];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      yield current;
      const children = this.children(current);
      for (let i = children.length - 1; i >= 0; i -= 1) {
        const child = children[i];
        if (child !== undefined) stack.push(child);
      }
    }
  }
}

export const isKind = <K extends SyntaxKind>(
  node: SyntaxNode,
  kind: K,
): node is NodeOfKind<K> => node.kind === kind;
